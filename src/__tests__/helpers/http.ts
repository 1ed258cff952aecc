/**
 * Start an express app on an ephemeral local port for request tests.
 */

import { createServer } from "http";
import type { Express } from "express";

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

export async function startTestServer(app: Express): Promise<TestServer> {
  const server = createServer(app);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));

  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Test server did not bind to a TCP port");
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
