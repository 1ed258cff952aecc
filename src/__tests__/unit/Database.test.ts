/**
 * Database Unit Tests
 *
 * Tests the DatabaseAdapter lifecycle, migrations, transactions and the
 * shared instance managed by getDatabase/closeDatabase.
 *
 * All tests use in-memory SQLite (`:memory:`).
 */

import {
  DatabaseAdapter,
  getDatabase,
  closeDatabase,
} from "../../storage/Database.js";

beforeAll(() => {
  jest.spyOn(console, "log").mockImplementation(() => {});
});

afterAll(() => {
  jest.restoreAllMocks();
});

describe("DatabaseAdapter", () => {
  let adapter: DatabaseAdapter;

  beforeEach(() => {
    adapter = new DatabaseAdapter({ path: ":memory:", walMode: false });
  });

  afterEach(() => {
    adapter.close();
  });

  it("should not open a connection until initialize()", () => {
    expect(adapter.isInitialized()).toBe(false);
    expect(() => adapter.getDb()).toThrow(
      "Database not initialized. Call initialize() first.",
    );
  });

  it("should create the schema on initialize()", () => {
    adapter.initialize();

    const tables = adapter
      .getDb()
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' ORDER BY name",
      )
      .all()
      .map((row) => row.name);

    expect(tables).toContain("migrations");
    expect(tables).toContain("embeddings");
    expect(adapter.isInitialized()).toBe(true);
  });

  it("should record applied migrations", () => {
    adapter.initialize();

    const names = adapter
      .getDb()
      .prepare<[], { name: string }>("SELECT name FROM migrations ORDER BY id")
      .all()
      .map((row) => row.name);

    expect(names).toEqual(["001_create_embeddings"]);
  });

  it("should be idempotent", () => {
    adapter.initialize();
    const db = adapter.getDb();
    adapter.initialize();

    expect(adapter.getDb()).toBe(db);
  });

  it("should return the value of a transaction", () => {
    adapter.initialize();

    const result = adapter.transaction(() => {
      adapter
        .getDb()
        .prepare<[string, string, string, string]>(
          "INSERT INTO embeddings (doc_id, model, content_hash, vector) VALUES (?, ?, ?, ?)",
        )
        .run("A-1", "m", "h", "[1]");
      return 42;
    });

    expect(result).toBe(42);
    const count = adapter
      .getDb()
      .prepare<[], { count: number }>("SELECT COUNT(*) as count FROM embeddings")
      .get();
    expect(count?.count).toBe(1);
  });

  it("should roll back a failing transaction", () => {
    adapter.initialize();
    const insert = adapter
      .getDb()
      .prepare<[string]>(
        "INSERT INTO embeddings (doc_id, model, content_hash, vector) VALUES (?, 'm', 'h', '[1]')",
      );

    expect(() =>
      adapter.transaction(() => {
        insert.run("A-1");
        insert.run("A-1");
      }),
    ).toThrow();

    const count = adapter
      .getDb()
      .prepare<[], { count: number }>("SELECT COUNT(*) as count FROM embeddings")
      .get();
    expect(count?.count).toBe(0);
  });

  it("should reset state on close()", () => {
    adapter.initialize();
    adapter.close();

    expect(adapter.isInitialized()).toBe(false);
    expect(() => adapter.getDb()).toThrow();
  });
});

describe("getDatabase / closeDatabase", () => {
  afterEach(() => {
    closeDatabase();
  });

  it("should return one initialized instance", () => {
    const first = getDatabase({ path: ":memory:", walMode: false });
    const second = getDatabase({ path: ":memory:", walMode: false });

    expect(first).toBe(second);
    expect(first.isInitialized()).toBe(true);
  });

  it("should open a new instance after closeDatabase()", () => {
    const first = getDatabase({ path: ":memory:", walMode: false });
    closeDatabase();
    const second = getDatabase({ path: ":memory:", walMode: false });

    expect(second).not.toBe(first);
    expect(first.isInitialized()).toBe(false);
  });
});
