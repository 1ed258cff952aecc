/**
 * Database.ts - SQLite adapter for the persisted vector index
 *
 * Uses better-sqlite3 for synchronous SQLite access.
 */

import Database from "better-sqlite3";
import { dirname, resolve } from "path";
import { existsSync, mkdirSync } from "fs";

export interface DatabaseConfig {
  /** Path to SQLite database file, or ":memory:" */
  path: string;
  /** Enable WAL mode for better concurrency */
  walMode?: boolean;
  /** Enable verbose logging */
  verbose?: boolean;
}

interface Migration {
  name: string;
  sql: string;
}

const MIGRATIONS: Migration[] = [
  {
    name: "001_create_embeddings",
    sql: `
      CREATE TABLE embeddings (
        doc_id TEXT NOT NULL,
        model TEXT NOT NULL,
        content_hash TEXT NOT NULL,
        vector TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        PRIMARY KEY (doc_id, model)
      );
      CREATE INDEX idx_embeddings_model ON embeddings(model);
    `,
  },
];

/**
 * SQLite database adapter
 */
export class DatabaseAdapter {
  private db: Database.Database | null = null;
  private config: DatabaseConfig;
  private initialized: boolean = false;

  constructor(config: DatabaseConfig) {
    this.config = {
      walMode: true,
      verbose: false,
      ...config,
    };
  }

  /**
   * Open the connection and run migrations
   */
  initialize(): void {
    if (this.initialized) {
      return;
    }

    const inMemory = this.config.path === ":memory:";
    if (!inMemory) {
      const dbDir = dirname(resolve(this.config.path));
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = new Database(this.config.path, {
      verbose: this.config.verbose ? console.log : undefined,
    });

    if (this.config.walMode && !inMemory) {
      this.db.pragma("journal_mode = WAL");
    }

    this.runMigrations(this.db);

    this.initialized = true;
    console.log(`[Database] Initialized at ${this.config.path}`);
  }

  private runMigrations(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);

    const applied = new Set(
      db
        .prepare<[], { name: string }>("SELECT name FROM migrations")
        .all()
        .map((row) => row.name),
    );

    const record = db.prepare<[string]>("INSERT INTO migrations (name) VALUES (?)");

    for (const migration of MIGRATIONS) {
      if (applied.has(migration.name)) continue;
      db.transaction(() => {
        db.exec(migration.sql);
        record.run(migration.name);
      })();
      console.log(`[Database] Applied migration: ${migration.name}`);
    }
  }

  /**
   * Get the raw database instance
   */
  getDb(): Database.Database {
    if (!this.db) {
      throw new Error("Database not initialized. Call initialize() first.");
    }
    return this.db;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.initialized = false;
      console.log("[Database] Connection closed");
    }
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  transaction<T>(fn: () => T): T {
    return this.getDb().transaction(fn)();
  }
}

let instance: DatabaseAdapter | null = null;

/**
 * Shared adapter for the process, opened on first use.
 */
export function getDatabase(config: DatabaseConfig): DatabaseAdapter {
  if (!instance) {
    instance = new DatabaseAdapter(config);
    instance.initialize();
  }
  return instance;
}

export function closeDatabase(): void {
  if (instance) {
    instance.close();
    instance = null;
  }
}
