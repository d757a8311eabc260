import { mkdirSync } from "fs";
import path from "path";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "@shared/schema";
import { ConstraintViolationError, StorageUnavailableError } from "./errors";
import { logger } from "./logger";

const log = logger.child("db");

export type AppDatabase = BetterSQLite3Database<typeof schema>;
export type SqlParam = string | number | bigint | Buffer | null;
type SqliteError = InstanceType<typeof Database.SqliteError>;

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL UNIQUE,
    password_hash TEXT NOT NULL,
    role TEXT NOT NULL DEFAULT 'standard',
    created_at INTEGER NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_users_role ON users (role)`,
  `CREATE TABLE IF NOT EXISTS cyber_incidents (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    description TEXT,
    category TEXT NOT NULL,
    severity TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'open',
    reported_at INTEGER NOT NULL,
    resolved_at INTEGER
  )`,
  `CREATE INDEX IF NOT EXISTS idx_incidents_category ON cyber_incidents (category)`,
  `CREATE INDEX IF NOT EXISTS idx_incidents_severity ON cyber_incidents (severity)`,
  `CREATE INDEX IF NOT EXISTS idx_incidents_status ON cyber_incidents (status)`,
  `CREATE INDEX IF NOT EXISTS idx_incidents_reported ON cyber_incidents (reported_at)`,
  `CREATE TABLE IF NOT EXISTS datasets_metadata (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    row_count INTEGER NOT NULL CHECK (row_count >= 0),
    column_count INTEGER NOT NULL CHECK (column_count >= 0),
    uploader TEXT NOT NULL,
    created_at INTEGER NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_datasets_uploader ON datasets_metadata (uploader)`,
  `CREATE INDEX IF NOT EXISTS idx_datasets_created ON datasets_metadata (created_at)`,
  `CREATE TABLE IF NOT EXISTS it_tickets (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    description TEXT,
    priority TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'open',
    assignee TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    resolved_at INTEGER
  )`,
  `CREATE INDEX IF NOT EXISTS idx_tickets_priority ON it_tickets (priority)`,
  `CREATE INDEX IF NOT EXISTS idx_tickets_status ON it_tickets (status)`,
  `CREATE INDEX IF NOT EXISTS idx_tickets_assignee ON it_tickets (assignee)`,
  `CREATE INDEX IF NOT EXISTS idx_tickets_created ON it_tickets (created_at)`,
];

const UNAVAILABLE_CODES = new Set([
  "SQLITE_CANTOPEN",
  "SQLITE_BUSY",
  "SQLITE_LOCKED",
  "SQLITE_IOERR",
  "SQLITE_READONLY",
  "SQLITE_FULL",
  "SQLITE_CORRUPT",
  "SQLITE_NOTADB",
]);

function findSqliteError(err: unknown): SqliteError | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 4 && current instanceof Error; depth++) {
    if (current instanceof Database.SqliteError) return current;
    current = current.cause;
  }
  return undefined;
}

/**
 * Maps driver failures onto the storage error kinds. Errors that are already
 * AppErrors, or that do not come from SQLite, pass through unchanged.
 */
export function translateStorageError(err: unknown): unknown {
  if (err instanceof ConstraintViolationError || err instanceof StorageUnavailableError) {
    return err;
  }
  const sqliteError = findSqliteError(err);
  if (!sqliteError) return err;

  if (sqliteError.code.startsWith("SQLITE_CONSTRAINT")) {
    return new ConstraintViolationError(sqliteError.message, { code: sqliteError.code });
  }
  const baseCode = sqliteError.code.split("_").slice(0, 2).join("_");
  if (UNAVAILABLE_CODES.has(baseCode)) {
    return new StorageUnavailableError(sqliteError.message, { code: sqliteError.code });
  }
  return err;
}

export class StorageGateway {
  readonly db: AppDatabase;

  constructor(
    private readonly sqlite: Database.Database,
    readonly location: string,
  ) {
    this.db = drizzle(sqlite, { schema });
  }

  get isOpen(): boolean {
    return this.sqlite.open;
  }

  /** Creates tables and indexes when absent. Safe to run on every start. */
  migrate(): void {
    this.transaction(() => {
      for (const statement of SCHEMA_STATEMENTS) {
        this.sqlite.exec(statement);
      }
    });
    log.info("Schema ready", { location: this.location });
  }

  /** Runs a write statement and returns the number of affected rows. */
  execute(statement: string, params: readonly SqlParam[] = []): number {
    return this.run(() => this.sqlite.prepare(statement).run(...params).changes);
  }

  query<T extends Record<string, unknown>>(statement: string, params: readonly SqlParam[] = []): T[] {
    return this.run(() => this.sqlite.prepare<SqlParam[], T>(statement).all(...params));
  }

  /**
   * Runs `fn` in a transaction. The transaction commits when `fn` returns
   * and rolls back when it throws; nested calls become savepoints.
   */
  transaction<T>(fn: () => T): T {
    return this.run(() => this.sqlite.transaction(fn)());
  }

  /** Runs `fn` against the drizzle handle with storage error translation. */
  run<T>(fn: (db: AppDatabase) => T): T {
    if (!this.sqlite.open) {
      throw new StorageUnavailableError("Database connection is closed");
    }
    try {
      return fn(this.db);
    } catch (err) {
      throw translateStorageError(err);
    }
  }

  ping(): boolean {
    try {
      this.query("SELECT 1 AS ok");
      return true;
    } catch (err) {
      log.error("Connectivity check failed", { error: String(err) });
      return false;
    }
  }

  close(): void {
    if (!this.sqlite.open) return;
    this.sqlite.close();
    log.info("Database connection closed", { location: this.location });
  }
}

/**
 * Opens the process-wide connection. Pass ":memory:" for a throwaway
 * database.
 */
export function openDatabase(location: string): StorageGateway {
  let sqlite: Database.Database;
  try {
    if (location !== ":memory:") {
      mkdirSync(path.dirname(path.resolve(location)), { recursive: true });
    }
    sqlite = new Database(location);
  } catch (err) {
    throw new StorageUnavailableError(`Unable to open database at ${location}`, { error: String(err) });
  }

  if (location !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.pragma("foreign_keys = ON");
  sqlite.pragma("busy_timeout = 5000");

  return new StorageGateway(sqlite, location);
}
