import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../logger", () => ({
  logger: {
    child: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  },
}));

import Database from "better-sqlite3";
import { openDatabase, translateStorageError, type StorageGateway } from "../db";
import { ConstraintViolationError, StorageUnavailableError } from "../errors";

describe("StorageGateway", () => {
  let gateway: StorageGateway;

  beforeEach(() => {
    gateway = openDatabase(":memory:");
    gateway.migrate();
  });

  afterEach(() => {
    gateway.close();
  });

  it("creates every table and is safe to migrate twice", () => {
    gateway.migrate();
    const tables = gateway
      .query<{ name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .map((row) => row.name);
    expect(tables).toEqual(["cyber_incidents", "datasets_metadata", "it_tickets", "users"]);
  });

  it("returns the affected row count from execute", () => {
    const inserted = gateway.execute(
      "INSERT INTO datasets_metadata (name, row_count, column_count, uploader, created_at) VALUES (?, ?, ?, ?, ?)",
      ["a", 10, 2, "alice", 1000],
    );
    expect(inserted).toBe(1);

    gateway.execute(
      "INSERT INTO datasets_metadata (name, row_count, column_count, uploader, created_at) VALUES (?, ?, ?, ?, ?)",
      ["b", 20, 3, "alice", 2000],
    );
    expect(gateway.execute("UPDATE datasets_metadata SET uploader = ? WHERE uploader = ?", ["bob", "alice"])).toBe(2);
    expect(gateway.execute("DELETE FROM datasets_metadata WHERE name = ?", ["missing"])).toBe(0);
  });

  it("binds parameters instead of interpolating them", () => {
    const hostile = "x'); DROP TABLE users; --";
    gateway.execute("INSERT INTO users (username, password_hash, role, created_at) VALUES (?, ?, ?, ?)", [
      hostile,
      "hash.salt",
      "standard",
      1,
    ]);
    const rows = gateway.query<{ username: string }>("SELECT username FROM users WHERE username = ?", [hostile]);
    expect(rows).toEqual([{ username: hostile }]);
  });

  it("commits a transaction when the callback returns", () => {
    const result = gateway.transaction(() => {
      gateway.execute("INSERT INTO users (username, password_hash, created_at) VALUES (?, ?, ?)", ["u1", "h.s", 1]);
      gateway.execute("INSERT INTO users (username, password_hash, created_at) VALUES (?, ?, ?)", ["u2", "h.s", 1]);
      return "done";
    });
    expect(result).toBe("done");
    expect(gateway.query<{ n: number }>("SELECT COUNT(*) AS n FROM users")).toEqual([{ n: 2 }]);
  });

  it("rolls a transaction back when the callback throws", () => {
    expect(() =>
      gateway.transaction(() => {
        gateway.execute("INSERT INTO users (username, password_hash, created_at) VALUES (?, ?, ?)", ["u1", "h.s", 1]);
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(gateway.query<{ n: number }>("SELECT COUNT(*) AS n FROM users")).toEqual([{ n: 0 }]);
  });

  it("translates a unique violation into ConstraintViolationError", () => {
    const insert = () =>
      gateway.execute("INSERT INTO users (username, password_hash, created_at) VALUES (?, ?, ?)", ["dup", "h.s", 1]);
    insert();
    expect(insert).toThrow(ConstraintViolationError);
  });

  it("translates a check violation into ConstraintViolationError", () => {
    expect(() =>
      gateway.execute(
        "INSERT INTO datasets_metadata (name, row_count, column_count, uploader, created_at) VALUES (?, ?, ?, ?, ?)",
        ["bad", -1, 2, "alice", 1],
      ),
    ).toThrow(ConstraintViolationError);
  });

  it("rolls back every row when one statement in a transaction violates a constraint", () => {
    expect(() =>
      gateway.transaction(() => {
        gateway.execute("INSERT INTO users (username, password_hash, created_at) VALUES (?, ?, ?)", ["same", "h.s", 1]);
        gateway.execute("INSERT INTO users (username, password_hash, created_at) VALUES (?, ?, ?)", ["same", "h.s", 1]);
      }),
    ).toThrow(ConstraintViolationError);
    expect(gateway.query<{ n: number }>("SELECT COUNT(*) AS n FROM users")).toEqual([{ n: 0 }]);
  });

  it("reports connectivity through ping", () => {
    expect(gateway.ping()).toBe(true);
  });

  it("raises StorageUnavailableError once closed", () => {
    gateway.close();
    expect(gateway.isOpen).toBe(false);
    expect(() => gateway.query("SELECT 1")).toThrow(StorageUnavailableError);
    expect(gateway.ping()).toBe(false);
    gateway.close();
  });
});

describe("translateStorageError", () => {
  it("maps busy and read-only failures to StorageUnavailableError", () => {
    const busy = new Database.SqliteError("database is locked", "SQLITE_BUSY");
    const readonly = new Database.SqliteError("attempt to write a readonly database", "SQLITE_READONLY_DBMOVED");
    expect(translateStorageError(busy)).toBeInstanceOf(StorageUnavailableError);
    expect(translateStorageError(readonly)).toBeInstanceOf(StorageUnavailableError);
  });

  it("finds a driver error wrapped as a cause", () => {
    const inner = new Database.SqliteError("UNIQUE constraint failed: users.username", "SQLITE_CONSTRAINT_UNIQUE");
    const wrapped = new Error("Failed query", { cause: inner });
    const translated = translateStorageError(wrapped);
    expect(translated).toBeInstanceOf(ConstraintViolationError);
    expect(translated).toMatchObject({ details: { code: "SQLITE_CONSTRAINT_UNIQUE" } });
  });

  it("passes through errors that do not come from SQLite", () => {
    const plain = new TypeError("not sql");
    expect(translateStorageError(plain)).toBe(plain);
  });
});
