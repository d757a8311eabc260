import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";

vi.mock("../logger", () => ({
  logger: {
    child: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  },
  withTaskContext: <T>(_task: string, fn: () => T): T => fn(),
}));

import { openDatabase, type StorageGateway } from "../db";
import { AuthManager } from "../auth/manager";
import { loadSeedData, parseCsv, seedDatabase, seedTables } from "../seed";
import { ValidationError } from "../errors";

const seedConfig = { adminUsername: "admin", adminPassword: "adminpass" };

describe("parseCsv", () => {
  it("maps snake_case headers and drops empty cells", () => {
    const rows = parseCsv(
      [
        "title,description,status,reported_at",
        '"Phishing, round two","Reported by ""finance""",resolved,2025-01-01T00:00:00.000Z',
        "Port scan,,open,2025-01-02T00:00:00.000Z",
        "",
      ].join("\n"),
    );
    expect(rows).toEqual([
      {
        title: "Phishing, round two",
        description: 'Reported by "finance"',
        status: "resolved",
        reportedAt: "2025-01-01T00:00:00.000Z",
      },
      { title: "Port scan", status: "open", reportedAt: "2025-01-02T00:00:00.000Z" },
    ]);
  });

  it("reports malformed CSV as a validation error", () => {
    expect(() => parseCsv('title,category\n"unterminated,Malware\n', "cyber_incidents.csv")).toThrow(ValidationError);
  });
});

describe("seeding", () => {
  let gateway: StorageGateway;
  let auth: AuthManager;
  let dir: string;

  beforeEach(() => {
    gateway = openDatabase(":memory:");
    gateway.migrate();
    auth = new AuthManager(gateway);
    dir = mkdtempSync(path.join(tmpdir(), "seed-"));
  });

  afterEach(() => {
    gateway.close();
    rmSync(dir, { recursive: true, force: true });
  });

  function writeCsv(file: string, lines: string[]): void {
    writeFileSync(path.join(dir, file), lines.join("\n") + "\n");
  }

  it("loads the bundled sample files", async () => {
    const data = await loadSeedData();
    expect(data.incidents.length).toBeGreaterThan(0);
    expect(data.datasets.length).toBeGreaterThan(0);
    expect(data.tickets.length).toBeGreaterThan(0);
  });

  it("creates the admin and inserts every row once", async () => {
    writeCsv("cyber_incidents.csv", [
      "title,description,category,severity,status,reported_at,resolved_at",
      'i1,"Invoice link, sent to finance",Phishing,high,,2025-01-01T00:00:00.000Z,',
      "i2,,Malware,low,resolved,2025-01-01T00:00:00.000Z,2025-01-01T05:00:00.000Z",
    ]);
    writeCsv("datasets_metadata.csv", ["name,row_count,column_count,uploader,created_at", "d1,10,2,alice,2025-01-02"]);
    writeCsv("it_tickets.csv", [
      "title,description,priority,status,assignee,created_at,resolved_at",
      "t1,,low,,A,2025-01-03T00:00:00.000Z,",
    ]);

    const first = await seedDatabase({ gateway, auth }, seedConfig, dir);
    expect(first).toMatchObject({ incidents: 2, datasets: 1, tickets: 1 });

    const session = await auth.authenticate("admin", "adminpass");
    await expect(auth.requireAuth(session)).resolves.toMatchObject({ id: first.adminUserId, role: "admin" });

    const second = await seedDatabase({ gateway, auth }, seedConfig, dir);
    expect(second).toEqual({ adminUserId: first.adminUserId, incidents: 0, datasets: 0, tickets: 0 });
    expect(gateway.query<{ n: number }>("SELECT COUNT(*) AS n FROM cyber_incidents")).toEqual([{ n: 2 }]);

    const rows = gateway.query<{ title: string; description: string | null; status: string; resolved_at: number | null }>(
      "SELECT title, description, status, resolved_at FROM cyber_incidents ORDER BY title",
    );
    expect(rows).toEqual([
      { title: "i1", description: "Invoice link, sent to finance", status: "open", resolved_at: null },
      { title: "i2", description: null, status: "resolved", resolved_at: Date.parse("2025-01-01T05:00:00.000Z") },
    ]);
    expect(gateway.query<{ row_count: number }>("SELECT row_count FROM datasets_metadata")).toEqual([{ row_count: 10 }]);
  });

  it("skips a table whose file is missing", async () => {
    writeCsv("datasets_metadata.csv", ["name,row_count,column_count,uploader,created_at", "d1,10,2,alice,2025-01-02"]);
    const data = await loadSeedData(dir);
    expect(data.incidents).toEqual([]);
    expect(data.tickets).toEqual([]);
    expect(data.datasets).toEqual([
      { name: "d1", rowCount: 10, columnCount: 2, uploader: "alice", createdAt: new Date("2025-01-02") },
    ]);
  });

  it("skips only the tables that already hold rows", () => {
    gateway.execute(
      "INSERT INTO it_tickets (title, priority, status, assignee, created_at) VALUES (?, ?, ?, ?, ?)",
      ["existing", "low", "open", "A", 1],
    );
    const report = seedTables(gateway, {
      incidents: [],
      datasets: [{ name: "d", rowCount: 1, columnCount: 1, uploader: "u", createdAt: new Date(0) }],
      tickets: [{ title: "new", priority: "low", assignee: "B", createdAt: new Date(0) }],
    });
    expect(report).toEqual({ incidents: 0, datasets: 1, tickets: 0 });
  });

  it("rejects rows that break the table rules", async () => {
    writeCsv("datasets_metadata.csv", ["name,row_count,column_count,uploader,created_at", "d,-4,1,u,2025-01-01"]);
    await expect(loadSeedData(dir)).rejects.toMatchObject({
      issues: [{ field: "datasets.0.rowCount", message: "Must not be negative" }],
    });
  });

  it("rejects a row with a blank count", async () => {
    writeCsv("datasets_metadata.csv", ["name,row_count,column_count,uploader,created_at", "d,,1,u,2025-01-01"]);
    await expect(loadSeedData(dir)).rejects.toBeInstanceOf(ValidationError);
  });
});
