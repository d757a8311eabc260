import { existsSync } from "fs";
import { readFile } from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { insertDatasetSchema, insertIncidentSchema, insertTicketSchema, timestampField } from "@shared/schema";
import { parseOrThrow } from "./aggregates";
import type { AppConfig } from "./config";
import type { AppContext } from "./context";
import type { SqlParam, StorageGateway } from "./db";
import { ValidationError } from "./errors";
import { logger, withTaskContext } from "./logger";

const log = logger.child("seed");

export const DEFAULT_SEED_DIR = fileURLToPath(new URL("../data", import.meta.url));

/** One CSV per table, header row first, snake_case column names. */
export const SEED_FILES = {
  incidents: "cyber_incidents.csv",
  datasets: "datasets_metadata.csv",
  tickets: "it_tickets.csv",
} as const;

type SeedTable = keyof typeof SEED_FILES;

const seedDataSchema = z.object({
  incidents: z.array(insertIncidentSchema.extend({ reportedAt: timestampField })).default([]),
  datasets: z.array(insertDatasetSchema.extend({ createdAt: timestampField })).default([]),
  tickets: z.array(insertTicketSchema.extend({ createdAt: timestampField })).default([]),
});

export type SeedData = z.infer<typeof seedDataSchema>;

export interface SeedReport {
  adminUserId: number;
  incidents: number;
  datasets: number;
  tickets: number;
}

const csvRecordsSchema = z.array(z.record(z.string()));

function toFieldName(header: string): string {
  return header.trim().replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

export function parseCsv(content: string, source = "CSV"): Record<string, string>[] {
  let records: unknown;
  try {
    records = parse(content, {
      columns: (header: string[]) => header.map(toFieldName),
      skip_empty_lines: true,
      trim: true,
    });
  } catch (err) {
    throw new ValidationError([{ field: source, message: err instanceof Error ? err.message : String(err) }]);
  }
  // Empty cells are absent values.
  return parseOrThrow(csvRecordsSchema, records).map((record) =>
    Object.fromEntries(Object.entries(record).filter(([, value]) => value !== "")),
  );
}

async function readTable(dir: string, table: SeedTable): Promise<Record<string, string>[]> {
  const file = path.join(dir, SEED_FILES[table]);
  if (!existsSync(file)) {
    log.warn("Seed file not found, skipping table", { file });
    return [];
  }
  return parseCsv(await readFile(file, "utf8"), SEED_FILES[table]);
}

export async function loadSeedData(dir = DEFAULT_SEED_DIR): Promise<SeedData> {
  const [incidents, datasets, tickets] = await Promise.all([
    readTable(dir, "incidents"),
    readTable(dir, "datasets"),
    readTable(dir, "tickets"),
  ]);
  return parseOrThrow(seedDataSchema, { incidents, datasets, tickets });
}

function timestamp(value: Date | null | undefined): number | null {
  return value ? value.getTime() : null;
}

// Table names below are fixed strings, never input.
function isEmpty(gateway: StorageGateway, table: "cyber_incidents" | "datasets_metadata" | "it_tickets"): boolean {
  const [row] = gateway.query<{ n: number }>(`SELECT COUNT(*) AS n FROM ${table}`);
  return !row || row.n === 0;
}

function insertAll(gateway: StorageGateway, statement: string, rows: SqlParam[][]): number {
  let inserted = 0;
  for (const params of rows) {
    inserted += gateway.execute(statement, params);
  }
  return inserted;
}

/**
 * Bulk-loads sample rows straight through the gateway, without the services'
 * status rules. A table that already holds rows is left alone.
 */
export function seedTables(gateway: StorageGateway, data: SeedData): Omit<SeedReport, "adminUserId"> {
  return gateway.transaction(() => {
    const report = { incidents: 0, datasets: 0, tickets: 0 };

    if (isEmpty(gateway, "cyber_incidents")) {
      report.incidents = insertAll(
        gateway,
        `INSERT INTO cyber_incidents (title, description, category, severity, status, reported_at, resolved_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        data.incidents.map((i) => [
          i.title,
          i.description ?? null,
          i.category,
          i.severity,
          i.status ?? "open",
          i.reportedAt.getTime(),
          timestamp(i.resolvedAt),
        ]),
      );
    }

    if (isEmpty(gateway, "datasets_metadata")) {
      report.datasets = insertAll(
        gateway,
        `INSERT INTO datasets_metadata (name, row_count, column_count, uploader, created_at)
         VALUES (?, ?, ?, ?, ?)`,
        data.datasets.map((d) => [d.name, d.rowCount, d.columnCount, d.uploader, d.createdAt.getTime()]),
      );
    }

    if (isEmpty(gateway, "it_tickets")) {
      report.tickets = insertAll(
        gateway,
        `INSERT INTO it_tickets (title, description, priority, status, assignee, created_at, resolved_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        data.tickets.map((t) => [
          t.title,
          t.description ?? null,
          t.priority,
          t.status ?? "open",
          t.assignee,
          t.createdAt.getTime(),
          timestamp(t.resolvedAt),
        ]),
      );
    }

    return report;
  });
}

export async function seedDatabase(
  ctx: Pick<AppContext, "gateway" | "auth">,
  seed: Pick<AppConfig["seed"], "adminUsername" | "adminPassword">,
  dir = DEFAULT_SEED_DIR,
): Promise<SeedReport> {
  return withTaskContext("seed", async () => {
    const admin = await ctx.auth.seedAdmin(seed.adminUsername, seed.adminPassword);
    const data = await loadSeedData(dir);
    const counts = seedTables(ctx.gateway, data);
    log.info("Seed complete", { adminUserId: admin.id, ...counts });
    return { adminUserId: admin.id, ...counts };
  });
}
