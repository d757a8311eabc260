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

import { openDatabase, type StorageGateway } from "../db";
import { DatasetService } from "../services/datasets";
import { NotFoundError, ValidationError } from "../errors";

const NOW = new Date("2025-06-01T12:00:00.000Z");

describe("DatasetService", () => {
  let gateway: StorageGateway;
  let service: DatasetService;

  beforeEach(() => {
    gateway = openDatabase(":memory:");
    gateway.migrate();
    service = new DatasetService(gateway, () => NOW);
  });

  afterEach(() => {
    gateway.close();
  });

  it("creates and reads back a dataset", async () => {
    const created = await service.create({ name: "churn", rowCount: "1200", columnCount: 8, uploader: "alice" });
    expect(created).toMatchObject({ name: "churn", rowCount: 1200, columnCount: 8, uploader: "alice", createdAt: NOW });
    await expect(service.get(created.id)).resolves.toEqual(created);
  });

  it("rejects negative and fractional counts", async () => {
    await expect(service.create({ name: "x", rowCount: -1, columnCount: 1, uploader: "a" })).rejects.toMatchObject({
      issues: [{ field: "rowCount", message: "Must not be negative" }],
    });
    await expect(service.create({ name: "x", rowCount: 1, columnCount: 1.5, uploader: "a" })).rejects.toMatchObject({
      issues: [{ field: "columnCount", message: "Must be a whole number" }],
    });
    await expect(service.create({ name: "x", rowCount: 1, columnCount: 1 })).rejects.toBeInstanceOf(ValidationError);
  });

  it("rejects blank or non-numeric counts instead of reading them as zero", async () => {
    for (const rowCount of [null, "", "  ", false, []]) {
      const err = await service
        .create({ name: "x", rowCount, columnCount: 1, uploader: "a" })
        .catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ issues: [expect.objectContaining({ field: "rowCount" })] });
    }
    expect((await service.list()).length).toBe(0);

    const created = await service.create({ name: "x", rowCount: 7, columnCount: 1, uploader: "a" });
    await expect(service.update(created.id, { rowCount: null })).rejects.toBeInstanceOf(ValidationError);
    await expect(service.update(created.id, { createdAt: null })).rejects.toBeInstanceOf(ValidationError);
    expect((await service.get(created.id)).rowCount).toBe(7);
  });

  it("re-validates the stored row when applying a patch", async () => {
    gateway.execute(
      "INSERT INTO datasets_metadata (name, row_count, column_count, uploader, created_at) VALUES (?, ?, ?, ?, ?)",
      ["legacy", 3, 2, "", NOW.getTime()],
    );
    const [legacy] = await service.list();
    await expect(service.update(legacy.id, { name: "renamed" })).rejects.toMatchObject({
      issues: [{ field: "uploader", message: "Required" }],
    });
    await expect(service.update(legacy.id, { name: "renamed", uploader: "carol" })).resolves.toMatchObject({
      name: "renamed",
      uploader: "carol",
    });
  });

  it("accepts zero counts", async () => {
    const created = await service.create({ name: "empty", rowCount: 0, columnCount: 0, uploader: "a" });
    expect(created.rowCount).toBe(0);
  });

  it("lists newest first and filters by uploader", async () => {
    const a = await service.create({ name: "a", rowCount: 1, columnCount: 1, uploader: "alice", createdAt: "2025-01-01" });
    const b = await service.create({ name: "b", rowCount: 1, columnCount: 1, uploader: "bob", createdAt: "2025-02-01" });
    const c = await service.create({ name: "c", rowCount: 1, columnCount: 1, uploader: "alice", createdAt: "2025-03-01" });

    expect((await service.list()).map((d) => d.id)).toEqual([c.id, b.id, a.id]);
    expect((await service.list({ uploader: "alice" })).map((d) => d.id)).toEqual([c.id, a.id]);
  });

  it("updates and deletes, raising NotFound for missing ids", async () => {
    const created = await service.create({ name: "a", rowCount: 5, columnCount: 2, uploader: "alice" });

    const updated = await service.update(created.id, { rowCount: 50 });
    expect(updated).toMatchObject({ name: "a", rowCount: 50, columnCount: 2 });
    await expect(service.update(created.id, { rowCount: -5 })).rejects.toBeInstanceOf(ValidationError);

    await service.delete(created.id);
    await expect(service.get(created.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.delete(created.id)).rejects.toThrow(`Dataset ${created.id} not found`);
    await expect(service.update(created.id, { name: "b" })).rejects.toBeInstanceOf(NotFoundError);
  });

  it("summarises totals and uploaders", async () => {
    await service.create({ name: "a", rowCount: 10, columnCount: 1, uploader: "bob" });
    await service.create({ name: "b", rowCount: 20, columnCount: 1, uploader: "alice" });
    await service.create({ name: "c", rowCount: 25, columnCount: 1, uploader: "bob" });
    await service.create({ name: "d", rowCount: 5, columnCount: 1, uploader: "carol" });

    const summary = await service.aggregate();
    expect(summary).toEqual({
      total: 4,
      totalRows: 60,
      averageRows: 15,
      byUploader: [
        { uploader: "bob", datasetCount: 2, totalRows: 35 },
        { uploader: "alice", datasetCount: 1, totalRows: 20 },
        { uploader: "carol", datasetCount: 1, totalRows: 5 },
      ],
    });
    expect(summary.byUploader.reduce((acc, u) => acc + u.datasetCount, 0)).toBe(summary.total);
    expect(summary.byUploader.reduce((acc, u) => acc + u.totalRows, 0)).toBe(summary.totalRows);
  });

  it("rounds the average row count to two decimals", async () => {
    await service.create({ name: "a", rowCount: 10, columnCount: 1, uploader: "u" });
    await service.create({ name: "b", rowCount: 20, columnCount: 1, uploader: "u" });
    await service.create({ name: "c", rowCount: 25, columnCount: 1, uploader: "u" });
    expect((await service.aggregate()).averageRows).toBe(18.33);
  });

  it("reports a null average for an empty catalog", async () => {
    expect(await service.aggregate()).toEqual({ total: 0, totalRows: 0, averageRows: null, byUploader: [] });
  });
});
