import { count, desc, eq, sql } from "drizzle-orm";
import {
  datasetFilterSchema,
  datasetRecordSchema,
  datasetsMetadata,
  insertDatasetSchema,
  updateDatasetSchema,
  type Dataset,
} from "@shared/schema";
import type { StorageGateway } from "../db";
import { NotFoundError } from "../errors";
import { logger } from "../logger";
import { assertValidId, compareText, parseOrThrow, round } from "../aggregates";

const log = logger.child("datasets");

export interface UploaderSummary {
  uploader: string;
  datasetCount: number;
  totalRows: number;
}

export interface DatasetSummary {
  total: number;
  totalRows: number;
  /** `null` when there are no datasets. */
  averageRows: number | null;
  byUploader: UploaderSummary[];
}

export class DatasetService {
  constructor(
    private readonly gateway: StorageGateway,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async create(input: unknown): Promise<Dataset> {
    const fields = parseOrThrow(insertDatasetSchema, input);
    const [created] = this.gateway.run((db) =>
      db
        .insert(datasetsMetadata)
        .values({
          name: fields.name,
          rowCount: fields.rowCount,
          columnCount: fields.columnCount,
          uploader: fields.uploader,
          createdAt: fields.createdAt ?? this.clock(),
        })
        .returning()
        .all(),
    );
    log.info("Dataset registered", { datasetId: created.id, rowCount: created.rowCount });
    return created;
  }

  async list(filter: unknown = {}): Promise<Dataset[]> {
    const f = parseOrThrow(datasetFilterSchema, filter);
    return this.gateway.run((db) =>
      db
        .select()
        .from(datasetsMetadata)
        .where(f.uploader ? eq(datasetsMetadata.uploader, f.uploader) : undefined)
        .orderBy(desc(datasetsMetadata.createdAt), desc(datasetsMetadata.id))
        .all(),
    );
  }

  async get(id: number): Promise<Dataset> {
    assertValidId(id);
    const [dataset] = this.gateway.run((db) =>
      db.select().from(datasetsMetadata).where(eq(datasetsMetadata.id, id)).all(),
    );
    if (!dataset) {
      throw new NotFoundError("Dataset", id);
    }
    return dataset;
  }

  async update(id: number, input: unknown): Promise<Dataset> {
    const patch = parseOrThrow(updateDatasetSchema, input);
    const existing = await this.get(id);

    const merged = parseOrThrow(datasetRecordSchema, {
      name: patch.name ?? existing.name,
      rowCount: patch.rowCount ?? existing.rowCount,
      columnCount: patch.columnCount ?? existing.columnCount,
      uploader: patch.uploader ?? existing.uploader,
      createdAt: patch.createdAt ?? existing.createdAt,
    });

    const [updated] = this.gateway.run((db) =>
      db
        .update(datasetsMetadata)
        .set({
          name: merged.name,
          rowCount: merged.rowCount,
          columnCount: merged.columnCount,
          uploader: merged.uploader,
          createdAt: merged.createdAt,
        })
        .where(eq(datasetsMetadata.id, id))
        .returning()
        .all(),
    );
    if (!updated) {
      throw new NotFoundError("Dataset", id);
    }
    log.info("Dataset updated", { datasetId: id });
    return updated;
  }

  async delete(id: number): Promise<void> {
    await this.get(id);
    const { changes } = this.gateway.run((db) =>
      db.delete(datasetsMetadata).where(eq(datasetsMetadata.id, id)).run(),
    );
    if (changes === 0) {
      throw new NotFoundError("Dataset", id);
    }
    log.info("Dataset deleted", { datasetId: id });
  }

  async aggregate(): Promise<DatasetSummary> {
    return this.gateway.run((db) => {
      const [totals] = db
        .select({
          total: count(),
          totalRows: sql<number | null>`sum(${datasetsMetadata.rowCount})`,
          averageRows: sql<number | null>`avg(${datasetsMetadata.rowCount})`,
        })
        .from(datasetsMetadata)
        .all();

      const uploaders = db
        .select({
          uploader: datasetsMetadata.uploader,
          datasetCount: count(),
          totalRows: sql<number>`coalesce(sum(${datasetsMetadata.rowCount}), 0)`,
        })
        .from(datasetsMetadata)
        .groupBy(datasetsMetadata.uploader)
        .all();

      return {
        total: totals.total,
        totalRows: totals.totalRows ?? 0,
        averageRows: totals.averageRows === null ? null : round(totals.averageRows),
        byUploader: uploaders
          .map((u) => ({ uploader: u.uploader, datasetCount: u.datasetCount, totalRows: Number(u.totalRows) }))
          .sort((a, b) => b.datasetCount - a.datasetCount || compareText(a.uploader, b.uploader)),
      };
    });
  }
}
