import { and, count, desc, eq, notInArray } from "drizzle-orm";
import {
  INCIDENT_SEVERITIES,
  INCIDENT_STATUSES,
  INCIDENT_TERMINAL_STATUSES,
  cyberIncidents,
  incidentFilterSchema,
  incidentRecordSchema,
  insertIncidentSchema,
  updateIncidentSchema,
  type Incident,
  type IncidentSeverity,
  type IncidentStatus,
} from "@shared/schema";
import type { StorageGateway } from "../db";
import { NotFoundError } from "../errors";
import { logger } from "../logger";
import {
  assertValidId,
  isTerminalStatus,
  parseOrThrow,
  reconcileResolvedAt,
  tallyDeclared,
  tallyOpen,
  type CountEntry,
} from "../aggregates";

const log = logger.child("incidents");

export interface IncidentSummary {
  total: number;
  open: number;
  byCategory: CountEntry[];
  bySeverity: CountEntry<IncidentSeverity>[];
  byStatus: CountEntry<IncidentStatus>[];
}

export class IncidentService {
  constructor(
    private readonly gateway: StorageGateway,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async create(input: unknown): Promise<Incident> {
    const fields = parseOrThrow(insertIncidentSchema, input);
    const status = fields.status ?? "open";
    const reportedAt = fields.reportedAt ?? this.clock();
    const resolvedAt = reconcileResolvedAt({
      status,
      terminalStatuses: INCIDENT_TERMINAL_STATUSES,
      startedAt: reportedAt,
      startField: "reportedAt",
      resolvedAt: fields.resolvedAt,
      now: this.clock(),
    });

    const [created] = this.gateway.run((db) =>
      db
        .insert(cyberIncidents)
        .values({
          title: fields.title,
          description: fields.description ?? null,
          category: fields.category,
          severity: fields.severity,
          status,
          reportedAt,
          resolvedAt,
        })
        .returning()
        .all(),
    );
    log.info("Incident created", { incidentId: created.id, severity: created.severity });
    return created;
  }

  async list(filter: unknown = {}): Promise<Incident[]> {
    const f = parseOrThrow(incidentFilterSchema, filter);
    return this.gateway.run((db) =>
      db
        .select()
        .from(cyberIncidents)
        .where(
          and(
            f.severity ? eq(cyberIncidents.severity, f.severity) : undefined,
            f.status ? eq(cyberIncidents.status, f.status) : undefined,
            f.category ? eq(cyberIncidents.category, f.category) : undefined,
          ),
        )
        .orderBy(desc(cyberIncidents.reportedAt), desc(cyberIncidents.id))
        .all(),
    );
  }

  async get(id: number): Promise<Incident> {
    assertValidId(id);
    const [incident] = this.gateway.run((db) =>
      db.select().from(cyberIncidents).where(eq(cyberIncidents.id, id)).all(),
    );
    if (!incident) {
      throw new NotFoundError("Incident", id);
    }
    return incident;
  }

  // Check-then-act: a concurrent delete between the read and the write
  // surfaces as NotFound from the write.
  async update(id: number, input: unknown): Promise<Incident> {
    const patch = parseOrThrow(updateIncidentSchema, input);
    const existing = await this.get(id);

    const merged = parseOrThrow(incidentRecordSchema, {
      title: patch.title ?? existing.title,
      description: patch.description !== undefined ? patch.description : existing.description,
      category: patch.category ?? existing.category,
      severity: patch.severity ?? existing.severity,
      status: patch.status ?? existing.status,
      reportedAt: patch.reportedAt ?? existing.reportedAt,
    });
    const resolvedAt = reconcileResolvedAt({
      status: merged.status,
      terminalStatuses: INCIDENT_TERMINAL_STATUSES,
      startedAt: merged.reportedAt,
      startField: "reportedAt",
      resolvedAt:
        patch.resolvedAt !== undefined
          ? patch.resolvedAt
          : isTerminalStatus(merged.status, INCIDENT_TERMINAL_STATUSES)
            ? existing.resolvedAt
            : null,
      now: this.clock(),
    });

    const [updated] = this.gateway.run((db) =>
      db
        .update(cyberIncidents)
        .set({
          title: merged.title,
          description: merged.description ?? null,
          category: merged.category,
          severity: merged.severity,
          status: merged.status,
          reportedAt: merged.reportedAt,
          resolvedAt,
        })
        .where(eq(cyberIncidents.id, id))
        .returning()
        .all(),
    );
    if (!updated) {
      throw new NotFoundError("Incident", id);
    }
    log.info("Incident updated", { incidentId: id, status: updated.status });
    return updated;
  }

  async delete(id: number): Promise<void> {
    await this.get(id);
    const { changes } = this.gateway.run((db) =>
      db.delete(cyberIncidents).where(eq(cyberIncidents.id, id)).run(),
    );
    if (changes === 0) {
      throw new NotFoundError("Incident", id);
    }
    log.info("Incident deleted", { incidentId: id });
  }

  async aggregate(): Promise<IncidentSummary> {
    return this.gateway.run((db) => {
      const [{ total }] = db.select({ total: count() }).from(cyberIncidents).all();
      const [{ open }] = db
        .select({ open: count() })
        .from(cyberIncidents)
        .where(notInArray(cyberIncidents.status, [...INCIDENT_TERMINAL_STATUSES]))
        .all();

      const categories = db
        .select({ value: cyberIncidents.category, count: count() })
        .from(cyberIncidents)
        .groupBy(cyberIncidents.category)
        .all();
      const severities = db
        .select({ value: cyberIncidents.severity, count: count() })
        .from(cyberIncidents)
        .groupBy(cyberIncidents.severity)
        .all();
      const statuses = db
        .select({ value: cyberIncidents.status, count: count() })
        .from(cyberIncidents)
        .groupBy(cyberIncidents.status)
        .all();

      return {
        total,
        open,
        byCategory: tallyOpen(categories),
        bySeverity: tallyDeclared(INCIDENT_SEVERITIES, severities),
        byStatus: tallyDeclared(INCIDENT_STATUSES, statuses),
      };
    });
  }
}
