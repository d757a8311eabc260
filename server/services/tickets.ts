import { and, count, desc, eq, notInArray, sql } from "drizzle-orm";
import {
  TICKET_PRIORITIES,
  TICKET_STATUSES,
  TICKET_TERMINAL_STATUSES,
  insertTicketSchema,
  itTickets,
  ticketFilterSchema,
  ticketRecordSchema,
  updateTicketSchema,
  type Ticket,
  type TicketPriority,
  type TicketStatus,
} from "@shared/schema";
import type { StorageGateway } from "../db";
import { NotFoundError } from "../errors";
import { logger } from "../logger";
import {
  assertValidId,
  compareText,
  isTerminalStatus,
  msToHours,
  parseOrThrow,
  reconcileResolvedAt,
  tallyDeclared,
  type CountEntry,
} from "../aggregates";

const log = logger.child("tickets");

export interface AssigneeSummary {
  assignee: string;
  ticketCount: number;
  resolvedCount: number;
  /** `null` when none of the assignee's tickets is resolved. */
  averageResolutionHours: number | null;
}

export interface RankedAssignee {
  assignee: string;
  averageResolutionHours: number;
}

export interface TicketSummary {
  total: number;
  open: number;
  byStatus: CountEntry<TicketStatus>[];
  byPriority: CountEntry<TicketPriority>[];
  /** Mean of `resolvedAt - createdAt` over resolved tickets; `null` when there are none. */
  averageResolutionHours: number | null;
  assignees: AssigneeSummary[];
  fastestAssignee: RankedAssignee | null;
  slowestAssignee: RankedAssignee | null;
}

interface AssigneeDuration {
  assignee: string;
  averageMs: number;
}

/**
 * Fastest is the lowest mean resolution time, slowest the highest. Both
 * break ties by assignee name ascending.
 */
export function rankAssignees(durations: AssigneeDuration[]): {
  fastest: AssigneeDuration | null;
  slowest: AssigneeDuration | null;
} {
  if (durations.length === 0) {
    return { fastest: null, slowest: null };
  }
  let fastest = durations[0];
  let slowest = durations[0];
  for (const candidate of durations.slice(1)) {
    const fasterBy = candidate.averageMs - fastest.averageMs;
    if (fasterBy < 0 || (fasterBy === 0 && compareText(candidate.assignee, fastest.assignee) < 0)) {
      fastest = candidate;
    }
    const slowerBy = candidate.averageMs - slowest.averageMs;
    if (slowerBy > 0 || (slowerBy === 0 && compareText(candidate.assignee, slowest.assignee) < 0)) {
      slowest = candidate;
    }
  }
  return { fastest, slowest };
}

function toRanked(duration: AssigneeDuration | null): RankedAssignee | null {
  if (!duration) return null;
  return { assignee: duration.assignee, averageResolutionHours: msToHours(duration.averageMs) ?? 0 };
}

export class TicketService {
  constructor(
    private readonly gateway: StorageGateway,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async create(input: unknown): Promise<Ticket> {
    const fields = parseOrThrow(insertTicketSchema, input);
    const status = fields.status ?? "open";
    const createdAt = fields.createdAt ?? this.clock();
    const resolvedAt = reconcileResolvedAt({
      status,
      terminalStatuses: TICKET_TERMINAL_STATUSES,
      startedAt: createdAt,
      startField: "createdAt",
      resolvedAt: fields.resolvedAt,
      now: this.clock(),
    });

    const [created] = this.gateway.run((db) =>
      db
        .insert(itTickets)
        .values({
          title: fields.title,
          description: fields.description ?? null,
          priority: fields.priority,
          status,
          assignee: fields.assignee,
          createdAt,
          resolvedAt,
        })
        .returning()
        .all(),
    );
    log.info("Ticket created", { ticketId: created.id, priority: created.priority });
    return created;
  }

  async list(filter: unknown = {}): Promise<Ticket[]> {
    const f = parseOrThrow(ticketFilterSchema, filter);
    return this.gateway.run((db) =>
      db
        .select()
        .from(itTickets)
        .where(
          and(
            f.priority ? eq(itTickets.priority, f.priority) : undefined,
            f.status ? eq(itTickets.status, f.status) : undefined,
            f.assignee ? eq(itTickets.assignee, f.assignee) : undefined,
          ),
        )
        .orderBy(desc(itTickets.createdAt), desc(itTickets.id))
        .all(),
    );
  }

  async get(id: number): Promise<Ticket> {
    assertValidId(id);
    const [ticket] = this.gateway.run((db) => db.select().from(itTickets).where(eq(itTickets.id, id)).all());
    if (!ticket) {
      throw new NotFoundError("Ticket", id);
    }
    return ticket;
  }

  async update(id: number, input: unknown): Promise<Ticket> {
    const patch = parseOrThrow(updateTicketSchema, input);
    const existing = await this.get(id);

    const merged = parseOrThrow(ticketRecordSchema, {
      title: patch.title ?? existing.title,
      description: patch.description !== undefined ? patch.description : existing.description,
      priority: patch.priority ?? existing.priority,
      status: patch.status ?? existing.status,
      assignee: patch.assignee ?? existing.assignee,
      createdAt: patch.createdAt ?? existing.createdAt,
    });
    const resolvedAt = reconcileResolvedAt({
      status: merged.status,
      terminalStatuses: TICKET_TERMINAL_STATUSES,
      startedAt: merged.createdAt,
      startField: "createdAt",
      resolvedAt:
        patch.resolvedAt !== undefined
          ? patch.resolvedAt
          : isTerminalStatus(merged.status, TICKET_TERMINAL_STATUSES)
            ? existing.resolvedAt
            : null,
      now: this.clock(),
    });

    const [updated] = this.gateway.run((db) =>
      db
        .update(itTickets)
        .set({
          title: merged.title,
          description: merged.description ?? null,
          priority: merged.priority,
          status: merged.status,
          assignee: merged.assignee,
          createdAt: merged.createdAt,
          resolvedAt,
        })
        .where(eq(itTickets.id, id))
        .returning()
        .all(),
    );
    if (!updated) {
      throw new NotFoundError("Ticket", id);
    }
    log.info("Ticket updated", { ticketId: id, status: updated.status });
    return updated;
  }

  async delete(id: number): Promise<void> {
    await this.get(id);
    const { changes } = this.gateway.run((db) => db.delete(itTickets).where(eq(itTickets.id, id)).run());
    if (changes === 0) {
      throw new NotFoundError("Ticket", id);
    }
    log.info("Ticket deleted", { ticketId: id });
  }

  async aggregate(): Promise<TicketSummary> {
    // Rows loaded in bulk may predate validation, so only well-ordered pairs count.
    const durationMs = sql<number | null>`case when ${itTickets.resolvedAt} is not null and ${itTickets.resolvedAt} >= ${itTickets.createdAt} then ${itTickets.resolvedAt} - ${itTickets.createdAt} end`;

    return this.gateway.run((db) => {
      const [totals] = db
        .select({
          total: count(),
          averageMs: sql<number | null>`avg(${durationMs})`,
        })
        .from(itTickets)
        .all();
      const [{ open }] = db
        .select({ open: count() })
        .from(itTickets)
        .where(notInArray(itTickets.status, [...TICKET_TERMINAL_STATUSES]))
        .all();

      const statuses = db
        .select({ value: itTickets.status, count: count() })
        .from(itTickets)
        .groupBy(itTickets.status)
        .all();
      const priorities = db
        .select({ value: itTickets.priority, count: count() })
        .from(itTickets)
        .groupBy(itTickets.priority)
        .all();

      const assigneeRows = db
        .select({
          assignee: itTickets.assignee,
          ticketCount: count(),
          resolvedCount: count(durationMs),
          averageMs: sql<number | null>`avg(${durationMs})`,
        })
        .from(itTickets)
        .groupBy(itTickets.assignee)
        .all();

      const durations: AssigneeDuration[] = [];
      for (const row of assigneeRows) {
        if (row.averageMs !== null) {
          durations.push({ assignee: row.assignee, averageMs: row.averageMs });
        }
      }
      const { fastest, slowest } = rankAssignees(durations);

      return {
        total: totals.total,
        open,
        byStatus: tallyDeclared(TICKET_STATUSES, statuses),
        byPriority: tallyDeclared(TICKET_PRIORITIES, priorities),
        averageResolutionHours: msToHours(totals.averageMs),
        assignees: assigneeRows
          .map((row) => ({
            assignee: row.assignee,
            ticketCount: row.ticketCount,
            resolvedCount: row.resolvedCount,
            averageResolutionHours: msToHours(row.averageMs),
          }))
          .sort((a, b) => b.ticketCount - a.ticketCount || compareText(a.assignee, b.assignee)),
        fastestAssignee: toRanked(fastest),
        slowestAssignee: toRanked(slowest),
      };
    });
  }
}
