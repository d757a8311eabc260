import type { ZodType, ZodTypeDef } from "zod";
import { ValidationError } from "./errors";

export interface CountEntry<K extends string = string> {
  value: K;
  count: number;
}

const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * Counts for a closed value set, in declaration order, with zero entries for
 * values that have no rows.
 */
export function tallyDeclared<K extends string>(
  declared: readonly K[],
  rows: ReadonlyArray<{ value: K; count: number }>,
): CountEntry<K>[] {
  const found = new Map<K, number>();
  for (const row of rows) {
    found.set(row.value, (found.get(row.value) ?? 0) + Number(row.count));
  }
  return declared.map((value) => ({ value, count: found.get(value) ?? 0 }));
}

/** Counts for an open value set, largest first, ties by value ascending. */
export function tallyOpen(rows: ReadonlyArray<{ value: string; count: number }>): CountEntry[] {
  return rows
    .map((row) => ({ value: row.value, count: Number(row.count) }))
    .sort((a, b) => b.count - a.count || compareText(a.value, b.value));
}

export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function msToHours(ms: number | null): number | null {
  return ms === null ? null : round(ms / MS_PER_HOUR);
}

export function parseOrThrow<Output, Input>(schema: ZodType<Output, ZodTypeDef, Input>, input: unknown): Output {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error);
  }
  return parsed.data;
}

export function assertValidId(id: number): void {
  if (!Number.isSafeInteger(id) || id < 1) {
    throw ValidationError.field("id", "Must be a positive integer");
  }
}

export function isTerminalStatus<S extends string>(status: S, terminalStatuses: readonly S[]): boolean {
  return terminalStatuses.includes(status);
}

interface ResolutionInput<S extends string> {
  status: S;
  terminalStatuses: readonly S[];
  startedAt: Date;
  startField: string;
  resolvedAt: Date | null | undefined;
  now?: Date;
}

/**
 * Keeps `resolvedAt` in step with the status: set exactly when the status is
 * terminal, never before the record's start time. A terminal record without
 * an explicit timestamp is stamped with `now`.
 * Callers pass the stored timestamp through only while the status stays
 * terminal.
 */
export function reconcileResolvedAt<S extends string>(input: ResolutionInput<S>): Date | null {
  if (!isTerminalStatus(input.status, input.terminalStatuses)) {
    if (input.resolvedAt) {
      throw ValidationError.field("resolvedAt", `Must be empty while status is "${input.status}"`);
    }
    return null;
  }

  const resolvedAt = input.resolvedAt ?? input.now ?? new Date();
  if (resolvedAt.getTime() < input.startedAt.getTime()) {
    throw ValidationError.field("resolvedAt", `Cannot be earlier than ${input.startField}`);
  }
  return resolvedAt;
}
