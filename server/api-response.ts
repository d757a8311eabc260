import type { Response } from "express";
import type { FieldIssue } from "./errors";

/**
 * Body of every `/api` response. Exactly one of `data` and `errors` is set;
 * `meta` carries list totals and the like.
 */
export interface Envelope<T> {
  data: T | null;
  meta: Record<string, unknown>;
  errors: EnvelopeError[] | null;
}

export interface EnvelopeError {
  code: string;
  message: string;
  field?: string;
}

// Codes raised by the HTTP layer itself; service failures carry their own
// `code` from the AppError subclasses.
export const ERROR_CODES = {
  BAD_REQUEST: "BAD_REQUEST",
  UNAUTHENTICATED: "UNAUTHENTICATED",
  INVALID_CREDENTIALS: "INVALID_CREDENTIALS",
  NOT_FOUND: "NOT_FOUND",
  VALIDATION_ERROR: "VALIDATION_ERROR",
  RATE_LIMITED: "RATE_LIMITED",
  INTERNAL_ERROR: "INTERNAL_ERROR",
  STORAGE_UNAVAILABLE: "STORAGE_UNAVAILABLE",
} as const;

export function reply<T>(res: Response, data: T, meta: Record<string, unknown> = {}, status = 200): Response {
  const body: Envelope<T> = { data, meta, errors: null };
  return res.status(status).json(body);
}

export function replyError(
  res: Response,
  status: number,
  errors: EnvelopeError[],
  meta: Record<string, unknown> = {},
): Response {
  const body: Envelope<null> = { data: null, meta, errors };
  return res.status(status).json(body);
}

export function replyUnauthenticated(
  res: Response,
  message = "Authentication required",
  code: string = ERROR_CODES.UNAUTHENTICATED,
): Response {
  return replyError(res, 401, [{ code, message }]);
}

/** One error entry per offending field. */
export function replyValidation(res: Response, issues: FieldIssue[]): Response {
  return replyError(
    res,
    422,
    issues.map((issue) => ({ code: ERROR_CODES.VALIDATION_ERROR, ...issue })),
  );
}
