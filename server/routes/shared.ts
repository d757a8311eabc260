import type { Request, RequestHandler, Response } from "express";
import { ValidationError } from "../errors";

type AsyncRoute = (req: Request, res: Response) => Promise<unknown>;

/** Express 4 does not await handlers; forward rejections to the error handler. */
export function asyncHandler(fn: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function parseIdParam(raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw ValidationError.field("id", "Must be a positive integer");
  }
  return Number(raw);
}
