import type { NextFunction, Request, Response } from "express";
import { AppError, ValidationError } from "./errors";
import { ERROR_CODES, replyError, replyValidation } from "./api-response";
import { logger } from "./logger";

const log = logger.child("express");

export function notFoundHandler(req: Request, res: Response): void {
  replyError(res, 404, [
    { code: ERROR_CODES.NOT_FOUND, message: `No route for ${req.method} ${req.baseUrl}${req.path}` },
  ]);
}

/**
 * Maps service errors onto the response envelope. Unknown errors become a 500
 * whose message is only exposed in development and test.
 */
export function createErrorHandler(exposeInternalMessages: boolean) {
  return (err: unknown, _req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof ValidationError) {
      replyValidation(res, err.issues);
      return;
    }

    if (err instanceof AppError) {
      if (err.status >= 500) {
        log.error(`${err.name}: ${err.message}`, { code: err.code });
      }
      replyError(res, err.status, [{ code: err.code, message: err.message }]);
      return;
    }

    // body-parser rejects malformed JSON with a 400 SyntaxError.
    if (err instanceof SyntaxError && "status" in err && err.status === 400) {
      replyError(res, 400, [{ code: ERROR_CODES.BAD_REQUEST, message: "Malformed JSON body" }]);
      return;
    }

    const message = err instanceof Error ? err.message : String(err);
    log.error("Internal Server Error", {
      error: message,
      stack: err instanceof Error ? err.stack : undefined,
    });
    replyError(res, 500, [
      { code: ERROR_CODES.INTERNAL_ERROR, message: exposeInternalMessages ? message : "Internal Server Error" },
    ]);
  };
}
