import type { Request, Response, NextFunction, Express, RequestHandler } from "express";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import { isProduction, type AppConfig } from "./config";
import { logger } from "./logger";
import { ERROR_CODES, replyError } from "./api-response";

const AUTH_PATHS = ["/api/login", "/api/register"];

function configureHelmet(cfg: AppConfig): ReturnType<typeof helmet> {
  return helmet({
    // JSON only; nothing here is meant to render in a browser.
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
        upgradeInsecureRequests: cfg.session.forceHttps ? [] : null,
      },
    },
    crossOriginResourcePolicy: { policy: "same-site" },
    hsts: isProduction(cfg) ? { maxAge: 31536000, includeSubDomains: true } : false,
    referrerPolicy: { policy: "no-referrer" },
    xFrameOptions: { action: "deny" },
  });
}

function tooManyRequests(res: Response, message: string): void {
  replyError(res, 429, [{ code: ERROR_CODES.RATE_LIMITED, message }]);
}

export function authRateLimiter(limit = 10): RequestHandler {
  return rateLimit({
    windowMs: 5 * 60 * 1000,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => tooManyRequests(res, "Too many authentication attempts, try again in 5 minutes"),
    skip: (req) => req.method === "GET",
  });
}

export function strictLimiter(limit = 30): RequestHandler {
  return rateLimit({
    windowMs: 15 * 60 * 1000,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => tooManyRequests(res, "Too many requests, please try again later"),
  });
}

export function stripNullBytes(value: unknown): unknown {
  if (typeof value === "string") {
    return value.replace(/\0/g, "");
  }
  if (Array.isArray(value)) {
    return value.map(stripNullBytes);
  }
  if (value !== null && typeof value === "object") {
    const cleaned: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      cleaned[key] = stripNullBytes(inner);
    }
    return cleaned;
  }
  return value;
}

// SQLite stores NUL inside TEXT but most readers truncate at it.
export function inputSanitization(req: Request, _res: Response, next: NextFunction): void {
  if (req.body && typeof req.body === "object") {
    req.body = stripNullBytes(req.body);
  }
  next();
}

export function applySecurityMiddleware(app: Express, cfg: AppConfig): void {
  app.use(configureHelmet(cfg));
  for (const path of AUTH_PATHS) {
    app.use(path, authRateLimiter());
  }
  logger.child("security").info("Security middleware applied: helmet, auth rate limiting");
}
