import { randomUUID } from "crypto";
import type { Request, Response, NextFunction } from "express";
import { AsyncLocalStorage } from "async_hooks";

type LogLevel = "debug" | "info" | "warn" | "error";

interface LogContext {
  requestId?: string;
  userId?: number;
  route?: string;
  method?: string;
  task?: string;
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  source: string;
  context: LogContext;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

const envLevel = process.env.LOG_LEVEL;

const MIN_LEVEL: LogLevel = isLogLevel(envLevel)
  ? envLevel
  : process.env.NODE_ENV === "development" || process.env.NODE_ENV === "test"
    ? "debug"
    : "info";

const REDACT_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /("?password"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?passwordHash"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?password_hash"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?secret"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?sessionSecret"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?token"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?authorization"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?cookie"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?accessKeyId"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?secretAccessKey"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?connect\.sid"?\s*[:=]\s*)[^\s;,}]+/gi, replacement: "$1[REDACTED]" },
  { pattern: /Bearer\s+[A-Za-z0-9\-._~+/]+=*/g, replacement: "Bearer [REDACTED]" },
  { pattern: /AKIA[A-Z0-9]{16}/g, replacement: "AKIA[REDACTED]" },
];

export function redact(input: string): string {
  let result = input;
  for (const { pattern, replacement } of REDACT_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, replacement);
  }
  return result;
}

const contextStore = new AsyncLocalStorage<LogContext>();

export function currentContext(): LogContext {
  return contextStore.getStore() ?? {};
}

function emit(level: LogLevel, source: string, message: string, extra?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[MIN_LEVEL]) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message: redact(message),
    source,
    context: { ...currentContext(), ...extra },
  };

  const serialized = redact(JSON.stringify(entry));

  if (level === "error" || level === "warn") {
    process.stderr.write(serialized + "\n");
  } else {
    process.stdout.write(serialized + "\n");
  }
}

export interface Logger {
  debug(message: string, extra?: Record<string, unknown>): void;
  info(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  error(message: string, extra?: Record<string, unknown>): void;
}

function createChild(source: string): Logger {
  return {
    debug(message, extra) {
      emit("debug", source, message, extra);
    },
    info(message, extra) {
      emit("info", source, message, extra);
    },
    warn(message, extra) {
      emit("warn", source, message, extra);
    },
    error(message, extra) {
      emit("error", source, message, extra);
    },
  };
}

export const logger = {
  child: createChild,
  ...createChild("app"),
};

export function correlationMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers["x-request-id"];
  const requestId = typeof header === "string" && header.length > 0 ? header : randomUUID();

  res.setHeader("x-request-id", requestId);

  const ctx: LogContext = {
    requestId,
    route: req.path,
    method: req.method,
  };

  contextStore.run(ctx, () => next());
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (!req.path.startsWith("/api")) return;

    const level: LogLevel = res.statusCode >= 500 ? "error" : res.statusCode >= 400 ? "warn" : "info";
    emit(level, "http", `${req.method} ${req.path} ${res.statusCode} ${duration}ms`, {
      statusCode: res.statusCode,
      durationMs: duration,
      ...(req.user ? { userId: req.user.userId } : {}),
    });
  });

  next();
}

export function withTaskContext<T>(task: string, fn: () => T): T {
  return contextStore.run({ task }, fn);
}
