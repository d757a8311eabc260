import type { Express } from "express";
import { reply, replyError, ERROR_CODES } from "./api-response";
import { registerAuthRoutes, type Authenticator } from "./auth";
import type { AppContext } from "./context";
import { createEntityRouter } from "./routes/entities";

export function registerRoutes(app: Express, ctx: AppContext, authenticator: Authenticator): void {
  app.get("/api/health", (_req, res) => {
    const timestamp = new Date().toISOString();
    if (!ctx.gateway.ping()) {
      return replyError(res, 503, [{ code: ERROR_CODES.STORAGE_UNAVAILABLE, message: "Database is unreachable" }], {
        timestamp,
      });
    }
    return reply(res, { status: "ok", database: "ok", aiEnabled: ctx.summarizer.enabled, timestamp });
  });

  registerAuthRoutes(app, ctx.auth, authenticator);

  app.use(
    "/api/incidents",
    createEntityRouter({ domain: "incidents", service: ctx.incidents, auth: ctx.auth, summarizer: ctx.summarizer }),
  );
  app.use(
    "/api/datasets",
    createEntityRouter({ domain: "datasets", service: ctx.datasets, auth: ctx.auth, summarizer: ctx.summarizer }),
  );
  app.use(
    "/api/tickets",
    createEntityRouter({ domain: "tickets", service: ctx.tickets, auth: ctx.auth, summarizer: ctx.summarizer }),
  );
}
