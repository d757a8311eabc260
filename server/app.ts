import express, { type Express } from "express";
import type { AppConfig } from "./config";
import type { AppContext } from "./context";
import { setupAuth } from "./auth";
import { createErrorHandler, notFoundHandler } from "./error-handler";
import { correlationMiddleware, requestLogger } from "./logger";
import { registerRoutes } from "./routes";
import { applySecurityMiddleware, inputSanitization } from "./security-middleware";

export function createApp(ctx: AppContext, cfg: AppConfig): Express {
  const app = express();
  app.disable("x-powered-by");

  applySecurityMiddleware(app, cfg);

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));
  app.use(inputSanitization);

  app.use(correlationMiddleware);
  app.use(requestLogger);

  const authenticator = setupAuth(app, ctx.auth, cfg);
  registerRoutes(app, ctx, authenticator);

  app.use("/api", notFoundHandler);
  app.use(createErrorHandler(cfg.nodeEnv === "development" || cfg.nodeEnv === "test"));

  return app;
}
