import { Router } from "express";
import { recommendationRequestSchema } from "@shared/schema";
import { recommend, type Domain, type Summarizer } from "../ai";
import { reply } from "../api-response";
import { parseOrThrow } from "../aggregates";
import type { AuthManager } from "../auth/manager";
import { isAuthenticated } from "../auth/session";
import { strictLimiter } from "../security-middleware";
import { asyncHandler, parseIdParam } from "./shared";

export interface EntityService<T, S> {
  create(input: unknown): Promise<T>;
  list(filter?: unknown): Promise<T[]>;
  get(id: number): Promise<T>;
  update(id: number, input: unknown): Promise<T>;
  delete(id: number): Promise<void>;
  aggregate(): Promise<S>;
}

export interface EntityRouterOptions<T, S> {
  domain: Domain;
  service: EntityService<T, S>;
  auth: AuthManager;
  summarizer: Summarizer;
}

/**
 * CRUD, summary and recommendation endpoints for one domain. Every route
 * re-checks the session through `isAuthenticated`.
 */
export function createEntityRouter<T, S>({ domain, service, auth, summarizer }: EntityRouterOptions<T, S>): Router {
  const router = Router();
  router.use(isAuthenticated(auth));

  router.get(
    "/summary",
    asyncHandler(async (_req, res) => reply(res, await service.aggregate())),
  );

  router.post(
    "/recommendations",
    strictLimiter(),
    asyncHandler(async (req, res) => {
      const { question } = parseOrThrow(recommendationRequestSchema, req.body ?? {});
      const summary = await service.aggregate();
      return reply(res, await recommend(summarizer, domain, summary, question));
    }),
  );

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const items = await service.list(req.query);
      return reply(res, items, { total: items.length });
    }),
  );

  router.post(
    "/",
    asyncHandler(async (req, res) => reply(res, await service.create(req.body), {}, 201)),
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => reply(res, await service.get(parseIdParam(req.params.id)))),
  );

  router.patch(
    "/:id",
    asyncHandler(async (req, res) => reply(res, await service.update(parseIdParam(req.params.id), req.body))),
  );

  router.delete(
    "/:id",
    asyncHandler(async (req, res) => {
      const id = parseIdParam(req.params.id);
      await service.delete(id);
      return reply(res, { id, deleted: true });
    }),
  );

  return router;
}
