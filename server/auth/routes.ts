import type { Express, Request } from "express";
import { credentialsSchema } from "@shared/schema";
import { reply, replyUnauthenticated, ERROR_CODES } from "../api-response";
import { parseOrThrow } from "../aggregates";
import { logger } from "../logger";
import { asyncHandler } from "../routes/shared";
import type { AuthManager, AuthSession } from "./manager";
import { getCurrentUser, isAuthenticated, type Authenticator } from "./session";

const log = logger.child("auth-routes");

function logIn(req: Request, user: AuthSession): Promise<void> {
  return new Promise((resolve, reject) => {
    req.login(user, (err: unknown) => (err ? reject(err) : resolve()));
  });
}

function logOut(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.logout((err: unknown) => (err ? reject(err) : resolve()));
  });
}

export function registerAuthRoutes(app: Express, auth: AuthManager, authenticator: Authenticator): void {
  app.post(
    "/api/register",
    asyncHandler(async (req, res) => {
      const { username, password } = parseOrThrow(credentialsSchema, req.body);
      const user = await auth.register(username, password);
      return reply(res, user, {}, 201);
    }),
  );

  app.post("/api/login", (req, res, next) => {
    // Reject a missing field before passport answers it with a bare 400.
    try {
      parseOrThrow(credentialsSchema, req.body);
    } catch (err) {
      next(err);
      return;
    }

    authenticator.authenticate(
      "local",
      (err: unknown, session: AuthSession | false, info?: { message?: string }) => {
        if (err) {
          next(err);
          return;
        }
        if (!session) {
          replyUnauthenticated(res, info?.message ?? "Invalid username or password", ERROR_CODES.INVALID_CREDENTIALS);
          return;
        }
        // Signing in over a live session replaces it.
        auth.logout(req.user);
        logIn(req, session)
          .then(() => auth.requireAuth(session))
          .then((user) => reply(res, user))
          .catch(next);
      },
    )(req, res, next);
  });

  app.post(
    "/api/logout",
    asyncHandler(async (req, res) => {
      auth.logout(req.user);
      if (req.user) {
        await logOut(req);
      }
      log.debug("Session cleared");
      return reply(res, { message: "Logged out" });
    }),
  );

  app.get(
    "/api/auth/user",
    isAuthenticated(auth),
    asyncHandler(async (req, res) => reply(res, getCurrentUser(req))),
  );
}
