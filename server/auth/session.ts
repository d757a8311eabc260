import passport from "passport";
import { Strategy as LocalStrategy } from "passport-local";
import session from "express-session";
import type { Express, Request, RequestHandler } from "express";
import type { SafeUser } from "@shared/schema";
import { isProduction, sessionTtlMs, type AppConfig } from "../config";
import { InvalidCredentialsError, UnauthenticatedError } from "../errors";
import type { AuthManager, AuthSession } from "./manager";

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    // eslint-disable-next-line @typescript-eslint/no-empty-interface
    interface User extends AuthSession {}

    interface Request {
      currentUser?: SafeUser;
    }
  }
}

export type Authenticator = passport.Authenticator;

export function getSession(cfg: AppConfig): RequestHandler {
  // The default MemoryStore keeps sessions in this process only.
  return session({
    secret: cfg.session.secret,
    resave: false,
    saveUninitialized: false,
    cookie: {
      httpOnly: true,
      secure: cfg.session.forceHttps,
      maxAge: sessionTtlMs(cfg),
      sameSite: isProduction(cfg) ? "strict" : "lax",
    },
  });
}

export function setupAuth(app: Express, auth: AuthManager, cfg: AppConfig): Authenticator {
  const authenticator = new passport.Authenticator();

  app.set("trust proxy", 1);
  app.use(getSession(cfg));
  app.use(authenticator.initialize());
  app.use(authenticator.session());

  authenticator.use(
    new LocalStrategy(
      { usernameField: "username", passwordField: "password" },
      (username, password, done) => {
        auth
          .authenticate(username, password)
          .then((authSession) => done(null, authSession))
          .catch((err: unknown) => {
            if (err instanceof InvalidCredentialsError) {
              return done(null, false, { message: err.message });
            }
            return done(err);
          });
      },
    ),
  );

  authenticator.serializeUser((user, cb) => cb(null, user.id));
  authenticator.deserializeUser((id: string, cb) => {
    cb(null, auth.resolveSession(id) ?? false);
  });

  return authenticator;
}

export function isAuthenticated(auth: AuthManager): RequestHandler {
  return (req, _res, next) => {
    auth
      .requireAuth(req.user)
      .then((user) => {
        req.currentUser = user;
        next();
      })
      .catch(next);
  };
}

export function getCurrentUser(req: Request): SafeUser {
  if (!req.currentUser) {
    throw new UnauthenticatedError();
  }
  return req.currentUser;
}
