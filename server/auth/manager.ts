import { randomBytes } from "crypto";
import { eq } from "drizzle-orm";
import { registerUserSchema, users, type SafeUser, type User, type UserRole } from "@shared/schema";
import type { StorageGateway } from "../db";
import {
  ConstraintViolationError,
  DuplicateUsernameError,
  InvalidCredentialsError,
  UnauthenticatedError,
  ValidationError,
} from "../errors";
import { logger } from "../logger";
import { comparePasswords, hashPassword } from "./password";

const log = logger.child("auth");

export interface AuthSession {
  id: string;
  userId: number;
  createdAt: Date;
  expiresAt: Date;
}

export interface AuthManagerOptions {
  /** Lifetime of a session from login; matches the session cookie's max age. */
  sessionTtlMs?: number;
  clock?: () => Date;
}

const DEFAULT_SESSION_TTL_MS = 12 * 60 * 60 * 1000;

export function toSafeUser(user: User): SafeUser {
  const { passwordHash: _passwordHash, ...safeUser } = user;
  return safeUser;
}

/**
 * Credential checks and the process-local session registry. Sessions live
 * only as long as this instance; a restart signs everyone out. Expired
 * entries are dropped on lookup and swept on every login.
 */
export class AuthManager {
  private readonly sessions = new Map<string, AuthSession>();
  private readonly sessionTtlMs: number;
  private readonly clock: () => Date;
  private dummyHash?: Promise<string>;

  constructor(
    private readonly gateway: StorageGateway,
    options: AuthManagerOptions = {},
  ) {
    this.sessionTtlMs = options.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS;
    this.clock = options.clock ?? (() => new Date());
  }

  async register(username: string, password: string, role: UserRole = "standard"): Promise<SafeUser> {
    const parsed = registerUserSchema.safeParse({ username, password, role });
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error);
    }

    if (this.findByUsername(username)) {
      throw new DuplicateUsernameError(username);
    }

    const passwordHash = await hashPassword(password);

    try {
      const [created] = this.gateway.run((db) =>
        db.insert(users).values({ username, passwordHash, role: parsed.data.role ?? "standard" }).returning().all(),
      );
      log.info("User registered", { userId: created.id, role: created.role });
      return toSafeUser(created);
    } catch (err) {
      // Lost a race with a concurrent registration of the same name.
      if (err instanceof ConstraintViolationError) {
        throw new DuplicateUsernameError(username);
      }
      throw err;
    }
  }

  async authenticate(username: string, password: string): Promise<AuthSession> {
    const user = username ? this.findByUsername(username) : undefined;

    if (!user) {
      // Same scrypt work as a real comparison so timing does not reveal unknown names.
      await comparePasswords(password, await this.getDummyHash());
      log.warn("Login failed");
      throw new InvalidCredentialsError();
    }

    const valid = await comparePasswords(password, user.passwordHash);
    if (!valid) {
      log.warn("Login failed", { userId: user.id });
      throw new InvalidCredentialsError();
    }

    this.sweepExpired();
    const now = this.clock();
    const session: AuthSession = {
      id: randomBytes(24).toString("hex"),
      userId: user.id,
      createdAt: now,
      expiresAt: new Date(now.getTime() + this.sessionTtlMs),
    };
    this.sessions.set(session.id, session);
    log.info("Login succeeded", { userId: user.id });
    return session;
  }

  resolveSession(sessionId: string): AuthSession | undefined {
    const session = this.sessions.get(sessionId);
    if (session && this.isExpired(session)) {
      this.sessions.delete(sessionId);
      return undefined;
    }
    return session;
  }

  /** Must run on every protected request; sessions can vanish at any time. */
  async requireAuth(session: Pick<AuthSession, "id"> | null | undefined): Promise<SafeUser> {
    if (!session) {
      throw new UnauthenticatedError();
    }
    const live = this.resolveSession(session.id);
    if (!live) {
      throw new UnauthenticatedError("Session has expired, please sign in again");
    }

    const [user] = this.gateway.run((db) => db.select().from(users).where(eq(users.id, live.userId)).all());
    if (!user) {
      this.sessions.delete(live.id);
      throw new UnauthenticatedError("Account no longer exists");
    }
    return toSafeUser(user);
  }

  logout(session: Pick<AuthSession, "id"> | null | undefined): void {
    if (!session) return;
    if (this.sessions.delete(session.id)) {
      log.info("Logged out");
    }
  }

  get activeSessionCount(): number {
    return this.sessions.size;
  }

  /** Creates the admin account on first start; leaves an existing one untouched. */
  async seedAdmin(username: string, password: string): Promise<SafeUser> {
    const existing = this.findByUsername(username);
    if (existing) {
      log.debug("Admin account already present", { userId: existing.id });
      return toSafeUser(existing);
    }
    return this.register(username, password, "admin");
  }

  private isExpired(session: AuthSession): boolean {
    return session.expiresAt.getTime() <= this.clock().getTime();
  }

  private sweepExpired(): void {
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(id);
      }
    }
  }

  private findByUsername(username: string): User | undefined {
    const [user] = this.gateway.run((db) => db.select().from(users).where(eq(users.username, username)).all());
    return user;
  }

  private getDummyHash(): Promise<string> {
    this.dummyHash ??= hashPassword(randomBytes(16).toString("hex"));
    return this.dummyHash;
  }
}
