import { z } from "zod";
import { logger } from "./logger";

const nodeEnvSchema = z.enum(["development", "staging", "production", "test"]).default("development");

const PRODUCTION_ENVS = new Set(["production", "staging"]);

const DEV_SESSION_SECRET = "dev-only-session-secret";

const configSchema = z.object({
  nodeEnv: nodeEnvSchema,
  port: z.coerce.number().int().positive().default(5000),

  databasePath: z.string().min(1).default("data/dashboard.db"),

  session: z.object({
    secret: z.string().min(1, "SESSION_SECRET must not be empty").default(DEV_SESSION_SECRET),
    forceHttps: z.boolean().default(false),
    ttlHours: z.coerce.number().int().positive().default(12),
  }),

  ai: z.object({
    enabled: z.boolean().default(false),
    region: z.string().min(1).default("us-east-1"),
    modelId: z.string().default("mistral.mistral-large-2402-v1:0"),
    maxTokens: z.coerce.number().int().positive().default(1024),
    temperature: z.coerce.number().min(0).max(2).default(0.3),
    topP: z.coerce.number().min(0).max(1).default(0.9),
  }),

  seed: z.object({
    onStartup: z.boolean().default(true),
    adminUsername: z.string().min(1).default("admin"),
    adminPassword: z.string().min(1).default("adminpass"),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;
export type AiSettings = AppConfig["ai"];

export function isProduction(cfg: Pick<AppConfig, "nodeEnv">): boolean {
  return PRODUCTION_ENVS.has(cfg.nodeEnv);
}

export function sessionTtlMs(cfg: Pick<AppConfig, "session">): number {
  return cfg.session.ttlHours * 60 * 60 * 1000;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    databasePath: env.DATABASE_PATH || undefined,
    session: {
      secret: env.SESSION_SECRET,
      forceHttps: env.FORCE_HTTPS === "true",
      ttlHours: env.SESSION_TTL_HOURS,
    },
    ai: {
      enabled: env.AI_ENABLED === "true",
      region: env.AWS_REGION || undefined,
      modelId: env.AI_MODEL_ID || undefined,
      maxTokens: env.AI_MAX_TOKENS,
      temperature: env.AI_TEMPERATURE,
      topP: env.AI_TOP_P,
    },
    seed: {
      onStartup: env.SEED_ON_STARTUP !== "false",
      adminUsername: env.SEED_ADMIN_USERNAME || undefined,
      adminPassword: env.SEED_ADMIN_PASSWORD || undefined,
    },
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `  - ${issue.path.join(".")}: ${issue.message}`
    );
    logger.child("config").error(`\n[Config] Fatal: invalid configuration.\n${errors.join("\n")}\n`);
    process.exit(1);
  }

  const cfg = result.data;
  const warnings: string[] = [];

  if (isProduction(cfg)) {
    if (!cfg.session.forceHttps) {
      warnings.push("FORCE_HTTPS is not enabled, session cookies will not have the Secure flag");
    }
    if (cfg.session.secret === DEV_SESSION_SECRET || cfg.session.secret.length < 32) {
      logger.child("config").error("SESSION_SECRET must be set to at least 32 characters in production environments");
      process.exit(1);
    }
    if (cfg.seed.onStartup && cfg.seed.adminPassword === "adminpass") {
      warnings.push("Seeding the admin account with the default password, set SEED_ADMIN_PASSWORD");
    }
  }

  if (!cfg.ai.enabled) {
    warnings.push("AI_ENABLED is not set, recommendations will be omitted from summaries");
  }

  for (const w of warnings) {
    logger.child("config").warn(w);
  }

  return cfg;
}

/**
 * ┌─────────────────────────────────────────────────────────────────────┐
 * │                  ENVIRONMENT VARIABLE REFERENCE                     │
 * ├──────────────────────────┬──────────┬──────────────────────────────┤
 * │ Variable                 │ Required │ Description                  │
 * ├──────────────────────────┼──────────┼──────────────────────────────┤
 * │ SESSION_SECRET           │ Prod     │ Session cookie signing key   │
 * │ DATABASE_PATH            │ No       │ SQLite file (data/dashboard.)│
 * │ PORT                     │ No       │ Server port (default 5000)   │
 * │ NODE_ENV                 │ No       │ development|staging|prod|test│
 * │ FORCE_HTTPS              │ No       │ Set "true" for secure cookie │
 * │ SESSION_TTL_HOURS        │ No       │ Cookie lifetime (default 12) │
 * │ LOG_LEVEL                │ No       │ debug|info|warn|error        │
 * │ AI_ENABLED               │ No       │ "true" to call Bedrock       │
 * │ AWS_REGION               │ No       │ Bedrock region (us-east-1)   │
 * │ AI_MODEL_ID              │ No       │ Bedrock model ID             │
 * │ AI_MAX_TOKENS            │ No       │ Max tokens (default 1024)    │
 * │ AI_TEMPERATURE           │ No       │ Model temp (default 0.3)     │
 * │ AI_TOP_P                 │ No       │ Nucleus sampling (def 0.9)   │
 * │ SEED_ON_STARTUP          │ No       │ "false" to skip seeding      │
 * │ SEED_ADMIN_USERNAME      │ No       │ Seeded admin (admin)         │
 * │ SEED_ADMIN_PASSWORD      │ No       │ Seeded admin password        │
 * └──────────────────────────┴──────────┴──────────────────────────────┘
 *
 * AWS credentials come from the SDK's default provider chain.
 */
