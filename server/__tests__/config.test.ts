import { describe, it, expect, vi, afterEach } from "vitest";

const { error, warn } = vi.hoisted(() => ({ error: vi.fn(), warn: vi.fn() }));

vi.mock("../logger", () => ({
  logger: {
    child: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn,
      error,
    }),
  },
}));

import { isProduction, loadConfig } from "../config";

const PROD_SECRET = "test-secret-test-secret-test-secret";

function exitThrows() {
  return vi.spyOn(process, "exit").mockImplementation((code) => {
    throw new Error(`exit ${code}`);
  });
}

describe("loadConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    error.mockClear();
    warn.mockClear();
  });

  it("applies defaults for an empty environment", () => {
    const cfg = loadConfig({});
    expect(cfg).toMatchObject({
      nodeEnv: "development",
      port: 5000,
      databasePath: "data/dashboard.db",
      session: { forceHttps: false, ttlHours: 12 },
      ai: { enabled: false, region: "us-east-1", maxTokens: 1024 },
      seed: { onStartup: true, adminUsername: "admin", adminPassword: "adminpass" },
    });
    expect(warn).toHaveBeenCalledWith("AI_ENABLED is not set, recommendations will be omitted from summaries");
  });

  it("reads overrides from the environment", () => {
    const cfg = loadConfig({
      NODE_ENV: "test",
      PORT: "8080",
      DATABASE_PATH: "/tmp/ops.db",
      AI_ENABLED: "true",
      AI_MODEL_ID: "test-model",
      AI_TEMPERATURE: "0.5",
      SEED_ON_STARTUP: "false",
      SEED_ADMIN_USERNAME: "root",
    });
    expect(cfg.port).toBe(8080);
    expect(cfg.databasePath).toBe("/tmp/ops.db");
    expect(cfg.ai).toMatchObject({ enabled: true, modelId: "test-model", temperature: 0.5 });
    expect(cfg.seed).toMatchObject({ onStartup: false, adminUsername: "root" });
    expect(warn).not.toHaveBeenCalled();
  });

  it("exits on an invalid value", () => {
    const exit = exitThrows();
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow("exit 1");
    expect(exit).toHaveBeenCalledWith(1);
    expect(error).toHaveBeenCalledOnce();
  });

  it("exits in production with the development session secret", () => {
    exitThrows();
    expect(() => loadConfig({ NODE_ENV: "production" })).toThrow("exit 1");
    expect(() => loadConfig({ NODE_ENV: "production", SESSION_SECRET: "short" })).toThrow("exit 1");
  });

  it("accepts a long session secret in production", () => {
    const cfg = loadConfig({ NODE_ENV: "production", SESSION_SECRET: PROD_SECRET, FORCE_HTTPS: "true" });
    expect(isProduction(cfg)).toBe(true);
    expect(cfg.session.forceHttps).toBe(true);
    expect(warn).toHaveBeenCalledWith("Seeding the admin account with the default password, set SEED_ADMIN_PASSWORD");
  });
});
