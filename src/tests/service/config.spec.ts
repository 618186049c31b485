import { describe, expect, it } from "vitest";
import { loadConfig } from "../../config/env";

describe("loadConfig", () => {
  it("applies defaults and disables the audit log without a database", () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.openaiApiKey).toBeUndefined();
    expect(config.summarizerA.model).toBe("gpt-4o-mini");
    expect(config.summarizerB.model).toBe("gpt-4o");
    expect(config.summaryMaxLength).toBe(800);
    expect(config.wikipedia.baseUrl).toBe("https://en.wikipedia.org/api/rest_v1");
    expect(config.backendTimeoutMs).toBe(15_000);
    expect(config.bulkRegisterConcurrency).toBe(3);
    expect(config.database).toBeNull();
  });

  it("reads overrides and database settings", () => {
    const config = loadConfig({
      PORT: "8080",
      OPENAI_API_KEY: "test-secret",
      BACKEND_TIMEOUT_MS: "500",
      PGHOST: "localhost",
      PGPORT: "5433",
      PGUSER: "resolver",
      PGDATABASE: "resolver",
      PGSSLMODE: "require"
    });

    expect(config.port).toBe(8080);
    expect(config.openaiApiKey).toBe("test-secret");
    expect(config.backendTimeoutMs).toBe(500);
    expect(config.database).toEqual({
      connectionString: undefined,
      host: "localhost",
      port: 5433,
      user: "resolver",
      password: undefined,
      database: "resolver",
      ssl: true
    });
  });

  it("treats blank optional values as unset", () => {
    const config = loadConfig({ OPENAI_API_KEY: "  ", DATABASE_URL: "" });
    expect(config.openaiApiKey).toBeUndefined();
    expect(config.database).toBeNull();
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(/Invalid configuration/);
    expect(() => loadConfig({ PGHOST: "localhost", PGPORT: "abc" })).toThrow(
      'Invalid configuration: PGPORT must be an integer, got "abc"'
    );
  });
});
