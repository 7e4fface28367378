import { describe, expect, it } from "vitest";
import { loadConfig, parseCorsOrigins } from "../config";

const baseEnv = {
  OPENAI_API_KEY: "test-openai-key",
  SUPABASE_URL: "http://localhost:54321",
  SUPABASE_SERVICE_ROLE_KEY: "test-service-role-key",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig(baseEnv)).toEqual({
      port: 8000,
      nodeEnv: "development",
      corsOrigins: [],
      openaiApiKey: "test-openai-key",
      openaiModel: "gpt-4o-mini",
      supabaseUrl: "http://localhost:54321",
      supabaseServiceRoleKey: "test-service-role-key",
    });
  });

  it("reads optional settings", () => {
    const config = loadConfig({
      ...baseEnv,
      PORT: "3001",
      NODE_ENV: "production",
      OPENAI_MODEL: "gpt-4.1-mini",
      CORS_ORIGINS: "http://localhost:3000, https://example.test",
    });

    expect(config.port).toBe(3001);
    expect(config.nodeEnv).toBe("production");
    expect(config.openaiModel).toBe("gpt-4.1-mini");
    expect(config.corsOrigins).toEqual(["http://localhost:3000", "https://example.test"]);
  });

  it("names every missing key", () => {
    expect(() => loadConfig({ OPENAI_API_KEY: "test-openai-key" })).toThrow(
      "Missing SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY"
    );
  });

  it("rejects a bad port", () => {
    expect(() => loadConfig({ ...baseEnv, PORT: "eighty" })).toThrow("Invalid PORT: eighty");
  });
});

describe("parseCorsOrigins", () => {
  it("drops blanks", () => {
    expect(parseCorsOrigins(" a ,, b ,")).toEqual(["a", "b"]);
    expect(parseCorsOrigins(undefined)).toEqual([]);
  });
});
