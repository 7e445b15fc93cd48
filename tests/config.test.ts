import { describe, it, expect } from "vitest";
import { ConfigError } from "../src/agent/errors.js";
import { DEFAULT_MODEL, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({}, {})).toEqual({
      apiKey: undefined,
      model: DEFAULT_MODEL,
      temperature: 0.7,
      maxTokens: 2000,
      maxIterations: 10,
      formatRetries: 1,
      verbose: true,
      httpTimeoutMs: 10_000,
      port: 8000,
    });
  });

  it("reads the environment and treats empty values as unset", () => {
    const config = loadConfig(
      {},
      {
        OPENROUTER_API_KEY: "test-secret",
        OPENROUTER_MODEL: "",
        AGENT_MAX_ITERATIONS: "5",
        AGENT_FORMAT_RETRIES: "0",
        AGENT_VERBOSE: "false",
        PORT: "9001",
      },
    );
    expect(config).toMatchObject({
      apiKey: "test-secret",
      model: DEFAULT_MODEL,
      maxIterations: 5,
      formatRetries: 0,
      verbose: false,
      port: 9001,
    });
  });

  it("lets overrides win over the environment", () => {
    const config = loadConfig({ maxIterations: 3, model: "some/model" }, { AGENT_MAX_ITERATIONS: "5" });
    expect(config.maxIterations).toBe(3);
    expect(config.model).toBe("some/model");
  });

  it("names malformed variables", () => {
    try {
      loadConfig({}, { AGENT_MAX_ITERATIONS: "zero", LLM_MAX_TOKENS: "12" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err).toMatchObject({
        message: "Invalid environment configuration: AGENT_MAX_ITERATIONS",
        keys: ["AGENT_MAX_ITERATIONS"],
      });
    }
  });

  it("rejects a non-positive iteration cap", () => {
    expect(() => loadConfig({}, { AGENT_MAX_ITERATIONS: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ maxIterations: 0 }, {})).toThrow(
      "maxIterations must be a positive integer",
    );
  });
});
