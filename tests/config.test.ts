import { describe, it, expect } from "vitest";
import { BATCH_DEFAULTS, HUMAN_TEST_DEFAULTS, loadConfig } from "../internal/simulator/config";
import { ConfigError } from "../internal/simulator/errors";

describe("loadConfig", () => {
  it("returns the human tester defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      sales: { model: "gpt-4o-mini", temperature: 0.3, maxTokens: 120 },
      prospect: { model: "gpt-4o-mini", temperature: 0.85, maxTokens: 100 },
      maxMessageExchanges: 10,
      numSimulations: 1,
      terminationMode: "rules",
      requestTimeoutMs: 30000,
    });
  });

  it("uses the batch defaults when asked", () => {
    const config = loadConfig({}, BATCH_DEFAULTS);
    expect(config.maxMessageExchanges).toBe(3);
    expect(config.numSimulations).toBe(100);
  });

  it("overlays SIM_* variables", () => {
    const config = loadConfig({
      SIM_SALES_MODEL: "gpt-4o",
      SIM_SALES_TEMPERATURE: "0.5",
      SIM_PROSPECT_MAX_TOKENS: "80",
      SIM_MAX_EXCHANGES: "4",
      SIM_TERMINATION_MODE: "model",
    });
    expect(config.sales).toEqual({ model: "gpt-4o", temperature: 0.5, maxTokens: 120 });
    expect(config.prospect.maxTokens).toBe(80);
    expect(config.maxMessageExchanges).toBe(4);
    expect(config.terminationMode).toBe("model");
  });

  it("ignores blank values", () => {
    expect(loadConfig({ SIM_MAX_EXCHANGES: "  ", SIM_SALES_MODEL: "" })).toEqual(HUMAN_TEST_DEFAULTS);
  });

  it("rejects values out of range", () => {
    let caught: unknown;
    try {
      loadConfig({ SIM_MAX_EXCHANGES: "0" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ code: "INVALID_CONFIG" });
    expect(String(caught)).toContain("SIM_MAX_EXCHANGES");
  });

  it("rejects an unknown termination mode and a non-numeric temperature", () => {
    expect(() => loadConfig({ SIM_TERMINATION_MODE: "magic" })).toThrow(ConfigError);
    expect(() => loadConfig({ SIM_PROSPECT_TEMPERATURE: "warm" })).toThrow(ConfigError);
    expect(() => loadConfig({ SIM_SALES_TEMPERATURE: "2.5" })).toThrow(ConfigError);
  });
});
