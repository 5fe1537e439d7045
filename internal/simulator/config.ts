// Configuration for the tester and batch simulator. The core only ever sees a
// SimulationConfig object; reading process.env happens in the CLIs.

import { z } from "zod";
import { ConfigError } from "./errors";
import type { ModelSettings } from "./types";

export type TerminationMode = "rules" | "model";

export interface SimulationConfig {
  sales: ModelSettings;
  prospect: ModelSettings;
  maxMessageExchanges: number;
  numSimulations: number;
  terminationMode: TerminationMode;
  requestTimeoutMs: number;
}

export const HUMAN_TEST_DEFAULTS: Readonly<SimulationConfig> = {
  sales: { model: "gpt-4o-mini", temperature: 0.3, maxTokens: 120 },
  prospect: { model: "gpt-4o-mini", temperature: 0.85, maxTokens: 100 },
  maxMessageExchanges: 10,
  numSimulations: 1,
  terminationMode: "rules",
  requestTimeoutMs: 30_000,
};

export const BATCH_DEFAULTS: Readonly<SimulationConfig> = {
  ...HUMAN_TEST_DEFAULTS,
  maxMessageExchanges: 3,
  numSimulations: 100,
};

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().min(1).optional());
const optionalTemperature = z.preprocess(blankToUndefined, z.coerce.number().min(0).max(2).optional());
const optionalPositiveInt = z.preprocess(
  blankToUndefined,
  z.coerce.number().int().positive().optional()
);

const envSchema = z.object({
  SIM_SALES_MODEL: optionalString,
  SIM_SALES_TEMPERATURE: optionalTemperature,
  SIM_SALES_MAX_TOKENS: optionalPositiveInt,
  SIM_PROSPECT_MODEL: optionalString,
  SIM_PROSPECT_TEMPERATURE: optionalTemperature,
  SIM_PROSPECT_MAX_TOKENS: optionalPositiveInt,
  SIM_MAX_EXCHANGES: optionalPositiveInt,
  SIM_NUM_SIMULATIONS: optionalPositiveInt,
  SIM_TERMINATION_MODE: z.preprocess(blankToUndefined, z.enum(["rules", "model"]).optional()),
  SIM_REQUEST_TIMEOUT_MS: optionalPositiveInt,
});

/**
 * Overlay SIM_* environment variables on a set of defaults.
 * Throws ConfigError(INVALID_CONFIG) listing every offending variable.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  defaults: Readonly<SimulationConfig> = HUMAN_TEST_DEFAULTS
): SimulationConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError("INVALID_CONFIG", `Invalid simulator configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    sales: {
      model: vars.SIM_SALES_MODEL ?? defaults.sales.model,
      temperature: vars.SIM_SALES_TEMPERATURE ?? defaults.sales.temperature,
      maxTokens: vars.SIM_SALES_MAX_TOKENS ?? defaults.sales.maxTokens,
    },
    prospect: {
      model: vars.SIM_PROSPECT_MODEL ?? defaults.prospect.model,
      temperature: vars.SIM_PROSPECT_TEMPERATURE ?? defaults.prospect.temperature,
      maxTokens: vars.SIM_PROSPECT_MAX_TOKENS ?? defaults.prospect.maxTokens,
    },
    maxMessageExchanges: vars.SIM_MAX_EXCHANGES ?? defaults.maxMessageExchanges,
    numSimulations: vars.SIM_NUM_SIMULATIONS ?? defaults.numSimulations,
    terminationMode: vars.SIM_TERMINATION_MODE ?? defaults.terminationMode,
    requestTimeoutMs: vars.SIM_REQUEST_TIMEOUT_MS ?? defaults.requestTimeoutMs,
  };
}
