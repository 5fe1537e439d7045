import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { ConfigError } from "../../../internal/simulator/errors";

export function loadEnv(cwd: string = process.cwd()): void {
  // If OPENAI_API_KEY is already present, respect the existing environment.
  if (process.env.OPENAI_API_KEY) {
    return;
  }

  const candidatePaths = [
    // 1) Current working directory
    path.join(cwd, ".env"),
    // 2) Parent of cwd (repo root when run from tester-backend)
    path.join(cwd, "..", ".env"),
    // 3) tester-backend/.env based on this file's location
    path.join(__dirname, "..", "..", ".env"),
    // 4) Repo root .env based on this file's location
    path.join(__dirname, "..", "..", "..", ".env"),
  ];

  for (const candidate of candidatePaths) {
    if (fs.existsSync(candidate)) {
      dotenv.config({ path: candidate });
      break;
    }
  }

  if (!process.env.OPENAI_API_KEY) {
    throw new ConfigError(
      "MISSING_OPENAI_API_KEY",
      "Missing OPENAI_API_KEY",
      candidatePaths.join(", ")
    );
  }
}

/** Single fatal line for the CLIs, keyed on the error code. */
export function formatFatal(err: unknown): string {
  if (err instanceof ConfigError && err.code === "MISSING_OPENAI_API_KEY") {
    return `[SIMULATOR_FATAL] Missing OPENAI_API_KEY (searched: ${err.locations ?? "environment"})`;
  }
  if (process.env.DEBUG === "1" && err instanceof Error && err.stack) {
    return err.stack;
  }
  return `[SIMULATOR_FATAL] ${err instanceof Error ? err.message : String(err)}`;
}
