// End-of-conversation intent judgment. The backend call lives in salesBackend.ts;
// this module owns parsing and the "unknown" fallback.

import { z } from "zod";
import { ClassificationFailure, describeError } from "./errors";
import { logFallback, logStepDone, logStepStart } from "./logging";
import { extractJsonObject, ZERO_USAGE } from "./openaiClient";
import {
  PROSPECT_INTENTS,
  type ClassificationReply,
  type ConversationMessage,
  type IntentResult,
  type ModelSettings,
  type ProspectIntent,
  type SalesBackend,
} from "./types";

const intentDetectionSchema = z.object({
  detected_intent: z.string(),
  confidence_level: z.coerce.number(),
  reasoning: z.string().default(""),
  best_time_to_visit: z.string().nullish(),
});

function isProspectIntent(value: string): value is ProspectIntent {
  return PROSPECT_INTENTS.some((intent) => intent === value);
}

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function normalizeVisitTime(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  if (!trimmed || trimmed.toLowerCase() === "null") return null;
  return trimmed.toLowerCase();
}

/**
 * Parse the sales bot's INTENT_DETECTION reply into an IntentResult.
 * When the bot lists several intents ("weight_loss, general_fitness") the first wins.
 */
export function parseIntentDetection(raw: string): IntentResult {
  let payload: unknown;
  try {
    payload = extractJsonObject(raw);
  } catch (err) {
    throw new ClassificationFailure(`Unparseable intent detection: ${describeError(err)}`, {
      cause: err,
    });
  }

  const parsed = intentDetectionSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ClassificationFailure(
      `Malformed intent detection: ${parsed.error.issues.map((i) => i.path.join(".")).join(", ")}`
    );
  }

  const detected = parsed.data.detected_intent.split(",")[0].trim().toLowerCase();
  if (!isProspectIntent(detected)) {
    throw new ClassificationFailure(`Unrecognized intent category: ${detected || "(empty)"}`);
  }

  return {
    category: detected,
    confidence: clampConfidence(parsed.data.confidence_level),
    reasoning: parsed.data.reasoning.trim(),
    recommendedVisitTime: normalizeVisitTime(parsed.data.best_time_to_visit),
  };
}

export function unknownIntentResult(failure: string): IntentResult {
  return {
    category: "unknown",
    confidence: 0,
    reasoning: `Intent classification failed: ${failure}`,
    recommendedVisitTime: null,
  };
}

/**
 * Ask the backend for its intent judgment. Never throws: a transcript must stay
 * exportable even when the judgment is missing.
 */
export async function classifyIntent(
  backend: SalesBackend,
  history: readonly ConversationMessage[],
  settings: ModelSettings,
  sessionId?: string
): Promise<ClassificationReply> {
  const startedAt = logStepStart("intent", "classify", sessionId);
  try {
    const reply = await backend.classify(history, settings);
    logStepDone("intent", "classify", startedAt, sessionId);
    return reply;
  } catch (err) {
    const failure = describeError(err);
    logFallback("intent", `classification failed, recording unknown intent: ${failure}`, sessionId);
    return { result: unknownIntentResult(failure), usage: { ...ZERO_USAGE } };
  }
}
