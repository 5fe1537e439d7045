import { summarizeBatch, type BatchSummary } from "../../../../internal/simulator/runBatchSimulation";
import { PROSPECT_INTENTS, type ConversationLog, type ProspectIntent } from "../../../../internal/simulator/types";

export type OutcomeCheckKey =
  | "intent_mismatch"
  | "intent_unknown"
  | "hit_message_limit"
  | "conversation_error";

export interface BatchOutcomeEvaluation {
  summary: BatchSummary;
  failureCountsByType: Record<OutcomeCheckKey, number>;
  topFailureTypes: { check: OutcomeCheckKey; count: number }[];
  weakestIntents: { intent: ProspectIntent; accuracy: number; total: number }[];
  recommendedFixes: string[];
}

const ALL_CHECK_KEYS: OutcomeCheckKey[] = [
  "intent_mismatch",
  "intent_unknown",
  "hit_message_limit",
  "conversation_error",
];

export function failedChecksFor(entry: ConversationLog): OutcomeCheckKey[] {
  if (!entry.session) return ["conversation_error"];

  const failed: OutcomeCheckKey[] = [];
  if (entry.session.intentResult.category === "unknown") {
    failed.push("intent_unknown");
  } else if (!entry.intentMatch) {
    failed.push("intent_mismatch");
  }
  if (entry.session.status === "limit_reached") {
    failed.push("hit_message_limit");
  }
  return failed;
}

export function evaluateBatchOutcomes(logs: readonly ConversationLog[]): BatchOutcomeEvaluation {
  const summary = summarizeBatch(logs);
  const failureCounts: Record<OutcomeCheckKey, number> = {
    intent_mismatch: 0,
    intent_unknown: 0,
    hit_message_limit: 0,
    conversation_error: 0,
  };

  for (const entry of logs) {
    for (const key of failedChecksFor(entry)) {
      failureCounts[key] += 1;
    }
  }

  const topFailureTypes = ALL_CHECK_KEYS.map((key) => ({ check: key, count: failureCounts[key] }))
    .filter((entry) => entry.count > 0)
    .sort((a, b) => b.count - a.count);

  const weakestIntents = PROSPECT_INTENTS.map((intent) => ({
    intent,
    accuracy: summary.intentAccuracyByTrueIntent[intent].accuracy,
    total: summary.intentAccuracyByTrueIntent[intent].total,
  }))
    .filter((entry) => entry.total > 0 && entry.accuracy < 0.5)
    .sort((a, b) => a.accuracy - b.accuracy);

  const totalRuns = logs.length;
  const failureRate = (key: OutcomeCheckKey): number =>
    totalRuns === 0 ? 0 : failureCounts[key] / totalRuns;

  const recommendedFixes: string[] = [];

  if (failureRate("intent_mismatch") > 0.2) {
    recommendedFixes.push(
      "Sharpen the intent-priority guidance so the bot weighs what the prospect keeps asking about over their first stated goal."
    );
  }

  for (const weak of weakestIntents) {
    recommendedFixes.push(
      `Add qualifying questions that separate ${weak.intent} prospects; only ${Math.round(
        weak.accuracy * 100
      )}% were detected correctly.`
    );
  }

  if (failureRate("intent_unknown") > 0.1) {
    recommendedFixes.push(
      "Tighten the INTENT_DETECTION output format instructions; too many judgments could not be parsed."
    );
  }

  if (failureRate("hit_message_limit") > 0.5) {
    recommendedFixes.push(
      "Offer the free class earlier so conversations reach a decision before the message limit."
    );
  }

  if (failureRate("conversation_error") > 0) {
    recommendedFixes.push("Investigate backend errors; some conversations did not complete.");
  }

  return {
    summary,
    failureCountsByType: failureCounts,
    topFailureTypes,
    weakestIntents,
    recommendedFixes,
  };
}
