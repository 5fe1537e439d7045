import { describe, it, expect } from "vitest";
import { summarizeBatch } from "../internal/simulator/runBatchSimulation";
import { generateProspectProfile } from "../internal/simulator/prospectProfile";
import type {
  ConversationLog,
  FitnessIntent,
  ProspectIntent,
  TerminalStatus,
} from "../internal/simulator/types";
import { buildSummaryPayload } from "../tester-backend/internal/simulator/runBatchSimulation";
import {
  evaluateBatchOutcomes,
  failedChecksFor,
} from "../tester-backend/internal/simulator/evaluators/outcomeEvaluator";
import { terminatedSessionFixture } from "./helpers/fakes";

function completed(
  trueIntent: ProspectIntent,
  status: TerminalStatus,
  category: FitnessIntent
): ConversationLog {
  const fixture = terminatedSessionFixture();
  return {
    conversationId: `conv_${trueIntent}_${status}`,
    profile: { ...generateProspectProfile(() => 0), trueIntent },
    session: { ...fixture, status, intentResult: { ...fixture.intentResult, category } },
    intentMatch: category === trueIntent,
    prospectUsage: { promptTokens: 0, completionTokens: 0 },
  };
}

function failed(): ConversationLog {
  return {
    conversationId: "conv_failed",
    profile: generateProspectProfile(() => 0),
    session: null,
    intentMatch: false,
    prospectUsage: { promptTokens: 30, completionTokens: 10 },
    error: "boom",
  };
}

const LOGS: ConversationLog[] = [
  completed("weight_loss", "agreed", "weight_loss"),
  completed("weight_loss", "agreed", "weight_loss"),
  completed("social_community", "limit_reached", "general_fitness"),
  failed(),
];

describe("failedChecksFor", () => {
  it("flags each kind of problem", () => {
    expect(failedChecksFor(LOGS[0])).toEqual([]);
    expect(failedChecksFor(LOGS[2])).toEqual(["intent_mismatch", "hit_message_limit"]);
    expect(failedChecksFor(LOGS[3])).toEqual(["conversation_error"]);
    expect(failedChecksFor(completed("general_fitness", "declined", "unknown"))).toEqual(["intent_unknown"]);
  });
});

describe("evaluateBatchOutcomes", () => {
  it("counts failures and recommends fixes", () => {
    const evaluation = evaluateBatchOutcomes(LOGS);

    expect(evaluation.failureCountsByType).toEqual({
      intent_mismatch: 1,
      intent_unknown: 0,
      hit_message_limit: 1,
      conversation_error: 1,
    });
    expect(evaluation.topFailureTypes).toEqual([
      { check: "intent_mismatch", count: 1 },
      { check: "hit_message_limit", count: 1 },
      { check: "conversation_error", count: 1 },
    ]);
    expect(evaluation.weakestIntents).toEqual([{ intent: "social_community", accuracy: 0, total: 1 }]);
    expect(evaluation.recommendedFixes).toEqual([
      "Sharpen the intent-priority guidance so the bot weighs what the prospect keeps asking about over their first stated goal.",
      "Add qualifying questions that separate social_community prospects; only 0% were detected correctly.",
      "Investigate backend errors; some conversations did not complete.",
    ]);
  });

  it("has nothing to recommend for a clean batch", () => {
    const evaluation = evaluateBatchOutcomes(LOGS.slice(0, 2));
    expect(evaluation.topFailureTypes).toEqual([]);
    expect(evaluation.recommendedFixes).toEqual([]);
  });
});

describe("buildSummaryPayload", () => {
  it("rounds the headline numbers", () => {
    const payload = buildSummaryPayload({ logs: LOGS, summary: summarizeBatch(LOGS) }, "out/run.json");

    expect(payload).toMatchObject({
      label: "baseline",
      totalRuns: 4,
      intentAccuracy: 0.667,
      outcomeCounts: { agreed: 2, declined: 0, limit_reached: 1 },
      averageExchanges: 2,
      averageTokens: 420,
      health: { runsWithErrors: 1, unknownIntents: 0 },
      transcriptPath: "out/run.json",
    });
    expect(payload.quality.recommendedFixes).toHaveLength(3);
  });
});
