// INTERNAL ONLY – batch orchestrator for persona-driven simulations.
// Each run plays a generated prospect against the sales bot through the same
// SessionController the human tester uses.
// To run: `npm run sim:batch`

import type { SimulationConfig } from "./config";
import { describeError } from "./errors";
import { log } from "./logging";
import { addUsage, ZERO_USAGE } from "./openaiClient";
import { generateProspectProfile, type RandomSource } from "./prospectProfile";
import { SessionController, isTerminated } from "./sessionController";
import { fileStamp } from "./storeConversationLogs";
import type { TerminationDetector } from "./terminationDetector";
import {
  PROSPECT_INTENTS,
  type ConversationLog,
  type ProspectAgent,
  type ProspectIntent,
  type SalesBackend,
  type Session,
  type TerminalStatus,
  type TokenUsage,
} from "./types";

export interface BatchDependencies {
  salesBackend: SalesBackend;
  prospectAgent: ProspectAgent;
  /** Built per run; the default is the rule-based detector. */
  createDetector?: () => TerminationDetector;
  random?: RandomSource;
  now?: () => Date;
}

export interface IntentAccuracy {
  total: number;
  matched: number;
  accuracy: number;
}

export interface BatchSummary {
  totalRuns: number;
  completedRuns: number;
  failedRuns: number;
  outcomeCounts: Record<TerminalStatus, number>;
  intentAccuracy: number;
  intentAccuracyByTrueIntent: Record<ProspectIntent, IntentAccuracy>;
  unknownIntentCount: number;
  averageExchanges: number;
  averageTokens: number;
}

export interface BatchRunResult {
  logs: ConversationLog[];
  summary: BatchSummary;
}

function conversationId(now: Date, index: number): string {
  return `conv_${fileStamp(now)}_${String(index).padStart(4, "0")}`;
}

export async function runBatchSimulation(
  count: number,
  config: SimulationConfig,
  deps: BatchDependencies
): Promise<BatchRunResult> {
  const now = deps.now ?? (() => new Date());
  const random = deps.random ?? Math.random;
  const logs: ConversationLog[] = [];

  log({ level: "info", component: "batch", message: `starting ${count} simulated conversation(s)` });

  for (let i = 0; i < count; i += 1) {
    const id = conversationId(now(), i);
    const profile = generateProspectProfile(random);
    const controller = new SessionController({
      backend: deps.salesBackend,
      config,
      detector: deps.createDetector?.(),
      now,
      createId: () => id,
    });

    let prospectUsage: TokenUsage = { ...ZERO_USAGE };
    try {
      let session: Session = await controller.start();
      while (!isTerminated(session)) {
        const prospectTurn = await deps.prospectAgent.respond(profile, session.messages);
        prospectUsage = addUsage(prospectUsage, prospectTurn.usage);
        session = await controller.submit(prospectTurn.text);
      }

      logs.push({
        conversationId: id,
        profile,
        session,
        intentMatch: session.intentResult.category === profile.trueIntent,
        prospectUsage,
      });
    } catch (err) {
      // one broken conversation should not sink the batch
      const error = describeError(err);
      log({ level: "error", component: "batch", message: `conversation failed: ${error}`, sessionId: id });
      logs.push({ conversationId: id, profile, session: null, intentMatch: false, prospectUsage, error });
    }
  }

  const summary = summarizeBatch(logs);
  log({
    level: "info",
    component: "batch",
    message: `completed ${summary.completedRuns}/${summary.totalRuns} conversation(s)`,
  });
  return { logs, summary };
}

function emptyAccuracy(): IntentAccuracy {
  return { total: 0, matched: 0, accuracy: 0 };
}

function ratio(part: number, whole: number): number {
  return whole === 0 ? 0 : part / whole;
}

export function summarizeBatch(logs: readonly ConversationLog[]): BatchSummary {
  const outcomeCounts: Record<TerminalStatus, number> = { agreed: 0, declined: 0, limit_reached: 0 };
  const byIntent: Record<ProspectIntent, IntentAccuracy> = {
    weight_loss: emptyAccuracy(),
    stress_relief_mental_health: emptyAccuracy(),
    learn_boxing_technique: emptyAccuracy(),
    general_fitness: emptyAccuracy(),
    social_community: emptyAccuracy(),
    just_wants_free_class: emptyAccuracy(),
  };

  let completedRuns = 0;
  let matched = 0;
  let unknownIntentCount = 0;
  let exchanges = 0;
  let tokens = 0;

  for (const entry of logs) {
    if (!entry.session) continue;
    completedRuns += 1;
    outcomeCounts[entry.session.status] += 1;
    exchanges += entry.session.exchangeCount;
    const usage = addUsage(entry.session.tokenUsage, entry.prospectUsage);
    tokens += usage.promptTokens + usage.completionTokens;
    if (entry.session.intentResult.category === "unknown") unknownIntentCount += 1;

    const bucket = byIntent[entry.profile.trueIntent];
    bucket.total += 1;
    if (entry.intentMatch) {
      bucket.matched += 1;
      matched += 1;
    }
  }

  for (const intent of PROSPECT_INTENTS) {
    byIntent[intent].accuracy = ratio(byIntent[intent].matched, byIntent[intent].total);
  }

  return {
    totalRuns: logs.length,
    completedRuns,
    failedRuns: logs.length - completedRuns,
    outcomeCounts,
    intentAccuracy: ratio(matched, completedRuns),
    intentAccuracyByTrueIntent: byIntent,
    unknownIntentCount,
    averageExchanges: ratio(exchanges, completedRuns),
    averageTokens: ratio(tokens, completedRuns),
  };
}
