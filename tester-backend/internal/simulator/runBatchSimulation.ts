// Backend-local CLI entrypoint for persona-driven batch simulations.
// Loads .env, runs the batch through the shared simulator core, optionally saves
// the transcripts, and prints one JSON summary for CI / local runs.
// Run: `npm run sim:batch` (SIM_OUTPUT_DIR=./transcripts to keep the logs)

import { BATCH_DEFAULTS, loadConfig } from "../../../internal/simulator/config";
import { createOpenAIClient } from "../../../internal/simulator/openaiClient";
import { OpenAIProspectAgent } from "../../../internal/simulator/prospectAgent";
import {
  runBatchSimulation as runBatchCore,
  type BatchRunResult,
} from "../../../internal/simulator/runBatchSimulation";
import { createSalesBackend } from "../../../internal/simulator/salesBackend";
import { saveConversationLogs } from "../../../internal/simulator/storeConversationLogs";
import { createTerminationDetector } from "../../../internal/simulator/terminationDetector";
import { evaluateBatchOutcomes } from "./evaluators/outcomeEvaluator";
import { formatFatal, loadEnv } from "./loadEnv";

export function buildSummaryPayload(result: BatchRunResult, transcriptPath: string | null) {
  const evaluation = evaluateBatchOutcomes(result.logs);
  const { summary } = evaluation;

  return {
    label: "baseline",
    totalRuns: summary.totalRuns,
    intentAccuracy: Number(summary.intentAccuracy.toFixed(3)),
    outcomeCounts: summary.outcomeCounts,
    averageExchanges: Number(summary.averageExchanges.toFixed(2)),
    averageTokens: Math.round(summary.averageTokens),
    health: {
      runsWithErrors: summary.failedRuns,
      unknownIntents: summary.unknownIntentCount,
    },
    quality: {
      topFailures: evaluation.topFailureTypes,
      weakestIntents: evaluation.weakestIntents,
      recommendedFixes: evaluation.recommendedFixes,
    },
    transcriptPath,
  };
}

async function main() {
  loadEnv();
  const config = loadConfig(process.env, BATCH_DEFAULTS);
  const client = createOpenAIClient({
    apiKey: process.env.OPENAI_API_KEY,
    timeoutMs: config.requestTimeoutMs,
  });
  const salesBackend = createSalesBackend(client, config);

  const result = await runBatchCore(config.numSimulations, config, {
    salesBackend,
    prospectAgent: new OpenAIProspectAgent(client, config.prospect),
    createDetector: () => createTerminationDetector(config.terminationMode, salesBackend),
  });

  const outputDir = process.env.SIM_OUTPUT_DIR;
  const transcriptPath = outputDir ? await saveConversationLogs(result.logs, outputDir) : null;

  // single structured summary, last thing written
  console.log(JSON.stringify(buildSummaryPayload(result, transcriptPath), null, 2));
}

if (require.main === module) {
  main().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error(formatFatal(err));
      process.exit(1);
    }
  );
}
