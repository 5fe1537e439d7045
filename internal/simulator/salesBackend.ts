// INTERNAL ONLY – OpenAI-backed sales bot used by both the human tester and the
// batch simulator, so both exercise the same prompts and request settings.

import { z } from "zod";
import { HUMAN_TEST_DEFAULTS, type SimulationConfig } from "./config";
import { ClassificationFailure, describeError } from "./errors";
import { parseIntentDetection } from "./intentClassifier";
import { completeChat, extractJsonObject, toChatTurns, ZERO_USAGE, type ChatClient } from "./openaiClient";
import {
  ASSESSMENT_SYSTEM_PROMPT,
  INTENT_DETECTION_REQUEST,
  STANDARD_OPENING,
  buildAssessmentPrompt,
  buildSalesSystemPrompt,
} from "./prompts";
import type {
  AssessedOutcome,
  BackendReply,
  ClassificationReply,
  ConversationAssessor,
  ConversationMessage,
  ModelSettings,
  SalesBackend,
} from "./types";

const ASSESSMENT_WINDOW = 6;

/** Assessment uses the sales model with a low temperature and a short reply budget. */
export function assessmentSettingsFor(sales: ModelSettings): ModelSettings {
  return { model: sales.model, temperature: 0.1, maxTokens: 150 };
}

const assessmentSchema = z.object({
  should_end: z.boolean().default(false),
  outcome: z.enum(["agreed_to_free_class", "not_interested", "continue"]).default("continue"),
  reasoning: z.string().optional(),
});

export interface OpenAISalesBackendOptions {
  client: ChatClient;
  maxExchanges: number;
  /** Sent for an empty history instead of asking the model. null asks the model. */
  openingMessage?: string | null;
  /** Settings for the outcome assessment call; low temperature for repeatable judgments. */
  assessmentSettings?: ModelSettings;
}

export class OpenAISalesBackend implements SalesBackend, ConversationAssessor {
  private readonly client: ChatClient;
  private readonly systemPrompt: string;
  private readonly openingMessage: string | null;
  private readonly assessmentSettings: ModelSettings;

  constructor(options: OpenAISalesBackendOptions) {
    this.client = options.client;
    this.systemPrompt = buildSalesSystemPrompt(options.maxExchanges);
    this.openingMessage =
      options.openingMessage === undefined ? STANDARD_OPENING : options.openingMessage;
    this.assessmentSettings = options.assessmentSettings ?? assessmentSettingsFor(HUMAN_TEST_DEFAULTS.sales);
  }

  async reply(
    history: readonly ConversationMessage[],
    settings: ModelSettings
  ): Promise<BackendReply> {
    if (history.length === 0 && this.openingMessage !== null) {
      return { text: this.openingMessage, usage: { ...ZERO_USAGE } };
    }
    return completeChat(this.client, toChatTurns(this.systemPrompt, history, "bot"), settings);
  }

  async classify(
    history: readonly ConversationMessage[],
    settings: ModelSettings
  ): Promise<ClassificationReply> {
    const turns = toChatTurns(this.systemPrompt, history, "bot");
    turns.push({ role: "user", content: INTENT_DETECTION_REQUEST });

    let reply: BackendReply;
    try {
      reply = await completeChat(this.client, turns, settings);
    } catch (err) {
      throw new ClassificationFailure(describeError(err), { cause: err });
    }
    return { result: parseIntentDetection(reply.text), usage: reply.usage };
  }

  async assess(messages: readonly ConversationMessage[]): Promise<AssessedOutcome> {
    const latestProspect = [...messages].reverse().find((m) => m.role === "prospect");
    if (!latestProspect) return "continue";

    const transcript = messages
      .slice(-ASSESSMENT_WINDOW)
      .map((m) => `${m.role === "bot" ? "SALES" : "PROSPECT"}: ${m.text}`)
      .join("\n");

    const { text } = await completeChat(
      this.client,
      [
        { role: "system", content: ASSESSMENT_SYSTEM_PROMPT },
        { role: "user", content: buildAssessmentPrompt(transcript, latestProspect.text) },
      ],
      this.assessmentSettings
    );

    const assessment = assessmentSchema.parse(extractJsonObject(text));
    if (!assessment.should_end) return "continue";
    switch (assessment.outcome) {
      case "agreed_to_free_class":
        return "agreed";
      case "not_interested":
        return "declined";
      default:
        return "continue";
    }
  }
}

export function createSalesBackend(client: ChatClient, config: SimulationConfig): OpenAISalesBackend {
  return new OpenAISalesBackend({
    client,
    maxExchanges: config.maxMessageExchanges,
    assessmentSettings: assessmentSettingsFor(config.sales),
  });
}
