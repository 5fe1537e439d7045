// INTERNAL ONLY – session/simulation types for the gym lead-qualification bot tester.
// Nothing here talks to a model; see salesBackend.ts for the OpenAI side.

export type MessageRole = "prospect" | "bot";

export interface ConversationMessage {
  role: MessageRole;
  text: string;
  /** ISO-8601 */
  timestamp: string;
}

export type TerminalStatus = "agreed" | "declined" | "limit_reached";

export type SessionStatus = "active" | TerminalStatus;

export type TerminationOutcome = "non_terminal" | TerminalStatus;

export type ProspectIntent =
  | "weight_loss"
  | "stress_relief_mental_health"
  | "learn_boxing_technique"
  | "general_fitness"
  | "social_community"
  | "just_wants_free_class";

export type FitnessIntent = ProspectIntent | "unknown";

export const PROSPECT_INTENTS: readonly ProspectIntent[] = [
  "weight_loss",
  "stress_relief_mental_health",
  "learn_boxing_technique",
  "general_fitness",
  "social_community",
  "just_wants_free_class",
];

export interface IntentResult {
  category: FitnessIntent;
  /** 0.0–1.0 */
  confidence: number;
  reasoning: string;
  /** e.g. "morning", "evening", "weekend"; null when the bot could not tell */
  recommendedVisitTime: string | null;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

interface SessionFields {
  id: string;
  startedAt: string;
  messages: readonly ConversationMessage[];
  /** Number of prospect-authored messages. */
  exchangeCount: number;
  tokenUsage: TokenUsage;
}

export interface ActiveSession extends SessionFields {
  status: "active";
  finishedAt: null;
  intentResult: null;
}

export interface TerminatedSession extends SessionFields {
  status: TerminalStatus;
  finishedAt: string;
  intentResult: IntentResult;
}

export type Session = ActiveSession | TerminatedSession;

export interface ModelSettings {
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface BackendReply {
  text: string;
  usage: TokenUsage;
}

export interface ClassificationReply {
  result: IntentResult;
  usage: TokenUsage;
}

/**
 * The sales bot as seen by the session controller: one call per turn, and one
 * separate call for the end-of-conversation intent judgment.
 */
export interface SalesBackend {
  reply(history: readonly ConversationMessage[], settings: ModelSettings): Promise<BackendReply>;
  classify(
    history: readonly ConversationMessage[],
    settings: ModelSettings
  ): Promise<ClassificationReply>;
}

export type AssessedOutcome = "agreed" | "declined" | "continue";

export interface ConversationAssessor {
  assess(messages: readonly ConversationMessage[]): Promise<AssessedOutcome>;
}

// Persona-driven batch simulation

export interface BigFiveTraits {
  openness: number;
  conscientiousness: number;
  extraversion: number;
  agreeableness: number;
  neuroticism: number;
}

export type ObjectionType =
  | "price"
  | "time_commitment"
  | "injury_concerns"
  | "intimidation_factor"
  | "location_parking"
  | "just_looking";

export type ReadinessLevel = "hot" | "warm" | "cold";

export interface ProspectProfile {
  bigFive: BigFiveTraits;
  trueIntent: ProspectIntent;
  objection: ObjectionType | null;
  readiness: ReadinessLevel;
  ageRange: string;
  fitnessBackground: string;
}

export interface ProspectAgent {
  respond(profile: ProspectProfile, messages: readonly ConversationMessage[]): Promise<BackendReply>;
}

export interface ConversationLog {
  conversationId: string;
  profile: ProspectProfile;
  session: TerminatedSession | null;
  intentMatch: boolean;
  /** Spent by the simulated prospect; the session's own tokenUsage covers the sales bot. */
  prospectUsage: TokenUsage;
  error?: string;
}
