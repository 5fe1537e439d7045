// Drives one tester conversation from the bot's opening message to a frozen,
// exportable record. Every session value handed out is deeply frozen; each step
// replaces the value instead of mutating it, and only after its backend call succeeded.

import { v4 as uuidv4 } from "uuid";
import {
  BackendUnavailableError,
  InvalidInputError,
  InvalidStateError,
  SimulatorError,
  describeError,
} from "./errors";
import { classifyIntent } from "./intentClassifier";
import { log, logStepDone, logStepStart } from "./logging";
import { addUsage, ZERO_USAGE } from "./openaiClient";
import { RuleBasedTerminationDetector, type TerminationDetector } from "./terminationDetector";
import type {
  ActiveSession,
  BackendReply,
  ConversationMessage,
  ModelSettings,
  SalesBackend,
  Session,
  TerminalStatus,
  TerminatedSession,
} from "./types";

export interface SessionControllerConfig {
  sales: ModelSettings;
  maxMessageExchanges: number;
}

export interface SessionControllerOptions {
  backend: SalesBackend;
  config: SessionControllerConfig;
  detector?: TerminationDetector;
  now?: () => Date;
  createId?: () => string;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

export function isTerminated(session: Session): session is TerminatedSession {
  return session.status !== "active";
}

export class SessionController {
  private readonly backend: SalesBackend;
  private readonly config: SessionControllerConfig;
  private readonly detector: TerminationDetector;
  private readonly now: () => Date;
  private readonly createId: () => string;
  private session: Session | null = null;

  constructor(options: SessionControllerOptions) {
    if (!Number.isInteger(options.config.maxMessageExchanges) || options.config.maxMessageExchanges < 1) {
      throw new RangeError("maxMessageExchanges must be a positive integer");
    }
    this.backend = options.backend;
    this.config = options.config;
    this.detector = options.detector ?? new RuleBasedTerminationDetector();
    this.now = options.now ?? (() => new Date());
    this.createId = options.createId ?? (() => `conv_${uuidv4()}`);
  }

  /** The current session value, or null before start() succeeded. */
  get current(): Session | null {
    return this.session;
  }

  async start(): Promise<ActiveSession> {
    if (this.session) {
      throw new InvalidStateError("start() may only be called once per session controller");
    }

    const id = this.createId();
    const startedAt = this.timestamp();
    const opening = await this.exchange([], id);

    const session: ActiveSession = {
      id,
      startedAt,
      finishedAt: null,
      status: "active",
      messages: [{ role: "bot", text: opening.text, timestamp: this.timestamp() }],
      exchangeCount: 0,
      intentResult: null,
      tokenUsage: addUsage(ZERO_USAGE, opening.usage),
    };
    this.session = deepFreeze(session);
    log({ level: "info", component: "session", message: "conversation started", sessionId: id });
    return session;
  }

  async submit(userText: string): Promise<Session> {
    const session = this.session;
    if (!session) {
      throw new InvalidStateError("submit() called before start()");
    }
    if (session.status !== "active") {
      throw new InvalidStateError(`submit() called on a ${session.status} session`);
    }
    const text = userText.trim();
    if (!text) {
      throw new InvalidInputError("Prospect message must not be empty");
    }

    const prospectMessage: ConversationMessage = { role: "prospect", text, timestamp: this.timestamp() };
    const history = [...session.messages, prospectMessage];
    const reply = await this.exchange(history, session.id);

    const messages = [...history, { role: "bot" as const, text: reply.text, timestamp: this.timestamp() }];
    const exchangeCount = session.exchangeCount + 1;
    const tokenUsage = addUsage(session.tokenUsage, reply.usage);

    const outcome = await this.detector.evaluate({
      messages,
      exchangeCount,
      maxExchanges: this.config.maxMessageExchanges,
      sessionId: session.id,
    });

    if (outcome === "non_terminal") {
      const next: ActiveSession = { ...session, messages, exchangeCount, tokenUsage };
      this.session = deepFreeze(next);
      return next;
    }

    return this.finalize(session, messages, exchangeCount, tokenUsage, outcome);
  }

  export(): TerminatedSession {
    const session = this.session;
    if (!session || !isTerminated(session)) {
      throw new InvalidStateError("export() is only available once the conversation has ended");
    }
    return session;
  }

  private async finalize(
    session: ActiveSession,
    messages: ConversationMessage[],
    exchangeCount: number,
    tokenUsage: ActiveSession["tokenUsage"],
    status: TerminalStatus
  ): Promise<TerminatedSession> {
    const classification = await classifyIntent(this.backend, messages, this.config.sales, session.id);

    const terminated: TerminatedSession = {
      id: session.id,
      startedAt: session.startedAt,
      finishedAt: this.timestamp(),
      status,
      messages,
      exchangeCount,
      intentResult: classification.result,
      tokenUsage: addUsage(tokenUsage, classification.usage),
    };
    this.session = deepFreeze(terminated);
    log({
      level: "info",
      component: "session",
      message: `conversation ended: ${status} after ${exchangeCount} exchange(s), intent ${terminated.intentResult.category}`,
      sessionId: session.id,
    });
    return terminated;
  }

  private async exchange(history: readonly ConversationMessage[], sessionId: string): Promise<BackendReply> {
    const startedAt = logStepStart("session", "reply", sessionId);
    try {
      const reply = await this.backend.reply(history, this.config.sales);
      logStepDone("session", "reply", startedAt, sessionId);
      return reply;
    } catch (err) {
      if (err instanceof SimulatorError) throw err;
      throw new BackendUnavailableError(`Sales backend failed: ${describeError(err)}`, { cause: err });
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
