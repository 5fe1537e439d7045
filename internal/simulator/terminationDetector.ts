// Decides after every exchange whether the conversation is over.
// The exchange limit is always checked before any content signal, so a session
// can never run past its configured number of exchanges.

import type { TerminationMode } from "./config";
import { describeError } from "./errors";
import { logFallback } from "./logging";
import type {
  ConversationAssessor,
  ConversationMessage,
  TerminationOutcome,
} from "./types";

export interface TerminationContext {
  messages: readonly ConversationMessage[];
  exchangeCount: number;
  maxExchanges: number;
  sessionId?: string;
}

export interface TerminationDetector {
  evaluate(context: TerminationContext): Promise<TerminationOutcome>;
}

export type ContentOutcome = "agreed" | "declined" | "non_terminal";

// Acceptance that stands on its own, whatever the bot asked last.
const EXPLICIT_AGREEMENT: RegExp[] = [
  /\b(sign me up|count me in|let's do it|let's try it|i'll try it|i'll be there|i'll come)\b/,
  /\bi'm in(?=\s*[.!,]|\s*$)/,
  /\b(book|schedule|reserve|sign) me\b/,
  /\b(let's|i'd like to|i want to|i'll|please|go ahead and|can i|can you) (book|schedule|reserve)\b/,
  /\bwhat (should|do) i (bring|wear)\b/,
  /\bwhere('s| is) (it|the gym) located\b/,
  /\bwhen('s| is) the next class\b/,
];

const TIME_WORDS =
  "mornings?|evenings?|afternoons?|weekends?|mondays?|tuesdays?|wednesdays?|thursdays?|fridays?|saturdays?|sundays?|tomorrow|tonight";
const CLOCK_TIME = "\\d{1,2}(:\\d{2})? ?(am|pm)";

// Yes-words and time talk count only as the answer to an offer.
const CONTEXTUAL_AGREEMENT: RegExp[] = [
  /\b(yes|yeah|yep|yup|absolutely|definitely|ok|okay)\b/,
  /(?<!not )(?<!not so )\bsure\b/,
  /\bsounds (good|great|perfect|awesome|fun)\b/,
  new RegExp(
    `\\b(${TIME_WORDS})\\b[^.!?]{0,20}\\b(works?|is good|is best|are best|are good|would work|is fine)\\b`
  ),
  new RegExp(`\\bi can (do|make) (it )?(on |at |this |next )?(${TIME_WORDS}|${CLOCK_TIME})`),
  /\bi'm (free|available)\b/,
  /\bwhat times?\b/,
];

// Bot turns that put the free class or a time slot on the table.
const OFFER_PROMPT =
  /\b(free (class|session|trial)|trial class|book|booking|schedule|sign you up|reserve|what time|which day|what day|when (would|could|can) you|come in|stop by|mornings?|evenings?|weekends?)\b/;

// "I don't want to book", "not sure I can come", "never going to sign up"
const NEGATED_AGREEMENT =
  /\b(not|don't|do not|won't|can't|cannot|never)\s+(?:\w+\s+){0,2}?(book|sign|schedule|come|try|sure|interested|going|want)\b/;

const BOOKING_CONFIRMATION =
  /\b(you're (all )?(set|booked)|i've booked you|booked you in|see you (then|there|soon|on|at))\b/;

const DECLINE_PATTERNS: RegExp[] = [
  /\bnot (really |that |very )?interested\b/,
  /\bno longer interested\b/,
  /\bno,? thanks?\b/,
  /\bno thank you\b/,
  /\bi'll pass\b/,
  /\bpass on (it|this|that)\b/,
  /\bnot for me\b/,
  /\bchanged my mind\b/,
  /\b(stop|quit) (texting|messaging|contacting)\b/,
  /\bunsubscribe\b/,
  /\bleave me alone\b/,
  /\b(don't|do not) (want|need) (it|this|to (join|come|sign up|book))\b/,
];

function normalize(text: string): string {
  return text.toLowerCase().replace(/[‘’]/g, "'").replace(/\s+/g, " ").trim();
}

function latest(
  messages: readonly ConversationMessage[],
  role: ConversationMessage["role"]
): string {
  for (let i = messages.length - 1; i >= 0; i -= 1) {
    if (messages[i].role === role) return normalize(messages[i].text);
  }
  return "";
}

/** The bot message the latest prospect message answers. */
function promptBeforeLatestProspect(messages: readonly ConversationMessage[]): string {
  let seenProspect = false;
  for (let i = messages.length - 1; i >= 0; i -= 1) {
    if (messages[i].role === "prospect") {
      seenProspect = true;
    } else if (seenProspect) {
      return normalize(messages[i].text);
    }
  }
  return "";
}

/**
 * `offered` is whether the prospect is answering an offer of the free class or a time.
 * Without one, "yes" or "evenings work" is an answer to a qualifying question.
 */
export function hasAgreementLanguage(text: string, offered = false): boolean {
  const normalized = normalize(text);
  if (NEGATED_AGREEMENT.test(normalized)) return false;
  if (EXPLICIT_AGREEMENT.some((pattern) => pattern.test(normalized))) return true;
  return offered && CONTEXTUAL_AGREEMENT.some((pattern) => pattern.test(normalized));
}

export function isOfferPrompt(text: string): boolean {
  return OFFER_PROMPT.test(normalize(text));
}

export function hasRejectionLanguage(text: string): boolean {
  const normalized = normalize(text);
  return DECLINE_PATTERNS.some((pattern) => pattern.test(normalized));
}

/** Content-only verdict over the latest prospect and bot messages. */
export function detectContentOutcome(messages: readonly ConversationMessage[]): ContentOutcome {
  const prospect = latest(messages, "prospect");
  const bot = latest(messages, "bot");
  const offered = isOfferPrompt(promptBeforeLatestProspect(messages));

  const prospectRejects = hasRejectionLanguage(prospect);
  if (hasAgreementLanguage(prospect, offered) || (!prospectRejects && BOOKING_CONFIRMATION.test(bot))) {
    return "agreed";
  }
  if (prospectRejects) return "declined";
  return "non_terminal";
}

export function detectTermination(context: TerminationContext): TerminationOutcome {
  if (context.exchangeCount >= context.maxExchanges) return "limit_reached";
  return detectContentOutcome(context.messages);
}

export class RuleBasedTerminationDetector implements TerminationDetector {
  async evaluate(context: TerminationContext): Promise<TerminationOutcome> {
    return detectTermination(context);
  }
}

/**
 * Asks the model whether the prospect agreed or declined. An assessment that
 * fails is treated as "keep talking"; the exchange limit still ends the session.
 */
export class ModelTerminationDetector implements TerminationDetector {
  constructor(private readonly assessor: ConversationAssessor) {}

  async evaluate(context: TerminationContext): Promise<TerminationOutcome> {
    if (context.exchangeCount >= context.maxExchanges) return "limit_reached";

    try {
      const outcome = await this.assessor.assess(context.messages);
      return outcome === "continue" ? "non_terminal" : outcome;
    } catch (err) {
      logFallback(
        "termination",
        `outcome assessment failed, continuing conversation: ${describeError(err)}`,
        context.sessionId
      );
      return "non_terminal";
    }
  }
}

export function createTerminationDetector(
  mode: TerminationMode,
  assessor: ConversationAssessor
): TerminationDetector {
  return mode === "model" ? new ModelTerminationDetector(assessor) : new RuleBasedTerminationDetector();
}
