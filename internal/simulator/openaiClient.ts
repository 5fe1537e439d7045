// Thin seam over the OpenAI chat completions API. The simulator depends on the
// ChatClient shape only, so tests can hand in a scripted client.

import OpenAI from "openai";
import { BackendUnavailableError, ConfigError, describeError } from "./errors";
import type { ConversationMessage, ModelSettings, TokenUsage } from "./types";

export type ChatTurn =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string };

export interface ChatCompletionRequest {
  model: string;
  messages: ChatTurn[];
  temperature: number;
  max_tokens: number;
}

export interface ChatCompletionResponse {
  choices: Array<{ message: { content: string | null } }>;
  usage?: { prompt_tokens: number; completion_tokens: number } | null;
}

export interface ChatClient {
  createChatCompletion(request: ChatCompletionRequest): Promise<ChatCompletionResponse>;
}

export interface OpenAIClientOptions {
  apiKey?: string;
  timeoutMs?: number;
}

export function createOpenAIClient(options: OpenAIClientOptions = {}): ChatClient {
  const apiKey = options.apiKey;
  if (!apiKey) {
    throw new ConfigError("MISSING_OPENAI_API_KEY", "Missing OPENAI_API_KEY");
  }

  const client = new OpenAI({ apiKey, timeout: options.timeoutMs, maxRetries: 1 });
  return {
    createChatCompletion: (request) =>
      client.chat.completions.create({ ...request, stream: false }),
  };
}

export const ZERO_USAGE: Readonly<TokenUsage> = { promptTokens: 0, completionTokens: 0 };

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    promptTokens: a.promptTokens + b.promptTokens,
    completionTokens: a.completionTokens + b.completionTokens,
  };
}

/**
 * Send one completion request and return the first choice's text.
 * Any SDK failure, and an empty completion, surface as BackendUnavailableError.
 */
export async function completeChat(
  client: ChatClient,
  messages: ChatTurn[],
  settings: ModelSettings
): Promise<{ text: string; usage: TokenUsage }> {
  let completion: ChatCompletionResponse;
  try {
    completion = await client.createChatCompletion({
      model: settings.model,
      messages,
      temperature: settings.temperature,
      max_tokens: settings.maxTokens,
    });
  } catch (err) {
    throw new BackendUnavailableError(`Model request failed: ${describeError(err)}`, { cause: err });
  }

  const text = completion.choices[0]?.message?.content?.trim() ?? "";
  if (!text) {
    throw new BackendUnavailableError("Model returned an empty completion");
  }

  return {
    text,
    usage: {
      promptTokens: completion.usage?.prompt_tokens ?? 0,
      completionTokens: completion.usage?.completion_tokens ?? 0,
    },
  };
}

/** Map a transcript onto chat roles from the point of view of `speaker`. */
export function toChatTurns(
  systemPrompt: string,
  messages: readonly ConversationMessage[],
  speaker: ConversationMessage["role"]
): ChatTurn[] {
  const turns: ChatTurn[] = [{ role: "system", content: systemPrompt }];
  for (const message of messages) {
    turns.push(
      message.role === speaker
        ? { role: "assistant", content: message.text }
        : { role: "user", content: message.text }
    );
  }
  return turns;
}

/**
 * Pull the JSON object out of a model reply that may wrap it in prose,
 * an "INTENT_DETECTION:" label, or a Markdown code fence.
 */
export function extractJsonObject(raw: string): unknown {
  const fenced = raw.match(/```(?:json)?\s*([\s\S]*?)```/);
  const body = fenced ? fenced[1] : raw;
  const start = body.indexOf("{");
  const end = body.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new SyntaxError("No JSON object found in model reply");
  }
  return JSON.parse(body.slice(start, end + 1));
}
