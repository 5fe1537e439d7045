import { describe, it, expect } from "vitest";
import { BackendUnavailableError, ClassificationFailure } from "../internal/simulator/errors";
import { OpenAIProspectAgent } from "../internal/simulator/prospectAgent";
import { generateProspectProfile } from "../internal/simulator/prospectProfile";
import { INTENT_DETECTION_REQUEST, STANDARD_OPENING } from "../internal/simulator/prompts";
import { HUMAN_TEST_DEFAULTS } from "../internal/simulator/config";
import { OpenAISalesBackend, createSalesBackend } from "../internal/simulator/salesBackend";
import type { ConversationMessage } from "../internal/simulator/types";
import { FakeChatClient, SALES_SETTINGS, completion } from "./helpers/fakes";

const T = "2026-01-05T10:00:00.000Z";

const HISTORY: ConversationMessage[] = [
  { role: "bot", text: STANDARD_OPENING, timestamp: T },
  { role: "prospect", text: "I want to lose weight", timestamp: T },
];

describe("OpenAISalesBackend.reply", () => {
  it("sends the standard opening without a model call", async () => {
    const client = new FakeChatClient([]);
    const backend = new OpenAISalesBackend({ client, maxExchanges: 10 });

    await expect(backend.reply([], SALES_SETTINGS)).resolves.toEqual({
      text: STANDARD_OPENING,
      usage: { promptTokens: 0, completionTokens: 0 },
    });
    expect(client.requests).toHaveLength(0);
  });

  it("asks the model for the opening when none is configured", async () => {
    const client = new FakeChatClient([completion("Hey! What brings you in?")]);
    const backend = new OpenAISalesBackend({ client, maxExchanges: 10, openingMessage: null });

    const reply = await backend.reply([], SALES_SETTINGS);
    expect(reply.text).toBe("Hey! What brings you in?");
    expect(client.requests[0].messages).toHaveLength(1);
  });

  it("maps the transcript onto chat roles from the bot's side", async () => {
    const client = new FakeChatClient([completion("  Great goal! How often do you train?  ")]);
    const backend = new OpenAISalesBackend({ client, maxExchanges: 4 });

    const reply = await backend.reply(HISTORY, SALES_SETTINGS);

    expect(reply).toEqual({
      text: "Great goal! How often do you train?",
      usage: { promptTokens: 12, completionTokens: 7 },
    });
    const request = client.requests[0];
    expect(request.model).toBe("test-model");
    expect(request.temperature).toBe(0.3);
    expect(request.max_tokens).toBe(120);
    expect(request.messages[0].role).toBe("system");
    expect(request.messages[0].content).toContain("You have a MAXIMUM of 4 message exchanges");
    expect(request.messages.slice(1)).toEqual([
      { role: "assistant", content: STANDARD_OPENING },
      { role: "user", content: "I want to lose weight" },
    ]);
  });

  it("wraps transport failures", async () => {
    const client = new FakeChatClient([new Error("connection reset")]);
    const backend = new OpenAISalesBackend({ client, maxExchanges: 10 });

    await expect(backend.reply(HISTORY, SALES_SETTINGS)).rejects.toThrow(
      new BackendUnavailableError("Model request failed: connection reset")
    );
  });

  it("treats an empty completion as unavailable", async () => {
    const client = new FakeChatClient([completion(null)]);
    const backend = new OpenAISalesBackend({ client, maxExchanges: 10 });

    await expect(backend.reply(HISTORY, SALES_SETTINGS)).rejects.toThrow("Model returned an empty completion");
  });
});

describe("OpenAISalesBackend.classify", () => {
  it("appends the intent request and parses the reply", async () => {
    const client = new FakeChatClient([
      completion(
        'INTENT_DETECTION:\n{"detected_intent": "weight_loss", "confidence_level": 0.9, "reasoning": "Wants to lose weight", "best_time_to_visit": "morning"}',
        { prompt_tokens: 40, completion_tokens: 30 }
      ),
    ]);
    const backend = new OpenAISalesBackend({ client, maxExchanges: 10 });

    const reply = await backend.classify(HISTORY, SALES_SETTINGS);

    expect(reply).toEqual({
      result: {
        category: "weight_loss",
        confidence: 0.9,
        reasoning: "Wants to lose weight",
        recommendedVisitTime: "morning",
      },
      usage: { promptTokens: 40, completionTokens: 30 },
    });
    const turns = client.requests[0].messages;
    expect(turns[turns.length - 1]).toEqual({ role: "user", content: INTENT_DETECTION_REQUEST });
  });

  it("reports request failures as classification failures", async () => {
    const client = new FakeChatClient([new Error("timeout")]);
    const backend = new OpenAISalesBackend({ client, maxExchanges: 10 });

    await expect(backend.classify(HISTORY, SALES_SETTINGS)).rejects.toBeInstanceOf(ClassificationFailure);
  });
});

describe("OpenAISalesBackend.assess", () => {
  it("maps a decided outcome", async () => {
    const client = new FakeChatClient([
      completion('{"should_end": true, "outcome": "not_interested", "reasoning": "Said no"}'),
    ]);
    const backend = new OpenAISalesBackend({ client, maxExchanges: 10 });

    await expect(backend.assess(HISTORY)).resolves.toBe("declined");
    const request = client.requests[0];
    expect(request.temperature).toBe(0.1);
    expect(request.max_tokens).toBe(150);
    expect(request.messages[1].content).toContain("PROSPECT: I want to lose weight");
  });

  it("continues unless the model says to end", async () => {
    const client = new FakeChatClient([
      completion('{"should_end": false, "outcome": "agreed_to_free_class"}'),
    ]);
    const backend = new OpenAISalesBackend({ client, maxExchanges: 10 });

    await expect(backend.assess(HISTORY)).resolves.toBe("continue");
  });

  it("skips the model before the prospect has spoken", async () => {
    const client = new FakeChatClient([]);
    const backend = new OpenAISalesBackend({ client, maxExchanges: 10 });

    await expect(backend.assess(HISTORY.slice(0, 1))).resolves.toBe("continue");
    expect(client.requests).toHaveLength(0);
  });

  it("assesses with the configured sales model", async () => {
    const client = new FakeChatClient([completion('{"should_end": false, "outcome": "continue"}')]);
    const backend = createSalesBackend(client, {
      ...HUMAN_TEST_DEFAULTS,
      sales: { model: "test-sales-model", temperature: 0.7, maxTokens: 300 },
    });

    await expect(backend.assess(HISTORY)).resolves.toBe("continue");
    expect(client.requests[0]).toMatchObject({ model: "test-sales-model", temperature: 0.1, max_tokens: 150 });
  });
});

describe("OpenAIProspectAgent", () => {
  it("plays the prospect side of the transcript", async () => {
    const client = new FakeChatClient([completion("Honestly I just want to drop 15 pounds.")]);
    const settings = { model: "prospect-model", temperature: 0.85, maxTokens: 100 };
    const agent = new OpenAIProspectAgent(client, settings);

    const reply = await agent.respond(generateProspectProfile(() => 0), HISTORY);

    expect(reply.text).toBe("Honestly I just want to drop 15 pounds.");
    const request = client.requests[0];
    expect(request.model).toBe("prospect-model");
    expect(request.messages[0].content).toContain(
      "YOUR TRUE INTENT: You want to lose weight and get in better shape"
    );
    expect(request.messages.slice(1)).toEqual([
      { role: "user", content: STANDARD_OPENING },
      { role: "assistant", content: "I want to lose weight" },
    ]);
  });
});
