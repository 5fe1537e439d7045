import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { BackendUnavailableError } from "../internal/simulator/errors";
import { SessionController } from "../internal/simulator/sessionController";
import { converse } from "../tester-backend/internal/simulator/runHumanTest";
import {
  DEFAULT_BOT_REPLY,
  OPENING_TEXT,
  SALES_SETTINGS,
  ScriptedSalesBackend,
  steppingClock,
} from "./helpers/fakes";

function makeController(backend: ScriptedSalesBackend) {
  return new SessionController({
    backend,
    config: { sales: SALES_SETTINGS, maxMessageExchanges: 10 },
    now: steppingClock(),
    createId: () => "conv_test",
  });
}

/** Answers prompts from a fixed list; `onAsk` runs before the n-th answer (1-based). */
function scriptedInput(lines: string[], onAsk?: (n: number) => void) {
  const queue = [...lines];
  let asked = 0;
  return async () => {
    asked += 1;
    onAsk?.(asked);
    return queue.shift() ?? "/quit";
  };
}

beforeEach(() => {
  vi.useFakeTimers({ toFake: ["Date"] });
  vi.setSystemTime(new Date("2026-03-01T09:30:00.000Z"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe("converse", () => {
  it("re-prompts after the sales bot fails and keeps the conversation", async () => {
    const backend = new ScriptedSalesBackend();
    const printed: string[] = [];
    const ask = scriptedInput(["I want to lose weight", "I want to lose weight", "No thanks"], (n) => {
      if (n === 1) backend.failNextReply = new Error("rate limited");
    });

    const session = await converse(ask, makeController(backend), (line) => printed.push(line));

    expect(session?.status).toBe("declined");
    expect(session?.exchangeCount).toBe(2);
    expect(session?.messages.map((m) => m.text)).toEqual([
      OPENING_TEXT,
      "I want to lose weight",
      DEFAULT_BOT_REPLY,
      "No thanks",
      DEFAULT_BOT_REPLY,
    ]);
    expect(console.warn).toHaveBeenCalledWith(
      "[2026-03-01T09:30:00.000Z] [WARN] [simulator:tester] [session:test] sales bot unavailable, send your message again: Sales backend failed: rate limited"
    );
    expect(printed).toEqual([
      `\nSales Bot: ${OPENING_TEXT}\n`,
      `\nSales Bot: ${DEFAULT_BOT_REPLY}\n`,
      `\nSales Bot: ${DEFAULT_BOT_REPLY}\n`,
    ]);
  });

  it("skips blank lines", async () => {
    const backend = new ScriptedSalesBackend();
    const session = await converse(scriptedInput(["   ", "No thanks"]), makeController(backend), () => undefined);

    expect(session?.status).toBe("declined");
    expect(session?.exchangeCount).toBe(1);
  });

  it("returns null when the person quits", async () => {
    const controller = makeController(new ScriptedSalesBackend());
    const session = await converse(scriptedInput(["I want to lose weight", " /QUIT "]), controller, () => undefined);

    expect(session).toBeNull();
    expect(controller.current?.status).toBe("active");
  });

  it("gives up when the opening cannot be fetched", async () => {
    const backend = new ScriptedSalesBackend();
    backend.failNextReply = new Error("ECONNRESET");

    await expect(converse(scriptedInput([]), makeController(backend), () => undefined)).rejects.toBeInstanceOf(
      BackendUnavailableError
    );
  });
});
