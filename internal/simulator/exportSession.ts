// Export formats for a finished tester session: a lossless JSON document and a
// formatted transcript (PDF via pdfkit, degrading to the JSON document).

import { z } from "zod";
import { ExportFormatError, ExportFormattingUnavailable, describeError } from "./errors";
import { logFallback } from "./logging";
import type { TerminatedSession } from "./types";

export interface StructuredDocument {
  conversationId: string;
  exportedAt: string;
  status: TerminatedSession["status"];
  exchangeCount: number;
  /** Number of bot messages, opening included. */
  conversationLength: number;
  startedAt: string;
  finishedAt: string;
  messages: TerminatedSession["messages"];
  intentResult: TerminatedSession["intentResult"];
  tokenUsage: TerminatedSession["tokenUsage"] & { totalTokens: number };
}

export type TranscriptDocument =
  | { format: "pdf"; contentType: "application/pdf"; fileName: string; data: Buffer }
  | { format: "json"; contentType: "application/json"; fileName: string; data: string };

export interface TranscriptRenderer {
  /** Throws ExportFormattingUnavailable when the renderer cannot be used. */
  render(session: TerminatedSession): Promise<Buffer>;
}

const OUTCOME_LABELS: Record<TerminatedSession["status"], string> = {
  agreed: "Agreed To Free Class",
  declined: "Not Interested",
  limit_reached: "Reached Message Limit",
};

const ROLE_LABELS = { bot: "Sales Bot", prospect: "Prospect" } as const;

export function humanizeLabel(value: string): string {
  return value
    .split("_")
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1) : word))
    .join(" ");
}

export function formatConfidence(confidence: number): string {
  return `${Math.round(confidence * 100)}%`;
}

export function buildStructuredDocument(
  session: TerminatedSession,
  exportedAt: Date = new Date()
): StructuredDocument {
  return {
    conversationId: session.id,
    exportedAt: exportedAt.toISOString(),
    status: session.status,
    exchangeCount: session.exchangeCount,
    conversationLength: session.messages.filter((m) => m.role === "bot").length,
    startedAt: session.startedAt,
    finishedAt: session.finishedAt,
    messages: session.messages,
    intentResult: session.intentResult,
    tokenUsage: {
      ...session.tokenUsage,
      totalTokens: session.tokenUsage.promptTokens + session.tokenUsage.completionTokens,
    },
  };
}

export function toStructuredDocument(session: TerminatedSession, exportedAt?: Date): string {
  return JSON.stringify(buildStructuredDocument(session, exportedAt), null, 2);
}

const messageSchema = z.object({
  role: z.enum(["prospect", "bot"]),
  text: z.string(),
  timestamp: z.string(),
});

const structuredDocumentSchema = z.object({
  conversationId: z.string().min(1),
  status: z.enum(["agreed", "declined", "limit_reached"]),
  exchangeCount: z.number().int().nonnegative(),
  startedAt: z.string(),
  finishedAt: z.string(),
  messages: z.array(messageSchema),
  intentResult: z.object({
    category: z.enum([
      "weight_loss",
      "stress_relief_mental_health",
      "learn_boxing_technique",
      "general_fitness",
      "social_community",
      "just_wants_free_class",
      "unknown",
    ]),
    confidence: z.number().min(0).max(1),
    reasoning: z.string(),
    recommendedVisitTime: z.string().nullable(),
  }),
  tokenUsage: z.object({
    promptTokens: z.number().int().nonnegative(),
    completionTokens: z.number().int().nonnegative(),
  }),
});

/** Rebuild the session a structured document was exported from. */
export function parseStructuredDocument(json: string): TerminatedSession {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new ExportFormatError(`Structured document is not valid JSON: ${describeError(err)}`, {
      cause: err,
    });
  }

  const parsed = structuredDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "(root)");
    throw new ExportFormatError(`Invalid structured document: ${fields.join(", ")}`);
  }

  const doc = parsed.data;
  const prospectCount = doc.messages.filter((m) => m.role === "prospect").length;
  if (prospectCount !== doc.exchangeCount) {
    throw new ExportFormatError(
      `exchangeCount ${doc.exchangeCount} does not match ${prospectCount} prospect message(s)`
    );
  }

  return {
    id: doc.conversationId,
    startedAt: doc.startedAt,
    finishedAt: doc.finishedAt,
    status: doc.status,
    messages: doc.messages,
    exchangeCount: doc.exchangeCount,
    intentResult: doc.intentResult,
    tokenUsage: {
      promptTokens: doc.tokenUsage.promptTokens,
      completionTokens: doc.tokenUsage.completionTokens,
    },
  };
}

export function renderTranscriptText(session: TerminatedSession): string {
  const lines: string[] = [
    "Gym Sales Bot Conversation",
    `Conversation ID: ${session.id}`,
    `Started: ${session.startedAt}`,
    "",
    "Conversation Transcript",
    "",
  ];

  for (const message of session.messages) {
    lines.push(`${ROLE_LABELS[message.role]}:`, message.text, "");
  }

  const intent = session.intentResult;
  lines.push(
    "Intent Detection Results",
    `Detected Intent: ${humanizeLabel(intent.category)}`,
    `Confidence: ${formatConfidence(intent.confidence)}`,
    `Reasoning: ${intent.reasoning}`
  );
  if (intent.recommendedVisitTime) {
    lines.push(`Best Time to Visit: ${humanizeLabel(intent.recommendedVisitTime)}`);
  }
  lines.push(
    "",
    `Outcome: ${OUTCOME_LABELS[session.status]}`,
    `Exchanges: ${session.exchangeCount}`,
    `Tokens Used: ${session.tokenUsage.promptTokens + session.tokenUsage.completionTokens}`
  );

  return lines.join("\n");
}

async function loadPdfKit(): Promise<typeof import("pdfkit")> {
  try {
    const mod = await import("pdfkit");
    return mod.default;
  } catch (err) {
    throw new ExportFormattingUnavailable("PDF export requires the optional 'pdfkit' package", {
      cause: err,
    });
  }
}

export const pdfTranscriptRenderer: TranscriptRenderer = {
  async render(session) {
    const PDFDocument = await loadPdfKit();

    try {
      const doc = new PDFDocument({ size: "LETTER", margin: 36 });
      const chunks: Buffer[] = [];
      const finished = new Promise<Buffer>((resolve, reject) => {
        doc.on("data", (chunk: Buffer) => chunks.push(chunk));
        doc.on("end", () => resolve(Buffer.concat(chunks)));
        doc.on("error", reject);
      });

      doc.font("Helvetica-Bold").fontSize(20).fillColor("#1e3a8a").text("Gym Sales Bot Conversation");
      doc.moveDown(0.5);
      doc.font("Helvetica").fontSize(10).fillColor("grey");
      doc.text(`Conversation ID: ${session.id}`);
      doc.text(`Started: ${session.startedAt}`);
      doc.moveDown();

      doc.font("Helvetica-Bold").fontSize(14).fillColor("black").text("Conversation Transcript");
      doc.moveDown(0.5);
      for (const message of session.messages) {
        doc
          .font("Helvetica-Bold")
          .fontSize(11)
          .fillColor(message.role === "bot" ? "#1e3a8a" : "#059669")
          .text(`${ROLE_LABELS[message.role]}:`);
        doc.font("Helvetica").fontSize(10).fillColor("black").text(message.text, { indent: 20 });
        doc.moveDown(0.5);
      }

      const intent = session.intentResult;
      doc.moveDown();
      doc.font("Helvetica-Bold").fontSize(14).text("Intent Detection Results");
      doc.font("Helvetica").fontSize(10);
      doc.text(`Detected Intent: ${humanizeLabel(intent.category)}`);
      doc.text(`Confidence: ${formatConfidence(intent.confidence)}`);
      doc.text(`Reasoning: ${intent.reasoning}`);
      if (intent.recommendedVisitTime) {
        doc.text(`Best Time to Visit: ${humanizeLabel(intent.recommendedVisitTime)}`);
      }
      doc.moveDown();
      doc.font("Helvetica-Bold").fontSize(11).text(`Outcome: ${OUTCOME_LABELS[session.status]}`);

      doc.end();
      return await finished;
    } catch (err) {
      throw new ExportFormattingUnavailable(`PDF rendering failed: ${describeError(err)}`, {
        cause: err,
      });
    }
  },
};

/**
 * Formatted transcript for download. Falls back to the structured JSON document
 * when the renderer is unavailable.
 */
export async function toTranscriptDocument(
  session: TerminatedSession,
  renderer: TranscriptRenderer = pdfTranscriptRenderer
): Promise<TranscriptDocument> {
  try {
    const data = await renderer.render(session);
    return {
      format: "pdf",
      contentType: "application/pdf",
      fileName: `conversation_${session.id}.pdf`,
      data,
    };
  } catch (err) {
    if (!(err instanceof ExportFormattingUnavailable)) throw err;
    logFallback("export", `${err.message}; exporting JSON instead`, session.id);
    return {
      format: "json",
      contentType: "application/json",
      fileName: `conversation_${session.id}.json`,
      data: toStructuredDocument(session),
    };
  }
}
