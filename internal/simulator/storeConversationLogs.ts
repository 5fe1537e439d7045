// INTERNAL ONLY – file persistence for simulation and tester output.
// Files are written only when a CLI asks for them; nothing is read back.

import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { buildStructuredDocument } from "./exportSession";
import type { ConversationLog } from "./types";

export function fileStamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
}

/** Writes conversation_transcripts_<stamp>.json into outputDir and returns its path. */
export async function saveConversationLogs(
  logs: readonly ConversationLog[],
  outputDir: string,
  now: Date = new Date()
): Promise<string> {
  await mkdir(outputDir, { recursive: true });

  const filePath = path.join(outputDir, `conversation_transcripts_${fileStamp(now)}.json`);
  const payload = logs.map((entry) => ({
    conversationId: entry.conversationId,
    profile: entry.profile,
    intentMatch: entry.intentMatch,
    prospectUsage: entry.prospectUsage,
    error: entry.error ?? null,
    conversation: entry.session ? buildStructuredDocument(entry.session, now) : null,
  }));

  await writeFile(filePath, JSON.stringify(payload, null, 2), "utf-8");
  return filePath;
}

export async function saveExportFile(
  outputDir: string,
  fileName: string,
  data: string | Buffer
): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const filePath = path.join(outputDir, fileName);
  await writeFile(filePath, data);
  return filePath;
}
