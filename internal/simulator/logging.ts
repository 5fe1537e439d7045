export type LogLevel = "info" | "warn" | "error" | "trace";

interface LogEntry {
  level: LogLevel;
  component?: string;
  message: string;
  durationMs?: number;
  sessionId?: string;
}

/** Batch ids end in a run index and log as "#0003"; other ids keep 8 characters after "conv_". */
export function sessionTag(sessionId: string): string {
  const id = sessionId.replace(/^conv_/, "");
  const runIndex = /_(\d+)$/.exec(id);
  return runIndex ? `#${runIndex[1]}` : id.slice(0, 8);
}

function formatEntry(entry: LogEntry): string {
  const parts = [`[${new Date().toISOString()}]`, `[${entry.level.toUpperCase()}]`];

  parts.push(entry.component ? `[simulator:${entry.component}]` : "[simulator]");

  if (entry.sessionId) {
    parts.push(`[session:${sessionTag(entry.sessionId)}]`);
  }

  parts.push(entry.message);

  if (entry.durationMs !== undefined) {
    parts.push(`(${entry.durationMs}ms)`);
  }

  return parts.join(" ");
}

export function isDebugEnabled(): boolean {
  return process.env.DEBUG === "1";
}

export function log(entry: LogEntry): void {
  // trace output is opt-in, same switch as the batch CLI
  if (entry.level === "trace" && !isDebugEnabled()) return;

  const formatted = formatEntry(entry);

  switch (entry.level) {
    case "error":
      console.error(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

export function logStepStart(component: string, step: string, sessionId?: string): number {
  log({ level: "trace", component, message: `${step}...`, sessionId });
  return Date.now();
}

export function logStepDone(
  component: string,
  step: string,
  startTime: number,
  sessionId?: string
): void {
  log({ level: "trace", component, message: `${step} done`, durationMs: Date.now() - startTime, sessionId });
}

export function logFallback(component: string, message: string, sessionId?: string): void {
  log({ level: "warn", component, message, sessionId });
}
