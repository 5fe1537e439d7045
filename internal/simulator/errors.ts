// Error kinds raised by the simulator core. Each carries a stable `code` so the
// CLIs can map failures to a single fatal line without inspecting messages.

export type SimulatorErrorCode =
  | "BACKEND_UNAVAILABLE"
  | "INVALID_STATE"
  | "INVALID_INPUT"
  | "CLASSIFICATION_FAILED"
  | "EXPORT_FORMAT_UNAVAILABLE"
  | "EXPORT_FORMAT_INVALID"
  | "MISSING_OPENAI_API_KEY"
  | "INVALID_CONFIG";

export class SimulatorError extends Error {
  readonly code: SimulatorErrorCode;

  constructor(code: SimulatorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The model service call failed (network, auth, rate limit, empty completion). */
export class BackendUnavailableError extends SimulatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("BACKEND_UNAVAILABLE", message, options);
  }
}

export class InvalidStateError extends SimulatorError {
  constructor(message: string) {
    super("INVALID_STATE", message);
  }
}

export class InvalidInputError extends SimulatorError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
  }
}

export class ClassificationFailure extends SimulatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CLASSIFICATION_FAILED", message, options);
  }
}

export class ExportFormattingUnavailable extends SimulatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EXPORT_FORMAT_UNAVAILABLE", message, options);
  }
}

export class ExportFormatError extends SimulatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EXPORT_FORMAT_INVALID", message, options);
  }
}

export class ConfigError extends SimulatorError {
  readonly locations?: string;

  constructor(
    code: "MISSING_OPENAI_API_KEY" | "INVALID_CONFIG",
    message: string,
    locations?: string
  ) {
    super(code, message);
    this.locations = locations;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
