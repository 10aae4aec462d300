// Interview Signal Engine - Error taxonomy
//
// Live-path failures (DetectorUnavailableError) are contained by the ingress and
// never reach the caller. Lifecycle misuse and configuration errors surface to
// the caller. Batch failures (TranscriptionError) are terminal for that run.

export type SignalEngineErrorCode =
  | "SESSION_STATE"
  | "DETECTOR_UNAVAILABLE"
  | "CONFIGURATION"
  | "ALREADY_OPEN"
  | "NOT_FOUND"
  | "TRANSCRIPTION";

export class SignalEngineError extends Error {
  readonly code: SignalEngineErrorCode;

  constructor(code: SignalEngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Operation is not valid for the session's current state. */
export class SessionStateError extends SignalEngineError {
  constructor(message: string) {
    super("SESSION_STATE", message);
  }
}

/** A detector adapter failed for one frame. Recovered by dropping the frame. */
export class DetectorUnavailableError extends SignalEngineError {
  readonly modality: string;

  constructor(modality: string, message: string, options?: { cause?: unknown }) {
    super("DETECTOR_UNAVAILABLE", message, options);
    this.modality = modality;
  }
}

export class ConfigurationError extends SignalEngineError {
  constructor(message: string) {
    super("CONFIGURATION", message);
  }
}

export class AlreadyOpenError extends SignalEngineError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super("ALREADY_OPEN", `Session already open: ${sessionId}`);
    this.sessionId = sessionId;
  }
}

export class NotFoundError extends SignalEngineError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

export class TranscriptionError extends SignalEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TRANSCRIPTION", message, options);
  }
}

/** Render any thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
