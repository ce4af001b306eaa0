// Live Transcription Relay - Error taxonomy
// Every failure the core reports carries a stable `code` so the server layer
// can map it to a WebSocket error event or an HTTP status.

export type RelayErrorCode =
  | "validation_error"
  | "engine_construction_error"
  | "engine_runtime_error"
  | "enrichment_error"
  | "parse_error"
  | "transport_error"
  | "not_found"
  | "protocol_error";

export class RelayError extends Error {
  public readonly code: RelayErrorCode;

  constructor(message: string, code: RelayErrorCode, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "RelayError";
    this.code = code;
  }
}

/** Unsupported language/model or otherwise invalid session parameters. */
export class ValidationError extends RelayError {
  constructor(message: string) {
    super(message, "validation_error");
    this.name = "ValidationError";
  }
}

/**
 * The engine adapter failed to build or start.
 * `rolledBack` is false when a reconfiguration could not restore the previous engine.
 */
export class EngineConstructionError extends RelayError {
  public readonly rolledBack: boolean;

  constructor(message: string, cause?: unknown, rolledBack = true) {
    super(message, "engine_construction_error", cause);
    this.name = "EngineConstructionError";
    this.rolledBack = rolledBack;
  }
}

export class EngineRuntimeError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, "engine_runtime_error", cause);
    this.name = "EngineRuntimeError";
  }
}

export class EnrichmentError extends RelayError {
  constructor(message: string, cause?: unknown, code: RelayErrorCode = "enrichment_error") {
    super(message, code, cause);
    this.name = "EnrichmentError";
  }
}

/** The LLM returned output that does not match the enrichment contract. */
export class ParseError extends EnrichmentError {
  constructor(message: string, cause?: unknown) {
    super(message, cause, "parse_error");
    this.name = "ParseError";
  }
}

export class TransportError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, "transport_error", cause);
    this.name = "TransportError";
  }
}

export class NotFoundError extends RelayError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, "not_found");
    this.name = "NotFoundError";
  }
}

/** Malformed or unknown client message. */
export class ProtocolError extends RelayError {
  constructor(message: string) {
    super(message, "protocol_error");
    this.name = "ProtocolError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
