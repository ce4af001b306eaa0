// Live Transcription Relay - Recognition engine contract
// The SessionManager only talks to speech recognition through this interface.
// Concrete engines (deepgram-engine.ts, test fakes) are built by an
// EngineFactory that receives the session's settings and a write-only
// callback for recognized text.

export type RecognitionCallback = (text: string) => void;

export interface EngineStatus {
  language: string;
  modelType: string;
  device: string;
  running: boolean;
}

/** Status reported before an engine exists or when a field is unknown. */
export const DEFAULT_ENGINE_STATUS: Readonly<EngineStatus> = Object.freeze({
  language: "unknown",
  modelType: "unknown",
  device: "unknown",
  running: false,
});

export interface RecognitionEngine {
  /** Idempotent. Rejects when the engine cannot begin accepting audio. */
  start(): Promise<void>;
  /** Idempotent. Rejects when shutdown fails; the engine is unusable afterwards either way. */
  stop(): Promise<void>;
  /**
   * Accepts one frame of raw PCM. Recognition happens off the calling path;
   * recognized text arrives later through the bound callback.
   * Rejects when the frame cannot be accepted (e.g. engine not running).
   */
  processAudio(chunk: Buffer): Promise<void>;
  readonly status: EngineStatus;
}

export interface EngineOptions {
  language: string;
  modelType: string;
  debugMode: boolean;
  onText: RecognitionCallback;
}

/**
 * Builds an engine for one session. May throw a ValidationError for an
 * unsupported language/model combination.
 */
export type EngineFactory = (options: EngineOptions) => RecognitionEngine;
