// Live Transcription Relay - Shared TypeScript interfaces and types
// Session registry, audio statistics, enrichment results, summary context
// and the WebSocket wire protocol.

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum SessionState {
  STARTING = "starting",
  RUNNING = "running",
  RECONFIGURING = "reconfiguring",
  STALLED = "stalled", // engine held but not running (rollback failed); next feed restarts it
  STOPPED = "stopped",
}

// ─── Session Configuration ──────────────────────────────────────────────────────

export interface SessionConfig {
  language: string;
  modelType: string;
  targetLanguage: string;
  debugMode: boolean;
  keywords: string[];
}

/** Fields accepted by a hot reconfiguration. Omitted fields keep their current value. */
export type SessionConfigUpdate = Partial<Pick<SessionConfig, "language" | "modelType" | "targetLanguage" | "debugMode">>;

/** Read-only projection of a session returned by getConfig(). */
export interface SessionSnapshot {
  id: string;
  language: string;
  modelType: string;
  targetLanguage: string;
  debugMode: boolean;
  keywords: string[];
  registeredAt: Date;
  state: SessionState;
  running: boolean;
}

// ─── Audio Statistics ───────────────────────────────────────────────────────────

export interface AudioStats {
  totalChunks: number;
  totalBytes: number;
  firstChunkTime: number | null; // epoch ms of the first accepted frame
  lastChunkTime: number | null; // epoch ms of the latest accepted frame
  maxChunkSize: number;
  minChunkSize: number | null; // null until the first frame
  slowChunks: number; // frames whose forward exceeded the soft latency threshold
}

// ─── Summary Context ────────────────────────────────────────────────────────────

export interface SummaryContextData {
  readonly scene: string;
  readonly topic: string;
  readonly keyPoints: readonly string[];
  readonly summary: string;
}

export interface SummaryContext extends SummaryContextData {
  readonly hasContext: boolean;
}

// ─── Enrichment ─────────────────────────────────────────────────────────────────

/** Fields the LLM adapter produces for one utterance. */
export interface ModelEnrichment {
  refined_text: string;
  translation: string;
  is_keyword_match: boolean;
  matched_keywords: string[];
  match_reason: string;
  is_continuation: boolean;
  continuation_reason: string;
}

export interface EnrichmentResult extends ModelEnrichment {
  context_enhanced: boolean;
  success: boolean;
  error?: string;
}

export interface EnrichmentInput {
  text: string;
  sourceLanguage: string;
  targetLanguage: string;
  history: readonly string[]; // most recent last
  keywords: readonly string[];
}

// ─── Summary Generation ─────────────────────────────────────────────────────────

export interface TranscriptionItem {
  text: string;
  timestamp: string; // ISO-8601
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

// Client → Server messages (binary frames carry audio and are not listed here)
export type ClientMessage =
  | {
      event: "config";
      config: {
        language?: string;
        model_type?: string;
        model?: string;
        target_language?: string;
        debug_mode?: boolean;
      };
    }
  | { event: "keywords"; keywords: string[] };

/** Wire shape of an accepted configuration, echoed back in config_updated. */
export interface WireSessionConfig {
  language: string;
  model_type: string;
  target_language: string;
  debug_mode: boolean;
}

export interface TranscriptionMessage {
  event: "transcription";
  text: string;
  refined_text: string;
  translation: string;
  timestamp: number; // epoch seconds
  source_language: string;
  target_language: string;
  is_keyword_match: boolean;
  matched_keywords: string[];
  match_reason: string;
  is_continuation: boolean;
  continuation_reason: string;
  context_enhanced: boolean;
}

/** Fallback delivery when the enriched message could not be sent. */
export interface RawTranscriptionMessage {
  event: "transcription";
  text: string;
  timestamp: number;
}

// Server → Client messages
export type ServerMessage =
  | { event: "connected"; client_id: string }
  | { event: "config_received"; status: "processing" }
  | { event: "config_updated"; status: "success"; config: WireSessionConfig }
  | { event: "config_updated"; status: "error"; message: string }
  | { event: "keywords_updated"; keywords: string[] }
  | TranscriptionMessage
  | RawTranscriptionMessage
  | { event: "error"; message: string };
