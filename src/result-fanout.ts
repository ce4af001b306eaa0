// Live Transcription Relay - Result Fan-out
// Delivers an enrichment result to the transport sink of the session that
// produced the utterance. Each session owns its sink; there is no shared
// connection table to look ids up in.

import type { EnrichmentResult, RawTranscriptionMessage, ServerMessage, TranscriptionMessage } from "./types.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

// ─── Transport sink ─────────────────────────────────────────────────────────────

/**
 * Write side of one client connection.
 * `send` rejects (normally with a TransportError) when the frame cannot be written.
 */
export interface TransportSink {
  isReady(): boolean;
  send(message: ServerMessage): Promise<void>;
}

export type DeliveryOutcome = "delivered" | "fallback" | "skipped" | "failed";

// ─── Message construction ───────────────────────────────────────────────────────

export function buildTranscriptionMessage(
  text: string,
  result: EnrichmentResult,
  sourceLanguage: string,
  targetLanguage: string,
  now: number = Date.now(),
): TranscriptionMessage {
  return {
    event: "transcription",
    text,
    refined_text: result.refined_text,
    translation: result.translation,
    timestamp: now / 1000,
    source_language: sourceLanguage,
    target_language: targetLanguage,
    is_keyword_match: result.is_keyword_match,
    matched_keywords: result.matched_keywords,
    match_reason: result.match_reason,
    is_continuation: result.is_continuation,
    continuation_reason: result.continuation_reason,
    context_enhanced: result.context_enhanced,
  };
}

// ─── Delivery ───────────────────────────────────────────────────────────────────

/**
 * Sends `message` to `sink`.
 *
 * - Sink not ready: nothing is sent, no retry.
 * - Send fails: one fallback send carrying only the raw text.
 *
 * Never rejects; the outcome says what happened.
 */
export async function deliverTranscription(
  sessionId: string,
  sink: TransportSink,
  message: TranscriptionMessage,
  logger: Logger,
): Promise<DeliveryOutcome> {
  if (!sink.isReady()) {
    logger.warn(`Connection for ${sessionId} is not open; dropping transcription "${message.text}"`);
    return "skipped";
  }

  try {
    await sink.send(message);
    logger.info(`Sent transcription to ${sessionId}: "${message.refined_text}"`);
    return "delivered";
  } catch (err) {
    logger.warn(`Sending enriched transcription to ${sessionId} failed: ${errorMessage(err)}; sending raw text`);
  }

  const raw: RawTranscriptionMessage = {
    event: "transcription",
    text: message.text,
    timestamp: message.timestamp,
  };
  try {
    await sink.send(raw);
    return "fallback";
  } catch (err) {
    logger.error(`Raw transcription fallback to ${sessionId} failed: ${errorMessage(err)}`);
    return "failed";
  }
}
