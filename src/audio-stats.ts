// Live Transcription Relay - Audio ingestion statistics
// One AudioStats record per session, updated by the SessionManager after each
// frame is forwarded to the recognition engine.

import type { AudioStats } from "./types.js";

export function createAudioStats(): AudioStats {
  return {
    totalChunks: 0,
    totalBytes: 0,
    firstChunkTime: null,
    lastChunkTime: null,
    maxChunkSize: 0,
    minChunkSize: null,
    slowChunks: 0,
  };
}

/**
 * Returns the stats after accepting one frame of `size` bytes at `now` (epoch ms).
 * The input record is not modified.
 */
export function recordChunk(stats: AudioStats, size: number, now: number, slow = false): AudioStats {
  return {
    totalChunks: stats.totalChunks + 1,
    totalBytes: stats.totalBytes + size,
    firstChunkTime: stats.firstChunkTime ?? now,
    lastChunkTime: now,
    maxChunkSize: Math.max(stats.maxChunkSize, size),
    minChunkSize: stats.minChunkSize === null ? size : Math.min(stats.minChunkSize, size),
    slowChunks: stats.slowChunks + (slow ? 1 : 0),
  };
}

/** Average frame size in bytes, 0 before the first frame. */
export function averageChunkSize(stats: AudioStats): number {
  return stats.totalChunks === 0 ? 0 : stats.totalBytes / stats.totalChunks;
}

/** Seconds between the first and latest accepted frame. */
export function streamDurationSeconds(stats: AudioStats): number {
  if (stats.firstChunkTime === null || stats.lastChunkTime === null) return 0;
  return (stats.lastChunkTime - stats.firstChunkTime) / 1000;
}

/**
 * One-line summary for periodic and end-of-session logging.
 */
export function describeAudioStats(stats: AudioStats): string {
  return (
    `chunks=${stats.totalChunks}, bytes=${stats.totalBytes}, ` +
    `avg=${averageChunkSize(stats).toFixed(1)}, duration=${streamDurationSeconds(stats).toFixed(1)}s`
  );
}

/** Snake-case projection served by the diagnostics endpoints. */
export function toWireAudioStats(stats: AudioStats) {
  return {
    total_chunks: stats.totalChunks,
    total_bytes: stats.totalBytes,
    first_chunk_time: stats.firstChunkTime,
    last_chunk_time: stats.lastChunkTime,
    max_chunk_size: stats.maxChunkSize,
    min_chunk_size: stats.minChunkSize,
    slow_chunks: stats.slowChunks,
  };
}
