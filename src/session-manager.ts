// Live Transcription Relay - Session Manager
// Central registry of streaming sessions. Owns, per session id: the
// configuration, the recognition engine handle, audio ingestion statistics,
// the utterance history and the transport sink results are delivered to.
//
// State machine (per session):
//   STARTING → RUNNING                      register()
//   RUNNING → RECONFIGURING → RUNNING       updateConfig() (swap or rollback)
//   RECONFIGURING → STALLED                 rollback failed; next feed() restarts
//   any → STOPPED                           unregister()
//
// Engine-touching operations (register, feed, updateConfig, unregister) are
// serialized per session through an OperationLock. Failures are returned as
// OperationResult values, never thrown.
//
// Privacy: audio frames are forwarded to the engine and never retained here.

import { SessionState } from "./types.js";
import type { AudioStats, SessionConfig, SessionConfigUpdate, SessionSnapshot } from "./types.js";
import { isSupportedLanguage, isSupportedModel } from "./config.js";
import {
  EngineConstructionError,
  EngineRuntimeError,
  NotFoundError,
  RelayError,
  ValidationError,
  errorMessage,
} from "./errors.js";
import { createAudioStats, describeAudioStats, recordChunk } from "./audio-stats.js";
import { HistoryBuffer } from "./history-buffer.js";
import type { EngineFactory, EngineStatus, RecognitionEngine } from "./recognition-engine.js";
import type { EnrichmentPipeline } from "./enrichment-pipeline.js";
import { buildTranscriptionMessage, deliverTranscription, type TransportSink } from "./result-fanout.js";
import { OperationLock } from "./utils/operation-lock.js";
import { createConsoleLogger, type Logger } from "./logger.js";

// ─── Results ────────────────────────────────────────────────────────────────────

export type OperationResult<T = undefined> = { ok: true; value: T } | { ok: false; error: RelayError };

function ok<T>(value: T): OperationResult<T> {
  return { ok: true, value };
}

function fail<T>(error: RelayError): OperationResult<T> {
  return { ok: false, error };
}

const DONE: OperationResult = { ok: true, value: undefined };

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionManagerDeps {
  engineFactory: EngineFactory;
  pipeline: EnrichmentPipeline;
  /** Utterances kept per session for enrichment context. Default 5. */
  historyLimit?: number;
  /** feed() slower than this (ms) is logged and counted, never failed. Default 100. */
  slowFeedThresholdMs?: number;
  logger?: Logger;
  now?: () => number;
}

/** Frames between periodic audio statistics lines. */
const STATS_LOG_INTERVAL = 20;

interface SessionEntry {
  id: string;
  /** Distinguishes this registration from a later one under the same id. */
  token: symbol;
  config: SessionConfig;
  registeredAt: Date;
  engine: RecognitionEngine;
  state: SessionState;
  running: boolean;
  stats: AudioStats;
  history: HistoryBuffer;
  sink: TransportSink;
}

/**
 * Trims keywords and drops blanks and duplicates, keeping first occurrences in order.
 */
export function normalizeKeywords(keywords: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const keyword of keywords) {
    const trimmed = keyword.trim();
    if (trimmed.length === 0 || seen.has(trimmed)) continue;
    seen.add(trimmed);
    result.push(trimmed);
  }
  return result;
}

function validateSelection(language: string | undefined, modelType: string | undefined): ValidationError | null {
  if (language !== undefined && !isSupportedLanguage(language)) {
    return new ValidationError(`Unsupported language: ${language}`);
  }
  if (modelType !== undefined && !isSupportedModel(modelType)) {
    return new ValidationError(`Unsupported model: ${modelType}`);
  }
  return null;
}

export class SessionManager {
  private sessions: Map<string, SessionEntry> = new Map();
  private readonly lock = new OperationLock();
  private readonly engineFactory: EngineFactory;
  private readonly pipeline: EnrichmentPipeline;
  private readonly historyLimit: number;
  private readonly slowFeedThresholdMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: SessionManagerDeps) {
    this.engineFactory = deps.engineFactory;
    this.pipeline = deps.pipeline;
    this.historyLimit = deps.historyLimit ?? 5;
    if (!Number.isInteger(this.historyLimit) || this.historyLimit < 1) {
      throw new ValidationError(`History limit must be a positive integer, got ${this.historyLimit}`);
    }
    this.slowFeedThresholdMs = deps.slowFeedThresholdMs ?? 100;
    this.logger = deps.logger ?? createConsoleLogger("SessionManager");
    this.now = deps.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────────

  /**
   * Registers a session and starts its recognition engine.
   * No entry remains when validation, construction or start fails.
   */
  async register(id: string, config: SessionConfig, sink: TransportSink): Promise<OperationResult<EngineStatus>> {
    const invalid = validateSelection(config.language, config.modelType);
    if (invalid) return fail(invalid);

    // Checked under the lock so an unregister queued for the same id runs first
    return this.lock.run<OperationResult<EngineStatus>>(id, async () => {
      if (this.sessions.has(id)) {
        return fail(new ValidationError(`Session already registered: ${id}`));
      }

      const token = Symbol(id);
      const sessionConfig: SessionConfig = { ...config, keywords: normalizeKeywords(config.keywords) };

      let engine: RecognitionEngine;
      try {
        engine = this.buildEngine(id, token, sessionConfig);
      } catch (err) {
        this.logger.error(`Engine construction failed for ${id}: ${errorMessage(err)}`);
        return fail(new EngineConstructionError(`Failed to create engine: ${errorMessage(err)}`, err));
      }

      const entry: SessionEntry = {
        id,
        token,
        config: sessionConfig,
        registeredAt: new Date(this.now()),
        engine,
        state: SessionState.STARTING,
        running: false,
        stats: createAudioStats(),
        history: new HistoryBuffer(this.historyLimit),
        sink,
      };
      this.sessions.set(id, entry);

      try {
        await engine.start();
      } catch (err) {
        this.sessions.delete(id);
        this.logger.error(`Engine start failed for ${id}: ${errorMessage(err)}`);
        return fail(new EngineConstructionError(`Failed to start engine: ${errorMessage(err)}`, err));
      }

      entry.state = SessionState.RUNNING;
      entry.running = true;
      this.logger.info(
        `Registered ${id} (language=${sessionConfig.language}, model=${sessionConfig.modelType}, ` +
          `target=${sessionConfig.targetLanguage}); ${this.sessions.size} active`,
      );
      return ok(engine.status);
    });
  }

  /**
   * Forwards one audio frame to the session's engine, restarting a stopped
   * engine once first. Statistics change only after a successful forward.
   */
  async feed(id: string, chunk: Buffer): Promise<OperationResult> {
    if (!this.sessions.has(id)) return fail(new NotFoundError(id));

    return this.lock.run<OperationResult>(id, async () => {
      const entry = this.sessions.get(id);
      if (!entry) return fail(new NotFoundError(id));

      const startedAt = this.now();

      if (!entry.running) {
        this.logger.warn(`Engine for ${id} is not running; restarting`);
        try {
          await entry.engine.start();
        } catch (err) {
          return fail(new EngineRuntimeError(`Failed to restart engine: ${errorMessage(err)}`, err));
        }
        entry.running = true;
        entry.state = SessionState.RUNNING;
      }

      try {
        await entry.engine.processAudio(chunk);
      } catch (err) {
        this.logger.error(`Forwarding audio for ${id} failed: ${errorMessage(err)}`);
        return fail(new EngineRuntimeError(`Failed to process audio: ${errorMessage(err)}`, err));
      }

      const finishedAt = this.now();
      const elapsed = finishedAt - startedAt;
      const slow = elapsed > this.slowFeedThresholdMs;
      if (slow) {
        this.logger.warn(`Slow audio forward for ${id}: ${elapsed}ms for ${chunk.length} bytes`);
      }
      entry.stats = recordChunk(entry.stats, chunk.length, finishedAt, slow);

      if (entry.config.debugMode && entry.stats.totalChunks % STATS_LOG_INTERVAL === 0) {
        this.logger.info(`Audio stats for ${id}: ${describeAudioStats(entry.stats)}`);
      }
      return DONE;
    });
  }

  /**
   * Hot-swaps the session's engine for one built with the merged config.
   * Parameters are validated before anything is touched. If the replacement
   * cannot be built or started, the previous engine is restarted; if that also
   * fails the session is left STALLED with running=false.
   */
  async updateConfig(id: string, params: SessionConfigUpdate): Promise<OperationResult<SessionSnapshot>> {
    if (!this.sessions.has(id)) return fail(new NotFoundError(id));
    const invalid = validateSelection(params.language, params.modelType);
    if (invalid) return fail(invalid);

    return this.lock.run<OperationResult<SessionSnapshot>>(id, async () => {
      const entry = this.sessions.get(id);
      if (!entry) return fail(new NotFoundError(id));

      const next: SessionConfig = {
        language: params.language ?? entry.config.language,
        modelType: params.modelType ?? entry.config.modelType,
        targetLanguage: params.targetLanguage ?? entry.config.targetLanguage,
        debugMode: params.debugMode ?? entry.config.debugMode,
        keywords: entry.config.keywords,
      };

      entry.state = SessionState.RECONFIGURING;
      const previous = entry.engine;

      try {
        await previous.stop();
      } catch (err) {
        this.logger.warn(`Stopping engine for ${id} failed: ${errorMessage(err)}`);
      }
      entry.running = false;

      let replacement: RecognitionEngine;
      try {
        replacement = this.buildEngine(id, entry.token, next);
      } catch (err) {
        this.logger.error(`Replacement engine for ${id} could not be built: ${errorMessage(err)}; rolling back`);
        return this.rollback(entry, previous, err);
      }

      try {
        await replacement.start();
      } catch (err) {
        this.logger.error(`Replacement engine for ${id} failed to start: ${errorMessage(err)}; rolling back`);
        await this.stopQuietly(id, replacement);
        return this.rollback(entry, previous, err);
      }

      entry.engine = replacement;
      entry.config = next;
      entry.running = true;
      entry.state = SessionState.RUNNING;
      this.logger.info(
        `Reconfigured ${id} (language=${next.language}, model=${next.modelType}, target=${next.targetLanguage})`,
      );
      return ok(this.snapshot(entry));
    });
  }

  /**
   * Stops and removes the session. Unknown ids succeed without effect.
   * Enrichment still in flight for the session is discarded when it completes.
   */
  async unregister(id: string): Promise<OperationResult> {
    if (!this.sessions.has(id)) return DONE;

    return this.lock.run<OperationResult>(id, async () => {
      const entry = this.sessions.get(id);
      if (!entry) return DONE;

      this.sessions.delete(id);
      entry.state = SessionState.STOPPED;
      entry.running = false;
      await this.stopQuietly(id, entry.engine);

      this.logger.info(`Unregistered ${id} (${describeAudioStats(entry.stats)}); ${this.sessions.size} active`);
      return DONE;
    });
  }

  /** Unregisters every session. */
  async shutdown(): Promise<void> {
    const ids = [...this.sessions.keys()];
    await Promise.all(ids.map((id) => this.unregister(id)));
  }

  // ── Keywords ────────────────────────────────────────────────────────────────

  /** Replaces the session's keyword list; the engine is not touched. */
  updateKeywords(id: string, keywords: readonly string[]): OperationResult<SessionSnapshot> {
    const entry = this.sessions.get(id);
    if (!entry) return fail(new NotFoundError(id));

    entry.config = { ...entry.config, keywords: normalizeKeywords(keywords) };
    this.logger.info(`Keywords for ${id}: [${entry.config.keywords.join(", ")}]`);
    return ok(this.snapshot(entry));
  }

  // ── Read-only views ─────────────────────────────────────────────────────────

  getConfig(id: string): OperationResult<SessionSnapshot> {
    const entry = this.sessions.get(id);
    return entry ? ok(this.snapshot(entry)) : fail(new NotFoundError(id));
  }

  getAudioStats(id: string): OperationResult<AudioStats> {
    const entry = this.sessions.get(id);
    return entry ? ok({ ...entry.stats }) : fail(new NotFoundError(id));
  }

  getEngineStatus(id: string): OperationResult<EngineStatus> {
    const entry = this.sessions.get(id);
    return entry ? ok({ ...entry.engine.status }) : fail(new NotFoundError(id));
  }

  getHistory(id: string): OperationResult<readonly string[]> {
    const entry = this.sessions.get(id);
    return entry ? ok(entry.history.snapshot()) : fail(new NotFoundError(id));
  }

  listSessions(): SessionSnapshot[] {
    return [...this.sessions.values()].map((entry) => this.snapshot(entry));
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  private snapshot(entry: SessionEntry): SessionSnapshot {
    return {
      id: entry.id,
      language: entry.config.language,
      modelType: entry.config.modelType,
      targetLanguage: entry.config.targetLanguage,
      debugMode: entry.config.debugMode,
      keywords: [...entry.config.keywords],
      registeredAt: entry.registeredAt,
      state: entry.state,
      running: entry.running,
    };
  }

  /** Builds an engine whose callback only reaches this registration of `id`. */
  private buildEngine(id: string, token: symbol, config: SessionConfig): RecognitionEngine {
    return this.engineFactory({
      language: config.language,
      modelType: config.modelType,
      debugMode: config.debugMode,
      onText: (text) => {
        this.handleRecognizedText(id, token, text).catch((err: unknown) => {
          this.logger.error(`Unexpected error delivering transcription for ${id}: ${errorMessage(err)}`);
        });
      },
    });
  }

  private async rollback(
    entry: SessionEntry,
    previous: RecognitionEngine,
    cause: unknown,
  ): Promise<OperationResult<SessionSnapshot>> {
    const message = `Failed to apply new configuration: ${errorMessage(cause)}`;
    try {
      await previous.start();
    } catch (err) {
      entry.running = false;
      entry.state = SessionState.STALLED;
      this.logger.error(`Rollback for ${entry.id} failed: ${errorMessage(err)}; session stalled`);
      return fail(new EngineConstructionError(message, cause, false));
    }

    entry.running = true;
    entry.state = SessionState.RUNNING;
    this.logger.warn(`Rolled back ${entry.id} to its previous configuration`);
    return fail(new EngineConstructionError(message, cause, true));
  }

  private async stopQuietly(id: string, engine: RecognitionEngine): Promise<void> {
    try {
      await engine.stop();
    } catch (err) {
      this.logger.warn(`Stopping engine for ${id} failed: ${errorMessage(err)}`);
    }
  }

  /** The live entry for `id`, if it is still the registration that owns `token`. */
  private liveEntry(id: string, token: symbol): SessionEntry | undefined {
    const entry = this.sessions.get(id);
    return entry?.token === token ? entry : undefined;
  }

  private async handleRecognizedText(id: string, token: symbol, text: string): Promise<void> {
    const utterance = text.trim();
    if (utterance.length === 0) return;

    const entry = this.liveEntry(id, token);
    if (!entry) {
      this.logger.debug(`Dropping recognized text for removed session ${id}`);
      return;
    }

    const { language, targetLanguage, keywords } = entry.config;
    this.logger.info(`Recognized text for ${id}: "${utterance}"`);

    const result = await this.pipeline.process({
      text: utterance,
      sourceLanguage: language,
      targetLanguage,
      history: entry.history.snapshot(),
      keywords,
    });

    const live = this.liveEntry(id, token);
    if (!live) {
      this.logger.debug(`Dropping enrichment result for removed session ${id}`);
      return;
    }

    const message = buildTranscriptionMessage(utterance, result, language, targetLanguage, this.now());
    await deliverTranscription(id, live.sink, message, this.logger);

    if (result.is_continuation) {
      live.history.replaceLast(result.refined_text);
    } else {
      live.history.push(result.refined_text);
    }
  }
}
