// Live Transcription Relay - Deepgram Whisper recognition engine
// Buffers incoming PCM into recognition windows and sends each window to
// Deepgram's pre-recorded endpoint using the hosted Whisper model that
// matches the session's model type.
//
// Audio format: mono LINEAR16, 16 kHz by default. Audio is held in memory
// only until its window has been sent.

import { isSupportedLanguage, isSupportedModel } from "./config.js";
import { EngineRuntimeError, ValidationError, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type {
  EngineFactory,
  EngineOptions,
  EngineStatus,
  RecognitionCallback,
  RecognitionEngine,
} from "./recognition-engine.js";

// ─── Deepgram client interface (for testability / dependency injection) ────────

/**
 * Minimal surface of the Deepgram SDK's pre-recorded API that the engine uses.
 * Mirrors `deepgram.listen.prerecorded.transcribeFile()`, which resolves to
 * `{ result, error }` instead of rejecting on API errors.
 */
export interface DeepgramPrerecordedClient {
  listen: {
    prerecorded: {
      transcribeFile(
        source: Buffer,
        options: DeepgramFileOptions,
      ): Promise<{ result: DeepgramPrerecordedResponse | null; error: unknown }>;
    };
  };
}

export interface DeepgramFileOptions {
  model: string;
  language: string;
  encoding: "linear16";
  sample_rate: number;
  channels: number;
  punctuate: boolean;
  smart_format: boolean;
}

export interface DeepgramPrerecordedResponse {
  results?: {
    channels?: Array<{
      alternatives?: Array<{
        transcript?: string;
        confidence?: number;
      }>;
    }>;
  };
}

// ─── Configuration ──────────────────────────────────────────────────────────────

export interface DeepgramEngineConfig {
  sampleRate: number;
  /** Seconds of audio per recognition request. */
  windowSeconds: number;
  /** A partial window shorter than this is discarded on stop(). */
  minFlushSeconds: number;
}

const DEFAULT_ENGINE_CONFIG: DeepgramEngineConfig = {
  sampleRate: 16000,
  windowSeconds: 3,
  minFlushSeconds: 0.5,
};

const BYTES_PER_SAMPLE = 2; // 16-bit PCM

/** Deepgram-hosted Whisper model for each supported model type. */
export function deepgramModelFor(modelType: string): string {
  return `whisper-${modelType}`;
}

// ─── Engine ─────────────────────────────────────────────────────────────────────

export class DeepgramWhisperEngine implements RecognitionEngine {
  private readonly client: DeepgramPrerecordedClient;
  private readonly language: string;
  private readonly modelType: string;
  private readonly onText: RecognitionCallback;
  private readonly config: DeepgramEngineConfig;
  private readonly logger: Logger;

  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private recognitionChain: Promise<void> = Promise.resolve();
  private _running = false;
  private _recognitionErrors = 0;

  /**
   * @throws ValidationError for an unsupported language or model type.
   */
  constructor(
    client: DeepgramPrerecordedClient,
    options: EngineOptions,
    config?: Partial<DeepgramEngineConfig>,
    logger: Logger = createConsoleLogger("DeepgramEngine"),
  ) {
    if (!isSupportedLanguage(options.language)) {
      throw new ValidationError(`Unsupported language: ${options.language}`);
    }
    if (!isSupportedModel(options.modelType)) {
      throw new ValidationError(`Unsupported model: ${options.modelType}`);
    }

    this.client = client;
    this.language = options.language;
    this.modelType = options.modelType;
    this.onText = options.onText;
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
    this.logger = logger;
  }

  get status(): EngineStatus {
    return {
      language: this.language,
      modelType: this.modelType,
      device: "deepgram-cloud",
      running: this._running,
    };
  }

  /** Number of recognition requests that failed since construction. */
  get recognitionErrors(): number {
    return this._recognitionErrors;
  }

  private get windowBytes(): number {
    return Math.floor(this.config.sampleRate * this.config.windowSeconds) * BYTES_PER_SAMPLE;
  }

  private get minFlushBytes(): number {
    return Math.floor(this.config.sampleRate * this.config.minFlushSeconds) * BYTES_PER_SAMPLE;
  }

  async start(): Promise<void> {
    if (this._running) return;
    this._running = true;
    this.logger.info(`Engine started (language=${this.language}, model=${deepgramModelFor(this.modelType)})`);
  }

  /**
   * Stops accepting audio. A buffered partial window long enough to be worth
   * recognizing is still sent; its text arrives through the callback later.
   */
  async stop(): Promise<void> {
    if (!this._running) return;
    this._running = false;

    if (this.pendingBytes >= this.minFlushBytes) {
      this.flushWindow();
    } else {
      this.pending = [];
      this.pendingBytes = 0;
    }
    this.logger.info(`Engine stopped (language=${this.language}, model=${this.modelType})`);
  }

  async processAudio(chunk: Buffer): Promise<void> {
    if (!this._running) {
      throw new EngineRuntimeError("Recognition engine is not running. Call start() first.");
    }

    this.pending.push(Buffer.from(chunk));
    this.pendingBytes += chunk.length;

    if (this.pendingBytes >= this.windowBytes) {
      this.flushWindow();
    }
  }

  /** Resolves once every queued recognition request has finished. */
  whenIdle(): Promise<void> {
    return this.recognitionChain;
  }

  private flushWindow(): void {
    const audio = Buffer.concat(this.pending, this.pendingBytes);
    this.pending = [];
    this.pendingBytes = 0;

    // Requests run one at a time so callbacks follow audio order
    this.recognitionChain = this.recognitionChain.then(() => this.recognize(audio));
  }

  private async recognize(audio: Buffer): Promise<void> {
    const startedAt = Date.now();
    try {
      const { result, error } = await this.client.listen.prerecorded.transcribeFile(audio, {
        model: deepgramModelFor(this.modelType),
        language: this.language,
        encoding: "linear16",
        sample_rate: this.config.sampleRate,
        channels: 1,
        punctuate: true,
        smart_format: true,
      });

      if (error) {
        throw new Error(`Deepgram request failed: ${errorMessage(error)}`);
      }

      const transcript = result?.results?.channels?.[0]?.alternatives?.[0]?.transcript?.trim() ?? "";
      this.logger.debug(`Recognized ${audio.length} bytes in ${Date.now() - startedAt}ms: "${transcript}"`);

      if (transcript.length > 0) {
        this.onText(transcript);
      }
    } catch (err) {
      this._recognitionErrors++;
      this.logger.warn(`Recognition failed for ${audio.length} bytes: ${errorMessage(err)}`);
    }
  }
}

/**
 * EngineFactory producing DeepgramWhisperEngine instances that share one client.
 */
export function createDeepgramEngineFactory(
  client: DeepgramPrerecordedClient,
  config?: Partial<DeepgramEngineConfig>,
  logger?: Logger,
): EngineFactory {
  return (options: EngineOptions) => new DeepgramWhisperEngine(client, options, config, logger);
}
