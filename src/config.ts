// Live Transcription Relay - Configuration
// Supported recognition languages/models and environment-driven settings.

import type { SessionConfig } from "./types.js";
import { parseLogLevel, type LogLevel } from "./logger.js";

// ─── Supported Sets ─────────────────────────────────────────────────────────────

export const SUPPORTED_LANGUAGES = ["zh", "en", "ja", "ko", "es", "fr", "de", "ru"] as const;
export const SUPPORTED_MODELS = ["tiny", "base", "small", "medium", "large"] as const;

export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number];
export type SupportedModel = (typeof SUPPORTED_MODELS)[number];

/** Display names used when building prompts. */
export const LANGUAGE_NAMES: Readonly<Record<string, string>> = {
  zh: "Chinese",
  en: "English",
  ja: "Japanese",
  ko: "Korean",
  es: "Spanish",
  fr: "French",
  de: "German",
  ru: "Russian",
};

const LANGUAGE_SET: ReadonlySet<string> = new Set<string>(SUPPORTED_LANGUAGES);
const MODEL_SET: ReadonlySet<string> = new Set<string>(SUPPORTED_MODELS);

export function isSupportedLanguage(value: string): value is SupportedLanguage {
  return LANGUAGE_SET.has(value);
}

export function isSupportedModel(value: string): value is SupportedModel {
  return MODEL_SET.has(value);
}

export function languageName(code: string): string {
  return LANGUAGE_NAMES[code] ?? code;
}

/** Configuration applied to a freshly connected client before any config message. */
export const DEFAULT_SESSION_CONFIG: Readonly<SessionConfig> = {
  language: "zh",
  modelType: "tiny",
  targetLanguage: "en",
  debugMode: true,
  keywords: [],
};

// ─── Application Config ─────────────────────────────────────────────────────────

export interface AppConfig {
  port: number;
  deepgramApiKey: string | null;
  openaiApiKey: string | null;
  enrichmentModel: string;
  summaryModel: string;
  historyLimit: number;
  slowFeedThresholdMs: number;
  enrichmentTimeoutMs: number;
  recognitionWindowSeconds: number;
  logLevel: LogLevel;
}

export const DEFAULT_APP_CONFIG: Readonly<AppConfig> = {
  port: 3000,
  deepgramApiKey: null,
  openaiApiKey: null,
  enrichmentModel: "gpt-4o-mini",
  summaryModel: "gpt-4o-mini",
  historyLimit: 5,
  slowFeedThresholdMs: 100,
  enrichmentTimeoutMs: 15000,
  recognitionWindowSeconds: 3,
  logLevel: "info",
};

export interface LoadConfigResult {
  config: AppConfig;
  /** Human-readable notes about values that were rejected and defaulted. */
  warnings: string[];
}

/**
 * Reads the application config from an environment map (normally process.env
 * after dotenv has loaded `.env`). Malformed numbers fall back to defaults and
 * produce a warning instead of failing startup.
 */
export function loadConfig(env: NodeJS.ProcessEnv): LoadConfigResult {
  const warnings: string[] = [];

  const readPositive = (name: string, fallback: number): number => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0) {
      warnings.push(`${name}="${raw}" is not a positive number; using ${fallback}`);
      return fallback;
    }
    return value;
  };

  const readString = (name: string): string | null => {
    const raw = env[name]?.trim();
    return raw ? raw : null;
  };

  const config: AppConfig = {
    port: Math.max(1, Math.floor(readPositive("PORT", DEFAULT_APP_CONFIG.port))),
    deepgramApiKey: readString("DEEPGRAM_API_KEY"),
    openaiApiKey: readString("OPENAI_API_KEY"),
    enrichmentModel: readString("ENRICHMENT_MODEL") ?? DEFAULT_APP_CONFIG.enrichmentModel,
    summaryModel: readString("SUMMARY_MODEL") ?? DEFAULT_APP_CONFIG.summaryModel,
    historyLimit: Math.max(1, Math.floor(readPositive("HISTORY_LIMIT", DEFAULT_APP_CONFIG.historyLimit))),
    slowFeedThresholdMs: readPositive("SLOW_FEED_THRESHOLD_MS", DEFAULT_APP_CONFIG.slowFeedThresholdMs),
    enrichmentTimeoutMs: readPositive("ENRICHMENT_TIMEOUT_MS", DEFAULT_APP_CONFIG.enrichmentTimeoutMs),
    recognitionWindowSeconds: readPositive("RECOGNITION_WINDOW_SECONDS", DEFAULT_APP_CONFIG.recognitionWindowSeconds),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };

  return { config, warnings };
}
