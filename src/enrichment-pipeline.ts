// Live Transcription Relay - Enrichment Pipeline
// Turns one recognized utterance into an EnrichmentResult: builds a prompt from
// the summary context, recent history and keywords, asks the enrichment model
// for refinement/translation/keyword/continuation analysis, then applies the
// direct keyword override.
//
// process() never rejects. Every failure at the model boundary (no model,
// request error, bad JSON, timeout) produces the degraded pass-through result.

import type { EnrichmentInput, EnrichmentResult, ModelEnrichment, SummaryContext } from "./types.js";
import type { EnrichmentModel, EnrichmentPrompt } from "./enrichment-model.js";
import type { SummaryContextStore } from "./summary-context.js";
import { formatContextPrompt } from "./summary-context.js";
import { languageName } from "./config.js";
import { EnrichmentError, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";

export const DIRECT_MATCH_REASON = "direct substring match";

const SYSTEM_PROMPT =
  "You post-process live speech-recognition output. You fix recognition errors, " +
  "translate, detect the listener's keywords and detect sentences that were split " +
  "in the middle. Respond with ONLY a JSON object.";

// ─── Pure helpers ───────────────────────────────────────────────────────────────

/**
 * Keywords that occur in `text` as case-insensitive substrings, in keyword order.
 */
export function findDirectKeywordMatches(text: string, keywords: readonly string[]): string[] {
  const haystack = text.toLowerCase();
  return keywords.filter((keyword) => keyword.length > 0 && haystack.includes(keyword.toLowerCase()));
}

/** Pass-through result used whenever enrichment cannot complete. */
export function degradedResult(text: string, error: string): EnrichmentResult {
  return {
    refined_text: text,
    translation: "",
    is_keyword_match: false,
    matched_keywords: [],
    match_reason: "",
    is_continuation: false,
    continuation_reason: "",
    context_enhanced: false,
    success: false,
    error,
  };
}

/**
 * Builds the enrichment prompt. Sections without content (no context, no
 * history, no keywords) are left out.
 */
export function buildEnrichmentPrompt(input: EnrichmentInput, context: SummaryContext): EnrichmentPrompt {
  const sourceName = languageName(input.sourceLanguage);
  const targetName = languageName(input.targetLanguage);
  const lastSentence = input.history[input.history.length - 1];
  const sections: string[] = [];

  if (context.hasContext) {
    sections.push(
      `${formatContextPrompt(context)}\n\n` +
        "Use this session context to understand the text below. Keep corrections and the " +
        "translation consistent with its scene, topic and key points.",
    );
  }

  if (input.history.length > 0) {
    const lines = input.history.map((sentence, i) => `${i + 1}. ${sentence}`);
    sections.push(`Recent sentences:\n${lines.join("\n")}`);
  }

  if (input.keywords.length > 0) {
    sections.push(`Keywords the listener cares about:\n${input.keywords.join(", ")}`);
  }

  sections.push(`Current text (${sourceName}): ${input.text}`);

  const previous = lastSentence === undefined ? "(no previous sentence)" : `"${lastSentence}"`;
  sections.push(
    [
      "Tasks:",
      "1. Keyword match: decide whether the current text, read against the recent sentences, " +
        "mentions any of the keywords. Inflections, variants and closely related expressions count. " +
        "Any single keyword is enough for true.",
      `2. Continuation: decide whether the current text is the remainder of the most recent sentence ${previous} ` +
        "that recognition split by mistake. Consider no other reason. If so, explain briefly.",
      "3. Refinement: fix typos and grammar while keeping the meaning. If the text is a continuation, " +
        "return it merged with the most recent sentence; otherwise return only the current text.",
      `4. Translation: translate the refined text into ${targetName}.`,
    ].join("\n"),
  );

  sections.push(
    [
      "Respond with this JSON object:",
      "{",
      '  "refined_text": "corrected text",',
      '  "translation": "translated text",',
      '  "is_keyword_match": true or false,',
      '  "matched_keywords": ["keyword"],',
      '  "match_reason": "very short reason for the match decision",',
      '  "is_continuation": true or false,',
      '  "continuation_reason": "very short reason if it continues the previous sentence"',
      "}",
    ].join("\n"),
  );

  return {
    system: SYSTEM_PROMPT,
    user: sections.join("\n\n"),
    originalText: input.text,
  };
}

/**
 * Forces a keyword match when a keyword literally occurs in the text but the
 * model reported none. Model-reported matches are kept as they are.
 */
export function applyKeywordOverride(enrichment: ModelEnrichment, directMatches: readonly string[]): ModelEnrichment {
  if (directMatches.length === 0 || enrichment.is_keyword_match) {
    return enrichment;
  }
  return {
    ...enrichment,
    is_keyword_match: true,
    matched_keywords: [...directMatches],
    match_reason: DIRECT_MATCH_REASON,
  };
}

// ─── Pipeline ───────────────────────────────────────────────────────────────────

export interface EnrichmentPipelineOptions {
  /** Upper bound on one model call, in ms. */
  timeoutMs?: number;
  logger?: Logger;
}

export class EnrichmentPipeline {
  private readonly model: EnrichmentModel | null;
  private readonly contextStore: SummaryContextStore;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  /**
   * @param model enrichment model, or null when no LLM is configured
   */
  constructor(model: EnrichmentModel | null, contextStore: SummaryContextStore, options: EnrichmentPipelineOptions = {}) {
    this.model = model;
    this.contextStore = contextStore;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.logger = options.logger ?? createConsoleLogger("EnrichmentPipeline");
  }

  async process(input: EnrichmentInput): Promise<EnrichmentResult> {
    // One snapshot per call; a concurrent set()/clear() does not affect this utterance
    const context = this.contextStore.get();

    if (input.text.trim().length === 0) {
      this.logger.warn("Skipping enrichment of empty text");
      return degradedResult(input.text, "empty text");
    }

    if (this.model === null) {
      this.logger.warn("Enrichment model not configured; passing text through");
      return degradedResult(input.text, "enrichment model unavailable");
    }

    const startedAt = Date.now();
    try {
      const prompt = buildEnrichmentPrompt(input, context);
      this.logger.debug(`Enrichment prompt: ${prompt.user}`);

      const model = this.model;
      const enrichment = await this.withTimeout((signal) => model.enrich(prompt, signal));
      const directMatches = findDirectKeywordMatches(input.text, input.keywords);
      const final = applyKeywordOverride(enrichment, directMatches);

      if (final.is_keyword_match) {
        this.logger.info(`Keyword match [${final.matched_keywords.join(", ")}]: ${final.match_reason}`);
      }
      this.logger.info(`Enriched "${input.text}" in ${Date.now() - startedAt}ms`);

      return {
        ...final,
        context_enhanced: context.hasContext,
        success: true,
      };
    } catch (err) {
      this.logger.error(`Enrichment failed for "${input.text}": ${errorMessage(err)}`);
      return degradedResult(input.text, errorMessage(err));
    }
  }

  /** Runs `operation`, aborting its signal when the timeout wins. */
  private withTimeout<T>(operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const pending = operation(controller.signal);

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new EnrichmentError(`Enrichment timed out after ${this.timeoutMs}ms`));
        controller.abort();
      }, this.timeoutMs);
    });
    return Promise.race([pending, timeout]).finally(() => clearTimeout(timer));
  }
}
