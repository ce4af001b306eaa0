// Live Transcription Relay - LLM enrichment model
// Sends an enrichment prompt to OpenAI chat completions in JSON mode and turns
// the reply into a typed ModelEnrichment. All JSON handling lives here; the
// pipeline only ever sees validated results or a thrown EnrichmentError.

import { z } from "zod";
import type { ModelEnrichment } from "./types.js";
import { EnrichmentError, ParseError, errorMessage } from "./errors.js";

// ─── OpenAI client interface (for testability / dependency injection) ────────────

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * Tests inject a stub; index.ts passes the real SDK client.
 */
export interface OpenAIClient {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: Array<{ role: "system" | "user"; content: string }>;
          response_format?: { type: "json_object" };
          temperature?: number;
        },
        options?: { signal?: AbortSignal },
      ): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

// ─── Model contract ─────────────────────────────────────────────────────────────

export interface EnrichmentPrompt {
  system: string;
  user: string;
  /** Raw utterance; used when the model omits refined_text. */
  originalText: string;
}

export interface EnrichmentModel {
  /**
   * @throws EnrichmentError when the model is unreachable or replies with nothing
   * @throws ParseError when the reply is not the expected JSON object
   */
  enrich(prompt: EnrichmentPrompt, signal?: AbortSignal): Promise<ModelEnrichment>;
}

export const ModelEnrichmentSchema = z.object({
  refined_text: z.string().optional(),
  translation: z.string().default(""),
  is_keyword_match: z.boolean().default(false),
  matched_keywords: z.array(z.string()).default([]),
  match_reason: z.string().default(""),
  is_continuation: z.boolean().default(false),
  continuation_reason: z.string().default(""),
});

/**
 * Parses a raw model reply. A fenced ```json block is unwrapped first.
 */
export function parseModelEnrichment(raw: string, originalText: string): ModelEnrichment {
  const fenced = /```(?:json)?\s*([\s\S]*?)\s*```/.exec(raw);
  const jsonText = fenced ? fenced[1] : raw;

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonText);
  } catch (err) {
    throw new ParseError(`Model reply is not valid JSON: ${raw.slice(0, 200)}`, err);
  }

  const result = ModelEnrichmentSchema.safeParse(parsed);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join(".") || issue.message).join(", ");
    throw new ParseError(`Model reply has an unexpected shape (${fields})`, result.error);
  }

  const { refined_text, ...rest } = result.data;
  return {
    ...rest,
    refined_text: refined_text ?? originalText,
  };
}

// ─── OpenAI implementation ──────────────────────────────────────────────────────

export class OpenAIEnrichmentModel implements EnrichmentModel {
  private readonly openai: OpenAIClient;
  private readonly model: string;

  constructor(openaiClient: OpenAIClient, model: string = "gpt-4o-mini") {
    this.openai = openaiClient;
    this.model = model;
  }

  /** An aborted `signal` cancels the HTTP request. */
  async enrich(prompt: EnrichmentPrompt, signal?: AbortSignal): Promise<ModelEnrichment> {
    let content: string | null | undefined;
    try {
      const response = await this.openai.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: prompt.system },
            { role: "user", content: prompt.user },
          ],
          response_format: { type: "json_object" },
          temperature: 0.2,
        },
        { signal },
      );
      content = response.choices[0]?.message?.content;
    } catch (err) {
      throw new EnrichmentError(`Enrichment request failed: ${errorMessage(err)}`, err);
    }

    if (!content) {
      throw new EnrichmentError("LLM returned empty response");
    }
    return parseModelEnrichment(content, prompt.originalText);
  }
}
