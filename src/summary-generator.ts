// Live Transcription Relay - Session Summary Generator
// Summarizes a list of timestamped transcriptions into scene / topic / key
// points / summary using OpenAI in JSON mode. The result is what clients post
// back to /summary/context to bias later enrichment.
//
// Never rejects: too little input, model failures and unparseable replies
// each map to a fixed summary the client can display.

import { z } from "zod";
import type { SummaryContextData, TranscriptionItem } from "./types.js";
import type { OpenAIClient } from "./enrichment-model.js";
import { errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";

export type SessionSummary = SummaryContextData;

/** Minimum number of transcriptions worth summarizing. */
export const MIN_TRANSCRIPTIONS = 2;

export const INSUFFICIENT_CONTENT_SUMMARY: SessionSummary = Object.freeze({
  scene: "Insufficient content",
  topic: "Not yet determined",
  keyPoints: Object.freeze(["More conversation is needed to extract key points"]),
  summary: "Keep the conversation going to generate a meaningful summary",
});

export function errorSummary(message: string): SessionSummary {
  return {
    scene: "Processing error",
    topic: "Undetermined",
    keyPoints: ["An error occurred while generating the summary"],
    summary: `Sorry, something went wrong while processing your request: ${message}`,
  };
}

export function parseErrorSummary(message: string): SessionSummary {
  return {
    scene: "Parse error",
    topic: "Unparseable",
    keyPoints: ["Could not extract key points from the model response"],
    summary: `Failed to parse the model response: ${message}`,
  };
}

const SummaryReplySchema = z.object({
  scene: z.string().default("Not provided"),
  topic: z.string().default("Not provided"),
  keyPoints: z.array(z.string()).default([]),
  summary: z.string().default("Not provided"),
});

/**
 * Formats an ISO-8601 timestamp as HH:MM:SS of its own clock time.
 * Anything that does not look like an ISO timestamp is returned unchanged.
 */
export function formatTimestamp(timestamp: string): string {
  const match = /^\d{4}-\d{2}-\d{2}[T ](\d{2}:\d{2}:\d{2})/.exec(timestamp);
  return match ? match[1] : timestamp;
}

export function buildSummaryPrompt(transcriptions: readonly TranscriptionItem[]): string {
  const transcript = transcriptions.map((item) => `[${formatTimestamp(item.timestamp)}] ${item.text}`).join("\n");

  return `Below is the transcript of a conversation. Each line has a timestamp and the spoken text.

${transcript}

Analyze the conversation and produce:
1. scene: the likely setting or situation of the conversation
2. topic: the main topic or purpose
3. keyPoints: the 3-5 main points discussed
4. summary: a concise summary of the content and any conclusions

Respond with ONLY a JSON object of this shape:
{
  "scene": "scene description",
  "topic": "topic",
  "keyPoints": ["point 1", "point 2", "point 3"],
  "summary": "full summary"
}

Answer in the language of the conversation. Use at most 5 key points.`;
}

export class SummaryGenerator {
  private readonly openai: OpenAIClient | null;
  private readonly model: string;
  private readonly logger: Logger;

  /**
   * @param openaiClient client to summarize with, or null when no LLM is configured
   */
  constructor(openaiClient: OpenAIClient | null, model: string = "gpt-4o-mini", logger?: Logger) {
    this.openai = openaiClient;
    this.model = model;
    this.logger = logger ?? createConsoleLogger("SummaryGenerator");
  }

  async generate(transcriptions: readonly TranscriptionItem[]): Promise<SessionSummary> {
    this.logger.info(`Summary requested for ${transcriptions.length} transcriptions`);

    if (transcriptions.length < MIN_TRANSCRIPTIONS) {
      this.logger.warn("Too few transcriptions for a meaningful summary");
      return INSUFFICIENT_CONTENT_SUMMARY;
    }

    if (this.openai === null) {
      return errorSummary("summary model not configured");
    }

    let content: string | null | undefined;
    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: "You summarize conversation transcripts. Respond with ONLY a JSON object." },
          { role: "user", content: buildSummaryPrompt(transcriptions) },
        ],
        response_format: { type: "json_object" },
        temperature: 0.3,
      });
      content = response.choices[0]?.message?.content;
    } catch (err) {
      this.logger.error(`Summary generation failed: ${errorMessage(err)}`);
      return errorSummary(errorMessage(err));
    }

    if (!content) {
      this.logger.error("Summary generation failed: LLM returned empty response");
      return errorSummary("LLM returned empty response");
    }

    return this.parseReply(content);
  }

  private parseReply(raw: string): SessionSummary {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.error(`Could not parse summary reply: ${errorMessage(err)}`);
      this.logger.debug(`Raw summary reply: ${raw}`);
      return parseErrorSummary(errorMessage(err));
    }

    const result = SummaryReplySchema.safeParse(parsed);
    if (!result.success) {
      const fields = result.error.issues.map((issue) => issue.path.join(".")).join(", ");
      this.logger.error(`Summary reply has an unexpected shape (${fields})`);
      return parseErrorSummary(`unexpected shape (${fields})`);
    }

    this.logger.info("Session summary generated");
    return result.data;
  }
}
