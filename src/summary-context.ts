// Live Transcription Relay - Summary Context Store
// Process-wide slot holding the latest session summary (scene, topic, key
// points, overall summary). The enrichment pipeline reads a snapshot of it to
// bias refinement and translation.
//
// The slot is always replaced as a whole and handed out frozen, so a reader
// never observes a half-written context.

import { z } from "zod";
import type { SummaryContext, SummaryContextData } from "./types.js";
import { createConsoleLogger, type Logger } from "./logger.js";

export const SummaryContextSchema = z.object({
  scene: z.string(),
  topic: z.string(),
  keyPoints: z.array(z.string()),
  summary: z.string(),
});

const EMPTY_CONTEXT: SummaryContext = Object.freeze({
  scene: "",
  topic: "",
  keyPoints: Object.freeze([]),
  summary: "",
  hasContext: false,
});

function freezeContext(data: SummaryContextData): SummaryContext {
  return Object.freeze({
    scene: data.scene,
    topic: data.topic,
    keyPoints: Object.freeze([...data.keyPoints]),
    summary: data.summary,
    hasContext: true,
  });
}

/**
 * Renders a context into the block prepended to enrichment prompts.
 */
export function formatContextPrompt(context: SummaryContextData): string {
  const keyPointsText = context.keyPoints.map((point) => `- ${point}`).join("\n");
  return [
    "Session context:",
    `Scene: ${context.scene}`,
    `Topic: ${context.topic}`,
    "Key points:",
    keyPointsText,
    `Overall summary: ${context.summary}`,
  ]
    .join("\n")
    .trim();
}

export class SummaryContextStore {
  private current: SummaryContext = EMPTY_CONTEXT;
  private readonly logger: Logger;

  constructor(logger: Logger = createConsoleLogger("SummaryContext")) {
    this.logger = logger;
  }

  /**
   * Replaces the context. All four fields must be present and well-typed;
   * otherwise returns false and keeps the previous context.
   */
  set(input: unknown): boolean {
    const parsed = SummaryContextSchema.safeParse(input);
    if (!parsed.success) {
      this.logger.warn(`Rejected summary context: ${parsed.error.issues.map((i) => i.path.join(".") || i.message).join(", ")}`);
      return false;
    }

    this.current = freezeContext(parsed.data);
    this.logger.info(`Summary context set (topic="${parsed.data.topic}", ${parsed.data.keyPoints.length} key points)`);
    return true;
  }

  /** Current context snapshot; defaults when nothing has been set. */
  get(): SummaryContext {
    return this.current;
  }

  hasContext(): boolean {
    return this.current.hasContext;
  }

  clear(): void {
    this.current = EMPTY_CONTEXT;
    this.logger.info("Summary context cleared");
  }

  /** Prompt rendering of the current context, or null when none is set. */
  contextPrompt(): string | null {
    const snapshot = this.current;
    return snapshot.hasContext ? formatContextPrompt(snapshot) : null;
  }
}
