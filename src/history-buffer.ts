// Live Transcription Relay - Utterance history
// Bounded, most-recent-last list of finalized utterances for one session.
// The enrichment pipeline only ever sees a copy from snapshot().

export class HistoryBuffer {
  private items: string[] = [];
  private readonly limit: number;

  constructor(limit: number = 5) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`History limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  /** Appends an utterance, evicting the oldest once the limit is reached. */
  push(text: string): void {
    this.items.push(text);
    if (this.items.length > this.limit) {
      this.items.splice(0, this.items.length - this.limit);
    }
  }

  /**
   * Replaces the most recent utterance (used when a fragment continues it).
   * Behaves like push() on an empty buffer.
   */
  replaceLast(text: string): void {
    if (this.items.length === 0) {
      this.push(text);
      return;
    }
    this.items[this.items.length - 1] = text;
  }

  snapshot(): readonly string[] {
    return Object.freeze([...this.items]);
  }
}
