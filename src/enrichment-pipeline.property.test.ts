// Property: whenever a keyword occurs in the utterance (ignoring case) and the
// model reports no match, the pipeline reports the direct matches instead.
// Whatever the model does, the result is fully populated.

import { describe, it, expect, vi } from "vitest";
import * as fc from "fast-check";
import { DIRECT_MATCH_REASON, EnrichmentPipeline, findDirectKeywordMatches } from "./enrichment-pipeline.js";
import { SummaryContextStore } from "./summary-context.js";
import type { EnrichmentModel } from "./enrichment-model.js";

function createSilentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

const noMatchModel: EnrichmentModel = {
  enrich: async (prompt) => ({
    refined_text: prompt.originalText,
    translation: "",
    is_keyword_match: false,
    matched_keywords: [],
    match_reason: "",
    is_continuation: false,
    continuation_reason: "",
  }),
};

const failingModel: EnrichmentModel = {
  enrich: async () => {
    throw new Error("down");
  },
};

const word = fc.stringMatching(/^[a-zA-Z]{1,8}$/);

describe("Property: keyword override", () => {
  it("a keyword embedded in the text is always reported", async () => {
    await fc.assert(
      fc.asyncProperty(word, word, word, fc.boolean(), async (prefix, keyword, suffix, upper) => {
        const pipeline = new EnrichmentPipeline(noMatchModel, new SummaryContextStore(createSilentLogger()), {
          logger: createSilentLogger(),
        });
        const embedded = upper ? keyword.toUpperCase() : keyword.toLowerCase();
        const text = `${prefix} ${embedded} ${suffix}`;

        const result = await pipeline.process({
          text,
          sourceLanguage: "en",
          targetLanguage: "zh",
          history: [],
          keywords: [keyword],
        });

        expect(result.is_keyword_match).toBe(true);
        expect(result.matched_keywords).toEqual([keyword]);
        expect(result.match_reason).toBe(DIRECT_MATCH_REASON);
      }),
      { numRuns: 100 },
    );
  });

  it("direct matches are exactly the keywords contained in the text", () => {
    fc.assert(
      fc.property(fc.string(), fc.array(word, { maxLength: 6 }), (text, keywords) => {
        const matches = findDirectKeywordMatches(text, keywords);
        for (const keyword of keywords) {
          expect(matches.includes(keyword)).toBe(text.toLowerCase().includes(keyword.toLowerCase()));
        }
      }),
    );
  });
});

describe("Property: degraded results", () => {
  it("a failing model always yields the input text and no translation", async () => {
    await fc.assert(
      fc.asyncProperty(fc.string({ minLength: 1 }), async (text) => {
        const pipeline = new EnrichmentPipeline(failingModel, new SummaryContextStore(createSilentLogger()), {
          logger: createSilentLogger(),
        });
        const result = await pipeline.process({
          text,
          sourceLanguage: "zh",
          targetLanguage: "en",
          history: [],
          keywords: [],
        });

        expect(result.success).toBe(false);
        expect(result.refined_text).toBe(text);
        expect(result.translation).toBe("");
        expect(result.matched_keywords).toEqual([]);
        expect(typeof result.error).toBe("string");
      }),
      { numRuns: 50 },
    );
  });
});
