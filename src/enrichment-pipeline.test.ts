// Unit tests for EnrichmentPipeline
// Tests: prompt construction, keyword override, degraded results, timeout,
//        summary context snapshot.

import { describe, it, expect, vi } from "vitest";
import {
  DIRECT_MATCH_REASON,
  EnrichmentPipeline,
  buildEnrichmentPrompt,
  degradedResult,
  findDirectKeywordMatches,
} from "./enrichment-pipeline.js";
import type { EnrichmentModel, EnrichmentPrompt } from "./enrichment-model.js";
import { SummaryContextStore } from "./summary-context.js";
import type { EnrichmentInput, ModelEnrichment, SummaryContext } from "./types.js";

// ─── Test helpers ───────────────────────────────────────────────────────────────

function createSilentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

function makeEnrichment(overrides?: Partial<ModelEnrichment>): ModelEnrichment {
  return {
    refined_text: "refined",
    translation: "translated",
    is_keyword_match: false,
    matched_keywords: [],
    match_reason: "",
    is_continuation: false,
    continuation_reason: "",
    ...overrides,
  };
}

function makeModel(impl: (prompt: EnrichmentPrompt, signal?: AbortSignal) => Promise<ModelEnrichment>) {
  const enrich = vi.fn(impl);
  const model: EnrichmentModel = { enrich };
  return { model, enrich };
}

function makeInput(overrides?: Partial<EnrichmentInput>): EnrichmentInput {
  return {
    text: "你好",
    sourceLanguage: "zh",
    targetLanguage: "en",
    history: [],
    keywords: [],
    ...overrides,
  };
}

const NO_CONTEXT: SummaryContext = { scene: "", topic: "", keyPoints: [], summary: "", hasContext: false };

const CONTEXT = {
  scene: "Support call",
  topic: "Refunds",
  keyPoints: ["Order 42"],
  summary: "Customer asks about a refund.",
};

function makePipeline(model: EnrichmentModel | null, store = new SummaryContextStore(createSilentLogger()), timeoutMs = 1000) {
  return new EnrichmentPipeline(model, store, { timeoutMs, logger: createSilentLogger() });
}

// ─── Pure helpers ───────────────────────────────────────────────────────────────

describe("findDirectKeywordMatches", () => {
  it("matches case-insensitive substrings in keyword order", () => {
    expect(findDirectKeywordMatches("I want a REFUND please", ["please", "refund", "cancel"])).toEqual([
      "please",
      "refund",
    ]);
  });

  it("ignores empty keywords", () => {
    expect(findDirectKeywordMatches("anything", [""])).toEqual([]);
  });
});

describe("degradedResult", () => {
  it("passes the text through with safe defaults", () => {
    expect(degradedResult("raw", "boom")).toEqual({
      refined_text: "raw",
      translation: "",
      is_keyword_match: false,
      matched_keywords: [],
      match_reason: "",
      is_continuation: false,
      continuation_reason: "",
      context_enhanced: false,
      success: false,
      error: "boom",
    });
  });
});

describe("buildEnrichmentPrompt", () => {
  it("includes history, keywords, the current text and language names", () => {
    const prompt = buildEnrichmentPrompt(
      makeInput({ history: ["第一句", "第二句"], keywords: ["退款", "订单"] }),
      NO_CONTEXT,
    );

    expect(prompt.originalText).toBe("你好");
    expect(prompt.user).toContain("Recent sentences:\n1. 第一句\n2. 第二句");
    expect(prompt.user).toContain("Keywords the listener cares about:\n退款, 订单");
    expect(prompt.user).toContain("Current text (Chinese): 你好");
    expect(prompt.user).toContain('the most recent sentence "第二句" that recognition split by mistake');
    expect(prompt.user).toContain("4. Translation: translate the refined text into English.");
  });

  it("leaves out empty sections", () => {
    const prompt = buildEnrichmentPrompt(makeInput(), NO_CONTEXT);
    expect(prompt.user).not.toContain("Recent sentences:");
    expect(prompt.user).not.toContain("Keywords the listener cares about:");
    expect(prompt.user).not.toContain("Session context:");
    expect(prompt.user).toContain("(no previous sentence)");
    expect(prompt.user.startsWith("Current text (Chinese): 你好")).toBe(true);
  });

  it("puts the summary context first when present", () => {
    const prompt = buildEnrichmentPrompt(makeInput(), { ...CONTEXT, hasContext: true });
    expect(prompt.user.startsWith("Session context:\nScene: Support call\nTopic: Refunds")).toBe(true);
  });
});

// ─── Pipeline ───────────────────────────────────────────────────────────────────

describe("EnrichmentPipeline", () => {
  it("returns the model's enrichment with success", async () => {
    const { model } = makeModel(async () => makeEnrichment({ refined_text: "你好。", translation: "Hello." }));
    const result = await makePipeline(model).process(makeInput());

    expect(result).toEqual({
      ...makeEnrichment({ refined_text: "你好。", translation: "Hello." }),
      context_enhanced: false,
      success: true,
    });
  });

  it("forces a keyword match on a direct substring hit the model missed", async () => {
    const { model } = makeModel(async () => makeEnrichment({ match_reason: "no keyword mentioned" }));
    const result = await makePipeline(model).process(
      makeInput({ text: "I want a REFUND please", sourceLanguage: "en", targetLanguage: "zh", keywords: ["refund"] }),
    );

    expect(result.is_keyword_match).toBe(true);
    expect(result.matched_keywords).toEqual(["refund"]);
    expect(result.match_reason).toBe(DIRECT_MATCH_REASON);
    expect(result.success).toBe(true);
  });

  it("trusts a match the model reported itself", async () => {
    const { model } = makeModel(async () =>
      makeEnrichment({ is_keyword_match: true, matched_keywords: ["money back"], match_reason: "synonym" }),
    );
    const result = await makePipeline(model).process(
      makeInput({ text: "can I get my refund", keywords: ["refund", "money back"] }),
    );

    expect(result.matched_keywords).toEqual(["money back"]);
    expect(result.match_reason).toBe("synonym");
  });

  it("degrades when the model throws", async () => {
    const { model } = makeModel(async () => {
      throw new Error("model unreachable");
    });
    const result = await makePipeline(model).process(makeInput({ text: "hello there", keywords: ["hello"] }));

    expect(result.success).toBe(false);
    expect(result.refined_text).toBe("hello there");
    expect(result.translation).toBe("");
    expect(result.is_keyword_match).toBe(false);
    expect(result.error).toBe("model unreachable");
  });

  it("degrades when the model is slower than the timeout", async () => {
    const { model } = makeModel(() => new Promise<ModelEnrichment>(() => {}));
    const result = await makePipeline(model, undefined, 20).process(makeInput());

    expect(result.success).toBe(false);
    expect(result.error).toBe("Enrichment timed out after 20ms");
  });

  it("aborts the model request once the timeout fires", async () => {
    const signals: AbortSignal[] = [];
    const { model } = makeModel((_prompt, signal) => {
      if (signal) signals.push(signal);
      return new Promise<ModelEnrichment>(() => {});
    });

    await makePipeline(model, undefined, 20).process(makeInput());

    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
  });

  it("leaves the signal untouched when the model answers in time", async () => {
    const signals: AbortSignal[] = [];
    const { model } = makeModel(async (_prompt, signal) => {
      if (signal) signals.push(signal);
      return makeEnrichment();
    });

    await makePipeline(model).process(makeInput());

    expect(signals[0].aborted).toBe(false);
  });

  it("skips the model for blank text", async () => {
    const { model, enrich } = makeModel(async () => makeEnrichment());
    const result = await makePipeline(model).process(makeInput({ text: "   " }));

    expect(enrich).not.toHaveBeenCalled();
    expect(result).toEqual(degradedResult("   ", "empty text"));
  });

  it("degrades every call when no model is configured", async () => {
    const pipeline = makePipeline(null);
    const result = await pipeline.process(makeInput());
    expect(result).toEqual(degradedResult("你好", "enrichment model unavailable"));
  });

  it("marks results context-enhanced and sends the context when one is set", async () => {
    const store = new SummaryContextStore(createSilentLogger());
    store.set(CONTEXT);
    const { model, enrich } = makeModel(async () => makeEnrichment());

    const result = await makePipeline(model, store).process(makeInput());

    expect(result.context_enhanced).toBe(true);
    expect(enrich.mock.calls[0][0].user).toContain("Topic: Refunds");
  });

  it("uses the context snapshot from the start of the call", async () => {
    const store = new SummaryContextStore(createSilentLogger());
    store.set(CONTEXT);
    const { model } = makeModel(async () => {
      store.clear();
      return makeEnrichment();
    });

    const result = await makePipeline(model, store).process(makeInput());
    expect(result.context_enhanced).toBe(true);
  });

  it("never rejects even when the model returns a rejected promise synchronously", async () => {
    const { model } = makeModel(() => Promise.reject(new Error("sync failure")));
    await expect(makePipeline(model).process(makeInput())).resolves.toMatchObject({
      success: false,
      error: "sync failure",
    });
  });
});
