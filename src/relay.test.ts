import { describe, it, expect, afterEach, vi } from "vitest";
import WebSocket from "ws";
import { APP_NAME, APP_VERSION, createRelay } from "./relay.js";
import { DEFAULT_APP_CONFIG, type AppConfig } from "./config.js";
import type { DeepgramPrerecordedClient } from "./deepgram-engine.js";
import type { OpenAIClient } from "./enrichment-model.js";
import type { AppServer } from "./server.js";

const config: AppConfig = {
  ...DEFAULT_APP_CONFIG,
  logLevel: "error",
  // 320-byte recognition windows at 16 kHz mono 16-bit
  recognitionWindowSeconds: 0.01,
};

function createDeepgramStub(transcript: string) {
  const transcribeFile = vi.fn(async () => ({
    result: { results: { channels: [{ alternatives: [{ transcript, confidence: 0.9 }] }] } },
    error: null,
  }));
  const client: DeepgramPrerecordedClient = { listen: { prerecorded: { transcribeFile } } };
  return { client, transcribeFile };
}

function createOpenAIStub(reply: object): OpenAIClient {
  return {
    chat: {
      completions: {
        create: async () => ({ choices: [{ message: { content: JSON.stringify(reply) } }] }),
      },
    },
  };
}

describe("Project setup", () => {
  it("should export app name", () => {
    expect(APP_NAME).toBe("Live Transcription Relay");
  });

  it("should export app version", () => {
    expect(APP_VERSION).toBe("0.1.0");
  });
});

describe("createRelay", () => {
  let server: AppServer | null = null;

  afterEach(async () => {
    await server?.close();
    server = null;
  });

  async function start(relay: AppServer): Promise<number> {
    server = relay;
    await relay.listen(0);
    const addr = relay.httpServer.address();
    if (typeof addr === "string" || addr === null) throw new Error("Unexpected server address format");
    return addr.port;
  }

  it("serves /health with stub clients", async () => {
    const port = await start(createRelay(config, { deepgram: createDeepgramStub("").client, openai: null }));

    const res = await fetch(`http://127.0.0.1:${port}/health`);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("turns streamed audio into an enriched transcription", async () => {
    const deepgram = createDeepgramStub("你好");
    const openai = createOpenAIStub({
      refined_text: "你好。",
      translation: "Hello.",
      is_keyword_match: false,
      matched_keywords: [],
      match_reason: "",
      is_continuation: false,
      continuation_reason: "",
    });
    const port = await start(createRelay(config, { deepgram: deepgram.client, openai }));

    const received: unknown[] = [];
    const ws = new WebSocket(`ws://127.0.0.1:${port}/ws/transcribe/e2e`);
    ws.on("message", (data: WebSocket.RawData) => {
      received.push(JSON.parse(String(data)));
    });
    await new Promise((resolve, reject) => {
      ws.on("open", resolve);
      ws.on("error", reject);
    });

    ws.send(Buffer.alloc(320));

    await vi.waitFor(() => expect(received).toHaveLength(2), { timeout: 3000 });
    expect(received[0]).toEqual({ event: "connected", client_id: "e2e" });
    expect(received[1]).toMatchObject({
      event: "transcription",
      text: "你好",
      refined_text: "你好。",
      translation: "Hello.",
      source_language: "zh",
      target_language: "en",
    });
    expect(deepgram.transcribeFile).toHaveBeenCalledWith(expect.any(Buffer), {
      model: "whisper-tiny",
      language: "zh",
      encoding: "linear16",
      sample_rate: 16000,
      channels: 1,
      punctuate: true,
      smart_format: true,
    });
    ws.close();
  });

  it("passes transcriptions through when no OpenAI client is configured", async () => {
    const port = await start(createRelay(config, { deepgram: createDeepgramStub("hello").client, openai: null }));

    const received: unknown[] = [];
    const ws = new WebSocket(`ws://127.0.0.1:${port}/ws/transcribe/plain`);
    ws.on("message", (data: WebSocket.RawData) => {
      received.push(JSON.parse(String(data)));
    });
    await new Promise((resolve, reject) => {
      ws.on("open", resolve);
      ws.on("error", reject);
    });

    ws.send(Buffer.alloc(320));

    await vi.waitFor(() => expect(received).toHaveLength(2), { timeout: 3000 });
    expect(received[1]).toMatchObject({ event: "transcription", text: "hello", refined_text: "hello", translation: "" });
    ws.close();
  });
});
