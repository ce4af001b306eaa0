// Live Transcription Relay - Entry point
// Loads configuration, creates the API clients and starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { loadConfig } from "./config.js";
import { APP_NAME, APP_VERSION, createRelay } from "./relay.js";
import type { DeepgramPrerecordedClient } from "./deepgram-engine.js";
import type { OpenAIClient } from "./enrichment-model.js";
import { errorMessage } from "./errors.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

const { config, warnings } = loadConfig(process.env);
for (const warning of warnings) {
  console.warn(`[WARN] [${ts()}] ${warning}`);
}

// ─── Validate API keys ─────────────────────────────────────────────────────────

if (!config.deepgramApiKey) {
  logFatal("DEEPGRAM_API_KEY is not set. Add it to your .env file.");
  process.exit(1);
}

if (!config.openaiApiKey) {
  console.warn(`[WARN] [${ts()}] OPENAI_API_KEY is not set; transcriptions will be passed through without enrichment`);
}

// ─── Initialize API clients ─────────────────────────────────────────────────────

logInit("Creating Deepgram client...");
const deepgramClient = createDeepgramClient(config.deepgramApiKey);

let openaiClient: OpenAI | null = null;
if (config.openaiApiKey) {
  logInit("Creating OpenAI client...");
  openaiClient = new OpenAI({ apiKey: config.openaiApiKey });
}

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createRelay(config, {
  deepgram: deepgramClient as unknown as DeepgramPrerecordedClient,
  openai: openaiClient as unknown as OpenAIClient | null,
});

server
  .listen(config.port)
  .then(() => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
    logInit(`WebSocket endpoint: ws://localhost:${config.port}/ws/transcribe/{clientId}`);
    logInit(`Enrichment: ${openaiClient ? config.enrichmentModel : "disabled"}`);
    logInit("Ready for connections");
  })
  .catch((err: unknown) => {
    logFatal(`Failed to start server: ${errorMessage(err)}`);
    process.exit(1);
  });

// ─── Graceful shutdown ──────────────────────────────────────────────────────────

const shutdown = (signal: string) => {
  logInit(`${signal} received, shutting down`);
  server
    .close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logFatal(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    });
};

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
