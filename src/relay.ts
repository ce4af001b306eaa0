// Live Transcription Relay - Component wiring
// Builds every component from an AppConfig and the external API clients.
// index.ts calls this with the real SDK clients; tests pass stubs.

import type { AppConfig } from "./config.js";
import { createAppServer, type AppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";
import { SummaryContextStore } from "./summary-context.js";
import { SummaryGenerator } from "./summary-generator.js";
import { EnrichmentPipeline } from "./enrichment-pipeline.js";
import { OpenAIEnrichmentModel, type OpenAIClient } from "./enrichment-model.js";
import { createDeepgramEngineFactory, type DeepgramPrerecordedClient } from "./deepgram-engine.js";
import { createConsoleLogger } from "./logger.js";

export const APP_NAME = "Live Transcription Relay";
export const APP_VERSION = "0.1.0";

export interface RelayClients {
  deepgram: DeepgramPrerecordedClient;
  /** Null when no OpenAI key is configured; enrichment and summaries then degrade. */
  openai: OpenAIClient | null;
}

export function createRelay(config: AppConfig, clients: RelayClients): AppServer {
  const logger = (component: string) => createConsoleLogger(component, config.logLevel);

  const contextStore = new SummaryContextStore(logger("SummaryContext"));

  const enrichmentModel = clients.openai ? new OpenAIEnrichmentModel(clients.openai, config.enrichmentModel) : null;
  const pipeline = new EnrichmentPipeline(enrichmentModel, contextStore, {
    timeoutMs: config.enrichmentTimeoutMs,
    logger: logger("EnrichmentPipeline"),
  });

  const engineFactory = createDeepgramEngineFactory(
    clients.deepgram,
    { windowSeconds: config.recognitionWindowSeconds },
    logger("DeepgramEngine"),
  );

  const sessionManager = new SessionManager({
    engineFactory,
    pipeline,
    historyLimit: config.historyLimit,
    slowFeedThresholdMs: config.slowFeedThresholdMs,
    logger: logger("SessionManager"),
  });

  const summaryGenerator = new SummaryGenerator(clients.openai, config.summaryModel, logger("SummaryGenerator"));

  return createAppServer({
    sessionManager,
    contextStore,
    summaryGenerator,
    logger: logger("Server"),
  });
}
