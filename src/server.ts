// Live Transcription Relay - WebSocket Handler and Express Server
// WebSocket endpoint /ws/transcribe/:clientId streams PCM audio in and
// enriched transcriptions out. REST endpoints cover session summaries, the
// shared summary context, health and per-client diagnostics.
//
// Privacy: audio frames are forwarded to the recognition engine and never
// written to disk. Session data lives in server memory only.

import express, { type ErrorRequestHandler, type Express, type Response } from "express";
import { createServer, type IncomingMessage, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { ClientMessage, ServerMessage, SessionConfigUpdate, SessionSnapshot, WireSessionConfig } from "./types.js";
import type { SessionManager } from "./session-manager.js";
import type { SummaryContextStore } from "./summary-context.js";
import type { SummaryGenerator } from "./summary-generator.js";
import type { TransportSink } from "./result-fanout.js";
import { DEFAULT_ENGINE_STATUS } from "./recognition-engine.js";
import { DEFAULT_SESSION_CONFIG } from "./config.js";
import { toWireAudioStats } from "./audio-stats.js";
import { ProtocolError, TransportError, errorMessage, type RelayError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const TRANSCRIBE_PATH = /^\/ws\/transcribe(?:\/([^/?]*))?\/?$/;

/** Close code for connections to an unknown path or rejected registrations. */
const POLICY_VIOLATION = 1008;

// ─── Message validation ─────────────────────────────────────────────────────────

const ConfigFieldsSchema = z.object({
  language: z.string().optional(),
  model_type: z.string().optional(),
  model: z.string().optional(),
  target_language: z.string().optional(),
  debug_mode: z.boolean().optional(),
});

const ClientMessageSchema = z.discriminatedUnion("event", [
  z.object({ event: z.literal("config"), config: ConfigFieldsSchema }),
  z.object({ event: z.literal("keywords"), keywords: z.array(z.string()) }),
]);

const EnvelopeSchema = z.object({ event: z.string() });
const KNOWN_EVENTS = new Set(["config", "keywords"]);

const SummaryRequestSchema = z.object({
  transcriptions: z.array(z.object({ text: z.string(), timestamp: z.string() })),
});

/**
 * Parses one text frame from a client.
 * @throws ProtocolError for malformed JSON, unknown events or bad fields
 */
export function parseClientMessage(raw: string): ClientMessage {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new ProtocolError("Invalid JSON message");
  }

  const envelope = EnvelopeSchema.safeParse(data);
  if (!envelope.success) {
    throw new ProtocolError("Message must be a JSON object with an event field");
  }
  if (!KNOWN_EVENTS.has(envelope.data.event)) {
    throw new ProtocolError(`Unknown event: ${envelope.data.event}`);
  }

  const parsed = ClientMessageSchema.safeParse(data);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new ProtocolError(`Invalid ${envelope.data.event} message (${fields})`);
  }
  return parsed.data;
}

/** Maps wire config fields to a SessionConfigUpdate; `model_type` wins over `model`. */
export function toConfigUpdate(config: z.infer<typeof ConfigFieldsSchema>): SessionConfigUpdate {
  return {
    language: config.language,
    modelType: config.model_type ?? config.model,
    targetLanguage: config.target_language,
    debugMode: config.debug_mode,
  };
}

export function toWireConfig(snapshot: SessionSnapshot): WireSessionConfig {
  return {
    language: snapshot.language,
    model_type: snapshot.modelType,
    target_language: snapshot.targetLanguage,
    debug_mode: snapshot.debugMode,
  };
}

/**
 * Client id from a /ws/transcribe path. A missing id or the literal
 * "undefined" (sent by clients that had no id yet) gets a fresh uuid.
 * Returns null for any other path.
 */
export function resolveClientId(url: string | undefined): string | null {
  const pathname = (url ?? "/").split("?")[0];
  const match = TRANSCRIBE_PATH.exec(pathname);
  if (!match) return null;

  const segment = match[1] ?? "";
  let id = segment;
  try {
    id = decodeURIComponent(segment);
  } catch (err) {
    if (!(err instanceof URIError)) throw err;
  }
  return id === "" || id === "undefined" ? uuidv4() : id;
}

function httpStatusFor(error: RelayError): number {
  switch (error.code) {
    case "validation_error":
    case "protocol_error":
      return 400;
    case "not_found":
      return 404;
    default:
      return 500;
  }
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  sessionManager: SessionManager;
  contextStore: SummaryContextStore;
  summaryGenerator: SummaryGenerator;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Unregister every session and shut the server down. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { sessionManager, contextStore, summaryGenerator, logger = createConsoleLogger("Server") } = options;

  const app = express();
  app.use(express.json());
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // ── Summaries ──

  app.post("/summary", (req, res) => {
    const parsed = SummaryRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Body must be {transcriptions: [{text, timestamp}]}" });
      return;
    }
    summaryGenerator
      .generate(parsed.data.transcriptions)
      .then((summary) => res.json(summary))
      .catch((err: unknown) => sendInternalError(res, logger, err));
  });

  app.post("/summary/context", (req, res) => {
    if (!contextStore.set(req.body)) {
      res.status(400).json({ status: "error", message: "Context requires scene, topic, keyPoints and summary" });
      return;
    }
    res.json({ status: "success", message: "Summary context updated" });
  });

  app.get("/summary/context", (_req, res) => {
    const context = contextStore.get();
    res.json({
      scene: context.scene,
      topic: context.topic,
      keyPoints: context.keyPoints,
      summary: context.summary,
      has_context: context.hasContext,
    });
  });

  app.delete("/summary/context", (_req, res) => {
    contextStore.clear();
    res.json({ status: "success", message: "Summary context cleared" });
  });

  // ── Diagnostics ──

  app.get("/ws/status", (_req, res) => {
    const clients: Record<string, unknown> = {};
    for (const snapshot of sessionManager.listSessions()) {
      const stats = sessionManager.getAudioStats(snapshot.id);
      clients[snapshot.id] = {
        config: { ...toWireConfig(snapshot), keywords: snapshot.keywords },
        state: snapshot.state,
        running: snapshot.running,
        registered_at: snapshot.registeredAt.toISOString(),
        audio_stats: stats.ok ? toWireAudioStats(stats.value) : null,
      };
    }
    res.json({ active_connections: sessionManager.size, clients });
  });

  app.get("/ws/client/:clientId/config", (req, res) => {
    const id = req.params.clientId;
    const snapshot = sessionManager.getConfig(id);
    if (!snapshot.ok) {
      res.status(httpStatusFor(snapshot.error)).json({ error: snapshot.error.message });
      return;
    }
    const engine = sessionManager.getEngineStatus(id);
    res.json({
      client_id: id,
      config: { ...toWireConfig(snapshot.value), keywords: snapshot.value.keywords },
      state: snapshot.value.state,
      running: snapshot.value.running,
      engine: engine.ok ? engine.value : DEFAULT_ENGINE_STATUS,
    });
  });

  app.post("/ws/client/:clientId/config", (req, res) => {
    const id = req.params.clientId;
    const parsed = ConfigFieldsSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid configuration body" });
      return;
    }
    sessionManager
      .updateConfig(id, toConfigUpdate(parsed.data))
      .then((result) => {
        if (result.ok) {
          res.json({ status: "success", config: toWireConfig(result.value) });
        } else {
          res.status(httpStatusFor(result.error)).json({ status: "error", message: result.error.message });
        }
      })
      .catch((err: unknown) => sendInternalError(res, logger, err));
  });

  // express.json() reports malformed bodies through the error chain
  const jsonErrorHandler: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    logger.warn(`Rejected request body: ${errorMessage(err)}`);
    res.status(400).json({ error: "Invalid JSON body" });
  };
  app.use(jsonErrorHandler);

  // ── WebSocket ──

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    const clientId = resolveClientId(req.url);
    if (clientId === null) {
      logger.warn(`Rejected WebSocket connection to ${req.url ?? "(no url)"}`);
      ws.close(POLICY_VIOLATION, "Unknown path");
      return;
    }
    handleConnection(ws, clientId, sessionManager, logger);
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    async close(): Promise<void> {
      await sessionManager.shutdown();
      await new Promise<void>((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

function sendInternalError(res: Response, logger: Logger, err: unknown): void {
  logger.error(`Request failed: ${errorMessage(err)}`);
  if (!res.headersSent) {
    res.status(500).json({ error: errorMessage(err) });
  }
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

/** TransportSink writing JSON text frames to one WebSocket. */
export function createWebSocketSink(ws: WebSocket): TransportSink {
  return {
    isReady: () => ws.readyState === WebSocket.OPEN,
    send: (message: ServerMessage) =>
      new Promise<void>((resolve, reject) => {
        ws.send(JSON.stringify(message), (err) => {
          if (err) reject(new TransportError(`WebSocket send failed: ${err.message}`, err));
          else resolve();
        });
      }),
  };
}

function handleConnection(ws: WebSocket, clientId: string, sessionManager: SessionManager, logger: Logger): void {
  logger.info(`New WebSocket connection, client ${clientId}`);
  sendMessage(ws, { event: "connected", client_id: clientId });

  // Resolves to whether this connection owns the session under clientId.
  // Every handler waits on it, which also keeps frames in arrival order.
  const registration: Promise<boolean> = sessionManager
    .register(clientId, { ...DEFAULT_SESSION_CONFIG, keywords: [] }, createWebSocketSink(ws))
    .then((result) => {
      if (result.ok) return true;
      logger.error(`Registration failed for ${clientId}: ${result.error.message}`);
      sendMessage(ws, { event: "error", message: result.error.message });
      ws.close(POLICY_VIOLATION, "Registration failed");
      return false;
    });

  const whenRegistered = (task: () => Promise<void>) => {
    registration
      .then((registered) => (registered ? task() : undefined))
      .catch((err: unknown) => {
        logger.error(`Error handling message for client ${clientId}: ${errorMessage(err)}`);
        sendMessage(ws, { event: "error", message: errorMessage(err) });
      });
  };

  ws.on("message", (data: RawData, isBinary: boolean) => {
    if (isBinary) {
      const chunk = toBuffer(data);
      whenRegistered(() => handleAudio(ws, clientId, chunk, sessionManager, logger));
      return;
    }

    let message: ClientMessage;
    try {
      message = parseClientMessage(toBuffer(data).toString("utf-8"));
    } catch (err) {
      logger.warn(`Protocol error from client ${clientId}: ${errorMessage(err)}`);
      sendMessage(ws, { event: "error", message: errorMessage(err) });
      return;
    }
    whenRegistered(() => handleClientMessage(ws, clientId, message, sessionManager, logger));
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, client ${clientId}`);
    whenRegistered(async () => {
      await sessionManager.unregister(clientId);
    });
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for client ${clientId}: ${err.message}`);
  });
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ─── Message Handlers ───────────────────────────────────────────────────────────

async function handleAudio(
  ws: WebSocket,
  clientId: string,
  chunk: Buffer,
  sessionManager: SessionManager,
  logger: Logger,
): Promise<void> {
  const result = await sessionManager.feed(clientId, chunk);
  if (!result.ok) {
    logger.warn(`Audio frame from ${clientId} rejected: ${result.error.message}`);
    sendMessage(ws, { event: "error", message: result.error.message });
  }
}

async function handleClientMessage(
  ws: WebSocket,
  clientId: string,
  message: ClientMessage,
  sessionManager: SessionManager,
  logger: Logger,
): Promise<void> {
  switch (message.event) {
    case "config": {
      logger.info(`Config request from ${clientId}: ${JSON.stringify(message.config)}`);
      sendMessage(ws, { event: "config_received", status: "processing" });

      const result = await sessionManager.updateConfig(clientId, toConfigUpdate(message.config));
      if (result.ok) {
        sendMessage(ws, { event: "config_updated", status: "success", config: toWireConfig(result.value) });
      } else {
        sendMessage(ws, { event: "config_updated", status: "error", message: result.error.message });
      }
      break;
    }

    case "keywords": {
      const result = sessionManager.updateKeywords(clientId, message.keywords);
      if (result.ok) {
        sendMessage(ws, { event: "keywords_updated", keywords: result.value.keywords });
      } else {
        sendMessage(ws, { event: "error", message: result.error.message });
      }
      break;
    }
  }
}

/**
 * Sends a control message if the socket is open. Transcriptions go through
 * the session's TransportSink instead.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
