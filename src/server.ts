// Interview Signal Engine - WebSocket Handler and Express Server
//
// WebSocket /ws/interview/:sessionId carries the live path: frames in,
// coalesced emotion_update and assessment_ready events out. HTTP routes expose
// snapshots, close, assessment runs, manual scores and the scoring weights.

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type IncomingMessage, type Server as HttpServer } from "node:http";
import type { AddressInfo } from "node:net";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { validateIndicators, type AssessmentPipeline } from "./assessment-pipeline.js";
import {
  AlreadyOpenError,
  ConfigurationError,
  NotFoundError,
  SessionStateError,
  SignalEngineError,
  errorMessage,
} from "./errors.js";
import { decodeFrame, isWireFrame } from "./frame-codec.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { ScoringWeightsHolder } from "./score-combiner.js";
import type { SessionController } from "./session-controller.js";
import { SessionState, type ClientMessage, type ScoringWeights, type ServerMessage } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const INTERVIEW_PATH = /^\/ws\/interview\/([^/?#]+)\/?(?:[?#].*)?$/;

/** Close code sent when the session id is already open on another connection. */
const CLOSE_ALREADY_OPEN = 4409;

/** Close code for an upgrade on a path other than /ws/interview/:sessionId. */
const CLOSE_UNKNOWN_PATH = 4404;

/** JSON body limit; frames travel over the WebSocket, not HTTP. */
const JSON_BODY_LIMIT = "1mb";

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionState {
  sessionId: string;
  /** end_session was received; socket close no longer aborts. */
  ended: boolean;
  unsubscribe: (() => void) | null;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  controller: SessionController;
  pipeline: AssessmentPipeline;
  weights: ScoringWeightsHolder;
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening. Resolves with the bound port (useful with port 0). */
  listen(port: number): Promise<number>;
  /** Close sockets, stop listening and abort every live session. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { controller, pipeline } = options;
  const logger = options.logger ?? createConsoleLogger("Server");

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: JSON_BODY_LIMIT }));
  registerRoutes(app, options, logger);

  const wss = new WebSocketServer({ server: httpServer });
  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    handleConnection(ws, req, controller, pipeline, logger);
  });

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const bound = isAddressInfo(address) ? address.port : port;
          logger.info(`Server listening on port ${bound}`);
          resolve(bound);
        });
      });
    },
    async close(): Promise<void> {
      for (const client of wss.clients) {
        client.close();
      }
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      await new Promise<void>((resolve, reject) => {
        if (!httpServer.listening) {
          resolve();
          return;
        }
        httpServer.close((err) => (err ? reject(err) : resolve()));
      });
      await controller.shutdown();
      logger.info("Server closed");
    },
  };
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === "object" && address !== null;
}

// ─── HTTP Routes ────────────────────────────────────────────────────────────────

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Forward rejections from an async route to the error middleware. */
function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function httpStatusFor(err: unknown): number {
  if (err instanceof NotFoundError) return 404;
  if (err instanceof AlreadyOpenError || err instanceof SessionStateError) return 409;
  if (err instanceof ConfigurationError) return 400;
  // body-parser rejects unparseable or oversized bodies with a 4xx status
  const status = readField(err, "status");
  if (typeof status === "number" && status >= 400 && status < 500) return status;
  return 500;
}

function registerRoutes(app: Express, options: CreateServerOptions, logger: Logger): void {
  const { controller, pipeline, weights } = options;

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", activeSessions: controller.activeSessionIds().length });
  });

  app.get("/api/sessions/:id/snapshot", (req, res) => {
    res.json(controller.requestSnapshot(req.params.id));
  });

  app.post(
    "/api/sessions/:id/close",
    asyncRoute(async (req, res) => {
      const finalized = await controller.close(req.params.id);
      res.json(finalized);
    }),
  );

  app.post("/api/sessions/:id/assessments", (req, res) => {
    const sessionId = req.params.id;
    const body: unknown = req.body;
    const indicators = validateIndicators(readField(body, "indicators"));
    const audioArtifactRef = resolveArtifactRef(sessionId, readField(body, "audioArtifactRef"), controller);

    pipeline.run(sessionId, audioArtifactRef, indicators).catch((err) => {
      logger.error(`Background assessment for session ${sessionId} failed: ${errorMessage(err)}`);
    });
    res.status(202).json({ status: pipeline.getStatus(sessionId) });
  });

  app.get(
    "/api/sessions/:id/assessments",
    asyncRoute(async (req, res) => {
      const status = pipeline.getStatus(req.params.id);
      const report = await pipeline.getReport(req.params.id);
      res.json({ status, report: report.status.state === "completed" ? report : null });
    }),
  );

  app.put(
    "/api/sessions/:id/manual-scores",
    asyncRoute(async (req, res) => {
      const scores = parseManualScores(readField(req.body, "manualScores"));
      const report = await pipeline.setManualScores(req.params.id, scores);
      res.json(report);
    }),
  );

  app.get("/api/settings/scoring-weights", (_req, res) => {
    res.json(weights.current());
  });

  app.put("/api/settings/scoring-weights", (req, res) => {
    const next = weights.update(parseWeights(req.body));
    logger.info(`Scoring weights updated to ${next.aiWeight}/${next.manualWeight}`);
    res.json(next);
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusFor(err);
    if (status === 500) logger.error(`Unhandled route error: ${errorMessage(err)}`);
    const code = err instanceof SignalEngineError ? err.code : status < 500 ? "BAD_REQUEST" : "INTERNAL";
    res.status(status).json({ error: { code, message: errorMessage(err) } });
  });
}

function readField(body: unknown, key: string): unknown {
  if (typeof body !== "object" || body === null) return undefined;
  return key in body ? Reflect.get(body, key) : undefined;
}

/** Explicit ref from the request, else the finalized session's artifact. */
function resolveArtifactRef(sessionId: string, explicit: unknown, controller: SessionController): string {
  if (explicit !== undefined) {
    if (typeof explicit !== "string" || explicit.trim().length === 0) {
      throw new ConfigurationError("audioArtifactRef must be a non-empty string");
    }
    return explicit;
  }

  const session = controller.getSession(sessionId);
  if (session.state !== SessionState.CLOSED) {
    throw new SessionStateError(
      `Cannot assess session ${sessionId} in "${session.state}" state. Close the session first.`,
    );
  }
  if (!session.finalAudioArtifactRef) {
    throw new SessionStateError(`Session ${sessionId} has no audio artifact to assess`);
  }
  return session.finalAudioArtifactRef;
}

export function parseManualScores(input: unknown): Record<string, number | null> {
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    throw new ConfigurationError("manualScores must be an object of indicatorId → score");
  }
  const scores: Record<string, number | null> = {};
  for (const [indicatorId, value] of Object.entries(input)) {
    if (value !== null && typeof value !== "number") {
      throw new ConfigurationError(`Manual score for ${indicatorId} must be a number or null`);
    }
    scores[indicatorId] = value;
  }
  return scores;
}

export function parseWeights(input: unknown): ScoringWeights {
  const aiWeight = readField(input, "aiWeight");
  const manualWeight = readField(input, "manualWeight");
  if (typeof aiWeight !== "number" || typeof manualWeight !== "number") {
    throw new ConfigurationError("aiWeight and manualWeight must both be numbers");
  }
  return { aiWeight, manualWeight };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

export function sessionIdFromPath(url: string | undefined): string | null {
  const match = INTERVIEW_PATH.exec(url ?? "");
  if (!match) return null;
  try {
    const id = decodeURIComponent(match[1]).trim();
    return id.length > 0 ? id : null;
  } catch {
    return null;
  }
}

function handleConnection(
  ws: WebSocket,
  req: IncomingMessage,
  controller: SessionController,
  pipeline: AssessmentPipeline,
  logger: Logger,
): void {
  const sessionId = sessionIdFromPath(req.url);
  if (!sessionId) {
    sendMessage(ws, { type: "error", message: `Unknown WebSocket path: ${req.url ?? ""}`, recoverable: false });
    ws.close(CLOSE_UNKNOWN_PATH, "unknown path");
    return;
  }

  try {
    controller.open(sessionId, {
      onEmotionUpdate: (snapshot) => sendMessage(ws, { type: "emotion_update", data: snapshot }),
    });
  } catch (err) {
    logger.warn(`Rejected connection for session ${sessionId}: ${errorMessage(err)}`);
    sendMessage(ws, { type: "error", message: errorMessage(err), recoverable: false });
    ws.close(err instanceof AlreadyOpenError ? CLOSE_ALREADY_OPEN : 1011, "session unavailable");
    return;
  }

  const connState: ConnectionState = { sessionId, ended: false, unsubscribe: null };
  connState.unsubscribe = pipeline.onAssessmentReady((readySessionId, indicatorId, assessment) => {
    if (readySessionId !== sessionId) return;
    sendMessage(ws, { type: "assessment_ready", data: { sessionId, indicatorId, assessment } });
  });

  logger.info(`New WebSocket connection, session ${sessionId}`);
  sendMessage(ws, { type: "session_opened", sessionId });

  ws.on("message", (data: RawData, isBinary: boolean) => {
    try {
      if (isBinary) {
        handleBinaryMessage(ws, toBuffer(data), connState, controller);
      } else {
        const message = parseClientMessage(toBuffer(data).toString("utf-8"));
        if (!message) {
          sendMessage(ws, { type: "error", message: "Malformed client message", recoverable: true });
          return;
        }
        handleClientMessage(ws, message, connState, controller, logger);
      }
    } catch (err) {
      logger.error(`Error handling message for session ${sessionId}: ${errorMessage(err)}`);
      sendMessage(ws, { type: "error", message: errorMessage(err), recoverable: true });
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, session ${sessionId}`);
    cleanupConnection(connState, controller, logger);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for session ${sessionId}: ${err.message}`);
  });
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ─── Binary Message Handler (IV frames) ─────────────────────────────────────────

function handleBinaryMessage(
  ws: WebSocket,
  data: Buffer,
  connState: ConnectionState,
  controller: SessionController,
): void {
  const frame = isWireFrame(data) ? decodeFrame(data) : null;
  if (!frame) {
    sendMessage(ws, {
      type: "error",
      message: `Binary message (${data.length} bytes) is not a valid IV frame.`,
      recoverable: true,
    });
    return;
  }
  controller.ingestFrame(connState.sessionId, frame.modality, frame.payload, frame.header.timestamp);
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

/** Parse and shape-check a JSON text message. Null when it is not a ClientMessage. */
export function parseClientMessage(text: string): ClientMessage | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const type = readField(raw, "type");
  switch (type) {
    case "video_frame":
    case "audio_chunk": {
      const data = readField(raw, "data");
      const timestamp = readField(raw, "timestamp");
      if (typeof data !== "string" || typeof timestamp !== "number") return null;
      return { type, data, timestamp };
    }
    case "get_snapshot":
    case "end_session":
      return { type };
    default:
      return null;
  }
}

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  connState: ConnectionState,
  controller: SessionController,
  logger: Logger,
): void {
  // Helper to catch errors from async handlers and send them to the client
  const catchAsync = (promise: Promise<void>) => {
    promise.catch((err) => {
      logger.error(`Async error for session ${connState.sessionId}: ${errorMessage(err)}`);
      sendMessage(ws, { type: "error", message: errorMessage(err), recoverable: true });
    });
  };

  switch (message.type) {
    case "video_frame":
      controller.ingestFrame(connState.sessionId, "facial", message.data, message.timestamp);
      break;

    case "audio_chunk":
      controller.ingestFrame(connState.sessionId, "voice", message.data, message.timestamp);
      break;

    case "get_snapshot":
      sendMessage(ws, { type: "snapshot", data: controller.requestSnapshot(connState.sessionId) });
      break;

    case "end_session":
      connState.ended = true;
      catchAsync(
        controller.close(connState.sessionId).then((finalized) => {
          sendMessage(ws, { type: "session_closed", data: finalized });
        }),
      );
      break;

    default: {
      const exhaustiveCheck: never = message;
      sendMessage(ws, {
        type: "error",
        message: `Unknown message type: ${String(readField(exhaustiveCheck, "type"))}`,
        recoverable: true,
      });
    }
  }
}

// ─── Message Sending ────────────────────────────────────────────────────────────

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

// ─── Connection Cleanup ─────────────────────────────────────────────────────────

/** Abort the session when the socket went away without end_session. */
function cleanupConnection(connState: ConnectionState, controller: SessionController, logger: Logger): void {
  connState.unsubscribe?.();
  connState.unsubscribe = null;
  if (connState.ended) return;

  let state: SessionState;
  try {
    state = controller.getSession(connState.sessionId).state;
  } catch (err) {
    logger.debug(`Session ${connState.sessionId} already gone at disconnect: ${errorMessage(err)}`);
    return;
  }
  if (state !== SessionState.OPEN) return;

  controller.abort(connState.sessionId).catch((err) => {
    logger.error(`Abort failed for session ${connState.sessionId}: ${errorMessage(err)}`);
  });
}

// ─── Exports for Testing ────────────────────────────────────────────────────────

export { CLOSE_ALREADY_OPEN, CLOSE_UNKNOWN_PATH };
export type { ConnectionState };
