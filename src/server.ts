// ATC Phrase Relay - Relay server (Express + WebSocket)
// Each WebSocket connection runs its own PhraseSession with its own fragment
// source and synthesizer; every session shares the one read-only table.
//
// Connect to ws://host:port/?input=text (JSON fragments) or ?input=audio
// (binary 16-bit mono PCM, transcribed by a per-connection LiveRecognizer).
// Synthesized phrase audio comes back as binary frames.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer, type IncomingMessage } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { z } from "zod";
import { combineDiagnostics } from "./diagnostics.js";
import { describeError } from "./errors.js";
import { FragmentQueue } from "./fragment-queue.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { PhraseSession } from "./phrase-session.js";
import type { LiveRecognizer } from "./recognizer.js";
import type {
  AudioChunkMeta,
  AudioSink,
  ClientMessage,
  DiagnosticEvent,
  DiagnosticsSink,
  FragmentSource,
  InputMode,
  MappingTable,
  ServerMessage,
  SessionOutcome,
  Synthesizer,
} from "./types.js";

// ─── Options ────────────────────────────────────────────────────────────────────

export interface CreateRelayServerOptions {
  table: MappingTable;
  /** Builds the synthesizer for one connection, writing to that connection. */
  synthesizerFactory: (sink: AudioSink) => Synthesizer;
  /** Builds a recognizer for one audio connection. Audio input is refused without it. */
  recognizerFactory?: () => LiveRecognizer;
  /** Process-wide diagnostics (console, audit log). */
  diagnostics?: DiagnosticsSink;
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Sessions currently running. */
  readonly activeSessions: number;
  /** Start listening on the given port. Resolves once listening. */
  listen(port: number): Promise<void>;
  /** Stop every session, close connections, stop listening. */
  close(): Promise<void>;
}

interface ConnectionState {
  session: PhraseSession;
  controller: AbortController;
  inputMode: InputMode;
  queue: FragmentQueue | null;
  recognizer: LiveRecognizer | null;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createRelayServer(options: CreateRelayServerOptions): AppServer {
  const { table, synthesizerFactory, recognizerFactory } = options;
  const logger = options.logger ?? createConsoleLogger("Server");
  const diagnostics = options.diagnostics ?? { report: () => {} };
  const running = new Map<string, { controller: AbortController; done: Promise<void> }>();

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", sessions: running.size, phrases: table.phrases.length });
  });

  app.get("/phrases", (_req, res) => {
    res.json({
      phrases: table.phrases.map((p) => ({
        id: p.id,
        canonicalText: p.canonicalText,
        variants: p.variants,
      })),
    });
  });

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    const inputMode = parseInputMode(req.url);
    if (inputMode === null) {
      sendMessage(ws, { type: "error", message: "Unknown input mode. Use ?input=text or ?input=audio.", recoverable: false });
      ws.close(1008, "unknown input mode");
      return;
    }
    if (inputMode === "audio" && !recognizerFactory) {
      sendMessage(ws, { type: "error", message: "Audio input is not available on this server.", recoverable: false });
      ws.close(1008, "audio input unavailable");
      return;
    }

    const conn = openConnection(ws, inputMode);
    running.set(conn.session.id, { controller: conn.controller, done: conn.done });
    void conn.done.finally(() => running.delete(conn.session.id));
  });

  function openConnection(ws: WebSocket, inputMode: InputMode): ConnectionState & { done: Promise<void> } {
    let source: FragmentSource;
    let queue: FragmentQueue | null = null;
    let recognizer: LiveRecognizer | null = null;

    if (inputMode === "audio" && recognizerFactory) {
      recognizer = recognizerFactory();
      recognizer.start();
      source = recognizer;
    } else {
      queue = new FragmentQueue("websocket");
      source = queue;
    }

    const controller = new AbortController();
    const session = new PhraseSession({
      table,
      source,
      synthesizer: synthesizerFactory(new WebSocketAudioSink(ws)),
      diagnostics: combineDiagnostics([diagnostics, new WebSocketDiagnostics(ws)], logger),
    });
    const conn: ConnectionState = { session, controller, inputMode, queue, recognizer };

    logger.info(`New WebSocket connection, session ${session.id} (${inputMode} input)`);
    sendMessage(ws, { type: "ready", sessionId: session.id, inputMode });

    ws.on("message", (data: RawData, isBinary: boolean) => {
      try {
        handleMessage(ws, conn, data, isBinary);
      } catch (err) {
        const errorMessage = describeError(err);
        logger.error(`Error handling message for session ${session.id}: ${errorMessage}`);
        sendMessage(ws, { type: "error", message: errorMessage, recoverable: true });
      }
    });

    ws.on("close", () => {
      logger.info(`WebSocket closed, session ${session.id}`);
      controller.abort();
    });

    ws.on("error", (err) => {
      logger.error(`WebSocket error for session ${session.id}: ${err.message}`);
      controller.abort();
    });

    const done = session.run(controller.signal).then(
      (outcome) => finishConnection(ws, outcome),
      (err: unknown) => {
        logger.error(`Session ${session.id} failed: ${describeError(err)}`);
        if (ws.readyState === WebSocket.OPEN) ws.close(1011, "session failed");
      },
    );

    return { ...conn, done };
  }

  function finishConnection(ws: WebSocket, outcome: SessionOutcome): void {
    if (ws.readyState !== WebSocket.OPEN) return;
    if (outcome.reason === "recognizer_error") {
      ws.close(1011, "recognizer failure");
    } else {
      ws.close(1000, outcome.reason);
    }
  }

  return {
    app,
    httpServer,
    wss,
    get activeSessions() {
      return running.size;
    },
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          httpServer.off("error", reject);
          logger.info(`Relay server listening on port ${port}`);
          resolve();
        });
      });
    },
    async close(): Promise<void> {
      const pending = [...running.values()];
      for (const { controller } of pending) {
        controller.abort();
      }
      await Promise.all(pending.map(({ done }) => done));

      for (const client of wss.clients) {
        client.close(1001, "server shutting down");
      }
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}

// ─── Message handling ───────────────────────────────────────────────────────────

function handleMessage(ws: WebSocket, conn: ConnectionState, data: RawData, isBinary: boolean): void {
  const bytes = toBuffer(data);

  if (isBinary) {
    if (!conn.recognizer) {
      sendMessage(ws, { type: "error", message: "Binary audio is only accepted on ?input=audio connections.", recoverable: true });
      return;
    }
    if (bytes.length % 2 !== 0) {
      sendMessage(ws, {
        type: "error",
        message: `Audio chunk byte length (${bytes.length}) is not a multiple of 2. Expected 16-bit PCM.`,
        recoverable: true,
      });
      return;
    }
    conn.recognizer.feedAudio(bytes);
    return;
  }

  const message = parseClientMessage(bytes.toString("utf-8"));
  if (!message) {
    sendMessage(ws, { type: "error", message: "Unrecognized message.", recoverable: true });
    return;
  }

  switch (message.type) {
    case "fragment":
      if (!conn.queue) {
        sendMessage(ws, { type: "error", message: "Text fragments are only accepted on ?input=text connections.", recoverable: true });
        return;
      }
      conn.queue.push(message.text);
      break;

    case "stop":
      conn.controller.abort();
      break;
  }
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

const ClientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("fragment"), text: z.string() }),
  z.object({ type: z.literal("stop") }),
]);

/** Parse and validate a JSON client message; null when it is not one we know. */
export function parseClientMessage(text: string): ClientMessage | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = ClientMessageSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function parseInputMode(url: string | undefined): InputMode | null {
  const params = new URL(url ?? "/", "ws://localhost").searchParams;
  const mode = params.get("input") ?? "text";
  if (mode === "text" || mode === "audio") return mode;
  return null;
}

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

// ─── Per-connection sinks ───────────────────────────────────────────────────────

/** Sends synthesized audio back to the client as binary frames. */
export class WebSocketAudioSink implements AudioSink {
  constructor(private readonly ws: WebSocket) {}

  write(audio: Buffer, _meta: AudioChunkMeta): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error("client disconnected"));
    }
    return new Promise((resolve, reject) => {
      this.ws.send(audio, { binary: true }, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  async close(): Promise<void> {
    // The connection is owned by the server.
  }
}

/** Mirrors session events to the client as JSON messages. */
export class WebSocketDiagnostics implements DiagnosticsSink {
  constructor(private readonly ws: WebSocket) {}

  report(event: DiagnosticEvent): void {
    const message = toServerMessage(event);
    if (message) sendMessage(this.ws, message);
  }
}

export function toServerMessage(event: DiagnosticEvent): ServerMessage | null {
  switch (event.type) {
    case "state_change":
      return { type: "state_change", state: event.to };
    case "match":
      return {
        type: "match",
        seq: event.seq,
        fragment: event.fragment,
        phraseId: event.phraseId,
        canonicalText: event.canonicalText,
      };
    case "no_match":
      return { type: "no_match", seq: event.seq, fragment: event.fragment };
    case "synthesis_error":
      return { type: "synthesis_error", seq: event.seq, phraseId: event.phraseId, message: event.message };
    case "session_stopped":
      return { type: "session_stopped", reason: event.reason, counters: event.counters };
    case "release_error":
      return null;
  }
}
