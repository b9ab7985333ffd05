// ATC Phrase Relay - Shared TypeScript interfaces and types
// Runtime code lives in its own modules; this file only carries types and the
// session state enum.

import type { RecognizerIOError, SynthesisError } from "./errors.js";

// ─── Result ─────────────────────────────────────────────────────────────────────

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

// ─── Mapping Table ──────────────────────────────────────────────────────────────

export interface CanonicalPhrase {
  readonly id: string;
  /** Exact text handed to the synthesizer when this phrase is selected. */
  readonly canonicalText: string;
  /** Alternate phrasings, in precedence order. Never empty. */
  readonly variants: readonly string[];
}

export interface MappingTable {
  /** Phrases in precedence order: earlier entries win ties. */
  readonly phrases: readonly CanonicalPhrase[];
  /** Where the table was loaded from (file path or label), for messages. */
  readonly source: string;
}

export type MappingTableWarning =
  | {
      kind: "short_variant";
      phraseId: string;
      variant: string;
    }
  | {
      kind: "shadowed_variant";
      phraseId: string;
      variant: string;
      /** Earlier phrase that captures the variant when it is spoken exactly. */
      capturedBy: string;
    };

export interface LoadedMappingTable {
  table: MappingTable;
  warnings: MappingTableWarning[];
}

// ─── Recognition ────────────────────────────────────────────────────────────────

export type FragmentOrigin = "deepgram" | "text" | "websocket";

export interface RecognitionFragment {
  text: string;
  /** 0-based arrival index within the session. */
  seq: number;
  receivedAt: Date;
  origin: FragmentOrigin;
}

/**
 * Anything the session loop can pull fragments from.
 * `next()` resolves null once the source has ended or the wait was aborted,
 * and rejects with a RecognizerIOError when fragment acquisition fails.
 */
export interface FragmentSource {
  next(signal?: AbortSignal): Promise<RecognitionFragment | null>;
  close(): Promise<void>;
}

// ─── Matching ───────────────────────────────────────────────────────────────────

export type MatchResult =
  | {
      kind: "matched";
      phraseId: string;
      canonicalText: string;
      /** The variant (as authored) that satisfied containment. */
      variant: string;
    }
  | { kind: "no_match" };

// ─── Synthesis ──────────────────────────────────────────────────────────────────

export interface Synthesizer {
  speak(text: string, phraseId?: string): Promise<Result<void, SynthesisError>>;
  close(): Promise<void>;
}

export type AudioFormat = "wav" | "mp3" | "opus" | "aac" | "flac" | "pcm";

export interface AudioChunkMeta {
  text: string;
  /** Id of the phrase being spoken; null when the text came from elsewhere. */
  phraseId: string | null;
  format: AudioFormat;
}

export interface AudioSink {
  write(audio: Buffer, meta: AudioChunkMeta): Promise<void>;
  close(): Promise<void>;
}

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum SessionState {
  IDLE = "idle",
  LISTENING = "listening",
  MATCHING = "matching",
  DISPATCHING = "dispatching",
  STOPPED = "stopped",
}

export type StopReason = "cancelled" | "input_ended" | "recognizer_error";

export interface SessionCounters {
  fragments: number;
  matched: number;
  unmatched: number;
  synthesisFailures: number;
}

export interface SessionOutcome {
  sessionId: string;
  reason: StopReason;
  counters: SessionCounters;
  /** Present when reason is "recognizer_error". */
  error?: RecognizerIOError;
}

// ─── Diagnostics ────────────────────────────────────────────────────────────────

interface DiagnosticBase {
  sessionId: string;
  /** ISO-8601 timestamp. */
  at: string;
}

export type DiagnosticEvent =
  | (DiagnosticBase & { type: "state_change"; from: SessionState; to: SessionState })
  | (DiagnosticBase & {
      type: "match";
      seq: number;
      fragment: string;
      phraseId: string;
      canonicalText: string;
      variant: string;
    })
  | (DiagnosticBase & { type: "no_match"; seq: number; fragment: string })
  | (DiagnosticBase & { type: "synthesis_error"; seq: number; phraseId: string; message: string })
  | (DiagnosticBase & { type: "release_error"; resource: "source" | "synthesizer"; message: string })
  | (DiagnosticBase & {
      type: "session_stopped";
      reason: StopReason;
      counters: SessionCounters;
      error?: string;
    });

export interface DiagnosticsSink {
  report(event: DiagnosticEvent): void;
}

// ─── Configuration ──────────────────────────────────────────────────────────────

export type InputMode = "audio" | "text";
export type OutputMode = "stdout" | "files";

export interface RecognizerConfig {
  model: string;
  language: string;
  sampleRate: number;
}

export interface TTSConfig {
  model: string;
  /** Voice preference; matched case-insensitively against available voice names. */
  voice: string | null;
  format: AudioFormat;
}

export interface RelayConfig {
  /** Absolute path to the phrase mapping document. */
  mappingsPath: string;
  recognizer: RecognizerConfig;
  tts: TTSConfig;
  output: {
    mode: OutputMode;
    /** Absolute path. */
    directory: string;
  };
  /** Absolute path of the JSONL audit log, or null when disabled. */
  auditLogPath: string | null;
  server: {
    port: number;
  };
  /** Path of the config file the values came from. */
  configPath: string;
}

export interface RelayCredentials {
  deepgramApiKey: string | null;
  openaiApiKey: string | null;
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

export type ClientMessage =
  | { type: "fragment"; text: string }
  | { type: "stop" };

export type ServerMessage =
  | { type: "ready"; sessionId: string; inputMode: InputMode }
  | { type: "state_change"; state: SessionState }
  | { type: "match"; seq: number; fragment: string; phraseId: string; canonicalText: string }
  | { type: "no_match"; seq: number; fragment: string }
  | { type: "synthesis_error"; seq: number; phraseId: string; message: string }
  | { type: "session_stopped"; reason: StopReason; counters: SessionCounters }
  | { type: "error"; message: string; recoverable: boolean };
