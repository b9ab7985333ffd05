// ATC Phrase Relay - Live Recognizer
// Streams PCM audio to Deepgram live transcription and turns each finished
// utterance into one RecognitionFragment.
//
// Audio format contract: mono LINEAR16, 16 kHz unless configured otherwise.
//
// Deepgram sends interim results, final results for stretches of audio, and a
// speech_final / UtteranceEnd marker when the speaker pauses. Only final text is
// kept; it is joined and emitted as one fragment at the utterance boundary.
//
// A connection error or an unexpected close fails the fragment stream with a
// RecognizerIOError; there is no reconnect.

import type { LiveSchema } from "@deepgram/sdk";
import { LiveTranscriptionEvents } from "@deepgram/sdk";
import { z } from "zod";
import { RecognizerIOError, describeError } from "./errors.js";
import { FragmentQueue } from "./fragment-queue.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { FragmentSource, RecognitionFragment, RecognizerConfig } from "./types.js";

// ─── Deepgram client interface (for testability / dependency injection) ─────────

/**
 * The part of a Deepgram ListenLiveClient we use. The SDK's client satisfies
 * it structurally; tests pass a plain object.
 */
export interface LiveConnection {
  on(event: string, listener: (data: unknown) => void): unknown;
  send(data: ArrayBufferLike): void;
  requestClose(): void;
}

export interface LiveTranscriptionClient {
  listen: {
    live(options: LiveSchema): LiveConnection;
  };
}

export const DEFAULT_RECOGNIZER_CONFIG: RecognizerConfig = {
  model: "nova-2",
  language: "en",
  sampleRate: 16000,
};

function buildLiveSchema(config: RecognizerConfig): LiveSchema {
  return {
    model: config.model,
    language: config.language,
    encoding: "linear16",
    sample_rate: config.sampleRate,
    channels: 1,
    interim_results: true,
    punctuate: false,
    smart_format: false,
    endpointing: 300,
    utterance_end_ms: 1000,
  };
}

// ─── Transcript event parsing ───────────────────────────────────────────────────

interface TranscriptResult {
  transcript: string;
  isFinal: boolean;
  speechFinal: boolean;
}

const TranscriptEventSchema = z.object({
  channel: z.object({
    alternatives: z.array(z.object({ transcript: z.string() })).nonempty(),
  }),
  is_final: z.boolean().optional(),
  speech_final: z.boolean().optional(),
});

/**
 * Pull the first alternative's transcript and the finality flags out of a
 * Deepgram "Results" event. Returns null for shapes we do not recognize.
 */
export function parseTranscriptEvent(data: unknown): TranscriptResult | null {
  const parsed = TranscriptEventSchema.safeParse(data);
  if (!parsed.success) return null;

  return {
    transcript: parsed.data.channel.alternatives[0].transcript,
    isFinal: parsed.data.is_final === true,
    speechFinal: parsed.data.speech_final === true,
  };
}

// ─── LiveRecognizer ─────────────────────────────────────────────────────────────

export interface LiveRecognizerOptions {
  config?: Partial<RecognizerConfig>;
  logger?: Logger;
}

export class LiveRecognizer implements FragmentSource {
  private readonly client: LiveTranscriptionClient;
  private readonly config: RecognizerConfig;
  private readonly logger: Logger;
  private readonly queue: FragmentQueue;
  private connection: LiveConnection | null = null;
  private utterance: string[] = [];
  private finishing = false;

  constructor(client: LiveTranscriptionClient, options: LiveRecognizerOptions = {}) {
    this.client = client;
    this.config = { ...DEFAULT_RECOGNIZER_CONFIG, ...options.config };
    this.logger = options.logger ?? createConsoleLogger("LiveRecognizer");
    this.queue = new FragmentQueue("deepgram", () => this.stop());
  }

  /**
   * Open the Deepgram connection.
   * @throws Error if a connection is already open or the recognizer was closed.
   */
  start(): void {
    if (this.connection) {
      throw new Error("Live recognition already started. Call close() first.");
    }
    if (this.queue.closed) {
      throw new Error("LiveRecognizer has been closed and cannot be restarted.");
    }

    const connection = this.client.listen.live(buildLiveSchema(this.config));
    this.connection = connection;

    connection.on(LiveTranscriptionEvents.Open, () => {
      this.logger.info(`Deepgram connection open (model ${this.config.model}, ${this.config.sampleRate} Hz)`);
    });

    connection.on(LiveTranscriptionEvents.Transcript, (data: unknown) => {
      this.handleTranscript(data);
    });

    connection.on(LiveTranscriptionEvents.UtteranceEnd, () => {
      this.flushUtterance();
    });

    // Some errors (an unparseable message) leave the socket open.
    connection.on(LiveTranscriptionEvents.Error, (error: unknown) => {
      this.queue.fail(
        new RecognizerIOError(`Deepgram live transcription error: ${describeError(error)}`, { cause: error }),
      );
      this.stop();
    });

    connection.on(LiveTranscriptionEvents.Close, () => {
      const expected = this.finishing;
      this.connection = null;
      if (expected) {
        this.flushUtterance();
        this.queue.end();
        return;
      }
      this.queue.fail(new RecognizerIOError("Deepgram connection closed unexpectedly"));
    });
  }

  /**
   * Forward one PCM frame to Deepgram.
   * @throws Error if the connection is not open.
   */
  feedAudio(chunk: Buffer): void {
    if (!this.connection || this.finishing) {
      throw new Error("No open recognition connection. Call start() first.");
    }
    this.connection.send(chunk.buffer.slice(chunk.byteOffset, chunk.byteOffset + chunk.byteLength));
  }

  /**
   * The audio input has ended: ask Deepgram to finish and close. Fragments for
   * audio already sent are still delivered, then the stream ends.
   */
  finish(): void {
    if (!this.connection || this.finishing) {
      this.queue.end();
      return;
    }
    this.finishing = true;
    this.connection.requestClose();
  }

  /** The audio input failed; the fragment stream fails with it. */
  abort(error: RecognizerIOError): void {
    this.queue.fail(error);
    this.stop();
  }

  next(signal?: AbortSignal): Promise<RecognitionFragment | null> {
    return this.queue.next(signal);
  }

  close(): Promise<void> {
    return this.queue.close();
  }

  private stop(): void {
    const connection = this.connection;
    if (!connection) return;
    this.connection = null;
    this.finishing = true;
    try {
      connection.requestClose();
    } catch (err) {
      this.logger.warn(`Deepgram close request failed: ${describeError(err)}`);
    }
  }

  private handleTranscript(data: unknown): void {
    const result = parseTranscriptEvent(data);
    if (!result) {
      this.logger.warn("Ignoring transcript event with unexpected shape");
      return;
    }

    if (result.isFinal) {
      const text = result.transcript.trim();
      if (text.length > 0) {
        this.utterance.push(text);
      }
    }

    if (result.speechFinal) {
      this.flushUtterance();
    }
  }

  private flushUtterance(): void {
    if (this.utterance.length === 0 || this.queue.closed) {
      this.utterance = [];
      return;
    }
    const text = this.utterance.join(" ");
    this.utterance = [];
    this.queue.push(text);
  }
}
