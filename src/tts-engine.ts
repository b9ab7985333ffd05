// ATC Phrase Relay - TTS Engine
// Speaks canonical phrases through the OpenAI speech API and hands the audio to
// an AudioSink.
//
// The vocabulary is fixed, so synthesized audio is cached per phrase text: each
// canonical phrase costs one API call per process.
//
// Failures are returned as SynthesisError results, never thrown; the session
// reports them and keeps listening.

import { SynthesisError, describeError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { AudioSink, Result, Synthesizer, TTSConfig } from "./types.js";

// ─── Voices ─────────────────────────────────────────────────────────────────────

export const OPENAI_VOICES = ["alloy", "echo", "fable", "onyx", "nova", "shimmer"] as const;

export type OpenAIVoice = (typeof OPENAI_VOICES)[number];

export const DEFAULT_VOICE: OpenAIVoice = "nova";

/**
 * Pick the first available voice whose name contains the preference
 * (case-insensitive). No preference, or no match, falls back to DEFAULT_VOICE.
 */
export function selectVoice(
  preference: string | null,
  available: readonly OpenAIVoice[] = OPENAI_VOICES,
): { voice: OpenAIVoice; matched: boolean } {
  const wanted = preference?.trim().toLowerCase() ?? "";
  if (wanted.length > 0) {
    const found = available.find((voice) => voice.toLowerCase().includes(wanted));
    if (found) return { voice: found, matched: true };
  }
  return { voice: DEFAULT_VOICE, matched: false };
}

// ─── Defaults ───────────────────────────────────────────────────────────────────

const DEFAULT_TTS_CONFIG: TTSConfig = {
  model: "tts-1",
  voice: null,
  format: "wav",
};

// ─── OpenAI TTS client interface (for testability / dependency injection) ────────

/**
 * Minimal interface for the OpenAI audio speech API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAITTSClient {
  audio: {
    speech: {
      create(params: {
        model: string;
        voice: OpenAIVoice;
        input: string;
        response_format?: TTSConfig["format"];
      }): Promise<{ arrayBuffer(): Promise<ArrayBuffer> }>;
    };
  };
}

// ─── TTSEngine ──────────────────────────────────────────────────────────────────

export interface TTSEngineOptions {
  config?: Partial<TTSConfig>;
  /** Keep synthesized audio per phrase text. Default true. */
  cacheAudio?: boolean;
  /** Cache to use, e.g. one shared by the engines of several connections. */
  cache?: Map<string, Buffer>;
  logger?: Logger;
}

export class TTSEngine implements Synthesizer {
  private readonly openai: OpenAITTSClient;
  private readonly sink: AudioSink;
  private readonly config: TTSConfig;
  private readonly cacheAudio: boolean;
  private readonly cache: Map<string, Buffer>;
  private readonly logger: Logger;
  readonly voice: OpenAIVoice;

  constructor(openaiClient: OpenAITTSClient, sink: AudioSink, options: TTSEngineOptions = {}) {
    this.openai = openaiClient;
    this.sink = sink;
    this.config = { ...DEFAULT_TTS_CONFIG, ...options.config };
    this.cacheAudio = options.cacheAudio ?? true;
    this.cache = options.cache ?? new Map();
    this.logger = options.logger ?? createConsoleLogger("TTSEngine");

    const { voice, matched } = selectVoice(this.config.voice);
    if (this.config.voice && !matched) {
      this.logger.warn(`No voice matches "${this.config.voice}"; using "${voice}"`);
    }
    this.voice = voice;
  }

  /**
   * Audio for `text`, from the cache when available.
   * @throws whatever the OpenAI client throws.
   */
  async synthesize(text: string): Promise<Buffer> {
    const cached = this.cache.get(text);
    if (cached) return cached;

    const response = await this.openai.audio.speech.create({
      model: this.config.model,
      voice: this.voice,
      input: text,
      response_format: this.config.format,
    });

    const audio = Buffer.from(await response.arrayBuffer());
    if (this.cacheAudio) {
      this.cache.set(text, audio);
    }
    return audio;
  }

  async speak(text: string, phraseId?: string): Promise<Result<void, SynthesisError>> {
    if (text.trim().length === 0) {
      return { ok: false, error: new SynthesisError("Refusing to speak empty text", text) };
    }

    let audio: Buffer;
    try {
      audio = await this.synthesize(text);
    } catch (err) {
      return {
        ok: false,
        error: new SynthesisError(`Speech synthesis failed for "${text}": ${describeError(err)}`, text, { cause: err }),
      };
    }

    try {
      await this.sink.write(audio, { text, phraseId: phraseId ?? null, format: this.config.format });
    } catch (err) {
      return {
        ok: false,
        error: new SynthesisError(`Audio output failed for "${text}": ${describeError(err)}`, text, { cause: err }),
      };
    }

    this.logger.info(`Spoke: ${text}`);
    return { ok: true, value: undefined };
  }

  close(): Promise<void> {
    return this.sink.close();
  }

  /** Number of phrases with cached audio. */
  get cachedPhrases(): number {
    return this.cache.size;
  }
}

// ─── Dry run ────────────────────────────────────────────────────────────────────

/**
 * Synthesizer stand-in for dry runs: logs the phrase it would speak.
 */
export class LoggingSynthesizer implements Synthesizer {
  private readonly logger: Logger;
  readonly spoken: string[] = [];

  constructor(logger: Logger = createConsoleLogger("DryRun")) {
    this.logger = logger;
  }

  async speak(text: string): Promise<Result<void, SynthesisError>> {
    this.spoken.push(text);
    this.logger.info(`Would speak: ${text}`);
    return { ok: true, value: undefined };
  }

  async close(): Promise<void> {
    this.logger.info(`Dry run complete, ${this.spoken.length} phrase(s) selected`);
  }
}
