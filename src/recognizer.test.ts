import { describe, it, expect, vi, beforeEach } from "vitest";
import { LiveTranscriptionEvents } from "@deepgram/sdk";
import { LiveRecognizer, parseTranscriptEvent, type LiveTranscriptionClient } from "./recognizer.js";
import { RecognizerIOError } from "./errors.js";
import { silentLogger } from "./logger.js";
import { PhraseSession } from "./phrase-session.js";
import { LoggingSynthesizer } from "./tts-engine.js";

/**
 * Creates a mock Deepgram client with a controllable live connection.
 * Event handlers are captured so tests can simulate Deepgram events.
 */
function createMockDeepgramClient() {
  const eventHandlers: Record<string, Array<(data: unknown) => void>> = {};

  const liveClient = {
    on: vi.fn((event: string, handler: (data: unknown) => void) => {
      (eventHandlers[event] ??= []).push(handler);
    }),
    send: vi.fn(),
    requestClose: vi.fn(),
  };

  const client: LiveTranscriptionClient = {
    listen: {
      live: vi.fn(() => liveClient),
    },
  };

  function emit(event: string, data?: unknown) {
    for (const handler of eventHandlers[event] ?? []) {
      handler(data);
    }
  }

  return { client, liveClient, emit };
}

function transcriptEvent(transcript: string, flags: { is_final?: boolean; speech_final?: boolean } = {}) {
  return {
    type: "Results",
    is_final: flags.is_final ?? false,
    speech_final: flags.speech_final ?? false,
    channel: {
      alternatives: [{ transcript, confidence: 0.9, words: [] }],
    },
  };
}

// ─── parseTranscriptEvent ───────────────────────────────────────────────────────

describe("parseTranscriptEvent", () => {
  it("reads the first alternative and the finality flags", () => {
    expect(parseTranscriptEvent(transcriptEvent("cleared to land", { is_final: true }))).toEqual({
      transcript: "cleared to land",
      isFinal: true,
      speechFinal: false,
    });
  });

  it.each([
    ["null", null],
    ["no channel", { is_final: true }],
    ["no alternatives", { channel: { alternatives: [] } }],
    ["a non-string transcript", { channel: { alternatives: [{ transcript: 42 }] } }],
  ])("returns null for %s", (_label, data) => {
    expect(parseTranscriptEvent(data)).toBeNull();
  });
});

// ─── LiveRecognizer ─────────────────────────────────────────────────────────────

describe("LiveRecognizer", () => {
  let mock: ReturnType<typeof createMockDeepgramClient>;
  let recognizer: LiveRecognizer;

  beforeEach(() => {
    mock = createMockDeepgramClient();
    recognizer = new LiveRecognizer(mock.client, { logger: silentLogger });
  });

  describe("start", () => {
    it("opens a Deepgram connection with the audio format config", () => {
      recognizer.start();

      expect(mock.client.listen.live).toHaveBeenCalledWith(
        expect.objectContaining({
          model: "nova-2",
          language: "en",
          encoding: "linear16",
          sample_rate: 16000,
          channels: 1,
          interim_results: true,
          utterance_end_ms: 1000,
        }),
      );
    });

    it("passes configured model and sample rate through", () => {
      const custom = new LiveRecognizer(mock.client, {
        config: { model: "nova-2-atc", sampleRate: 8000 },
        logger: silentLogger,
      });
      custom.start();
      expect(mock.client.listen.live).toHaveBeenCalledWith(
        expect.objectContaining({ model: "nova-2-atc", sample_rate: 8000 }),
      );
    });

    it("registers handlers for the events it consumes", () => {
      recognizer.start();
      const events = mock.liveClient.on.mock.calls.map((call) => call[0]);
      expect(events).toEqual(
        expect.arrayContaining([
          LiveTranscriptionEvents.Open,
          LiveTranscriptionEvents.Transcript,
          LiveTranscriptionEvents.UtteranceEnd,
          LiveTranscriptionEvents.Error,
          LiveTranscriptionEvents.Close,
        ]),
      );
    });

    it("refuses to start twice", () => {
      recognizer.start();
      expect(() => recognizer.start()).toThrow("Live recognition already started. Call close() first.");
    });
  });

  describe("fragments", () => {
    it("emits one fragment per utterance from final results only", async () => {
      recognizer.start();
      mock.emit(LiveTranscriptionEvents.Transcript, transcriptEvent("you are"));
      mock.emit(LiveTranscriptionEvents.Transcript, transcriptEvent("you are clear", { is_final: true }));
      mock.emit(LiveTranscriptionEvents.Transcript, transcriptEvent(" to land now ", { is_final: true, speech_final: true }));

      const fragment = await recognizer.next();
      expect(fragment).toMatchObject({ text: "you are clear to land now", seq: 0, origin: "deepgram" });
    });

    it("flushes the utterance on UtteranceEnd", async () => {
      recognizer.start();
      mock.emit(LiveTranscriptionEvents.Transcript, transcriptEvent("say again", { is_final: true }));
      mock.emit(LiveTranscriptionEvents.UtteranceEnd, { type: "UtteranceEnd" });
      mock.emit(LiveTranscriptionEvents.UtteranceEnd, { type: "UtteranceEnd" });

      expect((await recognizer.next())?.text).toBe("say again");
      mock.emit(LiveTranscriptionEvents.Transcript, transcriptEvent("wilco", { is_final: true, speech_final: true }));
      expect(await recognizer.next()).toMatchObject({ text: "wilco", seq: 1 });
    });

    it("skips utterances with no final text", async () => {
      recognizer.start();
      mock.emit(LiveTranscriptionEvents.Transcript, transcriptEvent("", { is_final: true, speech_final: true }));
      mock.emit(LiveTranscriptionEvents.Transcript, transcriptEvent("roger", { is_final: true, speech_final: true }));
      expect(await recognizer.next()).toMatchObject({ text: "roger", seq: 0 });
    });

    it("ignores transcript events with an unexpected shape", async () => {
      recognizer.start();
      mock.emit(LiveTranscriptionEvents.Transcript, { type: "Metadata" });
      mock.emit(LiveTranscriptionEvents.Transcript, transcriptEvent("roger", { is_final: true, speech_final: true }));
      expect((await recognizer.next())?.text).toBe("roger");
    });
  });

  describe("audio", () => {
    it("forwards exactly the bytes of each chunk", () => {
      recognizer.start();
      const backing = Buffer.from([9, 9, 1, 2, 3, 4, 9, 9]);
      recognizer.feedAudio(backing.subarray(2, 6));

      const sent = mock.liveClient.send.mock.calls[0]?.[0];
      expect(sent).toBeInstanceOf(ArrayBuffer);
      expect(Buffer.from(sent)).toEqual(Buffer.from([1, 2, 3, 4]));
    });

    it("refuses audio before start", () => {
      expect(() => recognizer.feedAudio(Buffer.alloc(2))).toThrow("No open recognition connection. Call start() first.");
    });
  });

  describe("finish and failure", () => {
    it("delivers the pending utterance and ends after a requested close", async () => {
      recognizer.start();
      recognizer.finish();
      expect(mock.liveClient.requestClose).toHaveBeenCalledTimes(1);

      mock.emit(LiveTranscriptionEvents.Transcript, transcriptEvent("going around", { is_final: true }));
      mock.emit(LiveTranscriptionEvents.Close, {});

      expect((await recognizer.next())?.text).toBe("going around");
      expect(await recognizer.next()).toBeNull();
    });

    it("fails the stream when Deepgram reports an error", async () => {
      recognizer.start();
      mock.emit(LiveTranscriptionEvents.Error, new Error("401 Unauthorized"));

      const read = recognizer.next();
      await expect(read).rejects.toBeInstanceOf(RecognizerIOError);
      await expect(read).rejects.toThrow("Deepgram live transcription error: 401 Unauthorized");
    });

    it("closes the connection when Deepgram reports an error on an open socket", async () => {
      recognizer.start();
      mock.emit(LiveTranscriptionEvents.Error, new Error("Unable to parse message"));

      expect(mock.liveClient.requestClose).toHaveBeenCalledTimes(1);
      mock.emit(LiveTranscriptionEvents.Close, {});
      await expect(recognizer.next()).rejects.toThrow("Deepgram live transcription error: Unable to parse message");
      await recognizer.close();
      expect(mock.liveClient.requestClose).toHaveBeenCalledTimes(1);
    });

    it("releases the connection when a session stops on a recognizer error", async () => {
      recognizer.start();
      const session = new PhraseSession({
        table: { source: "test", phrases: [{ id: "roger", canonicalText: "Roger", variants: ["roger"] }] },
        source: recognizer,
        synthesizer: new LoggingSynthesizer(silentLogger),
        diagnostics: { report: () => {} },
      });

      const running = session.run();
      mock.emit(LiveTranscriptionEvents.Error, { message: "Unable to parse message" });
      const outcome = await running;

      expect(outcome.reason).toBe("recognizer_error");
      expect(mock.liveClient.requestClose).toHaveBeenCalledTimes(1);
    });

    it("fails the stream when the connection closes unexpectedly", async () => {
      recognizer.start();
      mock.emit(LiveTranscriptionEvents.Close, {});
      await expect(recognizer.next()).rejects.toThrow("Deepgram connection closed unexpectedly");
    });

    it("abort() fails the stream and closes the connection", async () => {
      recognizer.start();
      const error = new RecognizerIOError("stdin broke");
      recognizer.abort(error);
      await expect(recognizer.next()).rejects.toBe(error);
      expect(mock.liveClient.requestClose).toHaveBeenCalledTimes(1);
    });

    it("close() asks Deepgram to close and cannot be restarted", async () => {
      recognizer.start();
      await recognizer.close();
      expect(mock.liveClient.requestClose).toHaveBeenCalledTimes(1);
      expect(await recognizer.next()).toBeNull();
      expect(() => recognizer.start()).toThrow("LiveRecognizer has been closed and cannot be restarted.");
    });
  });
});
