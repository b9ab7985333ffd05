// ATC Phrase Relay - Audio sinks
// Where synthesized phrase audio goes. Device selection is left to whatever
// reads the stream (e.g. a player routed to a virtual microphone) or the files.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Writable } from "node:stream";
import { derivePhraseId } from "./mapping-table.js";
import type { AudioChunkMeta, AudioSink } from "./types.js";

/**
 * Formats a sequence number and phrase id into an output filename:
 *   0007-landing_clearance.wav
 * Audio without a phrase id is named after a slug of its text.
 */
export function formatAudioFilename(seq: number, meta: AudioChunkMeta): string {
  const name = meta.phraseId ?? (derivePhraseId(meta.text) || "phrase");
  return `${String(seq).padStart(4, "0")}-${name}.${meta.format}`;
}

/**
 * Writes each phrase to its own numbered file under `directory`.
 * The directory is created on first write.
 */
export class FileAudioSink implements AudioSink {
  private readonly directory: string;
  private seq = 0;
  private prepared = false;

  constructor(directory: string) {
    this.directory = directory;
  }

  /** Paths written so far, in order. */
  readonly written: string[] = [];

  async write(audio: Buffer, meta: AudioChunkMeta): Promise<void> {
    if (!this.prepared) {
      await mkdir(this.directory, { recursive: true });
      this.prepared = true;
    }
    this.seq++;
    const filePath = join(this.directory, formatAudioFilename(this.seq, meta));
    await writeFile(filePath, audio);
    this.written.push(filePath);
  }

  async close(): Promise<void> {
    // Each write is complete on its own.
  }
}

export interface StreamAudioSinkOptions {
  /** End the stream on close(). Off for process.stdout. */
  endOnClose?: boolean;
}

/**
 * Writes raw audio bytes, phrase after phrase, to a writable stream.
 */
export class StreamAudioSink implements AudioSink {
  private readonly stream: Writable;
  private readonly endOnClose: boolean;

  constructor(stream: Writable, options: StreamAudioSinkOptions = {}) {
    this.stream = stream;
    this.endOnClose = options.endOnClose ?? false;
  }

  write(audio: Buffer, _meta: AudioChunkMeta): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(audio, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close(): Promise<void> {
    if (!this.endOnClose || this.stream.writableEnded) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.stream.end(() => resolve());
    });
  }
}
