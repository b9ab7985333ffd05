// ATC Phrase Relay - Text fragment source
// One fragment per non-blank input line. Used to replay recognizer
// transcripts through the matcher (audits, table tuning) and for dry runs.

import { createInterface, type Interface } from "node:readline";
import type { Readable } from "node:stream";
import { RecognizerIOError, describeError } from "./errors.js";
import { FragmentQueue } from "./fragment-queue.js";
import type { FragmentSource, RecognitionFragment } from "./types.js";

export class TextFragmentSource implements FragmentSource {
  private readonly input: Readable;
  private readonly queue: FragmentQueue;
  private reader: Interface | null = null;

  constructor(input: Readable) {
    this.input = input;
    this.queue = new FragmentQueue("text", () => this.stop());
  }

  /** Begin reading lines. Call once. */
  start(): void {
    if (this.reader) {
      throw new Error("TextFragmentSource already started.");
    }

    const onError = (err: unknown) => {
      this.queue.fail(
        new RecognizerIOError(`Reading fragments failed: ${describeError(err)}`, { cause: err }),
      );
    };
    this.input.once("error", onError);

    const reader = createInterface({ input: this.input, crlfDelay: Infinity });
    this.reader = reader;
    // readline re-emits input errors on the interface.
    reader.on("error", onError);

    reader.on("line", (line: string) => {
      if (line.trim().length === 0 || this.queue.closed) return;
      this.queue.push(line);
    });

    reader.once("close", () => {
      this.queue.end();
    });
  }

  next(signal?: AbortSignal): Promise<RecognitionFragment | null> {
    return this.queue.next(signal);
  }

  close(): Promise<void> {
    return this.queue.close();
  }

  private stop(): void {
    const reader = this.reader;
    this.reader = null;
    reader?.close();
  }
}
