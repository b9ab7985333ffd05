// ATC Phrase Relay - PCM input framing
// Re-chunks a raw PCM byte stream (stdin, a pipe from a capture tool) into
// fixed-size frames for the recognizer. Nothing here touches audio devices.

import type { Readable } from "node:stream";

/** 4096 samples of 16-bit mono PCM. */
export const DEFAULT_FRAME_BYTES = 8192;

export interface AudioFrameTarget {
  feedAudio(chunk: Buffer): void;
}

/**
 * Accumulates arbitrary-sized chunks and emits exact `frameBytes` frames.
 */
export class PcmFramer {
  private readonly frameBytes: number;
  private pending: Buffer = Buffer.alloc(0);

  constructor(frameBytes: number = DEFAULT_FRAME_BYTES) {
    if (!Number.isInteger(frameBytes) || frameBytes <= 0 || frameBytes % 2 !== 0) {
      throw new Error(`Frame size must be a positive even number of bytes, got ${frameBytes}`);
    }
    this.frameBytes = frameBytes;
  }

  /** Returns every complete frame available after appending `chunk`. */
  push(chunk: Buffer): Buffer[] {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    const frames: Buffer[] = [];
    while (this.pending.length >= this.frameBytes) {
      frames.push(this.pending.subarray(0, this.frameBytes));
      this.pending = this.pending.subarray(this.frameBytes);
    }
    return frames;
  }

  /** The trailing partial frame, if any. Resets the framer. */
  flush(): Buffer | null {
    if (this.pending.length === 0) return null;
    const rest = this.pending;
    this.pending = Buffer.alloc(0);
    return rest;
  }

  get buffered(): number {
    return this.pending.length;
  }
}

/**
 * Feed `input` to `target` in fixed-size frames until the stream ends.
 * The trailing partial frame is sent on end. Rejects if the stream errors.
 */
export async function pipeAudio(
  input: Readable,
  target: AudioFrameTarget,
  frameBytes: number = DEFAULT_FRAME_BYTES,
): Promise<void> {
  const framer = new PcmFramer(frameBytes);
  for await (const chunk of input) {
    const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), "binary");
    for (const frame of framer.push(bytes)) {
      target.feedAudio(frame);
    }
  }
  const rest = framer.flush();
  if (rest) {
    target.feedAudio(rest);
  }
}
