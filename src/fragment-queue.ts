/**
 * Unbounded FIFO between a push-driven producer (recognizer callback,
 * WebSocket handler, line reader) and the single session consumer.
 *
 * Fragments are never dropped or reordered. A producer failure is delivered
 * to the consumer only after every fragment buffered before it.
 */

import { RecognizerIOError } from "./errors.js";
import type { Deferred, FragmentOrigin, FragmentSource, RecognitionFragment } from "./types.js";
import { createDeferred } from "./utils/deferred.js";

interface PendingRead {
  deferred: Deferred<RecognitionFragment | null>;
  detach: () => void;
}

export class FragmentQueue implements FragmentSource {
  private buffer: RecognitionFragment[] = [];
  private pending: PendingRead | null = null;
  private ended = false;
  private released = false;
  private failure: RecognizerIOError | null = null;
  private seq = 0;
  private readonly origin: FragmentOrigin;
  private readonly onClose: (() => Promise<void> | void) | null;

  /**
   * @param onClose  Release hook for whatever feeds the queue; runs once on close().
   */
  constructor(origin: FragmentOrigin, onClose?: () => Promise<void> | void) {
    this.origin = origin;
    this.onClose = onClose ?? null;
  }

  /** Append a fragment. Throws once the queue has ended or failed. */
  push(text: string): RecognitionFragment {
    if (this.ended || this.failure) {
      throw new Error("FragmentQueue is closed; no more fragments are accepted.");
    }

    const fragment: RecognitionFragment = {
      text,
      seq: this.seq++,
      receivedAt: new Date(),
      origin: this.origin,
    };

    if (this.pending) {
      this.settle((d) => d.resolve(fragment));
    } else {
      this.buffer.push(fragment);
    }
    return fragment;
  }

  /** No more fragments will arrive. Buffered fragments are still delivered. */
  end(): void {
    if (this.ended || this.failure) return;
    this.ended = true;
    if (this.pending && this.buffer.length === 0) {
      this.settle((d) => d.resolve(null));
    }
  }

  /** Fragment acquisition failed. First failure wins. */
  fail(error: RecognizerIOError): void {
    if (this.ended || this.failure) return;
    this.failure = error;
    if (this.pending && this.buffer.length === 0) {
      this.settle((d) => d.reject(error));
    }
  }

  next(signal?: AbortSignal): Promise<RecognitionFragment | null> {
    if (this.pending) {
      return Promise.reject(new Error("FragmentQueue.next() is already awaiting a fragment."));
    }
    if (signal?.aborted) {
      return Promise.resolve(null);
    }

    const buffered = this.buffer.shift();
    if (buffered) return Promise.resolve(buffered);
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve(null);

    const deferred = createDeferred<RecognitionFragment | null>();
    const onAbort = () => this.settle((d) => d.resolve(null));
    signal?.addEventListener("abort", onAbort, { once: true });
    this.pending = {
      deferred,
      detach: () => signal?.removeEventListener("abort", onAbort),
    };
    return deferred.promise;
  }

  async close(): Promise<void> {
    this.end();
    this.buffer = [];
    if (this.pending) {
      this.settle((d) => d.resolve(null));
    }
    if (this.released) return;
    this.released = true;
    if (this.onClose) {
      await this.onClose();
    }
  }

  /** Fragments buffered and not yet handed out. */
  get size(): number {
    return this.buffer.length;
  }

  /** Fragments accepted so far (the next fragment's seq). */
  get received(): number {
    return this.seq;
  }

  get closed(): boolean {
    return this.ended || this.failure !== null;
  }

  private settle(action: (deferred: Deferred<RecognitionFragment | null>) => void): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    pending.detach();
    action(pending.deferred);
  }
}
