import { describe, it, expect, vi } from "vitest";
import { FragmentQueue } from "./fragment-queue.js";
import { RecognizerIOError } from "./errors.js";

describe("FragmentQueue", () => {
  it("delivers buffered fragments in arrival order with sequence numbers", async () => {
    const queue = new FragmentQueue("text");
    queue.push("first");
    queue.push("second");

    const a = await queue.next();
    const b = await queue.next();
    expect([a?.text, a?.seq, a?.origin]).toEqual(["first", 0, "text"]);
    expect([b?.text, b?.seq]).toEqual(["second", 1]);
    expect(queue.received).toBe(2);
    expect(queue.size).toBe(0);
  });

  it("resolves a waiting read when a fragment is pushed", async () => {
    const queue = new FragmentQueue("websocket");
    const pending = queue.next();
    queue.push("roger");
    await expect(pending).resolves.toMatchObject({ text: "roger", seq: 0, origin: "websocket" });
  });

  it("rejects a second concurrent read", async () => {
    const queue = new FragmentQueue("text");
    void queue.next();
    await expect(queue.next()).rejects.toThrow("FragmentQueue.next() is already awaiting a fragment.");
    await queue.close();
  });

  it("drains buffered fragments before reporting the end", async () => {
    const queue = new FragmentQueue("text");
    queue.push("one");
    queue.end();

    expect((await queue.next())?.text).toBe("one");
    expect(await queue.next()).toBeNull();
    expect(await queue.next()).toBeNull();
  });

  it("resolves a waiting read with null on end", async () => {
    const queue = new FragmentQueue("text");
    const pending = queue.next();
    queue.end();
    await expect(pending).resolves.toBeNull();
  });

  it("refuses pushes after end", () => {
    const queue = new FragmentQueue("text");
    queue.end();
    expect(queue.closed).toBe(true);
    expect(() => queue.push("late")).toThrow("FragmentQueue is closed; no more fragments are accepted.");
  });

  it("delivers a failure after the fragments buffered before it", async () => {
    const queue = new FragmentQueue("deepgram");
    const failure = new RecognizerIOError("socket dropped");
    queue.push("cleared to land");
    queue.fail(failure);
    queue.fail(new RecognizerIOError("second failure"));

    expect((await queue.next())?.text).toBe("cleared to land");
    await expect(queue.next()).rejects.toBe(failure);
  });

  it("rejects a waiting read on failure", async () => {
    const queue = new FragmentQueue("deepgram");
    const pending = queue.next();
    const failure = new RecognizerIOError("socket dropped");
    queue.fail(failure);
    await expect(pending).rejects.toBe(failure);
  });

  it("ignores a failure after end", async () => {
    const queue = new FragmentQueue("deepgram");
    queue.end();
    queue.fail(new RecognizerIOError("too late"));
    expect(await queue.next()).toBeNull();
  });

  it("resolves null when the signal aborts a waiting read", async () => {
    const queue = new FragmentQueue("text");
    const controller = new AbortController();
    const pending = queue.next(controller.signal);
    controller.abort();
    await expect(pending).resolves.toBeNull();

    // The queue is still usable afterwards.
    queue.push("after");
    expect((await queue.next())?.text).toBe("after");
  });

  it("returns null immediately for an already-aborted signal", async () => {
    const queue = new FragmentQueue("text");
    queue.push("buffered");
    const controller = new AbortController();
    controller.abort();
    expect(await queue.next(controller.signal)).toBeNull();
    expect(queue.size).toBe(1);
  });

  it("close() discards buffered fragments, settles the reader and runs the release hook once", async () => {
    const onClose = vi.fn();
    const queue = new FragmentQueue("text", onClose);
    const pending = queue.next();

    await queue.close();
    await queue.close();

    await expect(pending).resolves.toBeNull();
    expect(await queue.next()).toBeNull();
    expect(onClose).toHaveBeenCalledTimes(1);
  });

  it("close() after a failure still runs the release hook", async () => {
    const onClose = vi.fn();
    const queue = new FragmentQueue("deepgram", onClose);
    queue.fail(new RecognizerIOError("gone"));
    await queue.close();
    expect(onClose).toHaveBeenCalledTimes(1);
  });
});
