import { describe, it, expect } from "vitest";
import { PassThrough } from "node:stream";
import { TextFragmentSource } from "./text-fragment-source.js";
import { RecognizerIOError } from "./errors.js";

describe("TextFragmentSource", () => {
  it("yields one fragment per non-blank line, then ends", async () => {
    const input = new PassThrough();
    const source = new TextFragmentSource(input);
    source.start();

    input.end("you are clear to land now\n\n   \r\nsay again\r\nwilco");

    expect(await source.next()).toMatchObject({ text: "you are clear to land now", seq: 0, origin: "text" });
    expect(await source.next()).toMatchObject({ text: "say again", seq: 1 });
    expect(await source.next()).toMatchObject({ text: "wilco", seq: 2 });
    expect(await source.next()).toBeNull();
  });

  it("waits for lines that have not arrived yet", async () => {
    const input = new PassThrough();
    const source = new TextFragmentSource(input);
    source.start();

    const pending = source.next();
    input.write("roger\n");
    await expect(pending).resolves.toMatchObject({ text: "roger" });

    await source.close();
  });

  it("fails with RecognizerIOError when the input errors", async () => {
    const input = new PassThrough();
    const source = new TextFragmentSource(input);
    source.start();

    const pending = source.next();
    input.destroy(new Error("EPIPE"));

    await expect(pending).rejects.toBeInstanceOf(RecognizerIOError);
    await source.close();
  });

  it("stops reading on close", async () => {
    const input = new PassThrough();
    const source = new TextFragmentSource(input);
    source.start();

    await source.close();
    input.write("late\n");
    expect(await source.next()).toBeNull();
  });

  it("refuses to start twice", () => {
    const source = new TextFragmentSource(new PassThrough());
    source.start();
    expect(() => source.start()).toThrow("TextFragmentSource already started.");
  });
});
