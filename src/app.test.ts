// Unit tests for the application entry
// Tests: exit codes, fatal startup errors, --help and --check, stdin text sessions

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PassThrough, Readable } from "node:stream";
import { APP_NAME, APP_VERSION, exitCodeFor, runCli } from "./app.js";
import { USAGE } from "./cli-args.js";
import type { SessionOutcome } from "./types.js";

const counters = { fragments: 0, matched: 0, unmatched: 0, synthesisFailures: 0 };

function outcome(reason: SessionOutcome["reason"]): SessionOutcome {
  return { sessionId: "session-1", reason, counters };
}

describe("Project setup", () => {
  it("should export app name", () => {
    expect(APP_NAME).toBe("ATC Phrase Relay");
  });

  it("should export app version", () => {
    expect(APP_VERSION).toBe("0.1.0");
  });
});

describe("exitCodeFor", () => {
  it("fails the process only on a recognizer error", () => {
    expect(exitCodeFor(outcome("recognizer_error"))).toBe(1);
    expect(exitCodeFor(outcome("cancelled"))).toBe(0);
    expect(exitCodeFor(outcome("input_ended"))).toBe(0);
  });
});

describe("runCli", () => {
  let dir: string;
  let configPath: string;
  let logLines: string[];
  let errorLines: string[];

  const fatalLines = () => errorLines.filter((line) => line.startsWith("[FATAL] "));
  const io = (stdin: Readable) => ({ stdin, stdout: new PassThrough() });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "relay-cli-"));
    configPath = join(dir, "relay.json");
    await writeFile(
      join(dir, "phrases.json"),
      JSON.stringify({
        mappings: [
          { id: "landing_clearance", canonical: "Cleared to land runway two seven", variants: ["clear to land"] },
          { id: "go_around", canonical: "Going around", variants: ["go around"] },
        ],
      }),
    );
    await writeFile(configPath, JSON.stringify({ mappingsPath: "phrases.json" }));

    logLines = [];
    errorLines = [];
    vi.spyOn(console, "log").mockImplementation((line: unknown) => {
      logLines.push(String(line));
    });
    vi.spyOn(console, "error").mockImplementation((line: unknown) => {
      errorLines.push(String(line));
    });
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("prints usage for --help", async () => {
    expect(await runCli(["--help"], {})).toBe(0);
    expect(logLines).toEqual([USAGE]);
  });

  it("fails with a [FATAL] line naming a config file that cannot be read", async () => {
    const missing = join(dir, "missing.json");

    expect(await runCli(["--config", missing], {})).toBe(1);

    expect(fatalLines()).toHaveLength(1);
    expect(fatalLines()[0]).toContain(`] Config file could not be read: ${missing} (`);
  });

  it("fails with usage on an unknown flag", async () => {
    expect(await runCli(["--speak"], {})).toBe(1);
    expect(fatalLines()[0]).toContain("Usage: atc-phrase-relay [options]");
  });

  it("fails when the OpenAI key is missing outside a dry run", async () => {
    expect(await runCli(["--config", configPath, "--input", "text"], {}, io(Readable.from([])))).toBe(1);
    expect(fatalLines()[0]).toContain("] OPENAI_API_KEY is not set. Add it to your .env file, or use --dry-run.");
  });

  it("checks the table and exits without credentials", async () => {
    expect(await runCli(["--config", configPath, "--check"], {})).toBe(0);
    expect(logLines.some((line) => line.endsWith("] Phrase mappings OK"))).toBe(true);
    expect(fatalLines()).toEqual([]);
  });

  it("runs a dry-run text session to the end of stdin", async () => {
    const stdin = Readable.from([Buffer.from("you are clear to land\nsay again\n")]);

    const code = await runCli(["--config", configPath, "--input", "text", "--dry-run"], {}, io(stdin));

    expect(code).toBe(0);
    expect(logLines.filter((line) => line.startsWith("[INFO] [DryRun] "))).toEqual([
      "[INFO] [DryRun] Would speak: Cleared to land runway two seven",
      "[INFO] [DryRun] Dry run complete, 1 phrase(s) selected",
    ]);
  });

  it("exits 1 when reading stdin fails", async () => {
    const stdin = new Readable({
      read() {
        this.destroy(new Error("disk unplugged"));
      },
    });

    expect(await runCli(["--config", configPath, "--input", "text", "--dry-run"], {}, io(stdin))).toBe(1);
    expect(fatalLines()).toEqual([]);
  });
});
