// ATC Phrase Relay - Diagnostics sinks
// Every match decision, synthesis failure and state change is reported as a
// DiagnosticEvent. The console sink is for the operator; the audit log keeps
// one JSON object per line for offline review of recognition quality.

import { createWriteStream, type WriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { describeError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { DiagnosticEvent, DiagnosticsSink } from "./types.js";

// ─── Console ────────────────────────────────────────────────────────────────────

export interface ConsoleDiagnosticsOptions {
  /** Also log every state transition. */
  verbose?: boolean;
}

/** Renders one event as an operator-facing log line, or null to skip it. */
export function formatDiagnostic(event: DiagnosticEvent, verbose = false): string | null {
  const sid = event.sessionId.slice(0, 8);
  switch (event.type) {
    case "match":
      return `[${sid}] #${event.seq} "${event.fragment}" => ${event.phraseId} ("${event.canonicalText}") via "${event.variant}"`;
    case "no_match":
      return `[${sid}] #${event.seq} No match for: "${event.fragment}"`;
    case "synthesis_error":
      return `[${sid}] #${event.seq} Synthesis failed for ${event.phraseId}: ${event.message}`;
    case "release_error":
      return `[${sid}] Releasing ${event.resource} failed: ${event.message}`;
    case "state_change":
      return verbose ? `[${sid}] ${event.from} → ${event.to}` : null;
    case "session_stopped": {
      const { fragments, matched, unmatched, synthesisFailures } = event.counters;
      const detail = event.error ? `: ${event.error}` : "";
      return (
        `[${sid}] Session stopped (${event.reason}${detail}). ` +
        `${fragments} fragment(s), ${matched} matched, ${unmatched} unmatched, ${synthesisFailures} synthesis failure(s)`
      );
    }
  }
}

export class ConsoleDiagnostics implements DiagnosticsSink {
  private readonly logger: Logger;
  private readonly verbose: boolean;

  constructor(logger: Logger = createConsoleLogger("Diagnostics"), options: ConsoleDiagnosticsOptions = {}) {
    this.logger = logger;
    this.verbose = options.verbose ?? false;
  }

  report(event: DiagnosticEvent): void {
    const line = formatDiagnostic(event, this.verbose);
    if (line === null) return;

    if (event.type === "synthesis_error" || event.type === "release_error") {
      this.logger.warn(line);
    } else if (event.type === "session_stopped" && event.reason === "recognizer_error") {
      this.logger.error(line);
    } else {
      this.logger.info(line);
    }
  }
}

// ─── JSONL audit log ────────────────────────────────────────────────────────────

/**
 * Appends each event as one JSON line. Open with AuditLogDiagnostics.open().
 */
export class AuditLogDiagnostics implements DiagnosticsSink {
  private readonly stream: WriteStream;
  private readonly logger: Logger;
  private failed = false;

  private constructor(stream: WriteStream, logger: Logger) {
    this.stream = stream;
    this.logger = logger;
    this.stream.on("error", (err) => {
      if (!this.failed) {
        this.failed = true;
        this.logger.error(`Audit log write failed, further events are not recorded: ${describeError(err)}`);
      }
    });
  }

  static async open(filePath: string, logger: Logger = createConsoleLogger("AuditLog")): Promise<AuditLogDiagnostics> {
    await mkdir(dirname(filePath), { recursive: true });
    const stream = createWriteStream(filePath, { flags: "a" });
    await new Promise<void>((resolve, reject) => {
      stream.once("open", () => resolve());
      stream.once("error", reject);
    });
    return new AuditLogDiagnostics(stream, logger);
  }

  report(event: DiagnosticEvent): void {
    if (this.failed || this.stream.writableEnded) return;
    this.stream.write(`${JSON.stringify(event)}\n`);
  }

  /** Flush and close the file. */
  close(): Promise<void> {
    if (this.stream.writableEnded) return Promise.resolve();
    return new Promise((resolve) => {
      this.stream.end(() => resolve());
    });
  }
}

// ─── Fan-out ────────────────────────────────────────────────────────────────────

/**
 * Report to several sinks. One failing sink does not keep the event from the
 * others; the failure is logged.
 */
export function combineDiagnostics(
  sinks: DiagnosticsSink[],
  logger: Logger = createConsoleLogger("Diagnostics"),
): DiagnosticsSink {
  return {
    report(event: DiagnosticEvent): void {
      for (const sink of sinks) {
        try {
          sink.report(event);
        } catch (err) {
          logger.error(`Diagnostics sink failed on ${event.type}: ${describeError(err)}`);
        }
      }
    },
  };
}
