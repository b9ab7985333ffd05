// ATC Phrase Relay - Startup stages
// Each stage returns a Result so index.ts stays the single place that turns a
// setup failure into a fatal exit.

import { loadConfig, resolveCredentials } from "./config.js";
import { AuditLogDiagnostics, ConsoleDiagnostics, combineDiagnostics } from "./diagnostics.js";
import { ResourceUnavailableError, describeError, type ConfigError } from "./errors.js";
import { FileAudioSink, StreamAudioSink } from "./audio-sink.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { formatWarning, loadMappingTable } from "./mapping-table.js";
import { LoggingSynthesizer, TTSEngine, type OpenAITTSClient } from "./tts-engine.js";
import type { Writable } from "node:stream";
import type {
  AudioSink,
  DiagnosticsSink,
  InputMode,
  LoadedMappingTable,
  RelayConfig,
  RelayCredentials,
  Result,
  Synthesizer,
} from "./types.js";

type Env = Record<string, string | undefined>;

export interface RunMode {
  input: InputMode;
  dryRun: boolean;
  serve: boolean;
}

// ─── Stage 1: config and mapping table ──────────────────────────────────────────

export interface LoadedSetup {
  config: RelayConfig;
  mappings: LoadedMappingTable;
}

export async function loadSetup(configPath: string, env: Env): Promise<Result<LoadedSetup, ConfigError>> {
  const config = await loadConfig(configPath, env);
  if (!config.ok) return config;

  const mappings = await loadMappingTable(config.value.mappingsPath);
  if (!mappings.ok) return mappings;

  return { ok: true, value: { config: config.value, mappings: mappings.value } };
}

/** Log every lint warning; returns how many there were. */
export function reportTableWarnings(mappings: LoadedMappingTable, logger: Logger): number {
  for (const warning of mappings.warnings) {
    logger.warn(formatWarning(warning));
  }
  return mappings.warnings.length;
}

// ─── Stage 2: credentials ───────────────────────────────────────────────────────

/**
 * The CLI needs Deepgram only for audio input and OpenAI unless dry-running.
 * The server starts without a Deepgram key and refuses audio connections.
 */
export function resolveRunCredentials(env: Env, mode: RunMode): Result<RelayCredentials, ResourceUnavailableError> {
  return resolveCredentials(env, {
    deepgram: !mode.serve && mode.input === "audio",
    openai: !mode.dryRun,
  });
}

// ─── Stage 3: output ────────────────────────────────────────────────────────────

/** The CLI's audio destination: raw bytes on stdout, or numbered files. */
export function createAudioSink(config: RelayConfig, stdout: Writable): AudioSink {
  if (config.output.mode === "files") {
    return new FileAudioSink(config.output.directory);
  }
  return new StreamAudioSink(stdout);
}

export interface SynthesizerFactoryOptions {
  config: RelayConfig;
  dryRun: boolean;
  /** Required unless dryRun. */
  openai: OpenAITTSClient | null;
  logger?: Logger;
}

/**
 * Builds synthesizers writing to a given sink. In a dry run, phrases are logged
 * and the sink is never used.
 */
export function createSynthesizerFactory(
  options: SynthesizerFactoryOptions,
): Result<(sink: AudioSink) => Synthesizer, ResourceUnavailableError> {
  const { config, dryRun, openai, logger } = options;
  if (dryRun) {
    return { ok: true, value: () => new LoggingSynthesizer(logger) };
  }
  if (!openai) {
    return {
      ok: false,
      error: new ResourceUnavailableError("No OpenAI client available for speech synthesis.", "OPENAI_API_KEY"),
    };
  }

  // Shared across sinks so each phrase is synthesized once per process.
  const cache = new Map<string, Buffer>();
  return {
    ok: true,
    value: (sink) => new TTSEngine(openai, sink, { config: config.tts, cache, logger }),
  };
}

// ─── Stage 4: diagnostics ───────────────────────────────────────────────────────

export interface OpenedDiagnostics {
  sink: DiagnosticsSink;
  close(): Promise<void>;
}

export interface DiagnosticsOptions {
  verbose?: boolean;
  logger?: Logger;
}

/** Console diagnostics, plus the JSONL audit log when one is configured. */
export async function openDiagnostics(
  config: RelayConfig,
  options: DiagnosticsOptions = {},
): Promise<Result<OpenedDiagnostics, ResourceUnavailableError>> {
  const logger = options.logger ?? createConsoleLogger("Diagnostics");
  const consoleSink = new ConsoleDiagnostics(logger, { verbose: options.verbose });

  if (!config.auditLogPath) {
    return { ok: true, value: { sink: consoleSink, close: async () => {} } };
  }

  let audit: AuditLogDiagnostics;
  try {
    audit = await AuditLogDiagnostics.open(config.auditLogPath, logger);
  } catch (err) {
    return {
      ok: false,
      error: new ResourceUnavailableError(
        `Audit log could not be opened: ${config.auditLogPath} (${describeError(err)})`,
        config.auditLogPath,
        { cause: err },
      ),
    };
  }

  return {
    ok: true,
    value: {
      sink: combineDiagnostics([consoleSink, audit], logger),
      close: () => audit.close(),
    },
  };
}
