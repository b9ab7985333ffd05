// ATC Phrase Relay - Application
// Parses the command line, runs the startup stages, and then either runs one
// stdin session or starts the relay server. runCli is the only place a setup
// failure becomes a fatal exit.

import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import type { Readable, Writable } from "node:stream";
import { pipeAudio } from "./audio-input.js";
import {
  createAudioSink,
  createSynthesizerFactory,
  loadSetup,
  openDiagnostics,
  reportTableWarnings,
  resolveRunCredentials,
  type LoadedSetup,
} from "./bootstrap.js";
import { USAGE, parseCliArgs, type CliOptions } from "./cli-args.js";
import { RecognizerIOError, describeError } from "./errors.js";
import { createConsoleLogger, logFatal, logInit } from "./logger.js";
import { PhraseSession } from "./phrase-session.js";
import { LiveRecognizer } from "./recognizer.js";
import { createRelayServer } from "./server.js";
import { TextFragmentSource } from "./text-fragment-source.js";
import type { FragmentSource, RelayCredentials, SessionOutcome } from "./types.js";

export const APP_NAME = "ATC Phrase Relay";
export const APP_VERSION = "0.1.0";

type Env = Record<string, string | undefined>;

/** The process streams a stdin session reads from and writes audio to. */
export interface CliIO {
  stdin: Readable;
  stdout: Writable;
}

class FatalExit extends Error {}

function fatal(message: string): never {
  throw new FatalExit(message);
}

export function exitCodeFor(outcome: SessionOutcome): number {
  return outcome.reason === "recognizer_error" ? 1 : 0;
}

/**
 * Run the relay for one command line and resolve with the process exit code.
 * Fatal errors are logged as [FATAL] lines and give 1.
 */
export async function runCli(
  argv: string[],
  env: Env,
  io: CliIO = { stdin: process.stdin, stdout: process.stdout },
): Promise<number> {
  try {
    return await main(argv, env, io);
  } catch (err) {
    logFatal(err instanceof FatalExit ? err.message : `Unexpected error: ${describeError(err)}`);
    return 1;
  }
}

async function main(argv: string[], env: Env, io: CliIO): Promise<number> {
  const args = parseCliArgs(argv, env);
  if (!args.ok) fatal(args.error.message);
  const cli = args.value;

  if (cli.help) {
    console.log(USAGE);
    return 0;
  }

  // stdout carries audio unless serving, checking, or dry-running.
  const setup = await loadSetup(cli.configPath, env);
  if (!setup.ok) fatal(setup.error.message);
  const { config, mappings } = setup.value;
  const stderrOnly = !cli.serve && !cli.check && !cli.dryRun && config.output.mode === "stdout";

  logInit(`Config loaded from ${config.configPath}`, { stderrOnly });
  logInit(`${mappings.table.phrases.length} phrase(s) loaded from ${mappings.table.source}`, { stderrOnly });
  const warningCount = reportTableWarnings(mappings, createConsoleLogger("MappingTable", { stderrOnly }));

  if (cli.check) {
    logInit(warningCount === 0 ? "Phrase mappings OK" : `Phrase mappings OK with ${warningCount} warning(s)`);
    return 0;
  }

  const credentials = resolveRunCredentials(env, { input: cli.input, dryRun: cli.dryRun, serve: cli.serve });
  if (!credentials.ok) fatal(credentials.error.message);
  logInit("API keys loaded", { stderrOnly });

  return cli.serve ? serve(cli, setup.value, credentials.value) : runSession(cli, setup.value, credentials.value, io, stderrOnly);
}

// ─── Stdin session ──────────────────────────────────────────────────────────────

async function runSession(
  cli: CliOptions,
  { config, mappings }: LoadedSetup,
  credentials: RelayCredentials,
  io: CliIO,
  stderrOnly: boolean,
): Promise<number> {
  const openai = credentials.openaiApiKey ? new OpenAI({ apiKey: credentials.openaiApiKey }) : null;
  const synthesizers = createSynthesizerFactory({
    config,
    dryRun: cli.dryRun,
    openai,
    logger: createConsoleLogger(cli.dryRun ? "DryRun" : "TTSEngine", { stderrOnly }),
  });
  if (!synthesizers.ok) fatal(synthesizers.error.message);

  const diagnostics = await openDiagnostics(config, {
    verbose: cli.verbose,
    logger: createConsoleLogger("Diagnostics", { stderrOnly }),
  });
  if (!diagnostics.ok) fatal(diagnostics.error.message);

  let source: FragmentSource;
  if (cli.input === "text") {
    const text = new TextFragmentSource(io.stdin);
    text.start();
    source = text;
    logInit("Reading one fragment per line from stdin", { stderrOnly });
  } else {
    const deepgramKey = credentials.deepgramApiKey ?? fatal("DEEPGRAM_API_KEY is not set.");
    const recognizer = new LiveRecognizer(createDeepgramClient(deepgramKey), {
      config: config.recognizer,
      logger: createConsoleLogger("LiveRecognizer", { stderrOnly }),
    });
    recognizer.start();
    source = recognizer;
    void pipeAudio(io.stdin, recognizer).then(
      () => recognizer.finish(),
      (err: unknown) =>
        recognizer.abort(new RecognizerIOError(`Reading audio input failed: ${describeError(err)}`, { cause: err })),
    );
    logInit(`Streaming ${config.recognizer.sampleRate} Hz mono PCM from stdin to Deepgram`, { stderrOnly });
  }

  const session = new PhraseSession({
    table: mappings.table,
    source,
    synthesizer: synthesizers.value(createAudioSink(config, io.stdout)),
    diagnostics: diagnostics.value.sink,
  });

  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  logInit(`${APP_NAME} v${APP_VERSION} session ${session.id} listening`, { stderrOnly });
  try {
    return exitCodeFor(await session.run(controller.signal));
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
    await diagnostics.value.close();
  }
}

// ─── Relay server ───────────────────────────────────────────────────────────────

async function serve(cli: CliOptions, { config, mappings }: LoadedSetup, credentials: RelayCredentials): Promise<number> {
  const openai = credentials.openaiApiKey ? new OpenAI({ apiKey: credentials.openaiApiKey }) : null;
  const synthesizers = createSynthesizerFactory({ config, dryRun: cli.dryRun, openai });
  if (!synthesizers.ok) fatal(synthesizers.error.message);

  const diagnostics = await openDiagnostics(config, { verbose: cli.verbose });
  if (!diagnostics.ok) fatal(diagnostics.error.message);

  const deepgramKey = credentials.deepgramApiKey;
  if (!deepgramKey) {
    logInit("DEEPGRAM_API_KEY is not set; audio connections are refused");
  }
  const deepgram = deepgramKey ? createDeepgramClient(deepgramKey) : null;

  const server = createRelayServer({
    table: mappings.table,
    synthesizerFactory: synthesizers.value,
    recognizerFactory: deepgram ? () => new LiveRecognizer(deepgram, { config: config.recognizer }) : undefined,
    diagnostics: diagnostics.value.sink,
  });

  const port = cli.port ?? config.server.port;
  await server.listen(port);
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);
  logInit(`Connect to ws://localhost:${port}/?input=text or ?input=audio`);

  await new Promise<void>((resolve) => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
  });

  logInit("Shutting down...");
  await server.close();
  await diagnostics.value.close();
  return 0;
}
