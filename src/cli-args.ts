// ATC Phrase Relay - Command-line arguments

import { parseArgs } from "node:util";
import { DEFAULT_CONFIG_PATH, PortTextSchema } from "./config.js";
import { ConfigError, describeError } from "./errors.js";
import type { InputMode, Result } from "./types.js";

export interface CliOptions {
  configPath: string;
  input: InputMode;
  dryRun: boolean;
  serve: boolean;
  /** Overrides server.port from the config file. */
  port: number | null;
  /** Load and lint the mapping table, then exit. */
  check: boolean;
  /** Log every session state transition. */
  verbose: boolean;
  help: boolean;
}

export const USAGE = `Usage: atc-phrase-relay [options]

  --config <path>     Relay config file (default: $RELAY_CONFIG or ${DEFAULT_CONFIG_PATH})
  --input audio|text  Read 16 kHz mono PCM or one fragment per line from stdin (default: audio)
  --dry-run           Log the phrases that would be spoken instead of synthesizing them
  --serve             Run the WebSocket relay server instead of a stdin session
  --port <n>          Server port (overrides server.port and PORT)
  --check             Load and lint the phrase mappings, then exit
  --verbose           Log every session state change
  -h, --help          Show this help`;

export function parseCliArgs(
  argv: string[],
  env: Record<string, string | undefined> = {},
): Result<CliOptions, ConfigError> {
  let values: {
    config?: string;
    input?: string;
    "dry-run"?: boolean;
    serve?: boolean;
    port?: string;
    check?: boolean;
    verbose?: boolean;
    help?: boolean;
  };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        config: { type: "string", default: env["RELAY_CONFIG"] ?? DEFAULT_CONFIG_PATH },
        input: { type: "string", default: "audio" },
        "dry-run": { type: "boolean", default: false },
        serve: { type: "boolean", default: false },
        port: { type: "string" },
        check: { type: "boolean", default: false },
        verbose: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
      allowPositionals: false,
    }));
  } catch (err) {
    return { ok: false, error: new ConfigError(`${describeError(err)}\n\n${USAGE}`, "command line", { cause: err }) };
  }

  const input = (values.input ?? "audio").toLowerCase();
  if (input !== "audio" && input !== "text") {
    return {
      ok: false,
      error: new ConfigError(`Unsupported --input "${input}". Use "audio" or "text".`, "command line"),
    };
  }

  let port: number | null = null;
  if (values.port !== undefined) {
    const parsed = PortTextSchema.safeParse(values.port);
    if (!parsed.success) {
      return {
        ok: false,
        error: new ConfigError(`--port must be a port number, got "${values.port}"`, "command line"),
      };
    }
    port = parsed.data;
  }

  return {
    ok: true,
    value: {
      configPath: values.config ?? DEFAULT_CONFIG_PATH,
      input,
      dryRun: values["dry-run"] ?? false,
      serve: values.serve ?? false,
      port,
      check: values.check ?? false,
      verbose: values.verbose ?? false,
      help: values.help ?? false,
    },
  };
}
