// ATC Phrase Relay - Configuration
// Reads the relay's JSON config file and the API keys from the environment
// (populated from .env by dotenv at startup). The document is checked against
// RelayConfigSchema; a missing required field or a referenced file that does
// not exist is a ConfigError, a missing API key is ResourceUnavailable.

import { access, readFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import { z } from "zod";
import { ConfigError, ResourceUnavailableError, describeError } from "./errors.js";
import type {
  AudioFormat,
  OutputMode,
  RelayConfig,
  RelayCredentials,
  Result,
} from "./types.js";
import { describeIssues } from "./validation.js";

export const DEFAULT_CONFIG_PATH = "config/relay.config.json";

const AUDIO_FORMATS = ["wav", "mp3", "opus", "aac", "flac", "pcm"] as const satisfies readonly AudioFormat[];
const OUTPUT_MODES = ["stdout", "files"] as const satisfies readonly OutputMode[];

type Env = Record<string, string | undefined>;

// ─── Schema ─────────────────────────────────────────────────────────────────────

const NON_EMPTY = "must be a non-empty string";
const POSITIVE_INT = "must be a positive integer";
const OBJECT = { invalid_type_error: "must be an object" };

const text = () => z.string({ invalid_type_error: NON_EMPTY }).trim().min(1, NON_EMPTY);

const positiveInt = () =>
  z.number({ invalid_type_error: POSITIVE_INT }).int(POSITIVE_INT).positive(POSITIVE_INT);

/** Absent, null and blank all mean "not set". */
const optionalText = () =>
  z
    .string({ invalid_type_error: "must be a string" })
    .trim()
    .nullish()
    .transform((value) => (value ? value : null));

/**
 * The config file as written. Every field but mappingsPath has a default;
 * relative paths are resolved afterwards by parseConfig.
 */
export const RelayConfigSchema = z.object(
  {
    mappingsPath: z
      .string({
        required_error: "is required (path to the phrase mappings JSON file)",
        invalid_type_error: NON_EMPTY,
      })
      .trim()
      .min(1, NON_EMPTY),
    recognizer: z
      .object(
        {
          model: text().default("nova-2"),
          language: text().default("en"),
          sampleRate: positiveInt().default(16000),
        },
        OBJECT,
      )
      .default({}),
    tts: z
      .object(
        {
          model: text().default("tts-1"),
          voice: optionalText(),
          format: z
            .enum(AUDIO_FORMATS, { errorMap: () => ({ message: `must be one of ${AUDIO_FORMATS.join(", ")}` }) })
            .default("wav"),
        },
        OBJECT,
      )
      .default({}),
    output: z
      .object(
        {
          mode: z
            .enum(OUTPUT_MODES, { errorMap: () => ({ message: `must be one of ${OUTPUT_MODES.join(", ")}` }) })
            .default("stdout"),
          directory: text().default("output"),
        },
        OBJECT,
      )
      .default({}),
    auditLogPath: optionalText(),
    server: z
      .object({ port: positiveInt().max(65535, "must be at most 65535").default(3000) }, OBJECT)
      .default({}),
  },
  { invalid_type_error: "expected a JSON object" },
);

/** A port written as decimal digits, 0 to 65535. */
export const PortTextSchema = z
  .string()
  .trim()
  .regex(/^\d{1,5}$/)
  .transform(Number)
  .pipe(z.number().int().max(65535));

/**
 * Parse the JSON config document. Relative paths inside it resolve against
 * `baseDir` (the directory holding the config file).
 */
export function parseConfig(
  document: unknown,
  configPath: string,
  baseDir: string,
  env: Env = {},
): Result<RelayConfig, ConfigError> {
  const parsed = RelayConfigSchema.safeParse(document);
  const problems: string[] = parsed.success ? [] : describeIssues(parsed.error.issues);

  let portOverride: number | null = null;
  const portText = env["PORT"];
  if (portText !== undefined && portText.trim().length > 0) {
    const port = PortTextSchema.safeParse(portText);
    if (port.success && port.data > 0) {
      portOverride = port.data;
    } else {
      problems.push(`PORT environment variable must be a port number, got "${portText}"`);
    }
  }

  if (!parsed.success || problems.length > 0) {
    return {
      ok: false,
      error: new ConfigError(`Invalid configuration in ${configPath}:\n  - ${problems.join("\n  - ")}`, configPath),
    };
  }

  const doc = parsed.data;
  const toPath = (p: string) => (isAbsolute(p) ? p : resolve(baseDir, p));

  return {
    ok: true,
    value: {
      mappingsPath: toPath(doc.mappingsPath),
      recognizer: doc.recognizer,
      tts: doc.tts,
      output: { mode: doc.output.mode, directory: toPath(doc.output.directory) },
      auditLogPath: doc.auditLogPath ? toPath(doc.auditLogPath) : null,
      server: { port: portOverride ?? doc.server.port },
      configPath,
    },
  };
}

/**
 * Read and validate the config file, then check that the mapping file it
 * names exists.
 */
export async function loadConfig(
  configPath: string,
  env: Env = {},
): Promise<Result<RelayConfig, ConfigError>> {
  const absolutePath = resolve(configPath);

  let raw: string;
  try {
    raw = await readFile(absolutePath, "utf-8");
  } catch (err) {
    return {
      ok: false,
      error: new ConfigError(
        `Config file could not be read: ${absolutePath} (${describeError(err)}). ` +
          `Pass --config <path> or set RELAY_CONFIG.`,
        absolutePath,
        { cause: err },
      ),
    };
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (err) {
    return {
      ok: false,
      error: new ConfigError(`Config file is not valid JSON: ${absolutePath} (${describeError(err)})`, absolutePath, {
        cause: err,
      }),
    };
  }

  const parsed = parseConfig(document, absolutePath, dirname(absolutePath), env);
  if (!parsed.ok) return parsed;

  try {
    await access(parsed.value.mappingsPath);
  } catch {
    return {
      ok: false,
      error: new ConfigError(
        `Phrase mappings file not found: ${parsed.value.mappingsPath} (from "mappingsPath" in ${absolutePath})`,
        absolutePath,
      ),
    };
  }

  return parsed;
}

// ─── Credentials ────────────────────────────────────────────────────────────────

export interface CredentialNeeds {
  deepgram: boolean;
  openai: boolean;
}

/**
 * Pick API keys out of the environment. A key that the chosen mode needs and
 * that is unset is ResourceUnavailable.
 */
export function resolveCredentials(
  env: Env,
  needs: CredentialNeeds,
): Result<RelayCredentials, ResourceUnavailableError> {
  const read = (name: string): string | null => {
    const value = env[name]?.trim();
    return value ? value : null;
  };

  const credentials: RelayCredentials = {
    deepgramApiKey: read("DEEPGRAM_API_KEY"),
    openaiApiKey: read("OPENAI_API_KEY"),
  };

  if (needs.deepgram && !credentials.deepgramApiKey) {
    return {
      ok: false,
      error: new ResourceUnavailableError(
        "DEEPGRAM_API_KEY is not set. Add it to your .env file, or use --input text.",
        "DEEPGRAM_API_KEY",
      ),
    };
  }
  if (needs.openai && !credentials.openaiApiKey) {
    return {
      ok: false,
      error: new ResourceUnavailableError(
        "OPENAI_API_KEY is not set. Add it to your .env file, or use --dry-run.",
        "OPENAI_API_KEY",
      ),
    };
  }

  return { ok: true, value: credentials };
}
