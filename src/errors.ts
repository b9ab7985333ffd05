// ATC Phrase Relay - Error kinds
//
// Fatal:       ConfigError, ResourceUnavailableError, RecognizerIOError
// Recoverable: SynthesisError (reported, the session keeps listening)
//
// A fragment that matches nothing is not an error; see MatchResult.

export type RelayErrorKind =
  | "config"
  | "resource_unavailable"
  | "recognizer_io"
  | "synthesis";

abstract class RelayError extends Error {
  abstract readonly kind: RelayErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad or missing configuration or mapping source. */
export class ConfigError extends RelayError {
  readonly kind = "config" as const;

  constructor(
    message: string,
    /** File or label of the document at fault. */
    readonly source: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A required external resource (API key, output directory) is missing. */
export class ResourceUnavailableError extends RelayError {
  readonly kind = "resource_unavailable" as const;

  constructor(
    message: string,
    readonly resource: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The recognizer could not deliver the next fragment. Ends the session. */
export class RecognizerIOError extends RelayError {
  readonly kind = "recognizer_io" as const;
}

/** Speaking one phrase failed. Never ends the session. */
export class SynthesisError extends RelayError {
  readonly kind = "synthesis" as const;

  constructor(
    message: string,
    readonly text: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type FatalSetupError = ConfigError | ResourceUnavailableError;

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
