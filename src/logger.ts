// ATC Phrase Relay - Console logging
// Lines read "[LEVEL] [Component] message". Every component takes a Logger so
// tests can pass a silent one.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  /**
   * Send info lines to stderr as well. Used when stdout carries audio.
   */
  stderrOnly?: boolean;
}

export function createConsoleLogger(component: string, options: ConsoleLoggerOptions = {}): Logger {
  const tag = `[${component}]`;
  const infoSink = options.stderrOnly ? console.error : console.log;
  return {
    info: (msg, ...args) => infoSink(`[INFO] ${tag} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] ${tag} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] ${tag} ${msg}`, ...args),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

const ts = () => new Date().toISOString();

/** Startup progress line: "[INIT] [<iso time>] message". */
export function logInit(message: string, options: ConsoleLoggerOptions = {}): void {
  const line = `[INIT] [${ts()}] ${message}`;
  if (options.stderrOnly) {
    console.error(line);
  } else {
    console.log(line);
  }
}

/** Fatal line: "[FATAL] [<iso time>] message", always on stderr. */
export function logFatal(message: string): void {
  console.error(`[FATAL] [${ts()}] ${message}`);
}
