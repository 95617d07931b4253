/**
 * Logging contract for the engine.
 *
 * The engine never picks an output on its own: the editor integration
 * passes a Logger in. The default is silent.
 */

export const LogLevel = {
  Debug: "debug",
  Info: "info",
  Warn: "warn",
  Error: "error",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface LineLoggerOptions {
  /** Prepended to every message, e.g. the integration's name */
  readonly name?: string;
  /** Messages below this level are dropped (default: info) */
  readonly level?: LogLevel;
  /** Receives each formatted line (default: console.error) */
  readonly write?: (line: string) => void;
  /** Clock for timestamps */
  readonly now?: () => Date;
}

function describeError(err: unknown): string {
  if (err instanceof Error) return ` :: ${err.stack ?? err.message}`;
  if (err === undefined || err === null) return "";
  return ` :: ${String(err)}`;
}

/**
 * A logger that formats each entry as one line:
 * `[2026-01-01T00:00:00.000Z] [warn] name: message`.
 */
export function createLineLogger(options: LineLoggerOptions = {}): Logger {
  const threshold = SEVERITY[options.level ?? LogLevel.Info];
  const write = options.write ?? ((line: string) => console.error(line));
  const now = options.now ?? (() => new Date());
  const prefix = options.name ? `${options.name}: ` : "";

  const emit = (level: LogLevel, text: string): void => {
    if (SEVERITY[level] < threshold) return;
    write(`[${now().toISOString()}] [${level}] ${prefix}${text}`);
  };

  return {
    debug: (message) => emit(LogLevel.Debug, message),
    info: (message) => emit(LogLevel.Info, message),
    warn: (message) => emit(LogLevel.Warn, message),
    error: (message, err) => emit(LogLevel.Error, message + describeError(err)),
  };
}
