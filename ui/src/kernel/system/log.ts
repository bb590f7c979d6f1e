import type { Logger, LogLevel } from "../types.ts";

/**
 * Scoped console logger. With `redact` on, string arguments are hashed so
 * item labels (often names or e-mail addresses) never reach the browser
 * console history. Structured values (Error, numbers, booleans) pass through.
 */

export interface LoggerOptions {
  /** Lowest level that is written. Default "info". */
  level?: LogLevel;
  /** Hash string arguments before logging. Default false. */
  redact?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

async function hashString(s: string): Promise<string> {
  const buf = await crypto.subtle.digest("SHA-256", new TextEncoder().encode(s));
  const hex = Array.from(new Uint8Array(buf))
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
  return `string(sha256-${hex.slice(0, 12)})`;
}

/** Sanitize a single log argument: strings → hashed, others → passthrough. */
function sanitizeArg(arg: unknown): unknown {
  if (typeof arg === "string") return hashString(arg);
  return arg;
}

/** Resolve all arguments (some may be async from hashing). */
export async function sanitizeArgs(args: unknown[]): Promise<unknown[]> {
  return Promise.all(args.map(sanitizeArg));
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = `[${scope}]`;
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= threshold;

  const write = (level: LogLevel) => (msg: string, ...args: unknown[]) => {
    if (!enabled(level)) return;
    if (!options.redact) {
      console[level](prefix, msg, ...args);
      return;
    }
    // The message is ours; only the arguments can carry user data.
    void sanitizeArgs(args).then(
      (safe) => console[level](prefix, msg, ...safe),
      () => console[level](prefix, msg, "[redacted]"),
    );
  };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

/** Logger that drops everything. Used when the host opts out of logging. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
