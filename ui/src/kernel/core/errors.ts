import type { Logger } from "../types.ts";

/** Options were missing or out of range. Raised at construction time. */
export class DropdownConfigError extends Error {
  readonly problems: readonly string[];

  constructor(problems: string[]) {
    super(`Invalid dropdown options: ${problems.join("; ")}`);
    this.name = "DropdownConfigError";
    this.problems = problems;
  }
}

/** An operation was called in a state or mode that does not support it. */
export class DropdownStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DropdownStateError";
  }
}

/** The data source threw or rejected while loading a page. */
export class FetchFailure extends Error {
  readonly page: number;
  readonly query: string;

  constructor(page: number, query: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Fetching page ${page} failed: ${detail}`, { cause });
    this.name = "FetchFailure";
    this.page = page;
    this.query = query;
  }
}

/** Wraps a synchronous callback in a try/catch. Returns undefined on failure. */
export function errorBoundary<T>(log: Logger, label: string, fn: () => T): T | undefined {
  try {
    return fn();
  } catch (err) {
    log.error(`${label} threw:`, err);
    return undefined;
  }
}
