/**
 * Raised when a feed or notifier entry in the configuration cannot be used.
 * The offending entry is skipped; the rest of the run continues.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly subject?: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Raised when an HTTP request fails, either on the network or with a non-2xx
 * status. `status` is set only for HTTP failures.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = "FetchError";
  }
}

/**
 * Raised when a feed body cannot be parsed as RSS or Atom.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message);
    this.name = "ParseError";
  }
}

/**
 * Raised when the history database cannot be opened or initialised.
 * Always fatal for a run.
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = "StorageError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
