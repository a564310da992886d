/**
 * Error taxonomy.
 *
 * Every error the core raises on purpose extends FeedmailError, so the CLI can
 * tell an expected failure (print and exit 1) from a bug (rethrow).
 */

export class FeedmailError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FeedmailError";
  }
}

/**
 * Malformed options or a missing required setting. Raised before any feed runs.
 */
export class ConfigError extends FeedmailError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * The database file does not exist yet.
 */
export class NotFoundError extends FeedmailError {
  constructor(public readonly path: string) {
    super(`No feed database at ${path} (create one with "feedmail new")`);
    this.name = "NotFoundError";
  }
}

/**
 * The database file exists but cannot be parsed or validated.
 */
export class CorruptStateError extends FeedmailError {
  constructor(
    public readonly path: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Feed database at ${path} is corrupt: ${detail}`, options);
    this.name = "CorruptStateError";
  }
}

/**
 * The database could not be read or written.
 * The previously persisted snapshot is left in place.
 */
export class PersistenceError extends FeedmailError {
  constructor(
    public readonly path: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to persist feed database at ${path}: ${detail}`, options);
    this.name = "PersistenceError";
  }
}

/**
 * Fetching or parsing one feed failed. Recorded on the feed; the run continues.
 */
export class FetchError extends FeedmailError {
  /** Whether the fetch was cut off by the feed timeout */
  readonly timeout: boolean;

  constructor(
    public readonly feed: string,
    message: string,
    options?: { cause?: unknown; timeout?: boolean }
  ) {
    super(message, options);
    this.name = "FetchError";
    this.timeout = options?.timeout ?? false;
  }
}

/**
 * A fetched document is not RSS, Atom or JSON Feed.
 */
export class UnknownFeedFormatError extends FeedmailError {
  constructor(public readonly contentType?: string) {
    super(
      `Not an RSS, Atom or JSON Feed document${contentType ? ` (${contentType})` : ""}`
    );
    this.name = "UnknownFeedFormatError";
  }
}

/**
 * Handing a notification to the mail transport failed.
 */
export class DispatchError extends FeedmailError {
  constructor(
    public readonly feed: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DispatchError";
  }
}

export class DuplicateFeedError extends FeedmailError {
  constructor(public readonly feedName: string) {
    super(`A feed named "${feedName}" already exists`);
    this.name = "DuplicateFeedError";
  }
}

export class UnknownFeedError extends FeedmailError {
  constructor(public readonly feedName: string) {
    super(`No feed named "${feedName}"`);
    this.name = "UnknownFeedError";
  }
}

export class InvalidFeedNameError extends FeedmailError {
  constructor(public readonly feedName: string) {
    super(
      `Invalid feed name "${feedName}": use letters, digits, underscores, dots and dashes only`
    );
    this.name = "InvalidFeedNameError";
  }
}

/**
 * Extracts a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
