/**
 * Feed registry.
 *
 * Ordered collection of configured feeds plus the default target address.
 * Operates in place on a loaded Database; the caller persists it. Every
 * operation that removes a feed or its history also removes the matching
 * FeedState, so each state key always names exactly one feed.
 */

import {
  DuplicateFeedError,
  InvalidFeedNameError,
  UnknownFeedError,
  ConfigError,
} from "../errors";
import { generateOpml, parseOpml } from "../feed/opml";
import { createFeedState, type Database, type FeedConfig } from "../store/schema";

/** Valid feed names: letters, digits, underscore, dot and dash. */
export const FEED_NAME_PATTERN = /^[\w.-]+$/;

const SUPPORTED_PROTOCOLS = new Set(["http:", "https:", "file:"]);

/**
 * One row of `list()`.
 */
export interface FeedListing {
  index: number;
  feed: FeedConfig;
  /** Effective target: the feed's own, else the default */
  target?: string;
  seenCount: number;
  lastFetchedAt?: string;
  lastError?: string;
}

/**
 * Outcome of an OPML import.
 */
export interface OpmlImportResult {
  /** Names of the feeds added */
  added: string[];
  /** Names that already existed and were left alone */
  duplicates: string[];
  /** Outlines that could not be added, with the reason */
  skipped: { url: string; reason: string }[];
}

export function isValidFeedName(name: string): boolean {
  return FEED_NAME_PATTERN.test(name);
}

/**
 * Turns arbitrary outline text into a valid feed name, or undefined if
 * nothing usable is left. Text that is already a valid name is kept as is.
 */
export function sanitizeFeedName(text: string): string | undefined {
  if (isValidFeedName(text)) {
    return text;
  }
  const name = text
    .trim()
    .replace(/[^\w.-]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return name.length > 0 ? name : undefined;
}

function validateUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigError(`Invalid feed URL: ${url}`);
  }
  if (!SUPPORTED_PROTOCOLS.has(parsed.protocol)) {
    throw new ConfigError(`Unsupported feed URL scheme "${parsed.protocol}" in ${url}`);
  }
}

export class FeedRegistry {
  constructor(private readonly db: Database) {}

  get database(): Database {
    return this.db;
  }

  get defaultTarget(): string | undefined {
    return this.db.defaultTarget;
  }

  /**
   * Registers a new feed at the end of the list.
   *
   * @throws InvalidFeedNameError, ConfigError (bad URL), DuplicateFeedError
   */
  add(name: string, url: string, target?: string): FeedConfig {
    if (!isValidFeedName(name)) {
      throw new InvalidFeedNameError(name);
    }
    validateUrl(url);
    if (this.find(name)) {
      throw new DuplicateFeedError(name);
    }

    const feed: FeedConfig = {
      name,
      url,
      paused: false,
      ...(target ? { target } : {}),
    };
    this.db.feeds.push(feed);
    return feed;
  }

  /**
   * Removes a feed and its seen-entry history.
   */
  delete(name: string): FeedConfig {
    const index = this.db.feeds.findIndex((feed) => feed.name === name);
    if (index === -1) {
      throw new UnknownFeedError(name);
    }
    const [removed] = this.db.feeds.splice(index, 1);
    delete this.db.state[name];
    return removed;
  }

  pause(name: string): void {
    this.get(name).paused = true;
  }

  unpause(name: string): void {
    this.get(name).paused = false;
  }

  /**
   * Forgets every entry seen on the feed, keeping its configuration.
   * The next run treats everything the feed offers as new.
   */
  reset(name: string): void {
    this.get(name);
    this.db.state[name] = createFeedState();
  }

  /**
   * Sets the address used by feeds without their own target. Undefined clears it.
   */
  setDefaultTarget(address: string | undefined): void {
    if (address) {
      this.db.defaultTarget = address;
    } else {
      delete this.db.defaultTarget;
    }
  }

  /**
   * Replaces a feed's URL (after a permanent redirect).
   */
  setUrl(name: string, url: string): void {
    validateUrl(url);
    this.get(name).url = url;
  }

  get(name: string): FeedConfig {
    const feed = this.find(name);
    if (!feed) {
      throw new UnknownFeedError(name);
    }
    return feed;
  }

  find(name: string): FeedConfig | undefined {
    return this.db.feeds.find((feed) => feed.name === name);
  }

  /**
   * Resolves a command-line reference to a feed name. A reference is a feed
   * name or, when no feed has that name, its index in `list` order.
   *
   * @throws UnknownFeedError when neither matches
   */
  resolve(ref: string): string {
    if (this.find(ref)) {
      return ref;
    }
    const feed = /^\d+$/.test(ref) ? this.db.feeds[Number(ref)] : undefined;
    if (!feed) {
      throw new UnknownFeedError(ref);
    }
    return feed.name;
  }

  /**
   * Feeds in registry order, with a summary of their state.
   */
  list(): FeedListing[] {
    return this.db.feeds.map((feed, index) => {
      const state = this.db.state[feed.name];
      const target = feed.target ?? this.db.defaultTarget;
      return {
        index,
        feed,
        ...(target ? { target } : {}),
        seenCount: state ? Object.keys(state.entries).length : 0,
        ...(state?.lastFetchedAt ? { lastFetchedAt: state.lastFetchedAt } : {}),
        ...(state?.lastError ? { lastError: state.lastError.message } : {}),
      };
    });
  }

  /**
   * First unused name of the form `<prefix>-<n>`, counting from 0.
   */
  nextName(prefix = "feed"): string {
    for (let n = 0; ; n++) {
      const name = `${prefix}-${n}`;
      if (!this.find(name)) {
        return name;
      }
    }
  }

  /**
   * Serializes the registry as OPML. Does not modify anything.
   */
  exportOpml(now?: Date): string {
    return generateOpml(
      this.db.feeds.map((feed) => ({ name: feed.name, xmlUrl: feed.url, paused: feed.paused })),
      { dateCreated: now }
    );
  }

  /**
   * Adds every feed outline in an OPML document.
   *
   * Names come from the outline text, made valid if needed; outlines without usable
   * text get `feed-<n>`. An existing name is reported as a duplicate and the
   * import moves on.
   *
   * @throws OpmlParseError if the document cannot be read at all
   */
  importOpml(xml: string): OpmlImportResult {
    const result: OpmlImportResult = { added: [], duplicates: [], skipped: [] };

    for (const outline of parseOpml(xml)) {
      const name = (outline.title ? sanitizeFeedName(outline.title) : undefined) ?? this.nextName();
      try {
        const feed = this.add(name, outline.xmlUrl);
        if (outline.paused) {
          feed.paused = true;
        }
        result.added.push(name);
      } catch (error) {
        if (error instanceof DuplicateFeedError) {
          result.duplicates.push(name);
        } else if (error instanceof ConfigError || error instanceof InvalidFeedNameError) {
          result.skipped.push({ url: outline.xmlUrl, reason: error.message });
        } else {
          throw error;
        }
      }
    }

    return result;
  }
}
