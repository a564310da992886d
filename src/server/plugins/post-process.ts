/**
 * Post-process transforms.
 *
 * A transform rewrites an entry just before its notification is composed, or
 * returns null to drop the notification. Transforms are registered under a key
 * when the process starts and selected per feed by the `postProcess` option.
 * They only shape what gets sent; the entry is recorded as seen either way.
 */

import { ConfigError } from "../errors";
import type { Identity } from "../feed/identity";
import type { ParsedEntry } from "../feed/types";

export interface PostProcessContext {
  feedName: string;
  feedUrl: string;
  identity: Identity;
}

export type EntryTransform = (entry: ParsedEntry, context: PostProcessContext) => ParsedEntry | null;

/**
 * Keyed table of entry transforms.
 */
export class TransformRegistry {
  private transforms = new Map<string, EntryTransform>();

  register(key: string, transform: EntryTransform): void {
    if (this.transforms.has(key)) {
      throw new Error(`Post-process transform "${key}" is already registered`);
    }
    this.transforms.set(key, transform);
  }

  has(key: string): boolean {
    return this.transforms.has(key);
  }

  keys(): string[] {
    return [...this.transforms.keys()];
  }

  /**
   * @throws ConfigError naming every key that has no transform
   */
  assertKnown(keys: Iterable<string>): void {
    const unknown = [...keys].filter((key) => !this.transforms.has(key));
    if (unknown.length > 0) {
      throw new ConfigError(
        `Unknown post-process transform${unknown.length > 1 ? "s" : ""}: ${unknown.join(", ")} ` +
          `(available: ${this.keys().join(", ") || "none"})`
      );
    }
  }

  /**
   * Runs the named transforms in order. Stops at the first one that drops
   * the entry.
   */
  apply(
    keys: readonly string[],
    entry: ParsedEntry,
    context: PostProcessContext
  ): ParsedEntry | null {
    let current: ParsedEntry = entry;
    for (const key of keys) {
      const transform = this.transforms.get(key);
      if (!transform) {
        throw new ConfigError(`Unknown post-process transform: ${key}`);
      }
      const next = transform(current, context);
      if (next === null) {
        return null;
      }
      current = next;
    }
    return current;
  }
}

const TRACKING_PARAMS = new Set(["fbclid", "gclid"]);

/**
 * Removes utm_*, fbclid and gclid query parameters from a URL.
 * Unparsable URLs are returned unchanged.
 */
export function stripTrackingParams(link: string): string {
  let url: URL;
  try {
    url = new URL(link);
  } catch {
    return link;
  }

  const names = [...new Set(url.searchParams.keys())];
  const tracking = names.filter((name) => name.startsWith("utm_") || TRACKING_PARAMS.has(name));
  if (tracking.length === 0) {
    return link;
  }
  for (const name of tracking) {
    url.searchParams.delete(name);
  }
  return url.toString();
}

const URL_ATTRIBUTE_PATTERN = /(\s(?:href|src)\s*=\s*)(["'])(.*?)\2/gi;

/**
 * Rewrites relative href and src attribute values against a base URL.
 */
export function absolutizeLinks(html: string, baseUrl: string): string {
  return html.replace(URL_ATTRIBUTE_PATTERN, (match, prefix: string, quote: string, value: string) => {
    const trimmed = value.trim();
    if (!trimmed || trimmed.startsWith("#") || /^[a-z][a-z0-9+.-]*:/i.test(trimmed)) {
      return match;
    }
    try {
      return `${prefix}${quote}${new URL(trimmed, baseUrl).toString()}${quote}`;
    } catch {
      return match;
    }
  });
}

const downcase: EntryTransform = (entry) => ({
  ...entry,
  ...(entry.title !== undefined ? { title: entry.title.toLowerCase() } : {}),
  ...(entry.content !== undefined ? { content: entry.content.toLowerCase() } : {}),
  ...(entry.summary !== undefined ? { summary: entry.summary.toLowerCase() } : {}),
});

const stripTracking: EntryTransform = (entry) =>
  entry.link ? { ...entry, link: stripTrackingParams(entry.link) } : entry;

const absoluteLinks: EntryTransform = (entry, context) => {
  const base = entry.link ?? context.feedUrl;
  return {
    ...entry,
    ...(entry.content !== undefined ? { content: absolutizeLinks(entry.content, base) } : {}),
    ...(entry.summary !== undefined ? { summary: absolutizeLinks(entry.summary, base) } : {}),
  };
};

/**
 * Builds a registry holding the built-in transforms.
 */
export function createTransformRegistry(): TransformRegistry {
  const registry = new TransformRegistry();
  registry.register("downcase", downcase);
  registry.register("strip-tracking", stripTracking);
  registry.register("absolute-links", absoluteLinks);
  return registry;
}

// Process-wide table; the CLI registers any extra transforms before running
export const transformRegistry = createTransformRegistry();

export function registerTransform(key: string, transform: EntryTransform): void {
  transformRegistry.register(key, transform);
}
