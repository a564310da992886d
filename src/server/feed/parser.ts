/**
 * Picks the RSS, Atom or JSON Feed parser for a fetched document.
 *
 * The document's root element decides. The response's Content-Type is only
 * consulted when no element leads the document, as with a feed that a
 * server prefixes with stray warning text.
 */

import { UnknownFeedFormatError } from "../errors";
import { parseAtomFeed } from "./atom-parser";
import { isJsonFeed, parseJsonFeed } from "./json-parser";
import { parseRssFeed } from "./rss-parser";
import type { ParsedFeed } from "./types";

export type FeedFormat = "rss" | "atom" | "json";

const PARSERS: Record<FeedFormat, (content: string) => ParsedFeed> = {
  rss: parseRssFeed,
  atom: parseAtomFeed,
  json: parseJsonFeed,
};

// RSS 1.0 documents are rooted at rdf:RDF; a bare channel is a truncated RSS 2.0 one
const ROOT_ELEMENTS = new Map<string, FeedFormat>([
  ["rss", "rss"],
  ["rdf:rdf", "rss"],
  ["channel", "rss"],
  ["feed", "atom"],
]);

const MEDIA_TYPES = new Map<string, FeedFormat>([
  ["application/rss+xml", "rss"],
  ["application/rdf+xml", "rss"],
  ["application/atom+xml", "atom"],
  ["application/feed+json", "json"],
]);

const PROLOG = /^(?:\s|<\?[\s\S]*?\?>|<!--[\s\S]*?-->|<!DOCTYPE[^>[]*(?:\[[\s\S]*?\])?\s*>)*/i;

/**
 * Lowercased name of the element that opens the document, after the XML
 * declaration, comments and any DOCTYPE.
 */
export function rootElementName(content: string): string | undefined {
  const rest = content.replace(/^\uFEFF/, "").replace(PROLOG, "");
  return /^<([\w.:-]+)/.exec(rest)?.[1].toLowerCase();
}

/**
 * Feed format named by a Content-Type header. Generic XML and JSON types
 * name none.
 */
export function formatFromContentType(contentType: string | undefined): FeedFormat | undefined {
  const mediaType = contentType?.split(";")[0].trim().toLowerCase();
  return mediaType ? MEDIA_TYPES.get(mediaType) : undefined;
}

export function detectFeedFormat(content: string, contentType?: string): FeedFormat | undefined {
  const trimmed = content.replace(/^\uFEFF/, "").trimStart();
  if (trimmed.startsWith("{")) {
    return isJsonFeed(trimmed) ? "json" : undefined;
  }

  const root = rootElementName(trimmed);
  if (root === undefined) {
    return formatFromContentType(contentType);
  }
  return ROOT_ELEMENTS.get(root);
}

/**
 * @throws UnknownFeedFormatError when the document is not a feed
 * @throws Error from the chosen parser when the feed is malformed
 */
export function parseFeed(content: string, contentType?: string): ParsedFeed {
  const format = detectFeedFormat(content, contentType);
  if (!format) {
    throw new UnknownFeedFormatError(contentType);
  }
  return PARSERS[format](content);
}
