/**
 * JSON Feed 1.0/1.1 parser.
 * Parses JSON Feed documents into a unified ParsedFeed format.
 *
 * JSON Feed spec: https://jsonfeed.org/version/1.1
 */

import { z } from "zod";
import type { ParsedFeed, ParsedEntry } from "./types";
import { parseFeedDate } from "./xml-text";

const authorSchema = z
  .object({
    name: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

const itemSchema = z
  .object({
    // Some publishers emit numeric ids; JSON Feed 1.1 requires a string
    id: z.union([z.string(), z.number()]).transform(String),
    url: z.string().optional(),
    external_url: z.string().optional(),
    title: z.string().optional(),
    content_html: z.string().optional(),
    content_text: z.string().optional(),
    summary: z.string().optional(),
    date_published: z.string().optional(),
    date_modified: z.string().optional(),
    authors: z.array(authorSchema).optional(),
    // deprecated in 1.1, still common
    author: authorSchema.optional(),
  })
  .passthrough();

const jsonFeedSchema = z
  .object({
    version: z.string().startsWith("https://jsonfeed.org/version/"),
    title: z.string().min(1, "missing title"),
    home_page_url: z.string().optional(),
    description: z.string().optional(),
    authors: z.array(authorSchema).optional(),
    author: authorSchema.optional(),
    items: z.array(itemSchema),
  })
  .passthrough();

type JsonFeedAuthor = z.infer<typeof authorSchema>;
type JsonFeedItem = z.infer<typeof itemSchema>;

/**
 * Checks if content looks like JSON Feed.
 * Used for format detection.
 */
export function isJsonFeed(content: string): boolean {
  try {
    const parsed: unknown = JSON.parse(content);
    return z
      .object({ version: z.string().startsWith("https://jsonfeed.org/version/") })
      .safeParse(parsed).success;
  } catch {
    return false;
  }
}

function firstAuthor(
  authors: JsonFeedAuthor[] | undefined,
  author: JsonFeedAuthor | undefined
): JsonFeedAuthor | undefined {
  return authors?.[0] ?? author;
}

/**
 * Extracts an email address from a mailto: author URL.
 */
function authorEmail(author: JsonFeedAuthor | undefined): string | undefined {
  const url = author?.url?.trim();
  return url?.toLowerCase().startsWith("mailto:") ? url.slice("mailto:".length) : undefined;
}

function parseJsonFeedItem(item: JsonFeedItem, feedAuthor: JsonFeedAuthor | undefined): ParsedEntry {
  const html = item.content_html?.trim() || undefined;
  const text = item.content_text?.trim() || undefined;
  const author = firstAuthor(item.authors, item.author) ?? feedAuthor;

  return {
    guid: item.id.trim() || undefined,
    link: item.url?.trim() || item.external_url?.trim() || undefined,
    title: item.title?.trim() || undefined,
    author: author?.name?.trim() || undefined,
    authorEmail: authorEmail(author),
    content: html ?? text,
    summary: item.summary?.trim() || undefined,
    contentIsHtml: html !== undefined ? true : text !== undefined ? false : undefined,
    pubDate: parseFeedDate(item.date_published) ?? parseFeedDate(item.date_modified),
    updated: parseFeedDate(item.date_modified),
  };
}

/**
 * Parses a JSON Feed string into a ParsedFeed.
 *
 * @param json - The JSON Feed content as a string
 * @returns A ParsedFeed object with normalized feed data
 * @throws Error if the content is not a valid JSON Feed
 */
export function parseJsonFeed(json: string): ParsedFeed {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new Error(
      `Invalid JSON Feed: ${error instanceof Error ? error.message : "unparsable JSON"}`
    );
  }

  const result = jsonFeedSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(
      `Invalid JSON Feed: ${issue ? `${issue.path.join(".") || "root"}: ${issue.message}` : "unknown error"}`
    );
  }

  const feed = result.data;
  const feedAuthor = firstAuthor(feed.authors, feed.author);

  return {
    title: feed.title,
    description: feed.description,
    siteUrl: feed.home_page_url,
    items: feed.items.map((item) => parseJsonFeedItem(item, feedAuthor)),
  };
}
