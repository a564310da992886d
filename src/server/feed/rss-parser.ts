/**
 * RSS 2.0 / RSS 1.0 feed parser.
 * Parses RSS feeds into a unified ParsedFeed format.
 */

import { XMLParser } from "fast-xml-parser";
import type { ParsedFeed, ParsedEntry } from "./types";
import {
  asArray,
  extractText,
  feedParserOptions,
  looksLikeHtml,
  parseFeedDate,
  type XmlText,
} from "./xml-text";

/**
 * Parsed RSS item structure from fast-xml-parser.
 */
interface RssItem {
  title?: XmlText;
  link?: XmlText | XmlText[];
  description?: XmlText;
  pubDate?: XmlText;
  "dc:date"?: XmlText;
  guid?: XmlText;
  author?: XmlText;
  "dc:creator"?: XmlText;
  "content:encoded"?: XmlText;
  "@_rdf:about"?: string;
}

/**
 * Parsed RSS channel structure from fast-xml-parser.
 */
interface RssChannel {
  title?: XmlText;
  link?: XmlText | XmlText[];
  description?: XmlText;
  item?: RssItem | RssItem[];
}

/**
 * Parsed RSS structure from fast-xml-parser.
 */
interface ParsedRss {
  rss?: {
    channel?: RssChannel;
  };
  // RSS 1.0 has rdf:RDF at the root with items beside the channel
  "rdf:RDF"?: {
    channel?: RssChannel;
    item?: RssItem | RssItem[];
  };
}

/**
 * Returns the first textual link. Channels often mix <link> with atom:link
 * elements, which fast-xml-parser folds into the same array.
 */
function extractLink(link: XmlText | XmlText[] | undefined): string | undefined {
  for (const candidate of asArray(link)) {
    const text = extractText(candidate);
    if (text) {
      return text;
    }
  }
  return undefined;
}

/**
 * Splits an RSS author field such as "jane@example.com (Jane Doe)".
 */
function parseAuthor(raw: string | undefined): { name?: string; email?: string } {
  if (!raw) {
    return {};
  }
  const match = raw.match(/^\s*([^\s@()<>]+@[^\s@()<>]+)\s*(?:\((.+)\))?\s*$/);
  if (match) {
    return { email: match[1], name: match[2]?.trim() || undefined };
  }
  return { name: raw };
}

/**
 * Parses an RSS item into a ParsedEntry.
 */
function parseRssItem(item: RssItem): ParsedEntry {
  // Prefer content:encoded over description for full content
  const content = extractText(item["content:encoded"]) || extractText(item.description);
  const summary = extractText(item.description);

  // dc:creator holds a name; author is an email, optionally followed by a name
  const rssAuthor = parseAuthor(extractText(item.author));
  const author = extractText(item["dc:creator"]) || rssAuthor.name;

  return {
    guid: extractText(item.guid) || item["@_rdf:about"]?.trim() || undefined,
    link: extractLink(item.link),
    title: extractText(item.title),
    author,
    authorEmail: rssAuthor.email,
    content,
    summary,
    contentIsHtml: content ? looksLikeHtml(content) : undefined,
    pubDate: parseFeedDate(extractText(item.pubDate)) || parseFeedDate(extractText(item["dc:date"])),
  };
}

/**
 * Parses an RSS feed XML string into a ParsedFeed.
 *
 * @param xml - The RSS feed XML content as a string
 * @returns A ParsedFeed object with normalized feed data
 * @throws Error if the XML is not a valid RSS feed
 */
export function parseRssFeed(xml: string): ParsedFeed {
  const parser = new XMLParser(feedParserOptions);
  const parsed = parser.parse(xml) as ParsedRss;

  const channel = parsed.rss?.channel || parsed["rdf:RDF"]?.channel;
  if (!channel) {
    throw new Error("Invalid RSS feed: missing channel element");
  }

  const items = asArray(channel.item || parsed["rdf:RDF"]?.item);

  const title = extractText(channel.title);
  if (!title) {
    throw new Error("Invalid RSS feed: missing title");
  }

  return {
    title,
    description: extractText(channel.description),
    siteUrl: extractLink(channel.link),
    items: items.map(parseRssItem),
  };
}
