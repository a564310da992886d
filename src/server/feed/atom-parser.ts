/**
 * Atom 1.0 feed parser.
 * Parses Atom feeds into a unified ParsedFeed format.
 */

import { XMLBuilder, XMLParser } from "fast-xml-parser";
import type { ParsedFeed, ParsedEntry } from "./types";
import { asArray, extractText, feedParserOptions, parseFeedDate, type XmlText } from "./xml-text";

/**
 * Atom link element structure.
 */
interface AtomLink {
  "@_href"?: string;
  "@_rel"?: string;
  "@_type"?: string;
}

/**
 * Atom text construct (title, summary, content).
 * Can be plain text, HTML, or XHTML wrapped in a div.
 */
interface AtomTextConstruct {
  "@_type"?: string;
  "@_src"?: string;
  "#text"?: string;
  __cdata?: string;
  div?: unknown;
}

/**
 * Atom person construct (author, contributor).
 */
interface AtomPerson {
  name?: XmlText;
  email?: XmlText;
}

/**
 * Parsed Atom entry structure from fast-xml-parser.
 */
interface AtomEntry {
  id?: XmlText;
  title?: string | AtomTextConstruct;
  link?: AtomLink | AtomLink[];
  summary?: string | AtomTextConstruct;
  content?: string | AtomTextConstruct;
  author?: AtomPerson | AtomPerson[];
  published?: XmlText;
  updated?: XmlText;
}

/**
 * Parsed Atom feed structure from fast-xml-parser.
 */
interface AtomFeed {
  title?: string | AtomTextConstruct;
  subtitle?: string | AtomTextConstruct;
  link?: AtomLink | AtomLink[];
  author?: AtomPerson | AtomPerson[];
  entry?: AtomEntry | AtomEntry[];
}

interface ParsedAtom {
  feed?: AtomFeed;
}

const xhtmlBuilder = new XMLBuilder(feedParserOptions);

/**
 * Extracted text plus whether it carries markup.
 */
interface TextConstruct {
  text: string;
  html: boolean;
}

/**
 * Extracts content from an Atom text construct.
 * XHTML content is serialized back to markup; out-of-line content (src) is skipped.
 */
function extractTextConstruct(
  value: string | AtomTextConstruct | undefined
): TextConstruct | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "string") {
    const text = extractText(value);
    return text ? { text, html: false } : undefined;
  }
  if (value["@_src"]) {
    return undefined;
  }

  const type = value["@_type"] ?? "text";

  if (type === "xhtml" && value.div !== undefined) {
    const markup =
      typeof value.div === "string" ? value.div : String(xhtmlBuilder.build(value.div));
    const text = markup.trim();
    return text ? { text, html: true } : undefined;
  }

  const text = extractText(value);
  if (!text) {
    return undefined;
  }
  return { text, html: type === "html" || type.includes("html") };
}

/**
 * Extracts the alternate link (main entry/feed link) from Atom link elements.
 * A link without rel defaults to "alternate".
 */
function extractAlternateLink(links: AtomLink | AtomLink[] | undefined): string | undefined {
  const linkArray = asArray(links);
  const alternate =
    linkArray.find((link) => link["@_rel"] === "alternate" && link["@_href"]) ??
    linkArray.find((link) => !link["@_rel"] && link["@_href"]);
  return alternate?.["@_href"]?.trim() || undefined;
}

/**
 * Parses an Atom entry into a ParsedEntry.
 * Entries without an author inherit the feed-level author.
 */
function parseAtomEntry(entry: AtomEntry, feedAuthor: AtomPerson | undefined): ParsedEntry {
  const content = extractTextConstruct(entry.content) ?? extractTextConstruct(entry.summary);
  const summary = extractTextConstruct(entry.summary);
  const title = extractTextConstruct(entry.title);
  const author = asArray(entry.author)[0] ?? feedAuthor;

  return {
    guid: extractText(entry.id),
    link: extractAlternateLink(entry.link),
    title: title?.text,
    author: extractText(author?.name),
    authorEmail: extractText(author?.email),
    content: content?.text,
    summary: summary?.text,
    contentIsHtml: content?.html,
    pubDate: parseFeedDate(extractText(entry.published)) ?? parseFeedDate(extractText(entry.updated)),
    updated: parseFeedDate(extractText(entry.updated)),
  };
}

/**
 * Parses an Atom 1.0 feed XML string into a ParsedFeed.
 *
 * @param xml - The Atom feed XML content as a string
 * @returns A ParsedFeed object with normalized feed data
 * @throws Error if the XML is not a valid Atom feed
 */
export function parseAtomFeed(xml: string): ParsedFeed {
  const parser = new XMLParser(feedParserOptions);
  const parsed = parser.parse(xml) as ParsedAtom;

  const feed = parsed.feed;
  if (!feed) {
    throw new Error("Invalid Atom feed: missing feed element");
  }

  const title = extractTextConstruct(feed.title);
  if (!title) {
    throw new Error("Invalid Atom feed: missing title");
  }

  const feedAuthor = asArray(feed.author)[0];

  return {
    title: title.text,
    description: extractTextConstruct(feed.subtitle)?.text,
    siteUrl: extractAlternateLink(feed.link),
    items: asArray(feed.entry).map((entry) => parseAtomEntry(entry, feedAuthor)),
  };
}
