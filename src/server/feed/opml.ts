/**
 * OPML (Outline Processor Markup Language) parser and generator.
 * Exchanges feed lists with other feed tools.
 *
 * Nested folder outlines are flattened on import; feedmail has no folders.
 * Paused feeds carry a `feedmailPaused="true"` attribute so a round trip
 * keeps them paused. Other readers ignore the attribute.
 *
 * @see http://opml.org/spec2.opml
 */

import { XMLParser } from "fast-xml-parser";
import { FeedmailError } from "../errors";

/**
 * A feed outline read from OPML.
 */
export interface OpmlFeed {
  /** Outline text (or title attribute) */
  title?: string;
  /** URL to the feed XML */
  xmlUrl: string;
  paused: boolean;
}

/**
 * A feed to write as an OPML outline.
 */
export interface OpmlSubscription {
  name: string;
  xmlUrl: string;
  paused?: boolean;
}

export interface OpmlMetadata {
  /** Document title */
  title?: string;
  /** dateCreated value (defaults to now) */
  dateCreated?: Date;
}

export const PAUSED_ATTRIBUTE = "feedmailPaused";

interface ParsedOutline {
  "@_text"?: string;
  "@_title"?: string;
  "@_xmlUrl"?: string;
  "@_feedmailPaused"?: string;
  outline?: ParsedOutline | ParsedOutline[];
}

interface ParsedOpml {
  opml?: {
    // fast-xml-parser returns "" for empty elements like <body></body>
    body?: { outline?: ParsedOutline | ParsedOutline[] } | "";
  };
}

const parserOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  cdataPropName: "__cdata",
  textNodeName: "#text",
  // Keep attribute values as written ("0012" is a name, not a number)
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  removeNSPrefix: false,
};

function collectOutlines(outline: ParsedOutline | ParsedOutline[] | undefined): OpmlFeed[] {
  if (!outline) {
    return [];
  }

  const feeds: OpmlFeed[] = [];
  for (const item of Array.isArray(outline) ? outline : [outline]) {
    const xmlUrl = item["@_xmlUrl"]?.trim();
    if (xmlUrl) {
      feeds.push({
        xmlUrl,
        title: item["@_text"] || item["@_title"] || undefined,
        paused: item["@_feedmailPaused"]?.toLowerCase() === "true",
      });
    }
    // A feed outline may itself hold children; walk them either way
    if (item.outline) {
      feeds.push(...collectOutlines(item.outline));
    }
  }
  return feeds;
}

/**
 * Error thrown when OPML parsing fails.
 */
export class OpmlParseError extends FeedmailError {
  constructor(message: string) {
    super(message);
    this.name = "OpmlParseError";
  }
}

/**
 * Parses an OPML document into a flat list of feed outlines, in document order.
 *
 * @throws OpmlParseError if the XML is not valid OPML
 *
 * @example
 * parseOpml(xml);
 * // [{ title: "blog", xmlUrl: "https://blog.example.com/feed", paused: false }]
 */
export function parseOpml(xml: string): OpmlFeed[] {
  const parser = new XMLParser(parserOptions);

  let parsed: ParsedOpml;
  try {
    parsed = parser.parse(xml, true) as ParsedOpml;
  } catch (error) {
    throw new OpmlParseError(
      `Failed to parse XML: ${error instanceof Error ? error.message : "Unknown error"}`
    );
  }

  if (!parsed.opml) {
    throw new OpmlParseError("Invalid OPML: missing opml element");
  }

  const body = parsed.opml.body;
  if (body === undefined) {
    throw new OpmlParseError("Invalid OPML: missing body element");
  }
  if (body === "" || typeof body !== "object") {
    return [];
  }

  return collectOutlines(body.outline);
}

/**
 * Escapes special XML characters in text content.
 */
function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function buildOutlineElement(sub: OpmlSubscription): string {
  const attrs = [
    `type="rss"`,
    `text="${escapeXml(sub.name)}"`,
    `title="${escapeXml(sub.name)}"`,
    `xmlUrl="${escapeXml(sub.xmlUrl)}"`,
  ];
  if (sub.paused) {
    attrs.push(`${PAUSED_ATTRIBUTE}="true"`);
  }
  return `    <outline ${attrs.join(" ")} />`;
}

/**
 * Generates an OPML 2.0 document listing the given feeds.
 */
export function generateOpml(
  subscriptions: OpmlSubscription[],
  metadata: OpmlMetadata = {}
): string {
  const title = metadata.title || "feedmail subscriptions";
  const dateCreated = (metadata.dateCreated ?? new Date()).toUTCString();
  const outlines = subscriptions.map(buildOutlineElement);

  return [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<opml version="2.0">`,
    `  <head>`,
    `    <title>${escapeXml(title)}</title>`,
    `    <dateCreated>${dateCreated}</dateCreated>`,
    `  </head>`,
    `  <body>`,
    ...outlines,
    `  </body>`,
    `</opml>`,
    ``,
  ].join("\n");
}
