/**
 * Shared helpers for reading fast-xml-parser output.
 */

/**
 * Options shared by the RSS and Atom parsers.
 * These handle common feed quirks like CDATA sections and attributes.
 */
export const feedParserOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  // Handle CDATA sections
  cdataPropName: "__cdata",
  // Preserve text content
  textNodeName: "#text",
  // Keep values as strings: a numeric guid must not lose leading zeros
  parseTagValue: false,
  // Don't trim whitespace from text nodes
  trimValues: false,
  // Handle namespace prefixes (like dc:creator, content:encoded)
  removeNSPrefix: false,
};

/**
 * A text node as fast-xml-parser represents it: a plain string, or an object
 * carrying "#text" or "__cdata" next to its attributes.
 */
export type XmlText = string | number | { "#text"?: string | number; __cdata?: string };

/**
 * Decodes XML numeric character references that fast-xml-parser doesn't handle.
 * Handles both decimal (&#039;) and hexadecimal (&#x27;) forms.
 */
export function decodeNumericEntities(text: string): string {
  const decode = (match: string, codePoint: number) =>
    codePoint > 0 && codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match;
  return text
    .replace(/&#(\d+);/g, (match, code: string) => decode(match, parseInt(code, 10)))
    .replace(/&#x([0-9a-fA-F]+);/g, (match, code: string) => decode(match, parseInt(code, 16)));
}

/**
 * Extracts text content from various possible structures.
 * Handles plain strings, CDATA sections, and nested text nodes.
 * Returns undefined for missing or blank values.
 */
export function extractText(value: XmlText | undefined | null): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  let text: string | undefined;
  if (typeof value === "string" || typeof value === "number") {
    text = String(value);
  } else if (value.__cdata !== undefined) {
    text = String(value.__cdata);
  } else if (value["#text"] !== undefined) {
    text = String(value["#text"]);
  }

  const trimmed = text?.trim();
  return trimmed ? decodeNumericEntities(trimmed) : undefined;
}

/**
 * Normalizes a repeated element to an array.
 */
export function asArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Parses a feed date. Handles ISO 8601, RFC 822 and common timezone abbreviations.
 */
export function parseFeedDate(dateString: string | undefined): Date | undefined {
  if (!dateString) {
    return undefined;
  }

  const trimmed = dateString.trim();
  if (!trimmed) {
    return undefined;
  }

  const nativeDate = new Date(trimmed);
  if (!isNaN(nativeDate.getTime())) {
    return nativeDate;
  }

  // "DD Mon YYYY HH:MM:SS" without a timezone is read as GMT
  const match = trimmed.match(/^(\d{1,2})\s+([A-Za-z]{3})\s+(\d{4})\s+(\d{2}):(\d{2}):(\d{2})$/);
  if (match) {
    const parsed = new Date(
      `${match[2]} ${match[1]}, ${match[3]} ${match[4]}:${match[5]}:${match[6]} GMT`
    );
    if (!isNaN(parsed.getTime())) {
      return parsed;
    }
  }

  const timezoneMap: Record<string, string> = {
    PST: "-0800",
    PDT: "-0700",
    MST: "-0700",
    MDT: "-0600",
    CST: "-0600",
    CDT: "-0500",
    EST: "-0500",
    EDT: "-0400",
  };

  for (const [abbr, offset] of Object.entries(timezoneMap)) {
    if (trimmed.includes(abbr)) {
      const parsed = new Date(trimmed.replace(abbr, offset));
      if (!isNaN(parsed.getTime())) {
        return parsed;
      }
    }
  }

  return undefined;
}

/**
 * Heuristic used when a feed does not say whether a text field is HTML.
 */
export function looksLikeHtml(text: string): boolean {
  return /<\/?[a-z][\s\S]*?>/i.test(text) || /&(?:[a-z]+|#\d+);/i.test(text);
}
