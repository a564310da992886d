/**
 * HTML to plain-text conversion for text/plain mail bodies, using SAX parsing.
 */

import { Parser } from "htmlparser2";

/**
 * Elements separated from their surroundings by a blank line.
 */
const PARAGRAPH_TAGS = new Set([
  "p",
  "div",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "blockquote",
  "pre",
  "table",
  "ul",
  "ol",
  "dl",
  "figure",
  "hr",
  "section",
  "article",
  "header",
  "footer",
  "main",
  "nav",
  "aside",
]);

/**
 * Elements that start on their own line.
 */
const LINE_TAGS = new Set(["li", "tr", "dt", "dd", "figcaption"]);

/**
 * Tags whose content should be skipped entirely.
 */
const SKIP_TAGS = new Set(["script", "style", "head", "title"]);

export interface HtmlToTextOptions {
  /** Resolves relative link targets */
  baseUrl?: string;
  /** List link targets as numbered footnotes (default: true) */
  footnotes?: boolean;
}

function resolveHref(href: string, baseUrl?: string): string {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return href;
  }
}

/**
 * Renders HTML as readable plain text.
 *
 * Paragraph-level elements are separated by blank lines, list items start
 * with "* ", and each link is marked `[n]` with its target listed at the end.
 *
 * @example
 * htmlToText('<p>See <a href="https://example.com/">this</a>.</p>');
 * // => "See this[1].\n\n[1]: https://example.com/"
 */
export function htmlToText(html: string, options: HtmlToTextOptions = {}): string {
  if (!html) {
    return "";
  }

  const { baseUrl, footnotes = true } = options;
  let result = "";
  let lastWasSpace = true; // Start true to avoid leading spaces
  let pendingBreak = 0;
  let skipDepth = 0;
  let preDepth = 0;
  const links: string[] = [];
  const anchors: (string | undefined)[] = [];

  function emit(text: string): void {
    if (pendingBreak > 0) {
      result += "\n".repeat(pendingBreak);
      pendingBreak = 0;
    }
    result += text;
  }

  function breakLines(count: number): void {
    if (result.length > 0) {
      pendingBreak = Math.max(pendingBreak, count);
    }
    lastWasSpace = true;
  }

  const parser = new Parser(
    {
      onopentag(name, attribs) {
        const tag = name.toLowerCase();
        if (SKIP_TAGS.has(tag)) {
          skipDepth++;
          return;
        }
        if (tag === "pre") {
          preDepth++;
        }

        if (PARAGRAPH_TAGS.has(tag)) {
          breakLines(2);
        } else if (LINE_TAGS.has(tag)) {
          breakLines(1);
          if (tag === "li") {
            emit("* ");
          }
        } else if (tag === "br") {
          emit("\n");
          lastWasSpace = true;
        } else if ((tag === "td" || tag === "th") && !lastWasSpace) {
          emit(" ");
          lastWasSpace = true;
        } else if (tag === "a") {
          anchors.push(attribs.href?.trim() || undefined);
        } else if (tag === "img" && attribs.alt?.trim()) {
          emit(`[${attribs.alt.trim()}]`);
          lastWasSpace = false;
        }
      },
      ontext(text) {
        if (skipDepth > 0) return;

        if (preDepth > 0) {
          emit(text);
          lastWasSpace = /\s$/.test(text);
          return;
        }

        const normalized = text.replace(/\s+/g, " ");
        for (const char of normalized) {
          if (char === " ") {
            if (!lastWasSpace) {
              emit(" ");
              lastWasSpace = true;
            }
          } else {
            emit(char);
            lastWasSpace = false;
          }
        }
      },
      onclosetag(name) {
        const tag = name.toLowerCase();
        if (SKIP_TAGS.has(tag)) {
          skipDepth--;
          return;
        }
        if (tag === "pre") {
          preDepth--;
        }

        if (PARAGRAPH_TAGS.has(tag)) {
          breakLines(2);
        } else if (LINE_TAGS.has(tag)) {
          breakLines(1);
        } else if (tag === "a") {
          const href = anchors.pop();
          if (footnotes && href && !href.startsWith("#")) {
            const target = resolveHref(href, baseUrl);
            let index = links.indexOf(target);
            if (index === -1) {
              links.push(target);
              index = links.length - 1;
            }
            emit(`[${index + 1}]`);
            lastWasSpace = false;
          }
        }
      },
    },
    { decodeEntities: true }
  );

  parser.write(html);
  parser.end();

  let text = result
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();

  if (links.length > 0) {
    text += `\n\n${links.map((link, index) => `[${index + 1}]: ${link}`).join("\n")}`;
  }

  return text;
}

/**
 * Flattens HTML to a single line of text (for subjects and names).
 */
export function htmlToLine(html: string): string {
  return htmlToText(html, { footnotes: false }).replace(/\s+/g, " ").trim();
}
