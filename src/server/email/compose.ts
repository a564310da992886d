/**
 * Builds the outgoing notification for one feed entry.
 *
 * The result is a plain message description; MIME encoding is left to the
 * mail transport.
 */

import { randomUUID } from "crypto";
import type { FeedOptions } from "../config/options";
import type { Identity } from "../feed/identity";
import type { ParsedEntry } from "../feed/types";
import { looksLikeHtml } from "../feed/xml-text";
import { htmlToLine, htmlToText } from "../html/html-to-text";
import { APP_NAME_VERSION } from "../http/user-agent";

/** Domain used in generated Message-IDs and List-IDs. */
export const MESSAGE_ID_DOMAIN = "feedmail.invalid";

/** Length of a subject derived from content when an entry has no title. */
const SUBJECT_FROM_CONTENT_LENGTH = 70;

const EMAIL_PATTERN = /^[^@\s<>]+@[^@\s<>]+\.[^@\s<>]+$/;

export interface MailAddress {
  name: string;
  address: string;
}

/**
 * A notification ready for dispatch.
 */
export interface OutgoingMessage {
  from: MailAddress;
  to: string;
  subject: string;
  text: string;
  /** Present when HTML mail is enabled */
  html?: string;
  date: Date;
  /** Including angle brackets */
  messageId: string;
  /** Message-ID of the notification this one updates */
  inReplyTo?: string;
  /** Extra headers (X-RSS-*, List-ID, User-Agent, configured headers) */
  headers: Record<string, string>;
  /** Entry notifications attached to a digest */
  parts?: OutgoingMessage[];
}

/**
 * Everything needed to render one notification.
 */
export interface ComposeInput {
  feed: { name: string; url: string; title?: string };
  entry: ParsedEntry;
  identity: Identity;
  /** Recipient address */
  to: string;
  options: FeedOptions;
  /** Message-ID of the earlier notification, for change replies */
  inReplyTo?: string;
  now: Date;
}

export interface DigestInput {
  feed: { name: string; url: string; title?: string };
  /** Entry notifications, in delivery order */
  parts: OutgoingMessage[];
  to: string;
  options: FeedOptions;
}

export function generateMessageId(): string {
  return `<${randomUUID()}@${MESSAGE_ID_DOMAIN}>`;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function entryBody(entry: ParsedEntry): { value: string; isHtml: boolean } {
  const value = entry.content ?? entry.summary ?? "";
  return { value, isHtml: entry.contentIsHtml ?? looksLikeHtml(value) };
}

/**
 * Subject line: the title as one line of text, else the start of the content.
 */
export function entrySubject(entry: ParsedEntry): string {
  const title = entry.title?.trim();
  if (title) {
    return looksLikeHtml(title) ? htmlToLine(title) : title.replace(/\s+/g, " ");
  }

  const body = entryBody(entry);
  const text = (body.isHtml ? htmlToLine(body.value) : body.value.replace(/\s+/g, " ")).trim();
  return text ? text.slice(0, SUBJECT_FROM_CONTENT_LENGTH) : "(no title)";
}

/**
 * Sender: the entry author's address unless `forceFrom` is set or the
 * address is unusable, shown as "<feed title>: <author>" with `friendlyName`.
 */
export function entrySender(
  entry: ParsedEntry,
  feedTitle: string | undefined,
  options: Pick<FeedOptions, "from" | "forceFrom" | "friendlyName">
): MailAddress {
  const authorEmail = entry.authorEmail?.trim();
  const address =
    !options.forceFrom && authorEmail && EMAIL_PATTERN.test(authorEmail)
      ? authorEmail
      : options.from;

  if (!options.friendlyName) {
    return { name: "", address };
  }
  const title = feedTitle?.trim();
  const author = entry.author?.trim();
  const name = title && author ? `${title}: ${author}` : title || author || "";
  return { name, address };
}

/**
 * Date header: the first entry date found in `dateHeaderOrder` when
 * `dateHeader` is on, otherwise the send time.
 */
export function entryDate(
  entry: ParsedEntry,
  options: Pick<FeedOptions, "dateHeader" | "dateHeaderOrder">,
  now: Date
): Date {
  if (options.dateHeader) {
    for (const field of options.dateHeaderOrder) {
      const date = field === "updated" ? entry.updated : entry.pubDate;
      if (date) {
        return date;
      }
    }
  }
  return now;
}

function renderText(entry: ParsedEntry): string {
  const body = entryBody(entry);
  const text = body.isHtml
    ? htmlToText(body.value, { baseUrl: entry.link })
    : body.value.trim();
  const link = entry.link ? `URL: ${entry.link}` : "";
  return [text, link].filter(Boolean).join("\n\n") + "\n";
}

function renderHtml(entry: ParsedEntry, subject: string): string {
  const body = entryBody(entry);
  const content = body.isHtml ? body.value : `<pre>${escapeHtml(body.value.trim())}</pre>`;
  const heading = entry.link
    ? `<a href="${escapeHtml(entry.link)}">${escapeHtml(subject)}</a>`
    : escapeHtml(subject);
  const footer = entry.link
    ? `<p class="footer">URL: <a href="${escapeHtml(entry.link)}">${escapeHtml(entry.link)}</a></p>`
    : "";

  return [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(subject)}</title>`,
    "</head>",
    "<body>",
    `<h1 class="header">${heading}</h1>`,
    `<div id="body">${content}</div>`,
    ...(footer ? [footer] : []),
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

/**
 * Builds the notification for an entry.
 */
export function composeMessage(input: ComposeInput): OutgoingMessage {
  const { feed, entry, identity, to, options, inReplyTo, now } = input;
  const subject = entrySubject(entry);

  const headers: Record<string, string> = {
    "User-Agent": options.userAgent ?? APP_NAME_VERSION,
    "X-RSS-Feed": feed.url,
    "X-RSS-ID": identity.key,
    ...(entry.link ? { "X-RSS-URL": entry.link } : {}),
    "List-ID": `<${feed.name}.${MESSAGE_ID_DOMAIN}>`,
    ...options.headers,
  };

  return {
    from: entrySender(entry, feed.title, options),
    to,
    subject,
    text: renderText(entry),
    ...(options.htmlMail ? { html: renderHtml(entry, subject) } : {}),
    date: entryDate(entry, options, now),
    messageId: generateMessageId(),
    ...(inReplyTo ? { inReplyTo } : {}),
    headers,
  };
}

/**
 * Wraps a run's notifications for one feed into a single digest message.
 * Sender and Date come from the last part.
 *
 * @throws RangeError when there are no parts
 */
export function composeDigest(input: DigestInput): OutgoingMessage {
  const { feed, parts, to, options } = input;
  const last = parts.at(-1);
  if (!last) {
    throw new RangeError(`Empty digest for feed "${feed.name}"`);
  }

  const title = feed.title?.trim() || feed.name;
  const index = parts.map((part, i) => {
    const url = part.headers["X-RSS-URL"];
    return `${i + 1}. ${part.subject}${url ? `\n   ${url}` : ""}`;
  });

  return {
    from: last.from,
    to,
    subject: `Digest for ${feed.name} (${parts.length} ${parts.length === 1 ? "entry" : "entries"})`,
    text: `${title}\n\n${index.join("\n")}\n`,
    date: last.date,
    messageId: generateMessageId(),
    headers: {
      "User-Agent": options.userAgent ?? APP_NAME_VERSION,
      "X-RSS-Feed": feed.url,
      "List-ID": `<${feed.name}.${MESSAGE_ID_DOMAIN}>`,
      ...options.headers,
    },
    parts,
  };
}
