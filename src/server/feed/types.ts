/**
 * Unified feed parsing output interfaces.
 * These are used as the common output format for all feed parsers (RSS, Atom, JSON Feed).
 */

/**
 * A parsed entry from any feed format.
 */
export interface ParsedEntry {
  /** Unique identifier for the entry (guid in RSS, id in Atom and JSON Feed) */
  guid?: string;
  /** URL link to the entry */
  link?: string;
  /** Entry title */
  title?: string;
  /** Author name */
  author?: string;
  /** Author email address, when the feed exposes one */
  authorEmail?: string;
  /** Full content of the entry (content:encoded in RSS, content in Atom) */
  content?: string;
  /** Summary/description of the entry */
  summary?: string;
  /** Whether content is HTML (true) or plain text (false) */
  contentIsHtml?: boolean;
  /** Publication date of the entry */
  pubDate?: Date;
  /** Last modification date of the entry */
  updated?: Date;
}

/**
 * A parsed feed from any format (RSS, Atom, JSON Feed).
 */
export interface ParsedFeed {
  /** Feed title */
  title: string;
  /** Feed description */
  description?: string;
  /** URL to the feed's website */
  siteUrl?: string;
  /** Feed entries, in the order the publisher delivered them */
  items: ParsedEntry[];
}
