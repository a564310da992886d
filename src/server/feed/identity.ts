/**
 * Entry identity resolution.
 *
 * An entry's identity is the key under which it is remembered between runs.
 * Which fields make up that key depends on the trust policy; the content
 * fingerprint is computed alongside it for change detection.
 */

import { createHash } from "crypto";
import type { ParsedEntry } from "./types";

/**
 * Which entry fields determine identity.
 */
export type TrustPolicy = "trust-guid" | "trust-link" | "trust-guid-and-link";

/**
 * Identity of one fetched entry.
 */
export interface Identity {
  /** Key under which the entry is stored in the feed state */
  key: string;
  /** SHA-256 of the whitespace-normalized title and content */
  fingerprint: string;
  /** Trimmed guid, if the entry has one */
  guid?: string;
  /** Normalized link, if the entry has one */
  link?: string;
}

/**
 * Prefix for keys derived from content alone.
 */
export const FINGERPRINT_KEY_PREFIX = "sha256:";

/**
 * Collapses whitespace runs to a single space and trims.
 */
function normalizeText(text: string | undefined): string {
  return (text ?? "").replace(/\s+/g, " ").trim();
}

/**
 * Normalizes a link so that cosmetic differences do not change identity:
 * lower-cases the scheme and host (URL does this) and drops the fragment.
 * Unparsable links are returned trimmed.
 */
export function normalizeLink(link: string): string {
  const trimmed = link.trim();
  try {
    const url = new URL(trimmed);
    url.hash = "";
    return url.toString();
  } catch {
    return trimmed;
  }
}

/**
 * Generates the content fingerprint for an entry.
 * Whitespace-only edits produce the same fingerprint.
 */
export function fingerprintEntry(entry: ParsedEntry): string {
  const hashInput = `${normalizeText(entry.title)}\n${normalizeText(entry.content ?? entry.summary)}`;
  return createHash("sha256").update(hashInput, "utf8").digest("hex");
}

/**
 * Computes the identity of an entry under the given trust policy.
 *
 * - trust-guid: guid, else link, else content fingerprint
 * - trust-link: link, else guid, else content fingerprint
 * - trust-guid-and-link: both (either one changing gives a new key), else fingerprint
 *
 * @example
 * identify({ guid: "urn:post:1", link: "https://example.com/1" }, "trust-guid").key
 * // => "urn:post:1"
 */
export function identify(entry: ParsedEntry, policy: TrustPolicy): Identity {
  const guid = entry.guid?.trim() || undefined;
  const link = entry.link?.trim() ? normalizeLink(entry.link) : undefined;
  const fingerprint = fingerprintEntry(entry);

  let key: string | undefined;
  switch (policy) {
    case "trust-guid":
      key = guid ?? link;
      break;
    case "trust-link":
      key = link ?? guid;
      break;
    case "trust-guid-and-link":
      key = guid || link ? JSON.stringify([guid ?? null, link ?? null]) : undefined;
      break;
  }

  return {
    key: key ?? `${FINGERPRINT_KEY_PREFIX}${fingerprint}`,
    fingerprint,
    guid,
    link,
  };
}

/**
 * Trust settings as they appear in options and feed overrides.
 */
export interface TrustSettings {
  trustGuid: boolean;
  trustLink: boolean;
  trackChanges: boolean;
}

/**
 * Maps trust settings to a policy.
 *
 * Trusting neither field keeps guid-based identity but forces change tracking,
 * so a rewritten entry is still noticed.
 */
export function resolvePolicy(settings: TrustSettings): {
  policy: TrustPolicy;
  trackChanges: boolean;
} {
  if (settings.trustGuid && settings.trustLink) {
    return { policy: "trust-guid-and-link", trackChanges: settings.trackChanges };
  }
  if (settings.trustLink) {
    return { policy: "trust-link", trackChanges: settings.trackChanges };
  }
  if (settings.trustGuid) {
    return { policy: "trust-guid", trackChanges: settings.trackChanges };
  }
  return { policy: "trust-guid", trackChanges: true };
}
