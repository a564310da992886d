/**
 * Change detection.
 *
 * Compares freshly fetched entries against a feed's stored state and
 * classifies each one as new, changed, unchanged or suppressed. The result is
 * a pure function of (state, entries, policy, options). Recording the outcome
 * is a separate step (applyDiff), run once the caller knows what was
 * actually notified.
 */

import type { FeedState, SeenEntry } from "../store/schema";
import { identify, type Identity, type TrustPolicy } from "./identity";
import type { ParsedEntry } from "./types";

/**
 * Classification of one fetched entry.
 */
export type ChangeKind = "new" | "changed" | "unchanged" | "suppressed";

/**
 * One fetched entry with its identity and classification.
 */
export interface DiffItem {
  kind: ChangeKind;
  entry: ParsedEntry;
  identity: Identity;
  /** Stored record this entry matched, if any */
  previous?: SeenEntry;
}

/**
 * Diff output. Each list keeps feed-delivery order.
 */
export interface DiffResult {
  new: DiffItem[];
  changed: DiffItem[];
  unchanged: DiffItem[];
  suppressed: DiffItem[];
  /** Every item in delivery order */
  items: DiffItem[];
}

export interface DiffOptions {
  /** Compare stored fingerprints and report content edits as "changed" */
  trackChanges?: boolean;
  /** Record new and changed entries without notifying ("initialize without sending") */
  suppress?: boolean;
}

/**
 * Finds the stored entry a composite identity moved away from: one that shares
 * the guid but not the link, or (failing that) the link but not the guid.
 *
 * Stored records matched exactly by some entry of the same fetch, or already
 * claimed by an earlier partial match, are not candidates. A link match is
 * also ruled out when the fetched guid is already stored, so entries that
 * share a link (posts all pointing at a homepage) stay distinct.
 */
function findPartialMatch(
  state: FeedState,
  identity: Identity,
  taken: ReadonlySet<string>
): SeenEntry | undefined {
  const candidates = Object.values(state.entries).filter((seen) => !taken.has(seen.identity));
  if (identity.guid) {
    const byGuid = candidates.find(
      (seen) => seen.guid === identity.guid && seen.link !== identity.link
    );
    if (byGuid) {
      return byGuid;
    }
  }
  if (!identity.link) {
    return undefined;
  }
  const { guid } = identity;
  if (guid && Object.values(state.entries).some((seen) => seen.guid === guid)) {
    return undefined;
  }
  return candidates.find(
    (seen) => seen.link === identity.link && (seen.guid === undefined || seen.guid !== guid)
  );
}

/**
 * Classifies fetched entries against the stored feed state.
 *
 * - A key not in the state is "new", except under trust-guid-and-link when a
 *   stored entry no longer in the feed shares the guid (or, failing that, the
 *   link): that is the same entry with one field moved, so it is "changed".
 * - A known key is "changed" when change tracking is on and the stored
 *   fingerprint differs, otherwise "unchanged".
 * - A key repeated within one fetch is "unchanged" after its first occurrence.
 * - With `suppress`, anything new or changed becomes "suppressed".
 */
export function diff(
  state: FeedState,
  entries: ParsedEntry[],
  policy: TrustPolicy,
  options: DiffOptions = {}
): DiffResult {
  const { trackChanges = false, suppress = false } = options;
  const result: DiffResult = { new: [], changed: [], unchanged: [], suppressed: [], items: [] };
  const keysInFetch = new Set<string>();
  const identities = entries.map((entry) => identify(entry, policy));
  // Stored records that an entry of this fetch matches exactly, or that a
  // partial match has already claimed
  const taken = new Set(
    identities.map((identity) => identity.key).filter((key) => state.entries[key] !== undefined)
  );

  entries.forEach((entry, index) => {
    const identity = identities[index];
    let kind: ChangeKind;
    let previous: SeenEntry | undefined;

    if (keysInFetch.has(identity.key)) {
      kind = "unchanged";
    } else {
      previous = state.entries[identity.key];
      if (previous) {
        const edited =
          trackChanges &&
          previous.fingerprint !== undefined &&
          previous.fingerprint !== identity.fingerprint;
        kind = edited ? "changed" : "unchanged";
      } else {
        previous =
          policy === "trust-guid-and-link" ? findPartialMatch(state, identity, taken) : undefined;
        if (previous) {
          taken.add(previous.identity);
        }
        kind = previous ? "changed" : "new";
      }
    }
    keysInFetch.add(identity.key);

    if (suppress && (kind === "new" || kind === "changed")) {
      kind = "suppressed";
    }

    const item: DiffItem = { kind, entry, identity, ...(previous ? { previous } : {}) };
    result[kind].push(item);
    result.items.push(item);
  });

  return result;
}

/**
 * Entries worth a notification: new ones, plus changed ones when
 * change notifications are enabled. Delivery order is preserved.
 */
export function notifiable(result: DiffResult, options: { replyChanges: boolean }): DiffItem[] {
  return result.items.filter(
    (item) => item.kind === "new" || (item.kind === "changed" && options.replyChanges)
  );
}

export interface ApplyDiffOptions {
  /** Timestamp recorded as firstSeen/updatedAt */
  now: Date;
  /** Message-ID of the notification sent for an item, keyed by identity key */
  messageIds?: ReadonlyMap<string, string>;
  /** Identity keys to leave unrecorded (their notification failed) */
  skip?: ReadonlySet<string>;
}

/**
 * Returns a new feed state with the diff's new, changed and suppressed
 * entries recorded. Unchanged entries keep their stored record.
 *
 * A changed entry keeps its original firstSeen and Message-ID, so every
 * later change notification threads under the first one. When it matched
 * under a different key, the old key is dropped.
 */
export function applyDiff(state: FeedState, result: DiffResult, options: ApplyDiffOptions): FeedState {
  const { now, messageIds, skip } = options;
  const timestamp = now.toISOString();
  const entries: Record<string, SeenEntry> = { ...state.entries };

  for (const item of result.items) {
    if (item.kind === "unchanged" || skip?.has(item.identity.key)) {
      continue;
    }

    const { identity, previous } = item;
    if (previous && previous.identity !== identity.key) {
      delete entries[previous.identity];
    }

    const messageId = previous?.messageId ?? messageIds?.get(identity.key);
    const record: SeenEntry = {
      ...previous,
      identity: identity.key,
      firstSeen: previous?.firstSeen ?? timestamp,
      fingerprint: identity.fingerprint,
      ...(identity.guid ? { guid: identity.guid } : {}),
      ...(identity.link ? { link: identity.link } : {}),
      ...(messageId ? { messageId } : {}),
      ...(previous ? { updatedAt: timestamp } : {}),
    };
    entries[identity.key] = record;
  }

  return { ...state, entries };
}
