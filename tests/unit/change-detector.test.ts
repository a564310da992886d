/**
 * Unit tests for change detection and state recording.
 */

import { describe, it, expect } from "vitest";
import { applyDiff, diff, notifiable } from "../../src/server/feed/change-detector";
import { fingerprintEntry, identify } from "../../src/server/feed/identity";
import type { ParsedEntry } from "../../src/server/feed/types";
import { createFeedState, type FeedState } from "../../src/server/store/schema";

const NOW = new Date("2024-03-01T12:00:00.000Z");
const LATER = new Date("2024-03-02T12:00:00.000Z");

function entry(n: number, overrides: Partial<ParsedEntry> = {}): ParsedEntry {
  return {
    guid: `urn:post:${n}`,
    link: `https://example.com/posts/${n}`,
    title: `Post ${n}`,
    content: `Body of post ${n}`,
    ...overrides,
  };
}

/**
 * Records every entry as seen, as a first run would.
 */
function seed(entries: ParsedEntry[], policy: "trust-guid" | "trust-guid-and-link" = "trust-guid"): FeedState {
  return applyDiff(createFeedState(), diff(createFeedState(), entries, policy), { now: NOW });
}

describe("diff", () => {
  it("classifies everything as new on an empty state", () => {
    const result = diff(createFeedState(), [entry(1), entry(2)], "trust-guid");
    expect(result.new.map((item) => item.identity.key)).toEqual(["urn:post:1", "urn:post:2"]);
    expect(result.changed).toEqual([]);
    expect(result.unchanged).toEqual([]);
  });

  it("classifies stored entries as unchanged", () => {
    const state = seed([entry(1)]);
    const result = diff(state, [entry(1), entry(2)], "trust-guid");
    expect(result.unchanged.map((item) => item.identity.key)).toEqual(["urn:post:1"]);
    expect(result.new.map((item) => item.identity.key)).toEqual(["urn:post:2"]);
  });

  it("keeps feed-delivery order in items", () => {
    const state = seed([entry(2)]);
    const result = diff(state, [entry(3), entry(2), entry(1)], "trust-guid");
    expect(result.items.map((item) => [item.identity.key, item.kind])).toEqual([
      ["urn:post:3", "new"],
      ["urn:post:2", "unchanged"],
      ["urn:post:1", "new"],
    ]);
  });

  it("ignores content edits without change tracking", () => {
    const state = seed([entry(1)]);
    const result = diff(state, [entry(1, { content: "Edited" })], "trust-guid");
    expect(result.unchanged).toHaveLength(1);
  });

  it("reports content edits as changed with change tracking", () => {
    const state = seed([entry(1)]);
    const result = diff(state, [entry(1, { content: "Edited" })], "trust-guid", {
      trackChanges: true,
    });
    expect(result.changed).toHaveLength(1);
    expect(result.changed[0].previous?.identity).toBe("urn:post:1");
  });

  it("does not report whitespace-only edits as changed", () => {
    const state = seed([entry(1)]);
    const result = diff(state, [entry(1, { content: "  Body of\npost 1 " })], "trust-guid", {
      trackChanges: true,
    });
    expect(result.unchanged).toHaveLength(1);
  });

  it("treats a repeated key within one fetch as unchanged", () => {
    const result = diff(createFeedState(), [entry(1), entry(1, { title: "Again" })], "trust-guid");
    expect(result.new).toHaveLength(1);
    expect(result.unchanged).toHaveLength(1);
    expect(result.unchanged[0].entry.title).toBe("Again");
  });

  it("suppresses new and changed entries", () => {
    const state = seed([entry(1)]);
    const result = diff(state, [entry(1, { content: "Edited" }), entry(2)], "trust-guid", {
      trackChanges: true,
      suppress: true,
    });
    expect(result.new).toEqual([]);
    expect(result.changed).toEqual([]);
    expect(result.suppressed.map((item) => item.identity.key)).toEqual([
      "urn:post:1",
      "urn:post:2",
    ]);
  });

  it("is deterministic", () => {
    const state = seed([entry(1)]);
    const entries = [entry(1, { content: "Edited" }), entry(2)];
    expect(diff(state, entries, "trust-guid", { trackChanges: true })).toEqual(
      diff(state, entries, "trust-guid", { trackChanges: true })
    );
  });

  describe("trust-guid-and-link", () => {
    it("reports a moved link as changed, matching on the guid", () => {
      const state = seed([entry(1)], "trust-guid-and-link");
      const moved = entry(1, { link: "https://example.com/new/1" });
      const result = diff(state, [moved], "trust-guid-and-link");
      expect(result.changed).toHaveLength(1);
      expect(result.changed[0].previous?.guid).toBe("urn:post:1");
    });

    it("reports a changed guid as changed, matching on the link", () => {
      const state = seed([entry(1)], "trust-guid-and-link");
      const result = diff(state, [entry(1, { guid: "urn:other:1" })], "trust-guid-and-link");
      expect(result.changed).toHaveLength(1);
      expect(result.changed[0].previous?.link).toBe("https://example.com/posts/1");
    });

    it("prefers the guid match over the link match", () => {
      const state = seed([entry(1), entry(2)], "trust-guid-and-link");
      // guid of post 1 with the link of post 2
      const mixed = entry(1, { link: "https://example.com/posts/2" });
      const result = diff(state, [mixed], "trust-guid-and-link");
      expect(result.changed[0].previous?.identity).toBe(
        JSON.stringify(["urn:post:1", "https://example.com/posts/1"])
      );
    });

    describe("entries sharing a link", () => {
      const HOME = "https://example.com/";
      const post = (n: number) => entry(n, { link: HOME });

      it("reports a new guid as new while its siblings are still in the feed", () => {
        const state = seed([post(1), post(2)], "trust-guid-and-link");
        const result = diff(state, [post(3), post(1), post(2)], "trust-guid-and-link");

        expect(result.items.map((item) => [item.entry.guid, item.kind])).toEqual([
          ["urn:post:3", "new"],
          ["urn:post:1", "unchanged"],
          ["urn:post:2", "unchanged"],
        ]);
      });

      it("stays stable over repeated runs", () => {
        const upstream = [post(3), post(1), post(2)];
        let state = seed([post(1), post(2)], "trust-guid-and-link");

        state = applyDiff(state, diff(state, upstream, "trust-guid-and-link"), { now: LATER });
        expect(Object.keys(state.entries).sort()).toEqual(
          [1, 2, 3].map((n) => JSON.stringify([`urn:post:${n}`, HOME])).sort()
        );

        const again = diff(state, upstream, "trust-guid-and-link");
        expect(again.new).toEqual([]);
        expect(again.changed).toEqual([]);
        expect(again.unchanged).toHaveLength(3);
      });

      it("does not match on the link when the fetched guid is already stored", () => {
        const state = seed([post(1), entry(2)], "trust-guid-and-link");
        // post 1 drops out of the feed; a second item reuses post 2's guid
        const result = diff(state, [entry(2), post(2)], "trust-guid-and-link");

        expect(result.items.map((item) => item.kind)).toEqual(["unchanged", "new"]);
        expect(result.new[0].previous).toBeUndefined();
      });

      it("lets each stored record be claimed by one moved entry only", () => {
        const state = seed([entry(1)], "trust-guid-and-link");
        const link = "https://example.com/posts/1";
        const result = diff(
          state,
          [entry(7, { link }), entry(8, { link })],
          "trust-guid-and-link"
        );

        expect(result.items.map((item) => [item.entry.guid, item.kind])).toEqual([
          ["urn:post:7", "changed"],
          ["urn:post:8", "new"],
        ]);
      });
    });
  });
});

describe("notifiable", () => {
  const state = seed([entry(1)]);
  const result = diff(state, [entry(1, { content: "Edited" }), entry(2)], "trust-guid", {
    trackChanges: true,
  });

  it("returns only new entries by default", () => {
    expect(notifiable(result, { replyChanges: false }).map((item) => item.identity.key)).toEqual([
      "urn:post:2",
    ]);
  });

  it("includes changed entries with replyChanges, in delivery order", () => {
    expect(notifiable(result, { replyChanges: true }).map((item) => item.identity.key)).toEqual([
      "urn:post:1",
      "urn:post:2",
    ]);
  });

  it("never returns suppressed entries", () => {
    const suppressed = diff(createFeedState(), [entry(1)], "trust-guid", { suppress: true });
    expect(notifiable(suppressed, { replyChanges: true })).toEqual([]);
  });
});

describe("applyDiff", () => {
  it("records new entries with fingerprint and components", () => {
    const state = seed([entry(1)]);
    expect(state.entries["urn:post:1"]).toEqual({
      identity: "urn:post:1",
      firstSeen: NOW.toISOString(),
      fingerprint: fingerprintEntry(entry(1)),
      guid: "urn:post:1",
      link: "https://example.com/posts/1",
    });
  });

  it("does not modify the input state", () => {
    const state = createFeedState();
    applyDiff(state, diff(state, [entry(1)], "trust-guid"), { now: NOW });
    expect(state.entries).toEqual({});
  });

  it("records suppressed entries", () => {
    const result = diff(createFeedState(), [entry(1), entry(2)], "trust-guid", { suppress: true });
    const state = applyDiff(createFeedState(), result, { now: NOW });
    expect(Object.keys(state.entries)).toEqual(["urn:post:1", "urn:post:2"]);
  });

  it("stores message ids and skips unsent entries", () => {
    const result = diff(createFeedState(), [entry(1), entry(2)], "trust-guid");
    const state = applyDiff(createFeedState(), result, {
      now: NOW,
      messageIds: new Map([["urn:post:1", "<one@feedmail.invalid>"]]),
      skip: new Set(["urn:post:2"]),
    });
    expect(state.entries["urn:post:1"].messageId).toBe("<one@feedmail.invalid>");
    expect(state.entries["urn:post:2"]).toBeUndefined();
  });

  it("keeps firstSeen and the original message id on change", () => {
    const first = applyDiff(createFeedState(), diff(createFeedState(), [entry(1)], "trust-guid"), {
      now: NOW,
      messageIds: new Map([["urn:post:1", "<one@feedmail.invalid>"]]),
    });
    const edited = entry(1, { content: "Edited" });
    const result = diff(first, [edited], "trust-guid", { trackChanges: true });
    const second = applyDiff(first, result, { now: LATER });

    expect(second.entries["urn:post:1"]).toEqual({
      identity: "urn:post:1",
      firstSeen: NOW.toISOString(),
      updatedAt: LATER.toISOString(),
      fingerprint: fingerprintEntry(edited),
      guid: "urn:post:1",
      link: "https://example.com/posts/1",
      messageId: "<one@feedmail.invalid>",
    });
  });

  it("keeps the original message id when a reply is sent", () => {
    const first = applyDiff(createFeedState(), diff(createFeedState(), [entry(1)], "trust-guid"), {
      now: NOW,
      messageIds: new Map([["urn:post:1", "<one@feedmail.invalid>"]]),
    });
    const result = diff(first, [entry(1, { content: "Edited" })], "trust-guid", {
      trackChanges: true,
    });
    const second = applyDiff(first, result, {
      now: LATER,
      messageIds: new Map([["urn:post:1", "<reply@feedmail.invalid>"]]),
    });

    expect(second.entries["urn:post:1"].messageId).toBe("<one@feedmail.invalid>");
  });

  it("stores the reply's message id when none was recorded before", () => {
    const first = applyDiff(createFeedState(), diff(createFeedState(), [entry(1)], "trust-guid"), {
      now: NOW,
    });
    const result = diff(first, [entry(1, { content: "Edited" })], "trust-guid", {
      trackChanges: true,
    });
    const second = applyDiff(first, result, {
      now: LATER,
      messageIds: new Map([["urn:post:1", "<reply@feedmail.invalid>"]]),
    });

    expect(second.entries["urn:post:1"].messageId).toBe("<reply@feedmail.invalid>");
  });

  it("moves a composite match to its new key", () => {
    const state = seed([entry(1)], "trust-guid-and-link");
    const moved = entry(1, { link: "https://example.com/new/1" });
    const next = applyDiff(state, diff(state, [moved], "trust-guid-and-link"), { now: LATER });
    expect(Object.keys(next.entries)).toEqual([identify(moved, "trust-guid-and-link").key]);
  });

  it("leaves unchanged entries untouched", () => {
    const state = seed([entry(1)]);
    const next = applyDiff(state, diff(state, [entry(1)], "trust-guid"), { now: LATER });
    expect(next.entries).toEqual(state.entries);
  });
});
