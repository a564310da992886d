/**
 * Unit tests for post-process transforms.
 */

import { describe, it, expect } from "vitest";
import { ConfigError } from "../../src/server/errors";
import { identify } from "../../src/server/feed/identity";
import type { ParsedEntry } from "../../src/server/feed/types";
import {
  absolutizeLinks,
  createTransformRegistry,
  stripTrackingParams,
  TransformRegistry,
  type PostProcessContext,
} from "../../src/server/plugins/post-process";

const ENTRY: ParsedEntry = {
  guid: "urn:post:1",
  link: "https://example.com/posts/1?utm_source=rss&id=7",
  title: "Hello World",
  content: '<p>See <a href="/about">About</a></p>',
};

const CONTEXT: PostProcessContext = {
  feedName: "blog",
  feedUrl: "https://example.com/feed.xml",
  identity: identify(ENTRY, "trust-guid"),
};

describe("stripTrackingParams", () => {
  it("removes utm_*, fbclid and gclid", () => {
    expect(
      stripTrackingParams("https://example.com/a?utm_source=x&utm_medium=y&fbclid=1&gclid=2&id=7")
    ).toBe("https://example.com/a?id=7");
  });

  it("returns links without tracking parameters unchanged", () => {
    expect(stripTrackingParams("https://example.com/a?b=1")).toBe("https://example.com/a?b=1");
  });

  it("returns unparsable links unchanged", () => {
    expect(stripTrackingParams("not a url")).toBe("not a url");
  });
});

describe("absolutizeLinks", () => {
  it("resolves relative href and src values", () => {
    expect(
      absolutizeLinks('<a href="/a">A</a><img src=\'img/b.png\'>', "https://example.com/posts/1")
    ).toBe('<a href="https://example.com/a">A</a><img src=\'https://example.com/posts/img/b.png\'>');
  });

  it("leaves absolute URLs and fragments alone", () => {
    const html = '<a href="https://other.example.com/">x</a><a href="#top">y</a><a href="mailto:a@example.com">z</a>';
    expect(absolutizeLinks(html, "https://example.com/")).toBe(html);
  });
});

describe("TransformRegistry", () => {
  it("applies transforms in order", () => {
    const registry = createTransformRegistry();
    const result = registry.apply(["strip-tracking", "downcase"], ENTRY, CONTEXT);

    expect(result).toEqual({
      guid: "urn:post:1",
      link: "https://example.com/posts/1?id=7",
      title: "hello world",
      content: '<p>see <a href="/about">about</a></p>',
    });
  });

  it("does not modify the input entry", () => {
    createTransformRegistry().apply(["downcase"], ENTRY, CONTEXT);
    expect(ENTRY.title).toBe("Hello World");
  });

  it("resolves links against the entry link", () => {
    const result = createTransformRegistry().apply(["absolute-links"], ENTRY, CONTEXT);
    expect(result?.content).toBe('<p>See <a href="https://example.com/about">About</a></p>');
  });

  it("stops when a transform drops the entry", () => {
    const registry = new TransformRegistry();
    const seen: string[] = [];
    registry.register("drop", () => null);
    registry.register("record", (entry) => {
      seen.push(entry.title ?? "");
      return entry;
    });

    expect(registry.apply(["drop", "record"], ENTRY, CONTEXT)).toBeNull();
    expect(seen).toEqual([]);
  });

  it("passes the context to transforms", () => {
    const registry = new TransformRegistry();
    registry.register("tag", (entry, context) => ({ ...entry, title: context.feedName }));
    expect(registry.apply(["tag"], ENTRY, CONTEXT)?.title).toBe("blog");
  });

  it("rejects duplicate keys", () => {
    const registry = createTransformRegistry();
    expect(() => registry.register("downcase", (entry) => entry)).toThrow(
      'Post-process transform "downcase" is already registered'
    );
  });

  it("lists unknown keys in one ConfigError", () => {
    const registry = createTransformRegistry();
    expect(() => registry.assertKnown(["downcase", "nope", "also-nope"])).toThrow(ConfigError);
    expect(() => registry.assertKnown(["nope", "also-nope"])).toThrow(
      "Unknown post-process transforms: nope, also-nope (available: downcase, strip-tracking, absolute-links)"
    );
    expect(() => registry.assertKnown(["downcase"])).not.toThrow();
  });
});
