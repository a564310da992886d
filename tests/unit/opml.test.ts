/**
 * Unit tests for OPML parser and generator.
 */

import { describe, it, expect } from "vitest";
import { generateOpml, OpmlParseError, parseOpml } from "../../src/server/feed/opml";

describe("parseOpml", () => {
  it("parses flat feed outlines in document order", () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>
<opml version="2.0">
  <head><title>My Feeds</title></head>
  <body>
    <outline type="rss" text="Example Blog" xmlUrl="https://example.com/feed.xml" />
    <outline type="rss" title="Tech News" xmlUrl="https://tech.example.com/rss" />
  </body>
</opml>`;

    expect(parseOpml(xml)).toEqual([
      { title: "Example Blog", xmlUrl: "https://example.com/feed.xml", paused: false },
      { title: "Tech News", xmlUrl: "https://tech.example.com/rss", paused: false },
    ]);
  });

  it("prefers the text attribute over title", () => {
    const xml = `<opml version="2.0"><body>
      <outline text="from-text" title="from-title" xmlUrl="https://example.com/feed" />
    </body></opml>`;

    expect(parseOpml(xml)[0].title).toBe("from-text");
  });

  it("flattens nested folders", () => {
    const xml = `<opml version="2.0"><body>
      <outline text="Tech">
        <outline text="a" xmlUrl="https://a.example.com/feed" />
        <outline text="Deeper">
          <outline text="b" xmlUrl="https://b.example.com/feed" />
        </outline>
      </outline>
      <outline text="c" xmlUrl="https://c.example.com/feed" />
    </body></opml>`;

    expect(parseOpml(xml).map((feed) => feed.title)).toEqual(["a", "b", "c"]);
  });

  it("skips outlines without xmlUrl", () => {
    const xml = `<opml version="2.0"><body>
      <outline text="Just a note" />
      <outline text="a" xmlUrl="https://a.example.com/feed" />
    </body></opml>`;

    expect(parseOpml(xml)).toHaveLength(1);
  });

  it("reads the paused attribute", () => {
    const xml = `<opml version="2.0"><body>
      <outline text="a" xmlUrl="https://a.example.com/feed" feedmailPaused="true" />
      <outline text="b" xmlUrl="https://b.example.com/feed" feedmailPaused="false" />
    </body></opml>`;

    expect(parseOpml(xml).map((feed) => feed.paused)).toEqual([true, false]);
  });

  it("decodes entities in attributes", () => {
    const xml = `<opml version="2.0"><body>
      <outline text="Q &amp; A" xmlUrl="https://example.com/feed?a=1&amp;b=2" />
    </body></opml>`;

    expect(parseOpml(xml)[0]).toEqual({
      title: "Q & A",
      xmlUrl: "https://example.com/feed?a=1&b=2",
      paused: false,
    });
  });

  it("returns an empty list for an empty body", () => {
    expect(parseOpml(`<opml version="2.0"><head></head><body></body></opml>`)).toEqual([]);
  });

  it("throws OpmlParseError when the opml element is missing", () => {
    expect(() => parseOpml("<rss><channel></channel></rss>")).toThrow(
      "Invalid OPML: missing opml element"
    );
  });

  it("throws OpmlParseError when the body element is missing", () => {
    expect(() => parseOpml(`<opml version="2.0"><head></head></opml>`)).toThrow(
      "Invalid OPML: missing body element"
    );
  });

  it("throws OpmlParseError on malformed XML", () => {
    expect(() => parseOpml(`<opml><body><outline text="a"></body></opml>`)).toThrow(
      OpmlParseError
    );
  });
});

describe("generateOpml", () => {
  const dateCreated = new Date("2024-03-01T12:00:00.000Z");

  it("writes one outline per feed", () => {
    const xml = generateOpml(
      [
        { name: "blog", xmlUrl: "https://example.com/feed.xml" },
        { name: "news", xmlUrl: "https://news.example.com/rss", paused: true },
      ],
      { dateCreated }
    );

    expect(xml).toBe(`<?xml version="1.0" encoding="UTF-8"?>
<opml version="2.0">
  <head>
    <title>feedmail subscriptions</title>
    <dateCreated>Fri, 01 Mar 2024 12:00:00 GMT</dateCreated>
  </head>
  <body>
    <outline type="rss" text="blog" title="blog" xmlUrl="https://example.com/feed.xml" />
    <outline type="rss" text="news" title="news" xmlUrl="https://news.example.com/rss" feedmailPaused="true" />
  </body>
</opml>
`);
  });

  it("escapes special characters", () => {
    const xml = generateOpml([{ name: "a", xmlUrl: "https://example.com/?x=1&y=<2>" }], {
      dateCreated,
    });
    expect(xml).toContain(`xmlUrl="https://example.com/?x=1&amp;y=&lt;2&gt;"`);
  });

  it("round-trips through parseOpml", () => {
    const feeds = [
      { name: "blog", xmlUrl: "https://example.com/feed.xml?a=1&b=2", paused: false },
      { name: "news", xmlUrl: "https://news.example.com/rss", paused: true },
    ];

    expect(parseOpml(generateOpml(feeds))).toEqual(
      feeds.map((feed) => ({ title: feed.name, xmlUrl: feed.xmlUrl, paused: feed.paused }))
    );
  });
});
