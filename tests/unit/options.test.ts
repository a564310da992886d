/**
 * Unit tests for run options.
 */

import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  loadOptions,
  parseOptions,
  postProcessKeys,
  resolveFeedOptions,
} from "../../src/server/config/options";
import { ConfigError } from "../../src/server/errors";

const NO_SECRETS = { smtpPassword: undefined };
const FEED_URL = "https://a.example.com/feed";

describe("parseOptions", () => {
  it("fills in defaults", () => {
    const options = parseOptions({}, NO_SECRETS);

    expect(options).toMatchObject({
      from: "user@feedmail.invalid",
      forceFrom: false,
      friendlyName: true,
      trustGuid: true,
      trustLink: false,
      trackChanges: false,
      replyChanges: false,
      htmlMail: false,
      dateHeader: false,
      dateHeaderOrder: ["updated", "published"],
      headers: {},
      feedTimeout: 60,
      dispatchTimeout: 60,
      dispatchErrors: "continue",
      digest: false,
      checkpoint: "run",
      postProcess: [],
      sendmail: "/usr/sbin/sendmail",
      feeds: {},
    });
    expect(options.smtp).toEqual({
      enabled: false,
      host: "localhost",
      port: 25,
      secure: false,
    });
    expect(options.userAgent).toBeUndefined();
  });

  it("treats a null document as empty", () => {
    expect(parseOptions(null, NO_SECRETS).from).toBe("user@feedmail.invalid");
  });

  it("freezes the result", () => {
    const options = parseOptions({ feeds: { [FEED_URL]: { htmlMail: true } } }, NO_SECRETS);
    expect(Object.isFrozen(options)).toBe(true);
    expect(Object.isFrozen(options.smtp)).toBe(true);
    expect(Object.isFrozen(options.feeds[FEED_URL])).toBe(true);
  });

  it("rejects unknown keys", () => {
    expect(() => parseOptions({ bogus: 1 }, NO_SECRETS)).toThrow(
      "Invalid options: options: Unrecognized key(s) in object: 'bogus'"
    );
  });

  it("names each invalid field", () => {
    expect(() =>
      parseOptions({ feedTimeout: "10", dispatchErrors: "explode" }, NO_SECRETS)
    ).toThrow(ConfigError);
    expect(() => parseOptions({ feedTimeout: "10" }, NO_SECRETS)).toThrow(
      "Invalid options: feedTimeout: Expected number, received string"
    );
  });

  it("rejects unknown keys in per-feed overrides", () => {
    expect(() =>
      parseOptions({ feeds: { [FEED_URL]: { dispatchTimeout: 5 } } }, NO_SECRETS)
    ).toThrow(ConfigError);
  });

  it("takes the SMTP password from the environment", () => {
    const options = parseOptions(
      { smtp: { enabled: true, user: "mailer", password: "from-file" } },
      { smtpPassword: "test-secret" }
    );
    expect(options.smtp.password).toBe("test-secret");
  });

  it("keeps the file's SMTP password without an override", () => {
    const options = parseOptions({ smtp: { password: "from-file" } }, NO_SECRETS);
    expect(options.smtp.password).toBe("from-file");
  });
});

describe("loadOptions", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "feedmail-options-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns defaults when the file does not exist", async () => {
    const options = await loadOptions(path.join(dir, "missing.json"), NO_SECRETS);
    expect(options.checkpoint).toBe("run");
  });

  it("reads and validates the file", async () => {
    const file = path.join(dir, "config.json");
    await writeFile(file, JSON.stringify({ htmlMail: true, checkpoint: "feed" }));

    const options = await loadOptions(file, NO_SECRETS);
    expect(options.htmlMail).toBe(true);
    expect(options.checkpoint).toBe("feed");
  });

  it("throws ConfigError on invalid JSON", async () => {
    const file = path.join(dir, "config.json");
    await writeFile(file, "{ htmlMail: true");

    await expect(loadOptions(file, NO_SECRETS)).rejects.toThrow(
      `Options file ${file} is not valid JSON`
    );
  });

  it("throws ConfigError when the path is a directory", async () => {
    await expect(loadOptions(dir, NO_SECRETS)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("resolveFeedOptions", () => {
  const feed = { name: "a", url: FEED_URL, paused: false };

  it("layers defaults, globals, per-URL overrides and feed fields", () => {
    const options = parseOptions(
      {
        from: "global@example.com",
        htmlMail: false,
        trustLink: false,
        feedTimeout: 30,
        feeds: {
          [FEED_URL]: { from: "override@example.com", htmlMail: true, trustLink: true },
          "https://other.example.com/feed": { dateHeader: true },
        },
      },
      NO_SECRETS
    );

    const resolved = resolveFeedOptions(options, { ...feed, trustLink: false }, "me@example.com");

    expect(resolved).toMatchObject({
      target: "me@example.com",
      from: "override@example.com",
      htmlMail: true,
      trustLink: false,
      dateHeader: false,
      feedTimeout: 30,
    });
  });

  it("prefers the feed's own from and target", () => {
    const options = parseOptions({ feeds: { [FEED_URL]: { from: "override@example.com" } } }, NO_SECRETS);
    const resolved = resolveFeedOptions(
      options,
      { ...feed, from: "feed@example.com", target: "feed-target@example.com" },
      "me@example.com"
    );

    expect(resolved.from).toBe("feed@example.com");
    expect(resolved.target).toBe("feed-target@example.com");
  });

  it("takes a per-feed digest override over the global setting", () => {
    const options = parseOptions({ digest: true, feeds: { [FEED_URL]: { digest: false } } }, NO_SECRETS);

    expect(resolveFeedOptions(options, feed).digest).toBe(false);
    expect(resolveFeedOptions(options, { ...feed, url: "https://b.example.com/feed" }).digest).toBe(
      true
    );
  });

  it("leaves the target unset without a feed target or default", () => {
    const resolved = resolveFeedOptions(parseOptions({}, NO_SECRETS), feed);
    expect(resolved.target).toBeUndefined();
  });
});

describe("postProcessKeys", () => {
  it("collects keys from globals and every override", () => {
    const options = parseOptions(
      {
        postProcess: ["downcase"],
        feeds: {
          [FEED_URL]: { postProcess: ["strip-tracking", "downcase"] },
          "https://b.example.com/feed": { postProcess: ["custom"] },
        },
      },
      NO_SECRETS
    );

    expect(postProcessKeys(options)).toEqual(["downcase", "strip-tracking", "custom"]);
  });
});
