/**
 * Unit tests for mail dispatch.
 */

import type { SendMailOptions } from "nodemailer";
import { describe, it, expect } from "vitest";
import type { OutgoingMessage } from "../../src/server/email/compose";
import {
  buildMailOptions,
  createMailer,
  toMailOptions,
} from "../../src/server/email/transport";
import { parseOptions } from "../../src/server/config/options";

const DATE = new Date("2024-03-01T12:00:00.000Z");

function message(overrides: Partial<OutgoingMessage> = {}): OutgoingMessage {
  return {
    from: { name: "Example Blog: Jane", address: "jane@example.com" },
    to: "me@example.com",
    subject: "Hello",
    text: "Body\n",
    date: DATE,
    messageId: "<one@feedmail.invalid>",
    headers: { "X-RSS-ID": "urn:post:1" },
    ...overrides,
  };
}

/**
 * In-memory stand-in for a nodemailer transport.
 */
function fakeTransport(fail?: Error) {
  const sent: SendMailOptions[] = [];
  const status = { closed: false };
  return {
    sent,
    status,
    async sendMail(options: SendMailOptions) {
      if (fail) {
        throw fail;
      }
      sent.push(options);
      return { messageId: String(options.messageId) };
    },
    close() {
      status.closed = true;
    },
  };
}

describe("toMailOptions", () => {
  it("maps a notification to nodemailer options", () => {
    expect(toMailOptions(message())).toEqual({
      from: { name: "Example Blog: Jane", address: "jane@example.com" },
      to: "me@example.com",
      subject: "Hello",
      text: "Body\n",
      date: DATE,
      messageId: "<one@feedmail.invalid>",
      headers: { "X-RSS-ID": "urn:post:1" },
    });
  });

  it("uses a bare address when the sender has no name", () => {
    expect(toMailOptions(message({ from: { name: "", address: "a@example.com" } })).from).toBe(
      "a@example.com"
    );
  });

  it("sets In-Reply-To and References for a change reply", () => {
    const options = toMailOptions(message({ inReplyTo: "<first@feedmail.invalid>" }));
    expect(options.inReplyTo).toBe("<first@feedmail.invalid>");
    expect(options.references).toBe("<first@feedmail.invalid>");
  });

  it("includes the HTML alternative when present", () => {
    expect(toMailOptions(message({ html: "<p>Body</p>" })).html).toBe("<p>Body</p>");
  });
});

describe("buildMailOptions", () => {
  it("returns the plain options for a single notification", async () => {
    expect(await buildMailOptions(message())).toEqual(toMailOptions(message()));
  });

  it("attaches digest parts as RFC 822 messages", async () => {
    const digest = message({
      subject: "Digest for blog (2 entries)",
      parts: [
        message({ subject: "Post 1", messageId: "<p1@feedmail.invalid>" }),
        message({ subject: "Post 2", messageId: "<p2@feedmail.invalid>" }),
      ],
    });

    const options = await buildMailOptions(digest);
    const attachments = options.attachments ?? [];

    expect(attachments.map((a) => [a.filename, a.contentType, a.contentDisposition])).toEqual([
      ["1.eml", "message/rfc822", "attachment"],
      ["2.eml", "message/rfc822", "attachment"],
    ]);
    const first = String(attachments[0].content);
    expect(first).toContain("Subject: Post 1\r\n");
    expect(first).toContain("Message-ID: <p1@feedmail.invalid>\r\n");
    expect(String(attachments[1].content)).toContain("Subject: Post 2\r\n");
  });
});

describe("createMailer", () => {
  const options = parseOptions({}, { smtpPassword: undefined });

  it("hands messages to the transport", async () => {
    const transport = fakeTransport();
    const mailer = createMailer(options, { _transport: transport });

    await mailer.send(message());

    expect(transport.sent).toHaveLength(1);
    expect(transport.sent[0].subject).toBe("Hello");
  });

  it("propagates transport failures", async () => {
    const transport = fakeTransport(new Error("550 mailbox unavailable"));
    const mailer = createMailer(options, { _transport: transport });

    await expect(mailer.send(message())).rejects.toThrow("550 mailbox unavailable");
  });

  it("closes the transport", () => {
    const transport = fakeTransport();
    createMailer(options, { _transport: transport }).close();
    expect(transport.status.closed).toBe(true);
  });
});
