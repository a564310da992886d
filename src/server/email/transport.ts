/**
 * Mail dispatch.
 *
 * Hands composed notifications to nodemailer, through SMTP when enabled in the
 * options and through the local sendmail binary otherwise.
 */

import nodemailer, { type SendMailOptions, type Transporter } from "nodemailer";
import MailComposer from "nodemailer/lib/mail-composer";
import type { RunOptions } from "../config/options";
import type { OutgoingMessage } from "./compose";

/**
 * Anything that can deliver a notification. The run orchestrator depends on
 * this interface only, so tests pass an in-memory fake.
 */
export interface Mailer {
  send(message: OutgoingMessage): Promise<void>;
  close(): void;
}

type MailTransport = Pick<Transporter, "sendMail" | "close">;

/**
 * Maps a notification to nodemailer's message options.
 */
export function toMailOptions(message: OutgoingMessage): SendMailOptions {
  return {
    from: message.from.name
      ? { name: message.from.name, address: message.from.address }
      : message.from.address,
    to: message.to,
    subject: message.subject,
    text: message.text,
    ...(message.html ? { html: message.html } : {}),
    date: message.date,
    messageId: message.messageId,
    ...(message.inReplyTo
      ? { inReplyTo: message.inReplyTo, references: message.inReplyTo }
      : {}),
    headers: message.headers,
  };
}

/**
 * Renders a message to RFC 822 source.
 */
function renderMessage(message: OutgoingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    new MailComposer(toMailOptions(message)).compile().build((error, source) => {
      if (error) {
        reject(error);
      } else {
        resolve(source);
      }
    });
  });
}

/**
 * Like toMailOptions, with a digest's parts attached as message/rfc822.
 */
export async function buildMailOptions(message: OutgoingMessage): Promise<SendMailOptions> {
  const options = toMailOptions(message);
  if (!message.parts?.length) {
    return options;
  }

  const sources = await Promise.all(message.parts.map(renderMessage));
  return {
    ...options,
    attachments: sources.map((content, i) => ({
      filename: `${i + 1}.eml`,
      contentType: "message/rfc822",
      contentDisposition: "attachment",
      content,
    })),
  };
}

function createTransport(options: Pick<RunOptions, "smtp" | "sendmail" | "dispatchTimeout">): MailTransport {
  if (options.smtp.enabled) {
    const timeoutMs = options.dispatchTimeout * 1000;
    return nodemailer.createTransport({
      host: options.smtp.host,
      port: options.smtp.port,
      secure: options.smtp.secure,
      ...(options.smtp.user
        ? { auth: { user: options.smtp.user, pass: options.smtp.password ?? "" } }
        : {}),
      connectionTimeout: timeoutMs,
      greetingTimeout: timeoutMs,
      socketTimeout: timeoutMs,
    });
  }

  return nodemailer.createTransport({
    sendmail: true,
    path: options.sendmail,
    newline: "unix",
  });
}

/**
 * Creates the mailer described by the options.
 *
 * `_transport` replaces the nodemailer transport (for testing).
 */
export function createMailer(
  options: Pick<RunOptions, "smtp" | "sendmail" | "dispatchTimeout">,
  deps: { _transport?: MailTransport } = {}
): Mailer {
  const transport = deps._transport ?? createTransport(options);

  return {
    async send(message) {
      await transport.sendMail(await buildMailOptions(message));
    },
    close() {
      transport.close();
    },
  };
}
