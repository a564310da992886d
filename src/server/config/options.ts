/**
 * Run options.
 *
 * Options come from one JSON file validated with zod and are frozen once
 * loaded. Components receive them as an argument; nothing reads a
 * module-level setting at run time.
 *
 * Effective per-feed options layer, lowest first: built-in defaults, the
 * file's globals, the file's `feeds[<url>]` overrides, the feed's own fields.
 */

import { readFile } from "fs/promises";
import { z } from "zod";
import { ConfigError, errorMessage } from "../errors";
import type { FeedConfig } from "../store/schema";
import { secretsConfig } from "./env";

/** Entry dates that can feed the Date header, in preference order. */
const dateFieldSchema = z.enum(["updated", "published"]);

const feedOverridesSchema = z
  .object({
    from: z.string().min(1),
    forceFrom: z.boolean(),
    friendlyName: z.boolean(),
    trustGuid: z.boolean(),
    trustLink: z.boolean(),
    trackChanges: z.boolean(),
    replyChanges: z.boolean(),
    htmlMail: z.boolean(),
    dateHeader: z.boolean(),
    digest: z.boolean(),
    postProcess: z.array(z.string().min(1)),
    feedTimeout: z.number().positive(),
  })
  .partial()
  .strict();

const smtpSchema = z
  .object({
    enabled: z.boolean().default(false),
    host: z.string().min(1).default("localhost"),
    port: z.number().int().min(1).max(65535).default(25),
    secure: z.boolean().default(false),
    user: z.string().optional(),
    password: z.string().optional(),
  })
  .strict();

export const optionsSchema = z
  .object({
    from: z.string().min(1).default("user@feedmail.invalid"),
    forceFrom: z.boolean().default(false),
    friendlyName: z.boolean().default(true),
    trustGuid: z.boolean().default(true),
    trustLink: z.boolean().default(false),
    trackChanges: z.boolean().default(false),
    replyChanges: z.boolean().default(false),
    htmlMail: z.boolean().default(false),
    dateHeader: z.boolean().default(false),
    dateHeaderOrder: z.array(dateFieldSchema).min(1).default(["updated", "published"]),
    /** One message per feed per run, with the entries attached */
    digest: z.boolean().default(false),
    headers: z.record(z.string()).default({}),
    /** Seconds */
    feedTimeout: z.number().positive().default(60),
    /** Seconds */
    dispatchTimeout: z.number().positive().default(60),
    dispatchErrors: z.enum(["continue", "abort"]).default("continue"),
    checkpoint: z.enum(["run", "feed"]).default("run"),
    postProcess: z.array(z.string().min(1)).default([]),
    smtp: smtpSchema.default({}),
    sendmail: z.string().min(1).default("/usr/sbin/sendmail"),
    userAgent: z.string().min(1).optional(),
    feeds: z.record(feedOverridesSchema).default({}),
  })
  .strict();

export type DateField = z.infer<typeof dateFieldSchema>;

export interface FeedOverrides {
  readonly from?: string;
  readonly forceFrom?: boolean;
  readonly friendlyName?: boolean;
  readonly trustGuid?: boolean;
  readonly trustLink?: boolean;
  readonly trackChanges?: boolean;
  readonly replyChanges?: boolean;
  readonly htmlMail?: boolean;
  readonly dateHeader?: boolean;
  readonly digest?: boolean;
  readonly postProcess?: readonly string[];
  readonly feedTimeout?: number;
}

export interface SmtpOptions {
  readonly enabled: boolean;
  readonly host: string;
  readonly port: number;
  readonly secure: boolean;
  readonly user?: string;
  readonly password?: string;
}

/**
 * Validated, frozen options for one command invocation.
 */
export interface RunOptions {
  readonly from: string;
  readonly forceFrom: boolean;
  readonly friendlyName: boolean;
  readonly trustGuid: boolean;
  readonly trustLink: boolean;
  readonly trackChanges: boolean;
  readonly replyChanges: boolean;
  readonly htmlMail: boolean;
  readonly dateHeader: boolean;
  readonly dateHeaderOrder: readonly DateField[];
  readonly digest: boolean;
  readonly headers: Readonly<Record<string, string>>;
  readonly feedTimeout: number;
  readonly dispatchTimeout: number;
  readonly dispatchErrors: "continue" | "abort";
  readonly checkpoint: "run" | "feed";
  readonly postProcess: readonly string[];
  readonly smtp: SmtpOptions;
  readonly sendmail: string;
  readonly userAgent?: string;
  readonly feeds: Readonly<Record<string, FeedOverrides>>;
}

/**
 * Options in effect for one feed.
 */
export interface FeedOptions {
  /** Recipient: the feed's target, else the database default */
  readonly target?: string;
  readonly from: string;
  readonly forceFrom: boolean;
  readonly friendlyName: boolean;
  readonly trustGuid: boolean;
  readonly trustLink: boolean;
  readonly trackChanges: boolean;
  readonly replyChanges: boolean;
  readonly htmlMail: boolean;
  readonly dateHeader: boolean;
  readonly dateHeaderOrder: readonly DateField[];
  readonly digest: boolean;
  readonly headers: Readonly<Record<string, string>>;
  readonly postProcess: readonly string[];
  readonly feedTimeout: number;
  readonly dispatchTimeout: number;
  readonly userAgent?: string;
}

/**
 * Recursively freezes an object graph.
 */
export function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Validates raw options (the parsed JSON file) and freezes the result.
 *
 * @throws ConfigError listing every validation issue
 */
export function parseOptions(raw: unknown, secrets = secretsConfig): RunOptions {
  const result = optionsSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid options: ${issues}`);
  }

  const data = result.data;
  if (secrets.smtpPassword) {
    data.smtp.password = secrets.smtpPassword;
  }
  return deepFreeze(data);
}

/**
 * Loads options from a JSON file. A missing file yields the defaults.
 *
 * @throws ConfigError if the file cannot be read, parsed or validated
 */
export async function loadOptions(filePath: string, secrets = secretsConfig): Promise<RunOptions> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return parseOptions({}, secrets);
    }
    throw new ConfigError(`Cannot read options file ${filePath}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Options file ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }
  return parseOptions(parsed, secrets);
}

/**
 * Computes the options in effect for one feed.
 */
export function resolveFeedOptions(
  options: RunOptions,
  feed: FeedConfig,
  defaultTarget?: string
): FeedOptions {
  const overrides: FeedOverrides = options.feeds[feed.url] ?? {};
  const target = feed.target ?? defaultTarget;

  return deepFreeze({
    ...(target ? { target } : {}),
    from: feed.from ?? overrides.from ?? options.from,
    forceFrom: overrides.forceFrom ?? options.forceFrom,
    friendlyName: overrides.friendlyName ?? options.friendlyName,
    trustGuid: feed.trustGuid ?? overrides.trustGuid ?? options.trustGuid,
    trustLink: feed.trustLink ?? overrides.trustLink ?? options.trustLink,
    trackChanges: overrides.trackChanges ?? options.trackChanges,
    replyChanges: overrides.replyChanges ?? options.replyChanges,
    htmlMail: overrides.htmlMail ?? options.htmlMail,
    dateHeader: overrides.dateHeader ?? options.dateHeader,
    dateHeaderOrder: options.dateHeaderOrder,
    digest: overrides.digest ?? options.digest,
    headers: options.headers,
    postProcess: overrides.postProcess ?? options.postProcess,
    feedTimeout: overrides.feedTimeout ?? options.feedTimeout,
    dispatchTimeout: options.dispatchTimeout,
    ...(options.userAgent ? { userAgent: options.userAgent } : {}),
  });
}

/**
 * Every post-process key named anywhere in the options.
 */
export function postProcessKeys(options: RunOptions): string[] {
  const keys = new Set(options.postProcess);
  for (const overrides of Object.values(options.feeds)) {
    for (const key of overrides.postProcess ?? []) {
      keys.add(key);
    }
  }
  return [...keys];
}
