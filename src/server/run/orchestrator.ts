/**
 * Run orchestrator.
 *
 * Walks the registry one feed at a time:
 *
 *   Fetching -> Diffing -> Notifying -> Updating -> next feed
 *
 * Per-feed failures (fetch, parse, dispatch, missing target) are recorded on
 * the feed's lastError and the run moves on. Persistence failures end the run.
 * The database is saved once at the end of the run, or after every feed with
 * `checkpoint: "feed"`.
 */

import { logger as appLogger, type ComponentLogger } from "@/lib/logger";
import type { RunOptions } from "../config/options";
import { postProcessKeys, resolveFeedOptions } from "../config/options";
import { composeDigest, composeMessage, type OutgoingMessage } from "../email/compose";
import type { Mailer } from "../email/transport";
import { ConfigError, DispatchError, FeedmailError, FetchError, errorMessage } from "../errors";
import { applyDiff, diff, notifiable, type DiffItem } from "../feed/change-detector";
import {
  fetchFeed as defaultFetchFeed,
  type FetchFeedOptions,
  type FetchFeedResult,
} from "../feed/fetcher";
import { resolvePolicy } from "../feed/identity";
import { parseFeed as defaultParseFeed } from "../feed/parser";
import type { ParsedFeed } from "../feed/types";
import { transformRegistry, type TransformRegistry } from "../plugins/post-process";
import { FeedRegistry } from "../registry/feed-registry";
import { createFeedState, type Database, type FeedConfig, type FeedState } from "../store/schema";

/**
 * Logger interface for run events.
 */
export type RunnerLogger = ComponentLogger;

const defaultLogger: RunnerLogger = {
  info: (message, meta) => appLogger.info(message, { component: "run", ...meta }),
  warn: (message, meta) => appLogger.warn(message, { component: "run", ...meta }),
  error: (message, meta) => appLogger.error(message, { component: "run", ...meta }),
};

export interface RunnerConfig {
  mailer: Mailer;
  /** Persists the whole database */
  saveDatabase: (db: Database) => Promise<void>;
  fetchFeed?: (url: string, options: FetchFeedOptions) => Promise<FetchFeedResult>;
  /** Parses a fetched document; receives the response's Content-Type */
  parseFeed?: (content: string, contentType?: string) => ParsedFeed;
  transforms?: TransformRegistry;
  logger?: RunnerLogger;
  now?: () => Date;
}

export interface RunRequest {
  /** Dispatch notifications (false: record entries as seen without sending) */
  send?: boolean;
  /** Limit the run to these feeds (default: every feed) */
  feedNames?: readonly string[];
  /** Stops the run between feeds */
  signal?: AbortSignal;
}

export type FeedRunStatus = "ok" | "not-modified" | "error" | "skipped";

export interface FeedRunResult {
  name: string;
  status: FeedRunStatus;
  newCount: number;
  changedCount: number;
  sentCount: number;
  error?: string;
}

export interface RunSummary {
  feeds: FeedRunResult[];
  totals: { new: number; changed: number; sent: number; errors: number };
  /** Whether the signal stopped the run early */
  cancelled: boolean;
}

export interface Runner {
  run: (db: Database, options: RunOptions, request?: RunRequest) => Promise<RunSummary>;
}

/**
 * Rejects with the error from `onTimeout` when `promise` takes longer than `ms`.
 */
async function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function emptyResult(name: string, status: FeedRunStatus, error?: string): FeedRunResult {
  return { name, status, newCount: 0, changedCount: 0, sentCount: 0, ...(error ? { error } : {}) };
}

function withError(state: FeedState, message: string, now: Date): FeedState {
  return { ...state, lastError: { message, at: now.toISOString() } };
}

/**
 * Creates a runner.
 *
 * Usage:
 * ```typescript
 * const runner = createRunner({ mailer, saveDatabase: (db) => saveDatabase(path, db) });
 * const summary = await runner.run(db, options, { send: true });
 * ```
 */
export function createRunner(config: RunnerConfig): Runner {
  const {
    mailer,
    saveDatabase,
    fetchFeed = defaultFetchFeed,
    parseFeed = defaultParseFeed,
    transforms = transformRegistry,
    logger = defaultLogger,
    now = () => new Date(),
  } = config;

  /**
   * Processes one feed, updating its state in `db`.
   *
   * @throws DispatchError when a send fails under `dispatchErrors: "abort"`,
   *   after the feed's state has been updated
   */
  async function processFeed(
    db: Database,
    registry: FeedRegistry,
    feed: FeedConfig,
    options: RunOptions,
    send: boolean
  ): Promise<FeedRunResult> {
    const feedOptions = resolveFeedOptions(options, feed, db.defaultTarget);
    const state = db.state[feed.name] ?? createFeedState();
    const startedAt = now();
    const meta = { feed: feed.name, url: feed.url };

    let recipient = "";
    if (send) {
      if (!feedOptions.target) {
        const error = new ConfigError(
          `No target address for feed "${feed.name}" (set a default with "feedmail email <address>")`
        );
        db.state[feed.name] = withError(state, error.message, startedAt);
        logger.error("Feed has no target address", { ...meta, error: error.message });
        return emptyResult(feed.name, "error", error.message);
      }
      recipient = feedOptions.target;
    }

    // Fetching
    logger.info("Fetching feed", meta);
    let fetched: FetchFeedResult;
    try {
      fetched = await fetchFeed(feed.url, {
        etag: state.etag,
        lastModified: state.lastModified,
        timeout: feedOptions.feedTimeout * 1000,
        userAgent: feedOptions.userAgent,
      });
    } catch (error) {
      fetched = { status: "network_error", message: errorMessage(error), timeout: false };
    }

    if (fetched.status === "http_error" || fetched.status === "network_error") {
      const failure = new FetchError(feed.name, fetched.message, {
        timeout: fetched.status === "network_error" && fetched.timeout,
      });
      db.state[feed.name] = withError(state, failure.message, startedAt);
      logger.warn("Failed to fetch feed", { ...meta, error: failure.message, timeout: failure.timeout });
      return emptyResult(feed.name, "error", failure.message);
    }

    if (fetched.permanentUrl && fetched.permanentUrl !== feed.url) {
      logger.info("Feed moved permanently", { ...meta, newUrl: fetched.permanentUrl });
      registry.setUrl(feed.name, fetched.permanentUrl);
    }

    if (fetched.status === "not_modified") {
      const next: FeedState = { ...state, lastFetchedAt: startedAt.toISOString() };
      delete next.lastError;
      db.state[feed.name] = next;
      logger.info("Feed not modified", meta);
      return emptyResult(feed.name, "not-modified");
    }

    let parsed: ParsedFeed;
    try {
      parsed = parseFeed(fetched.body, fetched.contentType);
    } catch (error) {
      const parseError = new FetchError(feed.name, `Failed to parse feed: ${errorMessage(error)}`, {
        cause: error,
      });
      db.state[feed.name] = withError(state, parseError.message, startedAt);
      logger.warn("Failed to parse feed", { ...meta, error: parseError.message });
      return emptyResult(feed.name, "error", parseError.message);
    }

    // Diffing
    const { policy, trackChanges } = resolvePolicy({
      trustGuid: feedOptions.trustGuid,
      trustLink: feedOptions.trustLink,
      trackChanges: feedOptions.trackChanges || feedOptions.replyChanges,
    });
    const result = diff(state, parsed.items, policy, { trackChanges, suppress: !send });
    const pending = notifiable(result, { replyChanges: feedOptions.replyChanges });

    // Notifying
    const messageIds = new Map<string, string>();
    const unsent = new Set<string>();
    let sentCount = 0;
    let feedError: FeedmailError | undefined;
    let abortError: DispatchError | undefined;

    const drafts: { item: DiffItem; message: OutgoingMessage }[] = [];
    for (const item of pending) {
      try {
        const entry = transforms.apply(feedOptions.postProcess, item.entry, {
          feedName: feed.name,
          feedUrl: feed.url,
          identity: item.identity,
        });
        if (!entry) {
          logger.info("Notification dropped by post-process", { ...meta, id: item.identity.key });
          continue;
        }
        drafts.push({
          item,
          message: composeMessage({
            feed: { name: feed.name, url: feed.url, title: parsed.title },
            entry,
            identity: item.identity,
            to: recipient,
            options: feedOptions,
            inReplyTo: replyTarget(item),
            now: startedAt,
          }),
        });
      } catch (error) {
        // Left unrecorded so the entry is retried next run
        const failure = new FeedmailError(
          `Failed to prepare notification for ${item.identity.key}: ${errorMessage(error)}`,
          { cause: error }
        );
        logger.error("Failed to prepare notification", { ...meta, error: failure.message });
        unsent.add(item.identity.key);
        feedError ??= failure;
      }
    }

    // A digest goes out as one message; otherwise one message per entry
    const batches =
      feedOptions.digest && drafts.length > 0 ? [drafts] : drafts.map((draft) => [draft]);

    for (const [index, batch] of batches.entries()) {
      let message: OutgoingMessage | undefined;
      try {
        message = feedOptions.digest
          ? composeDigest({
              feed: { name: feed.name, url: feed.url, title: parsed.title },
              parts: batch.map((draft) => draft.message),
              to: recipient,
              options: feedOptions,
            })
          : batch[0].message;
        const subject = message.subject;
        await withTimeout(
          mailer.send(message),
          feedOptions.dispatchTimeout * 1000,
          () =>
            new DispatchError(
              feed.name,
              `Timed out after ${feedOptions.dispatchTimeout}s sending "${subject}"`
            )
        );
        for (const draft of batch) {
          messageIds.set(draft.item.identity.key, draft.message.messageId);
        }
        sentCount += batch.length;
      } catch (error) {
        const failed =
          error instanceof DispatchError
            ? error
            : new DispatchError(
                feed.name,
                `Failed to send "${message?.subject ?? feed.name}": ${errorMessage(error)}`,
                { cause: error }
              );
        logger.error("Failed to send notification", { ...meta, error: failed.message });
        for (const draft of batch) {
          unsent.add(draft.item.identity.key);
        }
        feedError ??= failed;

        if (options.dispatchErrors === "abort") {
          for (const remaining of batches.slice(index + 1).flat()) {
            unsent.add(remaining.item.identity.key);
          }
          abortError = failed;
          break;
        }
      }
    }

    // Updating
    const next = applyDiff(state, result, { now: startedAt, messageIds, skip: unsent });
    next.lastFetchedAt = startedAt.toISOString();
    // Keep the old validators while anything is unsent, so the next run
    // does not get a 304 and skip the retry
    if (unsent.size === 0) {
      setValidator(next, "etag", fetched.etag);
      setValidator(next, "lastModified", fetched.lastModified);
    }
    if (feedError) {
      next.lastError = { message: feedError.message, at: startedAt.toISOString() };
    } else {
      delete next.lastError;
    }
    db.state[feed.name] = next;

    if (abortError) {
      throw abortError;
    }

    logger.info("Feed processed", {
      ...meta,
      new: result.new.length,
      changed: result.changed.length,
      suppressed: result.suppressed.length,
      sent: sentCount,
    });

    return {
      name: feed.name,
      status: feedError ? "error" : "ok",
      newCount: result.new.length,
      changedCount: result.changed.length,
      sentCount,
      ...(feedError ? { error: feedError.message } : {}),
    };
  }

  /**
   * Runs processFeed, turning anything it throws into an error on that feed.
   * Only the DispatchError of `dispatchErrors: "abort"` escapes.
   */
  async function isolate(
    db: Database,
    registry: FeedRegistry,
    feed: FeedConfig,
    options: RunOptions,
    send: boolean
  ): Promise<FeedRunResult> {
    try {
      return await processFeed(db, registry, feed, options, send);
    } catch (error) {
      if (error instanceof DispatchError) {
        throw error;
      }
      const message = errorMessage(error);
      db.state[feed.name] = withError(db.state[feed.name] ?? createFeedState(), message, now());
      logger.error("Feed failed", { feed: feed.name, url: feed.url, error: message });
      return emptyResult(feed.name, "error", message);
    }
  }

  async function run(
    db: Database,
    options: RunOptions,
    request: RunRequest = {}
  ): Promise<RunSummary> {
    const { send = true, feedNames, signal } = request;
    const registry = new FeedRegistry(db);

    // Fail before touching any feed
    transforms.assertKnown(postProcessKeys(options));
    const requested = new Set(feedNames ?? []);
    for (const name of requested) {
      registry.get(name);
    }

    const selected = db.feeds.filter((feed) => requested.size === 0 || requested.has(feed.name));
    const results: FeedRunResult[] = [];
    let cancelled = false;

    try {
      for (const feed of selected) {
        if (signal?.aborted) {
          logger.warn("Run cancelled", { remaining: selected.length - results.length });
          cancelled = true;
          break;
        }
        if (feed.paused) {
          logger.info("Skipping paused feed", { feed: feed.name });
          results.push(emptyResult(feed.name, "skipped"));
          continue;
        }

        results.push(await isolate(db, registry, feed, options, send));

        if (options.checkpoint === "feed") {
          await saveDatabase(db);
        }
      }
    } catch (error) {
      if (error instanceof DispatchError) {
        // Keep what was sent before the failure
        await saveDatabase(db);
      }
      throw error;
    }

    if (options.checkpoint === "run") {
      await saveDatabase(db);
    }

    const totals = results.reduce(
      (sum, feed) => ({
        new: sum.new + feed.newCount,
        changed: sum.changed + feed.changedCount,
        sent: sum.sent + feed.sentCount,
        errors: sum.errors + (feed.status === "error" ? 1 : 0),
      }),
      { new: 0, changed: 0, sent: 0, errors: 0 }
    );

    return { feeds: results, totals, cancelled };
  }

  return { run };
}

function replyTarget(item: DiffItem): string | undefined {
  return item.kind === "changed" ? item.previous?.messageId : undefined;
}

function setValidator(state: FeedState, key: "etag" | "lastModified", value: string | undefined): void {
  if (value) {
    state[key] = value;
  } else {
    delete state[key];
  }
}
