/**
 * Command surface.
 *
 * One function per CLI command. Each loads what it needs, applies the change
 * and persists the database; output lines go through `ctx.out`.
 */

import { loadOptions } from "./config/options";
import { createMailer, type Mailer } from "./email/transport";
import { ConfigError } from "./errors";
import { FeedRegistry, type FeedListing, type OpmlImportResult } from "./registry/feed-registry";
import { createRunner, type RunnerConfig, type RunSummary } from "./run/orchestrator";
import { createDatabase, type Database } from "./store/schema";
import { loadDatabase, loadDatabaseIfExists, saveDatabase } from "./store/state-store";

export interface CommandContext {
  /** Feed database file */
  dataPath: string;
  /** Options file */
  configPath: string;
  /** Writes one line of command output (default: stdout) */
  out?: (line: string) => void;
  /** Overrides run collaborators (tests pass fakes here) */
  runner?: Partial<Omit<RunnerConfig, "saveDatabase">>;
  signal?: AbortSignal;
}

function output(ctx: CommandContext): (line: string) => void {
  return ctx.out ?? ((line) => process.stdout.write(`${line}\n`));
}

/**
 * Loads the database, applies `change` through a registry and saves it.
 */
async function updateDatabase<T>(
  ctx: CommandContext,
  change: (registry: FeedRegistry) => T
): Promise<T> {
  const db = await loadDatabase(ctx.dataPath);
  const result = change(new FeedRegistry(db));
  await saveDatabase(ctx.dataPath, db);
  return result;
}

/**
 * Names to act on: the given names or list indices, or every feed when none
 * are given.
 */
function targetNames(registry: FeedRegistry, refs: readonly string[]): string[] {
  return refs.length > 0
    ? refs.map((ref) => registry.resolve(ref))
    : registry.list().map((listing) => listing.feed.name);
}

/**
 * `new [email]`: creates an empty database.
 */
export async function newDatabase(ctx: CommandContext, email?: string): Promise<void> {
  if (await loadDatabaseIfExists(ctx.dataPath)) {
    throw new ConfigError(`A feed database already exists at ${ctx.dataPath}`);
  }
  await saveDatabase(ctx.dataPath, createDatabase(email));
}

/**
 * `email [address]`: sets (or, with no address, clears) the default target.
 */
export async function setEmail(ctx: CommandContext, address?: string): Promise<void> {
  await updateDatabase(ctx, (registry) => registry.setDefaultTarget(address));
}

/**
 * `add <name> <url> [email]`
 */
export async function addFeed(
  ctx: CommandContext,
  name: string,
  url: string,
  email?: string
): Promise<void> {
  await updateDatabase(ctx, (registry) => registry.add(name, url, email));
}

/**
 * `run [--no-send] [name...]`
 */
export async function runFeeds(
  ctx: CommandContext,
  request: { send: boolean; feedNames: readonly string[] }
): Promise<RunSummary> {
  const options = await loadOptions(ctx.configPath);
  const db = await loadDatabase(ctx.dataPath);
  const registry = new FeedRegistry(db);
  const feedNames = request.feedNames.map((ref) => registry.resolve(ref));
  const mailer: Mailer = ctx.runner?.mailer ?? createMailer(options);

  const runner = createRunner({
    ...ctx.runner,
    mailer,
    saveDatabase: (snapshot: Database) => saveDatabase(ctx.dataPath, snapshot),
  });

  try {
    return await runner.run(db, options, { send: request.send, feedNames, signal: ctx.signal });
  } finally {
    mailer.close();
  }
}

/**
 * One `list` line.
 *
 * @example
 * // 0: [*] blog (https://example.com/feed -> me@example.com)
 * // 1: [ ] news (https://news.example.com/rss -> me@example.com) !! HTTP 404: Not Found
 */
export function formatListing(listing: FeedListing): string {
  const active = listing.feed.paused ? " " : "*";
  const target = listing.target ?? "(no target)";
  const line = `${listing.index}: [${active}] ${listing.feed.name} (${listing.feed.url} -> ${target})`;
  return listing.lastError ? `${line} !! ${listing.lastError}` : line;
}

/**
 * `list`
 */
export async function listFeeds(ctx: CommandContext): Promise<string[]> {
  const db = await loadDatabase(ctx.dataPath);
  const lines = new FeedRegistry(db).list().map(formatListing);
  const out = output(ctx);
  for (const line of lines) {
    out(line);
  }
  return lines;
}

/**
 * `pause [name...]`
 */
export async function pauseFeeds(ctx: CommandContext, names: readonly string[]): Promise<void> {
  await updateDatabase(ctx, (registry) => {
    for (const name of targetNames(registry, names)) {
      registry.pause(name);
    }
  });
}

/**
 * `unpause [name...]`
 */
export async function unpauseFeeds(ctx: CommandContext, names: readonly string[]): Promise<void> {
  await updateDatabase(ctx, (registry) => {
    for (const name of targetNames(registry, names)) {
      registry.unpause(name);
    }
  });
}

/**
 * `reset [name...]`: forgets seen entries.
 */
export async function resetFeeds(ctx: CommandContext, names: readonly string[]): Promise<void> {
  await updateDatabase(ctx, (registry) => {
    for (const name of targetNames(registry, names)) {
      registry.reset(name);
    }
  });
}

/**
 * `delete <name...>`. Every name (or index) is resolved before anything is
 * removed, so indices refer to the listing before the command.
 */
export async function deleteFeeds(ctx: CommandContext, names: readonly string[]): Promise<void> {
  if (names.length === 0) {
    throw new ConfigError("delete needs at least one feed name");
  }
  await updateDatabase(ctx, (registry) => {
    for (const name of new Set(targetNames(registry, names))) {
      registry.delete(name);
    }
  });
}

/**
 * `opmlimport`: adds the feeds of an OPML document.
 */
export async function importOpml(ctx: CommandContext, xml: string): Promise<OpmlImportResult> {
  const result = await updateDatabase(ctx, (registry) => registry.importOpml(xml));
  const out = output(ctx);
  for (const name of result.duplicates) {
    out(`skipped ${name}: a feed with that name already exists`);
  }
  for (const skipped of result.skipped) {
    out(`skipped ${skipped.url}: ${skipped.reason}`);
  }
  return result;
}

/**
 * `opmlexport`: returns the registry as OPML.
 */
export async function exportOpml(ctx: CommandContext): Promise<string> {
  const db = await loadDatabase(ctx.dataPath);
  return new FeedRegistry(db).exportOpml();
}
