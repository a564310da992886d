#!/usr/bin/env npx tsx
/**
 * feedmail command-line interface.
 *
 * Usage:
 *   feedmail new you@example.com
 *   feedmail add blog https://blog.example.com/feed.xml
 *   feedmail run --no-send      # first run: remember what is already there
 *   feedmail run                # then run periodically (cron, systemd timer)
 *
 * Environment:
 *   FEEDMAIL_DATA            Feed database file
 *   FEEDMAIL_CONFIG          Options file (JSON)
 *   FEEDMAIL_SMTP_PASSWORD   SMTP password
 *   LOG_LEVEL, LOG_FORMAT    Logging (see src/lib/logger.ts)
 */

import { readFile, writeFile } from "fs/promises";
import { logger } from "../src/lib/logger";
import { parseCommandLine, USAGE, type CommandLine } from "../src/server/cli-args";
import {
  addFeed,
  deleteFeeds,
  exportOpml,
  importOpml,
  listFeeds,
  newDatabase,
  pauseFeeds,
  resetFeeds,
  runFeeds,
  setEmail,
  unpauseFeeds,
  type CommandContext,
} from "../src/server/commands";
import { pathConfig } from "../src/server/config/env";
import { FeedmailError } from "../src/server/errors";

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function execute(line: CommandLine, ctx: CommandContext): Promise<void> {
  const [first, second, third] = line.args;

  switch (line.command) {
    case "help":
      process.stdout.write(USAGE);
      return;
    case "new":
      await newDatabase(ctx, first);
      return;
    case "email":
      await setEmail(ctx, first);
      return;
    case "add":
      await addFeed(ctx, first, second, third);
      return;
    case "run": {
      const summary = await runFeeds(ctx, { send: !line.noSend, feedNames: line.args });
      logger.info("Run finished", { ...summary.totals, cancelled: summary.cancelled });
      return;
    }
    case "list":
      await listFeeds(ctx);
      return;
    case "pause":
      await pauseFeeds(ctx, line.args);
      return;
    case "unpause":
      await unpauseFeeds(ctx, line.args);
      return;
    case "reset":
      await resetFeeds(ctx, line.args);
      return;
    case "delete":
      await deleteFeeds(ctx, line.args);
      return;
    case "opmlimport": {
      const xml = first && first !== "-" ? await readFile(first, "utf8") : await readStdin();
      const result = await importOpml(ctx, xml);
      logger.info("OPML imported", {
        added: result.added.length,
        duplicates: result.duplicates.length,
        skipped: result.skipped.length,
      });
      return;
    }
    case "opmlexport": {
      const xml = await exportOpml(ctx);
      if (first && first !== "-") {
        await writeFile(first, xml, "utf8");
      } else {
        process.stdout.write(xml);
      }
      return;
    }
  }
}

async function main() {
  const line = parseCommandLine(process.argv.slice(2));
  if (line.verbosity > 0) {
    logger.setLevel(line.verbosity > 1 ? "debug" : "info");
  }

  // First Ctrl-C stops between feeds; a second one exits immediately
  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupted, finishing the current feed");
    controller.abort();
    process.once("SIGINT", () => process.exit(130));
  });

  await execute(line, {
    dataPath: line.dataPath ?? pathConfig.dataFile,
    configPath: line.configPath ?? pathConfig.configFile,
    signal: controller.signal,
  });
}

main().catch((err: unknown) => {
  if (err instanceof FeedmailError) {
    console.error(`error: ${err.message}`);
  } else {
    console.error("Error:", err);
  }
  process.exit(1);
});
