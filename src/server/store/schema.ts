/**
 * Persisted database schema.
 *
 * The whole database (feed registry + per-feed seen entries) lives in one JSON
 * document. Every object schema passes unknown keys through, so fields written
 * by a newer version survive a load/save cycle.
 */

import { z } from "zod";

export const DATABASE_VERSION = 1;

export const seenEntrySchema = z
  .object({
    identity: z.string().min(1),
    firstSeen: z.string(),
    updatedAt: z.string().optional(),
    fingerprint: z.string().optional(),
    guid: z.string().optional(),
    link: z.string().optional(),
    /** Message-ID of the first notification sent for this entry */
    messageId: z.string().optional(),
  })
  .passthrough();

export const feedErrorSchema = z
  .object({
    message: z.string(),
    at: z.string(),
  })
  .passthrough();

export const feedStateSchema = z
  .object({
    entries: z.record(seenEntrySchema).default({}),
    lastFetchedAt: z.string().optional(),
    lastError: feedErrorSchema.optional(),
    etag: z.string().optional(),
    lastModified: z.string().optional(),
  })
  .passthrough();

export const feedConfigSchema = z
  .object({
    name: z.string().min(1),
    url: z.string().min(1),
    paused: z.boolean().default(false),
    target: z.string().optional(),
    from: z.string().optional(),
    trustGuid: z.boolean().optional(),
    trustLink: z.boolean().optional(),
  })
  .passthrough();

export const databaseSchema = z
  .object({
    version: z.number().int().positive().default(DATABASE_VERSION),
    defaultTarget: z.string().optional(),
    feeds: z.array(feedConfigSchema).default([]),
    state: z.record(feedStateSchema).default({}),
  })
  .passthrough()
  .superRefine((db, ctx) => {
    const names = new Set<string>();
    for (const [index, feed] of db.feeds.entries()) {
      if (names.has(feed.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["feeds", index, "name"],
          message: `duplicate feed name "${feed.name}"`,
        });
      }
      names.add(feed.name);
    }
  });

export type SeenEntry = z.infer<typeof seenEntrySchema>;
export type FeedErrorRecord = z.infer<typeof feedErrorSchema>;
export type FeedState = z.infer<typeof feedStateSchema>;
export type FeedConfig = z.infer<typeof feedConfigSchema>;
export type Database = z.infer<typeof databaseSchema>;

/**
 * Builds an empty database.
 */
export function createDatabase(defaultTarget?: string): Database {
  return {
    version: DATABASE_VERSION,
    ...(defaultTarget ? { defaultTarget } : {}),
    feeds: [],
    state: {},
  };
}

/**
 * Builds an empty feed state.
 */
export function createFeedState(): FeedState {
  return { entries: {} };
}
