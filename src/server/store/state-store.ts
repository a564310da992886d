/**
 * Feed state store.
 *
 * Loads and saves the feed database as one JSON file. Saves go through a
 * temporary file beside the target that is renamed over it only after the
 * full snapshot has been written and flushed. Readers see either the
 * previous snapshot or the new one.
 */

import { randomBytes } from "crypto";
import { mkdir, open, readFile, rename, unlink } from "fs/promises";
import path from "path";
import { CorruptStateError, NotFoundError, PersistenceError, errorMessage } from "../errors";
import { databaseSchema, type Database } from "./schema";

/**
 * Test seams for save(). Production callers pass nothing.
 */
export interface SaveOptions {
  /** Replaces the final rename (used to simulate a crash before replace) */
  _rename?: (from: string, to: string) => Promise<void>;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Loads the database from disk.
 *
 * @throws NotFoundError if the file does not exist
 * @throws CorruptStateError if the file is not valid JSON or fails validation
 * @throws PersistenceError if the file cannot be read
 */
export async function loadDatabase(filePath: string): Promise<Database> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new NotFoundError(filePath);
    }
    throw new PersistenceError(filePath, errorMessage(error), { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CorruptStateError(filePath, errorMessage(error), { cause: error });
  }

  const result = databaseSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ");
    throw new CorruptStateError(filePath, issues, { cause: result.error });
  }

  return result.data;
}

/**
 * Atomically replaces the database file with a full snapshot of `db`.
 *
 * The snapshot is serialized before anything touches the disk. On any failure
 * the temporary file is removed and the previous database file is untouched.
 *
 * @throws PersistenceError on serialization or write failure
 */
export async function saveDatabase(
  filePath: string,
  db: Database,
  options: SaveOptions = {}
): Promise<void> {
  const { _rename = rename } = options;

  let json: string;
  try {
    json = `${JSON.stringify(db, null, 2)}\n`;
  } catch (error) {
    throw new PersistenceError(filePath, `cannot serialize: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const dir = path.dirname(filePath);
  const tmp = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${randomBytes(6).toString("hex")}.tmp`
  );

  try {
    await mkdir(dir, { recursive: true, mode: 0o700 });

    const handle = await open(tmp, "wx", 0o600);
    try {
      await handle.writeFile(json, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }

    await _rename(tmp, filePath);
  } catch (error) {
    await unlink(tmp).catch((cleanupError: unknown) => {
      if (!isErrnoException(cleanupError) || cleanupError.code !== "ENOENT") {
        throw new PersistenceError(
          filePath,
          `${errorMessage(error)} (and failed to remove ${tmp}: ${errorMessage(cleanupError)})`,
          { cause: error }
        );
      }
    });
    throw new PersistenceError(filePath, errorMessage(error), { cause: error });
  }
}

/**
 * Loads the database, or returns null when it has not been created yet.
 */
export async function loadDatabaseIfExists(filePath: string): Promise<Database | null> {
  try {
    return await loadDatabase(filePath);
  } catch (error) {
    if (error instanceof NotFoundError) {
      return null;
    }
    throw error;
  }
}
