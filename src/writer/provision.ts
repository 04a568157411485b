import fs from "node:fs/promises";
import { isErrnoException } from "../core/errors.js";
import { formatMode } from "../core/modes.js";
import { ancestorChain } from "../core/paths.js";
import type { Logger } from "../core/logger.js";
import type { Ownership } from "../core/types.js";
import { applyProperties } from "./properties.js";

export type EnsureDirectoryResult =
  | { status: "created" }
  | { status: "present" }
  | { status: "denied"; error: NodeJS.ErrnoException };

const PRESENT_CODES = new Set(["EEXIST", "EISDIR"]);
const DENIED_CODES = new Set(["EACCES", "EPERM"]);

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Creates a single directory level. Only a directory this call created gets
 * `mode` and `ownership`; one that was already there is left untouched.
 */
export async function ensureDirectory(
  dir: string,
  mode: number,
  ownership: Ownership | null,
): Promise<EnsureDirectoryResult> {
  try {
    await fs.mkdir(dir);
  } catch (err) {
    if (!isErrnoException(err)) throw err;
    if (err.code !== undefined && PRESENT_CODES.has(err.code)) {
      return { status: "present" };
    }
    if (err.code !== undefined && DENIED_CODES.has(err.code)) {
      return (await isDirectory(dir))
        ? { status: "present" }
        : { status: "denied", error: err };
    }
    throw err;
  }

  await applyProperties(dir, mode, ownership);
  return { status: "created" };
}

/**
 * Walks from the filesystem root down to `dir`, creating each missing level.
 * Permission errors are advisory: a level we may not create is logged and
 * skipped, and whatever needs it next will fail on its own.
 */
export async function provisionParents(
  dir: string,
  mode: number,
  ownership: Ownership | null,
  logger?: Logger,
): Promise<string[]> {
  const created: string[] = [];

  for (const level of ancestorChain(dir)) {
    const result = await ensureDirectory(level, mode, ownership);
    switch (result.status) {
      case "created":
        created.push(level);
        logger?.debug("Created directory", { path: level, mode: formatMode(mode) });
        break;
      case "denied":
        logger?.warn("Could not create directory", {
          path: level,
          code: result.error.code,
        });
        break;
      case "present":
        break;
    }
  }

  return created;
}
