import fs from "node:fs/promises";
import path from "node:path";
import {
  AtomicWriteError,
  DestinationExistsError,
  isErrnoException,
} from "../core/errors.js";
import { DEFAULT_DIR_MODE, DEFAULT_FILE_MODE, formatMode } from "../core/modes.js";
import { resolveDestination } from "../core/paths.js";
import type {
  AtomicWriteHandle,
  AtomicWriterOptions,
  Ownership,
  ResolvedWriterOptions,
} from "../core/types.js";
import { applyProperties, resolveOwnership } from "./properties.js";
import { provisionParents } from "./provision.js";
import { removeTree, syncDirectory, syncFile } from "../utils/fs.js";

export function resolveWriterOptions(
  options: AtomicWriterOptions = {},
): ResolvedWriterOptions {
  return Object.freeze({
    overwrite: options.overwrite ?? false,
    dirMode: options.dirMode ?? DEFAULT_DIR_MODE,
    fileMode: options.fileMode ?? DEFAULT_FILE_MODE,
    user: options.user,
    group: options.group,
    fsync: options.fsync ?? true,
    logger: options.logger,
  });
}

async function publish(
  source: string,
  destination: string,
  overwrite: boolean,
): Promise<void> {
  if (overwrite) {
    await fs.rename(source, destination);
    return;
  }

  // link() never replaces an existing entry, so the existence check and the
  // publish are one atomic step. The staged name goes away with the staging
  // directory.
  try {
    await fs.link(source, destination);
  } catch (err) {
    if (isErrnoException(err) && err.code === "EEXIST") {
      throw new DestinationExistsError(destination);
    }
    throw err;
  }
}

class StagedWrite implements AtomicWriteHandle {
  readonly path: string;
  private settled = false;

  constructor(
    readonly destination: string,
    readonly stagingDir: string,
    private readonly options: ResolvedWriterOptions,
    private readonly ownership: Ownership | null,
  ) {
    this.path = path.join(stagingDir, path.basename(destination));
  }

  private settle(): void {
    if (this.settled) {
      throw new AtomicWriteError(
        `Staged write for ${this.destination} has already been committed or discarded`,
      );
    }
    this.settled = true;
  }

  async commit(): Promise<void> {
    this.settle();
    const { overwrite, fileMode, fsync, logger } = this.options;
    try {
      if (fsync) {
        await syncFile(this.path);
      }
      await publish(this.path, this.destination, overwrite);
      await applyProperties(this.destination, fileMode, this.ownership);
      if (fsync) {
        await syncDirectory(path.dirname(this.destination));
      }
      logger?.info("Published file", {
        path: this.destination,
        mode: formatMode(fileMode),
        overwrite,
      });
    } finally {
      await this.cleanup();
    }
  }

  async discard(): Promise<void> {
    this.settle();
    await this.cleanup();
    this.options.logger?.debug("Discarded staged write", {
      path: this.destination,
    });
  }

  private async cleanup(): Promise<void> {
    await removeTree(this.stagingDir);
  }
}

/**
 * Prepares an atomic write to `destination`: creates missing parent
 * directories, then a private staging directory beside the destination.
 * Write to `handle.path`, then call `commit()` to publish or `discard()` to
 * drop the staged file. One of the two must be called to release the staging
 * directory.
 */
export async function acquireAtomicWriter(
  destination: string,
  options: AtomicWriterOptions = {},
): Promise<AtomicWriteHandle> {
  const resolved = resolveWriterOptions(options);
  const target = await resolveDestination(destination);
  const ownership = await resolveOwnership(resolved.user, resolved.group);
  const parent = path.dirname(target);

  await provisionParents(parent, resolved.dirMode, ownership, resolved.logger);

  const stagingDir = await fs.mkdtemp(
    path.join(parent, `${path.basename(target)}.tmp-`),
  );
  resolved.logger?.debug("Created staging directory", {
    path: target,
    stagingDir,
  });

  return new StagedWrite(target, stagingDir, resolved, ownership);
}

/**
 * Runs `fn` with a staging path for `destination`. When `fn` resolves, the
 * staged file is published atomically; when it throws, nothing is published
 * and the error is rethrown as-is. The staging directory is removed either way.
 *
 * @example
 * await withAtomicWriter("~/reports/daily.csv", async (tmp) => {
 *   await fs.writeFile(tmp, rows.join("\n"));
 * }, { overwrite: true });
 */
export async function withAtomicWriter<T>(
  destination: string,
  fn: (stagingPath: string) => Promise<T> | T,
  options: AtomicWriterOptions = {},
): Promise<T> {
  const handle = await acquireAtomicWriter(destination, options);

  let result: T;
  try {
    result = await fn(handle.path);
  } catch (err) {
    await handle.discard();
    throw err;
  }

  await handle.commit();
  return result;
}

export async function writeFileAtomic(
  destination: string,
  data: string | Uint8Array,
  options: AtomicWriterOptions = {},
): Promise<void> {
  await withAtomicWriter(
    destination,
    (stagingPath) => fs.writeFile(stagingPath, data),
    options,
  );
}
