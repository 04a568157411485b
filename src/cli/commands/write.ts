import { createReadStream, createWriteStream } from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import type { Readable } from "node:stream";
import { Command, InvalidArgumentError } from "@commander-js/extra-typings";
import { loadConfig } from "../../core/config.js";
import { ModeError } from "../../core/errors.js";
import { Logger } from "../../core/logger.js";
import { parseMode } from "../../core/modes.js";
import type { StagewriteConfig } from "../../core/types.js";
import { withAtomicWriter } from "../../writer/atomic-writer.js";
import { success, error, dim, mode, errorMessage } from "../formatters.js";

function parseModeOption(value: string): number {
  try {
    return parseMode(value);
  } catch (err) {
    if (err instanceof ModeError) {
      throw new InvalidArgumentError(err.message);
    }
    throw err;
  }
}

async function createLogger(
  config: StagewriteConfig,
  verbose: boolean,
): Promise<Logger> {
  const minLevel = verbose ? "debug" : config.logLevel;
  if (config.logFile) {
    return Logger.createFileLogger(path.resolve(config.logFile), minLevel);
  }
  return Logger.createCliLogger(minLevel);
}

export function createWriteCommand(stdin: Readable = process.stdin) {
  return new Command("write")
    .description("Atomically write stdin (or --from) to a destination file")
    .argument("<destination>", "file to publish")
    .option("--from <file>", "read content from a file instead of stdin")
    .option("--overwrite", "replace the destination if it exists")
    .option("--dir-mode <mode>", "mode for created parent directories", parseModeOption)
    .option("--file-mode <mode>", "mode for the published file", parseModeOption)
    .option("--user <name>", "owner for created directories and the file")
    .option("--group <name>", "group for created directories and the file")
    .option("--no-fsync", "skip flushing to disk before and after the rename")
    .option("-v, --verbose", "log each step")
    .action(async (destination, options) => {
      let logger: Logger | undefined;
      try {
        const config = await loadConfig();
        logger = await createLogger(config, options.verbose ?? false);
        const fileMode = options.fileMode ?? config.fileMode;

        const published = await withAtomicWriter(
          destination,
          async (stagingPath) => {
            const source = options.from
              ? createReadStream(path.resolve(options.from))
              : stdin;
            await pipeline(source, createWriteStream(stagingPath));
            // The staging directory sits beside the destination under the same base name.
            return path.join(
              path.dirname(path.dirname(stagingPath)),
              path.basename(stagingPath),
            );
          },
          {
            overwrite: options.overwrite ?? config.overwrite,
            dirMode: options.dirMode ?? config.dirMode,
            fileMode,
            user: options.user ?? config.user,
            group: options.group ?? config.group,
            fsync: options.fsync === false ? false : config.fsync,
            logger,
          },
        );

        console.log(success(`Wrote ${published}`) + " " + dim("mode") + " " + mode(fileMode));
      } catch (err) {
        logger?.error("Write failed", { destination, error: errorMessage(err) });
        console.error(error(errorMessage(err)));
        process.exitCode = 1;
      }
    });
}
