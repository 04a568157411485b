import type { Readable } from "node:stream";
import { Command } from "@commander-js/extra-typings";
import { createWriteCommand } from "./commands/write.js";
import { createInitCommand } from "./commands/init.js";
import { createConfigCommand } from "./commands/config.js";

export function createProgram(stdin: Readable = process.stdin) {
  return new Command()
    .name("stagewrite")
    .description("Atomically publish files through a private staging directory")
    .version("0.1.0")
    .addCommand(createWriteCommand(stdin))
    .addCommand(createInitCommand())
    .addCommand(createConfigCommand());
}

export const program = createProgram();
