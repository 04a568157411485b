import { Command } from "@commander-js/extra-typings";
import { stringify as stringifyYaml } from "yaml";
import { loadConfig, validateConfig } from "../../core/config.js";
import { formatMode } from "../../core/modes.js";
import { success, error, errorMessage } from "../formatters.js";

export function createConfigCommand() {
  const configCommand = new Command("config")
    .description("View or validate configuration");

  configCommand
    .command("show")
    .description("Show resolved configuration")
    .action(async () => {
      try {
        const config = await loadConfig();
        console.log(
          stringifyYaml({
            ...config,
            dirMode: formatMode(config.dirMode),
            fileMode: formatMode(config.fileMode),
          }),
        );
      } catch (err) {
        console.error(error(errorMessage(err)));
        process.exitCode = 1;
      }
    });

  configCommand
    .command("validate")
    .description("Validate stagewrite.yaml")
    .action(async () => {
      const result = await validateConfig();
      if (result.valid) {
        console.log(success("Configuration is valid"));
      } else {
        console.error(error("Configuration is invalid:"));
        console.error(result.error);
        process.exitCode = 1;
      }
    });

  return configCommand;
}
