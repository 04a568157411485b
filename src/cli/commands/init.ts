import { Command } from "@commander-js/extra-typings";
import { getConfigPath } from "../../core/paths.js";
import { getDefaultConfigYaml } from "../../core/config.js";
import { DestinationExistsError } from "../../core/errors.js";
import { writeFileAtomic } from "../../writer/atomic-writer.js";
import { success, warn, error, errorMessage } from "../formatters.js";

export function createInitCommand() {
  return new Command("init")
    .description("Create stagewrite.yaml in the current directory")
    .option("--force", "Overwrite existing config")
    .action(async (options) => {
      const configPath = getConfigPath();
      try {
        await writeFileAtomic(configPath, getDefaultConfigYaml(), {
          overwrite: options.force ?? false,
          fileMode: 0o644,
        });
      } catch (err) {
        if (err instanceof DestinationExistsError) {
          console.log(warn("stagewrite.yaml already exists. Use --force to overwrite."));
          return;
        }
        console.error(error(errorMessage(err)));
        process.exitCode = 1;
        return;
      }

      console.log(success(`Created ${configPath}`));
      console.log("");
      console.log("Next steps:");
      console.log("  1. Edit stagewrite.yaml to set default modes and ownership");
      console.log("  2. Run 'stagewrite write <destination> --from <file>' to publish a file");
    });
}
