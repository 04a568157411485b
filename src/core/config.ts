import fs from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { getConfigPath } from "./paths.js";
import { ConfigError, ModeError, isErrnoException } from "./errors.js";
import { LOG_LEVELS } from "./logger.js";
import { DEFAULT_DIR_MODE, DEFAULT_FILE_MODE, parseMode } from "./modes.js";
import type { StagewriteConfig } from "./types.js";

// YAML turns an unquoted 750 into a decimal number, so integers are read back
// as their digits and parsed as octal like any other mode string.
const ModeSchema = z
  .union([z.string(), z.number().int().nonnegative()])
  .transform((value, ctx) => {
    try {
      return parseMode(typeof value === "number" ? String(value) : value);
    } catch (err) {
      if (!(err instanceof ModeError)) throw err;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
      return z.NEVER;
    }
  });

const ConfigSchema = z
  .object({
    overwrite: z.boolean().default(false),
    dir_mode: ModeSchema.default(DEFAULT_DIR_MODE.toString(8)),
    file_mode: ModeSchema.default(DEFAULT_FILE_MODE.toString(8)),
    user: z.string().min(1).optional(),
    group: z.string().min(1).optional(),
    fsync: z.boolean().default(true),
    log_level: z.enum(LOG_LEVELS).default("warn"),
    log_file: z.string().min(1).optional(),
  })
  .strict();

type RawConfig = z.infer<typeof ConfigSchema>;

function mapConfig(raw: RawConfig): StagewriteConfig {
  return {
    overwrite: raw.overwrite,
    dirMode: raw.dir_mode,
    fileMode: raw.file_mode,
    user: raw.user,
    group: raw.group,
    fsync: raw.fsync,
    logLevel: raw.log_level,
    logFile: raw.log_file,
  };
}

export function parseConfig(parsed: unknown, source: string): StagewriteConfig {
  const result = ConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid config in ${source}:\n${issues}`);
  }
  return mapConfig(result.data);
}

/** Loads `stagewrite.yaml` from `base`; a missing file yields the defaults. */
export async function loadConfig(
  base: string = process.cwd(),
): Promise<StagewriteConfig> {
  const configPath = getConfigPath(base);
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return parseConfig({}, configPath);
    }
    throw new ConfigError(
      `Cannot read ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigError(
      `Invalid YAML in ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return parseConfig(parsed, configPath);
}

export async function validateConfig(
  base: string = process.cwd(),
): Promise<{ valid: boolean; config?: StagewriteConfig; error?: string }> {
  try {
    const config = await loadConfig(base);
    return { valid: true, config };
  } catch (err) {
    return {
      valid: false,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

export function getDefaultConfigYaml(): string {
  return `# Defaults for 'stagewrite write'. Command-line flags take precedence.

overwrite: false

# Modes take octal ("750") or symbolic ("u=rwx,g=rx,o=") form.
dir_mode: "u=rwx,g=rx,o="
file_mode: "u=rw"

# user: deploy
# group: www-data

fsync: true

log_level: warn
# log_file: ./stagewrite.log
`;
}
