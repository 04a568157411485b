export {
  acquireAtomicWriter,
  withAtomicWriter,
  writeFileAtomic,
  resolveWriterOptions,
} from "./writer/atomic-writer.js";
export { ensureDirectory, provisionParents } from "./writer/provision.js";
export type { EnsureDirectoryResult } from "./writer/provision.js";
export { applyProperties, resolveOwnership, lookupId } from "./writer/properties.js";
export type { IdDatabases } from "./writer/properties.js";
export {
  StagewriteError,
  AtomicWriteError,
  DestinationExistsError,
  OwnershipError,
  ConfigError,
  ModeError,
} from "./core/errors.js";
export { parseMode, formatMode, DEFAULT_DIR_MODE, DEFAULT_FILE_MODE } from "./core/modes.js";
export { resolveDestination, expandHome } from "./core/paths.js";
export { loadConfig, parseConfig } from "./core/config.js";
export { Logger } from "./core/logger.js";
export type { LogLevel } from "./core/logger.js";
export type {
  AtomicWriterOptions,
  ResolvedWriterOptions,
  AtomicWriteHandle,
  Ownership,
  StagewriteConfig,
} from "./core/types.js";
