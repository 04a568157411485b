import type { Logger, LogLevel } from "./logger.js";

export interface AtomicWriterOptions {
  /** Replace an existing destination instead of failing. */
  overwrite?: boolean;
  /** Mode for parent directories this call creates. */
  dirMode?: number;
  /** Mode applied to the destination after publishing. */
  fileMode?: number;
  /** Owner (name or numeric uid) for created directories and the destination. */
  user?: string;
  /** Group (name or numeric gid) for created directories and the destination. */
  group?: string;
  /** Flush the staged file and the destination directory around the rename. */
  fsync?: boolean;
  logger?: Logger;
}

export interface ResolvedWriterOptions {
  readonly overwrite: boolean;
  readonly dirMode: number;
  readonly fileMode: number;
  readonly user: string | undefined;
  readonly group: string | undefined;
  readonly fsync: boolean;
  readonly logger: Logger | undefined;
}

/** Numeric owner ids; -1 leaves that id unchanged. */
export interface Ownership {
  uid: number;
  gid: number;
}

export interface AtomicWriteHandle {
  /** Resolved absolute destination. */
  readonly destination: string;
  readonly stagingDir: string;
  /** Where the caller writes; shares the destination's base name. */
  readonly path: string;
  /** Publish the staged file, apply file properties, remove the staging directory. */
  commit(): Promise<void>;
  /** Remove the staging directory without publishing. */
  discard(): Promise<void>;
}

export interface StagewriteConfig {
  overwrite: boolean;
  dirMode: number;
  fileMode: number;
  user?: string;
  group?: string;
  fsync: boolean;
  logLevel: LogLevel;
  logFile?: string;
}
