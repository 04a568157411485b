export class StagewriteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StagewriteError";
  }
}

export class AtomicWriteError extends StagewriteError {
  constructor(message: string) {
    super(message);
    this.name = "AtomicWriteError";
  }
}

export class DestinationExistsError extends AtomicWriteError {
  readonly code = "EEXIST";

  constructor(public readonly destination: string) {
    super(`Destination already exists: ${destination}`);
    this.name = "DestinationExistsError";
  }
}

export class OwnershipError extends StagewriteError {
  constructor(
    message: string,
    public readonly kind: "user" | "group",
    public readonly lookup: string,
  ) {
    super(message);
    this.name = "OwnershipError";
  }
}

export class ConfigError extends StagewriteError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ModeError extends StagewriteError {
  constructor(public readonly input: string) {
    super(`Invalid permission mode: ${JSON.stringify(input)}`);
    this.name = "ModeError";
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}
