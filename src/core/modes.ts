import { ModeError } from "./errors.js";

/** u=rwx,g=rx,o= */
export const DEFAULT_DIR_MODE = 0o750;
/** u=rw */
export const DEFAULT_FILE_MODE = 0o600;

const PERMISSION_MASK = 0o7777;

const WHO_SHIFT: Record<"u" | "g" | "o", number> = { u: 6, g: 3, o: 0 };
const PERM_BITS: Record<"r" | "w" | "x", number> = { r: 4, w: 2, x: 1 };

const OCTAL_PATTERN = /^(?:0o|0)?([0-7]{1,4})$/i;
const SYMBOLIC_CLAUSE = /^([ugoa]+)=([rwx]*)$/;

/**
 * Parses a permission mode.
 *
 * Accepts a number, an octal string (`"750"`, `"0750"`, `"0o750"`) or a
 * comma-separated list of symbolic assignments (`"u=rwx,g=rx,o="`). Classes
 * not named in a symbolic list get no bits.
 */
export function parseMode(input: number | string): number {
  if (typeof input === "number") {
    if (!Number.isInteger(input) || input < 0 || input > PERMISSION_MASK) {
      throw new ModeError(String(input));
    }
    return input;
  }

  const trimmed = input.trim();
  const octal = OCTAL_PATTERN.exec(trimmed);
  if (octal) {
    return parseInt(octal[1], 8);
  }

  if (trimmed === "") {
    throw new ModeError(input);
  }

  let mode = 0;
  for (const clause of trimmed.split(",")) {
    const match = SYMBOLIC_CLAUSE.exec(clause.trim());
    if (!match) {
      throw new ModeError(input);
    }
    const who = match[1].includes("a") ? "ugo" : match[1];
    let bits = 0;
    for (const perm of match[2]) {
      if (perm === "r" || perm === "w" || perm === "x") {
        bits |= PERM_BITS[perm];
      }
    }
    for (const cls of who) {
      if (cls === "u" || cls === "g" || cls === "o") {
        const shift = WHO_SHIFT[cls];
        mode = (mode & ~(0o7 << shift)) | (bits << shift);
      }
    }
  }
  return mode;
}

export function formatMode(mode: number): string {
  return "0" + (mode & PERMISSION_MASK).toString(8).padStart(3, "0");
}
