import { describe, it, expect } from "vitest";
import { parseMode, formatMode } from "../../src/core/modes.js";
import { ModeError } from "../../src/core/errors.js";

describe("parseMode", () => {
  it("passes numbers through", () => {
    expect(parseMode(0o640)).toBe(0o640);
  });

  it.each([
    ["750", 0o750],
    ["0750", 0o750],
    ["0o750", 0o750],
    ["4755", 0o4755],
    ["0", 0],
    [" 600 ", 0o600],
  ])("parses octal %j", (input, expected) => {
    expect(parseMode(input)).toBe(expected);
  });

  it.each([
    ["u=rwx,g=rx,o=", 0o750],
    ["u=rw", 0o600],
    ["a=r", 0o444],
    ["ug=rw,o=r", 0o664],
    ["a=rwx,o=", 0o770],
  ])("parses symbolic %j", (input, expected) => {
    expect(parseMode(input)).toBe(expected);
  });

  it.each(["", "888", "u+rw", "u=rwz", "rw-r--r--", "12345"])(
    "rejects %j",
    (input) => {
      expect(() => parseMode(input)).toThrow(ModeError);
    },
  );

  it("rejects out-of-range numbers", () => {
    expect(() => parseMode(-1)).toThrow(ModeError);
    expect(() => parseMode(0o10000)).toThrow(ModeError);
    expect(() => parseMode(1.5)).toThrow(ModeError);
  });

  it("names the input in the error", () => {
    expect(() => parseMode("nope")).toThrow('Invalid permission mode: "nope"');
  });
});

describe("formatMode", () => {
  it("renders a leading-zero octal string", () => {
    expect(formatMode(0o750)).toBe("0750");
    expect(formatMode(0o600)).toBe("0600");
    expect(formatMode(0o4755)).toBe("04755");
    expect(formatMode(0)).toBe("0000");
  });
});
