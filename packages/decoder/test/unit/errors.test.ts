import { describe, it, expect } from "vitest";
import {
  describeError,
  invalidOffset,
  malformedHex,
  selectorMismatch,
  shapeMismatch,
  truncatedData,
  unsupportedFunction,
} from "../../src/errors.js";

describe("describeError", () => {
  it.each([
    [
      truncatedData("", 0, 4, 2),
      "Call data truncated while reading selector: needed 4 bytes at offset 0, 2 available",
    ],
    [
      invalidOffset("text", 4096n, 32),
      "Dynamic offset 4096 for text points outside the 32-byte argument buffer",
    ],
    [selectorMismatch("0x12345678", "0xa9059cbb"), "Function selector 0xa9059cbb does not match expected 0x12345678"],
    [malformedHex("odd length"), "Input is not valid hex: odd length"],
    [shapeMismatch("params[0]", "an array (main tuple)"), "Legacy payload slot params[0] is not an array (main tuple)"],
    [unsupportedFunction("transfer"), 'Unsupported function "transfer"; only deployToken calls can be decoded'],
  ])("%o", (error, message) => {
    expect(describeError(error)).toBe(message);
  });

  it("keeps offsets beyond the safe integer range exact", () => {
    expect(invalidOffset("data", 2n ** 200n, 64).offset).toBe((2n ** 200n).toString());
  });
});
