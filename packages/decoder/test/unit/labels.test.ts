import { describe, it, expect } from "vitest";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { AddressBook } from "../../src/labels.js";

const FIXTURES = join(dirname(fileURLToPath(import.meta.url)), "..", "fixtures");

describe("AddressBook", () => {
  it("looks addresses up regardless of case", () => {
    const book = AddressBook.fromRecord({ "0x000000000000000000000000000000000000dEaD": "Burn" });
    expect(book.label("0x000000000000000000000000000000000000dead")).toBe("Burn");
    expect(book.label("0x000000000000000000000000000000000000DEAD")).toBe("Burn");
  });

  it("returns null for unknown addresses", () => {
    expect(AddressBook.empty().label("0x4200000000000000000000000000000000000006")).toBeNull();
  });

  it("loads a label file, skipping unusable entries", () => {
    const book = AddressBook.load(join(FIXTURES, "labels.json"));
    expect(book.size).toBe(2);
    expect(book.label("0xabababababababababababababababababababab")).toBe("Test creator");
    expect(book.label("0x1111111111111111111111111111111111111111")).toBe("Test recipient");
    expect(book.label("0x2222222222222222222222222222222222222222")).toBeNull();
  });

  it("fails on a missing file", () => {
    expect(() => AddressBook.load(join(FIXTURES, "missing.json"))).toThrow(/^Failed to read address labels/);
  });

  it("fails when the file is not an object", () => {
    expect(() => AddressBook.load(join(FIXTURES, "not-an-object.json"))).toThrow("must contain a JSON object");
  });
});
