import { readFileSync } from "node:fs";
import { logger } from "./logger.js";
import { isRecord } from "./utils.js";

const ADDRESS_KEY = /^0x[0-9a-f]{40}$/;

/**
 * Read-only address → label table. Lookups ignore case.
 */
export class AddressBook {
  private readonly labels: ReadonlyMap<string, string>;

  private constructor(labels: Map<string, string>) {
    this.labels = labels;
  }

  static empty(): AddressBook {
    return new AddressBook(new Map());
  }

  /** Entries whose key is not an address, or whose label is not a non-empty string, are skipped */
  static fromRecord(table: Record<string, unknown>): AddressBook {
    const labels = new Map<string, string>();
    for (const [address, label] of Object.entries(table)) {
      const key = address.trim().toLowerCase();
      if (!ADDRESS_KEY.test(key)) {
        logger.warn({ address }, "Skipping label entry with invalid address");
        continue;
      }
      if (typeof label !== "string" || !label.trim()) {
        logger.warn({ address }, "Skipping label entry without a label");
        continue;
      }
      labels.set(key, label.trim());
    }
    return new AddressBook(labels);
  }

  static load(path: string): AddressBook {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, "utf8"));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Failed to read address labels from "${path}": ${message}`);
    }
    if (!isRecord(parsed)) {
      throw new Error(`Address labels file "${path}" must contain a JSON object`);
    }
    const book = AddressBook.fromRecord(parsed);
    logger.debug({ path, entries: book.size }, "Loaded address labels");
    return book;
  }

  get size(): number {
    return this.labels.size;
  }

  label(address: string): string | null {
    return this.labels.get(address.trim().toLowerCase()) ?? null;
  }
}
