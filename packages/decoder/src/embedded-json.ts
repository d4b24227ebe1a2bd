import { Result } from "neverthrow";
import type { JsonValue, ParsedOrRaw } from "./types.js";
import { isRecord } from "./utils.js";

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Strict JSON.parse as a Result; the error is the parser's message */
export const parseJson: (text: string) => Result<JsonValue, string> = Result.fromThrowable(
  (text: string): JsonValue => JSON.parse(text),
  reasonOf
);

/**
 * Parse a JSON document carried inside a string field (token metadata,
 * deployment context). On failure the original text is returned untouched,
 * flagged as failed.
 */
export function extractEmbeddedJson(text: string): ParsedOrRaw {
  return parseJson(text).match<ParsedOrRaw>(
    (value) => ({ kind: "parsed", value }),
    (reason) => ({ kind: "raw", raw: text, failed: true, reason })
  );
}

/**
 * The `id` member of a parsed context object, as a string.
 * Returns null when the context did not parse, is not an object, or has no
 * usable id.
 */
export function contextIdOf(context: ParsedOrRaw): string | null {
  if (context.kind !== "parsed" || !isRecord(context.value)) return null;
  if (!Object.prototype.hasOwnProperty.call(context.value, "id")) return null;

  const id = context.value["id"];
  if (id === null || id === undefined) return null;
  if (typeof id === "string") return id === "" ? null : id;
  if (typeof id === "number" || typeof id === "boolean") return String(id);
  return JSON.stringify(id);
}
