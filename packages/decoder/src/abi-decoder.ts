import { err, ok, type Result } from "neverthrow";
import {
  type ParamType,
  fromTwos,
  getAddress,
  hexlify,
  mask,
  toBigInt,
  toUtf8String,
  Utf8ErrorFuncs,
} from "ethers";
import {
  invalidOffset,
  selectorMismatch,
  truncatedData,
  type DecodeError,
} from "./errors.js";
import type { DecodedCall, FunctionInterface, StructValue, Value } from "./types.js";

const WORD = 32;
const SELECTOR_BYTES = 4;

/** Carries a typed error out of the recursive walk; never escapes this module */
class DecodeFailure extends Error {
  constructor(readonly error: DecodeError) {
    super(error.kind);
  }
}

function fail(error: DecodeError): never {
  throw new DecodeFailure(error);
}

/**
 * Check if a parameter is dynamic in the ABI encoding (stored behind an offset).
 * bytes, string and T[] always are; T[k] and tuples are when any member is.
 */
export function isDynamicType(param: ParamType): boolean {
  if (param.type === "string" || param.type === "bytes") return true;
  if (param.isArray()) return param.arrayLength === -1 || isDynamicType(param.arrayChildren);
  if (param.isTuple()) return param.components.some(isDynamicType);
  return false;
}

/** Bytes a parameter occupies in its enclosing head region */
function headSize(param: ParamType): number {
  if (isDynamicType(param)) return WORD;
  if (param.isArray()) return param.arrayLength * headSize(param.arrayChildren);
  if (param.isTuple()) return param.components.reduce((n, c) => n + headSize(c), 0);
  return WORD;
}

function keyOf(param: ParamType, index: number): string {
  return param.name || String(index);
}

function joinPath(parent: string, key: string): string {
  return parent ? `${parent}.${key}` : key;
}

/** Bounds-checked view over the argument bytes (everything after the selector) */
class ArgReader {
  constructor(private readonly data: Uint8Array) {}

  get length(): number {
    return this.data.length;
  }

  slice(at: number, size: number, path: string): Uint8Array {
    if (at + size > this.data.length) {
      fail(truncatedData(path, at, size, Math.max(0, this.data.length - at)));
    }
    return this.data.subarray(at, at + size);
  }

  word(at: number, path: string): Uint8Array {
    return this.slice(at, WORD, path);
  }

  uint(at: number, path: string): bigint {
    return toBigInt(this.word(at, path));
  }

  /** Length-prefixed byte string (the payload of `bytes` and `string`) */
  lengthPrefixed(at: number, path: string): Uint8Array {
    const length = this.uint(at, path);
    const start = at + WORD;
    const available = Math.max(0, this.data.length - start);
    if (length > BigInt(available)) {
      fail(truncatedData(path, start, Number(length), available));
    }
    return this.slice(start, Number(length), path);
  }
}

/**
 * Decode a head/tail encoded sequence starting at `base`. Static members are
 * read in place; dynamic members hold an offset relative to `base`.
 */
function decodeSequence(
  params: readonly ParamType[],
  reader: ArgReader,
  base: number,
  pathOf: (param: ParamType, index: number) => string
): Value[] {
  const values: Value[] = [];
  let cursor = base;

  params.forEach((param, index) => {
    const path = pathOf(param, index);
    if (isDynamicType(param)) {
      const offset = reader.uint(cursor, path);
      const target = BigInt(base) + offset;
      if (target > BigInt(reader.length)) {
        fail(invalidOffset(path, offset, reader.length));
      }
      values.push(decodeValue(param, reader, Number(target), path));
      cursor += WORD;
    } else {
      values.push(decodeValue(param, reader, cursor, path));
      cursor += headSize(param);
    }
  });

  return values;
}

function toStruct(components: readonly ParamType[], values: Value[]): StructValue {
  const fields: Record<string, Value> = {};
  components.forEach((param, index) => {
    fields[keyOf(param, index)] = values[index];
  });
  return { kind: "struct", fields };
}

function decodeValue(param: ParamType, reader: ArgReader, at: number, path: string): Value {
  if (param.isTuple()) {
    const values = decodeSequence(param.components, reader, at, (c, i) => joinPath(path, keyOf(c, i)));
    return toStruct(param.components, values);
  }

  if (param.isArray()) {
    const child = param.arrayChildren;
    let length = param.arrayLength;
    let start = at;

    if (length === -1) {
      const announced = reader.uint(at, path);
      start = at + WORD;
      // Every element owns at least its head slot, so an announced length
      // larger than what remains cannot be satisfied.
      const needed = announced * BigInt(headSize(child));
      const available = Math.max(0, reader.length - start);
      if (needed > BigInt(available)) {
        fail(truncatedData(path, start, Number(needed), available));
      }
      length = Number(announced);
    }

    const children = new Array<ParamType>(length).fill(child);
    const items = decodeSequence(children, reader, start, (_, i) => `${path}[${i}]`);
    return { kind: "list", items };
  }

  const type = param.type;
  if (type === "string") {
    return { kind: "string", value: toUtf8String(reader.lengthPrefixed(at, path), Utf8ErrorFuncs.replace) };
  }
  if (type === "bytes") {
    return { kind: "bytes", value: hexlify(reader.lengthPrefixed(at, path)) };
  }

  const word = reader.word(at, path);
  if (type === "address") {
    return { kind: "address", value: getAddress(hexlify(word.subarray(WORD - 20))) };
  }
  if (type === "bool") {
    return { kind: "bool", value: toBigInt(word) !== 0n };
  }

  const fixedBytes = /^bytes(\d+)$/.exec(type);
  if (fixedBytes) {
    return { kind: "bytes", value: hexlify(word.subarray(0, Number(fixedBytes[1]))) };
  }

  const integer = /^(u?)int(\d*)$/.exec(type);
  if (integer) {
    const bits = integer[2] ? Number(integer[2]) : 256;
    const raw = mask(toBigInt(word), bits);
    const value = integer[1] === "u" ? raw : fromTwos(raw, bits);
    return { kind: "int", value, type };
  }

  // Types outside the supported set (function pointers, fixed-point) stay raw
  return { kind: "bytes", value: hexlify(word) };
}

/**
 * Decode ABI call data (selector + arguments) against `fn`.
 * Top-level arguments and tuple members are keyed by name.
 */
export function decodeAbiCall(fn: FunctionInterface, data: Uint8Array): Result<DecodedCall, DecodeError> {
  if (data.length < SELECTOR_BYTES) {
    return err(truncatedData("", 0, SELECTOR_BYTES, data.length));
  }

  const selector = hexlify(data.subarray(0, SELECTOR_BYTES));
  if (fn.checkSelector && selector !== fn.selector.toLowerCase()) {
    return err(selectorMismatch(fn.selector, selector));
  }

  const reader = new ArgReader(data.subarray(SELECTOR_BYTES));
  try {
    const values = decodeSequence(fn.inputs, reader, 0, keyOf);
    return ok({
      schema: "named",
      functionName: fn.name,
      selector,
      args: toStruct(fn.inputs, values).fields,
    });
  } catch (e) {
    if (e instanceof DecodeFailure) return err(e.error);
    throw e;
  }
}
