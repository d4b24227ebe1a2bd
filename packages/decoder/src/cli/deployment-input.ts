import { readFile } from "node:fs/promises";
import { isHexString } from "ethers";
import { isRecord } from "../utils.js";

export type ParsedDeploymentInput =
  | { kind: "address"; address: string }
  | { kind: "calldata"; calldata: string };

const ADDRESS = /^0x[0-9a-fA-F]{40}$/;
const BARE_HEX = /^[0-9a-fA-F]+$/;

function looksLikeCalldata(value: string): boolean {
  return value.startsWith("{") || isHexString(value) || BARE_HEX.test(value);
}

async function loadCalldataFile(path: string): Promise<string> {
  let contents: string;
  try {
    contents = await readFile(path, "utf8");
  } catch (err) {
    if (isRecord(err) && err.code === "ENOENT") {
      throw new Error(`Input "${path}" is neither an address, call data, nor a readable file`);
    }
    throw err;
  }

  const calldata = contents.trim();
  if (!calldata) {
    throw new Error(`Call data file "${path}" is empty`);
  }
  return calldata;
}

/**
 * CLI positional → what to decode. A 20-byte address is looked up on the
 * explorer; JSON text and hex are taken as call data; anything else is read
 * as a file holding call data.
 */
export async function parseDeploymentInput(raw: string): Promise<ParsedDeploymentInput> {
  const arg = raw.trim();
  if (!arg) {
    throw new Error("Input cannot be empty");
  }

  if (ADDRESS.test(arg)) {
    return { kind: "address", address: arg };
  }

  if (looksLikeCalldata(arg)) {
    return { kind: "calldata", calldata: arg };
  }

  return { kind: "calldata", calldata: await loadCalldataFile(raw) };
}
