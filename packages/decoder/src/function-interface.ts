import { readFileSync } from "node:fs";
import { Interface, type InterfaceAbi, type JsonFragment } from "ethers";
import type { FunctionInterface } from "./types.js";

export type FunctionInterfaceOptions = {
  /** Compare the call's 4-byte selector against the function's (default true) */
  checkSelector?: boolean;
};

/**
 * Build the immutable interface for `functionName` out of an ABI, given either
 * as JSON fragments or human-readable signatures.
 * Throws when the ABI does not define the function.
 */
export function createFunctionInterface(
  abi: InterfaceAbi,
  functionName: string,
  options: FunctionInterfaceOptions = {}
): FunctionInterface {
  const iface = new Interface(abi);
  const fn = iface.getFunction(functionName);
  if (!fn) {
    throw new Error(`ABI does not define function "${functionName}"`);
  }

  return Object.freeze({
    name: fn.name,
    selector: fn.selector,
    signature: fn.format("sighash"),
    inputs: Object.freeze([...fn.inputs]),
    checkSelector: options.checkSelector ?? true,
  });
}

/** Load a JSON ABI file and pick `functionName` out of it */
export function loadFunctionInterface(
  abiPath: string,
  functionName: string,
  options: FunctionInterfaceOptions = {}
): FunctionInterface {
  let abi: JsonFragment[];
  try {
    abi = JSON.parse(readFileSync(abiPath, "utf8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read ABI file "${abiPath}": ${message}`);
  }
  if (!Array.isArray(abi)) {
    throw new Error(`ABI file "${abiPath}" must contain a JSON array of fragments`);
  }
  return createFunctionInterface(abi, functionName, options);
}
