import type { AppConfig } from "./config.js";
import { loadFunctionInterface } from "./function-interface.js";
import { AddressBook } from "./labels.js";
import { DEFAULT_LEGACY_LAYOUT, type LegacyLayout } from "./legacy-decoder.js";
import { logger } from "./logger.js";
import type { FunctionInterface } from "./types.js";

/**
 * Everything the decoding pipeline reads besides its input. Built once at
 * startup and shared by reference between concurrent decodes.
 */
export type DecoderContext = Readonly<{
  fn: FunctionInterface;
  labels: AddressBook;
  legacyLayout: LegacyLayout;
}>;

export function createDecoderContext(config: AppConfig): DecoderContext {
  const fn = loadFunctionInterface(config.abi.path, config.abi.functionName, {
    checkSelector: config.abi.checkSelector,
  });
  const labels = config.labelsPath ? AddressBook.load(config.labelsPath) : AddressBook.empty();
  logger.debug({ fn: fn.signature, selector: fn.selector, labels: labels.size }, "Decoder context ready");
  return Object.freeze({ fn, labels, legacyLayout: config.legacyLayout });
}

/** Context from in-memory parts; the legacy layout defaults when omitted */
export function decoderContextOf(
  fn: FunctionInterface,
  labels: AddressBook = AddressBook.empty(),
  legacyLayout: LegacyLayout = DEFAULT_LEGACY_LAYOUT
): DecoderContext {
  return Object.freeze({ fn, labels, legacyLayout });
}
