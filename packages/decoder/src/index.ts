export { decodeCall, decodeDeployment, type DecodeDeploymentOptions } from "./decoder.js";
export { classifyPayload, hexToBytes, type Classification } from "./classifier.js";
export { decodeAbiCall, isDynamicType } from "./abi-decoder.js";
export { decodeLegacyCall, DEFAULT_LEGACY_LAYOUT, type LegacyLayout } from "./legacy-decoder.js";
export { normalizeCall, DEPLOY_FUNCTION_NAME } from "./normalizer.js";
export { extractEmbeddedJson, contextIdOf, parseJson } from "./embedded-json.js";
export { AddressBook } from "./labels.js";
export { createFunctionInterface, loadFunctionInterface, type FunctionInterfaceOptions } from "./function-interface.js";
export { loadConfig, parseConfig, CONFIG_PATH, type AppConfig, type AbiConfig, type ExplorerConfig } from "./config.js";
export { createDecoderContext, decoderContextOf, type DecoderContext } from "./context.js";
export {
  ExplorerClient,
  type ExplorerClientOptions,
  type ExplorerTransaction,
  type HttpGet,
} from "./explorer.js";
export { renderDeployment, deploymentToJson } from "./outputs/printer.js";
export * from "./errors.js";
export type * from "./types.js";
