import { readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_LEGACY_LAYOUT, type LegacyLayout } from "./legacy-decoder.js";
import { deepFreeze, isRecord } from "./utils.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const PACKAGE_ROOT = join(__dirname, "..");
const MONOREPO_ROOT = join(PACKAGE_ROOT, "..", "..");

export const CONFIG_PATH = join(MONOREPO_ROOT, "deploy-decoder.config.json");
export const DEFAULT_ABI_PATH = join(PACKAGE_ROOT, "abi", "deploy-token.json");
export const DEFAULT_LABELS_PATH = join(PACKAGE_ROOT, "data", "address-labels.json");

// Etherscan V2 base (unified across chains)
const ETHERSCAN_V2_BASE = "https://api.etherscan.io/v2/api";
const BASE_CHAIN_ID = 8453;

export interface ExplorerConfig {
  apiBaseUrl: string;
  apiKey: string;
  chainId: number;
  timeoutMs: number;
}

export interface AbiConfig {
  /** Absolute path of the JSON ABI file */
  path: string;
  functionName: string;
  checkSelector: boolean;
}

export interface AppConfig {
  explorer: ExplorerConfig;
  abi: AbiConfig;
  /** Absolute path of the address label table; null disables labels */
  labelsPath: string | null;
  legacyLayout: LegacyLayout;
}

type Env = Record<string, string | undefined>;

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = root[key];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error(`Config "${key}" must be an object`);
  }
  return value;
}

function stringField(obj: Record<string, unknown>, key: string, field: string, fallback: string): string {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string") {
    throw new Error(`Config "${field}" must be a string`);
  }
  return value;
}

function integerField(obj: Record<string, unknown>, key: string, field: string, fallback: number): number {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
    throw new Error(`Config "${field}" must be a non-negative integer`);
  }
  return value;
}

function booleanField(obj: Record<string, unknown>, key: string, field: string, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") {
    throw new Error(`Config "${field}" must be a boolean`);
  }
  return value;
}

/** Overlay the configured slot positions on the defaults */
function parseLegacyLayout(raw: Record<string, unknown>): LegacyLayout {
  const mainTuple = section(raw, "mainTuple");
  const tokenConfig = section(raw, "tokenConfig");
  const rewardsConfig = section(raw, "rewardsConfig");
  const d = DEFAULT_LEGACY_LAYOUT;
  const slot = (obj: Record<string, unknown>, group: string, key: string, fallback: number) =>
    integerField(obj, key, `legacyLayout.${group}.${key}`, fallback);

  return {
    mainTuple: {
      tokenConfig: slot(mainTuple, "mainTuple", "tokenConfig", d.mainTuple.tokenConfig),
      rewardsConfig: slot(mainTuple, "mainTuple", "rewardsConfig", d.mainTuple.rewardsConfig),
    },
    tokenConfig: {
      name: slot(tokenConfig, "tokenConfig", "name", d.tokenConfig.name),
      symbol: slot(tokenConfig, "tokenConfig", "symbol", d.tokenConfig.symbol),
      imageUrl: slot(tokenConfig, "tokenConfig", "imageUrl", d.tokenConfig.imageUrl),
      metadata: slot(tokenConfig, "tokenConfig", "metadata", d.tokenConfig.metadata),
      context: slot(tokenConfig, "tokenConfig", "context", d.tokenConfig.context),
      originatingChainId: slot(
        tokenConfig,
        "tokenConfig",
        "originatingChainId",
        d.tokenConfig.originatingChainId
      ),
    },
    rewardsConfig: {
      creatorRewardRecipient: slot(
        rewardsConfig,
        "rewardsConfig",
        "creatorRewardRecipient",
        d.rewardsConfig.creatorRewardRecipient
      ),
    },
  };
}

/**
 * Validate a parsed config document. Relative paths resolve against
 * `baseDir`; EXPLORER_API_KEY in `env` wins over the file's key.
 */
export function parseConfig(raw: unknown, baseDir: string, env: Env = process.env): AppConfig {
  if (!isRecord(raw)) {
    throw new Error("Config must be a JSON object");
  }

  const explorer = section(raw, "explorer");
  const abi = section(raw, "abi");
  const labels = section(raw, "labels");

  const abiPath = stringField(abi, "path", "abi.path", "");
  const labelsPath = labels.path === null ? null : stringField(labels, "path", "labels.path", "");

  const config: AppConfig = {
    explorer: {
      apiBaseUrl: stringField(explorer, "apiBaseUrl", "explorer.apiBaseUrl", ETHERSCAN_V2_BASE),
      apiKey: env.EXPLORER_API_KEY || stringField(explorer, "apiKey", "explorer.apiKey", ""),
      chainId: integerField(explorer, "chainId", "explorer.chainId", BASE_CHAIN_ID),
      timeoutMs: integerField(explorer, "timeoutMs", "explorer.timeoutMs", 15000),
    },
    abi: {
      path: abiPath ? resolve(baseDir, abiPath) : DEFAULT_ABI_PATH,
      functionName: stringField(abi, "functionName", "abi.functionName", "deployToken"),
      checkSelector: booleanField(abi, "checkSelector", "abi.checkSelector", true),
    },
    labelsPath: labelsPath === null ? null : labelsPath ? resolve(baseDir, labelsPath) : DEFAULT_LABELS_PATH,
    legacyLayout: parseLegacyLayout(section(raw, "legacyLayout")),
  };

  return deepFreeze(config);
}

/**
 * Read and validate the config file. Called once at startup; the result is
 * frozen and handed to whoever needs it.
 */
export function loadConfig(path: string = CONFIG_PATH, env: Env = process.env): AppConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read config "${path}": ${message}`);
  }
  return parseConfig(raw, dirname(path), env);
}
