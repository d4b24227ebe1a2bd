import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Interface, hexlify, toUtf8Bytes, type JsonFragment } from "ethers";
import { createFunctionInterface } from "../../src/function-interface.js";
import type { Value } from "../../src/types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEPLOY_ABI_PATH = join(__dirname, "..", "..", "abi", "deploy-token.json");
export const deployAbi: JsonFragment[] = JSON.parse(readFileSync(DEPLOY_ABI_PATH, "utf8"));

export const deployIface = new Interface(deployAbi);
export const deployFn = createFunctionInterface(deployAbi, "deployToken");

// Lowercase on purpose: the decoders must hand back checksummed forms
export const RECIPIENT = "0x" + "ab".repeat(20);
export const ADMIN = "0x" + "cd".repeat(20);
export const WETH = "0x4200000000000000000000000000000000000006";

export type TokenConfigInput = {
  name: string;
  symbol: string;
  salt: string;
  image: string;
  metadata: string;
  context: string;
  originatingChainId: bigint;
};

export function tokenConfig(overrides: Partial<TokenConfigInput> = {}): TokenConfigInput {
  return {
    name: "DOGE",
    symbol: "DOGE",
    salt: "0x" + "11".repeat(32),
    image: "https://img.example/doge.png",
    metadata: '{"a":1}',
    context: '{"id":"xyz"}',
    originatingChainId: 8453n,
    ...overrides,
  };
}

/** deployToken call data as ethers encodes it */
export function encodeDeployment(token: TokenConfigInput = tokenConfig()): string {
  return deployIface.encodeFunctionData("deployToken", [
    {
      tokenConfig: token,
      vaultConfig: { vaultPercentage: 10, vaultDuration: 2592000n },
      poolConfig: { pairedToken: WETH, tickIfToken0IsNewToken: -230400 },
      initialBuyConfig: { pairedTokenPoolFee: 10000, pairedTokenSwapAmountOutMinimum: 0n },
      rewardsConfig: {
        creatorReward: 40n,
        creatorAdmin: ADMIN,
        creatorRewardRecipient: RECIPIENT,
        interfaceAdmin: ADMIN,
        interfaceRewardRecipient: ADMIN,
      },
    },
  ]);
}

/** Legacy payloads travel as hex of their UTF-8 JSON text */
export function hexOfText(text: string): string {
  return hexlify(toUtf8Bytes(text));
}

export function legacyPayload(
  token: unknown[] = ["Doge", "DOGE", "0x00", "https://img/m", "", '{"id":1}'],
  rewards: unknown[] = ["40", "0x1111111111111111111111111111111111111111"]
): string {
  return JSON.stringify({ method: "deployToken", params: [[token, [], [], [], rewards]] });
}

/** Walk struct fields by name; undefined as soon as the path leaves the tree */
export function at(value: Value | undefined, ...path: string[]): Value | undefined {
  let current = value;
  for (const key of path) {
    if (current?.kind !== "struct") return undefined;
    current = current.fields[key];
  }
  return current;
}
