import { err, ok, type Result } from "neverthrow";
import { contextIdOf, extractEmbeddedJson } from "./embedded-json.js";
import { missingFields, unsupportedFunction, type NormalizeError } from "./errors.js";
import type { CallSchema, DecodedCall, DeploymentRecord, StructValue, Value } from "./types.js";
import { normalizeAddress } from "./utils.js";

export const DEPLOY_FUNCTION_NAME = "deployToken";

type CanonicalField =
  | "name"
  | "symbol"
  | "imageUrl"
  | "metadata"
  | "context"
  | "originatingChainId"
  | "creatorRewardRecipient";

/** Where each canonical field lives in the call's token/rewards structs, per schema */
const FIELD_NAMES: Record<CallSchema, Record<CanonicalField, string>> = {
  named: {
    name: "name",
    symbol: "symbol",
    imageUrl: "image",
    metadata: "metadata",
    context: "context",
    originatingChainId: "originatingChainId",
    creatorRewardRecipient: "creatorRewardRecipient",
  },
  positional: {
    name: "name",
    symbol: "symbol",
    imageUrl: "imageUrl",
    metadata: "metadata",
    context: "context",
    originatingChainId: "originatingChainId",
    creatorRewardRecipient: "creatorRewardRecipient",
  },
};

const NO_FIELDS: Readonly<Record<string, Value>> = Object.freeze({});

function structOf(value: Value | undefined): StructValue | undefined {
  return value?.kind === "struct" ? value : undefined;
}

function textOf(value: Value | undefined): string | undefined {
  return value?.kind === "string" ? value.value : undefined;
}

function intOf(value: Value | undefined): bigint | undefined {
  return value?.kind === "int" ? value.value : undefined;
}

function addressOf(value: Value | undefined): string | undefined {
  if (value?.kind === "address") return value.value;
  if (value?.kind === "string") return normalizeAddress(value.value) ?? undefined;
  return undefined;
}

/**
 * Find the token and rewards structs.
 * named:      args.deploymentConfig.{tokenConfig,rewardsConfig}, or the same
 *             two structs at the top level for versions without the wrapper
 * positional: args.{token,rewards}
 */
function locateConfigs(call: DecodedCall): { token?: StructValue; rewards?: StructValue } {
  if (call.schema === "positional") {
    return { token: structOf(call.args.token), rewards: structOf(call.args.rewards) };
  }
  const source = structOf(call.args.deploymentConfig)?.fields ?? call.args;
  return { token: structOf(source.tokenConfig), rewards: structOf(source.rewardsConfig) };
}

/**
 * Map a decoded call onto the canonical deployment record.
 * Every missing required field is reported in one MissingFields error.
 */
export function normalizeCall(call: DecodedCall): Result<DeploymentRecord, NormalizeError> {
  if (call.functionName !== undefined && call.functionName !== DEPLOY_FUNCTION_NAME) {
    return err(unsupportedFunction(call.functionName));
  }

  const names = FIELD_NAMES[call.schema];
  const { token, rewards } = locateConfigs(call);
  const tokenFields = token?.fields ?? NO_FIELDS;
  const rewardsFields = rewards?.fields ?? NO_FIELDS;

  const name = textOf(tokenFields[names.name]);
  const symbol = textOf(tokenFields[names.symbol]);
  const metadataText = textOf(tokenFields[names.metadata]);
  const contextText = textOf(tokenFields[names.context]);
  const recipient = addressOf(rewardsFields[names.creatorRewardRecipient]);

  const missing: string[] = [];
  if (!token) {
    missing.push("tokenConfig");
  } else {
    if (name === undefined) missing.push("name");
    if (symbol === undefined) missing.push("symbol");
    if (metadataText === undefined) missing.push("metadata");
    if (contextText === undefined) missing.push("context");
  }
  if (!rewards) {
    missing.push("rewardsConfig");
  } else if (recipient === undefined) {
    missing.push("creatorRewardRecipient");
  }

  if (
    name === undefined ||
    symbol === undefined ||
    metadataText === undefined ||
    contextText === undefined ||
    recipient === undefined
  ) {
    return err(missingFields(missing));
  }

  const metadata = extractEmbeddedJson(metadataText);
  const context = extractEmbeddedJson(contextText);

  return ok({
    schema: call.schema,
    token: {
      name,
      symbol,
      imageUrl: textOf(tokenFields[names.imageUrl]) ?? null,
      originatingChainId: intOf(tokenFields[names.originatingChainId]) ?? null,
      metadata,
      context,
      contextId: contextIdOf(context),
    },
    rewards: { creatorRewardRecipient: recipient },
    sender: null,
  });
}
