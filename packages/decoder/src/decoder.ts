import { err, type Result } from "neverthrow";
import { decodeAbiCall } from "./abi-decoder.js";
import { classifyPayload } from "./classifier.js";
import type { DecoderContext } from "./context.js";
import { parseJson } from "./embedded-json.js";
import {
  malformedHex,
  malformedJson,
  type DecodeError,
  type DeploymentError,
} from "./errors.js";
import type { AddressBook } from "./labels.js";
import { decodeLegacyCall } from "./legacy-decoder.js";
import { logger } from "./logger.js";
import { normalizeCall } from "./normalizer.js";
import type { DecodedCall, DeploymentRecord, SenderInfo } from "./types.js";
import { normalizeAddress } from "./utils.js";

export type DecodeDeploymentOptions = {
  /** Transaction sender; attached to the record with its label */
  sender?: string;
};

/** Classify the raw input and run the matching decoder */
export function decodeCall(raw: string, ctx: DecoderContext): Result<DecodedCall, DecodeError> {
  const classification = classifyPayload(raw);
  logger.debug({ kind: classification.kind }, "Classified call data");

  switch (classification.kind) {
    case "already-json":
    case "hex-encoded-text":
      return parseJson(classification.text)
        .mapErr(malformedJson)
        .andThen((json) => decodeLegacyCall(json, ctx.legacyLayout));

    case "abi-binary":
      if (!classification.bytes) {
        return err(malformedHex("expected hex digits in pairs, optionally prefixed with 0x"));
      }
      return decodeAbiCall(ctx.fn, classification.bytes);
  }
}

function senderInfo(sender: string | undefined, labels: AddressBook): SenderInfo | null {
  const trimmed = sender?.trim();
  if (!trimmed) return null;
  const address = normalizeAddress(trimmed) ?? trimmed;
  return { address, label: labels.label(address) };
}

/**
 * Raw transaction input → canonical deployment record.
 * Never throws for bad input: every failure comes back as a typed error
 * naming the stage that rejected it.
 */
export function decodeDeployment(
  raw: string,
  ctx: DecoderContext,
  options: DecodeDeploymentOptions = {}
): Result<DeploymentRecord, DeploymentError> {
  const result = decodeCall(raw, ctx)
    .andThen(normalizeCall)
    .map((record): DeploymentRecord => ({ ...record, sender: senderInfo(options.sender, ctx.labels) }));

  if (result.isErr()) {
    logger.debug({ stage: result.error.stage, kind: result.error.kind }, "Deployment decode failed");
  }
  return result;
}
