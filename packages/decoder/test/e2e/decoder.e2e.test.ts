/**
 * E2E tests for the decoding pipeline
 *
 * Raw call data in, DeploymentRecord (or typed failure) out, across the three
 * encodings seen in the wild:
 * - ABI call data for deployToken
 * - hex of a legacy JSON payload
 * - a legacy JSON payload handed over as text
 */

import { describe, it, expect } from "vitest";
import { getAddress } from "ethers";
import { decoderContextOf } from "../../src/context.js";
import { decodeDeployment } from "../../src/decoder.js";
import { describeError } from "../../src/errors.js";
import { AddressBook } from "../../src/labels.js";
import {
  ADMIN,
  RECIPIENT,
  deployFn,
  encodeDeployment,
  hexOfText,
  legacyPayload,
  tokenConfig,
} from "../support/deployment.js";

const ctx = decoderContextOf(deployFn, AddressBook.fromRecord({ [ADMIN]: "Test admin" }));

const LEGACY_RECIPIENT = "0x1111111111111111111111111111111111111111";

describe("decodeDeployment", () => {
  describe("ABI call data", () => {
    it("produces the canonical record", () => {
      const result = decodeDeployment(encodeDeployment(), ctx);
      expect(result._unsafeUnwrap()).toEqual({
        schema: "named",
        token: {
          name: "DOGE",
          symbol: "DOGE",
          imageUrl: "https://img.example/doge.png",
          originatingChainId: 8453n,
          metadata: { kind: "parsed", value: { a: 1 } },
          context: { kind: "parsed", value: { id: "xyz" } },
          contextId: "xyz",
        },
        rewards: { creatorRewardRecipient: getAddress(RECIPIENT) },
        sender: null,
      });
    });

    it("accepts call data without the 0x prefix", () => {
      const record = decodeDeployment(encodeDeployment().slice(2), ctx)._unsafeUnwrap();
      expect(record.token.contextId).toBe("xyz");
    });

    it("attaches a labeled sender", () => {
      const record = decodeDeployment(encodeDeployment(), ctx, { sender: ADMIN })._unsafeUnwrap();
      expect(record.sender).toEqual({ address: getAddress(ADMIN), label: "Test admin" });
    });

    it("attaches an unlabeled sender", () => {
      const record = decodeDeployment(encodeDeployment(), ctx, { sender: RECIPIENT })._unsafeUnwrap();
      expect(record.sender).toEqual({ address: getAddress(RECIPIENT), label: null });
    });

    it("keeps malformed metadata visible", () => {
      const data = encodeDeployment(tokenConfig({ metadata: "{oops", context: "" }));
      const record = decodeDeployment(data, ctx)._unsafeUnwrap();
      expect(record.token.metadata).toMatchObject({ kind: "raw", raw: "{oops", failed: true });
      expect(record.token.context).toMatchObject({ kind: "raw", raw: "", failed: true });
      expect(record.token.contextId).toBeNull();
    });

    it("fails on a foreign selector", () => {
      const data = "0xa9059cbb" + encodeDeployment().slice(10);
      expect(decodeDeployment(data, ctx)._unsafeUnwrapErr()).toMatchObject({
        kind: "SelectorMismatch",
        stage: "abi",
      });
    });

    it("fails on truncated data", () => {
      const error = decodeDeployment(encodeDeployment().slice(0, -64), ctx)._unsafeUnwrapErr();
      expect(error).toMatchObject({ kind: "TruncatedData", path: "deploymentConfig.tokenConfig.context" });
    });

    it("fails on empty input", () => {
      expect(decodeDeployment("", ctx)._unsafeUnwrapErr()).toMatchObject({ kind: "TruncatedData", needed: 4 });
    });
  });

  describe("legacy payloads", () => {
    const expected = {
      schema: "positional",
      token: {
        name: "Doge",
        symbol: "DOGE",
        imageUrl: "https://img/m",
        originatingChainId: null,
        metadata: { kind: "raw", raw: "", failed: true },
        context: { kind: "parsed", value: { id: 1 } },
        contextId: "1",
      },
      rewards: { creatorRewardRecipient: LEGACY_RECIPIENT },
      sender: null,
    };

    it("decodes hex-encoded JSON text", () => {
      expect(decodeDeployment(hexOfText(legacyPayload()), ctx)._unsafeUnwrap()).toMatchObject(expected);
    });

    it("decodes JSON text handed over directly", () => {
      expect(decodeDeployment(legacyPayload(), ctx)._unsafeUnwrap()).toMatchObject(expected);
    });

    it("reports malformed JSON inside hex at the json stage", () => {
      const raw =
        "0x7b22706172616d73223a5b5b22222c22222c22222c2268747470733a2f2f696d672f6d222c227b5c226964655c223a315d227d5d7d";
      expect(decodeDeployment(raw, ctx)._unsafeUnwrapErr()).toMatchObject({ kind: "MalformedJson", stage: "json" });
    });

    it("reports a missing required field", () => {
      const raw = legacyPayload(["Doge", null, "0x00", "https://img/m", "{}", "{}"]);
      expect(decodeDeployment(raw, ctx)._unsafeUnwrapErr()).toEqual({
        kind: "MissingFields",
        stage: "normalize",
        fields: ["symbol"],
      });
    });

    it("rejects other functions", () => {
      const raw = JSON.stringify({ method: "transfer", params: [[["a", "b", "", "", "{}", "{}"], [], [], [], ["0", LEGACY_RECIPIENT]]] });
      expect(decodeDeployment(raw, ctx)._unsafeUnwrapErr()).toEqual({
        kind: "UnsupportedFunction",
        stage: "normalize",
        name: "transfer",
      });
    });

    it("reports shape errors at the legacy stage", () => {
      expect(decodeDeployment('{"params":{}}', ctx)._unsafeUnwrapErr()).toMatchObject({
        kind: "ShapeMismatch",
        stage: "legacy",
        path: "params",
      });
    });
  });

  it("reports non-hex input at the hex stage", () => {
    expect(decodeDeployment("not call data", ctx)._unsafeUnwrapErr()).toMatchObject({
      kind: "MalformedHex",
      stage: "hex",
    });
  });

  it("describes every failure in one line", () => {
    const error = decodeDeployment(legacyPayload(["Doge"]), ctx)._unsafeUnwrapErr();
    expect(describeError(error)).toBe("Deployment is missing required fields: symbol, metadata, context");
  });
});
