import { describe, it, expect } from "vitest";
import { stripVTControlCharacters } from "node:util";
import { decoderContextOf } from "../../src/context.js";
import { decodeDeployment } from "../../src/decoder.js";
import { AddressBook } from "../../src/labels.js";
import { deploymentToJson, renderDeployment } from "../../src/outputs/printer.js";
import { deployFn, encodeDeployment, legacyPayload } from "../support/deployment.js";

const SENDER = "0x1111111111111111111111111111111111111111";
const ctx = decoderContextOf(deployFn, AddressBook.fromRecord({ [SENDER]: "Test deployer" }));

describe("deploymentToJson", () => {
  it("serializes bigints as decimal strings", () => {
    const record = decodeDeployment(encodeDeployment(), ctx)._unsafeUnwrap();
    const json = JSON.parse(deploymentToJson(record));
    expect(json.token.originatingChainId).toBe("8453");
    expect(json.token.context).toEqual({ kind: "parsed", value: { id: "xyz" } });
    expect(json.sender).toBeNull();
  });
});

describe("renderDeployment", () => {
  const record = decodeDeployment(legacyPayload(), ctx, { sender: SENDER })._unsafeUnwrap();
  const output = stripVTControlCharacters(renderDeployment(record, 100));

  it("titles the box", () => {
    expect(output).toContain("Token Deployment");
  });

  it("lists the token fields", () => {
    expect(output).toContain("Name:           Doge");
    expect(output).toContain("Image:          https://img/m");
    expect(output).toContain("Chain ID:       (none)");
    expect(output).toContain("Context ID:     1");
  });

  it("shows the sender with its label", () => {
    expect(output).toContain(`Sender:         ${SENDER} (Test deployer)`);
  });

  it("flags metadata that is not JSON", () => {
    expect(output).toContain('Metadata:       "" (not JSON: ');
  });
});
