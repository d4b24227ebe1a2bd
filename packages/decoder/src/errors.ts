/** Where in the pipeline a failure was detected */
export type DecodeStage = "hex" | "json" | "abi" | "legacy" | "normalize";

export type TruncatedData = {
  kind: "TruncatedData";
  stage: "abi";
  /** Parameter being read, e.g. "deploymentConfig.tokenConfig.context" */
  path: string;
  offset: number;
  needed: number;
  available: number;
};

export type InvalidOffset = {
  kind: "InvalidOffset";
  stage: "abi";
  path: string;
  /** Decimal string: offsets are 256-bit words and may not fit a number */
  offset: string;
  bufferLength: number;
};

export type SelectorMismatch = {
  kind: "SelectorMismatch";
  stage: "abi";
  expected: string;
  actual: string;
};

export type MalformedHex = {
  kind: "MalformedHex";
  stage: "hex";
  reason: string;
};

export type MalformedJson = {
  kind: "MalformedJson";
  stage: "json";
  reason: string;
};

export type ShapeMismatch = {
  kind: "ShapeMismatch";
  stage: "legacy";
  /** JSON path of the offending slot, e.g. "params[0][0][4]" */
  path: string;
  expected: string;
};

export type DecodeError =
  | TruncatedData
  | InvalidOffset
  | SelectorMismatch
  | MalformedHex
  | MalformedJson
  | ShapeMismatch;

export type UnsupportedFunction = {
  kind: "UnsupportedFunction";
  stage: "normalize";
  name: string;
};

export type MissingFields = {
  kind: "MissingFields";
  stage: "normalize";
  fields: string[];
};

export type NormalizeError = UnsupportedFunction | MissingFields;

export type DeploymentError = DecodeError | NormalizeError;

export function truncatedData(path: string, offset: number, needed: number, available: number): TruncatedData {
  return { kind: "TruncatedData", stage: "abi", path, offset, needed, available };
}

export function invalidOffset(path: string, offset: bigint, bufferLength: number): InvalidOffset {
  return { kind: "InvalidOffset", stage: "abi", path, offset: offset.toString(), bufferLength };
}

export function selectorMismatch(expected: string, actual: string): SelectorMismatch {
  return { kind: "SelectorMismatch", stage: "abi", expected, actual };
}

export function malformedHex(reason: string): MalformedHex {
  return { kind: "MalformedHex", stage: "hex", reason };
}

export function malformedJson(reason: string): MalformedJson {
  return { kind: "MalformedJson", stage: "json", reason };
}

export function shapeMismatch(path: string, expected: string): ShapeMismatch {
  return { kind: "ShapeMismatch", stage: "legacy", path, expected };
}

export function unsupportedFunction(name: string): UnsupportedFunction {
  return { kind: "UnsupportedFunction", stage: "normalize", name };
}

export function missingFields(fields: string[]): MissingFields {
  return { kind: "MissingFields", stage: "normalize", fields };
}

/** One-line description naming the failing stage and field, for logs and replies */
export function describeError(error: DeploymentError): string {
  switch (error.kind) {
    case "TruncatedData":
      return `Call data truncated while reading ${error.path || "selector"}: needed ${error.needed} bytes at offset ${error.offset}, ${error.available} available`;
    case "InvalidOffset":
      return `Dynamic offset ${error.offset} for ${error.path} points outside the ${error.bufferLength}-byte argument buffer`;
    case "SelectorMismatch":
      return `Function selector ${error.actual} does not match expected ${error.expected}`;
    case "MalformedHex":
      return `Input is not valid hex: ${error.reason}`;
    case "MalformedJson":
      return `Input text is not valid JSON: ${error.reason}`;
    case "ShapeMismatch":
      return `Legacy payload slot ${error.path} is not ${error.expected}`;
    case "UnsupportedFunction":
      return `Unsupported function "${error.name}"; only deployToken calls can be decoded`;
    case "MissingFields":
      return `Deployment is missing required fields: ${error.fields.join(", ")}`;
  }
}
