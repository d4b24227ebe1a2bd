import boxen from "boxen";
import chalk from "chalk";
import wrapAnsi from "wrap-ansi";
import type { DeploymentRecord, ParsedOrRaw } from "../types.js";
import { serializeBigInts } from "../utils.js";

/* ----------------------------- width helpers ----------------------------- */

function termWidth(): number {
  // clamp to something readable; many CI envs report very large/small widths
  const w = process.stdout && process.stdout.columns ? process.stdout.columns : 120;
  return Math.max(80, w);
}

function wrapLines(lines: string[], width: number): string[] {
  return lines.flatMap((l) => wrapAnsi(l, width, { hard: true, trim: false }).split("\n"));
}

/* ------------------------------- formatting ------------------------------ */

const SCHEMA_NOTES: Record<DeploymentRecord["schema"], string> = {
  named: "ABI call data",
  positional: "legacy JSON payload",
};

function field(label: string, value: string): string {
  return `${chalk.cyan(`${label}:`.padEnd(16))}${value}`;
}

function orNone(value: string | null): string {
  return value === null ? chalk.gray("(none)") : chalk.white(value);
}

function embeddedJsonLines(label: string, value: ParsedOrRaw): string[] {
  if (value.kind === "parsed") {
    const rendered = JSON.stringify(value.value, null, 2).split("\n");
    if (rendered.length === 1) return [field(label, chalk.white(rendered[0]))];
    return [`${chalk.cyan(`${label}:`)}`, ...rendered.map((l) => `  ${chalk.white(l)}`)];
  }
  const raw = value.raw === "" ? chalk.gray('""') : chalk.white(value.raw);
  return [field(label, `${raw} ${chalk.red(`(not JSON: ${value.reason})`)}`)];
}

export function renderDeployment(record: DeploymentRecord, width = termWidth()): string {
  const { token, rewards, sender } = record;
  const lines = [
    field("Schema", `${record.schema} ${chalk.gray(`(${SCHEMA_NOTES[record.schema]})`)}`),
    field("Name", chalk.bold(token.name)),
    field("Symbol", chalk.bold(token.symbol)),
    field("Image", orNone(token.imageUrl)),
    field("Chain ID", orNone(token.originatingChainId === null ? null : token.originatingChainId.toString())),
    field("Context ID", orNone(token.contextId)),
    field("Reward to", chalk.white(rewards.creatorRewardRecipient)),
  ];

  if (sender) {
    const label = sender.label ? ` ${chalk.gray(`(${sender.label})`)}` : "";
    lines.push(field("Sender", `${chalk.white(sender.address)}${label}`));
  }

  lines.push(...embeddedJsonLines("Metadata", token.metadata));
  lines.push(...embeddedJsonLines("Context", token.context));

  // boxen width includes borders and padding
  return boxen(wrapLines(lines, width - 8).join("\n"), {
    title: chalk.green.bold("Token Deployment"),
    padding: 1,
    margin: 0,
    borderStyle: "round",
    borderColor: "green",
    width,
  });
}

/** Machine-readable form; bigints become decimal strings */
export function deploymentToJson(record: DeploymentRecord): string {
  return JSON.stringify(serializeBigInts(record), null, 2);
}

export function prettyPrint(record: DeploymentRecord) {
  console.log(renderDeployment(record));
}
