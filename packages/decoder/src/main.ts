import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { parseDeploymentInput } from "./cli/deployment-input.js";
import { loadConfig } from "./config.js";
import { createDecoderContext } from "./context.js";
import { decodeDeployment } from "./decoder.js";
import { describeError } from "./errors.js";
import { ExplorerClient } from "./explorer.js";
import { logger } from "./logger.js";
import { deploymentToJson, prettyPrint } from "./outputs/printer.js";

type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";
type CliArgs = { input: string; config?: string; sender?: string; json: boolean; logLevel: LogLevel };

/** Call data plus the sender to attach, fetched from the explorer for address input */
async function resolveInput(
  raw: string,
  explicitSender: string | undefined,
  explorer: ExplorerClient
): Promise<{ calldata: string; sender?: string }> {
  const input = await parseDeploymentInput(raw);
  if (input.kind === "calldata") {
    return { calldata: input.calldata, sender: explicitSender };
  }

  const txHash = await explorer.getCreationTxHash(input.address);
  if (!txHash) {
    throw new Error(`No creation transaction found for ${input.address}`);
  }
  const tx = await explorer.getTransaction(txHash);
  if (!tx) {
    throw new Error(`Creation transaction ${txHash} could not be fetched`);
  }
  logger.info({ address: input.address, txHash, from: tx.from }, "Fetched creation transaction");
  return { calldata: tx.input, sender: explicitSender ?? tx.from };
}

async function main() {
  await yargs(hideBin(process.argv))
    .command<CliArgs>(
      "$0 <input>",
      "Decode the parameters of a token deployment",
      (yargs) => {
        return yargs
          .positional("input", {
            describe: "Token contract address, raw call data (hex or JSON), or a file holding call data",
            type: "string",
            demandOption: true,
          })
          .option("config", {
            alias: "c",
            describe: "Path to the config file",
            type: "string",
          })
          .option("sender", {
            alias: "s",
            describe: "Transaction sender to label (defaults to the creator for address input)",
            type: "string",
          })
          .option("json", {
            describe: "Print the record as JSON",
            type: "boolean",
            default: false,
          })
          .option("log-level", {
            alias: "l",
            describe: "The level of logging to display",
            type: "string",
            choices: ["trace", "debug", "info", "warn", "error", "fatal"],
            default: "warn",
          });
      },
      async (argv) => {
        logger.level = argv.logLevel;
        try {
          const config = loadConfig(argv.config);
          const ctx = createDecoderContext(config);
          const explorer = new ExplorerClient(config.explorer);
          const { calldata, sender } = await resolveInput(argv.input, argv.sender, explorer);

          const result = decodeDeployment(calldata, ctx, { sender });
          if (result.isErr()) {
            logger.error({ stage: result.error.stage, kind: result.error.kind }, describeError(result.error));
            process.exitCode = 1;
            return;
          }

          if (argv.json) {
            console.log(deploymentToJson(result.value));
          } else {
            prettyPrint(result.value);
          }
        } catch (err: unknown) {
          logger.error(err, "An error occurred while decoding the deployment");
          process.exitCode = 1;
        }
      }
    )
    .strict()
    .help()
    .alias("h", "help")
    .fail((msg, err, yargs) => {
      if (err) throw err; // preserve stack
      logger.error(`Error: ${msg}\n`);
      yargs.showHelp();
      process.exit(1);
    }).argv;
}

main().catch((error) => {
  logger.fatal(error, "An unexpected error occurred");
  process.exit(1);
});
