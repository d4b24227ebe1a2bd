import axios from "axios";
import type { ExplorerConfig } from "./config.js";
import { logger } from "./logger.js";
import { isRecord, normalizeAddress, sleep } from "./utils.js";

const MAX_ATTEMPTS = 3;
const TX_HASH = /^0x[0-9a-fA-F]{64}$/;

/** The slice of axios the client needs; swapped for a stub in tests */
export type HttpGet = (
  url: string,
  config: { params: Record<string, string>; timeout: number }
) => Promise<{ data: unknown }>;

export type ExplorerClientOptions = {
  http?: HttpGet;
  /** Base back-off between attempts; multiplied by the attempt number */
  retryDelayMs?: number;
};

export type ExplorerTransaction = {
  hash: string;
  from: string;
  input: string;
};

function isRateLimited(data: unknown): boolean {
  return isRecord(data) && typeof data.result === "string" && /rate limit/i.test(data.result);
}

/**
 * Etherscan V2-style explorer API (one endpoint, chain picked by `chainid`).
 */
export class ExplorerClient {
  private readonly http: HttpGet;
  private readonly retryDelayMs: number;

  constructor(private readonly config: ExplorerConfig, options: ExplorerClientOptions = {}) {
    this.http = options.http ?? ((url, requestConfig) => axios.get(url, requestConfig));
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  /**
   * Response body of one API call. Returns null once every attempt was
   * rate-limited; throws when the last attempt failed in transport.
   */
  private async request(action: string, params: Record<string, string>): Promise<unknown> {
    const query: Record<string, string> = {
      chainid: String(this.config.chainId),
      ...params,
    };
    if (this.config.apiKey) query.apikey = this.config.apiKey;

    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      let data: unknown;
      try {
        logger.trace({ action, attempt }, "Calling explorer API");
        const resp = await this.http(this.config.apiBaseUrl, { params: query, timeout: this.config.timeoutMs });
        data = resp.data;
      } catch (err: unknown) {
        if (attempt < MAX_ATTEMPTS - 1) {
          logger.debug({ action, attempt, err }, "Explorer request failed, retrying");
          await sleep(this.retryDelayMs * (attempt + 1));
          continue;
        }
        throw new Error(`Failed to ${action}: ${err instanceof Error ? err.message : String(err)}`);
      }

      if (isRateLimited(data)) {
        logger.warn("Explorer rate limit hit, retrying...");
        await sleep(this.retryDelayMs * (attempt + 1));
        continue;
      }
      return data;
    }

    logger.warn({ action }, "Explorer rate limit persisted, giving up");
    return null;
  }

  /** Hash of the transaction that created `address`, or null when unknown */
  async getCreationTxHash(address: string): Promise<string | null> {
    const contract = normalizeAddress(address);
    if (!contract) {
      throw new Error(`Invalid contract address "${address}"`);
    }

    const data = await this.request(`fetch creation transaction of ${contract}`, {
      module: "contract",
      action: "getcontractcreation",
      contractaddresses: contract,
    });
    if (!isRecord(data) || data.status !== "1" || !Array.isArray(data.result)) {
      logger.debug({ contract, message: isRecord(data) ? data.message : undefined }, "No creation record");
      return null;
    }

    const entry: unknown = data.result[0];
    if (!isRecord(entry) || typeof entry.txHash !== "string" || !TX_HASH.test(entry.txHash)) {
      return null;
    }
    return entry.txHash;
  }

  async getTransaction(txHash: string): Promise<ExplorerTransaction | null> {
    if (!TX_HASH.test(txHash)) {
      throw new Error(`Invalid transaction hash "${txHash}"`);
    }

    const data = await this.request(`fetch transaction ${txHash}`, {
      module: "proxy",
      action: "eth_getTransactionByHash",
      txhash: txHash,
    });
    if (!isRecord(data) || !isRecord(data.result)) {
      logger.debug({ txHash }, "Transaction not found");
      return null;
    }

    const { hash, from, input } = data.result;
    if (typeof hash !== "string" || typeof from !== "string" || typeof input !== "string") {
      return null;
    }
    return { hash, from: normalizeAddress(from) ?? from, input };
  }
}
