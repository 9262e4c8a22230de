import { z } from "zod";
import { ActivityRecord, ContractCreation } from "../core/types.js";
import { UpstreamError } from "./errors.js";
import { FetchFn, RequestTarget, parsePayload, requestJson } from "./http.js";

const TRANSFER_PAGE_SIZE = 25;
const NORMAL_TX_PAGE_SIZE = 100;
// getcontractcreation accepts at most five addresses per call
export const MAX_CREATION_BATCH = 5;

const NO_RESULTS = /^No (transactions|records) found$/i;

const EnvelopeSchema = z.object({
  status: z.string(),
  message: z.string(),
  result: z.unknown()
});

const numeric = z.string().regex(/^\d+$/);

const TxSchema = z.object({
  blockNumber: numeric,
  timeStamp: numeric,
  hash: z.string(),
  from: z.string(),
  to: z.string().default(""),
  contractAddress: z.string().default(""),
  tokenName: z.string().optional(),
  tokenSymbol: z.string().optional(),
  functionName: z.string().optional(),
  type: z.string().optional()
});

const CreationSchema = z.object({
  contractAddress: z.string(),
  contractCreator: z.string(),
  txHash: z.string()
});

const EthPriceSchema = z.object({
  ethusd: z.string().regex(/^\d+(\.\d+)?$/)
});

const toRecord = (tx: z.infer<typeof TxSchema>): ActivityRecord => ({
  hash: tx.hash,
  timestamp: Number(tx.timeStamp),
  blockNumber: Number(tx.blockNumber),
  from: tx.from,
  to: tx.to,
  contractAddress: tx.contractAddress,
  tokenName: tx.tokenName,
  tokenSymbol: tx.tokenSymbol,
  functionName: tx.functionName,
  type: tx.type
});

export class EtherscanClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly fetchFn: FetchFn;

  constructor(baseUrl: string, apiKey: string, fetchFn: FetchFn = fetch) {
    this.baseUrl = baseUrl;
    this.apiKey = apiKey;
    this.fetchFn = fetchFn;
  }

  /** Latest ERC-20 transfers touching `address`, newest first. */
  async fetchRecentTransfers(address: string): Promise<ActivityRecord[]> {
    const txs = await this.list("tokentx", { address, page: "1", offset: String(TRANSFER_PAGE_SIZE), sort: "desc" });
    return txs.map(toRecord);
  }

  async fetchRecentInternalTxs(address: string, count: number): Promise<ActivityRecord[]> {
    const txs = await this.list("txlistinternal", { address, page: "1", offset: String(count), sort: "desc" });
    return txs.map(toRecord);
  }

  async fetchNormalTxs(address: string): Promise<ActivityRecord[]> {
    const txs = await this.list("txlist", {
      address,
      startblock: "0",
      endblock: "99999999",
      page: "1",
      offset: String(NORMAL_TX_PAGE_SIZE),
      sort: "desc"
    });
    return txs.map(toRecord);
  }

  async resolveCreatorAndTxHash(addresses: string[]): Promise<ContractCreation[]> {
    if (addresses.length === 0) {
      return [];
    }
    if (addresses.length > MAX_CREATION_BATCH) {
      throw new UpstreamError(
        "etherscan",
        "getcontractcreation",
        `at most ${MAX_CREATION_BATCH} addresses per call, got ${addresses.length}`
      );
    }
    const target: RequestTarget = { provider: "etherscan", operation: "getcontractcreation" };
    const result = await this.call("contract", "getcontractcreation", { contractaddresses: addresses.join(",") });
    return parsePayload(target, z.array(CreationSchema), result).map((row) => ({
      address: row.contractAddress,
      creator: row.contractCreator,
      txHash: row.txHash
    }));
  }

  async getEthPriceUsd(): Promise<number> {
    const target: RequestTarget = { provider: "etherscan", operation: "ethprice" };
    const result = await this.call("stats", "ethprice", {});
    return Number(parsePayload(target, EthPriceSchema, result).ethusd);
  }

  private async list(action: string, params: Record<string, string>): Promise<z.infer<typeof TxSchema>[]> {
    const target: RequestTarget = { provider: "etherscan", operation: action };
    const result = await this.call("account", action, params);
    return parsePayload(target, z.array(TxSchema), result);
  }

  private async call(module: string, action: string, params: Record<string, string>): Promise<unknown> {
    const target: RequestTarget = { provider: "etherscan", operation: action };
    const query = new URLSearchParams({ module, action, ...params, apikey: this.apiKey });
    const envelope = await requestJson(this.fetchFn, target, EnvelopeSchema, `${this.baseUrl}?${query.toString()}`);
    if (envelope.status === "1") {
      return envelope.result;
    }
    if (NO_RESULTS.test(envelope.message)) {
      return [];
    }
    const detail = typeof envelope.result === "string" ? envelope.result : envelope.message;
    throw new UpstreamError("etherscan", action, detail);
  }
}
