import { z } from "zod";
import { ErcTokenBalance } from "../core/types.js";
import { ComputeBudget, MeteredMethod } from "./computeBudget.js";
import { UpstreamError } from "./errors.js";
import { FetchFn, RequestTarget, parsePayload, requestJson } from "./http.js";

const hexQuantity = z.string().regex(/^0x[0-9a-fA-F]*$/);

const RpcEnvelopeSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.number(),
  result: z.unknown().optional(),
  error: z.object({ code: z.number(), message: z.string() }).optional()
});

const TokenBalancesSchema = z.object({
  address: z.string(),
  tokenBalances: z.array(
    z.object({
      contractAddress: z.string(),
      tokenBalance: hexQuantity.nullable()
    })
  )
});

export class AlchemyClient {
  private readonly rpcUrl: string;
  private readonly budget: ComputeBudget;
  private readonly fetchFn: FetchFn;
  private nextId = 1;

  constructor(baseUrl: string, apiKey: string, budget: ComputeBudget, fetchFn: FetchFn = fetch) {
    this.rpcUrl = `${baseUrl}/${apiKey}`;
    this.budget = budget;
    this.fetchFn = fetchFn;
  }

  async getGasPriceWei(): Promise<bigint> {
    return BigInt(await this.request("eth_gasPrice", [], hexQuantity));
  }

  async getBalanceWei(address: string): Promise<bigint> {
    return BigInt(await this.request("eth_getBalance", [address, "latest"], hexQuantity));
  }

  async getTokenBalances(address: string): Promise<ErcTokenBalance[]> {
    const result = await this.request("alchemy_getTokenBalances", [address, "erc20"], TokenBalancesSchema);
    return result.tokenBalances.map((balance) => ({
      contractAddress: balance.contractAddress,
      rawBalance: BigInt(balance.tokenBalance || "0x0").toString()
    }));
  }

  async request<T extends z.ZodTypeAny>(method: MeteredMethod, params: unknown[], schema: T): Promise<z.infer<T>> {
    const target: RequestTarget = { provider: "alchemy", operation: method };
    if (this.budget.isExhausted()) {
      throw new UpstreamError("alchemy", method, "monthly compute budget exhausted");
    }
    const payload = {
      jsonrpc: "2.0",
      id: this.nextId++,
      method,
      params
    };
    this.budget.charge(method);
    const body = await requestJson(this.fetchFn, target, RpcEnvelopeSchema, this.rpcUrl, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(payload)
    });
    if (body.error) {
      throw new UpstreamError("alchemy", method, body.error.message || "RPC returned error");
    }
    return parsePayload(target, schema, body.result);
  }
}
