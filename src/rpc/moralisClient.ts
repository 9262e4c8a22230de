import { z } from "zod";
import { FetchFn, RequestTarget, requestJson } from "./http.js";

const TOP_HOLDER_LIMIT = 10;

const OwnersSchema = z.object({
  result: z.array(
    z.object({
      owner_address: z.string(),
      percentage_relative_to_total_supply: z.number().nullish()
    })
  )
});

export class MoralisClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly fetchFn: FetchFn;

  constructor(baseUrl: string, apiKey: string, fetchFn: FetchFn = fetch) {
    this.baseUrl = baseUrl;
    this.apiKey = apiKey;
    this.fetchFn = fetchFn;
  }

  async resolveTopHolders(contractAddress: string): Promise<string[]> {
    const target: RequestTarget = { provider: "moralis", operation: "owners" };
    const query = new URLSearchParams({ chain: "eth", order: "DESC", limit: String(TOP_HOLDER_LIMIT) });
    const body = await requestJson(
      this.fetchFn,
      target,
      OwnersSchema,
      `${this.baseUrl}/erc20/${contractAddress}/owners?${query.toString()}`,
      { headers: { accept: "application/json", "X-API-Key": this.apiKey } }
    );
    return body.result.map((owner) => owner.owner_address);
  }
}
