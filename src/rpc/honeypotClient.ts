import { z } from "zod";
import { TokenMeta } from "../core/types.js";
import { FetchFn, RequestTarget, requestJson } from "./http.js";

const IsHoneypotSchema = z.object({
  token: z.object({
    name: z.string(),
    symbol: z.string(),
    decimals: z.number().int().nonnegative(),
    address: z.string()
  }),
  honeypotResult: z
    .object({
      isHoneypot: z.boolean(),
      honeypotReason: z.string().nullish()
    })
    .nullish(),
  simulationResult: z
    .object({
      buyTax: z.number(),
      sellTax: z.number()
    })
    .nullish(),
  pair: z
    .object({
      liquidity: z.number()
    })
    .nullish()
});

// When the simulation could not run the token cannot be sold; treat it as fully taxed.
const UNSIMULATED_TAX = 100;

export class HoneypotClient {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;

  constructor(baseUrl: string, fetchFn: FetchFn = fetch) {
    this.baseUrl = baseUrl;
    this.fetchFn = fetchFn;
  }

  /** Accepts either a token or a pair address; the token is resolved from the pair. */
  async resolveTokenMeta(address: string): Promise<TokenMeta> {
    const target: RequestTarget = { provider: "honeypot", operation: "IsHoneypot" };
    const url = `${this.baseUrl}/IsHoneypot?${new URLSearchParams({ address }).toString()}`;
    const body = await requestJson(this.fetchFn, target, IsHoneypotSchema, url);

    const honeypot = body.honeypotResult ?? {
      isHoneypot: true,
      honeypotReason: "honeypot result missing from response"
    };
    return {
      contractAddress: body.token.address,
      name: body.token.name,
      symbol: body.token.symbol,
      decimals: body.token.decimals,
      isHoneypot: honeypot.isHoneypot,
      honeypotReason: honeypot.isHoneypot ? honeypot.honeypotReason ?? undefined : undefined,
      buyTax: body.simulationResult?.buyTax ?? UNSIMULATED_TAX,
      sellTax: body.simulationResult?.sellTax ?? UNSIMULATED_TAX,
      liquidityUsd: body.pair?.liquidity ?? 0
    };
  }
}
