import { describe, it, expect, vi } from "vitest";
import { FetchFn } from "../../src/rpc/http.js";
import { MoralisClient } from "../../src/rpc/moralisClient.js";
import { jsonResponse } from "../helpers/fakes.js";

const BASE_URL = "https://deep-index.moralis.io/api/v2.2";
const TOKEN = "0x00000000000000000000000000000000000000c1";

describe("MoralisClient", () => {
  it("lists the top ten holders with the API key header", async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse({
        cursor: null,
        result: [
          { owner_address: "0x000000000000000000000000000000000000dead", percentage_relative_to_total_supply: 61.2 },
          { owner_address: "0x00000000000000000000000000000000000000d1" }
        ]
      })
    );
    const client = new MoralisClient(BASE_URL, "test-key", fetchFn);

    const holders = await client.resolveTopHolders(TOKEN);

    expect(holders).toEqual(["0x000000000000000000000000000000000000dead", "0x00000000000000000000000000000000000000d1"]);
    expect(fetchFn).toHaveBeenCalledWith(`${BASE_URL}/erc20/${TOKEN}/owners?chain=eth&order=DESC&limit=10`, {
      headers: { accept: "application/json", "X-API-Key": "test-key" }
    });
  });

  it("reports an unauthorized key as an upstream failure", async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({ message: "Invalid key" }, 401));
    const client = new MoralisClient(BASE_URL, "test-key", fetchFn);

    await expect(client.resolveTopHolders(TOKEN)).rejects.toThrow("moralis owners: HTTP 401");
  });
});
