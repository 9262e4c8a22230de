import { describe, it, expect, beforeEach, vi, type Mock } from "vitest";
import { UpstreamError } from "../../src/rpc/errors.js";
import { EtherscanClient } from "../../src/rpc/etherscanClient.js";
import { FetchFn } from "../../src/rpc/http.js";
import { jsonResponse } from "../helpers/fakes.js";

const BASE_URL = "https://api.etherscan.io/api";
const WALLET = "0x00000000000000000000000000000000000000aa";

const transfer = {
  blockNumber: "19000000",
  timeStamp: "1700000100",
  hash: "0xfeed",
  from: WALLET,
  to: "0x00000000000000000000000000000000000000bb",
  contractAddress: "0x00000000000000000000000000000000000000cc",
  tokenName: "Test Token",
  tokenSymbol: "TST",
  value: "1000"
};

const requestedUrl = (fetchFn: Mock<FetchFn>): URL => new URL(String(fetchFn.mock.calls[0][0]));

describe("EtherscanClient", () => {
  let fetchFn: Mock<FetchFn>;
  let client: EtherscanClient;

  beforeEach(() => {
    fetchFn = vi.fn<FetchFn>();
    client = new EtherscanClient(BASE_URL, "test-key", fetchFn);
  });

  it("fetches the latest 25 token transfers newest first", async () => {
    fetchFn.mockResolvedValue(jsonResponse({ status: "1", message: "OK", result: [transfer] }));

    const records = await client.fetchRecentTransfers(WALLET);

    expect(String(fetchFn.mock.calls[0][0])).toBe(
      `${BASE_URL}?module=account&action=tokentx&address=${WALLET}&page=1&offset=25&sort=desc&apikey=test-key`
    );
    expect(records).toEqual([
      {
        hash: "0xfeed",
        timestamp: 1700000100,
        blockNumber: 19000000,
        from: WALLET,
        to: "0x00000000000000000000000000000000000000bb",
        contractAddress: "0x00000000000000000000000000000000000000cc",
        tokenName: "Test Token",
        tokenSymbol: "TST",
        functionName: undefined,
        type: undefined
      }
    ]);
  });

  it("asks for the requested number of internal transactions", async () => {
    fetchFn.mockResolvedValue(jsonResponse({ status: "1", message: "OK", result: [] }));

    await client.fetchRecentInternalTxs(WALLET, 10);

    const url = requestedUrl(fetchFn);
    expect(url.searchParams.get("action")).toBe("txlistinternal");
    expect(url.searchParams.get("offset")).toBe("10");
  });

  it("treats an empty history as no records", async () => {
    fetchFn.mockResolvedValue(jsonResponse({ status: "0", message: "No transactions found", result: [] }));

    expect(await client.fetchNormalTxs(WALLET)).toEqual([]);
    expect(requestedUrl(fetchFn).searchParams.get("action")).toBe("txlist");
  });

  it("surfaces an error envelope with its result text", async () => {
    fetchFn.mockResolvedValue(jsonResponse({ status: "0", message: "NOTOK", result: "Max rate limit reached" }));

    await expect(client.fetchRecentTransfers(WALLET)).rejects.toThrow("etherscan tokentx: Max rate limit reached");
  });

  it("rejects a non-2xx response with its status", async () => {
    fetchFn.mockResolvedValue(jsonResponse({}, 503));

    const error = await client.getEthPriceUsd().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamError);
    if (error instanceof UpstreamError) {
      expect(error.message).toBe("etherscan ethprice: HTTP 503");
      expect(error.status).toBe(503);
    }
  });

  it("rejects rows missing required fields", async () => {
    fetchFn.mockResolvedValue(jsonResponse({ status: "1", message: "OK", result: [{ ...transfer, hash: undefined }] }));

    await expect(client.fetchRecentTransfers(WALLET)).rejects.toThrow(
      "etherscan tokentx: unexpected payload (0.hash: Required)"
    );
  });

  it("wraps transport failures", async () => {
    fetchFn.mockRejectedValue(new TypeError("fetch failed"));

    await expect(client.fetchRecentTransfers(WALLET)).rejects.toThrow("etherscan tokentx: request failed");
  });

  it("resolves creators for a batch of contracts in one call", async () => {
    fetchFn.mockResolvedValue(
      jsonResponse({
        status: "1",
        message: "OK",
        result: [
          { contractAddress: "0xc1", contractCreator: "0xd1", txHash: "0xt1" },
          { contractAddress: "0xc2", contractCreator: "0xd2", txHash: "0xt2" }
        ]
      })
    );

    const creations = await client.resolveCreatorAndTxHash(["0xc1", "0xc2"]);

    const url = requestedUrl(fetchFn);
    expect(url.searchParams.get("module")).toBe("contract");
    expect(url.searchParams.get("contractaddresses")).toBe("0xc1,0xc2");
    expect(creations).toEqual([
      { address: "0xc1", creator: "0xd1", txHash: "0xt1" },
      { address: "0xc2", creator: "0xd2", txHash: "0xt2" }
    ]);
  });

  it("refuses creator batches above five addresses without calling out", async () => {
    await expect(client.resolveCreatorAndTxHash(["1", "2", "3", "4", "5", "6"])).rejects.toThrow(
      "at most 5 addresses per call, got 6"
    );
    expect(await client.resolveCreatorAndTxHash([])).toEqual([]);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("reads the ETH price in USD", async () => {
    fetchFn.mockResolvedValue(
      jsonResponse({ status: "1", message: "OK", result: { ethbtc: "0.05", ethusd: "2500.50", ethusd_timestamp: "1" } })
    );

    expect(await client.getEthPriceUsd()).toBe(2500.5);
    expect(requestedUrl(fetchFn).searchParams.get("module")).toBe("stats");
  });
});
