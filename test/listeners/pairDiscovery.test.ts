import { describe, it, expect, beforeEach, vi, type Mock } from "vitest";
import { ActivityRecord, ContractCreation, TokenMeta } from "../../src/core/types.js";
import { PairDiscovery, chunk, isPairCreation } from "../../src/listeners/pairDiscovery.js";
import { UpstreamError } from "../../src/rpc/errors.js";
import { record, silentLogger } from "../helpers/fakes.js";

const FACTORY = "0x5C69bEe701ef814a2B6a3EDD4B1652CB9cc5aA6f";

const PAIR_A = "0x00000000000000000000000000000000000000a1";
const PAIR_B = "0x00000000000000000000000000000000000000a2";
const PAIR_C = "0x00000000000000000000000000000000000000a3";
const TOKEN_A = "0x00000000000000000000000000000000000000b1";
const TOKEN_B = "0x00000000000000000000000000000000000000b2";

const TOKENS = new Map([
  [PAIR_A, TOKEN_A],
  [PAIR_B, TOKEN_B]
]);

const pairCreated = (timestamp: number, pair: string): ActivityRecord =>
  record(timestamp, { type: "create", contractAddress: pair, from: FACTORY, to: "" });

const metaFor = (pair: string): TokenMeta => ({
  contractAddress: TOKENS.get(pair) ?? "",
  name: "Test Token",
  symbol: "TST",
  decimals: 18,
  isHoneypot: false,
  buyTax: 0,
  sellTax: 0,
  liquidityUsd: 5_000
});

const creationOf = (address: string): ContractCreation => ({
  address,
  creator: `creator-of-${address}`,
  txHash: `0xdeploy-${address}`
});

describe("isPairCreation", () => {
  it("accepts create and create2 traces with an address", () => {
    expect(isPairCreation(pairCreated(1, PAIR_A))).toBe(true);
    expect(isPairCreation(record(1, { type: "create2", contractAddress: PAIR_A }))).toBe(true);
  });

  it("rejects calls and creations without an address", () => {
    expect(isPairCreation(record(1, { type: "call", contractAddress: PAIR_A }))).toBe(false);
    expect(isPairCreation(record(1, { type: "create", contractAddress: "" }))).toBe(false);
    expect(isPairCreation(record(1, { contractAddress: PAIR_A }))).toBe(false);
  });
});

describe("chunk", () => {
  it("splits into groups of at most the given size", () => {
    expect(chunk([1, 2, 3, 4, 5, 6, 7], 5)).toEqual([
      [1, 2, 3, 4, 5],
      [6, 7]
    ]);
    expect(chunk([], 5)).toEqual([]);
  });
});

describe("PairDiscovery", () => {
  let fetchRecentInternalTxs: Mock<(address: string, count: number) => Promise<ActivityRecord[]>>;
  let resolveTokenMeta: Mock<(address: string) => Promise<TokenMeta>>;
  let resolveCreatorAndTxHash: Mock<(addresses: string[]) => Promise<ContractCreation[]>>;

  const discovery = (creatorBatchSize = 5): PairDiscovery =>
    new PairDiscovery(
      { fetchRecentInternalTxs, resolveTokenMeta, resolveCreatorAndTxHash },
      { factoryAddress: FACTORY, internalTxCount: 25, creatorBatchSize },
      silentLogger
    );

  beforeEach(() => {
    fetchRecentInternalTxs = vi.fn<(address: string, count: number) => Promise<ActivityRecord[]>>();
    resolveTokenMeta = vi.fn<(address: string) => Promise<TokenMeta>>().mockImplementation(async (pair) => metaFor(pair));
    resolveCreatorAndTxHash = vi
      .fn<(addresses: string[]) => Promise<ContractCreation[]>>()
      .mockImplementation(async (addresses) => addresses.map(creationOf));
  });

  it("baselines on the newest pair without reporting history", async () => {
    fetchRecentInternalTxs.mockResolvedValue([pairCreated(300, PAIR_B), pairCreated(200, PAIR_A)]);
    const subject = discovery();

    expect(await subject.poll()).toEqual([]);
    expect(subject.getCursor()).toBe(300);
    expect(fetchRecentInternalTxs).toHaveBeenCalledWith(FACTORY, 25);
    expect(resolveTokenMeta).not.toHaveBeenCalled();
  });

  it("waits for the first pair before setting a baseline", async () => {
    fetchRecentInternalTxs.mockResolvedValueOnce([]).mockResolvedValueOnce([pairCreated(300, PAIR_A)]);
    const subject = discovery();

    await subject.poll();
    expect(subject.getCursor()).toBeUndefined();

    expect(await subject.poll()).toEqual([]);
    expect(subject.getCursor()).toBe(300);
  });

  it("reports pairs created after the baseline, oldest first", async () => {
    fetchRecentInternalTxs
      .mockResolvedValueOnce([pairCreated(300, PAIR_C)])
      .mockResolvedValueOnce([
        pairCreated(500, PAIR_B),
        record(450, { type: "call", contractAddress: "" }),
        pairCreated(400, PAIR_A),
        pairCreated(300, PAIR_C)
      ]);
    const subject = discovery();
    await subject.poll();

    const found = await subject.poll();

    expect(found.map((c) => c.pairAddress)).toEqual([PAIR_A, PAIR_B]);
    expect(subject.getCursor()).toBe(500);
    expect(found[0]).toEqual({
      pairAddress: PAIR_A,
      contractAddress: TOKEN_A,
      creator: `creator-of-${TOKEN_A}`,
      creationTxHash: `0xdeploy-${TOKEN_A}`,
      discoveryTxHash: "0xhash400",
      createdAt: 400,
      toBuy: false,
      checks: { honeypot: "unknown", liquidityLocked: "unknown", renounced: "unknown" },
      meta: metaFor(PAIR_A)
    });
    expect(resolveCreatorAndTxHash).toHaveBeenCalledTimes(1);
    expect(resolveCreatorAndTxHash).toHaveBeenCalledWith([TOKEN_A, TOKEN_B]);
  });

  it("splits creator lookups by the batch size", async () => {
    fetchRecentInternalTxs
      .mockResolvedValueOnce([pairCreated(300, PAIR_C)])
      .mockResolvedValueOnce([pairCreated(500, PAIR_B), pairCreated(400, PAIR_A)]);
    const subject = discovery(1);
    await subject.poll();

    await subject.poll();

    expect(resolveCreatorAndTxHash.mock.calls).toEqual([[[TOKEN_A]], [[TOKEN_B]]]);
  });

  it("keeps a pair whose token lookup failed with an empty contract", async () => {
    resolveTokenMeta.mockImplementation(async (pair) => {
      if (pair === PAIR_A) {
        throw new UpstreamError("honeypot", "IsHoneypot", "HTTP 404");
      }
      return metaFor(pair);
    });
    fetchRecentInternalTxs
      .mockResolvedValueOnce([pairCreated(300, PAIR_C)])
      .mockResolvedValueOnce([pairCreated(500, PAIR_B), pairCreated(400, PAIR_A)]);
    const subject = discovery();
    await subject.poll();

    const [first, second] = await subject.poll();

    expect(first.contractAddress).toBe("");
    expect(first.creator).toBe("");
    expect(first.meta).toBeUndefined();
    expect(second.contractAddress).toBe(TOKEN_B);
    expect(resolveCreatorAndTxHash).toHaveBeenCalledWith([TOKEN_B]);
  });

  it("leaves creators empty when the creator lookup fails", async () => {
    resolveCreatorAndTxHash.mockRejectedValue(new UpstreamError("etherscan", "getcontractcreation", "rate limited"));
    fetchRecentInternalTxs
      .mockResolvedValueOnce([pairCreated(300, PAIR_C)])
      .mockResolvedValueOnce([pairCreated(400, PAIR_A)]);
    const subject = discovery();
    await subject.poll();

    const [found] = await subject.poll();

    expect(found.contractAddress).toBe(TOKEN_A);
    expect(found.creator).toBe("");
    expect(found.creationTxHash).toBe("");
  });

  it("returns nothing and keeps its cursor when the factory scan fails", async () => {
    fetchRecentInternalTxs
      .mockResolvedValueOnce([pairCreated(300, PAIR_C)])
      .mockRejectedValueOnce(new UpstreamError("etherscan", "txlistinternal", "HTTP 502"));
    const subject = discovery();
    await subject.poll();

    expect(await subject.poll()).toEqual([]);
    expect(subject.getCursor()).toBe(300);
  });
});
