import { Logger } from "../core/logger.js";
import { ActivityRecord, CandidateToken, ContractCreation, TokenMeta } from "../core/types.js";
import { describeError } from "../rpc/errors.js";
import { takeNewer } from "../storage/cursorStore.js";
import { CreationSource, TokenMetaSource } from "../trading/riskClassifier.js";

export interface InternalTxSource {
  fetchRecentInternalTxs(address: string, count: number): Promise<ActivityRecord[]>;
}

export interface DiscoverySources extends InternalTxSource, TokenMetaSource, CreationSource {}

export interface DiscoveryOptions {
  factoryAddress: string;
  internalTxCount: number;
  creatorBatchSize: number;
}

export const isPairCreation = (tx: ActivityRecord): boolean =>
  (tx.type ?? "").toLowerCase().startsWith("create") && tx.contractAddress !== "";

export const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

/**
 * Polls the factory's internal transactions for freshly created pairs. Only
 * pairs created after the first observed one are ever reported.
 */
export class PairDiscovery {
  private readonly sources: DiscoverySources;
  private readonly options: DiscoveryOptions;
  private readonly log: Logger;
  private cursor?: number;

  constructor(sources: DiscoverySources, options: DiscoveryOptions, log: Logger) {
    this.sources = sources;
    this.options = options;
    this.log = log;
  }

  getCursor(): number | undefined {
    return this.cursor;
  }

  /** New candidates in creation order, oldest first. */
  async poll(): Promise<CandidateToken[]> {
    let txs: ActivityRecord[];
    try {
      txs = await this.sources.fetchRecentInternalTxs(this.options.factoryAddress, this.options.internalTxCount);
    } catch (error) {
      this.log.warn({ factory: this.options.factoryAddress, error: describeError(error) }, "Factory scan failed");
      return [];
    }

    const creations = txs.filter(isPairCreation);
    if (this.cursor === undefined) {
      const [newest] = creations;
      if (newest) {
        this.cursor = newest.timestamp;
        this.log.info({ pair: newest.contractAddress, cursor: this.cursor }, "Discovery baseline set");
      }
      return [];
    }

    const fresh = takeNewer(creations, this.cursor);
    if (fresh.length === 0) {
      return [];
    }
    this.cursor = fresh[0].timestamp;
    return this.resolve(fresh.reverse());
  }

  private async resolve(txs: ActivityRecord[]): Promise<CandidateToken[]> {
    const metas = new Map<string, TokenMeta>();
    for (const tx of txs) {
      try {
        metas.set(tx.contractAddress.toLowerCase(), await this.sources.resolveTokenMeta(tx.contractAddress));
      } catch (error) {
        this.log.warn({ pair: tx.contractAddress, error: describeError(error) }, "Token lookup failed");
      }
    }

    const contracts = [...new Set([...metas.values()].map((meta) => meta.contractAddress).filter(Boolean))];
    const creations = new Map<string, ContractCreation>();
    for (const batch of chunk(contracts, this.options.creatorBatchSize)) {
      try {
        for (const creation of await this.sources.resolveCreatorAndTxHash(batch)) {
          creations.set(creation.address.toLowerCase(), creation);
        }
      } catch (error) {
        this.log.warn({ contracts: batch, error: describeError(error) }, "Creator lookup failed");
      }
    }

    return txs.map((tx): CandidateToken => {
      const meta = metas.get(tx.contractAddress.toLowerCase());
      const contractAddress = meta?.contractAddress ?? "";
      const creation = contractAddress ? creations.get(contractAddress.toLowerCase()) : undefined;
      return {
        pairAddress: tx.contractAddress,
        contractAddress,
        creator: creation?.creator ?? "",
        creationTxHash: creation?.txHash ?? "",
        discoveryTxHash: tx.hash,
        createdAt: tx.timestamp,
        toBuy: false,
        checks: { honeypot: "unknown", liquidityLocked: "unknown", renounced: "unknown" },
        meta
      };
    });
  }
}
