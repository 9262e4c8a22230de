import { Logger } from "../core/logger.js";
import {
  ActivityRecord,
  CandidateChecks,
  CandidateDecision,
  CandidateToken,
  CheckOutcome,
  ContractCreation,
  TokenMeta
} from "../core/types.js";
import { describeError } from "../rpc/errors.js";

export interface TokenMetaSource {
  resolveTokenMeta(address: string): Promise<TokenMeta>;
}

export interface HolderSource {
  resolveTopHolders(contractAddress: string): Promise<string[]>;
}

export interface NormalTxSource {
  fetchNormalTxs(address: string): Promise<ActivityRecord[]>;
}

export interface CreationSource {
  resolveCreatorAndTxHash(addresses: string[]): Promise<ContractCreation[]>;
}

export interface RiskSources extends TokenMetaSource, HolderSource, NormalTxSource, CreationSource {}

export interface RiskOptions {
  maxTaxPct: number;
  lockerAddresses: readonly string[];
  ttlSeconds: number;
}

const RENOUNCE_FUNCTION = "renounceOwnership";

export const isHoneypot = (meta: TokenMeta, maxTaxPct: number): boolean =>
  meta.isHoneypot || meta.buyTax > maxTaxPct || meta.sellTax > maxTaxPct;

export const hasLockedLiquidity = (holders: readonly string[], lockers: readonly string[]): boolean => {
  const known = new Set(lockers.map((address) => address.toLowerCase()));
  return holders.some((holder) => known.has(holder.toLowerCase()));
};

export const hasRenounceCall = (txs: readonly ActivityRecord[]): boolean =>
  txs.some((tx) => (tx.functionName ?? "").includes(RENOUNCE_FUNCTION));

/**
 * Folds the three check outcomes into a decision. Without a renouncement
 * nothing else matters; once renounced a honeypot verdict wins over liquidity.
 */
export const decide = (
  checks: CandidateChecks,
  createdAt: number,
  nowSeconds: number,
  ttlSeconds: number
): CandidateDecision => {
  const expired = nowSeconds - createdAt > ttlSeconds;
  if (checks.renounced !== "yes") {
    return expired ? { status: "expired" } : { status: "pending" };
  }
  if (checks.honeypot === "yes") {
    return { status: "rejected", reason: "honeypot" };
  }
  if (checks.liquidityLocked === "yes") {
    return { status: "buy" };
  }
  return expired ? { status: "expired" } : { status: "pending" };
};

export class RiskClassifier {
  private readonly sources: RiskSources;
  private readonly options: RiskOptions;
  private readonly log: Logger;

  constructor(sources: RiskSources, options: RiskOptions, log: Logger) {
    this.sources = sources;
    this.options = options;
    this.log = log;
  }

  /** Refreshes the candidate's check outcomes in place and returns the decision. */
  async evaluate(candidate: CandidateToken, nowSeconds: number): Promise<CandidateDecision> {
    // Renouncement cannot be undone, so a positive result is kept.
    if (candidate.checks.renounced !== "yes") {
      candidate.checks.renounced = await this.checkRenounced(candidate);
    }
    if (candidate.checks.renounced === "yes") {
      candidate.checks.honeypot = await this.checkHoneypot(candidate);
      candidate.checks.liquidityLocked = await this.checkLiquidity(candidate);
    }

    const decision = decide(candidate.checks, candidate.createdAt, nowSeconds, this.options.ttlSeconds);
    if (decision.status === "buy") {
      candidate.toBuy = true;
    }
    return decision;
  }

  async checkHoneypot(candidate: CandidateToken): Promise<CheckOutcome> {
    try {
      const meta = await this.sources.resolveTokenMeta(candidate.contractAddress || candidate.pairAddress);
      candidate.meta = meta;
      if (!candidate.contractAddress) {
        candidate.contractAddress = meta.contractAddress;
      }
      return isHoneypot(meta, this.options.maxTaxPct) ? "yes" : "no";
    } catch (error) {
      this.log.warn({ pair: candidate.pairAddress, error: describeError(error) }, "Honeypot lookup failed");
      return "unknown";
    }
  }

  async checkLiquidity(candidate: CandidateToken): Promise<CheckOutcome> {
    if (!candidate.contractAddress) {
      return "unknown";
    }
    try {
      const holders = await this.sources.resolveTopHolders(candidate.contractAddress);
      return hasLockedLiquidity(holders, this.options.lockerAddresses) ? "yes" : "no";
    } catch (error) {
      this.log.warn({ contract: candidate.contractAddress, error: describeError(error) }, "Holder lookup failed");
      return "unknown";
    }
  }

  async checkRenounced(candidate: CandidateToken): Promise<CheckOutcome> {
    const creator = await this.ensureCreator(candidate);
    if (!creator) {
      return "unknown";
    }
    try {
      const txs = await this.sources.fetchNormalTxs(creator);
      return hasRenounceCall(txs) ? "yes" : "no";
    } catch (error) {
      this.log.warn({ creator, error: describeError(error) }, "Creator history lookup failed");
      return "unknown";
    }
  }

  // Discovery may have left the contract or creator unresolved; retry once per cycle.
  private async ensureCreator(candidate: CandidateToken): Promise<string> {
    if (candidate.creator) {
      return candidate.creator;
    }
    if (!candidate.contractAddress && !(await this.resolveContract(candidate))) {
      return "";
    }
    try {
      const [creation] = await this.sources.resolveCreatorAndTxHash([candidate.contractAddress]);
      if (creation) {
        candidate.creator = creation.creator;
        candidate.creationTxHash = creation.txHash;
      }
    } catch (error) {
      this.log.warn({ contract: candidate.contractAddress, error: describeError(error) }, "Creator lookup failed");
    }
    return candidate.creator;
  }

  private async resolveContract(candidate: CandidateToken): Promise<boolean> {
    try {
      const meta = await this.sources.resolveTokenMeta(candidate.pairAddress);
      candidate.meta = meta;
      candidate.contractAddress = meta.contractAddress;
    } catch (error) {
      this.log.warn({ pair: candidate.pairAddress, error: describeError(error) }, "Token lookup failed");
    }
    return candidate.contractAddress !== "";
  }
}
