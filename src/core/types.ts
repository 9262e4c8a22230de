export type SubscriberId = string;

export interface SubscriberSettings {
  hideZeroBalances: boolean;
  autoSnipe: boolean;
}

/**
 * A single on-chain record as returned by the explorer, newest first.
 * `timestamp` is the block time in unix seconds.
 */
export interface ActivityRecord {
  hash: string;
  timestamp: number;
  blockNumber: number;
  from: string;
  to: string;
  contractAddress: string;
  tokenName?: string;
  tokenSymbol?: string;
  functionName?: string;
  type?: string;
}

export interface TokenMeta {
  contractAddress: string;
  name: string;
  symbol: string;
  decimals: number;
  isHoneypot: boolean;
  honeypotReason?: string;
  buyTax: number;
  sellTax: number;
  liquidityUsd: number;
}

export interface ContractCreation {
  address: string;
  creator: string;
  txHash: string;
}

export type CheckOutcome = "yes" | "no" | "unknown";

export interface CandidateChecks {
  honeypot: CheckOutcome;
  liquidityLocked: CheckOutcome;
  renounced: CheckOutcome;
}

export interface CandidateToken {
  pairAddress: string;
  /** Empty until the token behind the pair has been resolved. */
  contractAddress: string;
  creator: string;
  creationTxHash: string;
  discoveryTxHash: string;
  createdAt: number;
  toBuy: boolean;
  checks: CandidateChecks;
  meta?: TokenMeta;
}

export type CandidateDecision =
  | { status: "pending" }
  | { status: "buy" }
  | { status: "rejected"; reason: string }
  | { status: "expired" };

export interface WalletActivityEvent {
  subscriber: SubscriberId;
  address: string;
  record: ActivityRecord;
}

export interface ErcTokenBalance {
  contractAddress: string;
  rawBalance: string;
}
