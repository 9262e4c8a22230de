import { formatEther, formatUnits, isAddress } from "ethers";

export const weiToEth = (wei: bigint): number => Number(formatEther(wei));

export const weiToGwei = (wei: bigint): number => Number(formatUnits(wei, "gwei"));

export const toTokenAmount = (raw: string, decimals: number): number => Number(formatUnits(BigInt(raw), decimals));

/** 0x-prefixed, 40 hex characters, valid checksum when mixed case. */
export const isEthAddress = (value: string): boolean => value.length === 42 && value.startsWith("0x") && isAddress(value);

export const formatUsd = (value: number): string =>
  value.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });
