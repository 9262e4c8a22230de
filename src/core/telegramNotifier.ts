import TelegramBot from "node-telegram-bot-api";
import { ActivityRecord, CandidateToken, SubscriberId } from "./types.js";

export interface Notifier {
  notifyWalletActivity(subscriber: SubscriberId, address: string, record: ActivityRecord): Promise<void>;
  notifyCandidateToBuy(subscriber: SubscriberId, candidate: CandidateToken): Promise<void>;
}

/** `YYYY-MM-DD HH:mm:ss` in UTC. */
export const formatTimestamp = (unixSeconds: number): string =>
  new Date(unixSeconds * 1000).toISOString().replace("T", " ").slice(0, 19);

export const formatWalletActivity = (address: string, record: ActivityRecord): string =>
  [
    "🚨🚨🚨 New transaction from watched wallet 🚨🚨🚨",
    "",
    `🔎 Wallet: ${address}`,
    "",
    `⏰ Timestamp: ${formatTimestamp(record.timestamp)}`,
    `🔗 Transaction hash: ${record.hash}`,
    `💎 Token symbol: ${record.tokenSymbol ?? "?"}`,
    `💎 Token name: ${record.tokenName ?? "?"}`,
    `📄 Contract: ${record.contractAddress}`
  ].join("\n");

export const formatCandidate = (candidate: CandidateToken): string => {
  const meta = candidate.meta;
  const lines = [
    "🎯 New token passed screening",
    "",
    meta ? `💎 ${meta.name} (${meta.symbol})` : "💎 Unknown token",
    `📄 Contract: ${candidate.contractAddress || "unresolved"}`,
    `🔀 Pair: ${candidate.pairAddress}`,
    `👤 Creator: ${candidate.creator || "unresolved"}`,
    `⏰ Created: ${formatTimestamp(candidate.createdAt)}`
  ];
  if (meta) {
    lines.push(`🏷 Tax: buy ${meta.buyTax.toFixed(1)}% / sell ${meta.sellTax.toFixed(1)}%`);
    lines.push(`💧 Liquidity: $${Math.round(meta.liquidityUsd).toLocaleString("en-US")}`);
  }
  lines.push("✅ Ownership renounced, liquidity locked or burned");
  return lines.join("\n");
};

export class TelegramNotifier implements Notifier {
  private readonly bot: TelegramBot;

  constructor(bot: TelegramBot) {
    this.bot = bot;
  }

  async send(chatId: SubscriberId, message: string): Promise<void> {
    await this.bot.sendMessage(chatId, message, { disable_web_page_preview: true });
  }

  async notifyWalletActivity(subscriber: SubscriberId, address: string, record: ActivityRecord): Promise<void> {
    await this.send(subscriber, formatWalletActivity(address, record));
  }

  async notifyCandidateToBuy(subscriber: SubscriberId, candidate: CandidateToken): Promise<void> {
    await this.send(subscriber, formatCandidate(candidate));
  }
}
