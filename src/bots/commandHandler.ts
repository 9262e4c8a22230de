import { Logger } from "../core/logger.js";
import { ErcTokenBalance, SubscriberId, TokenMeta } from "../core/types.js";
import { BudgetStatus } from "../rpc/computeBudget.js";
import { describeError } from "../rpc/errors.js";
import { SubscriberRegistry } from "../storage/subscriberRegistry.js";
import { formatUsd, isEthAddress, toTokenAmount, weiToEth, weiToGwei } from "../utils/units.js";

// Gas used by a typical swap, plus the router fee.
const UNISWAP_V2_SWAP_GAS = 152_809;
const UNISWAP_V3_SWAP_GAS = 184_523;
const SWAP_FEE_FACTOR = 1.03;

export interface AccountSource {
  getBalanceWei(address: string): Promise<bigint>;
  getGasPriceWei(): Promise<bigint>;
  getTokenBalances(address: string): Promise<ErcTokenBalance[]>;
}

export interface PriceSource {
  getEthPriceUsd(): Promise<number>;
}

export interface TokenInfoSource {
  resolveTokenMeta(address: string): Promise<TokenMeta>;
}

export interface BudgetView {
  getStatus(): BudgetStatus;
}

export interface CommandDeps {
  registry: SubscriberRegistry;
  accounts: AccountSource;
  prices: PriceSource;
  tokens: TokenInfoSource;
  budget: BudgetView;
  walletAddress: string;
}

export interface ParsedCommand {
  name: string;
  args: string[];
}

export const HELP_TEXT = [
  "These commands are supported:",
  "/help - list available commands",
  "/watch <address...> - start monitoring ethereum wallets",
  "/unwatch - stop monitoring all wallets",
  "/autosnipe on|off - alert on new tokens that pass screening",
  "/hidezero on|off - hide zero token balances",
  "/settings - show current settings",
  "/balance - get wallet ETH balance",
  "/tokens - get wallet ERC-20 token balances",
  "/gas - get current eth gas",
  "/budget - show provider compute units used this month"
].join("\n");

/** Splits "/cmd@botname a b" into its lowercased name and arguments. */
export const parseCommand = (text: string): ParsedCommand | undefined => {
  const [head, ...args] = text.trim().split(/\s+/);
  if (!head || !head.startsWith("/")) {
    return undefined;
  }
  const name = head.slice(1).split("@")[0].toLowerCase();
  return name ? { name, args } : undefined;
};

export const parseToggle = (value: string | undefined): boolean | undefined => {
  switch (value?.toLowerCase()) {
    case "on":
    case "true":
    case "yes":
      return true;
    case "off":
    case "false":
    case "no":
      return false;
    default:
      return undefined;
  }
};

const failure = (error: unknown): string => `Something went wrong: ${describeError(error)}\n\nPlease try again`;

export class CommandHandler {
  private readonly deps: CommandDeps;
  private readonly log: Logger;

  constructor(deps: CommandDeps, log: Logger) {
    this.deps = deps;
    this.log = log;
  }

  async handle(subscriber: SubscriberId, text: string): Promise<string> {
    const command = parseCommand(text);
    if (!command) {
      return "Type /help to see available commands.";
    }
    switch (command.name) {
      case "help":
      case "start":
        return HELP_TEXT;
      case "watch":
        return this.watch(subscriber, command.args);
      case "unwatch":
        this.deps.registry.setWatchList(subscriber, []);
        return "Stopped watching all wallets";
      case "autosnipe":
        return this.toggle(subscriber, command.args[0], "autosnipe");
      case "hidezero":
        return this.toggle(subscriber, command.args[0], "hidezero");
      case "settings":
        return this.settings(subscriber);
      case "balance":
        return this.guard(subscriber, command.name, () => this.balance());
      case "tokens":
        return this.guard(subscriber, command.name, () => this.tokens(subscriber));
      case "gas":
        return this.guard(subscriber, command.name, () => this.gas());
      case "budget":
        return this.budget();
      default:
        return "Type /help to see available commands.";
    }
  }

  private watch(subscriber: SubscriberId, args: string[]): string {
    const wallets = args.filter(isEthAddress);
    if (wallets.length === 0) {
      return "Watch wallets cancelled: submitted wallets are incorrect";
    }
    const watched = this.deps.registry.setWatchList(subscriber, wallets);
    const lines = watched.map((wallet, index) => `${index + 1}. ${wallet}`);
    return ["Currently watched wallets:", "", ...lines].join("\n");
  }

  private toggle(subscriber: SubscriberId, value: string | undefined, setting: "autosnipe" | "hidezero"): string {
    const enabled = parseToggle(value);
    if (enabled === undefined) {
      return `Usage: /${setting} on|off`;
    }
    if (setting === "autosnipe") {
      this.deps.registry.setAutoSnipe(subscriber, enabled);
      return `Auto-snipe alerts ${enabled ? "enabled" : "disabled"}`;
    }
    this.deps.registry.setHideZeroBalances(subscriber, enabled);
    return `Zero balances ${enabled ? "hidden" : "shown"}`;
  }

  private settings(subscriber: SubscriberId): string {
    const settings = this.deps.registry.getSettings(subscriber);
    const watched = this.deps.registry.getWatchList(subscriber);
    return [
      `Auto-snipe: ${settings.autoSnipe ? "on" : "off"}`,
      `Hide zero balances: ${settings.hideZeroBalances ? "on" : "off"}`,
      `Watched wallets: ${watched.length}`
    ].join("\n");
  }

  private async balance(): Promise<string> {
    const ethPrice = await this.deps.prices.getEthPriceUsd();
    const eth = weiToEth(await this.deps.accounts.getBalanceWei(this.deps.walletAddress));
    const usd = Math.round(eth * ethPrice * 100) / 100;
    return `Wallet balance:\n${eth.toFixed(4)} ETH ($${formatUsd(usd)})`;
  }

  private async tokens(subscriber: SubscriberId): Promise<string> {
    const { hideZeroBalances } = this.deps.registry.getSettings(subscriber);
    const balances = await this.deps.accounts.getTokenBalances(this.deps.walletAddress);
    const visible = hideZeroBalances ? balances.filter((balance) => balance.rawBalance !== "0") : balances;
    if (visible.length === 0) {
      return "ERC-20 Token balances:\n\nNo tokens found";
    }

    const sections: string[] = [];
    for (const balance of visible) {
      try {
        const meta = await this.deps.tokens.resolveTokenMeta(balance.contractAddress);
        const amount = toTokenAmount(balance.rawBalance, meta.decimals);
        sections.push(
          `${meta.name} (${meta.symbol})\n📄 contract: ${balance.contractAddress}\n💰 balance: ${formatUsd(amount)}`
        );
      } catch (error) {
        this.log.warn({ contract: balance.contractAddress, error: describeError(error) }, "Token info lookup failed");
        sections.push(`${balance.contractAddress}\n📄 contract: ${balance.contractAddress}\n💰 balance: ?`);
      }
    }
    return ["ERC-20 Token balances:", "", sections.join("\n\n")].join("\n");
  }

  private async gas(): Promise<string> {
    const gwei = weiToGwei(await this.deps.accounts.getGasPriceWei());
    const ethPrice = await this.deps.prices.getEthPriceUsd();
    const swapCost = (gasUnits: number): number => gwei * 1e-9 * ethPrice * gasUnits * SWAP_FEE_FACTOR;
    return [
      `Current eth gas is: ${gwei.toFixed(0)} gwei`,
      "",
      "Estimated fees:",
      `🦄 Uniswap V2 swap: $${swapCost(UNISWAP_V2_SWAP_GAS).toFixed(2)}`,
      `🦄 Uniswap V3 swap: $${swapCost(UNISWAP_V3_SWAP_GAS).toFixed(2)}`
    ].join("\n");
  }

  private budget(): string {
    const status = this.deps.budget.getStatus();
    const pct = status.capacity > 0 ? (status.used / status.capacity) * 100 : 0;
    return `Compute units this month: ${status.used.toLocaleString("en-US")} / ${status.capacity.toLocaleString("en-US")} (${pct.toFixed(1)}%)`;
  }

  private async guard(subscriber: SubscriberId, command: string, run: () => Promise<string>): Promise<string> {
    try {
      return await run();
    } catch (error) {
      this.log.warn({ subscriber, command, error: describeError(error) }, "Command failed");
      return failure(error);
    }
  }
}
