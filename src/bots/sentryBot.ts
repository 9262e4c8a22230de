import TelegramBot from "node-telegram-bot-api";
import { BotConfig } from "../config/config.js";
import { Logger, moduleLogger } from "../core/logger.js";
import { Clock, PeriodicTask, Timer, systemClock, systemTimer } from "../core/scheduler.js";
import { TelegramNotifier } from "../core/telegramNotifier.js";
import { PairDiscovery } from "../listeners/pairDiscovery.js";
import { AlchemyClient } from "../rpc/alchemyClient.js";
import { ComputeBudget } from "../rpc/computeBudget.js";
import { describeError } from "../rpc/errors.js";
import { EtherscanClient } from "../rpc/etherscanClient.js";
import { HoneypotClient } from "../rpc/honeypotClient.js";
import { MoralisClient } from "../rpc/moralisClient.js";
import { CursorStore } from "../storage/cursorStore.js";
import { SubscriberRegistry } from "../storage/subscriberRegistry.js";
import { RiskClassifier } from "../trading/riskClassifier.js";
import { TokenMonitor } from "../trading/tokenMonitor.js";
import { WalletWatcher } from "../watchers/walletWatcher.js";
import { CommandHandler } from "./commandHandler.js";

export class SentryBot {
  private readonly config: BotConfig;
  private readonly bot: TelegramBot;
  private readonly log: Logger;
  private readonly commands: CommandHandler;
  private readonly tasks: PeriodicTask[];

  constructor(config: BotConfig, clock: Clock = systemClock, timer: Timer = systemTimer) {
    this.config = config;
    this.log = moduleLogger("sentryBot");
    this.bot = new TelegramBot(config.telegram.botToken, { polling: false });

    const { etherscan, alchemy, moralis, honeypot } = config.providers;
    const budget = new ComputeBudget(config.budget.monthlyComputeUnits, clock);
    const etherscanClient = new EtherscanClient(etherscan.baseUrl, etherscan.apiKey);
    const alchemyClient = new AlchemyClient(alchemy.baseUrl, alchemy.apiKey, budget);
    const honeypotClient = new HoneypotClient(honeypot.baseUrl);
    const moralisClient = new MoralisClient(moralis.baseUrl, moralis.apiKey);
    const riskSources = {
      fetchNormalTxs: (address: string) => etherscanClient.fetchNormalTxs(address),
      fetchRecentInternalTxs: (address: string, count: number) => etherscanClient.fetchRecentInternalTxs(address, count),
      resolveCreatorAndTxHash: (addresses: string[]) => etherscanClient.resolveCreatorAndTxHash(addresses),
      resolveTokenMeta: (address: string) => honeypotClient.resolveTokenMeta(address),
      resolveTopHolders: (contract: string) => moralisClient.resolveTopHolders(contract)
    };

    const registry = new SubscriberRegistry();
    const cursors = new CursorStore();
    registry.onWatchListChange((subscriber, addresses) => cursors.retain(subscriber, addresses));
    const notifier = new TelegramNotifier(this.bot);

    const watcher = new WalletWatcher(registry, cursors, etherscanClient, notifier, moduleLogger("walletWatcher"));
    const discovery = new PairDiscovery(riskSources, config.discovery, moduleLogger("pairDiscovery"));
    const classifier = new RiskClassifier(
      riskSources,
      {
        maxTaxPct: config.discovery.maxTaxPct,
        lockerAddresses: config.discovery.lockerAddresses,
        ttlSeconds: config.discovery.candidateTtlSeconds
      },
      moduleLogger("riskClassifier")
    );
    const monitor = new TokenMonitor(discovery, classifier, registry, notifier, moduleLogger("tokenMonitor"), clock);

    this.commands = new CommandHandler(
      {
        registry,
        accounts: alchemyClient,
        prices: etherscanClient,
        tokens: honeypotClient,
        budget,
        walletAddress: config.wallet.address
      },
      moduleLogger("commands")
    );

    const { walletWatchMs, discoveryMs, budgetTickMs } = config.intervals;
    this.tasks = [
      new PeriodicTask(
        "wallet-watch",
        walletWatchMs,
        async () => {
          await watcher.tick();
        },
        this.log,
        timer
      ),
      new PeriodicTask(
        "token-discovery",
        discoveryMs,
        async () => {
          const report = await monitor.tick();
          this.log.debug({ ...report }, "Token monitor cycle");
        },
        this.log,
        timer
      ),
      new PeriodicTask(
        "budget-reset",
        budgetTickMs,
        async () => {
          if (budget.dailyTick()) {
            this.log.info("Compute budget reset for the new month");
          }
        },
        this.log,
        timer
      )
    ];
  }

  async start(): Promise<void> {
    this.bot.on("message", (message) => void this.onMessage(message));
    this.bot.on("polling_error", (error) => this.log.error({ error: describeError(error) }, "Telegram polling error"));
    await this.bot.startPolling();
    for (const task of this.tasks) {
      task.start({ runImmediately: true });
    }
    this.log.info({ factory: this.config.discovery.factoryAddress }, "Bot started");
  }

  async stop(): Promise<void> {
    for (const task of this.tasks) {
      task.stop();
    }
    await this.bot.stopPolling();
  }

  private async onMessage(message: TelegramBot.Message): Promise<void> {
    if (!message.text) {
      return;
    }
    const chatId = String(message.chat.id);
    try {
      const reply = await this.commands.handle(chatId, message.text);
      await this.bot.sendMessage(chatId, reply, { disable_web_page_preview: true });
    } catch (error) {
      this.log.error({ chatId, error: describeError(error) }, "Failed to answer command");
    }
  }
}
