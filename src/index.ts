import { ConfigError, loadConfig } from "./config/config.js";
import { logger } from "./core/logger.js";
import { SentryBot } from "./bots/sentryBot.js";

const main = async (): Promise<void> => {
  const config = loadConfig(process.env.CONFIG_PATH);
  const bot = new SentryBot(config);

  const shutdown = (): void => {
    void bot.stop().finally(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await bot.start();
};

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.fatal(error.message);
  } else {
    logger.fatal({ err: error }, "Bot crashed during startup");
  }
  process.exit(1);
});
