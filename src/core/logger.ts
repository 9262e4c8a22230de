import pino, { type Logger } from "pino";

export type { Logger };

export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  redact: ["*.apiKey", "*.botToken", "config.telegram.botToken"],
  formatters: {
    level: (label) => ({ level: label })
  },
  timestamp: pino.stdTimeFunctions.isoTime
});

export const moduleLogger = (module: string): Logger => logger.child({ module });
