import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

const address = z.string().regex(/^0x[0-9a-fA-F]{40}$/, "expected a 0x-prefixed 20 byte address");

const ConfigSchema = z.object({
  telegram: z.object({
    botToken: z.string().min(1)
  }),
  wallet: z.object({
    address: address
  }),
  providers: z.object({
    etherscan: z.object({
      baseUrl: z.string().url().default("https://api.etherscan.io/api"),
      apiKey: z.string().min(1)
    }),
    alchemy: z.object({
      baseUrl: z.string().url().default("https://eth-mainnet.g.alchemy.com/v2"),
      apiKey: z.string().min(1)
    }),
    moralis: z.object({
      baseUrl: z.string().url().default("https://deep-index.moralis.io/api/v2.2"),
      apiKey: z.string().min(1)
    }),
    honeypot: z
      .object({
        baseUrl: z.string().url().default("https://api.honeypot.is/v2")
      })
      .default({})
  }),
  intervals: z
    .object({
      walletWatchMs: z.number().int().positive().default(60_000),
      discoveryMs: z.number().int().positive().default(60_000),
      budgetTickMs: z.number().int().positive().default(24 * 60 * 60 * 1000)
    })
    .default({}),
  discovery: z
    .object({
      factoryAddress: address.default("0x5C69bEe701ef814a2B6a3EDD4B1652CB9cc5aA6f"),
      internalTxCount: z.number().int().positive().default(25),
      creatorBatchSize: z.number().int().min(1).max(5).default(5),
      candidateTtlSeconds: z.number().int().positive().default(2 * 60 * 60),
      maxTaxPct: z.number().min(0).max(100).default(5),
      lockerAddresses: z
        .array(address)
        .default([
          "0x000000000000000000000000000000000000dEaD",
          "0x0000000000000000000000000000000000000000",
          "0x663A5C229c09b049E36dCc11a9B0d4a8Eb9db214",
          "0xE2fE530C047f2d85298b07D9333C05737f1435fB",
          "0x71B5759d73262FBb223956913ecF4ecC51057641"
        ])
    })
    .default({}),
  budget: z
    .object({
      monthlyComputeUnits: z.number().int().positive().default(300_000_000)
    })
    .default({})
});

export type BotConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const defaultConfigPath = path.resolve("config", "config.json");

type Env = Record<string, string | undefined>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const setIn = (target: Record<string, unknown>, keys: string[], value: string): Record<string, unknown> => {
  const [head, ...rest] = keys;
  if (rest.length === 0) {
    return { ...target, [head]: value };
  }
  const child = target[head];
  return { ...target, [head]: setIn(isRecord(child) ? child : {}, rest, value) };
};

const ENV_OVERRIDES: Array<[string, string[]]> = [
  ["TELEGRAM_BOT_TOKEN", ["telegram", "botToken"]],
  ["ETH_ADDRESS", ["wallet", "address"]],
  ["ETHERSCAN_API_KEY", ["providers", "etherscan", "apiKey"]],
  ["ALCHEMY_API_KEY", ["providers", "alchemy", "apiKey"]],
  ["MORALIS_API_KEY", ["providers", "moralis", "apiKey"]]
];

const applyEnv = (raw: unknown, env: Env): unknown => {
  if (!isRecord(raw)) {
    return raw;
  }
  let next = raw;
  for (const [name, keys] of ENV_OVERRIDES) {
    const value = env[name];
    if (value) {
      next = setIn(next, keys, value);
    }
  }
  return next;
};

export const parseConfig = (raw: unknown, env: Env = {}): BotConfig => {
  const result = ConfigSchema.safeParse(applyEnv(raw, env));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
};

export const loadConfig = (configPath = defaultConfigPath, env: Env = process.env): BotConfig => {
  dotenv.config();
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigError(`Config file not found at ${resolved}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file at ${resolved} is not valid JSON: ${detail}`);
  }
  return parseConfig(raw, env);
};
