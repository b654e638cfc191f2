import "dotenv/config";
import { z } from "zod";
import { toMicros } from "./money.js";
import type { ExecutionMode } from "./types.js";

const DEFAULT_GAMMA_API = "https://gamma-api.polymarket.com";
const DEFAULT_CLOB_API = "https://clob.polymarket.com";

const amount = (fallback: string) =>
  z
    .string()
    .trim()
    .regex(/^\d+(\.\d{1,6})?$/, "expected a non-negative decimal with at most 6 places")
    .default(fallback)
    .transform((v) => toMicros(v));

const millis = (fallback: number) => z.coerce.number().int().positive().finite().default(fallback);

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((v) => v === "true");

const envSchema = z
  .object({
    MODE: z.enum(["simulation", "production"]).default("simulation"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // Thresholds and sizing (dollars)
    MIN_PROFIT_THRESHOLD: amount("0.01"),
    MAX_POSITION_SIZE: amount("100"),
    MIN_LEG_PRICE: amount("0"),
    MIN_ORDER_SIZE: amount("5"),

    // Timing
    CHECK_INTERVAL_MS: millis(1000),
    QUOTE_MAX_AGE_MS: z.coerce.number().int().positive().finite().optional(),
    QUOTE_TIMEOUT_MS: millis(5000),
    SUBMIT_TIMEOUT_MS: millis(5000),
    FILL_POLL_INTERVAL_MS: millis(500),
    FILL_TIMEOUT_MS: millis(10_000),
    TRADE_TIMEOUT_MS: millis(30_000),
    FLATTEN_PARTIAL_FILLS: flag("false"),
    ROLLOVER_CHECK_MS: millis(60_000),
    SETTLEMENT_INTERVAL_MS: millis(30_000),
    SETTLEMENT_MIN_AGE_MS: millis(14 * 60_000),

    // Markets
    MARKET_A_ASSET: z.string().trim().toLowerCase().default("sol"),
    MARKET_B_ASSET: z.string().trim().toLowerCase().default("btc"),
    WINDOW_MINUTES: z.coerce.number().int().positive().default(15),

    // Venue
    GAMMA_API_URL: z.string().url().default(DEFAULT_GAMMA_API),
    CLOB_API_URL: z.string().url().default(DEFAULT_CLOB_API),
    CHAIN_ID: z.coerce.number().pipe(z.union([z.literal(137), z.literal(80002)])).default(137),
    PRIVATE_KEY: z.string().optional(),
    FUNDER_ADDRESS: z.string().optional(),
    SIGNATURE_TYPE: z.coerce.number().pipe(z.union([z.literal(0), z.literal(1), z.literal(2)])).default(0),
    POLY_API_KEY: z.string().optional(),
    POLY_SECRET: z.string().optional(),
    POLY_PASSPHRASE: z.string().optional(),

    // Status API
    PORT: z.coerce.number().int().positive().default(3001),
    API_KEY: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.MODE === "production" && !env.PRIVATE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["PRIVATE_KEY"],
        message: "required in production mode",
      });
    }
    if (env.MARKET_A_ASSET === env.MARKET_B_ASSET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MARKET_B_ASSET"],
        message: "must differ from MARKET_A_ASSET",
      });
    }
  });

export interface Config {
  mode: ExecutionMode;
  logLevel: "debug" | "info" | "warn" | "error";
  minProfitThreshold: bigint;
  maxPositionSize: bigint;
  minLegPrice: bigint;
  minOrderSize: bigint;
  checkIntervalMs: number;
  quoteMaxAgeMs: number;
  quoteTimeoutMs: number;
  submitTimeoutMs: number;
  fillPollIntervalMs: number;
  fillTimeoutMs: number;
  tradeTimeoutMs: number;
  flattenPartialFills: boolean;
  rolloverCheckMs: number;
  settlementIntervalMs: number;
  settlementMinAgeMs: number;
  marketAAsset: string;
  marketBAsset: string;
  windowMinutes: number;
  gammaApiUrl: string;
  clobApiUrl: string;
  chainId: 137 | 80002;
  privateKey?: string;
  funderAddress?: string;
  signatureType: 0 | 1 | 2;
  polyApiCreds?: { key: string; secret: string; passphrase: string };
  port: number;
  apiKey?: string;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`));
  }
  const e = result.data;

  const polyApiCreds =
    e.POLY_API_KEY && e.POLY_SECRET && e.POLY_PASSPHRASE
      ? { key: e.POLY_API_KEY, secret: e.POLY_SECRET, passphrase: e.POLY_PASSPHRASE }
      : undefined;

  return {
    mode: e.MODE,
    logLevel: e.LOG_LEVEL,
    minProfitThreshold: e.MIN_PROFIT_THRESHOLD,
    maxPositionSize: e.MAX_POSITION_SIZE,
    minLegPrice: e.MIN_LEG_PRICE,
    minOrderSize: e.MIN_ORDER_SIZE,
    checkIntervalMs: e.CHECK_INTERVAL_MS,
    // Two missed polls make a quote unusable.
    quoteMaxAgeMs: e.QUOTE_MAX_AGE_MS ?? e.CHECK_INTERVAL_MS * 2,
    quoteTimeoutMs: e.QUOTE_TIMEOUT_MS,
    submitTimeoutMs: e.SUBMIT_TIMEOUT_MS,
    fillPollIntervalMs: e.FILL_POLL_INTERVAL_MS,
    fillTimeoutMs: e.FILL_TIMEOUT_MS,
    tradeTimeoutMs: e.TRADE_TIMEOUT_MS,
    flattenPartialFills: e.FLATTEN_PARTIAL_FILLS,
    rolloverCheckMs: e.ROLLOVER_CHECK_MS,
    settlementIntervalMs: e.SETTLEMENT_INTERVAL_MS,
    settlementMinAgeMs: e.SETTLEMENT_MIN_AGE_MS,
    marketAAsset: e.MARKET_A_ASSET,
    marketBAsset: e.MARKET_B_ASSET,
    windowMinutes: e.WINDOW_MINUTES,
    gammaApiUrl: e.GAMMA_API_URL,
    clobApiUrl: e.CLOB_API_URL,
    chainId: e.CHAIN_ID,
    privateKey: e.PRIVATE_KEY,
    funderAddress: e.FUNDER_ADDRESS,
    signatureType: e.SIGNATURE_TYPE,
    polyApiCreds,
    port: e.PORT,
    apiKey: e.API_KEY,
  };
}
