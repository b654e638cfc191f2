import { z } from "zod";
import { QuoteFetchError, errorMessage } from "../errors.js";
import { toMicros } from "../money.js";
import type { Market, OutcomeSide, Token } from "../types.js";
import type { AskPair, BidSource, MarketResolution, MarketResolver, QuoteSource } from "./types.js";

const priceSchema = z.object({
  price: z.union([z.string(), z.number()]),
});

const marketSchema = z.object({
  closed: z.boolean().default(false),
  tokens: z
    .array(
      z.object({
        token_id: z.string(),
        outcome: z.string(),
        winner: z.boolean().default(false),
      }),
    )
    .default([]),
});

function outcomeSide(outcome: string): OutcomeSide | undefined {
  const o = outcome.trim().toLowerCase();
  if (o === "up") return "up";
  if (o === "down") return "down";
  return undefined;
}

/**
 * Public CLOB price and market endpoints. The best ask is what a BUY would
 * pay (`side=BUY`), the best bid what a SELL would get.
 */
export class ClobQuoteSource implements QuoteSource, BidSource, MarketResolver {
  private readonly apiBase: string;
  private readonly timeoutMs: number;

  constructor(params: { apiBase: string; timeoutMs?: number }) {
    this.apiBase = params.apiBase.replace(/\/+$/, "");
    this.timeoutMs = params.timeoutMs ?? 5_000;
  }

  async getAsks(market: Market, signal?: AbortSignal): Promise<AskPair> {
    const [upAsk, downAsk] = await Promise.all([
      this.getPrice(market.tokens.up.id, "BUY", signal),
      this.getPrice(market.tokens.down.id, "BUY", signal),
    ]);
    return { upAsk, downAsk };
  }

  async getBid(token: Token): Promise<bigint | null> {
    try {
      return await this.getPrice(token.id, "SELL");
    } catch (err) {
      if (err instanceof QuoteFetchError && err.kind === "not_found") return null;
      throw err;
    }
  }

  async getResolution(marketId: string): Promise<MarketResolution> {
    const body = await this.getJson(`/markets/${encodeURIComponent(marketId)}`);
    const parsed = marketSchema.safeParse(body);
    if (!parsed.success) {
      throw new QuoteFetchError("http", `Malformed market ${marketId}: ${parsed.error.message}`);
    }
    const { closed, tokens } = parsed.data;
    const winning = tokens.find((t) => t.winner);
    return { closed, winner: winning ? outcomeSide(winning.outcome) : undefined };
  }

  private async getPrice(tokenId: string, side: "BUY" | "SELL", signal?: AbortSignal): Promise<bigint> {
    const body = await this.getJson(`/price?side=${side}&token_id=${encodeURIComponent(tokenId)}`, signal);
    const parsed = priceSchema.safeParse(body);
    if (!parsed.success) {
      throw new QuoteFetchError("http", `Malformed price for token ${tokenId}`);
    }
    try {
      return toMicros(parsed.data.price);
    } catch (err) {
      throw new QuoteFetchError("http", `Unparseable price for token ${tokenId}: ${errorMessage(err)}`);
    }
  }

  private async getJson(path: string, signal?: AbortSignal): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(`${this.apiBase}${path}`, {
        signal: signal ?? AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError")) {
        throw new QuoteFetchError("timeout", `GET ${path} timed out`);
      }
      throw new QuoteFetchError("http", `GET ${path} failed: ${errorMessage(err)}`);
    }

    if (res.status === 404) throw new QuoteFetchError("not_found", `GET ${path}: not found`);
    if (res.status === 429) throw new QuoteFetchError("rate_limited", `GET ${path}: rate limited`);
    if (!res.ok) throw new QuoteFetchError("http", `GET ${path}: HTTP ${res.status}`);

    return res.json();
  }
}
