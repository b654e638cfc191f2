import { z } from "zod";
import type { MarketFinder } from "../clob/types.js";
import { log } from "../logger.js";
import { withRetry } from "../retry.js";
import type { Market, OutcomeSide, Token } from "../types.js";

/** Windows before the current one to try when it is not listed yet. */
const LOOKBACK_WINDOWS = 3;

const jsonStringArray = z.string().transform((text, ctx) => {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "not JSON" });
    return z.NEVER;
  }
  const parsed = z.array(z.string()).safeParse(value);
  if (!parsed.success) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "not a string array" });
    return z.NEVER;
  }
  return parsed.data;
});

const gammaMarket = z.object({
  conditionId: z.string(),
  slug: z.string().optional(),
  active: z.boolean().default(true),
  closed: z.boolean().default(false),
  clobTokenIds: jsonStringArray,
  outcomes: jsonStringArray.default('["Up","Down"]'),
});

const gammaEvent = z.object({
  markets: z.array(z.unknown()).default([]),
});

export function windowStart(nowSec: number, windowMinutes: number): number {
  const span = windowMinutes * 60;
  return Math.floor(nowSec / span) * span;
}

export function marketSlug(asset: string, windowMinutes: number, start: number): string {
  return `${asset.toLowerCase()}-updown-${windowMinutes}m-${start}`;
}

/**
 * Finds the live Up/Down market for an asset's current window through the
 * Gamma events API, by its deterministic slug.
 */
export class GammaMarketFinder implements MarketFinder {
  private readonly apiBase: string;
  private readonly timeoutMs: number;

  constructor(params: { apiBase: string; timeoutMs?: number }) {
    this.apiBase = params.apiBase.replace(/\/+$/, "");
    this.timeoutMs = params.timeoutMs ?? 10_000;
  }

  async findMarket(
    asset: string,
    windowMinutes: number,
    nowSec: number,
    exclude: ReadonlySet<string> = new Set(),
  ): Promise<Market | null> {
    const current = windowStart(nowSec, windowMinutes);
    const span = windowMinutes * 60;

    for (let i = 0; i <= LOOKBACK_WINDOWS; i++) {
      const start = current - i * span;
      const slug = marketSlug(asset, windowMinutes, start);
      const market = await this.fetchBySlug(slug, asset, windowMinutes, start);
      if (!market) continue;
      if (exclude.has(market.id)) {
        log.debug("Market excluded, trying earlier window", { slug });
        continue;
      }
      log.info("Found market", { slug, conditionId: market.id });
      return market;
    }

    log.warn("No active market found", { asset, windowMinutes, windowStart: current });
    return null;
  }

  private async fetchBySlug(slug: string, asset: string, windowMinutes: number, start: number): Promise<Market | null> {
    const res = await withRetry(
      async () => {
        const r = await fetch(`${this.apiBase}/events/slug/${encodeURIComponent(slug)}`, {
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        if (r.status >= 500 || r.status === 429) throw new Error(`Gamma HTTP ${r.status} for ${slug}`);
        return r;
      },
      { retries: 2, delayMs: 500, label: `Gamma ${slug}` },
    );
    if (!res.ok) {
      log.debug("Market not listed", { slug, status: res.status });
      return null;
    }

    const event = gammaEvent.safeParse(await res.json());
    if (!event.success || event.data.markets.length === 0) {
      log.warn("Gamma event has no markets", { slug });
      return null;
    }
    const parsed = gammaMarket.safeParse(event.data.markets[0]);
    if (!parsed.success) {
      log.warn("Malformed Gamma market", { slug, error: parsed.error.message });
      return null;
    }
    const m = parsed.data;
    if (!m.active || m.closed) {
      log.debug("Market not tradable", { slug, active: m.active, closed: m.closed });
      return null;
    }

    const tokens: Partial<Record<OutcomeSide, Token>> = {};
    m.outcomes.forEach((outcome, i) => {
      const side = outcome.trim().toLowerCase();
      const id = m.clobTokenIds[i];
      if (id && (side === "up" || side === "down")) {
        tokens[side] = { id, marketId: m.conditionId, side };
      }
    });
    if (!tokens.up || !tokens.down) {
      log.warn("Market is missing an Up or Down token", { slug, outcomes: m.outcomes });
      return null;
    }

    return {
      id: m.conditionId,
      label: `${asset.toUpperCase()}-${windowMinutes}m`,
      asset: asset.toLowerCase(),
      slug: m.slug ?? slug,
      windowStart: start,
      tokens: { up: tokens.up, down: tokens.down },
    };
  }
}
