import type { Market, Opportunity, Quote, Snapshot } from "../types.js";

export function makeMarket(id: string, asset: string, windowStart = 1_700_000_100): Market {
  return {
    id,
    label: `${asset.toUpperCase()}-15m`,
    asset,
    slug: `${asset}-updown-15m-${windowStart}`,
    windowStart,
    tokens: {
      up: { id: `${id}-up`, marketId: id, side: "up" },
      down: { id: `${id}-down`, marketId: id, side: "down" },
    },
  };
}

export function makeQuote(market: Market, side: "up" | "down", ask: bigint, observedAt = 1_000, sequence = 1): Quote {
  return { token: market.tokens[side], ask, observedAt, sequence };
}

export function makeSnapshot(market: Market, upAsk: bigint, downAsk: bigint, version = 1, observedAt = 1_000): Snapshot {
  return {
    ready: true,
    marketId: market.id,
    up: makeQuote(market, "up", upAsk, observedAt),
    down: makeQuote(market, "down", downAsk, observedAt),
    version,
  };
}

export const SOL = makeMarket("cond-sol", "sol");
export const BTC = makeMarket("cond-btc", "btc");

/** A_UP_B_DOWN at 0.47 + 0.40 unless overridden. */
export function makeOpportunity(overrides: Partial<Opportunity> = {}): Opportunity {
  return {
    combination: "A_UP_B_DOWN",
    legA: { market: SOL, token: SOL.tokens.up, ask: 470_000n },
    legB: { market: BTC, token: BTC.tokens.down, ask: 400_000n },
    combinedCost: 870_000n,
    profit: 130_000n,
    detectedAt: 1_000,
    versions: { a: 1, b: 1 },
    ...overrides,
  };
}
