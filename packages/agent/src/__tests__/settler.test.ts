import { describe, it, expect, vi, beforeEach } from "vitest";
import type { MarketResolution, MarketResolver } from "../clob/types.js";
import { ActiveTrade } from "../execution/trade.js";
import { PositionLedger } from "../ledger/position-ledger.js";
import { log } from "../logger.js";
import { Settler } from "../settlement/settler.js";
import type { Opportunity } from "../types.js";
import { BTC, SOL, makeOpportunity } from "./helpers.js";

vi.mock("../logger.js", () => ({
  log: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const SIZE = 10_000_000n;
const MIN_AGE = 840_000;

function recordTrade(ledger: PositionLedger, id: string, fills: [bigint, bigint], opportunity: Opportunity = makeOpportunity()) {
  const trade = new ActiveTrade({ id, opportunity, size: SIZE, createdAt: 1_000, onTransition: () => {} });
  trade.advance("awaiting_fills", 1_000);
  trade.legs.forEach((leg, i) => {
    leg.filledSize = fills[i];
    leg.status = fills[i] > 0n ? "filled" : "cancelled";
  });
  const filled = fills.filter((f) => f > 0n).length;
  ledger.append(trade.resolve(filled === 2 ? "filled" : filled === 1 ? "partially_filled" : "rejected", 1_100));
}

function resolver(results: Record<string, MarketResolution>) {
  return {
    getResolution: vi.fn(async (marketId: string) => results[marketId] ?? { closed: false }),
  } satisfies MarketResolver;
}

describe("Settler", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("pays a dollar per winning share and books the profit", async () => {
    const ledger = new PositionLedger();
    recordTrade(ledger, "t1", [SIZE, SIZE]);
    const settler = new Settler({
      ledger,
      resolver: resolver({ [SOL.id]: { closed: true, winner: "up" }, [BTC.id]: { closed: true, winner: "up" } }),
      intervalMs: 30_000,
      minAgeMs: MIN_AGE,
      now: () => 900_000,
    });

    const [settlement] = await settler.settleDue();

    // SOL Up won; BTC Down lost. 10 shares pay 10.00 against 8.70 spent.
    expect(settlement).toEqual({
      tradeId: "t1",
      winners: { a: "up", b: "up" },
      payout: 10_000_000n,
      cost: 8_700_000n,
      realizedProfit: 1_300_000n,
      settledAt: 900_000,
    });
    expect(ledger.getAggregates().realizedProfit).toBe(1_300_000n);
    expect(await settler.settleDue()).toEqual([]);
  });

  it("leaves trades alone until they are old enough", async () => {
    const ledger = new PositionLedger();
    recordTrade(ledger, "t1", [SIZE, SIZE]);
    const res = resolver({});
    const settler = new Settler({ ledger, resolver: res, intervalMs: 30_000, minAgeMs: MIN_AGE, now: () => 800_000 });

    expect(await settler.settleDue()).toEqual([]);
    expect(res.getResolution).not.toHaveBeenCalled();
  });

  it("waits for both markets to close", async () => {
    const ledger = new PositionLedger();
    recordTrade(ledger, "t1", [SIZE, SIZE]);
    const results: Record<string, MarketResolution> = { [SOL.id]: { closed: true, winner: "down" } };
    const settler = new Settler({ ledger, resolver: resolver(results), intervalMs: 30_000, minAgeMs: MIN_AGE, now: () => 900_000 });

    expect(await settler.settleDue()).toEqual([]);

    results[BTC.id] = { closed: true, winner: "down" };
    const [settlement] = await settler.settleDue();
    // BTC Down won: 10.00 back on 8.70.
    expect(settlement.realizedProfit).toBe(1_300_000n);
  });

  it("warns when both legs lose", async () => {
    const ledger = new PositionLedger();
    recordTrade(ledger, "t1", [SIZE, SIZE]);
    const settler = new Settler({
      ledger,
      resolver: resolver({ [SOL.id]: { closed: true, winner: "down" }, [BTC.id]: { closed: true, winner: "up" } }),
      intervalMs: 30_000,
      minAgeMs: MIN_AGE,
      now: () => 900_000,
    });

    const [settlement] = await settler.settleDue();

    expect(settlement.payout).toBe(0n);
    expect(settlement.realizedProfit).toBe(-8_700_000n);
    expect(log.warn).toHaveBeenCalledWith("Trade settled at a loss", expect.objectContaining({ profit: "-8.7" }));
  });

  it("settles only the filled leg of a partial trade", async () => {
    const ledger = new PositionLedger();
    recordTrade(ledger, "t1", [SIZE, 0n]);
    const settler = new Settler({
      ledger,
      resolver: resolver({ [SOL.id]: { closed: true, winner: "up" }, [BTC.id]: { closed: true, winner: "down" } }),
      intervalMs: 30_000,
      minAgeMs: MIN_AGE,
      now: () => 900_000,
    });

    const [settlement] = await settler.settleDue();
    // 10.00 back on 4.70 for the SOL leg alone.
    expect(settlement.realizedProfit).toBe(5_300_000n);
  });

  it("skips trades that hold no position", async () => {
    const ledger = new PositionLedger();
    recordTrade(ledger, "t1", [0n, 0n]);
    const settler = new Settler({ ledger, resolver: resolver({}), intervalMs: 30_000, minAgeMs: MIN_AGE, now: () => 900_000 });
    expect(settler.dueTrades()).toEqual([]);
  });

  it("asks once per market per pass and survives a failed lookup", async () => {
    const ledger = new PositionLedger();
    recordTrade(ledger, "t1", [SIZE, SIZE]);
    recordTrade(ledger, "t2", [SIZE, SIZE], makeOpportunity({ versions: { a: 2, b: 2 } }));
    const res = {
      getResolution: vi.fn(async (marketId: string): Promise<MarketResolution> => {
        if (marketId === BTC.id) throw new Error("gateway timeout");
        return { closed: true, winner: "up" };
      }),
    };
    const settler = new Settler({ ledger, resolver: res, intervalMs: 30_000, minAgeMs: MIN_AGE, now: () => 900_000 });

    expect(await settler.settleDue()).toEqual([]);
    expect(res.getResolution).toHaveBeenCalledTimes(2);
    expect(log.warn).toHaveBeenCalledWith("Could not read market resolution", {
      marketId: BTC.id,
      error: "gateway timeout",
    });
  });
});
