import { describe, it, expect } from "vitest";
import { ActiveTrade } from "../execution/trade.js";
import { PositionLedger } from "../ledger/position-ledger.js";
import type { ResolvedTrade, TerminalStatus } from "../types.js";
import { makeOpportunity } from "./helpers.js";

const SIZE = 10_000_000n;

function resolvedTrade(id: string, status: TerminalStatus, fills: [bigint, bigint]): ResolvedTrade {
  const trade = new ActiveTrade({ id, opportunity: makeOpportunity(), size: SIZE, createdAt: 1_000, onTransition: () => {} });
  trade.legs[0].filledSize = fills[0];
  trade.legs[1].filledSize = fills[1];
  if (status !== "rejected") trade.advance("awaiting_fills", 1_050);
  return trade.resolve(status, 1_100);
}

describe("PositionLedger", () => {
  it("folds each trade into the aggregates", () => {
    const ledger = new PositionLedger();
    ledger.append(resolvedTrade("t1", "filled", [SIZE, SIZE]));
    ledger.append(resolvedTrade("t2", "partially_filled", [SIZE, 0n]));
    ledger.append(resolvedTrade("t3", "rejected", [0n, 0n]));

    const agg = ledger.getAggregates();
    expect(agg.tradeCount).toBe(3);
    expect(agg.byStatus).toEqual({ filled: 1, partially_filled: 1, rejected: 1, cancelled: 0 });
    // 8.70 for the pair plus 4.70 for the naked SOL leg
    expect(agg.committedCapital).toBe(13_400_000n);
    expect(agg.expectedProfit).toBe(1_300_000n);
    expect(agg.partialFillIncidents).toBe(1);
  });

  it("refuses the same trade twice", () => {
    const ledger = new PositionLedger();
    const trade = resolvedTrade("t1", "filled", [SIZE, SIZE]);
    ledger.append(trade);
    expect(() => ledger.append(trade)).toThrow("already recorded");
  });

  it("refuses a record that is still mutable", () => {
    const ledger = new PositionLedger();
    const trade = resolvedTrade("t1", "filled", [SIZE, SIZE]);
    expect(() => ledger.append({ ...trade })).toThrow("must be resolved");
  });

  it("hands out copies of its aggregates", () => {
    const ledger = new PositionLedger();
    ledger.getAggregates().byStatus.filled = 99;
    expect(ledger.getAggregates().byStatus.filled).toBe(0);
  });

  it("marks an opportunity version pair only once", () => {
    const ledger = new PositionLedger();
    expect(ledger.markAttempted({ a: 1, b: 2 }, "A", "B")).toBe(true);
    expect(ledger.markAttempted({ a: 1, b: 2 }, "A", "B")).toBe(false);
    expect(ledger.hasAttempted({ a: 1, b: 3 }, "A", "B")).toBe(false);
  });

  it("books a settlement once and adds its realized profit", () => {
    const ledger = new PositionLedger();
    const settlement = {
      tradeId: "t1",
      winners: { a: "up" as const, b: "up" as const },
      payout: SIZE,
      cost: 8_700_000n,
      realizedProfit: 1_300_000n,
      settledAt: 2_000,
    };
    ledger.recordSettlement(settlement);

    expect(ledger.isSettled("t1")).toBe(true);
    expect(ledger.getAggregates().realizedProfit).toBe(1_300_000n);
    expect(ledger.getAggregates().settledCount).toBe(1);
    expect(() => ledger.recordSettlement(settlement)).toThrow("already settled");
  });

  it("filters transitions by trade", () => {
    const ledger = new PositionLedger();
    ledger.recordTransition({ tradeId: "t1", from: "idle", to: "submitting", at: 1 });
    ledger.recordTransition({ tradeId: "t2", from: "idle", to: "submitting", at: 2 });
    expect(ledger.getTransitions("t2")).toEqual([{ tradeId: "t2", from: "idle", to: "submitting", at: 2 }]);
    expect(ledger.getTransitions()).toHaveLength(2);
  });
});
