import type {
  LedgerAggregates,
  ResolvedTrade,
  Settlement,
  TerminalStatus,
  TradeTransition,
} from "../types.js";

function versionKey(versions: { a: number; b: number }, marketA: string, marketB: string): string {
  return `${marketA}:${versions.a}|${marketB}:${versions.b}`;
}

/**
 * Append-only record of trades. Entries are frozen on the way in and never
 * replaced; the aggregates are folded in as each record arrives.
 */
export class PositionLedger {
  private trades: ResolvedTrade[] = [];
  private transitions: TradeTransition[] = [];
  private settlements = new Map<string, Settlement>();
  private attempted = new Set<string>();

  private aggregates: LedgerAggregates = {
    tradeCount: 0,
    byStatus: { filled: 0, partially_filled: 0, rejected: 0, cancelled: 0 },
    committedCapital: 0n,
    expectedProfit: 0n,
    realizedProfit: 0n,
    partialFillIncidents: 0,
    settledCount: 0,
  };

  /** Marks an opportunity as acted on. Returns false if it already was. */
  markAttempted(versions: { a: number; b: number }, marketA: string, marketB: string): boolean {
    const key = versionKey(versions, marketA, marketB);
    if (this.attempted.has(key)) return false;
    this.attempted.add(key);
    return true;
  }

  hasAttempted(versions: { a: number; b: number }, marketA: string, marketB: string): boolean {
    return this.attempted.has(versionKey(versions, marketA, marketB));
  }

  recordTransition(transition: TradeTransition): void {
    this.transitions.push(Object.freeze({ ...transition }));
  }

  append(trade: ResolvedTrade): void {
    if (!Object.isFrozen(trade)) {
      throw new Error(`Trade ${trade.id} must be resolved before it is recorded`);
    }
    if (this.trades.some((t) => t.id === trade.id)) {
      throw new Error(`Trade ${trade.id} already recorded`);
    }

    this.trades.push(trade);

    const agg = this.aggregates;
    const status: TerminalStatus = trade.status;
    agg.tradeCount++;
    agg.byStatus[status]++;
    agg.committedCapital += trade.committed;
    if (status === "filled") agg.expectedProfit += trade.expectedProfit;
    if (status === "partially_filled") agg.partialFillIncidents++;
  }

  recordSettlement(settlement: Settlement): void {
    if (this.settlements.has(settlement.tradeId)) {
      throw new Error(`Trade ${settlement.tradeId} already settled`);
    }
    this.settlements.set(settlement.tradeId, Object.freeze({ ...settlement }));
    this.aggregates.realizedProfit += settlement.realizedProfit;
    this.aggregates.settledCount++;
  }

  isSettled(tradeId: string): boolean {
    return this.settlements.has(tradeId);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getAggregates(): LedgerAggregates {
    return { ...this.aggregates, byStatus: { ...this.aggregates.byStatus } };
  }

  getTrades(): readonly ResolvedTrade[] {
    return [...this.trades];
  }

  getTrade(id: string): ResolvedTrade | undefined {
    return this.trades.find((t) => t.id === id);
  }

  getTransitions(tradeId?: string): readonly TradeTransition[] {
    return tradeId ? this.transitions.filter((t) => t.tradeId === tradeId) : [...this.transitions];
  }

  getSettlements(): readonly Settlement[] {
    return [...this.settlements.values()];
  }
}
