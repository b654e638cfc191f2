import type { MarketResolution, MarketResolver } from "../clob/types.js";
import { errorMessage } from "../errors.js";
import type { PositionLedger } from "../ledger/position-ledger.js";
import { log } from "../logger.js";
import { formatUsd } from "../money.js";
import type { ResolvedTrade, Settlement } from "../types.js";

export interface SettlerOptions {
  ledger: PositionLedger;
  resolver: MarketResolver;
  intervalMs: number;
  /** Trades younger than this are not checked; their window has not closed yet. */
  minAgeMs: number;
  now?: () => number;
}

/**
 * Books realized profit for trades whose markets have resolved. Each winning
 * share pays one dollar, so payout is the filled size of the legs that won.
 */
export class Settler {
  private readonly opts: SettlerOptions;
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<Settlement[]> | null = null;

  constructor(opts: SettlerOptions) {
    this.opts = opts;
    this.now = opts.now ?? Date.now;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.running) return;
      this.running = this.settleDue()
        .catch((err) => {
          log.error("Settlement pass failed", { error: errorMessage(err) });
          return [];
        })
        .finally(() => {
          this.running = null;
        });
    }, this.opts.intervalMs);
  }

  async stop(): Promise<void> {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    await this.running;
  }

  /** Trades that hold a position, are old enough, and are not settled yet. */
  dueTrades(now: number = this.now()): ResolvedTrade[] {
    const { ledger, minAgeMs } = this.opts;
    return ledger
      .getTrades()
      .filter((t) => t.committed > 0n && !ledger.isSettled(t.id) && now - t.createdAt >= minAgeMs);
  }

  async settleDue(now: number = this.now()): Promise<Settlement[]> {
    const due = this.dueTrades(now);
    if (due.length === 0) return [];

    // Several trades usually share a market; ask once per market per pass.
    const resolutions = new Map<string, Promise<MarketResolution | null>>();
    const lookup = (marketId: string) => {
      let pending = resolutions.get(marketId);
      if (!pending) {
        pending = this.opts.resolver.getResolution(marketId).catch((err) => {
          log.warn("Could not read market resolution", { marketId, error: errorMessage(err) });
          return null;
        });
        resolutions.set(marketId, pending);
      }
      return pending;
    };

    const settled: Settlement[] = [];
    for (const trade of due) {
      const [legA, legB] = trade.legs;
      const [resA, resB] = await Promise.all([lookup(legA.marketId), lookup(legB.marketId)]);
      if (!resA?.closed || !resA.winner || !resB?.closed || !resB.winner) continue;

      const payout =
        (legA.side === resA.winner ? legA.filledSize : 0n) + (legB.side === resB.winner ? legB.filledSize : 0n);
      const settlement: Settlement = {
        tradeId: trade.id,
        winners: { a: resA.winner, b: resB.winner },
        payout,
        cost: trade.committed,
        realizedProfit: payout - trade.committed,
        settledAt: this.now(),
      };
      this.opts.ledger.recordSettlement(settlement);
      settled.push(settlement);

      const context = {
        tradeId: trade.id,
        winners: `${legA.marketLabel} ${resA.winner} / ${legB.marketLabel} ${resB.winner}`,
        payout: formatUsd(payout),
        cost: formatUsd(trade.committed),
        profit: formatUsd(settlement.realizedProfit),
      };
      if (settlement.realizedProfit < 0n) {
        log.warn("Trade settled at a loss", context);
      } else {
        log.info("Trade settled", context);
      }
    }
    return settled;
  }
}
