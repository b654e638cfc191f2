import { ONE_DOLLAR } from "../money.js";
import type { Combination, Market, Opportunity, Quote, SnapshotRead } from "../types.js";

export interface EvaluatorOptions {
  minProfitThreshold: bigint;
  /** When above zero, a pairing whose two asks are both below it is skipped. */
  minLegPrice?: bigint;
}

interface Candidate {
  combination: Combination;
  a: Quote;
  b: Quote;
}

/**
 * Finds the best Up/Down cross pairing between market A and market B.
 *
 * Only A-Up with B-Down and A-Down with B-Up are valid; same-market pairs are
 * never considered. The candidate order below is the tie-break order.
 */
export class OpportunityEvaluator {
  private readonly minProfitThreshold: bigint;
  private readonly minLegPrice: bigint;

  constructor(opts: EvaluatorOptions) {
    this.minProfitThreshold = opts.minProfitThreshold;
    this.minLegPrice = opts.minLegPrice ?? 0n;
  }

  evaluate(
    marketA: Market,
    snapshotA: SnapshotRead,
    marketB: Market,
    snapshotB: SnapshotRead,
    now: number = Date.now(),
  ): Opportunity | null {
    if (!snapshotA.ready || !snapshotB.ready) return null;
    if (snapshotA.marketId !== marketA.id || snapshotB.marketId !== marketB.id) return null;

    const candidates: Candidate[] = [
      { combination: "A_UP_B_DOWN", a: snapshotA.up, b: snapshotB.down },
      { combination: "A_DOWN_B_UP", a: snapshotA.down, b: snapshotB.up },
    ];

    let best: { candidate: Candidate; cost: bigint; profit: bigint } | null = null;

    for (const candidate of candidates) {
      const cost = candidate.a.ask + candidate.b.ask;
      if (cost >= ONE_DOLLAR) continue;

      const profit = ONE_DOLLAR - cost;
      if (profit < this.minProfitThreshold) continue;

      if (this.minLegPrice > 0n && candidate.a.ask < this.minLegPrice && candidate.b.ask < this.minLegPrice) {
        continue;
      }

      // Strictly greater: an exact tie keeps the earlier pairing.
      if (!best || profit > best.profit) {
        best = { candidate, cost, profit };
      }
    }

    if (!best) return null;

    const { candidate, cost, profit } = best;
    return {
      combination: candidate.combination,
      legA: { market: marketA, token: candidate.a.token, ask: candidate.a.ask },
      legB: { market: marketB, token: candidate.b.token, ask: candidate.b.ask },
      combinedCost: cost,
      profit,
      detectedAt: now,
      versions: { a: snapshotA.version, b: snapshotB.version },
    };
  }
}
