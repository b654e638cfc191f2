import type { OrderVenue } from "../clob/types.js";
import { errorMessage, withTimeout } from "../errors.js";
import type { PositionLedger } from "../ledger/position-ledger.js";
import { log } from "../logger.js";
import { formatUsd, sizeForBudget } from "../money.js";
import type {
  NakedLegExposure,
  Opportunity,
  ResolvedTrade,
  TerminalStatus,
  TradeFailureReason,
  TradeLeg,
  TradeView,
} from "../types.js";
import { ActiveTrade, legHasFill, legIsFinal } from "./trade.js";

function heavierLeg(legs: readonly [TradeLeg, TradeLeg]): 0 | 1 {
  return legs[0].filledSize >= legs[1].filledSize ? 0 : 1;
}

function unhedgedSize(legs: readonly [TradeLeg, TradeLeg]): bigint {
  const [a, b] = legs;
  return a.filledSize > b.filledSize ? a.filledSize - b.filledSize : b.filledSize - a.filledSize;
}

export interface CoordinatorOptions {
  venue: OrderVenue;
  ledger: PositionLedger;
  /** Dollars committed across both legs, micro-dollars. */
  maxPositionSize: bigint;
  /** Smallest order the venue takes, micro-shares. */
  minOrderSize: bigint;
  submitTimeoutMs: number;
  fillPollIntervalMs: number;
  /** How long to wait for both legs to fill once acknowledged. */
  fillTimeoutMs: number;
  /**
   * Hard bound on a trade from submission to resolution. Every venue call
   * after submission is cut short to fit inside it.
   */
  tradeTimeoutMs: number;
  /** Try one SELL of a naked leg after a partial fill. */
  flattenPartialFills: boolean;
  onNakedExposure?: (event: NakedLegExposure) => void;
  now?: () => number;
}

/** The single in-flight trade, or nothing. */
export class TradeSlot {
  private trade: ActiveTrade | null = null;

  claim(trade: ActiveTrade): boolean {
    if (this.trade) return false;
    this.trade = trade;
    return true;
  }

  current(): ActiveTrade | null {
    return this.trade;
  }

  release(trade: ActiveTrade): void {
    if (this.trade === trade) this.trade = null;
  }
}

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/** Reasons a one-sided outcome keeps; anything else is reported as naked exposure. */
const KEPT_ON_PARTIAL: ReadonlySet<TradeFailureReason> = new Set<TradeFailureReason>([
  "fill_timeout",
  "trade_timeout",
  "stopped",
]);

/**
 * Drives paired BUY orders through submission, fill confirmation and
 * resolution, one trade at a time. Opportunities that arrive while a trade
 * is in flight are dropped, never queued.
 */
export class ExecutionCoordinator {
  private readonly opts: CoordinatorOptions;
  private readonly venue: OrderVenue;
  private readonly ledger: PositionLedger;
  private readonly slot: TradeSlot;
  private readonly now: () => number;
  private stopping = false;
  private inFlight: Promise<ResolvedTrade> | null = null;
  private tradeSeq = 0;

  constructor(opts: CoordinatorOptions, slot: TradeSlot = new TradeSlot()) {
    this.opts = opts;
    this.venue = opts.venue;
    this.ledger = opts.ledger;
    this.slot = slot;
    this.now = opts.now ?? Date.now;
  }

  getState(): "idle" | TradeView {
    const trade = this.slot.current();
    return trade ? trade.view() : "idle";
  }

  isIdle(): boolean {
    return this.slot.current() === null;
  }

  isStopping(): boolean {
    return this.stopping;
  }

  /**
   * Attempt to trade `opportunity`. Resolves with the recorded trade, or null
   * when the opportunity was dropped without placing anything.
   */
  async submit(opportunity: Opportunity): Promise<ResolvedTrade | null> {
    if (this.stopping) {
      log.debug("Coordinator stopping, dropping opportunity");
      return null;
    }
    if (this.slot.current()) {
      log.debug("Trade in flight, dropping opportunity", { versions: opportunity.versions });
      return null;
    }

    const size = sizeForBudget(this.opts.maxPositionSize, opportunity.combinedCost);
    if (size < this.opts.minOrderSize) {
      log.info("Position size below venue minimum, skipping", {
        size: formatUsd(size),
        minOrderSize: formatUsd(this.opts.minOrderSize),
      });
      return null;
    }

    const marketA = opportunity.legA.market.id;
    const marketB = opportunity.legB.market.id;
    if (!this.ledger.markAttempted(opportunity.versions, marketA, marketB)) {
      log.debug("Opportunity already attempted", { versions: opportunity.versions });
      return null;
    }

    const createdAt = this.now();
    const trade = new ActiveTrade({
      id: `trade-${createdAt}-${++this.tradeSeq}`,
      opportunity,
      size,
      createdAt,
      onTransition: (t) => this.ledger.recordTransition(t),
    });
    this.slot.claim(trade);
    this.ledger.recordTransition({ tradeId: trade.id, from: "idle", to: "submitting", at: createdAt });

    log.info("Executing arbitrage", {
      tradeId: trade.id,
      combination: opportunity.combination,
      legA: `${opportunity.legA.market.label} ${opportunity.legA.token.side} @ ${formatUsd(opportunity.legA.ask)}`,
      legB: `${opportunity.legB.market.label} ${opportunity.legB.token.side} @ ${formatUsd(opportunity.legB.ask)}`,
      combinedCost: formatUsd(opportunity.combinedCost),
      profitPerPair: formatUsd(opportunity.profit),
      size: formatUsd(size),
    });

    const run = this.execute(trade);
    this.inFlight = run;
    try {
      return await run;
    } finally {
      if (this.inFlight === run) this.inFlight = null;
    }
  }

  /** Stop taking opportunities; resolves once any in-flight trade has settled. */
  async stop(): Promise<void> {
    this.stopping = true;
    if (this.inFlight) {
      log.info("Waiting for in-flight trade to settle before stopping");
      await this.inFlight;
    }
  }

  // ---------------------------------------------------------------------------
  // Protocol
  // ---------------------------------------------------------------------------

  private async execute(trade: ActiveTrade): Promise<ResolvedTrade> {
    const deadline = trade.createdAt + this.opts.tradeTimeoutMs;
    try {
      const acknowledged = await this.submitLegs(trade, deadline);
      if (!acknowledged) {
        return await this.abortSubmission(trade, deadline);
      }
      trade.advance("awaiting_fills", this.now());
      return await this.awaitFills(trade, deadline);
    } catch (err) {
      log.error("Unexpected failure while executing trade", { tradeId: trade.id, error: errorMessage(err) });
      if (trade.isSealed()) {
        this.slot.release(trade);
        throw err;
      }
      const reason: TradeFailureReason =
        this.now() >= deadline ? "trade_timeout" : trade.status === "submitting" ? "submission_failed" : "fill_timeout";
      return this.settle(trade, reason, deadline);
    }
  }

  private async submitLegs(trade: ActiveTrade, deadline: number): Promise<boolean> {
    const timeoutMs = Math.max(1, this.callTimeout(deadline));

    // Both legs go out together; the venue may still accept them one at a time.
    const results = await Promise.allSettled(
      trade.legs.map((leg, i) => {
        leg.status = "submitting";
        return withTimeout(
          this.venue.submitOrder({
            token: { id: leg.tokenId, marketId: leg.marketId, side: leg.side },
            side: "BUY",
            price: leg.price,
            size: leg.size,
          }),
          timeoutMs,
          `submit leg ${i === 0 ? "A" : "B"}`,
        );
      }),
    );

    results.forEach((result, i) => {
      const leg = trade.legs[i];
      if (result.status === "fulfilled") {
        leg.orderId = result.value.orderId;
        leg.status = "acknowledged";
      } else {
        leg.status = "failed";
        leg.error = errorMessage(result.reason);
      }
    });

    return results.every((r) => r.status === "fulfilled");
  }

  /** One leg never got acknowledged: pull the other before declaring the trade rejected. */
  private async abortSubmission(trade: ActiveTrade, deadline: number): Promise<ResolvedTrade> {
    log.warn("Order submission failed", {
      tradeId: trade.id,
      legA: trade.legs[0].error ?? trade.legs[0].status,
      legB: trade.legs[1].error ?? trade.legs[1].status,
    });

    await Promise.all(trade.legs.map((leg) => (leg.orderId ? this.cancelAndRefresh(trade, leg, deadline) : undefined)));

    return this.settle(trade, "submission_failed", deadline);
  }

  private async awaitFills(trade: ActiveTrade, deadline: number): Promise<ResolvedTrade> {
    const fillBound = this.now() + this.opts.fillTimeoutMs;
    const fillDeadline = Math.min(fillBound, deadline);
    const expiry: TradeFailureReason = fillBound > deadline ? "trade_timeout" : "fill_timeout";
    const [legA, legB] = trade.legs;

    for (;;) {
      await Promise.all(trade.legs.map((leg) => this.refreshLeg(trade, leg, deadline)));

      log.debug("Fill poll status", {
        tradeId: trade.id,
        statusA: legA.status,
        statusB: legB.status,
        filledA: legA.filledSize,
        filledB: legB.filledSize,
      });

      if (legA.status === "filled" && legB.status === "filled") {
        return this.settle(trade, undefined, deadline);
      }
      if (legIsFinal(legA) && legIsFinal(legB)) {
        return this.settle(trade, "legs_dead", deadline);
      }

      const deadA = legIsFinal(legA) && !legHasFill(legA);
      const deadB = legIsFinal(legB) && !legHasFill(legB);
      if (deadA || deadB) {
        // The survivor cannot be hedged any more; pull it.
        await this.cancelOpenLegs(trade, deadline);
        return this.settle(trade, trade.filledLegCount() === 0 ? "legs_dead" : "naked_leg_exposure", deadline);
      }

      if (this.stopping || this.now() >= fillDeadline) break;
      await sleep(Math.max(1, Math.min(this.opts.fillPollIntervalMs, fillDeadline - this.now())));
    }

    const reason: TradeFailureReason = this.stopping ? "stopped" : expiry;
    log.warn(reason === "stopped" ? "Stopping with trade unresolved, cancelling open legs" : "Fill timeout", {
      tradeId: trade.id,
      reason,
      statusA: legA.status,
      statusB: legB.status,
    });

    await this.cancelOpenLegs(trade, deadline);
    return this.settle(trade, reason, deadline);
  }

  // ---------------------------------------------------------------------------
  // Venue calls
  // ---------------------------------------------------------------------------

  /** Time left for one venue call: the submission timeout, clipped to the trade deadline. */
  private callTimeout(deadline: number): number {
    return Math.max(0, Math.min(this.opts.submitTimeoutMs, deadline - this.now()));
  }

  private async refreshLeg(trade: ActiveTrade, leg: TradeLeg, deadline: number): Promise<void> {
    if (!leg.orderId || legIsFinal(leg)) return;
    try {
      const result = await withTimeout(
        this.venue.getOrderStatus(leg.orderId),
        this.callTimeout(deadline),
        `order status ${leg.orderId}`,
      );
      if (result.filledSize > leg.filledSize) leg.filledSize = result.filledSize;
      switch (result.status) {
        case "filled":
          leg.status = "filled";
          if (leg.filledSize === 0n) leg.filledSize = leg.size;
          break;
        case "partially_filled":
          leg.status = "partially_filled";
          break;
        case "cancelled":
          leg.status = "cancelled";
          break;
        case "rejected":
          leg.status = "rejected";
          break;
        case "pending":
          break;
      }
    } catch (err) {
      // Unknown is not unfilled: keep polling until the deadline forces a decision.
      log.warn("Order status check failed", { tradeId: trade.id, orderId: leg.orderId, error: errorMessage(err) });
    }
  }

  private async cancelOpenLegs(trade: ActiveTrade, deadline: number): Promise<void> {
    await Promise.all(
      trade.legs.map((leg) => (legIsFinal(leg) ? undefined : this.cancelAndRefresh(trade, leg, deadline))),
    );
  }

  private async cancelAndRefresh(trade: ActiveTrade, leg: TradeLeg, deadline: number): Promise<void> {
    if (!leg.orderId) return;
    try {
      await withTimeout(this.venue.cancelOrder(leg.orderId), this.callTimeout(deadline), `cancel ${leg.orderId}`);
    } catch (err) {
      leg.error = `cancel failed: ${errorMessage(err)}`;
      log.error("Failed to cancel order", { tradeId: trade.id, orderId: leg.orderId, error: errorMessage(err) });
    }

    // A cancel can race a fill; read back what actually happened.
    await this.refreshLeg(trade, leg, deadline);
    if (!legIsFinal(leg)) {
      leg.status = legHasFill(leg) ? "partially_filled" : "cancelled";
    }
  }

  // ---------------------------------------------------------------------------
  // Resolution
  // ---------------------------------------------------------------------------

  /**
   * Picks the terminal state from the fill quantities, records it, and frees
   * the slot. Only equal, non-zero fills on both legs count as filled; any
   * difference leaves the excess unhedged.
   */
  private async settle(
    trade: ActiveTrade,
    reason: TradeFailureReason | undefined,
    deadline: number,
  ): Promise<ResolvedTrade> {
    const unhedged = unhedgedSize(trade.legs);

    let status: TerminalStatus;
    if (unhedged === 0n && trade.matchedSize() > 0n) {
      status = "filled";
      reason = undefined;
    } else if (unhedged > 0n) {
      status = "partially_filled";
      reason = reason && KEPT_ON_PARTIAL.has(reason) ? reason : "naked_leg_exposure";
      await this.handleNakedLeg(trade, deadline);
    } else if (reason === "stopped") {
      status = "cancelled";
    } else {
      status = "rejected";
    }

    const resolved = trade.resolve(status, this.now(), reason);
    this.ledger.append(resolved);

    if (status === "partially_filled") this.reportNakedExposure(resolved);

    this.ledger.recordTransition({ tradeId: trade.id, from: status, to: "idle", at: this.now() });
    this.slot.release(trade);

    const context = {
      tradeId: trade.id,
      status,
      reason,
      committed: formatUsd(resolved.committed),
      expectedProfit: status === "filled" ? formatUsd(resolved.expectedProfit) : undefined,
    };
    if (status === "filled") log.info("Trade filled", context);
    else if (status === "partially_filled") log.error("Trade resolved with naked leg", context);
    else log.warn("Trade resolved without position", context);

    return resolved;
  }

  /** One SELL of the unhedged shares on the heavier leg, at the bid or the entry price. */
  private async handleNakedLeg(trade: ActiveTrade, deadline: number): Promise<void> {
    if (!this.opts.flattenPartialFills) return;

    const legIndex = heavierLeg(trade.legs);
    const leg = trade.legs[legIndex];
    const size = unhedgedSize(trade.legs);
    const token = { id: leg.tokenId, marketId: leg.marketId, side: leg.side };

    let price = leg.price;
    if (this.venue.getBid) {
      try {
        const bid = await withTimeout(this.venue.getBid(token), this.callTimeout(deadline), `bid ${leg.tokenId}`);
        if (bid !== null && bid > 0n) price = bid;
      } catch (err) {
        log.warn("Could not read bid for flattening, using entry price", { tradeId: trade.id, error: errorMessage(err) });
      }
    }

    trade.flatten = { legIndex, price, size };
    try {
      const ack = await withTimeout(
        this.venue.submitOrder({ token, side: "SELL", price, size }),
        this.callTimeout(deadline),
        "flatten naked leg",
      );
      trade.flatten.orderId = ack.orderId;
      log.warn("Flatten order placed for naked leg", {
        tradeId: trade.id,
        orderId: ack.orderId,
        price: formatUsd(price),
        size: formatUsd(size),
      });
    } catch (err) {
      trade.flatten.error = errorMessage(err);
      log.error("Flatten order failed", { tradeId: trade.id, error: errorMessage(err) });
    }
  }

  private reportNakedExposure(trade: ResolvedTrade): void {
    const filledIndex = heavierLeg(trade.legs);
    const event: NakedLegExposure = {
      tradeId: trade.id,
      filledLeg: trade.legs[filledIndex],
      unfilledLeg: trade.legs[filledIndex === 0 ? 1 : 0],
      unhedgedSize: unhedgedSize(trade.legs),
      flatten: trade.flatten,
      at: trade.resolvedAt,
    };

    log.error("CRITICAL: naked leg exposure", {
      tradeId: trade.id,
      filled: `${event.filledLeg.marketLabel} ${event.filledLeg.side}`,
      filledSize: formatUsd(event.filledLeg.filledSize),
      unhedgedSize: formatUsd(event.unhedgedSize),
      unfilled: `${event.unfilledLeg.marketLabel} ${event.unfilledLeg.side}`,
      flattenOrderId: trade.flatten?.orderId,
    });

    if (!this.opts.onNakedExposure) return;
    try {
      this.opts.onNakedExposure(event);
    } catch (err) {
      log.error("Naked exposure handler threw", { tradeId: trade.id, error: errorMessage(err) });
    }
  }
}
