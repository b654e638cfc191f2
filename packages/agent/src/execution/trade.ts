import { ONE_DOLLAR, costOf } from "../money.js";
import type {
  FlattenAttempt,
  Opportunity,
  ResolvedTrade,
  TerminalStatus,
  TradeFailureReason,
  TradeLeg,
  TradeStatus,
  TradeTransition,
  TradeView,
} from "../types.js";

const TERMINAL: ReadonlySet<TradeStatus> = new Set<TradeStatus>([
  "filled",
  "partially_filled",
  "rejected",
  "cancelled",
]);

const ALLOWED: Record<TradeStatus, readonly TradeStatus[]> = {
  submitting: ["awaiting_fills", "rejected", "partially_filled", "cancelled"],
  awaiting_fills: ["filled", "partially_filled", "rejected", "cancelled"],
  filled: [],
  partially_filled: [],
  rejected: [],
  cancelled: [],
};

export function isTerminal(status: TradeStatus): status is TerminalStatus {
  return TERMINAL.has(status);
}

export function legHasFill(leg: TradeLeg): boolean {
  return leg.status === "filled" || leg.filledSize > 0n;
}

export function legIsFinal(leg: TradeLeg): boolean {
  return leg.status === "filled" || leg.status === "cancelled" || leg.status === "rejected" || leg.status === "failed";
}

function minFill(a: TradeLeg, b: TradeLeg): bigint {
  return a.filledSize < b.filledSize ? a.filledSize : b.filledSize;
}

/**
 * A trade while it is in flight. Only the coordinator holds one. Resolving it
 * produces a frozen `ResolvedTrade` and seals this object: any later attempt
 * to move it throws.
 */
export class ActiveTrade {
  readonly id: string;
  readonly createdAt: number;
  readonly legs: [TradeLeg, TradeLeg];
  readonly opportunity: Opportunity;
  readonly size: bigint;
  flatten?: FlattenAttempt;

  private _status: TradeStatus = "submitting";
  private _reason?: TradeFailureReason;
  private sealed = false;
  private readonly onTransition: (t: TradeTransition) => void;

  constructor(params: {
    id: string;
    opportunity: Opportunity;
    size: bigint;
    createdAt: number;
    onTransition: (t: TradeTransition) => void;
  }) {
    const { opportunity: opp, size } = params;
    this.id = params.id;
    this.opportunity = opp;
    this.size = size;
    this.createdAt = params.createdAt;
    this.onTransition = params.onTransition;
    this.legs = [
      {
        marketId: opp.legA.market.id,
        marketLabel: opp.legA.market.label,
        tokenId: opp.legA.token.id,
        side: opp.legA.token.side,
        price: opp.legA.ask,
        size,
        filledSize: 0n,
        status: "pending",
      },
      {
        marketId: opp.legB.market.id,
        marketLabel: opp.legB.market.label,
        tokenId: opp.legB.token.id,
        side: opp.legB.token.side,
        price: opp.legB.ask,
        size,
        filledSize: 0n,
        status: "pending",
      },
    ];
  }

  get status(): TradeStatus {
    return this._status;
  }

  get reason(): TradeFailureReason | undefined {
    return this._reason;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  filledLegCount(): number {
    return this.legs.filter(legHasFill).length;
  }

  /** Shares bought on both legs. */
  matchedSize(): bigint {
    return minFill(this.legs[0], this.legs[1]);
  }

  advance(to: "awaiting_fills", at: number): void {
    this.move(to, at);
  }

  /** Moves to a terminal state and returns the immutable record. */
  resolve(to: TerminalStatus, at: number, reason?: TradeFailureReason): ResolvedTrade {
    if (reason) this._reason = reason;
    this.move(to, at);
    this.sealed = true;

    const legs = Object.freeze([
      Object.freeze({ ...this.legs[0] }),
      Object.freeze({ ...this.legs[1] }),
    ] as const);

    const committed = legs.reduce((sum, leg) => sum + costOf(leg.price, leg.filledSize), 0n);

    const resolved: ResolvedTrade = {
      ...this.baseView(minFill(legs[0], legs[1])),
      legs,
      status: to,
      resolvedAt: at,
      committed,
      flatten: this.flatten ? Object.freeze({ ...this.flatten }) : undefined,
    };
    return Object.freeze(resolved);
  }

  view(): TradeView {
    return {
      ...this.baseView(this.size),
      legs: [{ ...this.legs[0] }, { ...this.legs[1] }],
    };
  }

  /** `pairs` is the share count the expected profit is taken over. */
  private baseView(pairs: bigint): Omit<TradeView, "legs"> {
    const opp = this.opportunity;
    return {
      id: this.id,
      status: this._status,
      combination: opp.combination,
      versions: { ...opp.versions },
      combinedCost: opp.combinedCost,
      expectedProfit: costOf(ONE_DOLLAR - opp.combinedCost, pairs),
      createdAt: this.createdAt,
      reason: this._reason,
    };
  }

  private move(to: TradeStatus, at: number): void {
    if (this.sealed) {
      throw new Error(`Trade ${this.id} is already resolved as ${this._status}`);
    }
    const from = this._status;
    if (!ALLOWED[from].includes(to)) {
      throw new Error(`Trade ${this.id}: illegal transition ${from} -> ${to}`);
    }
    this._status = to;
    this.onTransition({ tradeId: this.id, from, to, at, reason: this._reason });
  }
}
