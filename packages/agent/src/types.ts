export type OutcomeSide = "up" | "down";

export interface Token {
  id: string;
  marketId: string;
  side: OutcomeSide;
}

export interface Market {
  /** Condition id on the venue. */
  id: string;
  /** Human label, e.g. "SOL-15m". */
  label: string;
  asset: string;
  slug: string;
  /** Unix seconds at which the market's window opened. */
  windowStart: number;
  tokens: { up: Token; down: Token };
}

/** Best ask for one token. Prices are micro-dollars (6 decimals). */
export interface Quote {
  token: Token;
  ask: bigint;
  observedAt: number;
  sequence: number;
}

export interface Snapshot {
  ready: true;
  marketId: string;
  up: Quote;
  down: Quote;
  /** Bumped on every applied update for this market. */
  version: number;
}

export type NotReadyReason = "unknown-market" | "missing-quote" | "stale";

export interface NotReady {
  ready: false;
  marketId: string;
  reason: NotReadyReason;
}

export type SnapshotRead = Snapshot | NotReady;

export type Combination = "A_UP_B_DOWN" | "A_DOWN_B_UP";

export interface OpportunityLeg {
  market: Market;
  token: Token;
  ask: bigint;
}

export interface Opportunity {
  combination: Combination;
  legA: OpportunityLeg;
  legB: OpportunityLeg;
  combinedCost: bigint;
  profit: bigint;
  detectedAt: number;
  versions: { a: number; b: number };
}

// ---------------------------------------------------------------------------
// Trades
// ---------------------------------------------------------------------------

export type TradeStatus =
  | "submitting"
  | "awaiting_fills"
  | "filled"
  | "partially_filled"
  | "rejected"
  | "cancelled";

export type TerminalStatus = Extract<TradeStatus, "filled" | "partially_filled" | "rejected" | "cancelled">;

export type LegStatus =
  | "pending"
  | "submitting"
  | "acknowledged"
  | "partially_filled"
  | "filled"
  | "cancelled"
  | "rejected"
  | "failed";

export type TradeFailureReason =
  | "submission_failed"
  | "fill_timeout"
  | "legs_dead"
  | "naked_leg_exposure"
  | "trade_timeout"
  | "stopped";

export interface TradeLeg {
  marketId: string;
  marketLabel: string;
  tokenId: string;
  side: OutcomeSide;
  price: bigint;
  size: bigint;
  filledSize: bigint;
  orderId?: string;
  status: LegStatus;
  error?: string;
}

export interface FlattenAttempt {
  legIndex: 0 | 1;
  price: bigint;
  size: bigint;
  orderId?: string;
  error?: string;
}

export interface TradeView {
  id: string;
  status: TradeStatus;
  combination: Combination;
  versions: { a: number; b: number };
  legs: readonly [TradeLeg, TradeLeg];
  combinedCost: bigint;
  /** Over the requested size while in flight; over the hedged shares once resolved. */
  expectedProfit: bigint;
  createdAt: number;
  reason?: TradeFailureReason;
}

export interface ResolvedTrade extends TradeView {
  status: TerminalStatus;
  resolvedAt: number;
  /** Cost of what actually filled. Zero when nothing filled. */
  committed: bigint;
  flatten?: FlattenAttempt;
}

export interface TradeTransition {
  tradeId: string;
  from: TradeStatus | "idle";
  to: TradeStatus | "idle";
  at: number;
  reason?: TradeFailureReason;
}

export interface NakedLegExposure {
  tradeId: string;
  /** The leg that filled more. */
  filledLeg: TradeLeg;
  unfilledLeg: TradeLeg;
  /** Shares on `filledLeg` with no hedge on the other side. */
  unhedgedSize: bigint;
  flatten?: FlattenAttempt;
  at: number;
}

// ---------------------------------------------------------------------------
// Ledger / status
// ---------------------------------------------------------------------------

export interface Settlement {
  tradeId: string;
  winners: { a: OutcomeSide; b: OutcomeSide };
  payout: bigint;
  cost: bigint;
  realizedProfit: bigint;
  settledAt: number;
}

export interface LedgerAggregates {
  tradeCount: number;
  byStatus: Record<TerminalStatus, number>;
  committedCapital: bigint;
  expectedProfit: bigint;
  realizedProfit: bigint;
  partialFillIncidents: number;
  settledCount: number;
}

export type ExecutionMode = "simulation" | "production";

export interface EngineStatus {
  mode: ExecutionMode;
  running: boolean;
  markets: { a: Market | null; b: Market | null };
  inFlight: "idle" | TradeView;
  /** When the evaluator last ran, epoch ms; 0 before the first run. */
  lastEvaluation: number;
  lastOpportunity: Opportunity | null;
  aggregates: LedgerAggregates;
}
