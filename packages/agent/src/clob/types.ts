import type { Market, OutcomeSide, Token } from "../types.js";

export type OrderSide = "BUY" | "SELL";

export interface PlaceOrderParams {
  token: Token;
  side: OrderSide;
  /** Limit price, micro-dollars. */
  price: bigint;
  /** Shares, micro-shares. */
  size: bigint;
}

export interface OrderAck {
  orderId: string;
}

export type OrderStatus = "pending" | "filled" | "partially_filled" | "cancelled" | "rejected";

export interface OrderStatusResult {
  orderId: string;
  status: OrderStatus;
  filledSize: bigint;
}

/**
 * Where orders go. `submitOrder` and `cancelOrder` throw on any failure;
 * an acknowledgment means accepted, not filled.
 */
export interface OrderVenue {
  readonly name: string;
  submitOrder(params: PlaceOrderParams): Promise<OrderAck>;
  getOrderStatus(orderId: string): Promise<OrderStatusResult>;
  cancelOrder(orderId: string): Promise<void>;
  /** Best bid, used when flattening a naked leg. */
  getBid?(token: Token): Promise<bigint | null>;
}

/** Best bid for a token; null when the book has none. */
export interface BidSource {
  getBid(token: Token): Promise<bigint | null>;
}

export interface AskPair {
  upAsk: bigint;
  downAsk: bigint;
}

/** Throws `QuoteFetchError` on timeout, rate limiting or a missing market. */
export interface QuoteSource {
  getAsks(market: Market, signal?: AbortSignal): Promise<AskPair>;
}

export interface MarketFinder {
  findMarket(asset: string, windowMinutes: number, nowSec: number, exclude?: ReadonlySet<string>): Promise<Market | null>;
}

export interface MarketResolution {
  closed: boolean;
  winner?: OutcomeSide;
}

export interface MarketResolver {
  getResolution(marketId: string): Promise<MarketResolution>;
}
