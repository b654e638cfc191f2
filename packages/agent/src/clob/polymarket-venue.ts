import { Wallet } from "@ethersproject/wallet";
import { Chain, ClobClient, OrderType, Side, type ApiKeyCreds } from "@polymarket/clob-client";
import { SignatureType } from "@polymarket/order-utils";
import { z } from "zod";
import { SubmissionFailedError } from "../errors.js";
import { log } from "../logger.js";
import { formatUsd, toMicros, toNumber } from "../money.js";
import { withRetry } from "../retry.js";
import type { Token } from "../types.js";
import type { BidSource, OrderAck, OrderStatusResult, OrderVenue, PlaceOrderParams } from "./types.js";

const SIGNATURE_TYPES = [SignatureType.EOA, SignatureType.POLY_PROXY, SignatureType.POLY_GNOSIS_SAFE] as const;

// The client reports HTTP failures in the payload instead of throwing.
const postOrderResponse = z.object({
  success: z.boolean().optional(),
  errorMsg: z.string().optional(),
  orderID: z.string().optional(),
  orderId: z.string().optional(),
  error: z.unknown().optional(),
});

const openOrderResponse = z.object({
  id: z.string().optional(),
  status: z.string(),
  original_size: z.union([z.string(), z.number()]),
  size_matched: z.union([z.string(), z.number()]),
});

export interface PolymarketVenueParams {
  host: string;
  chainId: 137 | 80002;
  privateKey: string;
  funderAddress?: string;
  signatureType: 0 | 1 | 2;
  creds?: ApiKeyCreds;
  /** Where flattening reads the current bid. */
  bids?: BidSource;
}

/** Live order routing through the Polymarket CLOB. */
export class PolymarketOrderVenue implements OrderVenue {
  readonly name = "polymarket";
  private readonly params: PolymarketVenueParams;
  private client: Promise<ClobClient> | null = null;

  constructor(params: PolymarketVenueParams) {
    this.params = params;
  }

  /** Builds the trading client, deriving API credentials when none were configured. */
  async connect(): Promise<void> {
    await this.getClient();
  }

  async submitOrder(params: PlaceOrderParams): Promise<OrderAck> {
    const client = await this.getClient();
    const raw: unknown = await client.createAndPostOrder(
      {
        tokenID: params.token.id,
        price: toNumber(params.price),
        size: toNumber(params.size),
        side: params.side === "BUY" ? Side.BUY : Side.SELL,
      },
      { tickSize: "0.01" },
      OrderType.GTC,
    );

    const parsed = postOrderResponse.safeParse(raw);
    if (!parsed.success) {
      throw new SubmissionFailedError(`Unexpected order response: ${parsed.error.message}`);
    }
    const res = parsed.data;
    if (res.error !== undefined) {
      throw new SubmissionFailedError(`CLOB error: ${typeof res.error === "string" ? res.error : JSON.stringify(res.error)}`);
    }
    const orderId = res.orderID ?? res.orderId;
    if (res.success === false || res.errorMsg || !orderId) {
      throw new SubmissionFailedError(`Order rejected: ${res.errorMsg || "no order id returned"}`);
    }

    log.info("Order placed", {
      orderId,
      side: params.side,
      outcome: params.token.side,
      price: formatUsd(params.price),
      size: formatUsd(params.size),
    });
    return { orderId };
  }

  async getOrderStatus(orderId: string): Promise<OrderStatusResult> {
    const client = await this.getClient();
    const raw: unknown = await withRetry(() => client.getOrder(orderId), {
      retries: 2,
      delayMs: 200,
      label: `getOrder ${orderId}`,
    });

    const parsed = openOrderResponse.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Unexpected order status for ${orderId}: ${parsed.error.message}`);
    }
    const order = parsed.data;
    const original = toMicros(String(order.original_size));
    const matched = toMicros(String(order.size_matched));
    const status = order.status.toUpperCase();

    if (status === "MATCHED" || (original > 0n && matched >= original)) {
      return { orderId, status: "filled", filledSize: matched > 0n ? matched : original };
    }
    if (status.startsWith("CANCEL")) {
      return { orderId, status: "cancelled", filledSize: matched };
    }
    if (matched > 0n) {
      return { orderId, status: "partially_filled", filledSize: matched };
    }
    return { orderId, status: "pending", filledSize: 0n };
  }

  async getBid(token: Token): Promise<bigint | null> {
    return this.params.bids ? this.params.bids.getBid(token) : null;
  }

  async cancelOrder(orderId: string): Promise<void> {
    const client = await this.getClient();
    const raw: unknown = await client.cancelOrder({ orderID: orderId });
    const parsed = z.object({ error: z.unknown().optional() }).passthrough().safeParse(raw);
    if (parsed.success && parsed.data.error !== undefined) {
      throw new Error(`Cancel ${orderId} failed: ${JSON.stringify(parsed.data.error)}`);
    }
    log.info("Order cancelled", { orderId });
  }

  private getClient(): Promise<ClobClient> {
    if (!this.client) {
      this.client = this.createClient();
      // Let a failed connection be retried on the next call.
      void this.client.catch(() => {
        this.client = null;
      });
    }
    return this.client;
  }

  private async createClient(): Promise<ClobClient> {
    const { host, chainId, privateKey, funderAddress, signatureType } = this.params;
    const chain = chainId === 80002 ? Chain.AMOY : Chain.POLYGON;
    const signer = new Wallet(privateKey.startsWith("0x") ? privateKey : `0x${privateKey}`);

    let creds = this.params.creds;
    if (!creds) {
      log.info("No CLOB API credentials configured, deriving from wallet");
      const bootstrap = new ClobClient(host, chain, signer);
      creds = await withRetry(() => bootstrap.createOrDeriveApiKey(), {
        retries: 2,
        delayMs: 1000,
        label: "createOrDeriveApiKey",
      });
    }

    log.info("CLOB client ready", { host, chainId, signer: signer.address, funder: funderAddress });
    return new ClobClient(host, chain, signer, creds, SIGNATURE_TYPES[signatureType], funderAddress);
  }
}
