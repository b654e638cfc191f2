import type { OrderAck, OrderStatusResult, OrderVenue, PlaceOrderParams } from "../clob/types.js";
import { formatUsd } from "../money.js";
import { log } from "../logger.js";

interface SimulatedOrder {
  params: PlaceOrderParams;
  status: OrderStatusResult["status"];
}

/**
 * Paper venue for simulation mode. Every order is accepted and reported filled
 * at its limit price on the first status check. Nothing leaves the process.
 */
export class SimulatedVenue implements OrderVenue {
  readonly name = "simulation";
  private orders = new Map<string, SimulatedOrder>();
  private seq = 0;

  async submitOrder(params: PlaceOrderParams): Promise<OrderAck> {
    const orderId = `sim-${++this.seq}`;
    this.orders.set(orderId, { params, status: "pending" });
    log.info("[SIM] Order placed", {
      orderId,
      side: params.side,
      token: params.token.id,
      outcome: params.token.side,
      price: formatUsd(params.price),
      size: formatUsd(params.size),
    });
    return { orderId };
  }

  async getOrderStatus(orderId: string): Promise<OrderStatusResult> {
    const order = this.orders.get(orderId);
    if (!order) throw new Error(`Unknown simulated order ${orderId}`);
    if (order.status === "pending") order.status = "filled";
    return {
      orderId,
      status: order.status,
      filledSize: order.status === "filled" ? order.params.size : 0n,
    };
  }

  async cancelOrder(orderId: string): Promise<void> {
    const order = this.orders.get(orderId);
    if (!order) throw new Error(`Unknown simulated order ${orderId}`);
    if (order.status === "pending") order.status = "cancelled";
  }

  /** Everything submitted so far, oldest first. */
  getSubmitted(): readonly PlaceOrderParams[] {
    return [...this.orders.values()].map((o) => o.params);
  }
}
