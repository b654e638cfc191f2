import { describe, it, expect, vi, beforeEach } from "vitest";
import { PolymarketOrderVenue, type PolymarketVenueParams } from "../clob/polymarket-venue.js";
import { SubmissionFailedError } from "../errors.js";
import { SOL } from "./helpers.js";

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

const clob = vi.hoisted(() => ({
  constructed: new Array<unknown[]>(),
  createAndPostOrder: vi.fn(),
  getOrder: vi.fn(),
  cancelOrder: vi.fn(),
  createOrDeriveApiKey: vi.fn(),
}));

vi.mock("@polymarket/clob-client", () => ({
  ClobClient: class {
    constructor(...args: unknown[]) {
      clob.constructed.push(args);
    }
    createAndPostOrder = clob.createAndPostOrder;
    getOrder = clob.getOrder;
    cancelOrder = clob.cancelOrder;
    createOrDeriveApiKey = clob.createOrDeriveApiKey;
  },
  Chain: { POLYGON: 137, AMOY: 80002 },
  Side: { BUY: "BUY", SELL: "SELL" },
  OrderType: { GTC: "GTC" },
}));

vi.mock("@polymarket/order-utils", () => ({
  SignatureType: { EOA: 0, POLY_PROXY: 1, POLY_GNOSIS_SAFE: 2 },
}));

vi.mock("@ethersproject/wallet", () => ({
  Wallet: class {
    readonly address = "0x1111111111111111111111111111111111111111";
    readonly privateKey: string;
    constructor(privateKey: string) {
      this.privateKey = privateKey;
    }
  },
}));

vi.mock("../logger.js", () => ({
  log: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock("../retry.js", () => ({
  withRetry: vi.fn(async (fn: () => Promise<unknown>) => fn()),
}));

const CREDS = { key: "test-key", secret: "test-secret", passphrase: "test-pass" };

function createVenue(overrides: Partial<PolymarketVenueParams> = {}) {
  return new PolymarketOrderVenue({
    host: "https://clob.test",
    chainId: 137,
    privateKey: "test-private-key",
    funderAddress: "0x2222222222222222222222222222222222222222",
    signatureType: 2,
    creds: CREDS,
    ...overrides,
  });
}

beforeEach(() => {
  vi.clearAllMocks();
  clob.constructed.length = 0;
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("PolymarketOrderVenue.submitOrder", () => {
  it("posts a GTC limit order and returns its id", async () => {
    clob.createAndPostOrder.mockResolvedValue({ success: true, orderID: "0xorder" });
    const venue = createVenue();

    const ack = await venue.submitOrder({ token: SOL.tokens.up, side: "BUY", price: 470_000n, size: 114_940_000n });

    expect(ack).toEqual({ orderId: "0xorder" });
    expect(clob.createAndPostOrder).toHaveBeenCalledWith(
      { tokenID: "cond-sol-up", price: 0.47, size: 114.94, side: "BUY" },
      { tickSize: "0.01" },
      "GTC",
    );
  });

  it("builds the trading client with the configured credentials", async () => {
    clob.createAndPostOrder.mockResolvedValue({ success: true, orderID: "0xorder" });
    await createVenue().submitOrder({ token: SOL.tokens.up, side: "SELL", price: 450_000n, size: 5_000_000n });

    expect(clob.createOrDeriveApiKey).not.toHaveBeenCalled();
    expect(clob.constructed).toHaveLength(1);
    const [host, chain, , creds, signatureType, funder] = clob.constructed[0];
    expect([host, chain, creds, signatureType, funder]).toEqual([
      "https://clob.test",
      137,
      CREDS,
      2,
      "0x2222222222222222222222222222222222222222",
    ]);
  });

  it("derives API credentials when none are configured", async () => {
    clob.createOrDeriveApiKey.mockResolvedValue(CREDS);
    await createVenue({ creds: undefined, chainId: 80002 }).connect();

    expect(clob.createOrDeriveApiKey).toHaveBeenCalledTimes(1);
    expect(clob.constructed).toHaveLength(2);
    expect(clob.constructed[1][1]).toBe(80002);
    expect(clob.constructed[1][3]).toEqual(CREDS);
  });

  it("throws when the venue rejects the order", async () => {
    clob.createAndPostOrder.mockResolvedValue({ success: false, errorMsg: "not enough balance / allowance" });
    const err = await createVenue()
      .submitOrder({ token: SOL.tokens.up, side: "BUY", price: 470_000n, size: 5_000_000n })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SubmissionFailedError);
    expect(err instanceof Error && err.message).toBe("Order rejected: not enough balance / allowance");
  });

  it("throws on an HTTP error carried in the payload", async () => {
    clob.createAndPostOrder.mockResolvedValue({ error: "Unauthorized/Invalid api key", status: 401 });
    await expect(
      createVenue().submitOrder({ token: SOL.tokens.up, side: "BUY", price: 470_000n, size: 5_000_000n }),
    ).rejects.toThrow("CLOB error: Unauthorized/Invalid api key");
  });
});

describe("PolymarketOrderVenue.getOrderStatus", () => {
  it.each([
    [{ status: "MATCHED", original_size: "10", size_matched: "10" }, "filled", 10_000_000n],
    [{ status: "LIVE", original_size: "10", size_matched: "10" }, "filled", 10_000_000n],
    [{ status: "LIVE", original_size: "10", size_matched: "3.5" }, "partially_filled", 3_500_000n],
    [{ status: "CANCELED", original_size: "10", size_matched: "0" }, "cancelled", 0n],
    [{ status: "LIVE", original_size: "10", size_matched: "0" }, "pending", 0n],
  ] as const)("maps %o to %s", async (order, status, filledSize) => {
    clob.getOrder.mockResolvedValue({ id: "0xorder", ...order });
    expect(await createVenue().getOrderStatus("0xorder")).toEqual({ orderId: "0xorder", status, filledSize });
  });

  it("throws on a malformed order", async () => {
    clob.getOrder.mockResolvedValue({ error: "not found" });
    await expect(createVenue().getOrderStatus("0xorder")).rejects.toThrow("Unexpected order status");
  });
});

describe("PolymarketOrderVenue.cancelOrder", () => {
  it("cancels by order id", async () => {
    clob.cancelOrder.mockResolvedValue({ canceled: ["0xorder"], not_canceled: {} });
    await createVenue().cancelOrder("0xorder");
    expect(clob.cancelOrder).toHaveBeenCalledWith({ orderID: "0xorder" });
  });

  it("throws when the venue reports an error", async () => {
    clob.cancelOrder.mockResolvedValue({ error: "order not found" });
    await expect(createVenue().cancelOrder("0xorder")).rejects.toThrow("Cancel 0xorder failed");
  });
});

describe("PolymarketOrderVenue.getBid", () => {
  it("reads the bid from its bid source", async () => {
    const getBid = vi.fn().mockResolvedValue(450_000n);
    const venue = createVenue({ bids: { getBid } });

    expect(await venue.getBid(SOL.tokens.up)).toBe(450_000n);
    expect(getBid).toHaveBeenCalledWith(SOL.tokens.up);
    expect(clob.constructed).toHaveLength(0);
  });

  it("has no bid without a bid source", async () => {
    expect(await createVenue().getBid(SOL.tokens.up)).toBeNull();
  });
});
