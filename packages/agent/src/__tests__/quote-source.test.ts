import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ClobQuoteSource } from "../clob/quote-source.js";
import { QuoteFetchError } from "../errors.js";
import { SOL } from "./helpers.js";

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

function mockResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

const API_BASE = "https://clob.test";

let mockFetch: ReturnType<typeof vi.fn>;

beforeEach(() => {
  mockFetch = vi.fn();
  vi.stubGlobal("fetch", mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("ClobQuoteSource.getAsks", () => {
  it("reads the BUY price of each token", async () => {
    mockFetch.mockImplementation(async (url: string) =>
      mockResponse({ price: url.includes("cond-sol-up") ? "0.47" : "0.55" }),
    );
    const source = new ClobQuoteSource({ apiBase: `${API_BASE}/` });

    const asks = await source.getAsks(SOL);

    expect(asks).toEqual({ upAsk: 470_000n, downAsk: 550_000n });
    expect(mockFetch.mock.calls.map(([url]) => url)).toEqual([
      `${API_BASE}/price?side=BUY&token_id=cond-sol-up`,
      `${API_BASE}/price?side=BUY&token_id=cond-sol-down`,
    ]);
  });

  it("accepts numeric prices", async () => {
    mockFetch.mockResolvedValue(mockResponse({ price: 0.4 }));
    const asks = await new ClobQuoteSource({ apiBase: API_BASE }).getAsks(SOL);
    expect(asks.upAsk).toBe(400_000n);
  });

  it.each([
    [404, "not_found"],
    [429, "rate_limited"],
    [500, "http"],
  ] as const)("maps HTTP %i to %s", async (status, kind) => {
    mockFetch.mockResolvedValue(mockResponse({ error: "nope" }, status));
    const err = await new ClobQuoteSource({ apiBase: API_BASE }).getAsks(SOL).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(QuoteFetchError);
    expect(err instanceof QuoteFetchError && err.kind).toBe(kind);
  });

  it("reports an aborted request as a timeout", async () => {
    const aborted = new Error("This operation was aborted");
    aborted.name = "AbortError";
    mockFetch.mockRejectedValue(aborted);
    const err = await new ClobQuoteSource({ apiBase: API_BASE }).getAsks(SOL).catch((e: unknown) => e);
    expect(err instanceof QuoteFetchError && err.kind).toBe("timeout");
  });

  it("rejects a body without a price", async () => {
    mockFetch.mockResolvedValue(mockResponse({ mid: "0.5" }));
    await expect(new ClobQuoteSource({ apiBase: API_BASE }).getAsks(SOL)).rejects.toThrow("Malformed price");
  });
});

describe("ClobQuoteSource.getBid", () => {
  it("reads the SELL price", async () => {
    mockFetch.mockResolvedValue(mockResponse({ price: "0.45" }));
    const bid = await new ClobQuoteSource({ apiBase: API_BASE }).getBid(SOL.tokens.up);
    expect(bid).toBe(450_000n);
    expect(mockFetch.mock.calls[0][0]).toBe(`${API_BASE}/price?side=SELL&token_id=cond-sol-up`);
  });

  it("returns null when the book is gone", async () => {
    mockFetch.mockResolvedValue(mockResponse({}, 404));
    expect(await new ClobQuoteSource({ apiBase: API_BASE }).getBid(SOL.tokens.up)).toBeNull();
  });
});

describe("ClobQuoteSource.getResolution", () => {
  it("reports the winning outcome of a closed market", async () => {
    mockFetch.mockResolvedValue(
      mockResponse({
        condition_id: "cond-sol",
        closed: true,
        tokens: [
          { token_id: "cond-sol-up", outcome: "Up", price: 0, winner: false },
          { token_id: "cond-sol-down", outcome: "Down", price: 1, winner: true },
        ],
      }),
    );

    const resolution = await new ClobQuoteSource({ apiBase: API_BASE }).getResolution("cond-sol");

    expect(resolution).toEqual({ closed: true, winner: "down" });
    expect(mockFetch.mock.calls[0][0]).toBe(`${API_BASE}/markets/cond-sol`);
  });

  it("has no winner while the market is open", async () => {
    mockFetch.mockResolvedValue(
      mockResponse({
        closed: false,
        tokens: [
          { token_id: "cond-sol-up", outcome: "Up", winner: false },
          { token_id: "cond-sol-down", outcome: "Down", winner: false },
        ],
      }),
    );
    expect(await new ClobQuoteSource({ apiBase: API_BASE }).getResolution("cond-sol")).toEqual({
      closed: false,
      winner: undefined,
    });
  });
});
