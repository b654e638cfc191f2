import { Hono } from "hono";
import { cors } from "hono/cors";
import type { PositionLedger } from "../ledger/position-ledger.js";
import { formatUsd } from "../money.js";
import type { EngineStatus } from "../types.js";

type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

/** Bigints become decimal dollar strings; undefined fields are dropped. */
export function toJson(value: unknown): Json {
  if (typeof value === "bigint") return formatUsd(value);
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) return value.map(toJson);
  if (typeof value === "object") {
    const result: { [key: string]: Json } = {};
    for (const [key, field] of Object.entries(value)) {
      if (field !== undefined) result[key] = toJson(field);
    }
    return result;
  }
  return null;
}

export interface ServerDeps {
  getStatus: () => EngineStatus;
  ledger: PositionLedger;
  /** When set, every request must carry `Authorization: Bearer <apiKey>`. */
  apiKey?: string;
}

export function createServer({ getStatus, ledger, apiKey }: ServerDeps): Hono {
  const app = new Hono();

  app.use("*", cors());

  app.use("*", async (c, next) => {
    if (apiKey) {
      const auth = c.req.header("Authorization");
      if (auth !== `Bearer ${apiKey}`) {
        return c.json({ error: "unauthorized" }, 401);
      }
    }
    await next();
  });

  app.get("/api/status", (c) => {
    return c.json(toJson(getStatus()));
  });

  app.get("/api/trades", (c) => {
    const status = c.req.query("status");
    const trades = status ? ledger.getTrades().filter((t) => t.status === status) : ledger.getTrades();
    return c.json(toJson(trades));
  });

  app.get("/api/trades/:id", (c) => {
    const trade = ledger.getTrade(c.req.param("id"));
    if (!trade) return c.json({ error: "not found" }, 404);
    return c.json(toJson({ ...trade, transitions: ledger.getTransitions(trade.id) }));
  });

  app.get("/api/ledger", (c) => {
    return c.json(
      toJson({
        aggregates: ledger.getAggregates(),
        transitions: ledger.getTransitions(),
        settlements: ledger.getSettlements(),
      }),
    );
  });

  return app;
}
