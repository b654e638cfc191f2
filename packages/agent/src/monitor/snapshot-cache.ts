import type { Market, NotReady, Quote, Snapshot, SnapshotRead } from "../types.js";

interface Entry {
  readonly market: Market;
  readonly up?: Quote;
  readonly down?: Quote;
  readonly version: number;
}

/**
 * Latest quote per token, one entry per market.
 *
 * Each entry is a frozen object and is only ever swapped, never edited, so a
 * reader sees either the old pair or the new one, never half of each.
 */
export class SnapshotCache {
  private entries = new Map<string, Entry>();
  private readonly maxAgeMs: number;

  constructor(maxAgeMs: number) {
    this.maxAgeMs = maxAgeMs;
  }

  register(market: Market): void {
    if (this.entries.has(market.id)) return;
    this.entries.set(market.id, Object.freeze({ market, version: 0 }));
  }

  remove(marketId: string): void {
    this.entries.delete(marketId);
  }

  /**
   * Store `quote` for its token if its sequence is newer than the stored one.
   * Returns whether the cache changed.
   */
  update(marketId: string, quote: Quote): boolean {
    const entry = this.entries.get(marketId);
    if (!entry) return false;

    const side = quote.token.side;
    if (quote.token.marketId !== marketId || entry.market.tokens[side].id !== quote.token.id) {
      return false;
    }

    const current = entry[side];
    if (current && current.sequence >= quote.sequence) return false;

    const stored = Object.freeze({ ...quote });
    const version = entry.version + 1;
    this.entries.set(
      marketId,
      Object.freeze(side === "up" ? { ...entry, up: stored, version } : { ...entry, down: stored, version }),
    );
    return true;
  }

  /** Both sides of one poll, applied as a single swap. */
  updatePair(marketId: string, up: Quote, down: Quote): boolean {
    const entry = this.entries.get(marketId);
    if (!entry) return false;

    if (up.token.id !== entry.market.tokens.up.id || down.token.id !== entry.market.tokens.down.id) return false;

    const nextUp = entry.up && entry.up.sequence >= up.sequence ? entry.up : Object.freeze({ ...up });
    const nextDown = entry.down && entry.down.sequence >= down.sequence ? entry.down : Object.freeze({ ...down });
    if (nextUp === entry.up && nextDown === entry.down) return false;

    this.entries.set(marketId, Object.freeze({ ...entry, up: nextUp, down: nextDown, version: entry.version + 1 }));
    return true;
  }

  read(marketId: string, now: number = Date.now()): SnapshotRead {
    const entry = this.entries.get(marketId);
    if (!entry) return notReady(marketId, "unknown-market");

    const { up, down } = entry;
    if (!up || !down) return notReady(marketId, "missing-quote");

    if (now - up.observedAt > this.maxAgeMs || now - down.observedAt > this.maxAgeMs) {
      return notReady(marketId, "stale");
    }

    const snapshot: Snapshot = { ready: true, marketId, up, down, version: entry.version };
    return snapshot;
  }

  getMarket(marketId: string): Market | undefined {
    return this.entries.get(marketId)?.market;
  }
}

function notReady(marketId: string, reason: NotReady["reason"]): NotReady {
  return { ready: false, marketId, reason };
}
