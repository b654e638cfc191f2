import type { QuoteSource } from "../clob/types.js";
import { QuoteFetchError, TimeoutError, errorMessage, withTimeout } from "../errors.js";
import { log } from "../logger.js";
import type { Market } from "../types.js";
import type { SnapshotCache } from "./snapshot-cache.js";
import type { UpdateChannel } from "./update-channel.js";

export interface PollerOptions {
  source: QuoteSource;
  cache: SnapshotCache;
  channel: UpdateChannel<string>;
  intervalMs: number;
  timeoutMs: number;
  now?: () => number;
}

/**
 * Polls one market's asks on a fixed interval and writes them to the cache.
 * A failed fetch is logged and skipped; the loop carries on with the next tick.
 */
export class MarketPoller {
  private market: Market;
  private readonly opts: PollerOptions;
  private readonly now: () => number;
  private sequence = 0;
  private running = false;
  private loop: Promise<void> | null = null;
  private consecutiveFailures = 0;

  constructor(market: Market, opts: PollerOptions) {
    this.market = market;
    this.opts = opts;
    this.now = opts.now ?? Date.now;
  }

  getMarket(): Market {
    return this.market;
  }

  /** Takes effect on the next poll. */
  setMarket(market: Market): void {
    this.market = market;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.run();
  }

  async stop(): Promise<void> {
    this.running = false;
    await this.loop;
    this.loop = null;
  }

  isRunning(): boolean {
    return this.running;
  }

  /** One fetch-and-store cycle. Returns whether the cache changed. */
  async pollOnce(): Promise<boolean> {
    const market = this.market;
    const sequence = ++this.sequence;
    const { source, cache, channel, timeoutMs } = this.opts;

    try {
      const asks = await withTimeout(
        source.getAsks(market, AbortSignal.timeout(timeoutMs)),
        timeoutMs,
        `quote fetch ${market.label}`,
      );
      const observedAt = this.now();
      const applied = cache.updatePair(
        market.id,
        { token: market.tokens.up, ask: asks.upAsk, observedAt, sequence },
        { token: market.tokens.down, ask: asks.downAsk, observedAt, sequence },
      );
      this.consecutiveFailures = 0;
      if (applied) channel.push(market.id);
      return applied;
    } catch (err) {
      this.consecutiveFailures++;
      const kind = err instanceof QuoteFetchError ? err.kind : err instanceof TimeoutError ? "timeout" : "unknown";
      const context = {
        market: market.label,
        kind,
        failures: this.consecutiveFailures,
        error: errorMessage(err),
      };
      // Escalate after five straight failures.
      if (this.consecutiveFailures >= 5) {
        log.warn("Quote fetch failing repeatedly", context);
      } else {
        log.debug("Quote fetch failed", context);
      }
      return false;
    }
  }

  private async run(): Promise<void> {
    log.info("Poller started", { market: this.market.label, intervalMs: this.opts.intervalMs });
    while (this.running) {
      const started = this.now();
      await this.pollOnce();
      const elapsed = this.now() - started;
      const wait = Math.max(0, this.opts.intervalMs - elapsed);
      if (!this.running) break;
      await new Promise((r) => setTimeout(r, wait));
    }
    log.info("Poller stopped", { market: this.market.label });
  }
}
