import { OpportunityEvaluator } from "./arbitrage/evaluator.js";
import type { MarketFinder, MarketResolver, OrderVenue, QuoteSource } from "./clob/types.js";
import type { Config } from "./config.js";
import { windowStart } from "./discovery/gamma.js";
import { errorMessage } from "./errors.js";
import { ExecutionCoordinator } from "./execution/coordinator.js";
import { PositionLedger } from "./ledger/position-ledger.js";
import { log } from "./logger.js";
import { formatUsd } from "./money.js";
import { MarketPoller } from "./monitor/poller.js";
import { SnapshotCache } from "./monitor/snapshot-cache.js";
import { UpdateChannel } from "./monitor/update-channel.js";
import { Settler } from "./settlement/settler.js";
import type { EngineStatus, Market, NakedLegExposure, Opportunity } from "./types.js";

export type EngineConfig = Pick<
  Config,
  | "mode"
  | "minProfitThreshold"
  | "maxPositionSize"
  | "minLegPrice"
  | "minOrderSize"
  | "checkIntervalMs"
  | "quoteMaxAgeMs"
  | "quoteTimeoutMs"
  | "submitTimeoutMs"
  | "fillPollIntervalMs"
  | "fillTimeoutMs"
  | "tradeTimeoutMs"
  | "flattenPartialFills"
  | "rolloverCheckMs"
  | "settlementIntervalMs"
  | "settlementMinAgeMs"
  | "marketAAsset"
  | "marketBAsset"
  | "windowMinutes"
>;

export interface EngineDeps {
  quotes: QuoteSource;
  finder: MarketFinder;
  venue: OrderVenue;
  resolver: MarketResolver;
  ledger?: PositionLedger;
  onNakedExposure?: (event: NakedLegExposure) => void;
  now?: () => number;
}

export class ArbitrageEngine {
  private readonly config: EngineConfig;
  private readonly deps: EngineDeps;
  private readonly now: () => number;

  readonly ledger: PositionLedger;
  readonly cache: SnapshotCache;
  private readonly channel = new UpdateChannel<string>();
  private readonly evaluator: OpportunityEvaluator;
  private readonly coordinator: ExecutionCoordinator;
  private readonly settler: Settler;

  private marketA: Market | null = null;
  private marketB: Market | null = null;
  private pollerA: MarketPoller | null = null;
  private pollerB: MarketPoller | null = null;

  private running = false;
  private evaluationLoop: Promise<void> | null = null;
  private rolloverTimer: ReturnType<typeof setInterval> | null = null;
  private rollover: Promise<boolean> | null = null;
  private submissions = new Set<Promise<void>>();
  private lastEvaluation = 0;
  private lastOpportunity: Opportunity | null = null;

  constructor(config: EngineConfig, deps: EngineDeps) {
    this.config = config;
    this.deps = deps;
    this.now = deps.now ?? Date.now;
    this.ledger = deps.ledger ?? new PositionLedger();
    this.cache = new SnapshotCache(config.quoteMaxAgeMs);
    this.evaluator = new OpportunityEvaluator({
      minProfitThreshold: config.minProfitThreshold,
      minLegPrice: config.minLegPrice,
    });
    this.coordinator = new ExecutionCoordinator({
      venue: deps.venue,
      ledger: this.ledger,
      maxPositionSize: config.maxPositionSize,
      minOrderSize: config.minOrderSize,
      submitTimeoutMs: config.submitTimeoutMs,
      fillPollIntervalMs: config.fillPollIntervalMs,
      fillTimeoutMs: config.fillTimeoutMs,
      tradeTimeoutMs: config.tradeTimeoutMs,
      flattenPartialFills: config.flattenPartialFills,
      onNakedExposure: deps.onNakedExposure,
      now: this.now,
    });
    this.settler = new Settler({
      ledger: this.ledger,
      resolver: deps.resolver,
      intervalMs: config.settlementIntervalMs,
      minAgeMs: config.settlementMinAgeMs,
      now: this.now,
    });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Discovers both markets unless given, then starts polling, evaluation, rollover and settlement. */
  async start(markets?: { a: Market; b: Market }): Promise<void> {
    if (this.running) return;
    const { a, b } = markets ?? (await this.discoverPair(new Set()));
    if (a.id === b.id) throw new Error(`Markets A and B resolve to the same condition ${a.id}`);

    this.marketA = a;
    this.marketB = b;
    this.cache.register(a);
    this.cache.register(b);

    const pollerOpts = {
      source: this.deps.quotes,
      cache: this.cache,
      channel: this.channel,
      intervalMs: this.config.checkIntervalMs,
      timeoutMs: this.config.quoteTimeoutMs,
      now: this.now,
    };
    this.pollerA = new MarketPoller(a, pollerOpts);
    this.pollerB = new MarketPoller(b, pollerOpts);

    this.running = true;
    this.pollerA.start();
    this.pollerB.start();
    this.evaluationLoop = this.runEvaluationLoop();

    this.rolloverTimer = setInterval(() => {
      if (this.rollover) return;
      this.rollover = this.checkRollover()
        .catch((err) => {
          log.error("Rollover check failed", { error: errorMessage(err) });
          return false;
        })
        .finally(() => {
          this.rollover = null;
        });
    }, this.config.rolloverCheckMs);
    this.settler.start();

    log.info("Engine started", {
      mode: this.config.mode,
      venue: this.deps.venue.name,
      marketA: `${a.label} ${a.slug}`,
      marketB: `${b.label} ${b.slug}`,
      minProfit: formatUsd(this.config.minProfitThreshold),
      maxPosition: formatUsd(this.config.maxPositionSize),
    });
  }

  /**
   * Stops polling and evaluation, lets any in-flight trade reach a terminal
   * state, and waits for every background loop.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    log.info("Engine stopping");

    if (this.rolloverTimer) clearInterval(this.rolloverTimer);
    this.rolloverTimer = null;

    await Promise.all([this.pollerA?.stop(), this.pollerB?.stop()]);
    this.channel.close();
    await this.evaluationLoop;
    await this.coordinator.stop();
    await Promise.all([...this.submissions]);
    await this.rollover;
    await this.settler.stop();

    const agg = this.ledger.getAggregates();
    log.info("Engine stopped", {
      trades: agg.tradeCount,
      committed: formatUsd(agg.committedCapital),
      expectedProfit: formatUsd(agg.expectedProfit),
      realizedProfit: formatUsd(agg.realizedProfit),
      partialFills: agg.partialFillIncidents,
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  getStatus(): EngineStatus {
    return {
      mode: this.config.mode,
      running: this.running,
      markets: { a: this.marketA, b: this.marketB },
      inFlight: this.coordinator.getState(),
      lastEvaluation: this.lastEvaluation,
      lastOpportunity: this.lastOpportunity,
      aggregates: this.ledger.getAggregates(),
    };
  }

  // ---------------------------------------------------------------------------
  // Evaluation
  // ---------------------------------------------------------------------------

  private async runEvaluationLoop(): Promise<void> {
    for (;;) {
      const batch = await this.channel.next();
      if (batch === null) break;
      this.evaluate();
    }
  }

  /** Reads both snapshots once and hands any opportunity to the coordinator. */
  evaluate(): Opportunity | null {
    const a = this.marketA;
    const b = this.marketB;
    if (!a || !b) return null;

    const now = this.now();
    this.lastEvaluation = now;
    const opportunity = this.evaluator.evaluate(a, this.cache.read(a.id, now), b, this.cache.read(b.id, now), now);
    if (!opportunity) return null;

    this.lastOpportunity = opportunity;
    if (!this.coordinator.isIdle() || this.coordinator.isStopping()) return opportunity;
    if (this.ledger.hasAttempted(opportunity.versions, a.id, b.id)) return opportunity;

    log.info("Arbitrage opportunity", {
      combination: opportunity.combination,
      combinedCost: formatUsd(opportunity.combinedCost),
      profit: formatUsd(opportunity.profit),
    });

    const submission = this.coordinator
      .submit(opportunity)
      .then(() => undefined)
      .catch((err) => {
        log.error("Trade execution failed", { error: errorMessage(err) });
      })
      .finally(() => {
        this.submissions.delete(submission);
      });
    this.submissions.add(submission);
    return opportunity;
  }

  // ---------------------------------------------------------------------------
  // Market windows
  // ---------------------------------------------------------------------------

  /** Swaps in the next window's markets once the current window has ended. */
  async checkRollover(): Promise<boolean> {
    const a = this.marketA;
    const b = this.marketB;
    if (!a || !b) return false;

    const current = windowStart(Math.floor(this.now() / 1000), this.config.windowMinutes);
    if (a.windowStart === current && b.windowStart === current) return false;

    log.info("Market window ended, looking for the next one", { windowStart: current });
    const next = await this.discoverPair(new Set([a.id, b.id])).catch((err) => {
      log.warn("Next markets not available yet", { error: errorMessage(err) });
      return null;
    });
    if (!next || !this.running) return false;

    this.cache.register(next.a);
    this.cache.register(next.b);
    this.pollerA?.setMarket(next.a);
    this.pollerB?.setMarket(next.b);
    this.marketA = next.a;
    this.marketB = next.b;
    this.cache.remove(a.id);
    this.cache.remove(b.id);

    log.info("Rolled over to new markets", {
      marketA: `${next.a.label} ${next.a.slug}`,
      marketB: `${next.b.label} ${next.b.slug}`,
    });
    return true;
  }

  private async discoverPair(exclude: ReadonlySet<string>): Promise<{ a: Market; b: Market }> {
    const { finder } = this.deps;
    const { marketAAsset, marketBAsset, windowMinutes } = this.config;
    const nowSec = Math.floor(this.now() / 1000);

    const a = await finder.findMarket(marketAAsset, windowMinutes, nowSec, exclude);
    if (!a) throw new Error(`No active ${marketAAsset} market`);
    const b = await finder.findMarket(marketBAsset, windowMinutes, nowSec, new Set([...exclude, a.id]));
    if (!b) throw new Error(`No active ${marketBAsset} market`);
    return { a, b };
  }
}
