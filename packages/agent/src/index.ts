import { serve } from "@hono/node-server";
import { createServer } from "./api/server.js";
import { ClobQuoteSource } from "./clob/quote-source.js";
import { PolymarketOrderVenue } from "./clob/polymarket-venue.js";
import type { BidSource, OrderVenue } from "./clob/types.js";
import { ConfigError, loadConfig, type Config } from "./config.js";
import { GammaMarketFinder } from "./discovery/gamma.js";
import { ArbitrageEngine } from "./engine.js";
import { errorMessage } from "./errors.js";
import { SimulatedVenue } from "./execution/simulated-venue.js";
import { log, setLogLevel } from "./logger.js";

function createVenue(config: Config, bids: BidSource): OrderVenue {
  if (config.mode === "simulation") return new SimulatedVenue();
  if (!config.privateKey) throw new ConfigError(["PRIVATE_KEY: required in production mode"]);
  return new PolymarketOrderVenue({
    host: config.clobApiUrl,
    chainId: config.chainId,
    privateKey: config.privateKey,
    funderAddress: config.funderAddress,
    signatureType: config.signatureType,
    creds: config.polyApiCreds,
    bids,
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  if (config.mode === "production") {
    log.warn("PRODUCTION MODE: real orders will be placed");
  } else {
    log.info("Simulation mode: orders are filled on paper");
  }

  const quotes = new ClobQuoteSource({ apiBase: config.clobApiUrl, timeoutMs: config.quoteTimeoutMs });
  const venue = createVenue(config, quotes);
  if (venue instanceof PolymarketOrderVenue) await venue.connect();

  const engine = new ArbitrageEngine(config, {
    quotes,
    finder: new GammaMarketFinder({ apiBase: config.gammaApiUrl }),
    venue,
    resolver: quotes,
  });
  await engine.start();

  const app = createServer({
    getStatus: () => engine.getStatus(),
    ledger: engine.ledger,
    apiKey: config.apiKey,
  });
  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info("Status API listening", { port: info.port });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info("Shutting down", { signal });
    engine
      .stop()
      .then(() => {
        server.close();
        process.exit(0);
      })
      .catch((err) => {
        log.error("Shutdown failed", { error: errorMessage(err) });
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    log.error(err.message, { issues: err.issues });
  } else {
    log.error("Fatal error", { error: errorMessage(err) });
  }
  process.exit(1);
});
