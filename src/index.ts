import type http from "node:http";
import { loadBranding, loadSettings } from "./config/load.js";
import type { Settings } from "./config/schema.js";
import { DashboardPipeline, type DashboardState } from "./dashboard/pipeline.js";
import { startDashboard } from "./dashboard/server.js";
import { ExchangeClient, type FetchLike } from "./exchange/client.js";
import { buildFadePalette } from "./model/palette.js";
import { HealthMonitor } from "./monitoring/health.js";
import { Metrics } from "./monitoring/metrics.js";
import { RefreshDriver } from "./refresh/driver.js";
import { createLogger, setLogLevel } from "./utils/logger.js";

const logger = createLogger("Main");

/** Log metrics every this many cycles. */
const METRICS_LOG_INTERVAL = 10;

export interface App {
  settings: Settings;
  client: ExchangeClient;
  pipeline: DashboardPipeline;
  driver: RefreshDriver<DashboardState>;
  metrics: Metrics;
  health: HealthMonitor;
}

/** Wire the client, pipeline and refresh driver for `settings`. Nothing is started. */
export function createApp(settings: Settings, fetchImpl?: FetchLike): App {
  const client = new ExchangeClient({
    baseUrl: settings.api.baseUrl,
    apiKey: settings.api.apiKey,
    timeoutMs: settings.api.timeoutMs,
    slider: settings.slider,
    fetchImpl,
  });
  const pipeline = new DashboardPipeline(client, settings);
  const metrics = new Metrics();
  const health = new HealthMonitor(settings.refreshIntervalMs);

  const driver = new RefreshDriver<DashboardState>(() => pipeline.load(), {
    intervalMs: settings.refreshIntervalMs,
    onCycleStart: () => health.markCycleStart(),
    onSuccess: (state, elapsedMs) => {
      health.markCycleEnd(true);
      metrics.recordRefreshSuccess(elapsedMs, {
        balances: state.portfolio.skipped,
        orders: state.orders.skipped,
      });
      metrics.gauge("equity", state.portfolio.equityValue);
      metrics.gauge("orders_shown", state.orders.records.length);
      logCadence(metrics);
    },
    onFailure: (error) => {
      health.markCycleEnd(false);
      metrics.recordRefreshFailure(error.kind);
      logCadence(metrics);
    },
  });

  return { settings, client, pipeline, driver, metrics, health };
}

function logCadence(metrics: Metrics): void {
  const cycles = metrics.getCounter("refresh_ok") + metrics.getCounter("refresh_failed");
  if (cycles % METRICS_LOG_INTERVAL === 0) {
    metrics.gauge("memory_mb", Math.round(process.memoryUsage().rss / 1024 / 1024));
    metrics.log();
  }
}

export async function main(): Promise<void> {
  /* ---- Load env & settings ---- */
  const settings = loadSettings();
  setLogLevel(settings.logLevel);
  const branding = loadBranding(settings);

  logger.info(
    { apiUrl: settings.api.baseUrl, quoteAsset: settings.quoteAsset, advancedDetails: settings.advancedDetails },
    "Starting exchange dashboard"
  );

  /* ---- Wire up services ---- */
  const app = createApp(settings);
  const palette = buildFadePalette(settings.staleness.levels);

  const server: http.Server = await startDashboard({
    settings,
    branding,
    palette,
    client: app.client,
    pipeline: app.pipeline,
    driver: app.driver,
    metrics: app.metrics,
    health: app.health,
  });

  app.driver.start();

  /* ---- Graceful shutdown ---- */
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutting down");
    app.driver.stop();
    server.close((err) => {
      if (err) logger.error({ err: err.message }, "Server close failed");
      app.metrics.log();
      process.exit(err ? 1 : 0);
    });
    server.closeAllConnections();
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}
