/**
 * In-process counters, gauges and histograms for the refresh cycle.
 */
import type { RefreshErrorKind } from "../refresh/driver.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("Metrics");

const HISTOGRAM_WINDOW = 1000;

export interface HistogramSummary {
  count: number;
  p50: number;
  p95: number;
  p99: number;
}

export interface MetricsSnapshot {
  uptimeMs: number;
  counters: Record<string, number>;
  gauges: Record<string, number>;
  histograms: Record<string, HistogramSummary>;
}

export class Metrics {
  private counters = new Map<string, number>();
  private gauges = new Map<string, number>();
  private histograms = new Map<string, number[]>();
  private readonly startTime: number;

  constructor(private readonly clock: () => number = Date.now) {
    this.startTime = clock();
  }

  /* ---- Counters ---- */

  inc(name: string, delta = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + delta);
  }

  getCounter(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  /* ---- Gauges ---- */

  gauge(name: string, value: number): void {
    this.gauges.set(name, value);
  }

  getGauge(name: string): number {
    return this.gauges.get(name) ?? 0;
  }

  /* ---- Histograms (last HISTOGRAM_WINDOW observations) ---- */

  observe(name: string, value: number): void {
    const arr = this.histograms.get(name) ?? [];
    arr.push(value);
    if (arr.length > HISTOGRAM_WINDOW) arr.shift();
    this.histograms.set(name, arr);
  }

  percentile(name: string, p: number): number {
    const arr = this.histograms.get(name);
    if (!arr || arr.length === 0) return 0;
    const sorted = [...arr].sort((a, b) => a - b);
    const idx = Math.min(Math.ceil((p / 100) * sorted.length) - 1, sorted.length - 1);
    return sorted[Math.max(0, idx)];
  }

  /* ---- Refresh cycle ---- */

  recordRefreshSuccess(elapsedMs: number, skipped: { balances: number; orders: number }): void {
    this.inc("refresh_ok");
    this.observe("refresh_ms", elapsedMs);
    this.gauge("skipped_balance_rows", skipped.balances);
    this.gauge("skipped_order_rows", skipped.orders);
    if (skipped.balances > 0) this.inc("skipped_balance_rows_total", skipped.balances);
    if (skipped.orders > 0) this.inc("skipped_order_rows_total", skipped.orders);
  }

  recordRefreshFailure(kind: RefreshErrorKind): void {
    this.inc("refresh_failed");
    this.inc(`refresh_failed.${kind}`);
  }

  /* ---- Snapshot ---- */

  snapshot(): MetricsSnapshot {
    const histograms: Record<string, HistogramSummary> = {};
    for (const [k, arr] of this.histograms) {
      histograms[k] = {
        count: arr.length,
        p50: this.percentile(k, 50),
        p95: this.percentile(k, 95),
        p99: this.percentile(k, 99),
      };
    }
    return {
      uptimeMs: this.clock() - this.startTime,
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      histograms,
    };
  }

  /** Log current metrics at info level. */
  log(): void {
    logger.info(this.snapshot(), "metrics");
  }
}
