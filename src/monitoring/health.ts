import { createLogger } from "../utils/logger.js";

const logger = createLogger("Health");

export interface HealthStatus {
  uptime: number;
  uptimeHuman: string;
  lastCycleMs: number;
  cyclesPerHour: number;
  consecutiveFailures: number;
  lastSuccessAgoMs: number | null;
  memoryMB: number;
  healthy: boolean;
  checks: Record<string, boolean>;
}

/**
 * Tracks dashboard health: refresh cadence, consecutive failures, memory.
 * Data counts as current while the last success is within `staleAfterCycles`
 * refresh intervals.
 */
export class HealthMonitor {
  private startTime: number;
  private lastCycleStart = 0;
  private lastCycleEnd = 0;
  private lastSuccess: number | null = null;
  private cycleCount = 0;
  private consecutiveFailures = 0;
  private hourStartedAt: number;
  private cyclesInCurrentHour = 0;

  constructor(
    private readonly refreshIntervalMs: number,
    private readonly staleAfterCycles = 3,
    private readonly clock: () => number = Date.now
  ) {
    this.startTime = clock();
    this.hourStartedAt = this.startTime;
  }

  markCycleStart(): void {
    const now = this.clock();
    this.lastCycleStart = now;
    this.cycleCount++;

    if (now - this.hourStartedAt > 3_600_000) {
      this.hourStartedAt = now;
      this.cyclesInCurrentHour = 0;
    }
    this.cyclesInCurrentHour++;
  }

  markCycleEnd(ok: boolean): void {
    this.lastCycleEnd = this.clock();
    if (ok) {
      this.lastSuccess = this.lastCycleEnd;
      this.consecutiveFailures = 0;
    } else {
      this.consecutiveFailures++;
    }
  }

  status(extraChecks: Record<string, boolean> = {}): HealthStatus {
    const now = this.clock();
    const uptime = now - this.startTime;
    const hours = Math.floor(uptime / 3_600_000);
    const mins = Math.floor((uptime % 3_600_000) / 60_000);

    const lastCycleMs = this.lastCycleEnd >= this.lastCycleStart ? this.lastCycleEnd - this.lastCycleStart : 0;
    const lastSuccessAgoMs = this.lastSuccess === null ? null : now - this.lastSuccess;

    const mem = process.memoryUsage();

    const checks: Record<string, boolean> = {
      refreshRunning: this.cycleCount > 0,
      dataCurrent:
        lastSuccessAgoMs !== null && lastSuccessAgoMs <= this.refreshIntervalMs * this.staleAfterCycles,
      memoryOk: mem.rss < 512 * 1024 * 1024, // < 512 MB
      ...extraChecks,
    };

    const healthy = Object.values(checks).every(Boolean);

    if (!healthy) {
      logger.warn({ checks, consecutiveFailures: this.consecutiveFailures }, "Unhealthy status");
    }

    return {
      uptime,
      uptimeHuman: `${hours}h ${mins}m`,
      lastCycleMs,
      cyclesPerHour: this.cyclesInCurrentHour,
      consecutiveFailures: this.consecutiveFailures,
      lastSuccessAgoMs,
      memoryMB: Math.round(mem.rss / 1024 / 1024),
      healthy,
      checks,
    };
  }
}
