/**
 * Periodic fetch-then-build task.
 *
 * - One cycle at a time: a trigger arriving mid-flight joins the running cycle.
 * - A successful cycle replaces `data` wholesale; a failed one keeps the
 *   previous `data` and records an error indicator.
 * - `trigger()` never rejects, so timer callbacks can fire and forget.
 */
import { isExchangeFailure, type FailureKind } from "../exchange/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("RefreshDriver");

export type RefreshErrorKind = FailureKind | "internal";

export interface RefreshError {
  kind: RefreshErrorKind;
  message: string;
  at: number;
}

export interface RefreshState<T> {
  data: T | null;
  lastSuccessAt: number | null;
  error: RefreshError | null;
  cycles: number;
  failures: number;
  inFlight: boolean;
}

export interface RefreshDriverOptions<T> {
  intervalMs: number;
  onCycleStart?: () => void;
  onSuccess?: (data: T, elapsedMs: number) => void;
  onFailure?: (error: RefreshError, cause: unknown) => void;
  clock?: () => number;
}

export function classifyError(err: unknown, at: number): RefreshError {
  if (isExchangeFailure(err)) return { kind: err.kind, message: err.message, at };
  return { kind: "internal", message: err instanceof Error ? err.message : String(err), at };
}

export class RefreshDriver<T> {
  private readonly intervalMs: number;
  private readonly clock: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private current: Promise<RefreshState<T>> | null = null;
  private stopped = false;

  private data: T | null = null;
  private lastSuccessAt: number | null = null;
  private error: RefreshError | null = null;
  private cycles = 0;
  private failures = 0;

  constructor(
    private readonly task: () => Promise<T>,
    private readonly opts: RefreshDriverOptions<T>
  ) {
    if (!(opts.intervalMs > 0)) throw new Error("Refresh interval must be positive");
    this.intervalMs = opts.intervalMs;
    this.clock = opts.clock ?? Date.now;
  }

  /* ---------- Lifecycle ---------- */

  start(): void {
    if (this.timer) return;
    this.stopped = false;
    logger.info({ intervalMs: this.intervalMs }, "Refresh driver started");

    // Run immediately, then on interval
    void this.trigger();
    this.timer = setInterval(() => void this.trigger(), this.intervalMs);
  }

  /** Cancel the timer. A cycle already in flight finishes, but no new one starts. */
  stop(): void {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    logger.info("Refresh driver stopped");
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /* ---------- Cycles ---------- */

  /** Run a cycle now, or join the one in flight. Resolves with the resulting state. */
  trigger(): Promise<RefreshState<T>> {
    if (this.current) return this.current;
    if (this.stopped) return Promise.resolve(this.snapshot());
    this.current = this.runCycle().finally(() => {
      this.current = null;
    });
    return this.current;
  }

  snapshot(): RefreshState<T> {
    return {
      data: this.data,
      lastSuccessAt: this.lastSuccessAt,
      error: this.error,
      cycles: this.cycles,
      failures: this.failures,
      inFlight: this.current !== null,
    };
  }

  private async runCycle(): Promise<RefreshState<T>> {
    const started = this.clock();
    this.cycles++;
    this.opts.onCycleStart?.();

    let data: T;
    try {
      data = await this.task();
    } catch (err) {
      const error = classifyError(err, this.clock());
      this.error = error;
      this.failures++;
      logger.error({ cycle: this.cycles, kind: error.kind, err: error.message }, "Refresh failed; keeping last good state");
      this.opts.onFailure?.(error, err);
      return { ...this.snapshot(), inFlight: false };
    }

    const elapsed = this.clock() - started;
    this.data = data;
    this.lastSuccessAt = this.clock();
    this.error = null;
    logger.debug({ cycle: this.cycles, elapsedMs: elapsed }, "Refresh succeeded");
    this.opts.onSuccess?.(data, elapsed);

    return { ...this.snapshot(), inFlight: false };
  }
}
