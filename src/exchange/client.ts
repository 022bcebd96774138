/**
 * Read-only REST client for the paper exchange.
 *
 * Every call resolves to the decoded JSON body or throws an `ExchangeFailure`.
 * There are no retries here: the next scheduled refresh is the retry.
 */
import type { z } from "zod";
import { createLogger } from "../utils/logger.js";
import {
  ConnectionFailure,
  MalformedResponseFailure,
  failureForStatus,
} from "./errors.js";
import {
  AssetsOverviewPayloadSchema,
  BalanceListSchema,
  BalancePayloadSchema,
  OrdersPayloadSchema,
  TickersPayloadSchema,
  TradesOverviewPayloadSchema,
  type AssetsOverviewPayload,
  type BalancePayload,
  type TickersPayload,
  type TradesOverviewPayload,
} from "./payloads.js";

const logger = createLogger("ExchangeClient");

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ExchangeClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  /** Bounds applied to the orders tail. */
  slider: { min: number; max: number };
  fetchImpl?: FetchLike;
}

export class ExchangeClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly slider: { min: number; max: number };
  private readonly fetchImpl: FetchLike;

  constructor(opts: ExchangeClientOptions) {
    if (opts.baseUrl.trim() === "") throw new Error("Exchange base URL must not be empty");
    if (opts.apiKey.trim() === "") throw new Error("Exchange API key must not be empty");
    if (!(opts.timeoutMs > 0)) throw new Error("Request timeout must be positive");

    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.apiKey = opts.apiKey;
    this.timeoutMs = opts.timeoutMs;
    this.slider = opts.slider;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /** Clamp an orders tail into the slider range. */
  clampLimit(limit: number): number {
    const n = Number.isFinite(limit) ? Math.round(limit) : this.slider.min;
    return Math.min(this.slider.max, Math.max(this.slider.min, n));
  }

  /* ---------- Balances ---------- */

  async fetchPortfolio(): Promise<BalancePayload> {
    return this.getParsed("/balance", BalancePayloadSchema, "a list or object of balances");
  }

  /** Number of assets with a non-zero balance. */
  async fetchActiveAssetCount(): Promise<number> {
    const body = await this.getParsed("/balance/list", BalanceListSchema, "an object with a count");
    return body.count;
  }

  /* ---------- Orders ---------- */

  /**
   * Most recent `limit` orders, clamped to the slider range. `null` fetches
   * the whole book.
   */
  async fetchOrders(limit: number | null, status?: string): Promise<unknown[]> {
    const params = new URLSearchParams();
    if (limit !== null) params.set("tail", String(this.clampLimit(limit)));
    if (status) params.set("status", status);
    const query = params.toString();
    return this.getParsed(query ? `/orders?${query}` : "/orders", OrdersPayloadSchema, "a list of orders");
  }

  /** Single order with its step history. The body may be `{ error }` for a pruned order. */
  async fetchOrder(id: string): Promise<unknown> {
    return this.getJson(`/orders/${encodeURIComponent(id)}?include_history=true`);
  }

  /* ---------- Market data ---------- */

  /**
   * Tickers for `BASE/QUOTE` pairs, as `/tickers/BTC/USDT,ETH/USDT` (the slash
   * stays literal). No request is made for an empty list.
   */
  async fetchPrices(pairs: readonly string[]): Promise<TickersPayload> {
    if (pairs.length === 0) return {};
    const joined = pairs.map((p) => encodeURI(p)).join(",");
    return this.getParsed(`/tickers/${joined}`, TickersPayloadSchema, "a list or object of tickers");
  }

  /* ---------- Overviews ---------- */

  async fetchAssetsOverview(): Promise<AssetsOverviewPayload> {
    return this.getParsed("/overview/assets", AssetsOverviewPayloadSchema, "an assets overview");
  }

  async fetchTradesOverview(): Promise<TradesOverviewPayload> {
    return this.getParsed("/overview/trades", TradesOverviewPayloadSchema, "a trades overview");
  }

  /* ---------- Transport ---------- */

  private async getParsed<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    expected: string
  ): Promise<z.output<S>> {
    const body = await this.getJson(path);
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedResponseFailure(`Expected ${expected} from ${path}`, path, 200, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private async getJson(path: string): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const started = Date.now();

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: "GET",
        headers: { "x-api-key": this.apiKey, accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const timedOut = err instanceof Error && err.name === "TimeoutError";
      const reason = timedOut ? `timed out after ${this.timeoutMs}ms` : describe(err);
      throw new ConnectionFailure(`GET ${path} failed: ${reason}`, path, null, { cause: err });
    }

    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      if (!res.ok) {
        logger.debug({ path, status: res.status, err: describe(err) }, "Error body unreadable");
        throw failureForStatus(res.status, path, "");
      }
      throw new ConnectionFailure(`GET ${path} body read failed: ${describe(err)}`, path, res.status, {
        cause: err,
      });
    }

    if (!res.ok) throw failureForStatus(res.status, path, text);

    logger.debug({ path, status: res.status, ms: Date.now() - started }, "GET ok");

    try {
      return JSON.parse(text);
    } catch (err) {
      throw new MalformedResponseFailure(`Invalid JSON from ${path}`, path, res.status, { cause: err });
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
