/**
 * Order payloads → display records, with latency, staleness tier and
 * fee-adjusted value derived here rather than trusted from the backend.
 */
import { MalformedResponseFailure } from "../exchange/errors.js";
import {
  OrderDetailPayloadSchema,
  OrderPayloadSchema,
  isPlainObject,
  type OrderPayload,
} from "../exchange/payloads.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("Orders");

export const ORDER_STATUSES = [
  "new",
  "partially_filled",
  "filled",
  "partially_canceled",
  "canceled",
  "rejected",
  "expired",
] as const;

export type KnownOrderStatus = (typeof ORDER_STATUSES)[number];
export type OrderStatus = KnownOrderStatus | "unknown";
export type OrderSide = "buy" | "sell";

const KNOWN_STATUSES: ReadonlySet<string> = new Set(ORDER_STATUSES);

function isKnownStatus(s: string): s is KnownOrderStatus {
  return KNOWN_STATUSES.has(s);
}

/** `"PARTIALLY FILLED"`, `"partially-filled"` → `partially_filled`; `cancelled` → `canceled`. */
export function normalizeStatus(raw: string | null | undefined): OrderStatus {
  if (!raw) return "unknown";
  const s = raw
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, "_")
    .replace(/cancelled/g, "canceled");
  return isKnownStatus(s) ? s : "unknown";
}

/**
 * How many whole freshness windows have elapsed, clamped to `maxLevels`.
 * Future timestamps (clock skew) count as fresh.
 */
export function stalenessTier(ageMs: number, freshWindowMs: number, maxLevels: number): number {
  if (!(ageMs > 0) || !(freshWindowMs > 0)) return 0;
  return Math.min(Math.floor(ageMs / freshWindowMs), maxLevels);
}

export interface StalenessOptions {
  freshWindowMs: number;
  maxLevels: number;
}

export interface OrderRecord {
  id: string;
  symbol: string;
  asset: string;
  quoteAsset: string;
  side: OrderSide;
  type: string;
  status: OrderStatus;
  requestedAt: number;
  updatedAt: number;
  executedAt: number | null;
  /** Average execution price. */
  price: number | null;
  limitPrice: number | null;
  quantity: number;
  filled: number;
  notional: number;
  notionalCurrency: string;
  fee: number;
  feeCurrency: string;
  reservedNotionalLeft: number;
  reservedFeeLeft: number;
  latencyMs: number | null;
  stalenessTier: number;
  /** Buy: total cost (notional + fee). Sell: net proceeds (notional − fee). */
  feeAdjustedValue: number;
}

export function parseOrderPayload(raw: unknown): OrderPayload | null {
  const parsed = OrderPayloadSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function toOrderRecord(p: OrderPayload, now: number, opts: StalenessOptions): OrderRecord {
  const [base = p.symbol, quote = ""] = p.symbol.split("/");
  const filled = p.actual_filled ?? 0;
  const price = p.price ?? null;
  const notional = p.actual_notion ?? (price !== null ? price * filled : 0);
  const fee = p.actual_fee ?? 0;
  const executedAt = p.ts_finish ?? null;

  return {
    id: p.id,
    symbol: p.symbol,
    asset: base,
    quoteAsset: quote,
    side: p.side,
    type: p.type ?? "",
    status: normalizeStatus(p.status),
    requestedAt: p.ts_create,
    updatedAt: p.ts_update ?? executedAt ?? p.ts_create,
    executedAt,
    price,
    limitPrice: p.limit_price ?? null,
    quantity: p.amount,
    filled,
    notional,
    notionalCurrency: p.notion_currency ?? quote,
    fee,
    feeCurrency: p.fee_currency ?? quote,
    reservedNotionalLeft: p.reserved_notion_left ?? 0,
    reservedFeeLeft: p.reserved_fee_left ?? 0,
    latencyMs: executedAt !== null ? executedAt - p.ts_create : null,
    stalenessTier: stalenessTier(now - p.ts_create, opts.freshWindowMs, opts.maxLevels),
    feeAdjustedValue: p.side === "buy" ? notional + fee : notional - fee,
  };
}

export interface OrderBatch {
  records: OrderRecord[];
  skipped: number;
}

/** Malformed rows are skipped and counted; one bad row never blanks the table. */
export function toOrderBatch(rows: readonly unknown[], now: number, opts: StalenessOptions): OrderBatch {
  const records: OrderRecord[] = [];
  let skipped = 0;
  for (const row of rows) {
    const p = parseOrderPayload(row);
    if (p === null) {
      skipped++;
      continue;
    }
    records.push(toOrderRecord(p, now, opts));
  }
  if (skipped > 0) logger.warn({ skipped, total: rows.length }, "Skipped malformed order rows");
  return { records: sortByLastUpdate(records), skipped };
}

export function sortByLastUpdate(records: readonly OrderRecord[]): OrderRecord[] {
  return [...records].sort((a, b) => b.updatedAt - a.updatedAt);
}

/* ---------- Table filters ---------- */

export interface OrderFilter {
  status?: readonly string[];
  side?: readonly string[];
  type?: readonly string[];
  asset?: readonly string[];
}

export interface OrderFilterOptions {
  status: string[];
  side: string[];
  type: string[];
  asset: string[];
}

export function filterOptions(records: readonly OrderRecord[]): OrderFilterOptions {
  const distinct = (pick: (r: OrderRecord) => string): string[] =>
    [...new Set(records.map(pick).filter((v) => v !== ""))].sort();
  return {
    status: distinct((r) => r.status),
    side: distinct((r) => r.side),
    type: distinct((r) => r.type),
    asset: distinct((r) => r.asset),
  };
}

/** An empty or absent selection means "no constraint". */
export function applyOrderFilter(records: readonly OrderRecord[], filter: OrderFilter): OrderRecord[] {
  const accepts = (selected: readonly string[] | undefined, value: string): boolean =>
    !selected || selected.length === 0 || selected.includes(value);
  return records.filter(
    (r) =>
      accepts(filter.status, r.status) &&
      accepts(filter.side, r.side) &&
      accepts(filter.type, r.type) &&
      accepts(filter.asset, r.asset)
  );
}

/* ---------- Order detail ---------- */

export interface OrderHistoryStep {
  step: number;
  at: number | null;
  status: OrderStatus;
  price: number | null;
  filled: number | null;
  remaining: number | null;
  notional: number | null;
  reservedNotionalLeft: number | null;
  fee: number | null;
  reservedFeeLeft: number | null;
  comment: string;
}

export interface OrderDetail extends OrderRecord {
  history: OrderHistoryStep[];
}

/**
 * `null` when the exchange answers `{ error: ... }` (order pruned or unknown).
 * Any other body that is not an order is malformed.
 */
export function toOrderDetail(raw: unknown, now: number, opts: StalenessOptions): OrderDetail | null {
  if (isPlainObject(raw) && raw.error !== undefined) return null;

  const parsed = OrderDetailPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedResponseFailure("Order detail is not an order", "/orders/{id}", 200, {
      cause: parsed.error,
    });
  }

  const history: OrderHistoryStep[] = Object.entries(parsed.data.history ?? {})
    .map(([step, h]) => ({
      step: Number(step),
      at: h.ts ?? null,
      status: normalizeStatus(h.status),
      price: h.price ?? null,
      filled: h.actual_filled ?? null,
      remaining: h.amount_remain ?? null,
      notional: h.actual_notion ?? null,
      reservedNotionalLeft: h.reserved_notion_left ?? null,
      fee: h.actual_fee ?? null,
      reservedFeeLeft: h.reserved_fee_left ?? null,
      comment: h.comment ?? "",
    }))
    .filter((h) => Number.isFinite(h.step))
    .sort((a, b) => a.step - b.step);

  return { ...toOrderRecord(parsed.data, now, opts), history };
}
