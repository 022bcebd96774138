/**
 * Balance payload → portfolio snapshot and allocation slices.
 *
 * Each holding is valued with decimal arithmetic. Equity is the sum of the
 * published holding values, in their published order, so the two always
 * agree; a total reported by the backend is never trusted.
 */
import { Decimal } from "decimal.js";
import { MalformedResponseFailure } from "../exchange/errors.js";
import { BalanceRowSchema, isPlainObject, type BalancePayload } from "../exchange/payloads.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("Portfolio");

export interface Holding {
  asset: string;
  /** Total held (free + used). */
  quantity: number;
  free: number;
  used: number;
  quotePrice: number | null;
  valueInQuote: number;
}

export interface PortfolioSnapshot {
  asOf: number;
  quoteAsset: string;
  holdings: Holding[];
  equityValue: number;
  unpricedAssets: string[];
  skipped: number;
}

export interface AllocationSlice {
  asset: string;
  valueInQuote: number;
  percentage: number;
}

export interface SnapshotOptions {
  quoteAsset: string;
  now: number;
}

const LIST_KEYS = ["assets", "data", "balances"] as const;

/**
 * Flatten the balance shapes the exchange produces into row objects:
 * a bare list, `{ assets | data | balances: [...] }`, or `{ "BTC": {...} }`.
 */
export function extractBalanceRows(payload: BalancePayload): unknown[] {
  if (Array.isArray(payload)) return payload;

  for (const key of LIST_KEYS) {
    const nested = payload[key];
    if (Array.isArray(nested)) return nested;
  }

  const entries = Object.entries(payload);
  if (entries.length === 0) return [];
  if (entries.every(([, v]) => isPlainObject(v))) {
    return entries.map(([asset, v]) => (isPlainObject(v) ? { asset, ...v } : v));
  }
  throw new MalformedResponseFailure("Unrecognised balance payload shape", "/balance", 200);
}

/** Assets that carry no backend `quote_price` and so need a ticker lookup. */
export function assetsNeedingPrices(payload: BalancePayload, quoteAsset: string): string[] {
  const needed = new Set<string>();
  for (const row of extractBalanceRows(payload)) {
    const parsed = BalanceRowSchema.safeParse(row);
    if (!parsed.success) continue;
    const { asset, quote_price } = parsed.data;
    if (asset !== quoteAsset && (quote_price === null || quote_price === undefined)) needed.add(asset);
  }
  return [...needed];
}

export function toPortfolioSnapshot(
  payload: BalancePayload,
  prices: ReadonlyMap<string, number>,
  opts: SnapshotOptions
): PortfolioSnapshot {
  const holdings: Holding[] = [];
  const unpriced: string[] = [];
  let skipped = 0;

  for (const row of extractBalanceRows(payload)) {
    const parsed = BalanceRowSchema.safeParse(row);
    if (!parsed.success) {
      skipped++;
      continue;
    }
    const r = parsed.data;
    const used = r.used ?? r.locked ?? 0;
    const total = r.total ?? (r.free !== null && r.free !== undefined ? r.free + used : null);
    if (total === null) {
      skipped++;
      continue;
    }
    const free = r.free ?? total - used;

    const quotePrice = r.quote_price ?? (r.asset === opts.quoteAsset ? 1 : prices.get(r.asset)) ?? null;
    let value = new Decimal(0);
    if (quotePrice === null) {
      if (total !== 0) unpriced.push(r.asset);
    } else {
      value = new Decimal(total).times(quotePrice);
    }

    holdings.push({
      asset: r.asset,
      quantity: total,
      free,
      used,
      quotePrice,
      valueInQuote: value.toNumber(),
    });
  }

  if (skipped > 0) logger.warn({ skipped }, "Skipped malformed balance rows");

  holdings.sort((a, b) => b.valueInQuote - a.valueInQuote);
  const equityValue = holdings.reduce((sum, h) => sum + h.valueInQuote, 0);

  return {
    asOf: opts.now,
    quoteAsset: opts.quoteAsset,
    holdings,
    equityValue,
    unpricedAssets: unpriced,
    skipped,
  };
}

/** Share of equity per holding. Empty when there is nothing of value. */
export function toAllocationSlices(snapshot: PortfolioSnapshot): AllocationSlice[] {
  if (!(snapshot.equityValue > 0)) return [];
  const equity = new Decimal(snapshot.equityValue);
  return snapshot.holdings
    .filter((h) => h.valueInQuote !== 0)
    .map((h) => ({
      asset: h.asset,
      valueInQuote: h.valueInQuote,
      percentage: new Decimal(h.valueInQuote).div(equity).toNumber(),
    }));
}

/** Fold slices below `minShare` into a single "Other" slice for the chart. */
export function groupMinorSlices(slices: readonly AllocationSlice[], minShare = 0.01): AllocationSlice[] {
  const major: AllocationSlice[] = [];
  let otherValue = new Decimal(0);
  let otherShare = new Decimal(0);
  let minorCount = 0;

  for (const s of slices) {
    if (s.percentage >= minShare) {
      major.push(s);
    } else {
      otherValue = otherValue.plus(s.valueInQuote);
      otherShare = otherShare.plus(s.percentage);
      minorCount++;
    }
  }

  if (minorCount === 0) return major;
  return [...major, { asset: "Other", valueInQuote: otherValue.toNumber(), percentage: otherShare.toNumber() }];
}
