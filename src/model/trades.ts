/**
 * Trades overview → per-side totals and P&L / performance metrics.
 */
import { Decimal } from "decimal.js";
import type { MetricByPair, TradeSideBlock, TradesOverviewPayload } from "../exchange/payloads.js";

export interface TradeTotals {
  count: number;
  /** Traded amounts valued at current prices, in the quote asset. */
  amountValue: number;
  notional: number;
  fee: number;
  /** A traded asset had no current price, so `amountValue` undercounts. */
  amountValueIncomplete: boolean;
}

export interface TradesSummary {
  quoteAsset: string;
  buy: TradeTotals;
  sell: TradeTotals;
  total: TradeTotals;
}

export interface PerformanceMetrics {
  openMarketValue: number;
  capitalAtRisk: number;
  grossPnl: number;
  netPnl: number;
  roiBasis: "cost" | "value" | null;
  grossRoi: number | null;
  netRoi: number | null;
  /** Cash already recovered beyond what was invested; only on the value basis. */
  freeCarrySurplus: number | null;
  rvpi: number | null;
  dpi: number | null;
  moic: number | null;
  notionalTraded: number;
  avgNotional: { buy: number; sell: number; total: number };
  incomplete: boolean;
}

/** Base assets traded against `quoteAsset` on either side. */
export function tradedAssets(raw: TradesOverviewPayload, quoteAsset: string): string[] {
  const assets = new Set<string>();
  for (const block of [raw.BUY, raw.SELL]) {
    for (const [base, byQuote] of Object.entries(block?.amount ?? {})) {
      if (byQuote[quoteAsset] !== undefined && base !== quoteAsset) assets.add(base);
    }
  }
  return [...assets].sort();
}

function sumQuoted(metric: MetricByPair | null | undefined, quoteAsset: string): Decimal {
  let sum = new Decimal(0);
  for (const byQuote of Object.values(metric ?? {})) {
    const v = byQuote[quoteAsset];
    if (v !== undefined) sum = sum.plus(v);
  }
  return sum;
}

function sideTotals(
  block: TradeSideBlock | null | undefined,
  prices: ReadonlyMap<string, number>,
  quoteAsset: string
): TradeTotals {
  let amountValue = new Decimal(0);
  let incomplete = false;
  for (const [base, byQuote] of Object.entries(block?.amount ?? {})) {
    const amount = byQuote[quoteAsset];
    if (amount === undefined) continue;
    const price = base === quoteAsset ? 1 : prices.get(base);
    if (price === undefined) {
      if (amount !== 0) incomplete = true;
      continue;
    }
    amountValue = amountValue.plus(new Decimal(amount).times(price));
  }

  return {
    count: sumQuoted(block?.count, quoteAsset).toNumber(),
    amountValue: amountValue.toNumber(),
    notional: sumQuoted(block?.notional, quoteAsset).toNumber(),
    fee: sumQuoted(block?.fee, quoteAsset).toNumber(),
    amountValueIncomplete: incomplete,
  };
}

export function toTradesSummary(
  raw: TradesOverviewPayload,
  prices: ReadonlyMap<string, number>,
  quoteAsset: string
): TradesSummary {
  const buy = sideTotals(raw.BUY, prices, quoteAsset);
  const sell = sideTotals(raw.SELL, prices, quoteAsset);
  const add = (a: number, b: number): number => new Decimal(a).plus(b).toNumber();
  return {
    quoteAsset,
    buy,
    sell,
    total: {
      count: buy.count + sell.count,
      amountValue: add(buy.amountValue, sell.amountValue),
      notional: add(buy.notional, sell.notional),
      fee: add(buy.fee, sell.fee),
      amountValueIncomplete: buy.amountValueIncomplete || sell.amountValueIncomplete,
    },
  };
}

function ratio(num: Decimal, den: Decimal): number | null {
  return den.isZero() ? null : num.div(den).toNumber();
}

export function toPerformanceMetrics(t: TradesSummary): PerformanceMetrics {
  const openMarketValue = new Decimal(t.buy.amountValue).minus(t.sell.amountValue);
  const capitalAtRisk = new Decimal(t.buy.notional).minus(t.sell.notional);
  const grossPnl = openMarketValue.minus(capitalAtRisk);
  const netPnl = grossPnl.minus(t.total.fee);

  let roiBasis: PerformanceMetrics["roiBasis"] = null;
  let roiDen = new Decimal(0);
  if (capitalAtRisk.gt(0)) {
    roiBasis = "cost";
    roiDen = capitalAtRisk;
  } else if (openMarketValue.gt(0)) {
    roiBasis = "value";
    roiDen = openMarketValue;
  }

  const paidIn = new Decimal(t.buy.notional);
  const rvpi = ratio(openMarketValue, paidIn);
  const dpi = ratio(new Decimal(t.sell.notional), paidIn);

  const avg = (side: TradeTotals): number =>
    side.count > 0 ? new Decimal(side.notional).div(side.count).toNumber() : 0;

  return {
    openMarketValue: openMarketValue.toNumber(),
    capitalAtRisk: capitalAtRisk.toNumber(),
    grossPnl: grossPnl.toNumber(),
    netPnl: netPnl.toNumber(),
    roiBasis,
    grossRoi: roiBasis === null ? null : grossPnl.div(roiDen).toNumber(),
    netRoi: roiBasis === null ? null : netPnl.div(roiDen).toNumber(),
    freeCarrySurplus: roiBasis === "value" ? capitalAtRisk.abs().toNumber() : null,
    rvpi,
    dpi,
    moic: rvpi !== null && dpi !== null ? rvpi + dpi : null,
    notionalTraded: t.total.notional,
    avgNotional: { buy: avg(t.buy), sell: avg(t.sell), total: avg(t.total) },
    incomplete: t.total.amountValueIncomplete,
  };
}
