/**
 * Display-ready views built from a `DashboardState`: every number is already
 * formatted and every order row carries its colours.
 */
import type { Settings } from "../config/schema.js";
import {
  formatCash,
  formatPercent,
  formatRatio,
  formatSignificant,
  sideMarker,
  statusLabel,
} from "../format/numbers.js";
import type { AssetsOverview, SourceTotals } from "../model/overview.js";
import {
  applyOrderFilter,
  filterOptions,
  type OrderDetail,
  type OrderFilter,
  type OrderFilterOptions,
  type OrderRecord,
} from "../model/orders.js";
import { STATUS_LIGHTS, rowStyle, type FadePalette, type RowStyle } from "../model/palette.js";
import { formatTimestamp } from "../utils/time.js";
import type { DashboardState } from "./pipeline.js";

export interface ViewContext {
  settings: Settings;
  palette: FadePalette;
}

/* ---------- Portfolio ---------- */

export interface HoldingRow {
  asset: string;
  quantity: string;
  free: string;
  used: string;
  price: string;
  value: string;
  share: string;
}

export interface PortfolioView {
  asOf: string;
  equity: string;
  /** Exchange-side count of non-zero balances; `null` when advanced details are off. */
  activeAssets: number | null;
  holdings: HoldingRow[];
  chart: { label: string; value: number; percentage: number }[];
  warnings: string[];
}

export function portfolioView(state: DashboardState, ctx: ViewContext): PortfolioView {
  const { portfolio, allocation, chart, quoteAsset } = state;
  const shares = new Map(allocation.map((s) => [s.asset, s.percentage]));
  const warnings: string[] = [];
  if (portfolio.unpricedAssets.length > 0) {
    warnings.push(`No ${quoteAsset} price for ${portfolio.unpricedAssets.join(", ")}; valued at 0.`);
  }
  if (portfolio.skipped > 0) {
    warnings.push(`${portfolio.skipped} malformed balance row(s) skipped.`);
  }

  return {
    asOf: formatTimestamp(portfolio.asOf, ctx.settings.localTz),
    equity: formatCash(portfolio.equityValue, quoteAsset, portfolio.unpricedAssets.length > 0),
    activeAssets: state.activeAssets,
    holdings: portfolio.holdings.map((h) => ({
      asset: h.asset,
      quantity: formatSignificant(h.quantity),
      free: formatSignificant(h.free),
      used: formatSignificant(h.used),
      price: formatSignificant(h.quotePrice, quoteAsset),
      value: formatSignificant(h.valueInQuote, quoteAsset),
      share: formatPercent(shares.get(h.asset) ?? null),
    })),
    chart: chart.map((s) => ({ label: s.asset, value: s.valueInQuote, percentage: s.percentage })),
    warnings,
  };
}

/* ---------- Orders ---------- */

export interface OrderRow {
  id: string;
  detailsUrl: string;
  style: RowStyle | null;
  cells: {
    updated: string;
    requested: string;
    symbol: string;
    side: string;
    type: string;
    status: string;
    quantity: string;
    filled: string;
    price: string;
    limitPrice: string;
    notional: string;
    fee: string;
    feeAdjusted: string;
    latency: string;
  };
}

export interface OrdersView {
  caption: string;
  tail: number | null;
  rows: OrderRow[];
  filters: OrderFilterOptions;
}

export function orderDetailsUrl(uiUrl: string, id: string): string {
  return `${uiUrl.replace(/\/+$/, "")}/?order_id=${encodeURIComponent(id)}`;
}

export function formatLatency(ms: number | null): string {
  if (ms === null) return "";
  if (ms < 1000) return `${ms} ms`;
  return `${(ms / 1000).toFixed(2)} s`;
}

export function orderRow(r: OrderRecord, ctx: ViewContext): OrderRow {
  const tz = ctx.settings.localTz;
  return {
    id: r.id,
    detailsUrl: orderDetailsUrl(ctx.settings.uiUrl, r.id),
    style: rowStyle(r.status, r.stalenessTier, ctx.palette),
    cells: {
      updated: formatTimestamp(r.updatedAt, tz),
      requested: formatTimestamp(r.requestedAt, tz),
      symbol: r.symbol,
      side: sideMarker(r.side),
      type: r.type,
      status: statusLabel(r.status),
      quantity: formatSignificant(r.quantity),
      filled: formatSignificant(r.filled),
      price: formatSignificant(r.price),
      limitPrice: formatSignificant(r.limitPrice),
      notional: formatSignificant(r.notional, r.notionalCurrency),
      fee: formatSignificant(r.fee, r.feeCurrency),
      feeAdjusted: formatSignificant(r.feeAdjustedValue, r.notionalCurrency),
      latency: formatLatency(r.latencyMs),
    },
  };
}

export function ordersView(state: DashboardState, ctx: ViewContext, filter: OrderFilter = {}): OrdersView {
  const { records, skipped } = state.orders;
  const shown = applyOrderFilter(records, filter);
  const scope = state.tail === null ? "all orders" : `last ${state.tail} orders`;
  let caption = `Showing ${shown.length} of ${records.length} (${scope})`;
  if (skipped > 0) caption += `, ${skipped} malformed row(s) skipped`;
  return {
    caption,
    tail: state.tail,
    rows: shown.map((r) => orderRow(r, ctx)),
    filters: filterOptions(records),
  };
}

/* ---------- Performance ---------- */

export interface MetricCard {
  label: string;
  value: string;
  incomplete: boolean;
}

export interface PerformanceView {
  pnl: MetricCard[];
  capital: MetricCard[];
  multiples: MetricCard[];
  activity: MetricCard[];
  balances: MetricCard[];
}

function card(label: string, value: string, incomplete = false): MetricCard {
  return { label, value, incomplete };
}

export function performanceView(state: DashboardState): PerformanceView {
  const { performance: p, trades: t, quoteAsset: q } = state;
  const inc = p.incomplete;

  const capital: MetricCard[] = [];
  if (p.roiBasis === "cost") {
    capital.push(
      card("Capital at risk (cost)", formatCash(p.capitalAtRisk, q)),
      card("ROI net on cost", formatPercent(p.netRoi), inc),
      card("ROI gross on cost", formatPercent(p.grossRoi), inc)
    );
  } else if (p.roiBasis === "value") {
    capital.push(
      card("Free carry surplus", formatCash(p.freeCarrySurplus ?? 0, q)),
      card("ROI net on value", formatPercent(p.netRoi), inc),
      card("ROI gross on value", formatPercent(p.grossRoi), inc)
    );
  }

  return {
    pnl: [
      card("Open market value", formatCash(p.openMarketValue, q)),
      card("P&L net (after fees)", formatCash(p.netPnl, q), inc),
      card("P&L gross (before fees)", formatCash(p.grossPnl, q), inc),
    ],
    capital,
    multiples: [
      card("RVPI", formatRatio(p.rvpi), inc),
      card("DPI", formatRatio(p.dpi), inc),
      card("MOIC", formatRatio(p.moic), inc),
    ],
    activity: [
      card("Notional traded", formatCash(p.notionalTraded, q)),
      card("Orders", String(t.total.count)),
      card("Avg order size", formatCash(p.avgNotional.total, q)),
      card("Paid fees", formatCash(t.total.fee, q)),
      card("Buy notional", formatCash(t.buy.notional, q)),
      card("Buy orders", String(t.buy.count)),
      card("Avg buy size", formatCash(p.avgNotional.buy, q)),
      card("Sell notional", formatCash(t.sell.notional, q)),
      card("Sell orders", String(t.sell.count)),
      card("Avg sell size", formatCash(p.avgNotional.sell, q)),
    ],
    balances: state.assetsOverview ? balanceCards(state.assetsOverview) : [],
  };
}

const BALANCE_LABELS: ReadonlyArray<[keyof SourceTotals, string]> = [
  ["totalEquity", "Equity total"],
  ["totalFreeValue", "Equity free"],
  ["totalFrozenValue", "Equity frozen"],
  ["cashTotalValue", "Cash total"],
  ["cashFreeValue", "Cash free"],
  ["cashFrozenValue", "Cash frozen"],
  ["assetsTotalValue", "Assets total"],
  ["assetsFreeValue", "Assets free"],
  ["assetsFrozenValue", "Assets frozen"],
];

export function balanceCards(o: AssetsOverview): MetricCard[] {
  const cards: MetricCard[] = [];
  for (const [key, label] of BALANCE_LABELS) {
    const flagged = o.mismatch[key] === true;
    cards.push(card(label, formatCash(o.balance[key], o.cashAsset), flagged));
    if (flagged) cards.push(card(`${label} [order book]`, formatCash(o.orderBook[key], o.cashAsset), true));
  }
  return cards;
}

/* ---------- Order detail ---------- */

export interface OrderDetailView {
  title: string;
  order: OrderRow;
  history: {
    step: number;
    at: string;
    status: string;
    price: string;
    filled: string;
    remaining: string;
    notional: string;
    fee: string;
    comment: string;
  }[];
}

export function orderDetailView(d: OrderDetail, ctx: ViewContext): OrderDetailView {
  const light = d.status === "unknown" ? "" : `${STATUS_LIGHTS[d.status]} `;
  return {
    title: `${light}${sideMarker(d.side)} ${d.symbol} · ${statusLabel(d.status)}`,
    order: orderRow(d, ctx),
    history: d.history.map((h) => ({
      step: h.step,
      at: formatTimestamp(h.at, ctx.settings.localTz),
      status: statusLabel(h.status),
      price: formatSignificant(h.price),
      filled: formatSignificant(h.filled),
      remaining: formatSignificant(h.remaining),
      notional: formatSignificant(h.notional, d.notionalCurrency),
      fee: formatSignificant(h.fee, d.feeCurrency),
      comment: h.comment,
    })),
  };
}
