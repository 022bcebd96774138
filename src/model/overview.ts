import type { AssetsOverviewPayload, SourceTotalsPayload } from "../exchange/payloads.js";

export interface SourceTotals {
  totalEquity: number;
  totalFreeValue: number;
  totalFrozenValue: number;
  cashTotalValue: number;
  cashFreeValue: number;
  cashFrozenValue: number;
  assetsTotalValue: number;
  assetsFreeValue: number;
  assetsFrozenValue: number;
}

/** Balance-sourced vs order-book-sourced totals, with per-field disagreement flags. */
export interface AssetsOverview {
  cashAsset: string;
  balance: SourceTotals;
  orderBook: SourceTotals;
  mismatch: Partial<Record<keyof SourceTotals, boolean>>;
}

const FIELDS = {
  totalEquity: "total_equity",
  totalFreeValue: "total_free_value",
  totalFrozenValue: "total_frozen_value",
  cashTotalValue: "cash_total_value",
  cashFreeValue: "cash_free_value",
  cashFrozenValue: "cash_frozen_value",
  assetsTotalValue: "assets_total_value",
  assetsFreeValue: "assets_free_value",
  assetsFrozenValue: "assets_frozen_value",
} as const satisfies Record<keyof SourceTotals, keyof SourceTotalsPayload>;

function toSourceTotals(src: SourceTotalsPayload | null | undefined): SourceTotals {
  const v = (key: keyof SourceTotalsPayload): number => src?.[key] ?? 0;
  return {
    totalEquity: v(FIELDS.totalEquity),
    totalFreeValue: v(FIELDS.totalFreeValue),
    totalFrozenValue: v(FIELDS.totalFrozenValue),
    cashTotalValue: v(FIELDS.cashTotalValue),
    cashFreeValue: v(FIELDS.cashFreeValue),
    cashFrozenValue: v(FIELDS.cashFrozenValue),
    assetsTotalValue: v(FIELDS.assetsTotalValue),
    assetsFreeValue: v(FIELDS.assetsFreeValue),
    assetsFrozenValue: v(FIELDS.assetsFrozenValue),
  };
}

export function toAssetsOverview(raw: AssetsOverviewPayload, quoteAsset: string): AssetsOverview {
  const flags = raw.misc?.mismatch ?? {};
  const mismatch: AssetsOverview["mismatch"] = {};
  for (const [camel, snake] of Object.entries(FIELDS)) {
    const flag = flags[snake];
    if (flag !== undefined && isTotalsKey(camel)) mismatch[camel] = flag;
  }
  return {
    cashAsset: raw.misc?.cash_asset ?? quoteAsset,
    balance: toSourceTotals(raw.balance_source),
    orderBook: toSourceTotals(raw.orders_source),
    mismatch,
  };
}

function isTotalsKey(key: string): key is keyof SourceTotals {
  return Object.prototype.hasOwnProperty.call(FIELDS, key);
}
