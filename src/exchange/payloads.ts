/**
 * Raw exchange payload schemas.
 *
 * The exchange's JSON drifts: fields come and go, numbers arrive as strings,
 * enums change spelling. Every field the dashboard does not strictly need is
 * therefore optional/nullable here, and numeric strings are coerced.
 */
import { z } from "zod";

export function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Finite number, accepting numeric strings ("0.25"). */
export const numeric = z.preprocess(
  (v) => (typeof v === "string" && v.trim() !== "" ? Number(v) : v),
  z.number().finite()
);

const text = z.string().trim().min(1);

/* ---------- /balance ---------- */

/** Top level only; rows are validated one by one so a bad row can be skipped. */
export const BalancePayloadSchema = z.union([z.array(z.unknown()), z.record(z.string(), z.unknown())]);
export type BalancePayload = z.infer<typeof BalancePayloadSchema>;

export const BalanceRowSchema = z.object({
  asset: text,
  free: numeric.nullish(),
  used: numeric.nullish(),
  locked: numeric.nullish(),
  total: numeric.nullish(),
  quote_price: numeric.nullish(),
});
export type BalanceRow = z.infer<typeof BalanceRowSchema>;

export const BalanceListSchema = z.object({ count: numeric });

/* ---------- /tickers ---------- */

export const TickersPayloadSchema = z.union([z.array(z.unknown()), z.record(z.string(), z.unknown())]);
export type TickersPayload = z.infer<typeof TickersPayloadSchema>;

/** CCXT-style ticker (`last`) or the simplified `{ info: { price } }` form. */
export const TickerSchema = z.object({
  symbol: text,
  last: numeric.nullish(),
  info: z.object({ price: numeric.nullish() }).nullish(),
});

/* ---------- /orders ---------- */

export const OrdersPayloadSchema = z.array(z.unknown());

export const OrderPayloadSchema = z.object({
  id: z.union([text, z.number()]).transform(String),
  symbol: text,
  side: z
    .string()
    .transform((s) => s.trim().toLowerCase())
    .pipe(z.enum(["buy", "sell"])),
  type: z.string().nullish(),
  status: z.string().nullish(),
  ts_create: numeric,
  ts_update: numeric.nullish(),
  ts_finish: numeric.nullish(),
  price: numeric.nullish(),
  limit_price: numeric.nullish(),
  amount: numeric,
  actual_filled: numeric.nullish(),
  actual_notion: numeric.nullish(),
  notion_currency: z.string().nullish(),
  reserved_notion_left: numeric.nullish(),
  initial_booked_notion: numeric.nullish(),
  actual_fee: numeric.nullish(),
  fee_currency: z.string().nullish(),
  reserved_fee_left: numeric.nullish(),
  initial_booked_fee: numeric.nullish(),
});
export type OrderPayload = z.infer<typeof OrderPayloadSchema>;

export const OrderHistoryStepSchema = z.object({
  ts: numeric.nullish(),
  status: z.string().nullish(),
  price: numeric.nullish(),
  actual_filled: numeric.nullish(),
  amount_remain: numeric.nullish(),
  actual_notion: numeric.nullish(),
  reserved_notion_left: numeric.nullish(),
  actual_fee: numeric.nullish(),
  reserved_fee_left: numeric.nullish(),
  comment: z.string().nullish(),
});
export type OrderHistoryStepPayload = z.infer<typeof OrderHistoryStepSchema>;

export const OrderDetailPayloadSchema = OrderPayloadSchema.extend({
  history: z.record(z.string(), OrderHistoryStepSchema).nullish(),
});
export type OrderDetailPayload = z.infer<typeof OrderDetailPayloadSchema>;

/* ---------- /overview/assets ---------- */

export const SourceTotalsSchema = z.object({
  total_equity: numeric.nullish(),
  total_free_value: numeric.nullish(),
  total_frozen_value: numeric.nullish(),
  cash_total_value: numeric.nullish(),
  cash_free_value: numeric.nullish(),
  cash_frozen_value: numeric.nullish(),
  assets_total_value: numeric.nullish(),
  assets_free_value: numeric.nullish(),
  assets_frozen_value: numeric.nullish(),
});
export type SourceTotalsPayload = z.infer<typeof SourceTotalsSchema>;

export const AssetsOverviewPayloadSchema = z.object({
  balance_source: SourceTotalsSchema.nullish(),
  orders_source: SourceTotalsSchema.nullish(),
  misc: z
    .object({
      cash_asset: z.string().nullish(),
      mismatch: z.record(z.string(), z.boolean()).nullish(),
    })
    .nullish(),
});
export type AssetsOverviewPayload = z.infer<typeof AssetsOverviewPayloadSchema>;

/* ---------- /overview/trades ---------- */

/** `{ "BTC": { "USDT": "0.5" } }`: base asset → quote asset → value. */
const MetricByPairSchema = z.record(z.string(), z.record(z.string(), numeric));
export type MetricByPair = z.infer<typeof MetricByPairSchema>;

export const TradeSideBlockSchema = z.object({
  count: MetricByPairSchema.nullish(),
  amount: MetricByPairSchema.nullish(),
  notional: MetricByPairSchema.nullish(),
  fee: MetricByPairSchema.nullish(),
});
export type TradeSideBlock = z.infer<typeof TradeSideBlockSchema>;

export const TradesOverviewPayloadSchema = z.object({
  BUY: TradeSideBlockSchema.nullish(),
  SELL: TradeSideBlockSchema.nullish(),
});
export type TradesOverviewPayload = z.infer<typeof TradesOverviewPayloadSchema>;
