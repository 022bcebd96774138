import { TickerSchema, isPlainObject, type TickersPayload } from "../exchange/payloads.js";

/** `BASE/QUOTE` pairs for the assets that need a price; the quote asset itself is skipped. */
export function pricePairs(assets: Iterable<string>, quoteAsset: string): string[] {
  const pairs = new Set<string>();
  for (const asset of assets) {
    if (asset !== quoteAsset) pairs.add(`${asset}/${quoteAsset}`);
  }
  return [...pairs].sort();
}

/**
 * Base asset → last price in `quoteAsset`. Accepts the dict (`{ "BTC/USDT": {...} }`)
 * and list forms; tickers quoted in another asset or without a usable price
 * are ignored. The quote asset is always priced at 1.
 */
export function toPriceMap(raw: TickersPayload, quoteAsset: string): Map<string, number> {
  const prices = new Map<string, number>([[quoteAsset, 1]]);
  const items: unknown[] = Array.isArray(raw)
    ? raw
    : Object.entries(raw).map(([symbol, v]) => (isPlainObject(v) && v.symbol === undefined ? { ...v, symbol } : v));

  for (const item of items) {
    const parsed = TickerSchema.safeParse(item);
    if (!parsed.success) continue;
    const [base, quote] = parsed.data.symbol.split("/");
    if (!base || quote !== quoteAsset) continue;
    const price = parsed.data.last ?? parsed.data.info?.price ?? null;
    if (price === null || price <= 0) continue;
    prices.set(base, price);
  }
  return prices;
}
