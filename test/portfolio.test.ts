import { describe, it, expect } from "vitest";
import { MalformedResponseFailure } from "../src/exchange/errors.js";
import {
  assetsNeedingPrices,
  extractBalanceRows,
  groupMinorSlices,
  toAllocationSlices,
  toPortfolioSnapshot,
} from "../src/model/portfolio.js";
import { pricePairs, toPriceMap } from "../src/model/prices.js";

const opts = { quoteAsset: "USDT", now: 1_700_000_000_000 };
const prices = new Map([
  ["BTC", 30_000],
  ["ETH", 2_000],
]);

describe("toPortfolioSnapshot", () => {
  it("values every holding and recomputes equity as their sum", () => {
    const snap = toPortfolioSnapshot(
      [
        { asset: "USDT", free: 1000, used: 0 },
        { asset: "BTC", total: 0.5 },
        { asset: "ETH", free: "2", locked: "1" },
      ],
      prices,
      opts
    );

    expect(snap.holdings.map((h) => [h.asset, h.valueInQuote])).toEqual([
      ["BTC", 15_000],
      ["ETH", 6_000],
      ["USDT", 1_000],
    ]);
    expect(snap.equityValue).toBe(22_000);
    expect(snap.equityValue).toBe(snap.holdings.reduce((s, h) => s + h.valueInQuote, 0));
    expect(snap.asOf).toBe(opts.now);
    expect(snap.skipped).toBe(0);
  });

  it("derives total, free and used when the backend omits them", () => {
    const snap = toPortfolioSnapshot([{ asset: "ETH", free: 2, locked: 1 }], prices, opts);
    expect(snap.holdings[0]).toEqual({
      asset: "ETH",
      quantity: 3,
      free: 2,
      used: 1,
      quotePrice: 2_000,
      valueInQuote: 6_000,
    });
  });

  it("prefers a backend quote_price over the ticker map", () => {
    const snap = toPortfolioSnapshot({ BTC: { total: 2, quote_price: 100 } }, prices, opts);
    expect(snap.holdings[0].quotePrice).toBe(100);
    expect(snap.equityValue).toBe(200);
  });

  it("has zero equity for an empty balance", () => {
    const snap = toPortfolioSnapshot({}, prices, opts);
    expect(snap.holdings).toEqual([]);
    expect(snap.equityValue).toBe(0);
    expect(toAllocationSlices(snap)).toEqual([]);
  });

  it("reads balances nested under assets / data / balances", () => {
    const snap = toPortfolioSnapshot({ data: [{ asset: "USDT", total: 50 }] }, prices, opts);
    expect(snap.equityValue).toBe(50);
  });

  it("skips and counts malformed rows", () => {
    const snap = toPortfolioSnapshot(
      [{ asset: "BTC", total: 1 }, { free: 1 }, { asset: "XRP" }, { asset: "ETH", total: "abc" }],
      prices,
      opts
    );
    expect(snap.holdings.map((h) => h.asset)).toEqual(["BTC"]);
    expect(snap.skipped).toBe(3);
    expect(snap.equityValue).toBe(30_000);
  });

  it("values unpriced assets at zero and reports them", () => {
    const snap = toPortfolioSnapshot([{ asset: "DOGE", total: 10 }], prices, opts);
    expect(snap.holdings[0].valueInQuote).toBe(0);
    expect(snap.holdings[0].quotePrice).toBeNull();
    expect(snap.unpricedAssets).toEqual(["DOGE"]);
  });

  it("reports an equity equal to the sum of the published holding values", () => {
    const snap = toPortfolioSnapshot(
      [
        { asset: "USDT", total: 0.1 },
        { asset: "USDC", total: 0.2, quote_price: 1 },
      ],
      prices,
      opts
    );
    const sum = snap.holdings.reduce((acc, h) => acc + h.valueInQuote, 0);
    expect(snap.holdings.map((h) => h.valueInQuote)).toEqual([0.2, 0.1]);
    expect(snap.equityValue).toBe(sum);
    expect(snap.equityValue).toBeCloseTo(0.3, 12);
  });

  it("rejects a mapping whose values are not objects", () => {
    expect(() => toPortfolioSnapshot({ BTC: 5 }, prices, opts)).toThrow(MalformedResponseFailure);
  });
});

describe("extractBalanceRows", () => {
  it("injects the asset name from mapping keys", () => {
    expect(extractBalanceRows({ BTC: { free: 1 } })).toEqual([{ asset: "BTC", free: 1 }]);
  });
});

describe("assetsNeedingPrices", () => {
  it("lists non-quote assets without a backend price", () => {
    const needed = assetsNeedingPrices(
      [
        { asset: "USDT", total: 1 },
        { asset: "BTC", total: 1 },
        { asset: "ETH", total: 1, quote_price: 2000 },
      ],
      "USDT"
    );
    expect(needed).toEqual(["BTC"]);
  });
});

describe("toAllocationSlices", () => {
  it("percentages sum to 1 when equity is positive", () => {
    const snap = toPortfolioSnapshot(
      [
        { asset: "USDT", total: 333.33 },
        { asset: "BTC", total: 0.0123 },
        { asset: "ETH", total: 1.7 },
      ],
      prices,
      opts
    );
    const slices = toAllocationSlices(snap);
    expect(slices).toHaveLength(3);
    const sum = slices.reduce((s, x) => s + x.percentage, 0);
    expect(Math.abs(sum - 1)).toBeLessThan(1e-9);
  });

  it("leaves out zero-value holdings", () => {
    const snap = toPortfolioSnapshot(
      [
        { asset: "USDT", total: 100 },
        { asset: "BTC", total: 0 },
      ],
      prices,
      opts
    );
    expect(toAllocationSlices(snap)).toEqual([{ asset: "USDT", valueInQuote: 100, percentage: 1 }]);
  });
});

describe("groupMinorSlices", () => {
  it("folds slices under the threshold into Other", () => {
    const grouped = groupMinorSlices([
      { asset: "BTC", valueInQuote: 99, percentage: 0.99 },
      { asset: "XRP", valueInQuote: 0.5, percentage: 0.005 },
      { asset: "ADA", valueInQuote: 0.5, percentage: 0.005 },
    ]);
    expect(grouped).toEqual([
      { asset: "BTC", valueInQuote: 99, percentage: 0.99 },
      { asset: "Other", valueInQuote: 1, percentage: 0.01 },
    ]);
  });

  it("returns the slices unchanged when none is minor", () => {
    const slices = [{ asset: "BTC", valueInQuote: 1, percentage: 1 }];
    expect(groupMinorSlices(slices)).toEqual(slices);
  });
});

describe("prices", () => {
  it("builds BASE/QUOTE pairs without the quote asset", () => {
    expect(pricePairs(["ETH", "USDT", "BTC", "ETH"], "USDT")).toEqual(["BTC/USDT", "ETH/USDT"]);
  });

  it("reads dict and list ticker payloads", () => {
    const fromDict = toPriceMap({ "BTC/USDT": { last: "30000" }, "ETH/USDT": { info: { price: 2000 } } }, "USDT");
    expect(fromDict.get("BTC")).toBe(30_000);
    expect(fromDict.get("ETH")).toBe(2_000);
    expect(fromDict.get("USDT")).toBe(1);

    const fromList = toPriceMap([{ symbol: "BTC/USDT", last: 31_000 }, { symbol: "BTC/EUR", last: 1 }, "junk"], "USDT");
    expect(fromList.get("BTC")).toBe(31_000);
    expect(fromList.size).toBe(2);
  });
});
