import { describe, it, expect } from "vitest";
import { MalformedResponseFailure } from "../src/exchange/errors.js";
import {
  applyOrderFilter,
  filterOptions,
  normalizeStatus,
  parseOrderPayload,
  stalenessTier,
  toOrderBatch,
  toOrderDetail,
  toOrderRecord,
} from "../src/model/orders.js";
import type { OrderPayload } from "../src/exchange/payloads.js";

const staleness = { freshWindowMs: 60_000, maxLevels: 60 };

function payload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: "o-1",
    symbol: "BTC/USDT",
    side: "buy",
    type: "limit",
    status: "filled",
    ts_create: 100,
    ts_update: 150,
    ts_finish: 142,
    price: 10,
    limit_price: 11,
    amount: 2,
    actual_filled: 2,
    actual_notion: 20,
    actual_fee: 0.5,
    ...overrides,
  };
}

function parsed(raw: Record<string, unknown>): OrderPayload {
  const p = parseOrderPayload(raw);
  if (p === null) throw new Error("fixture did not parse");
  return p;
}

describe("stalenessTier", () => {
  it("counts whole freshness windows", () => {
    expect(stalenessTier(0, 60_000, 60)).toBe(0);
    expect(stalenessTier(59_000, 60_000, 60)).toBe(0);
    expect(stalenessTier(60_000, 60_000, 60)).toBe(1);
    expect(stalenessTier(3_600_000, 60_000, 60)).toBe(60);
  });

  it("clamps at the maximum and floors future timestamps at 0", () => {
    expect(stalenessTier(7_200_000, 60_000, 60)).toBe(60);
    expect(stalenessTier(-5_000, 60_000, 60)).toBe(0);
  });

  it("never decreases as time passes", () => {
    let previous = 0;
    for (let age = 0; age <= 5_000_000; age += 7_919) {
      const tier = stalenessTier(age, 60_000, 60);
      expect(tier).toBeGreaterThanOrEqual(previous);
      previous = tier;
    }
  });
});

describe("normalizeStatus", () => {
  it("folds spelling variants", () => {
    expect(normalizeStatus("cancelled")).toBe("canceled");
    expect(normalizeStatus("PARTIALLY FILLED")).toBe("partially_filled");
    expect(normalizeStatus("partially-canceled")).toBe("partially_canceled");
    expect(normalizeStatus(" New ")).toBe("new");
  });

  it("maps anything else to unknown", () => {
    expect(normalizeStatus("pending_review")).toBe("unknown");
    expect(normalizeStatus(null)).toBe("unknown");
    expect(normalizeStatus("")).toBe("unknown");
  });
});

describe("toOrderRecord", () => {
  it("computes latency from request to execution", () => {
    const r = toOrderRecord(parsed(payload()), 1_000, staleness);
    expect(r.requestedAt).toBe(100);
    expect(r.executedAt).toBe(142);
    expect(r.latencyMs).toBe(42);
  });

  it("leaves latency absent for an order that has not executed", () => {
    const r = toOrderRecord(parsed(payload({ ts_finish: null, status: "new" })), 1_000, staleness);
    expect(r.executedAt).toBeNull();
    expect(r.latencyMs).toBeNull();
  });

  it("maps fields and splits the symbol", () => {
    const r = toOrderRecord(parsed(payload({ id: 7, side: "SELL" })), 100, staleness);
    expect(r.id).toBe("7");
    expect(r.side).toBe("sell");
    expect(r.asset).toBe("BTC");
    expect(r.quoteAsset).toBe("USDT");
    expect(r.notionalCurrency).toBe("USDT");
    expect(r.feeCurrency).toBe("USDT");
    expect(r.limitPrice).toBe(11);
    expect(r.updatedAt).toBe(150);
    expect(r.stalenessTier).toBe(0);
  });

  it("adds the fee to a buy and subtracts it from a sell", () => {
    expect(toOrderRecord(parsed(payload()), 0, staleness).feeAdjustedValue).toBe(20.5);
    expect(toOrderRecord(parsed(payload({ side: "sell" })), 0, staleness).feeAdjustedValue).toBe(19.5);
  });

  it("falls back to price × filled when notional is missing", () => {
    const r = toOrderRecord(parsed(payload({ actual_notion: null, price: 3, actual_filled: 4 })), 0, staleness);
    expect(r.notional).toBe(12);
  });

  it("derives the staleness tier from the request time", () => {
    const r = toOrderRecord(parsed(payload({ ts_create: 0 })), 125_000, staleness);
    expect(r.stalenessTier).toBe(2);
  });
});

describe("toOrderBatch", () => {
  it("skips malformed rows without blanking the table", () => {
    const rows: unknown[] = Array.from({ length: 9 }, (_, i) => payload({ id: `o-${i}`, ts_update: 1_000 + i }));
    rows.splice(4, 0, { id: "broken", symbol: "BTC/USDT" });

    const batch = toOrderBatch(rows, 2_000, staleness);
    expect(batch.records).toHaveLength(9);
    expect(batch.skipped).toBe(1);
  });

  it("sorts by last update, newest first", () => {
    const batch = toOrderBatch(
      [payload({ id: "a", ts_update: 200 }), payload({ id: "b", ts_update: 900 }), payload({ id: "c", ts_update: 500 })],
      1_000,
      staleness
    );
    expect(batch.records.map((r) => r.id)).toEqual(["b", "c", "a"]);
  });
});

describe("order filters", () => {
  const { records } = toOrderBatch(
    [
      payload({ id: "1", status: "filled", side: "buy", symbol: "BTC/USDT" }),
      payload({ id: "2", status: "canceled", side: "sell", symbol: "ETH/USDT" }),
      payload({ id: "3", status: "filled", side: "sell", symbol: "ETH/USDT", type: "market" }),
    ],
    1_000,
    staleness
  );

  it("lists distinct values per column", () => {
    expect(filterOptions(records)).toEqual({
      status: ["canceled", "filled"],
      side: ["buy", "sell"],
      type: ["limit", "market"],
      asset: ["BTC", "ETH"],
    });
  });

  it("applies every selected constraint", () => {
    expect(applyOrderFilter(records, { status: ["filled"], side: ["sell"] }).map((r) => r.id)).toEqual(["3"]);
    expect(applyOrderFilter(records, { asset: [] })).toHaveLength(3);
  });
});

describe("toOrderDetail", () => {
  it("returns null for a pruned order", () => {
    expect(toOrderDetail({ error: "Order not found" }, 0, staleness)).toBeNull();
  });

  it("sorts history by numeric step", () => {
    const detail = toOrderDetail(
      payload({
        history: {
          "10": { ts: 300, status: "filled", comment: "done" },
          "2": { ts: 200, status: "partially filled", actual_filled: 1 },
          "1": { ts: 100, status: "new" },
        },
      }),
      1_000,
      staleness
    );
    expect(detail?.history.map((h) => h.step)).toEqual([1, 2, 10]);
    expect(detail?.history[1].status).toBe("partially_filled");
    expect(detail?.history[1].filled).toBe(1);
    expect(detail?.history[2].comment).toBe("done");
  });

  it("rejects a body that is not an order", () => {
    expect(() => toOrderDetail({ foo: 1 }, 0, staleness)).toThrow(MalformedResponseFailure);
  });
});
