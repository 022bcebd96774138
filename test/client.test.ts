import { describe, it, expect, vi } from "vitest";
import { ExchangeClient, type FetchLike } from "../src/exchange/client.js";
import {
  AuthFailure,
  ConnectionFailure,
  MalformedResponseFailure,
  RequestFailure,
  ServerFailure,
} from "../src/exchange/errors.js";

const BASE = "http://exchange.test";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function makeClient(fetchImpl: FetchLike, timeoutMs = 3_000): ExchangeClient {
  return new ExchangeClient({
    baseUrl: `${BASE}/`,
    apiKey: "test-secret",
    timeoutMs,
    slider: { min: 10, max: 1000 },
    fetchImpl,
  });
}

/** Never answers; rejects with the signal's reason once the request is aborted. */
const hangingFetch: FetchLike = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });

describe("ExchangeClient", () => {
  it("sends the API key on every request", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse([]));
    await makeClient(fetchImpl).fetchPortfolio();

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe(`${BASE}/balance`);
    expect(init?.headers).toMatchObject({ "x-api-key": "test-secret" });
    expect(init?.signal).toBeDefined();
  });

  it("clamps the orders tail into the slider range before requesting", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse([]));
    const client = makeClient(fetchImpl);

    await client.fetchOrders(5);
    await client.fetchOrders(5_000);
    await client.fetchOrders(250);

    expect(fetchImpl.mock.calls.map(([url]) => url)).toEqual([
      `${BASE}/orders?tail=10`,
      `${BASE}/orders?tail=1000`,
      `${BASE}/orders?tail=250`,
    ]);
  });

  it("fetches the whole book for a null tail and passes a status filter", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse([]));
    const client = makeClient(fetchImpl);

    await client.fetchOrders(null);
    await client.fetchOrders(20, "filled");

    expect(fetchImpl.mock.calls.map(([url]) => url)).toEqual([`${BASE}/orders`, `${BASE}/orders?tail=20&status=filled`]);
  });

  it("requests tickers with literal pair slashes and skips an empty list", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({}));
    const client = makeClient(fetchImpl);

    expect(await client.fetchPrices([])).toEqual({});
    expect(fetchImpl).not.toHaveBeenCalled();

    await client.fetchPrices(["BTC/USDT", "ETH/USDT"]);
    expect(fetchImpl.mock.calls[0][0]).toBe(`${BASE}/tickers/BTC/USDT,ETH/USDT`);
  });

  it("asks for order history", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({ error: "gone" }));
    expect(await makeClient(fetchImpl).fetchOrder("a b")).toEqual({ error: "gone" });
    expect(fetchImpl.mock.calls[0][0]).toBe(`${BASE}/orders/a%20b?include_history=true`);
  });

  it("reads the active asset count", async () => {
    const client = makeClient(async () => jsonResponse({ count: "3" }));
    expect(await client.fetchActiveAssetCount()).toBe(3);
  });

  it.each([
    [401, AuthFailure, "auth"],
    [403, AuthFailure, "auth"],
    [500, ServerFailure, "server"],
    [503, ServerFailure, "server"],
    [404, RequestFailure, "request"],
  ] as const)("classifies HTTP %i", async (status, type, kind) => {
    const client = makeClient(async () => new Response("nope", { status }));
    const err = await client.fetchPortfolio().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(type);
    expect(err).toMatchObject({ kind, status, path: "/balance" });
  });

  it("reports an unreachable exchange as a connection failure", async () => {
    const client = makeClient(async () => {
      throw new TypeError("fetch failed");
    });
    const err = await client.fetchPortfolio().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConnectionFailure);
    expect(err).toMatchObject({ kind: "connection", status: null });
  });

  it("reports a timed-out request as a connection failure", async () => {
    const client = makeClient(hangingFetch, 20);
    await expect(client.fetchOrders(10)).rejects.toBeInstanceOf(ConnectionFailure);
  });

  it("rejects bodies that are not JSON or not the expected shape", async () => {
    const notJson = makeClient(async () => new Response("<html>", { status: 200 }));
    await expect(notJson.fetchPortfolio()).rejects.toBeInstanceOf(MalformedResponseFailure);

    const notList = makeClient(async () => jsonResponse({ orders: [] }));
    await expect(notList.fetchOrders(10)).rejects.toBeInstanceOf(MalformedResponseFailure);

    const scalar = makeClient(async () => jsonResponse(42));
    await expect(scalar.fetchPortfolio()).rejects.toBeInstanceOf(MalformedResponseFailure);
  });

  it("refuses an empty base URL or API key", () => {
    const fetchImpl: FetchLike = async () => jsonResponse([]);
    const base = { timeoutMs: 1000, slider: { min: 10, max: 100 }, fetchImpl };
    expect(() => new ExchangeClient({ ...base, baseUrl: "", apiKey: "k" })).toThrow(/base URL/);
    expect(() => new ExchangeClient({ ...base, baseUrl: BASE, apiKey: " " })).toThrow(/API key/);
  });
});
