/**
 * Dashboard HTTP server.
 *
 * Endpoints:
 *   GET  /                 → single-page UI
 *   GET  /api/state        → refresh status + formatted views (order filters as query params)
 *   POST /api/refresh      → run a cycle now (`?tail=N` or `?tail=all`)
 *   GET  /api/orders/{id}  → order detail with history
 *   GET  /api/health       → health + metrics
 *   GET  /logo             → configured logo
 */
import http from "node:http";
import type { Branding } from "../config/load.js";
import type { Settings } from "../config/schema.js";
import type { ExchangeClient } from "../exchange/client.js";
import { isExchangeFailure } from "../exchange/errors.js";
import { toOrderDetail, type OrderFilter } from "../model/orders.js";
import type { FadePalette } from "../model/palette.js";
import type { HealthMonitor } from "../monitoring/health.js";
import type { Metrics } from "../monitoring/metrics.js";
import type { RefreshDriver, RefreshError, RefreshState } from "../refresh/driver.js";
import { createLogger } from "../utils/logger.js";
import { renderPage } from "./page.js";
import type { DashboardPipeline, DashboardState } from "./pipeline.js";
import {
  orderDetailView,
  ordersView,
  performanceView,
  portfolioView,
  type OrdersView,
  type PerformanceView,
  type PortfolioView,
  type ViewContext,
} from "./views.js";

const logger = createLogger("Dashboard");

export interface DashboardDeps {
  settings: Settings;
  branding: Branding;
  palette: FadePalette;
  client: ExchangeClient;
  pipeline: DashboardPipeline;
  driver: RefreshDriver<DashboardState>;
  metrics: Metrics;
  health: HealthMonitor;
}

export interface StatePayload {
  refresh: {
    lastSuccessAt: number | null;
    error: RefreshError | null;
    cycles: number;
    failures: number;
    inFlight: boolean;
  };
  tail: number | null;
  slider: Settings["slider"];
  skipped: { balances: number; orders: number } | null;
  view: {
    portfolio: PortfolioView;
    orders: OrdersView;
    performance: PerformanceView;
  } | null;
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
  }
}

export function buildStatePayload(
  snap: RefreshState<DashboardState>,
  deps: Pick<DashboardDeps, "settings" | "palette" | "pipeline">,
  filter: OrderFilter = {}
): StatePayload {
  const ctx: ViewContext = { settings: deps.settings, palette: deps.palette };
  const data = snap.data;
  return {
    refresh: {
      lastSuccessAt: snap.lastSuccessAt,
      error: snap.error,
      cycles: snap.cycles,
      failures: snap.failures,
      inFlight: snap.inFlight,
    },
    // A refresh that joined an in-flight cycle gets that cycle's tail.
    tail: data ? data.tail : deps.pipeline.getTail(),
    slider: deps.settings.slider,
    skipped: data ? { balances: data.portfolio.skipped, orders: data.orders.skipped } : null,
    view: data
      ? {
          portfolio: portfolioView(data, ctx),
          orders: ordersView(data, ctx, filter),
          performance: performanceView(data),
        }
      : null,
  };
}

/** `?status=filled,new&side=buy` → filter; absent parameters impose no constraint. */
export function parseOrderFilter(params: URLSearchParams): OrderFilter {
  const list = (key: string): string[] | undefined => {
    const raw = params.getAll(key).flatMap((v) => v.split(","));
    const values = raw.map((v) => v.trim()).filter((v) => v !== "");
    return values.length > 0 ? values : undefined;
  };
  return { status: list("status"), side: list("side"), type: list("type"), asset: list("asset") };
}

/** `"all"` → whole book; a number → that tail; anything else is a 400. */
export function parseTail(raw: string | null): number | null | undefined {
  if (raw === null || raw === "") return undefined;
  if (raw.toLowerCase() === "all") return null;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new HttpError(400, `Invalid tail: ${raw}`);
  return n;
}

export function createDashboardServer(deps: DashboardDeps): http.Server {
  const page = renderPage({
    title: deps.branding.title,
    hasLogo: deps.branding.logo !== null,
    slider: deps.settings.slider,
    refreshIntervalMs: deps.settings.refreshIntervalMs,
  });
  const ctx: ViewContext = { settings: deps.settings, palette: deps.palette };

  async function handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://dashboard.local");
    const method = req.method ?? "GET";
    const path = url.pathname;

    if (path === "/" && method === "GET") {
      res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
      res.end(page);
      return;
    }

    if (path === "/api/state" && method === "GET") {
      sendJson(res, 200, buildStatePayload(deps.driver.snapshot(), deps, parseOrderFilter(url.searchParams)));
      return;
    }

    if (path === "/api/refresh" && method === "POST") {
      const tail = parseTail(url.searchParams.get("tail"));
      if (tail !== undefined) deps.pipeline.setTail(tail);
      const snap = await deps.driver.trigger();
      sendJson(res, 200, buildStatePayload(snap, deps, parseOrderFilter(url.searchParams)));
      return;
    }

    if (path.startsWith("/api/orders/") && method === "GET") {
      const id = decodePathSegment(path.slice("/api/orders/".length));
      if (id === "") throw new HttpError(400, "Missing order id");
      const raw = await deps.client.fetchOrder(id);
      const detail = toOrderDetail(raw, Date.now(), {
        freshWindowMs: deps.settings.staleness.freshWindowMs,
        maxLevels: deps.settings.staleness.levels,
      });
      if (detail === null) throw new HttpError(404, `Order ${id} not found (it may have been pruned)`);
      sendJson(res, 200, orderDetailView(detail, ctx));
      return;
    }

    if (path === "/api/health" && method === "GET") {
      const snap = deps.driver.snapshot();
      const health = deps.health.status({ lastCycleOk: snap.error === null });
      sendJson(res, health.healthy ? 200 : 503, { health, metrics: deps.metrics.snapshot() });
      return;
    }

    if (path === "/logo" && method === "GET" && deps.branding.logo) {
      res.writeHead(200, { "Content-Type": deps.branding.logo.contentType, "Cache-Control": "max-age=3600" });
      res.end(deps.branding.logo.bytes);
      return;
    }

    throw new HttpError(404, `No route for ${method} ${path}`);
  }

  return http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      if (err instanceof HttpError) {
        sendJson(res, err.status, { error: err.message });
      } else if (isExchangeFailure(err)) {
        logger.warn({ kind: err.kind, path: err.path, err: err.message }, "Exchange request failed");
        sendJson(res, 502, { error: err.message, kind: err.kind });
      } else {
        logger.error({ err: String(err), url: req.url }, "Request handler error");
        sendJson(res, 500, { error: "Internal error" });
      }
    });
  });
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    throw new HttpError(400, `Malformed path segment: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  if (res.headersSent) {
    res.end();
    return;
  }
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

/** Start listening; resolves once the socket is bound. */
export function startDashboard(deps: DashboardDeps): Promise<http.Server> {
  const server = createDashboardServer(deps);
  const { host, port } = deps.settings.server;
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      logger.info({ host, port, url: `http://${host}:${port}` }, "Dashboard started");
      resolve(server);
    });
  });
}
