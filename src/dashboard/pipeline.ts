/**
 * One refresh cycle: fetch everything the dashboard shows, price it once,
 * and build an immutable `DashboardState`.
 */
import type { Settings } from "../config/schema.js";
import type { ExchangeClient } from "../exchange/client.js";
import type { AssetsOverviewPayload } from "../exchange/payloads.js";
import { toAssetsOverview, type AssetsOverview } from "../model/overview.js";
import { toOrderBatch, type OrderBatch } from "../model/orders.js";
import {
  assetsNeedingPrices,
  groupMinorSlices,
  toAllocationSlices,
  toPortfolioSnapshot,
  type AllocationSlice,
  type PortfolioSnapshot,
} from "../model/portfolio.js";
import { pricePairs, toPriceMap } from "../model/prices.js";
import {
  toPerformanceMetrics,
  toTradesSummary,
  tradedAssets,
  type PerformanceMetrics,
  type TradesSummary,
} from "../model/trades.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("Pipeline");

export interface DashboardState {
  asOf: number;
  quoteAsset: string;
  portfolio: PortfolioSnapshot;
  allocation: AllocationSlice[];
  /** Allocation with minor slices folded into "Other". */
  chart: AllocationSlice[];
  orders: OrderBatch;
  /** Orders tail used for this cycle; `null` means the whole book. */
  tail: number | null;
  trades: TradesSummary;
  performance: PerformanceMetrics;
  assetsOverview: AssetsOverview | null;
  /** Assets with a non-zero balance as the exchange counts them. */
  activeAssets: number | null;
}

export class DashboardPipeline {
  private tail: number | null;

  constructor(
    private readonly client: ExchangeClient,
    private readonly settings: Settings,
    private readonly clock: () => number = Date.now
  ) {
    this.tail = settings.slider.default;
  }

  /** Set the orders tail for the next cycles; clamped to the slider range, `null` for all. */
  setTail(tail: number | null): number | null {
    this.tail = tail === null ? null : this.client.clampLimit(tail);
    return this.tail;
  }

  getTail(): number | null {
    return this.tail;
  }

  async load(): Promise<DashboardState> {
    const { quoteAsset } = this.settings;
    const tail = this.tail;

    const advanced = this.settings.advancedDetails;
    const [balance, orderRows, tradesRaw, assetsRaw, activeAssets] = await Promise.all([
      this.client.fetchPortfolio(),
      this.client.fetchOrders(tail),
      this.client.fetchTradesOverview(),
      advanced ? this.client.fetchAssetsOverview() : Promise.resolve<AssetsOverviewPayload | null>(null),
      advanced ? this.client.fetchActiveAssetCount() : Promise.resolve(null),
    ]);

    const needed = new Set([...assetsNeedingPrices(balance, quoteAsset), ...tradedAssets(tradesRaw, quoteAsset)]);
    const prices = toPriceMap(await this.client.fetchPrices(pricePairs(needed, quoteAsset)), quoteAsset);

    const now = this.clock();
    const portfolio = toPortfolioSnapshot(balance, prices, { quoteAsset, now });
    const allocation = toAllocationSlices(portfolio);
    const orders = toOrderBatch(orderRows, now, {
      freshWindowMs: this.settings.staleness.freshWindowMs,
      maxLevels: this.settings.staleness.levels,
    });
    const trades = toTradesSummary(tradesRaw, prices, quoteAsset);

    if (portfolio.unpricedAssets.length > 0) {
      logger.warn({ assets: portfolio.unpricedAssets }, "No price for some holdings; valued at 0");
    }

    return {
      asOf: now,
      quoteAsset,
      portfolio,
      allocation,
      chart: groupMinorSlices(allocation),
      orders,
      tail,
      trades,
      performance: toPerformanceMetrics(trades),
      assetsOverview: assetsRaw ? toAssetsOverview(assetsRaw, quoteAsset) : null,
      activeAssets,
    };
  }
}
