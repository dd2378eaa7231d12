import { Inject, Injectable, Logger } from "@nestjs/common";
import { SIMULATION_CONFIG } from "../config/simulation.config";
import type { SimulationConfig } from "../config/simulation.config";
import { PriceHistoryUnavailableError } from "../errors";
import { PriceSeries } from "../market/price-series";
import type { PricePoint } from "../market/price-series";
import type { PriceMap, PriceSource } from "../types";
import { formatDay, startOfUtcDay, toUnixSeconds } from "../utils/dates";

type ChartPayload = {
  chart?: {
    result?: Array<{
      meta?: { gmtoffset?: number | null };
      timestamp?: number[];
      indicators?: { quote?: Array<{ close?: Array<number | null> }> };
    }> | null;
    error?: { code?: string; description?: string } | null;
  };
};

/** Daily closing prices downloaded once per run, then served with as-of lookups. */
@Injectable()
export class MarketDataService implements PriceSource {
  private readonly logger = new Logger(MarketDataService.name);
  private readonly history = new Map<string, PriceSeries>();

  constructor(@Inject(SIMULATION_CONFIG) private readonly config: SimulationConfig) {}

  async loadHistory(symbols: string[], from: Date, to: Date) {
    for (const symbol of symbols) {
      this.logger.log(`Downloading historical data for ${symbol} from ${formatDay(from)} to ${formatDay(to)}`);
      const points = await this.fetchDailyCloses(symbol, from, to);
      if (points.length === 0) {
        this.logger.error(`No data fetched for ${symbol}. Check symbol or date range.`);
        throw new PriceHistoryUnavailableError(symbol, `no closes between ${formatDay(from)} and ${formatDay(to)}`);
      }
      const series = new PriceSeries(points);
      this.history.set(symbol, series);
      this.logger.log(`Loaded ${series.length} closes for ${symbol}`);
    }
  }

  getPrice(symbol: string, date: Date) {
    const series = this.history.get(symbol);
    if (!series) {
      this.logger.warn(`No history loaded for ${symbol}`);
      return null;
    }
    const price = series.asOf(date);
    if (price === null) {
      this.logger.debug(`No trading data available for ${symbol} at or before ${formatDay(date)}`);
    }
    return price;
  }

  private async fetchDailyCloses(symbol: string, from: Date, to: Date): Promise<PricePoint[]> {
    const base = this.config.priceApiBaseUrl.replace(/\/$/, "");
    const endpoint =
      `${base}/v8/finance/chart/${encodeURIComponent(symbol)}` +
      `?period1=${toUnixSeconds(from)}&period2=${toUnixSeconds(to)}&interval=1d&events=history`;

    let payload: ChartPayload;
    try {
      const response = await fetch(endpoint, { headers: { Accept: "application/json" } });
      if (!response.ok) {
        const body = await response.text().catch(() => "");
        throw new Error(`status=${response.status} body=${body.slice(0, 200)}`);
      }
      payload = (await response.json()) as ChartPayload;
    } catch (error) {
      this.logger.error(`Price history request failed for ${symbol}: ${String(error)}`);
      throw new PriceHistoryUnavailableError(symbol, "price history request failed", { cause: error });
    }

    if (payload.chart?.error) {
      throw new PriceHistoryUnavailableError(
        symbol,
        payload.chart.error.description ?? payload.chart.error.code ?? "chart error",
      );
    }

    const result = payload.chart?.result?.[0];
    const timestamps = result?.timestamp ?? [];
    const closes = result?.indicators?.quote?.[0]?.close ?? [];
    // bars are stamped at the exchange's local session start; date them in exchange time
    const gmtoffset = result?.meta?.gmtoffset;
    const offsetMs = typeof gmtoffset === "number" && Number.isFinite(gmtoffset) ? gmtoffset * 1000 : 0;
    const points: PricePoint[] = [];
    timestamps.forEach((timestamp, index) => {
      const close = closes[index];
      if (typeof close !== "number" || !Number.isFinite(close) || close <= 0) {
        return;
      }
      points.push({ day: startOfUtcDay(new Date(timestamp * 1000 + offsetMs)).getTime(), close });
    });
    return points;
  }
}

/** Prices for every symbol that has one as of `date`; the rest are logged and left out. */
export function resolvePrices(
  source: Pick<PriceSource, "getPrice">,
  symbols: readonly string[],
  date: Date,
  logger: Pick<Logger, "warn">,
): PriceMap {
  const prices: PriceMap = {};
  for (const symbol of symbols) {
    const price = source.getPrice(symbol, date);
    if (price === null) {
      logger.warn(`Price for ${symbol} on ${formatDay(date)} not available.`);
      continue;
    }
    prices[symbol] = price;
  }
  return prices;
}
