import type { SimulationConfig } from "../src/config/simulation.config";
import type {
  NewsItem,
  NewsSource,
  PriceSource,
  Recommendation,
  RecommendationResult,
  Recommender,
} from "../src/types";
import { formatDay } from "../src/utils/dates";

export const day = (value: string) => new Date(`${value}T00:00:00.000Z`);

export const makeConfig = (overrides: Partial<SimulationConfig> = {}): SimulationConfig => ({
  symbols: ["AAPL"],
  initialCash: 1000,
  simulationDays: 1,
  intervalDays: 1,
  endDate: day("2024-03-05"),
  priceLookbackDays: 0,
  dayPauseMs: 0,
  priceApiBaseUrl: "https://prices.test",
  newsApiBaseUrl: "https://news.test",
  openaiModel: "test-model",
  openaiTemperature: 0.5,
  openaiMaxTokens: 150,
  logLevels: ["log", "error", "warn"],
  ...overrides,
});

/** Exact-day lookups over a fixed table: `{ AAPL: { "2024-03-04": 145 } }`. */
export class TablePriceSource implements PriceSource {
  readonly loads: Array<{ symbols: string[]; from: string; to: string }> = [];

  constructor(private readonly table: Record<string, Record<string, number>>) {}

  async loadHistory(symbols: string[], from: Date, to: Date) {
    this.loads.push({ symbols, from: formatDay(from), to: formatDay(to) });
  }

  getPrice(symbol: string, date: Date) {
    return this.table[symbol]?.[formatDay(date)] ?? null;
  }
}

export class StaticNewsSource implements NewsSource {
  readonly calls: Array<{ symbol: string; day: string }> = [];

  async fetchNews(symbol: string, date: Date): Promise<NewsItem[]> {
    this.calls.push({ symbol, day: formatDay(date) });
    return [{ title: `${symbol} headline`, description: "details" }];
  }
}

type Answer = Omit<Recommendation, "symbol">;

/** Answers from a per-day script; days without an entry get HOLD. */
export class ScriptedRecommender implements Recommender {
  readonly calls: Array<{ symbol: string; day: string; price: number; news: NewsItem[] }> = [];

  constructor(private readonly script: Record<string, Answer> = {}) {}

  async analyze(symbol: string, news: NewsItem[], currentPrice: number, date: Date): Promise<RecommendationResult> {
    const key = formatDay(date);
    this.calls.push({ symbol, day: key, price: currentPrice, news });
    const answer: Answer = this.script[key] ?? { action: "HOLD", buyLimit: currentPrice * 0.95, sellLimit: currentPrice * 1.05 };
    return { status: "ok", recommendation: { symbol, ...answer } };
  }
}
