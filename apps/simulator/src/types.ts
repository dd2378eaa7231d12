export type TradeAction = "BUY" | "SELL" | "HOLD";

export type TradeSide = Exclude<TradeAction, "HOLD">;

export const TRADE_ACTIONS: readonly TradeAction[] = ["BUY", "SELL", "HOLD"];

export interface NewsItem {
  title: string;
  description: string;
}

export interface Recommendation {
  symbol: string;
  buyLimit: number;
  sellLimit: number;
  action: TradeAction;
}

export type DegradedReason = "missing-api-key" | "request-failed" | "no-structured-output" | "invalid-structure";

export type RecommendationResult =
  | { status: "ok"; recommendation: Recommendation }
  | { status: "degraded"; recommendation: Recommendation; reason: DegradedReason; detail: string };

export interface Transaction {
  date: string;
  symbol: string;
  action: TradeSide;
  price: number;
  shares: number;
}

export type PriceMap = Record<string, number>;

export interface PriceSource {
  loadHistory(symbols: string[], from: Date, to: Date): Promise<void>;
  getPrice(symbol: string, date: Date): number | null;
}

export interface NewsSource {
  fetchNews(symbol: string, date: Date): Promise<NewsItem[]>;
}

export interface Recommender {
  analyze(symbol: string, news: NewsItem[], currentPrice: number, date: Date): Promise<RecommendationResult>;
}

export type NoTradeReason = "hold" | "buy-limit-not-met" | "sell-limit-not-met" | "insufficient-cash" | "no-position";

export type TradeIntent =
  | { kind: "trade"; side: TradeSide; shares: number }
  | { kind: "none"; reason: NoTradeReason };

export interface SymbolDecision {
  symbol: string;
  price: number;
  recommendation: RecommendationResult;
  intent: TradeIntent;
  executed: boolean;
}

export interface Valuation {
  cash: number;
  holdingsValue: number;
  totalValue: number;
}

export interface DayReport {
  date: string;
  prices: PriceMap;
  decisions: SymbolDecision[];
  valuation: Valuation | null;
}

export interface SimulationResult {
  startDate: string;
  endDate: string;
  iterations: number;
  tradingDays: number;
  skippedDays: number;
  days: DayReport[];
  transactions: Transaction[];
  initialCash: number;
  finalCash: number;
  holdings: Record<string, number>;
  finalValue: number;
  returnPct: number;
  report: string;
}
