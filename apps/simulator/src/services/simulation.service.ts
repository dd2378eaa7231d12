import { Inject, Injectable, Logger } from "@nestjs/common";
import { SIMULATION_CONFIG } from "../config/simulation.config";
import type { SimulationConfig } from "../config/simulation.config";
import { Portfolio } from "../portfolio/portfolio";
import { NEWS_SOURCE, PRICE_SOURCE, RECOMMENDER } from "../tokens";
import type {
  DayReport,
  NewsSource,
  PriceSource,
  Recommender,
  SimulationResult,
  SymbolDecision,
} from "../types";
import { addDays, formatDay } from "../utils/dates";
import { resolvePrices } from "./market-data.service";
import { TradingService, planTrade } from "./trading.service";

export interface SimulationWindow {
  startDate: Date;
  endDate: Date;
  historyFrom: Date;
  historyTo: Date;
}

/**
 * Iterations are `intervalDays` apart and the last one lands one interval before `endDate`,
 * so with the default weekly interval the first trading date is `days` weeks back, not `days`
 * calendar days. `endDate` itself is only the valuation anchor.
 */
export function simulationWindow(config: SimulationConfig): SimulationWindow {
  const startDate = addDays(config.endDate, -config.simulationDays * config.intervalDays);
  return {
    startDate,
    endDate: config.endDate,
    historyFrom: addDays(startDate, -config.priceLookbackDays),
    historyTo: addDays(config.endDate, config.intervalDays),
  };
}

@Injectable()
export class SimulationService {
  private readonly logger = new Logger(SimulationService.name);

  constructor(
    @Inject(SIMULATION_CONFIG) private readonly config: SimulationConfig,
    @Inject(PRICE_SOURCE) private readonly prices: PriceSource,
    @Inject(NEWS_SOURCE) private readonly news: NewsSource,
    @Inject(RECOMMENDER) private readonly recommender: Recommender,
    @Inject(TradingService) private readonly trading: TradingService,
  ) {}

  async run(): Promise<SimulationResult> {
    const startedAt = Date.now();
    const symbols = [...this.config.symbols];
    const window = simulationWindow(this.config);
    this.logger.log(
      `Simulation start: symbols=${symbols.join(",")} days=${this.config.simulationDays} interval=${this.config.intervalDays}d window=${formatDay(window.startDate)}..${formatDay(window.endDate)}`,
    );

    await this.prices.loadHistory(symbols, window.historyFrom, window.historyTo);

    const portfolio = new Portfolio(this.config.initialCash);
    const days: DayReport[] = [];
    let currentDate = window.startDate;

    for (let iteration = 0; iteration < this.config.simulationDays; iteration += 1) {
      days.push(await this.runDay(portfolio, symbols, currentDate));
      currentDate = addDays(currentDate, this.config.intervalDays);

      const isLast = iteration === this.config.simulationDays - 1;
      if (!isLast && this.config.dayPauseMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.config.dayPauseMs));
      }
    }

    const finalPrices = resolvePrices(this.prices, symbols, window.endDate, this.logger);
    const finalValue = portfolio.getValue(finalPrices);
    const tradingDays = days.filter((day) => day.valuation !== null).length;
    const result: SimulationResult = {
      startDate: formatDay(window.startDate),
      endDate: formatDay(window.endDate),
      iterations: days.length,
      tradingDays,
      skippedDays: days.length - tradingDays,
      days,
      transactions: [...portfolio.transactions],
      initialCash: portfolio.initialCash,
      finalCash: portfolio.cash,
      holdings: portfolio.holdings,
      finalValue,
      returnPct: portfolio.initialCash > 0 ? ((finalValue - portfolio.initialCash) / portfolio.initialCash) * 100 : 0,
      report: "",
    };
    result.report = buildReportText(result);

    this.logger.log(`Trading simulation complete in ${Date.now() - startedAt}ms. Final portfolio value: ${finalValue.toFixed(2)}`);
    this.logger.log(`\n${result.report}`);
    return result;
  }

  async runDay(portfolio: Portfolio, symbols: string[], date: Date): Promise<DayReport> {
    const day = formatDay(date);
    const prices = resolvePrices(this.prices, symbols, date, this.logger);
    if (Object.keys(prices).length === 0) {
      this.logger.log(`[${day}] No trading data; skipping.`);
      return { date: day, prices, decisions: [], valuation: null };
    }

    this.logger.log(`=== Trading Day: ${day} ===`);
    const decisions: SymbolDecision[] = [];
    for (const symbol of symbols) {
      if (!Object.hasOwn(prices, symbol)) {
        this.logger.log(`[${day}] Skipping ${symbol} due to missing price data.`);
        continue;
      }

      const price = prices[symbol];
      const articles = await this.news.fetchNews(symbol, date);
      const recommendation = await this.recommender.analyze(symbol, articles, price, date);
      const intent = planTrade(recommendation.recommendation, price, portfolio);
      const executed = this.trading.execute(portfolio, recommendation.recommendation, intent, price, date);
      decisions.push({ symbol, price, recommendation, intent, executed });
    }

    const valuation = this.trading.value(portfolio, prices);
    this.logger.log(`End of Day ${day} portfolio value: ${valuation.totalValue.toFixed(2)}`);
    return { date: day, prices, decisions, valuation };
  }
}

export function buildReportText(result: SimulationResult) {
  const money = (value: number) => value.toFixed(2);
  const lines: string[] = [];
  lines.push(`Window: ${result.startDate} .. ${result.endDate}`);
  lines.push(`Iterations: ${result.iterations} (trading=${result.tradingDays}, skipped=${result.skippedDays})`);
  lines.push("");
  lines.push("Decisions");
  const decisions = result.days.flatMap((day) => day.decisions.map((decision) => ({ day: day.date, decision })));
  if (decisions.length === 0) {
    lines.push("- None");
  } else {
    for (const { day, decision } of decisions) {
      const rec = decision.recommendation.recommendation;
      const source = decision.recommendation.status === "ok" ? "llm" : `fallback:${decision.recommendation.reason}`;
      const outcome =
        decision.intent.kind === "trade"
          ? `${decision.intent.side} x${decision.intent.shares} ${decision.executed ? "filled" : "rejected"}`
          : `no trade (${decision.intent.reason})`;
      lines.push(
        `- ${day} ${decision.symbol} @ ${money(decision.price)} ${rec.action} buy<=${money(rec.buyLimit)} sell>=${money(rec.sellLimit)} [${source}] -> ${outcome}`,
      );
    }
  }
  lines.push("");
  lines.push("Executed Trades");
  if (result.transactions.length === 0) {
    lines.push("- None");
  } else {
    for (const trade of result.transactions) {
      lines.push(
        `- ${trade.date.slice(0, 10)} ${trade.action} ${trade.symbol} x${trade.shares} @ ${money(trade.price)} total=${money(trade.price * trade.shares)}`,
      );
    }
  }
  lines.push("");
  lines.push("Portfolio");
  lines.push(`- Initial Cash: ${money(result.initialCash)}`);
  lines.push(`- Cash: ${money(result.finalCash)}`);
  const holdings = Object.entries(result.holdings);
  lines.push(`- Holdings: ${holdings.length > 0 ? holdings.map(([symbol, shares]) => `${symbol}=${shares}`).join(", ") : "-"}`);
  lines.push(`- Final Value: ${money(result.finalValue)}`);
  lines.push(`- Return: ${result.returnPct.toFixed(2)}%`);
  return lines.join("\n");
}
