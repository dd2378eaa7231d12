import { Injectable, Logger } from "@nestjs/common";
import { Portfolio } from "../portfolio/portfolio";
import type { PriceMap, Recommendation, TradeIntent, Valuation } from "../types";
import { formatDay } from "../utils/dates";

export interface LedgerView {
  readonly cash: number;
  sharesOf(symbol: string): number;
}

/**
 * Limit-price policy. Only the branch named by the recommendation's action is evaluated:
 * BUY spends all cash on whole shares when the price is at or under the buy limit, SELL
 * liquidates the whole position when the price is at or over the sell limit.
 */
export function planTrade(recommendation: Recommendation, price: number, ledger: LedgerView): TradeIntent {
  switch (recommendation.action) {
    case "BUY": {
      if (price > recommendation.buyLimit) {
        return { kind: "none", reason: "buy-limit-not-met" };
      }
      let shares = Math.floor(ledger.cash / price);
      // the float quotient can round up past what the cash covers
      while (shares > 0 && shares * price > ledger.cash) {
        shares -= 1;
      }
      return shares > 0 ? { kind: "trade", side: "BUY", shares } : { kind: "none", reason: "insufficient-cash" };
    }
    case "SELL": {
      if (price < recommendation.sellLimit) {
        return { kind: "none", reason: "sell-limit-not-met" };
      }
      const shares = ledger.sharesOf(recommendation.symbol);
      return shares > 0 ? { kind: "trade", side: "SELL", shares } : { kind: "none", reason: "no-position" };
    }
    case "HOLD":
      return { kind: "none", reason: "hold" };
  }
}

@Injectable()
export class TradingService {
  private readonly logger = new Logger(TradingService.name);

  /** Returns whether the portfolio accepted the trade; no-trade intents only log. */
  execute(
    portfolio: Portfolio,
    recommendation: Recommendation,
    intent: TradeIntent,
    price: number,
    date: Date,
  ): boolean {
    const day = formatDay(date);
    const symbol = recommendation.symbol;

    if (intent.kind === "none") {
      this.logger.log(`[${day}] No trade executed for ${symbol}; action: ${recommendation.action} (${intent.reason})`);
      return false;
    }

    return intent.side === "BUY"
      ? portfolio.buy(symbol, price, intent.shares, date)
      : portfolio.sell(symbol, price, intent.shares, date);
  }

  value(portfolio: Portfolio, prices: PriceMap): Valuation {
    const totalValue = portfolio.getValue(prices);
    return {
      cash: portfolio.cash,
      holdingsValue: totalValue - portfolio.cash,
      totalValue,
    };
  }
}
