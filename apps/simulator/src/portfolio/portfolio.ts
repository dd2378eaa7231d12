import { Logger } from "@nestjs/common";
import type { PriceMap, Transaction, TradeSide } from "../types";
import { formatDay } from "../utils/dates";

/**
 * In-memory cash/holdings ledger. Mutated only through `buy` and `sell`; each accepted trade
 * applies its cash delta, its holdings delta and its transaction record together.
 */
export class Portfolio {
  private readonly logger = new Logger(Portfolio.name);
  private balance: number;
  private readonly positions = new Map<string, number>();
  private readonly ledger: Transaction[] = [];

  constructor(readonly initialCash: number) {
    if (!Number.isFinite(initialCash) || initialCash < 0) {
      throw new RangeError(`Initial cash must be a non-negative number, got ${initialCash}`);
    }
    this.balance = initialCash;
  }

  get cash() {
    return this.balance;
  }

  get holdings(): Record<string, number> {
    return Object.fromEntries(this.positions);
  }

  get transactions(): readonly Transaction[] {
    return this.ledger.map((transaction) => ({ ...transaction }));
  }

  sharesOf(symbol: string) {
    return this.positions.get(symbol) ?? 0;
  }

  buy(symbol: string, price: number, shares: number, date: Date) {
    this.assertOrder(price, shares);
    const day = formatDay(date);
    const cost = price * shares;
    if (this.balance < cost) {
      this.logger.warn(`[${day}] Insufficient cash to buy ${shares} shares of ${symbol} at ${price.toFixed(2)}`);
      return false;
    }

    this.balance -= cost;
    this.positions.set(symbol, this.sharesOf(symbol) + shares);
    this.record(date, symbol, "BUY", price, shares);
    this.logger.log(`[${day}] Bought ${shares} shares of ${symbol} at ${price.toFixed(2)}`);
    return true;
  }

  sell(symbol: string, price: number, shares: number, date: Date) {
    this.assertOrder(price, shares);
    const day = formatDay(date);
    const held = this.sharesOf(symbol);
    if (held < shares) {
      this.logger.warn(`[${day}] Insufficient shares to sell ${shares} shares of ${symbol}`);
      return false;
    }

    const remaining = held - shares;
    if (remaining === 0) {
      this.positions.delete(symbol);
    } else {
      this.positions.set(symbol, remaining);
    }
    this.balance += price * shares;
    this.record(date, symbol, "SELL", price, shares);
    this.logger.log(`[${day}] Sold ${shares} shares of ${symbol} at ${price.toFixed(2)}`);
    return true;
  }

  /** Symbols missing from `currentPrices` are valued at 0 for this call only. */
  getValue(currentPrices: PriceMap) {
    let total = this.balance;
    for (const [symbol, shares] of this.positions) {
      total += (Object.hasOwn(currentPrices, symbol) ? currentPrices[symbol] : 0) * shares;
    }
    return total;
  }

  private record(date: Date, symbol: string, action: TradeSide, price: number, shares: number) {
    this.ledger.push({ date: date.toISOString(), symbol, action, price, shares });
  }

  private assertOrder(price: number, shares: number) {
    if (!Number.isInteger(shares) || shares <= 0) {
      throw new RangeError(`Share count must be a positive integer, got ${shares}`);
    }
    if (!Number.isFinite(price) || price <= 0) {
      throw new RangeError(`Price must be a positive number, got ${price}`);
    }
  }
}
