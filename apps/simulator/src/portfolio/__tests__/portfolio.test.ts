import { describe, expect, it } from "vitest";
import { day } from "../../../test/helpers";
import { Portfolio } from "../portfolio";

const D = day("2024-03-04");

// deterministic LCG so failures reproduce
function seeded(seed: number) {
  let state = seed >>> 0;
  return (max: number) => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state % max;
  };
}

describe("Portfolio", () => {
  describe("buy", () => {
    it("debits cash, credits holdings and records a BUY", () => {
      const portfolio = new Portfolio(100000);

      expect(portfolio.buy("AAPL", 150, 10, D)).toBe(true);

      expect(portfolio.cash).toBe(98500);
      expect(portfolio.holdings).toEqual({ AAPL: 10 });
      expect(portfolio.transactions).toEqual([
        { date: "2024-03-04T00:00:00.000Z", symbol: "AAPL", action: "BUY", price: 150, shares: 10 },
      ]);
    });

    it("rejects an order it cannot pay for without partial fills", () => {
      const portfolio = new Portfolio(1000);

      expect(portfolio.buy("AAPL", 145, 7, D)).toBe(false);

      expect(portfolio.cash).toBe(1000);
      expect(portfolio.holdings).toEqual({});
      expect(portfolio.transactions).toHaveLength(0);
    });

    it("accepts an order that spends the last unit of cash", () => {
      const portfolio = new Portfolio(1450);

      expect(portfolio.buy("AAPL", 145, 10, D)).toBe(true);
      expect(portfolio.cash).toBe(0);
    });

    it("adds to an existing position", () => {
      const portfolio = new Portfolio(10000);
      portfolio.buy("AAPL", 100, 10, D);
      portfolio.buy("AAPL", 50, 4, D);

      expect(portfolio.sharesOf("AAPL")).toBe(14);
      expect(portfolio.cash).toBe(8800);
    });

    it.each([
      [0, 100],
      [-1, 100],
      [1.5, 100],
      [1, 0],
      [1, Number.NaN],
    ])("throws on shares=%s price=%s", (shares, price) => {
      const portfolio = new Portfolio(1000);
      expect(() => portfolio.buy("AAPL", price, shares, D)).toThrow(RangeError);
      expect(portfolio.cash).toBe(1000);
    });
  });

  describe("sell", () => {
    it("rejects selling more than is held and leaves state unchanged", () => {
      const portfolio = new Portfolio(100000);
      portfolio.buy("AAPL", 150, 10, D);

      expect(portfolio.sell("AAPL", 160, 15, D)).toBe(false);

      expect(portfolio.cash).toBe(98500);
      expect(portfolio.holdings).toEqual({ AAPL: 10 });
      expect(portfolio.transactions).toHaveLength(1);
    });

    it("rejects selling a symbol that was never bought", () => {
      const portfolio = new Portfolio(500);

      expect(portfolio.sell("MSFT", 10, 1, D)).toBe(false);
      expect(portfolio.cash).toBe(500);
    });

    it("credits cash, debits holdings and records a SELL", () => {
      const portfolio = new Portfolio(100000);
      portfolio.buy("AAPL", 150, 10, D);

      expect(portfolio.sell("AAPL", 160, 4, D)).toBe(true);

      expect(portfolio.cash).toBe(99140);
      expect(portfolio.holdings).toEqual({ AAPL: 6 });
      expect(portfolio.transactions[1]).toEqual({
        date: "2024-03-04T00:00:00.000Z",
        symbol: "AAPL",
        action: "SELL",
        price: 160,
        shares: 4,
      });
    });

    it("returns cash to its pre-buy value on a same-price round trip", () => {
      const portfolio = new Portfolio(100000);

      portfolio.buy("AAPL", 150, 10, D);
      portfolio.sell("AAPL", 150, 10, D);

      expect(portfolio.cash).toBe(100000);
      expect(portfolio.sharesOf("AAPL")).toBe(0);
      expect(portfolio.holdings).toEqual({});
    });
  });

  describe("getValue", () => {
    it("equals cash when nothing is held", () => {
      expect(new Portfolio(1234.5).getValue({ AAPL: 150 })).toBe(1234.5);
    });

    it("values held symbols at the given prices", () => {
      const portfolio = new Portfolio(100000);
      portfolio.buy("AAPL", 150, 10, D);

      expect(portfolio.getValue({ AAPL: 160 })).toBe(100100);
    });

    it("values a symbol without a price at zero without touching holdings", () => {
      const portfolio = new Portfolio(100000);
      portfolio.buy("AAPL", 150, 10, D);

      expect(portfolio.getValue({ MSFT: 400 })).toBe(98500);
      expect(portfolio.holdings).toEqual({ AAPL: 10 });
    });

    it("ignores inherited object keys when a symbol has no price", () => {
      const portfolio = new Portfolio(100);
      portfolio.buy("constructor", 10, 1, D);
      portfolio.buy("toString", 10, 1, D);

      expect(portfolio.getValue({})).toBe(80);
    });
  });

  it("never lets cash or holdings go negative over random order sequences", () => {
    const next = seeded(20240304);
    const symbols = ["AAPL", "MSFT", "GOOG"];

    for (let run = 0; run < 20; run += 1) {
      const portfolio = new Portfolio(10000);
      const expected = new Map<string, number>();
      let expectedCash = 10000;

      for (let step = 0; step < 200; step += 1) {
        const symbol = symbols[next(symbols.length)];
        const price = 1 + next(300);
        const shares = 1 + next(60);
        const held = expected.get(symbol) ?? 0;

        if (next(2) === 0) {
          const accepted = portfolio.buy(symbol, price, shares, D);
          expect(accepted).toBe(expectedCash >= price * shares);
          if (accepted) {
            expectedCash -= price * shares;
            expected.set(symbol, held + shares);
          }
        } else {
          const accepted = portfolio.sell(symbol, price, shares, D);
          expect(accepted).toBe(held >= shares);
          if (accepted) {
            expectedCash += price * shares;
            expected.set(symbol, held - shares);
          }
        }

        expect(portfolio.cash).toBeGreaterThanOrEqual(0);
        expect(portfolio.cash).toBe(expectedCash);
        for (const symbolName of symbols) {
          expect(portfolio.sharesOf(symbolName)).toBe(expected.get(symbolName) ?? 0);
          expect(portfolio.sharesOf(symbolName)).toBeGreaterThanOrEqual(0);
        }
      }
    }
  });
});
