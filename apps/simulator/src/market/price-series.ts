export interface PricePoint {
  /** UTC midnight of the trading day, in epoch milliseconds. */
  day: number;
  close: number;
}

/**
 * Daily closes for one symbol, kept in ascending day order.
 *
 * `asOf` returns the close of the latest day at or before the query. Queries before the first
 * point have no price; queries after the last point keep returning the last close however stale
 * it is.
 */
export class PriceSeries {
  private readonly points: PricePoint[];

  constructor(points: Iterable<PricePoint>) {
    const byDay = new Map<number, number>();
    for (const point of points) {
      byDay.set(point.day, point.close);
    }
    this.points = [...byDay.entries()]
      .map(([day, close]) => ({ day, close }))
      .sort((a, b) => a.day - b.day);
  }

  get length() {
    return this.points.length;
  }

  get first(): PricePoint | undefined {
    return this.points[0];
  }

  get last(): PricePoint | undefined {
    return this.points[this.points.length - 1];
  }

  asOf(date: Date): number | null {
    const target = date.getTime();
    let low = 0;
    let high = this.points.length - 1;
    let found = -1;

    while (low <= high) {
      const mid = (low + high) >>> 1;
      if (this.points[mid].day <= target) {
        found = mid;
        low = mid + 1;
      } else {
        high = mid - 1;
      }
    }

    return found >= 0 ? this.points[found].close : null;
  }
}
