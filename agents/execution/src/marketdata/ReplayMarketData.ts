import type { IMarketData } from "@league/interfaces";

/**
 * Replays fixed per-symbol close series. Every `latestBars` call reveals one
 * more bar until the series is exhausted, after which the last bar repeats.
 */
export class ReplayMarketData implements IMarketData {
  private readonly revealed = new Map<string, number>();

  constructor(private readonly series: Readonly<Record<string, readonly number[]>>) {}

  async latestBars(symbol: string, count: number): Promise<number[]> {
    const s = this.seriesFor(symbol);
    const n = Math.min((this.revealed.get(symbol) ?? 0) + 1, s.length);
    this.revealed.set(symbol, n);
    return s.slice(Math.max(0, n - count), n);
  }

  async lastPrice(symbol: string): Promise<number> {
    const s = this.seriesFor(symbol);
    const n = Math.max(this.revealed.get(symbol) ?? 0, 1);
    const price = s[n - 1];
    if (price === undefined) throw new Error(`empty price series for ${symbol}`);
    return price;
  }

  private seriesFor(symbol: string): readonly number[] {
    const s = this.series[symbol];
    if (!s || s.length === 0) throw new Error(`no price series for ${symbol}`);
    return s;
  }
}
