export interface IMarketData {
  /** Most recent `count` closes, oldest first. The last element is the latest quote. */
  latestBars(symbol: string, count: number): Promise<number[]>;
  lastPrice(symbol: string): Promise<number>;
}
