import type { Signal } from '@league/schemas';

/** Pure: the same bounded price window always yields the same signal. */
export interface IStrategy {
  readonly name: string;
  readonly minBars: number;
  signal(prices: readonly number[]): Signal;
}
