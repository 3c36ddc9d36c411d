import type { EquitySnapshot, Fill, OrderIntent, Position, Venue } from '@league/schemas';

export type SubmitResult =
  | { status: 'filled'; fill: Fill }
  | { status: 'rejected'; reason: string; message: string };

/**
 * Broker gateway. Implementations are either simulated or a paper/real venue;
 * the core only ever depends on this contract.
 *
 * `submit` resolves with a fill or a venue-side rejection and throws
 * BrokerTransientError / BrokerTimeoutError / BrokerFatalError otherwise.
 * Once `signal` aborts the caller has stopped waiting: the implementation
 * stops polling and throws BrokerTimeoutError.
 */
export interface IBroker {
  readonly name: string;
  readonly venue: Venue;
  submit(intent: OrderIntent, signal?: AbortSignal): Promise<SubmitResult>;
  getPosition(symbol: string): Promise<Position>;
  getEquity(): Promise<EquitySnapshot>;
}
