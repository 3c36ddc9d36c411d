/**
 * Error taxonomy shared by every workspace.
 *
 * `fatal` errors end the run with a non-zero exit status; everything else is
 * recovered locally (recorded, then the next cycle proceeds).
 */
export class LeagueError extends Error {
  constructor(message: string, readonly code: string, readonly fatal: boolean, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing credentials, invalid guardrail values, empty symbol universe. Raised before any loop starts. */
export class ConfigurationError extends LeagueError {
  constructor(message: string, readonly issues: string[] = [], options?: ErrorOptions) {
    super(message, 'configuration', true, options);
  }
}

/** Network failure, rate limit or 5xx on a venue. Retried once within the cycle. */
export class BrokerTransientError extends LeagueError {
  constructor(message: string, options?: ErrorOptions, code = 'broker_transient') {
    super(message, code, false, options);
  }
}

/** The venue did not answer in time: the order may or may not exist. */
export class BrokerTimeoutError extends BrokerTransientError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options, 'broker_timeout');
  }
}

/** Account-level failure reported by the venue (bad credentials, blocked account). Halts the loop. */
export class BrokerFatalError extends LeagueError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'broker_fatal', true, options);
  }
}

export class InsufficientDataError extends LeagueError {
  constructor(readonly agentId: string, readonly tradeCount: number, readonly required: number) {
    super(`${agentId}: ${tradeCount} trade(s) in window, ${required} required`, 'insufficient_data', false);
  }
}

export function isFatal(err: unknown): boolean {
  return err instanceof LeagueError ? err.fatal : true;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
