import { sessionAt, type SessionState } from '@league/core';
import type { EquitySnapshot, Venue } from '@league/schemas';
import type { AgentRuntime } from './bootstrap';

export interface DoctorReport {
  agentId: string;
  venue: Venue;
  broker: string;
  realTradingEnabled: boolean;
  allowAfterHours: boolean;
  session: SessionState;
  account: EquitySnapshot;
  latestPrices: Record<string, number>;
  warnings: string[];
}

/**
 * Connectivity and configuration check; places no orders. Build the runtime
 * with `register: false` to leave the ledger untouched.
 */
export async function diagnose(rt: AgentRuntime): Promise<DoctorReport> {
  const { config, venue } = rt;
  const warnings: string[] = [];
  if (config.broker.venue === 'real' && !rt.armed) {
    warnings.push('real venue selected but REAL_TRADING_ENABLED is not set; orders will be rejected');
  }
  if (config.broker.venue !== 'real' && rt.armed) {
    warnings.push(`REAL_TRADING_ENABLED is set but the venue is ${config.broker.venue}`);
  }

  const latestPrices: Record<string, number> = {};
  for (const symbol of config.symbols) {
    latestPrices[symbol] = await venue.marketData.lastPrice(symbol);
  }

  return {
    agentId: config.agent.id,
    venue: config.broker.venue,
    broker: venue.broker.name,
    realTradingEnabled: rt.armed,
    allowAfterHours: config.guardrails.allowAfterHours,
    session: sessionAt(rt.clock.now(), rt.hours),
    account: await venue.broker.getEquity(),
    latestPrices,
    warnings,
  };
}
