import { describe, it, expect } from 'vitest';
import { ManualClock } from '@league/core';
import { MemoryLedger } from '@league/storage';
import { bootstrapAgent } from './bootstrap';
import { parseAgentConfig } from './config';
import { diagnose } from './doctor';

const config = parseAgentConfig(
  { agent: { id: 'agent-a' }, symbols: ['AAPL', 'MSFT'], broker: { prices: { AAPL: [101, 102], MSFT: [300] } } },
  {},
);

describe('diagnose', () => {
  it('reports venue, session, account and latest prices without trading', async () => {
    // 10:00 New York
    const ledger = new MemoryLedger();
    const rt = await bootstrapAgent(config, { env: {}, ledger, register: false, clock: new ManualClock('2026-02-18T15:00:00.000Z') });
    const report = await diagnose(rt);

    expect(await ledger.listAgents()).toEqual([]);
    expect(await ledger.equityHistory('agent-a', new Date(0))).toEqual([]);
    expect(report).toMatchObject({
      agentId: 'agent-a',
      venue: 'sim',
      broker: 'sim',
      realTradingEnabled: false,
      allowAfterHours: false,
      latestPrices: { AAPL: 101, MSFT: 300 },
      warnings: [],
    });
    expect(report.session).toMatchObject({ tradingDay: '2026-02-18', isOpen: true, phase: 'open' });
    expect(report.account).toMatchObject({ cash: 10_000, positionsValue: 0, equity: 10_000 });
  });

  it('warns when the arming flag is set for a non-real venue', async () => {
    const rt = await bootstrapAgent(config, { env: { REAL_TRADING_ENABLED: '1' }, ledger: new MemoryLedger() });
    const report = await diagnose(rt);

    expect(report.realTradingEnabled).toBe(true);
    expect(report.warnings).toEqual(['REAL_TRADING_ENABLED is set but the venue is sim']);
  });
});
