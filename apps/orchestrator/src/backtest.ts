import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { ConfigurationError, ManualClock, createMetrics, silentLogger, type LeagueMetrics, type Logger } from '@league/core';
import type { AgentConfig, KpiSet } from '@league/schemas';
import { MemoryLedger } from '@league/storage';
import { computeKpis } from '@league/manager';
import { bootstrapAgent } from './bootstrap';

export interface BacktestOptions {
  /** Timestamp of the first replayed bar. */
  start?: Date | string;
  flattenAtEnd?: boolean;
  /** Writes runs/<runId>/metrics.json and config.snapshot.json here when set. */
  artifactsDir?: string;
  runId?: string;
  log?: Logger;
  metrics?: LeagueMetrics;
}

export interface BacktestResult {
  runId: string;
  agentId: string;
  configHash: string;
  bars: number;
  steps: number;
  failedSteps: number;
  fills: number;
  rejections: number;
  equityStart: number;
  equityEnd: number;
  kpis: KpiSet;
}

/**
 * Replays `broker.prices` through the agent's own strategy, router and
 * guardrails against a simulated broker and an in-memory ledger, one bar per
 * cycle, then scores the run with the league KPIs. Nothing is written to the
 * agent's configured storage.
 */
export async function runBacktest(config: AgentConfig, opts: BacktestOptions = {}): Promise<BacktestResult> {
  const prices = config.broker.prices;
  if (!prices) {
    throw new ConfigurationError('a backtest needs replay prices', ['broker.prices: required for a backtest']);
  }
  const bars = Math.max(...config.symbols.map((s) => prices[s]?.length ?? 0));
  const runId = opts.runId ?? uuidv4();
  const log = (opts.log ?? silentLogger()).child({ runId });
  const clock = new ManualClock(opts.start ?? '2026-01-05T14:30:00.000Z');
  const ledger = new MemoryLedger();

  const rt = await bootstrapAgent(
    { ...config, broker: { ...config.broker, venue: 'sim' } },
    { env: {}, clock, log, metrics: opts.metrics ?? createMetrics(), ledger, register: false },
  );
  const agentId = config.agent.id;
  const equityStart = (await rt.venue.broker.getEquity()).equity;
  const stepMs = config.schedule.cycleMinutes * 60_000;

  let steps = 0;
  let failedSteps = 0;
  const cycle = async (flatten: boolean) => {
    const r = await rt.executor.runOnce({ marketOpen: true, flatten });
    steps += 1;
    if (r.status === 'failed') {
      failedSteps += 1;
      log.warn({ step: steps, error: r.error }, 'backtest cycle failed');
    }
    clock.advance(stepMs);
  };
  for (let i = 0; i < bars; i++) await cycle(false);
  if (opts.flattenAtEnd ?? config.schedule.flattenAtEnd) await cycle(true);

  const since = new Date(0);
  const [fills, rejections, equity] = await Promise.all([
    ledger.fillsSince(agentId, since),
    ledger.rejectionsSince(agentId, since),
    ledger.equityHistory(agentId, since),
  ]);
  const result: BacktestResult = {
    runId,
    agentId,
    configHash: rt.configHash,
    bars,
    steps,
    failedSteps,
    fills: fills.length,
    rejections: rejections.length,
    equityStart,
    equityEnd: equity.at(-1)?.equity ?? equityStart,
    kpis: computeKpis(fills, equity, config.league.drawdownFloor),
  };

  if (opts.artifactsDir) {
    const dir = path.join(opts.artifactsDir, 'runs', runId);
    await mkdir(dir, { recursive: true });
    await writeFile(path.join(dir, 'metrics.json'), JSON.stringify(result.kpis, null, 2));
    await writeFile(path.join(dir, 'config.snapshot.json'), JSON.stringify(config, null, 2));
    log.info({ dir }, 'wrote backtest artifacts');
  }
  log.info({ agentId, bars, fills: result.fills, netPnl: result.kpis.netPnl, equityEnd: result.equityEnd }, 'backtest complete');
  return result;
}
