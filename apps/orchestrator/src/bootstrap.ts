import {
  ConfigurationError,
  SafetySwitch,
  createMetrics,
  silentLogger,
  systemClock,
  type Clock,
  type LeagueMetrics,
  type Logger,
  type MarketHours,
} from '@league/core';
import type { AgentConfig, AgentRecord } from '@league/schemas';
import type { ILedger } from '@league/interfaces';
import { createStrategy } from '@league/signal';
import { PositionRouter } from '@league/strategy';
import { GuardrailEvaluator } from '@league/risk';
import { LiveStepExecutor, SimBroker, createVenue, type TradingVenue } from '@league/execution';
import { createLedger } from '@league/storage';
import { runNightly } from '@league/manager';
import { configHash, isArmed, type Env } from './config';
import { DayNightScheduler } from './DayNightScheduler';

export interface BootstrapOptions {
  env?: Env;
  fetch?: typeof fetch;
  clock?: Clock;
  log?: Logger;
  metrics?: LeagueMetrics;
  /** Shared ledger; built from `config.storage` when omitted. */
  ledger?: ILedger;
  safety?: SafetySwitch;
  /** Upsert the agent record into the ledger. Defaults to true. */
  register?: boolean;
}

export interface AgentRuntime {
  config: AgentConfig;
  configHash: string;
  armed: boolean;
  hours: MarketHours;
  ledger: ILedger;
  venue: TradingVenue;
  executor: LiveStepExecutor;
  safety: SafetySwitch;
  clock: Clock;
  log: Logger;
  metrics: LeagueMetrics;
  record: AgentRecord;
}

export function marketHours(config: AgentConfig): MarketHours {
  const { timezone, open, close } = config.schedule;
  return { timezone, open, close };
}

/**
 * Builds every collaborator of one agent and, unless `register` is false,
 * upserts its record in the ledger. Configuration problems surface here,
 * before any cycle runs.
 */
export async function bootstrapAgent(config: AgentConfig, opts: BootstrapOptions = {}): Promise<AgentRuntime> {
  const env = opts.env ?? process.env;
  const clock = opts.clock ?? systemClock;
  const log = (opts.log ?? silentLogger()).child({ agentId: config.agent.id });
  const metrics = opts.metrics ?? createMetrics();
  const armed = isArmed(env);

  const strategy = createStrategy(config.strategy);
  if (config.broker.historyBars < strategy.minBars) {
    throw new ConfigurationError(
      `historyBars ${config.broker.historyBars} is below the ${strategy.minBars} bars ${strategy.name} needs`,
      [`broker.historyBars: must be at least ${strategy.minBars}`],
    );
  }

  const venue = createVenue(config.broker, config.symbols, { env, fetch: opts.fetch, clock, log });
  if (config.broker.venue === 'real' && !armed) {
    log.warn('real venue selected without REAL_TRADING_ENABLED; every order will be rejected');
  }

  const ledger = opts.ledger ?? createLedger(config.storage);
  const executor = new LiveStepExecutor({
    agentId: config.agent.id,
    symbols: config.symbols,
    strategy,
    router: new PositionRouter({
      sizePct: config.sizing.sizePct,
      lotSize: config.sizing.lotSize,
      maxPositionPct: config.guardrails.maxPositionPct,
    }),
    guardrails: new GuardrailEvaluator({ config: config.guardrails, venue: config.broker.venue, armed }),
    broker: venue.broker,
    marketData: venue.marketData,
    ledger,
    historyBars: config.broker.historyBars,
    submitTimeoutMs: config.broker.submitTimeoutMs,
    retryBackoffMs: config.broker.retryBackoffMs,
    clock,
    log,
    metrics,
  });

  const hash = configHash(config);
  const now = clock.now().toISOString();
  const draft: AgentRecord = {
    agentId: config.agent.id,
    builderName: config.agent.builder?.name ?? null,
    builderModel: config.agent.builder?.model ?? null,
    lineage: config.agent.lineage ?? null,
    configHash: hash,
    createdAt: now,
    updatedAt: now,
  };
  const record = opts.register === false ? draft : await ledger.recordAgent(draft);
  log.info({ venue: config.broker.venue, armed, strategy: strategy.name, symbols: config.symbols, configHash: hash }, 'agent ready');

  return {
    config,
    configHash: hash,
    armed,
    hours: marketHours(config),
    ledger,
    venue,
    executor,
    safety: opts.safety ?? new SafetySwitch(log),
    clock,
    log,
    metrics,
    record,
  };
}

export interface SchedulerOverrides {
  maxSteps?: number;
  flattenAtEnd?: boolean;
  deadline?: Date;
}

export function createScheduler(rt: AgentRuntime, overrides: SchedulerOverrides = {}): DayNightScheduler {
  const { config, ledger, venue, log, clock } = rt;
  const { broker } = venue;
  return new DayNightScheduler({
    agentId: config.agent.id,
    executor: rt.executor,
    nightly: (tradingDay) =>
      runNightly({
        ledger,
        policy: config.league,
        tradingDay,
        artifactsDir: config.storage.artifactsDir,
        clock,
        log,
      }),
    lastNightlyDay: async () => (await ledger.latestRecommendations())?.tradingDay ?? null,
    hours: rt.hours,
    cycleMinutes: config.schedule.cycleMinutes,
    maxSteps: overrides.maxSteps ?? config.schedule.maxSteps,
    flattenAtEnd: overrides.flattenAtEnd ?? config.schedule.flattenAtEnd,
    allowAfterHours: config.guardrails.allowAfterHours,
    safety: rt.safety,
    // the simulator keeps its own day-start equity for the daily loss limit
    onDayStart: broker instanceof SimBroker ? () => broker.startDay() : undefined,
    deadline: overrides.deadline,
    clock,
    log,
    metrics: rt.metrics,
  });
}
