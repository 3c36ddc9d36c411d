#!/usr/bin/env node
import { ConfigurationError, SafetySwitch, createLogger, errorMessage, sessionAt } from '@league/core';
import { createLedger } from '@league/storage';
import { runNightly } from '@league/manager';
import { USAGE, UsageError, parseCliArgs, type CliArgs } from './args';
import { frozenAgents, loadAgentConfig } from './config';
import { bootstrapAgent, createScheduler, marketHours, type AgentRuntime } from './bootstrap';
import { runBacktest } from './backtest';
import { diagnose } from './doctor';
import { runLeagueLiveOnce } from './leagueLive';
import { runLiveLoop } from './liveLoop';

const log = createLogger('orchestrator');

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

type ConfigArgs = Extract<CliArgs, { config: string }>;
type AgentCommand = 'live' | 'close' | 'orchestrate' | 'doctor';

async function nightly(args: ConfigArgs): Promise<void> {
  const config = await loadAgentConfig(args.config);
  const ledger = createLedger(config.storage);
  try {
    const report = await runNightly({
      ledger,
      policy: config.league,
      tradingDay: sessionAt(new Date(), marketHours(config)).tradingDay,
      groupBy: args.group,
      artifactsDir: config.storage.artifactsDir,
      log,
    });
    print(report);
  } finally {
    await ledger.close();
  }
}

async function backtest(args: ConfigArgs): Promise<void> {
  const config = await loadAgentConfig(args.config);
  print(await runBacktest(config, {
    flattenAtEnd: args.flattenAtEnd || undefined,
    artifactsDir: config.storage.artifactsDir,
    log,
  }));
}

/** Exit status 1 when any agent errored. */
async function liveOnce(dir: string, artifactsDir: string | undefined, safety: SafetySwitch): Promise<number> {
  const rows = await runLeagueLiveOnce({ dir, artifactsDir, safety, log });
  print(rows);
  return rows.some((r) => r.status === 'error') ? 1 : 0;
}

async function withAgent(command: AgentCommand, args: ConfigArgs, safety: SafetySwitch): Promise<void> {
  const config = await loadAgentConfig(args.config);
  // doctor only reads; it leaves the agent registry alone
  const rt = await bootstrapAgent(config, { log, safety, register: command !== 'doctor' });
  if (safety.isFrozen(config.agent.id) && (command === 'live' || command === 'orchestrate')) {
    log.warn({ agentId: config.agent.id }, 'agent is listed in FROZEN_AGENTS; no cycle will run');
  }
  try {
    await dispatch(command, args, rt);
  } finally {
    await rt.ledger.close();
  }
}

async function dispatch(command: AgentCommand, args: ConfigArgs, rt: AgentRuntime): Promise<void> {
  const { config } = rt;
  switch (command) {
    case 'live': {
      const result = await runLiveLoop({
        agentId: config.agent.id,
        executor: rt.executor,
        hours: rt.hours,
        maxSteps: args.loop ? (args.maxSteps ?? config.schedule.maxSteps) : 1,
        intervalMs: (args.interval ?? config.schedule.cycleMinutes) * 60_000,
        flattenAtEnd: args.flattenAtEnd || config.schedule.flattenAtEnd,
        safety: rt.safety,
        clock: rt.clock,
        log: rt.log,
      });
      print(args.loop ? result : result.results[0]);
      return;
    }
    case 'close': {
      const marketOpen = sessionAt(rt.clock.now(), rt.hours).isOpen;
      print(await rt.executor.runOnce({ marketOpen, flatten: true }));
      return;
    }
    case 'orchestrate': {
      const scheduler = createScheduler(rt, {
        maxSteps: args.maxSteps,
        flattenAtEnd: args.flattenAtEnd || undefined,
      });
      const result = await scheduler.run();
      print({
        finalState: result.finalState,
        steps: result.steps,
        flattens: result.flattens,
        stopReason: result.stopReason,
        transitions: result.transitions,
        runId: result.report?.runId ?? null,
      });
      return;
    }
    case 'doctor':
      print(await diagnose(rt));
      return;
  }
}

async function main(): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(err.message);
    console.error(USAGE);
    return 2;
  }

  const safety = new SafetySwitch(log);
  for (const id of frozenAgents()) safety.freezeAgent(id);
  process.once('SIGINT', () => safety.killAll('SIGINT'));
  process.once('SIGTERM', () => safety.killAll('SIGTERM'));

  switch (args.command) {
    case 'nightly':
      await nightly(args);
      return 0;
    case 'backtest':
      await backtest(args);
      return 0;
    case 'live-once':
      return liveOnce(args.dir, args.artifacts, safety);
    default:
      await withAgent(args.command, args, safety);
      return 0;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    log.error({ err: errorMessage(err) }, 'orchestrator failed');
    if (err instanceof ConfigurationError) {
      for (const issue of err.issues) console.error(`  ${issue}`);
    }
    process.exit(1);
  });
