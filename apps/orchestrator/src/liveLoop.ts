import { sessionAt, silentLogger, systemClock, type Clock, type Logger, type MarketHours, type SafetySwitch } from '@league/core';
import type { StepResult } from '@league/execution';
import type { StepRunner } from './DayNightScheduler';

export interface LiveLoopOptions {
  agentId: string;
  executor: StepRunner;
  hours: MarketHours;
  maxSteps: number;
  intervalMs: number;
  flattenAtEnd: boolean;
  safety: SafetySwitch;
  clock?: Clock;
  log?: Logger;
}

export interface LiveLoopResult {
  steps: number;
  results: StepResult[];
  flattened: StepResult | null;
  stopReason: string;
}

/**
 * Fixed-interval live trading without the day/night state machine. Each cycle
 * asks the session calendar whether the market is open; the guardrails decide
 * what that means for the order. No sleep after the final cycle.
 */
export async function runLiveLoop(opts: LiveLoopOptions): Promise<LiveLoopResult> {
  const clock = opts.clock ?? systemClock;
  const log = (opts.log ?? silentLogger()).child({ agentId: opts.agentId });
  const results: StepResult[] = [];
  let stopReason = 'max_steps';

  while (results.length < opts.maxSteps) {
    if (opts.safety.shouldStop(opts.agentId)) {
      stopReason = opts.safety.reason ?? 'agent frozen';
      break;
    }
    const marketOpen = sessionAt(clock.now(), opts.hours).isOpen;
    const step = await opts.executor.runOnce({ marketOpen });
    results.push(step);
    if (step.status === 'failed') log.warn({ step: results.length, error: step.error }, 'cycle failed, continuing');
    if (results.length < opts.maxSteps) await clock.sleep(opts.intervalMs);
  }

  let flattened: StepResult | null = null;
  if (opts.flattenAtEnd) {
    log.info('flattening positions');
    flattened = await opts.executor.runOnce({ marketOpen: sessionAt(clock.now(), opts.hours).isOpen, flatten: true });
  }
  log.info({ steps: results.length, stopReason }, 'live loop finished');
  return { steps: results.length, results, flattened, stopReason };
}
