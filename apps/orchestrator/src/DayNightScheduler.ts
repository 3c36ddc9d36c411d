import {
  sessionAt,
  silentLogger,
  systemClock,
  type Clock,
  type LeagueMetrics,
  type Logger,
  type MarketHours,
  type SafetySwitch,
  type SessionState,
} from '@league/core';
import type { LeagueReport } from '@league/schemas';
import type { RunContext, StepResult } from '@league/execution';

export type SchedulerState = 'CLOSED' | 'OPEN_LIVE' | 'AFTER_HOURS_LIVE' | 'NIGHTLY_TUNE' | 'TERMINATED';

export interface StepRunner {
  runOnce(ctx: RunContext): Promise<StepResult>;
}

export interface SchedulerOptions {
  agentId: string;
  executor: StepRunner;
  /** Produces and persists the league report for the given trading day. */
  nightly: (tradingDay: string) => Promise<LeagueReport>;
  /** Trading day of the most recent persisted league report, if any. */
  lastNightlyDay: () => Promise<string | null>;
  hours: MarketHours;
  cycleMinutes: number;
  maxSteps: number;
  flattenAtEnd: boolean;
  allowAfterHours: boolean;
  safety: SafetySwitch;
  /** Called once per trading day before the first live cycle. */
  onDayStart?: (tradingDay: string) => void | Promise<void>;
  /** Idle or live, stop once the clock passes this point. */
  deadline?: Date;
  clock?: Clock;
  log?: Logger;
  metrics?: LeagueMetrics;
}

export interface Transition {
  from: SchedulerState;
  to: SchedulerState;
  at: string;
  reason: string;
}

export interface SchedulerResult {
  finalState: SchedulerState;
  /** Regular live cycles. */
  steps: number;
  /** Cycles run in flatten mode. */
  flattens: number;
  transitions: Transition[];
  lastStep: StepResult | null;
  report: LeagueReport | null;
  stopReason: string | null;
}

/**
 * Day/night operating loop for one agent.
 *
 * CLOSED idles until the session opens, hands off to AFTER_HOURS_LIVE when
 * after-hours participation is enabled, or to NIGHTLY_TUNE once per trading
 * day after the close. Live states run one cycle per interval. Reaching
 * maxSteps, a stop request or the deadline ends the run from any live state;
 * NIGHTLY_TUNE always ends it. Failed cycles are logged and the loop goes on;
 * fatal errors propagate to the caller.
 */
export class DayNightScheduler {
  private state: SchedulerState = 'CLOSED';
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly cycleMs: number;
  private readonly result: SchedulerResult = {
    finalState: 'CLOSED',
    steps: 0,
    flattens: 0,
    transitions: [],
    lastStep: null,
    report: null,
    stopReason: null,
  };
  private startedDay: string | null = null;
  private flattenedDay: string | null = null;
  private nightlyDay: string | null = null;

  constructor(private readonly opts: SchedulerOptions) {
    this.clock = opts.clock ?? systemClock;
    this.log = (opts.log ?? silentLogger()).child({ agentId: opts.agentId });
    this.cycleMs = opts.cycleMinutes * 60_000;
  }

  get current(): SchedulerState {
    return this.state;
  }

  async run(): Promise<SchedulerResult> {
    while (this.state !== 'TERMINATED') {
      switch (this.state) {
        case 'CLOSED':
          await this.closed();
          break;
        case 'OPEN_LIVE':
          await this.openLive();
          break;
        case 'AFTER_HOURS_LIVE':
          await this.afterHoursLive();
          break;
        case 'NIGHTLY_TUNE':
          await this.nightlyTune();
          break;
      }
    }
    this.result.finalState = this.state;
    return this.result;
  }

  private async closed(): Promise<void> {
    const stop = this.stopReason(false);
    if (stop) return this.terminate(stop);

    const session = this.session();
    if (session.isOpen) {
      await this.startDay(session.tradingDay);
      return this.transition('OPEN_LIVE', 'session open');
    }
    if (this.opts.allowAfterHours && session.isTradingDay) {
      await this.startDay(session.tradingDay);
      return this.transition('AFTER_HOURS_LIVE', 'after-hours participation enabled');
    }
    if (session.phase === 'post_close' && (await this.opts.lastNightlyDay()) !== session.tradingDay) {
      this.nightlyDay = session.tradingDay;
      return this.transition('NIGHTLY_TUNE', 'after close');
    }
    await this.clock.sleep(this.cycleMs);
  }

  private async openLive(): Promise<void> {
    const session = this.session();
    const stop = this.stopReason(true);
    if (stop) {
      await this.flattenOnce(session, session.isOpen);
      return this.terminate(stop);
    }
    if (!session.isOpen) {
      await this.flattenOnce(session, false);
      return this.transition('CLOSED', 'session closed');
    }

    const next = sessionAt(new Date(this.clock.now().getTime() + this.cycleMs), this.opts.hours);
    if (this.opts.flattenAtEnd && !next.isOpen) {
      // last slot of the session
      await this.flattenOnce(session, true);
    } else {
      await this.cycle({ marketOpen: true });
    }
    await this.clock.sleep(this.cycleMs);
  }

  private async afterHoursLive(): Promise<void> {
    const session = this.session();
    const stop = this.stopReason(true);
    if (stop) {
      await this.flattenOnce(session, session.isOpen);
      return this.terminate(stop);
    }
    if (session.isOpen) {
      await this.startDay(session.tradingDay);
      return this.transition('OPEN_LIVE', 'session open');
    }
    if (!session.isTradingDay) return this.transition('CLOSED', 'non-trading day');

    await this.cycle({ marketOpen: false });
    await this.clock.sleep(this.cycleMs);
  }

  private async nightlyTune(): Promise<void> {
    const tradingDay = this.nightlyDay ?? this.session().tradingDay;
    this.log.info({ tradingDay }, 'starting nightly league run');
    this.result.report = await this.opts.nightly(tradingDay);
    this.transition('TERMINATED', 'nightly complete');
  }

  private async cycle(ctx: RunContext): Promise<void> {
    const step = await this.opts.executor.runOnce(ctx);
    this.result.lastStep = step;
    if (ctx.flatten) this.result.flattens += 1;
    else this.result.steps += 1;
    if (step.status === 'failed') {
      this.log.warn({ state: this.state, error: step.error }, 'cycle failed, continuing');
    }
  }

  private async flattenOnce(session: SessionState, marketOpen: boolean): Promise<void> {
    if (!this.opts.flattenAtEnd || this.flattenedDay === session.tradingDay) return;
    this.flattenedDay = session.tradingDay;
    this.log.info({ tradingDay: session.tradingDay, marketOpen }, 'flattening positions');
    await this.cycle({ marketOpen, flatten: true });
  }

  private async startDay(tradingDay: string): Promise<void> {
    if (this.startedDay === tradingDay) return;
    this.startedDay = tradingDay;
    await this.opts.onDayStart?.(tradingDay);
  }

  private stopReason(live: boolean): string | null {
    const { safety, agentId, deadline } = this.opts;
    if (safety.shouldStop(agentId)) return safety.reason ?? 'agent frozen';
    if (live && this.result.steps >= this.opts.maxSteps) return 'max_steps';
    if (deadline && this.clock.now().getTime() >= deadline.getTime()) return 'deadline';
    return null;
  }

  private terminate(reason: string): void {
    this.result.stopReason = reason;
    this.transition('TERMINATED', reason);
  }

  private transition(to: SchedulerState, reason: string): void {
    const from = this.state;
    this.state = to;
    this.result.transitions.push({ from, to, at: this.clock.now().toISOString(), reason });
    this.opts.metrics?.transitions.inc({ from, to });
    this.log.info({ from, to, reason }, 'scheduler transition');
  }

  private session(): SessionState {
    return sessionAt(this.clock.now(), this.opts.hours);
  }
}
