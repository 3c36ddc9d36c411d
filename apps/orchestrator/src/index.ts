export { DayNightScheduler } from './DayNightScheduler';
export type { SchedulerOptions, SchedulerResult, SchedulerState, StepRunner, Transition } from './DayNightScheduler';
export { runLiveLoop } from './liveLoop';
export type { LiveLoopOptions, LiveLoopResult } from './liveLoop';
export { applyEnvOverrides, configHash, frozenAgents, isArmed, loadAgentConfig, parseAgentConfig, truthy } from './config';
export type { Env } from './config';
export { bootstrapAgent, createScheduler, marketHours } from './bootstrap';
export type { AgentRuntime, BootstrapOptions, SchedulerOverrides } from './bootstrap';
export { runBacktest } from './backtest';
export type { BacktestOptions, BacktestResult } from './backtest';
export { LAST_LIVE_FILE, listAgentFiles, runLeagueLiveOnce } from './leagueLive';
export type { LeagueLiveOptions, LiveOnceRow, LiveOnceStatus } from './leagueLive';
export { diagnose } from './doctor';
export type { DoctorReport } from './doctor';
export { Command, USAGE, UsageError, parseCliArgs } from './args';
export type { CliArgs } from './args';
