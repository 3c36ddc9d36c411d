export { LeagueAggregator, assess, compareKpis, groupByBuilder, rank } from "./LeagueAggregator";
export type { Contender, LeagueAggregatorOptions, PerformanceWindow } from "./LeagueAggregator";
export { averageKpis, computeKpis, maxDrawdown, periodReturns, profitFactor, realizedCurve, score, sharpeRatio } from "./metrics/rollups";
export { ALLOCATIONS_FILE, allocationsArtifact, runNightly } from "./nightly";
export type { NightlyOptions } from "./nightly";
