import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { silentLogger, type Clock, type Logger } from "@league/core";
import type { GroupBy, LeaguePolicy, LeagueReport } from "@league/schemas";
import type { ILedger } from "@league/interfaces";
import { LeagueAggregator } from "./LeagueAggregator";

export const ALLOCATIONS_FILE = "allocations.json";

export interface NightlyOptions {
  ledger: ILedger;
  policy: LeaguePolicy;
  tradingDay: string;
  groupBy?: GroupBy;
  agentIds?: readonly string[];
  /** Where allocations.json is written; skipped when unset. */
  artifactsDir?: string;
  clock?: Clock;
  log?: Logger;
}

/** Summary shape written next to the full report for downstream capital allocation. */
export function allocationsArtifact(report: LeagueReport) {
  const ids = (action: string) => report.recommendations.filter((r) => r.action === action).map((r) => r.agentId);
  return {
    runId: report.runId,
    generatedAt: report.generatedAt,
    tradingDay: report.tradingDay,
    lookbackDays: report.lookbackDays,
    groupBy: report.groupBy,
    promote: ids("promote"),
    retire: ids("retire"),
    allocations: Object.fromEntries(report.recommendations.filter((r) => r.weight > 0).map((r) => [r.agentId, r.weight])),
    recommendations: report.recommendations,
  };
}

export async function runNightly(opts: NightlyOptions): Promise<LeagueReport> {
  const log = opts.log ?? silentLogger();
  const aggregator = new LeagueAggregator({ ledger: opts.ledger, policy: opts.policy, clock: opts.clock, log });
  const report = await aggregator.report(opts.tradingDay, { agentIds: opts.agentIds, groupBy: opts.groupBy });
  await opts.ledger.recordRecommendations(report);

  if (opts.artifactsDir) {
    await mkdir(opts.artifactsDir, { recursive: true });
    const file = path.join(opts.artifactsDir, ALLOCATIONS_FILE);
    await writeFile(file, JSON.stringify(allocationsArtifact(report), null, 2));
    log.info({ file }, "wrote allocations");
  }

  const counts = { promote: 0, retire: 0, hold: 0 };
  for (const r of report.recommendations) counts[r.action] += 1;
  log.info({ runId: report.runId, tradingDay: report.tradingDay, ...counts }, "nightly league run complete");
  return report;
}
