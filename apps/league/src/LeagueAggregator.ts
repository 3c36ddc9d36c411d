import { v4 as uuidv4 } from "uuid";
import { InsufficientDataError, errorMessage, silentLogger, systemClock, type Clock, type Logger } from "@league/core";
import type {
  AllocationRecommendation,
  EquitySnapshot,
  Fill,
  GroupBy,
  KpiSet,
  LeaguePolicy,
  LeagueReport,
  RecommendationStatus,
} from "@league/schemas";
import type { ILedger } from "@league/interfaces";
import { averageKpis, computeKpis } from "./metrics/rollups";

const DAY_MS = 86_400_000;

/** Everything the ranking needs about one agent, read before any scoring happens. */
export interface PerformanceWindow {
  agentId: string;
  builderName: string | null;
  fills: Fill[];
  equity: EquitySnapshot[];
  /** Set when the window could not be loaded. */
  error?: string;
}

/** An agent, or a builder group standing in for its members. */
export interface Contender {
  id: string;
  status: RecommendationStatus;
  kpis: KpiSet | null;
  note?: string;
  members?: string[];
}

const round4 = (n: number) => Math.round(n * 1e4) / 1e4;

export function assess(w: PerformanceWindow, policy: LeaguePolicy): Contender {
  if (w.error !== undefined) return { id: w.agentId, status: "error", kpis: null, note: w.error };
  const kpis = computeKpis(w.fills, w.equity, policy.drawdownFloor);
  if (kpis.tradeCount < policy.minTrades) {
    return { id: w.agentId, status: "insufficient_data", kpis, note: new InsufficientDataError(w.agentId, kpis.tradeCount, policy.minTrades).message };
  }
  return { id: w.agentId, status: "ok", kpis };
}

/**
 * Collapses agents that share a builder into one virtual contender with
 * averaged KPIs. Agents without a builder stay as they are.
 */
export function groupByBuilder(windows: readonly PerformanceWindow[], policy: LeaguePolicy): Contender[] {
  const groups = new Map<string, PerformanceWindow[]>();
  const solo: Contender[] = [];
  for (const w of windows) {
    if (w.builderName === null) {
      solo.push(assess(w, policy));
      continue;
    }
    const key = `builder:${w.builderName}`;
    groups.set(key, [...(groups.get(key) ?? []), w]);
  }

  const grouped = [...groups.entries()].map(([id, members]): Contender => {
    const memberIds = members.map((m) => m.agentId).sort();
    const loaded = members.filter((m) => m.error === undefined);
    if (loaded.length === 0) {
      return { id, status: "error", kpis: null, members: memberIds, note: members.map((m) => `${m.agentId}: ${m.error}`).join("; ") };
    }
    const kpis = averageKpis(loaded.map((m) => computeKpis(m.fills, m.equity, policy.drawdownFloor)), policy.drawdownFloor);
    if (kpis.tradeCount < policy.minTrades) {
      return { id, status: "insufficient_data", kpis, members: memberIds, note: new InsufficientDataError(id, kpis.tradeCount, policy.minTrades).message };
    }
    return { id, status: "ok", kpis, members: memberIds };
  });

  return [...solo, ...grouped];
}

/** Unbounded profit factors sort above every finite one. */
const factor = (k: KpiSet) => k.profitFactor ?? Infinity;

export function compareKpis(a: { id: string; kpis: KpiSet }, b: { id: string; kpis: KpiSet }): number {
  return (
    b.kpis.score - a.kpis.score ||
    b.kpis.sharpe - a.kpis.sharpe ||
    (factor(a.kpis) === factor(b.kpis) ? 0 : factor(b.kpis) > factor(a.kpis) ? 1 : -1) ||
    b.kpis.netPnl - a.kpis.netPnl ||
    a.id.localeCompare(b.id)
  );
}

/**
 * Pure ranking. Contenders with enough data are ordered by score, then
 * Sharpe ratio, profit factor, net PnL and id. The top `promoteFraction` with
 * a positive score are promoted and share a weight of 1 in proportion to
 * score; the bottom `retireFraction` scoring under `retireFloor` are retired.
 * Everyone else holds their current weight. When promotions and holds add up
 * to more than 1, every weight is scaled down so that they total 1.
 */
export function rank(contenders: readonly Contender[], policy: LeaguePolicy, currentWeights: ReadonlyMap<string, number>): AllocationRecommendation[] {
  const current = (c: Contender) => {
    const own = currentWeights.get(c.id);
    if (own !== undefined) return own;
    return (c.members ?? []).reduce((s, m) => s + (currentWeights.get(m) ?? 0), 0);
  };
  type Draft = { c: Contender; action: AllocationRecommendation["action"]; weight: number; rationale: string };
  const draft = (c: Contender, action: Draft["action"], weight: number, rationale: string): Draft => ({ c, action, weight, rationale });

  const eligible = contenders
    .filter((c): c is Contender & { kpis: KpiSet } => c.status === "ok" && c.kpis !== null)
    .sort(compareKpis);
  const n = eligible.length;
  const promoted = eligible.slice(0, Math.ceil(policy.promoteFraction * n)).filter((c) => c.kpis.score > 0);
  const promotedIds = new Set(promoted.map((c) => c.id));
  const totalScore = promoted.reduce((s, c) => s + c.kpis.score, 0);
  const retireFrom = n - Math.ceil(policy.retireFraction * n);

  const pct = (f: number) => `${Math.round(f * 100)}%`;
  const ranked = eligible.map((c, i) => {
    const place = `rank ${i + 1}/${n}, score ${c.kpis.score.toFixed(4)}`;
    if (promotedIds.has(c.id)) return draft(c, "promote", c.kpis.score / totalScore, `${place}: top ${pct(policy.promoteFraction)}`);
    if (i >= retireFrom && c.kpis.score < policy.retireFloor) return draft(c, "retire", 0, `${place}: bottom ${pct(policy.retireFraction)} below floor ${policy.retireFloor}`);
    return draft(c, "hold", current(c), place);
  });

  const rankedIds = new Set(eligible.map((c) => c.id));
  const rest = contenders
    .filter((c) => !rankedIds.has(c.id))
    .sort((a, b) => a.id.localeCompare(b.id))
    .map((c) => draft(c, "hold", current(c), c.note ?? c.status));

  const drafts = [...ranked, ...rest];
  const total = drafts.reduce((s, d) => s + d.weight, 0);
  const scale = total > 1 + 1e-9 ? 1 / total : 1;
  const scaledNote = `; scaled by ${scale.toFixed(4)} so weights total 1`;

  return drafts.map(({ c, action, weight, rationale }) => ({
    agentId: c.id,
    action,
    weight: round4(weight * scale),
    rationale: scale < 1 && weight > 0 ? `${rationale}${scaledNote}` : rationale,
    status: c.status,
    kpis: c.kpis,
    ...(c.members ? { members: c.members } : {}),
  }));
}

export interface LeagueAggregatorOptions {
  ledger: ILedger;
  policy: LeaguePolicy;
  clock?: Clock;
  log?: Logger;
}

/** Reads every window first, then ranks; only the report is ever written. */
export class LeagueAggregator {
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(private readonly opts: LeagueAggregatorOptions) {
    this.clock = opts.clock ?? systemClock;
    this.log = opts.log ?? silentLogger();
  }

  /** Windows for the given agents, or every registered agent. A failed read marks that agent only. */
  async loadWindows(agentIds?: readonly string[]): Promise<PerformanceWindow[]> {
    const { ledger, policy } = this.opts;
    const records = await ledger.listAgents();
    const builders = new Map(records.map((r) => [r.agentId, r.builderName]));
    const ids = agentIds ?? records.map((r) => r.agentId);
    const since = new Date(this.clock.now().getTime() - policy.lookbackDays * DAY_MS);

    return Promise.all(ids.map(async (agentId): Promise<PerformanceWindow> => {
      const builderName = builders.get(agentId) ?? null;
      try {
        const [fills, equity] = await Promise.all([ledger.fillsSince(agentId, since), ledger.equityHistory(agentId, since)]);
        return { agentId, builderName, fills, equity };
      } catch (err) {
        this.log.warn({ agentId, err }, "could not load performance window");
        return { agentId, builderName, fills: [], equity: [], error: errorMessage(err) };
      }
    }));
  }

  async aggregate(agentIds?: readonly string[], groupBy: GroupBy = this.opts.policy.groupBy): Promise<AllocationRecommendation[]> {
    const { policy, ledger } = this.opts;
    const windows = await this.loadWindows(agentIds);
    const previous = await ledger.latestRecommendations();
    const weights = new Map((previous?.recommendations ?? []).map((r) => [r.agentId, r.weight]));
    const contenders = groupBy === "builder" ? groupByBuilder(windows, policy) : windows.map((w) => assess(w, policy));
    return rank(contenders, policy, weights);
  }

  async report(tradingDay: string, opts: { agentIds?: readonly string[]; groupBy?: GroupBy } = {}): Promise<LeagueReport> {
    const groupBy = opts.groupBy ?? this.opts.policy.groupBy;
    const recommendations = await this.aggregate(opts.agentIds, groupBy);
    return {
      runId: uuidv4(),
      generatedAt: this.clock.now().toISOString(),
      tradingDay,
      lookbackDays: this.opts.policy.lookbackDays,
      groupBy,
      recommendations,
    };
  }
}
