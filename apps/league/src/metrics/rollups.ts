import type { EquitySnapshot, Fill, KpiSet } from "@league/schemas";

/** Largest peak-to-trough fall of a value series, in the series' own units. */
export function maxDrawdown(series: readonly number[]): number {
  let peak = -Infinity;
  let worst = 0;
  for (const v of series) {
    peak = Math.max(peak, v);
    worst = Math.max(worst, peak - v);
  }
  return worst;
}

/** Cumulative realized PnL, starting from zero. */
export function realizedCurve(fills: readonly Fill[]): number[] {
  const out = [0];
  let acc = 0;
  for (const f of fills) {
    acc += f.realizedPnl;
    out.push(acc);
  }
  return out;
}

/** Period-over-period returns of an equity series; non-positive bases are skipped. */
export function periodReturns(series: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < series.length; i++) {
    const prev = series[i - 1];
    const cur = series[i];
    if (prev === undefined || cur === undefined || prev <= 0) continue;
    out.push(cur / prev - 1);
  }
  return out;
}

/** Mean over population standard deviation; 0 for fewer than two returns or a flat series. */
export function sharpeRatio(returns: readonly number[]): number {
  if (returns.length < 2) return 0;
  const mean = returns.reduce((s, r) => s + r, 0) / returns.length;
  const variance = returns.reduce((s, r) => s + (r - mean) ** 2, 0) / returns.length;
  const sd = Math.sqrt(variance);
  return sd < 1e-12 ? 0 : mean / sd;
}

/** Gains over losses; null stands for an unbounded ratio (gains, no losses). */
export function profitFactor(pnls: readonly number[]): number | null {
  const gains = pnls.reduce((s, p) => s + Math.max(p, 0), 0);
  const losses = pnls.reduce((s, p) => s - Math.min(p, 0), 0);
  if (losses === 0) return gains > 0 ? null : 0;
  return gains / losses;
}

export function score(netPnl: number, drawdown: number, drawdownFloor: number): number {
  return netPnl / Math.max(drawdown, drawdownFloor);
}

/**
 * KPIs of one performance window. Drawdown and the Sharpe ratio come from the
 * equity history when it has at least two points, otherwise from realized
 * PnL (the curve for drawdown, per closing trade for Sharpe).
 */
export function computeKpis(fills: readonly Fill[], equity: readonly EquitySnapshot[], drawdownFloor: number): KpiSet {
  const netPnl = fills.reduce((s, f) => s + f.realizedPnl, 0);
  const closing = fills.filter((f) => f.realizedPnl !== 0).map((f) => f.realizedPnl);
  const wins = closing.filter((p) => p > 0).length;
  const history = equity.length >= 2 ? equity.map((e) => e.equity) : null;
  const drawdown = history ? maxDrawdown(history) : maxDrawdown(realizedCurve(fills));
  return {
    netPnl,
    winRate: closing.length ? wins / closing.length : 0,
    maxDrawdown: drawdown,
    tradeCount: fills.length,
    score: score(netPnl, drawdown, drawdownFloor),
    sharpe: sharpeRatio(history ? periodReturns(history) : closing),
    profitFactor: profitFactor(closing),
  };
}

/**
 * Member-wise mean; the score is recomputed from the averaged PnL and drawdown.
 * One unbounded member profit factor makes the group's unbounded too.
 */
export function averageKpis(sets: readonly KpiSet[], drawdownFloor: number): KpiSet {
  const n = sets.length;
  const mean = (pick: (k: KpiSet) => number) => (n ? sets.reduce((s, k) => s + pick(k), 0) / n : 0);
  const netPnl = mean((k) => k.netPnl);
  const drawdown = mean((k) => k.maxDrawdown);
  const factors = sets.map((k) => k.profitFactor);
  return {
    netPnl,
    winRate: mean((k) => k.winRate),
    maxDrawdown: drawdown,
    tradeCount: mean((k) => k.tradeCount),
    score: score(netPnl, drawdown, drawdownFloor),
    sharpe: mean((k) => k.sharpe),
    profitFactor: factors.some((f) => f === null) ? null : mean((k) => k.profitFactor ?? 0),
  };
}
