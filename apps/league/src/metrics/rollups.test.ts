import { describe, it, expect } from "vitest";
import type { Fill } from "@league/schemas";
import { averageKpis, computeKpis, maxDrawdown, periodReturns, profitFactor, sharpeRatio } from "./rollups";

const fill = (realizedPnl: number, i = 0): Fill => ({
  orderId: `o-${i}`,
  intentId: `i-${i}`,
  agentId: "agent-a",
  symbol: "AAPL",
  side: realizedPnl === 0 ? "buy" : "sell",
  qty: 1,
  price: 100,
  ts: "2026-02-10T15:00:00.000Z",
  realizedPnl,
  broker: "sim",
});

describe("rollups", () => {
  it("measures the deepest fall from a running peak", () => {
    expect(maxDrawdown([100, 110, 95, 105, 90])).toBe(20);
    expect(maxDrawdown([])).toBe(0);
  });

  it("derives KPIs from realized PnL when there is no equity history", () => {
    const kpis = computeKpis([0, 50, -20, 0, 30].map(fill), [], 1);
    expect(kpis).toMatchObject({ netPnl: 60, winRate: 2 / 3, maxDrawdown: 20, tradeCount: 5, score: 3, profitFactor: 4 });
    // per-trade returns 50, -20, 30: mean 20, sd sqrt(2600 / 3)
    expect(kpis.sharpe).toBeCloseTo(20 / Math.sqrt(2600 / 3), 10);
  });

  it("prefers the equity history for drawdown", () => {
    const equity = [10_000, 10_100, 10_050].map((e, i) => ({ cash: e, positionsValue: 0, equity: e, lastEquity: 10_000, ts: `2026-02-1${i}T15:00:00.000Z` }));
    expect(computeKpis([fill(100)], equity, 1).maxDrawdown).toBe(50);
  });

  it("takes the Sharpe ratio from equity returns when there is a history", () => {
    const equity = [100, 110, 99, 108.9].map((e, i) => ({ cash: e, positionsValue: 0, equity: e, lastEquity: 100, ts: `2026-02-1${i}T15:00:00.000Z` }));
    // returns +10%, -10%, +10%: mean 0.1 / 3, sd sqrt(0.08) / 3
    expect(computeKpis([fill(-1)], equity, 1).sharpe).toBeCloseTo(0.1 / Math.sqrt(0.08), 6);
    expect(periodReturns([100, 110, 99])).toEqual([0.10000000000000009, -0.09999999999999998]);
  });

  it("computes the profit factor from closing trades", () => {
    expect(profitFactor([30, -10, 20])).toBe(5);
    expect(profitFactor([30, 20])).toBeNull();
    expect(profitFactor([])).toBe(0);
    expect(profitFactor([-5])).toBe(0);
  });

  it("returns a zero Sharpe ratio for short or flat series", () => {
    expect(sharpeRatio([0.01])).toBe(0);
    expect(sharpeRatio([0.01, 0.01, 0.01])).toBe(0);
    expect(sharpeRatio([-20, 40])).toBe(1 / 3);
  });

  it("floors the drawdown in the score", () => {
    expect(computeKpis([fill(10)], [], 5).score).toBe(2);
  });

  it("averages member KPIs and rescores", () => {
    const a = computeKpis([fill(100)], [], 1);
    const b = computeKpis([fill(-20), fill(40)], [], 1);
    expect(averageKpis([a, b], 1)).toEqual({ netPnl: 60, winRate: 0.75, maxDrawdown: 10, tradeCount: 1.5, score: 6, sharpe: 1 / 6, profitFactor: null });
    expect(averageKpis([b, b], 1).profitFactor).toBe(2);
  });
});
