import { describe, it, expect, vi } from "vitest";
import { ManualClock } from "@league/core";
import { LeaguePolicy, type Fill, type KpiSet } from "@league/schemas";
import { MemoryLedger } from "@league/storage";
import { LeagueAggregator, rank, type Contender } from "./LeagueAggregator";

const NOW = "2026-02-18T22:00:00.000Z";

async function seed(ledger: MemoryLedger, agentId: string, pnls: number[], builderName: string | null = null) {
  await ledger.recordAgent({ agentId, builderName, builderModel: null, lineage: null, configHash: "h", createdAt: NOW, updatedAt: NOW });
  for (const [i, realizedPnl] of pnls.entries()) {
    const f: Fill = { orderId: `${agentId}-${i}`, intentId: `${agentId}-${i}`, agentId, symbol: "AAPL", side: "sell", qty: 1, price: 100, ts: `2026-02-1${i}T15:00:00.000Z`, realizedPnl, broker: "sim" };
    await ledger.recordFill(f);
  }
}

const kpis = (netPnl: number, maxDrawdown: number, tradeCount = 10, extra: Partial<KpiSet> = {}): KpiSet => ({
  netPnl,
  winRate: 0.5,
  maxDrawdown,
  tradeCount,
  score: netPnl / Math.max(maxDrawdown, 1),
  sharpe: 0,
  profitFactor: 1,
  ...extra,
});

describe("rank", () => {
  const policy = LeaguePolicy.parse({});

  it("ranks equal PnL with a smaller drawdown higher", () => {
    const contenders: Contender[] = [
      { id: "B", status: "ok", kpis: kpis(100, 50) },
      { id: "A", status: "ok", kpis: kpis(100, 10) },
    ];
    const out = rank(contenders, policy, new Map());
    expect(out.map((r) => [r.agentId, r.action, r.weight])).toEqual([["A", "promote", 1], ["B", "hold", 0]]);
  });

  it("always holds an agent below the trade minimum", () => {
    const contenders: Contender[] = [
      { id: "A", status: "ok", kpis: kpis(10, 10) },
      { id: "C", status: "insufficient_data", kpis: kpis(10_000, 1, 2), note: "C: 2 trade(s) in window, 5 required" },
    ];
    const out = rank(contenders, policy, new Map([["C", 0.3]]));
    expect(out[1]).toMatchObject({ agentId: "C", action: "hold", weight: 0.3, status: "insufficient_data", rationale: "C: 2 trade(s) in window, 5 required" });
  });

  it("breaks score ties on Sharpe ratio, then profit factor", () => {
    const contenders: Contender[] = [
      { id: "A", status: "ok", kpis: kpis(100, 10, 10, { sharpe: 0.5, profitFactor: 3 }) },
      { id: "B", status: "ok", kpis: kpis(100, 10, 10, { sharpe: 0.9, profitFactor: 1 }) },
      { id: "C", status: "ok", kpis: kpis(100, 10, 10, { sharpe: 0.5, profitFactor: null }) },
      { id: "D", status: "ok", kpis: kpis(100, 10, 10, { sharpe: 0.5, profitFactor: 2 }) },
    ];
    const out = rank(contenders, policy, new Map());
    expect(out.map((r) => r.agentId)).toEqual(["B", "C", "A", "D"]);
    expect(out[0]).toMatchObject({ action: "promote", weight: 1 });
  });

  it("scales held weights down when they would push the total above 1", () => {
    const contenders: Contender[] = [
      { id: "A", status: "ok", kpis: kpis(100, 10) },
      { id: "B", status: "ok", kpis: kpis(20, 10) },
      { id: "C", status: "insufficient_data", kpis: kpis(5, 1, 2), note: "too few trades" },
    ];
    const out = rank(contenders, policy, new Map([["B", 0.6], ["C", 0.4]]));
    expect(out.map((r) => [r.agentId, r.action, r.weight])).toEqual([
      ["A", "promote", 0.5],
      ["B", "hold", 0.3],
      ["C", "hold", 0.2],
    ]);
    expect(out[1]?.rationale).toBe("rank 2/2, score 2.0000; scaled by 0.5000 so weights total 1");
    expect(out.reduce((s, r) => s + r.weight, 0)).toBe(1);
  });

  it("leaves weights alone when they already fit", () => {
    const contenders: Contender[] = [
      { id: "A", status: "ok", kpis: kpis(100, 10) },
      { id: "B", status: "ok", kpis: kpis(20, 10) },
    ];
    const out = rank(contenders, policy, new Map());
    expect(out.map((r) => [r.agentId, r.weight, r.rationale])).toEqual([
      ["A", 1, "rank 1/2, score 10.0000: top 25%"],
      ["B", 0, "rank 2/2, score 2.0000"],
    ]);
  });
});

describe("LeagueAggregator", () => {
  const clock = () => new ManualClock(NOW);

  it("promotes, holds and retires from ledger history", async () => {
    const ledger = new MemoryLedger();
    await seed(ledger, "agent-a", [60, -10, 50]);
    await seed(ledger, "agent-b", [-50, 150]);
    await seed(ledger, "agent-c", [-30, -10]);
    await seed(ledger, "agent-d", [500]);
    const policy = LeaguePolicy.parse({ minTrades: 2, promoteFraction: 0.5, retireFraction: 0.5 });

    const out = await new LeagueAggregator({ ledger, policy, clock: clock() }).aggregate();
    expect(out.map((r) => [r.agentId, r.action, r.weight, r.status])).toEqual([
      ["agent-a", "promote", 0.8333, "ok"],
      ["agent-b", "promote", 0.1667, "ok"],
      ["agent-c", "retire", 0, "ok"],
      ["agent-d", "hold", 0, "insufficient_data"],
    ]);
    expect(out[0]?.rationale).toBe("rank 1/3, score 10.0000: top 50%");
    expect(out[0]?.kpis).toMatchObject({ netPnl: 100, winRate: 2 / 3, maxDrawdown: 10, tradeCount: 3, score: 10, profitFactor: 11 });
  });

  it("keeps going when one agent's history cannot be read", async () => {
    const ledger = new MemoryLedger();
    await seed(ledger, "agent-a", [60, -10, 50]);
    await seed(ledger, "agent-b", [-50, 150]);
    await seed(ledger, "agent-c", [-30, -10]);
    await ledger.recordRecommendations({
      runId: "prev", generatedAt: "2026-02-17T22:00:00.000Z", tradingDay: "2026-02-17", lookbackDays: 30, groupBy: "agent",
      recommendations: [{ agentId: "agent-b", action: "promote", weight: 0.4, rationale: "", status: "ok", kpis: null }],
    });
    const read = ledger.fillsSince.bind(ledger);
    vi.spyOn(ledger, "fillsSince").mockImplementation(async (agentId, since) => {
      if (agentId === "agent-c") throw new Error("read failed");
      return read(agentId, since);
    });
    const policy = LeaguePolicy.parse({ minTrades: 2 });

    const out = await new LeagueAggregator({ ledger, policy, clock: clock() }).aggregate();
    // a promotion of 1 plus a held 0.4 is scaled by 1 / 1.4
    expect(out.map((r) => [r.agentId, r.action, r.weight, r.status])).toEqual([
      ["agent-a", "promote", 0.7143, "ok"],
      ["agent-b", "hold", 0.2857, "ok"],
      ["agent-c", "hold", 0, "error"],
    ]);
    expect(out[1]?.rationale).toBe("rank 2/2, score 2.0000; scaled by 0.7143 so weights total 1");
    expect(out[2]).toMatchObject({ rationale: "read failed", kpis: null });
  });

  it("compares builders on averaged KPIs", async () => {
    const ledger = new MemoryLedger();
    await seed(ledger, "a1", [100], "alice");
    await seed(ledger, "a2", [-20, 40], "alice");
    await seed(ledger, "b1", [10], "bob");
    const policy = LeaguePolicy.parse({ minTrades: 1, promoteFraction: 0.5, retireFraction: 0.5, groupBy: "builder" });

    const out = await new LeagueAggregator({ ledger, policy, clock: clock() }).aggregate();
    expect(out.map((r) => [r.agentId, r.action, r.weight, r.members])).toEqual([
      ["builder:bob", "promote", 1, ["b1"]],
      ["builder:alice", "hold", 0, ["a1", "a2"]],
    ]);
    expect(out[1]?.kpis).toEqual({ netPnl: 60, winRate: 0.75, maxDrawdown: 10, tradeCount: 1.5, score: 6, sharpe: 1 / 6, profitFactor: null });
  });

  it("only reads fills inside the lookback", async () => {
    const ledger = new MemoryLedger();
    await seed(ledger, "agent-a", [10, 10]);
    const policy = LeaguePolicy.parse({ lookbackDays: 5, minTrades: 1 });
    // fills sit on Feb 10 and 11, more than five days before NOW
    const [r] = await new LeagueAggregator({ ledger, policy, clock: clock() }).aggregate();
    expect(r).toMatchObject({ status: "insufficient_data", kpis: { tradeCount: 0 } });
  });
});
