import { describe, it, expect, vi } from "vitest";
import { BrokerFatalError, BrokerTransientError, ManualClock, createMetrics } from "@league/core";
import { GuardrailConfig, type Signal, type Venue } from "@league/schemas";
import type { IBroker, IStrategy } from "@league/interfaces";
import { GuardrailEvaluator } from "@league/risk";
import { PositionRouter } from "@league/strategy";
import { AlwaysFlat, RsiMeanReversion, RsiParams } from "@league/signal";
import { MemoryLedger } from "@league/storage";
import { SimBroker } from "./brokers/SimBroker";
import { ReplayMarketData } from "./marketdata/ReplayMarketData";
import { LiveStepExecutor } from "./LiveStepExecutor";

const constant = (signal: Signal): IStrategy => ({ name: `always_${signal}`, minBars: 1, signal: () => signal });

interface HarnessOptions {
  prices: Record<string, number[]>;
  strategy?: IStrategy;
  guardrails?: Partial<GuardrailConfig>;
  venue?: Venue;
  armed?: boolean;
  submitTimeoutMs?: number;
}

function harness(o: HarnessOptions) {
  const clock = new ManualClock("2026-02-18T15:00:00.000Z");
  const marketData = new ReplayMarketData(o.prices);
  const broker: IBroker = new SimBroker({ cash: 10_000, marketData, clock });
  const ledger = new MemoryLedger();
  const metrics = createMetrics();
  const executor = new LiveStepExecutor({
    agentId: "agent-a",
    symbols: Object.keys(o.prices),
    strategy: o.strategy ?? constant("LONG"),
    router: new PositionRouter({ sizePct: 0.1, lotSize: 1, maxPositionPct: 0.5 }),
    guardrails: new GuardrailEvaluator({ config: GuardrailConfig.parse(o.guardrails ?? {}), venue: o.venue ?? "sim", armed: o.armed ?? false }),
    broker,
    marketData,
    ledger,
    historyBars: 50,
    submitTimeoutMs: o.submitTimeoutMs ?? 1_000,
    retryBackoffMs: 250,
    clock,
    metrics,
  });
  return { clock, marketData, broker, ledger, metrics, executor };
}

const epoch = new Date("2026-01-01T00:00:00.000Z");
const open = { marketOpen: true };

describe("LiveStepExecutor", () => {
  it("buys once oversold and closes on the flat signal with realized PnL", async () => {
    const h = harness({
      prices: { AAPL: [100, 99, 98, 97, 96, 95, 100] },
      strategy: new RsiMeanReversion(RsiParams.parse({ rsiLen: 3 })),
    });
    const results = [];
    for (let i = 0; i < 7; i++) results.push(await h.executor.runOnce(open));

    expect(results.map((r) => r.signals.AAPL)).toEqual(["FLAT", "FLAT", "FLAT", "LONG", "LONG", "LONG", "FLAT"]);
    expect(results[3]?.intents).toMatchObject([{ side: "buy", qty: 10, refPrice: 97 }]);
    expect(results[4]?.intents).toEqual([]);
    expect(results[5]?.intents).toEqual([]);

    const fills = await h.ledger.fillsSince("agent-a", epoch);
    expect(fills.map((f) => [f.side, f.qty, f.price, f.realizedPnl])).toEqual([
      ["buy", 10, 97, 0],
      ["sell", 10, 100, 30],
    ]);
    expect(results[6]?.equityAfter).toMatchObject({ cash: 10_030, positionsValue: 0, equity: 10_030 });
    expect(await h.ledger.equityHistory("agent-a", epoch)).toHaveLength(7);

    const fillMetric = await h.metrics.fills.get();
    expect(fillMetric.values).toEqual([{ value: 2, labels: { symbol: "AAPL" } }]);
  });

  it("proposes nothing when flat and the signal stays flat", async () => {
    const h = harness({ prices: { AAPL: [100] }, strategy: new AlwaysFlat() });
    const a = await h.executor.runOnce(open);
    const b = await h.executor.runOnce(open);
    expect(a.intents).toEqual([]);
    expect(b.intents).toEqual([]);
    expect(await h.ledger.fillsSince("agent-a", epoch)).toEqual([]);
  });

  it("never sends an unarmed real-venue intent to the broker", async () => {
    const h = harness({ prices: { AAPL: [100] }, venue: "real", armed: false });
    const submit = vi.spyOn(h.broker, "submit");
    const r = await h.executor.runOnce(open);
    expect(submit).not.toHaveBeenCalled();
    expect(r.rejections).toMatchObject([{ kind: "guardrail", reason: "real_trading_locked" }]);
    expect(await h.ledger.rejectionsSince("agent-a", epoch)).toHaveLength(1);
  });

  it("rejects new risk after the daily loss limit but still flattens", async () => {
    const h = harness({ prices: { AAPL: [100] }, guardrails: { maxDailyLoss: 500 } });
    await h.executor.runOnce(open);
    vi.spyOn(h.broker, "getEquity").mockResolvedValue({ cash: 9000, positionsValue: 400, equity: 9400, lastEquity: 10_000, ts: "2026-02-18T15:00:00.000Z" });

    const more = await h.executor.runOnce(open);
    // target floor(940 / 100) = 9 against 10 held: a risk-reducing sell of 1
    expect(more.rejections).toEqual([]);
    expect(more.fills).toMatchObject([{ side: "sell", qty: 1 }]);

    const close = await h.executor.runOnce({ marketOpen: true, flatten: true });
    expect(close.signals.AAPL).toBe("FLAT");
    expect(close.fills).toMatchObject([{ side: "sell", qty: 9 }]);

    const reopen = await h.executor.runOnce(open);
    expect(reopen.rejections).toMatchObject([{ kind: "guardrail", reason: "max_daily_loss" }]);
  });

  it("rejects when closed and trades a limit order after hours when allowed", async () => {
    const closed = await harness({ prices: { AAPL: [100] } }).executor.runOnce({ marketOpen: false });
    expect(closed.rejections).toMatchObject([{ reason: "market_closed" }]);

    const h = harness({ prices: { AAPL: [100] }, guardrails: { allowAfterHours: true } });
    const submit = vi.spyOn(h.broker, "submit");
    const r = await h.executor.runOnce({ marketOpen: false });
    expect(submit.mock.calls[0]?.[0]).toMatchObject({ type: "limit", limitPrice: 100.1, extendedHours: true, timeInForce: "day" });
    expect(r.fills).toMatchObject([{ price: 100, qty: 10 }]);
  });

  it("retries a transient failure once after the backoff", async () => {
    const h = harness({ prices: { AAPL: [100] } });
    const submit = vi.spyOn(h.broker, "submit").mockRejectedValueOnce(new BrokerTransientError("503"));
    const r = await h.executor.runOnce(open);
    expect(submit).toHaveBeenCalledTimes(2);
    expect(h.clock.sleeps).toEqual([250]);
    expect(r.fills).toHaveLength(1);
    expect(r.unresolved).toBe(false);
  });

  it("records an unknown outcome when the retry also fails", async () => {
    const h = harness({ prices: { AAPL: [100], MSFT: [50] } });
    vi.spyOn(h.broker, "submit").mockRejectedValue(new BrokerTransientError("503"));
    const r = await h.executor.runOnce(open);
    expect(r.unresolved).toBe(true);
    expect(r.rejections).toMatchObject([{ kind: "unknown_outcome", reason: "retry_exhausted", symbol: "AAPL" }]);
    expect(r.signals).toEqual({ AAPL: "LONG", MSFT: "LONG" });
    expect(r.intents.map((i) => i.symbol)).toEqual(["AAPL"]);
  });

  it("retries a timed-out submit once, aborting each abandoned attempt", async () => {
    const h = harness({ prices: { AAPL: [100] }, submitTimeoutMs: 20 });
    const submit = vi.spyOn(h.broker, "submit").mockImplementation(() => new Promise<never>(() => undefined));
    const r = await h.executor.runOnce(open);
    expect(submit).toHaveBeenCalledTimes(2);
    expect(submit.mock.calls.map((c) => c[1]?.aborted)).toEqual([true, true]);
    expect(h.clock.sleeps).toEqual([250]);
    expect(r.status).toBe("ok");
    expect(r.unresolved).toBe(true);
    expect(r.rejections).toMatchObject([{ kind: "unknown_outcome", reason: "timeout" }]);
    expect(await h.ledger.rejectionsSince("agent-a", epoch)).toHaveLength(1);
  });

  it("fills on the retry after a first submit times out", async () => {
    const h = harness({ prices: { AAPL: [100] }, submitTimeoutMs: 20 });
    const submit = vi.spyOn(h.broker, "submit").mockImplementationOnce(() => new Promise<never>(() => undefined));
    const r = await h.executor.runOnce(open);
    expect(submit).toHaveBeenCalledTimes(2);
    expect(r.unresolved).toBe(false);
    expect(r.fills).toMatchObject([{ symbol: "AAPL", side: "buy", qty: 10 }]);
  });

  it("reads every symbol before submitting anything", async () => {
    const h = harness({ prices: { AAPL: [100], MSFT: [50] } });
    const bars = h.marketData.latestBars.bind(h.marketData);
    vi.spyOn(h.marketData, "latestBars").mockImplementation((symbol: string, count: number) =>
      symbol === "MSFT" ? Promise.reject(new Error("data api 503")) : bars(symbol, count)
    );
    const submit = vi.spyOn(h.broker, "submit");
    const r = await h.executor.runOnce(open);

    expect(submit).not.toHaveBeenCalled();
    expect(r.status).toBe("failed");
    expect(r.error).toBe("data api 503");
    expect(r.signals).toEqual({ AAPL: "LONG" });
    expect(await h.ledger.fillsSince("agent-a", epoch)).toEqual([]);
    expect(await h.ledger.equityHistory("agent-a", epoch)).toEqual([]);
  });

  it("records a confirmed fill when a later symbol fails mid-cycle", async () => {
    const h = harness({ prices: { AAPL: [100], MSFT: [50] } });
    const position = h.broker.getPosition.bind(h.broker);
    vi.spyOn(h.broker, "getPosition").mockImplementation((symbol: string) =>
      symbol === "MSFT" ? Promise.reject(new Error("data api 503")) : position(symbol)
    );
    const r = await h.executor.runOnce(open);

    expect(r.status).toBe("failed");
    expect(r.error).toBe("data api 503");
    expect(r.unresolved).toBe(true);
    expect(r.equityAfter).toMatchObject({ cash: 9000, positionsValue: 1000, equity: 10_000 });
    const fills = await h.ledger.fillsSince("agent-a", epoch);
    expect(fills.map((f) => [f.symbol, f.side, f.qty, f.price])).toEqual([["AAPL", "buy", 10, 100]]);
    expect(await h.ledger.equityHistory("agent-a", epoch)).toHaveLength(1);
    const cycles = await h.metrics.cycles.get();
    expect(cycles.values).toEqual([{ value: 1, labels: { status: "failed" } }]);
  });

  it("falls back to the pre-submit equity when the closing snapshot is unavailable", async () => {
    const h = harness({ prices: { AAPL: [100] } });
    const equity = h.broker.getEquity.bind(h.broker);
    vi.spyOn(h.broker, "getEquity").mockImplementationOnce(equity).mockRejectedValue(new Error("account api 503"));
    const r = await h.executor.runOnce(open);

    expect(r.status).toBe("failed");
    expect(r.error).toBe("account api 503");
    expect(r.fills).toHaveLength(1);
    expect(await h.ledger.fillsSince("agent-a", epoch)).toHaveLength(1);
    expect(await h.ledger.equityHistory("agent-a", epoch)).toMatchObject([{ cash: 10_000, positionsValue: 0, equity: 10_000 }]);
  });

  it("records the in-flight intent as unresolved before propagating a fatal broker error", async () => {
    const h = harness({ prices: { AAPL: [100] } });
    vi.spyOn(h.broker, "submit").mockRejectedValue(new BrokerFatalError("account blocked"));
    await expect(h.executor.runOnce(open)).rejects.toBeInstanceOf(BrokerFatalError);
    expect(await h.ledger.rejectionsSince("agent-a", epoch)).toMatchObject([
      { symbol: "AAPL", kind: "unknown_outcome", reason: "submit_error", message: "account blocked" },
    ]);
    expect(await h.ledger.equityHistory("agent-a", epoch)).toHaveLength(1);
  });

  it("propagates a fatal error raised before any submit and records nothing", async () => {
    const h = harness({ prices: { AAPL: [100] } });
    vi.spyOn(h.broker, "getPosition").mockRejectedValue(new BrokerFatalError("credentials revoked"));
    await expect(h.executor.runOnce(open)).rejects.toThrow("credentials revoked");
    expect(await h.ledger.equityHistory("agent-a", epoch)).toEqual([]);
  });

  it("retries the ledger write once and reports a failed cycle when both attempts fail", async () => {
    const h = harness({ prices: { AAPL: [100] } });
    const append = vi.spyOn(h.ledger, "appendCycle").mockRejectedValue(new Error("disk full"));
    const r = await h.executor.runOnce(open);
    expect(append).toHaveBeenCalledTimes(3);
    expect(r.status).toBe("failed");
    expect(r.error).toBe("disk full");
    expect(r.unresolved).toBe(true);
    expect(r.equityAfter).toBeNull();
    const cycles = await h.metrics.cycles.get();
    expect(cycles.values).toEqual([{ value: 1, labels: { status: "failed" } }]);
  });
});
