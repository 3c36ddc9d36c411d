import {
  BrokerTimeoutError,
  BrokerTransientError,
  LeagueError,
  errorMessage,
  silentLogger,
  systemClock,
  type Clock,
  type LeagueMetrics,
  type Logger,
} from "@league/core";
import type { EquitySnapshot, Fill, OrderIntent, Rejection, RejectionKind, Signal } from "@league/schemas";
import type { IBroker, ILedger, IMarketData, IStrategy, SubmitResult } from "@league/interfaces";
import type { GuardrailEvaluator } from "@league/risk";
import type { PositionRouter } from "@league/strategy";

export interface LiveStepDeps {
  agentId: string;
  symbols: readonly string[];
  strategy: IStrategy;
  router: PositionRouter;
  guardrails: GuardrailEvaluator;
  broker: IBroker;
  marketData: IMarketData;
  ledger: ILedger;
  historyBars: number;
  submitTimeoutMs: number;
  retryBackoffMs: number;
  clock?: Clock;
  log?: Logger;
  metrics?: LeagueMetrics;
}

export interface RunContext {
  marketOpen: boolean;
  /** Drive every symbol to a flat position whatever the strategy says. */
  flatten?: boolean;
}

export interface StepResult {
  status: "ok" | "failed";
  signals: Record<string, Signal>;
  intents: OrderIntent[];
  fills: Fill[];
  rejections: Rejection[];
  equityAfter: EquitySnapshot | null;
  /** An intent whose fate at the venue is unknown ended the cycle early. */
  unresolved: boolean;
  error?: string;
}

type Outcome =
  | SubmitResult
  | { status: "unknown"; reason: string; message: string };

interface Planned {
  symbol: string;
  price: number;
  signal: Signal;
}

/**
 * One live cycle: bars and signals for every symbol, then per symbol route,
 * guardrail and submit, then record.
 *
 * Nothing reaches the broker until every symbol has a signal, so a data
 * failure leaves the ledger untouched. Records are buffered and written with
 * a single `appendCycle`. Once an intent has been submitted the cycle is
 * always written, even when a later step fails: confirmed fills and
 * rejections go in and the cycle is marked unresolved. Position and equity
 * are re-read from the broker every cycle.
 */
export class LiveStepExecutor {
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(private readonly deps: LiveStepDeps) {
    this.clock = deps.clock ?? systemClock;
    this.log = (deps.log ?? silentLogger()).child({ agentId: deps.agentId });
  }

  async runOnce(ctx: RunContext): Promise<StepResult> {
    const { deps } = this;
    const result: StepResult = { status: "ok", signals: {}, intents: [], fills: [], rejections: [], equityAfter: null, unresolved: false };

    let plans: Planned[];
    try {
      plans = await this.plan(ctx, result);
    } catch (err) {
      return this.fail(result, err);
    }

    let submitted = false;
    let inFlight: OrderIntent | null = null;
    let lastEquity: EquitySnapshot | null = null;
    try {
      for (const { symbol, price, signal } of plans) {
        if (result.unresolved) break;
        const position = await deps.broker.getPosition(symbol);
        const equity = await deps.broker.getEquity();
        lastEquity = equity;
        const intents = deps.router.route({
          agentId: deps.agentId,
          symbol,
          signal,
          positionQty: position.qty,
          equity: equity.equity,
          price,
          flatten: ctx.flatten,
          now: this.clock.now(),
        });
        this.log.debug({ symbol, signal, price, position: position.qty, intents: intents.length }, "routed signal");

        for (const intent of intents) {
          result.intents.push(intent);
          const decision = deps.guardrails.evaluate(intent, equity, { marketOpen: ctx.marketOpen, positionQty: position.qty });
          if (!decision.accepted) {
            result.rejections.push(this.rejection(intent, "guardrail", decision.reason, decision.message));
            continue;
          }

          submitted = true;
          inFlight = decision.intent;
          const outcome = await this.submitWithRetry(decision.intent);
          inFlight = null;
          if (outcome.status === "filled") {
            result.fills.push(outcome.fill);
          } else if (outcome.status === "rejected") {
            result.rejections.push(this.rejection(intent, "broker", outcome.reason, outcome.message));
          } else {
            result.rejections.push(this.rejection(intent, "unknown_outcome", outcome.reason, outcome.message));
            result.unresolved = true;
            break;
          }
        }
      }

      const equityAfter = await deps.broker.getEquity();
      lastEquity = equityAfter;
      await deps.ledger.appendCycle({ agentId: deps.agentId, fills: result.fills, rejections: result.rejections, equity: equityAfter });
      result.equityAfter = equityAfter;
    } catch (err) {
      if (!submitted) return this.fail(result, err);
      if (inFlight) {
        result.rejections.push(this.rejection(inFlight, "unknown_outcome", "submit_error", errorMessage(err)));
      }
      result.unresolved = true;
      const salvaged: StepResult = { ...result, equityAfter: await this.salvage(result, lastEquity) };
      this.report(salvaged, false);
      return this.fail(salvaged, err);
    }

    this.report(result, true);
    return result;
  }

  /** Bars and signal for every symbol; no broker call. */
  private async plan(ctx: RunContext, result: StepResult): Promise<Planned[]> {
    const { deps } = this;
    const plans: Planned[] = [];
    for (const symbol of deps.symbols) {
      const bars = await deps.marketData.latestBars(symbol, deps.historyBars);
      const price = bars[bars.length - 1];
      if (price === undefined) throw new Error(`no price available for ${symbol}`);
      const signal: Signal = ctx.flatten ? "FLAT" : deps.strategy.signal(bars);
      result.signals[symbol] = signal;
      plans.push({ symbol, price, signal });
    }
    return plans;
  }

  /**
   * Writes what a broken cycle already did at the venue. Returns the equity
   * snapshot that was written, or null when the ledger refused both attempts.
   */
  private async salvage(result: StepResult, fallback: EquitySnapshot | null): Promise<EquitySnapshot | null> {
    const { deps } = this;
    let equity = fallback;
    try {
      equity = await deps.broker.getEquity();
    } catch (err) {
      this.log.warn({ err }, "equity unavailable; recording the last snapshot read this cycle");
    }
    if (!equity) {
      this.log.error({ fills: result.fills, rejections: result.rejections }, "no equity snapshot; cycle left unrecorded");
      return null;
    }

    const batch = { agentId: deps.agentId, fills: result.fills, rejections: result.rejections, equity };
    for (let attempt = 1; attempt <= 2; attempt++) {
      try {
        await deps.ledger.appendCycle(batch);
        return equity;
      } catch (err) {
        this.log.warn({ err, attempt }, "recording a broken cycle failed");
      }
    }
    this.log.error({ fills: result.fills, rejections: result.rejections }, "submitted orders could not be recorded");
    return null;
  }

  private fail(result: StepResult, err: unknown): StepResult {
    if (err instanceof LeagueError && err.fatal) throw err;
    const recorded = result.equityAfter !== null;
    this.log.error({ err }, recorded ? "cycle failed after submitting; recorded as unresolved" : "cycle failed; nothing recorded");
    this.deps.metrics?.cycles.inc({ status: "failed" });
    return { ...result, status: "failed", error: errorMessage(err) };
  }

  private async submitWithRetry(intent: OrderIntent): Promise<Outcome> {
    const { deps } = this;
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.submitBounded(intent);
      } catch (err) {
        // timeouts included: the retry reuses the intent id, which the venue deduplicates
        if (!(err instanceof BrokerTransientError)) throw err;
        if (attempt >= 2) {
          const reason = err instanceof BrokerTimeoutError ? "timeout" : "retry_exhausted";
          return { status: "unknown", reason, message: err.message };
        }
        this.log.warn({ intentId: intent.id, err }, "transient broker error; retrying once");
        await this.clock.sleep(deps.retryBackoffMs);
      }
    }
  }

  /** Races the broker against submitTimeoutMs and aborts the broker's own wait on timeout. */
  private submitBounded(intent: OrderIntent): Promise<SubmitResult> {
    const ms = this.deps.submitTimeoutMs;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new BrokerTimeoutError(`submit of ${intent.id} exceeded ${ms}ms`));
      }, ms);
    });
    return Promise.race([this.deps.broker.submit(intent, controller.signal), timeout]).finally(() => clearTimeout(timer));
  }

  private rejection(intent: OrderIntent, kind: RejectionKind, reason: string, message: string): Rejection {
    return {
      intentId: intent.id,
      agentId: intent.agentId,
      symbol: intent.symbol,
      kind,
      reason,
      message,
      ts: this.clock.now().toISOString(),
    };
  }

  private report(result: StepResult, completed: boolean): void {
    const { metrics } = this.deps;
    for (const f of result.fills) {
      this.log.info({ symbol: f.symbol, side: f.side, qty: f.qty, price: f.price, realizedPnl: f.realizedPnl }, "fill");
      metrics?.fills.inc({ symbol: f.symbol });
    }
    for (const r of result.rejections) {
      this.log.warn({ symbol: r.symbol, kind: r.kind, reason: r.reason }, r.message);
      metrics?.rejections.inc({ kind: r.kind, reason: r.reason });
    }
    if (completed) metrics?.cycles.inc({ status: result.unresolved ? "unresolved" : "ok" });
    if (result.equityAfter) metrics?.equity.set({ agent: this.deps.agentId }, result.equityAfter.equity);
  }
}
