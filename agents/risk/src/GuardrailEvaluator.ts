import type { EquitySnapshot, GuardrailConfig, OrderIntent, Venue } from "@league/schemas";

export type GuardrailReason =
  | "real_trading_locked"
  | "max_order_notional"
  | "max_position_pct"
  | "max_daily_loss"
  | "market_closed";

export type GuardrailDecision =
  | { accepted: true; intent: OrderIntent }
  | { accepted: false; reason: GuardrailReason; message: string; details: Record<string, number | string | boolean> };

/** Per-call facts that are not part of the intent itself. */
export interface GuardrailInput {
  marketOpen: boolean;
  /** Signed quantity currently held in the intent's symbol. */
  positionQty: number;
}

export interface GuardrailEvaluatorOptions {
  config: GuardrailConfig;
  venue: Venue;
  /** Real-money arming flag. Never read from the agent config file. */
  armed: boolean;
}

const round2 = (n: number) => Math.round(n * 100) / 100;

export function signedQty(intent: Pick<OrderIntent, "side" | "qty">): number {
  return intent.side === "buy" ? intent.qty : -intent.qty;
}

/** True when the intent moves the position further from flat. */
export function increasesRisk(intent: Pick<OrderIntent, "side" | "qty">, positionQty: number): boolean {
  return Math.abs(positionQty + signedQty(intent)) > Math.abs(positionQty);
}

/**
 * Pre-trade checks, applied in a fixed order and stopping at the first failure:
 * real-money gate, order notional, position cap, daily loss, market session.
 * Deterministic and free of side effects; the accepted intent may be a
 * downgraded copy (after-hours limit order), the input is never modified.
 */
export class GuardrailEvaluator {
  readonly config: GuardrailConfig;
  readonly venue: Venue;
  readonly armed: boolean;

  constructor(opts: GuardrailEvaluatorOptions) {
    this.config = opts.config;
    this.venue = opts.venue;
    this.armed = opts.armed;
  }

  evaluate(intent: OrderIntent, snapshot: EquitySnapshot, input: GuardrailInput): GuardrailDecision {
    const { config } = this;

    if (this.venue === "real" && !this.armed) {
      return {
        accepted: false,
        reason: "real_trading_locked",
        message: "real-money venue requires REAL_TRADING_ENABLED",
        details: { venue: this.venue },
      };
    }

    const notional = Math.abs(intent.qty * intent.refPrice);
    if (config.maxOrderNotional !== undefined && notional > config.maxOrderNotional) {
      return {
        accepted: false,
        reason: "max_order_notional",
        message: `order notional ${notional.toFixed(2)} exceeds ${config.maxOrderNotional}`,
        details: { notional, limit: config.maxOrderNotional },
      };
    }

    const increasing = increasesRisk(intent, input.positionQty);

    if (increasing) {
      const resultingValue = Math.abs(input.positionQty + signedQty(intent)) * intent.refPrice;
      const cap = config.maxPositionPct * snapshot.equity;
      if (resultingValue > cap) {
        return {
          accepted: false,
          reason: "max_position_pct",
          message: `position value ${resultingValue.toFixed(2)} would exceed ${cap.toFixed(2)}`,
          details: { resultingValue, cap, maxPositionPct: config.maxPositionPct },
        };
      }
    }

    const dayLoss = snapshot.lastEquity - snapshot.equity;
    if (increasing && config.maxDailyLoss !== undefined && dayLoss > config.maxDailyLoss) {
      return {
        accepted: false,
        reason: "max_daily_loss",
        message: `day loss ${dayLoss.toFixed(2)} exceeds ${config.maxDailyLoss}`,
        details: { dayLoss, limit: config.maxDailyLoss },
      };
    }

    if (input.marketOpen) return { accepted: true, intent };

    if (!config.allowAfterHours) {
      return {
        accepted: false,
        reason: "market_closed",
        message: "market is closed and after-hours trading is disabled",
        details: { allowAfterHours: false },
      };
    }

    const band = config.afterHoursLimitBps / 10_000;
    const limitPrice = round2(intent.side === "buy" ? intent.refPrice * (1 + band) : intent.refPrice * (1 - band));
    const downgraded: OrderIntent = Object.freeze({
      ...intent,
      type: "limit",
      limitPrice,
      timeInForce: "day",
      extendedHours: true,
    });
    return { accepted: true, intent: downgraded };
  }
}
