import { v4 as uuidv4 } from "uuid";
import { systemClock, type Clock } from "@league/core";
import type { EquitySnapshot, OrderIntent, Position } from "@league/schemas";
import type { IBroker, IMarketData, SubmitResult } from "@league/interfaces";

export interface SimBrokerOptions {
  cash: number;
  slippageBps?: number;
  /** Flat fee per fill, charged to cash. */
  commission?: number;
  /** Marks open positions; without it the last traded price is used. */
  marketData?: IMarketData;
  clock?: Clock;
}

/**
 * Deterministic long-only simulator. Orders fill immediately at the intent's
 * reference price moved against the trader by `slippageBps`.
 */
export class SimBroker implements IBroker {
  readonly name = "sim";
  readonly venue = "sim" as const;

  private cash: number;
  private readonly positions = new Map<string, Position>();
  private readonly lastTrade = new Map<string, number>();
  private dayStartEquity: number;
  private readonly slippageBps: number;
  private readonly commission: number;
  private readonly clock: Clock;

  constructor(private readonly opts: SimBrokerOptions) {
    this.cash = opts.cash;
    this.dayStartEquity = opts.cash;
    this.slippageBps = opts.slippageBps ?? 0;
    this.commission = opts.commission ?? 0;
    this.clock = opts.clock ?? systemClock;
  }

  async submit(intent: OrderIntent): Promise<SubmitResult> {
    const slip = intent.refPrice * (this.slippageBps / 1e4);
    const price = intent.side === "buy" ? intent.refPrice + slip : intent.refPrice - slip;

    if (intent.type === "limit" && intent.limitPrice !== undefined) {
      const marketable = intent.side === "buy" ? price <= intent.limitPrice : price >= intent.limitPrice;
      if (!marketable) {
        return { status: "rejected", reason: "limit_not_marketable", message: `${price} outside limit ${intent.limitPrice}` };
      }
    }

    const held = this.positions.get(intent.symbol) ?? { symbol: intent.symbol, qty: 0, avgPrice: 0 };
    let realizedPnl = 0;

    if (intent.side === "buy") {
      const cost = price * intent.qty + this.commission;
      if (cost > this.cash) {
        return { status: "rejected", reason: "insufficient_cash", message: `cost ${cost.toFixed(2)} exceeds cash ${this.cash.toFixed(2)}` };
      }
      this.cash -= cost;
      const qty = held.qty + intent.qty;
      this.positions.set(intent.symbol, { symbol: intent.symbol, qty, avgPrice: (held.avgPrice * held.qty + price * intent.qty) / qty });
    } else {
      if (intent.qty > held.qty) {
        return { status: "rejected", reason: "insufficient_position", message: `sell ${intent.qty} exceeds held ${held.qty}` };
      }
      this.cash += price * intent.qty - this.commission;
      realizedPnl = (price - held.avgPrice) * intent.qty;
      const qty = held.qty - intent.qty;
      if (qty === 0) this.positions.delete(intent.symbol);
      else this.positions.set(intent.symbol, { ...held, qty });
    }

    this.lastTrade.set(intent.symbol, price);
    return {
      status: "filled",
      fill: {
        orderId: uuidv4(),
        intentId: intent.id,
        agentId: intent.agentId,
        symbol: intent.symbol,
        side: intent.side,
        qty: intent.qty,
        price,
        ts: this.clock.now().toISOString(),
        realizedPnl,
        broker: this.name,
      },
    };
  }

  async getPosition(symbol: string): Promise<Position> {
    const p = this.positions.get(symbol);
    return p ? { ...p } : { symbol, qty: 0, avgPrice: 0 };
  }

  async getEquity(): Promise<EquitySnapshot> {
    let positionsValue = 0;
    for (const p of this.positions.values()) {
      positionsValue += p.qty * (await this.mark(p));
    }
    return {
      cash: this.cash,
      positionsValue,
      equity: this.cash + positionsValue,
      lastEquity: this.dayStartEquity,
      ts: this.clock.now().toISOString(),
    };
  }

  /** Rolls the daily-loss reference to the current equity. */
  async startDay(): Promise<void> {
    this.dayStartEquity = (await this.getEquity()).equity;
  }

  private async mark(p: Position): Promise<number> {
    if (this.opts.marketData) return this.opts.marketData.lastPrice(p.symbol);
    return this.lastTrade.get(p.symbol) ?? p.avgPrice;
  }
}
