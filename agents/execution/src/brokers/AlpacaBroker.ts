import { z } from "zod";
import { BrokerTimeoutError, BrokerTransientError, systemClock, type Clock, type Logger } from "@league/core";
import type { EquitySnapshot, Fill, OrderIntent, Position } from "@league/schemas";
import type { IBroker, SubmitResult } from "@league/interfaces";
import { AlpacaHttp, describeBody, type AlpacaCredentials } from "./alpacaHttp";

const num = z.coerce.number();

const AlpacaOrder = z.object({
  id: z.string(),
  client_order_id: z.string().optional(),
  status: z.string(),
  filled_qty: num.nullish(),
  filled_avg_price: num.nullish(),
  filled_at: z.string().nullish(),
});
type AlpacaOrder = z.infer<typeof AlpacaOrder>;

const AlpacaPosition = z.object({
  symbol: z.string(),
  qty: num,
  avg_entry_price: num,
  side: z.enum(["long", "short"]).optional(),
});

const AlpacaAccount = z.object({
  cash: num,
  equity: num,
  last_equity: num,
});

const DEAD = new Set(["canceled", "expired", "rejected", "done_for_day", "suspended"]);

export interface AlpacaBrokerOptions {
  venue: "paper" | "real";
  baseUrl: string;
  credentials: AlpacaCredentials;
  /** Bounds both each request and the wait for a fill. */
  timeoutMs: number;
  pollIntervalMs?: number;
  fetch?: typeof fetch;
  clock?: Clock;
  log?: Logger;
}

/** Paper and real venues over the Alpaca trading REST API (v2). */
export class AlpacaBroker implements IBroker {
  readonly name: string;
  readonly venue: "paper" | "real";
  private readonly http: AlpacaHttp;
  private readonly clock: Clock;
  private readonly pollIntervalMs: number;

  constructor(private readonly opts: AlpacaBrokerOptions) {
    this.venue = opts.venue;
    this.name = `alpaca_${opts.venue}`;
    this.http = new AlpacaHttp({ baseUrl: opts.baseUrl, credentials: opts.credentials, timeoutMs: opts.timeoutMs, fetch: opts.fetch });
    this.clock = opts.clock ?? systemClock;
    this.pollIntervalMs = opts.pollIntervalMs ?? 1_000;
  }

  async submit(intent: OrderIntent, signal?: AbortSignal): Promise<SubmitResult> {
    // needed for realized PnL: the venue reports fills, not closed-trade profit
    const before = intent.side === "sell" ? await this.getPosition(intent.symbol, signal) : null;

    const res = await this.http.request("POST", "/v2/orders", {
      signal,
      body: {
        symbol: intent.symbol,
        qty: String(intent.qty),
        side: intent.side,
        type: intent.type,
        time_in_force: intent.timeInForce,
        // the intent id makes a resubmission of the same intent a no-op on the venue
        client_order_id: intent.id,
        ...(intent.type === "limit" && intent.limitPrice !== undefined ? { limit_price: intent.limitPrice.toFixed(2) } : {}),
        ...(intent.extendedHours ? { extended_hours: true } : {}),
      },
    });

    let order: AlpacaOrder;
    if (res.status < 300) {
      order = AlpacaOrder.parse(res.body);
    } else if (res.status === 422 && describeBody(res.body).includes("client_order_id")) {
      order = await this.orderByClientId(intent.id, signal);
    } else {
      return { status: "rejected", reason: `http_${res.status}`, message: describeBody(res.body) };
    }

    const deadline = this.clock.now().getTime() + this.opts.timeoutMs;
    while (order.status !== "filled") {
      if (DEAD.has(order.status)) {
        return { status: "rejected", reason: `order_${order.status}`, message: `order ${order.id} ended ${order.status}` };
      }
      if (this.clock.now().getTime() >= deadline) {
        throw new BrokerTimeoutError(`order ${order.id} still ${order.status} after ${this.opts.timeoutMs}ms`);
      }
      await this.clock.sleep(this.pollIntervalMs);
      if (signal?.aborted) {
        throw new BrokerTimeoutError(`order ${order.id} still ${order.status} when the caller stopped waiting`);
      }
      order = await this.getOrder(order.id, signal);
    }

    const qty = order.filled_qty ?? intent.qty;
    const price = order.filled_avg_price ?? intent.refPrice;
    const fill: Fill = {
      orderId: order.id,
      intentId: intent.id,
      agentId: intent.agentId,
      symbol: intent.symbol,
      side: intent.side,
      qty,
      price,
      ts: order.filled_at ?? this.clock.now().toISOString(),
      realizedPnl: before ? (price - before.avgPrice) * qty : 0,
      broker: this.name,
    };
    this.opts.log?.info({ orderId: order.id, symbol: fill.symbol, qty, price }, "alpaca order filled");
    return { status: "filled", fill };
  }

  async getPosition(symbol: string, signal?: AbortSignal): Promise<Position> {
    const res = await this.http.request("GET", `/v2/positions/${encodeURIComponent(symbol)}`, { signal });
    if (res.status === 404) return { symbol, qty: 0, avgPrice: 0 };
    this.expectOk(res.status, res.body, "position");
    const p = AlpacaPosition.parse(res.body);
    const qty = p.side === "short" ? -Math.abs(p.qty) : p.qty;
    return { symbol, qty, avgPrice: p.avg_entry_price };
  }

  async getEquity(): Promise<EquitySnapshot> {
    const res = await this.http.request("GET", "/v2/account");
    this.expectOk(res.status, res.body, "account");
    const a = AlpacaAccount.parse(res.body);
    return {
      cash: a.cash,
      positionsValue: a.equity - a.cash,
      equity: a.equity,
      lastEquity: a.last_equity,
      ts: this.clock.now().toISOString(),
    };
  }

  private async getOrder(id: string, signal?: AbortSignal): Promise<AlpacaOrder> {
    const res = await this.http.request("GET", `/v2/orders/${encodeURIComponent(id)}`, { signal });
    this.expectOk(res.status, res.body, "order");
    return AlpacaOrder.parse(res.body);
  }

  private async orderByClientId(clientOrderId: string, signal?: AbortSignal): Promise<AlpacaOrder> {
    const res = await this.http.request("GET", "/v2/orders:by_client_order_id", { query: { client_order_id: clientOrderId }, signal });
    this.expectOk(res.status, res.body, "order lookup");
    return AlpacaOrder.parse(res.body);
  }

  private expectOk(status: number, body: unknown, what: string): void {
    if (status >= 300) throw new BrokerTransientError(`alpaca ${what} ${status}: ${describeBody(body)}`);
  }
}
