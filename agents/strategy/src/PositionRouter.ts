import { v4 as uuidv4 } from "uuid";
import type { OrderIntent, Signal } from "@league/schemas";

export interface RouterSizing {
  /** Fraction of equity a LONG stance should hold. */
  sizePct: number;
  /** Minimum tradable unit; deltas smaller than this produce no intent. */
  lotSize: number;
  /** Live position cap, applied to the target before the delta. */
  maxPositionPct: number;
}

export interface RouteInput {
  agentId: string;
  symbol: string;
  signal: Signal;
  positionQty: number;
  equity: number;
  price: number;
  /** Force the target to zero regardless of signal. */
  flatten?: boolean;
  now?: Date;
}

export function targetQty(signal: Signal, equity: number, price: number, sizing: RouterSizing): number {
  // long-only: SHORT has no sizing rules, so it routes to flat
  if (signal !== "LONG" || equity <= 0 || price <= 0) return 0;
  const fraction = Math.min(sizing.sizePct, sizing.maxPositionPct);
  const raw = (fraction * equity) / price;
  return Math.floor(raw / sizing.lotSize) * sizing.lotSize;
}

export class PositionRouter {
  constructor(private readonly sizing: RouterSizing) {}

  /** At most one intent per symbol per call. */
  route(input: RouteInput): OrderIntent[] {
    const target = input.flatten ? 0 : targetQty(input.signal, input.equity, input.price, this.sizing);
    const delta = target - input.positionQty;
    if (Math.abs(delta) < this.sizing.lotSize) return [];

    const intent: OrderIntent = Object.freeze({
      id: uuidv4(),
      agentId: input.agentId,
      symbol: input.symbol,
      side: delta > 0 ? "buy" : "sell",
      qty: Math.abs(delta),
      refPrice: input.price,
      type: "market",
      timeInForce: "day",
      extendedHours: false,
      createdAt: (input.now ?? new Date()).toISOString(),
    });
    return [intent];
  }
}
