import { RSI } from "technicalindicators";
import { z } from "zod";
import type { Signal } from "@league/schemas";
import type { IStrategy } from "@league/interfaces";

export const RsiParams = z.object({
  rsiLen: z.number().int().min(2).default(14),
  oversold: z.number().min(0).max(100).default(30),
  overbought: z.number().min(0).max(100).default(70),
}).refine((p) => p.oversold < p.overbought, { message: "oversold must be below overbought", path: ["overbought"] });
export type RsiParams = z.infer<typeof RsiParams>;

/**
 * Long-only mean reversion. The stance turns LONG once RSI reaches the
 * oversold level and returns to FLAT once it reaches overbought; in between it
 * keeps whatever the window last implied. Replaying from the start of the
 * window keeps the result a function of the prices alone.
 */
export class RsiMeanReversion implements IStrategy {
  readonly name = "rsi_mean_rev";
  readonly minBars: number;

  constructor(readonly params: RsiParams) {
    this.minBars = params.rsiLen + 1;
  }

  signal(prices: readonly number[]): Signal {
    if (prices.length < this.minBars) return "FLAT";
    const values = RSI.calculate({ values: [...prices], period: this.params.rsiLen });
    let stance: Signal = "FLAT";
    for (const rsi of values) {
      if (rsi <= this.params.oversold) stance = "LONG";
      else if (rsi >= this.params.overbought) stance = "FLAT";
    }
    return stance;
  }
}

export class AlwaysFlat implements IStrategy {
  readonly name = "always_flat";
  readonly minBars = 1;

  signal(): Signal {
    return "FLAT";
  }
}
