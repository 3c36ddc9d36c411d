import { ConfigurationError } from "@league/core";
import type { StrategyConfig } from "@league/schemas";
import type { IStrategy } from "@league/interfaces";
import { AlwaysFlat, RsiMeanReversion, RsiParams } from "./RsiMeanReversion";

type Factory = (params: Record<string, number>) => IStrategy;

const factories: Record<string, Factory> = {
  rsi_mean_rev: (params) => {
    const parsed = RsiParams.safeParse(params);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `strategy.params.${i.path.join(".")}: ${i.message}`);
      throw new ConfigurationError("invalid rsi_mean_rev parameters", issues);
    }
    return new RsiMeanReversion(parsed.data);
  },
  always_flat: () => new AlwaysFlat(),
};

export function strategyNames(): string[] {
  return Object.keys(factories);
}

export function createStrategy(config: StrategyConfig): IStrategy {
  const factory = factories[config.name];
  if (!factory) {
    throw new ConfigurationError(`unknown strategy "${config.name}"`, [`strategy.name: expected one of ${strategyNames().join(", ")}`]);
  }
  return factory(config.params);
}
