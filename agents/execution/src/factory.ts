import { ConfigurationError, systemClock, type Clock, type Logger } from "@league/core";
import type { BrokerConfig, Venue } from "@league/schemas";
import type { IBroker, IMarketData } from "@league/interfaces";
import { AlpacaBroker } from "./brokers/AlpacaBroker";
import { SimBroker } from "./brokers/SimBroker";
import type { AlpacaCredentials } from "./brokers/alpacaHttp";
import { AlpacaMarketData } from "./marketdata/AlpacaMarketData";
import { ReplayMarketData } from "./marketdata/ReplayMarketData";

export const ALPACA_PAPER_URL = "https://paper-api.alpaca.markets";
export const ALPACA_LIVE_URL = "https://api.alpaca.markets";
export const ALPACA_DATA_URL = "https://data.alpaca.markets";

/** Price used for every symbol of a simulated run without configured series. */
const DEFAULT_SIM_PRICE = 100;

export type VenueEnv = Record<string, string | undefined>;

export interface TradingVenue {
  broker: IBroker;
  marketData: IMarketData;
}

export interface CreateVenueOptions {
  env?: VenueEnv;
  fetch?: typeof fetch;
  clock?: Clock;
  log?: Logger;
}

/** Trading and data hosts: explicit config first, then ALPACA_BASE_URL / ALPACA_DATA_URL, then the venue default. */
export function alpacaUrls(venue: Exclude<Venue, "sim">, broker: Pick<BrokerConfig, "baseUrl" | "dataUrl">, env: VenueEnv = {}): { tradingUrl: string; dataUrl: string } {
  return {
    tradingUrl: broker.baseUrl ?? env.ALPACA_BASE_URL ?? (venue === "real" ? ALPACA_LIVE_URL : ALPACA_PAPER_URL),
    dataUrl: broker.dataUrl ?? env.ALPACA_DATA_URL ?? ALPACA_DATA_URL,
  };
}

export function alpacaCredentials(env: VenueEnv): AlpacaCredentials {
  const keyId = env.ALPACA_API_KEY_ID;
  const secretKey = env.ALPACA_API_SECRET_KEY;
  const missing = [
    ...(keyId ? [] : ["ALPACA_API_KEY_ID"]),
    ...(secretKey ? [] : ["ALPACA_API_SECRET_KEY"]),
  ];
  if (!keyId || !secretKey) {
    throw new ConfigurationError(`missing venue credentials: ${missing.join(", ")}`, missing.map((m) => `env.${m}: required`));
  }
  return { keyId, secretKey };
}

export function createVenue(broker: BrokerConfig, symbols: readonly string[], opts: CreateVenueOptions = {}): TradingVenue {
  const clock = opts.clock ?? systemClock;

  if (broker.venue === "sim") {
    const series: Record<string, number[]> = {};
    for (const s of symbols) {
      const configured = broker.prices?.[s];
      if (broker.prices && !configured) {
        throw new ConfigurationError(`no replay prices for ${s}`, [`broker.prices.${s}: required`]);
      }
      series[s] = configured ?? [DEFAULT_SIM_PRICE];
    }
    const marketData = new ReplayMarketData(series);
    return {
      marketData,
      broker: new SimBroker({ cash: broker.cash, slippageBps: broker.slippageBps, commission: broker.commission, marketData, clock }),
    };
  }

  const env = opts.env ?? process.env;
  const credentials = alpacaCredentials(env);
  const { tradingUrl, dataUrl } = alpacaUrls(broker.venue, broker, env);
  return {
    broker: new AlpacaBroker({
      venue: broker.venue,
      baseUrl: tradingUrl,
      credentials,
      timeoutMs: broker.submitTimeoutMs,
      fetch: opts.fetch,
      clock,
      log: opts.log,
    }),
    marketData: new AlpacaMarketData({
      dataUrl,
      credentials,
      timeoutMs: broker.submitTimeoutMs,
      feed: env.ALPACA_FEED,
      fetch: opts.fetch,
    }),
  };
}
