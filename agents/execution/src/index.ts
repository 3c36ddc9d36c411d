export { LiveStepExecutor } from "./LiveStepExecutor";
export type { LiveStepDeps, RunContext, StepResult } from "./LiveStepExecutor";
export { SimBroker } from "./brokers/SimBroker";
export type { SimBrokerOptions } from "./brokers/SimBroker";
export { AlpacaBroker } from "./brokers/AlpacaBroker";
export type { AlpacaBrokerOptions } from "./brokers/AlpacaBroker";
export { AlpacaHttp } from "./brokers/alpacaHttp";
export type { AlpacaCredentials } from "./brokers/alpacaHttp";
export { AlpacaMarketData } from "./marketdata/AlpacaMarketData";
export { ReplayMarketData } from "./marketdata/ReplayMarketData";
export { ALPACA_DATA_URL, ALPACA_LIVE_URL, ALPACA_PAPER_URL, alpacaCredentials, alpacaUrls, createVenue } from "./factory";
export type { CreateVenueOptions, TradingVenue, VenueEnv } from "./factory";
