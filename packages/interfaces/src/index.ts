export type { IBroker, SubmitResult } from './IBroker';
export type { IMarketData } from './IMarketData';
export type { IStrategy } from './IStrategy';
export type { ILedger } from './ILedger';
