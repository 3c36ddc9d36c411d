import { z } from "zod";
import { BrokerTransientError } from "@league/core";
import type { IMarketData } from "@league/interfaces";
import { AlpacaHttp, describeBody, type AlpacaCredentials } from "../brokers/alpacaHttp";

const Bars = z.object({
  bars: z.array(z.object({ t: z.string(), c: z.number() })).nullable(),
});

const LatestTrade = z.object({
  trade: z.object({ p: z.number(), t: z.string().optional() }),
});

export interface AlpacaMarketDataOptions {
  dataUrl: string;
  credentials: AlpacaCredentials;
  timeoutMs: number;
  /** Data feed (iex, sip); the account default when omitted. */
  feed?: string;
  timeframe?: string;
  fetch?: typeof fetch;
}

export class AlpacaMarketData implements IMarketData {
  private readonly http: AlpacaHttp;

  constructor(private readonly opts: AlpacaMarketDataOptions) {
    this.http = new AlpacaHttp({ baseUrl: opts.dataUrl, credentials: opts.credentials, timeoutMs: opts.timeoutMs, fetch: opts.fetch });
  }

  async latestBars(symbol: string, count: number): Promise<number[]> {
    const res = await this.http.request("GET", `/v2/stocks/${encodeURIComponent(symbol)}/bars`, {
      query: {
        timeframe: this.opts.timeframe ?? "1Min",
        limit: String(count),
        sort: "desc",
        feed: this.opts.feed ?? "",
      },
    });
    if (res.status >= 300) throw new BrokerTransientError(`alpaca bars ${res.status}: ${describeBody(res.body)}`);
    const bars = Bars.parse(res.body).bars ?? [];
    if (bars.length === 0) throw new BrokerTransientError(`no bars returned for ${symbol}`);
    // requested newest first so `limit` keeps the most recent ones
    return bars.map((b) => b.c).reverse();
  }

  async lastPrice(symbol: string): Promise<number> {
    const res = await this.http.request("GET", `/v2/stocks/${encodeURIComponent(symbol)}/trades/latest`, {
      query: { feed: this.opts.feed ?? "" },
    });
    if (res.status >= 300) throw new BrokerTransientError(`alpaca latest trade ${res.status}: ${describeBody(res.body)}`);
    return LatestTrade.parse(res.body).trade.p;
  }
}
