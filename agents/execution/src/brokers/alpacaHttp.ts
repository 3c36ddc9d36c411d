import { BrokerFatalError, BrokerTimeoutError, BrokerTransientError, errorMessage } from "@league/core";

export interface AlpacaCredentials {
  keyId: string;
  secretKey: string;
}

export interface AlpacaHttpOptions {
  baseUrl: string;
  credentials: AlpacaCredentials;
  timeoutMs: number;
  fetch?: typeof fetch;
}

export interface AlpacaResponse {
  status: number;
  body: unknown;
}

const RETRYABLE = new Set([408, 429]);

/**
 * Authenticated JSON request against an Alpaca REST host.
 *
 * Account-level failures (401/403) throw BrokerFatalError; rate limits,
 * 5xx and network errors throw BrokerTransientError; an aborted request
 * throws BrokerTimeoutError, as does one the caller aborts through
 * `signal`. Every other status is returned to the caller.
 * Error text is cut to 200 chars and never includes the keys.
 */
export class AlpacaHttp {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: AlpacaHttpOptions) {
    this.fetchImpl = opts.fetch ?? fetch;
  }

  async request(
    method: "GET" | "POST" | "DELETE",
    path: string,
    init: { body?: unknown; query?: Record<string, string>; signal?: AbortSignal } = {}
  ): Promise<AlpacaResponse> {
    const url = new URL(path, this.opts.baseUrl);
    for (const [k, v] of Object.entries(init.query ?? {})) {
      if (v !== "") url.searchParams.set(k, v);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.opts.timeoutMs);
    const outer = init.signal;
    const forward = () => controller.abort();
    if (outer?.aborted) controller.abort();
    else outer?.addEventListener("abort", forward, { once: true });
    let status: number;
    let text: string;
    try {
      const res = await this.fetchImpl(url.toString(), {
        method,
        headers: {
          "APCA-API-KEY-ID": this.opts.credentials.keyId,
          "APCA-API-SECRET-KEY": this.opts.credentials.secretKey,
          "Accept": "application/json",
          ...(init.body === undefined ? {} : { "Content-Type": "application/json" }),
        },
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
        signal: controller.signal,
      });
      status = res.status;
      text = await res.text();
    } catch (err) {
      if (controller.signal.aborted) {
        const why = outer?.aborted ? "was abandoned by the caller" : `timed out after ${this.opts.timeoutMs}ms`;
        throw new BrokerTimeoutError(`alpaca ${method} ${url.pathname} ${why}`, { cause: err });
      }
      throw new BrokerTransientError(`alpaca ${method} ${url.pathname} failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener("abort", forward);
    }

    const preview = text.slice(0, 200);
    if (status === 401 || status === 403) {
      throw new BrokerFatalError(`alpaca ${status}: ${preview}`);
    }
    if (RETRYABLE.has(status) || status >= 500) {
      throw new BrokerTransientError(`alpaca ${status}: ${preview}`);
    }
    return { status, body: parseBody(text) };
  }
}

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export function describeBody(body: unknown): string {
  if (body && typeof body === "object" && "message" in body && typeof body.message === "string") return body.message;
  return typeof body === "string" ? body.slice(0, 200) : JSON.stringify(body ?? null).slice(0, 200);
}
