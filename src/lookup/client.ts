import axios, { AxiosInstance, AxiosResponse } from "axios";
import Bottleneck from "bottleneck";
import {
  LookupFailure,
  NetworkError,
  TimeoutError,
  UnknownTradeError,
  UpstreamError,
  describeError
} from "../errors";
import { QueryFields } from "../types";
import { log } from "../utils/logger";
import { createLimiter } from "../utils/rateLimit";
import { TradeRegistry } from "./index";
import { LookupRequest, RawResponse } from "./types";

export interface LookupClient {
  lookup(trade: string, query: QueryFields): Promise<RawResponse>;
}

export interface HttpLookupClientOptions {
  registry: TradeRegistry;
  timeoutMs?: number;
  limiter?: Bottleneck;
  http?: AxiosInstance;
}

const HEADERS = {
  "User-Agent": "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36",
  Accept: "text/html,application/xhtml+xml",
  "Content-Type": "application/x-www-form-urlencoded"
};

const SNIPPET_LENGTH = 500;

/**
 * One form POST per call, no retries. Every failure comes back as a typed
 * LookupFailure so the caller can tell "never sent" from "sent and failed".
 */
export class HttpLookupClient implements LookupClient {
  private readonly registry: TradeRegistry;
  private readonly timeoutMs: number;
  private readonly limiter: Bottleneck;
  private readonly http: AxiosInstance;

  constructor(options: HttpLookupClientOptions) {
    this.registry = options.registry;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.limiter = options.limiter ?? createLimiter(0);
    this.http = options.http ?? axios.create();
  }

  async lookup(trade: string, query: QueryFields): Promise<RawResponse> {
    const definition = this.registry.get(trade);
    if (!definition) {
      throw new UnknownTradeError(trade);
    }
    const request = definition.buildRequest(query);

    log({ stage: "lookup_request", trade, url: request.url, variant: request.variant });
    const response = await this.limiter.schedule(() => this.post(request));

    const body = response.data;
    if (response.status < 200 || response.status >= 300) {
      throw new UpstreamError(
        `Lookup returned HTTP ${response.status}`,
        response.status,
        typeof body === "string" ? body.slice(0, SNIPPET_LENGTH) : null
      );
    }
    if (typeof body !== "string") {
      throw new UpstreamError("Lookup returned a non-text body", response.status);
    }

    log({ stage: "lookup_response", trade, status: response.status, bytes: body.length });
    return {
      trade: definition.trade,
      variant: request.variant,
      url: request.url,
      form: request.form,
      status: response.status,
      body,
      receivedAt: new Date().toISOString()
    };
  }

  private async post(request: LookupRequest): Promise<AxiosResponse<unknown>> {
    try {
      return await this.http.post<unknown>(
        request.url,
        new URLSearchParams(request.form).toString(),
        {
          headers: HEADERS,
          timeout: this.timeoutMs,
          responseType: "text",
          validateStatus: () => true
        }
      );
    } catch (err) {
      const failure = this.toFailure(err);
      log({ stage: "lookup_failed", level: "warn", url: request.url, kind: failure.kind, error: failure.message });
      throw failure;
    }
  }

  private toFailure(err: unknown): LookupFailure {
    if (axios.isAxiosError(err)) {
      if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") {
        return new TimeoutError(this.timeoutMs);
      }
      return new NetworkError(`${err.code ?? "ERR_NETWORK"}: ${err.message}`);
    }
    return new NetworkError(describeError(err));
  }
}
