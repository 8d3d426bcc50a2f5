import { LicenseRecord, QueryFields, Trade } from "../types";

export type ResponseVariant = "detail" | "search";

export interface LookupRequest {
  url: string;
  form: Record<string, string>;
  variant: ResponseVariant;
}

export interface RawResponse {
  trade: Trade;
  variant: ResponseVariant;
  url: string;
  form: Record<string, string>;
  status: number;
  body: string;
  receivedAt: string;
}

/**
 * Everything trade-specific about a lookup. The orchestrator and classifier
 * only ever see this interface.
 */
export interface TradeDefinition {
  trade: Trade;
  source: string;
  specialties: string[];
  buildRequest(query: QueryFields): LookupRequest;
  parse(raw: RawResponse): IterableIterator<LicenseRecord>;
}
