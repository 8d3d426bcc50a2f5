import { createDporTrade } from "./va_dpor";
import { TradeDefinition } from "./types";

export type TradeRegistry = ReadonlyMap<string, TradeDefinition>;

export interface TradeRegistryOptions {
  dporBaseUrl: string;
}

/**
 * Trade registry: maps each trade to its lookup form and parser.
 * New trades are added here; nothing downstream branches on trade.
 */
export function createTradeRegistry(options: TradeRegistryOptions): TradeRegistry {
  const definitions: TradeDefinition[] = [
    createDporTrade("painter", ["Painting and Wallcovering"], options.dporBaseUrl),
    createDporTrade("roofer", ["Roofing"], options.dporBaseUrl)
  ];
  return new Map(definitions.map((definition) => [definition.trade, definition]));
}

export * from "./types";
