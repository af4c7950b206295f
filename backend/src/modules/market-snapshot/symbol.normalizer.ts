/**
 * Symbol Normalizer
 * =================
 *
 * Venue-agnostic symbol (BTCUSDT) → venue instrument id.
 *
 *   OKX      BTCUSDT → BTC-USDT-SWAP
 *   Binance  BTCUSDT → BTCUSDT
 *   Bybit    BTCUSDT → BTCUSDT
 *
 * Each venue keeps its own rule: the formats differ structurally.
 */

import { InvalidSymbolError } from './snapshot.errors.js';
import { InstrumentRef, QUOTE_CURRENCY, Venue } from './snapshot.types.js';

const ALPHANUMERIC = /^[A-Z0-9]+$/;

interface VenueSymbolRule {
  requiresQuoteSuffix: boolean;
  toInstrumentId: (symbol: string) => string;
}

const RULES: Record<Venue, VenueSymbolRule> = {
  okx: {
    requiresQuoteSuffix: true,
    toInstrumentId: symbol => `${symbol.slice(0, -QUOTE_CURRENCY.length)}-${QUOTE_CURRENCY}-SWAP`,
  },
  binance: {
    requiresQuoteSuffix: true,
    toInstrumentId: symbol => symbol,
  },
  bybit: {
    requiresQuoteSuffix: true,
    toInstrumentId: symbol => symbol,
  },
};

/**
 * Trim + uppercase, then check the shape shared by every venue.
 */
export function canonicalSymbol(rawSymbol: string): string {
  const symbol = rawSymbol.trim().toUpperCase();
  if (!symbol || !ALPHANUMERIC.test(symbol)) {
    throw new InvalidSymbolError('Invalid symbol format.');
  }
  return symbol;
}

export function normalizeSymbol(rawSymbol: string, venue: Venue): string {
  const symbol = canonicalSymbol(rawSymbol);
  const rule = RULES[venue];

  if (rule.requiresQuoteSuffix) {
    if (!symbol.endsWith(QUOTE_CURRENCY) || symbol.length === QUOTE_CURRENCY.length) {
      throw new InvalidSymbolError(`Only *${QUOTE_CURRENCY} symbols supported (e.g., BTC${QUOTE_CURRENCY}).`);
    }
  }

  return rule.toInstrumentId(symbol);
}

export function buildInstrumentRef(rawSymbol: string, venue: Venue): InstrumentRef {
  return Object.freeze({
    rawSymbol,
    symbol: canonicalSymbol(rawSymbol),
    venue,
    instrumentId: normalizeSymbol(rawSymbol, venue),
  });
}
