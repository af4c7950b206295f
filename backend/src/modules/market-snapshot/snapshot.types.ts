/**
 * Market Snapshot Types
 * =====================
 *
 * Venue-agnostic contracts shared by the normalizer, adapters,
 * reconciler, cache and service.
 */

// ═══════════════════════════════════════════════════════════════
// VENUES & INSTRUMENTS
// ═══════════════════════════════════════════════════════════════

export const VENUES = ['okx', 'binance', 'bybit'] as const;

export type Venue = (typeof VENUES)[number];

export const QUOTE_CURRENCY = 'USDT';

export interface InstrumentRef {
  readonly rawSymbol: string;
  readonly symbol: string;        // BTCUSDT
  readonly venue: Venue;
  readonly instrumentId: string;  // BTC-USDT-SWAP on OKX, BTCUSDT elsewhere
}

// ═══════════════════════════════════════════════════════════════
// RAW READINGS (adapter output)
// ═══════════════════════════════════════════════════════════════

export type OpenInterestUnit = 'USD' | 'contracts';

export interface RawVenueReadings {
  lastPrice: number | null;
  open24h: number | null;
  quoteVolume24h: number | null;
  fundingRate: number | null;
  openInterest: number | null;
  openInterestUnit: OpenInterestUnit | null;
  /** Venue epoch milliseconds, as the venue sent it */
  exchangeTimestamp: string | number | null;
}

export const EMPTY_READINGS: Readonly<RawVenueReadings> = Object.freeze({
  lastPrice: null,
  open24h: null,
  quoteVolume24h: null,
  fundingRate: null,
  openInterest: null,
  openInterestUnit: null,
  exchangeTimestamp: null,
});

// ═══════════════════════════════════════════════════════════════
// CANONICAL SNAPSHOT
// ═══════════════════════════════════════════════════════════════

export type VolatilityRegime = 'low' | 'medium' | 'high';

export type LiquidityCondition = 'thin' | 'normal' | 'crowded';

export interface MarketSnapshot {
  // identity
  symbol: string;
  exchange: string;
  source: Venue;
  instrument_id: string;

  // pricing
  price: number | null;
  price_quote: typeof QUOTE_CURRENCY;
  price_change_24h: number | null;

  // volume
  volume_24h: number | null;
  volume_24h_unit: 'quote_notional';

  // derivatives
  funding_rate: number | null;
  open_interest: number | null;
  open_interest_unit: OpenInterestUnit | null;

  // reserved
  oi_change: null;
  long_short_ratio: null;

  // desk labels
  volatility_regime: VolatilityRegime | null;
  liquidity_condition: LiquidityCondition | null;

  // timestamps
  timestamp_exchange: string | null;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════
// REQUESTS
// ═══════════════════════════════════════════════════════════════

export interface SnapshotRequest {
  symbol: string;
  exchange?: string;
  timeframe?: string;
  signal?: AbortSignal;
}

export interface SnapshotCacheKey {
  exchange: string;
  instrumentId: string;
  timeframe: string;
}
