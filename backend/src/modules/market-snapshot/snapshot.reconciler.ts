/**
 * Snapshot Reconciler
 * ===================
 *
 * RawVenueReadings → MarketSnapshot. Pure: no I/O, the clock comes in as `now`.
 *
 * Labels are null exactly when their numeric input is null.
 */

import {
  LiquidityCondition,
  MarketSnapshot,
  QUOTE_CURRENCY,
  RawVenueReadings,
  Venue,
  VolatilityRegime,
} from './snapshot.types.js';

// ═══════════════════════════════════════════════════════════════
// THRESHOLDS
// ═══════════════════════════════════════════════════════════════

const VOLATILITY_LOW_BELOW_PCT = 2;
const VOLATILITY_MEDIUM_BELOW_PCT = 5;

const LIQUIDITY_THIN_BELOW = 50_000_000;
const LIQUIDITY_NORMAL_BELOW = 300_000_000;

// ═══════════════════════════════════════════════════════════════
// DERIVED FIELDS
// ═══════════════════════════════════════════════════════════════

export function priceChangePct(last: number | null, open24h: number | null): number | null {
  if (last === null || open24h === null || open24h === 0) return null;
  return ((last - open24h) / open24h) * 100;
}

export function volatilityRegimeFromChange(changePct: number | null): VolatilityRegime | null {
  if (changePct === null) return null;
  const magnitude = Math.abs(changePct);
  if (magnitude < VOLATILITY_LOW_BELOW_PCT) return 'low';
  if (magnitude < VOLATILITY_MEDIUM_BELOW_PCT) return 'medium';
  return 'high';
}

/**
 * Heuristic over traded quote notional. Not order book depth.
 */
export function liquidityConditionFromQuoteVolume(quoteVolume: number | null): LiquidityCondition | null {
  if (quoteVolume === null) return null;
  if (quoteVolume <= 0) return 'thin';
  if (quoteVolume < LIQUIDITY_THIN_BELOW) return 'thin';
  if (quoteVolume < LIQUIDITY_NORMAL_BELOW) return 'normal';
  return 'crowded';
}

// ═══════════════════════════════════════════════════════════════
// TIMESTAMPS
// ═══════════════════════════════════════════════════════════════

const INTEGER_STRING = /^-?\d+$/;

/** ISO-8601 UTC with second precision: 2024-01-02T03:04:05Z */
export function toIsoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Venue epoch milliseconds → ISO string, null when absent or unparsable.
 */
export function epochMsToIso(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) return null;

  let ms: number;
  if (typeof value === 'number') {
    if (!Number.isInteger(value)) return null;
    ms = value;
  } else {
    const trimmed = value.trim();
    if (!INTEGER_STRING.test(trimmed)) return null;
    ms = Number(trimmed);
  }

  const date = new Date(ms);
  if (Number.isNaN(date.getTime())) return null;
  return toIsoSeconds(date);
}

// ═══════════════════════════════════════════════════════════════
// RECONCILE
// ═══════════════════════════════════════════════════════════════

export interface ReconcileInput {
  symbol: string;
  exchange: string;
  source: Venue;
  instrumentId: string;
  readings: RawVenueReadings;
}

export function reconcile(input: ReconcileInput, now: Date = new Date()): MarketSnapshot {
  const { readings } = input;

  const priceChange24h = priceChangePct(readings.lastPrice, readings.open24h);
  const openInterestUnit = readings.openInterest === null ? null : readings.openInterestUnit;

  return {
    symbol: input.symbol,
    exchange: input.exchange,
    source: input.source,
    instrument_id: input.instrumentId,

    price: readings.lastPrice,
    price_quote: QUOTE_CURRENCY,
    price_change_24h: priceChange24h,

    volume_24h: readings.quoteVolume24h,
    volume_24h_unit: 'quote_notional',

    funding_rate: readings.fundingRate,
    open_interest: readings.openInterest,
    open_interest_unit: openInterestUnit,

    oi_change: null,
    long_short_ratio: null,

    volatility_regime: volatilityRegimeFromChange(priceChange24h),
    liquidity_condition: liquidityConditionFromQuoteVolume(readings.quoteVolume24h),

    timestamp_exchange: epochMsToIso(readings.exchangeTimestamp),
    timestamp: toIsoSeconds(now),
  };
}
