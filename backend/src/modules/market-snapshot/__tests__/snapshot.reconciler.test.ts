import { describe, it, expect } from 'vitest';
import {
  epochMsToIso,
  liquidityConditionFromQuoteVolume,
  priceChangePct,
  reconcile,
  ReconcileInput,
  toIsoSeconds,
  volatilityRegimeFromChange,
} from '../snapshot.reconciler.js';
import { EMPTY_READINGS } from '../snapshot.types.js';

const NOW = new Date('2024-05-01T12:00:00.456Z');

function input(readings: Partial<ReconcileInput['readings']>): ReconcileInput {
  return {
    symbol: 'BTCUSDT',
    exchange: 'okx',
    source: 'okx',
    instrumentId: 'BTC-USDT-SWAP',
    readings: { ...EMPTY_READINGS, ...readings },
  };
}

describe('priceChangePct', () => {
  it('computes percent change against the 24h open', () => {
    expect(priceChangePct(65000, 64000)).toBe(1.5625);
    expect(priceChangePct(105, 100)).toBe(5);
    expect(priceChangePct(90, 100)).toBe(-10);
  });

  it('is null without a usable open', () => {
    expect(priceChangePct(100, 0)).toBeNull();
    expect(priceChangePct(100, null)).toBeNull();
    expect(priceChangePct(null, 100)).toBeNull();
  });
});

describe('volatilityRegimeFromChange', () => {
  it('buckets on absolute change', () => {
    expect(volatilityRegimeFromChange(1.99)).toBe('low');
    expect(volatilityRegimeFromChange(-1.5)).toBe('low');
    expect(volatilityRegimeFromChange(2)).toBe('medium');
    expect(volatilityRegimeFromChange(-4.99)).toBe('medium');
    expect(volatilityRegimeFromChange(5)).toBe('high');
    expect(volatilityRegimeFromChange(-12)).toBe('high');
  });

  it('is null when the change is unknown', () => {
    expect(volatilityRegimeFromChange(null)).toBeNull();
  });
});

describe('liquidityConditionFromQuoteVolume', () => {
  it('buckets on quote notional', () => {
    expect(liquidityConditionFromQuoteVolume(0)).toBe('thin');
    expect(liquidityConditionFromQuoteVolume(-5)).toBe('thin');
    expect(liquidityConditionFromQuoteVolume(49_999_999)).toBe('thin');
    expect(liquidityConditionFromQuoteVolume(50_000_000)).toBe('normal');
    expect(liquidityConditionFromQuoteVolume(299_999_999.99)).toBe('normal');
    expect(liquidityConditionFromQuoteVolume(300_000_000)).toBe('crowded');
  });

  it('is null when volume is unknown', () => {
    expect(liquidityConditionFromQuoteVolume(null)).toBeNull();
  });
});

describe('timestamps', () => {
  it('drops milliseconds', () => {
    expect(toIsoSeconds(NOW)).toBe('2024-05-01T12:00:00Z');
  });

  it('converts venue epoch milliseconds', () => {
    expect(epochMsToIso('1700000000000')).toBe('2023-11-14T22:13:20Z');
    expect(epochMsToIso(' 1700000000999 ')).toBe('2023-11-14T22:13:20Z');
    expect(epochMsToIso(1700000000000)).toBe('2023-11-14T22:13:20Z');
  });

  it('is null for absent or unparsable values', () => {
    expect(epochMsToIso(null)).toBeNull();
    expect(epochMsToIso(undefined)).toBeNull();
    expect(epochMsToIso('')).toBeNull();
    expect(epochMsToIso('soon')).toBeNull();
    expect(epochMsToIso('1.7e12')).toBeNull();
    expect(epochMsToIso(1700000000000.5)).toBeNull();
    expect(epochMsToIso('99999999999999999999')).toBeNull();
  });
});

describe('reconcile', () => {
  it('builds the canonical snapshot', () => {
    const snapshot = reconcile(
      input({
        lastPrice: 65000,
        open24h: 64000,
        quoteVolume24h: 120_000_000,
        fundingRate: 0.0001,
        openInterest: 320_000_000,
        openInterestUnit: 'USD',
        exchangeTimestamp: '1700000000000',
      }),
      NOW,
    );

    expect(snapshot).toEqual({
      symbol: 'BTCUSDT',
      exchange: 'okx',
      source: 'okx',
      instrument_id: 'BTC-USDT-SWAP',
      price: 65000,
      price_quote: 'USDT',
      price_change_24h: 1.5625,
      volume_24h: 120_000_000,
      volume_24h_unit: 'quote_notional',
      funding_rate: 0.0001,
      open_interest: 320_000_000,
      open_interest_unit: 'USD',
      oi_change: null,
      long_short_ratio: null,
      volatility_regime: 'low',
      liquidity_condition: 'normal',
      timestamp_exchange: '2023-11-14T22:13:20Z',
      timestamp: '2024-05-01T12:00:00Z',
    });
  });

  it('classifies a 5% move as high', () => {
    const snapshot = reconcile(input({ lastPrice: 105, open24h: 100 }), NOW);
    expect(snapshot.price_change_24h).toBe(5);
    expect(snapshot.volatility_regime).toBe('high');
  });

  it('leaves labels null when their inputs are missing', () => {
    const snapshot = reconcile(input({ lastPrice: 65000, open24h: 0 }), NOW);

    expect(snapshot.price).toBe(65000);
    expect(snapshot.price_change_24h).toBeNull();
    expect(snapshot.volatility_regime).toBeNull();
    expect(snapshot.volume_24h).toBeNull();
    expect(snapshot.liquidity_condition).toBeNull();
    expect(snapshot.timestamp_exchange).toBeNull();
  });

  it('drops the open interest unit when there is no open interest', () => {
    const snapshot = reconcile(input({ openInterest: null, openInterestUnit: 'contracts' }), NOW);
    expect(snapshot.open_interest).toBeNull();
    expect(snapshot.open_interest_unit).toBeNull();
  });

  it('echoes the caller exchange label and the resolved source', () => {
    const snapshot = reconcile({ ...input({}), exchange: 'OKEX' }, NOW);
    expect(snapshot.exchange).toBe('OKEX');
    expect(snapshot.source).toBe('okx');
  });
});
