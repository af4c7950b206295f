import { describe, it, expect, beforeEach } from 'vitest';
import { BybitAdapter } from '../venues/bybit.adapter.js';
import { NoTickerDataError, UpstreamSemanticError } from '../snapshot.errors.js';
import { fakeUpstream, FakeUpstream, mockLogger } from './fakeUpstream.js';

const TICKERS = '/v5/market/tickers';
const FUNDING_HISTORY = '/v5/market/funding/history';
const OPEN_INTEREST = '/v5/market/open-interest';

function bybitOk(list: unknown[]) {
  return { body: { retCode: 0, retMsg: 'OK', result: { category: 'linear', list }, time: 1700000000000 } };
}

describe('BybitAdapter', () => {
  let upstream: FakeUpstream;
  let logger: ReturnType<typeof mockLogger>;
  let adapter: BybitAdapter;

  beforeEach(() => {
    upstream = fakeUpstream({
      [TICKERS]: bybitOk([
        { symbol: 'BTCUSDT', lastPrice: '65000', prevPrice24h: '60000', turnover24h: '350000000.5' },
      ]),
      [FUNDING_HISTORY]: bybitOk([{ symbol: 'BTCUSDT', fundingRate: '-0.00005', fundingRateTimestamp: '1699999200000' }]),
      [OPEN_INTEREST]: bybitOk([{ openInterest: '45000.5', timestamp: '1700000000000' }]),
    });
    logger = mockLogger();
    adapter = new BybitAdapter({ client: upstream.client, logger });
  });

  it('collects ticker, funding and open interest', async () => {
    const readings = await adapter.fetch('BTCUSDT');

    expect(readings).toEqual({
      lastPrice: 65000,
      open24h: 60000,
      quoteVolume24h: 350000000.5,
      fundingRate: -0.00005,
      openInterest: 45000.5,
      openInterestUnit: 'contracts',
      exchangeTimestamp: 1700000000000,
    });
  });

  it('queries the linear category', async () => {
    await adapter.fetch('BTCUSDT');

    expect(upstream.calls.find(call => call.path === TICKERS)?.params).toEqual({
      category: 'linear',
      symbol: 'BTCUSDT',
    });
    expect(upstream.calls.find(call => call.path === FUNDING_HISTORY)?.params).toEqual({
      category: 'linear',
      symbol: 'BTCUSDT',
      limit: 1,
    });
    expect(upstream.calls.find(call => call.path === OPEN_INTEREST)?.params).toEqual({
      category: 'linear',
      symbol: 'BTCUSDT',
      intervalTime: '5min',
      limit: 1,
    });
  });

  it('raises a semantic error on a non-zero retCode', async () => {
    upstream.routes[TICKERS] = { body: { retCode: 10001, retMsg: 'params error: symbol invalid', result: {} } };

    await expect(adapter.fetch('FOOUSDT')).rejects.toThrow(UpstreamSemanticError);
    await expect(adapter.fetch('FOOUSDT')).rejects.toThrow('Bybit retCode error on /v5/market/tickers');
  });

  it('raises NoTickerDataError on an empty list', async () => {
    upstream.routes[TICKERS] = bybitOk([]);

    await expect(adapter.fetch('BTCUSDT')).rejects.toThrow('No ticker data for BTCUSDT');
    await expect(adapter.fetch('BTCUSDT')).rejects.toThrow(NoTickerDataError);
  });

  it('soft-fails a funding error envelope', async () => {
    upstream.routes[FUNDING_HISTORY] = { body: { retCode: 10006, retMsg: 'Too many visits!' } };

    const readings = await adapter.fetch('BTCUSDT');
    expect(readings.fundingRate).toBeNull();
    expect(readings.openInterest).toBe(45000.5);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ venue: 'bybit', call: 'funding' }),
      'Bybit funding unavailable, leaving field empty',
    );
  });
});
