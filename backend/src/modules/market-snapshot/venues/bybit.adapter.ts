/**
 * Bybit Venue Adapter (USDT perpetual, category=linear)
 *
 * Envelope: { retCode: 0, retMsg: "OK", result: { list: [...] }, time }
 * API docs: https://bybit-exchange.github.io/docs/v5/intro
 */

import { z } from 'zod';
import { describePayload, NoTickerDataError, UpstreamSemanticError } from '../snapshot.errors.js';
import { BaseVenueAdapter, QueryParams } from './base.adapter.js';
import { pickNumber, pickTimestamp, VenueRow } from './venue.parse.js';
import type { FundingReadings, OpenInterestReadings, TickerReadings } from './venue.types.js';

const BybitEnvelope = z.object({
  retCode: z.union([z.number(), z.string()]).nullish(),
  retMsg: z.string().nullish(),
  result: z.object({ list: z.array(VenueRow).nullish() }).passthrough().nullish(),
  time: z.union([z.number(), z.string()]).nullish(),
});

interface BybitList {
  list: VenueRow[];
  time: string | number | null;
}

const CATEGORY = 'linear';

export class BybitAdapter extends BaseVenueAdapter {
  readonly venue = 'bybit' as const;
  readonly label = 'Bybit';

  private async getList(path: string, params: QueryParams, signal?: AbortSignal): Promise<BybitList> {
    const body = await this.getJson(path, { category: CATEGORY, ...params }, signal);
    const envelope = BybitEnvelope.safeParse(body);

    if (!envelope.success) {
      throw new UpstreamSemanticError(this.venue, `Bybit unexpected response on ${path}: ${describePayload(body)}`);
    }

    const { retCode } = envelope.data;
    if (retCode !== null && retCode !== undefined && retCode !== 0 && retCode !== '0') {
      throw new UpstreamSemanticError(this.venue, `Bybit retCode error on ${path}: ${describePayload(body)}`);
    }

    return {
      list: envelope.data.result?.list ?? [],
      time: pickTimestamp(envelope.data.time),
    };
  }

  protected async fetchTicker(instrumentId: string, signal?: AbortSignal): Promise<TickerReadings> {
    const { list, time } = await this.getList('/v5/market/tickers', { symbol: instrumentId }, signal);
    const ticker = list[0];
    if (!ticker) {
      throw new NoTickerDataError(this.venue, instrumentId);
    }

    return {
      lastPrice: pickNumber(ticker, ['lastPrice']),
      open24h: pickNumber(ticker, ['prevPrice24h']),
      quoteVolume24h: pickNumber(ticker, ['turnover24h']),
      exchangeTimestamp: time,
    };
  }

  protected async fetchFunding(instrumentId: string, signal?: AbortSignal): Promise<FundingReadings> {
    const { list } = await this.getList('/v5/market/funding/history', { symbol: instrumentId, limit: 1 }, signal);
    return { fundingRate: pickNumber(list[0], ['fundingRate']) };
  }

  protected async fetchOpenInterest(instrumentId: string, signal?: AbortSignal): Promise<OpenInterestReadings> {
    const { list } = await this.getList(
      '/v5/market/open-interest',
      { symbol: instrumentId, intervalTime: '5min', limit: 1 },
      signal,
    );

    const openInterest = pickNumber(list[0], ['openInterest']);
    return { openInterest, openInterestUnit: openInterest === null ? null : 'contracts' };
  }
}
