/**
 * Binance USDT-M Futures Venue Adapter
 *
 * No envelope: HTTP status is the only success signal.
 *
 * Endpoints:
 * - /fapi/v1/ticker/24hr   lastPrice, openPrice, quoteVolume, closeTime
 * - /fapi/v1/premiumIndex  lastFundingRate
 * - /fapi/v1/openInterest  openInterest (contracts)
 */

import { z } from 'zod';
import { describePayload, NoTickerDataError, UpstreamSemanticError } from '../snapshot.errors.js';
import { BaseVenueAdapter } from './base.adapter.js';
import { pickNumber, pickTimestamp, VenueRow } from './venue.parse.js';
import type { FundingReadings, OpenInterestReadings, TickerReadings } from './venue.types.js';

const BinanceBody = z.union([z.array(VenueRow), VenueRow]);

export class BinanceAdapter extends BaseVenueAdapter {
  readonly venue = 'binance' as const;
  readonly label = 'Binance';

  /**
   * Object for single-symbol queries; some endpoints answer with a list instead.
   */
  private async getRow(path: string, instrumentId: string, signal?: AbortSignal): Promise<VenueRow | undefined> {
    const body = await this.getJson(path, { symbol: instrumentId }, signal);
    const parsed = BinanceBody.safeParse(body);

    if (!parsed.success) {
      throw new UpstreamSemanticError(this.venue, `Binance unexpected response on ${path}: ${describePayload(body)}`);
    }

    const data = parsed.data;
    if (Array.isArray(data)) {
      return data.find(row => row.symbol === instrumentId);
    }
    return data;
  }

  protected async fetchTicker(instrumentId: string, signal?: AbortSignal): Promise<TickerReadings> {
    const ticker = await this.getRow('/fapi/v1/ticker/24hr', instrumentId, signal);
    if (!ticker) {
      throw new NoTickerDataError(this.venue, instrumentId);
    }

    return {
      lastPrice: pickNumber(ticker, ['lastPrice']),
      open24h: pickNumber(ticker, ['openPrice']),
      quoteVolume24h: pickNumber(ticker, ['quoteVolume']),
      exchangeTimestamp: pickTimestamp(ticker.closeTime),
    };
  }

  protected async fetchFunding(instrumentId: string, signal?: AbortSignal): Promise<FundingReadings> {
    const row = await this.getRow('/fapi/v1/premiumIndex', instrumentId, signal);
    return { fundingRate: pickNumber(row, ['lastFundingRate']) };
  }

  protected async fetchOpenInterest(instrumentId: string, signal?: AbortSignal): Promise<OpenInterestReadings> {
    const row = await this.getRow('/fapi/v1/openInterest', instrumentId, signal);
    const openInterest = pickNumber(row, ['openInterest']);
    return { openInterest, openInterestUnit: openInterest === null ? null : 'contracts' };
  }
}
