/**
 * OKX Venue Adapter
 *
 * Instrument: BTC-USDT-SWAP (perpetual swap)
 * Envelope:   { code: "0", msg: "", data: [...] }, code != "0" is an error
 *
 * Endpoints:
 * - /api/v5/market/ticker        last, open24h, volCcyQuote | volCcy24h | volCcy, ts
 * - /api/v5/public/funding-rate  fundingRate
 * - /api/v5/public/open-interest oiUsd (USD) | oi (contracts)
 */

import { z } from 'zod';
import { describePayload, NoTickerDataError, UpstreamSemanticError } from '../snapshot.errors.js';
import type { OpenInterestUnit } from '../snapshot.types.js';
import { BaseVenueAdapter, QueryParams } from './base.adapter.js';
import { pickFirst, pickNumber, pickTimestamp, toNumberOrNull, VenueRow } from './venue.parse.js';
import type { FundingReadings, OpenInterestReadings, TickerReadings } from './venue.types.js';

const OkxEnvelope = z.object({
  code: z.union([z.string(), z.number()]).nullish(),
  msg: z.string().nullish(),
  data: z.array(VenueRow).nullish(),
});

const QUOTE_VOLUME_KEYS = ['volCcyQuote', 'volCcy24h', 'volCcy'] as const;

const OPEN_INTEREST_KEYS = ['oiUsd', 'oi'] as const;

const OPEN_INTEREST_UNITS: Record<(typeof OPEN_INTEREST_KEYS)[number], OpenInterestUnit> = {
  oiUsd: 'USD',
  oi: 'contracts',
};

export class OkxAdapter extends BaseVenueAdapter {
  readonly venue = 'okx' as const;
  readonly label = 'OKX';

  private async getData(path: string, params: QueryParams, signal?: AbortSignal): Promise<VenueRow[]> {
    const body = await this.getJson(path, params, signal);
    const envelope = OkxEnvelope.safeParse(body);

    if (!envelope.success) {
      throw new UpstreamSemanticError(this.venue, `OKX unexpected response on ${path}: ${describePayload(body)}`);
    }

    const { code } = envelope.data;
    if (code !== null && code !== undefined && code !== '0' && code !== 0) {
      throw new UpstreamSemanticError(this.venue, `OKX code error on ${path}: ${describePayload(body)}`);
    }

    return envelope.data.data ?? [];
  }

  protected async fetchTicker(instrumentId: string, signal?: AbortSignal): Promise<TickerReadings> {
    const rows = await this.getData('/api/v5/market/ticker', { instId: instrumentId }, signal);
    const ticker = rows[0];
    if (!ticker) {
      throw new NoTickerDataError(this.venue, instrumentId);
    }

    return {
      lastPrice: pickNumber(ticker, ['last']),
      open24h: pickNumber(ticker, ['open24h']),
      quoteVolume24h: pickNumber(ticker, QUOTE_VOLUME_KEYS),
      exchangeTimestamp: pickTimestamp(ticker.ts),
    };
  }

  protected async fetchFunding(instrumentId: string, signal?: AbortSignal): Promise<FundingReadings> {
    const rows = await this.getData('/api/v5/public/funding-rate', { instId: instrumentId }, signal);
    return { fundingRate: pickNumber(rows[0], ['fundingRate']) };
  }

  protected async fetchOpenInterest(instrumentId: string, signal?: AbortSignal): Promise<OpenInterestReadings> {
    const rows = await this.getData(
      '/api/v5/public/open-interest',
      { instType: 'SWAP', instId: instrumentId },
      signal,
    );

    const hit = rows[0] ? pickFirst(rows[0], OPEN_INTEREST_KEYS) : null;
    const openInterest = hit ? toNumberOrNull(hit.value) : null;

    return {
      openInterest,
      openInterestUnit: hit && openInterest !== null ? OPEN_INTEREST_UNITS[hit.key] : null,
    };
  }
}
