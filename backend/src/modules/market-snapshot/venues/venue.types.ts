/**
 * Venue Adapter contract
 *
 * One implementation per venue. fetch() fans out to ticker, funding and
 * open interest; only the ticker is mandatory.
 */

import type { RawVenueReadings, Venue } from '../snapshot.types.js';

export interface VenueAdapter {
  readonly venue: Venue;
  /** Display name used in log lines and error messages */
  readonly label: string;

  fetch(instrumentId: string, signal?: AbortSignal): Promise<RawVenueReadings>;
}

export type TickerReadings = Pick<
  RawVenueReadings,
  'lastPrice' | 'open24h' | 'quoteVolume24h' | 'exchangeTimestamp'
>;

export type FundingReadings = Pick<RawVenueReadings, 'fundingRate'>;

export type OpenInterestReadings = Pick<RawVenueReadings, 'openInterest' | 'openInterestUnit'>;

export type VenueAdapters = Readonly<Record<Venue, VenueAdapter>>;
