/**
 * Venue Registry
 *
 * Builds one adapter per venue and maps caller labels to venues.
 */

import type { Logger } from '../../../common/logger.js';
import { createHttpClient } from '../../network/index.js';
import type { Venue } from '../snapshot.types.js';
import { BinanceAdapter } from './binance.adapter.js';
import { BybitAdapter } from './bybit.adapter.js';
import { OkxAdapter } from './okx.adapter.js';
import type { VenueAdapters } from './venue.types.js';

export interface VenueClientConfig {
  baseUrls: Record<Venue, string>;
  timeoutMs: number;
  proxyUrl?: string;
}

const VENUE_ALIASES: Readonly<Record<string, Venue>> = {
  okx: 'okx',
  okex: 'okx',
  binance: 'binance',
  'binance-futures': 'binance',
  binance_usdm: 'binance',
  bybit: 'bybit',
};

/**
 * Case-insensitive label → venue. Unknown labels resolve to null.
 */
export function resolveVenue(label: string): Venue | null {
  const key = label.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(VENUE_ALIASES, key) ? VENUE_ALIASES[key] : null;
}

export function createVenueAdapters(config: VenueClientConfig, logger: Logger): VenueAdapters {
  const clientFor = (venue: Venue) =>
    createHttpClient({
      baseURL: config.baseUrls[venue],
      timeoutMs: config.timeoutMs,
      proxyUrl: config.proxyUrl,
    });

  return Object.freeze({
    okx: new OkxAdapter({ client: clientFor('okx'), logger }),
    binance: new BinanceAdapter({ client: clientFor('binance'), logger }),
    bybit: new BybitAdapter({ client: clientFor('bybit'), logger }),
  });
}
