/**
 * Market Snapshot Service
 * =======================
 *
 * Per request:
 *   RESOLVE_VENUE → NORMALIZE → CACHE_LOOKUP → HIT: done
 *                                            → MISS: FETCH → RECONCILE → STORE → done
 *
 * Only successful reconciliations are stored. No retries here.
 */

import type { Logger } from '../../common/logger.js';
import { SnapshotCache } from './snapshot.cache.js';
import { reconcile } from './snapshot.reconciler.js';
import { MarketSnapshot, SnapshotCacheKey, SnapshotRequest, Venue } from './snapshot.types.js';
import { buildInstrumentRef } from './symbol.normalizer.js';
import { resolveVenue } from './venues/venue.registry.js';
import type { VenueAdapters } from './venues/venue.types.js';

export const DEFAULT_EXCHANGE_LABEL = 'okx';

export interface MarketSnapshotServiceOptions {
  adapters: VenueAdapters;
  cache: SnapshotCache;
  logger: Logger;
  /** Label used when the request carries none; must name a known venue */
  defaultExchange?: string;
  clock?: () => Date;
}

export class MarketSnapshotService {
  readonly defaultExchange: string;
  readonly defaultVenue: Venue;

  private readonly adapters: VenueAdapters;
  private readonly cache: SnapshotCache;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: MarketSnapshotServiceOptions) {
    this.adapters = options.adapters;
    this.cache = options.cache;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());

    this.defaultExchange = options.defaultExchange ?? DEFAULT_EXCHANGE_LABEL;
    const defaultVenue = resolveVenue(this.defaultExchange);
    if (!defaultVenue) {
      throw new Error(`Default exchange "${this.defaultExchange}" does not name a supported venue`);
    }
    this.defaultVenue = defaultVenue;
  }

  async getSnapshot(request: SnapshotRequest): Promise<MarketSnapshot> {
    const exchange = request.exchange && request.exchange.trim() ? request.exchange : this.defaultExchange;

    // Unknown labels are served by the default venue; `source` says which one answered
    const venue = resolveVenue(exchange) ?? this.defaultVenue;
    const instrument = buildInstrumentRef(request.symbol, venue);

    const key: SnapshotCacheKey = {
      exchange,
      instrumentId: instrument.instrumentId,
      timeframe: request.timeframe ?? '',
    };

    const cached = this.cache.get(key);
    if (cached) {
      this.logger.debug?.({ ...key, venue }, 'snapshot cache hit');
      return cached;
    }

    const adapter = this.adapters[venue];
    const startedAt = Date.now();
    const readings = await adapter.fetch(instrument.instrumentId, request.signal);

    const snapshot = reconcile(
      {
        symbol: instrument.symbol,
        exchange,
        source: venue,
        instrumentId: instrument.instrumentId,
        readings,
      },
      this.clock(),
    );

    this.cache.put(key, snapshot);
    this.logger.info(
      { ...key, venue, latencyMs: Date.now() - startedAt },
      `${adapter.label} snapshot fetched`,
    );

    return snapshot;
  }

  clearCache(): void {
    this.cache.clear();
  }
}
