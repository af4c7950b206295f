/**
 * Market Snapshot Module
 *
 * Multi-venue (OKX, Binance, Bybit) normalization + short-lived snapshot cache.
 */

export * from './snapshot.types.js';
export * from './snapshot.errors.js';
export * from './snapshot.reconciler.js';
export { SnapshotCache, snapshotCacheKey, DEFAULT_SNAPSHOT_TTL_MS } from './snapshot.cache.js';
export type { SnapshotCacheOptions } from './snapshot.cache.js';
export { MarketSnapshotService, DEFAULT_EXCHANGE_LABEL } from './snapshot.service.js';
export type { MarketSnapshotServiceOptions } from './snapshot.service.js';
export { normalizeSymbol, buildInstrumentRef, canonicalSymbol } from './symbol.normalizer.js';
export { snapshotRoutes } from './snapshot.routes.js';
export * from './venues/index.js';

import { FastifyInstance } from 'fastify';
import type { Env } from '../../config/env.js';
import type { Logger } from '../../common/logger.js';
import { SnapshotCache } from './snapshot.cache.js';
import { snapshotRoutes } from './snapshot.routes.js';
import { MarketSnapshotService } from './snapshot.service.js';
import { createVenueAdapters } from './venues/venue.registry.js';

export type SnapshotModuleConfig = Pick<
  Env,
  | 'DEFAULT_EXCHANGE'
  | 'OKX_BASE'
  | 'BINANCE_BASE'
  | 'BYBIT_BASE'
  | 'CACHE_TTL_SECONDS'
  | 'UPSTREAM_TIMEOUT_MS'
  | 'EGRESS_PROXY_URL'
>;

export function createMarketSnapshotService(config: SnapshotModuleConfig, logger: Logger): MarketSnapshotService {
  const adapters = createVenueAdapters(
    {
      baseUrls: {
        okx: config.OKX_BASE,
        binance: config.BINANCE_BASE,
        bybit: config.BYBIT_BASE,
      },
      timeoutMs: config.UPSTREAM_TIMEOUT_MS,
      proxyUrl: config.EGRESS_PROXY_URL,
    },
    logger,
  );

  return new MarketSnapshotService({
    adapters,
    cache: new SnapshotCache({ ttlMs: config.CACHE_TTL_SECONDS * 1000 }),
    logger,
    defaultExchange: config.DEFAULT_EXCHANGE,
  });
}

export async function registerMarketSnapshotModule(
  fastify: FastifyInstance,
  service: MarketSnapshotService,
): Promise<void> {
  await fastify.register(snapshotRoutes, { service });
  fastify.addHook('onClose', async () => {
    service.clearCache();
  });
}
