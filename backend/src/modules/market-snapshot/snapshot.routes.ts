/**
 * Market Snapshot Routes
 *
 * ENDPOINTS:
 *   GET /                                              — liveness
 *   GET /market_snapshot?symbol=BTCUSDT&exchange=okx&timeframe=4H — snapshot
 */

import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../../common/errors.js';
import type { MarketSnapshotService } from './snapshot.service.js';

const SnapshotQuery = z.object({
  symbol: z
    .string({ required_error: 'symbol is required', invalid_type_error: 'symbol must be a single string' })
    .trim()
    .min(1, 'symbol is required'),
  exchange: z.string({ invalid_type_error: 'exchange must be a single string' }).optional(),
  timeframe: z.string({ invalid_type_error: 'timeframe must be a single string' }).optional(),
});

export interface SnapshotRoutesOptions {
  service: MarketSnapshotService;
}

export async function snapshotRoutes(fastify: FastifyInstance, options: SnapshotRoutesOptions): Promise<void> {
  const { service } = options;

  fastify.get('/', async () => ({
    status: 'ok',
    service: 'crypto-market-snapshot',
    source: service.defaultVenue,
  }));

  fastify.get('/market_snapshot', async (request, reply) => {
    const query = SnapshotQuery.safeParse(request.query);
    if (!query.success) {
      throw new ValidationError(query.error.issues.map(issue => issue.message).join('; '));
    }

    // Client went away before we answered: abandon the upstream calls
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) controller.abort();
    };
    reply.raw.once('close', onClose);

    try {
      return await service.getSnapshot({ ...query.data, signal: controller.signal });
    } finally {
      reply.raw.off('close', onClose);
    }
  });
}
