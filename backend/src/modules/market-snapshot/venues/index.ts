export * from './venue.types.js';
export { BaseVenueAdapter } from './base.adapter.js';
export type { VenueAdapterOptions, QueryParams } from './base.adapter.js';
export { OkxAdapter } from './okx.adapter.js';
export { BinanceAdapter } from './binance.adapter.js';
export { BybitAdapter } from './bybit.adapter.js';
export { createVenueAdapters, resolveVenue } from './venue.registry.js';
export type { VenueClientConfig } from './venue.registry.js';
