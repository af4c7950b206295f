export { createHttpClient, DEFAULT_USER_AGENT } from './httpClient.factory.js';
export type { HttpClientOptions } from './httpClient.factory.js';
