/**
 * HTTP Client Factory
 * ===================
 *
 * Creates the axios clients used for every venue call.
 * All venue adapters MUST get their client from here.
 *
 * - validateStatus accepts everything: adapters classify status codes themselves
 * - no retry interceptor: a failed call surfaces once to the caller
 * - optional egress proxy through https-proxy-agent
 */

import axios, { AxiosInstance, CreateAxiosDefaults } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; DeskSnapshot/1.3)';

export interface HttpClientOptions {
  baseURL: string;
  timeoutMs: number;
  proxyUrl?: string;
  userAgent?: string;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const axiosConfig: CreateAxiosDefaults = {
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    headers: {
      'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
      Accept: 'application/json',
    },
    validateStatus: () => true,
  };

  if (options.proxyUrl) {
    const agent = new HttpsProxyAgent(options.proxyUrl);
    axiosConfig.httpsAgent = agent;
    axiosConfig.httpAgent = agent;
    axiosConfig.proxy = false; // the agent handles the tunnel
  }

  return axios.create(axiosConfig);
}
