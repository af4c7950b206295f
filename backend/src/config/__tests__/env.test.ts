import { describe, it, expect } from 'vitest';
import { loadEnv } from '../env.js';

describe('loadEnv', () => {
  it('applies defaults', () => {
    const env = loadEnv({});

    expect(env).toEqual({
      NODE_ENV: 'development',
      HOST: '0.0.0.0',
      PORT: 8000,
      LOG_LEVEL: 'info',
      CORS_ORIGINS: '*',
      DEFAULT_EXCHANGE: 'okx',
      OKX_BASE: 'https://www.okx.com',
      BINANCE_BASE: 'https://fapi.binance.com',
      BYBIT_BASE: 'https://api.bybit.com',
      CACHE_TTL_SECONDS: 8,
      UPSTREAM_TIMEOUT_MS: 12000,
    });
    expect(Object.isFrozen(env)).toBe(true);
  });

  it('coerces numeric variables', () => {
    const env = loadEnv({ PORT: '3000', CACHE_TTL_SECONDS: '2.5', UPSTREAM_TIMEOUT_MS: '5000' });

    expect(env.PORT).toBe(3000);
    expect(env.CACHE_TTL_SECONDS).toBe(2.5);
    expect(env.UPSTREAM_TIMEOUT_MS).toBe(5000);
  });

  it('treats empty values as unset', () => {
    const env = loadEnv({ PORT: '', EGRESS_PROXY_URL: '' });

    expect(env.PORT).toBe(8000);
    expect(env.EGRESS_PROXY_URL).toBeUndefined();
  });

  it('reports every invalid variable', () => {
    expect(() => loadEnv({ CACHE_TTL_SECONDS: '0', OKX_BASE: 'not a url' })).toThrow(
      /^Invalid environment configuration: .*OKX_BASE.*CACHE_TTL_SECONDS/,
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => loadEnv({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
  });
});
