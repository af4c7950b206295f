/**
 * Narrow logging contract handed to services.
 *
 * Fastify's logger (pino) satisfies it directly; tests pass vi.fn() mocks.
 */

export interface Logger {
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
  debug?: (obj: Record<string, unknown>, msg?: string) => void;
}
