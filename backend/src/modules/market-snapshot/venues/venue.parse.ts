/**
 * Soft parsing helpers for venue payloads.
 *
 * Venues send numbers as strings, sometimes empty. Nothing here throws:
 * unusable values come back as null.
 */

import { z } from 'zod';

export const VenueRow = z.record(z.string(), z.unknown());

export type VenueRow = z.infer<typeof VenueRow>;

export function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined && value !== '';
}

export function toNumberOrNull(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!trimmed) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * First key (in precedence order) whose value is present.
 */
export function pickFirst<K extends string>(
  row: VenueRow,
  keys: readonly K[],
): { key: K; value: unknown } | null {
  for (const key of keys) {
    const value = row[key];
    if (isPresent(value)) return { key, value };
  }
  return null;
}

export function pickNumber(row: VenueRow | undefined, keys: readonly string[]): number | null {
  if (!row) return null;
  const hit = pickFirst(row, keys);
  return hit ? toNumberOrNull(hit.value) : null;
}

/**
 * Raw epoch value for the reconciler to convert.
 */
export function pickTimestamp(value: unknown): string | number | null {
  if (typeof value === 'number' || (typeof value === 'string' && value !== '')) {
    return value;
  }
  return null;
}
