/**
 * Snapshot error taxonomy
 *
 * - InvalidSymbolError     → 400, raised before any network call
 * - UpstreamTransportError → 502, network failure / timeout / non-200
 * - UpstreamSemanticError  → 502, HTTP 200 but the venue envelope reports failure
 * - NoTickerDataError      → 502, venue returned no ticker for the instrument
 */

import { AppError } from '../../common/errors.js';
import type { Venue } from './snapshot.types.js';

const MAX_DETAIL_LENGTH = 500;

export class InvalidSymbolError extends AppError {
  constructor(message: string) {
    super(400, 'INVALID_SYMBOL', message);
  }
}

export abstract class UpstreamError extends AppError {
  readonly venue: Venue;

  protected constructor(code: string, venue: Venue, message: string) {
    super(502, code, message);
    this.venue = venue;
  }
}

export class UpstreamTransportError extends UpstreamError {
  readonly httpStatus?: number;

  constructor(venue: Venue, message: string, httpStatus?: number) {
    super('UPSTREAM_TRANSPORT_ERROR', venue, message);
    this.httpStatus = httpStatus;
  }
}

export class UpstreamSemanticError extends UpstreamError {
  constructor(venue: Venue, message: string) {
    super('UPSTREAM_SEMANTIC_ERROR', venue, message);
  }
}

export class NoTickerDataError extends UpstreamError {
  constructor(venue: Venue, instrumentId: string) {
    super('NO_TICKER_DATA', venue, `No ticker data for ${instrumentId}`);
  }
}

/**
 * Render an upstream payload for an error message.
 */
export function describePayload(payload: unknown): string {
  let text: string;
  if (typeof payload === 'string') {
    text = payload;
  } else if (payload === undefined) {
    text = '';
  } else {
    try {
      text = JSON.stringify(payload) ?? String(payload);
    } catch {
      text = String(payload);
    }
  }
  return text.length > MAX_DETAIL_LENGTH ? `${text.slice(0, MAX_DETAIL_LENGTH)}…` : text;
}
