/**
 * Base Venue Adapter
 *
 * Shared by every venue:
 * - concurrent fan-out (ticker + funding + open interest)
 * - soft-fail policy for the secondary calls
 * - transport error mapping for axios calls
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import type { Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import { describePayload, UpstreamTransportError } from '../snapshot.errors.js';
import type { RawVenueReadings, Venue } from '../snapshot.types.js';
import type {
  FundingReadings,
  OpenInterestReadings,
  TickerReadings,
  VenueAdapter,
} from './venue.types.js';

export type QueryParams = Record<string, string | number>;

export interface VenueAdapterOptions {
  client: AxiosInstance;
  logger: Logger;
}

const NO_FUNDING: FundingReadings = { fundingRate: null };
const NO_OPEN_INTEREST: OpenInterestReadings = { openInterest: null, openInterestUnit: null };

export abstract class BaseVenueAdapter implements VenueAdapter {
  abstract readonly venue: Venue;
  abstract readonly label: string;

  protected readonly client: AxiosInstance;
  protected readonly logger: Logger;

  constructor(options: VenueAdapterOptions) {
    this.client = options.client;
    this.logger = options.logger;
  }

  // ─────────────────────────────────────────────────────────────
  // Venue-specific calls
  // ─────────────────────────────────────────────────────────────

  /** Mandatory. Throws NoTickerDataError when the venue has nothing for the instrument. */
  protected abstract fetchTicker(instrumentId: string, signal?: AbortSignal): Promise<TickerReadings>;
  protected abstract fetchFunding(instrumentId: string, signal?: AbortSignal): Promise<FundingReadings>;
  protected abstract fetchOpenInterest(instrumentId: string, signal?: AbortSignal): Promise<OpenInterestReadings>;

  // ─────────────────────────────────────────────────────────────
  // Fan-out
  // ─────────────────────────────────────────────────────────────

  async fetch(instrumentId: string, signal?: AbortSignal): Promise<RawVenueReadings> {
    const [ticker, funding, openInterest] = await Promise.all([
      this.fetchTicker(instrumentId, signal),
      this.softFail('funding', instrumentId, () => this.fetchFunding(instrumentId, signal), NO_FUNDING),
      this.softFail('open_interest', instrumentId, () => this.fetchOpenInterest(instrumentId, signal), NO_OPEN_INTEREST),
    ]);

    // Secondary calls cut short by cancellation came back empty; don't pass that off as data
    if (signal?.aborted) {
      throw new UpstreamTransportError(this.venue, `${this.label} request aborted`);
    }

    return { ...ticker, ...funding, ...openInterest };
  }

  private async softFail<T>(
    call: string,
    instrumentId: string,
    run: () => Promise<T>,
    fallback: T,
  ): Promise<T> {
    try {
      return await run();
    } catch (error: unknown) {
      this.logger.warn(
        { venue: this.venue, instrumentId, call, err: errorMessage(error) },
        `${this.label} ${call} unavailable, leaving field empty`,
      );
      return fallback;
    }
  }

  // ─────────────────────────────────────────────────────────────
  // HTTP
  // ─────────────────────────────────────────────────────────────

  /**
   * GET and return the decoded body. Anything but HTTP 200 is a transport error.
   */
  protected async getJson(path: string, params: QueryParams, signal?: AbortSignal): Promise<unknown> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(path, { params, signal });
    } catch (error: unknown) {
      throw this.toTransportError(path, error);
    }

    if (response.status !== 200) {
      throw new UpstreamTransportError(
        this.venue,
        `${this.label} upstream error: HTTP ${response.status} on ${path}: ${describePayload(response.data)}`,
        response.status,
      );
    }

    return response.data;
  }

  private toTransportError(path: string, error: unknown): UpstreamTransportError {
    if (axios.isCancel(error)) {
      return new UpstreamTransportError(this.venue, `${this.label} request aborted on ${path}`);
    }
    if (axios.isAxiosError(error)) {
      const code = error.code ? `${error.code} ` : '';
      return new UpstreamTransportError(
        this.venue,
        `${this.label} transport error on ${path}: ${code}${error.message}`,
        error.response?.status,
      );
    }
    return new UpstreamTransportError(this.venue, `${this.label} transport error on ${path}: ${errorMessage(error)}`);
  }
}
