/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Nominatim (OpenStreetMap) geocoding client
 */

import { resolveGeocodeConfig, type GeocodeConfig } from '@tour-atlas/data';
import { MinIntervalThrottle } from './throttle.js';
import type { Coordinates, Geocoder } from './types.js';

// ============================================================================
// Error Types
// ============================================================================

export class GeocodeServiceError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly statusText: string,
    public readonly body?: string
  ) {
    super(message);
    this.name = 'GeocodeServiceError';
  }
}

// ============================================================================
// Response Narrowing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** Country of a /reverse answer; an `{ error }` body or a missing address is no result */
function countryOf(body: unknown): string | null {
  if (!isRecord(body)) return null;
  const address = body.address;
  if (!isRecord(address)) return null;
  const country = address.country;
  return typeof country === 'string' && country.trim() !== '' ? country : null;
}

/** Coordinates of the first /search hit; Nominatim sends lat/lon as strings */
function coordinatesOf(body: unknown): Coordinates | null {
  if (!Array.isArray(body) || body.length === 0) return null;
  const [first]: unknown[] = body;
  if (!isRecord(first)) return null;

  const latitude = Number(first.lat);
  const longitude = Number(first.lon);
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return null;
  return { latitude, longitude };
}

// ============================================================================
// Client
// ============================================================================

/**
 * @example
 * ```typescript
 * const client = new NominatimClient(resolveGeocodeConfig());
 * const country = await client.reverse(43.6532, -79.3832); // "Canada"
 * const coords = await client.search('Banff, Alberta');
 * ```
 */
export class NominatimClient implements Geocoder {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly language: string;
  private readonly timeoutMs: number;
  private readonly throttle: MinIntervalThrottle;

  constructor(config: GeocodeConfig, throttle?: MinIntervalThrottle) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.userAgent = config.userAgent;
    this.language = config.language;
    this.timeoutMs = config.timeoutMs;
    this.throttle = throttle ?? new MinIntervalThrottle(config.minDelayMs);
  }

  /** Client configured from TOUR_ATLAS_* variables */
  static fromEnv(overrides: Partial<GeocodeConfig> = {}): NominatimClient {
    return new NominatimClient(resolveGeocodeConfig(overrides));
  }

  async reverse(latitude: number, longitude: number): Promise<string | null> {
    const body = await this.request('/reverse', {
      lat: String(latitude),
      lon: String(longitude),
    });
    return countryOf(body);
  }

  async search(query: string): Promise<Coordinates | null> {
    const body = await this.request('/search', { q: query, limit: '1' });
    return coordinatesOf(body);
  }

  /** Build the request URL; parameters keep their insertion order */
  url(path: string, params: Record<string, string>): string {
    const search = new URLSearchParams({ format: 'jsonv2', ...params, 'accept-language': this.language });
    return `${this.baseUrl}${path}?${search.toString()}`;
  }

  /**
   * Throttled GET returning the parsed JSON body.
   * Non-2xx responses throw GeocodeServiceError.
   */
  private request(path: string, params: Record<string, string>): Promise<unknown> {
    const url = this.url(path, params);

    return this.throttle.schedule(async () => {
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        const bodyText = await response.text().catch(() => '');
        throw new GeocodeServiceError(
          `Geocoding service error: ${response.status} ${response.statusText}`,
          response.status,
          response.statusText,
          bodyText
        );
      }

      const body: unknown = await response.json();
      return body;
    });
  }
}
