/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Types for the offline geocoding jobs
 */

import type { CsvTable } from '@tour-atlas/data';

export interface Coordinates {
  latitude: number;
  longitude: number;
}

/**
 * Geocoding service as seen by the jobs. Both lookups resolve to null when
 * the service has no answer and reject on transport or HTTP failure.
 */
export interface Geocoder {
  reverse(latitude: number, longitude: number): Promise<string | null>;
  search(query: string): Promise<Coordinates | null>;
}

export type SentinelReason = 'missing-input' | 'no-result' | 'error';

/** Per-row result of one lookup */
export type GeocodeOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'sentinel'; reason: SentinelReason; error?: unknown };

export interface GeocodeSummary {
  /** Rows in the input table */
  total: number;
  /** Rows for which the service was called */
  attempted: number;
  /** Rows updated from a service answer */
  resolved: number;
  /** In-scope rows that received the sentinel value */
  sentinel: number;
  /** Rows outside the job's scope, copied unchanged */
  skipped: number;
}

export interface GeocodeJobResult {
  table: CsvTable;
  summary: GeocodeSummary;
}

/** Raw CSV columns the jobs read and write */
export const GEOCODE_COLUMNS = {
  location: 'location',
  latitude: 'latitude',
  longitude: 'longitude',
  country: 'country',
} as const;
