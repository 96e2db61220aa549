/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Geocoding batch jobs
 *
 * Each job walks the table once, asks the geocoder for the rows in its scope
 * and folds every row's outcome into a new table. Row failures become sentinel
 * values; the input table is never modified and failed rows are not retried.
 */

import { createLogger, parseNumber, presentValue, UNKNOWN_COUNTRY, type CsvRow, type CsvTable } from '@tour-atlas/data';
import { sentinel, settle } from './outcome.js';
import {
  GEOCODE_COLUMNS,
  type Coordinates,
  type GeocodeJobResult,
  type GeocodeOutcome,
  type GeocodeSummary,
  type Geocoder,
} from './types.js';

const log = createLogger('Geocoder');

// ============================================================================
// Job Runner
// ============================================================================

export type RowTask<T> = { kind: 'skip' } | { kind: 'missing-input' } | { kind: 'lookup'; lookup: () => Promise<T | null> };

export interface GeocodeJob<T> {
  name: string;
  /** Output headers; columns a job writes are appended when absent */
  headers(input: readonly string[]): string[];
  plan(row: CsvRow): RowTask<T>;
  /** Produce the output row for an in-scope row */
  apply(row: CsvRow, outcome: GeocodeOutcome<T>): CsvRow;
}

function withColumns(headers: readonly string[], columns: readonly string[]): string[] {
  return [...headers, ...columns.filter((column) => !headers.includes(column))];
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function runGeocodeJob<T>(table: CsvTable, job: GeocodeJob<T>): Promise<GeocodeJobResult> {
  const summary: GeocodeSummary = { total: table.rows.length, attempted: 0, resolved: 0, sentinel: 0, skipped: 0 };
  const rows: CsvRow[] = [];

  for (const [index, row] of table.rows.entries()) {
    const task = job.plan(row);

    if (task.kind === 'skip') {
      summary.skipped++;
      rows.push({ ...row });
      continue;
    }

    let outcome: GeocodeOutcome<T>;
    if (task.kind === 'missing-input') {
      outcome = sentinel<T>('missing-input');
    } else {
      summary.attempted++;
      outcome = await settle(task.lookup());
    }

    if (outcome.status === 'ok') {
      summary.resolved++;
      log.debug('Resolved', outcome.value, { operation: job.name, row: index });
    } else {
      summary.sentinel++;
      if (outcome.reason === 'error') {
        log.warn(`Lookup failed: ${describeError(outcome.error)}`, { operation: job.name, row: index });
      }
    }

    rows.push(job.apply(row, outcome));
  }

  log.info(
    `${summary.total} rows, ${summary.attempted} attempted, ${summary.resolved} resolved, ` +
      `${summary.sentinel} sentinel, ${summary.skipped} skipped`,
    { operation: job.name }
  );

  return { table: { headers: job.headers(table.headers), rows }, summary };
}

// ============================================================================
// Row Helpers
// ============================================================================

function coordinatesOf(row: CsvRow): Coordinates | null {
  const latitude = parseNumber(row[GEOCODE_COLUMNS.latitude]);
  const longitude = parseNumber(row[GEOCODE_COLUMNS.longitude]);
  if (latitude === null || longitude === null) return null;
  return { latitude, longitude };
}

function reverseTask(row: CsvRow, geocoder: Geocoder): RowTask<string> {
  const coordinates = coordinatesOf(row);
  if (!coordinates) return { kind: 'missing-input' };
  return { kind: 'lookup', lookup: () => geocoder.reverse(coordinates.latitude, coordinates.longitude) };
}

function withCountry(row: CsvRow, outcome: GeocodeOutcome<string>): CsvRow {
  return {
    ...row,
    [GEOCODE_COLUMNS.country]: outcome.status === 'ok' ? outcome.value : UNKNOWN_COUNTRY,
  };
}

// ============================================================================
// Jobs
// ============================================================================

/**
 * Set `country` on every row from its coordinates. Rows without valid
 * coordinates, without an answer or whose lookup failed get "Unknown".
 */
export function reverseGeocodeCountries(table: CsvTable, geocoder: Geocoder): Promise<GeocodeJobResult> {
  return runGeocodeJob<string>(table, {
    name: 'reverseGeocodeCountries',
    headers: (input) => withColumns(input, [GEOCODE_COLUMNS.country]),
    plan: (row) => reverseTask(row, geocoder),
    apply: withCountry,
  });
}

/**
 * Fill missing coordinates from the `location` text. Rows that already have
 * both coordinates are copied unchanged; unresolved rows keep their cells.
 */
export function forwardGeocodeCoordinates(table: CsvTable, geocoder: Geocoder): Promise<GeocodeJobResult> {
  return runGeocodeJob<Coordinates>(table, {
    name: 'forwardGeocodeCoordinates',
    headers: (input) => withColumns(input, [GEOCODE_COLUMNS.latitude, GEOCODE_COLUMNS.longitude]),
    plan: (row) => {
      if (coordinatesOf(row)) return { kind: 'skip' };
      const location = presentValue(row[GEOCODE_COLUMNS.location]);
      if (location === null) return { kind: 'missing-input' };
      return { kind: 'lookup', lookup: () => geocoder.search(location.trim()) };
    },
    apply: (row, outcome) => {
      if (outcome.status !== 'ok') return { ...row };
      return {
        ...row,
        [GEOCODE_COLUMNS.latitude]: String(outcome.value.latitude),
        [GEOCODE_COLUMNS.longitude]: String(outcome.value.longitude),
      };
    },
  });
}

/**
 * Retry reverse geocoding for rows whose country is exactly "Unknown".
 * All other rows are copied unchanged.
 */
export function fillUnknownCountries(table: CsvTable, geocoder: Geocoder): Promise<GeocodeJobResult> {
  return runGeocodeJob<string>(table, {
    name: 'fillUnknownCountries',
    headers: (input) => [...input],
    plan: (row) => (row[GEOCODE_COLUMNS.country] === UNKNOWN_COUNTRY ? reverseTask(row, geocoder) : { kind: 'skip' }),
    apply: withCountry,
  });
}
