/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * File-level job runner behind the tour-geocode CLI
 */

import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { InvalidArgumentError } from 'commander';
import { formatCsv, parseCsv, type CsvTable } from '@tour-atlas/data';
import { fillUnknownCountries, forwardGeocodeCoordinates, reverseGeocodeCountries } from './jobs.js';
import type { GeocodeJobResult, GeocodeSummary, Geocoder } from './types.js';

export const JOBS = {
  countries: reverseGeocodeCountries,
  coordinates: forwardGeocodeCoordinates,
  'fill-unknown': fillUnknownCountries,
} satisfies Record<string, (table: CsvTable, geocoder: Geocoder) => Promise<GeocodeJobResult>>;

export type JobName = keyof typeof JOBS;

export interface GeocodeCliOptions {
  url?: string;
  userAgent?: string;
  language?: string;
  delay?: number;
  timeout?: number;
}

export function parseMillisOption(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms < 0) {
    throw new InvalidArgumentError(`Expected a non-negative number of milliseconds, got "${value}"`);
  }
  return ms;
}

/**
 * Read `input`, run the named job and write the result to `output`.
 * Refuses to overwrite the input file.
 */
export async function runFileJob(
  name: JobName,
  input: string,
  output: string,
  geocoder: Geocoder
): Promise<GeocodeSummary> {
  if (resolve(input) === resolve(output)) {
    throw new Error(`Output ${output} would overwrite the input file`);
  }

  const table = parseCsv(await readFile(input, 'utf8'));
  const result = await JOBS[name](table, geocoder);
  await writeFile(output, formatCsv(result.table), 'utf8');
  return result.summary;
}
