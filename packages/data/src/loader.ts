/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Dataset loader - maps raw listing columns onto canonical tour records
 */

import { createLogger } from './logger.js';
import {
  DEFAULT_COLUMN_MAPPING,
  UNCATEGORIZED,
  UNKNOWN_COUNTRY,
  type CanonicalColumn,
  type ColumnMapping,
  type CsvRow,
  type CsvTable,
  type TourDataset,
  type TourRecord,
} from './types.js';

const log = createLogger('Loader');

/** Cell values treated as missing, in addition to the empty string */
const NULL_TOKENS = new Set(['', 'NA', 'N/A', 'n/a', 'NaN', 'nan', '-NaN', 'NULL', 'null', 'None', '<NA>', '#N/A']);

/** Thrown when the source lacks columns the dashboard needs */
export class DatasetSchemaError extends Error {
  constructor(
    message: string,
    public readonly missingColumns: string[]
  ) {
    super(message);
    this.name = 'DatasetSchemaError';
  }
}

export interface LoadOptions {
  /** Overrides for canonical -> raw column names */
  columns?: Partial<ColumnMapping>;
}

/** Cell text, or null when the cell is absent or holds a null token */
export function presentValue(value: string | undefined): string | null {
  if (value === undefined || NULL_TOKENS.has(value.trim())) return null;
  return value;
}

/** Parse a numeric cell; null when missing or not a finite number */
export function parseNumber(value: string | undefined): number | null {
  const text = presentValue(value);
  if (text === null) return null;
  const parsed = Number(text.trim());
  return Number.isFinite(parsed) ? parsed : null;
}

function resolveMapping(options: LoadOptions): ColumnMapping {
  return { ...DEFAULT_COLUMN_MAPPING, ...options.columns };
}

/**
 * Verify every mapped source column exists. Throws DatasetSchemaError listing
 * all missing columns.
 */
export function validateSchema(headers: readonly string[], mapping: ColumnMapping): void {
  const present = new Set(headers);
  const missing = Object.values(mapping).filter((raw) => !present.has(raw));

  if (missing.length > 0) {
    throw new DatasetSchemaError(
      `Dataset is missing required column(s): ${missing.join(', ')}`,
      missing
    );
  }
}

function toRecord(row: CsvRow, mapping: ColumnMapping): TourRecord {
  const cell = (column: CanonicalColumn): string | undefined => row[mapping[column]];

  const reviews = parseNumber(cell('total_reviews'));

  return Object.freeze({
    tour_name: presentValue(cell('tour_name')) ?? '',
    city: presentValue(cell('city')) ?? '',
    country: presentValue(cell('country')) ?? UNKNOWN_COUNTRY,
    category: presentValue(cell('category')) ?? UNCATEGORIZED,
    rating_score: parseNumber(cell('rating_score')) ?? 0,
    total_reviews: reviews !== null && reviews > 0 ? Math.trunc(reviews) : 0,
    latitude: parseNumber(cell('latitude')),
    longitude: parseNumber(cell('longitude')),
  });
}

/**
 * Normalize a parsed table into tour records.
 *
 * Rows are deduplicated on tour_name keeping the first occurrence; the
 * returned records and array are frozen.
 */
export function loadTours(table: CsvTable, options: LoadOptions = {}): TourDataset {
  const mapping = resolveMapping(options);
  validateSchema(table.headers, mapping);

  const seen = new Set<string>();
  const records: TourRecord[] = [];

  for (const row of table.rows) {
    const record = toRecord(row, mapping);
    if (seen.has(record.tour_name)) continue;
    seen.add(record.tour_name);
    records.push(record);
  }

  const duplicateCount = table.rows.length - records.length;
  if (duplicateCount > 0) {
    log.info(`Dropped ${duplicateCount} duplicate tour(s)`, { operation: 'loadTours' });
  }

  return {
    records: Object.freeze(records),
    sourceRowCount: table.rows.length,
    duplicateCount,
    loadedAt: Date.now(),
  };
}
