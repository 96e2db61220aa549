/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Core data types for tour listings
 */

// ============================================================================
// Raw tabular data
// ============================================================================

/** A parsed CSV row: header name -> raw cell text */
export interface CsvRow {
  [column: string]: string;
}

export interface CsvTable {
  /** Header names in source order */
  headers: string[];
  rows: CsvRow[];
}

// ============================================================================
// Canonical records
// ============================================================================

/**
 * One tour listing after normalization.
 * Field names are the column names the dashboard charts consume.
 */
export interface TourRecord {
  tour_name: string;
  /** Raw location label, never split into city/region */
  city: string;
  country: string;
  category: string;
  rating_score: number;
  total_reviews: number;
  latitude: number | null;
  longitude: number | null;
}

export type CanonicalColumn = keyof TourRecord;

/** Canonical column -> raw source column */
export type ColumnMapping = Record<CanonicalColumn, string>;

export const DEFAULT_COLUMN_MAPPING: Readonly<ColumnMapping> = {
  tour_name: 'title',
  city: 'location',
  country: 'country',
  category: 'category',
  rating_score: 'rating_score',
  total_reviews: 'rating_review_count',
  latitude: 'latitude',
  longitude: 'longitude',
};

export const UNCATEGORIZED = 'Uncategorized';
export const UNKNOWN_COUNTRY = 'Unknown';

export interface TourDataset {
  records: readonly TourRecord[];
  /** Data rows in the source before deduplication */
  sourceRowCount: number;
  /** Rows dropped because their tour_name was already seen */
  duplicateCount: number;
  loadedAt: number;
}
