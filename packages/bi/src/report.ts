/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Report helpers for the tour-atlas CLI: option parsing and table rendering
 */

import { InvalidArgumentError } from 'commander';
import { formatCsv, type CsvRow } from '@tour-atlas/data';
import type { DashboardView, FilterOptions, FilterSpec, NumericRange, SortDirection, SortKey } from './types.js';

export const REPORT_VIEWS = ['tours', 'cities', 'city-metrics', 'categories', 'hierarchy', 'map', 'reviews'] as const;
export type ReportView = (typeof REPORT_VIEWS)[number];

export const REPORT_FORMATS = ['json', 'csv'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface ReportCliOptions {
  country?: string[];
  category?: string[];
  reviews?: NumericRange;
  rating?: NumericRange;
  sort: SortKey;
  order: SortDirection;
  view: ReportView;
  format: ReportFormat;
  limit?: number;
}

function parseBound(text: string, fallback: number): number {
  return text.trim() === '' ? fallback : Number(text);
}

/**
 * Parse "<min>:<max>"; either side may be empty for an open bound
 */
export function parseRangeOption(value: string): NumericRange {
  const parts = value.split(':');
  if (parts.length !== 2) {
    throw new InvalidArgumentError('Expected a range as <min>:<max>, e.g. 10:500');
  }

  const min = parseBound(parts[0], -Infinity);
  const max = parseBound(parts[1], Infinity);
  if (Number.isNaN(min) || Number.isNaN(max)) {
    throw new InvalidArgumentError(`Range bounds must be numbers, got "${value}"`);
  }
  if (min > max) {
    throw new InvalidArgumentError(`Range minimum exceeds maximum in "${value}"`);
  }
  return [min, max];
}

/** Accumulate a repeatable option; unset stays undefined */
export function collectOption(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

export function parseCountOption(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}"`);
  }
  return count;
}

/**
 * Filter spec from CLI options; unset dimensions select everything
 */
export function buildFilterSpec(
  options: FilterOptions,
  cli: Pick<ReportCliOptions, 'country' | 'category' | 'reviews' | 'rating'>
): FilterSpec {
  return {
    countries: cli.country ?? 'all',
    categories: cli.category ?? 'all',
    reviewRange: cli.reviews ?? options.reviewBounds,
    ratingRange: cli.rating ?? options.ratingBounds,
  };
}

function selectRows(view: DashboardView, name: ReportView): readonly object[] {
  switch (name) {
    case 'tours':
      return view.tourRanking;
    case 'cities':
      return view.cityRanking;
    case 'city-metrics':
      return view.cityMetrics;
    case 'categories':
      return view.categoryMetrics;
    case 'hierarchy':
      return view.hierarchy;
    case 'map':
      return view.mapMarkers;
    case 'reviews':
      return view.reviewsVsRatings;
  }
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

export function rowsToCsv(rows: readonly object[]): string {
  if (rows.length === 0) return '';

  const headers = Object.keys(rows[0]);
  const csvRows = rows.map((row) => {
    const csvRow: CsvRow = {};
    for (const [column, value] of Object.entries(row)) {
      csvRow[column] = cellText(value);
    }
    return csvRow;
  });

  return formatCsv({ headers, rows: csvRows });
}

/**
 * Render one view. JSON hierarchy output is the nested tree; CSV output is
 * the flat (country, city, category, count) table.
 */
export function renderReport(view: DashboardView, name: ReportView, format: ReportFormat, limit?: number): string {
  if (format === 'json' && name === 'hierarchy') {
    return JSON.stringify(view.hierarchyTree, null, 2);
  }

  const rows = selectRows(view, name);
  const limited = limit === undefined ? rows : rows.slice(0, limit);

  return format === 'json' ? JSON.stringify(limited, null, 2) : rowsToCsv(limited);
}
