/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Ranking/sort service - orders tours and places for the rankings tables
 *
 * All sorts are stable: rows with equal sort values keep their input order.
 */

import type { TourRecord } from '@tour-atlas/data';
import { placeKey } from './aggregator.js';
import { groupRows, mean, sortedGroups, sum } from './group.js';
import type { CityMetric, CityRanking, RankedTour, SortDirection, SortKey, SortSpec } from './types.js';

/** Display label -> sort key, in menu order */
export const SORT_OPTIONS: Readonly<Record<string, SortKey>> = {
  'Total Reviews': 'total_reviews',
  'Rating Score': 'rating_score',
  'Total Tours': 'total_tours',
};

export const DEFAULT_SORT: Readonly<SortSpec> = { key: 'total_reviews', direction: 'desc' };

/** Compare nullable numbers; nulls sort last in either direction */
function compareValues(a: number | null, b: number | null, direction: SortDirection): number {
  if (a === null || b === null) {
    if (a === b) return 0;
    return a === null ? 1 : -1;
  }
  return direction === 'asc' ? a - b : b - a;
}

/**
 * Order tour rows by a metric and annotate each with its place's tour count.
 *
 * total_tours is a place-level metric: every row takes its place's rollup
 * value, so rows of one place share a sort value. A row whose place has no
 * rollup entry gets total_tours = null.
 */
export function rankTours(
  records: readonly TourRecord[],
  cityMetrics: readonly CityMetric[],
  key: SortKey,
  direction: SortDirection = 'desc'
): RankedTour[] {
  const toursByPlace = new Map<string, number>();
  for (const metric of cityMetrics) {
    toursByPlace.set(placeKey(metric), metric.total_tours);
  }

  const joined = records.map((record) => ({
    ...record,
    total_tours: toursByPlace.get(placeKey(record)) ?? null,
  }));

  joined.sort((a, b) => compareValues(a[key], b[key], direction));

  return joined.map((row, index) => ({ ...row, position: index + 1 }));
}

/**
 * One row per place ordered by summed reviews descending, with the place's
 * categories listed alphabetically.
 */
export function rankCities(records: readonly TourRecord[]): CityRanking[] {
  const groups = sortedGroups(groupRows(records, (r) => [r.city, r.country] as const));

  const rows = groups.map((group) => ({
    city: group.key[0],
    country: group.key[1],
    total_reviews: sum(group.rows.map((r) => r.total_reviews)),
    rating_score: mean(group.rows.map((r) => r.rating_score)),
    total_tours: group.rows.length,
    category: Array.from(new Set(group.rows.map((r) => r.category))).sort().join(', '),
  }));

  rows.sort((a, b) => b.total_reviews - a.total_reviews);

  return rows.map((row, index) => ({ position: index + 1, ...row }));
}
