/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Data aggregation engine for the tour dashboard
 *
 * Three single-purpose rollups over the filtered records:
 * - city rollup (map markers, rankings)
 * - category rollup (treemap, scatter)
 * - country -> city -> category counts (sunburst)
 *
 * Rollup rows are ordered by group key ascending.
 */

import { UNCATEGORIZED, type TourRecord } from '@tour-atlas/data';
import { encodeKey, groupRows, mean, modalValue, sortedGroups, sum, type GroupKey } from './group.js';
import type { CategoryMetric, CityMetric, HierarchyNode, HierarchyRow } from './types.js';

// ============================================================================
// Error Types
// ============================================================================

/** Thrown when rollup partials disagree on their key set */
export class AggregationInvariantError extends Error {
  constructor(
    message: string,
    public readonly expectedRows: number,
    public readonly mismatchedKeys: string[]
  ) {
    super(message);
    this.name = 'AggregationInvariantError';
  }
}

// ============================================================================
// City Rollup
// ============================================================================

type PlaceKey = readonly [city: string, country: string];

function placeOf(row: { city: string; country: string }): PlaceKey {
  return [row.city, row.country];
}

/** Encoded (city, country) key shared by rollups and rankings */
export function placeKey(row: { city: string; country: string }): string {
  return encodeKey(placeOf(row));
}

export interface CityCount {
  city: string;
  country: string;
  total_tours: number;
}

export interface CityStats {
  total_reviews: number;
  rating_score: number;
  latitude: number | null;
  longitude: number | null;
}

/** Per-place partial aggregates, each keyed by placeKey() */
export interface CityPartials {
  counts: Map<string, CityCount>;
  stats: Map<string, CityStats>;
  categories: Map<string, string>;
}

/**
 * Compute the three partial aggregates of the city rollup
 */
export function computeCityPartials(records: readonly TourRecord[]): CityPartials {
  const counts = new Map<string, CityCount>();
  const stats = new Map<string, CityStats>();
  const categories = new Map<string, string>();

  for (const group of sortedGroups(groupRows(records, placeOf))) {
    const key = encodeKey(group.key);
    const [city, country] = group.key;
    const located = group.rows.find((r) => r.latitude !== null && r.longitude !== null);

    counts.set(key, { city, country, total_tours: group.rows.length });
    stats.set(key, {
      total_reviews: sum(group.rows.map((r) => r.total_reviews)),
      rating_score: mean(group.rows.map((r) => r.rating_score)),
      latitude: located?.latitude ?? null,
      longitude: located?.longitude ?? null,
    });
    categories.set(key, modalValue(group.rows.map((r) => r.category), UNCATEGORIZED));
  }

  return { counts, stats, categories };
}

/**
 * Join the partials on their shared key. The count partial drives the join;
 * any key missing from, or extra in, another partial is an invariant violation.
 */
export function joinCityPartials(partials: CityPartials): CityMetric[] {
  const { counts, stats, categories } = partials;
  const metrics: CityMetric[] = [];
  const mismatched: string[] = [];

  for (const [key, count] of counts) {
    const stat = stats.get(key);
    const category = categories.get(key);
    if (!stat || category === undefined) {
      mismatched.push(key);
      continue;
    }

    metrics.push({
      city: count.city,
      country: count.country,
      total_tours: count.total_tours,
      total_reviews: stat.total_reviews,
      rating_score: Number.isFinite(stat.rating_score) ? stat.rating_score : 0,
      category,
      latitude: stat.latitude,
      longitude: stat.longitude,
    });
  }

  for (const key of [...stats.keys(), ...categories.keys()]) {
    if (!counts.has(key) && !mismatched.includes(key)) {
      mismatched.push(key);
    }
  }

  if (mismatched.length > 0 || metrics.length !== counts.size) {
    throw new AggregationInvariantError(
      `City rollup join produced ${metrics.length} row(s), expected ${counts.size}`,
      counts.size,
      mismatched
    );
  }

  return metrics;
}

/**
 * One row per (city, country) present in the records
 */
export function aggregateCities(records: readonly TourRecord[]): CityMetric[] {
  return joinCityPartials(computeCityPartials(records));
}

// ============================================================================
// Category Rollup
// ============================================================================

export function aggregateCategories(records: readonly TourRecord[]): CategoryMetric[] {
  return sortedGroups(groupRows(records, (r) => [r.category] as const)).map((group) => ({
    category: group.key[0],
    total_tours: group.rows.length,
    rating_score: mean(group.rows.map((r) => r.rating_score)),
    total_reviews: sum(group.rows.map((r) => r.total_reviews)),
  }));
}

// ============================================================================
// Hierarchy Rollup
// ============================================================================

export function aggregateHierarchy(records: readonly TourRecord[]): HierarchyRow[] {
  return sortedGroups(groupRows(records, (r) => [r.country, r.city, r.category] as const)).map((group) => {
    const [country, city, category] = group.key;
    return { country, city, category, count: group.rows.length };
  });
}

/**
 * Build the country -> city -> category tree. Inner node values are the sum
 * of their leaves; node order follows the rows.
 */
export function buildHierarchyTree(rows: readonly HierarchyRow[]): HierarchyNode[] {
  interface BranchNode extends HierarchyNode {
    children: HierarchyNode[];
  }

  const roots: BranchNode[] = [];
  const branches = new Map<string, BranchNode>();

  const branchOf = (siblings: HierarchyNode[], path: GroupKey): BranchNode => {
    const encoded = encodeKey(path);
    let node = branches.get(encoded);
    if (!node) {
      node = { key: path.join('/'), label: path[path.length - 1], value: 0, children: [] };
      branches.set(encoded, node);
      siblings.push(node);
    }
    return node;
  };

  for (const row of rows) {
    const countryNode = branchOf(roots, [row.country]);
    const cityNode = branchOf(countryNode.children, [row.country, row.city]);

    countryNode.value += row.count;
    cityNode.value += row.count;
    cityNode.children.push({
      key: [row.country, row.city, row.category].join('/'),
      label: row.category,
      value: row.count,
    });
  }

  return roots;
}
