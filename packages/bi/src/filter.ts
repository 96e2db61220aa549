/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Filter engine - applies the user's filter specification to tour records
 */

import type { TourRecord } from '@tour-atlas/data';
import { ALL_MARKER, type FilterOptions, type FilterSpec, type Selection } from './types.js';

/**
 * True when the selection bypasses its dimension: 'all', or the "All"
 * marker anywhere in the list
 */
export function selectsAll(selection: Selection): boolean {
  return selection === 'all' || selection.includes(ALL_MARKER);
}

function toMembership(selection: Selection): Set<string> | null {
  if (selectsAll(selection)) return null;
  return new Set<string>(selection);
}

/**
 * Keep the records matching every active predicate.
 * Membership within a dimension, AND across dimensions, ranges inclusive.
 */
export function applyFilters(records: readonly TourRecord[], spec: FilterSpec): TourRecord[] {
  const countries = toMembership(spec.countries);
  const categories = toMembership(spec.categories);
  const [minReviews, maxReviews] = spec.reviewRange;
  const [minRating, maxRating] = spec.ratingRange;

  return records.filter(
    (record) =>
      (countries === null || countries.has(record.country)) &&
      (categories === null || categories.has(record.category)) &&
      record.total_reviews >= minReviews &&
      record.total_reviews <= maxReviews &&
      record.rating_score >= minRating &&
      record.rating_score <= maxRating
  );
}

function distinctSorted(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort();
}

/**
 * Derive the filter choices from the full dataset: sorted countries and
 * categories behind the "All" marker, and the review/rating bounds.
 */
export function discoverFilterOptions(records: readonly TourRecord[]): FilterOptions {
  if (records.length === 0) {
    return {
      countries: [ALL_MARKER],
      categories: [ALL_MARKER],
      reviewBounds: [0, 0],
      ratingBounds: [0, 0],
    };
  }

  let minReviews = Infinity;
  let maxReviews = -Infinity;
  let minRating = Infinity;
  let maxRating = -Infinity;

  for (const record of records) {
    minReviews = Math.min(minReviews, record.total_reviews);
    maxReviews = Math.max(maxReviews, record.total_reviews);
    minRating = Math.min(minRating, record.rating_score);
    maxRating = Math.max(maxRating, record.rating_score);
  }

  return {
    countries: [ALL_MARKER, ...distinctSorted(records.map((r) => r.country))],
    categories: [ALL_MARKER, ...distinctSorted(records.map((r) => r.category))],
    reviewBounds: [Math.floor(minReviews), Math.floor(maxReviews)],
    ratingBounds: [minRating, maxRating],
  };
}

/**
 * Filter spec that selects every record the options were derived from
 */
export function defaultFilterSpec(options: FilterOptions): FilterSpec {
  return {
    countries: 'all',
    categories: 'all',
    reviewRange: options.reviewBounds,
    ratingRange: options.ratingBounds,
  };
}
