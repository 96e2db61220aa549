/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Core types for the tour dashboard data layer
 */

import type { TourRecord } from '@tour-atlas/data';

// ============================================================================
// Filter Specification
// ============================================================================

/** Selection entry that bypasses a dimension's filter */
export const ALL_MARKER = 'All';

/** 'all', or the selected values of a multi-select */
export type Selection = 'all' | readonly string[];

/** Inclusive [min, max] */
export type NumericRange = readonly [min: number, max: number];

export interface FilterSpec {
  countries: Selection;
  categories: Selection;
  reviewRange: NumericRange;
  ratingRange: NumericRange;
}

/** Choices offered to the user, derived from the full dataset */
export interface FilterOptions {
  /** ALL_MARKER followed by sorted distinct countries */
  countries: string[];
  /** ALL_MARKER followed by sorted distinct categories */
  categories: string[];
  reviewBounds: NumericRange;
  ratingBounds: NumericRange;
}

// ============================================================================
// Rollups
// ============================================================================

export interface CityMetric {
  city: string;
  country: string;
  total_tours: number;
  total_reviews: number;
  /** Mean rating of the place's tours */
  rating_score: number;
  /** Most frequent category; ties go to the first encountered */
  category: string;
  /** Coordinates of the first tour in the group that has both (not a centroid) */
  latitude: number | null;
  longitude: number | null;
}

export interface CategoryMetric {
  category: string;
  total_tours: number;
  rating_score: number;
  total_reviews: number;
}

export interface HierarchyRow {
  country: string;
  city: string;
  category: string;
  count: number;
}

/** Country -> city -> category tree for sunburst/treemap charts */
export interface HierarchyNode {
  /** Path key, e.g. "Canada/Toronto/Food Tours" */
  key: string;
  label: string;
  value: number;
  children?: HierarchyNode[];
}

// ============================================================================
// Rankings
// ============================================================================

export type SortKey = 'total_reviews' | 'rating_score' | 'total_tours';

export type SortDirection = 'asc' | 'desc';

export interface SortSpec {
  key: SortKey;
  direction: SortDirection;
}

export interface RankedTour extends TourRecord {
  /** 1-based rank */
  position: number;
  /** Tour count of the row's place; null when the place has no rollup entry */
  total_tours: number | null;
}

export interface CityRanking {
  position: number;
  city: string;
  country: string;
  total_reviews: number;
  rating_score: number;
  total_tours: number;
  /** Sorted, de-duplicated categories joined with ", " */
  category: string;
}

// ============================================================================
// Chart Views
// ============================================================================

export interface MapMarker extends CityMetric {
  latitude: number;
  longitude: number;
  circle_size: number;
}

export interface CategoryReviewPoint {
  category: string;
  avg_rating: number;
  sum_reviews: number;
}

export interface ReviewsVsRatingsOptions {
  /** Categories kept besides the pinned one (default: 20) */
  topN?: number;
  /** Category always shown when present (default: "Self-guided Tours") */
  pinnedCategory?: string;
}

export interface DashboardView {
  filtered: TourRecord[];
  cityMetrics: CityMetric[];
  categoryMetrics: CategoryMetric[];
  hierarchy: HierarchyRow[];
  hierarchyTree: HierarchyNode[];
  tourRanking: RankedTour[];
  cityRanking: CityRanking[];
  mapMarkers: MapMarker[];
  reviewsVsRatings: CategoryReviewPoint[];
  /** Computation time in ms (for perf monitoring) */
  computeTimeMs: number;
}
