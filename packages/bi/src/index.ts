/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @tour-atlas/bi - Filtering, rollups and rankings for the tour dashboard
 *
 * Produces plain tables for an external presentation layer.
 */

// Types
export type {
  Selection,
  NumericRange,
  FilterSpec,
  FilterOptions,
  CityMetric,
  CategoryMetric,
  HierarchyRow,
  HierarchyNode,
  SortKey,
  SortDirection,
  SortSpec,
  RankedTour,
  CityRanking,
  MapMarker,
  CategoryReviewPoint,
  ReviewsVsRatingsOptions,
  DashboardView,
} from './types.js';
export { ALL_MARKER } from './types.js';

// Filter engine
export { applyFilters, selectsAll, discoverFilterOptions, defaultFilterSpec } from './filter.js';

// Aggregation engine
export {
  aggregateCities,
  aggregateCategories,
  aggregateHierarchy,
  buildHierarchyTree,
  computeCityPartials,
  joinCityPartials,
  placeKey,
  AggregationInvariantError,
} from './aggregator.js';
export type { CityCount, CityStats, CityPartials } from './aggregator.js';
export { groupRows, compareKeys, modalValue, type Group, type GroupKey } from './group.js';

// Ranking
export { rankTours, rankCities, SORT_OPTIONS, DEFAULT_SORT } from './ranking.js';

// Chart views
export { buildMapMarkers, buildReviewsVsRatings, DEFAULT_TOP_CATEGORIES, PINNED_CATEGORY } from './views.js';

// Pipeline
export { computeDashboard, type DashboardOptions } from './dashboard.js';
