/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Dashboard pipeline - one full recomputation per filter change
 */

import { createLogger, type TourRecord } from '@tour-atlas/data';
import {
  aggregateCategories,
  aggregateCities,
  aggregateHierarchy,
  buildHierarchyTree,
} from './aggregator.js';
import { applyFilters } from './filter.js';
import { DEFAULT_SORT, rankCities, rankTours } from './ranking.js';
import type { CityMetric, DashboardView, FilterSpec, ReviewsVsRatingsOptions, SortSpec } from './types.js';
import { buildMapMarkers, buildReviewsVsRatings } from './views.js';

const log = createLogger('Dashboard');

export interface DashboardOptions {
  sort?: SortSpec;
  reviewsVsRatings?: ReviewsVsRatingsOptions;
}

/**
 * Filter, aggregate and rank in one synchronous pass.
 * An aggregation invariant violation is logged and rethrown; no partial view
 * is returned.
 */
export function computeDashboard(
  records: readonly TourRecord[],
  filterSpec: FilterSpec,
  options: DashboardOptions = {}
): DashboardView {
  const startTime = performance.now();
  const sort = options.sort ?? DEFAULT_SORT;

  const filtered = applyFilters(records, filterSpec);

  let cityMetrics: CityMetric[];
  try {
    cityMetrics = aggregateCities(filtered);
  } catch (error) {
    log.error('Error calculating city metrics', error, {
      operation: 'computeDashboard',
      data: { filteredRows: filtered.length },
    });
    throw error;
  }

  const hierarchy = aggregateHierarchy(filtered);

  const view: DashboardView = {
    filtered,
    cityMetrics,
    categoryMetrics: aggregateCategories(filtered),
    hierarchy,
    hierarchyTree: buildHierarchyTree(hierarchy),
    tourRanking: rankTours(filtered, cityMetrics, sort.key, sort.direction),
    cityRanking: rankCities(filtered),
    mapMarkers: buildMapMarkers(cityMetrics),
    reviewsVsRatings: buildReviewsVsRatings(filtered, options.reviewsVsRatings),
    computeTimeMs: performance.now() - startTime,
  };

  log.debug(`Recomputed dashboard in ${view.computeTimeMs.toFixed(1)}ms`, {
    rows: filtered.length,
    places: cityMetrics.length,
  });

  return view;
}
