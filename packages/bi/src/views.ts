/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Chart-ready views derived from the rollups
 */

import type { TourRecord } from '@tour-atlas/data';
import { aggregateCategories } from './aggregator.js';
import type { CategoryReviewPoint, CityMetric, MapMarker, ReviewsVsRatingsOptions } from './types.js';

const MIN_CIRCLE_SIZE = 2;
const CIRCLE_SCALE = 0.5;

export const DEFAULT_TOP_CATEGORIES = 20;
export const PINNED_CATEGORY = 'Self-guided Tours';

/**
 * Map markers: places with both coordinates, smallest first so larger
 * circles draw on top.
 */
export function buildMapMarkers(cityMetrics: readonly CityMetric[]): MapMarker[] {
  const markers: MapMarker[] = [];

  for (const metric of cityMetrics) {
    const { latitude, longitude } = metric;
    if (latitude === null || longitude === null) continue;
    markers.push({
      ...metric,
      latitude,
      longitude,
      circle_size: Math.max(metric.total_tours * CIRCLE_SCALE, MIN_CIRCLE_SIZE),
    });
  }

  return markers.sort((a, b) => a.total_tours - b.total_tours);
}

/**
 * Reviews vs ratings per category: the top N categories by summed reviews,
 * followed by the pinned category when it is present and not among them.
 */
export function buildReviewsVsRatings(
  records: readonly TourRecord[],
  options: ReviewsVsRatingsOptions = {}
): CategoryReviewPoint[] {
  const topN = options.topN ?? DEFAULT_TOP_CATEGORIES;
  const pinnedCategory = options.pinnedCategory ?? PINNED_CATEGORY;

  const points = aggregateCategories(records).map((metric) => ({
    category: metric.category,
    avg_rating: metric.rating_score,
    sum_reviews: metric.total_reviews,
  }));

  const pinned = points.find((p) => p.category === pinnedCategory);
  const top = points
    .filter((p) => p.category !== pinnedCategory)
    .sort((a, b) => b.sum_reviews - a.sum_reviews)
    .slice(0, Math.max(topN, 0));

  return pinned ? [...top, pinned] : top;
}
