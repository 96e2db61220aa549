/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @tour-atlas/geocode - Offline enrichment of tour listings via Nominatim
 */

export type {
  Coordinates,
  Geocoder,
  GeocodeOutcome,
  SentinelReason,
  GeocodeSummary,
  GeocodeJobResult,
} from './types.js';
export { GEOCODE_COLUMNS } from './types.js';

export { ok, sentinel, settle } from './outcome.js';
export { MinIntervalThrottle, type ThrottleClock } from './throttle.js';
export { NominatimClient, GeocodeServiceError } from './nominatim.js';
export {
  runGeocodeJob,
  reverseGeocodeCountries,
  forwardGeocodeCoordinates,
  fillUnknownCountries,
  type GeocodeJob,
  type RowTask,
} from './jobs.js';
export { runFileJob, parseMillisOption, JOBS, type JobName, type GeocodeCliOptions } from './run.js';
