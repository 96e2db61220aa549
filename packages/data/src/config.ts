/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Environment-backed configuration
 *
 * Environment Variables:
 *   TOUR_ATLAS_DEBUG               Enable info/debug logging ("true")
 *   TOUR_ATLAS_DATASET             Default dataset CSV path
 *   TOUR_ATLAS_NOMINATIM_URL       Geocoding service base URL
 *   TOUR_ATLAS_USER_AGENT          User-Agent sent to the geocoding service
 *   TOUR_ATLAS_GEOCODE_DELAY_MS    Minimum delay between geocoding calls (default: 1000)
 *   TOUR_ATLAS_GEOCODE_TIMEOUT_MS  Per-request timeout (default: 10000)
 *   TOUR_ATLAS_LANGUAGE            Preferred result language (default: en)
 */

import { createLogger } from './logger.js';

const log = createLogger('Config');

export interface DatasetConfig {
  /** CSV file the dashboard loads */
  datasetPath: string;
}

export interface GeocodeConfig {
  baseUrl: string;
  userAgent: string;
  /** Minimum interval between two requests, in ms */
  minDelayMs: number;
  timeoutMs: number;
  language: string;
}

export const DEFAULT_DATASET_CONFIG: Readonly<DatasetConfig> = {
  datasetPath: 'NorthAmericaTours_with_country.csv',
};

export const DEFAULT_GEOCODE_CONFIG: Readonly<GeocodeConfig> = {
  baseUrl: 'https://nominatim.openstreetmap.org',
  userAgent: 'tour-atlas-geocoder',
  minDelayMs: 1000,
  timeoutMs: 10000,
  language: 'en',
};

function readNonNegativeInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    log.warn(`Ignoring ${name}=${raw}: expected a non-negative integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

export function resolveDatasetConfig(
  overrides: Partial<DatasetConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): DatasetConfig {
  return {
    datasetPath: overrides.datasetPath ?? (env.TOUR_ATLAS_DATASET || DEFAULT_DATASET_CONFIG.datasetPath),
  };
}

/**
 * Merge configuration sources with precedence:
 * explicit overrides > environment variables > defaults
 */
export function resolveGeocodeConfig(
  overrides: Partial<GeocodeConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): GeocodeConfig {
  const fromEnv: GeocodeConfig = {
    baseUrl: env.TOUR_ATLAS_NOMINATIM_URL || DEFAULT_GEOCODE_CONFIG.baseUrl,
    userAgent: env.TOUR_ATLAS_USER_AGENT || DEFAULT_GEOCODE_CONFIG.userAgent,
    minDelayMs: readNonNegativeInt(env, 'TOUR_ATLAS_GEOCODE_DELAY_MS', DEFAULT_GEOCODE_CONFIG.minDelayMs),
    timeoutMs: readNonNegativeInt(env, 'TOUR_ATLAS_GEOCODE_TIMEOUT_MS', DEFAULT_GEOCODE_CONFIG.timeoutMs),
    language: env.TOUR_ATLAS_LANGUAGE || DEFAULT_GEOCODE_CONFIG.language,
  };

  return {
    baseUrl: overrides.baseUrl ?? fromEnv.baseUrl,
    userAgent: overrides.userAgent ?? fromEnv.userAgent,
    minDelayMs: overrides.minDelayMs ?? fromEnv.minDelayMs,
    timeoutMs: overrides.timeoutMs ?? fromEnv.timeoutMs,
    language: overrides.language ?? fromEnv.language,
  };
}
