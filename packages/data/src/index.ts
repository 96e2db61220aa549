/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @tour-atlas/data - Tour listing records, CSV codec and cached dataset
 */

export type {
  CsvRow,
  CsvTable,
  TourRecord,
  CanonicalColumn,
  ColumnMapping,
  TourDataset,
} from './types.js';
export { DEFAULT_COLUMN_MAPPING, UNCATEGORIZED, UNKNOWN_COUNTRY } from './types.js';

export { parseCsv, formatCsv, type CsvParseOptions, type CsvFormatOptions } from './csv.js';

export {
  loadTours,
  validateSchema,
  presentValue,
  parseNumber,
  DatasetSchemaError,
  type LoadOptions,
} from './loader.js';

export { TourDatasetStore, type DatasetSource } from './store.js';

export {
  resolveDatasetConfig,
  resolveGeocodeConfig,
  DEFAULT_DATASET_CONFIG,
  DEFAULT_GEOCODE_CONFIG,
  type DatasetConfig,
  type GeocodeConfig,
} from './config.js';

export { createLogger, isDebugEnabled, type Logger, type LogContext } from './logger.js';
