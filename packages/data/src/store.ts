/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Cached, read-only tour dataset
 *
 * The dataset is loaded once on first access and shared by every later
 * recomputation. invalidate()/reload() are the only invalidation points.
 */

import { readFile } from 'node:fs/promises';
import { parseCsv } from './csv.js';
import { loadTours, type LoadOptions } from './loader.js';
import { createLogger } from './logger.js';
import type { TourDataset } from './types.js';

const log = createLogger('DatasetStore');

/** Produces the raw CSV text of the dataset */
export type DatasetSource = () => Promise<string>;

export class TourDatasetStore {
  private dataset: TourDataset | null = null;
  private pending: Promise<TourDataset> | null = null;
  private version = 0;

  constructor(
    private readonly source: DatasetSource,
    private readonly options: LoadOptions = {}
  ) {}

  /**
   * Store backed by a UTF-8 CSV file on disk
   */
  static fromFile(path: string, options?: LoadOptions): TourDatasetStore {
    return new TourDatasetStore(() => readFile(path, 'utf-8'), options);
  }

  get isLoaded(): boolean {
    return this.dataset !== null;
  }

  /**
   * Return the cached dataset, loading it on first call.
   * Concurrent first calls share one load; a failed load is not cached.
   */
  get(): Promise<TourDataset> {
    if (this.dataset) return Promise.resolve(this.dataset);
    if (this.pending) return this.pending;

    const version = this.version;
    this.pending = this.load().then(
      (dataset) => {
        if (version === this.version) {
          this.dataset = dataset;
          this.pending = null;
        }
        return dataset;
      },
      (error: unknown) => {
        if (version === this.version) {
          this.pending = null;
        }
        throw error;
      }
    );
    return this.pending;
  }

  /**
   * Drop the cached dataset; the next get() loads again
   */
  invalidate(): void {
    this.dataset = null;
    this.pending = null;
    this.version++;
  }

  reload(): Promise<TourDataset> {
    this.invalidate();
    return this.get();
  }

  private async load(): Promise<TourDataset> {
    const startTime = performance.now();
    try {
      const content = await this.source();
      const dataset = loadTours(parseCsv(content), this.options);
      log.info(`Loaded ${dataset.records.length} tours in ${(performance.now() - startTime).toFixed(1)}ms`, {
        operation: 'load',
        data: { sourceRows: dataset.sourceRowCount, duplicates: dataset.duplicateCount },
      });
      return dataset;
    } catch (error) {
      log.error('Failed to load dataset', error, { operation: 'load' });
      throw error;
    }
  }
}
