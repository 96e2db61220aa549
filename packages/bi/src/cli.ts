#!/usr/bin/env node
/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CLI for the tour dashboard data layer
 *
 * Loads the listings, applies the filters and prints one rollup or ranking.
 */

import { Command, Option } from 'commander';
import { TourDatasetStore, resolveDatasetConfig } from '@tour-atlas/data';
import { computeDashboard } from './dashboard.js';
import { discoverFilterOptions } from './filter.js';
import { SORT_OPTIONS } from './ranking.js';
import {
  REPORT_FORMATS,
  REPORT_VIEWS,
  buildFilterSpec,
  collectOption,
  parseCountOption,
  parseRangeOption,
  renderReport,
  type ReportCliOptions,
} from './report.js';

const program = new Command();

program
  .name('tour-atlas')
  .description('Filter, aggregate and rank tour listings')
  .version('0.1.0')
  .argument('[dataset]', 'Tour listings CSV (default: $TOUR_ATLAS_DATASET)')
  .option('--country <name>', 'Country to include, repeatable ("All" keeps every country)', collectOption)
  .option('--category <name>', 'Category to include, repeatable ("All" keeps every category)', collectOption)
  .option('--reviews <min:max>', 'Inclusive total review range', parseRangeOption)
  .option('--rating <min:max>', 'Inclusive rating score range', parseRangeOption)
  .addOption(new Option('--sort <key>', 'Sort tours by').choices(Object.values(SORT_OPTIONS)).default('total_reviews'))
  .addOption(new Option('--order <direction>', 'Sort direction').choices(['asc', 'desc']).default('desc'))
  .addOption(new Option('--view <view>', 'Table to print').choices([...REPORT_VIEWS]).default('tours'))
  .addOption(new Option('--format <format>', 'Output format').choices([...REPORT_FORMATS]).default('json'))
  .option('-n, --limit <count>', 'Print at most this many rows', parseCountOption)
  .action(async (dataset: string | undefined, options: ReportCliOptions) => {
    const { datasetPath } = resolveDatasetConfig({ datasetPath: dataset });
    const { records } = await TourDatasetStore.fromFile(datasetPath).get();

    const filterSpec = buildFilterSpec(discoverFilterOptions(records), options);
    const view = computeDashboard(records, filterSpec, {
      sort: { key: options.sort, direction: options.order },
    });

    console.log(renderReport(view, options.view, options.format, options.limit));
  });

program.parseAsync().catch((error: unknown) => {
  console.error('\nError:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
