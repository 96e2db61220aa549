#!/usr/bin/env node
/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CLI for the offline geocoding jobs
 *
 * Each command reads <input>, runs one job and writes <output>. The input file
 * is never modified.
 */

import { Command } from 'commander';
import { NominatimClient } from './nominatim.js';
import { runFileJob, parseMillisOption, type GeocodeCliOptions, type JobName } from './run.js';

const program = new Command();

program
  .name('tour-geocode')
  .description('Enrich tour listings with countries and coordinates via Nominatim')
  .version('0.1.0')
  .option('--url <url>', 'Nominatim base URL (default: $TOUR_ATLAS_NOMINATIM_URL)')
  .option('--user-agent <agent>', 'User-Agent sent with every request (default: $TOUR_ATLAS_USER_AGENT)')
  .option('--language <code>', 'Preferred result language (default: $TOUR_ATLAS_LANGUAGE or en)')
  .option('--delay <ms>', 'Minimum delay between requests (default: 1000)', parseMillisOption)
  .option('--timeout <ms>', 'Per-request timeout (default: 10000)', parseMillisOption);

const commands: Array<[JobName, string]> = [
  ['countries', 'Reverse-geocode every row into a country column'],
  ['coordinates', 'Fill missing latitude/longitude from the location column'],
  ['fill-unknown', 'Retry reverse geocoding for rows whose country is "Unknown"'],
];

for (const [name, description] of commands) {
  program
    .command(name)
    .description(description)
    .argument('<input>', 'Source CSV')
    .argument('<output>', 'CSV to write')
    .action(async (input: string, output: string) => {
      const options = program.opts<GeocodeCliOptions>();
      const geocoder = NominatimClient.fromEnv({
        baseUrl: options.url,
        userAgent: options.userAgent,
        language: options.language,
        minDelayMs: options.delay,
        timeoutMs: options.timeout,
      });

      const summary = await runFileJob(name, input, output, geocoder);
      console.log(
        `Wrote ${output}: ${summary.total} rows, ${summary.attempted} attempted, ` +
          `${summary.resolved} resolved, ${summary.sentinel} sentinel, ${summary.skipped} skipped`
      );
    });
}

program.parseAsync().catch((error: unknown) => {
  console.error('\nError:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
