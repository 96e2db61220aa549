/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { Command, InvalidArgumentError } from 'commander';
import type { TourRecord } from '@tour-atlas/data';
import { computeDashboard } from './dashboard.js';
import { discoverFilterOptions } from './filter.js';
import { buildFilterSpec, collectOption, parseCountOption, parseRangeOption, renderReport, rowsToCsv } from './report.js';

function createTour(tour_name: string, overrides: Partial<TourRecord> = {}): TourRecord {
  return {
    tour_name,
    city: 'Toronto',
    country: 'Canada',
    category: 'Food Tours',
    rating_score: 4,
    total_reviews: 0,
    latitude: null,
    longitude: null,
    ...overrides,
  };
}

const TOURS: TourRecord[] = [
  createTour('a', { total_reviews: 100, rating_score: 4 }),
  createTour('b', { category: 'Cruises', total_reviews: 50, rating_score: 5 }),
  createTour('c', { category: 'Cruises', total_reviews: 10, rating_score: 3 }),
  createTour('d', { city: 'Boston', country: 'United States', total_reviews: 200, rating_score: 4.5 }),
  createTour('e', { city: 'Portland', country: 'United States', category: 'Hiking', total_reviews: 5, rating_score: 4 }),
];

// ============================================================================
// Option Parsing
// ============================================================================

describe('parseRangeOption', () => {
  it('should parse closed and open ranges', () => {
    expect(parseRangeOption('10:500')).toEqual([10, 500]);
    expect(parseRangeOption('3.5:')).toEqual([3.5, Infinity]);
    expect(parseRangeOption(':20')).toEqual([-Infinity, 20]);
  });

  it('should reject malformed ranges', () => {
    expect(() => parseRangeOption('10')).toThrow(InvalidArgumentError);
    expect(() => parseRangeOption('1:2:3')).toThrow(InvalidArgumentError);
    expect(() => parseRangeOption('low:high')).toThrow('Range bounds must be numbers, got "low:high"');
    expect(() => parseRangeOption('5:1')).toThrow('Range minimum exceeds maximum in "5:1"');
  });
});

describe('collectOption', () => {
  it('should accumulate repeated values in order', () => {
    expect(collectOption('Canada', undefined)).toEqual(['Canada']);
    expect(collectOption('Mexico', ['Canada'])).toEqual(['Canada', 'Mexico']);
  });

  it('should leave a dataset path after a repeated option as the argument', () => {
    const program = new Command()
      .exitOverride()
      .argument('[dataset]')
      .option('--country <name>', 'Country', collectOption)
      .action(() => {});

    program.parse(['--country', 'Canada', '--country', 'Mexico', 'tours.csv'], { from: 'user' });

    expect(program.opts()).toEqual({ country: ['Canada', 'Mexico'] });
    expect(program.args).toEqual(['tours.csv']);
  });
});

describe('parseCountOption', () => {
  it('should accept non-negative integers only', () => {
    expect(parseCountOption('0')).toBe(0);
    expect(parseCountOption('25')).toBe(25);
    expect(() => parseCountOption('-1')).toThrow(InvalidArgumentError);
    expect(() => parseCountOption('2.5')).toThrow(InvalidArgumentError);
  });
});

describe('buildFilterSpec', () => {
  it('should select everything for unset options', () => {
    expect(buildFilterSpec(discoverFilterOptions(TOURS), {})).toEqual({
      countries: 'all',
      categories: 'all',
      reviewRange: [5, 200],
      ratingRange: [3, 5],
    });
  });

  it('should pass explicit selections through', () => {
    const spec = buildFilterSpec(discoverFilterOptions(TOURS), {
      country: ['Canada'],
      category: ['Cruises'],
      reviews: [20, Infinity],
    });

    expect(spec).toEqual({
      countries: ['Canada'],
      categories: ['Cruises'],
      reviewRange: [20, Infinity],
      ratingRange: [3, 5],
    });
  });
});

// ============================================================================
// Rendering
// ============================================================================

describe('renderReport', () => {
  const view = computeDashboard(TOURS, buildFilterSpec(discoverFilterOptions(TOURS), {}));

  it('should render a rollup as CSV', () => {
    expect(renderReport(view, 'categories', 'csv')).toBe(
      'category,total_tours,rating_score,total_reviews\n' +
        'Cruises,2,4,60\n' +
        'Food Tours,2,4.25,300\n' +
        'Hiking,1,4,5\n'
    );
  });

  it('should write null cells as empty CSV fields', () => {
    const csv = renderReport(view, 'city-metrics', 'csv', 1);

    expect(csv).toBe(
      'city,country,total_tours,total_reviews,rating_score,category,latitude,longitude\n' +
        'Boston,United States,1,200,4.5,Food Tours,,\n'
    );
  });

  it('should quote categories lists in the city ranking', () => {
    const csv = renderReport(view, 'cities', 'csv', 2);

    expect(csv.split('\n')[2]).toBe('2,Toronto,Canada,160,4,3,"Cruises, Food Tours"');
  });

  it('should limit JSON rows', () => {
    const rows: unknown = JSON.parse(renderReport(view, 'tours', 'json', 2));

    expect(Array.isArray(rows) && rows.length).toBe(2);
  });

  it('should render the hierarchy as a nested tree in JSON', () => {
    const tree: unknown = JSON.parse(renderReport(view, 'hierarchy', 'json'));

    expect(tree).toEqual(view.hierarchyTree);
  });

  it('should render the hierarchy as flat rows in CSV', () => {
    expect(renderReport(view, 'hierarchy', 'csv', 1)).toBe('country,city,category,count\nCanada,Toronto,Cruises,2\n');
  });

  it('should render no rows as an empty string', () => {
    expect(rowsToCsv([])).toBe('');
  });
});
