/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { parseCsv } from './csv.js';
import { loadTours, DatasetSchemaError, parseNumber, presentValue } from './loader.js';
import type { CsvRow, CsvTable } from './types.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const HEADERS = [
  'title',
  'location',
  'country',
  'category',
  'rating_score',
  'rating_review_count',
  'latitude',
  'longitude',
];

function createRow(overrides: CsvRow = {}): CsvRow {
  return {
    title: 'Harbour Cruise',
    location: 'Vancouver, British Columbia',
    country: 'Canada',
    category: 'Cruises',
    rating_score: '4.5',
    rating_review_count: '120',
    latitude: '49.28',
    longitude: '-123.12',
    ...overrides,
  };
}

function createTable(rows: CsvRow[]): CsvTable {
  return { headers: [...HEADERS], rows };
}

// ============================================================================
// loadTours Tests
// ============================================================================

describe('loadTours', () => {
  it('should map raw columns onto canonical records', () => {
    const { records } = loadTours(createTable([createRow()]));

    expect(records).toEqual([
      {
        tour_name: 'Harbour Cruise',
        city: 'Vancouver, British Columbia',
        country: 'Canada',
        category: 'Cruises',
        rating_score: 4.5,
        total_reviews: 120,
        latitude: 49.28,
        longitude: -123.12,
      },
    ]);
  });

  it('should coerce an invalid rating to 0 and a missing category to Uncategorized', () => {
    const { records } = loadTours(
      createTable([createRow({ title: 'A', rating_score: 'bad', category: '', rating_review_count: '5', location: 'X', country: 'US' })])
    );

    expect(records[0].rating_score).toBe(0);
    expect(records[0].category).toBe('Uncategorized');
    expect(records[0].total_reviews).toBe(5);
    expect(records[0].city).toBe('X');
  });

  it('should treat null tokens as missing values', () => {
    const { records } = loadTours(
      createTable([createRow({ category: 'NaN', country: 'N/A', latitude: 'nan', longitude: '' })])
    );

    expect(records[0].category).toBe('Uncategorized');
    expect(records[0].country).toBe('Unknown');
    expect(records[0].latitude).toBeNull();
    expect(records[0].longitude).toBeNull();
  });

  it('should keep the location label verbatim without splitting it', () => {
    const { records } = loadTours(createTable([createRow({ location: 'Whistler, British Columbia' })]));

    expect(records[0].city).toBe('Whistler, British Columbia');
  });

  it('should coerce review counts to non-negative integers', () => {
    const { records } = loadTours(
      createTable([
        createRow({ title: 'a', rating_review_count: '12.0' }),
        createRow({ title: 'b', rating_review_count: '-3' }),
        createRow({ title: 'c', rating_review_count: 'many' }),
      ])
    );

    expect(records.map((r) => r.total_reviews)).toEqual([12, 0, 0]);
  });

  it('should keep the first occurrence of a duplicated tour name', () => {
    const dataset = loadTours(
      createTable([
        createRow({ title: 'Food Walk', location: 'Toronto', rating_score: '4.1' }),
        createRow({ title: 'Other', location: 'Montreal' }),
        createRow({ title: 'Food Walk', location: 'Ottawa', rating_score: '3.0' }),
      ])
    );

    expect(dataset.records).toHaveLength(2);
    expect(dataset.records[0].city).toBe('Toronto');
    expect(dataset.records[0].rating_score).toBe(4.1);
    expect(dataset.sourceRowCount).toBe(3);
    expect(dataset.duplicateCount).toBe(1);
  });

  it('should return frozen records', () => {
    const { records } = loadTours(createTable([createRow()]));

    expect(Object.isFrozen(records)).toBe(true);
    expect(Object.isFrozen(records[0])).toBe(true);
  });

  it('should reject a source missing required columns', () => {
    const table: CsvTable = { headers: ['title', 'location', 'category'], rows: [] };

    expect(() => loadTours(table)).toThrow(DatasetSchemaError);
    try {
      loadTours(table);
    } catch (error) {
      expect(error).toBeInstanceOf(DatasetSchemaError);
      if (error instanceof DatasetSchemaError) {
        expect(error.missingColumns).toEqual([
          'country',
          'rating_score',
          'rating_review_count',
          'latitude',
          'longitude',
        ]);
      }
    }
  });

  it('should accept custom column names', () => {
    const table = parseCsv(
      'name,place,nation,kind,score,reviews,lat,lon\nKayak Trip,Tofino,Canada,Outdoor,4.8,30,49.15,-125.9\n'
    );
    const { records } = loadTours(table, {
      columns: {
        tour_name: 'name',
        city: 'place',
        country: 'nation',
        category: 'kind',
        rating_score: 'score',
        total_reviews: 'reviews',
        latitude: 'lat',
        longitude: 'lon',
      },
    });

    expect(records[0]).toMatchObject({ tour_name: 'Kayak Trip', city: 'Tofino', total_reviews: 30 });
  });

  it('should load an empty table', () => {
    const dataset = loadTours(createTable([]));

    expect(dataset.records).toEqual([]);
    expect(dataset.duplicateCount).toBe(0);
  });
});

// ============================================================================
// Cell Helpers
// ============================================================================

describe('cell helpers', () => {
  it('should parse finite numbers only', () => {
    expect(parseNumber(' 4.25 ')).toBe(4.25);
    expect(parseNumber('abc')).toBeNull();
    expect(parseNumber('')).toBeNull();
    expect(parseNumber(undefined)).toBeNull();
    expect(parseNumber('Infinity')).toBeNull();
  });

  it('should return null for null tokens', () => {
    expect(presentValue('None')).toBeNull();
    expect(presentValue('  ')).toBeNull();
    expect(presentValue('Tours')).toBe('Tours');
  });
});
