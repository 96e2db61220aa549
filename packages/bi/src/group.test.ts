/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { compareKeys, encodeKey, groupRows, mean, modalValue, sortedGroups, sum } from './group.js';

describe('groupRows', () => {
  it('should group by composite key in first-encounter order', () => {
    const rows = [
      { city: 'Toronto', country: 'Canada', n: 1 },
      { city: 'Boston', country: 'United States', n: 2 },
      { city: 'Toronto', country: 'Canada', n: 3 },
    ];

    const groups = groupRows(rows, (r) => [r.city, r.country] as const);

    expect(Array.from(groups.values()).map((g) => [g.key, g.rows.map((r) => r.n)])).toEqual([
      [['Toronto', 'Canada'], [1, 3]],
      [['Boston', 'United States'], [2]],
    ]);
  });

  it('should not confuse keys whose parts contain the separator', () => {
    const groups = groupRows(['a|b', 'a'], (value) => (value === 'a' ? ['a|b', ''] : ['a', 'b|']));

    expect(groups.size).toBe(2);
    expect(encodeKey(['a|b', ''])).not.toBe(encodeKey(['a', 'b|']));
  });

  it('should sort groups by key ascending', () => {
    const groups = groupRows(['Quebec', 'Boston', 'Austin'], (city) => [city]);

    expect(sortedGroups(groups).map((g) => g.key[0])).toEqual(['Austin', 'Boston', 'Quebec']);
  });
});

describe('compareKeys', () => {
  it('should compare element by element, shorter first on a shared prefix', () => {
    expect(compareKeys(['Canada', 'Toronto'], ['Canada', 'Victoria'])).toBe(-1);
    expect(compareKeys(['United States'], ['Canada'])).toBe(1);
    expect(compareKeys(['Canada'], ['Canada', 'Toronto'])).toBe(-1);
    expect(compareKeys(['Canada'], ['Canada'])).toBe(0);
  });
});

describe('reducers', () => {
  it('should sum and average', () => {
    expect(sum([1, 2, 3.5])).toBe(6.5);
    expect(mean([4, 5, 3])).toBe(4);
  });

  it('should average an empty list to 0', () => {
    expect(mean([])).toBe(0);
  });

  it('should pick the most frequent value with ties to the first seen', () => {
    expect(modalValue(['Tour', 'Museum', 'Museum'], 'Uncategorized')).toBe('Museum');
    expect(modalValue(['Tour', 'Museum'], 'Uncategorized')).toBe('Tour');
    expect(modalValue([], 'Uncategorized')).toBe('Uncategorized');
  });
});
