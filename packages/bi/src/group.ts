/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Composite-key grouping shared by every rollup
 */

export type GroupKey = readonly string[];

export interface Group<T, K extends GroupKey> {
  key: K;
  /** Members in input order */
  rows: T[];
}

/** Encode a composite key; distinct tuples never collide */
export function encodeKey(key: GroupKey): string {
  return JSON.stringify(key);
}

/**
 * Group rows by a composite key. Groups appear in first-encounter order.
 */
export function groupRows<T, K extends GroupKey>(
  rows: readonly T[],
  keyOf: (row: T) => K
): Map<string, Group<T, K>> {
  const groups = new Map<string, Group<T, K>>();

  for (const row of rows) {
    const key = keyOf(row);
    const encoded = encodeKey(key);
    let group = groups.get(encoded);
    if (!group) {
      group = { key, rows: [] };
      groups.set(encoded, group);
    }
    group.rows.push(row);
  }

  return groups;
}

/** Lexicographic comparison of key tuples, element by element */
export function compareKeys(a: GroupKey, b: GroupKey): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] < b[i]) return -1;
    if (a[i] > b[i]) return 1;
  }
  return a.length - b.length;
}

/**
 * Groups ordered by key ascending
 */
export function sortedGroups<T, K extends GroupKey>(groups: Map<string, Group<T, K>>): Group<T, K>[] {
  return Array.from(groups.values()).sort((a, b) => compareKeys(a.key, b.key));
}

export function sum(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

/** Arithmetic mean; 0 for an empty list or a non-finite result */
export function mean(values: readonly number[]): number {
  const value = sum(values) / values.length;
  return Number.isFinite(value) ? value : 0;
}

/**
 * Most frequent value; ties go to the value encountered first.
 */
export function modalValue(values: readonly string[], fallback: string): string {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let best = fallback;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}
