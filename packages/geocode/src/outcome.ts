/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { GeocodeOutcome, SentinelReason } from './types.js';

export function ok<T>(value: T): GeocodeOutcome<T> {
  return { status: 'ok', value };
}

export function sentinel<T>(reason: SentinelReason, error?: unknown): GeocodeOutcome<T> {
  return error === undefined ? { status: 'sentinel', reason } : { status: 'sentinel', reason, error };
}

/**
 * Fold a lookup into an outcome: a value is 'ok', null is a
 * 'no-result' sentinel and a rejection is an 'error' sentinel.
 */
export function settle<T>(lookup: Promise<T | null>): Promise<GeocodeOutcome<T>> {
  return lookup.then(
    (value) => (value === null ? sentinel<T>('no-result') : ok<T>(value)),
    (error: unknown) => sentinel<T>('error', error)
  );
}
