// SPDX-License-Identifier: Apache-2.0

import crypto from 'node:crypto';

/**
 * JSON with the keys of every object sorted, so that equal values always serialize to the same text.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key: string, nested: unknown): unknown => {
    if (typeof nested !== 'object' || nested === null || Array.isArray(nested)) {
      return nested;
    }
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(nested).sort()) {
      sorted[key] = Reflect.get(nested, key);
    }
    return sorted;
  });
}

/** SHA-256 of the canonical JSON form, hex encoded */
export function appliedHash(value: unknown): string {
  return crypto.createHash('sha256').update(canonicalJson(value)).digest('hex');
}
