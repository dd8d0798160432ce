/**
 * Hashing utilities for record fingerprints
 */

import { createHash } from 'crypto';

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function hashObject(obj: unknown): string {
  // Sort keys for deterministic hashing
  const str = JSON.stringify(obj, (_key, value: unknown) => {
    if (isPlainRecord(value)) {
      return Object.keys(value)
        .sort()
        .reduce((sorted: Record<string, unknown>, k) => {
          sorted[k] = value[k];
          return sorted;
        }, {});
    }
    return value;
  });
  return hashString(str);
}

export function hashString(str: string): string {
  return createHash('sha256').update(str).digest('hex');
}
