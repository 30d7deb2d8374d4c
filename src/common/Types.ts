/**
 * Common type definitions shared by the tree, the client and the HTTP layer.
 */

import { InvalidArgumentError } from './Errors';

/**
 * Keys need a strict total order under `<` and `>`.
 * Strings compare by UTF-16 code unit, not by locale.
 */
export type OrderedKey = string | number | bigint;

/**
 * Strings never order against numbers under `<`, so mixing them is rejected.
 * Numbers and bigints compare exactly and may share one map.
 */
export function compareKeys<K extends OrderedKey>(a: K, b: K): number {
  if ((typeof a === 'string') !== (typeof b === 'string')) {
    throw new InvalidArgumentError(`cannot compare keys of type ${typeof a} and ${typeof b}`);
  }
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Runtime guard for callers that bypass the type checker (JSON bodies, plain JS).
 */
export function requireKey<K extends OrderedKey>(key: K | null | undefined, operation: string): K {
  if (key === null || key === undefined) {
    throw new InvalidArgumentError(`argument to ${operation}() is ${String(key)}`);
  }
  if (typeof key === 'number' && Number.isNaN(key)) {
    throw new InvalidArgumentError(`argument to ${operation}() is NaN`);
  }
  return key;
}
