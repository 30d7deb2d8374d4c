import type { OrderedKey } from '../common/Types';

export interface ISymbolTable<K extends OrderedKey, V> {
  /**
   * Insert or overwrite. Overwriting leaves size() unchanged.
   */
  put(key: K, value: V): void;
  get(key: K): V | undefined;

  /**
   * Remove a key. Deleting an absent key is a no-op.
   *
   * @returns true when a key was removed
   */
  delete(key: K): boolean;
  contains(key: K): boolean;
  size(): number;
  isEmpty(): boolean;
}

export interface InvariantReport {
  readonly ok: boolean;
  readonly violations: readonly InvariantName[];
}

export type InvariantName =
  | 'bst-order'
  | 'subtree-size'
  | 'rank-select'
  | 'two-three'
  | 'black-balance'
  | 'black-root';

/**
 * The order-statistic subset the rank/select cross-check needs.
 */
export interface IRankedKeys<K extends OrderedKey> {
  size(): number;
  rank(key: K): number;
  select(rank: number): K;
  keys(): K[];
}

export interface IOrderedSymbolTable<K extends OrderedKey, V>
  extends ISymbolTable<K, V>, IRankedKeys<K> {
  min(): K;
  max(): K;
  deleteMin(): K;
  deleteMax(): K;
  floor(key: K): K;
  ceil(key: K): K;

  /**
   * Keys in [lo, hi], both bounds inclusive, in ascending order.
   * Each call returns a fresh array.
   */
  rangeKeys(lo: K, hi: K): K[];
  keySize(lo: K, hi: K): number;
  height(): number;
  levelOrder(): K[][];
  check(): InvariantReport;
}
