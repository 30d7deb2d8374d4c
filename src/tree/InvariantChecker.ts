/**
 * Whole-tree validators. Debug and test aid only; every one walks the
 * entire tree.
 */

import { compareKeys, OrderedKey } from '../common/Types';
import type { IRankedKeys, InvariantName, InvariantReport } from '../interfaces/SymbolTable';
import { TreeNode, isRed, sizeOf } from './TreeNode';

type Node<K extends OrderedKey, V> = TreeNode<K, V> | null;

/**
 * Symmetric order, with keys strictly between the bounds inherited from
 * the ancestors.
 */
export function isBST<K extends OrderedKey, V>(root: Node<K, V>): boolean {
  return isBSTWithin(root, undefined, undefined);
}

function isBSTWithin<K extends OrderedKey, V>(
  node: Node<K, V>,
  min: K | undefined,
  max: K | undefined
): boolean {
  if (node === null) return true;
  if (min !== undefined && compareKeys(node.key, min) <= 0) return false;
  if (max !== undefined && compareKeys(node.key, max) >= 0) return false;
  return isBSTWithin(node.left, min, node.key) && isBSTWithin(node.right, node.key, max);
}

export function countCheck<K extends OrderedKey, V>(node: Node<K, V>): boolean {
  if (node === null) return true;
  if (node.size !== 1 + sizeOf(node.left) + sizeOf(node.right)) return false;
  return countCheck(node.left) && countCheck(node.right);
}

export function rankCheck<K extends OrderedKey>(table: IRankedKeys<K>): boolean {
  const size = table.size();
  for (let i = 0; i < size; i++) {
    if (table.rank(table.select(i)) !== i) return false;
  }
  for (const key of table.keys()) {
    if (compareKeys(table.select(table.rank(key)), key) !== 0) return false;
  }
  return true;
}

/**
 * No red right links and never two red links in a row.
 */
export function is23<K extends OrderedKey, V>(root: Node<K, V>): boolean {
  return is23Below(root, root);
}

function is23Below<K extends OrderedKey, V>(node: Node<K, V>, root: Node<K, V>): boolean {
  if (node === null) return true;
  if (isRed(node.right)) return false;
  if (node !== root && isRed(node) && isRed(node.left)) return false;
  return is23Below(node.left, root) && is23Below(node.right, root);
}

/**
 * Every path from the root to an empty link crosses the same number of
 * black links.
 */
export function isBalanced<K extends OrderedKey, V>(root: Node<K, V>): boolean {
  let black = 0;
  let current = root;
  while (current !== null) {
    if (!isRed(current)) black++;
    current = current.left;
  }
  return hasBlackHeight(root, black);
}

function hasBlackHeight<K extends OrderedKey, V>(node: Node<K, V>, black: number): boolean {
  if (node === null) return black === 0;
  const remaining = isRed(node) ? black : black - 1;
  return hasBlackHeight(node.left, remaining) && hasBlackHeight(node.right, remaining);
}

export function checkInvariants<K extends OrderedKey, V>(
  root: Node<K, V>,
  table: IRankedKeys<K>
): InvariantReport {
  const violations: InvariantName[] = [];

  if (!isBST(root)) violations.push('bst-order');
  if (!countCheck(root)) violations.push('subtree-size');
  // rank/select walk the tree by size, so skip the cross-check once sizes are wrong
  if (violations.length === 0 && !rankCheck(table)) violations.push('rank-select');
  if (!is23(root)) violations.push('two-three');
  if (!isBalanced(root)) violations.push('black-balance');
  if (isRed(root)) violations.push('black-root');

  return { ok: violations.length === 0, violations };
}
