/**
 * OrderedMap - symbol table backed by a left-leaning red-black BST
 *
 * Red links only lean left, so every insert and delete is repaired by the
 * three local cases in `balance()` on the way back up the recursion. The
 * tree stays in 1-1 correspondence with a 2-3 tree, which bounds its height
 * by 2 * log2(n + 1).
 *
 * Each node also stores its subtree size, which gives rank() and select()
 * in O(log n).
 *
 * Not safe for overlapping writers: callers that share one instance must
 * serialise access themselves.
 */

import {
  InvalidArgumentError,
  InvariantViolationError,
  NotFoundError,
  OutOfRangeError,
  UnderflowError,
} from '../common/Errors';
import { compareKeys, requireKey } from '../common/Types';
import type { OrderedKey } from '../common/Types';
import type { IOrderedSymbolTable, InvariantReport } from '../interfaces/SymbolTable';
import { balance, moveRedLeft, moveRedRight, rotateRight } from './Balance';
import {
  checkInvariants,
  countCheck,
  is23,
  isBalanced,
  isBST,
  rankCheck,
} from './InvariantChecker';
import {
  Color,
  TreeNode,
  createNode,
  isRed,
  maxNode,
  minNode,
  sizeOf,
} from './TreeNode';

type Node<K, V> = TreeNode<K, V> | null;

export class OrderedMap<K extends OrderedKey, V> implements IOrderedSymbolTable<K, V> {
  private root: Node<K, V> = null;

  constructor(init: Iterable<[K, V]> = []) {
    for (const [key, value] of init) {
      this.put(key, value);
    }
  }

  size(): number {
    return sizeOf(this.root);
  }

  isEmpty(): boolean {
    return this.root === null;
  }

  /**
   * Time complexity: O(log n)
   */
  get(key: K): V | undefined {
    return this.findNode(requireKey(key, 'get'))?.value;
  }

  contains(key: K): boolean {
    return this.findNode(requireKey(key, 'contains')) !== null;
  }

  // === Insertion ===

  /**
   * Insert a key or overwrite its value.
   * Time complexity: O(log n)
   *
   * A null or undefined value is rejected; use delete() to remove a key.
   */
  put(key: K, value: V): void {
    const checked = requireKey(key, 'put');
    if (value === undefined || value === null) {
      throw new InvalidArgumentError(
        `value passed to put(${String(checked)}) is ${String(value)}; use delete() to remove a key`
      );
    }

    const root = this.insert(this.root, checked, value);
    root.color = Color.BLACK;
    this.root = root;
  }

  private insert(node: Node<K, V>, key: K, value: V): TreeNode<K, V> {
    if (node === null) {
      return createNode(key, value);
    }

    const cmp = compareKeys(key, node.key);
    if (cmp < 0) {
      node.left = this.insert(node.left, key, value);
    } else if (cmp > 0) {
      node.right = this.insert(node.right, key, value);
    } else {
      node.value = value;
    }

    return balance(node);
  }

  // === Deletion ===

  /**
   * Time complexity: O(log n)
   *
   * Absent keys are detected up front so a miss never rotates anything.
   */
  delete(key: K): boolean {
    const checked = requireKey(key, 'delete');
    if (this.root === null || this.findNode(checked) === null) {
      return false;
    }

    this.root = this.removeKey(this.borrowRootRed(this.root), checked);
    this.blackenRoot();
    return true;
  }

  deleteMin(): K {
    if (this.root === null) {
      throw new UnderflowError('deleteMin');
    }

    const key = minNode(this.root).key;
    this.root = this.removeMin(this.borrowRootRed(this.root));
    this.blackenRoot();
    return key;
  }

  deleteMax(): K {
    if (this.root === null) {
      throw new UnderflowError('deleteMax');
    }

    const key = maxNode(this.root).key;
    this.root = this.removeMax(this.borrowRootRed(this.root));
    this.blackenRoot();
    return key;
  }

  clear(): void {
    this.root = null;
  }

  /**
   * A delete pushes a red link down ahead of itself, so it starts with one
   * at the root.
   */
  private borrowRootRed(root: TreeNode<K, V>): TreeNode<K, V> {
    if (!isRed(root.left) && !isRed(root.right)) {
      root.color = Color.RED;
    }
    return root;
  }

  private blackenRoot(): void {
    if (this.root !== null) {
      this.root.color = Color.BLACK;
    }
  }

  private removeMin(h: Node<K, V>): Node<K, V> {
    if (h === null || h.left === null) {
      return null;
    }

    if (!isRed(h.left) && !isRed(h.left.left)) {
      h = moveRedLeft(h);
    }

    h.left = this.removeMin(h.left);
    return balance(h);
  }

  private removeMax(h: Node<K, V>): Node<K, V> {
    if (h === null) {
      return null;
    }

    if (isRed(h.left)) {
      h = rotateRight(h);
    }
    if (h.right === null) {
      return null;
    }
    if (!isRed(h.right) && !isRed(h.right.left)) {
      h = moveRedRight(h);
    }

    h.right = this.removeMax(h.right);
    return balance(h);
  }

  /**
   * Precondition: key is present in the subtree rooted at h.
   */
  private removeKey(h: Node<K, V>, key: K): Node<K, V> {
    if (h === null) {
      return null;
    }

    if (compareKeys(key, h.key) < 0) {
      if (!isRed(h.left) && !isRed(h.left?.left)) {
        h = moveRedLeft(h);
      }
      h.left = this.removeKey(h.left, key);
    } else {
      if (isRed(h.left)) {
        h = rotateRight(h);
      }
      if (compareKeys(key, h.key) === 0 && h.right === null) {
        return null;
      }
      if (!isRed(h.right) && !isRed(h.right?.left)) {
        h = moveRedRight(h);
      }

      if (compareKeys(key, h.key) === 0) {
        // Two children: take over the successor's entry and unlink the successor node.
        const right = h.right;
        if (right === null) {
          throw new InvariantViolationError(`delete(${String(key)}) found no right subtree`);
        }
        const successor = minNode(right);
        h.key = successor.key;
        h.value = successor.value;
        h.right = this.removeMin(right);
      } else {
        h.right = this.removeKey(h.right, key);
      }
    }

    return balance(h);
  }

  // === Ordered queries ===

  min(): K {
    if (this.root === null) {
      throw new UnderflowError('min');
    }
    return minNode(this.root).key;
  }

  max(): K {
    if (this.root === null) {
      throw new UnderflowError('max');
    }
    return maxNode(this.root).key;
  }

  /**
   * Largest key less than or equal to key.
   */
  floor(key: K): K {
    const checked = requireKey(key, 'floor');
    if (this.root === null) {
      throw new UnderflowError('floor');
    }

    const node = this.floorNode(this.root, checked);
    if (node === null) {
      throw new NotFoundError('floor', checked);
    }
    return node.key;
  }

  /**
   * Smallest key greater than or equal to key.
   */
  ceil(key: K): K {
    const checked = requireKey(key, 'ceil');
    if (this.root === null) {
      throw new UnderflowError('ceil');
    }

    const node = this.ceilNode(this.root, checked);
    if (node === null) {
      throw new NotFoundError('ceil', checked);
    }
    return node.key;
  }

  /**
   * Number of keys strictly less than key.
   */
  rank(key: K): number {
    return this.rankIn(this.root, requireKey(key, 'rank'));
  }

  /**
   * Key of the given 0-based rank.
   */
  select(rank: number): K {
    if (!Number.isInteger(rank)) {
      throw new InvalidArgumentError(`argument to select() must be an integer, got ${rank}`);
    }
    const size = this.size();
    if (rank < 0 || rank >= size) {
      throw new OutOfRangeError(rank, size);
    }
    return this.selectIn(this.root, rank).key;
  }

  keys(): K[] {
    if (this.root === null) {
      return [];
    }
    return this.rangeKeys(this.min(), this.max());
  }

  /**
   * Time complexity: O(log n + k) where k is number of results
   */
  rangeKeys(lo: K, hi: K): K[] {
    const from = requireKey(lo, 'rangeKeys');
    const to = requireKey(hi, 'rangeKeys');
    const queue: K[] = [];
    this.collectKeys(this.root, queue, from, to);
    return queue;
  }

  keySize(lo: K, hi: K): number {
    const from = requireKey(lo, 'keySize');
    const to = requireKey(hi, 'keySize');
    if (compareKeys(from, to) > 0) {
      return 0;
    }
    if (this.contains(to)) {
      return this.rank(to) - this.rank(from) + 1;
    }
    return this.rank(to) - this.rank(from);
  }

  /**
   * Links on the longest root-to-leaf path; -1 when empty.
   */
  height(): number {
    return this.heightOf(this.root);
  }

  levelOrder(): K[][] {
    const levels: K[][] = [];
    let layer: TreeNode<K, V>[] = this.root === null ? [] : [this.root];

    while (layer.length > 0) {
      levels.push(layer.map((node) => node.key));
      const next: TreeNode<K, V>[] = [];
      for (const node of layer) {
        if (node.left !== null) next.push(node.left);
        if (node.right !== null) next.push(node.right);
      }
      layer = next;
    }

    return levels;
  }

  /**
   * Entries in key order.
   */
  entries(): Array<[K, V]> {
    const result: Array<[K, V]> = [];
    this.inOrderTraversal(this.root, result);
    return result;
  }

  *[Symbol.iterator](): Iterator<[K, V]> {
    yield* this.inOrderGenerator(this.root);
  }

  // === Invariant checks ===

  isBST(): boolean {
    return isBST(this.root);
  }

  countCheck(): boolean {
    return countCheck(this.root);
  }

  rankCheck(): boolean {
    return rankCheck(this);
  }

  is23(): boolean {
    return is23(this.root);
  }

  isBalanced(): boolean {
    return isBalanced(this.root);
  }

  check(): InvariantReport {
    return checkInvariants(this.root, this);
  }

  assertInvariants(): void {
    const report = this.check();
    if (!report.ok) {
      throw new InvariantViolationError(`tree invariants violated: ${report.violations.join(', ')}`);
    }
  }

  // === Private helper methods ===

  private findNode(key: K): Node<K, V> {
    let current = this.root;
    while (current !== null) {
      const cmp = compareKeys(key, current.key);
      if (cmp === 0) {
        return current;
      }
      current = cmp < 0 ? current.left : current.right;
    }
    return null;
  }

  private floorNode(node: Node<K, V>, key: K): Node<K, V> {
    if (node === null) return null;

    const cmp = compareKeys(key, node.key);
    if (cmp === 0) return node;
    if (cmp < 0) return this.floorNode(node.left, key);
    return this.floorNode(node.right, key) ?? node;
  }

  private ceilNode(node: Node<K, V>, key: K): Node<K, V> {
    if (node === null) return null;

    const cmp = compareKeys(key, node.key);
    if (cmp === 0) return node;
    if (cmp > 0) return this.ceilNode(node.right, key);
    return this.ceilNode(node.left, key) ?? node;
  }

  private rankIn(node: Node<K, V>, key: K): number {
    if (node === null) return 0;

    const cmp = compareKeys(key, node.key);
    if (cmp < 0) return this.rankIn(node.left, key);
    if (cmp > 0) return 1 + sizeOf(node.left) + this.rankIn(node.right, key);
    return sizeOf(node.left);
  }

  private selectIn(node: Node<K, V>, rank: number): TreeNode<K, V> {
    if (node === null) {
      throw new InvariantViolationError(`select(${rank}) ran past a leaf`);
    }

    const leftSize = sizeOf(node.left);
    if (leftSize > rank) return this.selectIn(node.left, rank);
    if (leftSize < rank) return this.selectIn(node.right, rank - leftSize - 1);
    return node;
  }

  private collectKeys(node: Node<K, V>, queue: K[], lo: K, hi: K): void {
    if (node === null) return;

    const cmpLo = compareKeys(lo, node.key);
    const cmpHi = compareKeys(hi, node.key);

    if (cmpLo < 0) {
      this.collectKeys(node.left, queue, lo, hi);
    }
    if (cmpLo <= 0 && cmpHi >= 0) {
      queue.push(node.key);
    }
    if (cmpHi > 0) {
      this.collectKeys(node.right, queue, lo, hi);
    }
  }

  private heightOf(node: Node<K, V>): number {
    if (node === null) return -1;
    return 1 + Math.max(this.heightOf(node.left), this.heightOf(node.right));
  }

  private inOrderTraversal(node: Node<K, V>, result: Array<[K, V]>): void {
    if (node === null) return;
    this.inOrderTraversal(node.left, result);
    result.push([node.key, node.value]);
    this.inOrderTraversal(node.right, result);
  }

  private *inOrderGenerator(node: Node<K, V>): Generator<[K, V]> {
    if (node === null) return;
    yield* this.inOrderGenerator(node.left);
    yield [node.key, node.value];
    yield* this.inOrderGenerator(node.right);
  }
}
