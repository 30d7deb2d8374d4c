/**
 * Local transforms that keep the tree left-leaning and black-balanced.
 *
 * Each one touches at most three nodes, keeps their size fields exact and
 * returns the new root of the subtree it was given. Callers store that
 * return value back into the parent link.
 */

import { InvariantViolationError } from '../common/Errors';
import { Color, TreeNode, isRed, updateSize } from './TreeNode';

/**
 * Turn a red right link into a red left link.
 */
export function rotateLeft<K, V>(h: TreeNode<K, V>): TreeNode<K, V> {
  const x = h.right;
  if (x === null || x.color !== Color.RED) {
    throw new InvariantViolationError('rotateLeft() requires a red right link');
  }

  h.right = x.left;
  x.left = h;
  x.color = h.color;
  h.color = Color.RED;
  x.size = h.size;
  updateSize(h);
  return x;
}

export function rotateRight<K, V>(h: TreeNode<K, V>): TreeNode<K, V> {
  const x = h.left;
  if (x === null || x.color !== Color.RED) {
    throw new InvariantViolationError('rotateRight() requires a red left link');
  }

  h.left = x.right;
  x.right = h;
  x.color = h.color;
  h.color = Color.RED;
  x.size = h.size;
  updateSize(h);
  return x;
}

/**
 * Toggle the colors of h and both children.
 *
 * On insert this splits a temporary 4-node and passes the red link up; on
 * delete it borrows a red link from the parent and pushes it down.
 */
export function flipColors<K, V>(h: TreeNode<K, V>): void {
  const { left, right } = h;
  if (left === null || right === null) {
    throw new InvariantViolationError('flipColors() requires two children');
  }

  h.color = toggle(h.color);
  left.color = toggle(left.color);
  right.color = toggle(right.color);
}

/**
 * Assuming h is red and both h.left and h.left.left are black, make h.left
 * or one of its children red.
 */
export function moveRedLeft<K, V>(h: TreeNode<K, V>): TreeNode<K, V> {
  flipColors(h);
  const right = h.right;
  if (right !== null && isRed(right.left)) {
    h.right = rotateRight(right);
    h = rotateLeft(h);
    flipColors(h);
  }
  return h;
}

/**
 * Assuming h is red and both h.right and h.right.left are black, make
 * h.right or one of its children red.
 */
export function moveRedRight<K, V>(h: TreeNode<K, V>): TreeNode<K, V> {
  flipColors(h);
  if (isRed(h.left?.left)) {
    h = rotateRight(h);
    flipColors(h);
  }
  return h;
}

/**
 * Fix-up applied on the way back up from every insert and delete.
 * The order of the three checks matters.
 */
export function balance<K, V>(h: TreeNode<K, V>): TreeNode<K, V> {
  if (isRed(h.right) && !isRed(h.left)) {
    h = rotateLeft(h);
  }
  if (isRed(h.left) && isRed(h.left?.left)) {
    h = rotateRight(h);
  }
  if (isRed(h.left) && isRed(h.right)) {
    flipColors(h);
  }

  updateSize(h);
  return h;
}

function toggle(color: Color): Color {
  return color === Color.RED ? Color.BLACK : Color.RED;
}
