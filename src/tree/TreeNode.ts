/**
 * Node layer of the left-leaning red-black tree.
 *
 * The color describes the link from the parent into this node. Absent
 * children count as black.
 */

export enum Color {
  RED = 0,
  BLACK = 1,
}

export interface TreeNode<K, V> {
  key: K;
  value: V;
  color: Color;
  left: TreeNode<K, V> | null;
  right: TreeNode<K, V> | null;
  // nodes in the subtree rooted here, this one included
  size: number;
}

/**
 * New keys always enter the tree as red leaves.
 */
export function createNode<K, V>(key: K, value: V): TreeNode<K, V> {
  return {
    key,
    value,
    color: Color.RED,
    left: null,
    right: null,
    size: 1,
  };
}

export function isRed<K, V>(node: TreeNode<K, V> | null | undefined): boolean {
  if (node === null || node === undefined) return false;
  return node.color === Color.RED;
}

export function sizeOf<K, V>(node: TreeNode<K, V> | null | undefined): number {
  if (node === null || node === undefined) return 0;
  return node.size;
}

export function updateSize<K, V>(node: TreeNode<K, V>): void {
  node.size = 1 + sizeOf(node.left) + sizeOf(node.right);
}

export function minNode<K, V>(node: TreeNode<K, V>): TreeNode<K, V> {
  let current = node;
  while (current.left !== null) {
    current = current.left;
  }
  return current;
}

export function maxNode<K, V>(node: TreeNode<K, V>): TreeNode<K, V> {
  let current = node;
  while (current.right !== null) {
    current = current.right;
  }
  return current;
}
