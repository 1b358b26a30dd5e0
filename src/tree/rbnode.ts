/**
 * @file rbnode.ts
 * @description Tree node, the per-tree sentinel, and the node-level
 * navigation helpers shared by the dictionary and its cursors.
 */

export enum Color {
  RED = 0,
  BLACK = 1,
}

/**
 * Internal tree node.  Absent children and the root's parent are the
 * owning tree's sentinel rather than null, so rotations and fixups can
 * follow links without null checks.
 */
export class RBNode<K> {
  key: K;
  color: Color;
  left: RBNode<K>;
  right: RBNode<K>;
  parent: RBNode<K>;

  /** With no `nil` given the node links to itself (sentinel construction). */
  constructor(key: K, color: Color, nil?: RBNode<K>) {
    const link = nil ?? this;
    this.key = key;
    this.color = color;
    this.left = link;
    this.right = link;
    this.parent = link;
  }
}

/**
 * Build a tree's sentinel: black, self-linked, and frozen.  Any attempted
 * write through it throws (module code is strict), so a fixup that forgets
 * to guard a sentinel write fails loudly instead of corrupting the tree.
 */
export function makeSentinel<K>(): RBNode<K> {
  // The sentinel never carries a key; nothing reads `key` off it.
  return Object.freeze(new RBNode<K>(undefined as unknown as K, Color.BLACK));
}

// ---------------------------------------------------------------------------
// Navigation helpers
// ---------------------------------------------------------------------------

export function subtreeMin<K>(node: RBNode<K>, nil: RBNode<K>): RBNode<K> {
  while (node.left !== nil) {
    node = node.left;
  }
  return node;
}

export function subtreeMax<K>(node: RBNode<K>, nil: RBNode<K>): RBNode<K> {
  while (node.right !== nil) {
    node = node.right;
  }
  return node;
}

/** In-order successor.  Returns nil when node is the maximum (or nil). */
export function nextNode<K>(node: RBNode<K>, nil: RBNode<K>): RBNode<K> {
  if (node === nil) return nil;
  if (node.right !== nil) {
    return subtreeMin(node.right, nil);
  }
  let p = node.parent;
  while (p !== nil && node === p.right) {
    node = p;
    p = p.parent;
  }
  // Walked past the root: node was the maximum.
  return p;
}
