/**
 * @file verify.ts
 * @description Full structural check of a RedBlackTree.  O(n); used by the
 * `verify` option and by the tests.
 */

import type { Comparator } from '../core/compare.js';
import { InvariantError } from '../core/error.js';
import { Color } from './rbnode.js';
import type { RBNode } from './rbnode.js';

/** The tree state verification reads.  Nothing here is written. */
export interface VerifiableTree<K> {
  /** @internal */ readonly _root: RBNode<K>;
  /** @internal */ readonly _nil: RBNode<K>;
  /** @internal */ readonly _min: RBNode<K>;
  /** @internal */ readonly _max: RBNode<K>;
  /** @internal */ readonly _size: number;
  /** @internal */ readonly _order: Comparator<K>;
}

export interface InvariantReport {
  valid: boolean;
  violations: string[];
  /** Black nodes from the root down to a leaf, excluding the root, counting the leaf. */
  blackHeight: number;
  /** Nodes on the longest root-to-leaf path. */
  height: number;
  /** Nodes reachable from the root. */
  size: number;
}

interface WalkState<K> {
  nil: RBNode<K>;
  seen: Set<RBNode<K>>;
  inorder: RBNode<K>[];
  violations: string[];
}

/**
 * Walk the subtree at `node` and return its black depth (black nodes on
 * any path down to the sentinel, counting `node` and the sentinel) and
 * height.  Mismatches are recorded, and the left side's figure is used to
 * keep going so one fault does not hide the others.
 */
function walk<K>(node: RBNode<K>, st: WalkState<K>): [number, number] {
  if (node === st.nil) return [1, 0];
  if (st.seen.has(node)) {
    st.violations.push(`node ${String(node.key)} is reachable twice`);
    return [1, 0];
  }
  st.seen.add(node);

  if (node.color !== Color.RED && node.color !== Color.BLACK) {
    st.violations.push(`node ${String(node.key)} has no valid color`);
  }
  for (const child of [node.left, node.right]) {
    if (child === st.nil) continue;
    if (child.parent !== node) {
      st.violations.push(`node ${String(child.key)} has a stale parent link`);
    }
    if (node.color === Color.RED && child.color === Color.RED) {
      st.violations.push(`red node ${String(node.key)} has red child ${String(child.key)}`);
    }
  }

  const [lb, lh] = walk(node.left, st);
  st.inorder.push(node);
  const [rb, rh] = walk(node.right, st);
  if (lb !== rb) {
    st.violations.push(
      `black heights differ below ${String(node.key)}: left ${lb - 1}, right ${rb - 1}`,
    );
  }
  return [lb + (node.color === Color.BLACK ? 1 : 0), 1 + Math.max(lh, rh)];
}

export function checkInvariants<K>(tree: VerifiableTree<K>): InvariantReport {
  const nil = tree._nil;
  const st: WalkState<K> = { nil, seen: new Set(), inorder: [], violations: [] };
  const v = st.violations;

  if (nil.color !== Color.BLACK) v.push('sentinel is not black');
  if (nil.left !== nil || nil.right !== nil || nil.parent !== nil) {
    v.push('sentinel links were overwritten');
  }

  const root = tree._root;
  if (root !== nil) {
    if (root.color !== Color.BLACK) v.push('root is not black');
    if (root.parent !== nil) v.push('root has a parent');
  }

  const [depth, height] = walk(root, st);
  const blackHeight = root === nil ? 0 : depth - (root.color === Color.BLACK ? 1 : 0);

  const nodes = st.inorder;
  for (let i = 1; i < nodes.length; i++) {
    if (tree._order(nodes[i - 1].key, nodes[i].key) >= 0) {
      v.push(`keys out of order: ${String(nodes[i - 1].key)} before ${String(nodes[i].key)}`);
    }
  }

  const n = nodes.length;
  if (n !== tree._size) v.push(`size is ${tree._size} but ${n} nodes are reachable`);
  const first = n > 0 ? nodes[0] : nil;
  const last = n > 0 ? nodes[n - 1] : nil;
  if (tree._min !== first) v.push('cached min is not the first node in order');
  if (tree._max !== last) v.push('cached max is not the last node in order');
  if (height > 2 * Math.log2(n + 1)) {
    v.push(`height ${height} exceeds 2·log2(${n}+1)`);
  }

  return { valid: v.length === 0, violations: v, blackHeight, height, size: n };
}

/** Throw `InvariantError` unless the tree passes every check. */
export function assertInvariants<K>(tree: VerifiableTree<K>): InvariantReport {
  const report = checkInvariants(tree);
  if (!report.valid) throw new InvariantError(report.violations);
  return report;
}
