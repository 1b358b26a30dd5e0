/**
 * @file render.ts
 * @description Text dump of a tree's shape using box-drawing prefixes.
 *
 *   └── 8
 *       ├── 3
 *       │   └── 1
 *       └── 10
 */

import type { Writer } from '../util/writer.js';
import type { RBNode } from './rbnode.js';

export interface RenderableTree<K> {
  /** @internal */ readonly _root: RBNode<K>;
  /** @internal */ readonly _nil: RBNode<K>;
}

/**
 * Write one line per node, parent before children, left child before
 * right.  A node is drawn as the tail (`└──`) when it is the last child
 * printed under its parent.  An empty tree prints a bare tail marker.
 */
export function renderTree<K>(
  tree: RenderableTree<K>,
  w: Writer,
  show: (key: K) => string = String,
): void {
  if (tree._root === tree._nil) {
    w.write('└── \n');
    return;
  }
  renderNode(tree._root, tree._nil, '', true, w, show);
}

function renderNode<K>(
  node: RBNode<K>,
  nil: RBNode<K>,
  prefix: string,
  tail: boolean,
  w: Writer,
  show: (key: K) => string,
): void {
  w.write(prefix + (tail ? '└── ' : '├── ') + show(node.key) + '\n');
  const childPrefix = prefix + (tail ? '    ' : '│   ');
  if (node.left !== nil) {
    renderNode(node.left, nil, childPrefix, node.right === nil, w, show);
  }
  if (node.right !== nil) {
    renderNode(node.right, nil, childPrefix, true, w, show);
  }
}
