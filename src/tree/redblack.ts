/**
 * @file redblack.ts
 * @description Red-black tree dictionary: a set of unique keys under a
 * pluggable total order.
 *
 * Guarantees:
 *   - O(log n) contains, add, delete, predecessor, successor, iteratorFrom
 *   - O(1) isEmpty, min, max, hasPredecessor, hasSuccessor, iterator
 *   - Fail-fast cursors that can delete the element they just returned
 *
 * The red-black tree invariants maintained:
 *   1. Every node is red or black.
 *   2. The root is black.
 *   3. Every leaf (NIL sentinel) is black.
 *   4. If a node is red, both children are black.
 *   5. Every simple path from a node to a descendant leaf has the same black-height.
 *
 * Insertion and deletion follow CLRS.  The left/right mirror cases are
 * written once, parameterized by a `Side`.
 */

import { ComparisonCounter } from '../core/compare.js';
import type { Comparator } from '../core/compare.js';
import { EmptyError, InvariantError, NotFoundError } from '../core/error.js';
import { resolveOptions } from '../core/options.js';
import type { DictionaryOptions } from '../core/options.js';
import type { OperationLog, OperationRecord } from '../util/oplog.js';
import { StringWriter } from '../util/writer.js';
import { TreeCursor } from './cursor.js';
import type { CursorHost } from './cursor.js';
import type { Dictionary } from './dictionary.js';
import { Color, RBNode, makeSentinel, subtreeMax, subtreeMin } from './rbnode.js';
import { renderTree } from './render.js';
import { checkInvariants } from './verify.js';

type Side = 'left' | 'right';

function flip(side: Side): Side {
  return side === 'left' ? 'right' : 'left';
}

export class RedBlackTree<K> implements Dictionary<K>, CursorHost<K> {
  /** @internal */ readonly _nil: RBNode<K>;
  /** @internal */ _root: RBNode<K>;
  /** @internal */ _min: RBNode<K>;
  /** @internal */ _max: RBNode<K>;
  /** @internal */ _size: number;
  /** @internal Bumped by every successful structural change. */
  _modCount: number;
  /** @internal Uncounted order, for verification. */
  readonly _order: Comparator<K>;

  private readonly counter: ComparisonCounter<K>;
  private readonly log: OperationLog | null;
  private readonly verify: boolean;
  private readonly debug: boolean;

  constructor(options?: DictionaryOptions<K>) {
    const opts = resolveOptions(options);
    this._nil = makeSentinel<K>();
    this._root = this._min = this._max = this._nil;
    this._size = 0;
    this._modCount = 0;
    this._order = opts.comparator;
    this.counter = new ComparisonCounter<K>(opts.comparator);
    this.log = opts.log;
    this.verify = opts.verify;
    this.debug = opts.debug;
  }

  // -- Instrumentation ----------------------------------------------------

  /** Key comparisons made by the most recent public call. */
  get comparisons(): number {
    return this.counter.count;
  }

  /**
   * Run one public call: reset the comparison count, then report the call
   * to the log sink once it finishes, whether it returned or threw.
   */
  private track<R>(operation: string, body: () => R, ...arg: [K] | []): R {
    this.counter.reset();
    try {
      return body();
    } finally {
      if (this.log !== null) {
        const entry: OperationRecord = { operation, comparisons: this.counter.count };
        if (arg.length === 1) entry.argument = arg[0];
        this.log.record(entry);
      }
    }
  }

  private cmp(a: K, b: K): number {
    return this.counter.compare(a, b);
  }

  private afterMutation(): void {
    ++this._modCount;
    if (!this.verify) return;
    const report = checkInvariants(this);
    if (!report.valid) {
      if (this.debug) {
        for (const v of report.violations) console.error(`rbtree: ${v}`);
      }
      throw new InvariantError(report.violations);
    }
  }

  // -- Capacity -----------------------------------------------------------

  /** Number of keys stored. */
  get size(): number {
    return this._size;
  }

  isEmpty(): boolean {
    return this.track('isEmpty', () => this._root === this._nil);
  }

  // -- Lookup -------------------------------------------------------------

  contains(key: K): boolean {
    return this.track('contains', () => this.locate(key) !== this._nil, key);
  }

  hasPredecessor(key: K): boolean {
    return this.track('hasPredecessor', () => this.lowerExists(key), key);
  }

  hasSuccessor(key: K): boolean {
    return this.track('hasSuccessor', () => this.higherExists(key), key);
  }

  predecessor(key: K): K {
    return this.track('predecessor', () => {
      if (!this.lowerExists(key)) {
        throw new NotFoundError('Argument does not have a predecessor');
      }
      return this.below(key).key;
    }, key);
  }

  successor(key: K): K {
    return this.track('successor', () => {
      if (!this.higherExists(key)) {
        throw new NotFoundError('Argument does not have a successor');
      }
      return this.above(key).key;
    }, key);
  }

  min(): K {
    return this.track('min', () => {
      if (this._root === this._nil) throw new EmptyError();
      return this._min.key;
    });
  }

  max(): K {
    return this.track('max', () => {
      if (this._root === this._nil) throw new EmptyError();
      return this._max.key;
    });
  }

  // -- Modifiers ----------------------------------------------------------

  /**
   * Insert `key`.
   * @returns false, with no change, when an equal key is already present
   *          or the key is null/undefined.
   */
  add(key: K): boolean {
    return this.track('add', () => {
      if (key === undefined || key === null) return false;
      const inserted = this.insert(key);
      if (inserted) this.afterMutation();
      return inserted;
    }, key);
  }

  /**
   * Remove `key`.
   * @returns true if the key was present.
   */
  delete(key: K): boolean {
    return this.track('delete', () => {
      const z = this.locate(key);
      if (z === this._nil) return false;
      this.deleteNode(z);
      this.afterMutation();
      return true;
    }, key);
  }

  /** @internal Cursor-driven removal of a node known to be live. */
  _removeNode(node: RBNode<K>): void {
    this.track('remove', () => {
      this.deleteNode(node);
      this.afterMutation();
    }, node.key);
  }

  // -- Iterators ----------------------------------------------------------

  /** Cursor starting at the minimum. */
  iterator(): TreeCursor<K> {
    return this.track('iterator', () => new TreeCursor<K>(this, this._min));
  }

  /** Cursor starting at the least key ≥ `key`. */
  iteratorFrom(key: K): TreeCursor<K> {
    return this.track('iteratorFrom', () => new TreeCursor<K>(this, this.ceiling(key)), key);
  }

  /** Iterate keys in order (for-of support).  Fail-fast like any cursor. */
  [Symbol.iterator](): IterableIterator<K> {
    return new TreeCursor<K>(this, this._min)[Symbol.iterator]();
  }

  /** Box-drawing dump of the tree shape, root first. */
  toString(): string {
    return this.track('toString', () => {
      const w = new StringWriter();
      renderTree(this, w);
      return w.toString();
    });
  }

  // -- Searches -----------------------------------------------------------

  private lowerExists(key: K): boolean {
    return this._root !== this._nil && this.cmp(key, this._min.key) > 0;
  }

  private higherExists(key: K): boolean {
    return this._root !== this._nil && this.cmp(key, this._max.key) < 0;
  }

  /** Node with key equal to `key`, or nil. */
  private locate(key: K): RBNode<K> {
    const nil = this._nil;
    let node = this._root;
    while (node !== nil) {
      const c = this.cmp(key, node.key);
      if (c < 0) {
        node = node.left;
      } else if (c > 0) {
        node = node.right;
      } else {
        return node;
      }
    }
    return nil;
  }

  /** Greatest node < `key`, or nil.  `key` need not be stored. */
  private below(key: K): RBNode<K> {
    const nil = this._nil;
    let node = this._root;
    let result = nil;
    while (node !== nil) {
      if (this.cmp(key, node.key) > 0) {
        // node.key < key: candidate
        result = node;
        node = node.right;
      } else {
        node = node.left;
      }
    }
    return result;
  }

  /** Least node > `key`, or nil.  `key` need not be stored. */
  private above(key: K): RBNode<K> {
    const nil = this._nil;
    let node = this._root;
    let result = nil;
    while (node !== nil) {
      if (this.cmp(key, node.key) < 0) {
        // node.key > key: candidate
        result = node;
        node = node.left;
      } else {
        node = node.right;
      }
    }
    return result;
  }

  /** Least node ≥ `key`, or nil. */
  private ceiling(key: K): RBNode<K> {
    const nil = this._nil;
    let node = this._root;
    let result = nil;
    while (node !== nil) {
      const c = this.cmp(key, node.key);
      if (c < 0) {
        result = node;
        node = node.left;
      } else if (c > 0) {
        node = node.right;
      } else {
        return node;
      }
    }
    return result;
  }

  // -- Red-black tree internals -------------------------------------------

  private insert(key: K): boolean {
    const nil = this._nil;
    let parent = nil;
    let node = this._root;
    let c = 0;
    while (node !== nil) {
      parent = node;
      c = this.cmp(key, node.key);
      if (c < 0) {
        node = node.left;
      } else if (c > 0) {
        node = node.right;
      } else {
        return false;
      }
    }

    const z = new RBNode<K>(key, Color.RED, nil);
    z.parent = parent;
    if (parent === nil) {
      this._root = z;
    } else if (c < 0) {
      parent.left = z;
    } else {
      parent.right = z;
    }
    this._size++;
    this.insertFixup(z);

    if (this._min === nil) {
      this._min = this._max = z;
    } else if (this.cmp(key, this._min.key) < 0) {
      this._min = z;
    } else if (this.cmp(key, this._max.key) > 0) {
      this._max = z;
    }
    return true;
  }

  /**
   * Rotate `x` down to `dir`: its child on the opposite side takes its
   * place.  `rotate(x, 'left')` is the classic left rotation.
   */
  private rotate(x: RBNode<K>, dir: Side): void {
    const nil = this._nil;
    const other = flip(dir);
    const y = x[other];
    x[other] = y[dir];
    if (y[dir] !== nil) {
      y[dir].parent = x;
    }
    y.parent = x.parent;
    if (x.parent === nil) {
      this._root = y;
    } else if (x === x.parent.left) {
      x.parent.left = y;
    } else {
      x.parent.right = y;
    }
    y[dir] = x;
    x.parent = y;
  }

  /** Restore red-black properties after inserting the red leaf `z`. */
  private insertFixup(z: RBNode<K>): void {
    while (z.parent.color === Color.RED) {
      // A red parent is never the root, so the grandparent is real.
      const g = z.parent.parent;
      const side: Side = z.parent === g.left ? 'left' : 'right';
      const other = flip(side);
      const uncle = g[other];
      if (uncle.color === Color.RED) {
        z.parent.color = Color.BLACK;
        uncle.color = Color.BLACK;
        g.color = Color.RED;
        z = g;
      } else {
        if (z === z.parent[other]) {
          // inner child: straighten into the outer case
          z = z.parent;
          this.rotate(z, side);
        }
        z.parent.color = Color.BLACK;
        z.parent.parent.color = Color.RED;
        this.rotate(z.parent.parent, other);
      }
    }
    this._root.color = Color.BLACK;
  }

  /** Replace subtree rooted at `u` with subtree rooted at `v`. */
  private transplant(u: RBNode<K>, v: RBNode<K>): void {
    if (u.parent === this._nil) {
      this._root = v;
    } else if (u === u.parent.left) {
      u.parent.left = v;
    } else {
      u.parent.right = v;
    }
    if (v !== this._nil) {
      v.parent = u.parent;
    }
  }

  /**
   * Unlink node `z` and rebalance.
   *
   * With two children, the in-order successor node itself is moved into
   * z's position (keys never move between nodes), so any cursor parked on
   * the successor stays valid.  The sentinel is read-only, so the
   * replacement's parent is tracked in `xParent` rather than stored on it.
   */
  private deleteNode(z: RBNode<K>): void {
    const nil = this._nil;
    let x: RBNode<K>;
    let xParent: RBNode<K>;
    let origColor: Color;

    if (z.left === nil) {
      origColor = z.color;
      x = z.right;
      xParent = z.parent;
      this.transplant(z, z.right);
    } else if (z.right === nil) {
      origColor = z.color;
      x = z.left;
      xParent = z.parent;
      this.transplant(z, z.left);
    } else {
      const y = subtreeMin(z.right, nil);
      origColor = y.color;
      x = y.right;
      if (y.parent === z) {
        xParent = y;
      } else {
        xParent = y.parent;
        this.transplant(y, y.right);
        y.right = z.right;
        y.right.parent = y;
      }
      this.transplant(z, y);
      y.left = z.left;
      y.left.parent = y;
      y.color = z.color;
    }
    this._size--;

    if (origColor === Color.BLACK) {
      this.deleteFixup(x, xParent);
    }

    if (this._root === nil) {
      this._min = this._max = nil;
    } else if (z === this._min) {
      this._min = subtreeMin(this._root, nil);
    } else if (z === this._max) {
      this._max = subtreeMax(this._root, nil);
    }
    z.left = z.right = z.parent = nil;
  }

  /**
   * Restore red-black properties after removing a black node.  `x` carries
   * the extra black; `parent` is its parent (x may be the sentinel).
   */
  private deleteFixup(x: RBNode<K>, parent: RBNode<K>): void {
    while (x !== this._root && x.color === Color.BLACK) {
      const side: Side = x === parent.left ? 'left' : 'right';
      const other = flip(side);
      let w = parent[other]; // sibling
      if (w.color === Color.RED) {
        w.color = Color.BLACK;
        parent.color = Color.RED;
        this.rotate(parent, side);
        w = parent[other];
      }
      if (w[side].color === Color.BLACK && w[other].color === Color.BLACK) {
        w.color = Color.RED;
        x = parent;
        parent = x.parent;
      } else {
        if (w[other].color === Color.BLACK) {
          // near nephew red, far nephew black
          w[side].color = Color.BLACK;
          w.color = Color.RED;
          this.rotate(w, other);
          w = parent[other];
        }
        w.color = parent.color;
        parent.color = Color.BLACK;
        w[other].color = Color.BLACK;
        this.rotate(parent, side);
        x = this._root;
      }
    }
    if (x !== this._nil) {
      x.color = Color.BLACK;
    }
  }
}
