/**
 * @file cursor.ts
 * @description Fail-fast forward cursor over a RedBlackTree.
 */

import {
  ConcurrentModificationError,
  ExhaustedError,
  IllegalStateError,
} from '../core/error.js';
import type { Cursor } from './dictionary.js';
import { nextNode } from './rbnode.js';
import type { RBNode } from './rbnode.js';

/**
 * The slice of the tree a cursor needs.  Kept narrow so the cursor holds
 * node identities only and never owns or relinks tree structure itself.
 */
export interface CursorHost<K> {
  /** @internal */ readonly _nil: RBNode<K>;
  /** @internal */ readonly _modCount: number;
  /** @internal Delete a live node through the tree's delete path. */
  _removeNode(node: RBNode<K>): void;
}

/**
 * Cursor states: positioned on `upcoming` (possibly the sentinel, meaning
 * exhausted).  `last` is the node returned by the latest `next()` while it
 * may still be removed, or the sentinel.
 *
 * Removing `last` keeps `upcoming` valid: the tree's delete relinks the
 * successor node into the removed node's position instead of copying
 * keys between nodes.
 */
export class TreeCursor<K> implements Cursor<K> {
  private readonly host: CursorHost<K>;
  private last: RBNode<K>;
  private upcoming: RBNode<K>;
  private expectedModCount: number;

  /** @internal */
  constructor(host: CursorHost<K>, start: RBNode<K>) {
    this.host = host;
    this.last = host._nil;
    this.upcoming = start;
    this.expectedModCount = host._modCount;
  }

  private checkForComodification(): void {
    if (this.expectedModCount !== this.host._modCount) {
      throw new ConcurrentModificationError();
    }
  }

  hasNext(): boolean {
    this.checkForComodification();
    return this.upcoming !== this.host._nil;
  }

  next(): K {
    if (!this.hasNext()) {
      throw new ExhaustedError();
    }
    this.last = this.upcoming;
    this.upcoming = nextNode(this.upcoming, this.host._nil);
    return this.last.key;
  }

  remove(): void {
    this.checkForComodification();
    if (this.last === this.host._nil) {
      throw new IllegalStateError('remove() must follow a call to next()');
    }
    this.host._removeNode(this.last);
    this.last = this.host._nil;
    // Our own removal bumped the counter; only foreign changes should trip us.
    this.expectedModCount = this.host._modCount;
  }

  /** Drain the remaining keys with for-of.  Still fail-fast. */
  *[Symbol.iterator](): IterableIterator<K> {
    while (this.hasNext()) {
      yield this.next();
    }
  }
}
