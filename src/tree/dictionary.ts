/**
 * @file dictionary.ts
 * @description The ordered-dictionary contract that consumers program
 * against.  `RedBlackTree` is the implementation.
 */

/**
 * Fail-fast forward cursor over a dictionary.
 *
 * Every operation throws `ConcurrentModificationError` once the backing
 * dictionary has been changed by anything other than this cursor.
 */
export interface Cursor<K> extends Iterable<K> {
  /** True while another key is available.  O(1). */
  hasNext(): boolean;
  /** Return the current key and advance.  Throws `ExhaustedError` at the end. */
  next(): K;
  /**
   * Delete the key returned by the latest `next()` from the dictionary.
   * Throws `IllegalStateError` without a fresh `next()`.
   */
  remove(): void;
}

/**
 * A set of unique keys under a total order.
 */
export interface Dictionary<K> extends Iterable<K> {
  readonly size: number;

  isEmpty(): boolean;
  contains(key: K): boolean;

  /** True iff some stored key is less than `key` (which need not be stored). */
  hasPredecessor(key: K): boolean;
  /** True iff some stored key is greater than `key` (which need not be stored). */
  hasSuccessor(key: K): boolean;
  /** Greatest stored key strictly less than `key`.  Throws `NotFoundError`. */
  predecessor(key: K): K;
  /** Least stored key strictly greater than `key`.  Throws `NotFoundError`. */
  successor(key: K): K;

  /** Throws `EmptyError` when empty. */
  min(): K;
  /** Throws `EmptyError` when empty. */
  max(): K;

  /** Insert `key`; false if an equal key is already present. */
  add(key: K): boolean;
  /** Remove `key`; false if it was not present. */
  delete(key: K): boolean;

  /** Cursor positioned at the minimum. */
  iterator(): Cursor<K>;
  /** Cursor positioned at the least key ≥ `key`; exhausted if there is none. */
  iteratorFrom(key: K): Cursor<K>;
}
