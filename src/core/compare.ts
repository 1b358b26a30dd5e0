/**
 * @file compare.ts
 * @description Key ordering for the dictionary, plus the counting wrapper
 * used to report how many comparisons a call made.
 */

import { DictionaryError } from './error.js';

/** Comparator function: negative ⇒ a < b, 0 ⇒ equal, positive ⇒ a > b. */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Default ordering for primitive keys.  Numbers and bigints compare by
 * value, strings by UTF-16 code unit.  Any other pairing needs an explicit
 * comparator.
 */
export function naturalOrder(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return cmp3(a, b);
  if (typeof a === 'string' && typeof b === 'string') return cmp3(a, b);
  if (typeof a === 'bigint' && typeof b === 'bigint') return cmp3(a, b);
  throw new DictionaryError(
    `No natural order between ${typeof a} and ${typeof b}; supply a comparator`,
  );
}

function cmp3<T extends number | string | bigint>(a: T, b: T): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Wraps a comparator and counts every invocation.
 *
 * The tree resets the counter at the start of each public call, so after
 * the call returns `count` holds the number of key comparisons it made.
 */
export class ComparisonCounter<T> {
  private _count = 0;
  private readonly cmp: Comparator<T>;

  constructor(cmp: Comparator<T>) {
    this.cmp = cmp;
  }

  get count(): number {
    return this._count;
  }

  compare(a: T, b: T): number {
    ++this._count;
    return this.cmp(a, b);
  }

  reset(): void {
    this._count = 0;
  }
}
