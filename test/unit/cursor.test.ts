/**
 * @file cursor.test.ts
 * @description Tests for TreeCursor: ordered traversal, starting points,
 * removal through the cursor, and fail-fast detection.
 */

import { describe, it, expect } from 'vitest';
import { RedBlackTree } from '../../src/tree/redblack.js';
import { checkInvariants } from '../../src/tree/verify.js';
import {
  ConcurrentModificationError,
  EmptyError,
  ExhaustedError,
  IllegalStateError,
} from '../../src/core/error.js';
import { makeRng, range, shuffled } from '../helpers/prng.js';

function filled(keys: number[]): RedBlackTree<number> {
  const t = new RedBlackTree<number>();
  for (const k of keys) t.add(k);
  return t;
}

function drain<K>(c: { hasNext(): boolean; next(): K }): K[] {
  const out: K[] = [];
  while (c.hasNext()) out.push(c.next());
  return out;
}

describe('TreeCursor traversal', () => {
  it('iterates the whole tree in ascending order', () => {
    const t = filled(shuffled(range(0, 100), makeRng(3)));
    expect(drain(t.iterator())).toEqual(range(0, 100));
  });

  it('is immediately exhausted on an empty tree', () => {
    const c = new RedBlackTree<number>().iterator();
    expect(c.hasNext()).toBe(false);
    expect(() => c.next()).toThrow(ExhaustedError);
  });

  it('iteratorFrom starts at a stored key', () => {
    const t = filled(range(0, 100));
    expect(drain(t.iteratorFrom(50))).toEqual(range(50, 100));
  });

  it('iteratorFrom starts at the ceiling of a missing key', () => {
    const t = filled(range(0, 100));
    t.delete(50);
    const c = t.iteratorFrom(50);
    expect(c.next()).toBe(51);
  });

  it('iteratorFrom below the minimum starts at the minimum', () => {
    const t = filled([10, 20, 30]);
    expect(drain(t.iteratorFrom(-5))).toEqual([10, 20, 30]);
  });

  it('iteratorFrom past the maximum is exhausted', () => {
    const t = filled(range(0, 100));
    const c = t.iteratorFrom(101);
    expect(c.hasNext()).toBe(false);
    expect(() => c.next()).toThrow(ExhaustedError);
  });

  it('throws ExhaustedError after the last key', () => {
    const c = filled([1, 2]).iterator();
    expect(c.next()).toBe(1);
    expect(c.next()).toBe(2);
    expect(() => c.next()).toThrow(ExhaustedError);
  });

  it('supports for-of on the tree and on a cursor', () => {
    const t = filled([5, 1, 3]);
    expect([...t]).toEqual([1, 3, 5]);
    const seen: number[] = [];
    for (const k of t.iteratorFrom(2)) seen.push(k);
    expect(seen).toEqual([3, 5]);
  });
});

describe('TreeCursor.remove', () => {
  it('removes the key just returned and carries on from its successor', () => {
    const t = filled(range(0, 10));
    const c = t.iterator();
    const kept: number[] = [];
    while (c.hasNext()) {
      const k = c.next();
      if (k % 2 === 0) c.remove();
      else kept.push(k);
    }
    expect(kept).toEqual([1, 3, 5, 7, 9]);
    expect([...t]).toEqual([1, 3, 5, 7, 9]);
    expect(t.contains(4)).toBe(false);
    expect(checkInvariants(t).valid).toBe(true);
  });

  it('resumes at the successor after an interior removal', () => {
    const t = filled(range(0, 100));
    const c = t.iteratorFrom(31);
    expect(c.next()).toBe(31);
    c.remove();
    expect(t.contains(31)).toBe(false);
    expect(c.next()).toBe(32);
    expect(checkInvariants(t).valid).toBe(true);
  });

  it('can empty the tree', () => {
    const t = filled(shuffled(range(0, 64), makeRng(11)));
    const c = t.iterator();
    let count = 0;
    while (c.hasNext()) {
      c.next();
      c.remove();
      count++;
      expect(checkInvariants(t).violations).toEqual([]);
    }
    expect(count).toBe(64);
    expect(t.isEmpty()).toBe(true);
    expect(() => t.min()).toThrow(EmptyError);
  });

  it('keeps min and max current', () => {
    const t = filled([1, 2, 3]);
    const c = t.iterator();
    c.next();
    c.remove();
    expect(t.min()).toBe(2);
    while (c.hasNext()) c.next();
    c.remove();
    expect(t.max()).toBe(2);
  });

  it('rejects remove before any next', () => {
    const c = filled([1, 2]).iterator();
    expect(() => c.remove()).toThrow(IllegalStateError);
  });

  it('rejects a second remove for the same key', () => {
    const t = filled([1, 2]);
    const c = t.iterator();
    c.next();
    c.remove();
    expect(() => c.remove()).toThrow(IllegalStateError);
    expect([...t]).toEqual([2]);
  });
});

describe('TreeCursor fail-fast', () => {
  it('detects an external add', () => {
    const t = filled([1, 2, 3]);
    const c = t.iterator();
    t.add(4);
    expect(() => c.hasNext()).toThrow(ConcurrentModificationError);
    expect(() => c.next()).toThrow(ConcurrentModificationError);
  });

  it('detects an external delete', () => {
    const t = filled([1, 2, 3]);
    const c = t.iterator();
    c.next();
    t.delete(3);
    expect(() => c.hasNext()).toThrow(ConcurrentModificationError);
    expect(() => c.remove()).toThrow(ConcurrentModificationError);
  });

  it('ignores calls that change nothing', () => {
    const t = filled([1, 2, 3]);
    const c = t.iterator();
    t.add(2);
    t.delete(42);
    t.contains(1);
    expect(c.next()).toBe(1);
  });

  it('a removal through one cursor invalidates the others', () => {
    const t = filled([1, 2, 3]);
    const a = t.iterator();
    const b = t.iterator();
    a.next();
    a.remove();
    expect(a.next()).toBe(2);
    expect(() => b.hasNext()).toThrow(ConcurrentModificationError);
  });

  it('for-of over the tree fails when the tree changes mid-loop', () => {
    const t = filled([1, 2, 3]);
    expect(() => {
      for (const k of t) {
        if (k === 2) t.add(10);
      }
    }).toThrow(ConcurrentModificationError);
  });
});
