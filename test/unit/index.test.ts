/**
 * @file index.test.ts
 * @description The package entry point exposes a working dictionary.
 */

import { describe, it, expect } from 'vitest';
import {
  RedBlackTree,
  OperationRecorder,
  StringWriter,
  NotFoundError,
  checkInvariants,
  type Dictionary,
} from '../../src/index.js';

describe('package entry point', () => {
  it('drives a dictionary through its public contract', () => {
    const log = new OperationRecorder();
    const dict: Dictionary<string> = new RedBlackTree<string>({ log });
    for (const w of ['delta', 'alpha', 'charlie', 'bravo']) dict.add(w);
    expect(dict.successor('bravo')).toBe('charlie');
    expect(() => dict.successor('delta')).toThrow(NotFoundError);
    expect([...dict]).toEqual(['alpha', 'bravo', 'charlie', 'delta']);

    const w = new StringWriter();
    log.writeTo(w);
    expect(w.toString().split('\n')[0]).toBe('Operation add(delta) completed using 0 comparison(s).');
  });

  it('exports the invariant checker', () => {
    const t = new RedBlackTree<number>();
    t.add(1);
    expect(checkInvariants(t).valid).toBe(true);
  });
});
