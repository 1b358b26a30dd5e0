/**
 * @file options.ts
 * @description Construction options for the dictionary.
 */

import { naturalOrder } from './compare.js';
import type { Comparator } from './compare.js';
import type { OperationLog } from '../util/oplog.js';

export interface DictionaryOptions<K> {
  /** Key order.  Defaults to `naturalOrder` (numbers, strings, bigints). */
  comparator?: Comparator<K>;
  /** Receives one record per public call. */
  log?: OperationLog;
  /**
   * Check every red-black property after each mutation and throw
   * `InvariantError` on failure.  O(n) per mutation; meant for tests and
   * debugging.  Defaults to on when `DEBUG_RBTREE=1`.
   */
  verify?: boolean;
}

export interface ResolvedOptions<K> {
  comparator: Comparator<K>;
  log: OperationLog | null;
  verify: boolean;
  /** Print verification failures to stderr before throwing. */
  debug: boolean;
}

export function debugEnabled(): boolean {
  return process.env.DEBUG_RBTREE === '1';
}

export function resolveOptions<K>(options: DictionaryOptions<K> = {}): ResolvedOptions<K> {
  const debug = debugEnabled();
  return {
    comparator: options.comparator ?? naturalOrder,
    log: options.log ?? null,
    verify: options.verify ?? debug,
    debug,
  };
}
