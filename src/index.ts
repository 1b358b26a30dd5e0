/**
 * @file index.ts
 * @description Public entry point.
 */

export { RedBlackTree } from './tree/redblack.js';
export { TreeCursor } from './tree/cursor.js';
export type { Cursor, Dictionary } from './tree/dictionary.js';
export { checkInvariants, assertInvariants } from './tree/verify.js';
export type { InvariantReport } from './tree/verify.js';
export { renderTree } from './tree/render.js';

export { naturalOrder, ComparisonCounter } from './core/compare.js';
export type { Comparator } from './core/compare.js';
export type { DictionaryOptions } from './core/options.js';
export {
  DictionaryError,
  NotFoundError,
  EmptyError,
  ExhaustedError,
  IllegalStateError,
  ConcurrentModificationError,
  InvariantError,
} from './core/error.js';

export { OperationRecorder, formatRecord } from './util/oplog.js';
export type { OperationLog, OperationRecord } from './util/oplog.js';
export { StringWriter, ConsoleWriter } from './util/writer.js';
export type { Writer } from './util/writer.js';
