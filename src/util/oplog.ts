/**
 * @file oplog.ts
 * @description Operation log sink: one record per public dictionary call,
 * kept in call order until drained.
 */

import type { Writer } from './writer.js';

/** What the dictionary reports after each public call. */
export interface OperationRecord {
  /** Method name, e.g. `add` or `iteratorFrom`. */
  operation: string;
  /** The key passed in; absent for nullary calls such as `min()`. */
  argument?: unknown;
  /** Key comparisons performed while the call ran. */
  comparisons: number;
}

/** Receiver for operation records.  Must not call back into the tree. */
export interface OperationLog {
  record(entry: OperationRecord): void;
}

/**
 * Render one record as a report line (no trailing newline):
 * `Operation add(5) completed using 3 comparison(s).`
 */
export function formatRecord(entry: OperationRecord): string {
  const arg = 'argument' in entry ? String(entry.argument) : '';
  return `Operation ${entry.operation}(${arg}) completed using ${entry.comparisons} comparison(s).`;
}

/**
 * Buffers records in memory.
 *
 * `writeTo` flushes the buffer as a text report and clears it, so two
 * successive reports never repeat a call.
 */
export class OperationRecorder implements OperationLog {
  private buf: OperationRecord[] = [];

  record(entry: OperationRecord): void {
    this.buf.push(entry);
  }

  get entries(): readonly OperationRecord[] {
    return this.buf;
  }

  /** Return everything recorded so far and start a fresh buffer. */
  drain(): OperationRecord[] {
    const out = this.buf;
    this.buf = [];
    return out;
  }

  reset(): void {
    this.buf = [];
  }

  writeTo(w: Writer): void {
    for (const entry of this.drain()) {
      w.write(formatRecord(entry));
      w.write('\n');
    }
  }
}
