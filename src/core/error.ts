/**
 * @file error.ts
 * @description Error classes raised by the dictionary and its cursors.
 */

/**
 * Base class for every failure the dictionary reports.
 *
 * None of these are fatal: each names a condition the caller can test for
 * and recover from.
 */
export class DictionaryError extends Error {
  explain: string;
  constructor(message: string) {
    super(message);
    this.name = 'DictionaryError';
    this.explain = message;
  }
}

/** No stored key lies on the requested side of the argument. */
export class NotFoundError extends DictionaryError {
  constructor(s: string) {
    super(s);
    this.name = 'NotFoundError';
  }
}

/** min/max requested from a dictionary with no keys. */
export class EmptyError extends DictionaryError {
  constructor(s: string = 'Dictionary is empty') {
    super(s);
    this.name = 'EmptyError';
  }
}

/** A cursor was advanced past its last element. */
export class ExhaustedError extends DictionaryError {
  constructor(s: string = 'No further elements') {
    super(s);
    this.name = 'ExhaustedError';
  }
}

/**
 * Cursor `remove()` called without a preceding `next()`, or called twice
 * for the same element.
 */
export class IllegalStateError extends DictionaryError {
  constructor(s: string) {
    super(s);
    this.name = 'IllegalStateError';
  }
}

/** The backing dictionary changed underneath a live cursor. */
export class ConcurrentModificationError extends DictionaryError {
  constructor(s: string = 'Backing dictionary has been modified') {
    super(s);
    this.name = 'ConcurrentModificationError';
  }
}

/**
 * Raised when verification finds the red-black properties broken.
 * Carries every violation found, not only the first.
 */
export class InvariantError extends DictionaryError {
  violations: string[];

  constructor(violations: string[]) {
    super(`Red-black invariants violated: ${violations.join('; ')}`);
    this.name = 'InvariantError';
    this.violations = violations;
  }
}
