/**
 * @file writer.ts
 * @description Minimal text sink used for tree dumps and operation reports.
 */

/**
 * Anything that accepts text.  Implementations can buffer into a string,
 * forward to a stream, or collect lines for a test.
 */
export interface Writer {
  write(s: string): void;
}

/**
 * Writer that accumulates output into a string buffer.
 */
export class StringWriter implements Writer {
  private buf: string[] = [];

  write(s: string): void {
    this.buf.push(s);
  }

  toString(): string {
    return this.buf.join('');
  }

  clear(): void {
    this.buf.length = 0;
  }
}

/**
 * Writer that forwards to process stdout, or stderr when asked.
 */
export class ConsoleWriter implements Writer {
  private readonly stream: NodeJS.WriteStream;

  constructor(target: 'stdout' | 'stderr' = 'stdout') {
    this.stream = target === 'stderr' ? process.stderr : process.stdout;
  }

  write(s: string): void {
    this.stream.write(s);
  }
}
