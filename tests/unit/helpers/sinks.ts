/**
 * Test sinks
 *
 * In-memory output destinations for engine and CLI tests.
 */

import { Writable } from 'node:stream';
import type { OutputSink } from '@/engine/types.js';

/**
 * Records each written line
 */
export class RecordingSink implements OutputSink {
  lines: string[] = [];

  async write(line: string): Promise<void> {
    this.lines.push(line);
  }
}

/**
 * Recording sink that fails for the given lines
 */
export class FailingSink extends RecordingSink {
  constructor(private failOn: string[]) {
    super();
  }

  async write(line: string): Promise<void> {
    if (this.failOn.includes(line)) {
      throw new Error(`failed to write "${line}"`);
    }
    this.lines.push(line);
  }
}

/**
 * Writable stream that keeps every chunk it receives
 */
export function createMemoryStream(): { stream: Writable; chunks: string[]; output: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, chunks, output: () => chunks.join('') };
}
