/**
 * Output Sinks
 *
 * Line sinks that work units and the runner write to.
 *
 * @module breakfast-scheduler/output/sinks
 */

import type { Writable } from 'node:stream';
import type { OutputSink } from '../engine/types.js';

/**
 * Options for {@link StreamSink}
 */
export interface StreamSinkOptions {
  /**
   * Write each line in chunks of this many characters, yielding to the
   * event loop between chunks. 0 writes the whole line at once.
   * @default 0
   */
  chunkSize?: number;
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Writes newline-terminated lines to a writable stream.
 *
 * With a `chunkSize`, a line is written piecewise, so lines written by
 * concurrently running units can interleave mid-line the way unsynchronized
 * console writes do.
 */
export class StreamSink implements OutputSink {
  private options: Required<StreamSinkOptions>;

  constructor(
    private stream: Writable,
    options: StreamSinkOptions = {}
  ) {
    const chunkSize = options.chunkSize ?? 0;
    if (!Number.isInteger(chunkSize) || chunkSize < 0) {
      throw new Error(`chunkSize must be a non-negative integer, got ${chunkSize}`);
    }
    this.options = { chunkSize };
  }

  async write(line: string): Promise<void> {
    // Split by code points so a chunk never ends inside a surrogate pair
    const characters = Array.from(`${line}\n`);
    const size = this.options.chunkSize > 0 ? this.options.chunkSize : characters.length;

    for (let offset = 0; offset < characters.length; offset += size) {
      if (offset > 0) {
        await yieldToEventLoop();
      }
      await this.writeChunk(characters.slice(offset, offset + size).join(''));
    }
  }

  private writeChunk(chunk: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(chunk, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}

/**
 * Sink writing to standard output
 */
export class ConsoleSink extends StreamSink {
  constructor(options: StreamSinkOptions = {}) {
    super(process.stdout, options);
  }
}
