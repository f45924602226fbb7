/**
 * Tests for output sinks
 */

import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import { ConsoleSink, StreamSink } from '@/output/sinks.js';
import { createMemoryStream } from '../helpers/sinks.js';

describe('StreamSink', () => {
  it('writes a whole line by default', async () => {
    const memory = createMemoryStream();
    const sink = new StreamSink(memory.stream);

    await sink.write('Creating coffee...');

    expect(memory.chunks).toEqual(['Creating coffee...\n']);
  });

  it('splits lines into chunks', async () => {
    const memory = createMemoryStream();
    const sink = new StreamSink(memory.stream, { chunkSize: 2 });

    await sink.write('toast');

    expect(memory.chunks).toEqual(['to', 'as', 't\n']);
    expect(memory.output()).toBe('toast\n');
  });

  it('keeps characters outside the BMP whole when chunking', async () => {
    const memory = createMemoryStream();
    const sink = new StreamSink(memory.stream, { chunkSize: 1 });

    await sink.write('Creating 🍞...');

    expect(memory.chunks).toHaveLength(14);
    expect(memory.chunks[9]).toBe('🍞');
    expect(memory.output()).toBe('Creating 🍞...\n');
  });

  it('writes an empty line', async () => {
    const memory = createMemoryStream();
    const sink = new StreamSink(memory.stream, { chunkSize: 4 });

    await sink.write('');

    expect(memory.chunks).toEqual(['\n']);
  });

  it.each([-1, 1.5])('rejects chunkSize %s', (chunkSize) => {
    const memory = createMemoryStream();

    expect(() => new StreamSink(memory.stream, { chunkSize })).toThrow(
      `chunkSize must be a non-negative integer, got ${chunkSize}`,
    );
  });

  it('rejects when the stream fails', async () => {
    const stream = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('disk full'));
      },
    });
    const errors: Error[] = [];
    stream.on('error', (error) => errors.push(error));
    const sink = new StreamSink(stream);

    await expect(sink.write('Created toast!')).rejects.toThrow('disk full');
  });
});

describe('ConsoleSink', () => {
  it('is a stream sink over stdout', () => {
    expect(new ConsoleSink()).toBeInstanceOf(StreamSink);
  });
});
