/**
 * Incremental parser for `data:`-framed event streams.
 *
 * Works on raw bytes: chunks are appended to a byte buffer and complete lines
 * (terminated by `\n`, optional trailing `\r`) are drained and decoded one at a
 * time. A line is only decoded once it is complete, so multi-byte characters
 * split across chunks are never seen half-way.
 */

import { getErrorMessage, StreamError } from '@cloudcall/core';
import { getLogger } from '@cloudcall/logger';
import { err, ok, type Result } from 'neverthrow';

export type StreamFrame = { data: string; type: 'data' } | { type: 'done' };

export const DEFAULT_MAX_BUFFER_BYTES = 1_048_576;
export const DONE_SENTINEL = '[DONE]';

export interface ParseFramesOptions {
  /** A line reaching this many bytes before its terminator fails the stream. */
  maxBufferBytes?: number | undefined;
}

const LF = 0x0a;
const CR = 0x0d;
const DATA_PREFIX = 'data:';
const BOM = '\uFEFF';

const logger = getLogger('FrameParser');

const overflowError = (maxBufferBytes: number, lineBytes: number): StreamError =>
  new StreamError(`line exceeds maximum buffer size of ${maxBufferBytes} bytes`, {
    context: { bufferedBytes: lineBytes },
  });

function append(buffer: Uint8Array, chunk: Uint8Array): Uint8Array {
  if (buffer.length === 0) {
    return chunk;
  }
  const merged = new Uint8Array(buffer.length + chunk.length);
  merged.set(buffer, 0);
  merged.set(chunk, buffer.length);
  return merged;
}

/**
 * Interpret one decoded line. Returns undefined for lines that carry no frame
 * (comments, other fields, blank keep-alives).
 */
export function parseLine(line: string): StreamFrame | undefined {
  if (!line.startsWith(DATA_PREFIX)) {
    return undefined;
  }
  const payload = line.startsWith(' ', DATA_PREFIX.length)
    ? line.slice(DATA_PREFIX.length + 1)
    : line.slice(DATA_PREFIX.length);

  if (payload === DONE_SENTINEL) {
    return { type: 'done' };
  }
  return { data: payload, type: 'data' };
}

/**
 * Turn a byte-chunk source into a lazy sequence of frames.
 *
 * The sequence ends after the done sentinel, after the source ends, or right
 * after the first error it yields. Stopping iteration early releases the
 * source.
 */
export async function* parseFrames(
  source: AsyncIterable<Uint8Array>,
  options: ParseFramesOptions = {}
): AsyncGenerator<Result<StreamFrame, StreamError>, void, undefined> {
  const maxBufferBytes = options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;
  const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  const iterator = source[Symbol.asyncIterator]();
  let buffer: Uint8Array = new Uint8Array(0);
  let sourceSettled = false;
  let firstLine = true;

  try {
    while (true) {
      let next: IteratorResult<Uint8Array>;
      try {
        next = await iterator.next();
      } catch (error) {
        sourceSettled = true;
        yield err(new StreamError(`failed to read stream: ${getErrorMessage(error)}`, { cause: error }));
        return;
      }

      if (next.done) {
        sourceSettled = true;
        if (buffer.length > 0) {
          logger.debug({ bytes: buffer.length }, 'Discarding unterminated trailing line');
        }
        return;
      }

      // Measure the line this chunk extends before merging it in.
      const chunk = next.value;
      const firstNewline = chunk.indexOf(LF);
      const pendingLine = buffer.length + (firstNewline === -1 ? chunk.length : firstNewline);
      if (pendingLine >= maxBufferBytes) {
        yield err(overflowError(maxBufferBytes, pendingLine));
        return;
      }

      buffer = append(buffer, chunk);

      let newline = buffer.indexOf(LF);
      while (newline !== -1) {
        if (newline >= maxBufferBytes) {
          yield err(overflowError(maxBufferBytes, newline));
          return;
        }
        const end = newline > 0 && buffer[newline - 1] === CR ? newline - 1 : newline;
        const lineBytes = buffer.subarray(0, end);
        buffer = buffer.subarray(newline + 1);

        let line: string;
        try {
          line = decoder.decode(lineBytes);
        } catch (error) {
          firstLine = false;
          logger.debug({ bytes: lineBytes.length, error: getErrorMessage(error) }, 'Skipping line with invalid UTF-8');
          newline = buffer.indexOf(LF);
          continue;
        }

        // A byte order mark only counts at the very start of the stream.
        if (firstLine && line.startsWith(BOM)) {
          line = line.slice(BOM.length);
        }
        firstLine = false;

        const frame = parseLine(line);
        if (frame) {
          yield ok(frame);
          if (frame.type === 'done') {
            return;
          }
        }
        newline = buffer.indexOf(LF);
      }

      if (buffer.length >= maxBufferBytes) {
        yield err(overflowError(maxBufferBytes, buffer.length));
        return;
      }
    }
  } finally {
    if (!sourceSettled) {
      await iterator.return?.();
    }
  }
}
