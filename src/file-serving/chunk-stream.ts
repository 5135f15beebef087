import { open } from 'fs/promises';
import { Readable } from 'stream';
import type { RangeSpec } from './range.ts';

export const DEFAULT_CHUNK_SIZE = 1024 * 1024;

/**
 * Read `range` of a file as a lazy sequence of chunks of at most `chunkSize` bytes.
 *
 * The file is opened on the first pull and closed when the sequence ends, when the
 * consumer calls `return()`, or when the stream wrapping it is destroyed. A short read
 * ends the sequence early, so a file that shrank mid-transfer yields fewer bytes than
 * the range asked for. Sequences cannot be rewound; resuming means a new range.
 */
export async function* readChunks(filePath: string, range: Pick<RangeSpec, 'start' | 'end'>, chunkSize: number = DEFAULT_CHUNK_SIZE): AsyncGenerator<Buffer, void, undefined> {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  const handle = await open(filePath, 'r');
  try {
    let position = range.start;
    let remaining = range.end - range.start + 1;

    while (remaining > 0) {
      const size = Math.min(chunkSize, remaining);
      const buffer = Buffer.allocUnsafe(size);
      const { bytesRead } = await handle.read(buffer, 0, size, position);
      if (bytesRead === 0) break;

      position += bytesRead;
      remaining -= bytesRead;
      yield bytesRead === size ? buffer : buffer.subarray(0, bytesRead);

      if (bytesRead < size) break;
    }
  } finally {
    await handle.close();
  }
}

/**
 * Wrap `readChunks()` in a Readable for piping into a response.
 * Destroying the stream (client went away) returns the generator, which closes the file.
 */
export function createChunkStream(filePath: string, range: Pick<RangeSpec, 'start' | 'end'>, chunkSize: number = DEFAULT_CHUNK_SIZE): Readable {
  return Readable.from(readChunks(filePath, range, chunkSize), { objectMode: false });
}
