/**
 * Byte interval of a download, `end` inclusive.
 * `partial` is true whenever the client sent a Range header, which is what selects 206 over 200.
 */
export interface RangeSpec {
  start: number;
  end: number;
  partial: boolean;
}

const DIGITS = /^\s*\d+\s*$/;

/**
 * Parse a `Range: bytes=<start>-<end>` header.
 *
 * Lenient on purpose: a header that cannot be read is treated as a request for the
 * whole file instead of being rejected, which keeps download managers with sloppy
 * headers working. Whether the result fits the file is left to `clampRange()`.
 *
 * @example
 * parseRange(undefined, 5)       // => { start: 0, end: 4, partial: false }
 * parseRange('bytes=1-3', 5)     // => { start: 1, end: 3, partial: true }
 * parseRange('bytes=2-', 5)      // => { start: 2, end: 4, partial: true }
 * parseRange('bytes=abc-1', 5)   // => { start: 0, end: 4, partial: true }
 */
export function parseRange(header: string | undefined, fileSize: number): RangeSpec {
  const whole = { start: 0, end: fileSize - 1 };
  if (!header) return { ...whole, partial: false };

  // Anything after a second '-' is ignored
  const [rawStart = '', rawEnd] = header.replace('bytes=', '').split('-');
  if (rawEnd === undefined) return { ...whole, partial: true };

  if ((rawStart && !DIGITS.test(rawStart)) || (rawEnd && !DIGITS.test(rawEnd))) {
    return { ...whole, partial: true };
  }

  return {
    start: rawStart ? Number(rawStart) : 0,
    end: rawEnd ? Number(rawEnd) : fileSize - 1,
    partial: true,
  };
}

/**
 * Fit a requested range to the file: an `end` past the last byte is pulled back to it.
 * Returns null when no byte of the file is covered (start past the end, or an empty file).
 * Whole-file ranges pass through untouched so that empty files still download.
 */
export function clampRange(range: RangeSpec, fileSize: number): RangeSpec | null {
  if (!range.partial) return range;
  const end = Math.min(range.end, fileSize - 1);
  if (range.start > end) return null;
  return { ...range, end };
}

export function contentLength(range: RangeSpec): number {
  return range.end - range.start + 1;
}
