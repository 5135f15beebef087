/**
 * Shared-folder transfer endpoints
 *
 * Serves one folder over HTTP: a listing, multipart uploads that never overwrite an
 * existing file, and downloads that honour `Range` so interrupted transfers of large
 * files can resume where they stopped.
 *
 * ## API Overview
 *
 * ### Building blocks
 * - `sanitizePath()` - Decode and confine a requested name to the shared folder
 * - `reserveName()` - Pick a collision-free stored name (`photo.jpg` → `photo_1.jpg`)
 * - `parseRange()` - Lenient `Range: bytes=start-end` parsing
 * - `readChunks()` - Lazy, bounded-memory reads of a byte range
 * - `listFiles()` - Regular files in the folder with display sizes and icons
 *
 * ### Express Router
 * - `createTransferRouter()` - `GET /`, `POST /upload`, `GET /download/<name>`
 *
 * @module file-serving
 *
 * @example
 * // Resume a download from byte 1048576
 * // curl -H 'Range: bytes=1048576-' http://192.168.1.20:5000/download/movie.mkv
 *
 * @example
 * import { createTransferRouter } from 'quickdrop';
 *
 * const app = express();
 * app.use(createTransferRouter({ sharedFolder: config.sharedFolder, chunkSize: config.chunkSize }, { logger }));
 */

export * from './chunk-stream.ts';
export * from './listing.ts';
export * from './page.ts';
export * from './range.ts';
export * from './router.ts';
export * from './sanitize-path.ts';
export * from './types.ts';
export * from './upload.ts';
export * from './upload-namer.ts';
