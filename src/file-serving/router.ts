import busboy from 'busboy';
import express, { type Request, type Response, type Router } from 'express';
import { stat } from 'fs/promises';
import * as path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { httpStatusFor, type Logger } from '../types.ts';
import { createChunkStream, DEFAULT_CHUNK_SIZE } from './chunk-stream.ts';
import { listFiles } from './listing.ts';
import { renderListingPage } from './page.ts';
import { clampRange, contentLength, parseRange } from './range.ts';
import { sanitizePath } from './sanitize-path.ts';
import { DEFAULT_MAX_UPLOAD_BYTES, type TransferConfig, type TransferRouterOptions, type UploadResponse } from './types.ts';
import { openUploadTarget, type UploadTarget, writeUpload } from './upload.ts';

const UPLOAD_FIELD = 'files';
const DOWNLOAD_PREFIX = '/download/';

/**
 * Percent-encode a filename for `filename*=UTF-8''...` (RFC 5987 attr-chars only)
 */
export function encodeRfc5987(value: string): string {
  return encodeURIComponent(value).replace(/['()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);
}

function describeError(error: unknown): Record<string, unknown> {
  return error instanceof Error ? { message: error.message, stack: error.stack } : { error: String(error) };
}

function isPrematureClose(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ERR_STREAM_PREMATURE_CLOSE';
}

/**
 * Create an Express router exposing the shared folder
 *
 * Routes:
 * - `GET /` - listing, as HTML or as JSON (`Accept: application/json`)
 * - `POST /upload` - multipart upload, repeatable field `files`
 * - `GET /download/<name>` - download with `Range` support for resuming
 *
 * @param config - Shared folder and transfer limits
 * @param options - Logger
 * @returns Express router ready to mount on an Express app
 *
 * @example
 * const app = express();
 * app.use(createTransferRouter({ sharedFolder: '/srv/share' }, { logger: console }));
 */
export function createTransferRouter(config: TransferConfig, options: TransferRouterOptions): Router {
  const { chunkSize = DEFAULT_CHUNK_SIZE, maxUploadBytes = DEFAULT_MAX_UPLOAD_BYTES, exclusiveCreate = true } = config;
  const { logger } = options;

  const router = express.Router();
  const root = path.resolve(config.sharedFolder);

  router.get('/', async (_req: Request, res: Response) => {
    const files = await listFiles(root, logger);
    const sendJson = () => {
      res.json({ sharedFolder: root, files });
    };

    res.format({
      'text/html': () => {
        res.send(renderListingPage(files, root));
      },
      'application/json': sendJson,
      default: sendJson,
    });
  });

  router.post('/upload', (req: Request, res: Response) => {
    const declaredLength = Number(req.headers['content-length']);
    if (declaredLength > maxUploadBytes) {
      res.status(413).json({ error: 'Upload too large' });
      return;
    }

    let parser: busboy.Busboy;
    try {
      parser = busboy({ headers: req.headers, limits: { fileSize: maxUploadBytes } });
    } catch (_error) {
      // Not multipart, or no boundary
      res.status(400).json({ error: 'No files' });
      return;
    }

    const saves: Promise<string | null>[] = [];
    let sawFilesField = false;
    let aborted = false;
    // Reservations run one at a time, in part order, so duplicate names within a request get _1, _2, ...
    let reserving: Promise<unknown> = Promise.resolve();

    const storeUpload = async (file: Readable, filename: string, target: Promise<UploadTarget>): Promise<string | null> => {
      let truncated = false;
      file.once('limit', () => {
        truncated = true;
      });

      let opened: UploadTarget;
      try {
        opened = await target;
      } catch (error) {
        file.resume();
        logger.warn(`Could not store upload "${filename}":`, describeError(error));
        return null;
      }

      try {
        await writeUpload(file, opened);
      } catch (error) {
        logger.warn(`Upload of "${opened.name}" failed:`, describeError(error));
        return null;
      }

      if (truncated) {
        logger.warn(`Upload of "${opened.name}" exceeded ${maxUploadBytes} bytes and was cut off`);
        return null;
      }
      logger.info(`Received ${opened.name}`);
      return opened.name;
    };

    const abort = (error: Error) => {
      if (aborted) return;
      aborted = true;
      logger.warn('Upload aborted:', describeError(error));
      req.unpipe(parser);
      parser.destroy(error);
      if (!res.headersSent) res.status(400).json({ error: 'Malformed upload' });
    };

    parser.on('file', (field, file, info) => {
      if (field !== UPLOAD_FIELD) {
        file.resume();
        return;
      }
      sawFilesField = true;
      if (!info.filename) {
        file.resume();
        return;
      }

      const target = reserving.then(() => openUploadTarget(root, info.filename, exclusiveCreate));
      reserving = target.catch(() => undefined);
      saves.push(storeUpload(file, info.filename, target));
    });

    parser.on('field', (field) => {
      // A file input left empty arrives without a filename, which busboy reports as a field
      if (field === UPLOAD_FIELD) sawFilesField = true;
    });

    parser.on('error', (error: unknown) => abort(error instanceof Error ? error : new Error(String(error))));

    parser.on('close', async () => {
      if (aborted) return;
      const results = await Promise.all(saves);
      if (res.headersSent) return;

      if (!sawFilesField) {
        res.status(400).json({ error: 'No files' });
        return;
      }
      const body: UploadResponse = { uploaded: results.filter((name): name is string => name !== null) };
      res.json(body);
    });

    req.on('close', () => {
      if (!req.complete) abort(new Error('Client closed the connection mid-upload'));
    });

    req.pipe(parser);
  });

  // Matched as a pattern so the name reaches the sanitizer still percent-encoded
  router.get(/^\/download\/.+/, async (req: Request, res: Response) => {
    try {
      const result = await sanitizePath(req.path.slice(DOWNLOAD_PREFIX.length), root);
      if (result.type === 'error') {
        res.status(httpStatusFor(result.code)).send(result.error);
        return;
      }

      const { size } = await stat(result.path);
      const range = clampRange(parseRange(req.get('range'), size), size);
      if (!range) {
        res.status(416).set('Content-Range', `bytes */${size}`).send('Range not satisfiable');
        return;
      }

      res.status(range.partial ? 206 : 200);
      res.set({
        'Content-Type': 'application/octet-stream',
        'Content-Disposition': `attachment; filename*=UTF-8''${encodeRfc5987(path.basename(result.name))}`,
        'Content-Length': String(contentLength(range)),
        'Accept-Ranges': 'bytes',
        'Cache-Control': 'no-cache',
        'X-Accel-Buffering': 'no',
      });
      if (size > 0) res.set('Content-Range', `bytes ${range.start}-${range.end}/${size}`);

      if (req.method === 'HEAD') {
        res.end();
        return;
      }

      try {
        await pipeline(createChunkStream(result.path, range, chunkSize), res);
      } catch (error) {
        if (isPrematureClose(error)) {
          logger.debug(`Transfer of ${result.name} aborted by client`);
        } else {
          logger.error(`Transfer of ${result.name} failed:`, describeError(error));
          res.destroy();
        }
      }
    } catch (error) {
      logger.error('Error handling download:', describeError(error));
      if (!res.headersSent) {
        res.status(500).send('Internal server error');
      } else {
        res.destroy();
      }
    }
  });

  return router;
}
