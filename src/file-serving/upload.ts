import { type FileHandle, open } from 'fs/promises';
import * as path from 'path';
import type { Readable } from 'stream';
import { reserveName } from './upload-namer.ts';

export interface UploadTarget {
  name: string;
  handle: FileHandle;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Reserve a name for an upload and create the file under it.
 *
 * With `exclusive` the file is opened with O_EXCL, and a name taken by a concurrent
 * upload between the existence check and the open sends us back to `reserveName()`.
 * Without it the open truncates whatever is there, so two uploads racing for the same
 * name can both land on it and the later one wins.
 */
export async function openUploadTarget(root: string, desiredName: string, exclusive: boolean): Promise<UploadTarget> {
  while (true) {
    const name = reserveName(desiredName, root);
    try {
      const handle = await open(path.join(root, name), exclusive ? 'wx' : 'w');
      return { name, handle };
    } catch (error) {
      if (exclusive && isErrnoException(error) && error.code === 'EEXIST') continue;
      throw error;
    }
  }
}

/**
 * Copy an upload stream into an opened target; the handle is closed when this settles.
 *
 * On a write error the rest of the upload is drained and discarded so the multipart
 * parser can move on to the next part. Whatever was written stays on disk.
 */
export function writeUpload(source: Readable, target: UploadTarget): Promise<void> {
  return new Promise((resolve, reject) => {
    const out = target.handle.createWriteStream();

    const fail = (error: Error) => {
      source.unpipe(out);
      source.resume();
      out.destroy();
      reject(error);
    };

    out.once('error', fail);
    source.once('error', fail);
    out.once('close', () => resolve());
    source.pipe(out);
  });
}
