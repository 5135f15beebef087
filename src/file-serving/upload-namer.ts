import { lstatSync } from 'fs';
import * as path from 'path';

// Path separators, control characters and characters Windows refuses in names
const UNSAFE_CHARACTERS = /[/\\<>:"|?*\u0000-\u001f\u007f]/g;

/**
 * Make a client-supplied filename safe to join onto the shared folder.
 *
 * Separators and control characters become `_`, and leading or trailing dots and
 * whitespace are dropped, so the result is always a single plain path segment.
 * Returns an empty string when nothing usable is left.
 *
 * @example
 * toSafeFilename('../../etc/passwd') // => '_.._etc_passwd'
 * toSafeFilename('holiday photo.jpg') // => 'holiday photo.jpg'
 */
export function toSafeFilename(name: string): string {
  return name.replace(UNSAFE_CHARACTERS, '_').replace(/^[\s.]+|[\s.]+$/g, '');
}

/**
 * Pick the stored name for an upload.
 *
 * Returns the filtered name when nothing by that name exists in `root`, otherwise the
 * first free `{stem}_{n}{ext}` counting from 1. The caller must create the file right
 * away; the name is only free as of this call.
 *
 * @example
 * // root already holds photo.jpg and photo_1.jpg
 * reserveName('photo.jpg', root) // => 'photo_2.jpg'
 *
 * @throws Error when the name is empty after filtering
 */
// lstat so a dangling symlink counts as taken instead of being followed out of the folder
function isTaken(file: string): boolean {
  return lstatSync(file, { throwIfNoEntry: false }) !== undefined;
}

export function reserveName(desiredName: string, root: string): string {
  const filename = toSafeFilename(desiredName);
  if (!filename) {
    throw new Error(`Filename "${desiredName}" has no usable characters`);
  }

  if (!isTaken(path.join(root, filename))) return filename;

  const ext = path.extname(filename);
  const stem = filename.slice(0, filename.length - ext.length);
  let counter = 1;
  while (true) {
    const candidate = `${stem}_${counter}${ext}`;
    if (!isTaken(path.join(root, candidate))) return candidate;
    counter++;
  }
}
