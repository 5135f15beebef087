import { realpath, stat } from 'fs/promises';
import * as path from 'path';
import { createActionableError, type ErrorBranch } from '../types.ts';

export interface SanitizedPath {
  type: 'success';
  /** Resolved absolute path, symlinks followed */
  path: string;
  /** The decoded name as the client asked for it */
  name: string;
}

export type SanitizeResult = SanitizedPath | ErrorBranch;

const DRIVE_PREFIX = /^[A-Za-z]:/;

/**
 * Validate a client-supplied filename against the shared folder.
 *
 * The name is URL-decoded once, rejected outright when it carries a `..` segment or
 * starts at a filesystem root, then resolved (symlinks included) and checked to stay
 * under the resolved root. Only regular files pass; directories look like missing files.
 *
 * @example
 * const result = await sanitizePath('report%20v2.pdf', '/home/me/Downloads/PhoneTransfer');
 * if (result.type === 'error') res.status(httpStatusFor(result.code)).send(result.error);
 */
export async function sanitizePath(requestedName: string, root: string): Promise<SanitizeResult> {
  let name: string;
  try {
    name = decodeURIComponent(requestedName);
  } catch (_error) {
    return createActionableError('Invalid filename', 'INVALID_PATH', 'Filename is not valid percent-encoding');
  }

  if (!name || name.includes('..') || name.includes('\0') || name.startsWith('/') || name.startsWith('\\') || DRIVE_PREFIX.test(name)) {
    return createActionableError('Invalid filename', 'INVALID_PATH');
  }

  let resolvedRoot: string;
  let resolvedFile: string;
  try {
    resolvedRoot = await realpath(path.resolve(root));
    resolvedFile = await realpath(path.join(resolvedRoot, name));
  } catch (_error) {
    // ENOENT, ENOTDIR, ELOOP and dangling symlinks all mean there is nothing to serve
    return createActionableError('File not found', 'NOT_FOUND');
  }

  if (!isWithin(resolvedFile, resolvedRoot)) {
    return createActionableError('Access denied', 'ACCESS_DENIED');
  }

  try {
    const stats = await stat(resolvedFile);
    if (!stats.isFile()) return createActionableError('File not found', 'NOT_FOUND');
  } catch (_error) {
    return createActionableError('File not found', 'NOT_FOUND');
  }

  return { type: 'success', path: resolvedFile, name };
}

export function isWithin(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}
