import { readdir, stat } from 'fs/promises';
import * as path from 'path';
import type { Logger } from '../types.ts';

export interface FileEntry {
  name: string;
  sizeBytes: number;
  displaySize: string;
  icon: string;
}

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB'] as const;

const DEFAULT_ICON = '📄';

const ICON_GROUPS: ReadonlyArray<[icon: string, extensions: readonly string[]]> = [
  ['📕', ['pdf']],
  ['📘', ['doc', 'docx']],
  ['📗', ['xls', 'xlsx']],
  ['📙', ['ppt', 'pptx']],
  ['🖼️', ['jpg', 'jpeg', 'png', 'gif', 'webp']],
  ['🎬', ['mp4', 'mov', 'avi', 'mkv']],
  ['🎵', ['mp3', 'wav', 'flac', 'm4a']],
  ['📦', ['zip', 'rar', '7z', 'tar', 'gz']],
  ['📄', ['txt', 'md']],
  ['🐍', ['py']],
  ['💛', ['js']],
  ['🌐', ['html']],
  ['🎨', ['css']],
  ['🤖', ['apk']],
];

const ICONS_BY_EXTENSION = new Map(ICON_GROUPS.flatMap(([icon, extensions]) => extensions.map((ext) => [ext, icon] as const)));

/**
 * Human readable size with one decimal, 1024-based.
 *
 * @example
 * formatSize(5)        // => '5.0 B'
 * formatSize(1536)     // => '1.5 KB'
 * formatSize(1024 ** 5) // => '1.0 TB'
 */
export function formatSize(sizeBytes: number): string {
  let value = sizeBytes;
  for (const unit of SIZE_UNITS) {
    if (value < 1024) return `${value.toFixed(1)} ${unit}`;
    value /= 1024;
  }
  return `${value.toFixed(1)} TB`;
}

export function fileIcon(filename: string): string {
  const dot = filename.lastIndexOf('.');
  if (dot === -1) return DEFAULT_ICON;
  return ICONS_BY_EXTENSION.get(filename.slice(dot + 1).toLowerCase()) ?? DEFAULT_ICON;
}

/**
 * List the regular files directly inside `root`, sorted by case-insensitive name.
 * Symlinks are followed; subdirectories and entries that cannot be stat'ed are left out.
 * An unreadable folder gives an empty list.
 */
export async function listFiles(root: string, logger?: Logger): Promise<FileEntry[]> {
  let names: string[];
  try {
    names = await readdir(root);
  } catch (error) {
    logger?.error('Error listing files:', error instanceof Error ? { message: error.message } : { error: String(error) });
    return [];
  }

  const entries: FileEntry[] = [];
  for (const name of names) {
    try {
      const stats = await stat(path.join(root, name));
      if (!stats.isFile()) continue;
      entries.push({ name, sizeBytes: stats.size, displaySize: formatSize(stats.size), icon: fileIcon(name) });
    } catch (error) {
      logger?.debug(`Skipping ${name}:`, error instanceof Error ? error.message : String(error));
    }
  }

  return entries.sort((a, b) => compareNames(a.name.toLowerCase(), b.name.toLowerCase()));
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
