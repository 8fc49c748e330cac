import fs from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import path from 'path';
import mime from 'mime-types';
import type { FileEntry, ScanResult } from '../common/fileTypes';
import { normaliseExtension, isDestinationFolderName } from '../common/classifier';
import { describeError } from '../common/errors';
import type { OrganizeMode, SizeCategory } from '../types/organizer';
import { shouldIgnoreFile, type IgnoreOptions } from './ignoreRules';

export interface ScanOptions extends IgnoreOptions {
  /** When set, directories matching this mode's folder names are reported */
  mode?: OrganizeMode;
  sizeCategories?: SizeCategory[];
}

const buildFileEntry = (filePath: string, stats: Stats, discoveryIndex: number): FileEntry => {
  const name = path.basename(filePath);
  return {
    path: filePath,
    name,
    size: stats.size,
    modifiedMs: stats.mtimeMs,
    extension: normaliseExtension(name),
    mimeType: mime.lookup(name) || null,
    discoveryIndex,
  };
};

const byCodeUnits = (a: string, b: string) => {
  if (a === b) return 0;
  return a < b ? -1 : 1;
};

// Plain code unit order does not depend on the host locale.
const sortEntries = (entries: Dirent[]): Dirent[] => [...entries].sort((a, b) => byCodeUnits(a.name, b.name));

/**
 * Counts entries per top-level media type (`image`, `text`, ...), with
 * `unknown` for names mime-types cannot place.
 */
export const countMediaTypes = (entries: FileEntry[]): Array<[mediaType: string, count: number]> => {
  const counts = new Map<string, number>();
  entries.forEach((entry) => {
    const mediaType = entry.mimeType?.split('/')[0] || 'unknown';
    counts.set(mediaType, (counts.get(mediaType) ?? 0) + 1);
  });
  return [...counts.entries()].sort(([a], [b]) => byCodeUnits(a, b));
};

/**
 * Lists the regular files directly under `rootPath`. Subdirectories are never
 * entered. Entries are numbered in name order so later phases can rely on a
 * stable discovery order.
 */
export const scanTargetDirectory = async (
  rootPath: string,
  options: ScanOptions = {},
): Promise<ScanResult> => {
  const absoluteRoot = path.resolve(rootPath);
  const dirEntries = sortEntries(await fs.readdir(absoluteRoot, { withFileTypes: true }));
  const result: ScanResult = {
    rootPath: absoluteRoot,
    entries: [],
    destinationFolders: [],
    failures: [],
  };

  for (const entry of dirEntries) {
    const entryPath = path.join(absoluteRoot, entry.name);

    if (entry.isSymbolicLink()) {
      // eslint-disable-next-line no-continue
      continue;
    }

    if (entry.isDirectory()) {
      if (options.mode && isDestinationFolderName(options.mode, entry.name, options.sizeCategories)) {
        result.destinationFolders.push(entryPath);
      }
      // eslint-disable-next-line no-continue
      continue;
    }

    if (!entry.isFile() || shouldIgnoreFile(entry.name, options)) {
      // eslint-disable-next-line no-continue
      continue;
    }

    try {
      const stats = await fs.lstat(entryPath);
      if (!stats.isFile()) {
        // eslint-disable-next-line no-continue
        continue;
      }
      result.entries.push(buildFileEntry(entryPath, stats, result.entries.length));
    } catch (error: unknown) {
      result.failures.push({ path: entryPath, message: describeError(error) });
    }
  }

  return result;
};

export type { FileEntry, ScanResult } from '../common/fileTypes';
