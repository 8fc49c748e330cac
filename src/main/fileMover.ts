import fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import path from 'path';
import { NameCollisionError, PerEntryWriteError, describeError, getErrorCode } from '../common/errors';

export const DEFAULT_MAX_NAME_ATTEMPTS = 100;

export type FileLockState = 'ok' | 'locked' | 'missing';

export interface MoveResult {
  targetPath: string;
  /** True when the original name was taken and a suffixed one was used */
  renamed: boolean;
}

export interface MoveOptions {
  maxAttempts?: number;
}

export const pathExists = async (targetPath: string) => {
  try {
    await fs.lstat(targetPath);
    return true;
  } catch {
    return false;
  }
};

export const defaultCheckFileLock = async (targetPath: string): Promise<FileLockState> => {
  try {
    const handle = await fs.open(targetPath, 'r+');
    await handle.close();
    return 'ok';
  } catch (error: unknown) {
    const code = getErrorCode(error);
    if (code === 'ENOENT') {
      return 'missing';
    }
    if (code === 'EBUSY' || code === 'ETXTBSY') {
      return 'locked';
    }
    // Read-only or permission-restricted files are left to the move or
    // delete itself, which reports the real error.
    return 'ok';
  }
};

/**
 * `report.pdf`, `report (1).pdf`, `report (2).pdf`, ...
 * Dot-files keep their whole name as the stem.
 */
export const candidateFileName = (fileName: string, attempt: number): string => {
  if (attempt === 0) {
    return fileName;
  }
  const lastDot = fileName.lastIndexOf('.');
  const hasExtension = lastDot > 0 && lastDot < fileName.length - 1;
  const stem = hasExtension ? fileName.slice(0, lastDot) : fileName;
  const extension = hasExtension ? fileName.slice(lastDot) : '';
  return `${stem} (${attempt})${extension}`;
};

/**
 * Creates `<rootPath>/<folderName>` when missing. Returns true when this call
 * created it.
 */
export const ensureDestinationFolder = async (rootPath: string, folderName: string): Promise<boolean> => {
  if (!folderName || folderName === '.' || folderName === '..' || /[\\/]/.test(folderName)) {
    throw new PerEntryWriteError(rootPath, `Invalid destination folder name "${folderName}"`);
  }
  const folderPath = path.join(rootPath, folderName);
  try {
    const stats = await fs.lstat(folderPath);
    if (!stats.isDirectory()) {
      throw new PerEntryWriteError(folderPath, `Destination ${folderPath} exists and is not a directory`);
    }
    return false;
  } catch (error: unknown) {
    if (error instanceof PerEntryWriteError) {
      throw error;
    }
    if (getErrorCode(error) !== 'ENOENT') {
      throw new PerEntryWriteError(folderPath, `Cannot inspect ${folderPath}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
  try {
    await fs.mkdir(folderPath);
    return true;
  } catch (error: unknown) {
    if (getErrorCode(error) === 'EEXIST') {
      return false;
    }
    throw new PerEntryWriteError(folderPath, `Cannot create folder ${folderPath}: ${describeError(error)}`, {
      cause: error,
    });
  }
};

const copyAcrossDevices = async (sourcePath: string, targetPath: string) => {
  const sourceStats = await fs.stat(sourcePath);
  await fs.copyFile(sourcePath, targetPath, fsConstants.COPYFILE_EXCL);
  try {
    const copiedStats = await fs.stat(targetPath);
    if (copiedStats.size !== sourceStats.size) {
      throw new Error(`Copied ${copiedStats.size} of ${sourceStats.size} bytes`);
    }
    await fs.utimes(targetPath, sourceStats.atime, sourceStats.mtime);
  } catch (error: unknown) {
    await fs.rm(targetPath, { force: true });
    throw error;
  }

  try {
    await fs.unlink(sourcePath);
  } catch (error: unknown) {
    // Already gone: the copy is now the only one.
    if (getErrorCode(error) === 'ENOENT') {
      return;
    }
    // The source stays where it was, so the copy goes.
    await fs.rm(targetPath, { force: true });
    throw error;
  }
};

const isTakenError = (error: unknown) => {
  const code = getErrorCode(error);
  return code === 'EEXIST' || code === 'ENOTEMPTY';
};

/**
 * Moves `sourcePath` into `destinationDir` without replacing anything that is
 * already there. Taken names get a numeric suffix, up to `maxAttempts`
 * candidates in total.
 */
export const moveWithoutOverwrite = async (
  sourcePath: string,
  destinationDir: string,
  options: MoveOptions = {},
): Promise<MoveResult> => {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_NAME_ATTEMPTS);
  const fileName = path.basename(sourcePath);

  if (path.resolve(path.dirname(sourcePath)) === path.resolve(destinationDir)) {
    throw new PerEntryWriteError(sourcePath, `${sourcePath} is already inside ${destinationDir}`);
  }

  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    const targetPath = path.join(destinationDir, candidateFileName(fileName, attempt));
    if (await pathExists(targetPath)) {
      // eslint-disable-next-line no-continue
      continue;
    }
    try {
      await fs.rename(sourcePath, targetPath);
      return { targetPath, renamed: attempt > 0 };
    } catch (error: unknown) {
      if (isTakenError(error)) {
        // eslint-disable-next-line no-continue
        continue;
      }
      if (getErrorCode(error) !== 'EXDEV') {
        throw new PerEntryWriteError(sourcePath, `Cannot move ${sourcePath}: ${describeError(error)}`, {
          cause: error,
        });
      }
    }

    try {
      await copyAcrossDevices(sourcePath, targetPath);
      return { targetPath, renamed: attempt > 0 };
    } catch (error: unknown) {
      if (getErrorCode(error) === 'EEXIST') {
        // eslint-disable-next-line no-continue
        continue;
      }
      throw new PerEntryWriteError(sourcePath, `Cannot move ${sourcePath} across devices: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  throw new NameCollisionError(sourcePath, maxAttempts);
};
