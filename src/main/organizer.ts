import fs from 'fs/promises';
import { constants as fsConstants, type Stats } from 'fs';
import path from 'path';
import type { FileEntry, ScanResult } from '../common/fileTypes';
import { createClassifier, type Classifier } from '../common/classifier';
import { resolveCalendar } from '../common/calendars';
import { FatalStartupError, describeError, getErrorCode } from '../common/errors';
import {
  isOrganizeMode,
  type ContentFingerprint,
  type FingerprintStrategy,
  type OperationRecord,
  type OrganizeMode,
  type RunCounts,
  type RunSummary,
} from '../types/organizer';
import type { LogSink } from '../utils/runLogger';
import { resolveOrganizerConfig, type OrganizerConfig } from './config';
import { findDuplicateGroups } from './duplicateScanner';
import {
  defaultCheckFileLock,
  ensureDestinationFolder,
  moveWithoutOverwrite,
  type FileLockState,
} from './fileMover';
import { createHashFingerprintStrategy } from './fingerprint';
import { logFileNames } from './ignoreRules';
import { countMediaTypes, scanTargetDirectory } from './scanner';

export interface OrganizerOptions {
  logSink: LogSink;
  config?: OrganizerConfig;
  /** Plan every operation without touching the filesystem */
  dryRun?: boolean;
  fingerprintStrategy?: FingerprintStrategy;
  checkFileLock?: (filePath: string) => Promise<FileLockState>;
}

interface RunContext {
  rootPath: string;
  mode: OrganizeMode;
  config: OrganizerConfig;
  dryRun: boolean;
  logSink: LogSink;
  classifier: Classifier;
  fingerprintStrategy: FingerprintStrategy;
  checkLock: (filePath: string) => Promise<FileLockState>;
  records: OperationRecord[];
  foldersCreated: string[];
  foldersRemoved: string[];
  renamed: number;
  duplicateGroups: number;
  bytesReclaimed: number;
}

const recordResult = (context: RunContext, record: OperationRecord) => {
  context.records.push(record);
  context.logSink.record(record);
};

const validateTarget = async (targetDirectory: string): Promise<string> => {
  const rootPath = path.resolve(targetDirectory);
  let stats: Stats;
  try {
    stats = await fs.stat(rootPath);
  } catch (error: unknown) {
    if (getErrorCode(error) === 'ENOENT') {
      throw new FatalStartupError(`The path ${rootPath} does not exist.`, { cause: error });
    }
    throw new FatalStartupError(`Cannot access ${rootPath}: ${describeError(error)}`, { cause: error });
  }
  if (!stats.isDirectory()) {
    throw new FatalStartupError(`The path ${rootPath} is not a directory.`);
  }
  try {
    // eslint-disable-next-line no-bitwise
    await fs.access(rootPath, fsConstants.R_OK | fsConstants.X_OK);
  } catch (error: unknown) {
    throw new FatalStartupError(`The directory ${rootPath} is not readable.`, { cause: error });
  }
  return rootPath;
};

const createRunContext = (
  rootPath: string,
  mode: OrganizeMode,
  options: OrganizerOptions,
): RunContext => {
  try {
    const config = options.config ?? resolveOrganizerConfig();
    const calendar = resolveCalendar(config.calendar, config.timeZone);
    const fingerprintStrategy = options.fingerprintStrategy ?? createHashFingerprintStrategy(config.hashAlgorithm);
    return {
      rootPath,
      mode,
      config,
      dryRun: options.dryRun ?? false,
      logSink: options.logSink,
      classifier: createClassifier({
        sizeCategories: config.sizeCategories,
        calendar,
        fingerprint: fingerprintStrategy,
      }),
      fingerprintStrategy,
      checkLock: options.checkFileLock ?? defaultCheckFileLock,
      records: [],
      foldersCreated: [],
      foldersRemoved: [],
      renamed: 0,
      duplicateGroups: 0,
      bytesReclaimed: 0,
    };
  } catch (error: unknown) {
    if (error instanceof FatalStartupError) {
      throw error;
    }
    throw new FatalStartupError(describeError(error), { cause: error });
  }
};

/**
 * Names to leave alone at the root: the run log and its rotated copy when
 * they are written there.
 */
const collectIgnoredNames = (context: RunContext): string[] => {
  const candidates = [context.logSink.logFilePath, path.resolve(context.rootPath, context.config.logFile)];
  return candidates
    .filter((candidate): candidate is string => Boolean(candidate))
    .filter((candidate) => path.dirname(candidate) === context.rootPath)
    .flatMap((candidate) => logFileNames(path.basename(candidate)));
};

const describeLockFailure = (state: FileLockState) =>
  state === 'missing' ? 'Source file no longer exists' : 'File is locked by another process';

const organizeIntoFolders = async (context: RunContext, entries: FileEntry[]) => {
  for (const entry of entries) {
    let folderName: string;
    try {
      const classification = await context.classifier.classify(entry, context.mode);
      if (classification.kind !== 'destination') {
        throw new Error(`Unexpected classification ${classification.kind} in ${context.mode} mode`);
      }
      folderName = classification.folderName;
    } catch (error: unknown) {
      recordResult(context, {
        sourcePath: entry.path,
        action: 'move',
        status: 'failed',
        message: `Cannot classify: ${describeError(error)}`,
      });
      // eslint-disable-next-line no-continue
      continue;
    }

    const destinationDir = path.join(context.rootPath, folderName);
    if (context.dryRun) {
      recordResult(context, {
        sourcePath: entry.path,
        action: 'move',
        status: 'planned',
        targetPath: path.join(destinationDir, entry.name),
      });
      // eslint-disable-next-line no-continue
      continue;
    }

    try {
      const lockState = await context.checkLock(entry.path);
      if (lockState !== 'ok') {
        recordResult(context, {
          sourcePath: entry.path,
          action: 'move',
          status: 'failed',
          targetPath: destinationDir,
          message: describeLockFailure(lockState),
        });
        // eslint-disable-next-line no-continue
        continue;
      }

      if (await ensureDestinationFolder(context.rootPath, folderName)) {
        context.foldersCreated.push(destinationDir);
        context.logSink.info(`Created folder: ${destinationDir}`);
      }

      const moved = await moveWithoutOverwrite(entry.path, destinationDir, {
        maxAttempts: context.config.maxNameAttempts,
      });
      if (moved.renamed) {
        context.renamed += 1;
      }
      recordResult(context, {
        sourcePath: entry.path,
        action: 'move',
        status: 'applied',
        targetPath: moved.targetPath,
        note: moved.renamed ? `name taken, saved as ${path.basename(moved.targetPath)}` : undefined,
      });
    } catch (error: unknown) {
      recordResult(context, {
        sourcePath: entry.path,
        action: 'move',
        status: 'failed',
        targetPath: destinationDir,
        message: describeError(error),
      });
    }
  }
};

const removeEmptyCreatedFolders = async (context: RunContext) => {
  for (const folderPath of context.foldersCreated) {
    try {
      const children = await fs.readdir(folderPath);
      if (children.length === 0) {
        await fs.rmdir(folderPath);
        context.foldersRemoved.push(folderPath);
        context.logSink.info(`Removed empty folder: ${folderPath}`);
      }
    } catch (error: unknown) {
      context.logSink.warn(`Could not remove empty folder ${folderPath}: ${describeError(error)}`);
    }
  }
};

type VerifyOutcome = { ok: true } | { ok: false; reason: string };

/**
 * Confirms the file on disk is still the one that was classified.
 */
const verifyUnchanged = async (
  context: RunContext,
  entry: FileEntry,
  expected: ContentFingerprint,
): Promise<VerifyOutcome> => {
  try {
    const stats = await fs.lstat(entry.path);
    if (!stats.isFile()) {
      return { ok: false, reason: 'is no longer a regular file' };
    }
    if (stats.size !== entry.size) {
      return { ok: false, reason: `size changed from ${entry.size} to ${stats.size} bytes` };
    }
  } catch (error: unknown) {
    if (getErrorCode(error) === 'ENOENT') {
      return { ok: false, reason: 'no longer exists' };
    }
    return { ok: false, reason: `cannot be inspected: ${describeError(error)}` };
  }

  try {
    const current = await context.fingerprintStrategy.fingerprint(entry.path);
    if (current.algorithm !== expected.algorithm || current.digest !== expected.digest) {
      return { ok: false, reason: 'content changed since it was scanned' };
    }
  } catch (error: unknown) {
    return { ok: false, reason: `cannot be read: ${describeError(error)}` };
  }
  return { ok: true };
};

const removeDuplicates = async (context: RunContext, entries: FileEntry[]) => {
  const scan = await findDuplicateGroups(entries, context.classifier, {
    concurrency: context.config.concurrency,
  });
  context.logSink.info(
    `Fingerprinted ${scan.hashedCount} of ${entries.length} files; ${scan.groups.length} duplicate groups`,
  );

  scan.failures.forEach(({ entry, message }) => {
    recordResult(context, {
      sourcePath: entry.path,
      action: 'fingerprint',
      status: 'failed',
      message,
    });
  });

  context.duplicateGroups = scan.groups.length;

  for (const group of scan.groups) {
    const [survivor, ...duplicates] = group.members;
    context.logSink.info(`Keeping ${survivor.path} (${duplicates.length} duplicate(s))`);

    if (context.dryRun) {
      duplicates.forEach((duplicate) =>
        recordResult(context, {
          sourcePath: duplicate.path,
          action: 'delete',
          status: 'planned',
          note: `duplicate of ${survivor.path}`,
        }),
      );
      // eslint-disable-next-line no-continue
      continue;
    }

    const survivorCheck = await verifyUnchanged(context, survivor, group.fingerprint);
    if (!survivorCheck.ok) {
      context.logSink.warn(`Survivor ${survivor.path} ${survivorCheck.reason}; leaving its group untouched`);
      duplicates.forEach((duplicate) =>
        recordResult(context, {
          sourcePath: duplicate.path,
          action: 'delete',
          status: 'skipped',
          message: `kept copy ${survivor.path} ${survivorCheck.reason}`,
        }),
      );
      // eslint-disable-next-line no-continue
      continue;
    }

    for (const duplicate of duplicates) {
      const check = await verifyUnchanged(context, duplicate, group.fingerprint);
      if (!check.ok) {
        context.logSink.warn(`Not deleting ${duplicate.path}: ${check.reason}`);
        recordResult(context, {
          sourcePath: duplicate.path,
          action: 'delete',
          status: 'skipped',
          message: check.reason,
        });
        // eslint-disable-next-line no-continue
        continue;
      }

      try {
        const lockState = await context.checkLock(duplicate.path);
        if (lockState !== 'ok') {
          recordResult(context, {
            sourcePath: duplicate.path,
            action: 'delete',
            status: 'failed',
            message: describeLockFailure(lockState),
          });
          // eslint-disable-next-line no-continue
          continue;
        }
        await fs.unlink(duplicate.path);
        context.bytesReclaimed += duplicate.size;
        recordResult(context, {
          sourcePath: duplicate.path,
          action: 'delete',
          status: 'applied',
          note: `duplicate of ${survivor.path}`,
        });
      } catch (error: unknown) {
        recordResult(context, {
          sourcePath: duplicate.path,
          action: 'delete',
          status: 'failed',
          message: describeError(error),
        });
      }
    }
  }
};

export const summariseRecords = (records: OperationRecord[], scanned: number, renamed: number): RunCounts => {
  const counts: RunCounts = {
    scanned,
    moved: 0,
    deleted: 0,
    skipped: 0,
    failed: 0,
    planned: 0,
    renamed,
  };
  records.forEach((record) => {
    if (record.status === 'applied') {
      if (record.action === 'move') counts.moved += 1;
      if (record.action === 'delete') counts.deleted += 1;
    } else {
      counts[record.status] += 1;
    }
  });
  return counts;
};

/**
 * Organizes the direct children of `targetDirectory` by `mode`.
 *
 * Throws FatalStartupError when the run cannot start. Once scanning has
 * begun, per-file problems become failed or skipped records and the run
 * continues with the next file.
 */
export const runOrganizer = async (
  targetDirectory: string,
  mode: string,
  options: OrganizerOptions,
): Promise<RunSummary> => {
  const startedAt = Date.now();
  if (!isOrganizeMode(mode)) {
    throw new FatalStartupError(`Unknown organize mode "${mode}"`);
  }
  const rootPath = await validateTarget(targetDirectory);
  const context = createRunContext(rootPath, mode, options);

  let scan: ScanResult;
  try {
    scan = await scanTargetDirectory(rootPath, {
      mode,
      sizeCategories: context.config.sizeCategories,
      ignoreNames: collectIgnoredNames(context),
    });
  } catch (error: unknown) {
    throw new FatalStartupError(`Cannot list ${rootPath}: ${describeError(error)}`, { cause: error });
  }

  scan.failures.forEach((failure) =>
    recordResult(context, {
      sourcePath: failure.path,
      action: 'scan',
      status: 'failed',
      message: failure.message,
    }),
  );

  if (scan.entries.length === 0) {
    context.logSink.warn(`No files found to organize in ${rootPath}`);
  } else {
    context.logSink.info(`Found ${scan.entries.length} files to organize in ${rootPath}`);
    context.logSink.info(
      `Media types: ${countMediaTypes(scan.entries)
        .map(([mediaType, count]) => `${mediaType} ${count}`)
        .join(', ')}`,
    );
  }
  if (scan.destinationFolders.length) {
    context.logSink.info(`Existing ${mode} folders left as they are: ${scan.destinationFolders.length}`);
  }

  if (mode === 'duplicate') {
    await removeDuplicates(context, scan.entries);
  } else {
    await organizeIntoFolders(context, scan.entries);
    if (context.config.removeEmptyFolders && !context.dryRun) {
      await removeEmptyCreatedFolders(context);
    }
  }

  const summary: RunSummary = {
    mode,
    rootPath,
    dryRun: context.dryRun,
    counts: summariseRecords(context.records, scan.entries.length, context.renamed),
    duplicateGroups: context.duplicateGroups,
    bytesReclaimed: context.bytesReclaimed,
    foldersCreated: context.foldersCreated,
    foldersRemoved: context.foldersRemoved,
    durationMs: Date.now() - startedAt,
    records: context.records,
    logFilePath: context.logSink.logFilePath,
  };
  context.logSink.summary(summary);
  return summary;
};
