import path from 'path';
import log from 'electron-log/node';
import { bold, cyan, dim, green, red, yellow } from 'colorette';
import type { OperationRecord, OperationStatus, RunSummary } from '../types/organizer';
import { describeError } from '../common/errors';

/**
 * Destination for progress and per-operation outcomes. The engine receives
 * one explicitly and never logs anywhere else.
 */
export interface LogSink {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, error?: unknown) => void;
  record: (record: OperationRecord) => void;
  summary: (summary: RunSummary) => void;
  close: () => Promise<void>;
  readonly logFilePath?: string;
}

export interface RunLoggerOptions {
  /** Detailed log destination; omitted means console only */
  logFilePath?: string;
  /** Print applied and planned records, not only problems */
  verbose?: boolean;
  /** Console output; defaults to on */
  console?: boolean;
}

const numberFormatter = new Intl.NumberFormat('en-US');

const formatNumber = (value: number) => numberFormatter.format(value);

const formatBytes = (bytes: number) => {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return `${unit === 0 ? value : value.toFixed(1)} ${units[unit]}`;
};

const formatDuration = (durationMs: number) => `${(durationMs / 1000).toFixed(durationMs >= 10000 ? 1 : 2)} s`;

const timestamp = () => dim(new Date().toISOString());

const statusColour: Record<OperationStatus, (text: string) => string> = {
  applied: green,
  planned: cyan,
  skipped: yellow,
  failed: red,
};

export const formatRecord = (record: OperationRecord): string => {
  const target = record.targetPath ? ` -> ${record.targetPath}` : '';
  const details = [record.note, record.message].filter(Boolean).join('; ');
  return `${record.action} ${record.status}: ${record.sourcePath}${target}${details ? ` (${details})` : ''}`;
};

export const formatSummaryLines = (summary: RunSummary): string[] => {
  const { counts } = summary;
  const lines = [
    `Mode: ${summary.mode}${summary.dryRun ? ' (dry run)' : ''}`,
    `Directory: ${summary.rootPath}`,
    `Files scanned: ${formatNumber(counts.scanned)}`,
  ];
  if (summary.dryRun) {
    lines.push(`Planned: ${formatNumber(counts.planned)}`);
  } else if (summary.mode === 'duplicate') {
    lines.push(`Duplicate groups: ${formatNumber(summary.duplicateGroups)}`);
    lines.push(`Deleted: ${formatNumber(counts.deleted)} (${formatBytes(summary.bytesReclaimed)} reclaimed)`);
  } else {
    lines.push(`Moved: ${formatNumber(counts.moved)} (${formatNumber(counts.renamed)} renamed to avoid collisions)`);
    lines.push(`Folders created: ${formatNumber(summary.foldersCreated.length)}`);
  }
  lines.push(`Skipped: ${formatNumber(counts.skipped)}`);
  lines.push(`Failed: ${formatNumber(counts.failed)}`);
  lines.push(`Duration: ${formatDuration(summary.durationMs)}`);
  if (counts.failed > 0 && summary.logFilePath) {
    lines.push(`Details of failures: ${summary.logFilePath}`);
  }
  return lines;
};

const emit = (header: string, details: string[] = []) => {
  console.log(`${timestamp()} ${header}`);
  details.forEach((detail) => console.log(`   ${detail}`));
};

const emitError = (header: string, details: string[] = []) => {
  console.error(`${timestamp()} ${header}`);
  details.forEach((detail) => console.error(`   ${detail}`));
};

let loggerSequence = 0;

/**
 * electron-log instance writing only to `logFilePath`. Rotation is off so
 * the log stays a single append-only file.
 */
export const createFileLogger = (logFilePath: string) => {
  loggerSequence += 1;
  const fileLogger = log.create({ logId: `file-organizer-${process.pid}-${loggerSequence}` });
  fileLogger.transports.console.level = false;
  fileLogger.transports.file.level = 'info';
  fileLogger.transports.file.maxSize = 0;
  fileLogger.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {text}';
  fileLogger.transports.file.resolvePathFn = () => logFilePath;
  return fileLogger;
};

/**
 * Console lines go through colorette, the detailed log through an
 * electron-log file transport. Both write synchronously per call, so lines
 * from concurrent fingerprint tasks never interleave.
 */
export const createRunLogger = (options: RunLoggerOptions = {}): LogSink => {
  const logFilePath = options.logFilePath ? path.resolve(options.logFilePath) : undefined;
  const fileLogger = logFilePath ? createFileLogger(logFilePath) : null;
  const useConsole = options.console ?? true;
  let closed = false;

  const writeFile = (level: 'info' | 'warn' | 'error', message: string) => {
    if (!closed && fileLogger) {
      fileLogger[level](message);
    }
  };

  return {
    logFilePath,
    info: (message) => {
      writeFile('info', message);
      if (useConsole && options.verbose) {
        emit(cyan(message));
      }
    },
    warn: (message) => {
      writeFile('warn', message);
      if (useConsole) {
        emit(yellow(message));
      }
    },
    error: (message, error) => {
      const detail = error === undefined ? message : `${message}: ${describeError(error)}`;
      writeFile('error', detail);
      if (useConsole) {
        emitError(red(detail));
      }
    },
    record: (record) => {
      const line = formatRecord(record);
      writeFile(record.status === 'failed' ? 'error' : record.status === 'skipped' ? 'warn' : 'info', line);
      if (!useConsole) {
        return;
      }
      if (record.status === 'failed') {
        emitError(`${statusColour.failed(bold(record.status))} ${line}`);
      } else if (record.status === 'skipped' || options.verbose) {
        emit(`${statusColour[record.status](bold(record.status))} ${line}`);
      }
    },
    summary: (summary) => {
      const lines = formatSummaryLines(summary);
      writeFile('info', ['Run summary', ...lines].join('\n'));
      if (useConsole) {
        const header = summary.counts.failed > 0 ? yellow('Finished with failures') : green('Finished');
        emit(bold(header), lines);
      }
    },
    close: async () => {
      if (closed) {
        return;
      }
      closed = true;
      if (fileLogger) {
        fileLogger.transports.file.level = false;
      }
    },
  };
};

/**
 * Runs `fn` with a freshly acquired sink and closes it on every exit path.
 */
export const withLogSink = async <T>(factory: () => LogSink, fn: (sink: LogSink) => Promise<T>): Promise<T> => {
  const sink = factory();
  try {
    return await fn(sink);
  } finally {
    await sink.close();
  }
};
