import path from 'path';
import type { RunSummary } from '../types/organizer';
import { createFileLogger, createRunLogger, formatRecord, formatSummaryLines, withLogSink } from '../utils/runLogger';
import { createMemoryLogSink } from '../../tests/helpers/memoryLogSink';

const buildSummary = (overrides: Partial<RunSummary> = {}): RunSummary => ({
  mode: 'extension',
  rootPath: '/data',
  dryRun: false,
  counts: { scanned: 1234, moved: 1200, deleted: 0, skipped: 4, failed: 30, planned: 0, renamed: 7 },
  duplicateGroups: 0,
  bytesReclaimed: 0,
  foldersCreated: ['/data/pdf_files', '/data/txt_files'],
  foldersRemoved: [],
  durationMs: 1500,
  records: [],
  logFilePath: '/data/file_organizer.log',
  ...overrides,
});

describe('runLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('formats operation records on one line', () => {
    expect(
      formatRecord({
        sourcePath: '/data/report.pdf',
        action: 'move',
        status: 'applied',
        targetPath: '/data/pdf_files/report (1).pdf',
        note: 'name taken, saved as report (1).pdf',
      }),
    ).toBe('move applied: /data/report.pdf -> /data/pdf_files/report (1).pdf (name taken, saved as report (1).pdf)');
    expect(formatRecord({ sourcePath: '/data/a.txt', action: 'delete', status: 'skipped' })).toBe(
      'delete skipped: /data/a.txt',
    );
  });

  it('summarises a move run', () => {
    expect(formatSummaryLines(buildSummary())).toEqual([
      'Mode: extension',
      'Directory: /data',
      'Files scanned: 1,234',
      'Moved: 1,200 (7 renamed to avoid collisions)',
      'Folders created: 2',
      'Skipped: 4',
      'Failed: 30',
      'Duration: 1.50 s',
      'Details of failures: /data/file_organizer.log',
    ]);
  });

  it('summarises duplicate removal and dry runs', () => {
    const duplicateRun = buildSummary({
      mode: 'duplicate',
      counts: { scanned: 10, moved: 0, deleted: 3, skipped: 0, failed: 0, planned: 0, renamed: 0 },
      duplicateGroups: 2,
      bytesReclaimed: 3.5 * 1024 * 1024,
      durationMs: 12000,
    });
    expect(formatSummaryLines(duplicateRun)).toEqual([
      'Mode: duplicate',
      'Directory: /data',
      'Files scanned: 10',
      'Duplicate groups: 2',
      'Deleted: 3 (3.5 MB reclaimed)',
      'Skipped: 0',
      'Failed: 0',
      'Duration: 12.0 s',
    ]);

    const dryRun = buildSummary({
      dryRun: true,
      counts: { scanned: 5, moved: 0, deleted: 0, skipped: 0, failed: 0, planned: 5, renamed: 0 },
      durationMs: 20,
    });
    expect(formatSummaryLines(dryRun).slice(0, 4)).toEqual([
      'Mode: extension (dry run)',
      'Directory: /data',
      'Files scanned: 5',
      'Planned: 5',
    ]);
  });

  it('prints problems always and progress only when verbose', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createRunLogger();

    logger.info('Found 2 files to organize in /data');
    logger.record({ sourcePath: '/data/a.txt', action: 'move', status: 'applied', targetPath: '/data/txt_files/a.txt' });
    logger.record({ sourcePath: '/data/b.txt', action: 'delete', status: 'skipped', message: 'no longer exists' });
    logger.record({ sourcePath: '/data/c.txt', action: 'move', status: 'failed', message: 'File is locked by another process' });

    const printed = logSpy.mock.calls.map((call) => call.join(' '));
    const printedErrors = errorSpy.mock.calls.map((call) => call.join(' '));
    expect(printed).toHaveLength(1);
    expect(printed[0]).toContain('delete skipped: /data/b.txt (no longer exists)');
    expect(printedErrors).toHaveLength(1);
    expect(printedErrors[0]).toContain('move failed: /data/c.txt (File is locked by another process)');
  });

  it('prints every record in verbose mode and indents summary lines', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createRunLogger({ verbose: true });

    logger.info('Created folder: /data/txt_files');
    logger.record({ sourcePath: '/data/a.txt', action: 'move', status: 'planned', targetPath: '/data/txt_files/a.txt' });
    logger.summary(buildSummary({ counts: { scanned: 1, moved: 1, deleted: 0, skipped: 0, failed: 0, planned: 0, renamed: 0 } }));

    const printed = logSpy.mock.calls.map((call) => call.join(' '));
    expect(printed[0]).toContain('Created folder: /data/txt_files');
    expect(printed[1]).toContain('move planned: /data/a.txt -> /data/txt_files/a.txt');
    expect(printed).toContain('   Moved: 1 (0 renamed to avoid collisions)');
    expect(printed).toContain('   Duration: 1.50 s');
  });

  it('stays silent on the console when disabled', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createRunLogger({ console: false });

    logger.warn('No files found to organize in /data');
    logger.error('Unexpected failure', new Error('boom'));

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('resolves the detailed log path', async () => {
    const logger = createRunLogger({ logFilePath: 'relative-run.log', console: false });
    expect(logger.logFilePath).toBe(path.resolve('relative-run.log'));
    await logger.close();
  });

  it('writes one log file without rotating it', () => {
    const fileLogger = createFileLogger(path.resolve('rotation-check.log'));
    expect(fileLogger.transports.file.maxSize).toBe(0);
    expect(fileLogger.transports.console.level).toBe(false);
    fileLogger.transports.file.level = false;
  });

  it('closes the sink when the wrapped run throws', async () => {
    const sink = createMemoryLogSink();
    await expect(
      withLogSink(
        () => sink,
        async () => {
          throw new Error('run failed');
        },
      ),
    ).rejects.toThrow('run failed');
    expect(sink.closed).toBe(true);
  });
});
