import path from 'path';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { bold, red } from 'colorette';
import { CALENDAR_SYSTEMS } from '../common/calendars';
import { FatalStartupError, describeError } from '../common/errors';
import type { OrganizeMode, RunSummary } from '../types/organizer';
import { createRunLogger, withLogSink, type LogSink, type RunLoggerOptions } from '../utils/runLogger';
import { resolveOrganizerConfig, type OrganizerConfig, type OrganizerConfigOverrides } from './config';
import { runOrganizer } from './organizer';

type CliOptions = {
  extension?: boolean;
  size?: boolean;
  lastModifyDate?: boolean;
  eraseDuplicates?: boolean;
  path: string;
  calendar?: OrganizerConfig['calendar'];
  timeZone?: string;
  sizeThresholds?: string;
  hash?: string;
  concurrency?: number;
  maxNameAttempts?: number;
  dryRun?: boolean;
  logFile?: string;
  keepEmptyFolders?: boolean;
  verbose?: boolean;
};

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  createLogSink?: (options: RunLoggerOptions) => LogSink;
  /** Receives the summary of a completed run */
  onSummary?: (summary: RunSummary) => void;
}

const MODE_FLAGS: Array<{ option: keyof CliOptions; mode: OrganizeMode; flag: string }> = [
  { option: 'extension', mode: 'extension', flag: '--extension' },
  { option: 'size', mode: 'size', flag: '--size' },
  { option: 'lastModifyDate', mode: 'date', flag: '--last-modify-date' },
  { option: 'eraseDuplicates', mode: 'duplicate', flag: '--erase-duplicates' },
];

const parsePositiveInt = (value: string) => {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
};

export const buildProgram = () =>
  new Command('file-organizer')
    .description('Organize the files of a directory by extension, size or modification date, or remove duplicates')
    .option('-e, --extension', 'organize files into <ext>_files folders')
    .option('-s, --size', 'organize files into light/medium/heavy folders')
    .option('-l, --last-modify-date', 'organize files into YYYY-MM folders of their modification date')
    .option('-d, --erase-duplicates', 'delete duplicate files, keeping one copy of each')
    .option('-p, --path <dir>', 'directory to organize', '.')
    .addOption(new Option('--calendar <calendar>', 'calendar for date folders').choices(CALENDAR_SYSTEMS))
    .option('--time-zone <zone>', 'IANA time zone for date folders')
    .option('--size-thresholds <list>', 'lower bounds of the medium and heavy categories, e.g. "500MB,1GB"')
    .option('--hash <algorithm>', 'hash algorithm used to fingerprint content')
    .option('--concurrency <n>', 'files fingerprinted in parallel', parsePositiveInt)
    .option('--max-name-attempts <n>', 'suffixed names tried before a move fails', parsePositiveInt)
    .option('--dry-run', 'report what would happen without changing anything')
    .option('--log-file <file>', 'detailed log, relative to the target directory')
    .option('--keep-empty-folders', 'keep folders created for moves that all failed')
    .option('-v, --verbose', 'print every operation, not only problems')
    .exitOverride();

const selectMode = (options: CliOptions): OrganizeMode | null => {
  const selected = MODE_FLAGS.filter(({ option }) => Boolean(options[option]));
  return selected.length === 1 ? selected[0].mode : null;
};

const toOverrides = (options: CliOptions): OrganizerConfigOverrides => {
  const overrides: OrganizerConfigOverrides = {};
  if (options.calendar) overrides.calendar = options.calendar;
  if (options.timeZone) overrides.timeZone = options.timeZone;
  if (options.sizeThresholds) overrides.sizeThresholds = options.sizeThresholds;
  if (options.hash) overrides.hashAlgorithm = options.hash;
  if (options.concurrency) overrides.concurrency = options.concurrency;
  if (options.maxNameAttempts) overrides.maxNameAttempts = options.maxNameAttempts;
  if (options.logFile) overrides.logFile = options.logFile;
  if (options.keepEmptyFolders) overrides.removeEmptyFolders = false;
  if (options.verbose) overrides.verbose = true;
  return overrides;
};

const reportStartupFailure = (message: string) => {
  console.error(`${bold(red('Cannot start:'))} ${message}`);
};

/**
 * Parses `argv` (without the node and script entries) and runs the organizer.
 * Resolves to the process exit code: 0 once a run has completed, whatever
 * happened to individual files, and 1 when it could not start.
 */
export const runCli = async (argv: string[], dependencies: CliDependencies = {}): Promise<number> => {
  const program = buildProgram();
  try {
    program.parse(argv, { from: 'user' });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 1;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  const mode = selectMode(options);
  if (!mode) {
    reportStartupFailure(
      `Please specify exactly one option: ${MODE_FLAGS.map(({ flag }) => flag).join(', ')}`,
    );
    return 1;
  }

  let config: OrganizerConfig;
  try {
    config = resolveOrganizerConfig(dependencies.env ?? process.env, toOverrides(options));
  } catch (error: unknown) {
    reportStartupFailure(describeError(error));
    return 1;
  }

  const targetDirectory = path.resolve(options.path);
  const logFilePath = path.resolve(targetDirectory, config.logFile);
  const createLogSink = dependencies.createLogSink ?? createRunLogger;

  try {
    const summary = await withLogSink(
      () => createLogSink({ logFilePath, verbose: config.verbose }),
      (logSink) => runOrganizer(targetDirectory, mode, { logSink, config, dryRun: options.dryRun }),
    );
    dependencies.onSummary?.(summary);
    return 0;
  } catch (error: unknown) {
    if (error instanceof FatalStartupError) {
      reportStartupFailure(error.message);
      return 1;
    }
    throw error;
  }
};
