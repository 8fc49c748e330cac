import { ConfigError, describeError } from '../common/errors';
import { isCalendarSystem, resolveCalendar } from '../common/calendars';
import {
  DEFAULT_SIZE_CATEGORIES,
  buildSizeCategories,
  parseByteSize,
  validateSizeCategories,
} from '../common/sizeCategories';
import type { CalendarSystem, SizeCategory } from '../types/organizer';
import { DEFAULT_HASH_ALGORITHM, isSupportedHashAlgorithm } from './fingerprint';
import { DEFAULT_FINGERPRINT_CONCURRENCY } from './duplicateScanner';
import { DEFAULT_MAX_NAME_ATTEMPTS } from './fileMover';

export const DEFAULT_LOG_FILE_NAME = 'file_organizer.log';

export interface OrganizerConfig {
  sizeCategories: SizeCategory[];
  calendar: CalendarSystem;
  timeZone: string;
  hashAlgorithm: string;
  concurrency: number;
  maxNameAttempts: number;
  /** File name inside the target directory, or an absolute path */
  logFile: string;
  verbose: boolean;
  removeEmptyFolders: boolean;
}

export interface OrganizerConfigOverrides extends Partial<Omit<OrganizerConfig, 'sizeCategories'>> {
  sizeCategories?: SizeCategory[];
  /** Comma separated thresholds such as "500MB,1GB" */
  sizeThresholds?: string;
}

const DEFAULT_CONFIG: OrganizerConfig = {
  sizeCategories: DEFAULT_SIZE_CATEGORIES,
  calendar: 'gregorian',
  timeZone: 'UTC',
  hashAlgorithm: DEFAULT_HASH_ALGORITHM,
  concurrency: DEFAULT_FINGERPRINT_CONCURRENCY,
  maxNameAttempts: DEFAULT_MAX_NAME_ATTEMPTS,
  logFile: DEFAULT_LOG_FILE_NAME,
  verbose: false,
  removeEmptyFolders: true,
};

const coerceBoolean = (value: string | undefined): boolean | undefined => {
  if (value === undefined) return undefined;
  const normalised = value.trim().toLowerCase();
  return ['1', 'true', 't', 'yes', 'y', 'on'].includes(normalised);
};

const parsePositiveInteger = (name: string, value: string | number | undefined): number | undefined => {
  if (value === undefined || value === '') return undefined;
  const numeric = typeof value === 'number' ? value : Number(value);
  if (!Number.isSafeInteger(numeric) || numeric < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return numeric;
};

export const parseSizeThresholds = (value: string): SizeCategory[] => {
  const parts = value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
  const thresholds = parts.map((part) => {
    const bytes = parseByteSize(part);
    if (bytes === null) {
      throw new ConfigError(`Invalid size threshold "${part}"`);
    }
    return bytes;
  });
  if (thresholds.length === 0) {
    throw new ConfigError('At least one size threshold is required');
  }
  return buildSizeCategories(thresholds);
};

/**
 * Defaults, then ORGANIZER_* environment variables, then explicit overrides.
 */
export const resolveOrganizerConfig = (
  env: NodeJS.ProcessEnv = process.env,
  overrides: OrganizerConfigOverrides = {},
): OrganizerConfig => {
  const thresholds = overrides.sizeThresholds ?? env.ORGANIZER_SIZE_THRESHOLDS;
  const sizeCategories =
    overrides.sizeCategories ?? (thresholds ? parseSizeThresholds(thresholds) : DEFAULT_CONFIG.sizeCategories);
  const issues = validateSizeCategories(sizeCategories);
  if (issues.length) {
    throw new ConfigError(issues.join('; '));
  }

  const calendar = overrides.calendar ?? env.ORGANIZER_CALENDAR ?? DEFAULT_CONFIG.calendar;
  if (!isCalendarSystem(calendar)) {
    throw new ConfigError(`Unsupported calendar "${calendar}"`);
  }

  const timeZone = overrides.timeZone ?? env.ORGANIZER_TIME_ZONE ?? DEFAULT_CONFIG.timeZone;
  try {
    resolveCalendar(calendar, timeZone);
  } catch (error: unknown) {
    throw new ConfigError(describeError(error));
  }

  const hashAlgorithm = (overrides.hashAlgorithm ?? env.ORGANIZER_HASH_ALGORITHM ?? DEFAULT_CONFIG.hashAlgorithm)
    .trim()
    .toLowerCase();
  if (!isSupportedHashAlgorithm(hashAlgorithm)) {
    throw new ConfigError(`Unsupported hash algorithm "${hashAlgorithm}"`);
  }

  return {
    sizeCategories,
    calendar,
    timeZone,
    hashAlgorithm,
    concurrency:
      parsePositiveInteger('concurrency', overrides.concurrency ?? env.ORGANIZER_CONCURRENCY) ??
      DEFAULT_CONFIG.concurrency,
    maxNameAttempts:
      parsePositiveInteger('maxNameAttempts', overrides.maxNameAttempts ?? env.ORGANIZER_MAX_NAME_ATTEMPTS) ??
      DEFAULT_CONFIG.maxNameAttempts,
    logFile: overrides.logFile ?? env.ORGANIZER_LOG_FILE ?? DEFAULT_CONFIG.logFile,
    verbose: overrides.verbose ?? coerceBoolean(env.ORGANIZER_LOG_VERBOSE) ?? DEFAULT_CONFIG.verbose,
    removeEmptyFolders: overrides.removeEmptyFolders ?? DEFAULT_CONFIG.removeEmptyFolders,
  };
};
