import { ConfigError, FatalStartupError } from '../common/errors';
import { DEFAULT_SIZE_CATEGORIES } from '../common/sizeCategories';
import { DEFAULT_LOG_FILE_NAME, parseSizeThresholds, resolveOrganizerConfig } from '../main/config';

describe('resolveOrganizerConfig', () => {
  it('falls back to defaults without environment', () => {
    expect(resolveOrganizerConfig({})).toEqual({
      sizeCategories: DEFAULT_SIZE_CATEGORIES,
      calendar: 'gregorian',
      timeZone: 'UTC',
      hashAlgorithm: 'sha256',
      concurrency: 4,
      maxNameAttempts: 100,
      logFile: DEFAULT_LOG_FILE_NAME,
      verbose: false,
      removeEmptyFolders: true,
    });
  });

  it('reads ORGANIZER_* variables', () => {
    const config = resolveOrganizerConfig({
      ORGANIZER_SIZE_THRESHOLDS: '500MB, 1GB',
      ORGANIZER_CALENDAR: 'persian',
      ORGANIZER_TIME_ZONE: 'Asia/Tehran',
      ORGANIZER_HASH_ALGORITHM: 'SHA512',
      ORGANIZER_CONCURRENCY: '8',
      ORGANIZER_MAX_NAME_ATTEMPTS: '5',
      ORGANIZER_LOG_FILE: 'runs.log',
      ORGANIZER_LOG_VERBOSE: '1',
    });

    expect(config).toEqual({
      sizeCategories: [
        { name: 'light', minBytes: 0 },
        { name: 'medium', minBytes: 524288000 },
        { name: 'heavy', minBytes: 1073741824 },
      ],
      calendar: 'persian',
      timeZone: 'Asia/Tehran',
      hashAlgorithm: 'sha512',
      concurrency: 8,
      maxNameAttempts: 5,
      logFile: 'runs.log',
      verbose: true,
      removeEmptyFolders: true,
    });
  });

  it('lets explicit overrides win over the environment', () => {
    const config = resolveOrganizerConfig(
      { ORGANIZER_CALENDAR: 'persian', ORGANIZER_CONCURRENCY: '8', ORGANIZER_LOG_VERBOSE: 'yes' },
      { calendar: 'gregorian', concurrency: 2, verbose: false, removeEmptyFolders: false },
    );

    expect(config).toMatchObject({
      calendar: 'gregorian',
      concurrency: 2,
      verbose: false,
      removeEmptyFolders: false,
    });
  });

  const invalidEnvironments: Array<[NodeJS.ProcessEnv, string]> = [
    [{ ORGANIZER_CONCURRENCY: '0' }, 'concurrency must be a positive integer, got "0"'],
    [{ ORGANIZER_MAX_NAME_ATTEMPTS: '2.5' }, 'maxNameAttempts must be a positive integer, got "2.5"'],
    [{ ORGANIZER_CALENDAR: 'lunar' }, 'Unsupported calendar "lunar"'],
    [{ ORGANIZER_TIME_ZONE: 'Nowhere/City' }, 'Unsupported time zone "Nowhere/City"'],
    [{ ORGANIZER_HASH_ALGORITHM: 'not-a-hash' }, 'Unsupported hash algorithm "not-a-hash"'],
    [{ ORGANIZER_SIZE_THRESHOLDS: 'big' }, 'Invalid size threshold "big"'],
    [
      { ORGANIZER_SIZE_THRESHOLDS: '1GB,500MB' },
      'Size category "heavy" must start above "medium" (1073741824 bytes)',
    ],
  ];

  it.each(invalidEnvironments)('rejects %j', (env, message) => {
    expect(() => resolveOrganizerConfig(env)).toThrow(new ConfigError(message));
  });

  it('reports configuration problems as startup failures', () => {
    let caught: unknown;
    try {
      resolveOrganizerConfig({ ORGANIZER_CONCURRENCY: 'many' });
    } catch (error: unknown) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toBeInstanceOf(FatalStartupError);
  });
});

describe('parseSizeThresholds', () => {
  it('names numbered categories for other threshold counts', () => {
    expect(parseSizeThresholds('1KB')).toEqual([
      { name: 'size_1', minBytes: 0 },
      { name: 'size_2', minBytes: 1024 },
    ]);
  });

  it('requires at least one threshold', () => {
    expect(() => parseSizeThresholds(' , ')).toThrow('At least one size threshold is required');
  });
});
