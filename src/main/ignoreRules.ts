import path from 'path';

const EXACT_NAMES = ['.DS_Store', 'Thumbs.db', 'ehthumbs.db', 'desktop.ini', '.localized', 'Icon\r'];

const PREFIX_PATTERNS = ['~$', '.~lock.', '._'];
const SUFFIX_PATTERNS = ['.crdownload', '.part', '.partial', '.download', '.swp', '.swo'];

const LOWER_EXACT_NAMES = new Set(EXACT_NAMES.map((name) => name.toLowerCase()));

const matchesPrefixPattern = (value: string) => {
  const lowerValue = value.toLowerCase();
  return PREFIX_PATTERNS.some((pattern) => lowerValue.startsWith(pattern));
};

const matchesSuffixPattern = (value: string) => {
  const lowerValue = value.toLowerCase();
  return SUFFIX_PATTERNS.some((pattern) => lowerValue.endsWith(pattern));
};

export interface IgnoreOptions {
  /** Extra names to leave in place, such as the run log */
  ignoreNames?: string[];
}

/**
 * Names a log file goes by: itself and the `<name>.old<ext>` it is rotated to.
 */
export const logFileNames = (logFileName: string): string[] => {
  const extension = path.extname(logFileName);
  return [logFileName, `${path.basename(logFileName, extension)}.old${extension}`];
};

/**
 * OS metadata, lock files of open documents and unfinished downloads stay
 * where they are, as do the names passed in.
 */
export const shouldIgnoreFile = (fileName: string, options: IgnoreOptions = {}): boolean => {
  if (options.ignoreNames?.includes(fileName)) {
    return true;
  }
  if (LOWER_EXACT_NAMES.has(fileName.toLowerCase())) {
    return true;
  }
  return matchesPrefixPattern(fileName) || matchesSuffixPattern(fileName);
};
