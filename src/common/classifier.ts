import type { FileEntry } from './fileTypes';
import type { CalendarConverter } from './calendars';
import { categoryForSize } from './sizeCategories';
import type {
  ClassificationResult,
  ContentFingerprint,
  DestinationClassification,
  FingerprintStrategy,
  OrganizeMode,
  SizeCategory,
} from '../types/organizer';
import { UnreadableEntryError } from './errors';

export const NO_EXTENSION_KEY = 'no_extension';

const FOLDER_SUFFIX = '_files';

const DATE_LABEL_PATTERN = /^\d{4}-\d{2}$/;

export interface ClassifierOptions {
  sizeCategories: SizeCategory[];
  calendar: CalendarConverter;
  fingerprint: FingerprintStrategy;
}

export interface Classifier {
  classify: (entry: FileEntry, mode: OrganizeMode) => Promise<ClassificationResult>;
}

/**
 * Lower-cased extension without its dot. Dot-files (".bashrc") and names
 * ending in a bare dot have no extension.
 */
export const normaliseExtension = (fileName: string): string => {
  const lastDot = fileName.lastIndexOf('.');
  if (lastDot <= 0 || lastDot === fileName.length - 1) {
    return '';
  }
  return fileName.slice(lastDot + 1).toLowerCase();
};

export const extensionKey = (entry: Pick<FileEntry, 'extension'>): string =>
  entry.extension || NO_EXTENSION_KEY;

export const sizeCategoryKey = (entry: Pick<FileEntry, 'size'>, categories: SizeCategory[]): string =>
  categoryForSize(entry.size, categories).name;

export const dateKey = (entry: Pick<FileEntry, 'modifiedMs'>, calendar: CalendarConverter): string =>
  calendar.convert(entry.modifiedMs).label;

export const duplicateGroupKey = (size: number, fingerprint: ContentFingerprint): string =>
  `${size}:${fingerprint.algorithm}:${fingerprint.digest}`;

export const destinationFolderName = (mode: Exclude<OrganizeMode, 'duplicate'>, key: string): string =>
  mode === 'date' ? key : `${key}${FOLDER_SUFFIX}`;

/**
 * Whether a directory name looks like one this mode creates. Extension
 * folders cannot be told apart from arbitrary "<x>_files" names, so any such
 * name counts.
 */
export const isDestinationFolderName = (
  mode: OrganizeMode,
  name: string,
  sizeCategories: SizeCategory[] = [],
): boolean => {
  switch (mode) {
    case 'extension':
      return name.endsWith(FOLDER_SUFFIX) && name.length > FOLDER_SUFFIX.length;
    case 'size':
      return sizeCategories.some((category) => name === `${category.name}${FOLDER_SUFFIX}`);
    case 'date':
      return DATE_LABEL_PATTERN.test(name);
    case 'duplicate':
      return false;
    default: {
      const exhaustive: never = mode;
      throw new Error(`Unsupported mode ${String(exhaustive)}`);
    }
  }
};

const toDestination = (
  mode: Exclude<OrganizeMode, 'duplicate'>,
  key: string,
): DestinationClassification => ({
  kind: 'destination',
  key,
  folderName: destinationFolderName(mode, key),
});

export const createClassifier = (options: ClassifierOptions): Classifier => ({
  classify: async (entry, mode) => {
    switch (mode) {
      case 'extension':
        return toDestination(mode, extensionKey(entry));
      case 'size':
        return toDestination(mode, sizeCategoryKey(entry, options.sizeCategories));
      case 'date':
        return toDestination(mode, dateKey(entry, options.calendar));
      case 'duplicate': {
        let fingerprint: ContentFingerprint;
        try {
          fingerprint = await options.fingerprint.fingerprint(entry.path);
        } catch (error: unknown) {
          throw new UnreadableEntryError(entry.path, error);
        }
        return {
          kind: 'duplicate-candidate',
          groupKey: duplicateGroupKey(entry.size, fingerprint),
          fingerprint,
        };
      }
      default: {
        const exhaustive: never = mode;
        throw new Error(`Unsupported mode ${String(exhaustive)}`);
      }
    }
  },
});
