import type { FileEntry } from '../common/fileTypes';

export const ORGANIZE_MODES = ['extension', 'size', 'date', 'duplicate'] as const;

export type OrganizeMode = (typeof ORGANIZE_MODES)[number];

export type CalendarSystem = 'gregorian' | 'persian';

export interface SizeCategory {
  name: string;
  /** Inclusive lower bound; the upper bound is the next category's minBytes */
  minBytes: number;
}

export interface ContentFingerprint {
  algorithm: string;
  digest: string;
}

export interface FingerprintStrategy {
  algorithm: string;
  fingerprint: (filePath: string) => Promise<ContentFingerprint>;
}

export interface DestinationClassification {
  kind: 'destination';
  key: string;
  folderName: string;
}

export interface DuplicateClassification {
  kind: 'duplicate-candidate';
  groupKey: string;
  fingerprint: ContentFingerprint;
}

export type ClassificationResult = DestinationClassification | DuplicateClassification;

export interface DuplicateGroup {
  key: string;
  size: number;
  fingerprint: ContentFingerprint;
  /** Sorted by discovery order; the first member is the survivor */
  members: FileEntry[];
}

export type OperationAction = 'move' | 'delete' | 'scan' | 'fingerprint';

export type OperationStatus = 'applied' | 'planned' | 'skipped' | 'failed';

export interface OperationRecord {
  sourcePath: string;
  action: OperationAction;
  status: OperationStatus;
  targetPath?: string;
  message?: string;
  /** Extra detail on a successful operation, e.g. a collision rename */
  note?: string;
}

export interface RunCounts {
  scanned: number;
  moved: number;
  deleted: number;
  skipped: number;
  failed: number;
  planned: number;
  renamed: number;
}

export interface RunSummary {
  mode: OrganizeMode;
  rootPath: string;
  dryRun: boolean;
  counts: RunCounts;
  duplicateGroups: number;
  bytesReclaimed: number;
  foldersCreated: string[];
  foldersRemoved: string[];
  durationMs: number;
  records: OperationRecord[];
  logFilePath?: string;
}

export const isOrganizeMode = (value: string): value is OrganizeMode =>
  ORGANIZE_MODES.some((mode) => mode === value);
