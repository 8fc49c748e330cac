export interface FileEntry {
  /** Absolute path on disk */
  path: string;
  /** File name including extension */
  name: string;
  /** File size in bytes */
  size: number;
  /** Last modification time, epoch milliseconds */
  modifiedMs: number;
  /** Lower-cased extension without the leading dot, empty when absent */
  extension: string;
  /** MIME type inferred from the file extension */
  mimeType: string | null;
  /** Position in the sorted scan, used as the stable ordering key */
  discoveryIndex: number;
}

export interface ScanResult {
  /** Root directory that was scanned */
  rootPath: string;
  /** Regular files found directly under the root */
  entries: FileEntry[];
  /** Existing directories whose names match a destination folder pattern */
  destinationFolders: string[];
  /** Children that could not be inspected */
  failures: Array<{ path: string; message: string }>;
}
