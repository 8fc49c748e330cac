/**
 * The run could not start: nothing was scanned and nothing was touched.
 */
export class FatalStartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalStartupError';
  }
}

export class ConfigError extends FatalStartupError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A single entry could not be inspected. The entry is skipped and the run
 * carries on with the rest.
 */
export class PerEntryReadError extends Error {
  readonly entryPath: string;

  constructor(entryPath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PerEntryReadError';
    this.entryPath = entryPath;
  }
}

export class UnreadableEntryError extends PerEntryReadError {
  constructor(entryPath: string, cause: unknown) {
    super(entryPath, `Cannot read content of ${entryPath}: ${describeError(cause)}`, { cause });
    this.name = 'UnreadableEntryError';
  }
}

/**
 * A mutation on a single entry failed (folder creation, move or delete).
 */
export class PerEntryWriteError extends Error {
  readonly entryPath: string;

  constructor(entryPath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PerEntryWriteError';
    this.entryPath = entryPath;
  }
}

export class NameCollisionError extends PerEntryWriteError {
  readonly attempts: number;

  constructor(entryPath: string, attempts: number) {
    super(entryPath, `No free destination name after ${attempts} attempts`);
    this.name = 'NameCollisionError';
    this.attempts = attempts;
  }
}

export const getErrorCode = (error: unknown): string | undefined => {
  if (error && typeof error === 'object' && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};

export function describeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const code = getErrorCode(error);
  if (code && !message.includes(code)) {
    return `${code}: ${message}`;
  }
  return message;
}
