export class TaskNotFoundError extends Error {
  readonly ref: string;

  constructor(ref: string) {
    super(`Task not found: ${ref}`);
    this.name = 'TaskNotFoundError';
    this.ref = ref;
  }
}

export class TaskValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaskValidationError';
  }
}

/** Raised for any file system failure while reading or writing the task file. */
export class TaskStorageError extends Error {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TaskStorageError';
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`Invalid config "${key}": ${message}`);
    this.name = 'ConfigError';
    this.key = key;
  }
}
