export type FileSystemOperation = 'list' | 'read' | 'copy' | 'delete' | 'rename' | 'stat';

/**
 * A filesystem call failed (permission denied, path vanished, I/O failure).
 * Always non-fatal: callers surface it as a status message.
 */
export class FileSystemError extends Error {
  readonly operation: FileSystemOperation;
  readonly path: string;
  readonly code: string | null;

  constructor(operation: FileSystemOperation, path: string, cause: unknown) {
    super(describeCause(cause));
    this.name = 'FileSystemError';
    this.operation = operation;
    this.path = path;
    this.code = errorCode(cause);
  }
}

/**
 * A file could not be decoded for a viewer (binary text, broken image).
 */
export class DecodeError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(message);
    this.name = 'DecodeError';
    this.path = path;
  }
}

function errorCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

function describeCause(err: unknown): string {
  const code = errorCode(err);
  switch (code) {
    case 'ENOENT':
      return 'no such file or directory';
    case 'EACCES':
    case 'EPERM':
      return 'permission denied';
    case 'EEXIST':
      return 'already exists';
    case 'ENOTEMPTY':
      return 'directory not empty';
    case 'ENOTDIR':
      return 'not a directory';
  }
  if (err instanceof Error) return err.message;
  if (err) return String(err);
  return 'unknown error';
}

/**
 * Human-readable one-liner for any thrown value.
 */
export function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err) return String(err);
  return 'unknown error';
}
