/**
 * Tail Errors
 *
 * Only filesystem failures are errors. Malformed log content never is.
 */

export class TailError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'TailError';
  }
}

/**
 * The watched file does not exist. Fatal to the watch session.
 */
export class FileNotFoundError extends TailError {
  constructor(filePath: string, cause?: unknown) {
    super(`File not found: ${filePath}`, filePath, cause);
    this.name = 'FileNotFoundError';
  }
}

/**
 * A stat or read failed this cycle. The session retries on the next poll.
 */
export class TransientIOError extends TailError {
  constructor(filePath: string, cause?: unknown) {
    super(`I/O error on ${filePath}: ${describeCause(cause)}`, filePath, cause);
    this.name = 'TransientIOError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Classify a Node fs error for the given path.
 */
export function toTailError(filePath: string, error: unknown): TailError {
  if (error instanceof TailError) return error;
  const code = errorCode(error);
  if (code === 'ENOENT' || code === 'ENOTDIR') {
    return new FileNotFoundError(filePath, error);
  }
  return new TransientIOError(filePath, error);
}
