/**
 * Base class for every error the initialiser raises on purpose.
 * `code` is stable and safe to log or branch on.
 */
export class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code = 'APP_ERROR', cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AppError';
    this.code = code;
  }
}
