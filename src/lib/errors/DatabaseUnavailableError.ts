import { AppError } from './AppError';

/** MongoDB did not become reachable within the configured wait budget. */
export class DatabaseUnavailableError extends AppError {
  constructor(
    readonly address: string,
    readonly attempts: number,
    readonly waitedMs: number,
    cause?: unknown,
  ) {
    super(
      `MongoDB at ${address} not available after ${attempts} attempt(s) in ${waitedMs}ms`,
      'DATABASE_UNAVAILABLE',
      cause,
    );
    this.name = 'DatabaseUnavailableError';
  }
}
