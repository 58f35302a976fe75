import { AppError } from './AppError';

/**
 * Mongo operations the initialiser performs.
 * String intersection keeps the union open for ad-hoc commands.
 */
export type MongoOperation =
  | 'connect'
  | 'ping'
  | 'listDatabases'
  | 'usersInfo'
  | 'createUser'
  | 'runCommand'
  | 'close'
  | (string & {});

/**
 * Structured, log-safe context attached to Mongo errors.
 */
export interface MongoErrorContext {
  /** Logical operation being attempted (e.g., "createUser"). */
  readonly operation: MongoOperation;
  readonly dbName?: string;
  /**
   * Sanitized arguments preview. Credentials are redacted before they get here.
   */
  readonly argsPreview?: Readonly<Record<string, unknown>>;
  /** Driver error code (e.g., 51003 from MongoServerError). */
  readonly driverCode?: number | string;
  /** Driver error class name (e.g., "MongoServerSelectionError"). */
  readonly driverError?: string;
}

/** Driver error classes that mean "no server reachable yet". */
const SERVER_SELECTION_ERRORS: ReadonlySet<string> = new Set([
  'MongoServerSelectionError',
  'MongoTopologyClosedError',
  'MongoNetworkError',
  'MongoNetworkTimeoutError',
]);

/**
 * A failure during a MongoDB action.
 * Wraps the driver error as `cause` and carries structured context.
 */
export class MongoActionError extends AppError {
  public readonly name = 'MongoActionError' as const;
  public readonly context: Readonly<MongoErrorContext>;

  constructor(message: string, context: MongoErrorContext, cause?: Error) {
    super(message, 'MONGO_ACTION_FAILED', cause);
    this.context = Object.freeze({ ...context });
  }

  /** True when the driver could not select a server (still starting, unreachable). */
  public isServerSelectionFailure(): boolean {
    const errName = this.context.driverError;
    return errName !== undefined && SERVER_SELECTION_ERRORS.has(errName);
  }

  /** Human-readable summary for logs. */
  public summary(): string {
    const parts: string[] = [`op=${this.context.operation}`];
    if (this.context.dbName) parts.push(`db=${this.context.dbName}`);
    if (this.context.driverError) parts.push(`error=${this.context.driverError}`);
    if (this.context.driverCode !== undefined) {
      parts.push(`driverCode=${String(this.context.driverCode)}`);
    }
    return `Mongo action failed: ${parts.join(' ')}: ${this.message}`;
  }

  /** JSON-safe representation for structured logs. */
  public toJSON(): {
    name: string;
    code: string;
    message: string;
    context: MongoErrorContext;
    cause?: { name: string; message: string };
  } {
    const c = this.cause;
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: c instanceof Error ? { name: c.name, message: c.message } : undefined,
    };
  }

  /**
   * Wrap a thrown value into a MongoActionError with consistent context.
   * An existing MongoActionError is returned as-is.
   */
  public static wrap(
    err: unknown,
    context: MongoErrorContext,
    fallbackMessage = 'Mongo action failed',
  ): MongoActionError {
    if (err instanceof MongoActionError) {
      return err;
    }
    const { message, driverCode, driverError } = extractDriverDetails(err);
    return new MongoActionError(
      message ?? fallbackMessage,
      { ...context, driverCode, driverError },
      err instanceof Error ? err : undefined,
    );
  }
}

/**
 * Pull message, code and class name out of driver errors
 * (MongoServerError, MongoServerSelectionError, ...).
 */
function extractDriverDetails(err: unknown): {
  message?: string;
  driverCode?: number | string;
  driverError?: string;
} {
  if (err instanceof Error) {
    const code: unknown = Reflect.get(err, 'code');
    return {
      message: err.message.length > 0 ? err.message : undefined,
      driverCode:
        typeof code === 'number' || typeof code === 'string' ? code : undefined,
      driverError: err.name,
    };
  }
  if (typeof err === 'string' && err.length > 0) {
    return { message: err };
  }
  return {};
}
