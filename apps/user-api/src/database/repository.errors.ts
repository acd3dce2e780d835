/**
 * RepositoryErrorKind - Failure categories of the persistence layer
 */
export type RepositoryErrorKind = 'not_found' | 'connection' | 'constraint_violation' | 'unknown';

// mysql2 / Node socket codes meaning the database could not be reached
const CONNECTION_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENOTFOUND',
  'PROTOCOL_CONNECTION_LOST',
  'PROTOCOL_SEQUENCE_TIMEOUT',
  'POOL_CLOSED',
  'ER_CON_COUNT_ERROR',
  'ER_ACCESS_DENIED_ERROR'
]);

// MySQL codes for rejected writes
const CONSTRAINT_CODES: ReadonlySet<string> = new Set([
  'ER_DUP_ENTRY',
  'ER_NO_REFERENCED_ROW',
  'ER_NO_REFERENCED_ROW_2',
  'ER_ROW_IS_REFERENCED',
  'ER_ROW_IS_REFERENCED_2',
  'ER_CHECK_CONSTRAINT_VIOLATED'
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  const code = error.code;
  return typeof code === 'string' ? code : undefined;
}

/**
 * RepositoryError - Typed failure raised by repositories and DatabaseService
 */
export class RepositoryError extends Error {
  constructor(
    readonly kind: RepositoryErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RepositoryError';
  }

  static notFound(message: string): RepositoryError {
    return new RepositoryError('not_found', message);
  }

  static connection(message: string, cause?: unknown): RepositoryError {
    return new RepositoryError('connection', message, { cause });
  }

  /**
   * Classify a raw driver error. Errors that are already RepositoryErrors pass through.
   * @param error - Anything thrown by mysql2 or the pool
   * @param context - Short description of the failed operation
   */
  static from(error: unknown, context: string): RepositoryError {
    if (error instanceof RepositoryError) return error;

    const code = errorCode(error);
    const detail = error instanceof Error ? error.message : String(error);

    if (code && CONNECTION_CODES.has(code)) {
      return new RepositoryError('connection', `${context}: ${detail}`, { cause: error });
    }
    if (code && CONSTRAINT_CODES.has(code)) {
      return new RepositoryError('constraint_violation', `${context}: ${detail}`, { cause: error });
    }
    return new RepositoryError('unknown', `${context}: ${detail}`, { cause: error });
  }
}
