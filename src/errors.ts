export type MigrationErrorCode = 'SOURCE_NOT_FOUND' | 'INVALID_CONFIG' | 'UNENCODABLE_OUTPUT';

/**
 * Error that aborts a whole run
 */
export class MigrationError extends Error {
  constructor(
    message: string,
    public code: MigrationErrorCode,
    public exitCode: number = 1
  ) {
    super(message);
    this.name = 'MigrationError';
  }
}

export function isMigrationError(error: unknown): error is MigrationError {
  return error instanceof MigrationError;
}
