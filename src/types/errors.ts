/**
 * Custom error classes for the question-answering pipeline.
 */

/**
 * Error thrown when an LLM call (SQL generation or answer synthesis) fails.
 */
export class LLMError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LLMError';
    Object.setPrototypeOf(this, LLMError.prototype);
  }
}

/**
 * Error thrown when the store rejects a query (bad syntax, unknown column,
 * constraint violation).
 */
export class SQLExecutionError extends Error {
  public readonly sql: string;

  constructor(message: string, sql: string) {
    super(message);
    this.name = 'SQLExecutionError';
    this.sql = sql;
    Object.setPrototypeOf(this, SQLExecutionError.prototype);
  }
}

/**
 * Error thrown when the store cannot be reached at all.
 */
export class StorageUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StorageUnavailableError';
    Object.setPrototypeOf(this, StorageUnavailableError.prototype);
  }
}

/**
 * Error thrown when the store cannot be provisioned from its source workbooks.
 */
export class ProvisioningError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProvisioningError';
    Object.setPrototypeOf(this, ProvisioningError.prototype);
  }
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
