import type { ContractIssue } from '../errors';

/**
 * TocTreeFormatError
 *
 * Thrown when a persisted TOC tree document is not JSON
 * or does not match the interchange schema.
 */
export class TocTreeFormatError extends Error {
  readonly issues: ContractIssue[];

  constructor(
    message: string,
    issues: ContractIssue[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'TocTreeFormatError';
    this.issues = issues;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create TocTreeFormatError from unknown error with context
   */
  static fromError(context: string, error: unknown): TocTreeFormatError {
    return new TocTreeFormatError(
      `${context}: ${TocTreeFormatError.getErrorMessage(error)}`,
      [],
      { cause: error },
    );
  }
}
