/**
 * Single violated call contract
 */
export interface ContractIssue {
  /**
   * Offending argument path (e.g. "lines[3].page", "totalPages")
   */
  path: string;

  message: string;
}

/**
 * OutlineContractError
 *
 * Base error class for caller contract violations at the API boundary
 * (missing total page count, malformed lines, invalid options).
 * Malformed document content never raises this error.
 */
export class OutlineContractError extends Error {
  readonly issues: ContractIssue[];

  constructor(
    message: string,
    issues: ContractIssue[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'OutlineContractError';
    this.issues = issues;
  }

  /**
   * Get formatted issue summary
   */
  getSummary(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  ${issue.path}: ${issue.message}`);
    }
    return lines.join('\n');
  }
}

/**
 * UnorderedLinesError
 *
 * Thrown when lines are not page-ordered, or line numbers
 * do not increase within a page.
 */
export class UnorderedLinesError extends OutlineContractError {
  constructor(issues: ContractIssue[]) {
    super(`Lines are not page-ordered (${issues.length} violation(s))`, issues);
    this.name = 'UnorderedLinesError';
  }
}
