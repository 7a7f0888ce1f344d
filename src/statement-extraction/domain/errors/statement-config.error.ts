/**
 * StatementConfigError - Company catalogue could not be loaded
 *
 * Raised only while the catalogue is loaded at startup. Request handling
 * never throws it: a registry that exists is a valid one.
 */
export class StatementConfigError extends Error {
  /**
   * Where the catalogue came from (file path or `inline`)
   */
  readonly source: string | null;

  /**
   * Company the problem belongs to, when it belongs to one
   */
  readonly companyKey: string | null;

  readonly issues: readonly string[];

  constructor(params: {
    message: string;
    source?: string;
    companyKey?: string;
    issues?: readonly string[];
  }) {
    super(params.message);
    this.name = 'StatementConfigError';
    this.source = params.source ?? null;
    this.companyKey = params.companyKey ?? null;
    this.issues = Object.freeze([...(params.issues ?? [])]);

    Object.setPrototypeOf(this, StatementConfigError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: 'StatementConfigError',
      message: this.message,
      source: this.source,
      companyKey: this.companyKey,
      issues: [...this.issues],
    };
  }

  /**
   * Fold several load-time problems into one error so the operator sees
   * all of them in a single restart.
   */
  static fromIssues(
    issues: readonly string[],
    source: string,
  ): StatementConfigError {
    return new StatementConfigError({
      message: `Invalid company catalogue (${source}): ${issues.length} problem(s) - ${issues.join('; ')}`,
      source,
      issues,
    });
  }
}
