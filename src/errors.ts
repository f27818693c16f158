/**
 * Fewer than two classes, a label outside the level set, or an estimator
 * override that does not fit the level count.
 */
export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DomainError';
  }
}

/**
 * The truth vector and the estimate disagree on the number of observations,
 * or the estimate has the wrong number of columns for the resolved classes.
 */
export class ShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShapeError';
  }
}

/**
 * Options or a prediction-set file failed validation.
 */
export class LogLossOptionsError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'LogLossOptionsError';
    this.issues = issues;
  }
}
