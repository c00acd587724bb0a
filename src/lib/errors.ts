// Failures the caller has to act on. Recoverable inference failures are
// booleans and row-level problems are recorded in the diagnosis, not thrown.

export class RuleLoadError extends Error {
  constructor(message: string, readonly sheet?: string) {
    super(message);
    this.name = 'RuleLoadError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ValidationConflictError extends Error {
  constructor(message: string, readonly labels: string[] = []) {
    super(message);
    this.name = 'ValidationConflictError';
  }
}

/** A state the row gate should make impossible. Seeing one is a bug. */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}
