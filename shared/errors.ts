/**
 * Error types shared by the scheduling core and the study orchestration.
 *
 * Every error carries a machine-readable `code` so callers can branch on the
 * failure without matching message text.
 */

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'SESSION_NOT_STARTED'
  | 'SESSION_ALREADY_STARTED'
  | 'SESSION_COMPLETED'
  | 'SESSION_NOT_COMPLETED'
  | 'INVALID_MODE'
  | 'CARD_ALREADY_GRADED'
  | 'CARD_OUT_OF_ORDER'
  | 'DUPLICATE_CARD'
  | 'NOTHING_TO_REVERT'
  | 'PERSISTENCE_FAILED';

export class MicroRecallError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MicroRecallError';
    this.code = code;
  }
}

/**
 * Invalid settings: zero limits, out-of-range retention, empty step lists.
 */
export class ConfigError extends MicroRecallError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export type PreconditionCode = Extract<
  ErrorCode,
  | 'SESSION_NOT_STARTED'
  | 'SESSION_ALREADY_STARTED'
  | 'SESSION_COMPLETED'
  | 'SESSION_NOT_COMPLETED'
  | 'INVALID_MODE'
  | 'CARD_ALREADY_GRADED'
  | 'CARD_OUT_OF_ORDER'
  | 'DUPLICATE_CARD'
  | 'NOTHING_TO_REVERT'
>;

/**
 * Misuse of a study session by the orchestration layer (grading before
 * start, after completion, or out of order).
 */
export class SchedulingPreconditionError extends MicroRecallError {
  constructor(message: string, code: PreconditionCode) {
    super(message, code);
    this.name = 'SchedulingPreconditionError';
  }
}

/**
 * A repository failure. The original error is kept as `cause`.
 */
export class PersistenceError extends MicroRecallError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PERSISTENCE_FAILED', { cause });
    this.name = 'PersistenceError';
  }
}

/**
 * Flatten zod-style issues into readable `path: message` strings.
 */
export function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string[] {
  return issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
