/**
 * Errors that escape the navigation loop to the attempt boundary.
 *
 * Resolution and action failures are never thrown; they come back as
 * ActionOutcome values. Only these conditions cross component lines.
 */

export class AttemptCancelledError extends Error {
  constructor(message = 'attempt cancelled') {
    super(message);
    this.name = 'AttemptCancelledError';
  }
}

export class BrowserDisconnectedError extends Error {
  constructor(message = 'browser disconnected') {
    super(message);
    this.name = 'BrowserDisconnectedError';
  }
}

/** Raised on an illegal SessionState transition (outcome rewrite, iteration past the cap). */
export class SessionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionStateError';
  }
}

export class OracleUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'OracleUnavailableError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** An applicant profile failed validation; `issues` lists each problem as `path: message`. */
export class ProfileValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid applicant profile: ${issues.join('; ')}`);
    this.name = 'ProfileValidationError';
    this.issues = issues;
  }
}
