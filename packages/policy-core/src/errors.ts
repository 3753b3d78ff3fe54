/**
 * Error types for policy loading, generation and engine contract violations.
 *
 * Validation problems are reported as values (see validator.ts) and policy
 * decisions are never errors.
 */

/**
 * Malformed configuration. Raised at the first offending construct.
 */
export class PolicyParseError extends Error {
  /** Index of the offending rule in `policies`, when the problem is inside a rule */
  readonly ruleIndex?: number;
  /** Name of the offending field */
  readonly field?: string;
  /** Human-readable description of what was expected */
  readonly expected?: string;

  constructor(
    message: string,
    details: { ruleIndex?: number; field?: string; expected?: string } = {}
  ) {
    super(message);
    this.name = 'PolicyParseError';
    this.ruleIndex = details.ruleIndex;
    this.field = details.field;
    this.expected = details.expected;
  }
}

export class UnsupportedFrameworkError extends Error {
  readonly framework: string;
  readonly supported: readonly string[];

  constructor(framework: string, supported: readonly string[]) {
    super(`Unsupported framework: ${framework}. Supported frameworks: ${supported.join(', ')}`);
    this.name = 'UnsupportedFrameworkError';
    this.framework = framework;
    this.supported = supported;
  }
}

export type InternalErrorCode =
  | 'UNVALIDATED_POLICY'
  | 'REVALIDATION_FAILED'
  | 'INVALID_REQUEST'
  | 'STATE_CORRUPTED';

/**
 * Broken internal invariant or caller contract. Never a user-facing outcome.
 */
export class InternalError extends Error {
  readonly code: InternalErrorCode;

  constructor(code: InternalErrorCode, message: string) {
    super(message);
    this.name = 'InternalError';
    this.code = code;
  }
}
