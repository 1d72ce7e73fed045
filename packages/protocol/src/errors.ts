// Protocol validation errors

import type { ZodError } from 'zod';

/**
 * A single problem found while validating input.
 */
export type ValidationIssue = {
  /** Dotted path to the offending value ("" for the root) */
  path: string;
  message: string;
};

/**
 * Base class for protocol validation errors.
 */
export class ProtocolValidationError extends Error {
  readonly code: string;
  readonly issues: ValidationIssue[];

  constructor(code: string, message: string, issues: ValidationIssue[]) {
    super(message);
    this.name = 'ProtocolValidationError';
    this.code = code;
    this.issues = issues;
  }
}

/**
 * Error when a context policy table is malformed.
 */
export class ContextPolicyError extends ProtocolValidationError {
  constructor(issues: ValidationIssue[]) {
    super('INVALID_CONTEXT_POLICY', `Invalid context policy: ${formatIssues(issues)}`, issues);
    this.name = 'ContextPolicyError';
  }
}

/**
 * Error when platform JSON does not match the expected wire shape.
 */
export class WireFormatError extends ProtocolValidationError {
  constructor(what: string, issues: ValidationIssue[]) {
    super('INVALID_WIRE_FORMAT', `Invalid ${what}: ${formatIssues(issues)}`, issues);
    this.name = 'WireFormatError';
  }
}

export function issuesFromZod(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

function formatIssues(issues: ValidationIssue[]): string {
  return issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join('; ');
}
