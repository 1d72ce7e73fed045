// Resolver error types

import type { Id } from '@permwise/protocol';

/**
 * Base class for all resolver errors.
 * Provides structured error information for debugging and logging.
 */
export class ResolverError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'ResolverError';
    this.code = code;
  }
}

/**
 * Malformed arguments, detected before any computation.
 */
export class InvalidInputError extends ResolverError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('INVALID_INPUT', message);
    this.name = 'InvalidInputError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * A role id has no entry in the guild's role grants.
 */
export class RoleNotFoundError extends ResolverError {
  readonly roleId: Id;
  readonly guildId: Id;
  readonly userId?: Id;

  constructor(roleId: Id, guildId: Id, userId?: Id) {
    const heldBy = userId === undefined ? '' : ` (held by member ${userId})`;
    super('ROLE_NOT_FOUND', `Role ${roleId} not found in guild ${guildId}${heldBy}`);
    this.name = 'RoleNotFoundError';
    this.roleId = roleId;
    this.guildId = guildId;
    this.userId = userId;
  }
}

export function isResolverError(value: unknown): value is ResolverError {
  return value instanceof ResolverError;
}
