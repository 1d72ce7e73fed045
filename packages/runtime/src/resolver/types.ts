// Resolver types

import type {
  ContextPolicy,
  Id,
  IdInput,
  PermissionBitmask,
} from '@permwise/protocol';
import type { ResolverLogger } from '../logger.js';

/**
 * Guild-level inputs for a resolver.
 */
export type PermissionResolverInput = {
  /** The guild id, which is also the everyone role's id */
  guildId: IdInput;

  /** The guild owner, who holds every permission */
  ownerId: IdInput;

  /** Guild-level grant of every role, including the everyone role */
  roles:
    | ReadonlyMap<IdInput, PermissionBitmask>
    | Readonly<Record<string, PermissionBitmask>>;
};

/**
 * Options for a resolver
 */
export type PermissionResolverOptions = {
  /**
   * Logger for structured logging (defaults to silent)
   */
  logger?: ResolverLogger;

  /**
   * Context masks and dependency rules (defaults to the shipped table)
   */
  policy?: ContextPolicy;

  /**
   * Skip roles missing from the guild's role grants instead of failing.
   * A missing everyone role then starts from the empty set. Results may be
   * incomplete. Defaults to false.
   */
  continueOnMissingItems?: boolean;
};

/**
 * Validated state shared by every resolution of one guild.
 */
export type ResolutionContext = {
  guildId: Id;
  ownerId: Id;
  roles: ReadonlyMap<Id, PermissionBitmask>;
  logger: ResolverLogger;
  policy: ContextPolicy;
  continueOnMissingItems: boolean;
};

/**
 * The member being resolved.
 */
export type MemberRef = {
  userId: Id;

  /** Held roles, deduplicated; the everyone role is implied */
  roleIds: ReadonlySet<Id>;
};

/**
 * Which shortcut, if any, produced a result.
 */
export type Bypass = 'owner' | 'administrator';

export type RootResolution = {
  permissions: PermissionBitmask;
  bypass?: Bypass;
};
