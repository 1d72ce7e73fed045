// Permission Resolver
//
// Computes the effective permissions of a guild member, guild-wide or in a
// single channel, from already-fetched role grants and channel overwrites.
// Resolution is synchronous and never mutates its inputs; one resolver can
// serve any number of members of the same guild.

import { z } from 'zod';
import {
  PermissionBitmask,
  defaultContextPolicy,
  idSchema,
  isContextType,
  issuesFromZod,
  parseId,
  type ContextType,
  type Id,
  type IdInput,
  type Overwrite,
} from '@permwise/protocol';
import { InvalidInputError, RoleNotFoundError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { applyContextPolicy, resolveContextPermissions } from './context.js';
import { resolveRootPermissions } from './root.js';
import type {
  MemberRef,
  PermissionResolverInput,
  PermissionResolverOptions,
  ResolutionContext,
} from './types.js';

// --- Input Validation ---

const bitmaskSchema = z.custom<PermissionBitmask>(
  (value) => value instanceof PermissionBitmask,
  'Expected a PermissionBitmask'
);

const rolesSchema = z
  .union([z.map(z.unknown(), z.unknown()), z.record(z.string(), z.unknown())])
  .transform((roles) =>
    roles instanceof Map ? Array.from(roles.entries()) : Object.entries(roles)
  )
  .pipe(z.array(z.tuple([idSchema, bitmaskSchema])));

const resolverInputSchema = z.object({
  guildId: idSchema,
  ownerId: idSchema,
  roles: rolesSchema,
});

function requireId(value: IdInput, field: string): Id {
  const id = parseId(value);
  if (id === undefined) {
    throw new InvalidInputError(`Invalid ${field}: ${String(value)}`, { field });
  }
  return id;
}

function requireContextType(value: unknown): asserts value is ContextType {
  if (typeof value !== 'string' || !isContextType(value)) {
    throw new InvalidInputError(`Invalid contextType: ${String(value)}`, {
      field: 'contextType',
    });
  }
}

function normalizeOverwrite(overwrite: Overwrite, index: number): Overwrite {
  const id = requireId(overwrite.target.id, `overwrites.${index}.target.id`);
  if (id === overwrite.target.id) return overwrite;
  return { ...overwrite, target: { ...overwrite.target, id } };
}

// --- Permission Resolver Class ---

/**
 * PermissionResolver resolves member permissions within one guild.
 *
 * @example
 * ```typescript
 * const resolver = new PermissionResolver({
 *   guildId: '1',
 *   ownerId: '2',
 *   roles: new Map([
 *     ['1', PermissionBitmask.fromFlags('VIEW_CHANNEL')],
 *     ['5', PermissionBitmask.fromFlags('SEND_MESSAGES')],
 *   ]),
 * });
 *
 * const inChannel = resolver.member('6', ['5']).inContext('text', overwrites);
 * if (inChannel.has('SEND_MESSAGES')) {
 *   // Member can post here
 * }
 * ```
 */
export class PermissionResolver {
  private readonly ctx: ResolutionContext;

  /**
   * @throws InvalidInputError when an id is malformed, a role id is listed
   * twice, or the everyone role is missing (unless `continueOnMissingItems`).
   */
  constructor(input: PermissionResolverInput, options: PermissionResolverOptions = {}) {
    const result = resolverInputSchema.safeParse(input);
    if (!result.success) {
      throw new InvalidInputError('Invalid resolver input', {
        details: { issues: issuesFromZod(result.error) },
      });
    }

    const { guildId, ownerId } = result.data;
    const roles = new Map<Id, PermissionBitmask>();
    for (const [roleId, grant] of result.data.roles) {
      if (roles.has(roleId)) {
        throw new InvalidInputError(`Duplicate role id ${roleId}`, {
          field: 'roles',
          details: { roleId },
        });
      }
      roles.set(roleId, grant);
    }

    const continueOnMissingItems = options.continueOnMissingItems ?? false;
    if (!roles.has(guildId) && !continueOnMissingItems) {
      throw new InvalidInputError(`Everyone role missing for guild ${guildId}`, {
        field: 'roles',
        details: { guildId },
      });
    }

    this.ctx = {
      guildId,
      ownerId,
      roles,
      logger: options.logger ?? silentLogger,
      policy: options.policy ?? defaultContextPolicy,
      continueOnMissingItems,
    };
  }

  get guildId(): Id {
    return this.ctx.guildId;
  }

  get ownerId(): Id {
    return this.ctx.ownerId;
  }

  /**
   * Bind a member for repeated resolution.
   */
  member(userId: IdInput, roleIds: Iterable<IdInput>): MemberPermissions {
    const roles = new Set<Id>();
    let index = 0;
    for (const roleId of roleIds) {
      roles.add(requireId(roleId, `roleIds.${index}`));
      index++;
    }
    return new MemberPermissions(this.ctx, {
      userId: requireId(userId, 'userId'),
      roleIds: roles,
    });
  }

  /**
   * Guild-level permissions of a member.
   */
  memberPermissions(userId: IdInput, roleIds: Iterable<IdInput>): PermissionBitmask {
    return this.member(userId, roleIds).permissions();
  }

  /**
   * Permissions of a member in a channel of the given type.
   */
  memberPermissionsInContext(
    userId: IdInput,
    roleIds: Iterable<IdInput>,
    contextType: ContextType,
    overwrites: Iterable<Overwrite>
  ): PermissionBitmask {
    return this.member(userId, roleIds).inContext(contextType, overwrites);
  }

  /**
   * Permissions a single role grants in a channel.
   *
   * Starts from the role's guild-level grant and applies the role's own
   * overwrite, if any. ADMINISTRATOR on the role grants every flag.
   *
   * @throws InvalidInputError when the context type is unknown, or the overwrite
 * targets a member or another role
   */
  rolePermissionsInContext(
    roleId: IdInput,
    contextType: ContextType,
    overwrite?: Overwrite
  ): PermissionBitmask {
    const { guildId, roles, logger } = this.ctx;
    const id = requireId(roleId, 'roleId');
    requireContextType(contextType);

    let permissions = roles.get(id);
    if (permissions === undefined) {
      if (!this.ctx.continueOnMissingItems) {
        throw new RoleNotFoundError(id, guildId);
      }
      logger.debug('Role missing from guild roles', { guildId, roleId: id });
      permissions = PermissionBitmask.empty();
    }

    if (overwrite) {
      const { target } = normalizeOverwrite(overwrite, 0);
      if (target.kind !== 'role') {
        throw new InvalidInputError('Overwrite must target a role', {
          field: 'overwrite.target',
          details: { target },
        });
      }
      if (target.id !== id) {
        throw new InvalidInputError(
          `Overwrite targets role ${target.id}, expected ${id}`,
          { field: 'overwrite.target.id', details: { roleId: id, targetId: target.id } }
        );
      }
    }

    if (permissions.has('ADMINISTRATOR')) {
      logger.debug('Administrator bypass', { guildId, roleId: id });
      return PermissionBitmask.all();
    }

    if (overwrite) {
      permissions = permissions.apply(overwrite.allow, overwrite.deny);
    }

    return applyContextPolicy(permissions, contextType, this.ctx.policy);
  }
}

/**
 * A member bound to a resolver.
 *
 * Created via {@link PermissionResolver.member}.
 */
export class MemberPermissions {
  constructor(
    private readonly ctx: ResolutionContext,
    private readonly ref: MemberRef
  ) {}

  get userId(): Id {
    return this.ref.userId;
  }

  /**
   * @throws RoleNotFoundError when a held role has no grant
   */
  permissions(): PermissionBitmask {
    return resolveRootPermissions(this.ctx, this.ref).permissions;
  }

  /**
   * @throws RoleNotFoundError when a held role, or a role an overwrite
   * targets, has no grant
   */
  inContext(contextType: ContextType, overwrites: Iterable<Overwrite>): PermissionBitmask {
    requireContextType(contextType);
    const normalized = Array.from(overwrites, normalizeOverwrite);
    return resolveContextPermissions(this.ctx, this.ref, contextType, normalized);
  }
}

// --- Factory Function ---

/**
 * Create a PermissionResolver instance.
 */
export function createPermissionResolver(
  input: PermissionResolverInput,
  options?: PermissionResolverOptions
): PermissionResolver {
  return new PermissionResolver(input, options);
}
