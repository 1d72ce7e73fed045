// Context-scoped (channel) permission resolution
//
// Overwrite hierarchy, lowest to highest precedence:
//   everyone overwrite -> union of held-role overwrites -> member overwrite
// Each tier clears its deny bits before setting its allow bits. The context
// policy then masks out flags the channel type cannot use and clears flags
// whose prerequisite is missing.

import {
  PermissionBitmask,
  type ContextPolicy,
  type ContextType,
  type Overwrite,
} from '@permwise/protocol';
import { RoleNotFoundError } from '../errors.js';
import { resolveRootPermissions } from './root.js';
import type { MemberRef, ResolutionContext } from './types.js';

type Delta = {
  allow: PermissionBitmask;
  deny: PermissionBitmask;
};

const emptyDelta = (): Delta => ({
  allow: PermissionBitmask.empty(),
  deny: PermissionBitmask.empty(),
});

function merge(delta: Delta, overwrite: Overwrite): Delta {
  return {
    allow: delta.allow.union(overwrite.allow),
    deny: delta.deny.union(overwrite.deny),
  };
}

/**
 * Resolve a member's permissions in a channel.
 *
 * Owner and administrator results pass through unmasked.
 */
export function resolveContextPermissions(
  ctx: ResolutionContext,
  member: MemberRef,
  contextType: ContextType,
  overwrites: Iterable<Overwrite>
): PermissionBitmask {
  const root = resolveRootPermissions(ctx, member);
  if (root.bypass) {
    return root.permissions;
  }

  const { guildId, roles, logger } = ctx;
  const { userId, roleIds } = member;

  let everyone = emptyDelta();
  let heldRoles = emptyDelta();
  let own = emptyDelta();

  for (const overwrite of overwrites) {
    const { target } = overwrite;
    switch (target.kind) {
      case 'role': {
        if (target.id === guildId) {
          everyone = merge(everyone, overwrite);
          break;
        }
        if (!roles.has(target.id)) {
          if (!ctx.continueOnMissingItems) {
            throw new RoleNotFoundError(target.id, guildId);
          }
          logger.debug('Overwrite targets role missing from guild roles', {
            guildId,
            roleId: target.id,
          });
          break;
        }
        if (roleIds.has(target.id)) {
          heldRoles = merge(heldRoles, overwrite);
        }
        break;
      }
      case 'member': {
        if (target.id === userId) {
          own = merge(own, overwrite);
        }
        break;
      }
      default: {
        const unreachable: never = target;
        throw new Error(`Unknown overwrite target: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  const permissions = root.permissions
    .apply(everyone.allow, everyone.deny)
    .apply(heldRoles.allow, heldRoles.deny)
    .apply(own.allow, own.deny);

  return applyContextPolicy(permissions, contextType, ctx.policy);
}

/**
 * Restrict a permission set to what a context type allows.
 *
 * Intersects with the context mask, then applies the dependency rules in
 * order, repeating until no rule clears anything. Applying it twice yields
 * the same result.
 */
export function applyContextPolicy(
  permissions: PermissionBitmask,
  contextType: ContextType,
  policy: ContextPolicy
): PermissionBitmask {
  let result = permissions.intersection(policy.maskFor(contextType));
  const rules = policy.dependenciesFor(contextType);

  // Each pass only removes bits, so this terminates.
  let changed = true;
  while (changed) {
    changed = false;
    for (const rule of rules) {
      if (!result.has(rule.requires) && result.intersects(rule.clears)) {
        result = result.difference(rule.clears);
        changed = true;
      }
    }
  }

  return result;
}
