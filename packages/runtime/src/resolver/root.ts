// Guild-level (root) permission resolution

import { PermissionBitmask } from '@permwise/protocol';
import { RoleNotFoundError } from '../errors.js';
import type { MemberRef, ResolutionContext, RootResolution } from './types.js';

/**
 * Resolve a member's guild-level permissions.
 *
 * The owner and any member whose roles grant ADMINISTRATOR get every flag.
 * Everyone else gets the union of the everyone role's grant and the grants
 * of every role they hold.
 */
export function resolveRootPermissions(
  ctx: ResolutionContext,
  member: MemberRef
): RootResolution {
  const { guildId, roles, logger } = ctx;
  const { userId } = member;

  if (userId === ctx.ownerId) {
    logger.debug('Owner bypass', { guildId, userId });
    return { permissions: PermissionBitmask.all(), bypass: 'owner' };
  }

  let permissions = roles.get(guildId);
  if (permissions === undefined) {
    if (!ctx.continueOnMissingItems) {
      throw new RoleNotFoundError(guildId, guildId);
    }
    logger.debug('Everyone role missing from guild roles', { guildId });
    permissions = PermissionBitmask.empty();
  }

  for (const roleId of member.roleIds) {
    const grant = roles.get(roleId);
    if (grant === undefined) {
      if (!ctx.continueOnMissingItems) {
        throw new RoleNotFoundError(roleId, guildId, userId);
      }
      logger.debug('Member holds role missing from guild roles', {
        guildId,
        userId,
        roleId,
      });
      continue;
    }
    permissions = permissions.union(grant);
  }

  if (permissions.has('ADMINISTRATOR')) {
    logger.debug('Administrator bypass', { guildId, userId });
    return { permissions: PermissionBitmask.all(), bypass: 'administrator' };
  }

  return { permissions };
}
