// Permission overwrite types

import type { Id } from './common.js';
import type { PermissionBitmask } from './permissions.js';

/**
 * Who an overwrite applies to.
 */
export type OverwriteTarget =
  | { kind: 'role'; id: Id } // Everyone holding the role (the guild id means everyone)
  | { kind: 'member'; id: Id }; // A single user

/**
 * A per-channel permission delta.
 * `deny` is applied before `allow`, so a bit in both ends up set.
 */
export type Overwrite = {
  target: OverwriteTarget;

  /**
   * Bits forcibly set
   */
  allow: PermissionBitmask;

  /**
   * Bits forcibly cleared
   */
  deny: PermissionBitmask;
};

/**
 * Guild-level grants keyed by role id.
 */
export type RoleGrants = ReadonlyMap<Id, PermissionBitmask>;
