// Wire format parsing
//
// Converts the platform's JSON shapes for roles and channel overwrites into
// protocol types. Bitfields arrive as decimal strings since they do not fit
// in a JSON number.

import { z } from 'zod';
import { parseId, type Id } from '../types/common.js';
import { PermissionBitmask } from '../types/permissions.js';
import type { Overwrite, RoleGrants } from '../types/overwrites.js';
import { WireFormatError, issuesFromZod } from '../errors.js';

export const idSchema = z
  .union([z.string(), z.number(), z.bigint()])
  .transform((value, ctx) => {
    const id = parseId(value);
    if (id === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Expected an unsigned 64-bit integer id',
      });
      return z.NEVER;
    }
    return id;
  });

export const bitfieldSchema = z
  .string()
  .regex(/^\d+$/, 'Expected a decimal bitfield string')
  .transform((value, ctx) => {
    try {
      return PermissionBitmask.parse(value);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  });

export const rawOverwriteSchema = z
  .object({
    id: idSchema,
    type: z.union([z.literal(0), z.literal(1), z.literal('role'), z.literal('member')]),
    allow: bitfieldSchema,
    deny: bitfieldSchema,
  })
  .transform(
    (raw): Overwrite => ({
      target:
        raw.type === 0 || raw.type === 'role'
          ? { kind: 'role', id: raw.id }
          : { kind: 'member', id: raw.id },
      allow: raw.allow,
      deny: raw.deny,
    })
  );

export const rawRoleSchema = z
  .object({
    id: idSchema,
    permissions: bitfieldSchema,
  })
  .transform((raw): [Id, PermissionBitmask] => [raw.id, raw.permissions]);

export type RawOverwrite = z.input<typeof rawOverwriteSchema>;
export type RawRole = z.input<typeof rawRoleSchema>;

/**
 * Parse a channel's `permission_overwrites` array.
 */
export function parseOverwrites(raw: unknown): Overwrite[] {
  const result = z.array(rawOverwriteSchema).safeParse(raw);
  if (!result.success) {
    throw new WireFormatError('permission overwrites', issuesFromZod(result.error));
  }
  return result.data;
}

/**
 * Parse a guild's `roles` array into role grants.
 * A role id listed twice is rejected.
 */
export function parseRoleGrants(raw: unknown): RoleGrants {
  const result = z.array(rawRoleSchema).safeParse(raw);
  if (!result.success) {
    throw new WireFormatError('roles', issuesFromZod(result.error));
  }

  const grants = new Map<Id, PermissionBitmask>();
  result.data.forEach(([id, permissions], index) => {
    if (grants.has(id)) {
      throw new WireFormatError('roles', [
        { path: `${index}.id`, message: `Duplicate role id ${id}` },
      ]);
    }
    grants.set(id, permissions);
  });
  return grants;
}
