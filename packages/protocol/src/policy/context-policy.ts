// Context policy table
//
// Which flags are meaningful in each context type, and which flags are
// cleared when a flag they depend on is missing. The table is data: the
// shipped default lives in context-policy.json and callers may load their
// own.

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  PermissionBitmask,
  isPermissionFlag,
  type PermissionFlag,
} from '../types/permissions.js';
import {
  CONTEXT_TYPES,
  isContextType,
  type ContextType,
} from '../types/contexts.js';
import { ContextPolicyError, issuesFromZod } from '../errors.js';

// --- Schema ---

const flagSchema = z
  .string()
  .refine((value): value is PermissionFlag => isPermissionFlag(value), {
    message: 'Unknown permission flag',
  });

const contextTypeSchema = z
  .string()
  .refine((value): value is ContextType => isContextType(value), {
    message: 'Unknown context type',
  });

const dependencySchema = z.object({
  requires: flagSchema,
  clears: z.union([z.literal('all'), z.array(flagSchema)]),
  contexts: z.array(contextTypeSchema).optional(),
});

const policyFileSchema = z
  .object({
    groups: z.record(z.string(), z.array(flagSchema)),
    contexts: z.record(z.string(), z.array(z.string())),
    dependencies: z.array(dependencySchema),
  })
  .superRefine((file, ctx) => {
    for (const [type, groups] of Object.entries(file.contexts)) {
      if (!isContextType(type)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['contexts', type],
          message: 'Unknown context type',
        });
      }
      groups.forEach((group, index) => {
        if (!(group in file.groups)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['contexts', type, index],
            message: `Unknown group "${group}"`,
          });
        }
      });
    }

    for (const type of CONTEXT_TYPES) {
      if (!(type in file.contexts)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['contexts', type],
          message: 'Missing context type',
        });
      }
    }
  });

export type ContextPolicyFile = z.input<typeof policyFileSchema>;

// --- Compiled Policy ---

/**
 * A dependency rule: when `requires` is missing, `clears` is removed.
 */
export type ContextDependency = {
  requires: PermissionFlag;
  clears: PermissionBitmask;

  /** Context types the rule applies to (all when absent) */
  contexts?: readonly ContextType[];
};

export class ContextPolicy {
  constructor(
    private readonly masks: ReadonlyMap<ContextType, PermissionBitmask>,
    private readonly dependencies: readonly ContextDependency[]
  ) {}

  /**
   * Flags meaningful in the given context type.
   */
  maskFor(type: ContextType): PermissionBitmask {
    return this.masks.get(type) ?? PermissionBitmask.empty();
  }

  /**
   * Dependency rules for the given context type, in table order.
   */
  dependenciesFor(type: ContextType): ContextDependency[] {
    return this.dependencies.filter(
      (rule) => rule.contexts === undefined || rule.contexts.includes(type)
    );
  }
}

/**
 * Validate and compile an in-memory policy table.
 */
export function parseContextPolicy(raw: unknown): ContextPolicy {
  const result = policyFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ContextPolicyError(issuesFromZod(result.error));
  }

  const file = result.data;
  const groups = new Map<string, PermissionBitmask>();
  for (const [name, flags] of Object.entries(file.groups)) {
    groups.set(name, PermissionBitmask.fromFlags(...flags));
  }

  const masks = new Map<ContextType, PermissionBitmask>();
  for (const type of CONTEXT_TYPES) {
    let mask = PermissionBitmask.empty();
    for (const group of file.contexts[type] ?? []) {
      mask = mask.union(groups.get(group) ?? PermissionBitmask.empty());
    }
    masks.set(type, mask);
  }

  const dependencies = file.dependencies.map((rule): ContextDependency => ({
    requires: rule.requires,
    clears:
      rule.clears === 'all'
        ? PermissionBitmask.all()
        : PermissionBitmask.fromFlags(...rule.clears),
    contexts: rule.contexts,
  }));

  return new ContextPolicy(masks, dependencies);
}

/**
 * Read, validate and compile a policy table from a JSON file.
 */
export function loadContextPolicy(path: string | URL): ContextPolicy {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ContextPolicyError([
      { path: '', message: err instanceof Error ? err.message : String(err) },
    ]);
  }
  return parseContextPolicy(raw);
}

/**
 * The shipped policy table.
 */
export const defaultContextPolicy: ContextPolicy = loadContextPolicy(
  new URL('./context-policy.json', import.meta.url)
);
