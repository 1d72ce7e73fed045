// @permwise/protocol
// Permission data model, context policy table and wire parsing

export * from './types/index.js';

export {
  ProtocolValidationError,
  ContextPolicyError,
  WireFormatError,
  issuesFromZod,
  type ValidationIssue,
} from './errors.js';

export {
  ContextPolicy,
  parseContextPolicy,
  loadContextPolicy,
  defaultContextPolicy,
  type ContextDependency,
  type ContextPolicyFile,
} from './policy/context-policy.js';

export {
  idSchema,
  bitfieldSchema,
  rawOverwriteSchema,
  rawRoleSchema,
  parseOverwrites,
  parseRoleGrants,
  type RawOverwrite,
  type RawRole,
} from './validation/wire.js';
