// @permwise/runtime
// Permission resolution for guild members and channels

// Resolver
export {
  PermissionResolver,
  MemberPermissions,
  createPermissionResolver,
  resolveRootPermissions,
  resolveContextPermissions,
  applyContextPolicy,
  type PermissionResolverInput,
  type PermissionResolverOptions,
  type ResolutionContext,
  type MemberRef,
  type Bypass,
  type RootResolution,
} from './resolver/index.js';

// Error types
export {
  ResolverError,
  InvalidInputError,
  RoleNotFoundError,
  isResolverError,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type ResolverLogger,
  type LogEntry,
} from './logger.js';
