// Permission resolution module

export {
  PermissionResolver,
  MemberPermissions,
  createPermissionResolver,
} from './resolver.js';
export { resolveRootPermissions } from './root.js';
export { resolveContextPermissions, applyContextPolicy } from './context.js';
export type {
  PermissionResolverInput,
  PermissionResolverOptions,
  ResolutionContext,
  MemberRef,
  Bypass,
  RootResolution,
} from './types.js';
