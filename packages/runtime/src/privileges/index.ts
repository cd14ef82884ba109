// Privilege Resolver

export {
  combinedPrivilege,
  groupMemberPrivilege,
  groupResourcePrivilege,
  effectivePrivilege,
  applyResourceFlags,
} from './resolver.js';
