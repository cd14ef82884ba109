// Privilege Resolver
//
// Combined privilege is the strongest level across every applicable grant.
// Effective privilege adjusts a user's combined resource privilege by the
// resource's immutable and public flags.

import {
  PrivilegeLevel,
  strongest,
  weakest,
  type Id,
  type Principal,
  type ResourceFlags,
} from '@custody/protocol';
import type { RepositoryContext } from '@custody/repositories';

/**
 * Active groups among the given ids.
 */
async function activeGroupIds(repos: RepositoryContext, groupIds: readonly Id[]): Promise<Id[]> {
  const groups = await repos.groups.getMany(groupIds);
  return groups.filter((g) => g.flags.active).map((g) => g.id);
}

/**
 * A user's privilege over a resource, direct and through group membership.
 *
 * Superusers resolve to OWNER and inactive users to NONE. Group grants count
 * only for active groups in which the user holds any grant.
 */
export async function combinedPrivilege(
  repos: RepositoryContext,
  user: Principal,
  resourceId: Id
): Promise<PrivilegeLevel> {
  if (user.isSuperuser) return PrivilegeLevel.OWNER;
  if (!user.isActive) return PrivilegeLevel.NONE;

  const direct = await repos.userResourceGrants.query({
    subjectId: user.id,
    objectId: resourceId,
  });

  const memberships = await repos.userGroupGrants.query({ subjectId: user.id });
  const groupIds = await activeGroupIds(repos, [...new Set(memberships.map((g) => g.objectId))]);

  const viaGroups =
    groupIds.length > 0
      ? await repos.groupResourceGrants.query({ subjectIds: groupIds, objectId: resourceId })
      : [];

  return strongest([...direct, ...viaGroups].map((g) => g.privilege));
}

/**
 * A user's privilege over a group: the strongest of their user-group grants.
 */
export async function groupMemberPrivilege(
  repos: RepositoryContext,
  user: Principal,
  groupId: Id
): Promise<PrivilegeLevel> {
  if (user.isSuperuser) return PrivilegeLevel.OWNER;
  if (!user.isActive) return PrivilegeLevel.NONE;

  const grants = await repos.userGroupGrants.query({ subjectId: user.id, objectId: groupId });
  return strongest(grants.map((g) => g.privilege));
}

/**
 * A group's privilege over a resource; NONE when the group is inactive or unknown.
 */
export async function groupResourcePrivilege(
  repos: RepositoryContext,
  groupId: Id,
  resourceId: Id
): Promise<PrivilegeLevel> {
  const group = await repos.groups.get(groupId);
  if (!group?.flags.active) return PrivilegeLevel.NONE;

  const grants = await repos.groupResourceGrants.query({ subjectId: groupId, objectId: resourceId });
  return strongest(grants.map((g) => g.privilege));
}

/**
 * Apply resource flags to a combined privilege.
 *
 * immutable floors the result at VIEW (max), then public guarantees VIEW (min).
 * With both set the result is VIEW whichever order the two are applied in.
 */
export function applyResourceFlags(
  level: PrivilegeLevel,
  flags: Pick<ResourceFlags, 'immutable' | 'public'>
): PrivilegeLevel {
  let result = level;
  if (flags.immutable) {
    result = weakest(PrivilegeLevel.VIEW, result);
  }
  if (flags.public) {
    result = strongest([PrivilegeLevel.VIEW, result]);
  }
  return result;
}

/**
 * A user's combined privilege over a resource, adjusted by its flags.
 * Unknown resources resolve to NONE.
 */
export async function effectivePrivilege(
  repos: RepositoryContext,
  user: Principal,
  resourceId: Id
): Promise<PrivilegeLevel> {
  const resource = await repos.resources.get(resourceId);
  if (!resource) return PrivilegeLevel.NONE;

  return applyResourceFlags(await combinedPrivilege(repos, user, resourceId), resource.flags);
}
