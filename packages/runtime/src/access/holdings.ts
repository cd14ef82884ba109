// Holdings - computed views over the grant relations
//
// Membership, ownership and holding are never stored as collections; they are
// derived from grant records on demand so the grants remain the only source of
// truth.

import {
  PrivilegeLevel,
  isAtLeast,
  strongest,
  type Grant,
  type GrantablePrivilege,
  type Group,
  type Id,
  type Resource,
  type User,
} from '@custody/protocol';
import type { RepositoryContext } from '@custody/repositories';

function distinct(ids: Iterable<Id>): Id[] {
  return [...new Set(ids)];
}

/**
 * Strongest privilege per key across a set of grants.
 */
function strongestBy(grants: readonly Grant[], key: (g: Grant) => Id): Map<Id, PrivilegeLevel> {
  const result = new Map<Id, PrivilegeLevel>();
  for (const grant of grants) {
    const id = key(grant);
    result.set(id, strongest([grant.privilege, result.get(id) ?? PrivilegeLevel.NONE]));
  }
  return result;
}

export class Holdings {
  constructor(private repos: RepositoryContext) {}

  // --- A user's holdings ---

  /** Groups the user holds any grant over (is a member of) */
  async heldGroups(userId: Id): Promise<Group[]> {
    const grants = await this.repos.userGroupGrants.query({ subjectId: userId });
    return this.repos.groups.getMany(distinct(grants.map((g) => g.objectId)));
  }

  async ownedGroups(userId: Id): Promise<Group[]> {
    const grants = await this.repos.userGroupGrants.query({
      subjectId: userId,
      privilege: PrivilegeLevel.OWNER,
    });
    return this.repos.groups.getMany(distinct(grants.map((g) => g.objectId)));
  }

  async editableGroups(userId: Id): Promise<Group[]> {
    const grants = await this.repos.userGroupGrants.query({
      subjectId: userId,
      atLeast: PrivilegeLevel.CHANGE,
    });
    const groups = await this.repos.groups.getMany(distinct(grants.map((g) => g.objectId)));
    return groups.filter((g) => g.flags.active);
  }

  /**
   * Strongest privilege per resource the user holds, directly or through
   * membership of an active group.
   */
  async resourcePrivileges(userId: Id): Promise<Map<Id, PrivilegeLevel>> {
    const direct = await this.repos.userResourceGrants.query({ subjectId: userId });

    const memberships = await this.repos.userGroupGrants.query({ subjectId: userId });
    const groups = await this.repos.groups.getMany(distinct(memberships.map((g) => g.objectId)));
    const activeGroupIds = groups.filter((g) => g.flags.active).map((g) => g.id);

    const viaGroups =
      activeGroupIds.length > 0
        ? await this.repos.groupResourceGrants.query({ subjectIds: activeGroupIds })
        : [];

    return strongestBy([...direct, ...viaGroups], (g) => g.objectId);
  }

  async heldResources(userId: Id): Promise<Resource[]> {
    const privileges = await this.resourcePrivileges(userId);
    return this.repos.resources.getMany([...privileges.keys()]);
  }

  async ownedResources(userId: Id): Promise<Resource[]> {
    const grants = await this.repos.userResourceGrants.query({
      subjectId: userId,
      privilege: PrivilegeLevel.OWNER,
    });
    return this.repos.resources.getMany(distinct(grants.map((g) => g.objectId)));
  }

  /**
   * Resources held at CHANGE or better, excluding immutable ones.
   */
  async editableResources(userId: Id): Promise<Resource[]> {
    const privileges = await this.resourcePrivileges(userId);
    const ids = [...privileges]
      .filter(([, level]) => isAtLeast(level, PrivilegeLevel.CHANGE))
      .map(([id]) => id);
    const resources = await this.repos.resources.getMany(ids);
    return resources.filter((r) => !r.flags.immutable);
  }

  /**
   * Resources whose strongest direct grant to the user is exactly `privilege`.
   */
  async resourcesWithExplicitAccess(userId: Id, privilege: GrantablePrivilege): Promise<Resource[]> {
    const grants = await this.repos.userResourceGrants.query({ subjectId: userId });
    const ids = [...strongestBy(grants, (g) => g.objectId)]
      .filter(([, level]) => level === privilege)
      .map(([id]) => id);
    return this.repos.resources.getMany(ids);
  }

  // --- A group's holders and holdings ---

  async groupMembers(groupId: Id): Promise<User[]> {
    const grants = await this.repos.userGroupGrants.query({ objectId: groupId });
    return this.repos.users.getMany(distinct(grants.map((g) => g.subjectId)));
  }

  async groupOwners(groupId: Id): Promise<User[]> {
    const grants = await this.repos.userGroupGrants.query({
      objectId: groupId,
      privilege: PrivilegeLevel.OWNER,
    });
    return this.repos.users.getMany(distinct(grants.map((g) => g.subjectId)));
  }

  async groupMemberCount(groupId: Id): Promise<number> {
    const grants = await this.repos.userGroupGrants.query({ objectId: groupId });
    return distinct(grants.map((g) => g.subjectId)).length;
  }

  /** Distinct users holding OWNER over the group */
  async groupOwnerCount(groupId: Id): Promise<number> {
    const grants = await this.repos.userGroupGrants.query({
      objectId: groupId,
      privilege: PrivilegeLevel.OWNER,
    });
    return distinct(grants.map((g) => g.subjectId)).length;
  }

  /** OWNER records over the group, counting each grantor separately */
  async groupOwnerRecordCount(groupId: Id): Promise<number> {
    return this.repos.userGroupGrants.count({ objectId: groupId, privilege: PrivilegeLevel.OWNER });
  }

  /**
   * The user's strongest privilege over the group from stored grants alone.
   */
  async groupUserPrivilege(groupId: Id, userId: Id): Promise<PrivilegeLevel> {
    const grants = await this.repos.userGroupGrants.query({ subjectId: userId, objectId: groupId });
    return strongest(grants.map((g) => g.privilege));
  }

  async groupHeldResources(groupId: Id): Promise<Resource[]> {
    const grants = await this.repos.groupResourceGrants.query({ subjectId: groupId });
    return this.repos.resources.getMany(distinct(grants.map((g) => g.objectId)));
  }

  async groupEditableResources(groupId: Id): Promise<Resource[]> {
    const grants = await this.repos.groupResourceGrants.query({
      subjectId: groupId,
      atLeast: PrivilegeLevel.CHANGE,
    });
    const resources = await this.repos.resources.getMany(distinct(grants.map((g) => g.objectId)));
    return resources.filter((r) => !r.flags.immutable);
  }

  // --- A resource's holders ---

  /** Users with a direct grant over the resource */
  async resourceUsers(resourceId: Id): Promise<User[]> {
    const grants = await this.repos.userResourceGrants.query({ objectId: resourceId });
    return this.repos.users.getMany(distinct(grants.map((g) => g.subjectId)));
  }

  async resourceGroups(resourceId: Id): Promise<Group[]> {
    const grants = await this.repos.groupResourceGrants.query({ objectId: resourceId });
    return this.repos.groups.getMany(distinct(grants.map((g) => g.subjectId)));
  }

  async resourceOwners(resourceId: Id): Promise<User[]> {
    const grants = await this.repos.userResourceGrants.query({
      objectId: resourceId,
      privilege: PrivilegeLevel.OWNER,
    });
    return this.repos.users.getMany(distinct(grants.map((g) => g.subjectId)));
  }

  async resourceOwnerCount(resourceId: Id): Promise<number> {
    return (await this.resourceOwners(resourceId)).length;
  }

  async resourceOwnerRecordCount(resourceId: Id): Promise<number> {
    return this.repos.userResourceGrants.count({
      objectId: resourceId,
      privilege: PrivilegeLevel.OWNER,
    });
  }

  /**
   * Every user holding the resource at `atLeast` or better, directly or as a
   * member of an active group holding it.
   */
  async resourceHolders(
    resourceId: Id,
    atLeast: GrantablePrivilege = PrivilegeLevel.VIEW
  ): Promise<User[]> {
    const direct = await this.repos.userResourceGrants.query({ objectId: resourceId, atLeast });
    const groupGrants = await this.repos.groupResourceGrants.query({
      objectId: resourceId,
      atLeast,
    });

    const groups = await this.repos.groups.getMany(distinct(groupGrants.map((g) => g.subjectId)));
    const activeGroupIds = groups.filter((g) => g.flags.active).map((g) => g.id);

    const members =
      activeGroupIds.length > 0
        ? await this.repos.userGroupGrants.query({ objectIds: activeGroupIds })
        : [];

    const users = await this.repos.users.getMany(
      distinct([...direct.map((g) => g.subjectId), ...members.map((g) => g.subjectId)])
    );
    return users.filter((u) => u.isActive);
  }
}

export function createHoldings(repos: RepositoryContext): Holdings {
  return new Holdings(repos);
}
