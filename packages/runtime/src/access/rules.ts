// Authorization rules
//
// Every rule is written once here. AccessChecker exposes each as a boolean
// predicate; AccessGateway evaluates the same rule inside its transaction and
// throws when it denies. Malformed calls (unknown ids, invalid levels) throw
// UsageError from both.

import {
  GrantablePrivilegeSchema,
  PrivilegeLevel,
  isStrongerThan,
  isWeakerThan,
  privilegeName,
  type GrantablePrivilege,
  type Group,
  type Id,
  type ObjectType,
  type Principal,
  type Resource,
  type User,
} from '@custody/protocol';
import type { GrantRepository, RepositoryContext } from '@custody/repositories';
import { IntegrityError, UsageError } from '../errors.js';
import {
  combinedPrivilege,
  effectivePrivilege,
  groupMemberPrivilege,
} from '../privileges/resolver.js';
import { ALLOW, deny, type AccessDecision } from './decision.js';

// --- Argument resolution ---

export async function requireUser(repos: RepositoryContext, userId: Id): Promise<User> {
  const user = await repos.users.get(userId);
  if (!user) {
    throw new UsageError(`User not found: ${userId}`, { field: 'userId' });
  }
  return user;
}

export async function requireGroup(repos: RepositoryContext, groupId: Id): Promise<Group> {
  const group = await repos.groups.get(groupId);
  if (!group) {
    throw new UsageError(`Group not found: ${groupId}`, { field: 'groupId' });
  }
  return group;
}

export async function requireResource(repos: RepositoryContext, resourceId: Id): Promise<Resource> {
  const resource = await repos.resources.get(resourceId);
  if (!resource) {
    throw new UsageError(`Resource not found: ${resourceId}`, { field: 'resourceId' });
  }
  return resource;
}

export function requireGrantable(level: number): GrantablePrivilege {
  const parsed = GrantablePrivilegeSchema.safeParse(level);
  if (!parsed.success) {
    throw new UsageError(`Invalid privilege level: ${level}`, {
      field: 'privilege',
      details: { level },
    });
  }
  return parsed.data;
}

// --- Owner bookkeeping ---

async function holdsOwnerGrant(repo: GrantRepository, subjectId: Id, objectId: Id): Promise<boolean> {
  return (await repo.count({ subjectId, objectId, privilege: PrivilegeLevel.OWNER })) > 0;
}

/**
 * OWNER records that would remain on an object once the excluded records are gone.
 *
 * @throws IntegrityError when the object has no OWNER record at all
 */
async function remainingOwnerRecords(
  repo: GrantRepository,
  objectType: ObjectType,
  objectId: Id,
  exclude: { subjectId?: Id; grantId?: Id }
): Promise<number> {
  const total = await repo.count({ objectId, privilege: PrivilegeLevel.OWNER });
  if (total === 0) {
    throw new IntegrityError(objectType, objectId, `${objectType} ${objectId} has no owner`);
  }
  return repo.count({
    objectId,
    privilege: PrivilegeLevel.OWNER,
    excludeSubjectId: exclude.subjectId,
    excludeGrantId: exclude.grantId,
  });
}

function checkActive(principal: Principal): AccessDecision | undefined {
  if (!principal.isActive) {
    return deny('inactive_principal', `Principal ${principal.id} is not active`);
  }
  return undefined;
}

function checkMutable(
  principal: Principal,
  objectType: ObjectType,
  object: Group | Resource
): AccessDecision | undefined {
  if (!principal.isSuperuser && !object.flags.active) {
    return deny('inactive_object', `${objectType} ${object.id} is not active`);
  }
  return undefined;
}

// --- Ownership, view and change ---

export async function ownsGroup(
  repos: RepositoryContext,
  principal: Principal,
  groupId: Id
): Promise<AccessDecision> {
  const group = await requireGroup(repos, groupId);
  const inactive = checkActive(principal);
  if (inactive) return inactive;
  if (!group.flags.active) {
    return deny('inactive_object', `group ${groupId} is not active`);
  }
  if (!(await holdsOwnerGrant(repos.userGroupGrants, principal.id, groupId))) {
    return deny('not_owner', `${principal.id} does not own group ${groupId}`);
  }
  return ALLOW;
}

export async function ownsResource(
  repos: RepositoryContext,
  principal: Principal,
  resourceId: Id
): Promise<AccessDecision> {
  const resource = await requireResource(repos, resourceId);
  const inactive = checkActive(principal);
  if (inactive) return inactive;
  if (!resource.flags.active) {
    return deny('inactive_object', `resource ${resourceId} is not active`);
  }
  if (!(await holdsOwnerGrant(repos.userResourceGrants, principal.id, resourceId))) {
    return deny('not_owner', `${principal.id} does not own resource ${resourceId}`);
  }
  return ALLOW;
}

export async function viewGroup(
  repos: RepositoryContext,
  principal: Principal,
  groupId: Id
): Promise<AccessDecision> {
  const group = await requireGroup(repos, groupId);
  const inactive = checkActive(principal);
  if (inactive) return inactive;
  if (principal.isSuperuser || group.flags.public) return ALLOW;

  const level = await groupMemberPrivilege(repos, principal, groupId);
  if (isWeakerThan(level, PrivilegeLevel.VIEW)) {
    return deny('no_privilege', `${principal.id} holds no privilege over group ${groupId}`);
  }
  return ALLOW;
}

export async function viewResource(
  repos: RepositoryContext,
  principal: Principal,
  resourceId: Id
): Promise<AccessDecision> {
  await requireResource(repos, resourceId);
  const inactive = checkActive(principal);
  if (inactive) return inactive;
  if (principal.isSuperuser) return ALLOW;

  const level = await effectivePrivilege(repos, principal, resourceId);
  if (isWeakerThan(level, PrivilegeLevel.VIEW)) {
    return deny('no_privilege', `${principal.id} holds no privilege over resource ${resourceId}`);
  }
  return ALLOW;
}

export async function viewGroupMetadata(
  repos: RepositoryContext,
  principal: Principal,
  groupId: Id
): Promise<AccessDecision> {
  const group = await requireGroup(repos, groupId);
  const inactive = checkActive(principal);
  if (inactive) return inactive;
  if (group.flags.discoverable || group.flags.public) return ALLOW;
  return viewGroup(repos, principal, groupId);
}

export async function viewResourceMetadata(
  repos: RepositoryContext,
  principal: Principal,
  resourceId: Id
): Promise<AccessDecision> {
  const resource = await requireResource(repos, resourceId);
  const inactive = checkActive(principal);
  if (inactive) return inactive;
  if (resource.flags.discoverable || resource.flags.public) return ALLOW;
  return viewResource(repos, principal, resourceId);
}

export async function changeGroup(
  repos: RepositoryContext,
  principal: Principal,
  groupId: Id
): Promise<AccessDecision> {
  const group = await requireGroup(repos, groupId);
  const inactive = checkActive(principal);
  if (inactive) return inactive;
  if (!group.flags.active) {
    return deny('inactive_object', `group ${groupId} is not active`);
  }
  if (principal.isSuperuser) return ALLOW;

  const level = await groupMemberPrivilege(repos, principal, groupId);
  if (isWeakerThan(level, PrivilegeLevel.CHANGE)) {
    return deny('insufficient_privilege', `${principal.id} cannot change group ${groupId}`);
  }
  return ALLOW;
}

export async function changeResource(
  repos: RepositoryContext,
  principal: Principal,
  resourceId: Id
): Promise<AccessDecision> {
  const resource = await requireResource(repos, resourceId);
  const inactive = checkActive(principal);
  if (inactive) return inactive;
  if (!resource.flags.active) {
    return deny('inactive_object', `resource ${resourceId} is not active`);
  }
  if (resource.flags.immutable) {
    return deny('immutable', `resource ${resourceId} is immutable`);
  }
  if (principal.isSuperuser) return ALLOW;

  const level = await combinedPrivilege(repos, principal, resourceId);
  if (isWeakerThan(level, PrivilegeLevel.CHANGE)) {
    return deny('insufficient_privilege', `${principal.id} cannot change resource ${resourceId}`);
  }
  return ALLOW;
}

// --- Lifecycle and flags ---

export async function createObject(
  repos: RepositoryContext,
  principal: Principal
): Promise<AccessDecision> {
  await requireUser(repos, principal.id);
  return checkActive(principal) ?? ALLOW;
}

/**
 * Flag changes and deletion: superusers, or owners of an active group.
 */
export async function administerGroup(
  repos: RepositoryContext,
  principal: Principal,
  groupId: Id
): Promise<AccessDecision> {
  await requireGroup(repos, groupId);
  const inactive = checkActive(principal);
  if (inactive) return inactive;
  if (principal.isSuperuser) return ALLOW;
  return ownsGroup(repos, principal, groupId);
}

export async function administerResource(
  repos: RepositoryContext,
  principal: Principal,
  resourceId: Id
): Promise<AccessDecision> {
  await requireResource(repos, resourceId);
  const inactive = checkActive(principal);
  if (inactive) return inactive;
  if (principal.isSuperuser) return ALLOW;
  return ownsResource(repos, principal, resourceId);
}

// --- Sharing ---

/**
 * Whether the principal may share the group at `level`, whoever the grantee.
 */
export async function shareGroup(
  repos: RepositoryContext,
  principal: Principal,
  groupId: Id,
  level: number
): Promise<AccessDecision> {
  const privilege = requireGrantable(level);
  const group = await requireGroup(repos, groupId);
  return shareGroupDecision(repos, principal, group, privilege);
}

async function shareGroupDecision(
  repos: RepositoryContext,
  principal: Principal,
  group: Group,
  level: GrantablePrivilege
): Promise<AccessDecision> {
  const inactive = checkActive(principal) ?? checkMutable(principal, 'group', group);
  if (inactive) return inactive;
  if (principal.isSuperuser) return ALLOW;

  const owner = await holdsOwnerGrant(repos.userGroupGrants, principal.id, group.id);
  if (!owner && !group.flags.shareable) {
    return deny('not_shareable', `group ${group.id} is not shareable`);
  }

  const own = await groupMemberPrivilege(repos, principal, group.id);
  if (isWeakerThan(own, PrivilegeLevel.VIEW)) {
    return deny('no_privilege', `${principal.id} holds no privilege over group ${group.id}`);
  }
  if (isWeakerThan(own, level)) {
    return deny(
      'insufficient_privilege',
      `${principal.id} holds ${privilegeName(own)} and cannot grant ${privilegeName(level)}`
    );
  }
  return ALLOW;
}

/**
 * Whether the principal may share the resource at `level`, whoever the grantee.
 */
export async function shareResource(
  repos: RepositoryContext,
  principal: Principal,
  resourceId: Id,
  level: number
): Promise<AccessDecision> {
  const privilege = requireGrantable(level);
  const resource = await requireResource(repos, resourceId);
  return shareResourceDecision(repos, principal, resource, privilege);
}

async function shareResourceDecision(
  repos: RepositoryContext,
  principal: Principal,
  resource: Resource,
  level: GrantablePrivilege
): Promise<AccessDecision> {
  const inactive = checkActive(principal) ?? checkMutable(principal, 'resource', resource);
  if (inactive) return inactive;
  if (principal.isSuperuser) return ALLOW;

  const owner = await holdsOwnerGrant(repos.userResourceGrants, principal.id, resource.id);
  if (!owner && !resource.flags.shareable) {
    return deny('not_shareable', `resource ${resource.id} is not shareable`);
  }

  const own = await combinedPrivilege(repos, principal, resource.id);
  if (isWeakerThan(own, PrivilegeLevel.VIEW)) {
    return deny('no_privilege', `${principal.id} holds no privilege over resource ${resource.id}`);
  }
  if (isWeakerThan(own, level)) {
    return deny(
      'insufficient_privilege',
      `${principal.id} holds ${privilegeName(own)} and cannot grant ${privilegeName(level)}`
    );
  }
  return ALLOW;
}

/**
 * Checks shared by both user-sharing rules once the object-level rule passes:
 * the grantee must be active, a non-owner may not override a stronger grant
 * made by someone else, and the upsert may not demote the last OWNER record.
 */
async function shareWithUserDecision(
  repo: GrantRepository,
  objectType: ObjectType,
  principal: Principal,
  objectId: Id,
  grantee: User,
  level: GrantablePrivilege
): Promise<AccessDecision> {
  if (!grantee.isActive) {
    return deny('inactive_subject', `User ${grantee.id} is not active`);
  }

  const owner = principal.isSuperuser || (await holdsOwnerGrant(repo, principal.id, objectId));
  if (!owner) {
    const held = await repo.query({ subjectId: grantee.id, objectId });
    const foreign = held.find(
      (g) => g.grantorId !== principal.id && isStrongerThan(g.privilege, level)
    );
    if (foreign) {
      return deny(
        'foreign_grant',
        `${grantee.id} holds ${privilegeName(foreign.privilege)} granted by ${foreign.grantorId}`
      );
    }
  }

  const existing = await repo.get({
    subjectId: grantee.id,
    objectId,
    grantorId: principal.id,
  });
  if (existing?.privilege === PrivilegeLevel.OWNER && level !== PrivilegeLevel.OWNER) {
    const others = await remainingOwnerRecords(repo, objectType, objectId, {
      grantId: existing.id,
    });
    if (others === 0) {
      return deny('sole_owner', `Cannot demote the sole owner of ${objectType} ${objectId}`);
    }
  }
  return ALLOW;
}

export async function shareGroupWithUser(
  repos: RepositoryContext,
  principal: Principal,
  groupId: Id,
  userId: Id,
  level: number
): Promise<AccessDecision> {
  const privilege = requireGrantable(level);
  const group = await requireGroup(repos, groupId);
  const grantee = await requireUser(repos, userId);

  const base = await shareGroupDecision(repos, principal, group, privilege);
  if (!base.allowed) return base;

  return shareWithUserDecision(repos.userGroupGrants, 'group', principal, groupId, grantee, privilege);
}

export async function shareResourceWithUser(
  repos: RepositoryContext,
  principal: Principal,
  resourceId: Id,
  userId: Id,
  level: number
): Promise<AccessDecision> {
  const privilege = requireGrantable(level);
  const resource = await requireResource(repos, resourceId);
  const grantee = await requireUser(repos, userId);

  const base = await shareResourceDecision(repos, principal, resource, privilege);
  if (!base.allowed) return base;

  return shareWithUserDecision(
    repos.userResourceGrants,
    'resource',
    principal,
    resourceId,
    grantee,
    privilege
  );
}

export async function shareResourceWithGroup(
  repos: RepositoryContext,
  principal: Principal,
  resourceId: Id,
  groupId: Id,
  level: number
): Promise<AccessDecision> {
  if (level === PrivilegeLevel.OWNER) {
    throw new UsageError('Groups cannot own resources', { field: 'privilege' });
  }
  const privilege = requireGrantable(level);
  const resource = await requireResource(repos, resourceId);
  await requireGroup(repos, groupId);

  const base = await shareResourceDecision(repos, principal, resource, privilege);
  if (!base.allowed) return base;

  if (!principal.isSuperuser) {
    const memberships = await repos.userGroupGrants.count({
      subjectId: principal.id,
      objectId: groupId,
    });
    if (memberships === 0) {
      return deny('not_member', `${principal.id} is not a member of group ${groupId}`);
    }
  }
  return ALLOW;
}

// --- Unsharing ---

/**
 * Remove all of a user's grants over an object: superuser, owner, or the user themself.
 * Refused when it would leave the object with no OWNER record.
 */
async function unshareUserDecision(
  repo: GrantRepository,
  objectType: ObjectType,
  principal: Principal,
  object: Group | Resource,
  subjectId: Id
): Promise<AccessDecision> {
  const inactive = checkActive(principal) ?? checkMutable(principal, objectType, object);
  if (inactive) return inactive;

  const authorized =
    principal.isSuperuser ||
    subjectId === principal.id ||
    (await holdsOwnerGrant(repo, principal.id, object.id));
  if (!authorized) {
    return deny('not_owner', `${principal.id} may not unshare ${objectType} ${object.id}`);
  }

  const others = await remainingOwnerRecords(repo, objectType, object.id, { subjectId });
  if (others === 0 && (await holdsOwnerGrant(repo, subjectId, object.id))) {
    return deny('sole_owner', `Cannot remove the sole owner of ${objectType} ${object.id}`);
  }
  return ALLOW;
}

export async function unshareGroupWithUser(
  repos: RepositoryContext,
  principal: Principal,
  groupId: Id,
  userId: Id
): Promise<AccessDecision> {
  const group = await requireGroup(repos, groupId);
  await requireUser(repos, userId);
  return unshareUserDecision(repos.userGroupGrants, 'group', principal, group, userId);
}

export async function unshareResourceWithUser(
  repos: RepositoryContext,
  principal: Principal,
  resourceId: Id,
  userId: Id
): Promise<AccessDecision> {
  const resource = await requireResource(repos, resourceId);
  await requireUser(repos, userId);
  return unshareUserDecision(repos.userResourceGrants, 'resource', principal, resource, userId);
}

/**
 * Remove a group's grants over a resource: superuser, resource owner, or group owner.
 */
export async function unshareResourceWithGroup(
  repos: RepositoryContext,
  principal: Principal,
  resourceId: Id,
  groupId: Id
): Promise<AccessDecision> {
  const resource = await requireResource(repos, resourceId);
  await requireGroup(repos, groupId);

  const inactive = checkActive(principal) ?? checkMutable(principal, 'resource', resource);
  if (inactive) return inactive;
  if (principal.isSuperuser) return ALLOW;

  if (await holdsOwnerGrant(repos.userResourceGrants, principal.id, resourceId)) return ALLOW;
  if ((await ownsGroup(repos, principal, groupId)).allowed) return ALLOW;

  return deny(
    'not_owner',
    `${principal.id} owns neither resource ${resourceId} nor group ${groupId}`
  );
}

// --- Undo ---

/**
 * Remove the single record `grantorId` made for the subject.
 * When the caller names someone else's record they must be owner or superuser.
 */
async function undoDecision(
  repo: GrantRepository,
  objectType: ObjectType,
  principal: Principal,
  object: Group | Resource,
  subjectId: Id,
  grantorId: Id
): Promise<AccessDecision> {
  const inactive = checkActive(principal) ?? checkMutable(principal, objectType, object);
  if (inactive) return inactive;

  if (grantorId !== principal.id && !principal.isSuperuser) {
    if (!(await holdsOwnerGrant(repo, principal.id, object.id))) {
      return deny('not_owner', `Only an owner may undo another grantor's share`);
    }
  }

  const record = await repo.get({ subjectId, objectId: object.id, grantorId });
  if (!record) {
    return deny('nothing_to_undo', `${grantorId} has no share with ${subjectId} to undo`);
  }

  const others = await remainingOwnerRecords(repo, objectType, object.id, { grantId: record.id });
  if (others === 0 && record.privilege === PrivilegeLevel.OWNER) {
    return deny('sole_owner', `Cannot remove the sole owner of ${objectType} ${object.id}`);
  }
  return ALLOW;
}

export async function undoShareGroupWithUser(
  repos: RepositoryContext,
  principal: Principal,
  groupId: Id,
  userId: Id,
  grantorId: Id = principal.id
): Promise<AccessDecision> {
  const group = await requireGroup(repos, groupId);
  await requireUser(repos, userId);
  return undoDecision(repos.userGroupGrants, 'group', principal, group, userId, grantorId);
}

export async function undoShareResourceWithUser(
  repos: RepositoryContext,
  principal: Principal,
  resourceId: Id,
  userId: Id,
  grantorId: Id = principal.id
): Promise<AccessDecision> {
  const resource = await requireResource(repos, resourceId);
  await requireUser(repos, userId);
  return undoDecision(
    repos.userResourceGrants,
    'resource',
    principal,
    resource,
    userId,
    grantorId
  );
}

/**
 * Group grants never carry OWNER, so only existence and authority are checked.
 * The owner test for another grantor's record is ownership of the resource.
 */
export async function undoShareResourceWithGroup(
  repos: RepositoryContext,
  principal: Principal,
  resourceId: Id,
  groupId: Id,
  grantorId: Id = principal.id
): Promise<AccessDecision> {
  const resource = await requireResource(repos, resourceId);
  await requireGroup(repos, groupId);

  const inactive = checkActive(principal) ?? checkMutable(principal, 'resource', resource);
  if (inactive) return inactive;

  if (grantorId !== principal.id && !principal.isSuperuser) {
    if (!(await holdsOwnerGrant(repos.userResourceGrants, principal.id, resourceId))) {
      return deny('not_owner', `Only an owner may undo another grantor's share`);
    }
  }

  const record = await repos.groupResourceGrants.get({
    subjectId: groupId,
    objectId: resourceId,
    grantorId,
  });
  if (!record) {
    return deny('nothing_to_undo', `${grantorId} has no share with group ${groupId} to undo`);
  }
  return ALLOW;
}
