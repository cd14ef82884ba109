// Access Checker
//
// Read-only predicates over the access rules, for deciding which actions to
// offer a caller. Each predicate answers exactly what the paired AccessGateway
// action would decide at the same instant; the action re-checks inside its own
// transaction, so a predicate's answer is advisory.

import type { Grant, Group, Id, PrivilegeLevel, Principal, User } from '@custody/protocol';
import type { GrantRepository, RepositoryContext } from '@custody/repositories';
import {
  combinedPrivilege,
  effectivePrivilege,
  groupMemberPrivilege,
  groupResourcePrivilege,
} from '../privileges/resolver.js';
import type { AccessDecision } from './decision.js';
import * as rules from './rules.js';

function uniqueSubjects(grants: readonly Grant[]): Id[] {
  return [...new Set(grants.map((g) => g.subjectId))];
}

/**
 * Access checker for authorization predicates and enumeration helpers.
 *
 * @example
 * ```ts
 * const checker = createAccessChecker(repos);
 *
 * if (await checker.canShareResourceWithUser(alice, resourceId, bob.id, PrivilegeLevel.VIEW)) {
 *   // offer the share control
 * }
 * ```
 */
export class AccessChecker {
  constructor(private repos: RepositoryContext) {}

  // --- Resolution ---

  combinedPrivilege(user: Principal, resourceId: Id): Promise<PrivilegeLevel> {
    return combinedPrivilege(this.repos, user, resourceId);
  }

  effectivePrivilege(user: Principal, resourceId: Id): Promise<PrivilegeLevel> {
    return effectivePrivilege(this.repos, user, resourceId);
  }

  groupPrivilege(user: Principal, groupId: Id): Promise<PrivilegeLevel> {
    return groupMemberPrivilege(this.repos, user, groupId);
  }

  groupResourcePrivilege(groupId: Id, resourceId: Id): Promise<PrivilegeLevel> {
    return groupResourcePrivilege(this.repos, groupId, resourceId);
  }

  // --- Ownership, view and change ---

  async ownsGroup(principal: Principal, groupId: Id): Promise<boolean> {
    return allowed(rules.ownsGroup(this.repos, principal, groupId));
  }

  async ownsResource(principal: Principal, resourceId: Id): Promise<boolean> {
    return allowed(rules.ownsResource(this.repos, principal, resourceId));
  }

  async canViewGroup(principal: Principal, groupId: Id): Promise<boolean> {
    return allowed(rules.viewGroup(this.repos, principal, groupId));
  }

  async canViewResource(principal: Principal, resourceId: Id): Promise<boolean> {
    return allowed(rules.viewResource(this.repos, principal, resourceId));
  }

  async canViewGroupMetadata(principal: Principal, groupId: Id): Promise<boolean> {
    return allowed(rules.viewGroupMetadata(this.repos, principal, groupId));
  }

  async canViewResourceMetadata(principal: Principal, resourceId: Id): Promise<boolean> {
    return allowed(rules.viewResourceMetadata(this.repos, principal, resourceId));
  }

  async canChangeGroup(principal: Principal, groupId: Id): Promise<boolean> {
    return allowed(rules.changeGroup(this.repos, principal, groupId));
  }

  async canChangeResource(principal: Principal, resourceId: Id): Promise<boolean> {
    return allowed(rules.changeResource(this.repos, principal, resourceId));
  }

  // --- Lifecycle and flags ---

  async canCreateGroup(principal: Principal): Promise<boolean> {
    return allowed(rules.createObject(this.repos, principal));
  }

  async canCreateResource(principal: Principal): Promise<boolean> {
    return allowed(rules.createObject(this.repos, principal));
  }

  async canChangeGroupFlags(principal: Principal, groupId: Id): Promise<boolean> {
    return allowed(rules.administerGroup(this.repos, principal, groupId));
  }

  async canChangeResourceFlags(principal: Principal, resourceId: Id): Promise<boolean> {
    return allowed(rules.administerResource(this.repos, principal, resourceId));
  }

  async canDeleteGroup(principal: Principal, groupId: Id): Promise<boolean> {
    return allowed(rules.administerGroup(this.repos, principal, groupId));
  }

  async canDeleteResource(principal: Principal, resourceId: Id): Promise<boolean> {
    return allowed(rules.administerResource(this.repos, principal, resourceId));
  }

  // --- Sharing ---

  /**
   * Whether the principal could share the group at `level` with someone.
   * The grantee can still matter: see canShareGroupWithUser.
   */
  async canShareGroup(principal: Principal, groupId: Id, level: number): Promise<boolean> {
    return allowed(rules.shareGroup(this.repos, principal, groupId, level));
  }

  async canShareResource(principal: Principal, resourceId: Id, level: number): Promise<boolean> {
    return allowed(rules.shareResource(this.repos, principal, resourceId, level));
  }

  async canShareGroupWithUser(
    principal: Principal,
    groupId: Id,
    userId: Id,
    level: number
  ): Promise<boolean> {
    return allowed(rules.shareGroupWithUser(this.repos, principal, groupId, userId, level));
  }

  async canShareResourceWithUser(
    principal: Principal,
    resourceId: Id,
    userId: Id,
    level: number
  ): Promise<boolean> {
    return allowed(rules.shareResourceWithUser(this.repos, principal, resourceId, userId, level));
  }

  async canShareResourceWithGroup(
    principal: Principal,
    resourceId: Id,
    groupId: Id,
    level: number
  ): Promise<boolean> {
    return allowed(rules.shareResourceWithGroup(this.repos, principal, resourceId, groupId, level));
  }

  // --- Unsharing and undo ---

  async canUnshareGroupWithUser(principal: Principal, groupId: Id, userId: Id): Promise<boolean> {
    return allowed(rules.unshareGroupWithUser(this.repos, principal, groupId, userId));
  }

  async canUnshareResourceWithUser(
    principal: Principal,
    resourceId: Id,
    userId: Id
  ): Promise<boolean> {
    return allowed(rules.unshareResourceWithUser(this.repos, principal, resourceId, userId));
  }

  async canUnshareResourceWithGroup(
    principal: Principal,
    resourceId: Id,
    groupId: Id
  ): Promise<boolean> {
    return allowed(rules.unshareResourceWithGroup(this.repos, principal, resourceId, groupId));
  }

  async canUndoShareGroupWithUser(principal: Principal, groupId: Id, userId: Id): Promise<boolean> {
    return allowed(rules.undoShareGroupWithUser(this.repos, principal, groupId, userId));
  }

  async canUndoShareGroupWithUserAs(
    principal: Principal,
    groupId: Id,
    userId: Id,
    grantorId: Id
  ): Promise<boolean> {
    return allowed(rules.undoShareGroupWithUser(this.repos, principal, groupId, userId, grantorId));
  }

  async canUndoShareResourceWithUser(
    principal: Principal,
    resourceId: Id,
    userId: Id
  ): Promise<boolean> {
    return allowed(rules.undoShareResourceWithUser(this.repos, principal, resourceId, userId));
  }

  async canUndoShareResourceWithUserAs(
    principal: Principal,
    resourceId: Id,
    userId: Id,
    grantorId: Id
  ): Promise<boolean> {
    return allowed(
      rules.undoShareResourceWithUser(this.repos, principal, resourceId, userId, grantorId)
    );
  }

  async canUndoShareResourceWithGroup(
    principal: Principal,
    resourceId: Id,
    groupId: Id
  ): Promise<boolean> {
    return allowed(rules.undoShareResourceWithGroup(this.repos, principal, resourceId, groupId));
  }

  async canUndoShareResourceWithGroupAs(
    principal: Principal,
    resourceId: Id,
    groupId: Id,
    grantorId: Id
  ): Promise<boolean> {
    return allowed(
      rules.undoShareResourceWithGroup(this.repos, principal, resourceId, groupId, grantorId)
    );
  }

  // --- Enumeration ---
  //
  // Each list is the candidate holders filtered through the rule of the
  // matching predicate, so membership and predicate truth cannot diverge.

  /**
   * Users whose share from this principal over the group could be undone.
   */
  async getGroupUndoUsers(principal: Principal, groupId: Id): Promise<User[]> {
    await rules.requireGroup(this.repos, groupId);
    const candidates = await this.candidates(this.repos.userGroupGrants, groupId, principal.id);
    const ids = await this.filterAllowed(candidates, (userId) =>
      rules.undoShareGroupWithUser(this.repos, principal, groupId, userId)
    );
    return this.repos.users.getMany(ids);
  }

  /**
   * Members the principal could remove from the group entirely.
   * For a plain member this is at most the principal themself.
   */
  async getGroupUnshareUsers(principal: Principal, groupId: Id): Promise<User[]> {
    await rules.requireGroup(this.repos, groupId);
    const candidates = await this.candidates(this.repos.userGroupGrants, groupId);
    const ids = await this.filterAllowed(candidates, (userId) =>
      rules.unshareGroupWithUser(this.repos, principal, groupId, userId)
    );
    return this.repos.users.getMany(ids);
  }

  async getResourceUndoUsers(principal: Principal, resourceId: Id): Promise<User[]> {
    await rules.requireResource(this.repos, resourceId);
    const candidates = await this.candidates(
      this.repos.userResourceGrants,
      resourceId,
      principal.id
    );
    const ids = await this.filterAllowed(candidates, (userId) =>
      rules.undoShareResourceWithUser(this.repos, principal, resourceId, userId)
    );
    return this.repos.users.getMany(ids);
  }

  async getResourceUnshareUsers(principal: Principal, resourceId: Id): Promise<User[]> {
    await rules.requireResource(this.repos, resourceId);
    const candidates = await this.candidates(this.repos.userResourceGrants, resourceId);
    const ids = await this.filterAllowed(candidates, (userId) =>
      rules.unshareResourceWithUser(this.repos, principal, resourceId, userId)
    );
    return this.repos.users.getMany(ids);
  }

  async getResourceUndoGroups(principal: Principal, resourceId: Id): Promise<Group[]> {
    await rules.requireResource(this.repos, resourceId);
    const candidates = await this.candidates(
      this.repos.groupResourceGrants,
      resourceId,
      principal.id
    );
    const ids = await this.filterAllowed(candidates, (groupId) =>
      rules.undoShareResourceWithGroup(this.repos, principal, resourceId, groupId)
    );
    return this.repos.groups.getMany(ids);
  }

  async getResourceUnshareGroups(principal: Principal, resourceId: Id): Promise<Group[]> {
    await rules.requireResource(this.repos, resourceId);
    const candidates = await this.candidates(this.repos.groupResourceGrants, resourceId);
    const ids = await this.filterAllowed(candidates, (groupId) =>
      rules.unshareResourceWithGroup(this.repos, principal, resourceId, groupId)
    );
    return this.repos.groups.getMany(ids);
  }

  private async candidates(repo: GrantRepository, objectId: Id, grantorId?: Id): Promise<Id[]> {
    return uniqueSubjects(await repo.query({ objectId, grantorId }));
  }

  private async filterAllowed(
    ids: readonly Id[],
    rule: (id: Id) => Promise<AccessDecision>
  ): Promise<Id[]> {
    const result: Id[] = [];
    for (const id of ids) {
      if ((await rule(id)).allowed) {
        result.push(id);
      }
    }
    return result;
  }
}

async function allowed(decision: Promise<AccessDecision>): Promise<boolean> {
  return (await decision).allowed;
}

/**
 * Create an access checker instance.
 */
export function createAccessChecker(repos: RepositoryContext): AccessChecker {
  return new AccessChecker(repos);
}
