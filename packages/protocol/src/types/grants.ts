// Grant types - one delegation of access per record

import type { Id, Timestamp } from './common.js';
import type { GrantablePrivilege } from './privileges.js';

/**
 * The three independently keyed grant relations.
 *
 * - user_group: a user's privilege over (membership in) a group
 * - user_resource: a user's direct privilege over a resource
 * - group_resource: a group's privilege over a resource, resolved into
 *   privilege for each active member
 */
export type GrantRelation = 'user_group' | 'user_resource' | 'group_resource';

/**
 * A Grant records that `grantorId` gave `subjectId` a privilege over `objectId`.
 *
 * Unique per (subjectId, objectId, grantorId) within a relation:
 * re-granting updates the privilege in place.
 */
export type Grant = {
  id: Id;

  relation: GrantRelation;

  /** The user (or, for group_resource, the group) receiving the privilege */
  subjectId: Id;

  /** The group or resource the privilege applies to */
  objectId: Id;

  /** The user who created this record */
  grantorId: Id;

  privilege: GrantablePrivilege;

  /** When the record was created or last updated */
  grantedAt: Timestamp;
};

/**
 * Identifies a single grant record within a relation.
 */
export type GrantKey = {
  subjectId: Id;
  objectId: Id;
  grantorId: Id;
};
