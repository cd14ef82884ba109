// Audit types for access mutations

import type { Id, Timestamp } from './common.js';
import type { ObjectType } from './principals.js';

export type AccessOperationType =
  | 'create_group'
  | 'delete_group'
  | 'set_group_flags'
  | 'create_resource'
  | 'delete_resource'
  | 'set_resource_flags'
  | 'share_group_with_user'
  | 'unshare_group_with_user'
  | 'undo_share_group_with_user'
  | 'share_resource_with_user'
  | 'unshare_resource_with_user'
  | 'undo_share_resource_with_user'
  | 'share_resource_with_group'
  | 'unshare_resource_with_group'
  | 'undo_share_resource_with_group';

/**
 * One record per attempted mutation, successful or not.
 */
export type AccessAuditEntry = {
  id: Id;
  timestamp: Timestamp;

  /** The principal who attempted the operation */
  actorId: Id;

  operationType: AccessOperationType;

  objectType: ObjectType;

  /** Absent only for a failed create */
  objectId?: Id;

  /** The user or group whose access changed, for sharing operations */
  subjectId?: Id;

  details: Record<string, unknown>;

  success: boolean;

  error?: string;
};
