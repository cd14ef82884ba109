// Principals and shared objects

import type { Id, Timestamp } from './common.js';

/**
 * The identity a caller acts as.
 * Supplied by the identity provider and threaded explicitly through every call.
 */
export type Principal = {
  id: Id;
  isActive: boolean;
  isSuperuser: boolean;
};

/**
 * A user as known to the access store.
 */
export type User = Principal & {
  username: string;
  createdAt: Timestamp;
};

export type GroupFlags = {
  /** Inactive groups confer no privilege and cannot be mutated by non-superusers */
  active: boolean;
  /** Group description is visible to everyone */
  discoverable: boolean;
  /** Group members can be listed by everyone */
  public: boolean;
  /** Members other than owners may share the group onward */
  shareable: boolean;
};

export type ResourceFlags = {
  active: boolean;
  /** Resource metadata is visible to everyone */
  discoverable: boolean;
  /** Everyone may view the resource */
  public: boolean;
  /** Holders other than owners may share the resource onward */
  shareable: boolean;
  published: boolean;
  /** Nobody, superusers included, may change the resource */
  immutable: boolean;
};

export const DEFAULT_GROUP_FLAGS: Readonly<GroupFlags> = {
  active: true,
  discoverable: true,
  public: true,
  shareable: true,
};

export const DEFAULT_RESOURCE_FLAGS: Readonly<ResourceFlags> = {
  active: true,
  discoverable: false,
  public: false,
  shareable: true,
  published: false,
  immutable: false,
};

/**
 * A named collection of users, defined purely by its grant records.
 */
export type Group = {
  id: Id;
  name: string;
  flags: GroupFlags;
  createdAt: Timestamp;
  updatedAt: Timestamp;
};

/**
 * An opaque shared content object.
 */
export type Resource = {
  id: Id;
  title: string;
  flags: ResourceFlags;
  createdAt: Timestamp;
  updatedAt: Timestamp;
};

export type ObjectType = 'group' | 'resource';
