import type { Id, Group, GroupFlags } from '@custody/protocol';

/**
 * Input for creating a new Group
 */
export type CreateGroupRecordInput = {
  id?: Id;
  name: string;
  flags?: Partial<GroupFlags>;
};

/**
 * Repository interface for Group existence and flag state.
 *
 * Membership is not stored here: it is derived from user_group grants.
 */
export interface GroupRepository {
  create(input: CreateGroupRecordInput): Promise<Group>;

  /**
   * @returns Group or null if not found
   */
  get(id: Id): Promise<Group | null>;

  getMany(ids: readonly Id[]): Promise<Group[]>;

  /**
   * Read a group and hold a write lock on it until the surrounding
   * transaction ends. Outside a transaction this behaves like get().
   */
  lock(id: Id): Promise<Group | null>;

  updateFlags(id: Id, flags: Partial<GroupFlags>): Promise<Group | null>;

  /**
   * @returns true if a group was deleted
   */
  delete(id: Id): Promise<boolean>;
}
