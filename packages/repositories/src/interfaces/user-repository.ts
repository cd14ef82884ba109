import type { Id, User } from '@custody/protocol';

/**
 * Input for registering a user with the access store
 */
export type CreateUserInput = {
  id?: Id;
  username: string;
  isActive?: boolean;
  isSuperuser?: boolean;
};

export type UpdateUserInput = {
  isActive?: boolean;
  isSuperuser?: boolean;
};

/**
 * Repository interface for the identity provider's view of users.
 *
 * The access core only ever reads `isActive` and `isSuperuser`; writes exist so
 * the owning application (and tests) can mirror identity changes.
 */
export interface UserRepository {
  create(input: CreateUserInput): Promise<User>;

  /**
   * @returns User or null if not found
   */
  get(id: Id): Promise<User | null>;

  /**
   * Get several users at once. Unknown ids are skipped.
   */
  getMany(ids: readonly Id[]): Promise<User[]>;

  update(id: Id, input: UpdateUserInput): Promise<User | null>;
}
