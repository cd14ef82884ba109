import type { Id, Resource, ResourceFlags } from '@custody/protocol';

/**
 * Input for creating a new Resource
 */
export type CreateResourceRecordInput = {
  id?: Id;
  title: string;
  flags?: Partial<ResourceFlags>;
};

/**
 * Repository interface for Resource existence and flag state.
 */
export interface ResourceRepository {
  create(input: CreateResourceRecordInput): Promise<Resource>;

  /**
   * @returns Resource or null if not found
   */
  get(id: Id): Promise<Resource | null>;

  getMany(ids: readonly Id[]): Promise<Resource[]>;

  /**
   * Read a resource and hold a write lock on it until the surrounding
   * transaction ends. Outside a transaction this behaves like get().
   */
  lock(id: Id): Promise<Resource | null>;

  updateFlags(id: Id, flags: Partial<ResourceFlags>): Promise<Resource | null>;

  /**
   * @returns true if a resource was deleted
   */
  delete(id: Id): Promise<boolean>;
}
