import type {
  Id,
  Grant,
  GrantKey,
  GrantRelation,
  GrantablePrivilege,
} from '@custody/protocol';

/**
 * Input for creating or updating the grant a grantor holds for a subject
 */
export type UpsertGrantInput = GrantKey & {
  privilege: GrantablePrivilege;
};

export type UpsertGrantResult = {
  grant: Grant;
  /** false when an existing record was updated in place */
  created: boolean;
  /** The record's privilege before the update, when it already existed */
  previousPrivilege?: GrantablePrivilege;
};

/**
 * Filter for querying Grants. All set fields must match.
 */
export type GrantFilter = {
  subjectId?: Id;
  subjectIds?: readonly Id[];
  objectId?: Id;
  objectIds?: readonly Id[];
  grantorId?: Id;
  privilege?: GrantablePrivilege;

  /** Only grants at least this strong (privilege <= atLeast) */
  atLeast?: GrantablePrivilege;

  /** Only grants strictly weaker than this (privilege > weakerThan) */
  weakerThan?: GrantablePrivilege;

  /** Skip grants to this subject */
  excludeSubjectId?: Id;

  /** Skip this grant record */
  excludeGrantId?: Id;
};

/**
 * Repository interface for one grant relation.
 *
 * A RepositoryContext carries one instance per relation. The store enforces
 * uniqueness of (subjectId, objectId, grantorId); there is no way to insert a
 * duplicate, only to upsert.
 */
export interface GrantRepository {
  readonly relation: GrantRelation;

  /**
   * @returns Grant or null if this grantor holds no record for the pair
   */
  get(key: GrantKey): Promise<Grant | null>;

  query(filter: GrantFilter): Promise<Grant[]>;

  count(filter: GrantFilter): Promise<number>;

  upsert(input: UpsertGrantInput): Promise<UpsertGrantResult>;

  /**
   * Delete every grant matching the filter.
   * The filter must name at least an object or a subject.
   *
   * @returns The deleted records
   */
  delete(filter: GrantFilter): Promise<Grant[]>;
}
