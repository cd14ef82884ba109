// Access control error types

import type { Id, ObjectType } from '@custody/protocol';
import type { DenialReason } from './access/decision.js';

/**
 * Base class for all access control errors.
 * Provides a stable code for callers that map errors onto responses.
 */
export class AccessControlError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'AccessControlError';
    this.code = code;
  }
}

/**
 * The caller may not perform the operation right now.
 * Recoverable: the caller should present a different state, never retry blindly.
 */
export class AuthorizationError extends AccessControlError {
  readonly reason: DenialReason;

  constructor(reason: DenialReason, message: string) {
    super('AUTHORIZATION_DENIED', message);
    this.name = 'AuthorizationError';
    this.reason = reason;
  }
}

/**
 * The call itself is malformed: unknown ids, invalid privilege levels,
 * OWNER requested for a group, or a flag patch that does not parse.
 */
export class UsageError extends AccessControlError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('USAGE_ERROR', message);
    this.name = 'UsageError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Stored grants already violate an invariant (an object with no owner).
 * Not recoverable by the caller.
 */
export class IntegrityError extends AccessControlError {
  readonly objectType: ObjectType;
  readonly objectId: Id;

  constructor(objectType: ObjectType, objectId: Id, message: string) {
    super('INTEGRITY_ERROR', message);
    this.name = 'IntegrityError';
    this.objectType = objectType;
    this.objectId = objectId;
  }
}

export function isAccessControlError(error: unknown): error is AccessControlError {
  return error instanceof AccessControlError;
}
