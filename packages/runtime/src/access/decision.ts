// Outcome of evaluating one authorization rule

export type DenialReason =
  | 'inactive_principal'
  | 'inactive_object'
  | 'inactive_subject'
  | 'immutable'
  | 'not_owner'
  | 'not_shareable'
  | 'insufficient_privilege'
  | 'no_privilege'
  | 'not_member'
  | 'sole_owner'
  | 'nothing_to_undo'
  | 'foreign_grant';

export type AccessDecision =
  | { allowed: true }
  | { allowed: false; reason: DenialReason; message: string };

export const ALLOW: AccessDecision = { allowed: true };

export function deny(reason: DenialReason, message: string): AccessDecision {
  return { allowed: false, reason, message };
}
