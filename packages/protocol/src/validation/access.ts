// Input schemas for access-control calls
//
// Callers hand the runtime raw ids, privilege levels and flag patches.
// These schemas define what a well-formed call looks like; the runtime maps a
// failed parse onto a usage error.

import { z } from 'zod';
import { PrivilegeLevel } from '../types/privileges.js';

export const IdSchema = z.string().min(1, 'id must not be empty');

/**
 * A level that may be stored on a grant (OWNER, CHANGE or VIEW).
 */
export const GrantablePrivilegeSchema = z.union([
  z.literal(PrivilegeLevel.OWNER),
  z.literal(PrivilegeLevel.CHANGE),
  z.literal(PrivilegeLevel.VIEW),
]);

export const GroupFlagsPatchSchema = z
  .object({
    active: z.boolean(),
    discoverable: z.boolean(),
    public: z.boolean(),
    shareable: z.boolean(),
  })
  .partial()
  .strict();

export const ResourceFlagsPatchSchema = z
  .object({
    active: z.boolean(),
    discoverable: z.boolean(),
    public: z.boolean(),
    shareable: z.boolean(),
    published: z.boolean(),
    immutable: z.boolean(),
  })
  .partial()
  .strict();

export const CreateGroupInputSchema = z.object({
  id: IdSchema.optional(),
  name: z.string().trim().min(1, 'group name must not be empty').max(150),
});

export const CreateResourceInputSchema = z.object({
  id: IdSchema.optional(),
  title: z.string().trim().min(1, 'resource title must not be empty').max(300),
  flags: ResourceFlagsPatchSchema.optional(),
});

export type GroupFlagsPatch = z.infer<typeof GroupFlagsPatchSchema>;
export type ResourceFlagsPatch = z.infer<typeof ResourceFlagsPatchSchema>;
export type CreateGroupInput = z.infer<typeof CreateGroupInputSchema>;
export type CreateResourceInput = z.infer<typeof CreateResourceInputSchema>;
