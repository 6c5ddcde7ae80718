import { z } from 'zod';
import { config } from './config.js';

// Common validators
export const platformIdSchema = z.string().trim().min(1).max(64);

export const credentialFieldsSchema = z.object({
  bearerToken: z.string().optional(),
  csrfToken: z.string().optional(),
  cookies: z.union([z.string(), z.record(z.string())]).optional(),
});

// POST /api/followers/list
export const listFollowersSchema = z.object({
  userId: platformIdSchema.optional(),
  // Opaque upstream cursor, forwarded verbatim
  cursor: z.string().min(1).max(4096).nullish(),
  count: z.coerce
    .number()
    .int()
    .min(1)
    .max(config.relay.maxPageSize)
    .optional()
    .default(config.relay.defaultPageSize),
  credentials: credentialFieldsSchema.optional(),
});

// POST /api/followers/remove
// The upper bound is enforced by the gateway so it can answer BATCH_TOO_LARGE.
export const removeFollowersSchema = z.object({
  userId: platformIdSchema.optional(),
  targets: z.array(platformIdSchema).min(1, 'At least one target is required'),
  credentials: credentialFieldsSchema.optional(),
});

// Export types
export type ListFollowersInput = z.infer<typeof listFollowersSchema>;
export type RemoveFollowersInput = z.infer<typeof removeFollowersSchema>;
