import { z } from 'zod';

/**
 * Identity input as handed over by the external authentication layer.
 * Role stays a free-form string here; it is narrowed to the closed Role
 * enumeration by buildIdentityScope().
 */
export const SessionContextInputSchema = z.object({
    sessionId: z.string().min(1).max(128).optional(),
    originAddress: z.string().min(1).max(64).optional(),
    requestTimestamp: z.string().datetime().optional(),
    clientLabel: z.string().min(1).max(128).optional(),
}).strict();

export const IdentityInputSchema = z.object({
    userId: z.string().min(1).max(128),
    role: z.string().max(64),
    sessionContext: SessionContextInputSchema.optional(),
}).strict();

export type SessionContextInput = z.infer<typeof SessionContextInputSchema>;
export type IdentityInput = z.infer<typeof IdentityInputSchema>;
