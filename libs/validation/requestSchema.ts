import { z } from 'zod';

/**
 * One mediation request as received on the service's input stream.
 * Identity is validated separately by buildIdentityScope().
 */
export const MediationRequestSchema = z.object({
    identity: z.unknown(),
    requestedResources: z.array(z.string().min(1).max(128)).max(64).optional(),
    records: z.record(z.array(z.record(z.unknown()))).optional(),
    traceId: z.string().regex(/^[A-Za-z0-9._-]{1,64}$/).optional(),
}).strict();

export type MediationRequest = z.infer<typeof MediationRequestSchema>;
