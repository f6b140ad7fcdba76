/**
 * ICCP Audit Entry Schema
 *
 * One entry per processed request. Append-only, never mutated after
 * creation, and sanitized before it reaches any sink.
 */

import { z } from 'zod';
import { Role } from '../context/identity.js';
import type { Clearance, SessionContext } from '../context/identity.js';
import type { PolicyDecision } from '../policy/policyEngine.js';
import type { TtlStatusMap } from '../freshness/freshnessTracker.js';

export interface AuditLogEntry {
    readonly traceId: string;
    readonly timestamp: string;      // ISO-8601
    readonly userId: string;
    readonly role: Role;
    readonly clearance: Clearance;
    readonly sessionContext: SessionContext;
    readonly modelInvoked: string;
    readonly resourcesAccessed: readonly string[];
    readonly resourcesDenied: readonly string[];
    readonly fieldsMasked: readonly string[];
    readonly policyDecision: PolicyDecision;
    readonly explanation: string;
    readonly ttlStatus: TtlStatusMap;
}

/** Key order of the persisted JSON line. */
export const AUDIT_ENTRY_FIELDS = [
    'traceId',
    'timestamp',
    'userId',
    'role',
    'clearance',
    'sessionContext',
    'modelInvoked',
    'resourcesAccessed',
    'resourcesDenied',
    'fieldsMasked',
    'policyDecision',
    'explanation',
    'ttlStatus',
] as const satisfies readonly (keyof AuditLogEntry)[];

const TtlStatusSchema = z.discriminatedUnion('status', [
    z.object({ status: z.literal('refreshed'), ttlSeconds: z.number(), remainingSeconds: z.number() }).strict(),
    z.object({ status: z.literal('cached'), ttlSeconds: z.number(), remainingSeconds: z.number() }).strict(),
]);

/**
 * Shape check for entries leaving the sanitizer and for lines replayed
 * from the durable log.
 */
export const AuditLogEntrySchema = z.object({
    traceId: z.string().min(1),
    timestamp: z.string().min(1),
    userId: z.string(),
    role: z.nativeEnum(Role),
    clearance: z.enum(['Full-Access', 'Department-Scoped', 'Self-Scoped', 'Unauthorized']),
    sessionContext: z.object({
        sessionId: z.string(),
        originAddress: z.string(),
        requestTimestamp: z.string(),
        clientLabel: z.string(),
    }).strict(),
    modelInvoked: z.string(),
    resourcesAccessed: z.array(z.string()),
    resourcesDenied: z.array(z.string()),
    fieldsMasked: z.array(z.string()),
    policyDecision: z.enum(['DENY', 'ALLOW_PARTIAL', 'ALLOW_FULL']),
    explanation: z.string(),
    ttlStatus: z.record(TtlStatusSchema),
}).strict();
