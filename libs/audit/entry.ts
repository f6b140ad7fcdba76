import type { IdentityScope } from '../context/identity.js';
import type { AuthorizationResult } from '../policy/policyEngine.js';
import type { TtlStatusMap } from '../freshness/freshnessTracker.js';
import type { AuditLogEntry } from './schema.js';

export interface AuditEntryInput {
    traceId: string;
    identity: IdentityScope;
    authorization: AuthorizationResult;
    modelInvoked: string;
    ttlStatus: TtlStatusMap;
    now?: Date;
}

/**
 * Plain-language account of a decision, kept in the audit entry.
 */
export function explainDecision(identity: IdentityScope, authorization: AuthorizationResult): string {
    const parts = [`${identity.role} (${identity.clearance}) requested ${authorization.requested.length} resource(s).`];

    if (authorization.authorized.length > 0) {
        parts.push(`Granted: ${authorization.authorized.join(', ')}.`);
    }
    if (authorization.denied.length > 0) {
        const denied = authorization.denied.map(id => `${id} (${authorization.denialReasons[id] ?? 'NOT_GRANTED'})`);
        parts.push(`Denied: ${denied.join(', ')}.`);
    }
    if (authorization.maskedFields.length > 0) {
        parts.push(`Masked: ${authorization.maskedFields.join(', ')} (institution/role policy).`);
    }
    if (authorization.selfScoped.length > 0) {
        parts.push(`Owner-scoped: ${authorization.selfScoped.join(', ')} restricted to the requester's own rows.`);
    }
    parts.push(`Decision: ${authorization.decision}.`);

    return parts.join(' ');
}

/**
 * Assembles the unsanitized entry; the pipeline sanitizes on enqueue.
 */
export function buildAuditEntry(input: AuditEntryInput): AuditLogEntry {
    const { traceId, identity, authorization } = input;
    return {
        traceId,
        timestamp: (input.now ?? new Date()).toISOString(),
        userId: identity.userId,
        role: identity.role,
        clearance: identity.clearance,
        sessionContext: { ...identity.sessionContext },
        modelInvoked: input.modelInvoked,
        resourcesAccessed: [...authorization.authorized],
        resourcesDenied: [...authorization.denied],
        fieldsMasked: [...authorization.maskedFields],
        policyDecision: authorization.decision,
        explanation: explainDecision(identity, authorization),
        ttlStatus: { ...input.ttlStatus },
    };
}
