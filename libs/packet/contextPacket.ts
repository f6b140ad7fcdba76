/**
 * ICCP Context Packet (protocol v1.0)
 *
 * Immutable per-request record of the authorization decision and its inputs,
 * correlated by trace id.
 */

import crypto from 'crypto';
import { IdentityScope, Role } from '../context/identity.js';
import { deepFreeze } from '../util/deepFreeze.js';
import type { IccpPolicy } from '../policy/policyProfile.js';
import type { AuthorizationResult, PolicyDecision } from '../policy/policyEngine.js';
import type { TtlStatusMap } from '../freshness/freshnessTracker.js';

export const CONTEXT_PROTOCOL_VERSION = '1.0';

export interface ModelDescriptor {
    readonly modelId: string;
    readonly provider: string;
    readonly complianceClassification: string;
    readonly riskLevel: 'low' | 'medium' | 'high';
}

export const DEFAULT_MODEL: ModelDescriptor = Object.freeze({
    modelId: 'institutional-assistant',
    provider: 'local',
    complianceClassification: 'internal',
    riskLevel: 'low',
});

export interface ContextConstraints {
    readonly maskedFields: readonly string[];
    readonly deniedResources: readonly string[];
    readonly selfScopedResources: readonly string[];
    /** "role+resource" pairs from the institution policy */
    readonly prohibitedCombinations: readonly string[];
    readonly ttlStatus: TtlStatusMap;
}

export interface ContextPacket {
    readonly protocolVersion: string;
    readonly traceId: string;
    readonly identityScope: IdentityScope;
    readonly selectedModel: ModelDescriptor;
    readonly authorizedResources: readonly string[];
    readonly deniedResources: readonly string[];
    readonly maskedFields: readonly string[];
    readonly policyDecision: PolicyDecision;
    readonly policyHash: string;
    readonly contextConstraints: ContextConstraints;
    readonly createdAt: string;
}

export interface ContextPacketInput {
    traceId: string;
    identity: IdentityScope;
    authorization: AuthorizationResult;
    policy: IccpPolicy;
    model?: ModelDescriptor;
    ttlStatus?: TtlStatusMap;
    now?: Date;
}

/**
 * Correlation fingerprint of a decision. Depends only on the role, the
 * authorized set (order-insensitive) and the policy version; never on
 * request content. Not an access-control boundary.
 */
export function computePolicyHash(role: Role, authorized: readonly string[], policyVersion: string): string {
    const canonical = `${role}:${[...authorized].sort().join(',')}@${policyVersion}`;
    return 'sha256:' + crypto.createHash('sha256').update(canonical).digest('hex').slice(0, 16);
}

export function buildContextPacket(input: ContextPacketInput): ContextPacket {
    const { traceId, identity, authorization, policy } = input;

    const packet: ContextPacket = {
        protocolVersion: CONTEXT_PROTOCOL_VERSION,
        traceId,
        identityScope: {
            userId: identity.userId,
            role: identity.role,
            clearance: identity.clearance,
            sessionContext: { ...identity.sessionContext },
        },
        selectedModel: { ...(input.model ?? DEFAULT_MODEL) },
        authorizedResources: [...authorization.authorized],
        deniedResources: [...authorization.denied],
        maskedFields: [...authorization.maskedFields],
        policyDecision: authorization.decision,
        policyHash: computePolicyHash(identity.role, authorization.authorized, authorization.policyVersion),
        contextConstraints: {
            maskedFields: [...authorization.maskedFields],
            deniedResources: [...authorization.denied],
            selfScopedResources: [...authorization.selfScoped],
            prohibitedCombinations: policy.institution.prohibitedCombinations.map(c => `${c.role}+${c.resourceId}`),
            ttlStatus: { ...(input.ttlStatus ?? {}) },
        },
        createdAt: (input.now ?? new Date()).toISOString(),
    };

    return deepFreeze(packet);
}
