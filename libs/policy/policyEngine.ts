import { IdentityScope, Role } from "../context/identity.js";
import { logger } from "../logging/logger.js";
import { ResourceRegistry } from "../registry/resourceRegistry.js";
import { IccpPolicy, RolePolicy } from "./policyProfile.js";

export type PolicyDecision = 'DENY' | 'ALLOW_PARTIAL' | 'ALLOW_FULL';

export type DenialReason =
    | 'UNKNOWN_RESOURCE'
    | 'UNRECOGNIZED_ROLE'
    | 'INSTITUTION_ROLE_RESTRICTED'
    | 'NOT_GRANTED'
    | 'PROHIBITED_COMBINATION';

export interface AuthorizationResult {
    /** Requested universe: de-duplicated, in request order */
    readonly requested: readonly string[];
    readonly authorized: readonly string[];
    readonly denied: readonly string[];
    readonly denialReasons: Readonly<Record<string, DenialReason>>;
    readonly maskedFields: readonly string[];
    /** Authorized resources whose rows are limited to the requester's own */
    readonly selfScoped: readonly string[];
    readonly decision: PolicyDecision;
    readonly policyVersion: string;
}

export function decide(authorized: readonly string[], denied: readonly string[]): PolicyDecision {
    if (authorized.length === 0) return 'DENY';
    if (denied.length > 0) return 'ALLOW_PARTIAL';
    return 'ALLOW_FULL';
}

const sorted = (values: Iterable<string>): string[] => [...values].sort();

/**
 * Authorization Engine
 * Institution > Role > User. Pure: no I/O, no shared state; safe to call
 * concurrently from any number of requests.
 */
export class PolicyEngine {
    constructor(
        private readonly policy: IccpPolicy,
        private readonly registry: ResourceRegistry
    ) { }

    public get policyVersion(): string {
        return this.policy.policyVersion;
    }

    /**
     * Returns the role-level policy, or null for roles that can hold no grant.
     */
    public rolePolicyFor(role: Role): RolePolicy | null {
        switch (role) {
            case Role.Admin:
                return this.policy.roles[Role.Admin];
            case Role.Teacher:
                return this.policy.roles[Role.Teacher];
            case Role.Student:
                return this.policy.roles[Role.Student];
            case Role.Unrecognized:
                return null;
            default: {
                const exhaustive: never = role;
                logger.warn({ role: exhaustive }, 'Role outside enumeration; denying');
                return null;
            }
        }
    }

    public isProhibited(role: Role, resourceId: string): boolean {
        return this.policy.institution.prohibitedCombinations.some(
            combination => combination.role === role && combination.resourceId === resourceId
        );
    }

    /**
     * An empty request stands for the whole registry universe.
     */
    public resolveUniverse(requestedResources: readonly string[]): string[] {
        if (requestedResources.length === 0) {
            return this.registry.universe();
        }
        return [...new Set(requestedResources)];
    }

    public evaluate(identity: IdentityScope, requestedResources: readonly string[]): AuthorizationResult {
        const requested = this.resolveUniverse(requestedResources);
        const denialReasons = new Map<string, DenialReason>();
        const authorized: string[] = [];

        const rolePolicy = this.rolePolicyFor(identity.role);

        if (!rolePolicy) {
            for (const resourceId of requested) {
                denialReasons.set(resourceId, 'UNRECOGNIZED_ROLE');
            }
        } else {
            for (const resourceId of requested) {
                const reason = this.denialReasonFor(identity.role, rolePolicy, resourceId);
                if (reason) {
                    denialReasons.set(resourceId, reason);
                } else {
                    authorized.push(resourceId);
                }
            }
        }

        const denied = requested.filter(resourceId => denialReasons.has(resourceId));
        const result: AuthorizationResult = {
            requested: Object.freeze(requested),
            authorized: Object.freeze(sorted(authorized)),
            denied: Object.freeze(sorted(denied)),
            // Own properties only: a requested "__proto__" must stay an ordinary key
            denialReasons: Object.freeze(Object.fromEntries(denialReasons)),
            maskedFields: Object.freeze(rolePolicy ? this.maskedFieldsFor(rolePolicy, authorized) : []),
            selfScoped: Object.freeze(rolePolicy ? sorted(rolePolicy.selfScopedResources.filter(id => authorized.includes(id))) : []),
            decision: decide(authorized, denied),
            policyVersion: this.policy.policyVersion,
        };

        logger.debug({
            userId: identity.userId,
            role: identity.role,
            authorized: result.authorized,
            denied: result.denied,
            decision: result.decision
        }, 'Policy evaluated');

        return Object.freeze(result);
    }

    private denialReasonFor(role: Role, rolePolicy: RolePolicy, resourceId: string): DenialReason | null {
        const descriptor = this.registry.tryDescribe(resourceId);

        // Institution baseline
        if (!descriptor) return 'UNKNOWN_RESOURCE';
        if (!descriptor.allowedRoles.includes(role)) return 'INSTITUTION_ROLE_RESTRICTED';

        // Role grant
        if (!rolePolicy.allowedResources.includes(resourceId)) return 'NOT_GRANTED';

        // Prohibited combinations strike even what the role granted
        if (this.isProhibited(role, resourceId)) return 'PROHIBITED_COMBINATION';

        return null;
    }

    /**
     * Institution and role masks, limited to fields that actually occur on
     * authorized resources of a masked category.
     */
    private maskedFieldsFor(rolePolicy: RolePolicy, authorized: readonly string[]): string[] {
        const candidates = new Set([...this.policy.institution.maskFields, ...rolePolicy.maskFields]);
        const present = new Set<string>();

        for (const resourceId of authorized) {
            const descriptor = this.registry.tryDescribe(resourceId);
            if (!descriptor || !this.policy.institution.maskedCategories.includes(descriptor.category)) continue;
            for (const field of descriptor.fields) {
                if (candidates.has(field)) present.add(field);
            }
        }

        return sorted(present);
    }
}
