/**
 * ICCP Data Filter
 *
 * Applies an authorization result to raw record collections handed over by
 * the storage layer: explicit denial markers, owner filtering for
 * self-scoped resources, then field masking. Input rows are never mutated.
 */

import { IdentityScope, isGrantableRole } from '../context/identity.js';
import { logger } from '../logging/logger.js';
import { ResourceRegistry } from '../registry/resourceRegistry.js';
import type { ResourceDescriptor } from '../registry/resources.js';
import type { IccpPolicy } from '../policy/policyProfile.js';
import type { AuthorizationResult, DenialReason } from '../policy/policyEngine.js';
import { maskRow, placeholderFor, RecordRow } from './masking.js';

export type RawRecords = Readonly<Record<string, readonly RecordRow[] | undefined>>;

export interface GrantedResourceView {
    readonly kind: 'granted';
    readonly resourceId: string;
    readonly rows: readonly RecordRow[];
    /** Fields replaced by a placeholder in this resource */
    readonly maskedFields: readonly string[];
    /** Set when rows were limited to the requester's own */
    readonly note?: string;
    /** Rows dropped by owner filtering */
    readonly withheldRows: number;
}

export interface DeniedResourceView {
    readonly kind: 'denied';
    readonly resourceId: string;
    readonly reason: DenialReason;
    readonly marker: string;
}

export type ResourceView = GrantedResourceView | DeniedResourceView;

export interface FilteredView {
    /** Requested universe, in request order */
    readonly order: readonly string[];
    readonly resources: Readonly<Record<string, ResourceView>>;
}

export const DEFAULT_RESTRICTION_NOTE = 'Restricted to your own records only.';

export function denialMarker(role: string, resourceId: string): string {
    return `[ACCESS DENIED: role ${role} cannot access ${resourceId}]`;
}

/**
 * Owner identifier of a row, or undefined when the row has no usable owner.
 */
export function ownerOf(row: RecordRow, ownerField: string): string | undefined {
    const value = row[ownerField];
    if (typeof value === 'string' && value.length > 0) return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return undefined;
}

export class DataFilter {
    constructor(
        private readonly policy: IccpPolicy,
        private readonly registry: ResourceRegistry
    ) { }

    public apply(records: RawRecords, authorization: AuthorizationResult, identity: IdentityScope): FilteredView {
        const resources = new Map<string, ResourceView>();

        for (const resourceId of authorization.requested) {
            const reason = Object.hasOwn(authorization.denialReasons, resourceId)
                ? authorization.denialReasons[resourceId]
                : undefined;
            if (reason) {
                const denied: DeniedResourceView = {
                    kind: 'denied',
                    resourceId,
                    reason,
                    marker: denialMarker(identity.role, resourceId),
                };
                resources.set(resourceId, Object.freeze(denied));
                continue;
            }

            // Authorized ids always have a descriptor; the policy engine denies unknown ones.
            const descriptor = this.registry.describe(resourceId);
            const rows = Object.hasOwn(records, resourceId) ? records[resourceId] : undefined;
            resources.set(resourceId, this.grant(descriptor, rows ?? [], identity, authorization));
        }

        return Object.freeze({
            order: authorization.requested,
            // fromEntries defines own properties, so ids such as "__proto__" stay plain keys
            resources: Object.freeze(Object.fromEntries(resources)),
        });
    }

    private grant(
        descriptor: ResourceDescriptor,
        rows: readonly RecordRow[],
        identity: IdentityScope,
        authorization: AuthorizationResult
    ): GrantedResourceView {
        const selfScoped = authorization.selfScoped.includes(descriptor.resourceId);
        const visible = selfScoped ? this.ownRows(descriptor, rows, identity) : rows;

        // Storage rows may carry columns the catalog does not declare; a mask
        // field is withheld wherever it appears.
        const candidates = this.policy.institution.maskedCategories.includes(descriptor.category)
            ? this.maskFieldsFor(identity)
            : [];
        const maskedFields = candidates.filter(field =>
            descriptor.fields.includes(field) || visible.some(row => Object.hasOwn(row, field))
        );
        const placeholder = placeholderFor(descriptor);

        const view: GrantedResourceView = {
            kind: 'granted',
            resourceId: descriptor.resourceId,
            rows: Object.freeze(visible.map(row => maskRow(row, maskedFields, placeholder))),
            maskedFields: Object.freeze(maskedFields),
            withheldRows: rows.length - visible.length,
            ...(selfScoped ? { note: this.restrictionNote(identity, descriptor.resourceId) } : {}),
        };
        return Object.freeze(view);
    }

    /**
     * Rows whose owner equals the requester. Rows without a recognizable
     * owner are treated as someone else's.
     */
    private ownRows(descriptor: ResourceDescriptor, rows: readonly RecordRow[], identity: IdentityScope): RecordRow[] {
        const ownerField = descriptor.ownerField;
        if (!ownerField) {
            logger.warn({ resourceId: descriptor.resourceId }, 'Self-scoped resource has no owner field; withholding all rows');
            return [];
        }
        return rows.filter(row => ownerOf(row, ownerField) === identity.userId);
    }

    /** Institution and role mask lists, sorted and de-duplicated. */
    private maskFieldsFor(identity: IdentityScope): string[] {
        const roleMasks = isGrantableRole(identity.role) ? this.policy.roles[identity.role].maskFields : [];
        return [...new Set([...this.policy.institution.maskFields, ...roleMasks])].sort();
    }

    private restrictionNote(identity: IdentityScope, resourceId: string): string {
        if (!isGrantableRole(identity.role)) return DEFAULT_RESTRICTION_NOTE;
        return this.policy.roles[identity.role].restrictionNotes[resourceId] ?? DEFAULT_RESTRICTION_NOTE;
    }
}
