/**
 * ICCP Policy Model
 *
 * Precedence is Institution > Role > User. Each level can only narrow what
 * the level above granted. The whole object is loaded once at process start,
 * frozen, and passed explicitly to every component that needs it.
 */

import { z } from 'zod';
import { GrantableRole, isGrantableRole, Role } from '../context/identity.js';
import type { ResourceCategory } from '../registry/resources.js';

export interface ProhibitedCombination {
    readonly role: GrantableRole;
    readonly resourceId: string;
}

export interface InstitutionPolicy {
    /** Field names masked for every role */
    readonly maskFields: readonly string[];
    /** (role, resource) pairs that are denied whatever the role grant says */
    readonly prohibitedCombinations: readonly ProhibitedCombination[];
    /** Resource categories that institution and role masks apply to */
    readonly maskedCategories: readonly ResourceCategory[];
}

export interface RolePolicy {
    readonly allowedResources: readonly string[];
    readonly maskFields: readonly string[];
    /** Authorized resources whose rows are limited to the requester's own */
    readonly selfScopedResources: readonly string[];
    /** Note shown alongside an owner-filtered resource, keyed by resource id */
    readonly restrictionNotes: Readonly<Record<string, string>>;
}

export interface IccpPolicy {
    readonly policyVersion: string;
    readonly institution: InstitutionPolicy;
    readonly roles: Readonly<Record<GrantableRole, RolePolicy>>;
}

/**
 * Policy as loaded from disk, with provenance.
 */
export interface LoadedPolicy {
    readonly policy: IccpPolicy;
    readonly sourcePath: string;
    /** SHA-256 (hex) of the policy file bytes */
    readonly digest: string;
}

const GrantableRoleSchema = z.nativeEnum(Role).refine(
    (role): role is GrantableRole => isGrantableRole(role),
    { message: 'unrecognized is not a grantable role' }
);

const CategorySchema = z.enum(['persons', 'financial', 'grades', 'classes', 'documents']);

const RolePolicySchema = z.object({
    allowedResources: z.array(z.string().min(1)),
    maskFields: z.array(z.string().min(1)).default([]),
    selfScopedResources: z.array(z.string().min(1)).default([]),
    restrictionNotes: z.record(z.string().min(1)).default({}),
}).strict().superRefine((val, ctx) => {
    for (const resourceId of val.selfScopedResources) {
        if (!val.allowedResources.includes(resourceId)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['selfScopedResources'],
                message: `self-scoped resource ${resourceId} is not in allowedResources`
            });
        }
    }
});

export const IccpPolicySchema = z.object({
    policyVersion: z.string().regex(/^v\d+\.\d+\.\d+$/),
    institution: z.object({
        maskFields: z.array(z.string().min(1)),
        prohibitedCombinations: z.array(z.object({
            role: GrantableRoleSchema,
            resourceId: z.string().min(1),
        }).strict()),
        maskedCategories: z.array(CategorySchema),
    }).strict(),
    roles: z.object({
        [Role.Admin]: RolePolicySchema,
        [Role.Teacher]: RolePolicySchema,
        [Role.Student]: RolePolicySchema,
    }).strict(),
}).strict();
