/**
 * ICCP Identity Scope
 * Who is asking: user, role, derived clearance and session context.
 * Frozen once built; one instance per request.
 */

import crypto from 'crypto';
import { IdentityInputSchema } from '../validation/identitySchema.js';
import { createValidator } from '../validation/validator.js';
import { logger } from '../logging/logger.js';

export enum Role {
    Admin = 'admin',
    Teacher = 'teacher',
    Student = 'student',
    /** Any role string outside the closed set. Always fails closed. */
    Unrecognized = 'unrecognized',
}

/** Roles that can hold grants in a policy. */
export type GrantableRole = Exclude<Role, Role.Unrecognized>;

export const GRANTABLE_ROLES: readonly GrantableRole[] = [Role.Admin, Role.Teacher, Role.Student];

export type Clearance = 'Full-Access' | 'Department-Scoped' | 'Self-Scoped' | 'Unauthorized';

export interface SessionContext {
    readonly sessionId: string;
    readonly originAddress: string;
    readonly requestTimestamp: string;
    readonly clientLabel: string;
}

export interface IdentityScope {
    readonly userId: string;
    readonly role: Role;
    readonly clearance: Clearance;
    readonly sessionContext: SessionContext;
}

const DEFAULT_ORIGIN_ADDRESS = '0.0.0.0';
const DEFAULT_CLIENT_LABEL = 'iccp-client/1.0';

const validateIdentityInput = createValidator(IdentityInputSchema);

/**
 * Narrows a free-form role string to the closed enumeration.
 * Matching is case-insensitive; anything else is Role.Unrecognized.
 */
export function parseRole(raw: string): Role {
    switch (raw.trim().toLowerCase()) {
        case Role.Admin:
            return Role.Admin;
        case Role.Teacher:
            return Role.Teacher;
        case Role.Student:
            return Role.Student;
        default:
            return Role.Unrecognized;
    }
}

export function isGrantableRole(role: Role): role is GrantableRole {
    return role !== Role.Unrecognized;
}

export function clearanceFor(role: Role): Clearance {
    switch (role) {
        case Role.Admin:
            return 'Full-Access';
        case Role.Teacher:
            return 'Department-Scoped';
        case Role.Student:
            return 'Self-Scoped';
        case Role.Unrecognized:
            return 'Unauthorized';
        default: {
            const exhaustive: never = role;
            return exhaustive;
        }
    }
}

/**
 * Validates raw identity input and builds the immutable scope.
 * Throws IccpError(INVALID_IDENTITY) when the input is malformed; an
 * unknown role is not malformed and yields Role.Unrecognized.
 */
export function buildIdentityScope(input: unknown, now: Date = new Date()): IdentityScope {
    const parsed = validateIdentityInput(input, 'IdentityScope');
    const role = parseRole(parsed.role);

    if (role === Role.Unrecognized) {
        logger.warn({ userId: parsed.userId, claimedRole: parsed.role }, 'Unrecognized role; identity will fail closed');
    }

    const session = parsed.sessionContext ?? {};
    const sessionContext: SessionContext = Object.freeze({
        sessionId: session.sessionId ?? `sess-${crypto.randomBytes(4).toString('hex')}`,
        originAddress: session.originAddress ?? DEFAULT_ORIGIN_ADDRESS,
        requestTimestamp: session.requestTimestamp ?? now.toISOString(),
        clientLabel: session.clientLabel ?? DEFAULT_CLIENT_LABEL,
    });

    return Object.freeze({
        userId: parsed.userId,
        role,
        clearance: clearanceFor(role),
        sessionContext,
    });
}
