/**
 * Shared test data. Identifiers, names and account numbers are made up.
 */

import { buildIdentityScope, IdentityScope, Role } from '../../libs/context/identity.js';
import { parsePolicy } from '../../libs/policy/policyLoader.js';
import type { IccpPolicy } from '../../libs/policy/policyProfile.js';
import type { RawRecords } from '../../libs/filter/dataFilter.js';
import type { AuditLogEntry } from '../../libs/audit/schema.js';

export const FIXED_NOW = new Date('2026-03-02T09:30:00.000Z');

interface RoleDocument {
    allowedResources: string[];
    maskFields: string[];
    selfScopedResources: string[];
    restrictionNotes: Record<string, string>;
}

export interface PolicyDocument {
    policyVersion: string;
    institution: {
        maskFields: string[];
        maskedCategories: string[];
        prohibitedCombinations: { role: string; resourceId: string }[];
    };
    roles: Record<'admin' | 'teacher' | 'student', RoleDocument>;
}

/** Mutable copy of the bundled policy document. */
export function policyDocument(): PolicyDocument {
    return {
        policyVersion: 'v1.0.0',
        institution: {
            maskFields: ['ssn', 'bank_account'],
            maskedCategories: ['persons', 'financial'],
            prohibitedCombinations: [{ role: 'student', resourceId: 'grades' }],
        },
        roles: {
            admin: {
                allowedResources: ['persons', 'financial_information', 'grades', 'classes', 'documents'],
                maskFields: [],
                selfScopedResources: [],
                restrictionNotes: {},
            },
            teacher: {
                allowedResources: ['persons', 'financial_information', 'grades', 'classes', 'documents'],
                maskFields: [],
                selfScopedResources: ['financial_information'],
                restrictionNotes: { financial_information: 'Restricted to your own salary only.' },
            },
            student: {
                allowedResources: ['persons', 'financial_information', 'classes', 'documents'],
                maskFields: ['email'],
                selfScopedResources: ['financial_information'],
                restrictionNotes: { financial_information: 'Restricted to your own tuition info only.' },
            },
        },
    };
}

export const TEST_POLICY: IccpPolicy = parsePolicy(policyDocument());

export function identity(userId: string, role: string): IdentityScope {
    return buildIdentityScope({
        userId,
        role,
        sessionContext: { sessionId: `sess-${userId}`, originAddress: '10.0.0.8', clientLabel: 'test-client/1.0' },
    }, FIXED_NOW);
}

export const ADMIN = (): IdentityScope => identity('a-001', 'admin');
export const TEACHER = (): IdentityScope => identity('t-100', 'teacher');
export const STUDENT = (): IdentityScope => identity('s-200', 'student');

export function sampleRecords(): RawRecords {
    return {
        persons: [
            { person_id: 's-200', name: 'Avery Example', role: 'student', email: 'avery@example.edu', ssn: '000-00-0001', major: 'History' },
            { person_id: 't-100', name: 'Jordan Sample', role: 'teacher', email: 'jordan@example.edu', ssn: '000-00-0002', department: 'Math' },
        ],
        financial_information: [
            { person_id: 't-100', type: 'salary', annual_salary: 50000, bank_account: 'ACCT-1', pay_frequency: 'monthly' },
            { person_id: 't-101', type: 'salary', annual_salary: 61000, bank_account: 'ACCT-2', pay_frequency: 'monthly' },
            { person_id: 's-200', type: 'tuition', amount_due: 1200, amount_paid: 200, balance: 1000, bank_account: 'ACCT-3' },
        ],
        grades: [
            { student_id: 's-200', class_id: 'c-1', grade: 'B' },
        ],
        classes: [
            { class_id: 'c-1', name: 'Algebra', teacher_id: 't-100' },
        ],
    };
}

export function sampleEntry(traceId: string = 'tr-0000aaaa'): AuditLogEntry {
    return {
        traceId,
        timestamp: FIXED_NOW.toISOString(),
        userId: 's-200',
        role: Role.Student,
        clearance: 'Self-Scoped',
        sessionContext: {
            sessionId: 'sess-s-200',
            originAddress: '10.0.0.8',
            requestTimestamp: FIXED_NOW.toISOString(),
            clientLabel: 'test-client/1.0',
        },
        modelInvoked: 'institutional-assistant',
        resourcesAccessed: ['classes'],
        resourcesDenied: ['grades'],
        fieldsMasked: [],
        policyDecision: 'ALLOW_PARTIAL',
        explanation: 'student (Self-Scoped) requested 2 resource(s). Granted: classes. Denied: grades (INSTITUTION_ROLE_RESTRICTED). Decision: ALLOW_PARTIAL.',
        ttlStatus: { classes: { status: 'cached', ttlSeconds: 600, remainingSeconds: 42.5 } },
    };
}
