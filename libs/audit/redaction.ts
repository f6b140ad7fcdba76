/**
 * Audit Redaction
 *
 * Two independent passes over everything bound for an audit sink:
 * - keys found in the sensitive-key table get a category placeholder,
 * - every string (values and keys) is scanned for sensitive patterns,
 *   whatever the field is called.
 */

import { clearanceFor, parseRole } from '../context/identity.js';
import { logger } from '../logging/logger.js';
import { deepFreeze } from '../util/deepFreeze.js';
import type { PolicyDecision } from '../policy/policyEngine.js';
import { AuditLogEntry, AuditLogEntrySchema } from './schema.js';

export const REDACTED = '[REDACTED]';
export const REDACTED_FINANCIAL = '[REDACTED-FINANCIAL]';
export const REDACTED_SSN = '[REDACTED-SSN]';
export const CIRCULAR = '[CIRCULAR]';
export const UNREADABLE = '[UNREADABLE]';
export const SANITIZER_FAULT = '[SANITIZER-FAULT]';

/** Lower-case key → placeholder */
export const SENSITIVE_KEY_PLACEHOLDERS: Readonly<Record<string, string>> = Object.freeze({
    ssn: REDACTED,
    social_security: REDACTED,
    national_id: REDACTED,
    annual_salary: REDACTED_FINANCIAL,
    amount_due: REDACTED_FINANCIAL,
    amount_paid: REDACTED_FINANCIAL,
    balance: REDACTED_FINANCIAL,
    bank_account: REDACTED_FINANCIAL,
});

export const SSN_PATTERN_SOURCE = '\\d{3}-\\d{2}-\\d{4}';

const SENSITIVE_PATTERNS: readonly { pattern: RegExp; replacement: string }[] = [
    { pattern: new RegExp(SSN_PATTERN_SOURCE, 'g'), replacement: REDACTED_SSN },
];

/** True when the text still carries a sensitive-pattern match. */
export function containsSensitivePattern(text: string): boolean {
    return SENSITIVE_PATTERNS.some(({ pattern }) => new RegExp(pattern.source).test(text));
}

export function scrubString(text: string): string {
    let scrubbed = text;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
        scrubbed = scrubbed.replace(pattern, replacement);
    }
    return scrubbed;
}

/**
 * Deep, non-mutating redaction of an arbitrary value.
 */
export function redactSensitive(value: unknown): unknown {
    return walk(value, new WeakSet<object>());
}

function walk(value: unknown, seen: WeakSet<object>): unknown {
    if (typeof value === 'string') return scrubString(value);
    if (typeof value === 'bigint') return value.toString();
    if (typeof value === 'function' || typeof value === 'symbol') return undefined;
    if (value === null || typeof value !== 'object') return value;

    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
    }
    if (seen.has(value)) return CIRCULAR;

    seen.add(value);
    try {
        if (Array.isArray(value)) {
            return value.map(item => walk(item, seen));
        }

        const out: Record<string, unknown> = {};
        for (const key of Object.keys(value)) {
            const placeholder = SENSITIVE_KEY_PLACEHOLDERS[key.toLowerCase()];
            if (placeholder !== undefined) {
                out[scrubString(key)] = placeholder;
                continue;
            }
            let child: unknown;
            try {
                child = Reflect.get(value, key);
            } catch {
                out[scrubString(key)] = UNREADABLE;
                continue;
            }
            out[scrubString(key)] = walk(child, seen);
        }
        return out;
    } finally {
        // Shared, non-cyclic references are walked again where they reappear.
        seen.delete(value);
    }
}

const DECISIONS: readonly PolicyDecision[] = ['DENY', 'ALLOW_PARTIAL', 'ALLOW_FULL'];

function readString(read: () => unknown): string {
    try {
        const value = read();
        return scrubString(typeof value === 'string' ? value : String(value ?? ''));
    } catch {
        return UNREADABLE;
    }
}

function readStrings(read: () => unknown): string[] {
    try {
        const value = read();
        return Array.isArray(value) ? value.map(item => readString(() => item)) : [];
    } catch {
        return [];
    }
}

/**
 * Best-effort entry for when the full walk fails: identifiers and decision
 * survive pattern-scrubbed, the explanation and TTL map are dropped.
 */
export function degradedEntry(entry: AuditLogEntry): AuditLogEntry {
    const role = parseRole(readString(() => entry.role));
    const decision = readString(() => entry.policyDecision);

    return deepFreeze({
        traceId: readString(() => entry.traceId) || 'unknown-trace',
        timestamp: readString(() => entry.timestamp) || new Date().toISOString(),
        userId: readString(() => entry.userId),
        role,
        clearance: clearanceFor(role),
        sessionContext: {
            sessionId: readString(() => entry.sessionContext.sessionId),
            originAddress: readString(() => entry.sessionContext.originAddress),
            requestTimestamp: readString(() => entry.sessionContext.requestTimestamp),
            clientLabel: readString(() => entry.sessionContext.clientLabel),
        },
        modelInvoked: readString(() => entry.modelInvoked),
        resourcesAccessed: readStrings(() => entry.resourcesAccessed),
        resourcesDenied: readStrings(() => entry.resourcesDenied),
        fieldsMasked: readStrings(() => entry.fieldsMasked),
        policyDecision: DECISIONS.find(d => d === decision) ?? 'DENY',
        explanation: SANITIZER_FAULT,
        ttlStatus: {},
    });
}

/**
 * Returns a frozen, redacted copy of the entry. Never throws: an entry the
 * walk cannot bring back into shape is replaced by degradedEntry().
 */
export function sanitizeAuditEntry(entry: AuditLogEntry): AuditLogEntry {
    try {
        const result = AuditLogEntrySchema.safeParse(redactSensitive(entry));
        if (result.success) {
            return deepFreeze(result.data);
        }
        logger.error({
            traceId: readString(() => entry.traceId),
            issues: result.error.issues.map(issue => issue.path.join('.'))
        }, 'Audit entry malformed after redaction; delivering degraded entry');
    } catch (error) {
        logger.error({ traceId: readString(() => entry.traceId), error }, 'Audit sanitizer fault; delivering degraded entry');
    }
    return degradedEntry(entry);
}
