import path from 'path';
import { z } from 'zod';
import { IccpError } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import { DEFAULT_POLICY_PATH } from '../policy/policyLoader.js';

export type Env = Readonly<Record<string, string | undefined>>;

export type GuardRule =
    | { type: 'required'; name: string; when: (env: Env) => boolean; reason: string }
    | { type: 'assert'; check: (env: Env) => boolean; message: string };

const HARDENED_ENVIRONMENTS = new Set(['production', 'staging']);

const isHardened = (env: Env): boolean => HARDENED_ENVIRONMENTS.has(env['NODE_ENV'] ?? '');

/**
 * Deployments that keep audit evidence must say where it goes. A relative
 * path would follow whatever directory the process happened to start in.
 */
export const ICCP_CONFIG_REQUIREMENTS: readonly GuardRule[] = [
    {
        type: 'required',
        name: 'ICCP_AUDIT_LOG_PATH',
        when: isHardened,
        reason: 'audit log location must be explicit outside development',
    },
    {
        type: 'assert',
        check: env => !isHardened(env) || !env['ICCP_AUDIT_LOG_PATH'] || path.isAbsolute(env['ICCP_AUDIT_LOG_PATH']),
        message: 'ICCP_AUDIT_LOG_PATH must be absolute outside development',
    },
];

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const IccpEnvSchema = z.object({
    NODE_ENV: z.string().min(1).default('development'),
    ICCP_AUDIT_LOG_PATH: z.string().min(1).default(path.join('logs', 'audit_log.jsonl')),
    ICCP_AUDIT_CONSOLE: z.enum(['true', 'false']).default('true').transform(value => value === 'true'),
    ICCP_AUDIT_MEMORY_CAPACITY: positiveInt(1000),
    ICCP_AUDIT_QUEUE_HIGH_WATER: positiveInt(1000),
    ICCP_AUDIT_WRITE_ATTEMPTS: positiveInt(3),
    ICCP_AUDIT_SINK_TIMEOUT_MS: positiveInt(5000),
    ICCP_CONTEXT_PACKET_CAPACITY: positiveInt(1000),
    ICCP_POLICY_PATH: z.string().min(1).optional(),
    ICCP_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface IccpConfig {
    readonly environment: string;
    /** Absolute path of the JSONL audit log */
    readonly auditLogPath: string;
    readonly auditConsole: boolean;
    readonly auditMemoryCapacity: number;
    readonly auditQueueHighWater: number;
    readonly auditWriteAttempts: number;
    /** Per-sink write deadline before the attempt is recorded as failed */
    readonly auditSinkTimeoutMs: number;
    readonly contextPacketCapacity: number;
    /** Absolute path of the policy file */
    readonly policyPath: string;
    readonly logLevel: string;
}

export function checkGuardRules(rules: readonly GuardRule[], env: Env): string[] {
    const errors: string[] = [];

    for (const rule of rules) {
        switch (rule.type) {
            case 'required': {
                const value = env[rule.name];
                if (rule.when(env) && (!value || value.trim() === '')) {
                    errors.push(`${rule.name} is required (${rule.reason})`);
                }
                break;
            }
            case 'assert': {
                if (!rule.check(env)) {
                    errors.push(rule.message);
                }
                break;
            }
        }
    }

    return errors;
}

/**
 * Validates the environment into a frozen configuration.
 * Every violation is collected before failing; nothing is partially applied.
 */
export function loadIccpConfig(env: Env = process.env, cwd: string = process.cwd()): IccpConfig {
    const errors = checkGuardRules(ICCP_CONFIG_REQUIREMENTS, env);
    const parsed = IccpEnvSchema.safeParse(env);

    if (!parsed.success) {
        for (const issue of parsed.error.issues) {
            errors.push(`${issue.path.join('.') || '<root>'}: ${issue.message}`);
        }
    }

    if (errors.length > 0 || !parsed.success) {
        logger.fatal({ errors, remediation: 'Check ICCP_* environment variables.' }, 'Configuration Guard Violation');
        throw new IccpError('CONFIG_INVALID', `Invalid configuration: ${errors.join('; ')}`, { errors }, 'CFG');
    }

    const values = parsed.data;
    return Object.freeze({
        environment: values.NODE_ENV,
        auditLogPath: path.resolve(cwd, values.ICCP_AUDIT_LOG_PATH),
        auditConsole: values.ICCP_AUDIT_CONSOLE,
        auditMemoryCapacity: values.ICCP_AUDIT_MEMORY_CAPACITY,
        auditQueueHighWater: values.ICCP_AUDIT_QUEUE_HIGH_WATER,
        auditWriteAttempts: values.ICCP_AUDIT_WRITE_ATTEMPTS,
        auditSinkTimeoutMs: values.ICCP_AUDIT_SINK_TIMEOUT_MS,
        contextPacketCapacity: values.ICCP_CONTEXT_PACKET_CAPACITY,
        policyPath: values.ICCP_POLICY_PATH ? path.resolve(cwd, values.ICCP_POLICY_PATH) : DEFAULT_POLICY_PATH,
        logLevel: values.ICCP_LOG_LEVEL,
    });
}
