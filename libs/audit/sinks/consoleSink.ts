import type { AuditLogEntry } from '../schema.js';
import type { AuditSink } from './sink.js';

const RULE = '='.repeat(60);

function list(values: readonly string[]): string {
    return values.length > 0 ? values.join(', ') : '-';
}

export function formatAuditEntry(entry: AuditLogEntry): string {
    const ttl = Object.entries(entry.ttlStatus)
        .map(([resourceId, status]) => `${resourceId}=${status.status}(${status.remainingSeconds}s)`)
        .join(', ');

    return [
        RULE,
        `  AUDIT LOG: ${entry.traceId}`,
        RULE,
        `  Timestamp : ${entry.timestamp}`,
        `  User      : ${entry.userId} | Role: ${entry.role} | Clearance: ${entry.clearance}`,
        `  Session   : ${entry.sessionContext.sessionId} from ${entry.sessionContext.originAddress}`,
        `  Model     : ${entry.modelInvoked}`,
        `  Decision  : ${entry.policyDecision}`,
        `  Accessed  : ${list(entry.resourcesAccessed)}`,
        `  Denied    : ${list(entry.resourcesDenied)}`,
        `  Masked    : ${list(entry.fieldsMasked)}`,
        `  TTL       : ${ttl || '-'}`,
        `  Explain   : ${entry.explanation}`,
        RULE,
        '',
    ].join('\n');
}

/**
 * Human-readable diagnostic sink. Writes to stderr unless given a stream.
 */
export class ConsoleAuditSink implements AuditSink {
    public readonly name = 'console';

    constructor(private readonly stream: NodeJS.WritableStream = process.stderr) { }

    public write(entry: AuditLogEntry): Promise<void> {
        const text = formatAuditEntry(entry);
        return new Promise((resolve, reject) => {
            this.stream.write(text, error => (error ? reject(error) : resolve()));
        });
    }
}
