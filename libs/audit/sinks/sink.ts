import type { AuditLogEntry } from '../schema.js';

/**
 * Destination for sanitized audit entries. Each sink is written
 * independently; a failing sink never affects the others.
 */
export interface AuditSink {
    readonly name: string;
    write(entry: AuditLogEntry): Promise<void>;
    close?(): Promise<void>;
}
