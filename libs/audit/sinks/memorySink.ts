import type { AuditLogEntry } from '../schema.js';
import type { AuditSink } from './sink.js';

/**
 * In-process ordered buffer of sanitized entries, retrievable by trace id.
 * With a capacity set, the oldest entries are evicted first.
 */
export class MemoryAuditSink implements AuditSink {
    public readonly name = 'memory';
    private readonly entries: AuditLogEntry[] = [];

    constructor(private readonly capacity: number = Number.POSITIVE_INFINITY) { }

    public async write(entry: AuditLogEntry): Promise<void> {
        this.entries.push(entry);
        while (this.entries.length > this.capacity) {
            this.entries.shift();
        }
    }

    public getByTraceId(traceId: string): AuditLogEntry | undefined {
        for (let i = this.entries.length - 1; i >= 0; i--) {
            const entry = this.entries[i];
            if (entry?.traceId === traceId) return entry;
        }
        return undefined;
    }

    /** Most recent entries, oldest first. */
    public list(limit?: number): AuditLogEntry[] {
        return limit === undefined ? [...this.entries] : this.entries.slice(-limit);
    }

    public get size(): number {
        return this.entries.length;
    }
}
