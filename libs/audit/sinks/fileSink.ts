import fs from 'fs/promises';
import path from 'path';
import { setTimeout as sleep } from 'node:timers/promises';
import { logger as rootLogger } from '../../logging/logger.js';
import type { AuditLogEntry } from '../schema.js';
import type { AuditSink } from './sink.js';

const logger = rootLogger.child({ name: 'FileAuditSink' });

export interface FileAuditSinkOptions {
    /** Total append attempts per entry, including the first */
    maxAttempts?: number;
    /** Delay before retry n is n * retryDelayMs */
    retryDelayMs?: number;
}

/**
 * Append-only JSON Lines sink: one sanitized entry per line, safe to tail
 * or replay. Entries arrive one at a time from the dispatcher, so appends
 * never interleave.
 */
export class FileAuditSink implements AuditSink {
    public readonly name = 'file';
    private readonly maxAttempts: number;
    private readonly retryDelayMs: number;
    private directoryReady: Promise<unknown> | null = null;

    constructor(
        public readonly filePath: string,
        options: FileAuditSinkOptions = {}
    ) {
        this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
        this.retryDelayMs = Math.max(0, options.retryDelayMs ?? 50);
    }

    public async write(entry: AuditLogEntry): Promise<void> {
        const line = JSON.stringify(entry) + '\n';
        let lastError: unknown;

        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            try {
                await this.ensureDirectory();
                await fs.appendFile(this.filePath, line, 'utf-8');
                return;
            } catch (error) {
                lastError = error;
                this.directoryReady = null;
                logger.warn({ traceId: entry.traceId, attempt, maxAttempts: this.maxAttempts, error }, 'Audit file append failed');
                if (attempt < this.maxAttempts) {
                    await sleep(this.retryDelayMs * attempt);
                }
            }
        }

        throw lastError instanceof Error ? lastError : new Error(`Audit file append failed: ${String(lastError)}`);
    }

    private ensureDirectory(): Promise<unknown> {
        if (!this.directoryReady) {
            this.directoryReady = fs.mkdir(path.dirname(this.filePath), { recursive: true });
        }
        return this.directoryReady;
    }
}
