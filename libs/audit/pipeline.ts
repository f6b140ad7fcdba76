/**
 * ICCP Audit Pipeline
 *
 * Producers enqueue and return immediately. A single dispatcher drains the
 * queue in FIFO order and fans each entry out to every sink; a failing sink
 * is recorded and never blocks the others or the caller. A write that does not
 * settle within the sink timeout counts as failed.
 */

import { clearTimeout, setTimeout } from 'node:timers';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { IccpError } from '../errors/sanitizer.js';
import { logger as rootLogger } from '../logging/logger.js';
import { sanitizeAuditEntry } from './redaction.js';
import type { AuditLogEntry } from './schema.js';
import type { AuditSink } from './sinks/sink.js';

const logger = rootLogger.child({ name: 'AuditPipeline' });

const DEFAULT_HIGH_WATER_MARK = 1000;
const MAX_RECORDED_FAILURES = 1000;
const DEFAULT_SINK_TIMEOUT_MS = 5000;

export interface AuditPipelineOptions {
    /** Queue depth above which a backlog warning is logged. Entries are never dropped. */
    highWaterMark?: number;
    /** Upper bound on a single sink write */
    sinkTimeoutMs?: number;
}

export interface SinkFailure {
    readonly traceId: string;
    readonly sink: string;
    readonly error: string;
    readonly failedAt: string;
}

export interface AuditPipelineStats {
    readonly queued: number;
    readonly delivered: number;
    readonly failed: number;
    readonly stopped: boolean;
}

export class AuditPipeline {
    private readonly queue: AuditLogEntry[] = [];
    private readonly failureLog: SinkFailure[] = [];
    private readonly highWaterMark: number;
    private readonly sinkTimeoutMs: number;
    private accepting = true;
    private backlogWarned = false;
    private delivered = 0;
    private failedWrites = 0;
    private dispatching: Promise<void> | null = null;
    private stopping: Promise<void> | null = null;

    constructor(
        private readonly sinks: readonly AuditSink[],
        options: AuditPipelineOptions = {}
    ) {
        this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
        this.sinkTimeoutMs = options.sinkTimeoutMs ?? DEFAULT_SINK_TIMEOUT_MS;
    }

    /**
     * Sanitizes the entry and queues it for delivery. Never waits on a sink.
     * Returns the sanitized entry exactly as the sinks will receive it.
     */
    public enqueue(entry: AuditLogEntry): AuditLogEntry {
        this.assertAccepting(entry.traceId);

        const sanitized = sanitizeAuditEntry(entry);
        this.queue.push(sanitized);

        if (this.queue.length > this.highWaterMark && !this.backlogWarned) {
            this.backlogWarned = true;
            logger.warn({ queued: this.queue.length, highWaterMark: this.highWaterMark }, 'Audit queue above high-water mark');
        }

        this.wake();
        return sanitized;
    }

    /**
     * Resolves once every entry enqueued so far has reached every sink
     * (or failed there).
     */
    public async flush(): Promise<void> {
        while (this.dispatching) {
            await this.dispatching;
        }
    }

    /**
     * Refuses new entries, drains what is queued, then closes the sinks.
     * Safe to call more than once.
     */
    public stop(): Promise<void> {
        if (!this.stopping) {
            this.accepting = false;
            this.stopping = this.drainAndClose();
        }
        return this.stopping;
    }

    public get isAccepting(): boolean {
        return this.accepting;
    }

    /**
     * Throws AUDIT_PIPELINE_STOPPED once stop() has been called.
     */
    public assertAccepting(traceId: string): void {
        if (!this.accepting) {
            throw new IccpError(
                'AUDIT_PIPELINE_STOPPED',
                'Audit pipeline is stopped',
                `Rejected entry ${traceId}`,
                'OPS'
            );
        }
    }

    public failures(): readonly SinkFailure[] {
        return [...this.failureLog];
    }

    public stats(): AuditPipelineStats {
        return {
            queued: this.queue.length,
            delivered: this.delivered,
            failed: this.failedWrites,
            stopped: !this.accepting,
        };
    }

    private wake(): void {
        if (this.dispatching) return;

        this.dispatching = this.dispatch().finally(() => {
            this.dispatching = null;
            if (this.queue.length > 0) {
                this.wake();
            }
        });
    }

    private async dispatch(): Promise<void> {
        // Let the producer's turn finish before any sink work starts.
        await yieldToEventLoop();

        let entry = this.queue.shift();
        while (entry) {
            await this.deliver(entry);
            entry = this.queue.shift();
        }

        if (this.backlogWarned && this.queue.length === 0) {
            this.backlogWarned = false;
            logger.info('Audit queue drained below high-water mark');
        }
    }

    private async deliver(entry: AuditLogEntry): Promise<void> {
        const results = await Promise.allSettled(this.sinks.map(sink => this.writeTo(sink, entry)));

        results.forEach((result, index) => {
            if (result.status === 'fulfilled') return;
            const sink = this.sinks[index];
            this.recordFailure(entry.traceId, sink?.name ?? `sink-${index}`, result.reason);
        });
        this.delivered += 1;
    }

    private async writeTo(sink: AuditSink, entry: AuditLogEntry): Promise<void> {
        await this.withDeadline(() => sink.write(entry), `Sink ${sink.name}`);
    }

    private async withDeadline(work: () => Promise<void>, label: string): Promise<void> {
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(
                () => reject(new Error(`${label} timed out after ${this.sinkTimeoutMs}ms`)),
                this.sinkTimeoutMs
            );
        });

        try {
            await Promise.race([work(), timeout]);
        } finally {
            clearTimeout(timer);
        }
    }

    private recordFailure(traceId: string, sink: string, reason: unknown): void {
        const error = reason instanceof Error ? reason.message : String(reason);
        this.failedWrites += 1;
        this.failureLog.push({ traceId, sink, error, failedAt: new Date().toISOString() });
        if (this.failureLog.length > MAX_RECORDED_FAILURES) {
            this.failureLog.shift();
        }
        logger.error({ traceId, sink, error }, 'Audit sink write failed');
    }

    private async drainAndClose(): Promise<void> {
        await this.flush();

        const results = await Promise.allSettled(this.sinks.map(async sink => {
            const close = sink.close?.bind(sink);
            if (close) await this.withDeadline(close, `Sink ${sink.name} close`);
        }));
        results.forEach((result, index) => {
            if (result.status === 'rejected') {
                logger.error({ sink: this.sinks[index]?.name, error: result.reason }, 'Audit sink close failed');
            }
        });

        logger.info({ delivered: this.delivered, failed: this.failedWrites }, 'Audit pipeline stopped');
    }
}
