/**
 * Resource Freshness Tracker
 *
 * Per-resource TTL accounting shared across requests. Purely advisory: the
 * status ends up in the audit entry and the context packet constraints, and
 * never gates access.
 *
 * Updates are synchronous, so each access is atomic on the event loop.
 */

import type { ResourceDescriptor } from '../registry/resources.js';

export type TtlStatus =
    | { readonly status: 'refreshed'; readonly ttlSeconds: number; readonly remainingSeconds: number }
    | { readonly status: 'cached'; readonly ttlSeconds: number; readonly remainingSeconds: number };

export type TtlStatusMap = Readonly<Record<string, TtlStatus>>;

export type Clock = () => number;

const roundMillis = (seconds: number): number => Math.round(seconds * 1000) / 1000;

export class FreshnessTracker {
    private readonly lastRefresh = new Map<string, number>();

    constructor(private readonly clock: Clock = Date.now) { }

    public access(resourceId: string, ttlSeconds: number): TtlStatus {
        const now = this.clock();
        const last = this.lastRefresh.get(resourceId);
        const elapsedSeconds = last === undefined ? Number.POSITIVE_INFINITY : (now - last) / 1000;

        if (elapsedSeconds > ttlSeconds) {
            this.lastRefresh.set(resourceId, now);
            return Object.freeze({ status: 'refreshed', ttlSeconds, remainingSeconds: ttlSeconds });
        }

        return Object.freeze({
            status: 'cached',
            ttlSeconds,
            remainingSeconds: roundMillis(ttlSeconds - elapsedSeconds)
        });
    }

    public accessAll(descriptors: readonly ResourceDescriptor[]): TtlStatusMap {
        const statuses: Record<string, TtlStatus> = {};
        for (const descriptor of descriptors) {
            statuses[descriptor.resourceId] = this.access(descriptor.resourceId, descriptor.ttlSeconds);
        }
        return Object.freeze(statuses);
    }

    /**
     * Forces the next access to report a refresh, e.g. after the document
     * index was rebuilt out of band.
     */
    public invalidate(resourceId: string): void {
        this.lastRefresh.delete(resourceId);
    }

    public snapshot(): ReadonlyMap<string, number> {
        return new Map(this.lastRefresh);
    }
}
