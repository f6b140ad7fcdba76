/**
 * ICCP Orchestrator
 *
 * One call per request: evaluate → filter and render → freshness → packet →
 * audit. The response never waits on audit durability; it does require the
 * audit pipeline to accept the entry.
 */

import crypto from 'crypto';
import type { IdentityScope } from '../context/identity.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { getContextLogger } from '../logging/logger.js';
import { defaultRegistry, ResourceRegistry } from '../registry/resourceRegistry.js';
import { PolicyEngine } from '../policy/policyEngine.js';
import type { PolicyDecision } from '../policy/policyEngine.js';
import type { IccpPolicy } from '../policy/policyProfile.js';
import { DataFilter } from '../filter/dataFilter.js';
import type { FilteredView, RawRecords } from '../filter/dataFilter.js';
import { renderFilteredView } from '../filter/render.js';
import { FreshnessTracker } from '../freshness/freshnessTracker.js';
import { buildContextPacket, DEFAULT_MODEL } from '../packet/contextPacket.js';
import type { ContextPacket, ModelDescriptor } from '../packet/contextPacket.js';
import { buildAuditEntry } from '../audit/entry.js';
import type { AuditPipeline } from '../audit/pipeline.js';
import type { CorrelationStore } from '../correlation/correlationStore.js';

export type AccessLevel = 'denied' | 'partial' | 'full';

export interface ProcessRequest {
    identity: IdentityScope;
    /** Empty or omitted means every registered resource */
    requestedResources?: readonly string[];
    /** Raw rows per resource id, as fetched by the storage layer */
    records?: RawRecords;
    model?: ModelDescriptor;
    traceId?: string;
}

export interface ProcessResult {
    readonly traceId: string;
    readonly accessLevel: AccessLevel;
    readonly decision: PolicyDecision;
    readonly view: FilteredView;
    readonly renderedContext: string;
    readonly contextPacket: ContextPacket;
    readonly maskedFields: readonly string[];
    readonly deniedResources: readonly string[];
}

export interface IccpEngineOptions {
    policy: IccpPolicy;
    pipeline: AuditPipeline;
    correlation: CorrelationStore;
    registry?: ResourceRegistry;
    freshness?: FreshnessTracker;
    model?: ModelDescriptor;
    now?: () => Date;
}

export function newTraceId(): string {
    return `tr-${crypto.randomBytes(4).toString('hex')}`;
}

export function accessLevelFor(decision: PolicyDecision): AccessLevel {
    switch (decision) {
        case 'DENY':
            return 'denied';
        case 'ALLOW_PARTIAL':
            return 'partial';
        case 'ALLOW_FULL':
            return 'full';
        default: {
            const exhaustive: never = decision;
            return exhaustive;
        }
    }
}

export class IccpEngine {
    private readonly registry: ResourceRegistry;
    private readonly policyEngine: PolicyEngine;
    private readonly filter: DataFilter;
    private readonly freshness: FreshnessTracker;
    private readonly model: ModelDescriptor;
    private readonly now: () => Date;

    constructor(private readonly options: IccpEngineOptions) {
        this.registry = options.registry ?? defaultRegistry;
        this.policyEngine = new PolicyEngine(options.policy, this.registry);
        this.filter = new DataFilter(options.policy, this.registry);
        this.freshness = options.freshness ?? new FreshnessTracker();
        this.model = options.model ?? DEFAULT_MODEL;
        this.now = options.now ?? (() => new Date());
    }

    public get correlation(): CorrelationStore {
        return this.options.correlation;
    }

    public get pipeline(): AuditPipeline {
        return this.options.pipeline;
    }

    public get policyVersion(): string {
        return this.policyEngine.policyVersion;
    }

    public process(request: ProcessRequest): ProcessResult {
        try {
            return this.mediate(request);
        } catch (err) {
            throw ErrorSanitizer.sanitize(err, 'IccpEngine.process');
        }
    }

    /**
     * Stops accepting requests' audit entries and waits for the queue to drain.
     */
    public async shutdown(): Promise<void> {
        await this.options.pipeline.stop();
    }

    private mediate(request: ProcessRequest): ProcessResult {
        const { identity } = request;
        const traceId = request.traceId ?? newTraceId();
        const model = request.model ?? this.model;
        const now = this.now();
        const log = getContextLogger(identity, traceId);

        // Refuse before touching freshness or correlation state.
        this.options.pipeline.assertAccepting(traceId);

        const authorization = this.policyEngine.evaluate(identity, request.requestedResources ?? []);

        const view = this.filter.apply(request.records ?? {}, authorization, identity);
        const renderedContext = renderFilteredView(view, this.registry);
        const ttlStatus = this.freshness.accessAll(authorization.authorized.map(id => this.registry.describe(id)));

        const contextPacket = buildContextPacket({
            traceId,
            identity,
            authorization,
            policy: this.options.policy,
            model,
            ttlStatus,
            now,
        });
        this.options.correlation.recordPacket(contextPacket);

        this.options.pipeline.enqueue(buildAuditEntry({
            traceId,
            identity,
            authorization,
            modelInvoked: model.modelId,
            ttlStatus,
            now,
        }));

        log.info({
            decision: authorization.decision,
            authorized: authorization.authorized.length,
            denied: authorization.denied.length,
            masked: authorization.maskedFields.length
        }, 'Context mediated');

        return Object.freeze({
            traceId,
            accessLevel: accessLevelFor(authorization.decision),
            decision: authorization.decision,
            view,
            renderedContext,
            contextPacket,
            maskedFields: authorization.maskedFields,
            deniedResources: authorization.denied,
        });
    }
}
