/**
 * ICCP Engine
 * Public surface: build an engine, mediate requests, read the trail back.
 */

export { IccpEngine, accessLevelFor, newTraceId } from './iccpEngine.js';
export type { AccessLevel, IccpEngineOptions, ProcessRequest, ProcessResult } from './iccpEngine.js';
export { createIccpEngine } from './createEngine.js';

export { loadIccpConfig } from '../config/iccpConfig.js';
export type { IccpConfig } from '../config/iccpConfig.js';

export { Role, buildIdentityScope, parseRole, clearanceFor } from '../context/identity.js';
export type { IdentityScope, Clearance, SessionContext } from '../context/identity.js';

export { ResourceRegistry, UnknownResourceError, defaultRegistry } from '../registry/resourceRegistry.js';
export type { ResourceDescriptor } from '../registry/resources.js';

export * from '../policy/index.js';

export { DataFilter } from '../filter/dataFilter.js';
export type { FilteredView, ResourceView, RawRecords } from '../filter/dataFilter.js';
export { renderFilteredView } from '../filter/render.js';

export { buildContextPacket, computePolicyHash, DEFAULT_MODEL } from '../packet/contextPacket.js';
export type { ContextPacket, ModelDescriptor } from '../packet/contextPacket.js';

export { FreshnessTracker } from '../freshness/freshnessTracker.js';
export type { TtlStatus, TtlStatusMap } from '../freshness/freshnessTracker.js';

export { AuditPipeline } from '../audit/pipeline.js';
export type { AuditLogEntry } from '../audit/schema.js';
export { FileAuditSink } from '../audit/sinks/fileSink.js';
export { MemoryAuditSink } from '../audit/sinks/memorySink.js';
export { ConsoleAuditSink } from '../audit/sinks/consoleSink.js';
export type { AuditSink } from '../audit/sinks/sink.js';
export { verifyAuditLog } from '../audit/integrity.js';

export { CorrelationStore } from '../correlation/correlationStore.js';
export { IccpError, ErrorSanitizer } from '../errors/sanitizer.js';
