import type { IccpConfig } from '../config/iccpConfig.js';
import { defaultRegistry, ResourceRegistry } from '../registry/resourceRegistry.js';
import type { IccpPolicy } from '../policy/policyProfile.js';
import { AuditPipeline } from '../audit/pipeline.js';
import type { AuditSink } from '../audit/sinks/sink.js';
import { FileAuditSink } from '../audit/sinks/fileSink.js';
import { MemoryAuditSink } from '../audit/sinks/memorySink.js';
import { ConsoleAuditSink } from '../audit/sinks/consoleSink.js';
import { CorrelationStore } from '../correlation/correlationStore.js';
import { IccpEngine } from './iccpEngine.js';

/**
 * Wires the engine with the configured sinks: JSONL file, in-memory buffer
 * (backing the correlation store) and, when enabled, the console.
 */
export function createIccpEngine(
    config: IccpConfig,
    policy: IccpPolicy,
    registry: ResourceRegistry = defaultRegistry
): IccpEngine {
    const memory = new MemoryAuditSink(config.auditMemoryCapacity);
    const sinks: AuditSink[] = [
        new FileAuditSink(config.auditLogPath, { maxAttempts: config.auditWriteAttempts }),
        memory,
    ];
    if (config.auditConsole) {
        sinks.push(new ConsoleAuditSink());
    }

    return new IccpEngine({
        policy,
        registry,
        pipeline: new AuditPipeline(sinks, {
            highWaterMark: config.auditQueueHighWater,
            sinkTimeoutMs: config.auditSinkTimeoutMs,
        }),
        correlation: new CorrelationStore(memory, config.contextPacketCapacity),
    });
}
