import { LRUCache } from 'lru-cache';
import type { ContextPacket } from '../packet/contextPacket.js';
import type { AuditLogEntry } from '../audit/schema.js';
import type { MemoryAuditSink } from '../audit/sinks/memorySink.js';

const DEFAULT_PACKET_CAPACITY = 1000;

/**
 * Trace id → context packet and audit entry. Packets live in a bounded LRU;
 * audit entries are read from the in-memory audit sink, so an entry is
 * visible here only once the dispatcher has delivered it.
 */
export class CorrelationStore {
    private readonly packets: LRUCache<string, ContextPacket>;

    constructor(
        private readonly auditBuffer: MemoryAuditSink,
        packetCapacity: number = DEFAULT_PACKET_CAPACITY
    ) {
        this.packets = new LRUCache<string, ContextPacket>({ max: packetCapacity });
    }

    public recordPacket(packet: ContextPacket): void {
        this.packets.set(packet.traceId, packet);
    }

    public getPacket(traceId: string): ContextPacket | undefined {
        return this.packets.get(traceId);
    }

    public getAuditEntry(traceId: string): AuditLogEntry | undefined {
        return this.auditBuffer.getByTraceId(traceId);
    }

    public listAuditEntries(limit?: number): AuditLogEntry[] {
        return this.auditBuffer.list(limit);
    }

    public get packetCount(): number {
        return this.packets.size;
    }
}
