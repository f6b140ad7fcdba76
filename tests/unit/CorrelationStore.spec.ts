/**
 * Unit Tests: Correlation Store
 *
 * @see libs/correlation/correlationStore.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CorrelationStore } from '../../libs/correlation/correlationStore.js';
import { MemoryAuditSink } from '../../libs/audit/sinks/memorySink.js';
import { buildContextPacket } from '../../libs/packet/contextPacket.js';
import { PolicyEngine } from '../../libs/policy/policyEngine.js';
import { defaultRegistry } from '../../libs/registry/resourceRegistry.js';
import { sampleEntry, TEACHER, TEST_POLICY } from '../helpers/fixtures.js';

const engine = new PolicyEngine(TEST_POLICY, defaultRegistry);

function packet(traceId: string) {
    const identity = TEACHER();
    return buildContextPacket({ traceId, identity, authorization: engine.evaluate(identity, ['classes']), policy: TEST_POLICY });
}

describe('CorrelationStore', () => {
    it('returns recorded packets by trace id', () => {
        const store = new CorrelationStore(new MemoryAuditSink());
        const recorded = packet('tr-00000001');

        store.recordPacket(recorded);

        assert.strictEqual(store.getPacket('tr-00000001'), recorded);
        assert.strictEqual(store.getPacket('tr-00000002'), undefined);
    });

    it('evicts the least recently used packet beyond capacity', () => {
        const store = new CorrelationStore(new MemoryAuditSink(), 2);

        store.recordPacket(packet('tr-00000001'));
        store.recordPacket(packet('tr-00000002'));
        store.getPacket('tr-00000001');
        store.recordPacket(packet('tr-00000003'));

        assert.ok(store.getPacket('tr-00000001'));
        assert.strictEqual(store.getPacket('tr-00000002'), undefined);
        assert.ok(store.getPacket('tr-00000003'));
        assert.strictEqual(store.packetCount, 2);
    });

    it('reads audit entries from the memory sink', async () => {
        const memory = new MemoryAuditSink();
        const store = new CorrelationStore(memory);

        await memory.write(sampleEntry('tr-00000001'));
        await memory.write(sampleEntry('tr-00000002'));

        assert.strictEqual(store.getAuditEntry('tr-00000002')?.traceId, 'tr-00000002');
        assert.strictEqual(store.getAuditEntry('tr-00000003'), undefined);
        assert.deepStrictEqual(store.listAuditEntries(1).map(entry => entry.traceId), ['tr-00000002']);
        assert.strictEqual(store.listAuditEntries().length, 2);
    });
});
