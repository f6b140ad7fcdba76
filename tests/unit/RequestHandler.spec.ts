/**
 * Unit Tests: Service Request Handler
 *
 * @see services/iccp-engine/src/requestHandler.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { handleRequestLine, serveLines } from '../../services/iccp-engine/src/requestHandler.js';
import { logDestination } from '../../libs/logging/logger.js';
import { IccpEngine } from '../../libs/engine/iccpEngine.js';
import { AuditPipeline } from '../../libs/audit/pipeline.js';
import { MemoryAuditSink } from '../../libs/audit/sinks/memorySink.js';
import { CorrelationStore } from '../../libs/correlation/correlationStore.js';
import { computePolicyHash } from '../../libs/packet/contextPacket.js';
import { Role } from '../../libs/context/identity.js';
import { TEST_POLICY } from '../helpers/fixtures.js';

describe('handleRequestLine', () => {
    let engine: IccpEngine;

    beforeEach(() => {
        const memory = new MemoryAuditSink();
        engine = new IccpEngine({
            policy: TEST_POLICY,
            pipeline: new AuditPipeline([memory]),
            correlation: new CorrelationStore(memory),
        });
    });

    it('mediates a well-formed request', () => {
        const response = handleRequestLine(engine, JSON.stringify({
            identity: { userId: 's-200', role: 'student' },
            requestedResources: ['classes', 'grades'],
            records: { classes: [{ class_id: 'c-1', name: 'Algebra' }] },
            traceId: 'tr-0000abcd',
        }));

        assert.deepStrictEqual(response, {
            ok: true,
            traceId: 'tr-0000abcd',
            accessLevel: 'partial',
            decision: 'ALLOW_PARTIAL',
            renderedContext: '=== GRADES ===\n  [ACCESS DENIED: role student cannot access grades]\n\n=== CLASSES ===\n  class_id: c-1 | name: Algebra',
            maskedFields: [],
            deniedResources: ['grades'],
            policyHash: computePolicyHash(Role.Student, ['classes'], 'v1.0.0'),
        });
    });

    it('answers malformed JSON with a sanitized error', () => {
        const response = handleRequestLine(engine, '{"identity":');

        assert.strictEqual(response.ok, false);
        if (!response.ok) {
            assert.strictEqual(response.error.code, 'INVALID_REQUEST');
            assert.match(response.error.incidentId, /^[0-9a-f-]{36}$/);
        }
    });

    it('rejects invalid identities', () => {
        const response = handleRequestLine(engine, JSON.stringify({ identity: { userId: '', role: 'admin' } }));

        assert.strictEqual(response.ok, false);
        if (!response.ok) {
            assert.strictEqual(response.error.code, 'INVALID_IDENTITY');
        }
    });

    it('rejects unexpected request keys', () => {
        const response = handleRequestLine(engine, JSON.stringify({ identity: { userId: 'a-001', role: 'admin' }, sql: 'select 1' }));

        assert.strictEqual(response.ok, false);
        if (!response.ok) {
            assert.strictEqual(response.error.code, 'INVALID_REQUEST');
        }
    });

    it('reports a stopped pipeline', async () => {
        await engine.shutdown();

        const response = handleRequestLine(engine, JSON.stringify({ identity: { userId: 'a-001', role: 'admin' } }));

        assert.deepStrictEqual(response.ok ? null : response.error.code, 'AUDIT_PIPELINE_STOPPED');
    });
});

describe('serveLines', () => {
    async function* feed(lines: string[]): AsyncGenerator<string> {
        yield* lines;
    }

    function engineWithMemory(): IccpEngine {
        const memory = new MemoryAuditSink();
        return new IccpEngine({
            policy: TEST_POLICY,
            pipeline: new AuditPipeline([memory]),
            correlation: new CorrelationStore(memory),
        });
    }

    it('writes exactly one response object per request line and nothing else', async () => {
        const written: string[] = [];
        const answered = await serveLines(engineWithMemory(), feed([
            JSON.stringify({ identity: { userId: 'a-001', role: 'admin' }, requestedResources: ['classes'], traceId: 'tr-00000a01' }),
            '   ',
            'not json',
        ]), { write: (line: string) => written.push(line) });

        assert.strictEqual(answered, 2);
        assert.strictEqual(written.length, 2);
        assert.ok(written.every(chunk => chunk.endsWith('\n') && chunk.indexOf('\n') === chunk.length - 1));

        assert.deepStrictEqual(written.map(chunk => JSON.parse(chunk).ok), [true, false]);
        assert.strictEqual(JSON.parse(written[0] ?? '').traceId, 'tr-00000a01');
        assert.strictEqual(JSON.parse(written[1] ?? '').error.code, 'INVALID_REQUEST');
    });

    it('stops answering once the engine is shut down', async () => {
        const engine = engineWithMemory();
        await engine.shutdown();
        const written: string[] = [];

        const answered = await serveLines(engine, feed([
            JSON.stringify({ identity: { userId: 'a-001', role: 'admin' } }),
        ]), { write: (line: string) => written.push(line) });

        assert.strictEqual(answered, 0);
        assert.deepStrictEqual(written, []);
    });

    it('keeps operational logs off stdout', () => {
        assert.strictEqual(logDestination.fd, 2);
    });
});
