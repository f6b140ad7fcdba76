/**
 * Unit Tests: Audit Log Verifier
 *
 * @see libs/audit/integrity.ts
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { verifyAuditLog } from '../../libs/audit/integrity.js';
import { sanitizeAuditEntry } from '../../libs/audit/redaction.js';
import { sampleEntry } from '../helpers/fixtures.js';

describe('verifyAuditLog', () => {
    let tmpDir: string;

    const writeLog = (name: string, lines: string[]): string => {
        const filePath = path.join(tmpDir, name);
        fs.writeFileSync(filePath, lines.map(line => line + '\n').join(''));
        return filePath;
    };

    before(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'iccp-verify-'));
    });

    after(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('accepts a missing log', () => {
        assert.deepStrictEqual(verifyAuditLog(path.join(tmpDir, 'absent.jsonl')), { valid: true, entries: 0 });
    });

    it('accepts sanitized entries', () => {
        const filePath = writeLog('good.jsonl', [
            JSON.stringify(sanitizeAuditEntry(sampleEntry('tr-00000001'))),
            JSON.stringify(sanitizeAuditEntry({ ...sampleEntry('tr-00000002'), explanation: 'id 000-12-3456' })),
        ]);

        assert.deepStrictEqual(verifyAuditLog(filePath), { valid: true, entries: 2 });
    });

    it('stops at the first unparsable line', () => {
        const filePath = writeLog('truncated.jsonl', [
            JSON.stringify(sampleEntry('tr-00000001')),
            '{"traceId":"tr-00000002",',
            JSON.stringify(sampleEntry('tr-00000003')),
        ]);

        const result = verifyAuditLog(filePath);

        assert.strictEqual(result.valid, false);
        assert.strictEqual(result.entries, 1);
        assert.strictEqual(result.violationIndex, 1);
        assert.ok(result.reason?.startsWith('Format error at line 2: '));
    });

    it('rejects entries without a trace id', () => {
        const { traceId: _traceId, ...withoutTrace } = sampleEntry();
        const filePath = writeLog('no-trace.jsonl', [JSON.stringify(withoutTrace)]);

        const result = verifyAuditLog(filePath);

        assert.strictEqual(result.valid, false);
        assert.strictEqual(result.violationIndex, 0);
        assert.strictEqual(result.reason, 'Schema violation at line 1: traceId: Required');
    });

    it('rejects entries that still carry identity numbers', () => {
        const filePath = writeLog('leaky.jsonl', [
            JSON.stringify({ ...sampleEntry('tr-00000009'), explanation: 'id 000-12-3456' }),
        ]);

        assert.deepStrictEqual(verifyAuditLog(filePath), {
            valid: false,
            entries: 0,
            violationIndex: 0,
            reason: 'Sensitive pattern at line 1 (trace tr-00000009)',
        });
    });
});
