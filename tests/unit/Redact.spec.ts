import { describe, it } from 'node:test';
import assert from 'node:assert';
import { REDACT_CENSOR, REDACT_KEYS } from '../../libs/logging/redactionConfig.js';
import pino from 'pino';
import { Writable } from 'stream';

function captureLogger() {
    const lines: Record<string, unknown>[] = [];
    const stream = new Writable({
        write(chunk, _encoding, callback) {
            lines.push(JSON.parse(chunk.toString()));
            callback();
        }
    });

    const testLogger = pino({
        redact: {
            paths: REDACT_KEYS,
            censor: REDACT_CENSOR
        }
    }, stream);

    return { testLogger, lines };
}

describe('Log Redaction', () => {
    it('should redact credentials in objects', () => {
        const { testLogger, lines } = captureLogger();

        testLogger.info({
            password: 'test-secret',
            authorization: 'Bearer test-token',
            nested: {
                secret: 'test-secret',
                other: 'safe'
            },
            visible: 'ok'
        }, 'test message');

        const log = lines[0];
        assert.ok(log);
        assert.strictEqual(log['password'], REDACT_CENSOR);
        assert.strictEqual(log['authorization'], REDACT_CENSOR);
        assert.deepStrictEqual(log['nested'], { secret: REDACT_CENSOR, other: 'safe' });
        assert.strictEqual(log['visible'], 'ok');
    });

    it('should redact institutional record values', () => {
        const { testLogger, lines } = captureLogger();

        testLogger.info({
            ssn: '000-00-0001',
            person: { annual_salary: 50000, bank_account: 'ACCT-1', name: 'Jordan Sample' },
            rows: [{ person_id: 't-100' }],
            resourceId: 'financial_information'
        }, 'record access');

        const log = lines[0];
        assert.ok(log);
        assert.strictEqual(log['ssn'], REDACT_CENSOR);
        assert.deepStrictEqual(log['person'], {
            annual_salary: REDACT_CENSOR,
            bank_account: REDACT_CENSOR,
            name: 'Jordan Sample'
        });
        assert.strictEqual(log['rows'], REDACT_CENSOR);
        assert.strictEqual(log['resourceId'], 'financial_information');
    });
});
