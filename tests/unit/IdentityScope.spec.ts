/**
 * Unit Tests: Identity Scope
 *
 * @see libs/context/identity.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { buildIdentityScope, clearanceFor, parseRole, Role } from '../../libs/context/identity.js';
import { IccpError } from '../../libs/errors/sanitizer.js';

const NOW = new Date('2026-03-02T09:30:00.000Z');

const isErrorWithCode = (code: string) => (err: unknown): boolean =>
    err instanceof IccpError && err.code === code;

describe('IdentityScope', () => {
    it('narrows role strings case-insensitively', () => {
        assert.strictEqual(parseRole(' ADMIN '), Role.Admin);
        assert.strictEqual(parseRole('Teacher'), Role.Teacher);
        assert.strictEqual(parseRole('student'), Role.Student);
        assert.strictEqual(parseRole('janitor'), Role.Unrecognized);
        assert.strictEqual(parseRole(''), Role.Unrecognized);
    });

    it('derives clearance from role', () => {
        assert.strictEqual(clearanceFor(Role.Admin), 'Full-Access');
        assert.strictEqual(clearanceFor(Role.Teacher), 'Department-Scoped');
        assert.strictEqual(clearanceFor(Role.Student), 'Self-Scoped');
        assert.strictEqual(clearanceFor(Role.Unrecognized), 'Unauthorized');
    });

    it('fills session defaults', () => {
        const scope = buildIdentityScope({ userId: 't-100', role: 'Teacher' }, NOW);

        assert.strictEqual(scope.userId, 't-100');
        assert.strictEqual(scope.role, Role.Teacher);
        assert.strictEqual(scope.clearance, 'Department-Scoped');
        assert.match(scope.sessionContext.sessionId, /^sess-[0-9a-f]{8}$/);
        assert.strictEqual(scope.sessionContext.originAddress, '0.0.0.0');
        assert.strictEqual(scope.sessionContext.clientLabel, 'iccp-client/1.0');
        assert.strictEqual(scope.sessionContext.requestTimestamp, '2026-03-02T09:30:00.000Z');
    });

    it('keeps supplied session context', () => {
        const scope = buildIdentityScope({
            userId: 's-200',
            role: 'student',
            sessionContext: {
                sessionId: 'sess-fixed',
                originAddress: '10.0.0.8',
                requestTimestamp: '2026-03-01T08:00:00.000Z',
                clientLabel: 'portal/2.1',
            },
        }, NOW);

        assert.deepStrictEqual(scope.sessionContext, {
            sessionId: 'sess-fixed',
            originAddress: '10.0.0.8',
            requestTimestamp: '2026-03-01T08:00:00.000Z',
            clientLabel: 'portal/2.1',
        });
    });

    it('maps unknown roles to unrecognized with no clearance', () => {
        const scope = buildIdentityScope({ userId: 'x-1', role: 'janitor' }, NOW);

        assert.strictEqual(scope.role, Role.Unrecognized);
        assert.strictEqual(scope.clearance, 'Unauthorized');
    });

    it('is frozen', () => {
        const scope = buildIdentityScope({ userId: 't-100', role: 'teacher' }, NOW);

        assert.ok(Object.isFrozen(scope));
        assert.ok(Object.isFrozen(scope.sessionContext));
        assert.strictEqual(Reflect.set(scope, 'role', Role.Admin), false);
        assert.strictEqual(scope.role, Role.Teacher);
    });

    it('rejects malformed input', () => {
        assert.throws(() => buildIdentityScope({ userId: '', role: 'admin' }, NOW), isErrorWithCode('INVALID_IDENTITY'));
        assert.throws(() => buildIdentityScope({ role: 'admin' }, NOW), isErrorWithCode('INVALID_IDENTITY'));
        assert.throws(() => buildIdentityScope('admin', NOW), isErrorWithCode('INVALID_IDENTITY'));
    });

    it('rejects unexpected identity keys', () => {
        assert.throws(
            () => buildIdentityScope({ userId: 'a-001', role: 'admin', password: 'test-secret' }, NOW),
            isErrorWithCode('INVALID_IDENTITY')
        );
    });

    it('lists every failing path in the error message', () => {
        try {
            buildIdentityScope({ userId: '', sessionContext: { requestTimestamp: 'yesterday' } }, NOW);
            assert.fail('expected validation failure');
        } catch (err) {
            assert.ok(err instanceof IccpError);
            assert.ok(err.publicMessage.startsWith('Validation violation in IdentityScope: '));
            assert.ok(err.publicMessage.includes('userId: '));
            assert.ok(err.publicMessage.includes('role: Required'));
            assert.ok(err.publicMessage.includes('sessionContext.requestTimestamp: '));
        }
    });
});
