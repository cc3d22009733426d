import { describe, it } from 'node:test';
import assert from 'node:assert';
import { filterResponseForUser, redactSensitiveContent } from '../../libs/guards/index.js';
import { Role } from '../../libs/rbac/roles.js';
import { makeContext } from '../support/contexts.js';

describe('redactSensitiveContent', () => {
    it('redacts every figure pattern below manager', () => {
        const text = 'Salary: $120,000; compensation $140,000; Revenue $3B; budget: $450K';

        assert.strictEqual(
            redactSensitiveContent(Role.IC, text),
            '[SALARY REDACTED]; [COMPENSATION REDACTED]; [REVENUE REDACTED]; [BUDGET REDACTED]'
        );
    });

    it('leaves text without a dollar figure alone', () => {
        assert.strictEqual(redactSensitiveContent(Role.NEW_EMPLOYEE, 'salary bands are reviewed yearly'), 'salary bands are reviewed yearly');
    });

    it('does not touch text for managers and above', () => {
        assert.strictEqual(redactSensitiveContent(Role.MANAGER, 'salary: $1'), 'salary: $1');
        assert.strictEqual(redactSensitiveContent(Role.CEO, 'salary: $1'), 'salary: $1');
    });

    it('is stable on its own output', () => {
        const once = redactSensitiveContent(Role.IC, 'salary: $99,000');
        assert.strictEqual(redactSensitiveContent(Role.IC, once), once);
    });
});

describe('filterResponseForUser', () => {
    const payload = {
        name: 'Alice',
        base_salary: 120000,
        contact: {
            Personal_Email: 'alice@home.example',
            work_email: 'alice@example.com'
        },
        history: [
            { year: 2024, compensation_total: 150000 },
            'note'
        ]
    };

    it('redacts sensitive keys at any nesting for contributors', () => {
        assert.deepStrictEqual(filterResponseForUser(payload, makeContext(Role.IC)), {
            name: 'Alice',
            base_salary: '[REDACTED]',
            contact: {
                Personal_Email: '[REDACTED]',
                work_email: 'alice@example.com'
            },
            history: [
                { year: 2024, compensation_total: '[REDACTED]' },
                'note'
            ]
        });
    });

    it('returns everything to leadership', () => {
        assert.deepStrictEqual(filterResponseForUser(payload, makeContext(Role.LEADERSHIP)), payload);
    });

    it('accepts a custom field list', () => {
        assert.deepStrictEqual(
            filterResponseForUser({ badge_id: 7, base_salary: 1 }, makeContext(Role.IC), ['badge']),
            { badge_id: '[REDACTED]', base_salary: 1 }
        );
    });

    it('stops descending past ten levels', () => {
        let deep: Record<string, unknown> = { ssn: '000-00-0000' };
        for (let i = 0; i < 11; i++) {
            deep = { child: deep };
        }

        let cursor: unknown = filterResponseForUser(deep, makeContext(Role.IC));
        for (let i = 0; i < 11; i++) {
            assert.ok(typeof cursor === 'object' && cursor !== null && 'child' in cursor);
            cursor = cursor.child;
        }
        assert.deepStrictEqual(cursor, { ssn: '000-00-0000' });
    });
});
