import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    ANONYMOUS_USER_ID,
    ContextBuilder,
    OrgDirectory,
    StaticOrgDirectory
} from '../../libs/context/contextBuilder.js';
import { InvalidIdentityPayloadError } from '../../libs/errors/accessErrors.js';
import type { DirectoryEntryInput } from '../../libs/validation/identitySchema.js';
import { Role } from '../../libs/rbac/roles.js';
import { makeContext } from '../support/contexts.js';

const ENTRIES: DirectoryEntryInput[] = [
    {
        userId: 'mona',
        role: 'manager',
        teamId: 'platform',
        departmentId: 'engineering',
        organizationId: 'acme',
        email: 'mona@example.com',
        name: 'Mona',
        managerId: 'lee',
        directReports: ['alice', 'bob'],
        projectIds: ['apollo']
    },
    { userId: 'alice', role: 'IC', teamId: 'platform', departmentId: 'engineering' }
];

class CountingDirectory implements OrgDirectory {
    public lookups = 0;
    private readonly inner = new StaticOrgDirectory(ENTRIES);

    public async lookup(userId: string): Promise<DirectoryEntryInput | null> {
        this.lookups++;
        return this.inner.lookup(userId);
    }
}

class BrokenDirectory implements OrgDirectory {
    public async lookup(): Promise<DirectoryEntryInput | null> {
        throw new Error('directory offline');
    }
}

describe('ContextBuilder', () => {
    describe('fromTokenPayload()', () => {
        it('should fill what the token leaves out from the directory', async () => {
            const builder = new ContextBuilder({ directory: new StaticOrgDirectory(ENTRIES) });
            const context = await builder.fromTokenPayload({ sub: 'mona' }, { sessionId: 'sess-1' });

            assert.strictEqual(context.role, Role.MANAGER);
            assert.strictEqual(context.teamId, 'platform');
            assert.strictEqual(context.organizationId, 'acme');
            assert.strictEqual(context.managerId, 'lee');
            assert.deepStrictEqual(context.directReports, ['alice', 'bob']);
            assert.deepStrictEqual(context.projectIds, ['apollo']);
            assert.strictEqual(context.sessionId, 'sess-1');
            assert.ok(Object.isFrozen(context));
        });

        it('should prefer token claims over directory data', async () => {
            const builder = new ContextBuilder({ directory: new StaticOrgDirectory(ENTRIES) });
            const context = await builder.fromTokenPayload({ sub: 'mona', role: 'leadership', team_id: 'ml' });

            assert.strictEqual(context.role, Role.LEADERSHIP);
            assert.strictEqual(context.teamId, 'ml');
            assert.strictEqual(context.departmentId, 'engineering');
        });

        it('should default an unknown role to IC and a missing org', async () => {
            const context = await new ContextBuilder().fromTokenPayload({ sub: 'zed', role: 'wizard' });

            assert.strictEqual(context.role, Role.IC);
            assert.strictEqual(context.teamId, '');
            assert.strictEqual(context.organizationId, 'default');
            assert.deepStrictEqual(context.directReports, []);
        });

        it('should reject a payload without a subject', async () => {
            await assert.rejects(
                new ContextBuilder().fromTokenPayload({ role: 'CEO' }),
                (err: unknown) => err instanceof InvalidIdentityPayloadError && err.statusCode === 400
            );
        });

        it('should degrade to token claims when the directory fails', async () => {
            const builder = new ContextBuilder({ directory: new BrokenDirectory() });
            const context = await builder.fromTokenPayload({ sub: 'mona', role: 'MANAGER', team_id: 'platform' });

            assert.strictEqual(context.role, Role.MANAGER);
            assert.strictEqual(context.teamId, 'platform');
            assert.deepStrictEqual(context.directReports, []);
        });
    });

    describe('fromUserId()', () => {
        it('should build entirely from the directory', async () => {
            const builder = new ContextBuilder({ directory: new StaticOrgDirectory(ENTRIES) });
            const context = await builder.fromUserId('alice');

            assert.strictEqual(context.role, Role.IC);
            assert.strictEqual(context.organizationId, 'default');
        });

        it('should reject an unknown user', async () => {
            const builder = new ContextBuilder({ directory: new StaticOrgDirectory(ENTRIES) });

            await assert.rejects(
                builder.fromUserId('ghost'),
                (err: unknown) => err instanceof InvalidIdentityPayloadError
                    && err.code === 'IDENTITY_USER_NOT_FOUND'
                    && err.message === 'User not found: ghost'
            );
        });
    });

    describe('caching', () => {
        it('should look each user up once, misses included', async () => {
            const directory = new CountingDirectory();
            const builder = new ContextBuilder({ directory });

            await builder.fromTokenPayload({ sub: 'mona' });
            await builder.fromTokenPayload({ sub: 'mona' });
            await builder.fromTokenPayload({ sub: 'ghost' });
            await builder.fromTokenPayload({ sub: 'ghost' });
            assert.strictEqual(directory.lookups, 2);

            builder.invalidate('mona');
            await builder.fromTokenPayload({ sub: 'mona' });
            assert.strictEqual(directory.lookups, 3);
        });
    });

    describe('resolve()', () => {
        const builder = new ContextBuilder({ directory: new StaticOrgDirectory(ENTRIES) });

        it('should prefer the token payload', async () => {
            const context = await builder.resolve({ tokenPayload: { sub: 'zed', role: 'CEO' }, userId: 'alice' });
            assert.strictEqual(context.userId, 'zed');
        });

        it('should fall back to the user id', async () => {
            const context = await builder.resolve({ userId: 'alice', tokenPayload: null });
            assert.strictEqual(context.userId, 'alice');
        });

        it('should fall back to the most restrictive context', async () => {
            const context = await builder.resolve({ session: { ipAddress: '10.0.0.1' } });

            assert.strictEqual(context.userId, ANONYMOUS_USER_ID);
            assert.strictEqual(context.role, Role.NEW_EMPLOYEE);
            assert.strictEqual(context.teamId, '');
            assert.strictEqual(context.organizationId, '');
            assert.strictEqual(context.ipAddress, '10.0.0.1');
        });
    });

    describe('enrichWithOrgChart()', () => {
        const builder = new ContextBuilder({ directory: new StaticOrgDirectory(ENTRIES) });

        it('should refresh the reporting line', async () => {
            const stale = makeContext(Role.MANAGER, { userId: 'mona', directReports: ['carol'] });
            const enriched = await builder.enrichWithOrgChart(stale);

            assert.strictEqual(enriched.managerId, 'lee');
            assert.deepStrictEqual(enriched.directReports, ['alice', 'bob']);
            assert.strictEqual(enriched.teamId, stale.teamId);
        });

        it('should keep existing reports when the directory lists none', async () => {
            const context = makeContext(Role.IC, { userId: 'alice', directReports: ['intern'] });
            const enriched = await builder.enrichWithOrgChart(context);

            assert.deepStrictEqual(enriched.directReports, ['intern']);
        });

        it('should return the same context for an unknown user', async () => {
            const context = makeContext(Role.IC, { userId: 'ghost' });
            assert.strictEqual(await builder.enrichWithOrgChart(context), context);
        });
    });
});
