import { describe, it, before, after, mock } from 'node:test';
import assert from 'node:assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { bootstrap, loadDirectoryFile } from '../../libs/bootstrap/startup.js';
import { loadAccessConfig } from '../../libs/bootstrap/config.js';
import { ConfigGuardViolation } from '../../libs/bootstrap/config-guard.js';
import type { Queryable } from '../../libs/db/pool.js';
import { Role } from '../../libs/rbac/roles.js';

describe('bootstrap', () => {
    let tmpDir: string;
    let directoryFile: string;

    before(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rbac-startup-'));
        directoryFile = path.join(tmpDir, 'directory.json');
        fs.writeFileSync(directoryFile, JSON.stringify([
            { userId: 'mona', role: 'MANAGER', teamId: 'platform', directReports: ['alice'] }
        ]));
    });

    after(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should wire the default policy set with an in-memory audit trail', async () => {
        const env = { NODE_ENV: 'test' };
        const core = await bootstrap('unit', loadAccessConfig(env), env);

        assert.strictEqual(core.registry.size, 39);
        const context = await core.contextBuilder.resolve({ tokenPayload: { sub: 'alice', role: 'IC' } });
        assert.strictEqual(core.guard.checkAccess(context, 'chat', 'write').allowed, true);
        await core.audit.flush();
    });

    it('should load the org directory named in the configuration', async () => {
        const env = { NODE_ENV: 'test', RBAC_DIRECTORY_FILE: directoryFile };
        const core = await bootstrap('unit', loadAccessConfig(env), env);

        const context = await core.contextBuilder.fromUserId('mona');
        assert.strictEqual(context.role, Role.MANAGER);
        assert.deepStrictEqual(context.directReports, ['alice']);
    });

    it('should send audit records to the postgres client when configured', async () => {
        const query = mock.fn(async (_text: string, _params?: unknown[]) => ({ rows: [] }));
        const auditClient: Queryable = { query: query as unknown as Queryable['query'] };
        const env = { NODE_ENV: 'test', RBAC_AUDIT_SINK: 'postgres' };

        const core = await bootstrap('unit', loadAccessConfig(env), env, { auditClient });
        const context = await core.contextBuilder.resolve({});
        core.guard.checkAccess(context, 'onboarding_flows', 'read');
        await core.audit.flush();

        assert.strictEqual(query.mock.callCount(), 2);
        assert.match(query.mock.calls[1]?.arguments[0] ?? '', /^INSERT INTO rbac_audit_log /);
    });

    it('should refuse to start in production without the postgres audit trail', async () => {
        const env = { NODE_ENV: 'production' };

        await assert.rejects(bootstrap('unit', loadAccessConfig(env), env), ConfigGuardViolation);
    });
});

describe('loadDirectoryFile', () => {
    it('should reject entries without a user id', async () => {
        const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'rbac-dir-')), 'bad.json');
        fs.writeFileSync(file, JSON.stringify([{ role: 'IC' }]));

        try {
            await assert.rejects(loadDirectoryFile(file), /^Error: Validation failed in directory file /);
        } finally {
            fs.rmSync(path.dirname(file), { recursive: true, force: true });
        }
    });
});
