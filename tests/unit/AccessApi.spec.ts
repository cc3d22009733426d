import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import type { Server } from 'http';
import { createAccessApp } from '../../services/access-api/src/app.js';
import { CLAIMS_HEADER } from '../../services/access-api/src/gatewayClaims.js';
import { bootstrap } from '../../libs/bootstrap/startup.js';
import { loadAccessConfig } from '../../libs/bootstrap/config.js';

type FetchResponse = Awaited<ReturnType<typeof fetch>>;

async function readJson(response: FetchResponse): Promise<Record<string, unknown>> {
    const body: unknown = await response.json();
    assert.ok(body !== null && typeof body === 'object' && !Array.isArray(body));
    return Object.fromEntries(Object.entries(body));
}

function claims(payload: Record<string, unknown>): string {
    return Buffer.from(JSON.stringify(payload), 'utf8').toString('base64url');
}

describe('access-api', () => {
    let server: Server;
    let baseUrl: string;

    before(async () => {
        const env = { NODE_ENV: 'test', RBAC_ALLOW_DEMO_ROLE: 'true' };
        const config = loadAccessConfig(env);
        const core = await bootstrap('access-api-test', config, env);

        server = createAccessApp(core, config).listen(0, '127.0.0.1');
        await new Promise<void>(resolve => server.once('listening', () => resolve()));
        const address = server.address();
        assert.ok(address !== null && typeof address === 'object');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    after(async () => {
        await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    });

    it('should report health with the policy count', async () => {
        const response = await fetch(`${baseUrl}/healthz`);

        assert.strictEqual(response.status, 200);
        assert.deepStrictEqual(await readJson(response), { status: 'ok', policies: 39 });
    });

    it('should bootstrap an anonymous caller as a new employee', async () => {
        const response = await fetch(`${baseUrl}/v1/rbac/bootstrap`);
        const body = await readJson(response);

        assert.strictEqual(response.status, 200);
        assert.deepStrictEqual(body.user, {
            id: 'anonymous',
            name: null,
            email: null,
            role: 'NEW_EMPLOYEE',
            team_id: '',
            department_id: '',
            organization_id: ''
        });
    });

    it('should apply the demo role header outside production', async () => {
        const response = await fetch(`${baseUrl}/v1/rbac/bootstrap`, {
            headers: { [CLAIMS_HEADER]: claims({ sub: 'alice', role: 'IC' }), 'x-demo-role': 'manager' }
        });
        const body = await readJson(response);

        assert.deepStrictEqual(body.user, {
            id: 'alice',
            name: null,
            email: null,
            role: 'MANAGER',
            team_id: '',
            department_id: '',
            organization_id: 'default'
        });
    });

    it('should answer an access check', async () => {
        const response = await fetch(`${baseUrl}/v1/rbac/check`, {
            method: 'POST',
            headers: {
                'content-type': 'application/json',
                [CLAIMS_HEADER]: claims({ sub: 'alice', role: 'IC', team_id: 'platform' })
            },
            body: JSON.stringify({ resource: 'knowledge_team', attributes: { teamId: 'platform' } })
        });

        assert.strictEqual(response.status, 200);
        assert.deepStrictEqual(await readJson(response), {
            allowed: true,
            reason: 'Access granted by policy',
            policyId: 'ic-team-knowledge-read',
            accessLevel: 'read',
            scopeFilters: { team_id: 'platform' }
        });
    });

    it('should accept collaborator attributes on an access check', async () => {
        const response = await fetch(`${baseUrl}/v1/rbac/check`, {
            method: 'POST',
            headers: {
                'content-type': 'application/json',
                [CLAIMS_HEADER]: claims({ sub: 'alice', role: 'IC', team_id: 'platform' })
            },
            body: JSON.stringify({ resource: 'knowledge_team', attributes: { teamId: 'platform', documentId: 'doc-7' } })
        });
        const body = await readJson(response);

        assert.strictEqual(response.status, 200);
        assert.strictEqual(body.allowed, true);
        assert.strictEqual(body.policyId, 'ic-team-knowledge-read');
    });

    it('should reject a malformed check body with 400', async () => {
        const response = await fetch(`${baseUrl}/v1/rbac/check`, {
            method: 'POST',
            headers: { 'content-type': 'application/json' },
            body: JSON.stringify({ resource: 'payroll' })
        });
        const body = await readJson(response);

        assert.strictEqual(response.status, 400);
        assert.strictEqual(body.error, 'REQUEST_INVALID');
    });

    it('should reject an unreadable claims header with 400', async () => {
        const response = await fetch(`${baseUrl}/v1/rbac/permissions`, {
            headers: { [CLAIMS_HEADER]: '%%%' }
        });
        const body = await readJson(response);

        assert.strictEqual(response.status, 400);
        assert.strictEqual(body.error, 'IDENTITY_PAYLOAD_INVALID');
    });

    it('should filter a chat answer for a contributor', async () => {
        const response = await fetch(`${baseUrl}/v1/rbac/chat/filter`, {
            method: 'POST',
            headers: {
                'content-type': 'application/json',
                [CLAIMS_HEADER]: claims({ sub: 'alice', role: 'IC', team_id: 'platform' })
            },
            body: JSON.stringify({
                response: 'Budget: $40K',
                sources: [{ title: 'Plan', type: 'department_doc', department_id: 'sales' }]
            })
        });

        assert.deepStrictEqual(await readJson(response), {
            response: '[BUDGET REDACTED]',
            sources: [{ title: '[Restricted]', type: 'department_doc', access_denied: true }]
        });
    });
});
