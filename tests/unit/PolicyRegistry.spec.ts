import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { PolicyRegistry } from '../../libs/rbac/registry.js';
import { AccessPolicy, definePolicy } from '../../libs/rbac/policy.js';
import { createDefaultRegistry, defaultPolicies } from '../../libs/rbac/defaultPolicies.js';
import { PolicyConfigurationError } from '../../libs/errors/accessErrors.js';
import { Role } from '../../libs/rbac/roles.js';

describe('PolicyRegistry', () => {
    let registry: PolicyRegistry;
    const jiraRead = definePolicy({ policyId: 'ic-jira', role: Role.IC, resource: 'mcp_jira', accessLevel: 'read' });

    beforeEach(() => {
        registry = new PolicyRegistry();
    });

    it('indexes a policy by role and by resource', () => {
        registry.register(jiraRead);

        assert.deepStrictEqual(registry.forRole(Role.IC), [jiraRead]);
        assert.deepStrictEqual(registry.forResource('mcp_jira'), [jiraRead]);
        assert.strictEqual(registry.get('ic-jira'), jiraRead);
        assert.strictEqual(registry.size, 1);
    });

    it('rejects a duplicate policy id', () => {
        registry.register(jiraRead);

        assert.throws(
            () => registry.register(definePolicy({ policyId: 'ic-jira', role: Role.MANAGER, resource: 'mcp_github', accessLevel: 'read' })),
            (err: unknown) => err instanceof PolicyConfigurationError
                && err.code === 'POLICY_DUPLICATE_ID'
                && err.policyId === 'ic-jira'
        );
        assert.strictEqual(registry.size, 1);
    });

    it('rejects an unknown resource', () => {
        const bogus: AccessPolicy = JSON.parse(JSON.stringify({ ...jiraRead, policyId: 'bogus', resource: 'payroll' }));

        assert.throws(
            () => registry.register(bogus),
            (err: unknown) => err instanceof PolicyConfigurationError && err.code === 'POLICY_UNKNOWN_RESOURCE'
        );
    });

    it('rejects an unknown role', () => {
        const bogus: AccessPolicy = JSON.parse(JSON.stringify({ ...jiraRead, policyId: 'bogus', role: 9 }));

        assert.throws(
            () => registry.register(bogus),
            (err: unknown) => err instanceof PolicyConfigurationError && err.code === 'POLICY_UNKNOWN_ROLE'
        );
    });

    it('rejects an unknown access level', () => {
        const bogus: AccessPolicy = JSON.parse(JSON.stringify({ ...jiraRead, policyId: 'bogus', accessLevel: 'owner' }));

        assert.throws(
            () => registry.register(bogus),
            (err: unknown) => err instanceof PolicyConfigurationError && err.code === 'POLICY_INVALID_LEVEL'
        );
    });

    it('removes an unregistered policy from both indexes', () => {
        registry.register(jiraRead);

        assert.strictEqual(registry.unregister('ic-jira'), true);
        assert.deepStrictEqual(registry.forRole(Role.IC), []);
        assert.deepStrictEqual(registry.forResource('mcp_jira'), []);
        assert.strictEqual(registry.get('ic-jira'), undefined);
    });

    it('reports false when unregistering an unknown id', () => {
        assert.strictEqual(registry.unregister('missing'), false);
    });

    it('leaves an earlier snapshot untouched by later changes', () => {
        registry.register(jiraRead);
        const before = registry.snapshot();

        registry.unregister('ic-jira');

        assert.strictEqual(before.byId.has('ic-jira'), true);
        assert.strictEqual(registry.snapshot().byId.has('ic-jira'), false);
    });

    it('keeps registration order within a resource', () => {
        const github = definePolicy({ policyId: 'a', role: Role.IC, resource: 'mcp_github', accessLevel: 'read' });
        const githubManager = definePolicy({ policyId: 'b', role: Role.MANAGER, resource: 'mcp_github', accessLevel: 'read' });
        registry.registerAll([github, githubManager]);

        assert.deepStrictEqual(registry.forResource('mcp_github').map(p => p.policyId), ['a', 'b']);
    });

    it('freezes defined policies and their conditions', () => {
        const policy = definePolicy({
            policyId: 'frozen',
            role: Role.IC,
            resource: 'knowledge_team',
            accessLevel: 'read',
            conditions: { sameTeam: true }
        });

        assert.strictEqual(Object.isFrozen(policy), true);
        assert.strictEqual(Object.isFrozen(policy.conditions), true);
        assert.strictEqual(policy.priority, 0);
        assert.strictEqual(policy.enabled, true);
        assert.strictEqual(policy.description, '');
    });
});

describe('default policy set', () => {
    it('registers every default policy exactly once', () => {
        const ids = defaultPolicies().map(p => p.policyId);

        assert.strictEqual(ids.length, 39);
        assert.strictEqual(new Set(ids).size, ids.length);
        assert.strictEqual(createDefaultRegistry().size, 39);
    });

    it('builds an independent registry per call', () => {
        const first = createDefaultRegistry();
        const second = createDefaultRegistry();

        first.unregister('ic-chat');

        assert.strictEqual(second.get('ic-chat')?.policyId, 'ic-chat');
    });
});
