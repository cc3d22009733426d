/**
 * Policy Registry
 *
 * Holds the active policy set in two indexes (by role, by resource).
 * Mutations are copy-on-write: a new frozen snapshot is built and swapped in,
 * so an evaluation that already holds a snapshot never observes a half-applied
 * change.
 */

import { AccessPolicy } from './policy.js';
import { Role, isRole } from './roles.js';
import { ResourceType, isResourceType, isAccessLevel } from './resources.js';
import { PolicyConfigurationError } from '../errors/accessErrors.js';

export interface PolicySnapshot {
    readonly byId: ReadonlyMap<string, AccessPolicy>;
    readonly byRole: ReadonlyMap<Role, readonly AccessPolicy[]>;
    readonly byResource: ReadonlyMap<ResourceType, readonly AccessPolicy[]>;
}

const EMPTY: readonly AccessPolicy[] = Object.freeze([]);

function buildSnapshot(policies: Iterable<AccessPolicy>): PolicySnapshot {
    const byId = new Map<string, AccessPolicy>();
    const byRole = new Map<Role, AccessPolicy[]>();
    const byResource = new Map<ResourceType, AccessPolicy[]>();

    for (const policy of policies) {
        byId.set(policy.policyId, policy);

        const roleBucket = byRole.get(policy.role) ?? [];
        roleBucket.push(policy);
        byRole.set(policy.role, roleBucket);

        const resourceBucket = byResource.get(policy.resource) ?? [];
        resourceBucket.push(policy);
        byResource.set(policy.resource, resourceBucket);
    }

    for (const bucket of byRole.values()) Object.freeze(bucket);
    for (const bucket of byResource.values()) Object.freeze(bucket);

    return Object.freeze({ byId, byRole, byResource });
}

export class PolicyRegistry {
    private current: PolicySnapshot = buildSnapshot([]);

    /**
     * Register a policy. Fails on a duplicate id or on a role, resource or
     * level outside the closed vocabularies.
     */
    public register(policy: AccessPolicy): void {
        this.assertWellFormed(policy);

        if (this.current.byId.has(policy.policyId)) {
            throw new PolicyConfigurationError(
                'POLICY_DUPLICATE_ID',
                policy.policyId,
                `Policy ${policy.policyId} is already registered`
            );
        }

        this.current = buildSnapshot([...this.current.byId.values(), policy]);
    }

    public registerAll(policies: Iterable<AccessPolicy>): void {
        for (const policy of policies) {
            this.register(policy);
        }
    }

    /**
     * Remove a policy by id. Returns false when it was not registered.
     */
    public unregister(policyId: string): boolean {
        if (!this.current.byId.has(policyId)) {
            return false;
        }

        const remaining = [...this.current.byId.values()].filter(p => p.policyId !== policyId);
        this.current = buildSnapshot(remaining);
        return true;
    }

    public get(policyId: string): AccessPolicy | undefined {
        return this.current.byId.get(policyId);
    }

    public forRole(role: Role): readonly AccessPolicy[] {
        return this.current.byRole.get(role) ?? EMPTY;
    }

    public forResource(resource: ResourceType): readonly AccessPolicy[] {
        return this.current.byResource.get(resource) ?? EMPTY;
    }

    /** Stable view for one evaluation. */
    public snapshot(): PolicySnapshot {
        return this.current;
    }

    public get size(): number {
        return this.current.byId.size;
    }

    private assertWellFormed(policy: AccessPolicy): void {
        if (!isRole(policy.role)) {
            throw new PolicyConfigurationError(
                'POLICY_UNKNOWN_ROLE',
                policy.policyId,
                `Policy ${policy.policyId} names unknown role ${String(policy.role)}`
            );
        }

        if (!isResourceType(policy.resource)) {
            throw new PolicyConfigurationError(
                'POLICY_UNKNOWN_RESOURCE',
                policy.policyId,
                `Policy ${policy.policyId} names unknown resource ${String(policy.resource)}`
            );
        }

        if (!isAccessLevel(policy.accessLevel)) {
            throw new PolicyConfigurationError(
                'POLICY_INVALID_LEVEL',
                policy.policyId,
                `Policy ${policy.policyId} names unknown access level ${String(policy.accessLevel)}`
            );
        }
    }
}
