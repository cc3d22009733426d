/**
 * RBAC Policy Engine
 *
 * Flat, table-driven evaluation:
 * 1. Candidates = enabled policies for (caller role, resource), plus, for
 *    LEADERSHIP and above, an unscoped copy of every lower-role policy on the
 *    same resource (priority - 1).
 * 2. Highest priority first.
 * 3. The first candidate whose conditions hold decides. It either grants with
 *    scope filters, or denies (explicit `none`, or level too low).
 *
 * Deny is data: evaluate() returns a decision, it does not throw for control
 * flow. The engine performs no I/O.
 */

import { UserContext, contextSnapshot } from '../context/identity.js';
import { logger } from '../logging/logger.js';
import { conditionsHold, buildScopeFilters } from './conditions.js';
import {
    AccessDecision,
    AccessPolicy,
    PolicyConditions,
    ResourceAttributes,
    allowDecision,
    denyDecision
} from './policy.js';
import { PolicyRegistry } from './registry.js';
import {
    AccessLevel,
    ResourceType,
    accessLevelLabel,
    levelSatisfies
} from './resources.js';
import { Role, roleName, roleAtLeast } from './roles.js';

/** Lowest role whose holders inherit every lower-role grant. */
export const INHERITANCE_FLOOR = Role.LEADERSHIP;

export interface PermissionSummary {
    readonly policyId: string;
    readonly resource: ResourceType;
    readonly accessLevel: AccessLevel;
    readonly conditions: PolicyConditions;
    readonly description: string;
}

export class PolicyEngine {
    constructor(private readonly registry: PolicyRegistry) { }

    public evaluate(
        context: UserContext,
        resource: ResourceType,
        requiredLevel: AccessLevel,
        resourceAttrs: ResourceAttributes = {}
    ): AccessDecision {
        const snapshot = contextSnapshot(context);
        const attrs: ResourceAttributes = {
            ...resourceAttrs,
            ownerId: resourceAttrs.ownerId === undefined ? context.userId : resourceAttrs.ownerId
        };

        const candidates = this.collectCandidates(context.role, resource);

        if (candidates.length === 0) {
            return denyDecision(
                `No policies found for role ${roleName(context.role)} on resource ${resource}`,
                resource,
                snapshot
            );
        }

        const matched = candidates.find(policy =>
            policy.role === context.role && conditionsHold(policy.conditions, context, attrs)
        );

        if (matched) {
            if (matched.accessLevel === 'none') {
                return denyDecision(`Access denied by policy ${matched.policyId}`, resource, snapshot, matched.policyId);
            }

            if (levelSatisfies(matched.accessLevel, requiredLevel)) {
                const decision = allowDecision(matched, buildScopeFilters(matched.conditions, context), snapshot);

                logger.debug({
                    userId: context.userId,
                    role: snapshot.role,
                    resource,
                    policyId: matched.policyId
                }, 'Access granted');

                return decision;
            }
            // First match is terminal even when its level falls short.
        }

        return denyDecision(
            `No policy grants ${accessLevelLabel(requiredLevel)} access to ${resource}`,
            resource,
            snapshot
        );
    }

    /** Boolean shortcut for callers that need no scope filters. */
    public checkQuick(context: UserContext, resource: ResourceType, requiredLevel: AccessLevel = 'read'): boolean {
        return this.evaluate(context, resource, requiredLevel).allowed;
    }

    /**
     * Direct (non-inherited) grants for a role, for UI display.
     */
    public permissionsForRole(role: Role): PermissionSummary[] {
        return this.registry.forRole(role)
            .filter(policy => policy.enabled)
            .map(policy => ({
                policyId: policy.policyId,
                resource: policy.resource,
                accessLevel: policy.accessLevel,
                conditions: policy.conditions,
                description: policy.description
            }));
    }

    private collectCandidates(role: Role, resource: ResourceType): AccessPolicy[] {
        const forResource = this.registry.forResource(resource);
        const candidates: AccessPolicy[] = forResource.filter(policy => policy.enabled && policy.role === role);

        if (roleAtLeast(role, INHERITANCE_FLOOR)) {
            for (const policy of forResource) {
                if (policy.enabled && policy.role < role) {
                    candidates.push(inherit(policy, role));
                }
            }
        }

        // sort() is stable: registration order breaks priority ties.
        return candidates.sort((a, b) => b.priority - a.priority);
    }
}

function inherit(policy: AccessPolicy, role: Role): AccessPolicy {
    return Object.freeze({
        ...policy,
        policyId: `${policy.policyId}-inherited`,
        role,
        conditions: Object.freeze({}),
        description: `Inherited from ${policy.policyId}`,
        priority: policy.priority - 1
    });
}
