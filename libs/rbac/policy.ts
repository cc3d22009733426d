/**
 * Policy & Decision Value Objects
 *
 * Both are frozen on creation. A decision is produced fresh for every
 * evaluation and is never cached across requests.
 */

import { Role } from './roles.js';
import { AccessLevel, ResourceType } from './resources.js';
import { ContextSnapshot } from '../context/identity.js';

export interface PolicyConditions {
    /** resource.teamId must equal caller's team */
    readonly sameTeam?: boolean;
    /** resource.departmentId must equal caller's department */
    readonly sameDepartment?: boolean;
    /** resource.ownerId must be the caller */
    readonly isOwner?: boolean;
    /** resource.ownerId must be one of the caller's direct reports */
    readonly isManagerOfOwner?: boolean;
    /** resource.projectId, when present, must be one of the caller's projects */
    readonly projectMember?: boolean;
    /** resource.hierarchyDepth must not exceed this ceiling */
    readonly maxHierarchyDepth?: number;
    /** resource must not be flagged as hidden from onboarding */
    readonly onboardingVisible?: boolean;
}

export interface AccessPolicy {
    readonly policyId: string;
    readonly role: Role;
    readonly resource: ResourceType;
    readonly accessLevel: AccessLevel;
    readonly conditions: PolicyConditions;
    readonly description: string;
    /** Higher wins. Inherited copies sit one below their source. */
    readonly priority: number;
    readonly enabled: boolean;
}

export type PolicyInit =
    Pick<AccessPolicy, 'policyId' | 'role' | 'resource' | 'accessLevel'> &
    Partial<Pick<AccessPolicy, 'conditions' | 'description' | 'priority' | 'enabled'>>;

export function definePolicy(init: PolicyInit): AccessPolicy {
    return Object.freeze({
        policyId: init.policyId,
        role: init.role,
        resource: init.resource,
        accessLevel: init.accessLevel,
        conditions: Object.freeze({ ...(init.conditions ?? {}) }),
        description: init.description ?? '',
        priority: init.priority ?? 0,
        enabled: init.enabled ?? true
    });
}

/**
 * Attributes of the resource instance being accessed.
 * Unknown keys are carried through untouched for collaborators.
 */
export interface ResourceAttributes {
    readonly teamId?: string | null;
    readonly departmentId?: string | null;
    readonly ownerId?: string | null;
    readonly projectId?: string | null;
    readonly hierarchyDepth?: number;
    readonly onboardingVisible?: boolean;
    readonly [extra: string]: unknown;
}

/**
 * Constraints a caller must apply to its own query to honour a partial grant.
 * Keys use the column names collaborators filter on.
 */
export interface ScopeFilters {
    readonly team_id?: string;
    readonly department_id?: string;
    readonly owner_id?: string;
    readonly owner_ids?: readonly string[];
    readonly project_ids?: readonly string[];
    readonly max_depth?: number;
    readonly onboarding_visible?: true;
}

interface DecisionBase {
    readonly reason: string;
    readonly resource: ResourceType;
    readonly scopeFilters: ScopeFilters;
    readonly decidedAt: string; // ISO-8601
    readonly contextSnapshot: ContextSnapshot;
}

export interface AllowDecision extends DecisionBase {
    readonly allowed: true;
    readonly policyId: string;
    readonly accessLevel: AccessLevel;
}

export interface DenyDecision extends DecisionBase {
    readonly allowed: false;
    /** Set only when an explicit `none` policy produced the denial. */
    readonly policyId: string | null;
    readonly accessLevel: null;
}

export type AccessDecision = AllowDecision | DenyDecision;

export const GRANTED_REASON = 'Access granted by policy';

export function allowDecision(
    policy: Pick<AccessPolicy, 'policyId' | 'resource' | 'accessLevel'>,
    scopeFilters: ScopeFilters,
    snapshot: ContextSnapshot
): AllowDecision {
    return Object.freeze({
        allowed: true,
        reason: GRANTED_REASON,
        policyId: policy.policyId,
        resource: policy.resource,
        accessLevel: policy.accessLevel,
        scopeFilters: Object.freeze({ ...scopeFilters }),
        decidedAt: new Date().toISOString(),
        contextSnapshot: snapshot
    });
}

export function denyDecision(
    reason: string,
    resource: ResourceType,
    snapshot: ContextSnapshot,
    policyId: string | null = null
): DenyDecision {
    return Object.freeze({
        allowed: false,
        reason,
        policyId,
        resource,
        accessLevel: null,
        scopeFilters: Object.freeze({}),
        decidedAt: new Date().toISOString(),
        contextSnapshot: snapshot
    });
}
