import { UserContext, isManagerOf } from '../context/identity.js';
import { PolicyConditions, ResourceAttributes, ScopeFilters } from './policy.js';

/**
 * Evaluate every enabled condition of a policy against the caller and the
 * resource. A condition set to `false` (or absent) is skipped.
 * Pure: neither argument is touched.
 */
export function conditionsHold(
    conditions: PolicyConditions,
    context: UserContext,
    attrs: ResourceAttributes
): boolean {
    if (conditions.sameTeam && !sameNonEmpty(attrs.teamId, context.teamId)) {
        return false;
    }

    if (conditions.sameDepartment && !sameNonEmpty(attrs.departmentId, context.departmentId)) {
        return false;
    }

    if (conditions.isOwner && attrs.ownerId !== context.userId) {
        return false;
    }

    if (conditions.isManagerOfOwner && !isManagerOf(context, attrs.ownerId ?? undefined)) {
        return false;
    }

    if (conditions.projectMember && attrs.projectId && !context.projectIds.includes(attrs.projectId)) {
        return false;
    }

    if (conditions.maxHierarchyDepth !== undefined && (attrs.hierarchyDepth ?? 0) > conditions.maxHierarchyDepth) {
        return false;
    }

    if (conditions.onboardingVisible && attrs.onboardingVisible === false) {
        return false;
    }

    return true;
}

// A blank id on the caller (anonymous, unassigned) matches nothing.
function sameNonEmpty(resourceValue: string | null | undefined, callerValue: string): boolean {
    return callerValue !== '' && resourceValue === callerValue;
}

/**
 * Translate the matched policy's conditions into query constraints, one
 * filter per condition. Nothing is added that the policy did not ask for.
 */
export function buildScopeFilters(conditions: PolicyConditions, context: UserContext): ScopeFilters {
    return {
        ...(conditions.sameTeam ? { team_id: context.teamId } : {}),
        ...(conditions.sameDepartment ? { department_id: context.departmentId } : {}),
        ...(conditions.isOwner ? { owner_id: context.userId } : {}),
        ...(conditions.isManagerOfOwner ? { owner_ids: [...context.directReports] } : {}),
        ...(conditions.projectMember ? { project_ids: [...context.projectIds] } : {}),
        ...(conditions.maxHierarchyDepth !== undefined ? { max_depth: conditions.maxHierarchyDepth } : {}),
        ...(conditions.onboardingVisible ? { onboarding_visible: true as const } : {})
    };
}
