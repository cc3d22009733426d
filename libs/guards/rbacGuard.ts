/**
 * RBAC Guard
 *
 * Enforcement point between callers and the policy engine. Every check is
 * logged once and forwarded to the audit dispatcher; audit delivery is never
 * awaited and cannot change the outcome.
 *
 * An unexpected failure inside evaluation is sanitized into an incident and
 * returned as a deny. The guard never grants on error.
 */

import type { Logger } from 'pino';
import { logger as rootLogger } from '../logging/logger.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { PermissionDeniedError } from '../errors/accessErrors.js';
import { AuditDispatcher } from '../audit/dispatcher.js';
import { UserContext, contextSnapshot, isManagerOf } from '../context/identity.js';
import { PermissionSummary, PolicyEngine } from '../rbac/engine.js';
import {
    AccessDecision,
    AllowDecision,
    ResourceAttributes,
    ScopeFilters,
    denyDecision
} from '../rbac/policy.js';
import { AccessLevel, ResourceType } from '../rbac/resources.js';
import { Role, RoleName, roleName } from '../rbac/roles.js';
import { redactSensitiveContent } from './contentFilter.js';

export interface RbacGuardOptions {
    engine: PolicyEngine;
    audit?: AuditDispatcher;
    logger?: Logger;
}

/**
 * A retrieval source cited by a chat answer. Only the keys the guard reads
 * are typed; everything else is passed through on allow.
 */
export interface ChatSource {
    readonly type?: string | null;
    readonly title?: string;
    readonly team_id?: string | null;
    readonly department_id?: string | null;
    readonly owner_id?: string | null;
    readonly access_denied?: boolean;
    readonly [key: string]: unknown;
}

export interface RestrictedSource extends ChatSource {
    readonly title: typeof RESTRICTED_TITLE;
    readonly type: string | null;
    readonly access_denied: true;
}

export interface FilteredChatResponse {
    response: string;
    sources: ChatSource[];
}

export interface KnowledgeScope {
    allowedNodes: string[];
    maxDepth: number;
    filters: {
        team_id?: string;
        department_id?: string;
        onboarding_visible?: true;
    };
}

export interface McpToolPermission {
    allowed: boolean;
    level: 'read' | 'none';
    scope: ScopeFilters;
}

export interface McpToolPermissions {
    jira: McpToolPermission;
    github: McpToolPermission;
    slack: McpToolPermission;
}

export type DashboardLevel = 'company' | 'department' | 'team' | 'personal' | 'onboarding';

export interface DashboardConfig {
    widgets: string[];
    dataScope: {
        level: DashboardLevel;
        department_id?: string;
        team_id?: string;
        user_id?: string;
    };
    refreshInterval: number;
}

export interface BootstrapPayload {
    user: {
        id: string;
        name: string | null;
        email: string | null;
        role: RoleName;
        team_id: string;
        department_id: string;
        organization_id: string;
    };
    dashboard: DashboardConfig;
    mcpPermissions: McpToolPermissions;
    knowledgeScope: KnowledgeScope;
    permissions: PermissionSummary[];
}

export const RESTRICTED_TITLE = '[Restricted]';

const SOURCE_RESOURCES: ReadonlyMap<string, ResourceType> = new Map<string, ResourceType>([
    ['document', 'knowledge_team'],
    ['team_doc', 'knowledge_team'],
    ['department_doc', 'knowledge_department'],
    ['company_doc', 'knowledge_global'],
    ['personal', 'knowledge_personal'],
    ['jira', 'mcp_jira'],
    ['github', 'mcp_github'],
    ['slack', 'mcp_slack']
]);

const DEFAULT_SOURCE_RESOURCE: ResourceType = 'knowledge_team';

/**
 * Resource type a cited source is checked against. Unknown types fall back to
 * team knowledge.
 */
export function sourceResource(sourceType: string | null | undefined): ResourceType {
    return SOURCE_RESOURCES.get((sourceType ?? '').toLowerCase()) ?? DEFAULT_SOURCE_RESOURCE;
}

export function restrictedSource(source: ChatSource): RestrictedSource {
    return {
        title: RESTRICTED_TITLE,
        type: source.type ?? null,
        access_denied: true
    };
}

const DASHBOARD_WIDGETS: Readonly<Record<RoleName, readonly string[]>> = {
    CEO: [
        'company_overview',
        'all_teams_health',
        'cross_team_analytics',
        'company_okrs',
        'executive_summary',
        'bottleneck_analysis',
        'ownership_map'
    ],
    LEADERSHIP: [
        'department_overview',
        'team_health',
        'department_analytics',
        'department_okrs',
        'team_bottlenecks',
        'ownership_map'
    ],
    MANAGER: [
        'team_overview',
        'sprint_velocity',
        'team_workload',
        'team_analytics',
        'member_status',
        'ownership_lookup'
    ],
    IC: [
        'personal_tasks',
        'team_activity',
        'my_analytics',
        'team_knowledge'
    ],
    NEW_EMPLOYEE: [
        'onboarding_progress',
        'next_steps',
        'team_introduction',
        'help_resources'
    ]
};

const DEFAULT_REFRESH_SECONDS = 60;
const ONBOARDING_REFRESH_SECONDS = 300;

export class RbacGuard {
    public readonly engine: PolicyEngine;
    private readonly audit?: AuditDispatcher;
    private readonly log: Logger;

    constructor(options: RbacGuardOptions) {
        this.engine = options.engine;
        this.audit = options.audit;
        this.log = options.logger ?? rootLogger;
    }

    public checkAccess(
        context: UserContext,
        resource: ResourceType,
        requiredLevel: AccessLevel = 'read',
        resourceAttrs?: ResourceAttributes
    ): AccessDecision {
        let decision: AccessDecision;
        try {
            decision = this.engine.evaluate(context, resource, requiredLevel, resourceAttrs);
        } catch (err) {
            const incident = ErrorSanitizer.sanitize(err, 'rbac.evaluate');
            decision = denyDecision(
                `Access evaluation failed (incident ${incident.incidentId})`,
                resource,
                contextSnapshot(context)
            );
        }

        this.log.info({
            allowed: decision.allowed,
            userId: context.userId,
            role: roleName(context.role),
            resource,
            reason: decision.reason,
            policyId: decision.policyId
        }, 'RBAC access decision');

        this.audit?.recordDecision(decision, context);
        return decision;
    }

    /**
     * Like checkAccess, but a deny aborts the operation.
     * @throws PermissionDeniedError
     */
    public requireAccess(
        context: UserContext,
        resource: ResourceType,
        requiredLevel: AccessLevel = 'read',
        resourceAttrs?: ResourceAttributes
    ): AllowDecision {
        const decision = this.checkAccess(context, resource, requiredLevel, resourceAttrs);
        if (!decision.allowed) {
            throw new PermissionDeniedError(decision);
        }
        return decision;
    }

    /**
     * Re-check every cited source for this caller and scrub the answer body.
     * Denied sources are replaced in place, so count and order are preserved.
     */
    public filterChatResponse(
        context: UserContext,
        response: string,
        sources: readonly ChatSource[] = []
    ): FilteredChatResponse {
        const filteredSources = sources.map((source): ChatSource => {
            if (source.access_denied === true) {
                return restrictedSource(source);
            }

            const decision = this.checkAccess(context, sourceResource(source.type), 'read', {
                teamId: source.team_id ?? null,
                departmentId: source.department_id ?? null,
                ownerId: source.owner_id ?? null
            });

            return decision.allowed ? source : restrictedSource(source);
        });

        return {
            response: redactSensitiveContent(context.role, response),
            sources: filteredSources
        };
    }

    public getKnowledgeScope(context: UserContext): KnowledgeScope {
        switch (context.role) {
            case Role.CEO:
                return { allowedNodes: ['*'], maxDepth: 10, filters: {} };
            case Role.LEADERSHIP:
                return {
                    allowedNodes: [`department:${context.departmentId}`, `team:${context.teamId}`],
                    maxDepth: 10,
                    filters: { department_id: context.departmentId }
                };
            case Role.MANAGER:
                return {
                    allowedNodes: [`team:${context.teamId}`],
                    maxDepth: 10,
                    filters: { team_id: context.teamId }
                };
            case Role.IC:
                return {
                    allowedNodes: [`team:${context.teamId}`],
                    maxDepth: 5,
                    filters: { team_id: context.teamId }
                };
            case Role.NEW_EMPLOYEE:
                return {
                    allowedNodes: [`team:${context.teamId}`],
                    maxDepth: 2,
                    filters: { team_id: context.teamId, onboarding_visible: true }
                };
        }
    }

    public getMcpToolPermissions(context: UserContext): McpToolPermissions {
        const permission = (resource: ResourceType): McpToolPermission => {
            const decision = this.checkAccess(context, resource, 'read');
            return {
                allowed: decision.allowed,
                level: decision.allowed ? 'read' : 'none',
                scope: decision.scopeFilters
            };
        };

        return {
            jira: permission('mcp_jira'),
            github: permission('mcp_github'),
            slack: permission('mcp_slack')
        };
    }

    public getDashboardConfig(context: UserContext): DashboardConfig {
        const widgets = [...DASHBOARD_WIDGETS[roleName(context.role)]];

        switch (context.role) {
            case Role.CEO:
                return { widgets, dataScope: { level: 'company' }, refreshInterval: DEFAULT_REFRESH_SECONDS };
            case Role.LEADERSHIP:
                return {
                    widgets,
                    dataScope: { level: 'department', department_id: context.departmentId },
                    refreshInterval: DEFAULT_REFRESH_SECONDS
                };
            case Role.MANAGER:
                return {
                    widgets,
                    dataScope: { level: 'team', team_id: context.teamId },
                    refreshInterval: DEFAULT_REFRESH_SECONDS
                };
            case Role.IC:
                return {
                    widgets,
                    dataScope: { level: 'personal', team_id: context.teamId, user_id: context.userId },
                    refreshInterval: DEFAULT_REFRESH_SECONDS
                };
            case Role.NEW_EMPLOYEE:
                return {
                    widgets,
                    dataScope: { level: 'onboarding', user_id: context.userId },
                    refreshInterval: ONBOARDING_REFRESH_SECONDS
                };
        }
    }

    public canViewEmployeeData(context: UserContext, targetUserId: string, targetTeamId: string): boolean {
        if (context.userId === targetUserId) return true;
        if (context.role === Role.CEO) return true;
        if (isManagerOf(context, targetUserId)) return true;
        if (context.teamId !== '' && context.teamId === targetTeamId) return true;

        if (context.role === Role.LEADERSHIP) {
            return this.checkAccess(context, 'team_members', 'read', { teamId: targetTeamId }).allowed;
        }

        return false;
    }

    /**
     * Everything the UI needs to render for this caller in one payload.
     */
    public getBootstrap(context: UserContext): BootstrapPayload {
        return {
            user: {
                id: context.userId,
                name: context.name ?? null,
                email: context.email ?? null,
                role: roleName(context.role),
                team_id: context.teamId,
                department_id: context.departmentId,
                organization_id: context.organizationId
            },
            dashboard: this.getDashboardConfig(context),
            mcpPermissions: this.getMcpToolPermissions(context),
            knowledgeScope: this.getKnowledgeScope(context),
            permissions: this.engine.permissionsForRole(context.role)
        };
    }
}
