/**
 * Agent Guard
 *
 * Wraps an LLM agent's inputs and outputs in the caller's permissions:
 * retrieved documents are cut to the knowledge scope, tool calls are checked
 * and scoped, and answers go through the chat filter before they leave.
 */

import type { Logger } from 'pino';
import { logger as rootLogger } from '../logging/logger.js';
import { AuditDispatcher } from '../audit/dispatcher.js';
import type { UserContext } from '../context/identity.js';
import type { ResourceAttributes, ScopeFilters } from '../rbac/policy.js';
import type { ResourceType } from '../rbac/resources.js';
import { Role, RoleName, roleAtLeast, roleName } from '../rbac/roles.js';
import {
    ChatSource,
    DashboardConfig,
    FilteredChatResponse,
    KnowledgeScope,
    McpToolPermissions,
    RbacGuard
} from './rbacGuard.js';

export interface AgentGuardOptions {
    guard: RbacGuard;
    audit?: AuditDispatcher;
    logger?: Logger;
}

export interface AgentContext {
    userId: string;
    userRole: RoleName;
    userTeam: string;
    userDepartment: string;
    knowledgeScope: KnowledgeScope;
    mcpPermissions: McpToolPermissions;
    dashboardWidgets: string[];
    dataScope: DashboardConfig['dataScope'];
    query: string;
    isNewEmployee: boolean;
    canSeeCrossTeam: boolean;
    canSeeSensitive: boolean;
}

export interface RetrievedDocument {
    readonly team_id?: string | null;
    readonly department_id?: string | null;
    readonly hierarchy_depth?: number;
    readonly onboarding_visible?: boolean;
    readonly [key: string]: unknown;
}

export type ToolParams = Readonly<Record<string, unknown>>;

export interface ToolPermission {
    allowed: boolean;
    scope: ScopeFilters;
}

const TOOL_RESOURCES: ReadonlyMap<string, ResourceType> = new Map<string, ResourceType>([
    ['jira_search', 'mcp_jira'],
    ['jira_get_issue', 'mcp_jira'],
    ['jira_get_sprint', 'mcp_jira'],
    ['github_search', 'mcp_github'],
    ['github_get_pr', 'mcp_github'],
    ['github_get_commits', 'mcp_github'],
    ['slack_search', 'mcp_slack'],
    ['slack_get_channel', 'mcp_slack'],
    ['knowledge_search', 'knowledge_team'],
    ['team_analytics', 'team_analytics'],
    ['ownership_lookup', 'ownership_lookup']
]);

/** Roles at or above this see across teams and see sensitive figures. */
const WIDE_VISIBILITY_ROLE = Role.LEADERSHIP;

export function toolResource(toolName: string): ResourceType | undefined {
    return TOOL_RESOURCES.get(toolName);
}

function stringParam(params: ToolParams, key: string): string | null | undefined {
    const value = params[key];
    if (value === null) return null;
    return typeof value === 'string' ? value : undefined;
}

// Tool parameters use the wire names; the engine reads attribute names.
function toolAttributes(params: ToolParams): ResourceAttributes {
    const depth = params.hierarchy_depth;
    return {
        teamId: stringParam(params, 'team_id'),
        departmentId: stringParam(params, 'department_id'),
        ownerId: stringParam(params, 'owner_id'),
        projectId: stringParam(params, 'project_id'),
        ...(typeof depth === 'number' ? { hierarchyDepth: depth } : {})
    };
}

/**
 * Copy of the tool parameters with every scope constraint forced in.
 * Caller-supplied values for the same keys are overwritten.
 */
export function applyToolScope(params: ToolParams, scope: ScopeFilters): Record<string, unknown> {
    const scoped: Record<string, unknown> = { ...params };

    if (scope.team_id !== undefined) {
        scoped.team_id = scope.team_id;
        scoped.team_filter = scope.team_id;
    }
    if (scope.department_id !== undefined) {
        scoped.department_id = scope.department_id;
    }
    if (scope.owner_id !== undefined) {
        scoped.owner_id = scope.owner_id;
        scoped.assignee = scope.owner_id;
    }
    if (scope.project_ids !== undefined) {
        scoped.project_ids = [...scope.project_ids];
    }
    if (scope.max_depth !== undefined) {
        scoped.max_depth = scope.max_depth;
    }

    return scoped;
}

const ROLE_PROMPT_CONSTRAINTS: Readonly<Record<RoleName, (context: UserContext) => string[]>> = {
    NEW_EMPLOYEE: () => [
        'The user is a new employee in onboarding.',
        'Only provide information relevant to their team and onboarding process.',
        'Do not reveal sensitive business metrics or cross-team data.',
        'Focus on helping them learn and get started.',
        'Recommend they contact their manager for access to restricted information.'
    ],
    IC: context => [
        'The user is an individual contributor.',
        `They have access to their team (${context.teamId}) data only.`,
        "Do not reveal information about other teams unless it's publicly shared.",
        'For cross-team questions, suggest they contact the relevant team.'
    ],
    MANAGER: context => [
        'The user is a team manager.',
        `They have access to their team (${context.teamId}) data.`,
        'They can see team member workloads and analytics.',
        "Do not reveal other teams' private data or sensitive HR information."
    ],
    LEADERSHIP: context => [
        'The user is in leadership.',
        `They have access to department-level (${context.departmentId}) data.`,
        'They can see cross-team analytics within their department.',
        'Exercise discretion with highly sensitive information.'
    ],
    CEO: () => [
        'The user has executive access.',
        'They can access company-wide data and analytics.',
        'Provide comprehensive information while maintaining professionalism.'
    ]
};

export class AgentGuard {
    private readonly guard: RbacGuard;
    private readonly audit?: AuditDispatcher;
    private readonly log: Logger;

    constructor(options: AgentGuardOptions) {
        this.guard = options.guard;
        this.audit = options.audit;
        this.log = options.logger ?? rootLogger;
    }

    public buildAgentContext(context: UserContext, query: string): AgentContext {
        const dashboard = this.guard.getDashboardConfig(context);
        const wide = roleAtLeast(context.role, WIDE_VISIBILITY_ROLE);

        return {
            userId: context.userId,
            userRole: roleName(context.role),
            userTeam: context.teamId,
            userDepartment: context.departmentId,
            knowledgeScope: this.guard.getKnowledgeScope(context),
            mcpPermissions: this.guard.getMcpToolPermissions(context),
            dashboardWidgets: dashboard.widgets,
            dataScope: dashboard.dataScope,
            query,
            isNewEmployee: context.role === Role.NEW_EMPLOYEE,
            canSeeCrossTeam: wide,
            canSeeSensitive: wide
        };
    }

    /**
     * Access-control section appended to the agent's system prompt.
     */
    public getSystemPromptAdditions(context: UserContext): string {
        const constraints = ROLE_PROMPT_CONSTRAINTS[roleName(context.role)](context);

        return [
            '',
            '## Access Control Constraints',
            "You MUST follow these constraints based on the user's role:",
            ...constraints.map(line => `- ${line}`),
            '',
            "If asked for information outside these constraints, politely explain that the user doesn't have access and suggest who they could contact.",
            ''
        ].join('\n');
    }

    /**
     * Drop retrieved documents outside the caller's knowledge scope before
     * they reach the model. A document without a team or department is not
     * excluded on that axis.
     */
    public filterRetrievedContext<T extends RetrievedDocument>(context: UserContext, docs: readonly T[]): T[] {
        const { filters, maxDepth } = this.guard.getKnowledgeScope(context);

        const kept = docs.filter(doc => {
            if (filters.team_id !== undefined && doc.team_id && doc.team_id !== filters.team_id) {
                return false;
            }
            if (filters.department_id !== undefined && doc.department_id && doc.department_id !== filters.department_id) {
                return false;
            }
            if (filters.onboarding_visible && doc.onboarding_visible !== true) {
                return false;
            }
            return (doc.hierarchy_depth ?? 0) <= maxDepth;
        });

        this.log.debug({
            originalCount: docs.length,
            filteredCount: kept.length,
            userId: context.userId
        }, 'Context filtered');

        return kept;
    }

    public filterAgentResponse(
        context: UserContext,
        response: string,
        sources: readonly ChatSource[] = [],
        agentName = 'unknown'
    ): FilteredChatResponse {
        const filtered = this.guard.filterChatResponse(context, response, sources);

        const responseFiltered = filtered.response !== response;
        const sourcesFiltered = filtered.sources.some((source, index) => source !== sources[index]);
        const wasFiltered = responseFiltered || sourcesFiltered;

        this.audit?.recordEvent({
            eventType: wasFiltered ? 'chat_filtered' : 'chat_response',
            context,
            resource: 'chat',
            result: wasFiltered ? 'filtered' : 'success',
            metadata: {
                agent: agentName,
                sourcesCount: filtered.sources.length,
                filtered: wasFiltered
            }
        });

        return filtered;
    }

    /**
     * Check a tool call and return the scope it must run under.
     * Unknown tools are refused without consulting the engine.
     */
    public checkToolPermission(context: UserContext, toolName: string, params: ToolParams = {}): ToolPermission {
        const resource = toolResource(toolName);
        if (resource === undefined) {
            this.log.warn({ tool: toolName, userId: context.userId }, 'Unknown tool');
            return { allowed: false, scope: {} };
        }

        const decision = this.guard.checkAccess(context, resource, 'read', toolAttributes(params));

        this.audit?.recordEvent({
            eventType: decision.allowed ? 'mcp_tool_call' : 'mcp_tool_blocked',
            context,
            resource,
            result: decision.allowed ? 'success' : 'denied',
            policyId: decision.policyId,
            reason: decision.reason,
            scopeFilters: decision.scopeFilters,
            metadata: { tool: toolName }
        });

        return { allowed: decision.allowed, scope: decision.scopeFilters };
    }
}
