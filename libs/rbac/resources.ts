/**
 * Protected Resource Registry
 *
 * Closed set: a policy naming anything outside this list is rejected at
 * registration time.
 */

export const RESOURCE_TYPES = [
    // Chat & conversations
    'chat',
    'chat_history',

    // Knowledge graph
    'knowledge_global',
    'knowledge_department',
    'knowledge_team',
    'knowledge_personal',

    // Memory
    'memory_org',
    'memory_team',
    'memory_user',

    // Analytics & dashboards
    'dashboard_company',
    'dashboard_department',
    'dashboard_team',
    'dashboard_personal',

    // External tools
    'mcp_jira',
    'mcp_github',
    'mcp_slack',

    // Team management
    'team_members',
    'team_workload',
    'team_analytics',

    // Onboarding
    'onboarding_flows',
    'onboarding_progress',

    // Ownership & recommendations
    'ownership_lookup',
    'expertise_search'
] as const;

export type ResourceType = typeof RESOURCE_TYPES[number];

export function isResourceType(value: unknown): value is ResourceType {
    return typeof value === 'string' && (RESOURCE_TYPES as readonly string[]).includes(value);
}

export const ACCESS_LEVELS = ['none', 'read', 'write', 'admin'] as const;

export type AccessLevel = typeof ACCESS_LEVELS[number];

const ACCESS_LEVEL_RANK: Readonly<Record<AccessLevel, number>> = {
    none: 0,
    read: 1,
    write: 2,
    admin: 3
};

const ACCESS_LEVEL_LABEL: Readonly<Record<AccessLevel, string>> = {
    none: 'None',
    read: 'Read',
    write: 'Write',
    admin: 'Admin'
};

export function accessLevelRank(level: AccessLevel): number {
    return ACCESS_LEVEL_RANK[level];
}

/** `granted` satisfies `required` when it ranks at or above it. */
export function levelSatisfies(granted: AccessLevel, required: AccessLevel): boolean {
    return ACCESS_LEVEL_RANK[granted] >= ACCESS_LEVEL_RANK[required];
}

export function accessLevelLabel(level: AccessLevel): string {
    return ACCESS_LEVEL_LABEL[level];
}

export function isAccessLevel(value: unknown): value is AccessLevel {
    return typeof value === 'string' && (ACCESS_LEVELS as readonly string[]).includes(value);
}
