/**
 * Default Organizational Policy Set
 *
 * Direct grants per role. Leadership and CEO additionally inherit an unscoped
 * copy of every lower-role grant at evaluation time, so nothing here repeats
 * a lower grant for a higher role unless the higher role gets more.
 */

import { AccessPolicy, definePolicy } from './policy.js';
import { Role, roleName } from './roles.js';
import { PolicyRegistry } from './registry.js';
import { logger } from '../logging/logger.js';

const CEO_POLICIES: AccessPolicy[] = [
    definePolicy({
        policyId: 'ceo-global-knowledge',
        role: Role.CEO,
        resource: 'knowledge_global',
        accessLevel: 'admin',
        description: 'CEO has full access to all knowledge'
    }),
    definePolicy({
        policyId: 'ceo-company-dashboard',
        role: Role.CEO,
        resource: 'dashboard_company',
        accessLevel: 'admin',
        description: 'CEO can view and configure company dashboards'
    }),
    definePolicy({
        policyId: 'ceo-all-analytics',
        role: Role.CEO,
        resource: 'team_analytics',
        accessLevel: 'read',
        description: 'CEO can view all team analytics'
    }),
    definePolicy({
        policyId: 'ceo-org-memory',
        role: Role.CEO,
        resource: 'memory_org',
        accessLevel: 'admin',
        description: 'CEO has full access to organizational memory'
    }),
    definePolicy({
        policyId: 'ceo-ownership-lookup',
        role: Role.CEO,
        resource: 'ownership_lookup',
        accessLevel: 'read',
        description: 'CEO can look up ownership across company'
    })
];

const LEADERSHIP_POLICIES: AccessPolicy[] = [
    definePolicy({
        policyId: 'leadership-dept-knowledge',
        role: Role.LEADERSHIP,
        resource: 'knowledge_department',
        accessLevel: 'write',
        conditions: { sameDepartment: true },
        description: 'Leadership has write access to department knowledge'
    }),
    definePolicy({
        policyId: 'leadership-dept-dashboard',
        role: Role.LEADERSHIP,
        resource: 'dashboard_department',
        accessLevel: 'admin',
        conditions: { sameDepartment: true },
        description: 'Leadership can manage department dashboards'
    }),
    definePolicy({
        policyId: 'leadership-team-analytics',
        role: Role.LEADERSHIP,
        resource: 'team_analytics',
        accessLevel: 'read',
        conditions: { sameDepartment: true },
        description: 'Leadership can view team analytics in their department'
    }),
    definePolicy({
        policyId: 'leadership-team-memory',
        role: Role.LEADERSHIP,
        resource: 'memory_team',
        accessLevel: 'read',
        conditions: { sameDepartment: true },
        description: 'Leadership can read team memory in their department'
    }),
    definePolicy({
        policyId: 'leadership-ownership-dept',
        role: Role.LEADERSHIP,
        resource: 'ownership_lookup',
        accessLevel: 'read',
        conditions: { sameDepartment: true },
        description: 'Leadership can look up ownership in their department'
    })
];

const MANAGER_POLICIES: AccessPolicy[] = [
    definePolicy({
        policyId: 'manager-team-knowledge',
        role: Role.MANAGER,
        resource: 'knowledge_team',
        accessLevel: 'write',
        conditions: { sameTeam: true },
        description: 'Managers have write access to team knowledge'
    }),
    definePolicy({
        policyId: 'manager-team-dashboard',
        role: Role.MANAGER,
        resource: 'dashboard_team',
        accessLevel: 'admin',
        conditions: { sameTeam: true },
        description: 'Managers can manage team dashboards'
    }),
    definePolicy({
        policyId: 'manager-team-members',
        role: Role.MANAGER,
        resource: 'team_members',
        accessLevel: 'read',
        conditions: { sameTeam: true },
        description: 'Managers can view team member information'
    }),
    definePolicy({
        policyId: 'manager-team-workload',
        role: Role.MANAGER,
        resource: 'team_workload',
        accessLevel: 'read',
        conditions: { sameTeam: true },
        description: 'Managers can view team workload'
    }),
    definePolicy({
        policyId: 'manager-team-analytics',
        role: Role.MANAGER,
        resource: 'team_analytics',
        accessLevel: 'read',
        conditions: { sameTeam: true },
        description: "Managers can view their team's analytics"
    }),
    definePolicy({
        policyId: 'manager-team-memory',
        role: Role.MANAGER,
        resource: 'memory_team',
        accessLevel: 'write',
        conditions: { sameTeam: true },
        description: 'Managers can read/write team memory'
    }),
    definePolicy({
        policyId: 'manager-ownership-team',
        role: Role.MANAGER,
        resource: 'ownership_lookup',
        accessLevel: 'read',
        conditions: { sameTeam: true },
        description: 'Managers can look up ownership in their team'
    }),
    definePolicy({
        policyId: 'manager-mcp-jira',
        role: Role.MANAGER,
        resource: 'mcp_jira',
        accessLevel: 'read',
        conditions: { sameTeam: true },
        description: 'Managers can access Jira for their team'
    }),
    definePolicy({
        policyId: 'manager-mcp-github',
        role: Role.MANAGER,
        resource: 'mcp_github',
        accessLevel: 'read',
        conditions: { sameTeam: true },
        description: 'Managers can access GitHub for their team'
    })
];

const IC_POLICIES: AccessPolicy[] = [
    definePolicy({
        policyId: 'ic-team-knowledge-read',
        role: Role.IC,
        resource: 'knowledge_team',
        accessLevel: 'read',
        conditions: { sameTeam: true },
        description: 'ICs can read team knowledge'
    }),
    definePolicy({
        policyId: 'ic-personal-knowledge',
        role: Role.IC,
        resource: 'knowledge_personal',
        accessLevel: 'write',
        conditions: { isOwner: true },
        description: 'ICs have full access to their personal knowledge'
    }),
    definePolicy({
        policyId: 'ic-personal-dashboard',
        role: Role.IC,
        resource: 'dashboard_personal',
        accessLevel: 'write',
        conditions: { isOwner: true },
        description: 'ICs can manage their personal dashboard'
    }),
    definePolicy({
        policyId: 'ic-user-memory',
        role: Role.IC,
        resource: 'memory_user',
        accessLevel: 'write',
        conditions: { isOwner: true },
        description: 'ICs have full access to their personal memory'
    }),
    definePolicy({
        policyId: 'ic-ownership-team',
        role: Role.IC,
        resource: 'ownership_lookup',
        accessLevel: 'read',
        conditions: { sameTeam: true },
        description: 'ICs can look up ownership in their team'
    }),
    definePolicy({
        policyId: 'ic-mcp-jira-own',
        role: Role.IC,
        resource: 'mcp_jira',
        accessLevel: 'read',
        conditions: { isOwner: true },
        description: 'ICs can access their own Jira tickets'
    }),
    definePolicy({
        policyId: 'ic-mcp-github-own',
        role: Role.IC,
        resource: 'mcp_github',
        accessLevel: 'read',
        conditions: { isOwner: true },
        description: 'ICs can access their own GitHub activity'
    })
];

const NEW_EMPLOYEE_POLICIES: AccessPolicy[] = [
    definePolicy({
        policyId: 'new-onboarding-flows',
        role: Role.NEW_EMPLOYEE,
        resource: 'onboarding_flows',
        accessLevel: 'read',
        description: 'New employees can access onboarding flows'
    }),
    definePolicy({
        policyId: 'new-onboarding-progress',
        role: Role.NEW_EMPLOYEE,
        resource: 'onboarding_progress',
        accessLevel: 'write',
        conditions: { isOwner: true },
        description: 'New employees can update their onboarding progress'
    }),
    definePolicy({
        policyId: 'new-team-knowledge-limited',
        role: Role.NEW_EMPLOYEE,
        resource: 'knowledge_team',
        accessLevel: 'read',
        conditions: { sameTeam: true, maxHierarchyDepth: 2, onboardingVisible: true },
        description: 'New employees have limited team knowledge access'
    }),
    definePolicy({
        policyId: 'new-chat',
        role: Role.NEW_EMPLOYEE,
        resource: 'chat',
        accessLevel: 'write',
        description: 'New employees can use chat for onboarding help'
    }),
    definePolicy({
        policyId: 'new-ownership-team-limited',
        role: Role.NEW_EMPLOYEE,
        resource: 'ownership_lookup',
        accessLevel: 'read',
        conditions: { sameTeam: true },
        description: 'New employees can find contacts in their team'
    })
];

// Chat and own chat history for everyone past onboarding.
const COMMON_POLICIES: AccessPolicy[] = [Role.IC, Role.MANAGER, Role.LEADERSHIP, Role.CEO].flatMap(role => {
    const name = roleName(role);
    const prefix = name.toLowerCase();
    return [
        definePolicy({
            policyId: `${prefix}-chat`,
            role,
            resource: 'chat',
            accessLevel: 'write',
            description: `${name} can use chat`
        }),
        definePolicy({
            policyId: `${prefix}-chat-history-own`,
            role,
            resource: 'chat_history',
            accessLevel: 'read',
            conditions: { isOwner: true },
            description: `${name} can view their own chat history`
        })
    ];
});

export function defaultPolicies(): readonly AccessPolicy[] {
    return [
        ...CEO_POLICIES,
        ...LEADERSHIP_POLICIES,
        ...MANAGER_POLICIES,
        ...IC_POLICIES,
        ...NEW_EMPLOYEE_POLICIES,
        ...COMMON_POLICIES
    ];
}

/**
 * Registry pre-loaded with the default set. Each call builds a fresh one.
 */
export function createDefaultRegistry(): PolicyRegistry {
    const registry = new PolicyRegistry();
    registry.registerAll(defaultPolicies());

    logger.info({ policyCount: registry.size }, 'RBAC policies initialized');
    return registry;
}
