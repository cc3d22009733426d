/**
 * Access Audit Schema
 *
 * Every decision (allow and deny) and every filtered agent interaction is
 * recorded in this shape, whatever sink ends up storing it.
 */

import type { ScopeFilters } from '../rbac/policy.js';
import type { RoleName } from '../rbac/roles.js';

export type AccessAuditEventType =
    | 'access_granted'
    | 'access_denied'
    | 'chat_response'
    | 'chat_filtered'
    | 'mcp_tool_call'
    | 'mcp_tool_blocked';

export type AccessAuditResult = 'success' | 'denied' | 'filtered';

export interface AccessAuditRecord {
    eventId: string;        // UUID
    eventType: AccessAuditEventType;
    timestamp: string;      // ISO-8601
    actor: {
        userId: string;
        role: RoleName;
        teamId: string;
        departmentId: string;
        organizationId: string;
    };
    resource: string | null;
    result: AccessAuditResult;
    policyId: string | null;
    reason: string | null;
    scopeFilters: ScopeFilters;
    session: {
        sessionId: string | null;
        ipAddress: string | null;
        userAgent: string | null;
    };
    metadata: Record<string, unknown>;
}

export interface ChainedAuditRecord extends AccessAuditRecord {
    integrity: {
        prevHash: string;     // Hash of the immediately preceding record
        hash: string;         // SHA-256(this_record_serialized || prevHash)
    };
}

/** Events that page someone when they occur. */
export const SENSITIVE_EVENT_TYPES: ReadonlySet<AccessAuditEventType> = new Set([
    'access_denied',
    'mcp_tool_blocked'
]);
