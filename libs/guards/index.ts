/**
 * Enforcement points over the policy engine.
 *
 * RbacGuard      → per-request checks, chat filtering, UI scopes
 * AgentGuard     → agent inputs, tool calls and answers
 * contentFilter  → body and payload redaction
 */

export type {
    RbacGuardOptions,
    ChatSource,
    RestrictedSource,
    FilteredChatResponse,
    KnowledgeScope,
    McpToolPermission,
    McpToolPermissions,
    DashboardConfig,
    DashboardLevel,
    BootstrapPayload
} from './rbacGuard.js';
export { RbacGuard, RESTRICTED_TITLE, sourceResource, restrictedSource } from './rbacGuard.js';

export type {
    AgentGuardOptions,
    AgentContext,
    RetrievedDocument,
    ToolParams,
    ToolPermission
} from './agentGuard.js';
export { AgentGuard, applyToolScope, toolResource } from './agentGuard.js';

export {
    redactSensitiveContent,
    filterResponseForUser,
    DEFAULT_SENSITIVE_FIELDS,
    FIELD_REDACTED
} from './contentFilter.js';
