/**
 * Caller Identity Context
 * The single input every access decision is made against.
 *
 * Built once per request by the context builder and frozen; nothing in the
 * access core mutates or persists it.
 */

import { Role, roleName, RoleName } from '../rbac/roles.js';

export interface SessionMetadata {
    readonly sessionId?: string;
    readonly ipAddress?: string;
    readonly userAgent?: string;
}

export interface UserContext extends SessionMetadata {
    readonly userId: string;
    readonly role: Role;
    readonly teamId: string;
    readonly departmentId: string;
    readonly organizationId: string;

    readonly email?: string;
    readonly name?: string;
    readonly managerId?: string;
    readonly directReports: readonly string[];
    readonly projectIds: readonly string[];

    readonly createdAt: string; // ISO-8601
}

export type UserContextInit =
    Omit<UserContext, 'directReports' | 'projectIds' | 'createdAt'> &
    Partial<Pick<UserContext, 'directReports' | 'projectIds' | 'createdAt'>>;

/**
 * Serializable view attached to decisions and audit records.
 */
export interface ContextSnapshot {
    readonly userId: string;
    readonly role: RoleName;
    readonly teamId: string;
    readonly departmentId: string;
    readonly organizationId: string;
    readonly email: string | null;
    readonly name: string | null;
    readonly managerId: string | null;
    readonly directReports: readonly string[];
    readonly projectIds: readonly string[];
}

export function createUserContext(init: UserContextInit): UserContext {
    return Object.freeze({
        ...init,
        directReports: Object.freeze([...(init.directReports ?? [])]),
        projectIds: Object.freeze([...(init.projectIds ?? [])]),
        createdAt: init.createdAt ?? new Date().toISOString()
    });
}

export function isManagerOf(context: UserContext, userId: string | undefined): boolean {
    return userId !== undefined && context.directReports.includes(userId);
}

export function contextSnapshot(context: UserContext): ContextSnapshot {
    return Object.freeze({
        userId: context.userId,
        role: roleName(context.role),
        teamId: context.teamId,
        departmentId: context.departmentId,
        organizationId: context.organizationId,
        email: context.email ?? null,
        name: context.name ?? null,
        managerId: context.managerId ?? null,
        directReports: Object.freeze([...context.directReports]),
        projectIds: Object.freeze([...context.projectIds])
    });
}
