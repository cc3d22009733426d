/**
 * Caller Context Builder
 *
 * Turns whatever the authenticator produced (verified token claims, a bare
 * user id, or nothing) into the frozen UserContext the access core decides on.
 * Token verification itself happens upstream; payloads arriving here are
 * trusted for authenticity and only checked for shape.
 */

import { LRUCache } from 'lru-cache';
import { logger } from '../logging/logger.js';
import { InvalidIdentityPayloadError } from '../errors/accessErrors.js';
import { Role, parseRole } from '../rbac/roles.js';
import {
    DirectoryEntry,
    DirectoryEntryInput,
    DirectoryEntrySchema,
    TokenPayloadSchema
} from '../validation/identitySchema.js';
import { validate } from '../validation/zod-middleware.js';
import { SessionMetadata, UserContext, createUserContext } from './identity.js';

export const ANONYMOUS_USER_ID = 'anonymous';
export const DEFAULT_ORGANIZATION_ID = 'default';

/**
 * Source of organizational facts: team, department, reporting line, projects.
 * Returns null for an unknown user.
 */
export interface OrgDirectory {
    lookup(userId: string): Promise<DirectoryEntryInput | null>;
}

export interface ContextBuilderOptions {
    directory?: OrgDirectory;
    cacheTtlMs?: number;
    cacheMax?: number;
}

export interface ResolveInput {
    tokenPayload?: unknown;
    userId?: string;
    session?: SessionMetadata;
}

const NO_ENTRY = 'none';
type CachedEntry = DirectoryEntry | typeof NO_ENTRY;

/**
 * Directory backed by a fixed list. For local runs and tests.
 */
export class StaticOrgDirectory implements OrgDirectory {
    private readonly entries: Map<string, DirectoryEntryInput>;

    constructor(entries: Iterable<DirectoryEntryInput>) {
        this.entries = new Map([...entries].map(entry => [entry.userId, entry]));
    }

    public async lookup(userId: string): Promise<DirectoryEntryInput | null> {
        return this.entries.get(userId) ?? null;
    }
}

export class ContextBuilder {
    private readonly directory?: OrgDirectory;
    private readonly cache: LRUCache<string, CachedEntry>;

    constructor(options: ContextBuilderOptions = {}) {
        this.directory = options.directory;
        this.cache = new LRUCache<string, CachedEntry>({
            max: options.cacheMax ?? 5000,
            ttl: options.cacheTtlMs ?? 5 * 60 * 1000
        });
    }

    /**
     * Build a context from verified token claims. Claims win over directory
     * data; the directory fills what the token leaves out.
     * @throws InvalidIdentityPayloadError when `sub` is missing or malformed
     */
    public async fromTokenPayload(payload: unknown, session: SessionMetadata = {}): Promise<UserContext> {
        const claims = validate(
            TokenPayloadSchema,
            payload,
            'ContextBuilder.fromTokenPayload',
            message => new InvalidIdentityPayloadError(message)
        );

        const entry = await this.fetchEntry(claims.sub);

        return createUserContext({
            userId: claims.sub,
            role: parseRole(claims.role ?? entry?.role),
            teamId: claims.team_id ?? entry?.teamId ?? '',
            departmentId: claims.department_id ?? entry?.departmentId ?? '',
            organizationId: claims.org_id ?? entry?.organizationId ?? DEFAULT_ORGANIZATION_ID,
            email: claims.email ?? entry?.email,
            name: claims.name ?? entry?.name,
            managerId: entry?.managerId,
            directReports: entry?.directReports ?? [],
            projectIds: entry?.projectIds ?? [],
            ...session
        });
    }

    /**
     * Build a context purely from the directory.
     * @throws InvalidIdentityPayloadError when the user is unknown
     */
    public async fromUserId(userId: string, session: SessionMetadata = {}): Promise<UserContext> {
        const entry = await this.fetchEntry(userId);
        if (!entry) {
            throw new InvalidIdentityPayloadError(`User not found: ${userId}`, 'IDENTITY_USER_NOT_FOUND');
        }

        return createUserContext({
            userId,
            role: parseRole(entry.role),
            teamId: entry.teamId ?? '',
            departmentId: entry.departmentId ?? '',
            organizationId: entry.organizationId ?? DEFAULT_ORGANIZATION_ID,
            email: entry.email,
            name: entry.name,
            managerId: entry.managerId,
            directReports: entry.directReports,
            projectIds: entry.projectIds,
            ...session
        });
    }

    /**
     * Most restrictive context, for unauthenticated callers.
     */
    public anonymous(session: SessionMetadata = {}): UserContext {
        return createUserContext({
            userId: ANONYMOUS_USER_ID,
            role: Role.NEW_EMPLOYEE,
            teamId: '',
            departmentId: '',
            organizationId: '',
            ...session
        });
    }

    /**
     * Token first, then user id, then anonymous.
     */
    public async resolve(input: ResolveInput): Promise<UserContext> {
        const session = input.session ?? {};

        if (input.tokenPayload !== undefined && input.tokenPayload !== null) {
            return this.fromTokenPayload(input.tokenPayload, session);
        }
        if (input.userId) {
            return this.fromUserId(input.userId, session);
        }
        return this.anonymous(session);
    }

    /**
     * Copy of the context with the reporting line refreshed from the directory.
     * Unchanged when the directory has nothing for this user.
     */
    public async enrichWithOrgChart(context: UserContext): Promise<UserContext> {
        const entry = await this.fetchEntry(context.userId);
        if (!entry) {
            return context;
        }

        return createUserContext({
            ...context,
            managerId: entry.managerId ?? context.managerId,
            directReports: entry.directReports.length > 0 ? entry.directReports : context.directReports
        });
    }

    public invalidate(userId: string): void {
        this.cache.delete(userId);
    }

    private async fetchEntry(userId: string): Promise<DirectoryEntry | null> {
        if (!this.directory) {
            return null;
        }

        const cached = this.cache.get(userId);
        if (cached !== undefined) {
            return cached === NO_ENTRY ? null : cached;
        }

        try {
            const raw = await this.directory.lookup(userId);
            const entry = raw === null ? null : DirectoryEntrySchema.parse(raw);
            this.cache.set(userId, entry ?? NO_ENTRY);
            return entry;
        } catch (error) {
            // Directory trouble degrades to "no extra data"; it never fails the request.
            logger.warn({
                userId,
                error: error instanceof Error ? error.message : String(error)
            }, 'Org directory lookup failed');
            return null;
        }
    }
}
