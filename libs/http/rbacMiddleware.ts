/**
 * Express glue for the access core.
 *
 * The upstream authenticator leaves verified token claims on
 * `res.locals.tokenPayload`. contextFromRequest turns them into a UserContext
 * and runs the rest of the chain inside RequestContext; the other factories
 * read that context back.
 */

import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { getContextLogger, logger } from '../logging/logger.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { InvalidIdentityPayloadError, InvalidRequestError, PermissionDeniedError } from '../errors/accessErrors.js';
import { ContextBuilder } from '../context/contextBuilder.js';
import { SessionMetadata, UserContext, createUserContext } from '../context/identity.js';
import { RequestContext } from '../context/requestContext.js';
import { RbacGuard } from '../guards/rbacGuard.js';
import type { ResourceAttributes } from '../rbac/policy.js';
import type { AccessLevel, ResourceType } from '../rbac/resources.js';
import { Role, parseRole, roleAtLeast, roleName } from '../rbac/roles.js';

export const SESSION_HEADER = 'x-session-id';
export const DEMO_ROLE_HEADER = 'x-demo-role';

export interface BootstrapHandlerOptions {
    /** Honour the demo role header. Never set in production. */
    allowDemoRoleOverride: boolean;
}

const contexts = new WeakMap<Response, UserContext>();

/**
 * Caller context established for this response, if any.
 */
export function userContextOf(res: Response): UserContext | undefined {
    return contexts.get(res);
}

function headerValue(req: Request, name: string): string | undefined {
    const value = req.headers[name];
    const first = Array.isArray(value) ? value[0] : value;
    return first && first.trim() !== '' ? first.trim() : undefined;
}

export function sessionFromRequest(req: Request): SessionMetadata {
    return {
        sessionId: headerValue(req, SESSION_HEADER),
        ipAddress: req.ip ?? req.socket?.remoteAddress,
        userAgent: headerValue(req, 'user-agent')
    };
}

export function contextFromRequest(builder: ContextBuilder): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const context = await builder.resolve({
                tokenPayload: res.locals.tokenPayload,
                session: sessionFromRequest(req)
            });

            contexts.set(res, context);
            res.locals.userContext = context;
            getContextLogger(context).debug({ method: req.method, path: req.path }, 'Caller context established');

            RequestContext.run(context, () => next());
        } catch (error) {
            next(error);
        }
    };
}

export function requireRole(minRole: Role): RequestHandler {
    return (_req: Request, res: Response, next: NextFunction): void => {
        const context = userContextOf(res);
        if (!context) {
            res.status(401).json({ error: 'Authentication required' });
            return;
        }

        if (!roleAtLeast(context.role, minRole)) {
            res.status(403).json({ error: `Requires ${roleName(minRole)} role or higher` });
            return;
        }

        next();
    };
}

/**
 * Gate a route on one resource check. On allow the scope filters the handler
 * must apply are left on `res.locals.rbacScope`.
 */
export function requireResourceAccess(
    guard: RbacGuard,
    resource: ResourceType,
    requiredLevel: AccessLevel = 'read',
    getAttrs?: (req: Request) => ResourceAttributes
): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        const context = userContextOf(res);
        if (!context) {
            res.status(401).json({ error: 'Authentication required' });
            return;
        }

        const decision = guard.checkAccess(context, resource, requiredLevel, getAttrs?.(req));
        if (!decision.allowed) {
            res.status(403).json({ error: 'ACCESS_DENIED', reason: decision.reason });
            return;
        }

        res.locals.rbacScope = decision.scopeFilters;
        next();
    };
}

export function bootstrapHandler(guard: RbacGuard, options: BootstrapHandlerOptions): RequestHandler {
    return (req: Request, res: Response): void => {
        const context = userContextOf(res);
        if (!context) {
            res.status(401).json({ error: 'Authentication required' });
            return;
        }

        const demoRole = options.allowDemoRoleOverride ? headerValue(req, DEMO_ROLE_HEADER) : undefined;
        const effective = demoRole === undefined
            ? context
            : createUserContext({ ...context, role: parseRole(demoRole) });

        res.json(guard.getBootstrap(effective));
    };
}

/**
 * Maps access-core errors to responses. Anything unexpected becomes a 500
 * carrying only an incident id.
 */
export function accessErrorHandler(): ErrorRequestHandler {
    return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
        void _next;

        if (err instanceof PermissionDeniedError) {
            res.status(err.statusCode).json({ error: err.code, reason: err.reason });
            return;
        }

        if (err instanceof InvalidIdentityPayloadError) {
            logger.warn({ code: err.code }, 'Rejected identity payload');
            res.status(err.statusCode).json({ error: err.code, message: err.message });
            return;
        }

        if (err instanceof InvalidRequestError) {
            res.status(err.statusCode).json({ error: err.code, message: err.message });
            return;
        }

        const incident = ErrorSanitizer.sanitize(err, 'http');
        res.status(500).json({ error: incident.publicMessage, incidentId: incident.incidentId });
    };
}
