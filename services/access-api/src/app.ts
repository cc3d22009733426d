import express, { Express, Request, Response } from 'express';
import type { AccessConfig } from '../../../libs/bootstrap/config.js';
import type { AccessCore } from '../../../libs/bootstrap/startup.js';
import { InvalidRequestError } from '../../../libs/errors/accessErrors.js';
import {
    accessErrorHandler,
    bootstrapHandler,
    contextFromRequest,
    userContextOf
} from '../../../libs/http/rbacMiddleware.js';
import { validate } from '../../../libs/validation/zod-middleware.js';
import { AccessCheckRequestSchema, ChatFilterRequestSchema } from '../../../libs/validation/accessRequestSchema.js';
import { gatewayClaims } from './gatewayClaims.js';

const toBadRequest = (message: string): Error => new InvalidRequestError(message);

export function createAccessApp(core: AccessCore, config: AccessConfig): Express {
    const app = express();
    app.disable('x-powered-by');
    app.use(express.json({ limit: '256kb' }));

    app.get('/healthz', (_req: Request, res: Response) => {
        res.json({ status: 'ok', policies: core.registry.size });
    });

    const api = express.Router();
    api.use(gatewayClaims());
    api.use(contextFromRequest(core.contextBuilder));

    api.get('/bootstrap', bootstrapHandler(core.guard, {
        allowDemoRoleOverride: config.RBAC_ALLOW_DEMO_ROLE && config.NODE_ENV !== 'production'
    }));

    api.get('/permissions', (_req: Request, res: Response) => {
        const context = userContextOf(res);
        if (!context) {
            res.status(401).json({ error: 'Authentication required' });
            return;
        }
        res.json({ permissions: core.engine.permissionsForRole(context.role) });
    });

    api.post('/check', (req: Request, res: Response) => {
        const context = userContextOf(res);
        if (!context) {
            res.status(401).json({ error: 'Authentication required' });
            return;
        }

        const body = validate(AccessCheckRequestSchema, req.body, 'POST /check', toBadRequest);
        const decision = core.guard.checkAccess(context, body.resource, body.level, body.attributes);

        res.json({
            allowed: decision.allowed,
            reason: decision.reason,
            policyId: decision.policyId,
            accessLevel: decision.accessLevel,
            scopeFilters: decision.scopeFilters
        });
    });

    api.post('/chat/filter', (req: Request, res: Response) => {
        const context = userContextOf(res);
        if (!context) {
            res.status(401).json({ error: 'Authentication required' });
            return;
        }

        const body = validate(ChatFilterRequestSchema, req.body, 'POST /chat/filter', toBadRequest);
        res.json(core.agentGuard.filterAgentResponse(context, body.response, body.sources, 'api'));
    });

    app.use('/v1/rbac', api);
    app.use(accessErrorHandler());

    return app;
}
