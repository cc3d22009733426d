import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { InvalidIdentityPayloadError } from '../../../libs/errors/accessErrors.js';

export const CLAIMS_HEADER = 'x-authenticated-claims';

/**
 * Reads the claims the authenticating gateway forwards as base64url JSON.
 * The gateway verifies the token and strips any client-supplied copy of the
 * header; this service must not be reachable except through it.
 */
export function gatewayClaims(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        const header = req.headers[CLAIMS_HEADER];
        if (header === undefined) {
            next();
            return;
        }

        const encoded = Array.isArray(header) ? header[0] : header;
        try {
            const decoded: unknown = JSON.parse(Buffer.from(encoded ?? '', 'base64url').toString('utf8'));
            res.locals.tokenPayload = decoded;
            next();
        } catch {
            next(new InvalidIdentityPayloadError(`Malformed ${CLAIMS_HEADER} header`));
        }
    };
}
