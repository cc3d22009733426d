/**
 * Access Core Error Taxonomy
 * Machine-readable codes so callers and audit can branch without parsing text.
 */

import type { AccessDecision } from '../rbac/policy.js';

export type AccessErrorCode =
    | 'ACCESS_DENIED'
    | 'POLICY_DUPLICATE_ID'
    | 'POLICY_UNKNOWN_RESOURCE'
    | 'POLICY_UNKNOWN_ROLE'
    | 'POLICY_INVALID_LEVEL'
    | 'IDENTITY_PAYLOAD_INVALID'
    | 'IDENTITY_USER_NOT_FOUND'
    | 'REQUEST_INVALID';

/**
 * The only error a caller of the access core is expected to surface.
 * Raised at the require boundary; carries the decision reason verbatim.
 */
export class PermissionDeniedError extends Error {
    readonly code: AccessErrorCode = 'ACCESS_DENIED';
    readonly statusCode: number = 403;
    readonly decision: AccessDecision;

    constructor(decision: AccessDecision) {
        super(`Access denied: ${decision.reason}`);
        this.name = 'PermissionDeniedError';
        this.decision = decision;
        Object.setPrototypeOf(this, PermissionDeniedError.prototype);
    }

    get reason(): string {
        return this.decision.reason;
    }
}

/**
 * Malformed policy registration. Detected at startup, never during evaluation.
 */
export class PolicyConfigurationError extends Error {
    readonly code: AccessErrorCode;
    readonly policyId: string;

    constructor(code: AccessErrorCode, policyId: string, message: string) {
        super(message);
        this.name = 'PolicyConfigurationError';
        this.code = code;
        this.policyId = policyId;
        Object.setPrototypeOf(this, PolicyConfigurationError.prototype);
    }
}

/**
 * Authentication payload could not be turned into a caller context.
 */
export class InvalidIdentityPayloadError extends Error {
    readonly code: AccessErrorCode;
    readonly statusCode: number = 400;

    constructor(message: string, code: AccessErrorCode = 'IDENTITY_PAYLOAD_INVALID') {
        super(message);
        this.name = 'InvalidIdentityPayloadError';
        this.code = code;
        Object.setPrototypeOf(this, InvalidIdentityPayloadError.prototype);
    }
}

/**
 * Request body failed validation at an HTTP boundary.
 */
export class InvalidRequestError extends Error {
    readonly code: AccessErrorCode = 'REQUEST_INVALID';
    readonly statusCode: number = 400;

    constructor(message: string) {
        super(message);
        this.name = 'InvalidRequestError';
        Object.setPrototypeOf(this, InvalidRequestError.prototype);
    }
}
