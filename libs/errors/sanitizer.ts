import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Internal failures are wrapped in a generic message plus an incident id.
 * Full details go to the log under that id, never to the caller.
 */
export class InternalAccessError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        contextLabel: string,
        public readonly internalDetails?: unknown,
        options?: { cause?: unknown }
    ) {
        super(publicMessage);
        this.name = 'InternalAccessError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = contextLabel;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            contextLabel,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Wrap any thrown value into an InternalAccessError.
     */
    sanitize: (err: unknown, contextLabel: string): InternalAccessError => {
        if (err instanceof InternalAccessError) return err;

        let originalErrorMessage: string;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else {
            originalErrorMessage = String(err);
        }

        return new InternalAccessError(
            'An internal access-control error occurred',
            contextLabel,
            { originalError: originalErrorMessage, stack: originalErrorStack },
            { cause: err }
        );
    }
};
