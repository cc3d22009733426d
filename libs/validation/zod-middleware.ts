import { z } from 'zod';
import { logger } from '../logging/logger.js';

/**
 * Parse `data` or throw. The offending paths are logged; the data itself is
 * not, since payloads here carry identity fields.
 */
export function validate<S extends z.ZodTypeAny>(
    schema: S,
    data: unknown,
    context: string,
    toError: (message: string) => Error = message => new Error(message)
): z.output<S> {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({
            context,
            errors: errorDetails
        }, "Input validation failure");

        throw toError(`Validation failed in ${context}: ${JSON.stringify(errorDetails)}`);
    }

    return result.data;
}
