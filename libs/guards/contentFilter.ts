/**
 * Content Filters
 *
 * Text and payload redaction applied on the way out. Both filters are pure
 * and idempotent: running them on their own output changes nothing.
 */

import type { UserContext } from '../context/identity.js';
import { Role, roleAtLeast } from '../rbac/roles.js';

interface RedactionPattern {
    readonly pattern: RegExp;
    readonly replacement: string;
}

const BODY_PATTERNS: readonly RedactionPattern[] = [
    { pattern: /salary[:\s]+\$[\d,]+/gi, replacement: '[SALARY REDACTED]' },
    { pattern: /compensation[:\s]+\$[\d,]+/gi, replacement: '[COMPENSATION REDACTED]' },
    { pattern: /revenue[:\s]+\$[\d,]+[BMK]?/gi, replacement: '[REVENUE REDACTED]' },
    { pattern: /budget[:\s]+\$[\d,]+[BMK]?/gi, replacement: '[BUDGET REDACTED]' }
];

/** Roles at or above this see financial figures in chat bodies. */
export const BODY_REDACTION_EXEMPT_ROLE = Role.MANAGER;

/** Roles at or above this see sensitive fields in structured payloads. */
export const FIELD_REDACTION_EXEMPT_ROLE = Role.LEADERSHIP;

export const DEFAULT_SENSITIVE_FIELDS: readonly string[] = [
    'salary',
    'compensation',
    'ssn',
    'social_security',
    'bank_account',
    'personal_email',
    'home_address',
    'phone_number'
];

export const FIELD_REDACTED = '[REDACTED]';

const MAX_FILTER_DEPTH = 10;

export function redactSensitiveContent(role: Role, text: string): string {
    if (roleAtLeast(role, BODY_REDACTION_EXEMPT_ROLE)) {
        return text;
    }

    return BODY_PATTERNS.reduce(
        (filtered, { pattern, replacement }) => filtered.replace(pattern, replacement),
        text
    );
}

export type JsonObject = { [key: string]: unknown };

function isPlainObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Replace the value of every key that contains a sensitive field name
 * (case-insensitive substring match) with "[REDACTED]", walking nested
 * objects and arrays of objects. Nesting beyond ten levels is returned as is.
 */
export function filterResponseForUser(
    data: JsonObject,
    context: UserContext,
    sensitiveFields: readonly string[] = DEFAULT_SENSITIVE_FIELDS
): JsonObject {
    const seesSensitive = roleAtLeast(context.role, FIELD_REDACTION_EXEMPT_ROLE);
    const needles = sensitiveFields.map(field => field.toLowerCase());

    const filterObject = (input: JsonObject, depth: number): JsonObject => {
        if (depth > MAX_FILTER_DEPTH) {
            return input;
        }

        const output: JsonObject = {};
        for (const [key, value] of Object.entries(input)) {
            const lowered = key.toLowerCase();

            if (needles.some(needle => lowered.includes(needle))) {
                output[key] = seesSensitive ? value : FIELD_REDACTED;
            } else if (isPlainObject(value)) {
                output[key] = filterObject(value, depth + 1);
            } else if (Array.isArray(value)) {
                output[key] = value.map(item => isPlainObject(item) ? filterObject(item, depth + 1) : item);
            } else {
                output[key] = value;
            }
        }
        return output;
    };

    return filterObject(data, 0);
}
