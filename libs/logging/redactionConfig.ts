/**
 * Centralized Redaction Configuration
 * Keys that must never reach log output: credentials plus the personal
 * fields the access core itself redacts from responses.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'access_token', '*.access_token',
    'refresh_token', '*.refresh_token',
    'id_token', '*.id_token',
    'password', '*.password',
    'secret', '*.secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',
    'tokenPayload', '*.tokenPayload',

    // Personal / compensation (Root and Nested)
    'salary', '*.salary',
    'compensation', '*.compensation',
    'ssn', '*.ssn',
    'social_security', '*.social_security',
    'bank_account', '*.bank_account',
    'personal_email', '*.personal_email',
    'home_address', '*.home_address',
    'phone_number', '*.phone_number'
];

export const REDACT_CENSOR = '[REDACTED]';
