import { z } from 'zod';

/**
 * Access Core Runtime Configuration
 * Read from the environment once, validated, then frozen.
 */

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1');

export const AccessConfigSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
    RBAC_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    RBAC_DIRECTORY_CACHE_TTL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
    RBAC_DIRECTORY_CACHE_MAX: z.coerce.number().int().positive().default(5000),
    RBAC_ALLOW_DEMO_ROLE: booleanFlag.default('false'),
    RBAC_AUDIT_SINK: z.enum(['memory', 'postgres']).default('memory'),
    RBAC_HTTP_PORT: z.coerce.number().int().positive().default(8080),
    RBAC_DIRECTORY_FILE: z.string().min(1).optional(),

    DB_HOST: z.string().min(1).optional(),
    DB_PORT: z.coerce.number().int().positive().optional(),
    DB_USER: z.string().min(1).optional(),
    DB_PASSWORD: z.string().min(1).optional(),
    DB_NAME: z.string().min(1).optional(),
    DB_POOL_MAX: z.coerce.number().int().positive().default(20),
    DB_CA_CERT: z.string().optional(),
    DB_SSL_QUERY: booleanFlag.default('false')
});

export type AccessConfig = Readonly<z.infer<typeof AccessConfigSchema>>;

/**
 * Parse configuration from an environment map.
 * Throws with every offending variable listed.
 */
export function loadAccessConfig(env: NodeJS.ProcessEnv = process.env): AccessConfig {
    const result = AccessConfigSchema.safeParse(env);

    if (!result.success) {
        const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid access configuration: ${problems.join('; ')}`);
    }

    const config = result.data;

    // Role impersonation is a development aid only.
    if (config.NODE_ENV === 'production' && config.RBAC_ALLOW_DEMO_ROLE) {
        throw new Error('Invalid access configuration: RBAC_ALLOW_DEMO_ROLE must not be enabled in production');
    }

    return Object.freeze(config);
}
