import { GuardRule } from '../config-guard.js';

const usesPostgresAudit = (env: NodeJS.ProcessEnv): boolean => env.RBAC_AUDIT_SINK === 'postgres';

/**
 * Database connection parameters. Only required when audit records go to
 * PostgreSQL.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST', when: usesPostgresAudit },
    { type: 'required', name: 'DB_PORT', when: usesPostgresAudit },
    { type: 'required', name: 'DB_USER', when: usesPostgresAudit },
    { type: 'required', name: 'DB_PASSWORD', sensitive: true, when: usesPostgresAudit },
    { type: 'required', name: 'DB_NAME', when: usesPostgresAudit },

    {
        type: 'assert',
        check: env =>
            !usesPostgresAudit(env) ||
            !['production', 'staging'].includes(env.NODE_ENV ?? '') ||
            !!env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging',
    }
];
