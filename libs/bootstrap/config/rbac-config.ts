import { GuardRule } from '../config-guard.js';

/**
 * Access service startup rules.
 */
export const RBAC_CONFIG_GUARDS: GuardRule[] = [
    {
        type: 'forbidIf',
        name: 'DEMO_ROLE_IN_PRODUCTION',
        when: env => env.NODE_ENV === 'production' && ['true', '1'].includes(env.RBAC_ALLOW_DEMO_ROLE ?? ''),
        message: 'Role impersonation must be disabled in production'
    },
    {
        type: 'assert',
        check: env => env.NODE_ENV !== 'production' || env.RBAC_AUDIT_SINK === 'postgres',
        message: 'RBAC_AUDIT_SINK=postgres is required in production'
    }
];
