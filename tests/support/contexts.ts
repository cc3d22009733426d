import { UserContext, UserContextInit, createUserContext } from '../../libs/context/identity.js';
import { Role } from '../../libs/rbac/roles.js';

export function makeContext(role: Role, overrides: Partial<UserContextInit> = {}): UserContext {
    return createUserContext({
        userId: 'user-1',
        role,
        teamId: 'platform',
        departmentId: 'engineering',
        organizationId: 'default',
        ...overrides
    });
}
