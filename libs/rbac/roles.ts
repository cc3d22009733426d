/**
 * Organizational Role Ladder
 *
 * Roles are ranked; the numeric value is the only thing inheritance looks at.
 * Higher value = wider visibility.
 */

export enum Role {
    NEW_EMPLOYEE = 1,
    IC = 2,
    MANAGER = 3,
    LEADERSHIP = 4,
    CEO = 5
}

export type RoleName = keyof typeof Role;

export const ALL_ROLES: readonly Role[] = [
    Role.NEW_EMPLOYEE,
    Role.IC,
    Role.MANAGER,
    Role.LEADERSHIP,
    Role.CEO
];

/**
 * Vocabulary accepted from identity providers and HR exports.
 * Keys are lower-case; lookups lower-case the input first.
 */
const ROLE_ALIASES: ReadonlyMap<string, Role> = new Map(Object.entries({
    new_employee: Role.NEW_EMPLOYEE,
    intern: Role.NEW_EMPLOYEE,
    ic: Role.IC,
    individual_contributor: Role.IC,
    engineer: Role.IC,
    employee: Role.IC,
    manager: Role.MANAGER,
    team_lead: Role.MANAGER,
    lead: Role.MANAGER,
    leadership: Role.LEADERSHIP,
    director: Role.LEADERSHIP,
    vp: Role.LEADERSHIP,
    vice_president: Role.LEADERSHIP,
    ceo: Role.CEO,
    cto: Role.CEO,
    cfo: Role.CEO,
    executive: Role.CEO
}));

/**
 * Parse a free-form role string. Unrecognized values land on IC.
 */
export function parseRole(value: string | null | undefined): Role {
    if (!value) return Role.IC;
    return ROLE_ALIASES.get(value.trim().toLowerCase()) ?? Role.IC;
}

export function isRole(value: unknown): value is Role {
    return typeof value === 'number' && ALL_ROLES.some(role => role === value);
}

export function roleName(role: Role): RoleName {
    switch (role) {
        case Role.NEW_EMPLOYEE: return 'NEW_EMPLOYEE';
        case Role.IC: return 'IC';
        case Role.MANAGER: return 'MANAGER';
        case Role.LEADERSHIP: return 'LEADERSHIP';
        case Role.CEO: return 'CEO';
    }
}

/** True when `role` ranks at or above `minimum`. */
export function roleAtLeast(role: Role, minimum: Role): boolean {
    return role >= minimum;
}
