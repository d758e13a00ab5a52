/**
 * Membership roles as persisted in the `member.role` column.
 *
 * The stored integers do not follow privilege: OWNER is 1 but outranks ADMIN (2)
 * and MEMBER (3). Compare roles with {@link isAtLeast}, never with `<` or `>`.
 */
export enum Role {
    UNEMPLOYED = 0,
    OWNER = 1,
    ADMIN = 2,
    MEMBER = 3,
}

const PRIVILEGE: Record<Role, number> = {
    [Role.UNEMPLOYED]: 0,
    [Role.MEMBER]: 1,
    [Role.ADMIN]: 2,
    [Role.OWNER]: 3,
};

export const ACTIVE_ROLES: readonly Role[] = [Role.MEMBER, Role.ADMIN, Role.OWNER];

export function isAtLeast(role: Role, minimum: Role): boolean {
    return PRIVILEGE[role] >= PRIVILEGE[minimum];
}
