import { EntityManager } from 'typeorm';
import { Membership } from './entities/membership.entity';

/**
 * Authorization predicates over a user's current membership. They answer, they
 * never throw: turning `false` into an error is the caller's job.
 */
export abstract class PermissionChecker {
    /** True when the user is MEMBER or higher in exactly this company. */
    abstract hasPermission(userId: number, companyId: number, manager?: EntityManager): Promise<boolean>;

    abstract isMemberOrHigher(userId: number, companyId: number, manager?: EntityManager): Promise<boolean>;

    abstract isAdminOrHigher(userId: number, companyId: number, manager?: EntityManager): Promise<boolean>;

    /** The user's membership when they own this company, otherwise null. */
    abstract findOwner(userId: number, companyId: number, manager?: EntityManager): Promise<Membership | null>;
}
