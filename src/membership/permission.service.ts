import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { isAtLeast, Role } from '../common/role';
import { Membership } from './entities/membership.entity';
import { PermissionChecker } from './permission-checker';

@Injectable()
export class PermissionService extends PermissionChecker {
    constructor(
        @InjectRepository(Membership)
        private membershipRepository: Repository<Membership>,
    ) {
        super();
    }

    hasPermission(userId: number, companyId: number, manager?: EntityManager): Promise<boolean> {
        return this.hasRoleIn(userId, companyId, Role.MEMBER, manager);
    }

    isMemberOrHigher(userId: number, companyId: number, manager?: EntityManager): Promise<boolean> {
        return this.hasRoleIn(userId, companyId, Role.MEMBER, manager);
    }

    isAdminOrHigher(userId: number, companyId: number, manager?: EntityManager): Promise<boolean> {
        return this.hasRoleIn(userId, companyId, Role.ADMIN, manager);
    }

    findOwner(userId: number, companyId: number, manager?: EntityManager): Promise<Membership | null> {
        return this.repository(manager).findOneBy({ userId, companyId, role: Role.OWNER });
    }

    private async hasRoleIn(userId: number, companyId: number, minimum: Role, manager?: EntityManager): Promise<boolean> {
        const membership = await this.repository(manager).findOneBy({ userId });
        return membership !== null && membership.companyId === companyId && isAtLeast(membership.role, minimum);
    }

    private repository(manager?: EntityManager): Repository<Membership> {
        return manager ? manager.getRepository(Membership) : this.membershipRepository;
    }
}
