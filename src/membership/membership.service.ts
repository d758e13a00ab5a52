import { ConflictException, Injectable, Logger, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, IsNull, Repository } from 'typeorm';
import { Page } from '../common/dto/pagination-query.dto';
import { ACTIVE_ROLES, Role } from '../common/role';
import { Membership } from './entities/membership.entity';
import { PermissionChecker } from './permission-checker';

type MembershipChange = Pick<Membership, 'role'> & Partial<Pick<Membership, 'companyId'>>;

const LEFT_COMPANY: MembershipChange = { role: Role.UNEMPLOYED, companyId: null };

@Injectable()
export class MembershipService {
    private readonly logger = new Logger(MembershipService.name);

    constructor(
        @InjectRepository(Membership)
        private membershipRepository: Repository<Membership>,
        private permissions: PermissionChecker,
    ) { }

    async listMembers(actorId: number, companyId: number, page: Page): Promise<Membership[]> {
        if (!(await this.permissions.hasPermission(actorId, companyId))) {
            throw new UnauthorizedException();
        }
        return this.membershipRepository.find({
            where: { companyId, role: In([...ACTIVE_ROLES]) },
            order: { id: 'ASC' },
            skip: page.skip,
            take: page.take,
        });
    }

    async listAdmins(actorId: number, companyId: number, page: Page): Promise<Membership[]> {
        if (!(await this.permissions.hasPermission(actorId, companyId))) {
            throw new UnauthorizedException();
        }
        return this.membershipRepository.find({
            where: { companyId, role: Role.ADMIN },
            order: { id: 'ASC' },
            skip: page.skip,
            take: page.take,
        });
    }

    isMember(userId: number, companyId: number, manager?: EntityManager): Promise<boolean> {
        const repository = manager ? manager.getRepository(Membership) : this.membershipRepository;
        return repository.existsBy({ userId, companyId });
    }

    async removeMember(actorId: number, companyId: number, targetUserId: number): Promise<Membership> {
        await this.requireOwner(actorId, companyId);
        if (actorId === targetUserId) {
            this.logger.warn(`User ${actorId} tried to remove themselves from company ${companyId}`);
            throw new UnauthorizedException('The owner cannot remove themselves');
        }

        const member = await this.membershipRepository.findOneBy({ userId: targetUserId, companyId });
        if (!member) {
            throw new NotFoundException(`User ${targetUserId} is not a member of company ${companyId}`);
        }
        if (member.role === Role.OWNER) {
            this.logger.warn(`User ${actorId} tried to remove the owner of company ${companyId}`);
            throw new UnauthorizedException('The owner cannot be removed');
        }

        const removed = await this.transition(member, [Role.MEMBER, Role.ADMIN], LEFT_COMPANY);
        this.logger.log(`User ${targetUserId} removed from company ${companyId} by ${actorId}`);
        return removed;
    }

    async leaveCompany(userId: number, companyId: number): Promise<Membership> {
        const member = await this.membershipRepository.findOneBy({ userId, companyId });
        if (!member || member.role === Role.OWNER) {
            this.logger.warn(`User ${userId} cannot leave company ${companyId}`);
            throw new UnauthorizedException();
        }

        const left = await this.transition(member, [Role.MEMBER, Role.ADMIN], LEFT_COMPANY);
        this.logger.log(`User ${userId} left company ${companyId}`);
        return left;
    }

    async appointAdmin(ownerId: number, companyId: number, targetUserId: number): Promise<Membership> {
        await this.requireOwner(ownerId, companyId);
        const member = await this.membershipRepository.findOneBy({ userId: targetUserId, companyId });
        if (!member || member.role !== Role.MEMBER) {
            throw new NotFoundException(`User ${targetUserId} is not a member eligible to become admin`);
        }
        return this.transition(member, [Role.MEMBER], { role: Role.ADMIN });
    }

    async removeAdmin(ownerId: number, companyId: number, targetUserId: number): Promise<Membership> {
        await this.requireOwner(ownerId, companyId);
        const member = await this.membershipRepository.findOneBy({ userId: targetUserId, companyId });
        if (!member || member.role !== Role.ADMIN) {
            throw new NotFoundException(`User ${targetUserId} is not an admin of company ${companyId}`);
        }
        return this.transition(member, [Role.ADMIN], { role: Role.MEMBER });
    }

    /** Makes `userId` a MEMBER of `companyId` inside the caller's transaction. */
    joinCompany(manager: EntityManager, userId: number, companyId: number): Promise<Membership> {
        return this.affiliate(manager, userId, companyId, Role.MEMBER);
    }

    /** Company creation only. */
    assignOwner(manager: EntityManager, userId: number, companyId: number): Promise<Membership> {
        return this.affiliate(manager, userId, companyId, Role.OWNER);
    }

    async ensureUnaffiliated(userId: number, manager?: EntityManager): Promise<void> {
        const repository = manager ? manager.getRepository(Membership) : this.membershipRepository;
        const current = await repository.findOneBy({ userId });
        if (current && current.companyId !== null) {
            throw new ConflictException(`User ${userId} already belongs to company ${current.companyId}`);
        }
    }

    private async affiliate(manager: EntityManager, userId: number, companyId: number, role: Role): Promise<Membership> {
        const repository = manager.getRepository(Membership);
        const existing = await repository.findOneBy({ userId });

        if (!existing) {
            return repository.save(repository.create({ userId, companyId, role }));
        }

        // Only a row without a company may be claimed.
        const result = await repository.update({ id: existing.id, companyId: IsNull() }, { companyId, role });
        if (!result.affected) {
            throw new ConflictException(
                existing.companyId === companyId
                    ? `User ${userId} is already a member of company ${companyId}`
                    : `User ${userId} already belongs to another company`,
            );
        }
        return repository.findOneByOrFail({ id: existing.id });
    }

    private async requireOwner(userId: number, companyId: number): Promise<void> {
        if (!(await this.permissions.findOwner(userId, companyId))) {
            this.logger.warn(`User ${userId} is not the owner of company ${companyId}`);
            throw new UnauthorizedException('Only the company owner can do this');
        }
    }

    // Applies `changes` only if the row still has one of the `from` roles in the same company.
    private async transition(member: Membership, from: Role[], changes: MembershipChange): Promise<Membership> {
        const result = await this.membershipRepository.update(
            { id: member.id, companyId: member.companyId ?? IsNull(), role: In(from) },
            changes,
        );
        if (!result.affected) {
            throw new NotFoundException(`Membership of user ${member.userId} changed concurrently`);
        }
        return this.membershipRepository.findOneByOrFail({ id: member.id });
    }
}
