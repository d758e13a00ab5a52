import { ConflictException, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Role } from '../common/role';
import { Company } from '../companies/entities/company.entity';
import { User } from '../users/entities/user.entity';
import { createTestApp, seedCompany, seedMembership, seedUser, TestApp } from '../testing/test-app';
import { Membership } from './entities/membership.entity';
import { MembershipModule } from './membership.module';
import { MembershipService } from './membership.service';

describe('MembershipService', () => {
    let app: TestApp;
    let dataSource: DataSource;
    let service: MembershipService;
    let owner: User;
    let admin: User;
    let member: User;
    let company: Company;

    const membershipOf = (userId: number) => dataSource.getRepository(Membership).findOneByOrFail({ userId });

    beforeEach(async () => {
        app = await createTestApp([MembershipModule]);
        dataSource = app.dataSource;
        service = app.moduleRef.get(MembershipService);

        owner = await seedUser(dataSource, 'owner');
        admin = await seedUser(dataSource, 'admin');
        member = await seedUser(dataSource, 'member');
        company = await seedCompany(dataSource, owner.id);
        await seedMembership(dataSource, admin.id, company.id, Role.ADMIN);
        await seedMembership(dataSource, member.id, company.id, Role.MEMBER);
    });

    afterEach(async () => {
        await app.moduleRef.close();
    });

    describe('removeMember', () => {
        it('detaches the member from the company', async () => {
            const removed = await service.removeMember(owner.id, company.id, member.id);

            expect(removed.role).toBe(Role.UNEMPLOYED);
            expect(removed.companyId).toBeNull();
        });

        it('is reserved for the owner', async () => {
            await expect(service.removeMember(admin.id, company.id, member.id)).rejects.toBeInstanceOf(UnauthorizedException);
            expect((await membershipOf(member.id)).role).toBe(Role.MEMBER);
        });

        it('refuses self-removal', async () => {
            await expect(service.removeMember(owner.id, company.id, owner.id)).rejects.toBeInstanceOf(UnauthorizedException);
            expect((await membershipOf(owner.id)).role).toBe(Role.OWNER);
        });

        it('reports the missing ownership before the self-removal', async () => {
            await expect(service.removeMember(member.id, company.id, member.id))
                .rejects.toThrow('Only the company owner can do this');
            await expect(service.removeMember(owner.id, company.id, owner.id))
                .rejects.toThrow('The owner cannot remove themselves');
        });

        it('reports users outside the company as not found', async () => {
            const outsider = await seedUser(dataSource, 'outsider');
            await expect(service.removeMember(owner.id, company.id, outsider.id)).rejects.toBeInstanceOf(NotFoundException);
        });
    });

    describe('leaveCompany', () => {
        it('lets admins and members leave', async () => {
            const left = await service.leaveCompany(admin.id, company.id);
            expect(left.role).toBe(Role.UNEMPLOYED);
            expect(left.companyId).toBeNull();
        });

        it('does not let the owner leave', async () => {
            await expect(service.leaveCompany(owner.id, company.id)).rejects.toBeInstanceOf(UnauthorizedException);
        });

        it('rejects users who are not in the company', async () => {
            const outsider = await seedUser(dataSource, 'outsider');
            await expect(service.leaveCompany(outsider.id, company.id)).rejects.toBeInstanceOf(UnauthorizedException);
        });
    });

    describe('admin appointments', () => {
        it('promotes a member and demotes them back', async () => {
            expect((await service.appointAdmin(owner.id, company.id, member.id)).role).toBe(Role.ADMIN);
            expect((await service.removeAdmin(owner.id, company.id, member.id)).role).toBe(Role.MEMBER);
        });

        it('only promotes plain members', async () => {
            await expect(service.appointAdmin(owner.id, company.id, admin.id)).rejects.toBeInstanceOf(NotFoundException);
            await expect(service.appointAdmin(owner.id, company.id, owner.id)).rejects.toBeInstanceOf(NotFoundException);
        });

        it('only demotes admins', async () => {
            await expect(service.removeAdmin(owner.id, company.id, member.id)).rejects.toBeInstanceOf(NotFoundException);
            await expect(service.removeAdmin(owner.id, company.id, owner.id)).rejects.toBeInstanceOf(NotFoundException);
        });

        it('requires the owner', async () => {
            await expect(service.appointAdmin(admin.id, company.id, member.id)).rejects.toBeInstanceOf(UnauthorizedException);
        });
    });

    it('never produces an owner', async () => {
        await service.appointAdmin(owner.id, company.id, member.id);
        await service.removeAdmin(owner.id, company.id, member.id);
        await service.removeMember(owner.id, company.id, admin.id);
        await service.leaveCompany(member.id, company.id);

        const owners = await dataSource.getRepository(Membership).findBy({ role: Role.OWNER });
        expect(owners.map((row) => row.userId)).toEqual([owner.id]);
    });

    describe('joinCompany', () => {
        it('reuses the row of a user who left', async () => {
            await service.leaveCompany(member.id, company.id);
            const before = await membershipOf(member.id);

            const joined = await dataSource.transaction((manager) => service.joinCompany(manager, member.id, company.id));

            expect(joined.id).toBe(before.id);
            expect(joined.role).toBe(Role.MEMBER);
            expect(joined.companyId).toBe(company.id);
        });

        it('creates a row for a user seen for the first time', async () => {
            const newcomer = await seedUser(dataSource, 'newcomer');
            const joined = await dataSource.transaction((manager) => service.joinCompany(manager, newcomer.id, company.id));
            expect(joined.role).toBe(Role.MEMBER);
        });

        it('conflicts when the user is active anywhere', async () => {
            const otherOwner = await seedUser(dataSource, 'other-owner');
            const other = await seedCompany(dataSource, otherOwner.id, 'Globex');

            await expect(dataSource.transaction((manager) => service.joinCompany(manager, member.id, company.id)))
                .rejects.toBeInstanceOf(ConflictException);
            await expect(dataSource.transaction((manager) => service.joinCompany(manager, member.id, other.id)))
                .rejects.toBeInstanceOf(ConflictException);
        });
    });

    it('lists the admins of the company', async () => {
        const admins = await service.listAdmins(member.id, company.id, { skip: 0, take: 10 });
        expect(admins.map((row) => row.userId)).toEqual([admin.id]);

        const outsider = await seedUser(dataSource, 'outsider');
        await expect(service.listAdmins(outsider.id, company.id, { skip: 0, take: 10 }))
            .rejects.toBeInstanceOf(UnauthorizedException);
    });

    it('lists active members for members of the company', async () => {
        const members = await service.listMembers(member.id, company.id, { skip: 0, take: 10 });
        expect(members.map((row) => row.userId)).toEqual([owner.id, admin.id, member.id]);

        const outsider = await seedUser(dataSource, 'outsider');
        await expect(service.listMembers(outsider.id, company.id, { skip: 0, take: 10 }))
            .rejects.toBeInstanceOf(UnauthorizedException);
    });
});
