import { ConflictException, Injectable, Logger, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, FindOptionsWhere, Repository } from 'typeorm';
import { Page } from '../common/dto/pagination-query.dto';
import { validateDto } from '../common/validation';
import { Company } from '../companies/entities/company.entity';
import { MembershipService } from '../membership/membership.service';
import { PermissionChecker } from '../membership/permission-checker';
import { UsersService } from '../users/users.service';
import { InvitationResponse } from './dto/invitation-response.dto';
import { JoinRequestDto } from './dto/join-request.dto';
import { SendInvitationDto } from './dto/send-invitation.dto';
import { Invitation, InvitationStatus } from './entities/invitation.entity';

type Resolution = InvitationStatus.ACCEPTED | InvitationStatus.DECLINED;

@Injectable()
export class InvitationsService {
    private readonly logger = new Logger(InvitationsService.name);

    constructor(
        @InjectRepository(Invitation)
        private invitationRepository: Repository<Invitation>,
        @InjectRepository(Company)
        private companyRepository: Repository<Company>,
        @InjectDataSource()
        private dataSource: DataSource,
        private membershipService: MembershipService,
        private permissions: PermissionChecker,
        private usersService: UsersService,
    ) { }

    async sendInvitation(senderId: number, input: SendInvitationDto): Promise<InvitationResponse> {
        const dto = await validateDto(SendInvitationDto, input);

        if (!(await this.permissions.findOwner(senderId, dto.companyId))) {
            this.logger.warn(`User ${senderId} cannot invite to company ${dto.companyId}`);
            throw new UnauthorizedException('Only the company owner can send invitations');
        }
        const company = await this.findCompany(dto.companyId);
        const receiver = await this.usersService.findById(dto.receiverId);

        if (await this.membershipService.isMember(receiver.id, company.id)) {
            throw new ConflictException(`User ${receiver.id} is already a member of company ${company.id}`);
        }
        await this.ensureNoPending({ senderId, receiverId: receiver.id, companyId: company.id });

        const invitation = await this.invitationRepository.save(this.invitationRepository.create({
            title: dto.title,
            description: dto.description,
            senderId,
            receiverId: receiver.id,
            companyId: company.id,
            status: InvitationStatus.PENDING,
        }));
        this.logger.log(`Invitation ${invitation.id} sent by ${senderId} to ${receiver.id}`);
        return this.toResponse(invitation, company.name, receiver.username);
    }

    /** A join request is an invitation addressed to the company owner. */
    async requestToJoin(userId: number, companyId: number, input: JoinRequestDto): Promise<InvitationResponse> {
        const dto = await validateDto(JoinRequestDto, input);
        const company = await this.findCompany(companyId);

        if (await this.membershipService.isMember(userId, companyId)) {
            throw new ConflictException(`User ${userId} is already a member of company ${companyId}`);
        }
        await this.ensureNoPending({ senderId: userId, receiverId: company.ownerId, companyId });

        const owner = await this.usersService.findById(company.ownerId);
        const request = await this.invitationRepository.save(this.invitationRepository.create({
            title: dto.title,
            description: dto.description,
            senderId: userId,
            receiverId: company.ownerId,
            companyId,
            status: InvitationStatus.PENDING,
        }));
        this.logger.log(`Join request ${request.id} from ${userId} to company ${companyId}`);
        return this.toResponse(request, company.name, owner.username);
    }

    accept(invitationId: number, actorId: number): Promise<InvitationResponse> {
        return this.resolve(invitationId, actorId, InvitationStatus.ACCEPTED);
    }

    decline(invitationId: number, actorId: number): Promise<InvitationResponse> {
        return this.resolve(invitationId, actorId, InvitationStatus.DECLINED);
    }

    async cancel(invitationId: number, actorId: number): Promise<number> {
        const invitation = await this.invitationRepository.findOneBy({ id: invitationId });
        if (!invitation) {
            throw new NotFoundException(`Invitation ${invitationId} not found`);
        }
        if (invitation.senderId !== actorId) {
            this.logger.warn(`User ${actorId} cannot cancel invitation ${invitationId}`);
            throw new UnauthorizedException();
        }

        const result = await this.invitationRepository.delete({ id: invitationId, status: InvitationStatus.PENDING });
        if (!result.affected) {
            this.logger.warn(`Invitation ${invitationId} is already ${invitation.status}`);
            throw new UnauthorizedException('Invitation is already resolved');
        }
        this.logger.log(`Invitation ${invitationId} cancelled by ${actorId}`);
        return invitationId;
    }

    listReceived(userId: number, page: Page): Promise<InvitationResponse[]> {
        return this.list({ receiverId: userId }, page);
    }

    listSent(userId: number, page: Page): Promise<InvitationResponse[]> {
        return this.list({ senderId: userId }, page);
    }

    // The status change and the resulting membership commit or roll back together.
    private async resolve(invitationId: number, actorId: number, resolution: Resolution): Promise<InvitationResponse> {
        const response = await this.dataSource.transaction(async (manager) => {
            const invitations = manager.getRepository(Invitation);
            const invitation = await invitations.findOne({ where: { id: invitationId }, relations: { company: true } });
            if (!invitation || !invitation.company) {
                throw new NotFoundException(`Invitation ${invitationId} not found`);
            }
            const company = invitation.company;
            const isInvite = invitation.senderId === company.ownerId;

            await this.authorizeResolution(invitation, actorId, isInvite, manager);

            const result = await invitations.update(
                { id: invitationId, status: InvitationStatus.PENDING },
                { status: resolution },
            );
            if (!result.affected) {
                this.logger.warn(`Invitation ${invitationId} is already ${invitation.status}`);
                throw new UnauthorizedException('Invitation is already resolved');
            }

            if (resolution === InvitationStatus.ACCEPTED) {
                const joiningUserId = isInvite ? invitation.receiverId : invitation.senderId;
                await this.membershipService.joinCompany(manager, joiningUserId, company.id);
            }

            const receiver = await this.usersService.findById(invitation.receiverId, manager);
            return this.toResponse({ ...invitation, status: resolution }, company.name, receiver.username);
        });

        this.logger.log(`Invitation ${invitationId} ${resolution} by user ${actorId}`);
        return response;
    }

    private async authorizeResolution(
        invitation: Invitation,
        actorId: number,
        isInvite: boolean,
        manager: EntityManager,
    ): Promise<void> {
        const isReceiver = invitation.receiverId === actorId;
        // Ownership may have moved since the request was filed.
        const allowed = isInvite
            ? isReceiver
            : isReceiver && (await this.permissions.findOwner(actorId, invitation.companyId, manager)) !== null;

        if (!allowed) {
            this.logger.warn(`User ${actorId} cannot resolve invitation ${invitation.id}`);
            throw new UnauthorizedException();
        }
    }

    private async list(where: FindOptionsWhere<Invitation>, page: Page): Promise<InvitationResponse[]> {
        const invitations = await this.invitationRepository.find({
            where,
            relations: { company: true },
            order: { id: 'DESC' },
            skip: page.skip,
            take: page.take,
        });
        const receivers = await this.usersService.findByIds(invitations.map((invitation) => invitation.receiverId));

        return invitations.map((invitation) => this.toResponse(
            invitation,
            invitation.company?.name ?? '',
            receivers.get(invitation.receiverId)?.username ?? '',
        ));
    }

    private async findCompany(companyId: number): Promise<Company> {
        const company = await this.companyRepository.findOneBy({ id: companyId });
        if (!company) {
            throw new NotFoundException(`Company ${companyId} not found`);
        }
        return company;
    }

    private async ensureNoPending(where: Pick<Invitation, 'senderId' | 'receiverId' | 'companyId'>): Promise<void> {
        const exists = await this.invitationRepository.existsBy({ ...where, status: InvitationStatus.PENDING });
        if (exists) {
            throw new ConflictException('An identical pending invitation already exists');
        }
    }

    private toResponse(invitation: Invitation, companyName: string, receiverName: string): InvitationResponse {
        return {
            id: invitation.id,
            title: invitation.title,
            description: invitation.description,
            companyName,
            receiverName,
            status: invitation.status,
        };
    }
}
