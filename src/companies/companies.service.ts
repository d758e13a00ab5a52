import { Injectable, Logger, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { Page } from '../common/dto/pagination-query.dto';
import { validateDto } from '../common/validation';
import { MembershipService } from '../membership/membership.service';
import { CreateCompanyDto } from './dto/create-company.dto';
import { UpdateCompanyDto } from './dto/update-company.dto';
import { Company } from './entities/company.entity';

@Injectable()
export class CompaniesService {
    private readonly logger = new Logger(CompaniesService.name);

    constructor(
        @InjectRepository(Company)
        private companyRepository: Repository<Company>,
        @InjectDataSource()
        private dataSource: DataSource,
        private membershipService: MembershipService,
    ) { }

    // The creator becomes OWNER in the same transaction.
    async create(ownerId: number, input: CreateCompanyDto): Promise<Company> {
        const dto = await validateDto(CreateCompanyDto, input);

        const company = await this.dataSource.transaction(async (manager) => {
            await this.membershipService.ensureUnaffiliated(ownerId, manager);
            const repository = manager.getRepository(Company);
            const saved = await repository.save(repository.create({
                name: dto.name,
                description: dto.description ?? null,
                isVisible: dto.isVisible ?? true,
                ownerId,
            }));
            await this.membershipService.assignOwner(manager, ownerId, saved.id);
            return saved;
        });

        this.logger.log(`Company ${company.id} created by user ${ownerId}`);
        return company;
    }

    async findOne(id: number): Promise<Company> {
        const company = await this.companyRepository.findOneBy({ id });
        if (!company) {
            this.logger.warn(`Company ${id} not found`);
            throw new NotFoundException(`Company ${id} not found`);
        }
        return company;
    }

    // Visible companies plus the ones the caller owns.
    findAll(actorId: number, page: Page): Promise<Company[]> {
        return this.companyRepository.find({
            where: [{ isVisible: true }, { ownerId: actorId }],
            order: { id: 'ASC' },
            skip: page.skip,
            take: page.take,
        });
    }

    async update(actorId: number, id: number, input: UpdateCompanyDto): Promise<Company> {
        const dto = await validateDto(UpdateCompanyDto, input);
        const company = await this.findOwned(actorId, id);
        if (dto.name !== undefined) company.name = dto.name;
        if (dto.description !== undefined) company.description = dto.description;
        return this.companyRepository.save(company);
    }

    async setVisibility(actorId: number, id: number, isVisible: boolean): Promise<Company> {
        const company = await this.findOwned(actorId, id);
        company.isVisible = isVisible;
        return this.companyRepository.save(company);
    }

    // Memberships, invitations and quizzes go with it.
    async remove(actorId: number, id: number): Promise<number> {
        await this.findOwned(actorId, id);
        await this.companyRepository.delete({ id });
        this.logger.log(`Company ${id} deleted by user ${actorId}`);
        return id;
    }

    private async findOwned(actorId: number, id: number): Promise<Company> {
        const company = await this.findOne(id);
        if (company.ownerId !== actorId) {
            this.logger.warn(`User ${actorId} is not the owner of company ${id}`);
            throw new UnauthorizedException();
        }
        return company;
    }
}
