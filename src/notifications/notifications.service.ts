import { ConflictException, Injectable, Logger, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, Repository } from 'typeorm';
import { Page } from '../common/dto/pagination-query.dto';
import { ACTIVE_ROLES } from '../common/role';
import { Membership } from '../membership/entities/membership.entity';
import { Notification, NotificationStatus } from './entities/notification.entity';

@Injectable()
export class NotificationsService {
    private readonly logger = new Logger(NotificationsService.name);

    constructor(
        @InjectRepository(Notification)
        private notificationRepository: Repository<Notification>,
    ) { }

    notify(receiverId: number, companyId: number, message: string, manager?: EntityManager): Promise<Notification> {
        const repository = this.repository(manager);
        return repository.save(repository.create({
            receiverId,
            companyId,
            message,
            status: NotificationStatus.PENDING,
        }));
    }

    /** One pending notification for every active member of the company. */
    async sendNotifications(companyId: number, message: string, manager?: EntityManager): Promise<Notification[]> {
        const members = await (manager ?? this.notificationRepository.manager)
            .getRepository(Membership)
            .findBy({ companyId, role: In([...ACTIVE_ROLES]) });
        if (members.length === 0) return [];

        const repository = this.repository(manager);
        const saved = await repository.save(members.map((member) => repository.create({
            receiverId: member.userId,
            companyId,
            message,
            status: NotificationStatus.PENDING,
        })));
        this.logger.log(`Sent ${saved.length} notifications to company ${companyId}`);
        return saved;
    }

    async markAsRead(userId: number, notificationId: number): Promise<Notification> {
        const notification = await this.notificationRepository.findOneBy({ id: notificationId });
        if (!notification) {
            throw new NotFoundException(`Notification ${notificationId} not found`);
        }
        if (notification.receiverId !== userId) {
            this.logger.warn(`User ${userId} cannot read notification ${notificationId}`);
            throw new UnauthorizedException();
        }

        const result = await this.notificationRepository.update(
            { id: notificationId, status: NotificationStatus.PENDING },
            { status: NotificationStatus.READ },
        );
        if (!result.affected) {
            throw new ConflictException(`Notification ${notificationId} is already read`);
        }
        return { ...notification, status: NotificationStatus.READ };
    }

    async markAllAsRead(userId: number): Promise<number> {
        const result = await this.notificationRepository.update(
            { receiverId: userId, status: NotificationStatus.PENDING },
            { status: NotificationStatus.READ },
        );
        return result.affected ?? 0;
    }

    findAll(userId: number, page: Page): Promise<Notification[]> {
        return this.notificationRepository.find({
            where: { receiverId: userId },
            order: { id: 'DESC' },
            skip: page.skip,
            take: page.take,
        });
    }

    private repository(manager?: EntityManager): Repository<Notification> {
        return manager ? manager.getRepository(Notification) : this.notificationRepository;
    }
}
