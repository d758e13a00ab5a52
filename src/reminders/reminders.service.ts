import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { ACTIVE_ROLES } from '../common/role';
import { Company } from '../companies/entities/company.entity';
import { CompletionCacheService } from '../completions/completion-cache.service';
import { Membership } from '../membership/entities/membership.entity';
import { NotificationsService } from '../notifications/notifications.service';
import { Quiz } from '../quizzes/entities/quiz.entity';

export const reminderMessage = (quizId: number) =>
    `You didn't complete available quiz: ${quizId}. Please complete it in next 24h!`;

const HOUR_MS = 60 * 60 * 1000;

/**
 * Reminds every active member about each quiz of their company they have not
 * completed within the trailing window.
 */
@Injectable()
export class RemindersService implements OnApplicationShutdown {
    private readonly logger = new Logger(RemindersService.name);
    private readonly windowMs: number;
    private readonly inFlight = new Set<AbortController>();

    constructor(
        @InjectRepository(Company)
        private companyRepository: Repository<Company>,
        @InjectRepository(Membership)
        private membershipRepository: Repository<Membership>,
        @InjectRepository(Quiz)
        private quizRepository: Repository<Quiz>,
        private completionCache: CompletionCacheService,
        private notificationsService: NotificationsService,
        configService: ConfigService,
    ) {
        this.windowMs = configService.get<number>('reminders.windowHours', 24) * HOUR_MS;
    }

    @Cron(CronExpression.EVERY_DAY_AT_MIDNIGHT, { name: 'quiz-reminders' })
    async handleCron() {
        await this.runReminderPass();
    }

    async runReminderPass(signal?: AbortSignal): Promise<void> {
        const controller = new AbortController();
        const forward = () => controller.abort();
        signal?.addEventListener('abort', forward);
        this.inFlight.add(controller);

        const cutoff = Date.now() - this.windowMs;
        let sent = 0;

        try {
            const companies = await this.companyRepository.find({ order: { id: 'ASC' } });
            for (const company of companies) {
                if (controller.signal.aborted || signal?.aborted) {
                    this.logger.warn('Reminder pass aborted');
                    return;
                }
                try {
                    sent += await this.remindCompany(company.id, cutoff);
                } catch (err) {
                    const message = err instanceof Error ? err.message : String(err);
                    this.logger.error(`Reminders for company ${company.id} failed: ${message}`);
                }
            }
            this.logger.log(`Reminder pass finished, ${sent} notifications sent`);
        } finally {
            signal?.removeEventListener('abort', forward);
            this.inFlight.delete(controller);
        }
    }

    onApplicationShutdown() {
        for (const controller of this.inFlight) {
            controller.abort();
        }
    }

    private async remindCompany(companyId: number, cutoff: number): Promise<number> {
        const [members, quizzes] = await Promise.all([
            this.membershipRepository.find({ where: { companyId, role: In([...ACTIVE_ROLES]) }, order: { id: 'ASC' } }),
            this.quizRepository.findBy({ companyId }),
        ]);

        let sent = 0;
        for (const member of members) {
            for (const quiz of quizzes) {
                try {
                    if (await this.remind(member.userId, companyId, quiz.id, cutoff)) sent++;
                } catch (err) {
                    const message = err instanceof Error ? err.message : String(err);
                    this.logger.error(`Reminder for user ${member.userId} on quiz ${quiz.id} failed: ${message}`);
                }
            }
        }
        return sent;
    }

    private async remind(userId: number, companyId: number, quizId: number, cutoff: number): Promise<boolean> {
        const records = await this.completionCache.find({ userId, companyId, quizId });
        if (records.some((record) => Date.parse(record.timestamp) >= cutoff)) {
            return false;
        }
        await this.notificationsService.notify(userId, companyId, reminderMessage(quizId));
        return true;
    }
}
