import { BadRequestException, Injectable, UnauthorizedException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Between, FindOptionsWhere, Repository } from 'typeorm';
import { AnsweredQuestion } from '../completions/entities/answered-question.entity';
import { PermissionChecker } from '../membership/permission-checker';
import { QuizzesService } from '../quizzes/quizzes.service';
import { averageScore } from './score';

type ScoredRow = Pick<AnsweredQuestion, 'userId' | 'quizId' | 'isCorrect' | 'createdAt'>;
type GroupKey = 'userId' | 'quizId';

function groupBy(rows: ScoredRow[], key: GroupKey): Map<number, ScoredRow[]> {
    const groups = new Map<number, ScoredRow[]>();
    for (const row of rows) {
        const group = groups.get(row[key]);
        if (group) group.push(row);
        else groups.set(row[key], [row]);
    }
    return groups;
}

function scoresBy(rows: ScoredRow[], key: GroupKey): Record<number, number> {
    const scores: Record<number, number> = {};
    for (const [id, group] of groupBy(rows, key)) {
        scores[id] = averageScore(group);
    }
    return scores;
}

function latestBy(rows: ScoredRow[], key: GroupKey): Record<number, Date> {
    const latest: Record<number, Date> = {};
    for (const [id, group] of groupBy(rows, key)) {
        const newest = Math.max(...group.map((row) => new Date(row.createdAt).getTime()));
        latest[id] = new Date(newest);
    }
    return latest;
}

// Scores are computed from the answer history, never from the completion cache.
@Injectable()
export class AnalyticsService {
    constructor(
        @InjectRepository(AnsweredQuestion)
        private answeredRepository: Repository<AnsweredQuestion>,
        private quizzesService: QuizzesService,
        private permissions: PermissionChecker,
    ) { }

    async systemScore(userId: number): Promise<number> {
        return averageScore(await this.rows({ userId }));
    }

    async companyScore(actorId: number, companyId: number, userId: number): Promise<number> {
        await this.requirePermission(actorId, companyId);
        return averageScore(await this.rows({ userId, companyId }));
    }

    async quizScore(actorId: number, quizId: number, userId: number): Promise<number> {
        const quiz = await this.quizzesService.findQuiz(quizId);
        await this.requirePermission(actorId, quiz.companyId);
        return averageScore(await this.rows({ userId, quizId }));
    }

    /** Average over every member's answers in the company between `from` and `to`, inclusive. */
    async rangeScore(actorId: number, companyId: number, from: Date, to: Date): Promise<number> {
        const createdAt = this.range(from, to);
        await this.requirePermission(actorId, companyId);
        return averageScore(await this.rows({ companyId, createdAt }));
    }

    /** Score of each user who answered in the company within the range, keyed by user id. */
    async memberScores(actorId: number, companyId: number, from: Date, to: Date): Promise<Record<number, number>> {
        const createdAt = this.range(from, to);
        await this.requirePermission(actorId, companyId);
        return scoresBy(await this.rows({ companyId, createdAt }), 'userId');
    }

    /** One user's score per quiz of the company within the range, keyed by quiz id. */
    async quizScores(
        actorId: number,
        companyId: number,
        userId: number,
        from: Date,
        to: Date,
    ): Promise<Record<number, number>> {
        const createdAt = this.range(from, to);
        await this.requirePermission(actorId, companyId);
        return scoresBy(await this.rows({ userId, companyId, createdAt }), 'quizId');
    }

    async myQuizScores(userId: number, from: Date, to: Date): Promise<Record<number, number>> {
        const createdAt = this.range(from, to);
        return scoresBy(await this.rows({ userId, createdAt }), 'quizId');
    }

    /** Time of each user's latest answer in the company. */
    async lastAttempts(actorId: number, companyId: number): Promise<Record<number, Date>> {
        await this.requirePermission(actorId, companyId);
        return latestBy(await this.rows({ companyId }), 'userId');
    }

    /** Time of the user's latest answer to each quiz. */
    async lastCompletions(userId: number): Promise<Record<number, Date>> {
        return latestBy(await this.rows({ userId }), 'quizId');
    }

    private rows(where: FindOptionsWhere<AnsweredQuestion>): Promise<ScoredRow[]> {
        return this.answeredRepository.find({
            where,
            select: { id: true, userId: true, quizId: true, isCorrect: true, createdAt: true },
        });
    }

    private range(from: Date, to: Date) {
        if (from.getTime() > to.getTime()) {
            throw new BadRequestException('from must not be after to');
        }
        return Between(from, to);
    }

    private async requirePermission(actorId: number, companyId: number): Promise<void> {
        if (!(await this.permissions.hasPermission(actorId, companyId))) {
            throw new UnauthorizedException();
        }
    }
}
