import { BadRequestException, Injectable, Logger, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { validateDto } from '../common/validation';
import { PermissionChecker } from '../membership/permission-checker';
import { Answer } from '../quizzes/entities/answer.entity';
import { Question } from '../quizzes/entities/question.entity';
import { Quiz } from '../quizzes/entities/quiz.entity';
import { QuizzesService } from '../quizzes/quizzes.service';
import { averageScore } from '../analytics/score';
import { CompletionCacheService } from './completion-cache.service';
import { CompletionFilter, CompletionRecord } from './completion-record';
import { SubmitQuizDto } from './dto/submit-quiz.dto';
import { AnsweredQuestion } from './entities/answered-question.entity';

export interface SubmissionResult {
    quizId: number;
    companyId: number;
    total: number;
    correct: number;
    score: number;
}

type AnswerPair = [questionId: number, answerId: number];

function toPairs(answers: Record<string, number>): AnswerPair[] {
    const pairs = Object.entries(answers).map(([questionId, answerId]): AnswerPair => [Number(questionId), answerId]);
    if (pairs.length === 0) {
        throw new BadRequestException('answers must not be empty');
    }
    if (pairs.some(([questionId, answerId]) => !Number.isInteger(questionId) || !Number.isInteger(answerId))) {
        throw new BadRequestException('answers must map question ids to answer ids');
    }
    return pairs;
}

@Injectable()
export class SubmissionsService {
    private readonly logger = new Logger(SubmissionsService.name);

    constructor(
        @InjectDataSource()
        private dataSource: DataSource,
        private quizzesService: QuizzesService,
        private permissions: PermissionChecker,
        private completionCache: CompletionCacheService,
    ) { }

    async recordSubmission(userId: number, quizId: number, input: SubmitQuizDto): Promise<SubmissionResult> {
        const dto = await validateDto(SubmitQuizDto, input);
        const pairs = toPairs(dto.answers);

        const quiz = await this.quizzesService.findQuiz(quizId);
        if (!(await this.permissions.hasPermission(userId, quiz.companyId))) {
            this.logger.warn(`User ${userId} cannot submit quiz ${quizId}`);
            throw new UnauthorizedException();
        }

        const rows = await this.dataSource.transaction(async (manager) => {
            const saved: AnsweredQuestion[] = [];
            for (const [questionId, answerId] of pairs) {
                const question = await manager.getRepository(Question).findOneBy({ id: questionId });
                if (!question || question.quizId !== quizId) {
                    throw new NotFoundException(`Question ${questionId} is not part of quiz ${quizId}`);
                }
                const answer = await manager.getRepository(Answer).findOneBy({ id: answerId });
                if (!answer || answer.questionId !== questionId) {
                    throw new NotFoundException(`Answer ${answerId} does not belong to question ${questionId}`);
                }

                const answered = manager.getRepository(AnsweredQuestion);
                saved.push(await answered.save(answered.create({
                    userId,
                    companyId: quiz.companyId,
                    quizId,
                    questionId,
                    answerId,
                    answerText: answer.text,
                    isCorrect: answer.isCorrect,
                })));
            }
            await manager.getRepository(Quiz).increment({ id: quizId }, 'frequency', 1);
            return saved;
        });

        await this.completionCache.write({
            userId,
            companyId: quiz.companyId,
            quizId,
            timestamp: new Date().toISOString(),
            answers: rows.map((row) => ({
                questionId: row.questionId,
                answerId: row.answerId,
                answerText: row.answerText,
                isCorrect: row.isCorrect,
                createdAt: new Date(row.createdAt).toISOString(),
            })),
        });

        const correct = rows.filter((row) => row.isCorrect).length;
        this.logger.log(`User ${userId} submitted quiz ${quizId}: ${correct}/${rows.length}`);
        return {
            quizId,
            companyId: quiz.companyId,
            total: rows.length,
            correct,
            score: averageScore(rows),
        };
    }

    recentResults(userId: number, filter: Omit<CompletionFilter, 'userId'>): Promise<CompletionRecord[]> {
        return this.completionCache.find({ ...filter, userId });
    }

    async companyResults(actorId: number, companyId: number, quizId?: number): Promise<CompletionRecord[]> {
        if (!(await this.permissions.isAdminOrHigher(actorId, companyId))) {
            throw new UnauthorizedException();
        }
        return this.completionCache.find({ companyId, quizId });
    }
}
