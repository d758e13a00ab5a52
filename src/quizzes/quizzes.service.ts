import { BadRequestException, Injectable, Logger, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, IsNull, Repository } from 'typeorm';
import { Page } from '../common/dto/pagination-query.dto';
import { validateDto } from '../common/validation';
import { PermissionChecker } from '../membership/permission-checker';
import { NotificationsService } from '../notifications/notifications.service';
import { CreateAnswerDto } from './dto/create-answer.dto';
import { CreateQuestionDto } from './dto/create-question.dto';
import { CreateQuizDto } from './dto/create-quiz.dto';
import { AnswerView, QuestionView, QuizView } from './dto/quiz-view.dto';
import { UpdateQuizDto } from './dto/update-quiz.dto';
import { Answer } from './entities/answer.entity';
import { Question } from './entities/question.entity';
import { Quiz } from './entities/quiz.entity';

const MIN_ANSWERS = 2;
const MIN_QUESTIONS = 2;

export const newQuizMessage = (title: string) => `New quiz is available: ${title}`;

/**
 * Answers and questions are created into the company's pool first, then claimed
 * by a question or a quiz. A claimed item cannot be claimed again.
 */
@Injectable()
export class QuizzesService {
    private readonly logger = new Logger(QuizzesService.name);

    constructor(
        @InjectRepository(Quiz)
        private quizRepository: Repository<Quiz>,
        @InjectRepository(Question)
        private questionRepository: Repository<Question>,
        @InjectRepository(Answer)
        private answerRepository: Repository<Answer>,
        @InjectDataSource()
        private dataSource: DataSource,
        private permissions: PermissionChecker,
        private notificationsService: NotificationsService,
    ) { }

    async createAnswer(actorId: number, input: CreateAnswerDto): Promise<Answer> {
        const dto = await validateDto(CreateAnswerDto, input);
        await this.requireAuthor(actorId, dto.companyId);
        return this.answerRepository.save(this.answerRepository.create({
            text: dto.text,
            isCorrect: dto.isCorrect,
            companyId: dto.companyId,
            questionId: null,
        }));
    }

    async createQuestion(actorId: number, input: CreateQuestionDto): Promise<QuestionView> {
        const dto = await validateDto(CreateQuestionDto, input);
        await this.requireAuthor(actorId, dto.companyId);

        return this.dataSource.transaction(async (manager) => {
            const questions = manager.getRepository(Question);
            const question = await questions.save(questions.create({
                title: dto.title,
                companyId: dto.companyId,
                quizId: null,
            }));

            const claimed = await manager.getRepository(Answer).update(
                { id: In(dto.answerIds), companyId: dto.companyId, questionId: IsNull() },
                { questionId: question.id },
            );
            if (claimed.affected !== dto.answerIds.length) {
                throw new NotFoundException('Some answers do not exist or are already used');
            }

            const [view] = await this.questionViews(manager, [question], true);
            return view;
        });
    }

    async createQuiz(actorId: number, input: CreateQuizDto): Promise<QuizView> {
        const dto = await validateDto(CreateQuizDto, input);
        await this.requireAuthor(actorId, dto.companyId);

        const view = await this.dataSource.transaction(async (manager) => {
            const quizzes = manager.getRepository(Quiz);
            const quiz = await quizzes.save(quizzes.create({
                title: dto.title,
                description: dto.description ?? null,
                companyId: dto.companyId,
                frequency: 0,
            }));

            const claimed = await manager.getRepository(Question).update(
                { id: In(dto.questionIds), companyId: dto.companyId, quizId: IsNull() },
                { quizId: quiz.id },
            );
            if (claimed.affected !== dto.questionIds.length) {
                throw new NotFoundException('Some questions do not exist or are already used');
            }

            await this.notificationsService.sendNotifications(dto.companyId, newQuizMessage(quiz.title), manager);
            return this.quizView(manager, quiz, true);
        });

        this.logger.log(`Quiz ${view.id} created in company ${dto.companyId} by user ${actorId}`);
        return view;
    }

    async getQuiz(actorId: number, quizId: number): Promise<QuizView> {
        const quiz = await this.findQuiz(quizId);
        if (!(await this.permissions.hasPermission(actorId, quiz.companyId))) {
            throw new UnauthorizedException();
        }
        const revealAnswers = await this.permissions.isAdminOrHigher(actorId, quiz.companyId);
        return this.quizView(this.dataSource.manager, quiz, revealAnswers);
    }

    async listQuizzes(actorId: number, companyId: number, page: Page): Promise<Quiz[]> {
        if (!(await this.permissions.hasPermission(actorId, companyId))) {
            throw new UnauthorizedException();
        }
        return this.quizRepository.find({
            where: { companyId },
            order: { id: 'ASC' },
            skip: page.skip,
            take: page.take,
        });
    }

    async updateQuiz(actorId: number, quizId: number, input: UpdateQuizDto): Promise<Quiz> {
        const dto = await validateDto(UpdateQuizDto, input);
        const quiz = await this.findQuiz(quizId);
        await this.requireAuthor(actorId, quiz.companyId);

        if (dto.title !== undefined) quiz.title = dto.title;
        if (dto.description !== undefined) quiz.description = dto.description;
        return this.quizRepository.save(quiz);
    }

    async deleteQuiz(actorId: number, quizId: number): Promise<number> {
        const quiz = await this.findQuiz(quizId);
        await this.requireAuthor(actorId, quiz.companyId);
        await this.quizRepository.delete({ id: quizId });
        this.logger.log(`Quiz ${quizId} deleted by user ${actorId}`);
        return quizId;
    }

    async deleteQuestion(actorId: number, questionId: number): Promise<number> {
        const question = await this.questionRepository.findOneBy({ id: questionId });
        if (!question || question.companyId === null) {
            throw new NotFoundException(`Question ${questionId} not found`);
        }
        await this.requireAuthor(actorId, question.companyId);

        await this.dataSource.transaction(async (manager) => {
            const questions = manager.getRepository(Question);
            if (question.quizId !== null && (await questions.countBy({ quizId: question.quizId })) <= MIN_QUESTIONS) {
                throw new BadRequestException(`A quiz needs at least ${MIN_QUESTIONS} questions`);
            }
            await questions.delete({ id: questionId });
        });
        return questionId;
    }

    async deleteAnswer(actorId: number, answerId: number): Promise<number> {
        const answer = await this.answerRepository.findOneBy({ id: answerId });
        if (!answer || answer.companyId === null) {
            throw new NotFoundException(`Answer ${answerId} not found`);
        }
        await this.requireAuthor(actorId, answer.companyId);

        await this.dataSource.transaction(async (manager) => {
            const answers = manager.getRepository(Answer);
            if (answer.questionId !== null && (await answers.countBy({ questionId: answer.questionId })) <= MIN_ANSWERS) {
                throw new BadRequestException(`A question needs at least ${MIN_ANSWERS} answers`);
            }
            await answers.delete({ id: answerId });
        });
        return answerId;
    }

    async findQuiz(quizId: number): Promise<Quiz> {
        const quiz = await this.quizRepository.findOneBy({ id: quizId });
        if (!quiz) {
            throw new NotFoundException(`Quiz ${quizId} not found`);
        }
        return quiz;
    }

    private async requireAuthor(actorId: number, companyId: number): Promise<void> {
        if (!(await this.permissions.isAdminOrHigher(actorId, companyId))) {
            this.logger.warn(`User ${actorId} cannot author quizzes in company ${companyId}`);
            throw new UnauthorizedException();
        }
    }

    private async quizView(manager: EntityManager, quiz: Quiz, revealAnswers: boolean): Promise<QuizView> {
        const questions = await manager.getRepository(Question).find({
            where: { quizId: quiz.id },
            order: { id: 'ASC' },
        });
        return {
            id: quiz.id,
            title: quiz.title,
            description: quiz.description,
            frequency: quiz.frequency,
            companyId: quiz.companyId,
            questions: await this.questionViews(manager, questions, revealAnswers),
        };
    }

    private async questionViews(manager: EntityManager, questions: Question[], revealAnswers: boolean): Promise<QuestionView[]> {
        const answers = await manager.getRepository(Answer).find({
            where: { questionId: In(questions.map((question) => question.id)) },
            order: { id: 'ASC' },
        });

        return questions.map((question) => ({
            id: question.id,
            title: question.title,
            answers: answers
                .filter((answer) => answer.questionId === question.id)
                .map((answer): AnswerView => (revealAnswers
                    ? { id: answer.id, text: answer.text, isCorrect: answer.isCorrect }
                    : { id: answer.id, text: answer.text })),
        }));
    }
}
