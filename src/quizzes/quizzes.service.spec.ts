import { BadRequestException, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Role } from '../common/role';
import { Company } from '../companies/entities/company.entity';
import { Notification } from '../notifications/entities/notification.entity';
import { createTestApp, seedCompany, seedMembership, seedUser, TestApp } from '../testing/test-app';
import { User } from '../users/entities/user.entity';
import { Answer } from './entities/answer.entity';
import { Question } from './entities/question.entity';
import { Quiz } from './entities/quiz.entity';
import { QuizzesModule } from './quizzes.module';
import { QuizzesService } from './quizzes.service';

describe('QuizzesService', () => {
    let app: TestApp;
    let dataSource: DataSource;
    let service: QuizzesService;
    let owner: User;
    let admin: User;
    let member: User;
    let company: Company;

    const answer = (text: string, isCorrect: boolean) =>
        service.createAnswer(admin.id, { text, isCorrect, companyId: company.id });

    const question = async (title: string) => {
        const yes = await answer(`${title} yes`, true);
        const no = await answer(`${title} no`, false);
        return service.createQuestion(admin.id, { title, companyId: company.id, answerIds: [yes.id, no.id] });
    };

    beforeEach(async () => {
        app = await createTestApp([QuizzesModule]);
        dataSource = app.dataSource;
        service = app.moduleRef.get(QuizzesService);

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

    describe('createQuestion', () => {
        it('attaches staged answers', async () => {
            const created = await question('Capital of France?');

            expect(created.title).toBe('Capital of France?');
            expect(created.answers).toEqual([
                { id: expect.any(Number), text: 'Capital of France? yes', isCorrect: true },
                { id: expect.any(Number), text: 'Capital of France? no', isCorrect: false },
            ]);
        });

        it('takes between two and four answers and writes nothing otherwise', async () => {
            const ids: number[] = [];
            for (let i = 0; i < 5; i++) ids.push((await answer(`a${i}`, i === 0)).id);

            await expect(service.createQuestion(admin.id, { title: 'Too few', companyId: company.id, answerIds: ids.slice(0, 1) }))
                .rejects.toBeInstanceOf(BadRequestException);
            await expect(service.createQuestion(admin.id, { title: 'Too many', companyId: company.id, answerIds: ids }))
                .rejects.toBeInstanceOf(BadRequestException);
            expect(await dataSource.getRepository(Question).count()).toBe(0);

            const four = await service.createQuestion(admin.id, { title: 'Four', companyId: company.id, answerIds: ids.slice(0, 4) });
            expect(four.answers).toHaveLength(4);
        });

        it('rolls back when an answer is missing or already used', async () => {
            const created = await question('First');
            const spare = await answer('spare', false);

            await expect(service.createQuestion(admin.id, {
                title: 'Second',
                companyId: company.id,
                answerIds: [created.answers[0].id, spare.id],
            })).rejects.toBeInstanceOf(NotFoundException);

            expect(await dataSource.getRepository(Question).countBy({ title: 'Second' })).toBe(0);
            expect((await dataSource.getRepository(Answer).findOneByOrFail({ id: spare.id })).questionId).toBeNull();
        });

        it('is reserved for admins and the owner', async () => {
            await expect(service.createAnswer(member.id, { text: 'x', isCorrect: true, companyId: company.id }))
                .rejects.toBeInstanceOf(UnauthorizedException);
        });
    });

    describe('createQuiz', () => {
        it('attaches questions and tells every member', async () => {
            const first = await question('First');
            const second = await question('Second');

            const quiz = await service.createQuiz(admin.id, {
                title: 'Geography',
                companyId: company.id,
                questionIds: [first.id, second.id],
            });

            expect(quiz.questions.map((item) => item.id)).toEqual([first.id, second.id]);
            const notifications = await dataSource.getRepository(Notification).findBy({ companyId: company.id });
            expect(notifications).toHaveLength(3);
            expect(new Set(notifications.map((row) => row.message))).toEqual(new Set(['New quiz is available: Geography']));
        });

        it('needs at least two questions before touching the database', async () => {
            const only = await question('Only');

            await expect(service.createQuiz(admin.id, { title: 'Short', companyId: company.id, questionIds: [only.id] }))
                .rejects.toBeInstanceOf(BadRequestException);
            expect(await dataSource.getRepository(Quiz).count()).toBe(0);
        });

        it('rolls back the quiz and its broadcast when a question is missing', async () => {
            const first = await question('First');

            await expect(service.createQuiz(admin.id, { title: 'Broken', companyId: company.id, questionIds: [first.id, 9999] }))
                .rejects.toBeInstanceOf(NotFoundException);

            expect(await dataSource.getRepository(Quiz).count()).toBe(0);
            expect(await dataSource.getRepository(Notification).count()).toBe(0);
            expect((await dataSource.getRepository(Question).findOneByOrFail({ id: first.id })).quizId).toBeNull();
        });
    });

    describe('getQuiz', () => {
        it('hides correct answers from members', async () => {
            const first = await question('First');
            const second = await question('Second');
            const created = await service.createQuiz(admin.id, {
                title: 'Geography',
                companyId: company.id,
                questionIds: [first.id, second.id],
            });

            const asMember = await service.getQuiz(member.id, created.id);
            const asOwner = await service.getQuiz(owner.id, created.id);

            expect(asMember.questions[0].answers[0]).toEqual({ id: first.answers[0].id, text: 'First yes' });
            expect(asOwner.questions[0].answers[0]).toEqual({ id: first.answers[0].id, text: 'First yes', isCorrect: true });
        });

        it('rejects outsiders and unknown quizzes', async () => {
            const outsider = await seedUser(dataSource, 'outsider');
            const first = await question('First');
            const second = await question('Second');
            const created = await service.createQuiz(admin.id, {
                title: 'Geography',
                companyId: company.id,
                questionIds: [first.id, second.id],
            });

            await expect(service.getQuiz(outsider.id, created.id)).rejects.toBeInstanceOf(UnauthorizedException);
            await expect(service.getQuiz(member.id, 9999)).rejects.toBeInstanceOf(NotFoundException);
        });
    });

    describe('deleting parts', () => {
        it('keeps at least two answers per question and two questions per quiz', async () => {
            const first = await question('First');
            const second = await question('Second');
            await service.createQuiz(admin.id, { title: 'Geography', companyId: company.id, questionIds: [first.id, second.id] });

            await expect(service.deleteAnswer(owner.id, first.answers[0].id)).rejects.toBeInstanceOf(BadRequestException);
            await expect(service.deleteQuestion(owner.id, second.id)).rejects.toBeInstanceOf(BadRequestException);

            expect(await dataSource.getRepository(Answer).countBy({ questionId: first.id })).toBe(2);
            expect(await dataSource.getRepository(Question).countBy({ id: second.id })).toBe(1);
        });

        it('removes an answer while the question keeps two', async () => {
            const extra = await answer('Maybe', false);
            const yes = await answer('Yes', true);
            const no = await answer('No', false);
            const created = await service.createQuestion(admin.id, {
                title: 'Three answers',
                companyId: company.id,
                answerIds: [yes.id, no.id, extra.id],
            });

            expect(await service.deleteAnswer(admin.id, extra.id)).toBe(extra.id);
            expect(await dataSource.getRepository(Answer).countBy({ questionId: created.id })).toBe(2);
        });

        it('deletes staged items freely', async () => {
            const staged = await answer('Loose', true);
            const pooled = await question('Pooled');

            expect(await service.deleteAnswer(admin.id, staged.id)).toBe(staged.id);
            expect(await service.deleteQuestion(admin.id, pooled.id)).toBe(pooled.id);
        });
    });

    it('updates and deletes quizzes for authors only', async () => {
        const first = await question('First');
        const second = await question('Second');
        const created = await service.createQuiz(admin.id, {
            title: 'Geography',
            companyId: company.id,
            questionIds: [first.id, second.id],
        });

        await expect(service.updateQuiz(member.id, created.id, { title: 'Nope' })).rejects.toBeInstanceOf(UnauthorizedException);
        expect((await service.updateQuiz(owner.id, created.id, { title: 'World geography' })).title).toBe('World geography');

        expect(await service.deleteQuiz(admin.id, created.id)).toBe(created.id);
        expect(await dataSource.getRepository(Question).countBy({ id: first.id })).toBe(0);
        expect(await service.listQuizzes(member.id, company.id, { skip: 0, take: 10 })).toEqual([]);
    });
});
