import { BadRequestException, UnauthorizedException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Role } from '../common/role';
import { SubmissionsService } from '../completions/submissions.service';
import { CompletionsModule } from '../completions/completions.module';
import { createTestApp, seedCompany, seedMembership, seedQuiz, SeededQuiz, seedUser, TestApp } from '../testing/test-app';
import { AnalyticsModule } from './analytics.module';
import { AnalyticsService } from './analytics.service';

describe('AnalyticsService', () => {
    let app: TestApp;
    let dataSource: DataSource;
    let analytics: AnalyticsService;
    let submissions: SubmissionsService;
    let memberId: number;
    let companyId: number;
    let first: SeededQuiz;
    let second: SeededQuiz;

    const submit = (seeded: SeededQuiz, choices: Array<'correct' | 'wrong'>) => {
        const answers: Record<string, number> = {};
        seeded.questions.forEach((entry, index) => {
            answers[String(entry.question.id)] = entry[choices[index]].id;
        });
        return submissions.recordSubmission(memberId, seeded.quiz.id, { answers });
    };

    beforeEach(async () => {
        app = await createTestApp([CompletionsModule, AnalyticsModule]);
        dataSource = app.dataSource;
        analytics = app.moduleRef.get(AnalyticsService);
        submissions = app.moduleRef.get(SubmissionsService);

        const owner = await seedUser(dataSource, 'owner');
        const member = await seedUser(dataSource, 'member');
        memberId = member.id;
        companyId = (await seedCompany(dataSource, owner.id)).id;
        await seedMembership(dataSource, memberId, companyId, Role.MEMBER);
        first = await seedQuiz(dataSource, companyId, 'First', ['a', 'b']);
        second = await seedQuiz(dataSource, companyId, 'Second', ['c', 'd']);

        await submit(first, ['correct', 'correct']);
        await submit(second, ['correct', 'wrong']);
    });

    afterEach(async () => {
        await app.moduleRef.close();
    });

    it('averages over every answer of the user', async () => {
        expect(await analytics.systemScore(memberId)).toBe(0.75);
        expect(await analytics.companyScore(memberId, companyId, memberId)).toBe(0.75);
    });

    it('scores a single quiz', async () => {
        expect(await analytics.quizScore(memberId, first.quiz.id, memberId)).toBe(1);
        expect(await analytics.quizScore(memberId, second.quiz.id, memberId)).toBe(0.5);
    });

    it('is 0 for users without answers', async () => {
        expect(await analytics.systemScore(memberId + 100)).toBe(0);
    });

    it('scores the company over a time range', async () => {
        const from = new Date(Date.now() - 60 * 60 * 1000);
        const to = new Date(Date.now() + 60 * 60 * 1000);

        expect(await analytics.rangeScore(memberId, companyId, from, to)).toBe(0.75);
        await expect(analytics.rangeScore(memberId, companyId, to, from)).rejects.toBeInstanceOf(BadRequestException);
    });

    describe('breakdowns over a time range', () => {
        const from = () => new Date(Date.now() - 60 * 60 * 1000);
        const to = () => new Date(Date.now() + 60 * 60 * 1000);

        it('scores every member of the company', async () => {
            expect(await analytics.memberScores(memberId, companyId, from(), to())).toEqual({ [memberId]: 0.75 });
        });

        it('scores each quiz of one member', async () => {
            const expected = { [first.quiz.id]: 1, [second.quiz.id]: 0.5 };

            expect(await analytics.quizScores(memberId, companyId, memberId, from(), to())).toEqual(expected);
            expect(await analytics.myQuizScores(memberId, from(), to())).toEqual(expected);
        });

        it('is empty outside the range', async () => {
            const longAgo = new Date(Date.now() - 48 * 60 * 60 * 1000);
            const hourAgo = new Date(Date.now() - 60 * 60 * 1000);

            expect(await analytics.memberScores(memberId, companyId, longAgo, hourAgo)).toEqual({});
            expect(await analytics.myQuizScores(memberId, longAgo, hourAgo)).toEqual({});
        });

        it('rejects an inverted range', async () => {
            await expect(analytics.memberScores(memberId, companyId, to(), from())).rejects.toBeInstanceOf(BadRequestException);
        });
    });

    it('reports the latest attempt of each member and of each quiz', async () => {
        const attempts = await analytics.lastAttempts(memberId, companyId);
        expect(Object.keys(attempts)).toEqual([String(memberId)]);
        expect(attempts[memberId]).toBeInstanceOf(Date);

        const completions = await analytics.lastCompletions(memberId);
        expect(Object.keys(completions).map(Number).sort((a, b) => a - b)).toEqual([first.quiz.id, second.quiz.id]);
    });

    it('keeps member breakdowns to the company', async () => {
        const outsider = await seedUser(dataSource, 'outsider');
        const from = new Date(Date.now() - 60 * 60 * 1000);
        const to = new Date(Date.now() + 60 * 60 * 1000);

        await expect(analytics.memberScores(outsider.id, companyId, from, to)).rejects.toBeInstanceOf(UnauthorizedException);
        await expect(analytics.quizScores(outsider.id, companyId, memberId, from, to)).rejects.toBeInstanceOf(UnauthorizedException);
        await expect(analytics.lastAttempts(outsider.id, companyId)).rejects.toBeInstanceOf(UnauthorizedException);
    });

    it('keeps company scores to its members', async () => {
        const outsider = await seedUser(dataSource, 'outsider');

        await expect(analytics.companyScore(outsider.id, companyId, memberId)).rejects.toBeInstanceOf(UnauthorizedException);
        await expect(analytics.quizScore(outsider.id, first.quiz.id, memberId)).rejects.toBeInstanceOf(UnauthorizedException);
    });
});
