import { Controller, Get, Param, ParseIntPipe, Query } from '@nestjs/common';
import { CurrentUser } from '../common/current-user.decorator';
import { AnalyticsService } from './analytics.service';
import { ScoreRangeQueryDto } from './dto/score-range-query.dto';

@Controller('analytics')
export class AnalyticsController {
    constructor(private readonly analyticsService: AnalyticsService) { }

    @Get('me')
    async mine(@CurrentUser() userId: number) {
        return { score: await this.analyticsService.systemScore(userId) };
    }

    @Get('me/quizzes')
    myQuizzes(@CurrentUser() userId: number, @Query() query: ScoreRangeQueryDto) {
        return this.analyticsService.myQuizScores(userId, query.from, query.to);
    }

    @Get('me/last-completions')
    myLastCompletions(@CurrentUser() userId: number) {
        return this.analyticsService.lastCompletions(userId);
    }

    @Get('companies/:companyId/members')
    members(
        @CurrentUser() actorId: number,
        @Param('companyId', ParseIntPipe) companyId: number,
        @Query() query: ScoreRangeQueryDto,
    ) {
        return this.analyticsService.memberScores(actorId, companyId, query.from, query.to);
    }

    @Get('companies/:companyId/members/last-attempts')
    lastAttempts(@CurrentUser() actorId: number, @Param('companyId', ParseIntPipe) companyId: number) {
        return this.analyticsService.lastAttempts(actorId, companyId);
    }

    @Get('companies/:companyId/members/:userId/quizzes')
    memberQuizzes(
        @CurrentUser() actorId: number,
        @Param('companyId', ParseIntPipe) companyId: number,
        @Param('userId', ParseIntPipe) userId: number,
        @Query() query: ScoreRangeQueryDto,
    ) {
        return this.analyticsService.quizScores(actorId, companyId, userId, query.from, query.to);
    }

    @Get('companies/:companyId/users/:userId')
    async company(
        @CurrentUser() actorId: number,
        @Param('companyId', ParseIntPipe) companyId: number,
        @Param('userId', ParseIntPipe) userId: number,
    ) {
        return { score: await this.analyticsService.companyScore(actorId, companyId, userId) };
    }

    @Get('quizzes/:quizId/users/:userId')
    async quiz(
        @CurrentUser() actorId: number,
        @Param('quizId', ParseIntPipe) quizId: number,
        @Param('userId', ParseIntPipe) userId: number,
    ) {
        return { score: await this.analyticsService.quizScore(actorId, quizId, userId) };
    }

    @Get('companies/:companyId/range')
    async range(
        @CurrentUser() actorId: number,
        @Param('companyId', ParseIntPipe) companyId: number,
        @Query() query: ScoreRangeQueryDto,
    ) {
        return { score: await this.analyticsService.rangeScore(actorId, companyId, query.from, query.to) };
    }
}
