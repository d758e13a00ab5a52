import { Body, Controller, Get, Param, ParseIntPipe, Post, Query } from '@nestjs/common';
import { CurrentUser } from '../common/current-user.decorator';
import { CompletionsQueryDto } from './dto/completions-query.dto';
import { SubmitQuizDto } from './dto/submit-quiz.dto';
import { SubmissionsService } from './submissions.service';

@Controller('completions')
export class CompletionsController {
    constructor(private readonly submissionsService: SubmissionsService) { }

    @Post('quizzes/:quizId')
    submit(
        @CurrentUser() userId: number,
        @Param('quizId', ParseIntPipe) quizId: number,
        @Body() submitQuizDto: SubmitQuizDto,
    ) {
        return this.submissionsService.recordSubmission(userId, quizId, submitQuizDto);
    }

    @Get('me')
    mine(@CurrentUser() userId: number, @Query() query: CompletionsQueryDto) {
        return this.submissionsService.recentResults(userId, { companyId: query.companyId, quizId: query.quizId });
    }

    @Get('companies/:companyId')
    company(
        @CurrentUser() userId: number,
        @Param('companyId', ParseIntPipe) companyId: number,
        @Query() query: CompletionsQueryDto,
    ) {
        return this.submissionsService.companyResults(userId, companyId, query.quizId);
    }
}
