import { Body, Controller, Delete, Get, Param, ParseIntPipe, Patch, Post, Query } from '@nestjs/common';
import { CurrentUser } from '../common/current-user.decorator';
import { PaginationQueryDto, toPage } from '../common/dto/pagination-query.dto';
import { CreateQuizDto } from './dto/create-quiz.dto';
import { UpdateQuizDto } from './dto/update-quiz.dto';
import { QuizzesService } from './quizzes.service';

@Controller('quizzes')
export class QuizzesController {
    constructor(private readonly quizzesService: QuizzesService) { }

    @Post()
    create(@CurrentUser() userId: number, @Body() createQuizDto: CreateQuizDto) {
        return this.quizzesService.createQuiz(userId, createQuizDto);
    }

    @Get('company/:companyId')
    findAll(
        @CurrentUser() userId: number,
        @Param('companyId', ParseIntPipe) companyId: number,
        @Query() query: PaginationQueryDto,
    ) {
        return this.quizzesService.listQuizzes(userId, companyId, toPage(query));
    }

    @Get(':id')
    findOne(@CurrentUser() userId: number, @Param('id', ParseIntPipe) id: number) {
        return this.quizzesService.getQuiz(userId, id);
    }

    @Patch(':id')
    update(
        @CurrentUser() userId: number,
        @Param('id', ParseIntPipe) id: number,
        @Body() updateQuizDto: UpdateQuizDto,
    ) {
        return this.quizzesService.updateQuiz(userId, id, updateQuizDto);
    }

    @Delete(':id')
    async remove(@CurrentUser() userId: number, @Param('id', ParseIntPipe) id: number) {
        const deletedId = await this.quizzesService.deleteQuiz(userId, id);
        return { deletedId };
    }
}
