import { Body, Controller, Delete, Param, ParseIntPipe, Post } from '@nestjs/common';
import { CurrentUser } from '../common/current-user.decorator';
import { CreateAnswerDto } from './dto/create-answer.dto';
import { CreateQuestionDto } from './dto/create-question.dto';
import { QuizzesService } from './quizzes.service';

@Controller('questions')
export class QuestionsController {
    constructor(private readonly quizzesService: QuizzesService) { }

    @Post()
    create(@CurrentUser() userId: number, @Body() createQuestionDto: CreateQuestionDto) {
        return this.quizzesService.createQuestion(userId, createQuestionDto);
    }

    @Delete(':id')
    async remove(@CurrentUser() userId: number, @Param('id', ParseIntPipe) id: number) {
        const deletedId = await this.quizzesService.deleteQuestion(userId, id);
        return { deletedId };
    }
}

@Controller('answers')
export class AnswersController {
    constructor(private readonly quizzesService: QuizzesService) { }

    @Post()
    create(@CurrentUser() userId: number, @Body() createAnswerDto: CreateAnswerDto) {
        return this.quizzesService.createAnswer(userId, createAnswerDto);
    }

    @Delete(':id')
    async remove(@CurrentUser() userId: number, @Param('id', ParseIntPipe) id: number) {
        const deletedId = await this.quizzesService.deleteAnswer(userId, id);
        return { deletedId };
    }
}
