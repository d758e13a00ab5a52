import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MembershipModule } from '../membership/membership.module';
import { NotificationsModule } from '../notifications/notifications.module';
import { Answer } from './entities/answer.entity';
import { Question } from './entities/question.entity';
import { Quiz } from './entities/quiz.entity';
import { AnswersController, QuestionsController } from './questions.controller';
import { QuizzesController } from './quizzes.controller';
import { QuizzesService } from './quizzes.service';

@Module({
    imports: [TypeOrmModule.forFeature([Quiz, Question, Answer]), MembershipModule, NotificationsModule],
    controllers: [QuizzesController, QuestionsController, AnswersController],
    providers: [QuizzesService],
    exports: [QuizzesService],
})
export class QuizzesModule { }
