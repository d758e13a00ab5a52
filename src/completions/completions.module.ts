import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MembershipModule } from '../membership/membership.module';
import { QuizzesModule } from '../quizzes/quizzes.module';
import { CompletionCacheService } from './completion-cache.service';
import { CompletionsController } from './completions.controller';
import { AnsweredQuestion } from './entities/answered-question.entity';
import { SubmissionsService } from './submissions.service';

@Module({
    imports: [TypeOrmModule.forFeature([AnsweredQuestion]), MembershipModule, QuizzesModule],
    controllers: [CompletionsController],
    providers: [CompletionCacheService, SubmissionsService],
    exports: [CompletionCacheService],
})
export class CompletionsModule { }
