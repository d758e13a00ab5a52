import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AnsweredQuestion } from '../completions/entities/answered-question.entity';
import { MembershipModule } from '../membership/membership.module';
import { QuizzesModule } from '../quizzes/quizzes.module';
import { AnalyticsController } from './analytics.controller';
import { AnalyticsService } from './analytics.service';

@Module({
    imports: [TypeOrmModule.forFeature([AnsweredQuestion]), MembershipModule, QuizzesModule],
    controllers: [AnalyticsController],
    providers: [AnalyticsService],
})
export class AnalyticsModule { }
