import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Company } from '../companies/entities/company.entity';
import { CompletionsModule } from '../completions/completions.module';
import { Membership } from '../membership/entities/membership.entity';
import { NotificationsModule } from '../notifications/notifications.module';
import { Quiz } from '../quizzes/entities/quiz.entity';
import { RemindersService } from './reminders.service';

@Module({
    imports: [TypeOrmModule.forFeature([Company, Membership, Quiz]), CompletionsModule, NotificationsModule],
    providers: [RemindersService],
    exports: [RemindersService],
})
export class RemindersModule { }
