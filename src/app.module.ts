import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AnalyticsModule } from './analytics/analytics.module';
import { CacheModule } from './cache/cache.module';
import { CompaniesModule } from './companies/companies.module';
import { CompletionsModule } from './completions/completions.module';
import { appConfig } from './config/app.config';
import { InvitationsModule } from './invitations/invitations.module';
import { MembershipModule } from './membership/membership.module';
import { NotificationsModule } from './notifications/notifications.module';
import { QuizzesModule } from './quizzes/quizzes.module';
import { RemindersModule } from './reminders/reminders.module';
import { UsersModule } from './users/users.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig],
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('database.host', 'localhost'),
        port: configService.get<number>('database.port', 5432),
        username: configService.get<string>('database.username', 'postgres'),
        password: configService.get<string>('database.password', 'postgres'),
        database: configService.get<string>('database.name', 'quizworkforce'),
        autoLoadEntities: true,
        synchronize: configService.get<boolean>('database.synchronize', false),
      }),
      inject: [ConfigService],
    }),
    ScheduleModule.forRoot(),
    CacheModule,
    UsersModule,
    MembershipModule,
    CompaniesModule,
    InvitationsModule,
    NotificationsModule,
    QuizzesModule,
    CompletionsModule,
    AnalyticsModule,
    RemindersModule,
  ],
})
export class AppModule { }
