import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { RemindersService } from './reminders/reminders.service';
import { requireSharedCache } from './reminders/require-shared-cache';

// One reminder pass outside the daily schedule, then exit.
async function run() {
  const app = await NestFactory.createApplicationContext(AppModule);
  app.enableShutdownHooks();
  try {
    requireSharedCache({ redis: { url: app.get(ConfigService).get<string>('redis.url') } });
    await app.get(RemindersService).runReminderPass();
  } finally {
    await app.close();
  }
}

run().catch((err: unknown) => {
  new Logger('Reminder').error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exitCode = 1;
});
