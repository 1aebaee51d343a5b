import { DynamicModule, Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { CoreModule } from '../core/core.module';
import { NotificationSettingsModule } from '../notification-settings/notificationSettings.module';
import { SlackModule } from '../slack/slack.module';

export const createLoggerModule = (level: string = process.env.LOG_LEVEL ?? 'info'): DynamicModule =>
  LoggerModule.forRoot({
    pinoHttp: {
      level,
      customLogLevel: (_req, res, error) => {
        if (error instanceof Error) return 'error';
        if (res.statusCode >= 500) return 'error';
        return 'silent';
      },
      redact: {
        paths: ['req.headers.authorization', 'req.headers.cookie', 'req.headers["set-cookie"]'],
        censor: '[REDACTED]',
      },
    },
  });

@Module({
  imports: [createLoggerModule(), CoreModule, SlackModule, NotificationSettingsModule],
})
export class AppModule {}
