import { Module } from '@nestjs/common';
import { CoreModule } from '../core/core.module';
import { NotificationSettingsController } from './notificationSettings.controller';
import { NotificationSettingsService } from './notificationSettings.service';
import { NOTIFICATION_SETTINGS_STORE, PgNotificationSettingsStore } from './notificationSettings.store';

@Module({
  imports: [CoreModule],
  controllers: [NotificationSettingsController],
  providers: [
    PgNotificationSettingsStore,
    { provide: NOTIFICATION_SETTINGS_STORE, useExisting: PgNotificationSettingsStore },
    NotificationSettingsService,
  ],
  exports: [NotificationSettingsService],
})
export class NotificationSettingsModule {}
