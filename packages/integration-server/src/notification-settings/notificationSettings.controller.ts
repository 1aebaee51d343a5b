import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Inject, Put, Query } from '@nestjs/common';
import { NotificationSettingQueryDto, UpdateNotificationSettingDto, toCoordinates } from './dto';
import { NotificationSettingsService } from './notificationSettings.service';
import type { NotificationSettingValue } from './types';

@Controller('api/notification-settings')
export class NotificationSettingsController {
  constructor(@Inject(NotificationSettingsService) private readonly settings: NotificationSettingsService) {}

  @Get()
  async get(@Query() query: NotificationSettingQueryDto): Promise<{ value: NotificationSettingValue }> {
    const value = await this.settings.getSettings(query.provider, query.type, toCoordinates(query));
    return { value };
  }

  @Put()
  async update(@Body() body: UpdateNotificationSettingDto): Promise<{ value: NotificationSettingValue }> {
    await this.settings.updateSettings(body.provider, body.type, body.value, toCoordinates(body));
    return { value: body.value };
  }

  @Delete()
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Query() query: NotificationSettingQueryDto): Promise<void> {
    await this.settings.removeSettings(query.provider, query.type, toCoordinates(query));
  }
}
