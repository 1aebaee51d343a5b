import { BadRequestException } from '@nestjs/common';
import type { NotificationSettingType, NotificationSettingValue } from './types';

export class InvalidTargetError extends BadRequestException {
  readonly code = 'invalid_target';

  constructor(message: string) {
    super({ error: 'invalid_target', message });
    this.name = 'InvalidTargetError';
  }
}

export class InvalidSettingValueError extends BadRequestException {
  readonly code = 'invalid_setting_value';

  constructor(
    readonly type: NotificationSettingType,
    readonly value: NotificationSettingValue,
  ) {
    super({ error: 'invalid_setting_value', message: `value '${value}' is not valid for type '${type}'` });
    this.name = 'InvalidSettingValueError';
  }
}
