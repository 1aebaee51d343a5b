import { Type } from 'class-transformer';
import { IsEnum, IsInt, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { ExternalProvider, NotificationSettingType, NotificationSettingValue, type SettingCoordinates } from '../types';

export class NotificationSettingQueryDto {
  @Type(() => Number)
  @IsInt()
  @IsEnum(ExternalProvider)
  provider!: ExternalProvider;

  @Type(() => Number)
  @IsInt()
  @IsEnum(NotificationSettingType)
  type!: NotificationSettingType;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  userId?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  teamId?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  projectId?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  organizationId?: string;
}

export class UpdateNotificationSettingDto extends NotificationSettingQueryDto {
  @Type(() => Number)
  @IsInt()
  @IsEnum(NotificationSettingValue)
  value!: NotificationSettingValue;
}

export function toCoordinates(dto: NotificationSettingQueryDto): SettingCoordinates {
  return {
    user: dto.userId ? { id: dto.userId } : null,
    team: dto.teamId ? { id: dto.teamId } : null,
    project: dto.projectId ? { id: dto.projectId } : null,
    organization: dto.organizationId ? { id: dto.organizationId } : null,
  };
}
