import { IsNotEmpty, IsString } from 'class-validator';

export class IdentityContextQueryDto {
  @IsString()
  @IsNotEmpty()
  organizationId!: string;

  @IsString()
  @IsNotEmpty()
  userId!: string;
}
