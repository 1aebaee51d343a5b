import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class ChannelLookupDto {
  @IsString()
  @IsNotEmpty()
  organizationId!: string;

  // Slack caps channel names at 80 characters; leave room for prefixes
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;
}
