import { Body, Controller, Get, HttpCode, HttpStatus, Inject, Param, Post } from '@nestjs/common';
import { ChannelLookupService } from './channelLookup.service';
import { ChannelLookupDto } from './dto';

@Controller('api/integrations/slack')
export class ChannelLookupController {
  constructor(@Inject(ChannelLookupService) private readonly lookups: ChannelLookupService) {}

  @Post(':integrationId/channel-lookup')
  @HttpCode(HttpStatus.OK)
  async lookup(@Param('integrationId') integrationId: string, @Body() dto: ChannelLookupDto) {
    return this.lookups.lookupForAlertRule(dto.organizationId, integrationId, dto.name);
  }

  @Get('channel-lookup/:jobId')
  getJob(@Param('jobId') jobId: string) {
    return this.lookups.getJob(jobId);
  }
}
