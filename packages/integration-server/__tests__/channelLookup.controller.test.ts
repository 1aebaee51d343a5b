import { Test } from '@nestjs/testing';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { describe, expect, it, vi } from 'vitest';
import { ChannelLookupController } from '../src/slack/lookup/channelLookup.controller';
import { ChannelLookupService } from '../src/slack/lookup/channelLookup.service';
import { ChannelLookupDto } from '../src/slack/lookup/dto';

describe('ChannelLookupController', () => {
  it('starts lookups and reads jobs through the service', async () => {
    const lookups = {
      lookupForAlertRule: vi.fn(async () => ({ status: 'pending', jobId: 'job-1' })),
      getJob: vi.fn(() => ({ id: 'job-1', name: '#general', status: 'pending' })),
    };
    const module = await Test.createTestingModule({
      controllers: [ChannelLookupController],
      providers: [{ provide: ChannelLookupService, useValue: lookups }],
    }).compile();
    const controller = module.get(ChannelLookupController);

    await expect(controller.lookup('int-1', { organizationId: 'org-1', name: '#general' })).resolves.toEqual({
      status: 'pending',
      jobId: 'job-1',
    });
    expect(lookups.lookupForAlertRule).toHaveBeenCalledWith('org-1', 'int-1', '#general');
    expect(controller.getJob('job-1')).toEqual({ id: 'job-1', name: '#general', status: 'pending' });
  });

  it('validates the lookup body', async () => {
    const valid = await validate(plainToInstance(ChannelLookupDto, { organizationId: 'org-1', name: '#general' }));
    const invalid = await validate(plainToInstance(ChannelLookupDto, { organizationId: 'org-1', name: 'x'.repeat(101) }));

    expect(valid).toEqual([]);
    expect(invalid.map((e) => e.property)).toEqual(['name']);
  });
});
