import { Module } from '@nestjs/common';
import { ConfigService } from './services/config.service';
import { DatabaseService } from './services/database.service';
import { LoggerService } from './services/logger.service';

@Module({
  providers: [
    { provide: ConfigService, useFactory: () => ConfigService.getInstance() },
    DatabaseService,
    LoggerService,
  ],
  exports: [
    ConfigService, //
    DatabaseService,
    LoggerService,
  ],
})
export class CoreModule {}
