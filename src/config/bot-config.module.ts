import { Global, Module } from '@nestjs/common';
import { BotConfigService } from './bot-config.service.js';

@Global()
@Module({
  providers: [BotConfigService],
  exports: [BotConfigService],
})
export class BotConfigModule {}
