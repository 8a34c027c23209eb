import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { BotExceptionFilter } from './common/filters/bot-exception.filter.js';
import { BotConfigModule } from './config/bot-config.module.js';
import { PlatformModule } from './platform/platform.module.js';
import { EngineModule } from './engine/engine.module.js';
import { ControlModule } from './control/control.module.js';

@Module({
  imports: [BotConfigModule, PlatformModule, EngineModule, ControlModule],
  providers: [
    {
      provide: APP_FILTER,
      useClass: BotExceptionFilter,
    },
  ],
})
export class AppModule {}
