import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { BotController } from './bot.controller.js';
import { SettingsController } from './settings.controller.js';
import { ReferencesController } from './references.controller.js';

@Module({
  imports: [EngineModule],
  controllers: [BotController, SettingsController, ReferencesController],
})
export class ControlModule {}
