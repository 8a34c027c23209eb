// 봇 시작/정지/상태 조회: 표시용 스냅샷만 읽는다

import { Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { AutomationService } from '../engine/automation/automation.service.js';
import { ReferenceStoreService } from '../engine/detector/reference-store.service.js';

@Controller('v1/bot')
export class BotController {
  constructor(
    private readonly automation: AutomationService,
    private readonly references: ReferenceStoreService,
  ) {}

  @Post('start')
  @HttpCode(HttpStatus.OK)
  start() {
    return this.automation.start();
  }

  @Post('stop')
  @HttpCode(HttpStatus.OK)
  stop() {
    return this.automation.stop();
  }

  @Get('status')
  getStatus() {
    return {
      ...this.automation.getStatus(),
      references: this.references.list(),
    };
  }
}
