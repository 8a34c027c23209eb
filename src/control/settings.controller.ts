// 설정 API: 런타임 변경은 워커의 다음 읽기부터 반영

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Put,
} from '@nestjs/common';
import { BotConfigService } from '../config/bot-config.service.js';
import {
  BotConfigPatchSchema,
  MaxUsesBodySchema,
  type BotConfigPatch,
  type MaxUsesBody,
} from '../config/bot-config.schema.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { NotFoundError } from '../common/errors/bot-errors.js';
import { isAbilityId, type AbilityId } from '../types/index.js';

@Controller('v1/settings')
export class SettingsController {
  constructor(private readonly configService: BotConfigService) {}

  @Get()
  getSettings() {
    return this.configService.get();
  }

  @Patch()
  updateSettings(
    @Body(new ZodValidationPipe(BotConfigPatchSchema)) body: BotConfigPatch,
  ) {
    return this.configService.update(body);
  }

  /** 최대 PP 변경 + 해당 슬롯 즉시 리셋 */
  @Put('abilities/:id/max-uses')
  setMaxUses(
    @Param('id') id: string,
    @Body(new ZodValidationPipe(MaxUsesBodySchema)) body: MaxUsesBody,
  ) {
    return this.configService.setMaxUses(parseAbilityId(id), body.maxUses);
  }

  @Post('abilities/reset')
  @HttpCode(HttpStatus.OK)
  resetAbilities() {
    return this.configService.resetUses().abilities;
  }
}

function parseAbilityId(raw: string): AbilityId {
  const id = Number(raw);
  if (!isAbilityId(id)) {
    throw new NotFoundError(`Ability ${raw} does not exist`, { valid: [1, 2, 3, 4] });
  }
  return id;
}
