import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { ReferenceStoreService } from '../engine/detector/reference-store.service.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { NotFoundError, ReferenceLoadError } from '../common/errors/bot-errors.js';
import { REFERENCE_NAME, isReferenceName } from '../types/index.js';
import { LoadReferenceBodySchema, type LoadReferenceBody } from './dto/load-reference.dto.js';

@Controller('v1/references')
export class ReferencesController {
  constructor(private readonly references: ReferenceStoreService) {}

  @Get()
  list() {
    return this.references.list();
  }

  /** 파일 경로에서 기준 비트맵 교체, persist면 정본 경로에도 저장 */
  @Post(':name')
  async load(
    @Param('name') name: string,
    @Body(new ZodValidationPipe(LoadReferenceBodySchema)) body: LoadReferenceBody,
  ) {
    if (!isReferenceName(name)) {
      throw new NotFoundError(`Unknown reference "${name}"`, { valid: REFERENCE_NAME });
    }
    const result = await this.references.loadFromFile(name, body.path, body.persist);
    if (!result.loaded) {
      throw new ReferenceLoadError(name, body.path);
    }
    return { name, ...result };
  }
}
