import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ReferenceName } from '../../types/index.js';
import { CAPTURE_PROVIDER, type CaptureProvider } from '../../platform/capture.provider.js';
import { downscaleGray } from '../../platform/image-codec.js';
import { locateTemplate } from './coarse-to-fine.js';
import { ReferenceStoreService } from './reference-store.service.js';

/**
 * 화면 상태 판정. 매 호출마다 새로 캡처하며 캐시하지 않는다.
 * 매칭은 중간중간 이벤트 루프에 양보한다.
 * 실패는 전부 "미검출"로 수렴: 호출자에게 예외를 넘기지 않는다.
 */
@Injectable()
export class DetectorService {
  private readonly logger = new Logger(DetectorService.name);

  constructor(
    @Inject(CAPTURE_PROVIDER) private readonly captureProvider: CaptureProvider,
    private readonly references: ReferenceStoreService,
  ) {}

  /** 최대 상관계수, 기준 비트맵이 없거나 캡처 실패 시 null */
  async score(name: ReferenceName): Promise<number | null> {
    const template = this.references.get(name);
    if (!template) {
      this.logger.debug(`Reference ${name} not loaded`);
      return null;
    }

    try {
      const screen = await this.captureProvider.capture();
      return (await locateTemplate(screen, template, downscaleGray)).score;
    } catch (err) {
      this.logger.warn(`Detection error for ${name}: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }

  async detect(name: ReferenceName, threshold: number): Promise<boolean> {
    const score = await this.score(name);
    return score !== null && score >= threshold;
  }

  isInBattle(threshold: number): Promise<boolean> {
    return this.detect('hp_indicator', threshold);
  }

  isBattleMenuVisible(threshold: number): Promise<boolean> {
    return this.detect('battle_menu', threshold);
  }
}
