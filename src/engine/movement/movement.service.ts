import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Direction, MovementPattern, MovementSettings } from '../../types/index.js';
import { BotConfigService } from '../../config/bot-config.service.js';
import { MAX_SPACES, MIN_SPACES } from '../../config/bot-config.schema.js';
import { CLOCK, type Clock } from '../../platform/clock.js';
import { holdScript } from '../battle/action-scripts.js';
import { ScriptRunnerService, type ContinueCheck } from '../battle/script-runner.service.js';

const SETTLE_MS = 100;
const POLE_DWELL_MS = 200;

/** 축별 [시작 극, 반대 극] */
const POLES: Record<MovementPattern, readonly [Direction, Direction]> = {
  HORIZONTAL: ['LEFT', 'RIGHT'],
  VERTICAL: ['UP', 'DOWN'],
};

/** 방향 전환 비용 + 칸당 비용 */
export function movementCost(
  direction: Direction,
  spaces: number,
  facing: Direction,
  timings: Pick<MovementSettings, 'timePerSpaceMs' | 'timeToTurnMs'>,
): number {
  const turn = direction === facing ? 0 : timings.timeToTurnMs;
  return turn + timings.timePerSpaceMs * spaces;
}

export function clampSpaces(spaces: number): number {
  return Math.max(MIN_SPACES, Math.min(MAX_SPACES, Math.round(spaces)));
}

/**
 * 두 칸 사이 왕복으로 랜덤 인카운터를 유발한다.
 * facing은 사이클 사이에 유지된다.
 */
@Injectable()
export class MovementService {
  private readonly logger = new Logger(MovementService.name);
  private pattern: MovementPattern;
  private facing: Direction;

  constructor(
    private readonly configService: BotConfigService,
    private readonly scriptRunner: ScriptRunnerService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.pattern = configService.get().movement.pattern;
    this.facing = POLES[this.pattern][0];
  }

  get currentFacing(): Direction {
    return this.facing;
  }

  get currentPattern(): MovementPattern {
    return this.pattern;
  }

  /** 축 전환: 다음 이동에서 잘못된 회전 비용이 붙지 않도록 facing 리셋 */
  setPattern(pattern: MovementPattern): void {
    if (pattern !== this.pattern) {
      this.logger.debug(`Movement pattern ${this.pattern} → ${pattern}`);
    }
    this.pattern = pattern;
    this.facing = POLES[pattern][0];
  }

  /** 이동 후 facing 갱신, 실제 누른 시간(ms) 반환 */
  async move(direction: Direction, spaces: number): Promise<number> {
    const { movement } = this.configService.get();
    const duration = movementCost(direction, spaces, this.facing, movement);
    this.facing = direction;
    await this.scriptRunner.run(holdScript(direction, duration, SETTLE_MS), () => true);
    return duration;
  }

  /** 한 사이클: 시작 극 → 반대 극, 각 극에서 잠시 대기 */
  async moveCycle(shouldContinue: ContinueCheck): Promise<boolean> {
    const { movement } = this.configService.get();
    if (movement.pattern !== this.pattern) {
      this.setPattern(movement.pattern);
    }
    const spaces = clampSpaces(movement.spaces);

    for (const direction of POLES[this.pattern]) {
      if (!shouldContinue()) return false;
      await this.move(direction, spaces);
      await this.clock.sleep(POLE_DWELL_MS);
    }
    return true;
  }
}
