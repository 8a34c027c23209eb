import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  AbilityId,
  AbilityTable,
  BattleAction,
  BattleOutcome,
  BattleSettings,
} from '../../types/index.js';
import { BotConfigService } from '../../config/bot-config.service.js';
import { getSlot } from '../../config/ability-table.js';
import { CLOCK, type Clock } from '../../platform/clock.js';
import { DetectorService } from '../detector/detector.service.js';
import { FLEE_SCRIPT, fightScript } from './action-scripts.js';
import { ScriptRunnerService, type ContinueCheck } from './script-runner.service.js';

/**
 * 기술 선택 우선순위:
 * 1. 주력 기술 PP 남음 → 주력
 * 2. 보조 사용 + 보조 PP 남음 → 보조
 * 3. 그 외 → 도주
 */
export function selectBattleAction(
  battle: Pick<BattleSettings, 'primaryAbility' | 'backupAbility' | 'useBackup'>,
  abilities: AbilityTable,
): BattleAction {
  if (getSlot(abilities, battle.primaryAbility).remainingUses > 0) {
    return { kind: 'FIGHT', ability: battle.primaryAbility };
  }
  if (battle.useBackup && getSlot(abilities, battle.backupAbility).remainingUses > 0) {
    return { kind: 'FIGHT', ability: battle.backupAbility };
  }
  return { kind: 'FLEE' };
}

@Injectable()
export class BattlePolicyService {
  private readonly logger = new Logger(BattlePolicyService.name);

  constructor(
    private readonly configService: BotConfigService,
    private readonly detector: DetectorService,
    private readonly scriptRunner: ScriptRunnerService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /** 현재 설정 스냅샷 기준 행동 선택 */
  selectAction(): BattleAction {
    const config = this.configService.get();
    return selectBattleAction(config.battle, config.abilities);
  }

  /** 기술 사용 스크립트: 끝까지 실행된 경우에만 PP 1 차감 */
  async fight(ability: AbilityId, shouldContinue: ContinueCheck): Promise<boolean> {
    const completed = await this.scriptRunner.run(fightScript(ability), shouldContinue);
    if (!completed) return false;
    const slot = this.configService.consumeUse(ability);
    this.logger.debug(`Used ability ${ability} (${slot.remainingUses}/${slot.maxUses} left)`);
    return true;
  }

  flee(shouldContinue: ContinueCheck): Promise<boolean> {
    return this.scriptRunner.run(FLEE_SCRIPT, shouldContinue);
  }

  /**
   * 전투 하나를 끝까지 처리.
   * 전투 중인 동안 메뉴가 보이면 행동, 매 턴 attackWaitMs 대기 후 재확인.
   * 도주를 택하면 즉시 FLED: 그 다음은 상위 상태 머신이 결정한다.
   */
  async handleEncounter(shouldContinue: ContinueCheck): Promise<BattleOutcome> {
    let turns = 0;

    while (shouldContinue()) {
      const { detection } = this.configService.get();
      if (!(await this.detector.isInBattle(detection.threshold))) {
        return 'RESOLVED';
      }
      if (!shouldContinue()) break;

      if (await this.detector.isBattleMenuVisible(detection.threshold)) {
        const action = this.selectAction();
        if (action.kind === 'FLEE') {
          this.logger.log('No usable ability left, fleeing');
          return (await this.flee(shouldContinue)) ? 'FLED' : 'CANCELLED';
        }
        if (!(await this.fight(action.ability, shouldContinue))) break;
      }

      turns++;
      const { battle, detection: latest } = this.configService.get();
      await this.clock.sleep(battle.attackWaitMs);

      if (!(await this.detector.isInBattle(latest.threshold))) {
        return 'RESOLVED';
      }
      if (battle.maxTurnsPerBattle !== null && turns >= battle.maxTurnsPerBattle) {
        this.logger.warn(`Battle still active after ${turns} turns, giving up on this encounter`);
        return 'TURN_LIMIT';
      }
    }

    return 'CANCELLED';
  }
}
