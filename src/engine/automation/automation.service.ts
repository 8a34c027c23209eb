// 봇 생명주기 상태 머신 + 백그라운드 워커 루프

import { Inject, Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import type {
  AbilityTable,
  BotState,
  BotStats,
  StateTransition,
} from '../../types/index.js';
import { assertNever, describeState, stateTag } from '../../types/index.js';
import { BotConfigService } from '../../config/bot-config.service.js';
import { PreconditionFailedError } from '../../common/errors/bot-errors.js';
import { CLOCK, type Clock } from '../../platform/clock.js';
import { DetectorService } from '../detector/detector.service.js';
import { ReferenceStoreService } from '../detector/reference-store.service.js';
import { BattlePolicyService } from '../battle/battle-policy.service.js';
import { RECOVERY_RESTORE_SCRIPT, RECOVERY_TRAVEL_SCRIPT } from '../battle/action-scripts.js';
import { ScriptRunnerService } from '../battle/script-runner.service.js';
import { MovementService } from '../movement/movement.service.js';

const IDLE_POLL_MS = 100;
const FLEE_SETTLE_MS = 2000;
const HISTORY_LIMIT = 20;

/** start()마다 새로 발급: stop 후 재시작해도 이전 루프가 되살아나지 않는다 */
interface RunToken {
  id: number;
  active: boolean;
}

export interface BotStatus {
  running: boolean;
  state: BotState;
  label: string;
  stats: BotStats;
  abilities: AbilityTable;
  history: StateTransition[];
}

@Injectable()
export class AutomationService implements OnModuleDestroy {
  private readonly logger = new Logger(AutomationService.name);
  private state: BotState = { kind: 'STOPPED' };
  private readonly stats: BotStats = { movementCycles: 0, battles: 0, flees: 0 };
  private readonly history: StateTransition[] = [];
  private token: RunToken | null = null;
  private nextTokenId = 1;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly configService: BotConfigService,
    private readonly references: ReferenceStoreService,
    private readonly detector: DetectorService,
    private readonly battlePolicy: BattlePolicyService,
    private readonly movement: MovementService,
    private readonly scriptRunner: ScriptRunnerService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  onModuleDestroy(): void {
    this.stop();
  }

  get isRunning(): boolean {
    return this.token?.active ?? false;
  }

  getState(): BotState {
    return this.state;
  }

  getStats(): BotStats {
    return { ...this.stats };
  }

  getStatus(): BotStatus {
    return {
      running: this.isRunning,
      state: this.state,
      label: describeState(this.state),
      stats: this.getStats(),
      abilities: this.configService.get().abilities,
      history: [...this.history],
    };
  }

  /** 멱등: 이미 실행 중이면 그대로 */
  start(): BotStatus {
    if (this.isRunning) return this.getStatus();

    if (!this.references.has('hp_indicator')) {
      throw new PreconditionFailedError('Load the hp_indicator reference before starting', {
        missing: 'hp_indicator',
      });
    }

    const token: RunToken = { id: this.nextTokenId++, active: true };
    this.token = token;
    this.transition({ kind: 'MOVING' });
    this.logger.log(`Bot started (run #${token.id})`);

    // 이전 워커가 진행 중인 스텝을 마칠 때까지 새 워커는 입력을 보내지 않는다
    const previous = this.loop;
    this.loop = this.run(token, previous).catch((err) => {
      this.logger.error(`Bot loop crashed (run #${token.id})`, err instanceof Error ? err.stack : String(err));
      this.halt(token);
    });
    return this.getStatus();
  }

  /** 멱등: 워커는 다음 확인 지점에서 빠져나간다 */
  stop(): BotStatus {
    if (this.token) {
      const { id } = this.token;
      this.halt(this.token);
      this.logger.log(`Bot stopped (run #${id})`);
    }
    return this.getStatus();
  }

  /** 워커 루프 종료까지 대기, 기다리는 사이 재시작됐으면 새 루프도 기다린다 */
  async whenIdle(): Promise<void> {
    let current: Promise<void> | null;
    do {
      current = this.loop;
      await current;
    } while (current !== this.loop);
  }

  private halt(token: RunToken): void {
    token.active = false;
    if (this.token === token) {
      this.token = null;
      this.transition({ kind: 'STOPPED' });
    }
  }

  private transition(next: BotState): void {
    const from = stateTag(this.state);
    const to = stateTag(next);
    this.state = next;
    if (from === to) return;
    this.history.push({ at: this.clock.now(), from, to });
    if (this.history.length > HISTORY_LIMIT) this.history.shift();
  }

  private async run(token: RunToken, previous: Promise<void> | null): Promise<void> {
    const alive = () => token.active;

    if (previous) await previous;
    if (!alive()) return;
    await this.clock.sleep(this.configService.get().startupDelayMs);

    while (alive()) {
      const config = this.configService.get();

      if (await this.detector.isInBattle(config.detection.threshold)) {
        if (!alive()) break;
        const finished = await this.runEncounter(token);
        if (finished) return;
      } else if (alive() && this.state.kind === 'MOVING') {
        if (await this.movement.moveCycle(alive)) {
          this.stats.movementCycles++;
        }
        await this.clock.sleep(this.configService.get().movement.cycleDelayMs);
      }

      await this.clock.sleep(IDLE_POLL_MS);
    }
  }

  /** 전투 1회 처리, 회복 후 자동 정지했으면 true */
  private async runEncounter(token: RunToken): Promise<boolean> {
    const alive = () => token.active;

    this.transition({ kind: 'IN_BATTLE' });
    this.stats.battles++;
    this.logger.log(`Battle #${this.stats.battles} detected`);

    // 남은 PP가 하나라도 있으면 공격 상태로 진입, 실제 기술 선택은 턴마다 정책이 한다
    const hasUses = this.configService.get().abilities.some((slot) => slot.remainingUses > 0);
    this.transition(hasUses ? { kind: 'ATTACKING' } : { kind: 'FLEEING' });

    const outcome = await this.battlePolicy.handleEncounter(alive);
    if (!alive()) return false;

    switch (outcome) {
      case 'RESOLVED':
      case 'TURN_LIMIT':
        this.transition({ kind: 'MOVING' });
        return false;
      case 'CANCELLED':
        return false;
      case 'FLED':
        this.transition({ kind: 'FLEEING' });
        this.stats.flees++;
        if (!this.configService.get().recovery.enabled) {
          this.transition({ kind: 'MOVING' });
          return false;
        }
        return this.recover(token);
      default:
        return assertNever(outcome);
    }
  }

  /**
   * 도주 후 회복 지점 이동 → 회복 → 정지.
   * 전투 중이면 이번 사이클은 포기하고 MOVING으로 돌아간다.
   */
  private async recover(token: RunToken): Promise<boolean> {
    const alive = () => token.active;

    await this.clock.sleep(FLEE_SETTLE_MS);
    if (!alive()) return false;

    const { detection } = this.configService.get();
    if (await this.detector.isInBattle(detection.threshold)) {
      this.logger.warn('Still in battle after fleeing, recovery skipped this cycle');
      if (alive()) this.transition({ kind: 'MOVING' });
      return false;
    }
    if (!alive()) return false;

    this.transition({ kind: 'RECOVERING', phase: 'TRAVEL' });
    this.logger.log('Travelling to recovery point');
    if (!(await this.scriptRunner.run(RECOVERY_TRAVEL_SCRIPT, alive))) return false;
    if (!alive()) return false;

    this.transition({ kind: 'RECOVERING', phase: 'RESTORE' });
    if (!(await this.scriptRunner.run(RECOVERY_RESTORE_SCRIPT, alive))) return false;

    this.configService.resetUses();
    this.logger.log('Resources restored, stopping bot');
    this.halt(token);
    return true;
  }
}
