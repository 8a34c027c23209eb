import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, type Clock } from '../../platform/clock.js';
import { INPUT_ACTUATOR, type InputActuator } from '../../platform/input-actuator.js';
import type { ActionScript, ScriptStep } from './action-scripts.js';

export type ContinueCheck = () => boolean;

/**
 * 액션 스크립트 순차 실행.
 * 각 스텝 직전에 중단 여부를 확인한다. 스텝 내부 대기는 끊지 않는다
 * (hold 중간에 멈추면 키가 눌린 채로 남는다).
 */
@Injectable()
export class ScriptRunnerService {
  private readonly logger = new Logger(ScriptRunnerService.name);

  constructor(
    @Inject(INPUT_ACTUATOR) private readonly actuator: InputActuator,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /** 끝까지 실행했으면 true, 중단됐으면 false */
  async run(script: ActionScript, shouldContinue: ContinueCheck): Promise<boolean> {
    for (let i = 0; i < script.steps.length; i++) {
      if (!shouldContinue()) {
        this.logger.debug(`Script ${script.name} interrupted before step ${i + 1}/${script.steps.length}`);
        return false;
      }
      const step = script.steps[i];
      if (step) await this.execute(step);
    }
    return true;
  }

  private async execute(step: ScriptStep): Promise<void> {
    switch (step.op) {
      case 'press':
        await this.actuator.press(step.key);
        break;
      case 'hold':
        await this.actuator.keyDown(step.key);
        try {
          await this.clock.sleep(step.holdMs);
        } finally {
          await this.actuator.keyUp(step.key);
        }
        break;
      case 'wait':
        break;
    }
    await this.clock.sleep(step.delayMs);
  }
}
