import type { BotKey } from '../types/index.js';
import type { InputActuator } from './input-actuator.js';

export type InputEvent = {
  type: 'press' | 'down' | 'up';
  key: BotKey;
};

/**
 * 입력을 보내지 않고 기록만 하는 액추에이터.
 * BOT_DRY_RUN=true 운영 점검과 테스트에서 쓴다.
 */
export class RecordingActuator implements InputActuator {
  readonly events: InputEvent[] = [];
  onEvent: ((event: InputEvent) => void) | null = null;

  async press(key: BotKey): Promise<void> {
    this.record({ type: 'press', key });
  }

  async keyDown(key: BotKey): Promise<void> {
    this.record({ type: 'down', key });
  }

  async keyUp(key: BotKey): Promise<void> {
    this.record({ type: 'up', key });
  }

  /** 'press:CONFIRM' 형식의 간단한 로그 */
  get log(): string[] {
    return this.events.map((e) => `${e.type}:${e.key}`);
  }

  private record(event: InputEvent): void {
    this.events.push(event);
    this.onEvent?.(event);
  }
}
