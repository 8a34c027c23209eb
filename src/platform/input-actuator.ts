import type { BotKey } from '../types/index.js';

export const INPUT_ACTUATOR = Symbol('INPUT_ACTUATOR');

/**
 * 키 입력 송신. 엔진은 결과를 읽지 않는다.
 * 각 호출은 입력이 전달된 뒤 resolve: 스크립트 순서 보장용.
 */
export interface InputActuator {
  press(key: BotKey): Promise<void>;
  keyDown(key: BotKey): Promise<void>;
  keyUp(key: BotKey): Promise<void>;
}
