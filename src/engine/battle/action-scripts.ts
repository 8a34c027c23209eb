// 고정 메뉴 배치를 가정한 입력 스크립트 테이블
// 게임 UI가 바뀌면 이 파일만 교체한다

import type { AbilityId, BotKey } from '../../types/index.js';

export type ScriptStep =
  | { op: 'press'; key: BotKey; delayMs: number }
  | { op: 'hold'; key: BotKey; holdMs: number; delayMs: number }
  | { op: 'wait'; delayMs: number };

export interface ActionScript {
  name: string;
  steps: readonly ScriptStep[];
}

const STEP_DELAY_MS = 100;
const MENU_OPEN_DELAY_MS = 300;
const CONFIRM_SETTLE_MS = 300;

export const TRAVEL_ANIMATION_MS = 6000;
export const TRAVEL_ARRIVAL_MS = 2000;
export const RESTORE_STEP_DELAY_MS = 800;
export const RESTORE_CONFIRM_COUNT = 5;

const press = (key: BotKey, delayMs: number = STEP_DELAY_MS): ScriptStep => ({
  op: 'press',
  key,
  delayMs,
});

/** FIGHT 서브메뉴 열기 + 커서를 1번 슬롯(좌상단)으로 리셋 */
const FIGHT_PRELUDE: readonly ScriptStep[] = [
  press('UP'),
  press('CONFIRM', MENU_OPEN_DELAY_MS),
  press('UP'),
  press('UP'),
  press('LEFT'),
];

/** 2x2 기술 그리드에서 1번 슬롯 기준 이동 */
export const SLOT_OFFSETS: Record<AbilityId, readonly BotKey[]> = {
  1: [],
  2: ['RIGHT'],
  3: ['DOWN'],
  4: ['DOWN', 'RIGHT'],
};

export function fightScript(ability: AbilityId): ActionScript {
  return {
    name: `fight:${ability}`,
    steps: [
      ...FIGHT_PRELUDE,
      ...SLOT_OFFSETS[ability].map((key) => press(key)),
      press('CONFIRM', CONFIRM_SETTLE_MS),
    ],
  };
}

export const FLEE_SCRIPT: ActionScript = {
  name: 'flee',
  steps: [press('UP'), press('DOWN'), press('RIGHT'), press('CONFIRM', CONFIRM_SETTLE_MS)],
};

export const RECOVERY_TRAVEL_SCRIPT: ActionScript = {
  name: 'recovery:travel',
  steps: [
    press('TRAVEL', TRAVEL_ANIMATION_MS),
    { op: 'wait', delayMs: TRAVEL_ARRIVAL_MS },
  ],
};

/** 회복 NPC와 반복 대화 */
export const RECOVERY_RESTORE_SCRIPT: ActionScript = {
  name: 'recovery:restore',
  steps: [
    { op: 'wait', delayMs: RESTORE_STEP_DELAY_MS },
    ...Array.from({ length: RESTORE_CONFIRM_COUNT }, () => press('CONFIRM', RESTORE_STEP_DELAY_MS)),
  ],
};

/** 방향키를 holdMs 동안 누른 뒤 settleMs 대기 */
export function holdScript(key: BotKey, holdMs: number, settleMs: number): ActionScript {
  return {
    name: `hold:${key}`,
    steps: [{ op: 'hold', key, holdMs, delayMs: settleMs }],
  };
}
