// 봇 전역 열거형

export const ABILITY_ID = [1, 2, 3, 4] as const;
export type AbilityId = (typeof ABILITY_ID)[number];

export const DIRECTION = ['UP', 'DOWN', 'LEFT', 'RIGHT'] as const;
export type Direction = (typeof DIRECTION)[number];

export const MOVEMENT_PATTERN = ['HORIZONTAL', 'VERTICAL'] as const;
export type MovementPattern = (typeof MOVEMENT_PATTERN)[number];

/** 액추에이터로 보내는 논리 키: 실제 키 이름은 keyBindings가 결정 */
export const BOT_KEY = ['UP', 'DOWN', 'LEFT', 'RIGHT', 'CONFIRM', 'TRAVEL'] as const;
export type BotKey = (typeof BOT_KEY)[number];

export const REFERENCE_NAME = ['hp_indicator', 'battle_menu'] as const;
export type ReferenceName = (typeof REFERENCE_NAME)[number];

export const BATTLE_OUTCOME = ['RESOLVED', 'FLED', 'CANCELLED', 'TURN_LIMIT'] as const;
export type BattleOutcome = (typeof BATTLE_OUTCOME)[number];

export const RECOVERY_PHASE = ['TRAVEL', 'RESTORE'] as const;
export type RecoveryPhase = (typeof RECOVERY_PHASE)[number];

export function isAbilityId(value: number): value is AbilityId {
  return ABILITY_ID.some((id) => id === value);
}

export function isReferenceName(value: string): value is ReferenceName {
  return REFERENCE_NAME.some((name) => name === value);
}
