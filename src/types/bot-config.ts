import type { AbilityId, BotKey, MovementPattern } from './enums.js';

export type AbilitySlot = {
  readonly id: AbilityId;
  readonly maxUses: number;
  readonly remainingUses: number;
};

/** 슬롯 1~4 고정 길이: 인덱스 = id - 1 */
export type AbilityTable = readonly [AbilitySlot, AbilitySlot, AbilitySlot, AbilitySlot];

export type MovementSettings = {
  readonly timePerSpaceMs: number;
  readonly timeToTurnMs: number;
  readonly cycleDelayMs: number;
  readonly pattern: MovementPattern;
  readonly spaces: number;
};

export type BattleSettings = {
  readonly attackWaitMs: number;
  readonly primaryAbility: AbilityId;
  readonly backupAbility: AbilityId;
  readonly useBackup: boolean;
  /** null이면 전투 루프 횟수 제한 없음 */
  readonly maxTurnsPerBattle: number | null;
};

export type BotConfig = {
  readonly movement: MovementSettings;
  readonly detection: { readonly threshold: number };
  readonly battle: BattleSettings;
  readonly abilities: AbilityTable;
  readonly recovery: { readonly enabled: boolean };
  readonly startupDelayMs: number;
  readonly keyBindings: Readonly<Record<BotKey, string>>;
};
