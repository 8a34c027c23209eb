import type { AbilityId, RecoveryPhase } from './enums.js';

export type BotState =
  | { kind: 'STOPPED' }
  | { kind: 'MOVING' }
  | { kind: 'IN_BATTLE' }
  | { kind: 'ATTACKING' }
  | { kind: 'FLEEING' }
  | { kind: 'RECOVERING'; phase: RecoveryPhase };

export type BotStats = {
  movementCycles: number;
  battles: number;
  flees: number;
};

export type StateTransition = {
  at: number;
  from: string;
  to: string;
};

/** 한 전투 턴에서 고른 행동 */
export type BattleAction =
  | { kind: 'FIGHT'; ability: AbilityId }
  | { kind: 'FLEE' };

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

export function describeState(state: BotState): string {
  switch (state.kind) {
    case 'STOPPED':
      return 'Stopped';
    case 'MOVING':
      return 'Moving';
    case 'IN_BATTLE':
      return 'In battle';
    case 'ATTACKING':
      return 'Attacking';
    case 'FLEEING':
      return 'Fleeing';
    case 'RECOVERING':
      return state.phase === 'TRAVEL' ? 'Recovering (travel)' : 'Recovering (restore)';
    default:
      return assertNever(state);
  }
}

/** 전이 기록용 짧은 태그: RECOVERING은 phase 포함 */
export function stateTag(state: BotState): string {
  return state.kind === 'RECOVERING' ? `RECOVERING:${state.phase}` : state.kind;
}
