// 봇 설정 서비스: .env 기본값 + 런타임 변경 지원

import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import type {
  AbilityId,
  AbilitySlot,
  BotConfig,
  BotKey,
} from '../types/index.js';
import { InvalidInputError } from '../common/errors/bot-errors.js';
import {
  clampSlot,
  createAbilityTable,
  getSlot,
  refillAll,
  updateSlot,
} from './ability-table.js';
import type { BotConfigPatch } from './bot-config.schema.js';

export const DEFAULT_KEY_BINDINGS: Readonly<Record<BotKey, string>> = {
  UP: 'Up',
  DOWN: 'Down',
  LEFT: 'Left',
  RIGHT: 'Right',
  CONFIRM: 'z',
  TRAVEL: '9',
};

/** 테스트/임베딩용 초기 설정 주입 토큰 */
export const INITIAL_BOT_CONFIG = Symbol('INITIAL_BOT_CONFIG');

type Env = Record<string, string | undefined>;

function envInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  return Number.isFinite(value) && value >= min ? value : fallback;
}

function envThreshold(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseFloat(raw);
  return Number.isFinite(value) && value >= 0 && value <= 1 ? value : fallback;
}

export function buildDefaultConfig(env: Env = {}): BotConfig {
  const maxUses = envInt(env, 'BOT_MAX_USES', 20, 1);
  const maxTurns = envInt(env, 'BOT_MAX_TURNS_PER_BATTLE', 0, 0);
  return {
    movement: {
      timePerSpaceMs: envInt(env, 'BOT_TIME_PER_SPACE_MS', 200, 1),
      timeToTurnMs: envInt(env, 'BOT_TIME_TO_TURN_MS', 120, 1),
      cycleDelayMs: envInt(env, 'BOT_CYCLE_DELAY_MS', 500, 1),
      pattern: env.BOT_MOVEMENT_PATTERN === 'VERTICAL' ? 'VERTICAL' : 'HORIZONTAL',
      spaces: 1,
    },
    detection: {
      threshold: envThreshold(env, 'BOT_DETECTION_THRESHOLD', 0.8),
    },
    battle: {
      attackWaitMs: envInt(env, 'BOT_ATTACK_WAIT_MS', 11000, 1),
      primaryAbility: 1,
      backupAbility: 2,
      useBackup: true,
      maxTurnsPerBattle: maxTurns > 0 ? maxTurns : null,
    },
    abilities: createAbilityTable(maxUses),
    recovery: {
      enabled: env.BOT_RECOVERY_ENABLED === 'true',
    },
    startupDelayMs: envInt(env, 'BOT_STARTUP_DELAY_MS', 3000, 0),
    keyBindings: DEFAULT_KEY_BINDINGS,
  };
}

/**
 * 설정은 불변 스냅샷 하나로 관리한다.
 * 모든 쓰기는 새 객체를 만들어 통째로 교체: 읽는 쪽은 항상 완결된 스냅샷을 본다.
 * 카운터 변경(차감/리셋/최대치 변경)도 여기서만 read-modify-write 한다.
 */
@Injectable()
export class BotConfigService {
  private readonly logger = new Logger(BotConfigService.name);
  private config: BotConfig;

  constructor(@Optional() @Inject(INITIAL_BOT_CONFIG) initial?: BotConfig) {
    this.config = initial ?? buildDefaultConfig(process.env);
  }

  get(): BotConfig {
    return this.config;
  }

  getAbility(id: AbilityId): AbilitySlot {
    return getSlot(this.config.abilities, id);
  }

  /** 런타임 설정 변경: 워커의 다음 읽기부터 반영 */
  update(patch: BotConfigPatch): BotConfig {
    const current = this.config;
    this.config = {
      ...current,
      movement: { ...current.movement, ...patch.movement },
      detection: { ...current.detection, ...patch.detection },
      battle: { ...current.battle, ...patch.battle },
      recovery: { ...current.recovery, ...patch.recovery },
      startupDelayMs: patch.startupDelayMs ?? current.startupDelayMs,
      keyBindings: { ...current.keyBindings, ...patch.keyBindings },
    };
    this.logger.log(`Bot config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }

  /** 최대 사용 횟수 변경: 해당 슬롯 카운터도 즉시 최대치로 */
  setMaxUses(id: AbilityId, maxUses: number): AbilitySlot {
    if (!Number.isInteger(maxUses) || maxUses <= 0) {
      throw new InvalidInputError('maxUses must be a positive integer', {
        ability: id,
        maxUses,
      });
    }
    this.config = {
      ...this.config,
      abilities: updateSlot(this.config.abilities, id, (slot) => ({
        ...slot,
        maxUses,
        remainingUses: maxUses,
      })),
    };
    this.logger.log(`Ability ${id} max uses set to ${maxUses}`);
    return this.getAbility(id);
  }

  /** 전투 스크립트 1회 완료 시 호출: 0 미만으로 내려가지 않는다 */
  consumeUse(id: AbilityId): AbilitySlot {
    this.config = {
      ...this.config,
      abilities: updateSlot(this.config.abilities, id, (slot) =>
        clampSlot({ ...slot, remainingUses: slot.remainingUses - 1 }),
      ),
    };
    return this.getAbility(id);
  }

  resetUses(): BotConfig {
    this.config = { ...this.config, abilities: refillAll(this.config.abilities) };
    return this.config;
  }
}
