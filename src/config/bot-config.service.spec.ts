import { BotConfigService, buildDefaultConfig } from './bot-config.service.js';
import { InvalidInputError } from '../common/errors/bot-errors.js';

describe('buildDefaultConfig', () => {
  it('환경 변수 없으면 기본값', () => {
    const config = buildDefaultConfig({});
    expect(config.movement).toEqual({
      timePerSpaceMs: 200,
      timeToTurnMs: 120,
      cycleDelayMs: 500,
      pattern: 'HORIZONTAL',
      spaces: 1,
    });
    expect(config.detection.threshold).toBe(0.8);
    expect(config.battle).toEqual({
      attackWaitMs: 11000,
      primaryAbility: 1,
      backupAbility: 2,
      useBackup: true,
      maxTurnsPerBattle: null,
    });
    expect(config.abilities.map((s) => s.maxUses)).toEqual([20, 20, 20, 20]);
    expect(config.recovery.enabled).toBe(false);
    expect(config.startupDelayMs).toBe(3000);
    expect(config.keyBindings.CONFIRM).toBe('z');
    expect(config.keyBindings.TRAVEL).toBe('9');
  });

  it('환경 변수 반영', () => {
    const config = buildDefaultConfig({
      BOT_DETECTION_THRESHOLD: '0.65',
      BOT_MAX_USES: '35',
      BOT_RECOVERY_ENABLED: 'true',
      BOT_MAX_TURNS_PER_BATTLE: '40',
      BOT_MOVEMENT_PATTERN: 'VERTICAL',
    });
    expect(config.detection.threshold).toBe(0.65);
    expect(config.abilities[3]).toEqual({ id: 4, maxUses: 35, remainingUses: 35 });
    expect(config.recovery.enabled).toBe(true);
    expect(config.battle.maxTurnsPerBattle).toBe(40);
    expect(config.movement.pattern).toBe('VERTICAL');
  });

  it('잘못된 값은 기본값으로', () => {
    const config = buildDefaultConfig({
      BOT_DETECTION_THRESHOLD: '1.7',
      BOT_TIME_PER_SPACE_MS: 'fast',
      BOT_MAX_USES: '0',
    });
    expect(config.detection.threshold).toBe(0.8);
    expect(config.movement.timePerSpaceMs).toBe(200);
    expect(config.abilities[0].maxUses).toBe(20);
  });
});

describe('BotConfigService', () => {
  let service: BotConfigService;

  beforeEach(() => {
    service = new BotConfigService(buildDefaultConfig({}));
  });

  describe('update', () => {
    it('부분 변경, 나머지 유지', () => {
      const before = service.get();
      const after = service.update({
        movement: { spaces: 3 },
        battle: { useBackup: false },
      });
      expect(after.movement.spaces).toBe(3);
      expect(after.movement.timePerSpaceMs).toBe(200);
      expect(after.battle.useBackup).toBe(false);
      expect(after.battle.primaryAbility).toBe(1);
      expect(after.abilities).toBe(before.abilities);
    });

    it('스냅샷 교체: 이전 스냅샷은 변하지 않는다', () => {
      const before = service.get();
      service.update({ detection: { threshold: 0.5 } });
      expect(before.detection.threshold).toBe(0.8);
      expect(service.get().detection.threshold).toBe(0.5);
    });

    it('keyBindings 일부만 덮어쓰기', () => {
      service.update({ keyBindings: { CONFIRM: 'x' } });
      expect(service.get().keyBindings.CONFIRM).toBe('x');
      expect(service.get().keyBindings.UP).toBe('Up');
    });
  });

  describe('setMaxUses', () => {
    it('최대치 변경 + 카운터 즉시 리셋', () => {
      service.consumeUse(2);
      const slot = service.setMaxUses(2, 30);
      expect(slot).toEqual({ id: 2, maxUses: 30, remainingUses: 30 });
      expect(service.getAbility(1)).toEqual({ id: 1, maxUses: 20, remainingUses: 20 });
    });

    it('0 이하 / 정수 아님 → InvalidInputError, 기존 값 유지', () => {
      expect(() => service.setMaxUses(3, 0)).toThrow(InvalidInputError);
      expect(() => service.setMaxUses(3, 2.5)).toThrow(InvalidInputError);
      expect(service.getAbility(3)).toEqual({ id: 3, maxUses: 20, remainingUses: 20 });
    });
  });

  describe('consumeUse', () => {
    it('정확히 1 차감, 다른 슬롯 불변', () => {
      const slot = service.consumeUse(3);
      expect(slot.remainingUses).toBe(19);
      expect(service.get().abilities.map((s) => s.remainingUses)).toEqual([20, 20, 19, 20]);
    });

    it('0 아래로 내려가지 않는다', () => {
      service.setMaxUses(1, 1);
      service.consumeUse(1);
      expect(service.consumeUse(1).remainingUses).toBe(0);
    });
  });

  describe('resetUses', () => {
    it('모든 슬롯 remaining = max, 멱등', () => {
      service.setMaxUses(4, 7);
      service.consumeUse(1);
      service.consumeUse(4);
      service.consumeUse(4);

      const first = service.resetUses().abilities;
      const second = service.resetUses().abilities;
      expect(first.map((s) => [s.remainingUses, s.maxUses])).toEqual([
        [20, 20],
        [20, 20],
        [20, 20],
        [7, 7],
      ]);
      expect(second).toEqual(first);
    });
  });
});
