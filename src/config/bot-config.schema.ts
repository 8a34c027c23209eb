import { z } from 'zod';
import { ABILITY_ID, BOT_KEY, MOVEMENT_PATTERN } from '../types/index.js';

export const MIN_SPACES = 1;
export const MAX_SPACES = 4;

const positiveMs = z.number().int().positive();
const abilityId = z.union([
  z.literal(ABILITY_ID[0]),
  z.literal(ABILITY_ID[1]),
  z.literal(ABILITY_ID[2]),
  z.literal(ABILITY_ID[3]),
]);

/** PATCH /v1/settings 본문 */
export const BotConfigPatchSchema = z
  .object({
    movement: z
      .object({
        timePerSpaceMs: positiveMs,
        timeToTurnMs: positiveMs,
        cycleDelayMs: positiveMs,
        pattern: z.enum(MOVEMENT_PATTERN),
        spaces: z.number().int().min(MIN_SPACES).max(MAX_SPACES),
      })
      .partial()
      .strict(),
    detection: z.object({ threshold: z.number().min(0).max(1) }).partial().strict(),
    battle: z
      .object({
        attackWaitMs: positiveMs,
        primaryAbility: abilityId,
        backupAbility: abilityId,
        useBackup: z.boolean(),
        maxTurnsPerBattle: z.number().int().positive().nullable(),
      })
      .partial()
      .strict(),
    recovery: z.object({ enabled: z.boolean() }).partial().strict(),
    startupDelayMs: z.number().int().min(0),
    keyBindings: z.record(z.enum(BOT_KEY), z.string().min(1).max(32)),
  })
  .partial()
  .strict();

export type BotConfigPatch = z.infer<typeof BotConfigPatchSchema>;

export const MaxUsesBodySchema = z.object({
  maxUses: z.number().int().positive().max(999),
});

export type MaxUsesBody = z.infer<typeof MaxUsesBodySchema>;
