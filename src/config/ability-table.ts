import type { AbilityId, AbilitySlot, AbilityTable } from '../types/index.js';

const SLOT_INDEX: Record<AbilityId, 0 | 1 | 2 | 3> = { 1: 0, 2: 1, 3: 2, 4: 3 };

export function createAbilityTable(maxUses: number): AbilityTable {
  const slot = (id: AbilityId): AbilitySlot => ({ id, maxUses, remainingUses: maxUses });
  return [slot(1), slot(2), slot(3), slot(4)];
}

export function getSlot(table: AbilityTable, id: AbilityId): AbilitySlot {
  return table[SLOT_INDEX[id]];
}

export function mapSlots(
  table: AbilityTable,
  fn: (slot: AbilitySlot) => AbilitySlot,
): AbilityTable {
  return [fn(table[0]), fn(table[1]), fn(table[2]), fn(table[3])];
}

export function updateSlot(
  table: AbilityTable,
  id: AbilityId,
  fn: (slot: AbilitySlot) => AbilitySlot,
): AbilityTable {
  return mapSlots(table, (slot) => (slot.id === id ? fn(slot) : slot));
}

/** 0 ≤ remaining ≤ max 로 고정 */
export function clampSlot(slot: AbilitySlot): AbilitySlot {
  const remainingUses = Math.max(0, Math.min(slot.maxUses, slot.remainingUses));
  return remainingUses === slot.remainingUses ? slot : { ...slot, remainingUses };
}

export function refillAll(table: AbilityTable): AbilityTable {
  return mapSlots(table, (slot) => ({ ...slot, remainingUses: slot.maxUses }));
}
