// 공용 Enum 정의 — 배열(as const) + 유니온 타입 쌍

export const STATUS_EFFECT_KIND = [
  'BURNED',
  'FROZEN',
  'BLEEDING',
  'STUNNED',
  'ENRAGED',
  'POISONED',
  'REGENERATING',
  'STRENGTHENED',
  'WEAKENED',
  'SHIELDED',
] as const;
export type StatusEffectKind = (typeof STATUS_EFFECT_KIND)[number];

export const TICK_PHASE = ['TURN_START', 'TURN_END', 'PASSIVE'] as const;
export type TickPhase = (typeof TICK_PHASE)[number];

export const ENCOUNTER_PHASE = [
  'AWAITING_PLAYER_ACTION',
  'RESOLVING_PLAYER_ACTION',
  'AWAITING_ENEMY_ACTION',
  'RESOLVING_ENEMY_ACTION',
  'VICTORY',
  'DEFEAT',
] as const;
export type EncounterPhase = (typeof ENCOUNTER_PHASE)[number];

export const ENCOUNTER_STATUS = ['ACTIVE', 'VICTORY', 'DEFEAT'] as const;
export type EncounterStatus = (typeof ENCOUNTER_STATUS)[number];

export const COMBAT_SIDE = ['PLAYER', 'ENEMY'] as const;
export type CombatSide = (typeof COMBAT_SIDE)[number];

export const COMBAT_ACTION = ['ATTACK', 'DEFEND', 'SPECIAL'] as const;
export type CombatActionType = (typeof COMBAT_ACTION)[number];

export const ARCHETYPE = ['DEMON', 'UNDEAD', 'BEAST', 'ELEMENTAL'] as const;
export type Archetype = (typeof ARCHETYPE)[number];

export const AI_BEHAVIOR = ['AGGRESSIVE', 'BALANCED', 'DEFENSIVE'] as const;
export type AiBehavior = (typeof AI_BEHAVIOR)[number];

export const ABILITY_TARGET = ['SELF', 'OPPONENT'] as const;
export type AbilityTarget = (typeof ABILITY_TARGET)[number];

export const QUEST_STATUS = ['LOCKED', 'UNLOCKED', 'COMPLETED'] as const;
export type QuestStatus = (typeof QUEST_STATUS)[number];

export const COMBAT_EVENT_KIND = [
  'BATTLE',
  'DAMAGE',
  'HEAL',
  'STATUS',
  'SKIP',
  'END',
] as const;
export type CombatEventKind = (typeof COMBAT_EVENT_KIND)[number];

export const STORE_DRIVER = ['postgres', 'memory'] as const;
export type StoreDriver = (typeof STORE_DRIVER)[number];
