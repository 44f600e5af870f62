// 컨텐츠 시드 데이터 스키마 (demonling_v1 JSON 대응)

import { z } from 'zod';
import {
  ABILITY_TARGET,
  AI_BEHAVIOR,
  ARCHETYPE,
  STATUS_EFFECT_KIND,
  type Archetype,
} from '../db/types/index.js';

const BaseStatsSchema = z.object({
  maxHealth: z.number().int().min(1),
  attack: z.number().int().min(0),
  defense: z.number().int().min(0),
  agility: z.number().int().min(0),
  magic: z.number().int().min(0),
});

export const AbilityEffectSchema = z.object({
  target: z.enum(ABILITY_TARGET),
  kind: z.enum(STATUS_EFFECT_KIND),
  duration: z.number().int().min(1).optional(),
  power: z.number().int().min(0).optional(),
});
export type AbilityEffect = z.infer<typeof AbilityEffectSchema>;

const AbilityObject = z.object({
  abilityId: z.string().min(1),
  name: z.string().min(1),
  verb: z.string().min(1), // 로그 문구 "X unleashes hellfire!"
  dealsDamage: z.boolean().default(false),
  effects: z.array(AbilityEffectSchema).default([]),
});

const hasEffect = (a: { dealsDamage: boolean; effects: unknown[] }) =>
  a.dealsDamage || a.effects.length > 0;
const HAS_EFFECT_MESSAGE = { message: 'ability must deal damage or apply at least one effect' };

export const AbilitySchema = AbilityObject.refine(hasEffect, HAS_EFFECT_MESSAGE);
export type AbilityDefinition = z.infer<typeof AbilitySchema>;

export const PlayerAbilitySchema = AbilityObject.extend({
  unlockLevel: z.number().int().min(1),
}).refine(hasEffect, HAS_EFFECT_MESSAGE);
export type PlayerAbilityDefinition = z.infer<typeof PlayerAbilitySchema>;

const AbilityList = z.array(AbilitySchema).min(1);

/** 아키타입은 닫힌 집합 — 4종 모두 필수, 그 외 키 불허 */
export const AbilitiesFileSchema = z.object({
  archetypes: z
    .object({
      DEMON: AbilityList,
      UNDEAD: AbilityList,
      BEAST: AbilityList,
      ELEMENTAL: AbilityList,
    })
    .strict(),
  player: z.array(PlayerAbilitySchema).min(1),
});
export type AbilitiesFile = z.infer<typeof AbilitiesFileSchema>;

export const EnemyTemplateSchema = z.object({
  templateId: z.string().min(1),
  name: z.string().min(1),
  archetype: z.enum(ARCHETYPE),
  behavior: z.enum(AI_BEHAVIOR),
  stats: BaseStatsSchema,
});
export type EnemyTemplate = z.infer<typeof EnemyTemplateSchema>;

export const EnemiesFileSchema = z.array(EnemyTemplateSchema).min(1);

export const QuestSchema = z.object({
  questId: z.string().min(1),
  title: z.string().min(1),
  description: z.string(),
  energyCost: z.number().int().min(0),
  reward: z.object({
    xp: z.number().int().min(0),
    gold: z.number().int().min(0),
    soulShard: z.boolean(),
    soulShardAmount: z.number().int().min(1).default(1),
  }),
  enemy: z
    .object({
      templateId: z.string().min(1),
      level: z.number().int().min(1).default(1),
    })
    .optional(),
  unlockFeature: z.string().min(1).optional(),
});

export const ChainSchema = z.object({
  chainId: z.string().min(1),
  title: z.string().min(1),
  description: z.string(),
  quests: z.array(QuestSchema).min(1),
});

export const QuestsFileSchema = z.object({
  chains: z.array(ChainSchema).min(1),
});
export type QuestsFile = z.infer<typeof QuestsFileSchema>;

export const RulesFileSchema = z.object({
  playerName: z.string().min(1),
  xpGrowthFactor: z.number().gt(1),
  energyRegenIntervalMs: z.number().int().min(1000),
  energyRefillSoulShardCost: z.number().int().min(1),
  lowHealthThreshold: z.number().gt(0).lt(1),
  levelGrowth: BaseStatsSchema.extend({ maxHealth: z.number().int().min(0) }),
  enemyLevelGrowth: BaseStatsSchema.extend({ maxHealth: z.number().int().min(0) }),
});
export type GameRules = z.infer<typeof RulesFileSchema>;

// --- 런타임 (불변) 컨텐츠 ---

export type QuestDefinition = z.infer<typeof QuestSchema> & {
  chainId: string;
  chainIndex: number;
};

export type ChainDefinition = {
  chainId: string;
  title: string;
  description: string;
  questIds: readonly string[];
};

export interface GameContent {
  readonly rules: Readonly<GameRules>;
  readonly chains: readonly ChainDefinition[];
  readonly quests: ReadonlyMap<string, Readonly<QuestDefinition>>;
  readonly enemies: ReadonlyMap<string, Readonly<EnemyTemplate>>;
  readonly archetypeAbilities: Readonly<Record<Archetype, readonly AbilityDefinition[]>>;
  readonly playerAbilities: readonly PlayerAbilityDefinition[];
  /** 적/플레이어 어빌리티 전체 (abilityId → 정의) */
  readonly abilities: ReadonlyMap<string, Readonly<AbilityDefinition>>;
}

export type RawContentFiles = {
  quests: unknown;
  enemies: unknown;
  abilities: unknown;
  rules: unknown;
};
