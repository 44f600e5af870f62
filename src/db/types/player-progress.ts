import { z } from 'zod';
import { DEFAULT_BASE_STATS, type BaseStats } from './base-stats.js';

export type PlayerProgress = {
  level: number;
  xp: number;
  xpToNext: number;
  gold: number;
  soulShards: number;
  energy: number;
  energyMax: number;
  lastEnergyTimestamp: number; // epoch ms
  completedQuestIds: string[];
  baseStats: BaseStats;
  unlockedFeatures: string[];
};

/** 첫 실행 기본값 (lastEnergyTimestamp는 로드 시각) */
export const DEFAULT_PLAYER_PROGRESS: Omit<PlayerProgress, 'lastEnergyTimestamp'> = {
  level: 1,
  xp: 0,
  xpToNext: 10,
  gold: 100,
  soulShards: 0,
  energy: 10,
  energyMax: 10,
  completedQuestIds: [],
  baseStats: DEFAULT_BASE_STATS,
  unlockedFeatures: [],
};

const asObject = (value: unknown): unknown =>
  typeof value === 'object' && value !== null && !Array.isArray(value) ? value : {};

const count = (fallback: number) => z.number().int().min(0).catch(fallback);

const BaseStatsSchema = z.preprocess(
  asObject,
  z.object({
    maxHealth: z.number().int().min(1).catch(DEFAULT_BASE_STATS.maxHealth),
    attack: count(DEFAULT_BASE_STATS.attack),
    defense: count(DEFAULT_BASE_STATS.defense),
    agility: count(DEFAULT_BASE_STATS.agility),
    magic: count(DEFAULT_BASE_STATS.magic),
  }),
);

/**
 * 저장 레코드 → PlayerProgress. 필드 단위로 검증하고,
 * 누락/손상된 필드만 기본값으로 대체한다.
 */
export function buildPlayerProgressSchema(now: number) {
  const d = DEFAULT_PLAYER_PROGRESS;
  return z.preprocess(
    asObject,
    z.object({
      level: z.number().int().min(1).catch(d.level),
      xp: count(d.xp),
      xpToNext: z.number().int().min(1).catch(d.xpToNext),
      gold: count(d.gold),
      soulShards: count(d.soulShards),
      energy: count(d.energy),
      energyMax: z.number().int().min(1).catch(d.energyMax),
      lastEnergyTimestamp: z.number().int().min(0).catch(now),
      completedQuestIds: z
        .array(z.string())
        .catch([])
        .transform((ids) => [...new Set(ids)]),
      baseStats: BaseStatsSchema,
      unlockedFeatures: z
        .array(z.string())
        .catch([])
        .transform((ids) => [...new Set(ids)]),
    }),
  );
}
