// 퀘스트 체인 해금 / 보상 / 레벨업 / 에너지 소비

import { Injectable } from '@nestjs/common';
import {
  ForbiddenError,
  InsufficientEnergyError,
  InsufficientSoulShardsError,
  InvalidInputError,
  InvalidQuestError,
} from '../../common/errors/game-errors.js';
import { GameConfigService } from '../../config/game-config.service.js';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type {
  EnemyTemplate,
  PlayerAbilityDefinition,
  QuestDefinition,
} from '../../content/content.types.js';
import {
  buildPlayerProgressSchema,
  type BaseStats,
  type PlayerProgress,
  type QuestStatus,
} from '../../db/types/index.js';
import { StatsService } from '../stats/stats.service.js';
import { EnergyService } from './energy.service.js';

export type QuestKind = 'COMBAT' | 'NARRATIVE';
export type QuestResolution = 'VICTORY' | 'DEFEAT' | 'NARRATIVE';

export interface CompletionSummary {
  questId: string;
  resolution: QuestResolution;
  rewarded: boolean;
  firstClear: boolean;
  xpGained: number;
  goldGained: number;
  soulShardsGained: number;
  levelsGained: number;
  level: number;
  unlockedFeature: string | null;
}

export interface QuestStartResult {
  progress: PlayerProgress;
  quest: Readonly<QuestDefinition>;
  kind: QuestKind;
}

export interface ScaledEnemy {
  templateId: string;
  name: string;
  archetype: EnemyTemplate['archetype'];
  behavior: EnemyTemplate['behavior'];
  level: number;
  stats: BaseStats;
}

export interface QuestBoardEntry {
  questId: string;
  title: string;
  description: string;
  energyCost: number;
  kind: QuestKind;
  status: QuestStatus;
  reward: QuestDefinition['reward'];
  enemy: { name: string; level: number } | null;
}

export interface QuestBoardChain {
  chainId: string;
  title: string;
  description: string;
  quests: QuestBoardEntry[];
}

@Injectable()
export class ProgressionService {
  constructor(
    private readonly content: ContentLoaderService,
    private readonly energyService: EnergyService,
    private readonly statsService: StatsService,
    private readonly config: GameConfigService,
  ) {}

  /** 저장 레코드(누락/손상 허용) → PlayerProgress. 에너지는 최대치로 clamp */
  normalize(record: unknown, now: number): PlayerProgress {
    const progress = buildPlayerProgressSchema(now).parse(record);
    return { ...progress, energy: Math.min(progress.energy, progress.energyMax) };
  }

  regenerate(progress: PlayerProgress, now: number): { progress: PlayerProgress; gained: number } {
    const { state, gained } = this.energyService.regenerate(
      progress,
      now,
      this.content.getRules().energyRegenIntervalMs,
    );
    return { progress: state, gained };
  }

  /** 체인 첫 퀘스트이거나 직전 퀘스트를 한 번 이상 완료 */
  isEligible(progress: PlayerProgress, questId: string): boolean {
    const quest = this.content.getQuest(questId);
    if (!quest) return false;
    if (quest.chainIndex === 0) return true;
    const chain = this.content.getChains().find((c) => c.chainId === quest.chainId);
    const previous = chain?.questIds[quest.chainIndex - 1];
    return previous !== undefined && progress.completedQuestIds.includes(previous);
  }

  /**
   * 에너지 재계산 → 검증 → 비용 차감.
   * 실패 시 예외만 던지고 입력 progress는 건드리지 않는다.
   */
  startQuest(progress: PlayerProgress, questId: string, now: number): QuestStartResult {
    const quest = this.content.getQuest(questId);
    if (!quest) {
      throw new InvalidQuestError(`Unknown quest: ${questId}`, { questId });
    }
    if (!this.isEligible(progress, questId)) {
      throw new InvalidQuestError('Previous quest in chain not completed', {
        questId,
        chainId: quest.chainId,
      });
    }

    const regenerated = this.regenerate(progress, now).progress;
    if (regenerated.energy < quest.energyCost) {
      throw new InsufficientEnergyError(quest.energyCost, regenerated.energy);
    }

    return {
      progress: { ...regenerated, energy: regenerated.energy - quest.energyCost },
      quest,
      kind: quest.enemy ? 'COMBAT' : 'NARRATIVE',
    };
  }

  /**
   * 보상 적용. 영혼 파편은 첫 클리어에만, 완료 목록 삽입은 멱등.
   * DEFEAT는 보상 없이 그대로 반환.
   */
  complete(
    progress: PlayerProgress,
    questId: string,
    resolution: QuestResolution,
  ): { progress: PlayerProgress; summary: CompletionSummary } {
    const quest = this.content.getQuest(questId);
    if (!quest) {
      throw new InvalidQuestError(`Unknown quest: ${questId}`, { questId });
    }

    const firstClear = !progress.completedQuestIds.includes(questId);
    if (resolution === 'DEFEAT') {
      return {
        progress,
        summary: {
          questId,
          resolution,
          rewarded: false,
          firstClear: false,
          xpGained: 0,
          goldGained: 0,
          soulShardsGained: 0,
          levelsGained: 0,
          level: progress.level,
          unlockedFeature: null,
        },
      };
    }

    const soulShardsGained = quest.reward.soulShard && firstClear ? quest.reward.soulShardAmount : 0;
    const leveled = this.applyXp(progress, quest.reward.xp);

    const unlockedFeatures = [...leveled.progress.unlockedFeatures];
    let unlockedFeature: string | null = null;
    if (quest.unlockFeature && !unlockedFeatures.includes(quest.unlockFeature)) {
      unlockedFeatures.push(quest.unlockFeature);
      unlockedFeature = quest.unlockFeature;
    }

    const next: PlayerProgress = {
      ...leveled.progress,
      gold: leveled.progress.gold + quest.reward.gold,
      soulShards: leveled.progress.soulShards + soulShardsGained,
      completedQuestIds: firstClear
        ? [...leveled.progress.completedQuestIds, questId]
        : [...leveled.progress.completedQuestIds],
      unlockedFeatures,
    };

    return {
      progress: next,
      summary: {
        questId,
        resolution,
        rewarded: true,
        firstClear,
        xpGained: quest.reward.xp,
        goldGained: quest.reward.gold,
        soulShardsGained,
        levelsGained: leveled.levelsGained,
        level: next.level,
        unlockedFeature,
      },
    };
  }

  /** xp ≥ xpToNext 동안 반복: 초과분 이월, 임계치 × 성장계수(내림), 레벨당 스탯 성장 */
  applyXp(progress: PlayerProgress, xp: number): { progress: PlayerProgress; levelsGained: number } {
    const rules = this.content.getRules();
    let { level, xpToNext } = progress;
    let current = progress.xp + Math.max(0, xp);
    let levelsGained = 0;

    while (current >= xpToNext) {
      current -= xpToNext;
      level += 1;
      xpToNext = Math.floor(xpToNext * rules.xpGrowthFactor);
      levelsGained += 1;
    }

    return {
      progress: {
        ...progress,
        level,
        xp: current,
        xpToNext,
        baseStats: this.statsService.applyGrowth(progress.baseStats, rules.levelGrowth, levelsGained),
      },
      levelsGained,
    };
  }

  /** 테스트용 즉시 충전 — GAME_ALLOW_TEST_REFILL=false면 거부 */
  refillEnergyForTesting(progress: PlayerProgress, now: number): PlayerProgress {
    if (!this.config.allowTestRefill) {
      throw new ForbiddenError('Test energy refill is disabled');
    }
    return { ...progress, energy: progress.energyMax, lastEnergyTimestamp: now };
  }

  /** 영혼 파편으로 가득 충전 */
  refillEnergyWithSoulShards(progress: PlayerProgress, now: number): PlayerProgress {
    const cost = this.content.getRules().energyRefillSoulShardCost;
    const regenerated = this.regenerate(progress, now).progress;
    if (regenerated.energy >= regenerated.energyMax) {
      throw new InvalidInputError('Energy is already full');
    }
    if (regenerated.soulShards < cost) {
      throw new InsufficientSoulShardsError(cost, regenerated.soulShards);
    }
    return {
      ...regenerated,
      soulShards: regenerated.soulShards - cost,
      energy: regenerated.energyMax,
      lastEnergyTimestamp: now,
    };
  }

  availableAbilities(progress: PlayerProgress): PlayerAbilityDefinition[] {
    return this.content.getPlayerAbilities().filter((a) => a.unlockLevel <= progress.level);
  }

  questStatus(progress: PlayerProgress, questId: string): QuestStatus {
    if (progress.completedQuestIds.includes(questId)) return 'COMPLETED';
    return this.isEligible(progress, questId) ? 'UNLOCKED' : 'LOCKED';
  }

  questBoard(progress: PlayerProgress): QuestBoardChain[] {
    return this.content.getChains().map((chain) => ({
      chainId: chain.chainId,
      title: chain.title,
      description: chain.description,
      quests: chain.questIds.flatMap((questId): QuestBoardEntry[] => {
        const quest = this.content.getQuest(questId);
        if (!quest) return [];
        const enemy = quest.enemy ? this.scaleEnemy(quest.enemy.templateId, quest.enemy.level) : null;
        return [
          {
            questId,
            title: quest.title,
            description: quest.description,
            energyCost: quest.energyCost,
            kind: quest.enemy ? 'COMBAT' : 'NARRATIVE',
            status: this.questStatus(progress, questId),
            reward: quest.reward,
            enemy: enemy ? { name: enemy.name, level: enemy.level } : null,
          },
        ];
      }),
    }));
  }

  /** 레벨 L → (L-1)배 성장치 가산, 이름 앞에 "Level L" */
  scaleEnemy(templateId: string, level: number): ScaledEnemy {
    const template = this.content.getEnemy(templateId);
    if (!template) {
      throw new InvalidQuestError(`Unknown enemy template: ${templateId}`, { templateId });
    }
    const bonus = Math.max(0, level - 1);
    return {
      templateId,
      name: bonus > 0 ? `Level ${level} ${template.name}` : template.name,
      archetype: template.archetype,
      behavior: template.behavior,
      level: Math.max(1, level),
      stats: this.statsService.applyGrowth(
        template.stats,
        this.content.getRules().enemyLevelGrowth,
        bonus,
      ),
    };
  }
}
