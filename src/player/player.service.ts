// GET /v1/player, 에너지 충전

import { isDeepStrictEqual } from 'util';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { GAME_STORE, type GameStore } from '../db/game-store.js';
import type { PlayerProgress } from '../db/types/index.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import type { AbilityEffect } from '../content/content.types.js';
import { EnergyService } from '../engine/progression/energy.service.js';
import { ProgressionService } from '../engine/progression/progression.service.js';

export interface PlayerAbilityView {
  abilityId: string;
  name: string;
  dealsDamage: boolean;
  effects: AbilityEffect[];
  unlockLevel: number;
}

export interface PlayerView {
  progress: PlayerProgress;
  energy: {
    current: number;
    max: number;
    msUntilNext: number | null;
  };
  abilities: PlayerAbilityView[];
}

@Injectable()
export class PlayerService {
  private readonly logger = new Logger(PlayerService.name);

  constructor(
    @Inject(GAME_STORE) private readonly store: GameStore,
    private readonly progression: ProgressionService,
    private readonly energyService: EnergyService,
    private readonly content: ContentLoaderService,
  ) {}

  /** 저장 레코드 로드 + 정규화 (레코드가 없으면 기본값) */
  async loadProgress(userId: string, now: number): Promise<PlayerProgress> {
    const raw = await this.store.loadProgress(userId);
    return this.progression.normalize(raw, now);
  }

  async getPlayer(userId: string): Promise<PlayerView> {
    const now = Date.now();
    const raw = await this.store.loadProgress(userId);
    const normalized = this.progression.normalize(raw, now);
    const { progress, gained } = this.progression.regenerate(normalized, now);

    // 신규 플레이어, 정규화 보정, 에너지 재생만 저장 (키 순서 무관 비교).
    // 최대치에서 타임스탬프만 당겨진 경우는 저장하지 않는다
    const repaired = raw !== null && !isDeepStrictEqual(raw, normalized);
    if (raw === null || repaired || gained > 0) {
      await this.store.commit(userId, { progress });
      if (raw === null) {
        this.logger.log(`New player progress created: user=${userId}`);
      } else if (repaired) {
        this.logger.warn(`Player progress repaired on load: user=${userId}`);
      } else {
        this.logger.debug(`Energy regenerated: user=${userId} +${gained}`);
      }
    }

    return this.toView(progress, now);
  }

  async refillWithSoulShards(userId: string): Promise<PlayerView> {
    const now = Date.now();
    const current = await this.loadProgress(userId, now);
    const progress = this.progression.refillEnergyWithSoulShards(current, now);
    await this.store.commit(userId, { progress });
    this.logger.log(
      `Energy refilled with soul shards: user=${userId} shards=${progress.soulShards}`,
    );
    return this.toView(progress, now);
  }

  async refillForTesting(userId: string): Promise<PlayerView> {
    const now = Date.now();
    const current = await this.loadProgress(userId, now);
    const progress = this.progression.refillEnergyForTesting(current, now);
    await this.store.commit(userId, { progress });
    this.logger.warn(`Test energy refill: user=${userId}`);
    return this.toView(progress, now);
  }

  toView(progress: PlayerProgress, now: number): PlayerView {
    return {
      progress,
      energy: {
        current: progress.energy,
        max: progress.energyMax,
        msUntilNext: this.energyService.msUntilNext(
          progress,
          now,
          this.content.getRules().energyRegenIntervalMs,
        ),
      },
      abilities: this.progression.availableAbilities(progress).map((a) => ({
        abilityId: a.abilityId,
        name: a.name,
        dealsDamage: a.dealsDamage,
        effects: a.effects.map((e) => ({ ...e })),
        unlockLevel: a.unlockLevel,
      })),
    };
  }
}
