// 스탯 파이프라인 — 기본 스탯 + 상태이상 modifier → 유효 스탯

import { Injectable } from '@nestjs/common';
import type { BaseStats } from '../../db/types/index.js';

/** 매 행동 시점에 계산되는 유효 스탯 */
export interface StatsSnapshot {
  maxHealth: number;
  attack: number; // 최소 1
  defense: number; // 최소 0
  agility: number;
  magic: number;
  damagePercent: number; // 가하는 피해 배율 (정수, 100 = 1.0x)
  incomingReduction: number; // 받는 피해 고정 감소량
}

export type ModifierStat = keyof StatsSnapshot;

export interface StatModifier {
  stat: ModifierStat;
  value: number; // 가산 (FLAT)
  source?: string;
}

@Injectable()
export class StatsService {
  /** 기본 스탯 + modifier 합산 → StatsSnapshot */
  buildSnapshot(base: BaseStats, modifiers: StatModifier[]): StatsSnapshot {
    const snap: StatsSnapshot = {
      maxHealth: base.maxHealth,
      attack: base.attack,
      defense: base.defense,
      agility: base.agility,
      magic: base.magic,
      damagePercent: 100,
      incomingReduction: 0,
    };

    for (const mod of modifiers) {
      snap[mod.stat] += mod.value;
    }

    // clamp
    snap.maxHealth = Math.max(1, Math.round(snap.maxHealth));
    snap.attack = Math.max(1, Math.round(snap.attack));
    snap.defense = Math.max(0, Math.round(snap.defense));
    snap.agility = Math.max(0, Math.round(snap.agility));
    snap.magic = Math.max(0, Math.round(snap.magic));
    snap.damagePercent = Math.max(0, Math.round(snap.damagePercent));
    snap.incomingReduction = Math.max(0, Math.round(snap.incomingReduction));

    return snap;
  }

  /** 레벨 상승분(levels)만큼 성장치 가산 */
  applyGrowth(base: BaseStats, growth: BaseStats, levels: number): BaseStats {
    return {
      maxHealth: base.maxHealth + growth.maxHealth * levels,
      attack: base.attack + growth.attack * levels,
      defense: base.defense + growth.defense * levels,
      agility: base.agility + growth.agility * levels,
      magic: base.magic + growth.magic * levels,
    };
  }
}
