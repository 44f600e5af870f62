// 피해 계산 — 결정적 (RNG 미사용)

import { Injectable } from '@nestjs/common';
import type { StatsSnapshot } from '../stats/stats.service.js';

export interface DamageResult {
  damage: number;
  baseDamage: number;
  enraged: boolean;
  defended: boolean;
  shielded: number;
}

@Injectable()
export class DamageService {
  /**
   * 적용 순서 고정:
   * base = max(1, ATK - floor(DEF / 2))
   * → 분노 배율 (damagePercent)
   * → 방어 태세 시 절반
   * → 보호막 고정 감소
   * → 최소 1
   */
  computeDamage(
    attacker: StatsSnapshot,
    defender: StatsSnapshot,
    defending: boolean,
  ): DamageResult {
    const baseDamage = Math.max(1, attacker.attack - Math.floor(defender.defense / 2));

    let damage = Math.floor((baseDamage * attacker.damagePercent) / 100);

    if (defending) {
      damage = Math.floor(damage / 2);
    }

    damage -= defender.incomingReduction;

    return {
      damage: Math.max(1, damage),
      baseDamage,
      enraged: attacker.damagePercent > 100,
      defended: defending,
      shielded: defender.incomingReduction,
    };
  }
}
