// 적 AI — 행동 성향 + HP 비율 가중치 테이블

import { Injectable } from '@nestjs/common';
import type {
  AiBehavior,
  CombatAction,
  StatusEffectInstance,
} from '../../db/types/index.js';
import type { AbilityDefinition } from '../../content/content.types.js';
import type { RandomSource } from '../rng/rng.service.js';

export interface EnemyAiContext {
  behavior: AiBehavior;
  hp: number;
  maxHealth: number;
  enraged: boolean;
  abilities: readonly AbilityDefinition[];
  selfStatuses: readonly StatusEffectInstance[];
  opponentStatuses: readonly StatusEffectInstance[];
  /** 이 비율 미만이면 자기 강화/회복 위주 */
  lowHealthThreshold: number;
}

interface ActionWeights {
  attack: number;
  defend: number;
  special: number;
}

const WEIGHTS: Record<AiBehavior, { normal: ActionWeights; low: ActionWeights }> = {
  AGGRESSIVE: {
    normal: { attack: 0.75, defend: 0.05, special: 0.2 },
    low: { attack: 0.5, defend: 0.15, special: 0.35 },
  },
  BALANCED: {
    normal: { attack: 0.6, defend: 0.1, special: 0.3 },
    low: { attack: 0.35, defend: 0.25, special: 0.4 },
  },
  DEFENSIVE: {
    normal: { attack: 0.5, defend: 0.25, special: 0.25 },
    low: { attack: 0.25, defend: 0.4, special: 0.35 },
  },
};

/** 피해 없이 자신에게만 거는 어빌리티 (버프/회복) */
export function isSelfTargeted(ability: AbilityDefinition): boolean {
  return (
    !ability.dealsDamage &&
    ability.effects.length > 0 &&
    ability.effects.every((e) => e.target === 'SELF')
  );
}

@Injectable()
export class EnemyAiService {
  /**
   * 행동 불가(FROZEN/STUNNED) 상태에서는 호출하지 않는다.
   * ENRAGED → 무조건 ATTACK (난수 미소비)
   */
  chooseAction(ctx: EnemyAiContext, random: RandomSource): CombatAction {
    if (ctx.enraged) {
      return { type: 'ATTACK' };
    }

    const low = ctx.hp / Math.max(1, ctx.maxHealth) < ctx.lowHealthThreshold;
    const pool = this.specialPool(ctx, low);
    const weights = WEIGHTS[ctx.behavior][low ? 'low' : 'normal'];

    // 쓸 만한 특수기가 없으면 그 몫은 공격으로
    const attack = pool.length > 0 ? weights.attack : weights.attack + weights.special;
    const special = pool.length > 0 ? weights.special : 0;

    const roll = random.next() * (attack + weights.defend + special);
    if (roll < attack) {
      return { type: 'ATTACK' };
    }
    if (roll < attack + weights.defend) {
      return { type: 'DEFEND' };
    }
    const picked = pool[random.range(0, pool.length - 1)];
    return { type: 'SPECIAL', abilityId: picked.abilityId };
  }

  /** HP 낮으면 자기 대상, 아니면 상대 대상. 효과가 모두 이미 걸려 있으면 제외 */
  specialPool(ctx: EnemyAiContext, low: boolean): AbilityDefinition[] {
    return ctx.abilities.filter((ability) => {
      if (isSelfTargeted(ability) !== low) return false;
      if (ability.dealsDamage) return true;
      return !ability.effects.every((effect) => {
        const statuses = effect.target === 'SELF' ? ctx.selfStatuses : ctx.opponentStatuses;
        return statuses.some((s) => s.kind === effect.kind);
      });
    });
  }
}
