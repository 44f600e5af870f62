// 상태이상 레지스트리 — kind별 행동 테이블 1개 + 해석기

import { Injectable } from '@nestjs/common';
import type {
  CombatantState,
  StatusEffectInstance,
  StatusEffectKind,
  TickPhase,
} from '../../db/types/index.js';
import type { ModifierStat, StatModifier } from '../stats/stats.service.js';

export interface StatusDefinition {
  kind: StatusEffectKind;
  label: string;
  icon: string;
  phase: TickPhase;
  hpEffect: 'DAMAGE' | 'HEAL' | 'NONE';
  preventsAction: boolean;
  /** modifier 값 = power * scale */
  modifier?: { stat: ModifierStat; scale: number };
  baseDuration: number;
  basePower: number;
}

const STATUS_REGISTRY: Record<StatusEffectKind, StatusDefinition> = {
  BURNED: {
    kind: 'BURNED',
    label: 'Burned',
    icon: '🔥',
    phase: 'TURN_END',
    hpEffect: 'DAMAGE',
    preventsAction: false,
    baseDuration: 3,
    basePower: 5,
  },
  POISONED: {
    kind: 'POISONED',
    label: 'Poisoned',
    icon: '☠️',
    phase: 'TURN_END',
    hpEffect: 'DAMAGE',
    preventsAction: false,
    baseDuration: 5,
    basePower: 3,
  },
  REGENERATING: {
    kind: 'REGENERATING',
    label: 'Regenerating',
    icon: '💚',
    phase: 'TURN_END',
    hpEffect: 'HEAL',
    preventsAction: false,
    baseDuration: 3,
    basePower: 8,
  },
  BLEEDING: {
    kind: 'BLEEDING',
    label: 'Bleeding',
    icon: '🩸',
    phase: 'TURN_START',
    hpEffect: 'DAMAGE',
    preventsAction: false,
    baseDuration: 4,
    basePower: 3,
  },
  FROZEN: {
    kind: 'FROZEN',
    label: 'Frozen',
    icon: '❄️',
    phase: 'TURN_START',
    hpEffect: 'NONE',
    preventsAction: true,
    baseDuration: 2,
    basePower: 1,
  },
  STUNNED: {
    kind: 'STUNNED',
    label: 'Stunned',
    icon: '😵',
    phase: 'TURN_START',
    hpEffect: 'NONE',
    preventsAction: true,
    baseDuration: 1,
    basePower: 1,
  },
  STRENGTHENED: {
    kind: 'STRENGTHENED',
    label: 'Strengthened',
    icon: '💪',
    phase: 'PASSIVE',
    hpEffect: 'NONE',
    preventsAction: false,
    modifier: { stat: 'attack', scale: 1 },
    baseDuration: 4,
    basePower: 3,
  },
  WEAKENED: {
    kind: 'WEAKENED',
    label: 'Weakened',
    icon: '🔻',
    phase: 'PASSIVE',
    hpEffect: 'NONE',
    preventsAction: false,
    modifier: { stat: 'attack', scale: -1 },
    baseDuration: 3,
    basePower: 2,
  },
  ENRAGED: {
    kind: 'ENRAGED',
    label: 'Enraged',
    icon: '🧠',
    phase: 'PASSIVE',
    hpEffect: 'NONE',
    preventsAction: false,
    // power 2 → +20%, power 3 → +30%
    modifier: { stat: 'damagePercent', scale: 10 },
    baseDuration: 3,
    basePower: 2,
  },
  SHIELDED: {
    kind: 'SHIELDED',
    label: 'Shielded',
    icon: '🛡️',
    phase: 'PASSIVE',
    hpEffect: 'NONE',
    preventsAction: false,
    modifier: { stat: 'incomingReduction', scale: 1 },
    baseDuration: 2,
    basePower: 5,
  },
};

@Injectable()
export class StatusService {
  getDefinition(kind: StatusEffectKind): StatusDefinition {
    return STATUS_REGISTRY[kind];
  }

  /** 레지스트리 기본값으로 인스턴스 생성 */
  createInstance(
    kind: StatusEffectKind,
    overrides: { duration?: number; power?: number } = {},
  ): StatusEffectInstance {
    const def = STATUS_REGISTRY[kind];
    return {
      kind,
      duration: Math.max(1, overrides.duration ?? def.baseDuration),
      power: Math.max(0, overrides.power ?? def.basePower),
    };
  }

  /**
   * 틱 효과 적용 — HP 변화량(부호 포함)을 반환.
   * modifier/CC 계열은 데미지 계산 시 읽기만 하므로 no-op (0).
   */
  apply(target: CombatantState, instance: StatusEffectInstance): number {
    const def = STATUS_REGISTRY[instance.kind];
    const before = target.hp;
    if (def.hpEffect === 'DAMAGE') {
      target.hp = Math.max(0, target.hp - instance.power);
    } else if (def.hpEffect === 'HEAL') {
      target.hp = Math.min(target.stats.maxHealth, target.hp + instance.power);
    }
    return target.hp - before;
  }

  /** duration 1 감소 — 만료(0 이하)되면 true */
  tick(instance: StatusEffectInstance): boolean {
    instance.duration -= 1;
    return instance.duration <= 0;
  }

  isPhase(instance: StatusEffectInstance, phase: TickPhase): boolean {
    return STATUS_REGISTRY[instance.kind].phase === phase;
  }

  /** 현재 상태이상에서 스탯 modifier 목록 추출 */
  getModifiers(statuses: StatusEffectInstance[]): StatModifier[] {
    const mods: StatModifier[] = [];
    for (const status of statuses) {
      const modifier = STATUS_REGISTRY[status.kind].modifier;
      if (!modifier) continue;
      mods.push({
        stat: modifier.stat,
        value: status.power * modifier.scale,
        source: status.kind,
      });
    }
    return mods;
  }

  /** FROZEN / STUNNED */
  preventsAction(statuses: StatusEffectInstance[]): boolean {
    return statuses.some((s) => STATUS_REGISTRY[s.kind].preventsAction);
  }

  isEnraged(statuses: StatusEffectInstance[]): boolean {
    return statuses.some((s) => s.kind === 'ENRAGED');
  }

  /** UI 표시용 — "🔥(3) ❄️(1)" */
  describe(statuses: StatusEffectInstance[]): string {
    return statuses
      .map((s) => `${STATUS_REGISTRY[s.kind].icon}(${s.duration})`)
      .join(' ');
  }
}
