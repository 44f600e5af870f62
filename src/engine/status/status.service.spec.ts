import { StatusService } from './status.service.js';
import {
  STATUS_EFFECT_KIND,
  type CombatantState,
  type StatusEffectInstance,
} from '../../db/types/index.js';

function makeTarget(hp: number, maxHealth = 30): CombatantState {
  return {
    id: 'player',
    name: 'Demonling',
    stats: { maxHealth, attack: 5, defense: 3, agility: 4, magic: 2 },
    hp,
    statuses: [],
    defending: false,
  };
}

describe('StatusService', () => {
  let service: StatusService;

  beforeEach(() => {
    service = new StatusService();
  });

  describe('레지스트리', () => {
    it('10종 모두 정의되어 있다', () => {
      for (const kind of STATUS_EFFECT_KIND) {
        expect(service.getDefinition(kind).kind).toBe(kind);
      }
    });

    it('틱 시점: BLEEDING은 턴 시작, BURNED/POISONED/REGENERATING은 턴 종료', () => {
      expect(service.getDefinition('BLEEDING').phase).toBe('TURN_START');
      expect(service.getDefinition('BURNED').phase).toBe('TURN_END');
      expect(service.getDefinition('POISONED').phase).toBe('TURN_END');
      expect(service.getDefinition('REGENERATING').phase).toBe('TURN_END');
      expect(service.getDefinition('SHIELDED').phase).toBe('PASSIVE');
    });

    it('createInstance — 기본값과 override', () => {
      expect(service.createInstance('BURNED')).toEqual({
        kind: 'BURNED',
        duration: 3,
        power: 5,
      });
      expect(service.createInstance('BURNED', { duration: 2, power: 6 })).toEqual({
        kind: 'BURNED',
        duration: 2,
        power: 6,
      });
    });
  });

  describe('apply', () => {
    it('DAMAGE 계열은 power만큼 HP 감소', () => {
      const target = makeTarget(20);
      const delta = service.apply(target, { kind: 'POISONED', duration: 5, power: 3 });
      expect(delta).toBe(-3);
      expect(target.hp).toBe(17);
    });

    it('HP는 0 아래로 내려가지 않는다', () => {
      const target = makeTarget(2);
      const delta = service.apply(target, { kind: 'BURNED', duration: 3, power: 5 });
      expect(delta).toBe(-2);
      expect(target.hp).toBe(0);
    });

    it('HEAL은 maxHealth에서 clamp', () => {
      const target = makeTarget(26, 30);
      const delta = service.apply(target, { kind: 'REGENERATING', duration: 3, power: 8 });
      expect(delta).toBe(4);
      expect(target.hp).toBe(30);
    });

    it('modifier 계열은 no-op', () => {
      const target = makeTarget(20);
      expect(service.apply(target, { kind: 'STRENGTHENED', duration: 4, power: 3 })).toBe(0);
      expect(service.apply(target, { kind: 'FROZEN', duration: 2, power: 1 })).toBe(0);
      expect(target.hp).toBe(20);
    });
  });

  describe('tick', () => {
    it('duration 1 감소, 0 도달 시 만료', () => {
      const inst: StatusEffectInstance = { kind: 'STUNNED', duration: 2, power: 1 };
      expect(service.tick(inst)).toBe(false);
      expect(inst.duration).toBe(1);
      expect(service.tick(inst)).toBe(true);
      expect(inst.duration).toBe(0);
    });
  });

  describe('getModifiers', () => {
    it('STRENGTHENED +power, WEAKENED -power (attack)', () => {
      const mods = service.getModifiers([
        { kind: 'STRENGTHENED', duration: 4, power: 3 },
        { kind: 'WEAKENED', duration: 3, power: 2 },
      ]);
      expect(mods).toEqual([
        { stat: 'attack', value: 3, source: 'STRENGTHENED' },
        { stat: 'attack', value: -2, source: 'WEAKENED' },
      ]);
    });

    it('ENRAGED power 3 → damagePercent +30, SHIELDED → incomingReduction', () => {
      const mods = service.getModifiers([
        { kind: 'ENRAGED', duration: 2, power: 3 },
        { kind: 'SHIELDED', duration: 3, power: 6 },
      ]);
      expect(mods).toEqual([
        { stat: 'damagePercent', value: 30, source: 'ENRAGED' },
        { stat: 'incomingReduction', value: 6, source: 'SHIELDED' },
      ]);
    });

    it('DOT/CC는 modifier 없음', () => {
      const mods = service.getModifiers([
        { kind: 'BURNED', duration: 3, power: 5 },
        { kind: 'FROZEN', duration: 2, power: 1 },
      ]);
      expect(mods).toHaveLength(0);
    });
  });

  describe('행동 제약', () => {
    it('FROZEN / STUNNED → 행동 불가', () => {
      expect(service.preventsAction([{ kind: 'FROZEN', duration: 1, power: 1 }])).toBe(true);
      expect(service.preventsAction([{ kind: 'STUNNED', duration: 1, power: 1 }])).toBe(true);
      expect(service.preventsAction([{ kind: 'BLEEDING', duration: 1, power: 3 }])).toBe(false);
    });

    it('isEnraged', () => {
      expect(service.isEnraged([{ kind: 'ENRAGED', duration: 1, power: 2 }])).toBe(true);
      expect(service.isEnraged([])).toBe(false);
    });
  });

  it('describe — 아이콘(남은 턴), 삽입 순서', () => {
    expect(
      service.describe([
        { kind: 'BURNED', duration: 3, power: 5 },
        { kind: 'FROZEN', duration: 1, power: 1 },
      ]),
    ).toBe('🔥(3) ❄️(1)');
    expect(service.describe([])).toBe('');
  });
});
