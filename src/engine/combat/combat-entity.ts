import type {
  CombatantState,
  StatusEffectInstance,
  StatusEffectKind,
} from '../../db/types/index.js';
import type { StatusService } from '../status/status.service.js';
import type { StatsService, StatsSnapshot } from '../stats/stats.service.js';

export type StatusApplyResult = 'ADDED' | 'REPLACED' | 'KEPT';

export interface StatusTick {
  kind: StatusEffectKind;
  hpDelta: number;
  hpAfter: number;
}

export interface TurnStartResult {
  ticks: StatusTick[];
  canAct: boolean;
  defeated: boolean;
}

export interface TurnEndResult {
  ticks: StatusTick[];
  expired: StatusEffectKind[];
  defeated: boolean;
}

/**
 * 전투 참가자 래퍼. 인카운터 상태(JSON)의 combatant를 직접 변경한다.
 * 인카운터 1회 동안만 유효하며 인카운터 간 공유되지 않는다.
 */
export class CombatEntity {
  constructor(
    readonly state: CombatantState,
    private readonly statusService: StatusService,
    private readonly statsService: StatsService,
  ) {}

  get name(): string {
    return this.state.name;
  }

  get hp(): number {
    return this.state.hp;
  }

  get maxHealth(): number {
    return this.state.stats.maxHealth;
  }

  get statuses(): readonly StatusEffectInstance[] {
    return this.state.statuses;
  }

  isDefeated(): boolean {
    return this.state.hp <= 0;
  }

  canAct(): boolean {
    return !this.statusService.preventsAction(this.state.statuses);
  }

  isEnraged(): boolean {
    return this.statusService.isEnraged(this.state.statuses);
  }

  effectiveStats(): StatsSnapshot {
    return this.statsService.buildSnapshot(
      this.state.stats,
      this.statusService.getModifiers(this.state.statuses),
    );
  }

  effectiveAttack(): number {
    return this.effectiveStats().attack;
  }

  effectiveDefense(): number {
    return this.effectiveStats().defense;
  }

  /** 동일 kind 재적용: 새 duration이 더 길 때만 교체 (자리는 유지) */
  addStatusEffect(instance: StatusEffectInstance): StatusApplyResult {
    const incoming = { ...instance };
    const idx = this.state.statuses.findIndex((s) => s.kind === incoming.kind);
    if (idx < 0) {
      this.state.statuses.push(incoming);
      return 'ADDED';
    }
    if (incoming.duration > this.state.statuses[idx].duration) {
      this.state.statuses[idx] = incoming;
      return 'REPLACED';
    }
    return 'KEPT';
  }

  hasStatus(kind: StatusEffectKind): boolean {
    return this.state.statuses.some((s) => s.kind === kind);
  }

  /** 실제로 깎인 HP 반환 */
  takeDamage(amount: number): number {
    const before = this.state.hp;
    this.state.hp = Math.max(0, before - Math.max(0, amount));
    return before - this.state.hp;
  }

  /** 실제로 회복된 HP 반환 */
  heal(amount: number): number {
    const before = this.state.hp;
    this.state.hp = Math.min(this.maxHealth, before + Math.max(0, amount));
    return this.state.hp - before;
  }

  /** 턴 시작 틱 (BLEEDING 등) → 행동 가능 여부 재확인 */
  processTurnStart(): TurnStartResult {
    const ticks = this.runTicks('TURN_START');
    return { ticks, canAct: this.canAct(), defeated: this.isDefeated() };
  }

  /** 턴 종료 틱 (화상/독/재생) → 전체 duration 감소 + 만료 제거 */
  processTurnEnd(): TurnEndResult {
    const ticks = this.runTicks('TURN_END');

    const expired: StatusEffectKind[] = [];
    const remaining: StatusEffectInstance[] = [];
    for (const status of this.state.statuses) {
      if (this.statusService.tick(status)) {
        expired.push(status.kind);
      } else {
        remaining.push(status);
      }
    }
    this.state.statuses = remaining;

    return { ticks, expired, defeated: this.isDefeated() };
  }

  statusDisplay(): string {
    return this.statusService.describe(this.state.statuses);
  }

  private runTicks(phase: 'TURN_START' | 'TURN_END'): StatusTick[] {
    const ticks: StatusTick[] = [];
    for (const status of this.state.statuses) {
      if (this.isDefeated()) break;
      if (!this.statusService.isPhase(status, phase)) continue;
      const hpDelta = this.statusService.apply(this.state, status);
      if (hpDelta !== 0) {
        ticks.push({ kind: status.kind, hpDelta, hpAfter: this.state.hp });
      }
    }
    return ticks;
  }
}
