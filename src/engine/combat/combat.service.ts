// 턴제 전투 상태 머신 — 플레이어 턴 → 적 턴, 매 HP 변화마다 종료 판정

import { Injectable } from '@nestjs/common';
import type {
  AiBehavior,
  Archetype,
  BaseStats,
  CombatAction,
  CombatEvent,
  CombatEventKind,
  CombatSide,
  EncounterStateV1,
} from '../../db/types/index.js';
import type { AbilityDefinition } from '../../content/content.types.js';
import {
  AbilityUnavailableError,
  EncounterConflictError,
  InternalError,
} from '../../common/errors/game-errors.js';
import { RngService, type Rng } from '../rng/rng.service.js';
import { StatsService } from '../stats/stats.service.js';
import { StatusService } from '../status/status.service.js';
import { DamageService } from './damage.service.js';
import { EnemyAiService } from './enemy-ai.service.js';
import { CombatEntity, type StatusTick } from './combat-entity.js';

export type CombatOutcome = 'ONGOING' | 'VICTORY' | 'DEFEAT';

export interface EncounterSetup {
  encounterId: string;
  questId: string;
  seed: string;
  player: { name: string; stats: BaseStats };
  enemy: {
    templateId: string;
    name: string;
    archetype: Archetype;
    behavior: AiBehavior;
    stats: BaseStats;
    abilityIds: string[];
  };
  playerAbilityIds: string[];
}

/** 라운드 해석에 필요한 컨텐츠 값 */
export interface CombatRules {
  abilities: ReadonlyMap<string, Readonly<AbilityDefinition>>;
  lowHealthThreshold: number;
}

export interface RoundResult {
  nextState: EncounterStateV1;
  events: CombatEvent[];
  outcome: CombatOutcome;
  /** 플레이어가 FROZEN/STUNNED로 행동하지 못함 (에러 아님) */
  actionUnavailable: boolean;
}

/**
 * 종료 판정. 양쪽 모두 쓰러지면 행동 중인 쪽이 패배:
 * 플레이어 턴 → DEFEAT, 적 턴 → VICTORY
 */
export function decideOutcome(
  playerHp: number,
  enemyHp: number,
  actingSide: CombatSide,
): CombatOutcome {
  const playerDown = playerHp <= 0;
  const enemyDown = enemyHp <= 0;
  if (playerDown && enemyDown) {
    return actingSide === 'PLAYER' ? 'DEFEAT' : 'VICTORY';
  }
  if (playerDown) return 'DEFEAT';
  if (enemyDown) return 'VICTORY';
  return 'ONGOING';
}

interface RoundContext {
  state: EncounterStateV1;
  player: CombatEntity;
  enemy: CombatEntity;
  rng: Rng;
  rules: CombatRules;
  events: CombatEvent[];
}

@Injectable()
export class CombatService {
  constructor(
    private readonly rngService: RngService,
    private readonly statsService: StatsService,
    private readonly statusService: StatusService,
    private readonly damageService: DamageService,
    private readonly enemyAiService: EnemyAiService,
  ) {}

  createEncounter(setup: EncounterSetup): EncounterStateV1 {
    const state: EncounterStateV1 = {
      version: 'encounter_state_v1',
      encounterId: setup.encounterId,
      questId: setup.questId,
      phase: 'AWAITING_PLAYER_ACTION',
      round: 1,
      rng: { seed: setup.seed, cursor: 0 },
      player: {
        id: 'player',
        name: setup.player.name,
        stats: { ...setup.player.stats },
        hp: setup.player.stats.maxHealth,
        statuses: [],
        defending: false,
      },
      enemy: {
        id: 'enemy',
        templateId: setup.enemy.templateId,
        name: setup.enemy.name,
        archetype: setup.enemy.archetype,
        behavior: setup.enemy.behavior,
        stats: { ...setup.enemy.stats },
        hp: setup.enemy.stats.maxHealth,
        statuses: [],
        defending: false,
        abilityIds: [...setup.enemy.abilityIds],
      },
      playerAbilityIds: [...setup.playerAbilityIds],
      log: [],
    };
    state.log.push(`Battle started: ${state.player.name} vs ${state.enemy.name}!`);
    return state;
  }

  /**
   * 플레이어 행동 1회 + (종료되지 않았다면) 적 턴 1회.
   * 입력 state는 변경하지 않으며, 검증 실패 시 아무것도 바뀌지 않는다.
   */
  resolvePlayerAction(
    state: EncounterStateV1,
    action: CombatAction,
    rules: CombatRules,
  ): RoundResult {
    if (state.phase === 'VICTORY' || state.phase === 'DEFEAT') {
      throw new EncounterConflictError('ENCOUNTER_ENDED', 'Encounter has already ended', {
        encounterId: state.encounterId,
        phase: state.phase,
      });
    }
    if (state.phase !== 'AWAITING_PLAYER_ACTION') {
      throw new InternalError(`Encounter in unexpected phase: ${state.phase}`);
    }
    if (action.type === 'SPECIAL') {
      if (!state.playerAbilityIds.includes(action.abilityId) || !rules.abilities.has(action.abilityId)) {
        throw new AbilityUnavailableError(action.abilityId);
      }
    }

    // deep clone encounter state
    const next: EncounterStateV1 = JSON.parse(JSON.stringify(state));
    const ctx: RoundContext = {
      state: next,
      player: this.wrap(next.player),
      enemy: this.wrap(next.enemy),
      rng: this.rngService.restore(next.rng),
      rules,
      events: [],
    };

    next.phase = 'RESOLVING_PLAYER_ACTION';
    const playerTurn = this.runTurn(ctx, 'PLAYER', () => action);

    let outcome = playerTurn.outcome;
    if (outcome === 'ONGOING') {
      next.phase = 'RESOLVING_ENEMY_ACTION';
      outcome = this.runTurn(ctx, 'ENEMY', () => this.chooseEnemyAction(ctx)).outcome;
    }

    if (outcome === 'ONGOING') {
      next.phase = 'AWAITING_PLAYER_ACTION';
      next.round += 1;
    } else {
      next.phase = outcome;
      this.finish(ctx, outcome);
    }

    next.rng = ctx.rng.getState();

    return {
      nextState: next,
      events: ctx.events,
      outcome,
      actionUnavailable: playerTurn.skipped,
    };
  }

  private wrap(state: EncounterStateV1['player']): CombatEntity {
    return new CombatEntity(state, this.statusService, this.statsService);
  }

  private chooseEnemyAction(ctx: RoundContext): CombatAction {
    const enemy = ctx.state.enemy;
    const abilities: AbilityDefinition[] = [];
    for (const id of enemy.abilityIds) {
      const ability = ctx.rules.abilities.get(id);
      if (ability) abilities.push(ability);
    }
    return this.enemyAiService.chooseAction(
      {
        behavior: enemy.behavior,
        hp: enemy.hp,
        maxHealth: enemy.stats.maxHealth,
        enraged: ctx.enemy.isEnraged(),
        abilities,
        selfStatuses: enemy.statuses,
        opponentStatuses: ctx.state.player.statuses,
        lowHealthThreshold: ctx.rules.lowHealthThreshold,
      },
      ctx.rng,
    );
  }

  /** 한쪽 턴: 시작 틱 → 행동 → 종료 틱 */
  private runTurn(
    ctx: RoundContext,
    side: CombatSide,
    chooseAction: () => CombatAction,
  ): { outcome: CombatOutcome; skipped: boolean } {
    const actor = side === 'PLAYER' ? ctx.player : ctx.enemy;
    const target = side === 'PLAYER' ? ctx.enemy : ctx.player;
    const check = () => decideOutcome(ctx.player.hp, ctx.enemy.hp, side);

    // 방어 태세는 상대 턴 동안만 유효
    actor.state.defending = false;

    const start = actor.processTurnStart();
    this.emitTicks(ctx, actor, start.ticks);
    let outcome = check();
    if (outcome !== 'ONGOING') return { outcome, skipped: false };

    const skipped = !start.canAct;
    if (skipped) {
      this.emit(ctx, 'SKIP', `${actor.name} cannot act!`, [side], {
        statuses: actor.statusDisplay(),
      });
    } else {
      let action = chooseAction();
      if (action.type !== 'ATTACK' && actor.isEnraged()) {
        this.emit(ctx, 'STATUS', `${actor.name} is enraged and can only attack!`, [side, 'ENRAGED']);
        action = { type: 'ATTACK' };
      }
      outcome = this.resolveAction(ctx, side, actor, target, action);
      if (outcome !== 'ONGOING') return { outcome, skipped };
    }

    const end = actor.processTurnEnd();
    this.emitTicks(ctx, actor, end.ticks);
    for (const kind of end.expired) {
      const label = this.statusService.getDefinition(kind).label.toLowerCase();
      this.emit(ctx, 'STATUS', `${actor.name} is no longer ${label}.`, [side, kind, 'EXPIRED']);
    }
    outcome = check();
    return { outcome, skipped };
  }

  private resolveAction(
    ctx: RoundContext,
    side: CombatSide,
    actor: CombatEntity,
    target: CombatEntity,
    action: CombatAction,
  ): CombatOutcome {
    switch (action.type) {
      case 'ATTACK':
        this.performAttack(ctx, side, actor, target);
        return decideOutcome(ctx.player.hp, ctx.enemy.hp, side);
      case 'DEFEND':
        actor.state.defending = true;
        this.emit(ctx, 'BATTLE', `${actor.name} braces for the next attack.`, [side, 'DEFEND']);
        return 'ONGOING';
      case 'SPECIAL':
        return this.performSpecial(ctx, side, actor, target, action.abilityId);
    }
  }

  private performAttack(
    ctx: RoundContext,
    side: CombatSide,
    actor: CombatEntity,
    target: CombatEntity,
  ): void {
    const result = this.damageService.computeDamage(
      actor.effectiveStats(),
      target.effectiveStats(),
      target.state.defending,
    );
    const dealt = target.takeDamage(result.damage);
    // 방어 태세는 한 번의 공격에 소모
    target.state.defending = false;

    const notes: string[] = [];
    if (result.defended) notes.push('defended');
    if (result.shielded > 0) notes.push('shielded');
    const suffix = notes.length > 0 ? ` (${notes.join(', ')})` : '';

    this.emit(
      ctx,
      'DAMAGE',
      `${actor.name} attacks ${target.name} for ${dealt} damage!${suffix}`,
      [side, 'ATTACK'],
      { amount: dealt, baseDamage: result.baseDamage, hpAfter: target.hp },
    );
  }

  private performSpecial(
    ctx: RoundContext,
    side: CombatSide,
    actor: CombatEntity,
    target: CombatEntity,
    abilityId: string,
  ): CombatOutcome {
    const ability = ctx.rules.abilities.get(abilityId);
    if (!ability) {
      throw new InternalError(`Unknown ability: ${abilityId}`);
    }
    this.emit(ctx, 'BATTLE', `${actor.name} ${ability.verb}!`, [side, 'SPECIAL', ability.abilityId]);

    if (ability.dealsDamage) {
      this.performAttack(ctx, side, actor, target);
      const outcome = decideOutcome(ctx.player.hp, ctx.enemy.hp, side);
      if (outcome !== 'ONGOING') return outcome;
    }

    for (const effect of ability.effects) {
      const recipient = effect.target === 'SELF' ? actor : target;
      const instance = this.statusService.createInstance(effect.kind, {
        duration: effect.duration,
        power: effect.power,
      });
      const applied = recipient.addStatusEffect(instance);
      const label = this.statusService.getDefinition(effect.kind).label.toLowerCase();
      const text =
        applied === 'KEPT'
          ? `${recipient.name} is already ${label}.`
          : `${recipient.name} is ${label}! (${instance.duration} turns)`;
      this.emit(ctx, 'STATUS', text, [side, effect.kind, applied], {
        target: recipient.state.id,
        duration: instance.duration,
        power: instance.power,
      });
    }
    return 'ONGOING';
  }

  private emitTicks(ctx: RoundContext, entity: CombatEntity, ticks: StatusTick[]): void {
    for (const tick of ticks) {
      const label = this.statusService.getDefinition(tick.kind).label;
      if (tick.hpDelta < 0) {
        this.emit(
          ctx,
          'DAMAGE',
          `${entity.name} suffers ${-tick.hpDelta} damage (${label}).`,
          [entity.state.id, tick.kind],
          { amount: -tick.hpDelta, hpAfter: tick.hpAfter },
        );
      } else {
        this.emit(
          ctx,
          'HEAL',
          `${entity.name} recovers ${tick.hpDelta} HP (${label}).`,
          [entity.state.id, tick.kind],
          { amount: tick.hpDelta, hpAfter: tick.hpAfter },
        );
      }
    }
  }

  private finish(ctx: RoundContext, outcome: 'VICTORY' | 'DEFEAT'): void {
    const text =
      outcome === 'VICTORY'
        ? `Victory! ${ctx.enemy.name} is defeated!`
        : `Defeat! ${ctx.player.name} has fallen...`;
    this.emit(ctx, 'END', text, [outcome]);
  }

  private emit(
    ctx: RoundContext,
    kind: CombatEventKind,
    text: string,
    tags: string[],
    data?: Record<string, unknown>,
  ): void {
    ctx.state.log.push(text);
    ctx.events.push(data ? { kind, text, tags, data } : { kind, text, tags });
  }
}
