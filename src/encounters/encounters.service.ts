// 인카운터 조회 / 플레이어 행동 제출 — 종료 시 보상과 함께 한 번에 커밋

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  EncounterConflictError,
  ForbiddenError,
  NotFoundError,
} from '../common/errors/game-errors.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { GAME_STORE, type GameStore } from '../db/game-store.js';
import type {
  CombatAction,
  CombatantState,
  CombatEvent,
  EncounterRecord,
  PlayerProgress,
} from '../db/types/index.js';
import {
  CombatService,
  type CombatOutcome,
  type CombatRules,
} from '../engine/combat/combat.service.js';
import {
  ProgressionService,
  type CompletionSummary,
} from '../engine/progression/progression.service.js';
import { StatsService } from '../engine/stats/stats.service.js';
import { StatusService } from '../engine/status/status.service.js';
import { PlayerService } from '../player/player.service.js';
import type { CombatantView, EncounterView } from './encounter-view.js';
import type { SubmitActionBody } from './dto/submit-action.dto.js';

export interface SubmitActionResult {
  encounter: EncounterView;
  events: CombatEvent[];
  outcome: CombatOutcome;
  actionUnavailable: boolean;
  completion: CompletionSummary | null;
  progress: PlayerProgress | null;
}

@Injectable()
export class EncountersService {
  private readonly logger = new Logger(EncountersService.name);

  constructor(
    @Inject(GAME_STORE) private readonly store: GameStore,
    private readonly combat: CombatService,
    private readonly progression: ProgressionService,
    private readonly statsService: StatsService,
    private readonly statusService: StatusService,
    private readonly content: ContentLoaderService,
    private readonly players: PlayerService,
  ) {}

  async getActiveEncounter(userId: string): Promise<EncounterView | null> {
    const record = await this.store.getActiveEncounter(userId);
    return record ? this.toView(record) : null;
  }

  async getEncounter(userId: string, encounterId: string): Promise<EncounterView> {
    return this.toView(await this.getOwned(userId, encounterId));
  }

  async submitAction(
    userId: string,
    encounterId: string,
    body: SubmitActionBody,
  ): Promise<SubmitActionResult> {
    const record = await this.getOwned(userId, encounterId);
    const round = record.state.round;
    if (body.expectedRound !== undefined && body.expectedRound !== round) {
      throw new EncounterConflictError('ROUND_CONFLICT', 'Encounter round has moved on', {
        encounterId,
        expectedRound: body.expectedRound,
        round,
      });
    }

    const action: CombatAction =
      body.type === 'SPECIAL' ? { type: 'SPECIAL', abilityId: body.abilityId } : { type: body.type };
    const result = this.combat.resolvePlayerAction(record.state, action, this.combatRules());

    // 저장은 읽은 라운드 그대로일 때만 — 동시 제출 중 하나만 반영
    if (result.outcome === 'ONGOING') {
      const next: EncounterRecord = { ...record, state: result.nextState };
      await this.store.commit(userId, { encounter: next, expectedRound: round });
      return {
        encounter: this.toView(next),
        events: result.events,
        outcome: result.outcome,
        actionUnavailable: result.actionUnavailable,
        completion: null,
        progress: null,
      };
    }

    // 종료: 인카운터 결과 + 보상을 같은 커밋으로
    const finished: EncounterRecord = {
      ...record,
      status: result.outcome,
      state: result.nextState,
    };
    const current = await this.players.loadProgress(userId, Date.now());
    const { progress, summary } = this.progression.complete(
      current,
      record.questId,
      result.outcome,
    );
    await this.store.commit(userId, { progress, encounter: finished, expectedRound: round });

    this.logger.log(
      `Encounter ${result.outcome}: user=${userId} quest=${record.questId} ` +
        `rounds=${result.nextState.round}`,
    );
    if (summary.levelsGained > 0) {
      this.logger.log(`Level up: user=${userId} level=${summary.level}`);
    }

    return {
      encounter: this.toView(finished),
      events: result.events,
      outcome: result.outcome,
      actionUnavailable: result.actionUnavailable,
      completion: summary,
      progress,
    };
  }

  toView(record: EncounterRecord): EncounterView {
    const { state } = record;
    return {
      encounterId: record.encounterId,
      questId: record.questId,
      status: record.status,
      phase: state.phase,
      round: state.round,
      player: this.combatantView(state.player),
      enemy: {
        ...this.combatantView(state.enemy),
        templateId: state.enemy.templateId,
        archetype: state.enemy.archetype,
        behavior: state.enemy.behavior,
      },
      abilities: state.playerAbilityIds.map((abilityId) => ({
        abilityId,
        name: this.content.getAbility(abilityId)?.name ?? abilityId,
      })),
      log: [...state.log],
    };
  }

  private combatantView(combatant: CombatantState): CombatantView {
    return {
      name: combatant.name,
      hp: combatant.hp,
      maxHealth: combatant.stats.maxHealth,
      defending: combatant.defending,
      stats: this.statsService.buildSnapshot(
        combatant.stats,
        this.statusService.getModifiers(combatant.statuses),
      ),
      statuses: combatant.statuses.map((s) => {
        const def = this.statusService.getDefinition(s.kind);
        return { ...s, label: def.label, icon: def.icon };
      }),
      statusDisplay: this.statusService.describe(combatant.statuses),
    };
  }

  private combatRules(): CombatRules {
    const content = this.content.get();
    return {
      abilities: content.abilities,
      lowHealthThreshold: content.rules.lowHealthThreshold,
    };
  }

  private async getOwned(userId: string, encounterId: string): Promise<EncounterRecord> {
    const record = await this.store.getEncounter(encounterId);
    if (!record) {
      throw new NotFoundError(`Encounter not found: ${encounterId}`);
    }
    if (record.userId !== userId) {
      throw new ForbiddenError('Encounter belongs to another player');
    }
    return record;
  }
}
