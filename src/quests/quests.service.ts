// GET /v1/quests, POST /v1/quests/:questId/start

import { randomUUID } from 'crypto';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { EncounterConflictError, InternalError } from '../common/errors/game-errors.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { GAME_STORE, type GameStore } from '../db/game-store.js';
import type { EncounterRecord, PlayerProgress } from '../db/types/index.js';
import { CombatService } from '../engine/combat/combat.service.js';
import {
  ProgressionService,
  type CompletionSummary,
  type QuestBoardChain,
  type QuestKind,
} from '../engine/progression/progression.service.js';
import type { EncounterView } from '../encounters/encounter-view.js';
import { EncountersService } from '../encounters/encounters.service.js';
import { PlayerService } from '../player/player.service.js';

export interface QuestStartResponse {
  questId: string;
  kind: QuestKind;
  progress: PlayerProgress;
  encounter: EncounterView | null;
  completion: CompletionSummary | null;
}

@Injectable()
export class QuestsService {
  private readonly logger = new Logger(QuestsService.name);

  constructor(
    @Inject(GAME_STORE) private readonly store: GameStore,
    private readonly progression: ProgressionService,
    private readonly combat: CombatService,
    private readonly content: ContentLoaderService,
    private readonly players: PlayerService,
    private readonly encounters: EncountersService,
  ) {}

  async getBoard(userId: string): Promise<{ chains: QuestBoardChain[] }> {
    const progress = await this.players.loadProgress(userId, Date.now());
    return { chains: this.progression.questBoard(progress) };
  }

  async startQuest(userId: string, questId: string): Promise<QuestStartResponse> {
    const now = Date.now();
    const current = await this.players.loadProgress(userId, now);
    const started = this.progression.startQuest(current, questId, now);

    // 서사 퀘스트: 시작 즉시 완료
    if (started.kind === 'NARRATIVE') {
      const { progress, summary } = this.progression.complete(
        started.progress,
        questId,
        'NARRATIVE',
      );
      await this.store.commit(userId, { progress });
      this.logger.log(`Narrative quest completed: user=${userId} quest=${questId}`);
      if (summary.levelsGained > 0) {
        this.logger.log(`Level up: user=${userId} level=${summary.level}`);
      }
      return { questId, kind: started.kind, progress, encounter: null, completion: summary };
    }

    const active = await this.store.getActiveEncounter(userId);
    if (active) {
      throw new EncounterConflictError('ENCOUNTER_ACTIVE', 'Another encounter is active', {
        encounterId: active.encounterId,
      });
    }

    const enemyRef = started.quest.enemy;
    if (!enemyRef) {
      throw new InternalError(`Combat quest without enemy: ${questId}`);
    }
    const enemy = this.progression.scaleEnemy(enemyRef.templateId, enemyRef.level);
    const rules = this.content.getRules();

    const state = this.combat.createEncounter({
      encounterId: randomUUID(),
      questId,
      seed: randomUUID(),
      player: { name: rules.playerName, stats: started.progress.baseStats },
      enemy: {
        templateId: enemy.templateId,
        name: enemy.name,
        archetype: enemy.archetype,
        behavior: enemy.behavior,
        stats: enemy.stats,
        abilityIds: this.content.getArchetypeAbilities(enemy.archetype).map((a) => a.abilityId),
      },
      playerAbilityIds: this.progression
        .availableAbilities(started.progress)
        .map((a) => a.abilityId),
    });

    const record: EncounterRecord = {
      encounterId: state.encounterId,
      userId,
      questId,
      status: 'ACTIVE',
      state,
    };
    // 에너지 차감 + 인카운터 생성은 한 커밋
    await this.store.commit(userId, { progress: started.progress, encounter: record });

    this.logger.log(
      `Quest started: user=${userId} quest=${questId} enemy=${enemy.name} ` +
        `energy=${started.progress.energy}/${started.progress.energyMax}`,
    );

    return {
      questId,
      kind: started.kind,
      progress: started.progress,
      encounter: this.encounters.toView(record),
      completion: null,
    };
  }
}
