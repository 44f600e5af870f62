import { Injectable } from '@nestjs/common';
import { EncounterConflictError } from '../common/errors/game-errors.js';
import type { GameStore, GameStoreCommit } from './game-store.js';
import type { EncounterRecord } from './types/index.js';

/** GAME_STORE=memory 및 테스트용. 저장 시 JSON 복제로 호출자 객체와 분리 */
@Injectable()
export class InMemoryGameStore implements GameStore {
  private readonly progress = new Map<string, string>();
  private readonly encounters = new Map<string, string>();
  /** userId → ACTIVE encounterId */
  private readonly activeByUser = new Map<string, string>();

  async loadProgress(userId: string): Promise<unknown> {
    const raw = this.progress.get(userId);
    return raw === undefined ? null : JSON.parse(raw);
  }

  async getEncounter(encounterId: string): Promise<EncounterRecord | null> {
    return this.readEncounter(encounterId);
  }

  async getActiveEncounter(userId: string): Promise<EncounterRecord | null> {
    const encounterId = this.activeByUser.get(userId);
    return encounterId === undefined ? null : this.readEncounter(encounterId);
  }

  // 검사와 반영 사이에 await 없음 — 동시 커밋이 끼어들 수 없다
  async commit(userId: string, changes: GameStoreCommit): Promise<void> {
    const incoming = changes.encounter;
    if (incoming) {
      if (changes.expectedRound !== undefined) {
        const stored = this.readEncounter(incoming.encounterId);
        if (
          !stored ||
          stored.status !== 'ACTIVE' ||
          stored.state.round !== changes.expectedRound
        ) {
          throw new EncounterConflictError('ROUND_CONFLICT', 'Encounter was updated concurrently', {
            encounterId: incoming.encounterId,
            expectedRound: changes.expectedRound,
          });
        }
      }

      // encounters_user_active_idx 와 같은 제약
      const activeId = this.activeByUser.get(incoming.userId);
      if (
        incoming.status === 'ACTIVE' &&
        activeId !== undefined &&
        activeId !== incoming.encounterId
      ) {
        throw new EncounterConflictError('ENCOUNTER_ACTIVE', 'Another encounter is active', {
          encounterId: activeId,
        });
      }
    }

    // 직렬화를 먼저 끝낸 뒤 한 번에 반영
    const progress = changes.progress ? JSON.stringify(changes.progress) : undefined;
    const encounter = incoming ? JSON.stringify(incoming) : undefined;

    if (progress !== undefined) this.progress.set(userId, progress);
    if (incoming && encounter !== undefined) {
      this.encounters.set(incoming.encounterId, encounter);
      if (incoming.status === 'ACTIVE') {
        this.activeByUser.set(incoming.userId, incoming.encounterId);
      } else if (this.activeByUser.get(incoming.userId) === incoming.encounterId) {
        this.activeByUser.delete(incoming.userId);
      }
    }
  }

  private readEncounter(encounterId: string): EncounterRecord | null {
    const raw = this.encounters.get(encounterId);
    if (raw === undefined) return null;
    const record: EncounterRecord = JSON.parse(raw);
    return record;
  }
}
